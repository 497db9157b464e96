import type { Dialect, DialectOverride } from '../types/conversion.js';

/** How much of the decoded text the sniffer looks at. */
export const SNIFF_SAMPLE_CHARS = 4096;

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|', ':'];
const CANDIDATE_QUOTES = ['"', "'"];
const MAX_SAMPLE_RECORDS = 20;

export const DEFAULT_DIALECT: Dialect = { delimiter: ',', quote: '"' };

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Split a sample into records, honouring quoted newlines. The last record is
 * dropped when the sample was truncated mid-record.
 */
function sampleRecords(sample: string, quote: string, truncated: boolean): string[] {
    const records: string[] = [];
    let current = '';
    let inQuotes = false;

    for (const char of sample) {
        if (char === quote) {
            inQuotes = !inQuotes;
        }
        if (!inQuotes && (char === '\n' || char === '\r')) {
            if (current.length > 0) records.push(current);
            current = '';
            continue;
        }
        current += char;
    }
    if (current.length > 0 && !truncated) records.push(current);

    return records.slice(0, MAX_SAMPLE_RECORDS);
}

function countOutsideQuotes(record: string, delimiter: string, quote: string): number {
    let count = 0;
    let inQuotes = false;
    for (const char of record) {
        if (char === quote) inQuotes = !inQuotes;
        else if (!inQuotes && char === delimiter) count += 1;
    }
    return count;
}

function sniffQuote(sample: string): string | null {
    const boundary = `[${CANDIDATE_DELIMITERS.map(escapeRegExp).join('')}]`;
    let best: { quote: string; hits: number } | null = null;

    for (const quote of CANDIDATE_QUOTES) {
        const q = escapeRegExp(quote);
        const opening = sample.match(new RegExp(`(?:^|${boundary}|\\n)${q}`, 'gm'))?.length ?? 0;
        const closing = sample.match(new RegExp(`${q}(?:$|${boundary}|\\r?\\n)`, 'gm'))?.length ?? 0;
        const hits = Math.min(opening, closing);
        if (hits > 0 && (!best || hits > best.hits)) {
            best = { quote, hits };
        }
    }

    return best?.quote ?? null;
}

function sniffDelimiter(records: string[], quote: string): string | null {
    let best: { delimiter: string; count: number } | null = null;

    for (const delimiter of CANDIDATE_DELIMITERS) {
        const counts = records.map((record) => countOutsideQuotes(record, delimiter, quote));
        const first = counts[0] ?? 0;
        const consistent = first > 0 && counts.every((count) => count === first);
        if (consistent && (!best || first > best.count)) {
            best = { delimiter, count: first };
        }
    }

    return best?.delimiter ?? null;
}

/**
 * Guess the delimiter and quote character of a CSV sample.
 *
 * A delimiter qualifies when every sampled record contains it the same,
 * non-zero number of times outside quotes; the most frequent qualifier wins.
 * Returns `null` when nothing qualifies.
 */
export function sniffDialect(sample: string): Dialect | null {
    const truncated = sample.length > SNIFF_SAMPLE_CHARS;
    const text = sample.slice(0, SNIFF_SAMPLE_CHARS);
    const quote = sniffQuote(text) ?? DEFAULT_DIALECT.quote;
    const records = sampleRecords(text, quote, truncated);
    if (records.length === 0) return null;

    const delimiter = sniffDelimiter(records, quote);
    if (!delimiter) return null;

    return { delimiter, quote };
}

/** Apply user overrides on top of the sniffed dialect, then the defaults. */
export function resolveDialect(text: string, override: DialectOverride): Dialect {
    if (override.delimiter && override.quote) {
        return { delimiter: override.delimiter, quote: override.quote };
    }

    const sniffed = sniffDialect(text);
    return {
        delimiter: override.delimiter ?? sniffed?.delimiter ?? DEFAULT_DIALECT.delimiter,
        quote: override.quote ?? sniffed?.quote ?? DEFAULT_DIALECT.quote,
    };
}
