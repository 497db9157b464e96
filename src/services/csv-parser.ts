import { parse as parseCsv } from 'csv-parse/sync';
import type { CsvRecord, Dialect } from '../types/conversion.js';

export interface ParsedCsv {
    /** Column names in output order. */
    columns: string[];
    records: CsvRecord[];
    /** True when the first row was not a usable header and positional keys were used. */
    positional: boolean;
}

function isStringMatrix(value: unknown): value is string[][] {
    return (
        Array.isArray(value) &&
        value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
    );
}

function positionalKey(index: number): string {
    return `col${index + 1}`;
}

function toRecord(columns: string[], row: string[]): CsvRecord {
    const width = Math.max(columns.length, row.length);
    const entries: [string, string][] = [];
    for (let index = 0; index < width; index++) {
        entries.push([columns[index] ?? positionalKey(index), row[index] ?? '']);
    }
    // fromEntries defines own properties, so a "__proto__" header stays a plain key.
    return Object.fromEntries(entries);
}

/**
 * Parse decoded CSV text into ordered records keyed by the header row.
 *
 * A missing header, or one with a blank column name, switches every row
 * (the first included) to positional keys `col1..colN`. Short rows are padded
 * with empty strings; cells past the header are keyed by position. Values are
 * never coerced. A quote inside an unquoted field is kept as text; an
 * unterminated quoted field throws.
 */
export function parseRecords(text: string, dialect: Dialect): ParsedCsv {
    const rows: unknown = parseCsv(text, {
        delimiter: dialect.delimiter,
        quote: dialect.quote,
        escape: dialect.quote,
        relax_quotes: true,
        relax_column_count: true,
        skip_empty_lines: true,
    });
    if (!isStringMatrix(rows)) {
        throw new TypeError('CSV parser returned an unexpected shape.');
    }

    const [header, ...body] = rows;
    if (!header) {
        return { columns: [], records: [], positional: false };
    }

    const usableHeader = header.length > 0 && header.every((name) => name.trim() !== '');
    if (!usableHeader) {
        const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
        const columns = Array.from({ length: width }, (_, index) => positionalKey(index));
        return { columns, records: rows.map((row) => toRecord(columns, row)), positional: true };
    }

    return { columns: [...header], records: body.map((row) => toRecord(header, row)), positional: false };
}
