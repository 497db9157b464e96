import type { CsvRecord, OutputFormat } from '../types/conversion.js';

export const OUTPUT_EXTENSIONS: Record<OutputFormat, string> = {
    array: '.json',
    lines: '.jsonl',
};

/**
 * Render records as a JSON array, or as JSON Lines (one compact object per
 * line, each terminated by `\n`). `indent` only applies to array mode.
 */
export function serializeRecords(records: CsvRecord[], format: OutputFormat, indent: number | null): string {
    if (format === 'lines') {
        return records.map((record) => `${JSON.stringify(record)}\n`).join('');
    }
    return JSON.stringify(records, null, indent ?? undefined);
}
