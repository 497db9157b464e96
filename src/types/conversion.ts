import type { Fingerprint } from './file-watcher.js';

/** `array` writes one JSON array; `lines` writes one JSON object per line. */
export type OutputFormat = 'array' | 'lines';

/** Delimiter and quote convention of a CSV file. */
export interface Dialect {
    delimiter: string;
    quote: string;
}

/** User overrides; `null` means "sniff it". */
export interface DialectOverride {
    delimiter: string | null;
    quote: string | null;
}

/** One parsed row: column name → raw cell text, in header order. */
export type CsvRecord = Record<string, string>;

export interface ConversionJob {
    sourcePath: string;
    /** Root of the watch target the source was found under. */
    watchRoot: string;
    /** Fingerprint the source had when the gate promoted it. */
    fingerprint: Fingerprint;
    /** Deterministic output path; uniquified at write time unless `overwrite`. */
    outputPath: string;
    format: OutputFormat;
    /** Pretty-print indent for array mode. Ignored in lines mode. */
    indent: number | null;
    dialect: DialectOverride;
    /** Input encoding label, e.g. `utf-8-sig` or `latin1`. */
    encoding: string;
    overwrite: boolean;
    /** Digest of the last converted bytes; identical content is skipped. */
    previousDigest?: string;
}

export type ConversionResult =
    | {
          status: 'converted';
          outputPath: string;
          rowCount: number;
          digest: string;
          fingerprint: Fingerprint;
          dialect: Dialect;
      }
    | { status: 'unchanged'; digest: string; fingerprint: Fingerprint }
    | { status: 'failed'; error: Error }
    | { status: 'abandoned' };
