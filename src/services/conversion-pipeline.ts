import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { resolveDialect } from './csv-dialect.js';
import { parseRecords, type ParsedCsv } from './csv-parser.js';
import { serializeRecords } from './json-serializer.js';
import { publishOverwrite, publishUnique } from './output-path.js';
import { sameFingerprint } from './stability-gate.js';
import { decodeBytes } from './text-decoding.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { isMissingFileError } from '../utils/fs-errors.js';
import {
    CsvWatchError,
    ParseError,
    RaceAbortError,
    SourceVanishedError,
    WriteError,
    errorMessage,
} from '../types/errors.js';
import type { ConversionJob, ConversionResult } from '../types/conversion.js';
import type { Fingerprint } from '../types/file-watcher.js';

export interface ConversionPipelineOptions {
    logger?: Logger;
}

function digestOf(bytes: Uint8Array): string {
    return createHash('sha256').update(bytes).digest('hex');
}

/**
 * Turns one stable CSV file into one JSON output file.
 *
 * `run()` resolves with a result for every per-file failure instead of
 * throwing: `ParseError` and `WriteError` come back as `failed`, and losing a
 * race with the writer comes back as `failed` with a `RaceAbortError` or
 * `SourceVanishedError` so the caller can re-observe the file.
 *
 * The output is written to a hidden temp file next to its destination and
 * moved into place in one step; an aborted job removes its temp file.
 */
export class ConversionPipeline {
    readonly #log: Logger;

    constructor(options: ConversionPipelineOptions = {}) {
        this.#log = options.logger ?? componentLogger('pipeline');
    }

    async run(job: ConversionJob, signal?: AbortSignal): Promise<ConversionResult> {
        try {
            return await this.#convert(job, signal);
        } catch (err) {
            const error =
                err instanceof CsvWatchError
                    ? err
                    : new ParseError(job.sourcePath, errorMessage(err), { cause: err });
            return { status: 'failed', error };
        }
    }

    async #convert(job: ConversionJob, signal?: AbortSignal): Promise<ConversionResult> {
        const source = job.sourcePath;

        const before = await this.#fingerprint(source);
        if (!sameFingerprint(before, job.fingerprint)) {
            throw new RaceAbortError(source, 'size or mtime changed after it was promoted');
        }

        let bytes: Buffer;
        try {
            bytes = await readFile(source);
        } catch (err) {
            if (isMissingFileError(err)) throw new SourceVanishedError(source, { cause: err });
            throw new ParseError(source, `unreadable: ${errorMessage(err)}`, { cause: err });
        }

        const after = await this.#fingerprint(source);
        if (!sameFingerprint(after, before) || bytes.length !== after.size) {
            throw new RaceAbortError(source, 'modified while it was being read');
        }

        const digest = digestOf(bytes);
        if (job.previousDigest === digest) {
            this.#log.debug({ path: source }, 'pipeline: content identical to last conversion');
            return { status: 'unchanged', digest, fingerprint: after };
        }

        let text: string;
        try {
            text = decodeBytes(bytes, job.encoding);
        } catch (err) {
            throw new ParseError(source, `not valid ${job.encoding}`, { cause: err });
        }

        const dialect = resolveDialect(text, job.dialect);
        let parsed: ParsedCsv;
        try {
            parsed = parseRecords(text, dialect);
        } catch (err) {
            throw new ParseError(source, errorMessage(err), { cause: err });
        }
        if (parsed.positional) {
            this.#log.info({ path: source }, 'pipeline: no usable header row; using positional column names');
        }

        const payload = serializeRecords(parsed.records, job.format, job.indent);
        if (signal?.aborted) {
            return { status: 'abandoned' };
        }

        const outputPath = await this.#publish(job, payload, signal);
        if (!outputPath) {
            return { status: 'abandoned' };
        }

        return {
            status: 'converted',
            outputPath,
            rowCount: parsed.records.length,
            digest,
            fingerprint: after,
            dialect,
        };
    }

    async #fingerprint(source: string): Promise<Fingerprint> {
        try {
            const stats = await stat(source);
            return { size: stats.size, mtimeMs: stats.mtimeMs };
        } catch (err) {
            if (isMissingFileError(err)) throw new SourceVanishedError(source, { cause: err });
            throw new ParseError(source, `cannot stat: ${errorMessage(err)}`, { cause: err });
        }
    }

    /** Resolves the final path, or `null` if the job was aborted before publishing. */
    async #publish(job: ConversionJob, payload: string, signal?: AbortSignal): Promise<string | null> {
        const directory = path.dirname(job.outputPath);
        const tempPath = path.join(
            directory,
            `.${path.basename(job.outputPath)}.${randomUUID().slice(0, 8)}.tmp`,
        );

        try {
            await mkdir(directory, { recursive: true });
            await writeFile(tempPath, payload, 'utf8');
        } catch (err) {
            await this.#discard(tempPath);
            throw new WriteError(job.outputPath, errorMessage(err), { cause: err });
        }

        if (signal?.aborted) {
            await this.#discard(tempPath);
            return null;
        }

        try {
            return job.overwrite
                ? await publishOverwrite(tempPath, job.outputPath)
                : await publishUnique(tempPath, job.outputPath);
        } catch (err) {
            await this.#discard(tempPath);
            throw new WriteError(job.outputPath, errorMessage(err), { cause: err });
        }
    }

    async #discard(tempPath: string): Promise<void> {
        try {
            await rm(tempPath, { force: true });
        } catch (err) {
            this.#log.warn({ err, path: tempPath }, 'pipeline: failed to remove temp file');
        }
    }
}
