import { access, link, rename, unlink } from 'node:fs/promises';
import path from 'node:path';
import { OUTPUT_EXTENSIONS } from './json-serializer.js';
import { errorCode } from '../utils/fs-errors.js';
import type { OutputFormat } from '../types/conversion.js';

const MAX_UNIQUE_ATTEMPTS = 10_000;
/** Filesystems without hard links report one of these from link(2). */
const LINK_UNSUPPORTED = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'EXDEV', 'ENOSYS']);

async function exists(filePath: string): Promise<boolean> {
    try {
        await access(filePath);
        return true;
    } catch (err) {
        if (errorCode(err) === 'ENOENT') return false;
        throw err;
    }
}

/**
 * Deterministic output path for a source file: the source's directory
 * relative to its watch root is mirrored under `outputRoot`, and the
 * extension is replaced by `.json` or `.jsonl`.
 */
export function deriveOutputPath(
    sourcePath: string,
    watchRoot: string,
    outputRoot: string,
    format: OutputFormat,
): string {
    const relativeDir = path.relative(watchRoot, path.dirname(sourcePath));
    const insideRoot = !relativeDir.startsWith('..') && !path.isAbsolute(relativeDir);
    const stem = path.basename(sourcePath, path.extname(sourcePath));
    return path.join(outputRoot, insideRoot ? relativeDir : '', `${stem}${OUTPUT_EXTENSIONS[format]}`);
}

/** `base`, then `stem_1.ext`, `stem_2.ext`, … */
export function* uniqueCandidates(basePath: string): Generator<string> {
    yield basePath;
    const ext = path.extname(basePath);
    const stem = path.basename(basePath, ext);
    const dir = path.dirname(basePath);
    for (let index = 1; index < MAX_UNIQUE_ATTEMPTS; index++) {
        yield path.join(dir, `${stem}_${index}${ext}`);
    }
}

/** First candidate that does not exist yet. Advisory only; see {@link publishUnique}. */
export async function nextFreeOutputPath(basePath: string): Promise<string> {
    for (const candidate of uniqueCandidates(basePath)) {
        if (!(await exists(candidate))) return candidate;
    }
    throw new Error(`No free output name near ${basePath} after ${MAX_UNIQUE_ATTEMPTS} attempts.`);
}

/** Move a finished temp file onto `target`, replacing whatever is there. */
export async function publishOverwrite(tempPath: string, target: string): Promise<string> {
    await rename(tempPath, target);
    return target;
}

/**
 * Move a finished temp file onto the first free candidate name.
 *
 * The name is claimed with link(2), which fails if the target exists, so an
 * existing file is never replaced even when another writer races us. Where
 * hard links are unsupported it falls back to check-then-rename.
 */
export async function publishUnique(tempPath: string, basePath: string): Promise<string> {
    for (const candidate of uniqueCandidates(basePath)) {
        try {
            await link(tempPath, candidate);
        } catch (err) {
            const code = errorCode(err);
            if (code === 'EEXIST') continue;
            if (code && LINK_UNSUPPORTED.has(code)) {
                const free = await nextFreeOutputPath(basePath);
                await rename(tempPath, free);
                return free;
            }
            throw err;
        }
        await unlink(tempPath);
        return candidate;
    }
    throw new Error(`No free output name near ${basePath} after ${MAX_UNIQUE_ATTEMPTS} attempts.`);
}
