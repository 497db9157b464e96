import { constants, type Stats } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { isMissingFileError } from '../utils/fs-errors.js';
import type { FileObservation } from '../types/stability.js';

/**
 * Stat a candidate file for the stability gate. Resolves `null` when the
 * path is gone or is no longer a regular file.
 */
export async function observeFile(filePath: string): Promise<FileObservation | null> {
    let stats: Stats;
    try {
        stats = await stat(filePath);
    } catch (err) {
        if (isMissingFileError(err)) return null;
        throw err;
    }
    if (!stats.isFile()) return null;

    let readable = true;
    try {
        await access(filePath, constants.R_OK);
    } catch (err) {
        if (isMissingFileError(err)) return null;
        readable = false;
    }

    return { size: stats.size, mtimeMs: stats.mtimeMs, readable };
}
