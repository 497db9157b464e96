import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { isCandidatePath } from './path-filter.js';
import { isMissingFileError } from '../utils/fs-errors.js';
import type { Logger } from '../utils/logger.js';
import type { Fingerprint, WatchTarget } from '../types/file-watcher.js';

export interface ScannedFile extends Fingerprint {
    path: string;
    targetId: string;
}

/**
 * List every candidate CSV file under a watch target with its fingerprint.
 *
 * Fails only when the root itself cannot be read; unreadable subdirectories
 * and files that vanish mid-scan are skipped.
 */
export async function scanTarget(target: WatchTarget, log?: Logger): Promise<ScannedFile[]> {
    const found: ScannedFile[] = [];
    const pending: string[] = [target.directory];

    while (pending.length > 0) {
        const directory = pending.pop();
        if (directory === undefined) break;

        let entries: Dirent[];
        try {
            entries = await readdir(directory, { withFileTypes: true });
        } catch (err) {
            if (directory === target.directory) throw err;
            log?.debug({ err, path: directory }, 'scan: skipping unreadable directory');
            continue;
        }

        for (const entry of entries) {
            const entryPath = path.join(directory, entry.name);
            if (entry.isDirectory()) {
                if (target.recursive) pending.push(entryPath);
                continue;
            }
            if (!entry.isFile() || !isCandidatePath(entryPath)) continue;

            try {
                const stats = await stat(entryPath);
                found.push({
                    path: entryPath,
                    targetId: target.id,
                    size: stats.size,
                    mtimeMs: stats.mtimeMs,
                });
            } catch (err) {
                if (!isMissingFileError(err)) {
                    log?.debug({ err, path: entryPath }, 'scan: skipping file that cannot be stat-ed');
                }
            }
        }
    }

    return found.sort((a, b) => a.path.localeCompare(b.path));
}
