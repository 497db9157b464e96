import path from 'node:path';

const CSV_EXTENSIONS = new Set(['.csv']);
const TEMP_SUFFIXES = ['.tmp', '.partial', '.part', '.crdownload'];
const TEMP_PREFIXES = ['.~', '~$', '.'];

/** Editor locks, hidden files and in-progress downloads. */
export function isProbablyTemp(filePath: string): boolean {
    const name = path.basename(filePath);
    const lower = name.toLowerCase();
    if (TEMP_PREFIXES.some((prefix) => name.startsWith(prefix))) return true;
    return TEMP_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

export function isCsvPath(filePath: string): boolean {
    return CSV_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/** True when a path is a candidate for conversion at all. */
export function isCandidatePath(filePath: string): boolean {
    return isCsvPath(filePath) && !isProbablyTemp(filePath);
}
