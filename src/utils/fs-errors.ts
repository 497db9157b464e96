/** `code` of a Node system error, if there is one. */
export function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

/** ENOENT, or ENOTDIR when a parent directory was replaced by a file. */
export function isMissingFileError(err: unknown): boolean {
    const code = errorCode(err);
    return code === 'ENOENT' || code === 'ENOTDIR';
}
