/** Base class for every error this package raises on purpose. */
export class CsvWatchError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CsvWatchError';
    }
}

/** The source file disappeared between stabilization and reading. */
export class SourceVanishedError extends CsvWatchError {
    readonly path: string;

    constructor(path: string, options?: { cause?: unknown }) {
        super(`Source vanished before it could be read: ${path}`, options);
        this.name = 'SourceVanishedError';
        this.path = path;
    }
}

/** The source changed after it was promoted; it must re-stabilize. */
export class RaceAbortError extends CsvWatchError {
    readonly path: string;

    constructor(path: string, detail: string) {
        super(`Source changed while converting ${path}: ${detail}`);
        this.name = 'RaceAbortError';
        this.path = path;
    }
}

/** The source could not be decoded or is not valid CSV. */
export class ParseError extends CsvWatchError {
    readonly path: string;

    constructor(path: string, detail: string, options?: { cause?: unknown }) {
        super(`Failed to parse ${path}: ${detail}`, options);
        this.name = 'ParseError';
        this.path = path;
    }
}

/** The output could not be written. */
export class WriteError extends CsvWatchError {
    readonly outputPath: string;

    constructor(outputPath: string, detail: string, options?: { cause?: unknown }) {
        super(`Failed to write ${outputPath}: ${detail}`, options);
        this.name = 'WriteError';
        this.outputPath = outputPath;
    }
}

/** Invalid configuration or no usable event source. Fatal. */
export class StartupError extends CsvWatchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StartupError';
    }
}

export function isRaceError(error: unknown): error is SourceVanishedError | RaceAbortError {
    return error instanceof SourceVanishedError || error instanceof RaceAbortError;
}

export function isStartupError(error: unknown): error is StartupError {
    return error instanceof StartupError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
