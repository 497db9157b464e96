import { constants } from 'node:fs';
import { access, mkdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_ENCODING, isSupportedEncoding } from '../services/text-decoding.js';
import { isLogLevel } from '../utils/logger.js';
import { StartupError, errorMessage } from '../types/errors.js';
import type { LevelWithSilent } from 'pino';
import type { DialectOverride, OutputFormat } from '../types/conversion.js';
import type { WatchTarget } from '../types/file-watcher.js';

export interface WatchConfig {
    targets: WatchTarget[];
    /** Where outputs go. `null` writes each output beside its source's watch root. */
    outputDir: string | null;
    processExisting: boolean;
    format: OutputFormat;
    overwrite: boolean;
    indent: number | null;
    dialect: DialectOverride;
    encoding: string;
    quietPeriodMs: number;
    pollIntervalMs: number;
    coalesceMs: number;
    workers: number;
    forcePolling: boolean;
    shutdownGraceMs: number;
    maxIdleEntries: number;
    logLevel: LevelWithSilent;
}

export const DEFAULT_WATCH_CONFIG: Omit<WatchConfig, 'targets'> = {
    outputDir: null,
    processExisting: false,
    format: 'array',
    overwrite: false,
    indent: null,
    dialect: { delimiter: null, quote: null },
    encoding: DEFAULT_ENCODING,
    quietPeriodMs: 1250,
    pollIntervalMs: 2000,
    coalesceMs: 100,
    workers: 1,
    forcePolling: false,
    shutdownGraceMs: 5000,
    maxIdleEntries: 10_000,
    logLevel: 'info',
};

/** Raw settings as collected from the command line. Anything omitted falls back to env, then defaults. */
export interface WatchConfigInput {
    directories: string[];
    outputDir?: string;
    recursive?: boolean;
    processExisting?: boolean;
    format?: string;
    overwrite?: boolean;
    indent?: number;
    delimiter?: string;
    quoteChar?: string;
    encoding?: string;
    quietPeriodMs?: number;
    pollIntervalMs?: number;
    workers?: number;
    forcePolling?: boolean;
    shutdownGraceMs?: number;
    logLevel?: string;
}

/** Environment variables consulted when the matching option is absent. */
export const ENV_KEYS = {
    quietPeriodMs: 'CSVWATCH_QUIET_MS',
    pollIntervalMs: 'CSVWATCH_POLL_INTERVAL_MS',
    logLevel: 'LOG_LEVEL',
} as const;

const FORMATS: readonly OutputFormat[] = ['array', 'lines'];

function isOutputFormat(value: string): value is OutputFormat {
    return FORMATS.some((format) => format === value);
}

function envInteger(env: NodeJS.ProcessEnv, key: string): number | undefined {
    const raw = env[key]?.trim();
    if (!raw) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new StartupError(`${key} must be an integer, got '${raw}'.`);
    }
    return value;
}

function requireInteger(name: string, value: number, min: number): number {
    if (!Number.isInteger(value) || value < min) {
        throw new StartupError(`${name} must be an integer >= ${min}, got ${value}.`);
    }
    return value;
}

/** `\t` and `tab` both mean a tab character. */
function normalizeDelimiter(value: string | undefined): string | null {
    if (value === undefined) return null;
    if (value === '\\t' || value.toLowerCase() === 'tab') return '\t';
    return value;
}

function requireSingleChar(name: string, value: string | null): string | null {
    if (value !== null && [...value].length !== 1) {
        throw new StartupError(`${name} must be a single character, got '${value}'.`);
    }
    return value;
}

/**
 * Merge CLI input, environment and defaults into a validated config.
 * Throws `StartupError` on any invalid value. Does not touch the filesystem.
 */
export function resolveWatchConfig(input: WatchConfigInput, env: NodeJS.ProcessEnv = process.env): WatchConfig {
    const directories = [...new Set(input.directories.map((dir) => path.resolve(dir)))];
    if (directories.length === 0) {
        throw new StartupError('At least one directory to watch is required.');
    }
    const recursive = input.recursive ?? false;
    const targets: WatchTarget[] = directories.map((directory) => ({ id: directory, directory, recursive }));

    const format = input.format ?? DEFAULT_WATCH_CONFIG.format;
    if (!isOutputFormat(format)) {
        throw new StartupError(`Unknown output format '${format}'. Expected one of: ${FORMATS.join(', ')}.`);
    }

    const delimiter = requireSingleChar('Delimiter', normalizeDelimiter(input.delimiter));
    const quote = requireSingleChar('Quote character', input.quoteChar ?? null);
    if (delimiter !== null && delimiter === quote) {
        throw new StartupError('Delimiter and quote character must differ.');
    }

    const encoding = input.encoding ?? DEFAULT_WATCH_CONFIG.encoding;
    if (!isSupportedEncoding(encoding)) {
        throw new StartupError(`Unsupported input encoding '${encoding}'.`);
    }

    const logLevel = (input.logLevel ?? env[ENV_KEYS.logLevel] ?? DEFAULT_WATCH_CONFIG.logLevel).trim().toLowerCase();
    if (!isLogLevel(logLevel)) {
        throw new StartupError(`Unknown log level '${logLevel}'.`);
    }

    const indent = input.indent === undefined ? null : requireInteger('Indent', input.indent, 0);

    return {
        targets,
        outputDir: input.outputDir ? path.resolve(input.outputDir) : null,
        processExisting: input.processExisting ?? DEFAULT_WATCH_CONFIG.processExisting,
        format,
        overwrite: input.overwrite ?? DEFAULT_WATCH_CONFIG.overwrite,
        indent,
        dialect: { delimiter, quote },
        encoding,
        quietPeriodMs: requireInteger(
            'Quiet period',
            input.quietPeriodMs ?? envInteger(env, ENV_KEYS.quietPeriodMs) ?? DEFAULT_WATCH_CONFIG.quietPeriodMs,
            0,
        ),
        pollIntervalMs: requireInteger(
            'Poll interval',
            input.pollIntervalMs ?? envInteger(env, ENV_KEYS.pollIntervalMs) ?? DEFAULT_WATCH_CONFIG.pollIntervalMs,
            1,
        ),
        coalesceMs: DEFAULT_WATCH_CONFIG.coalesceMs,
        workers: requireInteger('Workers', input.workers ?? DEFAULT_WATCH_CONFIG.workers, 1),
        forcePolling: input.forcePolling ?? DEFAULT_WATCH_CONFIG.forcePolling,
        shutdownGraceMs: requireInteger(
            'Shutdown timeout',
            input.shutdownGraceMs ?? DEFAULT_WATCH_CONFIG.shutdownGraceMs,
            0,
        ),
        maxIdleEntries: DEFAULT_WATCH_CONFIG.maxIdleEntries,
        logLevel,
    };
}

async function assertDirectory(label: string, directory: string, mode: number): Promise<void> {
    let isDirectory = false;
    try {
        isDirectory = (await stat(directory)).isDirectory();
    } catch (err) {
        throw new StartupError(`${label} ${directory} cannot be accessed: ${errorMessage(err)}`, { cause: err });
    }
    if (!isDirectory) {
        throw new StartupError(`${label} ${directory} is not a directory.`);
    }
    try {
        await access(directory, mode);
    } catch (err) {
        throw new StartupError(`${label} ${directory} lacks the required permissions.`, { cause: err });
    }
}

/**
 * Check every watch root is a readable directory and that outputs can be
 * written, creating an explicit output directory if needed.
 */
export async function verifyDirectories(config: WatchConfig): Promise<void> {
    for (const target of config.targets) {
        const mode = config.outputDir ? constants.R_OK | constants.X_OK : constants.R_OK | constants.W_OK | constants.X_OK;
        await assertDirectory('Watch directory', target.directory, mode);
    }

    if (config.outputDir) {
        try {
            await mkdir(config.outputDir, { recursive: true });
        } catch (err) {
            throw new StartupError(`Output directory ${config.outputDir} cannot be created: ${errorMessage(err)}`, {
                cause: err,
            });
        }
        await assertDirectory('Output directory', config.outputDir, constants.W_OK | constants.X_OK);
    }
}
