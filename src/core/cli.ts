import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { Dispatcher } from './dispatcher.js';
import {
    DEFAULT_WATCH_CONFIG,
    ENV_KEYS,
    resolveWatchConfig,
    verifyDirectories,
    type WatchConfig,
} from '../config/watch-config.js';
import { componentLogger, setLogLevel } from '../utils/logger.js';
import { isStartupError } from '../types/errors.js';

export const PROGRAM_NAME = 'csvwatch';
export const PROGRAM_VERSION = '0.1.0';

/** Where help, version and usage errors are printed. */
export interface CliOutput {
    writeOut(text: string): void;
    writeErr(text: string): void;
}

/** Option values as commander hands them over. */
interface CliOptions {
    out?: string;
    recursive?: boolean;
    processExisting?: boolean;
    format?: string;
    jsonl?: boolean;
    overwrite?: boolean;
    indent?: number;
    delimiter?: string;
    quotechar?: string;
    encoding?: string;
    logLevel?: string;
    quietMs?: number;
    pollInterval?: number;
    workers?: number;
    poll?: boolean;
    shutdownTimeout?: number;
}

export type ParsedCommandLine = { kind: 'config'; config: WatchConfig } | { kind: 'exit'; code: number };

const processOutput: CliOutput = {
    writeOut: (text) => process.stdout.write(text),
    writeErr: (text) => process.stderr.write(text),
};

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Expected an integer.');
    }
    return parsed;
}

export function createProgram(): Command {
    return new Command()
        .name(PROGRAM_NAME)
        .description('Watch directories and convert CSV files to JSON once they stop changing.')
        .version(PROGRAM_VERSION)
        .argument('<directories...>', 'directories to watch')
        .option('-o, --out <dir>', 'write outputs under this directory (default: beside each source)')
        .option('-r, --recursive', 'watch subdirectories too')
        .option('-e, --process-existing', 'convert files already present at startup')
        .addOption(
            new Option('-f, --format <format>', 'output format')
                .choices(['array', 'lines'])
                .default(DEFAULT_WATCH_CONFIG.format),
        )
        .addOption(new Option('--jsonl', 'shorthand for --format lines').conflicts('format'))
        .option('--overwrite', 'replace an existing output instead of picking a new name')
        .option('--indent <n>', 'pretty-print JSON arrays with this many spaces', parseInteger)
        .option('--delimiter <char>', 'field delimiter, `\\t` for tab (default: detect)')
        .option('--quotechar <char>', 'quote character (default: detect)')
        .option('--encoding <label>', 'input encoding', DEFAULT_WATCH_CONFIG.encoding)
        .option('--log-level <level>', `log verbosity (env ${ENV_KEYS.logLevel}, default: info)`)
        .option(
            '--quiet-ms <ms>',
            `time a file must stay unchanged (env ${ENV_KEYS.quietPeriodMs}, default: ${DEFAULT_WATCH_CONFIG.quietPeriodMs})`,
            parseInteger,
        )
        .option(
            '--poll-interval <ms>',
            `polling interval (env ${ENV_KEYS.pollIntervalMs}, default: ${DEFAULT_WATCH_CONFIG.pollIntervalMs})`,
            parseInteger,
        )
        .option('--workers <n>', 'conversions to run at once', parseInteger, DEFAULT_WATCH_CONFIG.workers)
        .option('--poll', 'use polling even when file notifications work')
        .option(
            '--shutdown-timeout <ms>',
            'how long running conversions may finish on shutdown',
            parseInteger,
            DEFAULT_WATCH_CONFIG.shutdownGraceMs,
        );
}

/**
 * Parse `argv` (user arguments only, without the node binary and script) into
 * a validated config. Help, version and usage errors come back as `exit`;
 * invalid values throw `StartupError`.
 */
export function parseCommandLine(
    argv: readonly string[],
    env: NodeJS.ProcessEnv = process.env,
    output: CliOutput = processOutput,
): ParsedCommandLine {
    const program = createProgram().exitOverride().configureOutput(output);
    try {
        program.parse([...argv], { from: 'user' });
    } catch (err) {
        if (err instanceof CommanderError) {
            return { kind: 'exit', code: err.exitCode };
        }
        throw err;
    }

    const options = program.opts<CliOptions>();
    const config = resolveWatchConfig(
        {
            directories: program.args,
            outputDir: options.out,
            recursive: options.recursive,
            processExisting: options.processExisting,
            format: options.jsonl ? 'lines' : options.format,
            overwrite: options.overwrite,
            indent: options.indent,
            delimiter: options.delimiter,
            quoteChar: options.quotechar,
            encoding: options.encoding,
            quietPeriodMs: options.quietMs,
            pollIntervalMs: options.pollInterval,
            workers: options.workers,
            forcePolling: options.poll,
            shutdownGraceMs: options.shutdownTimeout,
            logLevel: options.logLevel,
        },
        env,
    );
    return { kind: 'config', config };
}

export interface MainOptions {
    env?: NodeJS.ProcessEnv;
    output?: CliOutput;
    /** Resolves with the reason to shut down. Defaults to the first SIGINT or SIGTERM. */
    waitForShutdown?: (dispatcher: Dispatcher) => Promise<string>;
}

/** Run the watcher until shutdown. Resolves with the process exit code. */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
    const output = options.output ?? processOutput;

    let config: WatchConfig;
    try {
        const parsed = parseCommandLine(argv, options.env ?? process.env, output);
        if (parsed.kind === 'exit') return parsed.code;
        config = parsed.config;
    } catch (err) {
        if (isStartupError(err)) {
            output.writeErr(`${PROGRAM_NAME}: ${err.message}\n`);
            return 1;
        }
        throw err;
    }

    // Loggers created from here on pick up the configured level.
    setLogLevel(config.logLevel);
    const log = componentLogger('cli');

    let dispatcher: Dispatcher;
    try {
        await verifyDirectories(config);
        dispatcher = new Dispatcher({ config });
        await dispatcher.start();
    } catch (err) {
        if (isStartupError(err)) {
            log.error({ reason: err.message }, 'cli: startup failed');
            output.writeErr(`${PROGRAM_NAME}: ${err.message}\n`);
            return 1;
        }
        throw err;
    }

    const reason = await (options.waitForShutdown ?? waitForSignal)(dispatcher);
    log.info({ reason }, 'cli: shutting down');
    await dispatcher.drain();
    return 0;
}

function waitForSignal(): Promise<string> {
    return new Promise((resolve) => {
        const onSignal = (signal: NodeJS.Signals) => {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
            resolve(signal);
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);
    });
}
