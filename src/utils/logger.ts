import pino, { type LevelWithSilent, type Logger } from 'pino';

const VALID_LEVELS: LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LevelWithSilent {
    return VALID_LEVELS.some((level) => level === value);
}

function resolveLogLevel(): LevelWithSilent {
    const requested = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
    if (isLogLevel(requested)) {
        return requested;
    }
    return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger: Logger = pino({
    name: 'csvwatch',
    level: resolveLogLevel(),
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
});

/** Change the verbosity of the root logger. Children created afterwards inherit it. */
export function setLogLevel(level: LevelWithSilent): void {
    logger.level = level;
}

/** Child logger tagged with the emitting component. */
export function componentLogger(component: string): Logger {
    return logger.child({ component });
}

export type { Logger };
