import { config, LOG_LEVELS, LogLevel } from './config';

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

/**
 * Console logger that prefixes every line with `[tag]`, the way the engine's
 * services have always logged. Lines below `level` are dropped.
 */
export function createLogger(tag: string, level: LogLevel = config.logLevel): Logger {
    const TAG = `[${tag}]`;
    const threshold = LOG_LEVELS.indexOf(level);
    const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

    return {
        debug: (message, ...args) => {
            if (enabled('debug')) console.debug(`${TAG} ${message}`, ...args);
        },
        info: (message, ...args) => {
            if (enabled('info')) console.log(`${TAG} ${message}`, ...args);
        },
        warn: (message, ...args) => {
            if (enabled('warn')) console.warn(`${TAG} ${message}`, ...args);
        },
        error: (message, ...args) => {
            if (enabled('error')) console.error(`${TAG} ${message}`, ...args);
        },
    };
}
