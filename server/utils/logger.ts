import { logLevel } from '../config/env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/**
 * Console logger that prefixes every line with the component tag, e.g. `[GameState] Game started`.
 * Lines below `level` are dropped.
 */
export function createLogger(tag: string, level: LogLevel = logLevel): Logger {
    const enabled = (wanted: LogLevel) => LEVEL_ORDER[wanted] >= LEVEL_ORDER[level];

    return {
        debug: (message, ...meta) => {
            if (enabled('debug')) console.debug(`[${tag}] ${message}`, ...meta);
        },
        info: (message, ...meta) => {
            if (enabled('info')) console.log(`[${tag}] ${message}`, ...meta);
        },
        warn: (message, ...meta) => {
            if (enabled('warn')) console.warn(`[${tag}] ${message}`, ...meta);
        },
        error: (message, ...meta) => {
            if (enabled('error')) console.error(`[${tag}] ${message}`, ...meta);
        },
    };
}
