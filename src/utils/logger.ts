import pino, { type Logger } from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 * Output goes to stderr; stdout is reserved for command results.
 * Call `getLogger()` where you log, not at import time, so the startup
 * configuration applies.
 */
let loggerInstance: Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at the level named by
 * PAPERDEX_LOG_LEVEL (info when unset).
 */
export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: envLogLevel() ?? 'info' });
    }
    return loggerInstance;
}

function envLogLevel(): LogLevel | undefined {
    switch (process.env['PAPERDEX_LOG_LEVEL']) {
        case 'silent':
            return 'silent';
        case 'error':
            return 'error';
        case 'warn':
            return 'warn';
        case 'info':
            return 'info';
        case 'debug':
            return 'debug';
        default:
            return undefined;
    }
}
