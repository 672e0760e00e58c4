import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 *
 * Modules call `getLogger()` at the point of logging rather than caching the
 * instance, so a later `initLogger()` applies everywhere.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel | 'silent';
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ name: 'fieldscout', level });
    } else {
        loggerInstance = pino({
            name: 'fieldscout',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a logger at `FIELDSCOUT_LOG_LEVEL` (default info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: levelFromEnv() });
    }
    return loggerInstance;
}

function levelFromEnv(): LogLevel | 'silent' {
    const raw = process.env['FIELDSCOUT_LOG_LEVEL'];
    if (raw === 'silent' || raw === 'error' || raw === 'warn' || raw === 'info' || raw === 'debug') {
        return raw;
    }
    if (raw) {
        process.emitWarning(`Ignoring unknown FIELDSCOUT_LOG_LEVEL "${raw}"`);
    }
    return 'info';
}
