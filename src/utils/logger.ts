import pino from 'pino';
import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        // stderr: stdout carries command output
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
 * If not initialized, builds one from SCENARIO_SYNTH_LOG_LEVEL / SCENARIO_SYNTH_JSON_LOGS
 * (info-level pretty output when neither is set).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        const envLevel = process.env['SCENARIO_SYNTH_LOG_LEVEL'];
        const level = LOG_LEVELS.find((l) => l === envLevel) ?? 'info';
        const jsonLogs = process.env['SCENARIO_SYNTH_JSON_LOGS'] === '1';
        loggerInstance = initLogger({ level, jsonLogs });
    }
    return loggerInstance;
}
