/**
 * Logger
 *
 * Shared winston logger for the whole server. Messages follow the
 * `[Component] message key=value` convention; structured metadata can be
 * passed as the second argument and is appended as JSON.
 *
 * Level comes from LOG_LEVEL (default: info).
 *
 * @module server/utils/logger
 */

import winston from 'winston';

const { combine, timestamp, errors, printf, colorize } = winston.format;

const LEVELS = ['error', 'warn', 'info', 'debug'] as const;

function resolveLevel(value: string | undefined): string {
    const level = (value || 'info').toLowerCase();
    return (LEVELS as readonly string[]).includes(level) ? level : 'info';
}

const lineFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${String(ts)} ${level}: ${String(message)}${extra}${trace}`;
});

const logger = winston.createLogger({
    level: resolveLevel(process.env.LOG_LEVEL),
    format: combine(
        errors({ stack: true }),
        timestamp(),
        lineFormat
    ),
    transports: [
        new winston.transports.Console({
            format: combine(
                colorize({ level: process.stdout.isTTY === true }),
                errors({ stack: true }),
                timestamp(),
                lineFormat
            ),
        }),
    ],
});

/**
 * Change the active level at runtime (e.g. after config is loaded).
 */
export function setLogLevel(level: string | undefined): void {
    logger.level = resolveLevel(level);
}

export default logger;
