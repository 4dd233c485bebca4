/**
 * Logger Module - structured logging
 *
 * Principles:
 * 1. Structured entries (JSON in production, one pretty line in development)
 * 2. Trace ID and chat session ID injected from the tracing context
 * 3. Levels debug/info/warn/error, daily file rotation kept for 14 days
 * 4. Errors are serialized in full (name, message, stack, cause chain);
 *    callers pass the original error object, never a wrapped copy
 *
 * Kinds:
 * - biz: usecase layer, reconstructs what a user did
 * - sys: adapter layer, locates bugs
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getTraceId, getSessionId } from './tracing.js';
import config from './config.js';

export type LogKind = 'biz' | 'sys';

export interface LogMeta {
    kind: LogKind;
    /** Emitting component, e.g. 'StreamRegistry' */
    component: string;
    message: string;
    /** Original error object, serialized in full */
    error?: unknown;
    meta?: Record<string, unknown>;
}

const IS_DEV = process.env.NODE_ENV !== 'production';

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

/**
 * Keeps the whole error: cause chain and any custom properties (code, status, ...)
 */
export function serializeError(error: unknown): Record<string, unknown> | undefined {
    if (!error) return undefined;

    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...(error.cause ? { cause: serializeError(error.cause) } : {}),
            ...Object.fromEntries(
                Object.entries(error).filter(([key]) => !['name', 'message', 'stack', 'cause'].includes(key))
            ),
        };
    }

    return { raw: isRecord(error) ? error : String(error) };
}

const jsonFormat = winston.format.printf(({ level, message, timestamp, ...rest }) => {
    const logObject: Record<string, unknown> = {
        timestamp,
        level,
        traceId: getTraceId() || '-',
        sessionId: getSessionId() || '-',
        ...rest,
        message,
    };

    if (rest.error) {
        logObject.error = serializeError(rest.error);
    }

    return JSON.stringify(logObject);
});

const prettyFormat = winston.format.printf(({ level, message, timestamp, kind, component, error, meta }) => {
    const traceId = getTraceId() || '-';
    const sessionId = getSessionId() || '-';

    let output = `${timestamp} [${level.toUpperCase().padEnd(5)}] [${kind || 'sys'}] [${traceId}] [${sessionId}] ${component || 'App'}: ${message}`;

    if (error) {
        const serialized = serializeError(error);
        if (serialized) {
            output += `\n  error: ${serialized.name} - ${serialized.message}`;
            if (serialized.stack) {
                output += `\n  stack: ${serialized.stack}`;
            }
            if (serialized.cause) {
                output += `\n  cause: ${JSON.stringify(serialized.cause)}`;
            }
        }
    }

    if (isRecord(meta) && Object.keys(meta).length > 0) {
        output += `\n  meta: ${JSON.stringify(meta)}`;
    }

    return output;
});

const consoleTransport = new winston.transports.Console({
    format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.colorize({ all: IS_DEV }),
        IS_DEV ? prettyFormat : jsonFormat
    ),
});

const transports: winston.transport[] = [consoleTransport];

if (config.logging.toFile) {
    // Daily rotation, 14 days, 50MB per file
    const fileTransport = new DailyRotateFile({
        dirname: config.logging.dir,
        filename: 'app-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '50m',
        maxFiles: '14d',
        format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
            jsonFormat
        ),
    });
    transports.push(fileTransport);
}

const winstonLogger = winston.createLogger({
    level: config.logging.level,
    transports,
});

/**
 * @example
 * logger.info({
 *     kind: 'biz',
 *     component: 'ChatStreamService',
 *     message: 'Stream admitted',
 *     meta: { streamId }
 * });
 *
 * logger.error({
 *     kind: 'sys',
 *     component: 'OpenRouterStreamAdapter',
 *     message: 'Provider request failed',
 *     error, // original error object
 *     meta: { status }
 * });
 */
export const logger = {
    debug: ({ message, ...rest }: LogMeta) => winstonLogger.debug(message, rest),
    info: ({ message, ...rest }: LogMeta) => winstonLogger.info(message, rest),
    warn: ({ message, ...rest }: LogMeta) => winstonLogger.warn(message, rest),
    error: ({ message, ...rest }: LogMeta) => winstonLogger.error(message, rest),
};

export default logger;
