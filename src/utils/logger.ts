// src/utils/logger.ts

import winston from 'winston';
import { config } from '@/config';
import { STORAGE_PATHS } from '@/config/apis';

type LogMeta = Record<string, unknown>;

const isTest = config.app.nodeEnv === 'test';

// Custom log format
const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, stack, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
        const serviceStr = service ? `[${String(service)}] ` : '';
        const stackStr = typeof stack === 'string' ? stack : '';
        return `${String(timestamp)} [${level.toUpperCase()}] ${serviceStr}${String(message)} ${stackStr} ${metaStr}`;
    })
);

const transports: winston.transport[] = [
    new winston.transports.Console({
        silent: isTest,
        format: winston.format.combine(
            winston.format.colorize(),
            logFormat
        )
    })
];

if (!isTest) {
    transports.push(
        // File transport for all logs
        new winston.transports.File({
            filename: STORAGE_PATHS.logs.app,
            maxsize: 5242880, // 5MB
            maxFiles: 5
        }),

        // Separate file for errors
        new winston.transports.File({
            filename: STORAGE_PATHS.logs.error,
            level: 'error',
            maxsize: 5242880, // 5MB
            maxFiles: 3
        })
    );
}

const logger = winston.createLogger({
    level: config.app.logLevel,
    format: logFormat,
    defaultMeta: { service: 'repo-spotlight-bot' },
    transports
});

const describeError = (error: unknown): LogMeta => {
    if (error instanceof Error) {
        return { error: error.message, stack: error.stack };
    }
    return error === undefined ? {} : { error };
};

// Service-specific loggers
export const createServiceLogger = (serviceName: string) => {
    return {
        info: (message: string, meta?: LogMeta) =>
            logger.info(message, { service: serviceName, ...meta }),

        error: (message: string, error?: unknown, meta?: LogMeta) =>
            logger.error(message, {
                service: serviceName,
                ...describeError(error),
                ...meta
            }),

        warn: (message: string, meta?: LogMeta) =>
            logger.warn(message, { service: serviceName, ...meta }),

        debug: (message: string, meta?: LogMeta) =>
            logger.debug(message, { service: serviceName, ...meta })
    };
};

// API request logging
export const logApiRequest = (
    service: string,
    endpoint: string,
    method: string,
    statusCode?: number
) => {
    const level = statusCode && statusCode >= 400 ? 'error' : 'info';
    logger.log(level, `API Request: ${method} ${endpoint}`, {
        service,
        endpoint,
        method,
        statusCode
    });
};

export default logger;
