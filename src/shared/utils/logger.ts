import pino from 'pino';
import type { GeocodeDirection, LogContext } from '../types/common.types';

/**
 * Create a logger instance with appropriate configuration
 */
function createLogger() {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const logLevel = process.env.LOG_LEVEL || 'info';

    const baseConfig = {
        level: logLevel,
        base: {
            env: process.env.NODE_ENV,
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    // Pretty print only in development
    if (isDevelopment) {
        return pino({
            ...baseConfig,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return pino(baseConfig);
}

/**
 * Global logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with context
 *
 * @example
 * const requestLogger = createContextLogger({ requestId: '123' });
 * requestLogger.info('Processing request');
 */
export function createContextLogger(context: LogContext) {
    return logger.child(context);
}

/**
 * Replace the `key` query parameter so credentials never reach the logs
 */
export function redactApiKey(url: string): string {
    return url.replace(/([?&]key=)[^&]*/, '$1[REDACTED]');
}

/**
 * Log an outgoing geocoder request
 */
export function logGeocoderRequest(data: {
    direction: GeocodeDirection;
    adapter: string;
    url: string;
}) {
    logger.debug({
        event: `geocoder.${data.direction}.request`,
        adapter: data.adapter,
        url: redactApiKey(data.url),
    }, `${data.adapter}.${data.direction === 'forward' ? 'geocode' : 'reverse'}: ${redactApiKey(data.url)}`);
}

/**
 * Log a geocoder lookup outcome
 */
export function logGeocoderResult(data: {
    direction: GeocodeDirection;
    words?: string;
    latitude?: number;
    longitude?: number;
    error?: string;
    errorType?: string;
}) {
    if (data.error) {
        logger.warn({
            event: `geocoder.${data.direction}.failed`,
            error: data.error,
            errorType: data.errorType,
        }, 'Geocoder lookup failed');
    } else {
        logger.debug({
            event: `geocoder.${data.direction}.success`,
            words: data.words,
            latitude: data.latitude,
            longitude: data.longitude,
        }, 'Geocoder lookup completed');
    }
}

/**
 * Log error with context
 */
export function logError(error: Error, context?: LogContext) {
    logger.error({
        event: 'error',
        error: {
            message: error.message,
            name: error.name,
            stack: error.stack,
        },
        ...context,
    }, error.message);
}
