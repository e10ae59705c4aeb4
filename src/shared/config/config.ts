import { ZodError } from 'zod';
import { formatZodError, validateEnv, type ValidatedEnv } from '../utils/validators';
import { logger } from '../utils/logger';
import { GeocoderConfigurationError } from '@/services/geocoding/geocoding.interface';

/**
 * Geocoder configuration, built once from the environment
 */
export interface AppConfig {
    logging: {
        level: ValidatedEnv['LOG_LEVEL'];
    };
    what3words: {
        apiKey: string;
    };
    transport: {
        timeoutMs: number;
        userAgent: string | undefined;
    };
    retry: {
        limit: number;
        backoffMs: number;
    };
}

/**
 * Load and validate configuration from environment variables
 *
 * @throws {GeocoderConfigurationError} If a variable is missing or malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
    let validated: ValidatedEnv;
    try {
        validated = validateEnv(env);
    } catch (error) {
        const details = error instanceof ZodError ? formatZodError(error) : String(error);
        logger.error({
            event: 'config.invalid',
            error: details,
        }, 'Failed to validate environment variables');
        throw new GeocoderConfigurationError(
            `Invalid environment configuration: ${details}`,
            error instanceof Error ? error : undefined
        );
    }

    return Object.freeze({
        logging: {
            level: validated.LOG_LEVEL,
        },
        what3words: {
            apiKey: validated.W3W_API_KEY,
        },
        transport: {
            timeoutMs: validated.GEOCODER_TIMEOUT_MS,
            userAgent: validated.GEOCODER_USER_AGENT,
        },
        retry: {
            limit: validated.API_RETRY_LIMIT,
            backoffMs: validated.API_RETRY_BACKOFF_MS,
        },
    });
}

/**
 * Log configuration summary (without sensitive data)
 */
export function logConfigSummary(config: Readonly<AppConfig>) {
    logger.info({
        logging: {
            level: config.logging.level,
        },
        transport: config.transport,
        retry: config.retry,
        apiKeyConfigured: config.what3words.apiKey.length > 0,
    }, 'Configuration loaded');
}
