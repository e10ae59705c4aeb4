import { loadConfig, logConfigSummary } from './shared/config/config';
import { logger } from './shared/utils/logger';
import { What3WordsAdapter, type GeocoderOptions } from './services/geocoding/what3words.adapter';

export {
    What3WordsAdapter,
    DEFAULT_GEOCODER_OPTIONS,
    isValidThreeWordAddress,
    type GeocoderOptions,
} from './services/geocoding/what3words.adapter';
export {
    GeocoderError,
    GeocoderConfigurationError,
    GeocoderServiceError,
    GeocoderQueryError,
    GeocoderAuthenticationFailure,
    GeocoderInsufficientPrivileges,
    GeocoderParseError,
    GeocoderQuotaExceeded,
    GeocoderRateLimited,
    GeocoderUnavailable,
    GeocoderTimedOut,
    type GeocodingAdapter,
    type LookupOptions,
    type SingleLookupOptions,
    type ListLookupOptions,
    type FlexibleLookupOptions,
} from './services/geocoding/geocoding.interface';
export { Location, type RawGeocoderResponse } from './services/geocoding/location';
export { Point, formatCoordinate, type PointInput } from './services/geocoding/point';
export {
    KyTransport,
    mapTransportError,
    type GeocoderTransport,
    type KyTransportOptions,
    type TransportRequestOptions,
} from './services/geocoding/transport/http.transport';
export { loadConfig, logConfigSummary, type AppConfig } from './shared/config/config';
export type { Coordinates, RetryConfig } from './shared/types/common.types';

/**
 * Build a what3words adapter from environment variables. `LOG_LEVEL` is
 * applied to the shared logger.
 *
 * @param env - Environment to read, defaults to `process.env`
 * @param overrides - Options taking precedence over the environment (e.g. a custom transport)
 * @throws {GeocoderConfigurationError} If the environment is invalid
 */
export function createGeocoderFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: Partial<GeocoderOptions> = {}
): What3WordsAdapter {
    const config = loadConfig(env);
    logger.level = config.logging.level;
    logConfigSummary(config);

    return new What3WordsAdapter({
        apiKey: config.what3words.apiKey,
        timeout: config.transport.timeoutMs,
        userAgent: config.transport.userAgent,
        retry: config.retry,
        ...overrides,
    });
}
