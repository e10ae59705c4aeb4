import ky, { HTTPError, TimeoutError, type KyInstance } from 'ky';
import type { RetryConfig } from '@/shared/types/common.types';
import { createContextLogger, redactApiKey } from '@/shared/utils/logger';
import {
    GeocoderAuthenticationFailure,
    GeocoderInsufficientPrivileges,
    GeocoderParseError,
    GeocoderQueryError,
    GeocoderQuotaExceeded,
    GeocoderRateLimited,
    GeocoderServiceError,
    GeocoderTimedOut,
    GeocoderUnavailable,
} from '../geocoding.interface';

/**
 * Per-request transport options
 */
export interface TransportRequestOptions {
    /** Milliseconds before the request is aborted, `false` to wait indefinitely */
    timeout: number | false;
}

/**
 * HTTP transport used by geocoders: performs a GET and decodes the JSON body.
 *
 * Implementations throw a {@link GeocoderServiceError} subclass for network
 * failures, timeouts and non-2xx responses.
 */
export interface GeocoderTransport {
    getJson(url: string, options: TransportRequestOptions): Promise<unknown>;
}

export interface KyTransportOptions {
    userAgent: string;
    retry: RetryConfig;
    /** Custom fetch, e.g. one routing through a proxy or a custom TLS agent */
    fetch?: typeof fetch | undefined;
}

type ServiceErrorClass = new (message: string, code?: number, cause?: Error) => GeocoderServiceError;

/**
 * HTTP status → error class. 429 is handled separately to read Retry-After.
 */
const ERROR_CODE_MAP: Readonly<Record<number, ServiceErrorClass>> = {
    400: GeocoderQueryError,
    401: GeocoderAuthenticationFailure,
    402: GeocoderQuotaExceeded,
    403: GeocoderInsufficientPrivileges,
    407: GeocoderAuthenticationFailure,
    412: GeocoderQueryError,
    413: GeocoderQueryError,
    414: GeocoderQueryError,
    502: GeocoderServiceError,
    503: GeocoderUnavailable,
    504: GeocoderTimedOut,
};

/**
 * Seconds from a numeric `Retry-After` header, undefined for dates or garbage
 */
function parseRetryAfter(value: string | null): number | undefined {
    if (value === null || !/^\s*\d+\s*$/.test(value)) {
        return undefined;
    }
    return Number(value);
}

/**
 * Translate a ky/fetch failure into the geocoder error taxonomy
 */
export function mapTransportError(error: unknown): GeocoderServiceError {
    if (error instanceof GeocoderServiceError) {
        return error;
    }

    if (error instanceof HTTPError) {
        const status = error.response.status;
        const message = `Non-successful status code ${status}`;

        if (status === 429) {
            return new GeocoderRateLimited(
                message,
                parseRetryAfter(error.response.headers.get('retry-after')),
                status,
                error
            );
        }

        const ErrorClass = ERROR_CODE_MAP[status] ?? GeocoderServiceError;
        return new ErrorClass(message, status, error);
    }

    if (error instanceof TimeoutError) {
        return new GeocoderTimedOut('Service timed out', undefined, error);
    }

    if (error instanceof Error) {
        return new GeocoderUnavailable(`Service not available: ${error.message}`, undefined, error);
    }

    return new GeocoderUnavailable(`Service not available: ${String(error)}`);
}

/**
 * Default transport, backed by ky
 */
export class KyTransport implements GeocoderTransport {
    private client: KyInstance;
    private log = createContextLogger({ component: 'ky-transport' });

    constructor(options: KyTransportOptions) {
        this.client = ky.create({
            headers: {
                'User-Agent': options.userAgent,
                Accept: 'application/json',
            },
            retry: {
                limit: options.retry.limit,
                methods: ['get'],
                statusCodes: [408, 429, 500, 502, 503, 504],
                backoffLimit: options.retry.backoffMs,
            },
            hooks: {
                beforeRetry: [
                    ({ request, error, retryCount }) => {
                        this.log.warn({
                            event: 'geocoder.api.retry',
                            url: redactApiKey(request.url),
                            retryCount,
                            error: error.message,
                        }, 'Retrying geocoder API request');
                    },
                ],
            },
            ...(options.fetch ? { fetch: options.fetch } : {}),
        });
    }

    async getJson(url: string, options: TransportRequestOptions): Promise<unknown> {
        let body: string;
        try {
            const response = await this.client.get(url, { timeout: options.timeout });
            body = await response.text();
        } catch (error) {
            throw mapTransportError(error);
        }

        try {
            const data: unknown = JSON.parse(body);
            return data;
        } catch (error) {
            throw new GeocoderParseError(
                `Could not deserialize response: ${body.slice(0, 200)}`,
                error instanceof Error ? error : undefined
            );
        }
    }
}
