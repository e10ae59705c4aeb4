import type { GeocodeDirection, RetryConfig } from '@/shared/types/common.types';
import { logger, logGeocoderRequest, logGeocoderResult } from '@/shared/utils/logger';
import { addSpanAttributes, withSpan } from '@/shared/utils/tracing-utils';
import {
    formatZodError,
    geocoderOptionsSchema,
    timeoutSchema,
    w3wResultSchema,
    w3wStatusSchema,
} from '@/shared/utils/validators';
import {
    GeocoderAuthenticationFailure,
    GeocoderConfigurationError,
    GeocoderParseError,
    GeocoderQueryError,
    type FlexibleLookupOptions,
    type GeocodingAdapter,
    type ListLookupOptions,
    type SingleLookupOptions,
} from './geocoding.interface';
import { Location } from './location';
import { Point, type PointInput } from './point';
import { KyTransport, type GeocoderTransport } from './transport/http.transport';

/**
 * Constructor options. Omitted transport settings fall back to
 * {@link DEFAULT_GEOCODER_OPTIONS}.
 */
export interface GeocoderOptions {
    /** Key issued by what3words */
    apiKey: string;
    /** Default request timeout in milliseconds, `false` for none */
    timeout?: number | false | undefined;
    userAgent?: string | undefined;
    retry?: RetryConfig | undefined;
    domain?: string | undefined;
    scheme?: 'http' | 'https' | undefined;
    /** Replaces the default ky transport */
    transport?: GeocoderTransport | undefined;
    /** Fetch implementation for the default transport (proxy, custom TLS agent) */
    fetch?: typeof fetch | undefined;
}

export const DEFAULT_GEOCODER_OPTIONS: Readonly<{
    timeout: number | false;
    userAgent: string;
    retry: Readonly<RetryConfig>;
    domain: string;
    scheme: 'http' | 'https';
}> = Object.freeze({
    timeout: 10_000,
    userAgent: 'three-word-geocoder/1.0.0',
    retry: Object.freeze({ limit: 2, backoffMs: 3_000 }),
    domain: 'api.what3words.com',
    scheme: 'https',
});

const THREE_WORD_ADDRESS_RE = /^\p{L}+\.\p{L}+\.\p{L}+$/u;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Syntactic check for `word.word.word`: letters only, separated by single dots.
 * Says nothing about whether the address exists.
 */
export function isValidThreeWordAddress(query: string): boolean {
    return THREE_WORD_ADDRESS_RE.test(query);
}

/**
 * what3words Adapter
 *
 * Converts three word addresses to coordinates and back through the v2 API
 * API Docs: https://docs.what3words.com/api/v2/
 */
export class What3WordsAdapter implements GeocodingAdapter {
    static readonly geocodePath = '/v2/forward';
    static readonly reversePath = '/v2/reverse';

    readonly geocodeApi: string;
    readonly reverseApi: string;

    private readonly apiKey: string;
    private readonly timeout: number | false;
    private readonly transport: GeocoderTransport;

    /**
     * @throws {GeocoderConfigurationError} If the key is missing or a transport setting is invalid
     */
    constructor(options: GeocoderOptions) {
        const result = geocoderOptionsSchema.safeParse({
            apiKey: options.apiKey,
            timeout: options.timeout ?? DEFAULT_GEOCODER_OPTIONS.timeout,
            userAgent: options.userAgent ?? DEFAULT_GEOCODER_OPTIONS.userAgent,
            retry: options.retry ?? DEFAULT_GEOCODER_OPTIONS.retry,
            domain: options.domain ?? DEFAULT_GEOCODER_OPTIONS.domain,
            scheme: options.scheme ?? DEFAULT_GEOCODER_OPTIONS.scheme,
        });

        if (!result.success) {
            throw new GeocoderConfigurationError(
                `Invalid geocoder configuration: ${formatZodError(result.error)}`,
                result.error
            );
        }

        const config = result.data;
        this.apiKey = config.apiKey;
        this.timeout = config.timeout;
        this.geocodeApi = `${config.scheme}://${config.domain}${What3WordsAdapter.geocodePath}`;
        this.reverseApi = `${config.scheme}://${config.domain}${What3WordsAdapter.reversePath}`;
        this.transport = options.transport ?? new KyTransport({
            userAgent: config.userAgent,
            retry: config.retry,
            fetch: options.fetch,
        });
    }

    /**
     * Return the location of a three word address. Unknown addresses are
     * reported by the API and raised as {@link GeocoderQueryError}.
     */
    geocode(query: string, options?: SingleLookupOptions): Promise<Location>;
    geocode(query: string, options: ListLookupOptions): Promise<Location[]>;
    geocode(query: string, options: FlexibleLookupOptions): Promise<Location | Location[]>;
    async geocode(
        query: string,
        options: FlexibleLookupOptions = {}
    ): Promise<Location | Location[]> {
        if (!isValidThreeWordAddress(query)) {
            throw new GeocoderQueryError("Search string must be 'word.word.word'");
        }
        const timeout = this.resolveTimeout(options.timeout);

        const params = new URLSearchParams({
            addr: query,
            lang: (options.language ?? 'en').toLowerCase(),
            key: this.apiKey,
        });

        const location = await this.lookup('forward', `${this.geocodeApi}?${params}`, timeout);
        return options.exactlyOne === false ? [location] : location;
    }

    /**
     * Return the three word address of a point. Every point on the surface
     * has one, so a valid point always resolves.
     */
    reverse(query: PointInput, options?: SingleLookupOptions): Promise<Location>;
    reverse(query: PointInput, options: ListLookupOptions): Promise<Location[]>;
    reverse(query: PointInput, options: FlexibleLookupOptions): Promise<Location | Location[]>;
    async reverse(
        query: PointInput,
        options: FlexibleLookupOptions = {}
    ): Promise<Location | Location[]> {
        let coords: string;
        try {
            coords = Point.from(query).toString();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new GeocoderQueryError(message, undefined, error instanceof Error ? error : undefined);
        }
        const timeout = this.resolveTimeout(options.timeout);

        const params = new URLSearchParams({
            coords,
            lang: (options.language ?? 'en').toLowerCase(),
            key: this.apiKey,
        });

        const location = await this.lookup('reverse', `${this.reverseApi}?${params}`, timeout);
        return options.exactlyOne === false ? [location] : location;
    }

    /**
     * Validate the API key with a forward lookup of a known address
     *
     * @returns False when the key is rejected; other failures are thrown
     */
    async validateApiKey(): Promise<boolean> {
        try {
            await this.geocode('index.home.raft');
            return true;
        } catch (error) {
            if (error instanceof GeocoderAuthenticationFailure) {
                logger.warn({
                    event: 'geocoder.credentials.invalid',
                    error: error.message,
                }, 'what3words API key validation failed');
                return false;
            }
            throw error;
        }
    }

    /**
     * Per-call timeout, checked against the same bounds as the constructor's
     *
     * @throws {GeocoderConfigurationError} If the override is not a valid timeout
     */
    private resolveTimeout(override: number | false | undefined): number | false {
        if (override === undefined) {
            return this.timeout;
        }

        const result = timeoutSchema.safeParse(override);
        if (!result.success) {
            throw new GeocoderConfigurationError(
                `Invalid timeout: ${formatZodError(result.error)}`,
                result.error
            );
        }
        return result.data;
    }

    private lookup(
        direction: GeocodeDirection,
        url: string,
        timeout: number | false
    ): Promise<Location> {
        return withSpan(`geocoder.${direction}`, async (span) => {
            logGeocoderRequest({ direction, adapter: 'What3WordsAdapter', url });

            try {
                const resources = await this.transport.getJson(url, { timeout });
                const location = this.parseJson(resources);

                addSpanAttributes(span, { 'geocoder.words': location.label });
                logGeocoderResult({
                    direction,
                    words: location.label,
                    latitude: location.latitude,
                    longitude: location.longitude,
                });

                return location;
            } catch (error) {
                logGeocoderResult({
                    direction,
                    error: error instanceof Error ? error.message : String(error),
                    errorType: error instanceof Error ? error.name : typeof error,
                });
                throw error;
            }
        }, {
            'geocoder.provider': 'what3words',
            'geocoder.direction': direction,
        });
    }

    /**
     * Turn a response body into a Location, raising the error it reports.
     * Forward and reverse responses share this shape.
     */
    private parseJson(resources: unknown): Location {
        if (!isRecord(resources)) {
            throw new GeocoderParseError('Error parsing result.');
        }

        // https://docs.what3words.com/api/v2/#errors
        const status = w3wStatusSchema.safeParse(resources['status']);
        if (status.success && status.data.code) {
            const code = Number(status.data.code);
            const detail = status.data.message;
            const message = `Error returned by what3words: ${
                typeof detail === 'string' ? detail : String(detail ?? 'unknown error')
            }`;

            if (code === 401) {
                throw new GeocoderAuthenticationFailure(message, code);
            }
            throw new GeocoderQueryError(message, Number.isFinite(code) ? code : undefined);
        }

        const result = w3wResultSchema.safeParse(resources);
        if (!result.success) {
            throw new GeocoderParseError('Error parsing result.', result.error);
        }

        const { words, geometry } = result.data;
        let point: Point;
        try {
            point = new Point(geometry.lat, geometry.lng);
        } catch (error) {
            throw new GeocoderParseError('Error parsing result.', error instanceof Error ? error : undefined);
        }

        return new Location(words, point, resources);
    }
}
