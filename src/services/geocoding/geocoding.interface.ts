import type { Location } from './location';
import type { PointInput } from './point';

/**
 * Per-call lookup options
 */
export interface LookupOptions {
    /** Two-letter language code, lowercased before sending (default: 'en') */
    language?: string | undefined;
    /** Request timeout in milliseconds for this call only, `false` for none */
    timeout?: number | false | undefined;
}

/**
 * Lookup returning the matched location directly
 */
export interface SingleLookupOptions extends LookupOptions {
    exactlyOne?: true | undefined;
}

/**
 * Lookup returning a list. There is only ever one match per three word
 * address, so the list always has exactly one element.
 */
export interface ListLookupOptions extends LookupOptions {
    exactlyOne: false;
}

/**
 * Lookup whose result shape is only known at run time
 */
export interface FlexibleLookupOptions extends LookupOptions {
    exactlyOne?: boolean | undefined;
}

/**
 * Geocoding Adapter Interface
 *
 * Defines the contract for geocoders translating three word addresses
 * to coordinates and back
 *
 * Implementations: what3words
 */
export interface GeocodingAdapter {
    /**
     * Resolve a `word.word.word` address to a location
     *
     * @throws {GeocoderQueryError} If the address is malformed or unknown
     * @throws {GeocoderAuthenticationFailure} If the API key is rejected
     */
    geocode(query: string, options?: SingleLookupOptions): Promise<Location>;
    geocode(query: string, options: ListLookupOptions): Promise<Location[]>;
    geocode(query: string, options: FlexibleLookupOptions): Promise<Location | Location[]>;

    /**
     * Resolve a coordinate to its three word address
     *
     * @throws {GeocoderQueryError} If the point is invalid or rejected by the API
     * @throws {GeocoderAuthenticationFailure} If the API key is rejected
     */
    reverse(query: PointInput, options?: SingleLookupOptions): Promise<Location>;
    reverse(query: PointInput, options: ListLookupOptions): Promise<Location[]>;
    reverse(query: PointInput, options: FlexibleLookupOptions): Promise<Location | Location[]>;

    /**
     * Validate API key/credentials
     *
     * @returns True if credentials are valid
     */
    validateApiKey(): Promise<boolean>;
}

/**
 * Base class of every geocoder error
 */
export class GeocoderError extends Error {
    constructor(
        message: string,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'GeocoderError';
    }
}

/**
 * Invalid or missing client configuration (API key, timeout, retry settings)
 */
export class GeocoderConfigurationError extends GeocoderError {
    constructor(message: string, cause?: Error) {
        super(message, cause);
        this.name = 'GeocoderConfigurationError';
    }
}

/**
 * The remote service failed or rejected the request.
 *
 * `code` is the HTTP status, or the API status code reported in the body.
 */
export class GeocoderServiceError extends GeocoderError {
    constructor(
        message: string,
        public readonly code?: number,
        cause?: Error
    ) {
        super(message, cause);
        this.name = 'GeocoderServiceError';
    }
}

/**
 * Malformed query, or a query the API refused
 */
export class GeocoderQueryError extends GeocoderServiceError {
    constructor(message: string, code?: number, cause?: Error) {
        super(message, code, cause);
        this.name = 'GeocoderQueryError';
    }
}

/**
 * API key rejected
 */
export class GeocoderAuthenticationFailure extends GeocoderServiceError {
    constructor(message: string, code?: number, cause?: Error) {
        super(message, code, cause);
        this.name = 'GeocoderAuthenticationFailure';
    }
}

/**
 * API key valid but not allowed to perform the request
 */
export class GeocoderInsufficientPrivileges extends GeocoderServiceError {
    constructor(message: string, code?: number, cause?: Error) {
        super(message, code, cause);
        this.name = 'GeocoderInsufficientPrivileges';
    }
}

/**
 * Response did not have the expected shape
 */
export class GeocoderParseError extends GeocoderServiceError {
    constructor(message: string, cause?: Error) {
        super(message, undefined, cause);
        this.name = 'GeocoderParseError';
    }
}

/**
 * Account quota exhausted
 */
export class GeocoderQuotaExceeded extends GeocoderServiceError {
    constructor(message: string, code?: number, cause?: Error) {
        super(message, code, cause);
        this.name = 'GeocoderQuotaExceeded';
    }
}

/**
 * Too many requests. `retryAfter` is in seconds when the service sent it.
 */
export class GeocoderRateLimited extends GeocoderQuotaExceeded {
    constructor(
        message: string,
        public readonly retryAfter?: number,
        code?: number,
        cause?: Error
    ) {
        super(message, code, cause);
        this.name = 'GeocoderRateLimited';
    }
}

/**
 * Service unreachable or temporarily down
 */
export class GeocoderUnavailable extends GeocoderServiceError {
    constructor(message: string, code?: number, cause?: Error) {
        super(message, code, cause);
        this.name = 'GeocoderUnavailable';
    }
}

/**
 * No response within the timeout
 */
export class GeocoderTimedOut extends GeocoderServiceError {
    constructor(message: string, code?: number, cause?: Error) {
        super(message, code, cause);
        this.name = 'GeocoderTimedOut';
    }
}
