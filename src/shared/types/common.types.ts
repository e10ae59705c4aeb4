/**
 * Common TypeScript types used across the geocoder
 */

/**
 * GPS coordinates
 */
export interface Coordinates {
    latitude: number;
    longitude: number;
}

/**
 * Retry policy handed to the HTTP transport
 */
export interface RetryConfig {
    /** Maximum retry attempts for transient HTTP failures */
    limit: number;
    /** Upper bound for the backoff delay between attempts (ms) */
    backoffMs: number;
}

/**
 * Geocoding direction, used in logs and span names
 */
export type GeocodeDirection = 'forward' | 'reverse';

/**
 * Log context for structured logging
 */
export interface LogContext {
    /** Request ID for tracing */
    requestId?: string;
    /** Additional context */
    [key: string]: unknown;
}
