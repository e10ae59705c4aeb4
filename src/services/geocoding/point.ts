import type { Coordinates } from '@/shared/types/common.types';

/**
 * Anything a caller may pass where a coordinate is expected
 */
export type PointInput = Point | Coordinates | readonly [number, number] | string;

const DECIMAL = String.raw`[+-]?(?:\d+(?:\.\d*)?|\.\d+)`;
const POINT_STRING_RE = new RegExp(`^\\s*(${DECIMAL})\\s*(?:,\\s*|\\s+)(${DECIMAL})\\s*$`);

/**
 * Print a coordinate without exponent notation.
 *
 * `String(0.0000001)` gives `1e-7`, which the API does not accept, so values
 * below 1 are printed in fixed notation with trailing zeros removed.
 */
export function formatCoordinate(value: number): string {
    if (value === 0 || Math.abs(value) >= 1) {
        return String(value);
    }

    const fixed = value.toFixed(7).replace(/\.?0+$/, '');
    return fixed === '-0' ? '0' : fixed;
}

/**
 * A geographic point in decimal degrees
 */
export class Point implements Coordinates {
    readonly latitude: number;
    readonly longitude: number;

    /**
     * @throws {RangeError} If a value is not finite or latitude is outside [-90, 90]
     */
    constructor(latitude: number, longitude: number) {
        if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
            throw new RangeError(`Point coordinates must be finite numbers, got (${latitude}, ${longitude})`);
        }
        if (latitude < -90 || latitude > 90) {
            throw new RangeError(`Latitude must be in the [-90; 90] range, got ${latitude}`);
        }

        this.latitude = latitude;
        // Longitudes wrap around the antimeridian
        this.longitude = longitude >= -180 && longitude <= 180
            ? longitude
            : ((((longitude + 180) % 360) + 360) % 360) - 180;
        Object.freeze(this);
    }

    /**
     * Parse `"lat, lng"`, `"lat,lng"` or `"lat lng"` in decimal degrees
     *
     * @throws {RangeError} If the string is not a coordinate pair
     */
    static parse(value: string): Point {
        const match = POINT_STRING_RE.exec(value);
        if (!match || match[1] === undefined || match[2] === undefined) {
            throw new RangeError(`Failed to create Point instance from string '${value}'`);
        }

        return new Point(Number(match[1]), Number(match[2]));
    }

    /**
     * Normalize any accepted representation into a Point
     */
    static from(input: PointInput): Point {
        if (input instanceof Point) {
            return input;
        }
        if (typeof input === 'string') {
            return Point.parse(input);
        }
        if ('latitude' in input) {
            return new Point(input.latitude, input.longitude);
        }

        const [latitude, longitude] = input;
        return new Point(latitude, longitude);
    }

    /**
     * Canonical `lat,lng` form sent to the API
     */
    toString(): string {
        return `${formatCoordinate(this.latitude)},${formatCoordinate(this.longitude)}`;
    }

    toJSON(): Coordinates {
        return { latitude: this.latitude, longitude: this.longitude };
    }
}
