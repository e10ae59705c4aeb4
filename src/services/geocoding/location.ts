import type { Point } from './point';

/**
 * Unmodified JSON object returned by the geocoding API for a match
 */
export type RawGeocoderResponse = Readonly<Record<string, unknown>>;

/**
 * A geocoding match: the three word address, its point and the raw response
 */
export class Location {
    constructor(
        /** Three word address, e.g. `index.home.raft` */
        readonly label: string,
        readonly point: Point,
        readonly raw: RawGeocoderResponse
    ) {
        Object.freeze(this);
    }

    get latitude(): number {
        return this.point.latitude;
    }

    get longitude(): number {
        return this.point.longitude;
    }

    toString(): string {
        return this.label;
    }

    toJSON() {
        return {
            label: this.label,
            latitude: this.point.latitude,
            longitude: this.point.longitude,
            raw: this.raw,
        };
    }
}
