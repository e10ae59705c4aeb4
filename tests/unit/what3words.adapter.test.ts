import { describe, it, expect, beforeEach, vi } from 'vitest';
import { What3WordsAdapter, isValidThreeWordAddress } from '@/services/geocoding/what3words.adapter';
import {
    GeocoderAuthenticationFailure,
    GeocoderConfigurationError,
    GeocoderParseError,
    GeocoderQueryError,
    GeocoderTimedOut,
} from '@/services/geocoding/geocoding.interface';
import type { GeocoderTransport, TransportRequestOptions } from '@/services/geocoding/transport/http.transport';
import { Location } from '@/services/geocoding/location';
import { Point } from '@/services/geocoding/point';
import { logger } from '@/shared/utils/logger';

/**
 * Unit tests for the what3words adapter
 *
 * The transport is replaced by an in-memory mock so that request building
 * and response parsing can be checked without network access.
 */

class MockTransport implements GeocoderTransport {
    public calls: Array<{ url: string; options: TransportRequestOptions }> = [];
    public response: unknown = {};
    public error: Error | undefined;

    async getJson(url: string, options: TransportRequestOptions): Promise<unknown> {
        this.calls.push({ url, options });
        if (this.error) {
            throw this.error;
        }
        return this.response;
    }
}

const RAFT_RESPONSE = {
    words: 'index.home.raft',
    geometry: { lat: 51.521251, lng: -0.203586 },
};

describe('isValidThreeWordAddress', () => {
    it.each([
        'index.home.raft',
        'Index.Home.Raft',
        'école.très.bien',
        'дом.кот.лес',
    ])('should accept %s', (query) => {
        expect(isValidThreeWordAddress(query)).toBe(true);
    });

    it.each([
        '',
        'index.home',
        'index.home.raft.extra',
        'index..home.raft',
        'indexhomeraft',
        'index.home.raft1',
        'in_dex.home.raft',
        'index.h0me.raft',
        'index home raft',
        ' index.home.raft',
        'index.home.raft ',
        'not a valid query',
    ])('should reject %j', (query) => {
        expect(isValidThreeWordAddress(query)).toBe(false);
    });
});

describe('What3WordsAdapter', () => {
    let transport: MockTransport;
    let adapter: What3WordsAdapter;

    beforeEach(() => {
        transport = new MockTransport();
        transport.response = RAFT_RESPONSE;
        adapter = new What3WordsAdapter({ apiKey: 'test-key', transport });
    });

    describe('Construction', () => {
        it('should build the forward and reverse endpoints', () => {
            expect(adapter.geocodeApi).toBe('https://api.what3words.com/v2/forward');
            expect(adapter.reverseApi).toBe('https://api.what3words.com/v2/reverse');
        });

        it('should honour a custom domain and scheme', () => {
            const local = new What3WordsAdapter({
                apiKey: 'test-key',
                domain: 'localhost:8080',
                scheme: 'http',
                transport,
            });

            expect(local.geocodeApi).toBe('http://localhost:8080/v2/forward');
        });

        it('should reject an empty API key', () => {
            expect(() => new What3WordsAdapter({ apiKey: '', transport })).toThrow(GeocoderConfigurationError);
            expect(() => new What3WordsAdapter({ apiKey: '   ', transport })).toThrow(
                'Invalid geocoder configuration: apiKey: API key is required'
            );
        });

        it('should reject a malformed timeout', () => {
            expect(() => new What3WordsAdapter({ apiKey: 'test-key', timeout: -5, transport }))
                .toThrow(GeocoderConfigurationError);
            expect(() => new What3WordsAdapter({ apiKey: 'test-key', timeout: 1.5, transport }))
                .toThrow(GeocoderConfigurationError);
        });

        it('should reject a negative retry limit', () => {
            expect(() => new What3WordsAdapter({
                apiKey: 'test-key',
                retry: { limit: -1, backoffMs: 0 },
                transport,
            })).toThrow(GeocoderConfigurationError);
        });
    });

    describe('geocode', () => {
        it('should return the location of a three word address', async () => {
            const location = await adapter.geocode('index.home.raft');

            expect(location).toBeInstanceOf(Location);
            expect(location.label).toBe('index.home.raft');
            expect(location.latitude).toBe(51.521251);
            expect(location.longitude).toBe(-0.203586);
            expect(location.raw).toEqual(RAFT_RESPONSE);
        });

        it('should keep the decoded response body as raw', async () => {
            transport.response = { ...RAFT_RESPONSE, language: 'en', map: 'https://w3w.co/index.home.raft' };

            const location = await adapter.geocode('index.home.raft');

            expect(location.raw).toBe(transport.response);
        });

        it('should send addr, lang and key in that order', async () => {
            await adapter.geocode('index.home.raft');

            expect(transport.calls).toHaveLength(1);
            expect(transport.calls[0]?.url).toBe(
                'https://api.what3words.com/v2/forward?addr=index.home.raft&lang=en&key=test-key'
            );
        });

        it('should lowercase the language code', async () => {
            await adapter.geocode('index.home.raft', { language: 'DE' });

            const url = new URL(transport.calls[0]?.url ?? '');
            expect(url.searchParams.get('lang')).toBe('de');
        });

        it('should percent-encode non-ASCII addresses', async () => {
            transport.response = { words: 'дом.кот.лес', geometry: { lat: 55.75, lng: 37.61 } };

            await adapter.geocode('дом.кот.лес', { language: 'ru' });

            expect(transport.calls[0]?.url).toBe(
                'https://api.what3words.com/v2/forward?addr=%D0%B4%D0%BE%D0%BC.%D0%BA%D0%BE%D1%82.%D0%BB%D0%B5%D1%81&lang=ru&key=test-key'
            );
        });

        it('should reject a malformed query without calling the transport', async () => {
            await expect(adapter.geocode('not a valid query')).rejects.toThrow(GeocoderQueryError);
            await expect(adapter.geocode('not a valid query')).rejects.toThrow(
                "Search string must be 'word.word.word'"
            );
            expect(transport.calls).toHaveLength(0);
        });

        it('should use the default timeout unless overridden', async () => {
            await adapter.geocode('index.home.raft');
            await adapter.geocode('index.home.raft', { timeout: 500 });
            await adapter.geocode('index.home.raft', { timeout: false });

            expect(transport.calls.map((call) => call.options.timeout)).toEqual([10_000, 500, false]);
        });

        it('should accept the largest timeout a timer can take', async () => {
            await adapter.geocode('index.home.raft', { timeout: 2_147_483_647 });

            expect(transport.calls[0]?.options.timeout).toBe(2_147_483_647);
        });

        it.each([3_000_000_000, Number.NaN, 0, -1, 1.5])(
            'should reject a per-call timeout of %d without calling the transport',
            async (timeout) => {
                const error = await adapter.geocode('index.home.raft', { timeout }).catch((e: unknown) => e);

                expect(error).toBeInstanceOf(GeocoderConfigurationError);
                expect(error).toMatchObject({ message: expect.stringMatching(/^Invalid timeout: /) });
                expect(transport.calls).toHaveLength(0);
            }
        );

        it('should log the request with the key redacted before sending it', async () => {
            const events: string[] = [];
            const debug = vi.spyOn(logger, 'debug').mockImplementation(() => {
                events.push('log');
            });
            const ordered: GeocoderTransport = {
                async getJson() {
                    events.push('fetch');
                    return RAFT_RESPONSE;
                },
            };
            const logged = new What3WordsAdapter({ apiKey: 'test-key', transport: ordered });
            const redacted = 'https://api.what3words.com/v2/forward?addr=index.home.raft&lang=en&key=[REDACTED]';

            try {
                await logged.geocode('index.home.raft');

                expect(events[0]).toBe('log');
                expect(events[1]).toBe('fetch');
                expect(debug.mock.calls[0]).toEqual([
                    {
                        event: 'geocoder.forward.request',
                        adapter: 'What3WordsAdapter',
                        url: redacted,
                    },
                    `What3WordsAdapter.geocode: ${redacted}`,
                ]);
                expect(JSON.stringify(debug.mock.calls)).not.toContain('test-key');
            } finally {
                debug.mockRestore();
            }
        });

        it('should pick the result shape from a boolean known only at run time', async () => {
            const lookupWith = (exactlyOne: boolean) => adapter.geocode('index.home.raft', { exactlyOne });

            const list = await lookupWith(false);
            const single = await lookupWith(true);

            expect(Array.isArray(list)).toBe(true);
            expect(single).toBeInstanceOf(Location);
        });

        it('should wrap the location in a list when exactlyOne is false', async () => {
            const single = await adapter.geocode('index.home.raft');
            const list = await adapter.geocode('index.home.raft', { exactlyOne: false });

            expect(Array.isArray(list)).toBe(true);
            expect(list).toHaveLength(1);
            expect(list[0]?.label).toBe(single.label);
            expect(list[0]?.point).toEqual(single.point);
            expect(list[0]?.raw).toEqual(single.raw);
        });
    });

    describe('reverse', () => {
        it('should send the point as lat,lng and return its address', async () => {
            const location = await adapter.reverse([51.521251, -0.203586]);

            const url = new URL(transport.calls[0]?.url ?? '');
            expect(url.origin + url.pathname).toBe('https://api.what3words.com/v2/reverse');
            expect([...url.searchParams.keys()]).toEqual(['coords', 'lang', 'key']);
            expect(url.searchParams.get('coords')).toBe('51.521251,-0.203586');
            expect(location.label).toBe('index.home.raft');
            expect(location.point).toEqual(new Point(51.521251, -0.203586));
        });

        it('should accept a "lat, lng" string, a Point and a coordinates object', async () => {
            await adapter.reverse('51.521251, -0.203586');
            await adapter.reverse(new Point(51.521251, -0.203586));
            await adapter.reverse({ latitude: 51.521251, longitude: -0.203586 });

            const coords = transport.calls.map((call) => new URL(call.url).searchParams.get('coords'));
            expect(coords).toEqual(['51.521251,-0.203586', '51.521251,-0.203586', '51.521251,-0.203586']);
        });

        it('should reject an unparseable point without calling the transport', async () => {
            await expect(adapter.reverse('north of the river')).rejects.toThrow(GeocoderQueryError);
            await expect(adapter.reverse([95, 0])).rejects.toThrow(GeocoderQueryError);
            expect(transport.calls).toHaveLength(0);
        });

        it('should map an API status code to a query error', async () => {
            transport.response = { status: { code: 3, message: 'Bad coordinates' } };

            const error = await adapter.reverse([51.521251, -0.203586]).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(GeocoderQueryError);
            expect(error).toMatchObject({
                message: 'Error returned by what3words: Bad coordinates',
                code: 3,
            });
        });

        it('should return a one-element list when exactlyOne is false', async () => {
            const list = await adapter.reverse('51.521251,-0.203586', { exactlyOne: false });

            expect(list).toHaveLength(1);
            expect(list[0]?.label).toBe('index.home.raft');
        });

        it('should validate the per-call timeout', async () => {
            await expect(adapter.reverse([51.521251, -0.203586], { timeout: 0 }))
                .rejects.toThrow(GeocoderConfigurationError);
            expect(transport.calls).toHaveLength(0);
        });

        it('should accept a run-time exactlyOne flag', async () => {
            const lookupWith = (exactlyOne: boolean) => adapter.reverse([51.521251, -0.203586], { exactlyOne });

            expect(await lookupWith(false)).toHaveLength(1);
        });
    });

    describe('Response parsing', () => {
        it('should raise an authentication failure for status 401', async () => {
            transport.response = { status: { code: 401, message: 'Invalid key' } };

            const error = await adapter.geocode('index.home.raft').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(GeocoderAuthenticationFailure);
            expect(error).toMatchObject({
                message: 'Error returned by what3words: Invalid key',
                code: 401,
            });
        });

        it('should raise an authentication failure for status 401 with a null message', async () => {
            transport.response = { status: { code: 401, message: null } };

            const error = await adapter.geocode('index.home.raft').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(GeocoderAuthenticationFailure);
            expect(error).toMatchObject({
                message: 'Error returned by what3words: unknown error',
                code: 401,
            });
        });

        it('should raise a query error for a status with a non-string message', async () => {
            transport.response = { status: { code: 300, message: 42 } };

            const error = await adapter.geocode('index.home.raft').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(GeocoderQueryError);
            expect(error).toMatchObject({
                message: 'Error returned by what3words: 42',
                code: 300,
            });
        });

        it('should ignore a success status block', async () => {
            transport.response = { ...RAFT_RESPONSE, status: { reason: 'OK', status: 200 } };

            const location = await adapter.geocode('index.home.raft');

            expect(location.label).toBe('index.home.raft');
        });

        it('should raise a parse error when geometry is missing', async () => {
            transport.response = { words: 'index.home.raft' };

            await expect(adapter.geocode('index.home.raft')).rejects.toThrow(GeocoderParseError);
            await expect(adapter.geocode('index.home.raft')).rejects.toThrow('Error parsing result.');
        });

        it('should raise a parse error for a non-object body', async () => {
            transport.response = ['index.home.raft'];

            await expect(adapter.geocode('index.home.raft')).rejects.toThrow(GeocoderParseError);
        });

        it('should coerce string coordinates to numbers', async () => {
            transport.response = { words: 'index.home.raft', geometry: { lat: '51.521251', lng: '-0.203586' } };

            const location = await adapter.geocode('index.home.raft');

            expect(location.latitude).toBe(51.521251);
            expect(location.longitude).toBe(-0.203586);
        });

        it('should coerce a zero coordinate like any other value', async () => {
            transport.response = { words: 'equator.meets.meridian', geometry: { lat: 0, lng: '12.5' } };

            const location = await adapter.geocode('equator.meets.meridian');

            expect(location.latitude).toBe(0);
            expect(location.longitude).toBe(12.5);
        });

        it('should raise a parse error for non-numeric coordinates', async () => {
            transport.response = { words: 'index.home.raft', geometry: { lat: 'north', lng: 1 } };

            await expect(adapter.geocode('index.home.raft')).rejects.toThrow(GeocoderParseError);
        });

        it('should pass transport errors through unchanged', async () => {
            const timeout = new GeocoderTimedOut('Service timed out');
            transport.error = timeout;

            await expect(adapter.geocode('index.home.raft')).rejects.toBe(timeout);
        });
    });

    describe('validateApiKey', () => {
        it('should return true when a lookup succeeds', async () => {
            await expect(adapter.validateApiKey()).resolves.toBe(true);
        });

        it('should return false when the key is rejected', async () => {
            transport.response = { status: { code: 401, message: 'Invalid key' } };

            await expect(adapter.validateApiKey()).resolves.toBe(false);
        });

        it('should rethrow other failures', async () => {
            transport.error = new GeocoderTimedOut('Service timed out');

            await expect(adapter.validateApiKey()).rejects.toThrow(GeocoderTimedOut);
        });
    });
});
