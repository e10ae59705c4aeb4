import { createGeocoderFromEnv } from '@/index';
import { GeocoderError } from '@/services/geocoding/geocoding.interface';
import { logError } from '@/shared/utils/logger';

/**
 * Usage:
 *   npm run lookup -- forward index.home.raft [lang]
 *   npm run lookup -- reverse "51.521251,-0.203586" [lang]
 *
 * Reads W3W_API_KEY and the transport settings from the environment.
 */

const [direction, query, language = 'en'] = process.argv.slice(2);

if ((direction !== 'forward' && direction !== 'reverse') || !query) {
    console.error('Usage: lookup <forward|reverse> <query> [lang]');
    process.exit(1);
}

try {
    const geocoder = createGeocoderFromEnv();
    const location = direction === 'forward'
        ? await geocoder.geocode(query, { language })
        : await geocoder.reverse(query, { language });

    console.log(JSON.stringify({
        label: location.label,
        latitude: location.latitude,
        longitude: location.longitude,
    }, null, 2));
} catch (error) {
    if (error instanceof GeocoderError) {
        logError(error, { direction, query });
        console.error(`${error.name}: ${error.message}`);
        process.exit(2);
    }
    throw error;
}
