import { trace } from '@opentelemetry/api';

/**
 * OpenTelemetry tracer
 *
 * Only the API is used here: spans are recorded when the host application
 * registers an SDK, and are no-ops otherwise.
 */

const SERVICE_NAME = process.env.OTEL_SERVICE_NAME || 'three-word-geocoder';
const SERVICE_VERSION = process.env.npm_package_version || '1.0.0';

export const tracer = trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
