import { z } from 'zod';

/**
 * Environment variables validation schema
 */
export const envSchema = z.object({
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // API Keys
    W3W_API_KEY: z.string().min(1, 'what3words API key is required'),

    // Transport
    GEOCODER_TIMEOUT_MS: z.string().default('10000').transform(Number).pipe(z.number().int().positive()),
    GEOCODER_USER_AGENT: z.string().min(1).optional(),

    // Retry Configuration
    API_RETRY_LIMIT: z.string().default('2').transform(Number).pipe(z.number().int().min(0)),
    API_RETRY_BACKOFF_MS: z.string().default('3000').transform(Number).pipe(z.number().int().min(0)),
});

/**
 * Request timeout in milliseconds, or `false` for none. Bounded by the
 * largest delay `setTimeout` accepts.
 */
export const timeoutSchema = z.union([z.number().int().positive().max(2_147_483_647), z.literal(false)]);

/**
 * Geocoder constructor options schema (after defaults are merged)
 */
export const geocoderOptionsSchema = z.object({
    apiKey: z.string({ required_error: 'API key is required' }).regex(/\S/, 'API key is required'),
    timeout: timeoutSchema,
    userAgent: z.string().min(1, 'User agent must not be empty'),
    retry: z.object({
        limit: z.number().int().min(0),
        backoffMs: z.number().int().min(0),
    }),
    domain: z.string().regex(/^[^/\s?#]+$/, 'Domain must be a bare host name'),
    scheme: z.enum(['http', 'https']),
});

/**
 * Latitude/longitude as sent by the API: a number or a numeric string
 */
const coordinateValueSchema = z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number().finite());

/**
 * Error status block, e.g. `{ "code": 300, "message": "Invalid or non-existent 3 word address" }`
 */
export const w3wStatusSchema = z.object({
    code: z.union([z.number(), z.string()]).optional(),
    message: z.unknown(),
});

/**
 * Single result record
 */
export const w3wResultSchema = z.object({
    words: z.string().min(1),
    geometry: z.object({
        lat: coordinateValueSchema,
        lng: coordinateValueSchema,
    }),
});

/**
 * Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv) {
    return envSchema.parse(env);
}

/**
 * Format zod issues into a single line
 */
export function formatZodError(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Type exports for validated data
 */
export type ValidatedEnv = z.infer<typeof envSchema>;
