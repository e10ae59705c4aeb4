import { type Span, SpanStatusCode, trace, context } from '@opentelemetry/api';
import { tracer } from './tracing';

/**
 * Tracing Utility Functions
 *
 * Helper functions for creating and managing OpenTelemetry spans
 */

/**
 * Execute a function within a new span
 *
 * @param spanName - Name of the span
 * @param fn - Function to execute within the span
 * @param attributes - Optional span attributes
 * @returns Result of the function
 */
export async function withSpan<T>(
    spanName: string,
    fn: (span: Span) => Promise<T>,
    attributes?: Record<string, string | number | boolean>
): Promise<T> {
    const span = tracer.startSpan(spanName);

    if (attributes) {
        span.setAttributes(attributes);
    }

    try {
        const result = await context.with(trace.setSpan(context.active(), span), () => fn(span));

        span.setStatus({ code: SpanStatusCode.OK });

        return result;
    } catch (error) {
        recordException(span, error);
        span.setStatus({
            code: SpanStatusCode.ERROR,
            message: error instanceof Error ? error.message : 'Unknown error',
        });

        throw error;
    } finally {
        span.end();
    }
}

/**
 * Add structured attributes to a span, skipping empty values
 */
export function addSpanAttributes(
    span: Span,
    attributes: Record<string, string | number | boolean | null | undefined>
): void {
    for (const [key, value] of Object.entries(attributes)) {
        if (value !== null && value !== undefined) {
            span.setAttribute(key, value);
        }
    }
}

/**
 * Record an exception in a span
 */
export function recordException(span: Span, error: unknown): void {
    if (error instanceof Error) {
        span.recordException(error);
    } else {
        span.recordException({
            name: 'UnknownError',
            message: String(error),
        });
    }
}
