/**
 * Span creation with error recording.
 *
 * Without a registered tracer provider the span is a no-op and `fn` still
 * runs.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api";

export const TRACER_NAME = "veracity";

export const EVALUATE_SPAN = "veracity.gateway.evaluate";

/**
 * Run `fn` inside a named span. Exceptions are recorded, the status is set
 * and the span always ends; the error is rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
