import { Attributes, SpanStatusCode, trace } from '@opentelemetry/api';

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

function toAttributes(attributes: SpanAttributes): Attributes {
  return Object.fromEntries(
    Object.entries(attributes).filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined),
  );
}

/**
 * Runs `fn` inside an active span. `describe` may add attributes derived from
 * the result, e.g. substitution counts, before the span ends.
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes | undefined,
  fn: () => T | Promise<T>,
  describe?: (result: T) => SpanAttributes,
): Promise<T> {
  const tracer = trace.getTracer('glyph-transpiler');
  return tracer.startActiveSpan(name, { attributes: attributes ? toAttributes(attributes) : undefined }, async (span) => {
    try {
      const result = await fn();
      if (describe) {
        span.setAttributes(toAttributes(describe(result)));
      }
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      span.recordException(failure);
      span.setStatus({ code: SpanStatusCode.ERROR, message: failure.message });
      throw failure;
    } finally {
      span.end();
    }
  });
}
