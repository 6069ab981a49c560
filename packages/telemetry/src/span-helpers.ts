/**
 * Span helper: wraps OpenTelemetry's tracer.startActiveSpan with
 * attribute setting, error recording and guaranteed span end.
 */

import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

const TRACER_NAME = "tandem";

/**
 * Execute an async function within a named OTel span.
 *
 * The span is handed to `fn` so it can record result attributes
 * (e.g. how many entries a batch synced). Failures are recorded on the
 * span and rethrown.
 *
 * When no tracer provider is registered (OTel disabled), the function
 * still executes with a no-op span.
 *
 * @param name - Span name (e.g., "tandem.federation.sync_batch")
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      span.setAttributes(attributes);
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
