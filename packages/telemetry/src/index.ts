/**
 * @tandem/telemetry: OpenTelemetry tracing and metrics for the
 * federation and routing engine.
 *
 * Public API:
 * - setupTelemetry() / shutdownTelemetry(): SDK lifecycle
 * - isTelemetryEnabled(): check OTEL_ENABLED env var
 * - withSpan(): span creation helper
 * - getSyncEvents / getRoutingDecisions / getSolutions / getLearningDropped: counters
 */

export { SpanStatusCode } from "@opentelemetry/api";
export {
  getLearningDropped,
  getRoutingDecisions,
  getSolutions,
  getSyncEvents,
} from "./metrics.js";
export {
  isTelemetryEnabled,
  resolveSampleRatio,
  setupTelemetry,
  shutdownTelemetry,
} from "./setup.js";
export { withSpan } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue, TelemetryConfig } from "./types.js";
