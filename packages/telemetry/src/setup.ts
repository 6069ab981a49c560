/**
 * OTel SDK initialization.
 *
 * Lazy-loaded: SDK packages are only imported when OTEL_ENABLED=true,
 * so nothing beyond @opentelemetry/api is loaded when telemetry is off.
 */

import type { TelemetryConfig } from "./types.js";

/** Reference to the NodeSDK for shutdown */
let sdkInstance: { shutdown(): Promise<void> } | undefined;

/**
 * Check if telemetry is enabled via the OTEL_ENABLED env var.
 *
 * Returns true only when OTEL_ENABLED is explicitly set to "true" or "1".
 */
export function isTelemetryEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.OTEL_ENABLED;
  return value === "true" || value === "1";
}

/** Clamp a sampling ratio to [0, 1]; NaN falls back to 1. */
export function resolveSampleRatio(raw: number): number {
  return Number.isNaN(raw) ? 1.0 : Math.max(0, Math.min(1, raw));
}

/**
 * Initialize the OpenTelemetry Node SDK with an OTLP HTTP trace exporter
 * and a parent-based ratio sampler.
 *
 * @returns true if telemetry was initialized, false if disabled or already initialized
 */
export async function setupTelemetry(config?: TelemetryConfig): Promise<boolean> {
  if (!isTelemetryEnabled() || sdkInstance !== undefined) {
    return false;
  }

  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-http");
  const { ATTR_SERVICE_NAME } = await import("@opentelemetry/semantic-conventions");
  const { Resource } = await import("@opentelemetry/resources");
  const { ParentBasedSampler, TraceIdRatioBasedSampler } = await import(
    "@opentelemetry/sdk-trace-base"
  );

  const serviceName = config?.serviceName ?? process.env.OTEL_SERVICE_NAME ?? "tandem";
  const endpoint =
    config?.endpoint ?? process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318";
  const sampleRatio = resolveSampleRatio(
    config?.sampleRatio ?? parseFloat(process.env.OTEL_TRACES_SAMPLER_ARG ?? "1.0"),
  );
  const environment = config?.environment ?? process.env.OTEL_ENVIRONMENT ?? "development";

  const sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: serviceName,
      "deployment.environment": environment,
    }),
    traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
    sampler: new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(sampleRatio) }),
  });

  sdk.start();
  sdkInstance = sdk;
  return true;
}

/**
 * Gracefully shut down the OTel SDK, flushing any pending spans.
 *
 * Safe to call even if telemetry was never initialized.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (sdkInstance !== undefined) {
    const sdk = sdkInstance;
    sdkInstance = undefined;
    await sdk.shutdown();
  }
}
