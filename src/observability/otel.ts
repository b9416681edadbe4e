/**
 * OpenTelemetry Integration
 *
 * Fire-and-forget spans for admission decisions (auth, rate limiting).
 * Without a registered SDK the API hands back no-op tracers.
 *
 * Enable with: OTEL_ENABLED=true
 *
 * @module marquee/observability/otel
 */

import { SpanStatusCode, trace, type Tracer } from "@opentelemetry/api";
import { env } from "../runtime/runtime.ts";

let serverTracer: Tracer | null = null;

/**
 * Get or create the server tracer
 */
export function getServerTracer(): Tracer {
  if (!serverTracer) {
    serverTracer = trace.getTracer("marquee.admission", "0.3.0");
  }
  return serverTracer;
}

/**
 * Record an admission event as a fire-and-forget span.
 */
export function recordAdmissionEvent(
  event: "auth.verify" | "auth.reject" | "rate_limit.reject",
  attributes: Record<string, string | number | boolean | undefined>,
): void {
  const tracer = getServerTracer();
  tracer.startActiveSpan(`marquee.${event}`, { attributes }, (span) => {
    span.setStatus({
      code: event === "auth.verify" ? SpanStatusCode.OK : SpanStatusCode.ERROR,
    });
    span.end();
  });
}

/**
 * Check if OTEL is enabled.
 */
export function isOtelEnabled(): boolean {
  return env("OTEL_ENABLED") === "true";
}
