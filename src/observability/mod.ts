/**
 * Observability module
 *
 * - OTel spans on admission decisions
 * - Metrics collection (counters, histogram, gauges)
 * - Prometheus text format export
 *
 * @module marquee/observability
 */

export {
  getServerTracer,
  isOtelEnabled,
  recordAdmissionEvent,
} from "./otel.ts";

export { ServerMetrics, type ServerMetricsSnapshot } from "./metrics.ts";
