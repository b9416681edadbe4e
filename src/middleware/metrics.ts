/**
 * Request metrics middleware.
 *
 * @module marquee/middleware/metrics
 */

import type { ServerMetrics } from "../observability/metrics.ts";
import type { Middleware } from "./types.ts";

/**
 * Create a middleware that counts requests and responses.
 *
 * A downstream throw is recorded as a 500 and rethrown unchanged, so the
 * panic layer above still sees it.
 *
 * @param metrics - Shared collector owned by the server
 * @param now - Clock for durations (default: Date.now)
 */
export function createMetricsMiddleware(
  metrics: ServerMetrics,
  now: () => number = Date.now,
): Middleware {
  return async (_ctx, next) => {
    const started = now();
    metrics.recordRequestReceived();
    try {
      const response = await next();
      metrics.recordResponseSent(response.status, now() - started);
      return response;
    } catch (error) {
      metrics.recordResponseSent(500, now() - started);
      throw error;
    }
  };
}
