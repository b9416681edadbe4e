/**
 * Rate limiting middleware.
 *
 * @module marquee/middleware/rate-limit
 */

import { splitHostPort } from "../concurrency/client-address.ts";
import type { ClientRateLimiter } from "../concurrency/rate-limiter.ts";
import { RateLimitError, serverErrorResponse } from "../errors.ts";
import type { ServerMetrics } from "../observability/metrics.ts";
import { isOtelEnabled, recordAdmissionEvent } from "../observability/otel.ts";
import type { Logger } from "../types.ts";
import type { Middleware } from "./types.ts";

/**
 * Create a per-client rate limiting middleware.
 *
 * Clients are keyed by the host part of the remote address. An address
 * that cannot be split is a server-side fault and answers 500.
 *
 * @param limiter - Shared limiter, or null when rate limiting is disabled
 * @param metrics - Receives `requests_rate_limited` increments
 * @param log - Server logger
 */
export function createRateLimitMiddleware(
  limiter: ClientRateLimiter | null,
  metrics: ServerMetrics,
  log: Logger,
): Middleware {
  return async (ctx, next) => {
    if (!limiter) {
      return next();
    }

    const address = splitHostPort(ctx.remoteAddress);
    if (!address.ok) {
      log(
        `[ERROR] cannot derive client key from remote address ` +
          `"${ctx.remoteAddress}": ${address.reason} ` +
          `(${ctx.request.method} ${ctx.request.url} request_id=${ctx.requestId})`,
      );
      return serverErrorResponse();
    }

    if (!limiter.allow(address.host)) {
      const waitMs = limiter.getTimeUntilToken(address.host);
      metrics.recordRateLimited();
      if (isOtelEnabled()) {
        recordAdmissionEvent("rate_limit.reject", {
          "client.address": address.host,
          "rate_limit.wait_ms": Math.ceil(waitMs),
        });
      }
      return new RateLimitError(Math.max(1, Math.ceil(waitMs / 1000)))
        .toResponse();
    }

    return next();
  };
}
