/**
 * Panic containment middleware.
 *
 * Outermost layer of the pipeline. Anything thrown below it, Error or not,
 * becomes a generic 500 with `Connection: close` and a log line carrying
 * the request's coordinates.
 *
 * @module marquee/middleware/recover-panic
 */

import { describeError, serverErrorResponse } from "../errors.ts";
import type { ServerMetrics } from "../observability/metrics.ts";
import type { Logger } from "../types.ts";
import type { Middleware } from "./types.ts";

/**
 * Create the panic containment middleware.
 *
 * @param metrics - Receives `panics_recovered` increments
 * @param log - Server logger
 */
export function createRecoverPanicMiddleware(
  metrics: ServerMetrics,
  log: Logger,
): Middleware {
  return async (ctx, next) => {
    try {
      return await next();
    } catch (error) {
      metrics.recordPanic();
      const { method, url } = ctx.request;
      log(
        `[ERROR] panic recovered: ${method} ${url} ` +
          `client=${ctx.remoteAddress || "unknown"} request_id=${ctx.requestId}\n` +
          describeError(error),
      );
      return serverErrorResponse({ Connection: "close" });
    }
  };
}
