/**
 * Middleware module for ApiServer.
 *
 * @module marquee/middleware
 */

// Types
export type {
  Handler,
  Middleware,
  NextFunction,
  RequestContext,
} from "./types.ts";

// Runner
export { createMiddlewareRunner } from "./runner.ts";

// Built-in middlewares
export { createRecoverPanicMiddleware } from "./recover-panic.ts";
export { createMetricsMiddleware } from "./metrics.ts";
export { createCorsMiddleware } from "./cors.ts";
export { createRateLimitMiddleware } from "./rate-limit.ts";
