/**
 * Middleware pipeline runner.
 *
 * Composes an array of middlewares into a single callable function
 * using the onion model: each middleware wraps the next.
 *
 * @module marquee/middleware/runner
 */

import { applyResponseHeaders } from "../http/responses.ts";
import type { Handler, Middleware, RequestContext } from "./types.ts";

/**
 * Create a middleware runner that composes middlewares + a final handler.
 *
 * Execution order (onion model):
 * ```
 * m1-before → m2-before → handler → m2-after → m1-after
 * ```
 *
 * Headers accumulated on `ctx.responseHeaders` are applied to whichever
 * response comes back out, including short-circuit responses.
 *
 * @param middlewares - Middleware functions, outermost first
 * @param handler - Final handler (the router)
 * @returns A function that runs the full pipeline for a given context
 *
 * @example
 * ```typescript
 * const run = createMiddlewareRunner(
 *   [recoverPanic, metrics, cors],
 *   (ctx) => router.fetch(ctx.request, ctx),
 * );
 * const res = await run(ctx);
 * ```
 */
export function createMiddlewareRunner(
  middlewares: Middleware[],
  handler: Handler,
): Handler {
  return async (ctx: RequestContext) => {
    let index = 0;
    let handlerCalled = false;

    const next = async (): Promise<Response> => {
      if (index < middlewares.length) {
        const middleware = middlewares[index++];
        return middleware(ctx, next);
      }
      if (handlerCalled) {
        throw new Error(
          "[MiddlewareRunner] next() called after pipeline already completed. " +
            "A middleware may be calling next() multiple times.",
        );
      }
      handlerCalled = true;
      return handler(ctx);
    };

    const response = await next();
    return applyResponseHeaders(response, ctx.responseHeaders);
  };
}
