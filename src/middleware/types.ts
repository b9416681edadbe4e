/**
 * Middleware pipeline types for ApiServer.
 *
 * Provides an onion-model middleware system (similar to Koa/Hono)
 * where each middleware wraps the next, enabling before/after logic.
 *
 * @module marquee/middleware/types
 */

import type { Principal } from "../auth/types.ts";

/**
 * Context passed through the middleware pipeline.
 * One per inbound request; nothing in it outlives the request.
 */
export interface RequestContext {
  /** The inbound request */
  readonly request: Request;

  /** Peer address as `host:port` (`[v6]:port` for IPv6), as the transport saw it */
  readonly remoteAddress: string;

  /** Correlation id, echoed as `X-Request-Id` */
  readonly requestId: string;

  /** Epoch ms at which the pipeline picked the request up */
  readonly receivedAt: number;

  /**
   * Headers that end up on the response whichever layer produces it.
   * Applied by the runner after the chain returns.
   */
  readonly responseHeaders: Headers;

  /**
   * Set once by the authenticate middleware.
   * Read it through `contextGetPrincipal()`.
   */
  principal?: Principal;
}

/**
 * Function to invoke the next middleware in the chain.
 */
export type NextFunction = () => Promise<Response>;

/**
 * Terminal handler of the pipeline.
 */
export type Handler = (ctx: RequestContext) => Promise<Response>;

/**
 * A middleware function.
 *
 * Receives the context and a `next()` function to call the next middleware.
 * Can short-circuit the pipeline by not calling `next()`.
 *
 * @example
 * ```typescript
 * const timing: Middleware = async (ctx, next) => {
 *   const started = Date.now();
 *   const res = await next();
 *   log(`${ctx.request.method} ${res.status} ${Date.now() - started}ms`);
 *   return res;
 * };
 * ```
 */
export type Middleware = (
  ctx: RequestContext,
  next: NextFunction,
) => Promise<Response>;
