/**
 * CORS middleware.
 *
 * Grants cross-origin access to trusted origins only and answers their
 * preflight requests without reaching the rest of the pipeline.
 *
 * @module marquee/middleware/cors
 */

import type { CorsOptions } from "../types.ts";
import type { Middleware } from "./types.ts";

const PREFLIGHT_ALLOW_METHODS = "OPTIONS, PUT, PATCH, DELETE";
const PREFLIGHT_ALLOW_HEADERS = "Authorization, Content-Type";
const PREFLIGHT_MAX_AGE_SECONDS = "600";

/**
 * Create a CORS middleware.
 *
 * Every response varies on `Origin` and `Access-Control-Request-Method`,
 * whether or not the origin is trusted. Origins are compared as exact
 * strings.
 */
export function createCorsMiddleware(options: CorsOptions): Middleware {
  const trusted = new Set(options.trustedOrigins);

  return async (ctx, next) => {
    ctx.responseHeaders.append("Vary", "Origin");
    ctx.responseHeaders.append("Vary", "Access-Control-Request-Method");

    const origin = ctx.request.headers.get("Origin");
    if (!origin || !trusted.has(origin)) {
      return next();
    }

    ctx.responseHeaders.set("Access-Control-Allow-Origin", origin);

    const isPreflight = ctx.request.method === "OPTIONS" &&
      ctx.request.headers.has("Access-Control-Request-Method");
    if (isPreflight) {
      return new Response(null, {
        status: 204,
        headers: {
          "Access-Control-Allow-Methods": PREFLIGHT_ALLOW_METHODS,
          "Access-Control-Allow-Headers": PREFLIGHT_ALLOW_HEADERS,
          "Access-Control-Max-Age": PREFLIGHT_MAX_AGE_SECONDS,
        },
      });
    }

    return next();
  };
}
