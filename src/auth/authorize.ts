/**
 * Authorization gates.
 *
 * Each gate wraps a route handler and reads the principal the authenticate
 * middleware attached. Gates nest: a permission check implies the
 * activation check, which implies the authentication check.
 *
 * @module marquee/auth/authorize
 */

import { describeError } from "../errors.ts";
import type { RequestContext } from "../middleware/types.ts";
import type { Logger } from "../types.ts";
import { AuthError, contextGetPrincipal } from "./middleware.ts";
import type { PermissionStore, User } from "./types.ts";

/**
 * Anything that carries the request context as `env`, such as a Hono
 * `Context` whose bindings are the pipeline context.
 */
export interface GateContext {
  env: RequestContext;
}

export type GatedHandler<C extends GateContext> = (c: C) => Promise<Response>;

/**
 * The three composable gates.
 */
export interface Authorizer {
  requireAuthenticatedUser<C extends GateContext>(
    handler: GatedHandler<C>,
  ): GatedHandler<C>;
  requireActivatedUser<C extends GateContext>(
    handler: GatedHandler<C>,
  ): GatedHandler<C>;
  requirePermission<C extends GateContext>(
    code: string,
    handler: GatedHandler<C>,
  ): GatedHandler<C>;
}

/**
 * Create the authorization gates.
 *
 * A permission lookup that fails is logged and treated as missing
 * permission.
 *
 * @example
 * ```typescript
 * const { requirePermission } = createAuthorizer(permissions, log);
 * app.get("/v1/movies", requirePermission("movies:read", listMovies));
 * ```
 */
export function createAuthorizer(
  permissions: PermissionStore,
  log: Logger,
): Authorizer {
  const authenticatedUser = (ctx: RequestContext): Readonly<User> | null => {
    const principal = contextGetPrincipal(ctx);
    return principal.kind === "user" ? principal.user : null;
  };

  const hasPermission = async (
    ctx: RequestContext,
    user: Readonly<User>,
    code: string,
  ): Promise<boolean> => {
    try {
      const granted = await permissions.getAllForUser(user.id);
      return granted.includes(code);
    } catch (error) {
      log(
        `[ERROR] permission lookup failed for user ${user.id} ` +
          `(request_id=${ctx.requestId}): ${describeError(error)}`,
      );
      return false;
    }
  };

  function requireAuthenticatedUser<C extends GateContext>(
    handler: GatedHandler<C>,
  ): GatedHandler<C> {
    return async (c) => {
      if (!authenticatedUser(c.env)) {
        return new AuthError("authentication_required").toResponse();
      }
      return handler(c);
    };
  }

  function requireActivatedUser<C extends GateContext>(
    handler: GatedHandler<C>,
  ): GatedHandler<C> {
    return async (c) => {
      const user = authenticatedUser(c.env);
      if (!user) {
        return new AuthError("authentication_required").toResponse();
      }
      if (!user.activated) {
        return new AuthError("inactive_account").toResponse();
      }
      return handler(c);
    };
  }

  function requirePermission<C extends GateContext>(
    code: string,
    handler: GatedHandler<C>,
  ): GatedHandler<C> {
    return requireActivatedUser<C>(async (c) => {
      const user = authenticatedUser(c.env);
      if (!user || !(await hasPermission(c.env, user, code))) {
        return new AuthError("not_permitted").toResponse();
      }
      return handler(c);
    });
  }

  return { requireAuthenticatedUser, requireActivatedUser, requirePermission };
}
