/**
 * Authentication middleware and utilities.
 *
 * Provides Bearer token extraction, the principal accessors on the request
 * context, and the authenticate middleware for the pipeline.
 *
 * @module marquee/auth/middleware
 */

import { ClientError, describeError, serverErrorResponse } from "../errors.ts";
import type { Middleware, RequestContext } from "../middleware/types.ts";
import type { ServerMetrics } from "../observability/metrics.ts";
import { isOtelEnabled, recordAdmissionEvent } from "../observability/otel.ts";
import type { Logger } from "../types.ts";
import { fingerprintToken, isWellFormedToken } from "./tokens.ts";
import {
  ANONYMOUS,
  type CredentialStore,
  type Lookup,
  type Principal,
  TokenScope,
  type User,
} from "./types.ts";

export type AuthErrorCode =
  | "invalid_credentials"
  | "invalid_token"
  | "authentication_required"
  | "inactive_account"
  | "not_permitted";

const AUTH_ERRORS: Record<AuthErrorCode, { status: number; message: string }> =
  {
    invalid_credentials: {
      status: 401,
      message: "authorization header must have the form 'Bearer <token>'",
    },
    invalid_token: {
      status: 401,
      message: "invalid or missing authentication token",
    },
    authentication_required: {
      status: 401,
      message: "you must be authenticated to access this resource",
    },
    inactive_account: {
      status: 403,
      message: "your user account must be activated to access this resource",
    },
    not_permitted: {
      status: 403,
      message:
        "your user account doesn't have the necessary permissions to access this resource",
    },
  };

/**
 * Authentication or authorization failure with a stable code.
 */
export class AuthError extends ClientError {
  constructor(code: AuthErrorCode) {
    const { status, message } = AUTH_ERRORS[code];
    super(status, code, message);
    this.name = "AuthError";
  }

  protected override responseHeaders(): Record<string, string> {
    // Only a rejected credential invites the client to present another one
    return this.code === "invalid_credentials" || this.code === "invalid_token"
      ? { "WWW-Authenticate": "Bearer" }
      : {};
  }
}

/**
 * Result of reading the Authorization header.
 */
export type BearerHeader =
  | { kind: "absent" }
  | { kind: "malformed" }
  | { kind: "bearer"; token: string };

/**
 * Extract the Bearer token from the Authorization header.
 *
 * An empty header counts as absent. Anything other than exactly
 * `Bearer <token>` split on single spaces is malformed.
 */
export function extractBearerToken(request: Request): BearerHeader {
  const auth = request.headers.get("Authorization");
  if (!auth) return { kind: "absent" };

  const parts = auth.split(" ");
  if (parts.length !== 2 || parts[0] !== "Bearer") {
    return { kind: "malformed" };
  }
  return { kind: "bearer", token: parts[1] };
}

/**
 * Attach the principal to the request context. Only once per request.
 */
export function contextSetPrincipal(
  ctx: RequestContext,
  principal: Principal,
): void {
  if (ctx.principal) {
    throw new Error(
      "[Authenticate] principal already attached to this request. " +
        "The authenticate middleware may be registered twice.",
    );
  }
  ctx.principal = principal.kind === "user"
    ? Object.freeze({ kind: "user", user: Object.freeze({ ...principal.user }) })
    : principal;
}

/**
 * Read the principal attached by the authenticate middleware.
 *
 * @throws Error when no principal is attached (pipeline misconfiguration)
 */
export function contextGetPrincipal(ctx: RequestContext): Principal {
  if (!ctx.principal) {
    throw new Error(
      "[Authorize] no principal found on request. " +
        "Ensure the authenticate middleware runs before any authorization gate.",
    );
  }
  return ctx.principal;
}

/**
 * Options for {@link createAuthenticateMiddleware}
 */
export interface AuthenticateOptions {
  credentials: CredentialStore;
  metrics: ServerMetrics;
  log: Logger;
  /** Clock for token expiry checks (default: current time) */
  now?: () => Date;
}

/**
 * Create the authenticate middleware.
 *
 * Resolves the bearer token against the credential store and attaches the
 * principal to the context. Requests without an Authorization header go
 * through as anonymous; authorization gates decide what they may reach.
 */
export function createAuthenticateMiddleware(
  options: AuthenticateOptions,
): Middleware {
  const { credentials, metrics, log } = options;
  const now = options.now ?? (() => new Date());

  const reject = (code: AuthErrorCode, reason: string): Response => {
    metrics.recordAuth(false);
    if (isOtelEnabled()) {
      recordAdmissionEvent("auth.reject", { reason });
    }
    return new AuthError(code).toResponse();
  };

  return async (ctx, next) => {
    ctx.responseHeaders.append("Vary", "Authorization");

    const header = extractBearerToken(ctx.request);
    switch (header.kind) {
      case "absent":
        contextSetPrincipal(ctx, ANONYMOUS);
        return next();
      case "malformed":
        return reject("invalid_credentials", "malformed_header");
    }

    if (!isWellFormedToken(header.token)) {
      return reject("invalid_token", "malformed_token");
    }

    let lookup: Lookup<User>;
    try {
      lookup = await credentials.getForToken(
        TokenScope.Authentication,
        fingerprintToken(header.token),
        now(),
      );
    } catch (error) {
      lookup = { kind: "failed", error };
    }

    switch (lookup.kind) {
      case "not_found":
        return reject("invalid_token", "unknown_token");
      case "failed":
        log(
          `[ERROR] credential lookup failed (request_id=${ctx.requestId}): ` +
            describeError(lookup.error),
        );
        return serverErrorResponse();
    }

    const user = lookup.value;
    metrics.recordAuth(true);
    if (isOtelEnabled()) {
      recordAdmissionEvent("auth.verify", { "user.id": user.id });
    }
    contextSetPrincipal(ctx, { kind: "user", user });
    return next();
  };
}
