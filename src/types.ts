/**
 * Type definitions for the Marquee API server.
 *
 * Options consumed by {@link ApiServer}, plus the shapes shared between the
 * admission pipeline and the stores it calls out to.
 *
 * @module marquee/types
 */

import type {
  CredentialStore,
  PermissionStore,
  UserStore,
} from "./auth/types.ts";
import type { MovieStore } from "./data/movies.ts";
import type { ActivationDelivery } from "./http/user-routes.ts";

/**
 * Log sink. Receives one formatted line per call.
 * Severity is carried as a message prefix (`[WARN]`, `[ERROR]`).
 */
export type Logger = (msg: string) => void;

/**
 * Per-client token bucket configuration.
 */
export interface RateLimitOptions {
  /**
   * Master switch. When false no limiter is created and requests pass
   * straight through without any bookkeeping.
   */
  enabled: boolean;

  /** Refill rate in tokens per second */
  rps: number;

  /** Bucket capacity (maximum burst) */
  burst: number;

  /** Idle time after which a client entry is evicted (default: 3 minutes) */
  idleTtlMs?: number;

  /** Interval between eviction sweeps (default: 1 minute) */
  sweepIntervalMs?: number;
}

/**
 * CORS configuration
 */
export interface CorsOptions {
  /** Origins allowed cross-origin access, compared by exact string match */
  trustedOrigins: string[];
}

/**
 * Configuration options for ApiServer
 */
export interface ApiServerOptions {
  /** Server name (log prefix) */
  name: string;

  /** Application version reported by the healthcheck */
  version: string;

  /** Deployment environment reported by the healthcheck */
  environment: string;

  rateLimit: RateLimitOptions;

  cors: CorsOptions;

  /** Token lookup and issuance */
  credentials: CredentialStore;

  /** Accounts for registration, activation and login */
  users: UserStore;

  /** Permission lookup keyed by user id */
  permissions: PermissionStore;

  /**
   * Receives each new activation token (default: log that one was issued,
   * without the plaintext)
   */
  deliverActivation?: ActivationDelivery;

  movies: MovieStore;

  /** Custom logger function (default: console.error with a name prefix) */
  logger?: Logger;
}

/**
 * HTTP listener options
 */
export interface HttpServerOptions {
  port: number;

  /** Interface to bind (default: "0.0.0.0") */
  hostname?: string;

  /**
   * Maximum request body size in bytes (default: 1 MB).
   * `null` disables the check.
   */
  maxBodyBytes?: number | null;

  /** Called once the listener is bound */
  onListen?: (info: { hostname: string; port: number }) => void;
}

/**
 * Handle returned by {@link ApiServer.startHttp}
 */
export interface HttpServerInstance {
  shutdown: () => Promise<void>;
  addr: { hostname: string; port: number };
}
