/**
 * Runtime Port: platform contract
 *
 * Defines the interface the runtime module implements. Everything else in
 * the server talks to the platform through these functions only.
 *
 * @module marquee/runtime/types
 */

// ─── Environment ─────────────────────────────────────────

/**
 * Get an environment variable.
 * Returns undefined if not set (never throws).
 */
export type EnvFn = (key: string) => string | undefined;

// ─── File System ─────────────────────────────────────────

/**
 * Read a UTF-8 text file.
 * Returns null if the file does not exist (no throw on ENOENT).
 * Throws on other errors (permission denied, etc.).
 */
export type ReadTextFileFn = (path: string) => Promise<string | null>;

// ─── HTTP Server ─────────────────────────────────────────

/** Transport facts about the connection a request arrived on */
export interface ConnectionInfo {
  /**
   * Peer address as `host:port`, IPv6 hosts bracketed.
   * Empty when the socket no longer knows its peer.
   */
  remoteAddress: string;
}

/** Fetch-style request handler (Web standard) plus connection info */
export type FetchHandler = (
  req: Request,
  info: ConnectionInfo,
) => Response | Promise<Response>;

/** Options for starting an HTTP server */
export interface ServeOptions {
  port: number;
  hostname?: string;
  onListen?: (info: { hostname: string; port: number }) => void;
  /** Maximum request body size in bytes (optional). */
  maxBodyBytes?: number | null;
}

/** Handle returned by serve(), used to shut down the server */
export interface ServeHandle {
  shutdown(): Promise<void>;
}

/**
 * Start an HTTP server with a fetch-style handler.
 */
export type ServeFn = (
  options: ServeOptions,
  handler: FetchHandler,
) => ServeHandle;

// ─── Timers ──────────────────────────────────────────────

/**
 * Unref a timer so it doesn't prevent process exit.
 */
export type UnrefTimerFn = (timer: ReturnType<typeof setInterval>) => void;

// ─── Port interface ──────────────────────────────────────

/**
 * Complete runtime port contract.
 * Checked with `satisfies RuntimePort` at the bottom of runtime.ts.
 */
export interface RuntimePort {
  env: EnvFn;
  readTextFile: ReadTextFileFn;
  serve: ServeFn;
  unrefTimer: UnrefTimerFn;
}
