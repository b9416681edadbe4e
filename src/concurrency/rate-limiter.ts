/**
 * Client Rate Limiter
 *
 * Token bucket per client for request throttling, with a periodic sweep
 * that evicts clients that went quiet.
 *
 * @module marquee/concurrency/rate-limiter
 */

import { unrefTimer } from "../runtime/runtime.ts";

/**
 * Per-client bucket state
 */
interface ClientState {
  tokens: number;
  lastRefill: number;
  lastSeen: number;
}

/**
 * Options for {@link ClientRateLimiter}
 */
export interface ClientRateLimiterOptions {
  /** Refill rate in tokens per second */
  rps: number;
  /** Bucket capacity; a new client starts with a full bucket */
  burst: number;
  /** Idle time before a client is evicted (default: 180000) */
  idleTtlMs?: number;
  /** Sweep interval once started (default: 60000) */
  sweepIntervalMs?: number;
  /** Clock (default: Date.now) */
  now?: () => number;
}

/**
 * Token bucket rate limiter keyed by client.
 *
 * Refill-and-consume runs without an await in between, so on the event
 * loop it is atomic with respect to every other request and to the sweep.
 *
 * @example
 * ```typescript
 * const limiter = new ClientRateLimiter({ rps: 2, burst: 4 });
 * limiter.start();
 *
 * if (limiter.allow("203.0.113.7")) {
 *   // Execute request
 * } else {
 *   const waitMs = limiter.getTimeUntilToken("203.0.113.7");
 * }
 * ```
 */
export class ClientRateLimiter {
  private clients = new Map<string, ClientState>();
  private readonly rps: number;
  private readonly burst: number;
  private readonly idleTtlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ClientRateLimiterOptions) {
    this.rps = options.rps;
    this.burst = options.burst;
    this.idleTtlMs = options.idleTtlMs ?? 180_000;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Refill the client's bucket and try to take one token.
   *
   * @param key - Client identifier (remote host)
   * @returns true if allowed, false if rate limited
   */
  allow(key: string): boolean {
    const state = this.refill(key);
    if (state.tokens >= 1) {
      state.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Time until the client's next token (in ms).
   * Returns 0 if a token is available now.
   */
  getTimeUntilToken(key: string): number {
    const state = this.refill(key);
    if (state.tokens >= 1) return 0;
    if (this.rps <= 0) return Number.POSITIVE_INFINITY;
    return ((1 - state.tokens) / this.rps) * 1000;
  }

  /**
   * Remove clients idle for longer than the TTL.
   *
   * @returns Number of clients removed
   */
  sweep(): number {
    const cutoff = this.now() - this.idleTtlMs;
    let removed = 0;
    for (const [key, state] of this.clients) {
      if (state.lastSeen < cutoff) {
        this.clients.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Start the periodic sweep. Idempotent; the timer never holds the
   * process open.
   */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    unrefTimer(this.sweepTimer);
  }

  /**
   * Stop the periodic sweep.
   */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Clear every client's bucket
   */
  clearAll(): void {
    this.clients.clear();
  }

  /**
   * Get metrics for monitoring
   */
  getMetrics(): { keys: number } {
    return { keys: this.clients.size };
  }

  private refill(key: string): ClientState {
    const now = this.now();
    let state = this.clients.get(key);
    if (!state) {
      state = { tokens: this.burst, lastRefill: now, lastSeen: now };
      this.clients.set(key, state);
      return state;
    }

    const elapsedSeconds = Math.max(0, now - state.lastRefill) / 1000;
    state.tokens = Math.min(this.burst, state.tokens + elapsedSeconds * this.rps);
    state.lastRefill = now;
    state.lastSeen = now;
    return state;
  }
}
