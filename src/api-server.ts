/**
 * Marquee API server.
 *
 * Builds the admission pipeline around the router and owns the state that
 * outlives a request: the rate limiter, the metrics collector and the HTTP
 * listener.
 *
 * Pipeline, outermost first:
 * ```
 * recover panic → metrics → CORS → rate limit → authenticate → router
 * ```
 *
 * @module marquee/api-server
 */

import { randomUUID } from "node:crypto";
import { createAuthorizer } from "./auth/authorize.ts";
import { createAuthenticateMiddleware } from "./auth/middleware.ts";
import { addUserSchemas } from "./auth/users.ts";
import { ClientRateLimiter } from "./concurrency/rate-limiter.ts";
import { MOVIE_INPUT_SCHEMA, movieInputSchema } from "./data/movies.ts";
import { createRouter } from "./http/routes.ts";
import { createCorsMiddleware } from "./middleware/cors.ts";
import { createMetricsMiddleware } from "./middleware/metrics.ts";
import { createRateLimitMiddleware } from "./middleware/rate-limit.ts";
import { createRecoverPanicMiddleware } from "./middleware/recover-panic.ts";
import { createMiddlewareRunner } from "./middleware/runner.ts";
import type { Handler, RequestContext } from "./middleware/types.ts";
import { ServerMetrics } from "./observability/metrics.ts";
import { serve, type ServeHandle } from "./runtime/runtime.ts";
import type {
  ApiServerOptions,
  HttpServerInstance,
  HttpServerOptions,
  Logger,
} from "./types.ts";
import { SchemaValidator } from "./validation/schema-validator.ts";

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * The API server.
 *
 * @example
 * ```typescript
 * const server = new ApiServer({
 *   name: "marquee",
 *   version: "0.3.0",
 *   environment: "development",
 *   rateLimit: { enabled: true, rps: 2, burst: 4 },
 *   cors: { trustedOrigins: ["https://app.example.com"] },
 *   credentials, users: credentials, permissions, movies,
 * });
 * const http = await server.startHttp({ port: 4000 });
 * ```
 */
export class ApiServer {
  private readonly metrics = new ServerMetrics();
  private readonly rateLimiter: ClientRateLimiter | null;
  private readonly pipeline: Handler;
  private httpServer: ServeHandle | null = null;
  private started = false;

  constructor(private readonly options: ApiServerOptions) {
    const log: Logger = (msg) => this.log(msg);

    // Disabled means no limiter at all, not a limiter that always says yes
    this.rateLimiter = options.rateLimit.enabled
      ? new ClientRateLimiter({
        rps: options.rateLimit.rps,
        burst: options.rateLimit.burst,
        idleTtlMs: options.rateLimit.idleTtlMs,
        sweepIntervalMs: options.rateLimit.sweepIntervalMs,
      })
      : null;

    const validator = new SchemaValidator();
    validator.addSchema(MOVIE_INPUT_SCHEMA, movieInputSchema);
    addUserSchemas(validator);

    const router = createRouter({
      movies: options.movies,
      users: options.users,
      credentials: options.credentials,
      deliverActivation: options.deliverActivation ??
        (async (user) => {
          log(`activation token issued for user ${user.id}; no delivery configured`);
        }),
      authorizer: createAuthorizer(options.permissions, log),
      validator,
      systemInfo: {
        environment: options.environment,
        version: options.version,
      },
      metrics: {
        snapshot: () => {
          this.refreshGauges();
          return this.metrics.getSnapshot();
        },
        prometheus: () => {
          this.refreshGauges();
          return this.metrics.toPrometheusFormat();
        },
      },
      log,
    });

    this.pipeline = createMiddlewareRunner(
      [
        createRecoverPanicMiddleware(this.metrics, log),
        createMetricsMiddleware(this.metrics),
        createCorsMiddleware(options.cors),
        createRateLimitMiddleware(this.rateLimiter, this.metrics, log),
        createAuthenticateMiddleware({
          credentials: options.credentials,
          metrics: this.metrics,
          log,
        }),
      ],
      async (ctx) => router.fetch(ctx.request, ctx),
    );
  }

  /**
   * Run one request through the pipeline.
   *
   * @param remoteAddress - Peer as `host:port`, as the transport reports it
   */
  handle(request: Request, remoteAddress: string): Promise<Response> {
    const ctx = this.createContext(request, remoteAddress);
    return this.pipeline(ctx);
  }

  /**
   * Start the HTTP listener and the rate limiter sweep.
   *
   * @example
   * ```typescript
   * const http = await server.startHttp({ port: 4000 });
   * // later
   * await http.shutdown();
   * ```
   */
  async startHttp(options: HttpServerOptions): Promise<HttpServerInstance> {
    if (this.started) {
      throw new Error(
        "[ApiServer] Server already started. Call stop() before starting again.",
      );
    }

    const hostname = options.hostname ?? "0.0.0.0";
    const maxBodyBytes = options.maxBodyBytes === undefined
      ? 1_048_576
      : options.maxBodyBytes;

    this.httpServer = serve(
      {
        port: options.port,
        hostname,
        maxBodyBytes,
        onListen: options.onListen ?? ((info) => {
          this.log(
            `HTTP server started on http://${info.hostname}:${info.port}`,
          );
        }),
      },
      (request, info) => this.handle(request, info.remoteAddress),
    );

    this.started = true;
    this.rateLimiter?.start();

    const { rateLimit, cors, environment } = this.options;
    const rateLimitInfo = rateLimit.enabled
      ? `rate limit: ${rateLimit.rps} rps, burst ${rateLimit.burst}`
      : "rate limit: off";
    this.log(
      `Server started (env: ${environment}, ${rateLimitInfo}, ` +
        `trusted origins: ${cors.trustedOrigins.length})`,
    );

    return {
      shutdown: async () => {
        await this.stop();
      },
      addr: { hostname, port: options.port },
    };
  }

  /**
   * Stop the server gracefully
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }

    this.rateLimiter?.stop();

    if (this.httpServer) {
      await this.httpServer.shutdown();
      this.httpServer = null;
    }

    this.started = false;
    this.log("Server stopped");
  }

  /**
   * Get the metrics collector (for tests and embedding)
   */
  getMetrics(): ServerMetrics {
    return this.metrics;
  }

  private createContext(request: Request, remoteAddress: string): RequestContext {
    const requestId = this.resolveRequestId(request);
    const responseHeaders = new Headers({ "X-Request-Id": requestId });
    return {
      request,
      remoteAddress,
      requestId,
      receivedAt: Date.now(),
      responseHeaders,
    };
  }

  private resolveRequestId(request: Request): string {
    const supplied = request.headers.get("X-Request-Id");
    return supplied && supplied.length <= MAX_REQUEST_ID_LENGTH
      ? supplied
      : randomUUID();
  }

  private refreshGauges(): void {
    this.metrics.setGauges({
      rateLimiterKeys: this.rateLimiter?.getMetrics().keys ?? 0,
    });
  }

  /**
   * Log message using custom logger or stderr
   */
  private log(msg: string): void {
    if (this.options.logger) {
      this.options.logger(msg);
    } else {
      console.error(`[${this.options.name}] ${msg}`);
    }
  }
}
