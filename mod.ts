/**
 * Marquee API
 *
 * Movie catalogue API behind a request admission pipeline: panic
 * containment, metrics, CORS, per-client rate limiting, bearer-token
 * authentication and permission gates, with optimistic concurrency on
 * writes.
 *
 * @example
 * ```typescript
 * import { ApiServer, MemoryCredentialStore, MemoryMovieStore, MemoryPermissionStore } from "marquee-api";
 *
 * const credentials = new MemoryCredentialStore();
 * const server = new ApiServer({
 *   name: "marquee",
 *   version: "0.3.0",
 *   environment: "development",
 *   rateLimit: { enabled: true, rps: 2, burst: 4 },
 *   cors: { trustedOrigins: ["https://app.example.com"] },
 *   credentials,
 *   users: credentials,
 *   permissions: new MemoryPermissionStore(),
 *   movies: new MemoryMovieStore(),
 * });
 *
 * const http = await server.startHttp({ port: 4000 });
 * ```
 *
 * @module marquee
 */

// Main server class
export { ApiServer } from "./src/api-server.ts";

// Configuration
export { loadConfig } from "./src/config.ts";
export type { AppConfig, Environment } from "./src/config.ts";

// Errors
export {
  ApiError,
  BadRequestError,
  ClientError,
  ConflictError,
  FailedValidationError,
  InvalidLoginError,
  NotFoundError,
  RateLimitError,
  ServerError,
  StorageError,
} from "./src/errors.ts";

// Rate limiting
export { ClientRateLimiter } from "./src/concurrency/rate-limiter.ts";
export type { ClientRateLimiterOptions } from "./src/concurrency/rate-limiter.ts";
export { splitHostPort } from "./src/concurrency/client-address.ts";

// Schema validation
export { SchemaValidator } from "./src/validation/schema-validator.ts";
export type {
  ValidationError,
  ValidationResult,
} from "./src/validation/schema-validator.ts";

// Data
export { updateVersioned } from "./src/data/versioned.ts";
export type {
  FieldErrors,
  UpdateOutcome,
  UpdateRequest,
  VersionedRecord,
  VersionedStore,
} from "./src/data/versioned.ts";
export {
  formatRuntime,
  parseRuntime,
  toMovieJson,
  validateMovie,
} from "./src/data/movies.ts";
export type {
  Movie,
  MovieDraft,
  MovieFilters,
  MovieJson,
  MoviePage,
  MovieSort,
  MovieStore,
} from "./src/data/movies.ts";
export { MemoryMovieStore } from "./src/data/memory-movies.ts";
export { PostgresMovieStore } from "./src/data/postgres-movies.ts";
export { createPgPool, toQueryable, withDeadline } from "./src/data/postgres.ts";
export type { Queryable, Row } from "./src/data/postgres.ts";
export {
  calculateMetadata,
  parsePageRequest,
  toMetadataJson,
} from "./src/data/pagination.ts";
export type {
  PageDefaults,
  PageMetadata,
  PageRequest,
} from "./src/data/pagination.ts";

// Account routes
export {
  ACTIVATION_TOKEN_TTL_MS,
  AUTHENTICATION_TOKEN_TTL_MS,
} from "./src/http/user-routes.ts";
export type { ActivationDelivery } from "./src/http/user-routes.ts";

// Type exports
export type {
  ApiServerOptions,
  CorsOptions,
  HttpServerInstance,
  HttpServerOptions,
  Logger,
  RateLimitOptions,
} from "./src/types.ts";

// Middleware
export * from "./src/middleware/mod.ts";

// Auth
export * from "./src/auth/mod.ts";

// Observability
export * from "./src/observability/mod.ts";
