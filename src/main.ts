/**
 * Process entry point.
 *
 * Loads config, connects the Postgres-backed stores and serves the API
 * until SIGINT or SIGTERM.
 *
 * @module marquee/main
 */

import { ApiServer } from "./api-server.ts";
import {
  PostgresCredentialStore,
  PostgresPermissionStore,
} from "./auth/postgres-store.ts";
import { loadConfig } from "./config.ts";
import { PostgresMovieStore } from "./data/postgres-movies.ts";
import { createPgPool, toQueryable } from "./data/postgres.ts";
import { describeError } from "./errors.ts";

const NAME = "marquee";
const VERSION = "0.3.0";

async function main(): Promise<void> {
  const config = await loadConfig(process.argv[2]);
  if (!config.db.dsn) {
    throw new Error(
      '[Config] "db.dsn" is required. Set db.dsn in YAML or MARQUEE_DB_DSN env var.',
    );
  }

  const pool = createPgPool({
    dsn: config.db.dsn,
    maxOpenConns: config.db.maxOpenConns,
    maxIdleTimeMs: config.db.maxIdleTimeMs,
  });
  const db = toQueryable(pool);
  const timeoutMs = config.operationTimeoutMs;

  const credentials = new PostgresCredentialStore(db, timeoutMs);

  const server = new ApiServer({
    name: NAME,
    version: VERSION,
    environment: config.env,
    rateLimit: config.limiter,
    cors: config.cors,
    credentials,
    users: credentials,
    permissions: new PostgresPermissionStore(db, timeoutMs),
    movies: new PostgresMovieStore(db, timeoutMs),
  });

  const http = await server.startHttp({ port: config.port });

  const shutdown = async (signal: string) => {
    console.error(`[${NAME}] Received ${signal}, shutting down`);
    try {
      await http.shutdown();
      await pool.end();
      process.exit(0);
    } catch (error) {
      console.error(`[${NAME}] [ERROR] shutdown failed: ${describeError(error)}`);
      process.exit(1);
    }
  };

  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));
}

main().catch((error: unknown) => {
  console.error(`[${NAME}] [ERROR] ${describeError(error)}`);
  process.exit(1);
});
