/**
 * Postgres access shared by the stores.
 *
 * Stores talk to a {@link Queryable} rather than to `pg` directly so that
 * tests can hand them an in-process fake. Every call goes through
 * {@link withDeadline}.
 *
 * @module marquee/data/postgres
 */

import pg from "pg";
import { StorageError } from "../errors.ts";

/** A result row, column name to decoded value */
export type Row = Record<string, unknown>;

/**
 * The slice of a pg Pool the stores use.
 */
export interface Queryable {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: Row[]; rowCount: number | null }>;
}

export interface PoolOptions {
  dsn: string;
  maxOpenConns: number;
  maxIdleTimeMs: number;
}

/**
 * Create a connection pool. Connections are opened lazily on first query.
 */
export function createPgPool(options: PoolOptions): pg.Pool {
  return new pg.Pool({
    connectionString: options.dsn,
    max: options.maxOpenConns,
    idleTimeoutMillis: options.maxIdleTimeMs,
  });
}

/**
 * Narrow a pool to the {@link Queryable} contract.
 */
export function toQueryable(pool: pg.Pool): Queryable {
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
  };
}

/**
 * Run a store operation under a deadline.
 *
 * Overruns and failures both surface as {@link StorageError}; the pending
 * query is abandoned, not cancelled.
 *
 * @param label - Operation name for the error message
 */
export function withDeadline<T>(
  timeoutMs: number,
  label: string,
  task: () => Promise<T>,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | null = null;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new StorageError(`${label} timed out after ${timeoutMs} ms`)),
      timeoutMs,
    );
  });

  const run = task().catch((error: unknown) => {
    if (error instanceof StorageError) throw error;
    throw new StorageError(`${label} failed`, { cause: error });
  });

  return Promise.race([run, deadline]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

// ─── Row decoding ────────────────────────────────────────

function column(row: Row, name: string): unknown {
  if (!(name in row)) {
    throw new StorageError(`missing column "${name}" in result row`);
  }
  return row[name];
}

/**
 * Read an integer column. int8 columns arrive as decimal strings.
 */
export function readInt(row: Row, name: string): number {
  const value = column(row, name);
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^-?\d+$/.test(value)) {
    const parsed = Number(value);
    if (Number.isSafeInteger(parsed)) return parsed;
  }
  throw new StorageError(`column "${name}" is not an integer`);
}

export function readString(row: Row, name: string): string {
  const value = column(row, name);
  if (typeof value === "string") return value;
  throw new StorageError(`column "${name}" is not text`);
}

export function readBoolean(row: Row, name: string): boolean {
  const value = column(row, name);
  if (typeof value === "boolean") return value;
  throw new StorageError(`column "${name}" is not a boolean`);
}

export function readDate(row: Row, name: string): Date {
  const value = column(row, name);
  if (value instanceof Date) return value;
  if (typeof value === "string" && !Number.isNaN(Date.parse(value))) {
    return new Date(value);
  }
  throw new StorageError(`column "${name}" is not a timestamp`);
}

export function readStringArray(row: Row, name: string): string[] {
  const value = column(row, name);
  if (Array.isArray(value) && value.every((v) => typeof v === "string")) {
    return value;
  }
  throw new StorageError(`column "${name}" is not a text array`);
}
