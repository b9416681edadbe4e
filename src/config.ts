/**
 * Configuration loader.
 *
 * Loads config from a YAML file with env var overrides.
 * Priority: env vars > YAML > defaults
 *
 * @module marquee/config
 */

import { parse as parseYaml } from "yaml";
import { env, readTextFile } from "./runtime/runtime.ts";

export type Environment = "development" | "staging" | "production";

const ENVIRONMENTS: readonly Environment[] = [
  "development",
  "staging",
  "production",
];

/**
 * Parsed configuration (after YAML + env merge).
 */
export interface AppConfig {
  port: number;
  env: Environment;
  limiter: {
    enabled: boolean;
    /** Tokens per second */
    rps: number;
    burst: number;
  };
  cors: {
    trustedOrigins: string[];
  };
  db: {
    /** Absent when neither YAML nor env names a database */
    dsn?: string;
    maxOpenConns: number;
    maxIdleTimeMs: number;
  };
  /** Deadline for each store operation */
  operationTimeoutMs: number;
}

type Scalar = string | number | boolean;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function scalar(value: unknown): Scalar | undefined {
  return typeof value === "string" || typeof value === "number" ||
      typeof value === "boolean"
    ? value
    : undefined;
}

function section(
  file: Record<string, unknown>,
  key: string,
): Record<string, unknown> {
  const value = file[key];
  return isRecord(value) ? value : {};
}

function invalid(name: string, expectation: string, raw: Scalar): Error {
  return new Error(
    `[Config] "${name}" must be ${expectation}, got ${JSON.stringify(raw)}`,
  );
}

function readNumber(
  name: string,
  raw: Scalar | undefined,
  fallback: number,
  expectation: string,
  accept: (n: number) => boolean,
): number {
  if (raw === undefined) return fallback;
  const n = typeof raw === "number"
    ? raw
    : typeof raw === "string" && raw.trim() !== ""
    ? Number(raw)
    : Number.NaN;
  if (!Number.isFinite(n) || !accept(n)) {
    throw invalid(name, expectation, raw);
  }
  return n;
}

function readInteger(
  name: string,
  raw: Scalar | undefined,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  return readNumber(
    name,
    raw,
    fallback,
    max === Number.MAX_SAFE_INTEGER
      ? `an integer >= ${min}`
      : `an integer between ${min} and ${max}`,
    (n) => Number.isInteger(n) && n >= min && n <= max,
  );
}

function readBoolean(
  name: string,
  raw: Scalar | undefined,
  fallback: boolean,
): boolean {
  if (raw === undefined) return fallback;
  if (raw === true || raw === "true") return true;
  if (raw === false || raw === "false") return false;
  throw invalid(name, "true or false", raw);
}

function readOrigins(envValue: string | undefined, yamlValue: unknown): string[] {
  const split = (text: string) => text.split(/\s+/).filter(Boolean);
  if (envValue !== undefined) return split(envValue);
  if (typeof yamlValue === "string") return split(yamlValue);
  if (Array.isArray(yamlValue)) {
    return yamlValue.filter((o): o is string => typeof o === "string");
  }
  return [];
}

function readEnvironment(raw: Scalar | undefined): Environment {
  if (raw === undefined) return "development";
  const match = ENVIRONMENTS.find((e) => e === raw);
  if (!match) {
    throw invalid("env", `one of ${ENVIRONMENTS.join(", ")}`, raw);
  }
  return match;
}

/**
 * Load configuration from YAML file + env var overrides.
 *
 * Env var mapping:
 * - MARQUEE_PORT → port
 * - MARQUEE_ENV → env
 * - MARQUEE_LIMITER_ENABLED / _RPS / _BURST → limiter.*
 * - MARQUEE_CORS_TRUSTED_ORIGINS → cors.trustedOrigins (space-separated)
 * - MARQUEE_DB_DSN / _MAX_OPEN_CONNS / _MAX_IDLE_TIME_MS → db.*
 * - MARQUEE_OPERATION_TIMEOUT_MS → operationTimeoutMs
 *
 * @param configPath - Path to YAML config file. Defaults to "marquee.yaml" in cwd.
 * @throws Error if a value is invalid (fail-fast)
 */
export async function loadConfig(
  configPath = "marquee.yaml",
): Promise<AppConfig> {
  const file = await loadYamlFile(configPath);
  const limiter = section(file, "limiter");
  const cors = section(file, "cors");
  const db = section(file, "db");

  const dsn = env("MARQUEE_DB_DSN") ?? scalar(db.dsn);

  return {
    port: readInteger(
      "port",
      env("MARQUEE_PORT") ?? scalar(file.port),
      4000,
      1,
      65535,
    ),
    env: readEnvironment(env("MARQUEE_ENV") ?? scalar(file.env)),
    limiter: {
      enabled: readBoolean(
        "limiter.enabled",
        env("MARQUEE_LIMITER_ENABLED") ?? scalar(limiter.enabled),
        true,
      ),
      rps: readNumber(
        "limiter.rps",
        env("MARQUEE_LIMITER_RPS") ?? scalar(limiter.rps),
        2,
        "a number > 0",
        (n) => n > 0,
      ),
      burst: readInteger(
        "limiter.burst",
        env("MARQUEE_LIMITER_BURST") ?? scalar(limiter.burst),
        4,
        1,
      ),
    },
    cors: {
      trustedOrigins: readOrigins(
        env("MARQUEE_CORS_TRUSTED_ORIGINS"),
        cors.trustedOrigins,
      ),
    },
    db: {
      dsn: dsn === undefined || dsn === "" ? undefined : String(dsn),
      maxOpenConns: readInteger(
        "db.maxOpenConns",
        env("MARQUEE_DB_MAX_OPEN_CONNS") ?? scalar(db.maxOpenConns),
        25,
        1,
      ),
      maxIdleTimeMs: readInteger(
        "db.maxIdleTimeMs",
        env("MARQUEE_DB_MAX_IDLE_TIME_MS") ?? scalar(db.maxIdleTimeMs),
        900_000,
        0,
      ),
    },
    operationTimeoutMs: readInteger(
      "operationTimeoutMs",
      env("MARQUEE_OPERATION_TIMEOUT_MS") ?? scalar(file.operationTimeoutMs),
      3000,
      1,
    ),
  };
}

/**
 * Load a YAML config file.
 * Returns an empty object if the file doesn't exist (not an error).
 */
async function loadYamlFile(path: string): Promise<Record<string, unknown>> {
  // readTextFile returns null if file doesn't exist
  const text = await readTextFile(path);
  if (text === null) return {};

  const parsed: unknown = parseYaml(text);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(
      `[Config] ${path} must contain a YAML mapping at the top level`,
    );
  }
  return parsed;
}
