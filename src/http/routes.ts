/**
 * HTTP routes.
 *
 * A Hono application whose bindings are the pipeline's request context,
 * so handlers and authorization gates reach the principal through `c.env`.
 *
 * @module marquee/http/routes
 */

import { type Context, Hono } from "hono";
import type { Authorizer } from "../auth/authorize.ts";
import type { CredentialStore, UserStore } from "../auth/types.ts";
import {
  checkDraft,
  decodeMovieInput,
  MOVIE_PAGE_DEFAULTS,
  type MovieStore,
  toMovieJson,
  validateMovie,
} from "../data/movies.ts";
import {
  calculateMetadata,
  parsePageRequest,
  toMetadataJson,
} from "../data/pagination.ts";
import { updateVersioned } from "../data/versioned.ts";
import {
  ApiError,
  BadRequestError,
  ConflictError,
  describeError,
  FailedValidationError,
  NotFoundError,
  ServerError,
} from "../errors.ts";
import type { RequestContext } from "../middleware/types.ts";
import type { ServerMetricsSnapshot } from "../observability/metrics.ts";
import type { Logger } from "../types.ts";
import type { SchemaValidator } from "../validation/schema-validator.ts";
import { readJson } from "./requests.ts";
import { jsonResponse } from "./responses.ts";
import { type ActivationDelivery, registerUserRoutes } from "./user-routes.ts";

export type AppEnv = { Bindings: RequestContext };

type MovieContext = Context<AppEnv, "/v1/movies/:id">;

export interface RouterOptions {
  movies: MovieStore;
  users: UserStore;
  credentials: CredentialStore;
  deliverActivation: ActivationDelivery;
  authorizer: Authorizer;
  /** Must have the movie and user schemas registered */
  validator: SchemaValidator;
  /** Reported by the healthcheck */
  systemInfo: { environment: string; version: string };
  /** Metrics export, refreshed per call */
  metrics: {
    snapshot: () => ServerMetricsSnapshot;
    prometheus: () => string;
  };
  log: Logger;
}

const ID_PATTERN = /^[0-9]+$/;

function parseId(c: MovieContext): number {
  const raw = c.req.param("id");
  const id = ID_PATTERN.test(raw) ? Number(raw) : 0;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new NotFoundError();
  }
  return id;
}

function parseExpectedVersion(c: Context<AppEnv>): number | undefined {
  const header = c.req.header("X-Expected-Version");
  if (header === undefined || header === "") return undefined;
  const version = ID_PATTERN.test(header) ? Number(header) : 0;
  if (!Number.isSafeInteger(version) || version < 1) {
    throw new BadRequestError("X-Expected-Version must be a positive integer");
  }
  return version;
}

function parseGenres(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(",").map((g) => g.trim()).filter((g) => g !== "");
}

/**
 * Build the router.
 */
export function createRouter(options: RouterOptions): Hono<AppEnv> {
  const { movies, validator, log } = options;
  const { requirePermission } = options.authorizer;
  const app = new Hono<AppEnv>();

  // ApiErrors render themselves; anything else belongs to the panic layer
  app.onError((err, c) => {
    if (err instanceof ApiError) {
      if (err instanceof ServerError) {
        log(
          `[ERROR] ${c.req.method} ${c.req.url} request_id=${c.env.requestId}: ` +
            describeError(err),
        );
      }
      return err.toResponse();
    }
    throw err;
  });

  app.notFound(() => new NotFoundError().toResponse());

  // Health check endpoint
  app.get("/v1/healthcheck", () =>
    jsonResponse({
      status: "available",
      system_info: {
        environment: options.systemInfo.environment,
        version: options.systemInfo.version,
      },
    }));

  // Prometheus metrics endpoint
  app.get("/metrics", () =>
    new Response(options.metrics.prometheus(), {
      headers: { "Content-Type": "text/plain; version=0.0.4; charset=utf-8" },
    }));

  app.get("/debug/vars", () => jsonResponse(options.metrics.snapshot()));

  registerUserRoutes(app, {
    users: options.users,
    credentials: options.credentials,
    validator,
    deliverActivation: options.deliverActivation,
    log,
  });

  app.get(
    "/v1/movies",
    requirePermission("movies:read", async (c: Context<AppEnv>) => {
      const paging = parsePageRequest(
        {
          page: c.req.query("page"),
          page_size: c.req.query("page_size"),
          sort: c.req.query("sort"),
        },
        MOVIE_PAGE_DEFAULTS,
      );
      if (!paging.ok) {
        throw new FailedValidationError(paging.fields);
      }
      const { page, pageSize } = paging.value;

      const found = await movies.list(
        {
          title: c.req.query("title") ?? "",
          genres: parseGenres(c.req.query("genres")),
        },
        paging.value,
      );
      return jsonResponse({
        movies: found.movies.map(toMovieJson),
        metadata: toMetadataJson(
          calculateMetadata(found.totalRecords, page, pageSize),
        ),
      });
    }),
  );

  app.post(
    "/v1/movies",
    requirePermission("movies:write", async (c: Context<AppEnv>) => {
      const input = decodeMovieInput(validator, await readJson(c));
      const checked = checkDraft(input);
      if (!checked.ok) {
        throw new FailedValidationError(checked.fields);
      }
      const movie = await movies.insert(checked.draft);
      return jsonResponse({ movie: toMovieJson(movie) }, 201, {
        Location: `/v1/movies/${movie.id}`,
      });
    }),
  );

  app.get(
    "/v1/movies/:id",
    requirePermission("movies:read", async (c: MovieContext) => {
      const movie = await movies.get(parseId(c));
      if (!movie) throw new NotFoundError();
      return jsonResponse({ movie: toMovieJson(movie) });
    }),
  );

  app.patch(
    "/v1/movies/:id",
    requirePermission("movies:write", async (c: MovieContext) => {
      const id = parseId(c);
      const expectedVersion = parseExpectedVersion(c);
      const input = decodeMovieInput(validator, await readJson(c));

      const outcome = await updateVersioned(movies, id, {
        apply: (current) => ({ ...current, ...input }),
        validate: (candidate) => validateMovie(candidate),
        expectedVersion,
      });

      switch (outcome.kind) {
        case "not_found":
          throw new NotFoundError();
        case "conflict":
          throw new ConflictError();
        case "invalid":
          throw new FailedValidationError(outcome.fields);
        case "updated":
          return jsonResponse({ movie: toMovieJson(outcome.value) });
      }
    }),
  );

  app.delete(
    "/v1/movies/:id",
    requirePermission("movies:write", async (c: MovieContext) => {
      if (!(await movies.delete(parseId(c)))) {
        throw new NotFoundError();
      }
      return jsonResponse({ message: "movie successfully deleted" });
    }),
  );

  return app;
}
