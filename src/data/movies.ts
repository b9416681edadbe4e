/**
 * Movie model: record shape, store contract, JSON codec and validation.
 *
 * @module marquee/data/movies
 */

import { BadRequestError } from "../errors.ts";
import type { SchemaValidator } from "../validation/schema-validator.ts";
import type { PageDefaults, PageRequest } from "./pagination.ts";
import type { FieldErrors, VersionedStore } from "./versioned.ts";

export interface Movie {
  id: number;
  createdAt: Date;
  title: string;
  year: number;
  /** Minutes */
  runtime: number;
  genres: string[];
  version: number;
}

/** The fields a client sets */
export type MovieDraft = Pick<Movie, "title" | "year" | "runtime" | "genres">;

export interface MovieFilters {
  /** Case-insensitive substring of the title */
  title?: string;
  /** Every listed genre must be present */
  genres?: string[];
}

export const MOVIE_SORTS = [
  "id",
  "title",
  "year",
  "runtime",
  "-id",
  "-title",
  "-year",
  "-runtime",
] as const;

export type MovieSort = typeof MOVIE_SORTS[number];

/** Column each sort value orders by; ties always fall back to id ascending */
export const MOVIE_SORT_COLUMNS: Record<
  MovieSort,
  "id" | "title" | "year" | "runtime"
> = {
  id: "id",
  title: "title",
  year: "year",
  runtime: "runtime",
  "-id": "id",
  "-title": "title",
  "-year": "year",
  "-runtime": "runtime",
};

export const MOVIE_PAGE_DEFAULTS: PageDefaults<MovieSort> = {
  pageSize: 20,
  sort: "id",
  sortSafelist: MOVIE_SORTS,
};

/** One page of a listing plus the count of every match */
export interface MoviePage {
  movies: Movie[];
  totalRecords: number;
}

/**
 * Movie persistence.
 */
export interface MovieStore extends VersionedStore<Movie> {
  /** Insert with version 1; id and createdAt are assigned by the store */
  insert(draft: MovieDraft): Promise<Movie>;
  /** One page of matching movies in the requested order */
  list(filters: MovieFilters, page: PageRequest<MovieSort>): Promise<MoviePage>;
  /** @returns false when no such movie existed */
  delete(id: number): Promise<boolean>;
}

// ─── Runtime codec ───────────────────────────────────────

const RUNTIME_PATTERN = /^(-?\d+) mins$/;

/** Encode a runtime as `"<n> mins"` */
export function formatRuntime(minutes: number): string {
  return `${minutes} mins`;
}

/**
 * Decode `"<n> mins"`.
 *
 * @returns The minutes, or null when the text is not in that form
 */
export function parseRuntime(text: string): number | null {
  const match = RUNTIME_PATTERN.exec(text);
  if (!match) return null;
  const minutes = Number(match[1]);
  return Number.isSafeInteger(minutes) ? minutes : null;
}

// ─── JSON representation ─────────────────────────────────

export interface MovieJson {
  id: number;
  title: string;
  year: number;
  runtime: string;
  genres: string[];
  version: number;
}

/** Wire form of a movie. createdAt stays internal. */
export function toMovieJson(movie: Movie): MovieJson {
  return {
    id: movie.id,
    title: movie.title,
    year: movie.year,
    runtime: formatRuntime(movie.runtime),
    genres: [...movie.genres],
    version: movie.version,
  };
}

/** Schema name of the movie request body in a {@link SchemaValidator} */
export const MOVIE_INPUT_SCHEMA = "movie.input";

/**
 * Shape of create and update bodies. Every field is optional here;
 * presence is a domain rule checked by {@link validateMovie}.
 */
export const movieInputSchema = {
  type: "object",
  properties: {
    title: { type: "string" },
    year: { type: "integer" },
    runtime: { type: "string", pattern: "^-?[0-9]+ mins$" },
    genres: { type: "array", items: { type: "string" } },
  },
  additionalProperties: false,
} as const;

/**
 * Decode a parsed JSON body into draft fields.
 *
 * @throws BadRequestError when the body does not have the input shape
 */
export function decodeMovieInput(
  validator: SchemaValidator,
  body: unknown,
): Partial<MovieDraft> {
  const result = validator.validate(MOVIE_INPUT_SCHEMA, body);
  if (!result.valid || typeof body !== "object" || body === null) {
    throw new BadRequestError(
      result.errors[0]?.message ?? "body must be a JSON object",
    );
  }

  const input: Partial<MovieDraft> = {};
  if ("title" in body && typeof body.title === "string") {
    input.title = body.title;
  }
  if ("year" in body && typeof body.year === "number") {
    input.year = body.year;
  }
  if ("runtime" in body && typeof body.runtime === "string") {
    const minutes = parseRuntime(body.runtime);
    if (minutes === null) throw new BadRequestError("invalid runtime format");
    input.runtime = minutes;
  }
  if ("genres" in body && Array.isArray(body.genres)) {
    input.genres = body.genres.filter((g): g is string => typeof g === "string");
  }
  return input;
}

// ─── Validation ──────────────────────────────────────────

/** Year of the first film */
const EARLIEST_YEAR = 1888;
const MAX_TITLE_BYTES = 500;
const MAX_GENRES = 5;

/**
 * Domain rules for a movie. Keeps the first failure per field.
 *
 * @param currentYear - Latest acceptable year (default: this year)
 */
export function validateMovie(
  movie: Partial<MovieDraft>,
  currentYear: number = new Date().getFullYear(),
): FieldErrors {
  const errors: FieldErrors = {};
  const check = (ok: boolean, field: string, message: string) => {
    if (!ok && !(field in errors)) errors[field] = message;
  };

  const title = movie.title ?? "";
  check(title !== "", "title", "must be provided");
  check(
    Buffer.byteLength(title, "utf8") <= MAX_TITLE_BYTES,
    "title",
    `must not be more than ${MAX_TITLE_BYTES} bytes long`,
  );

  const year = movie.year ?? 0;
  check(year !== 0, "year", "must be provided");
  check(year >= EARLIEST_YEAR, "year", `must be greater than ${EARLIEST_YEAR}`);
  check(year <= currentYear, "year", "must not be in the future");

  const runtime = movie.runtime ?? 0;
  check(runtime !== 0, "runtime", "must be provided");
  check(runtime > 0, "runtime", "must be a positive integer");

  const genres = movie.genres;
  check(genres !== undefined, "genres", "must be provided");
  if (genres) {
    check(genres.length >= 1, "genres", "must contain at least 1 genre");
    check(
      genres.length <= MAX_GENRES,
      "genres",
      `must not contain more than ${MAX_GENRES} genres`,
    );
    check(
      new Set(genres).size === genres.length,
      "genres",
      "must not contain duplicate values",
    );
  }

  return errors;
}

/**
 * Validate draft fields and, when they pass, return the complete draft.
 */
export function checkDraft(
  input: Partial<MovieDraft>,
  currentYear?: number,
):
  | { ok: true; draft: MovieDraft }
  | { ok: false; fields: FieldErrors } {
  const fields = validateMovie(input, currentYear);
  const { title, year, runtime, genres } = input;
  if (
    Object.keys(fields).length > 0 || title === undefined ||
    year === undefined || runtime === undefined || genres === undefined
  ) {
    return { ok: false, fields };
  }
  return { ok: true, draft: { title, year, runtime, genres } };
}
