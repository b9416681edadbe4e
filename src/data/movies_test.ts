import { expect, test } from "vitest";
import { BadRequestError } from "../errors.ts";
import { SchemaValidator } from "../validation/schema-validator.ts";
import {
  checkDraft,
  decodeMovieInput,
  formatRuntime,
  MOVIE_INPUT_SCHEMA,
  movieInputSchema,
  parseRuntime,
  toMovieJson,
  validateMovie,
} from "./movies.ts";

function validator(): SchemaValidator {
  const v = new SchemaValidator();
  v.addSchema(MOVIE_INPUT_SCHEMA, movieInputSchema);
  return v;
}

const good = {
  title: "Casablanca",
  year: 1942,
  runtime: 102,
  genres: ["drama", "romance"],
};

// ─── Runtime codec ───────────────────────────────────────

test("formatRuntime - minutes with a mins suffix", () => {
  expect(formatRuntime(102)).toBe("102 mins");
});

test("parseRuntime - accepts only '<n> mins'", () => {
  expect(parseRuntime("102 mins")).toBe(102);
  expect(parseRuntime("-5 mins")).toBe(-5);
  expect(parseRuntime("102")).toBeNull();
  expect(parseRuntime("102 min")).toBeNull();
  expect(parseRuntime("102  mins")).toBeNull();
  expect(parseRuntime(" 102 mins")).toBeNull();
  expect(parseRuntime("99999999999999999999 mins")).toBeNull();
});

test("toMovieJson - encodes runtime and drops createdAt", () => {
  const json = toMovieJson({
    ...good,
    id: 4,
    createdAt: new Date("2024-01-01T00:00:00Z"),
    version: 2,
  });

  expect(json).toEqual({
    id: 4,
    title: "Casablanca",
    year: 1942,
    runtime: "102 mins",
    genres: ["drama", "romance"],
    version: 2,
  });
});

// ─── Body decoding ───────────────────────────────────────

test("decodeMovieInput - full body", () => {
  expect(
    decodeMovieInput(validator(), {
      title: "Casablanca",
      year: 1942,
      runtime: "102 mins",
      genres: ["drama", "romance"],
    }),
  ).toEqual(good);
});

test("decodeMovieInput - partial body keeps only the sent fields", () => {
  expect(decodeMovieInput(validator(), { year: 1943 })).toEqual({ year: 1943 });
});

test("decodeMovieInput - unknown field is a bad request", () => {
  expect(() => decodeMovieInput(validator(), { title: "x", rating: 5 }))
    .toThrow(new BadRequestError("Unknown property: rating"));
});

test("decodeMovieInput - wrong type is a bad request", () => {
  expect(() => decodeMovieInput(validator(), { year: "1942" })).toThrow(
    "Property /year must be integer",
  );
});

test("decodeMovieInput - runtime without the suffix is a bad request", () => {
  expect(() => decodeMovieInput(validator(), { runtime: "102" })).toThrow(
    "Property /runtime must match pattern: ^-?[0-9]+ mins$",
  );
});

test("decodeMovieInput - runtime too large to represent is a bad request", () => {
  expect(() =>
    decodeMovieInput(validator(), { runtime: "99999999999999999999 mins" })
  ).toThrow("invalid runtime format");
});

test("decodeMovieInput - non-object body is a bad request", () => {
  expect(() => decodeMovieInput(validator(), [1, 2])).toThrow(BadRequestError);
});

// ─── Validation ──────────────────────────────────────────

test("validateMovie - valid movie has no errors", () => {
  expect(validateMovie(good, 2025)).toEqual({});
});

test("validateMovie - empty input reports every field as missing", () => {
  expect(validateMovie({}, 2025)).toEqual({
    title: "must be provided",
    year: "must be provided",
    runtime: "must be provided",
    genres: "must be provided",
  });
});

test("validateMovie - keeps the first failure per field", () => {
  expect(
    validateMovie(
      { title: "x".repeat(501), year: 1500, runtime: -3, genres: [] },
      2025,
    ),
  ).toEqual({
    title: "must not be more than 500 bytes long",
    year: "must be greater than 1888",
    runtime: "must be a positive integer",
    genres: "must contain at least 1 genre",
  });
});

test("validateMovie - title limit counts bytes, not characters", () => {
  const title = "é".repeat(251);

  expect(validateMovie({ ...good, title }, 2025).title).toBe(
    "must not be more than 500 bytes long",
  );
  expect(validateMovie({ ...good, title: "é".repeat(250) }, 2025)).toEqual({});
});

test("validateMovie - year bounds", () => {
  expect(validateMovie({ ...good, year: 1888 }, 2025)).toEqual({});
  expect(validateMovie({ ...good, year: 2025 }, 2025)).toEqual({});
  expect(validateMovie({ ...good, year: 2026 }, 2025)).toEqual({
    year: "must not be in the future",
  });
});

test("validateMovie - genre count and duplicates", () => {
  expect(
    validateMovie({ ...good, genres: ["a", "b", "c", "d", "e", "f"] }, 2025),
  ).toEqual({ genres: "must not contain more than 5 genres" });
  expect(validateMovie({ ...good, genres: ["a", "a"] }, 2025)).toEqual({
    genres: "must not contain duplicate values",
  });
});

test("checkDraft - complete valid input becomes a draft", () => {
  expect(checkDraft(good, 2025)).toEqual({ ok: true, draft: good });
});

test("checkDraft - invalid input returns the field errors", () => {
  expect(checkDraft({ ...good, runtime: undefined }, 2025)).toEqual({
    ok: false,
    fields: { runtime: "must be provided" },
  });
});
