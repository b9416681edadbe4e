import { expect, test } from "vitest";
import {
  ApiError,
  BadRequestError,
  ConflictError,
  describeError,
  FailedValidationError,
  NotFoundError,
  RateLimitError,
  ServerError,
  serverErrorResponse,
  StorageError,
} from "./errors.ts";

const GENERIC_MESSAGE =
  "the server encountered a problem and could not process your request";

test("ClientError - renders its own code and message", async () => {
  const res = new BadRequestError("body must not be empty").toResponse();

  expect(res.status).toBe(400);
  expect(res.headers.get("Content-Type")).toBe("application/json");
  expect(await res.json()).toEqual({
    error: { code: "bad_request", message: "body must not be empty" },
  });
});

test("NotFoundError and ConflictError - fixed messages", async () => {
  expect(await new NotFoundError().toResponse().json()).toEqual({
    error: {
      code: "not_found",
      message: "the requested resource could not be found",
    },
  });
  const conflict = new ConflictError().toResponse();
  expect(conflict.status).toBe(409);
  expect((await conflict.json()).error.code).toBe("edit_conflict");
});

test("FailedValidationError - carries the field map", async () => {
  const res = new FailedValidationError({ year: "must be provided" })
    .toResponse();

  expect(res.status).toBe(422);
  expect(await res.json()).toEqual({
    error: {
      code: "failed_validation",
      message: "the request failed validation",
      fields: { year: "must be provided" },
    },
  });
});

test("RateLimitError - Retry-After header", () => {
  const res = new RateLimitError(3).toResponse();

  expect(res.status).toBe(429);
  expect(res.headers.get("Retry-After")).toBe("3");
});

test("ServerError - never leaks its detail", async () => {
  const error = new StorageError("movies.get timed out after 3000 ms");
  const res = error.toResponse();

  expect(error).toBeInstanceOf(ServerError);
  expect(error).toBeInstanceOf(ApiError);
  expect(res.status).toBe(500);
  expect(await res.json()).toEqual({
    error: { code: "server_error", message: GENERIC_MESSAGE },
  });
});

test("serverErrorResponse - extra headers", async () => {
  const res = serverErrorResponse({ Connection: "close" });

  expect(res.status).toBe(500);
  expect(res.headers.get("Connection")).toBe("close");
  expect(await res.json()).toEqual({
    error: { code: "server_error", message: GENERIC_MESSAGE },
  });
});

test("describeError - follows the cause chain", () => {
  const root = new Error("ECONNRESET");
  root.stack = "Error: ECONNRESET";
  const wrapped = new StorageError("movies.list failed", { cause: root });
  wrapped.stack = "StorageError: movies.list failed";

  expect(describeError(wrapped)).toBe(
    "StorageError: movies.list failed\nCaused by: Error: ECONNRESET",
  );
});

test("describeError - non-Error values", () => {
  expect(describeError("plain")).toBe("plain");
  expect(describeError(42)).toBe("42");
});
