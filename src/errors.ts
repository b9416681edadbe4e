/**
 * Error taxonomy for the request pipeline.
 *
 * Every failure that is allowed to reach a caller is an {@link ApiError}:
 * a {@link ClientError} keeps its message and code stable for the caller,
 * a {@link ServerError} always renders the same generic body and keeps the
 * underlying failure as `cause` for the logs.
 *
 * @module marquee/errors
 */

import { jsonResponse } from "./http/responses.ts";

const SERVER_ERROR_MESSAGE =
  "the server encountered a problem and could not process your request";

/**
 * Base class for errors that map onto an HTTP response.
 */
export abstract class ApiError extends Error {
  abstract readonly status: number;

  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ApiError";
  }

  /** Extra response headers for this error */
  protected responseHeaders(): Record<string, string> {
    return {};
  }

  /** Body `error` member */
  protected responseBody(): Record<string, unknown> {
    return { code: this.code, message: this.message };
  }

  toResponse(): Response {
    return jsonResponse(
      { error: this.responseBody() },
      this.status,
      this.responseHeaders(),
    );
  }
}

/**
 * A failure caused by the request itself. Never retried by the pipeline.
 */
export class ClientError extends ApiError {
  constructor(
    public readonly status: number,
    code: string,
    message: string,
  ) {
    super(code, message);
    this.name = "ClientError";
  }
}

export class BadRequestError extends ClientError {
  constructor(message: string) {
    super(400, "bad_request", message);
    this.name = "BadRequestError";
  }
}

export class NotFoundError extends ClientError {
  constructor() {
    super(404, "not_found", "the requested resource could not be found");
    this.name = "NotFoundError";
  }
}

/**
 * Domain validation failure. `fields` maps a field name to its first error.
 */
export class FailedValidationError extends ClientError {
  constructor(public readonly fields: Record<string, string>) {
    super(422, "failed_validation", "the request failed validation");
    this.name = "FailedValidationError";
  }

  protected override responseBody(): Record<string, unknown> {
    return { ...super.responseBody(), fields: this.fields };
  }
}

export class RateLimitError extends ClientError {
  constructor(public readonly retryAfterSeconds: number) {
    super(429, "rate_limited", "rate limit exceeded");
    this.name = "RateLimitError";
  }

  protected override responseHeaders(): Record<string, string> {
    return { "Retry-After": String(this.retryAfterSeconds) };
  }
}

/**
 * Optimistic concurrency loss. The caller has to re-read and retry.
 */
export class ConflictError extends ClientError {
  constructor() {
    super(
      409,
      "edit_conflict",
      "unable to update the record due to an edit conflict, please try again",
    );
    this.name = "ConflictError";
  }
}

/**
 * Email and password did not match an account.
 */
export class InvalidLoginError extends ClientError {
  constructor() {
    super(401, "invalid_login", "invalid authentication credentials");
    this.name = "InvalidLoginError";
  }
}

/**
 * A failure on our side. The response body never carries the detail.
 */
export class ServerError extends ApiError {
  readonly status = 500;

  constructor(detail: string, options?: { cause?: unknown }) {
    super("server_error", detail, options);
    this.name = "ServerError";
  }

  protected override responseBody(): Record<string, unknown> {
    return { code: this.code, message: SERVER_ERROR_MESSAGE };
  }
}

/**
 * A store operation failed or ran past its deadline.
 */
export class StorageError extends ServerError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(detail, options);
    this.name = "StorageError";
  }
}

/**
 * Generic 500 response, for layers that have no error object to render.
 */
export function serverErrorResponse(headers?: Record<string, string>): Response {
  return jsonResponse(
    { error: { code: "server_error", message: SERVER_ERROR_MESSAGE } },
    500,
    headers,
  );
}

/**
 * Render an unknown thrown value for a log line, stack included when present.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const stack = error.stack ?? `${error.name}: ${error.message}`;
    return error.cause === undefined
      ? stack
      : `${stack}\nCaused by: ${describeError(error.cause)}`;
  }
  return String(error);
}
