/**
 * User account model: request shapes, validation and JSON form.
 *
 * @module marquee/auth/users
 */

import type { FieldErrors } from "../data/versioned.ts";
import { BadRequestError } from "../errors.ts";
import type { SchemaValidator } from "../validation/schema-validator.ts";
import { isWellFormedToken, TOKEN_PLAINTEXT_LENGTH } from "./tokens.ts";
import type { User } from "./types.ts";

export const REGISTRATION_SCHEMA = "user.registration";
export const ACTIVATION_SCHEMA = "user.activation";
export const LOGIN_SCHEMA = "user.login";

const stringProperty = { type: "string" } as const;

export const registrationSchema = {
  type: "object",
  properties: {
    name: stringProperty,
    email: stringProperty,
    password: stringProperty,
  },
  additionalProperties: false,
} as const;

export const activationSchema = {
  type: "object",
  properties: { token: stringProperty },
  additionalProperties: false,
} as const;

export const loginSchema = {
  type: "object",
  properties: { email: stringProperty, password: stringProperty },
  additionalProperties: false,
} as const;

/** Register the user request schemas on a validator */
export function addUserSchemas(validator: SchemaValidator): void {
  validator.addSchema(REGISTRATION_SCHEMA, registrationSchema);
  validator.addSchema(ACTIVATION_SCHEMA, activationSchema);
  validator.addSchema(LOGIN_SCHEMA, loginSchema);
}

/**
 * Check a body against a named schema.
 *
 * @throws BadRequestError when the body does not have the schema's shape
 */
export function decodeBody(
  validator: SchemaValidator,
  schema: string,
  body: unknown,
): object {
  const result = validator.validate(schema, body);
  if (!result.valid || typeof body !== "object" || body === null) {
    throw new BadRequestError(
      result.errors[0]?.message ?? "body must be a JSON object",
    );
  }
  return body;
}

/** A string member of a decoded body; absent reads as "" */
export function stringField(body: object, key: string): string {
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : "";
}

// ─── Validation ──────────────────────────────────────────

const EMAIL_PATTERN =
  /^[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

const MAX_NAME_BYTES = 500;
const MIN_PASSWORD_BYTES = 8;
const MAX_PASSWORD_BYTES = 72;

type Check = (ok: boolean, field: string, message: string) => void;

function collector(): { errors: FieldErrors; check: Check } {
  const errors: FieldErrors = {};
  return {
    errors,
    check: (ok, field, message) => {
      if (!ok && !(field in errors)) errors[field] = message;
    },
  };
}

function checkEmail(check: Check, email: string): void {
  check(email !== "", "email", "must be provided");
  check(EMAIL_PATTERN.test(email), "email", "must be a valid email address");
}

function checkPassword(check: Check, password: string): void {
  const bytes = Buffer.byteLength(password, "utf8");
  check(password !== "", "password", "must be provided");
  check(
    bytes >= MIN_PASSWORD_BYTES,
    "password",
    `must be at least ${MIN_PASSWORD_BYTES} bytes long`,
  );
  check(
    bytes <= MAX_PASSWORD_BYTES,
    "password",
    `must not be more than ${MAX_PASSWORD_BYTES} bytes long`,
  );
}

export function validateRegistration(input: {
  name: string;
  email: string;
  password: string;
}): FieldErrors {
  const { errors, check } = collector();
  check(input.name !== "", "name", "must be provided");
  check(
    Buffer.byteLength(input.name, "utf8") <= MAX_NAME_BYTES,
    "name",
    `must not be more than ${MAX_NAME_BYTES} bytes long`,
  );
  checkEmail(check, input.email);
  checkPassword(check, input.password);
  return errors;
}

export function validateLogin(input: {
  email: string;
  password: string;
}): FieldErrors {
  const { errors, check } = collector();
  checkEmail(check, input.email);
  checkPassword(check, input.password);
  return errors;
}

export function validateTokenPlaintext(token: string): FieldErrors {
  const { errors, check } = collector();
  check(token !== "", "token", "must be provided");
  check(
    isWellFormedToken(token),
    "token",
    `must be ${TOKEN_PLAINTEXT_LENGTH} characters long`,
  );
  return errors;
}

// ─── JSON representation ─────────────────────────────────

export interface UserJson {
  id: number;
  created_at: string;
  name: string;
  email: string;
  activated: boolean;
}

/** Wire form of a user. The version stays internal. */
export function toUserJson(user: User): UserJson {
  return {
    id: user.id,
    created_at: user.createdAt.toISOString(),
    name: user.name,
    email: user.email,
    activated: user.activated,
  };
}
