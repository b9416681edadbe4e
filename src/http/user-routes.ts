/**
 * Account routes: registration, activation and authentication token
 * issuance. None of them sit behind a gate.
 *
 * Activation tokens go to an {@link ActivationDelivery}; mailing them is
 * outside this service.
 *
 * @module marquee/http/user-routes
 */

import type { Hono } from "hono";
import { hashPassword, verifyPassword } from "../auth/passwords.ts";
import { fingerprintToken } from "../auth/tokens.ts";
import {
  type CredentialStore,
  type Token,
  TokenScope,
  type User,
  type UserStore,
} from "../auth/types.ts";
import {
  ACTIVATION_SCHEMA,
  decodeBody,
  LOGIN_SCHEMA,
  REGISTRATION_SCHEMA,
  stringField,
  toUserJson,
  validateLogin,
  validateRegistration,
  validateTokenPlaintext,
} from "../auth/users.ts";
import { updateVersioned } from "../data/versioned.ts";
import {
  ConflictError,
  describeError,
  FailedValidationError,
  InvalidLoginError,
  StorageError,
} from "../errors.ts";
import type { Logger } from "../types.ts";
import type { SchemaValidator } from "../validation/schema-validator.ts";
import { readJson } from "./requests.ts";
import { jsonResponse } from "./responses.ts";
import type { AppEnv } from "./routes.ts";

const DAY = 24 * 60 * 60 * 1000;

export const ACTIVATION_TOKEN_TTL_MS = 3 * DAY;
export const AUTHENTICATION_TOKEN_TTL_MS = DAY;

/**
 * Hands a fresh activation token to whoever tells the user about it.
 * Not awaited by the request; a rejection is logged.
 */
export type ActivationDelivery = (user: User, token: Token) => Promise<void>;

export interface UserRouteOptions {
  users: UserStore;
  credentials: CredentialStore;
  /** Must have the user schemas registered */
  validator: SchemaValidator;
  deliverActivation: ActivationDelivery;
  log: Logger;
}

function failIfInvalid(fields: Record<string, string>): void {
  if (Object.keys(fields).length > 0) {
    throw new FailedValidationError(fields);
  }
}

/**
 * Mount the account routes on the router.
 */
export function registerUserRoutes(
  app: Hono<AppEnv>,
  options: UserRouteOptions,
): void {
  const { users, credentials, validator, log } = options;

  app.post("/v1/users", async (c) => {
    const body = decodeBody(validator, REGISTRATION_SCHEMA, await readJson(c));
    const input = {
      name: stringField(body, "name"),
      email: stringField(body, "email"),
      password: stringField(body, "password"),
    };
    failIfInvalid(validateRegistration(input));

    const outcome = await users.insert({
      name: input.name,
      email: input.email,
      passwordHash: await hashPassword(input.password),
    });
    if (outcome.kind === "duplicate_email") {
      throw new FailedValidationError({
        email: "a user with this email address already exists",
      });
    }

    const { user } = outcome;
    const token = await credentials.issue(
      user.id,
      ACTIVATION_TOKEN_TTL_MS,
      TokenScope.Activation,
    );
    void options.deliverActivation(user, token).catch((error: unknown) => {
      log(
        `[ERROR] activation delivery failed for user ${user.id}: ` +
          describeError(error),
      );
    });

    return jsonResponse({ user: toUserJson(user) }, 201);
  });

  app.post("/v1/users/activate", async (c) => {
    const body = decodeBody(validator, ACTIVATION_SCHEMA, await readJson(c));
    const plaintext = stringField(body, "token");
    failIfInvalid(validateTokenPlaintext(plaintext));

    const lookup = await credentials.getForToken(
      TokenScope.Activation,
      fingerprintToken(plaintext),
      new Date(),
    );
    if (lookup.kind === "failed") {
      throw new StorageError("activation token lookup failed", {
        cause: lookup.error,
      });
    }
    if (lookup.kind === "not_found") {
      throw new FailedValidationError({
        token: "invalid or expired activation token",
      });
    }

    const holder = lookup.value;
    const outcome = await updateVersioned(users, holder.id, {
      apply: (current) => ({ ...current, activated: true }),
      expectedVersion: holder.version,
    });
    switch (outcome.kind) {
      case "not_found":
        throw new FailedValidationError({
          token: "invalid or expired activation token",
        });
      case "conflict":
        throw new ConflictError();
      case "invalid":
        throw new FailedValidationError(outcome.fields);
      case "updated":
        await credentials.revokeAllForUser(TokenScope.Activation, holder.id);
        return jsonResponse({ user: toUserJson(outcome.value) });
    }
  });

  app.post("/v1/tokens/authentication", async (c) => {
    const body = decodeBody(validator, LOGIN_SCHEMA, await readJson(c));
    const input = {
      email: stringField(body, "email"),
      password: stringField(body, "password"),
    };
    failIfInvalid(validateLogin(input));

    const account = await users.getByEmail(input.email);
    if (
      !account || !(await verifyPassword(input.password, account.passwordHash))
    ) {
      throw new InvalidLoginError();
    }

    const token = await credentials.issue(
      account.user.id,
      AUTHENTICATION_TOKEN_TTL_MS,
      TokenScope.Authentication,
    );
    return jsonResponse(
      {
        authentication_token: {
          token: token.plaintext,
          expiry: token.expiry.toISOString(),
        },
      },
      201,
    );
  });
}
