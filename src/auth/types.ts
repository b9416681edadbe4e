/**
 * Authentication types.
 *
 * The principal attached to each request, the token model, and the two
 * store contracts the pipeline consumes: credential lookup and permission
 * lookup.
 *
 * @module marquee/auth/types
 */

import type { VersionedStore } from "../data/versioned.ts";

/**
 * A registered user as seen by the pipeline.
 * Frozen (Object.freeze) before being attached to a request.
 */
export interface User {
  id: number;
  createdAt: Date;
  name: string;
  email: string;
  activated: boolean;
  version: number;
}

/**
 * Identity attached to a request after authentication.
 */
export type Principal =
  | { readonly kind: "anonymous" }
  | { readonly kind: "user"; readonly user: Readonly<User> };

/** The single anonymous principal */
export const ANONYMOUS: Principal = Object.freeze({ kind: "anonymous" });

/**
 * Token scopes. A token only authenticates lookups for its own scope.
 */
export const TokenScope = {
  Authentication: "authentication",
  Activation: "activation",
} as const;

export type TokenScope = typeof TokenScope[keyof typeof TokenScope];

/**
 * An issued token. `plaintext` only exists in the value handed back by
 * issuance; stores keep the fingerprint.
 */
export interface Token {
  plaintext: string;
  fingerprint: string;
  userId: number;
  scope: TokenScope;
  expiry: Date;
}

/**
 * Outcome of a lookup that must tell "absent" apart from "broken".
 */
export type Lookup<T> =
  | { kind: "found"; value: T }
  | { kind: "not_found" }
  | { kind: "failed"; error: unknown };

/**
 * Token store consumed by the authenticate middleware.
 *
 * @example
 * ```typescript
 * class ApiKeyStore implements CredentialStore {
 *   async getForToken(scope, fingerprint, now) {
 *     const user = await db.findUserByKeyHash(scope, fingerprint, now);
 *     return user ? { kind: "found", value: user } : { kind: "not_found" };
 *   }
 *   ...
 * }
 * ```
 */
export interface CredentialStore {
  /**
   * Resolve the owner of a non-expired token.
   *
   * @param fingerprint - Hex SHA-256 of the token plaintext
   * @param now - Tokens whose expiry is at or before this instant are absent
   */
  getForToken(
    scope: TokenScope,
    fingerprint: string,
    now: Date,
  ): Promise<Lookup<User>>;

  /** Create and store a token, returning it with its plaintext */
  issue(userId: number, ttlMs: number, scope: TokenScope): Promise<Token>;

  /** Revoke every token of a scope held by a user */
  revokeAllForUser(scope: TokenScope, userId: number): Promise<void>;
}

/** Fields supplied at registration; the store assigns the rest */
export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
}

export type InsertUserOutcome =
  | { kind: "created"; user: User }
  | { kind: "duplicate_email" };

/**
 * User accounts. Emails are unique, compared case-insensitively.
 * `update` is the versioned compare-and-set write of name, email and
 * activation flag.
 */
export interface UserStore extends VersionedStore<User> {
  /** Insert as not activated with version 1 */
  insert(user: NewUser): Promise<InsertUserOutcome>;

  /** The account and its stored password hash, or null */
  getByEmail(email: string): Promise<{ user: User; passwordHash: string } | null>;
}

/**
 * Permission lookup. Rejects when the lookup itself fails.
 */
export interface PermissionStore {
  getAllForUser(userId: number): Promise<readonly string[]>;
}
