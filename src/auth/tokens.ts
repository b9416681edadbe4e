/**
 * Opaque bearer tokens.
 *
 * Plaintexts are 16 random bytes in unpadded base64url (22 characters).
 * Only the SHA-256 fingerprint is ever stored or used for lookup.
 *
 * @module marquee/auth/tokens
 */

import { createHash, randomBytes } from "node:crypto";
import type { Token, TokenScope } from "./types.ts";

const TOKEN_BYTES = 16;

/** Length of a token plaintext in characters */
export const TOKEN_PLAINTEXT_LENGTH = 22;

const PLAINTEXT_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * One-way fingerprint of a token plaintext (lowercase hex SHA-256).
 */
export function fingerprintToken(plaintext: string): string {
  return createHash("sha256").update(plaintext, "utf8").digest("hex");
}

/**
 * Check the plaintext shape before spending a store lookup on it.
 */
export function isWellFormedToken(plaintext: string): boolean {
  return plaintext.length === TOKEN_PLAINTEXT_LENGTH &&
    PLAINTEXT_PATTERN.test(plaintext);
}

/**
 * Generate a new token for a user.
 *
 * @param ttlMs - Lifetime from `now`
 * @param now - Issue instant (default: current time)
 */
export function generateToken(
  userId: number,
  ttlMs: number,
  scope: TokenScope,
  now: Date = new Date(),
): Token {
  const plaintext = randomBytes(TOKEN_BYTES).toString("base64url");
  return {
    plaintext,
    fingerprint: fingerprintToken(plaintext),
    userId,
    scope,
    expiry: new Date(now.getTime() + ttlMs),
  };
}
