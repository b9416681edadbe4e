import { expect, test } from "vitest";
import {
  fingerprintToken,
  generateToken,
  isWellFormedToken,
  TOKEN_PLAINTEXT_LENGTH,
} from "./tokens.ts";
import { TokenScope } from "./types.ts";

test("generateToken - 22 base64url characters with a matching fingerprint", () => {
  const token = generateToken(
    3,
    60_000,
    TokenScope.Authentication,
    new Date("2025-01-01T00:00:00Z"),
  );

  expect(token.plaintext).toHaveLength(TOKEN_PLAINTEXT_LENGTH);
  expect(token.plaintext).toMatch(/^[A-Za-z0-9_-]{22}$/);
  expect(token.fingerprint).toBe(fingerprintToken(token.plaintext));
  expect(token.userId).toBe(3);
  expect(token.scope).toBe("authentication");
  expect(token.expiry.toISOString()).toBe("2025-01-01T00:01:00.000Z");
});

test("generateToken - plaintexts differ between calls", () => {
  const a = generateToken(1, 1000, TokenScope.Activation);
  const b = generateToken(1, 1000, TokenScope.Activation);

  expect(a.plaintext).not.toBe(b.plaintext);
});

test("fingerprintToken - lowercase hex SHA-256", () => {
  expect(fingerprintToken("abc")).toBe(
    "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
  );
});

test("isWellFormedToken - accepts only 22 base64url characters", () => {
  expect(isWellFormedToken("abcdefghijklmnopqrstuv")).toBe(true);
  expect(isWellFormedToken("ABC-_fghijklmnopqrst09")).toBe(true);
  expect(isWellFormedToken("abcdefghijklmnopqrstu")).toBe(false);
  expect(isWellFormedToken("abcdefghijklmnopqrstuvw")).toBe(false);
  expect(isWellFormedToken("abcdefghijklmnopqrst+/")).toBe(false);
  expect(isWellFormedToken("")).toBe(false);
});
