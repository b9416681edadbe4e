/**
 * Password hashing with scrypt.
 *
 * Stored form: `scrypt$<salt hex>$<key hex>`, with a fresh random salt per
 * hash. Plaintexts never leave this module.
 *
 * @module marquee/auth/passwords
 */

import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";

const SALT_BYTES = 16;
const KEY_BYTES = 32;
const PREFIX = "scrypt";

function deriveKey(plaintext: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(plaintext, salt, KEY_BYTES, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

/**
 * Hash a password for storage.
 */
export async function hashPassword(plaintext: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const key = await deriveKey(plaintext, salt);
  return `${PREFIX}$${salt.toString("hex")}$${key.toString("hex")}`;
}

/**
 * Check a password against a stored hash in constant time.
 *
 * @returns false for a mismatch and for a hash not in the stored form
 */
export async function verifyPassword(
  plaintext: string,
  stored: string,
): Promise<boolean> {
  const [prefix, saltHex, keyHex] = stored.split("$");
  if (prefix !== PREFIX || !saltHex || !keyHex) return false;

  const expected = Buffer.from(keyHex, "hex");
  if (expected.length !== KEY_BYTES) return false;

  const actual = await deriveKey(plaintext, Buffer.from(saltHex, "hex"));
  return timingSafeEqual(actual, expected);
}
