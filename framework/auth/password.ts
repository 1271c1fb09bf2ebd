/**
 * Password Hashing
 *
 * PBKDF2 with SHA-256 through the Web Crypto API. The stored form is
 * base64(salt || derived bits).
 */

import { webcrypto, timingSafeEqual } from 'node:crypto';

const ALGORITHM = 'PBKDF2';
const HASH_ALGORITHM = 'SHA-256';
const ITERATIONS = 100000;
const KEY_LENGTH = 256;
const SALT_LENGTH = 16;

async function deriveBits(password: string, salt: Uint8Array): Promise<Uint8Array> {
  const passwordKey = await webcrypto.subtle.importKey(
    'raw',
    new TextEncoder().encode(password),
    ALGORITHM,
    false,
    ['deriveBits']
  );

  const derivedBits = await webcrypto.subtle.deriveBits(
    {
      name: ALGORITHM,
      salt,
      iterations: ITERATIONS,
      hash: HASH_ALGORITHM,
    },
    passwordKey,
    KEY_LENGTH
  );

  return new Uint8Array(derivedBits);
}

/**
 * Hash a password
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = webcrypto.getRandomValues(new Uint8Array(SALT_LENGTH));
  const hash = await deriveBits(password, salt);
  return Buffer.concat([salt, hash]).toString('base64');
}

/**
 * Verify a password against a stored hash. A malformed hash never verifies.
 */
export async function verifyPassword(password: string, storedHash: string): Promise<boolean> {
  const combined = Buffer.from(storedHash, 'base64');
  if (combined.length !== SALT_LENGTH + KEY_LENGTH / 8) {
    return false;
  }

  const salt = combined.subarray(0, SALT_LENGTH);
  const expected = combined.subarray(SALT_LENGTH);
  const actual = await deriveBits(password, salt);

  return timingSafeEqual(actual, expected);
}
