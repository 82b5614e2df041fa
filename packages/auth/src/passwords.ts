// @packroom/auth — Password hashing (scrypt, node:crypto)

import { scrypt, randomBytes, timingSafeEqual, type ScryptOptions } from 'node:crypto';
import { MalformedHashError, PasswordMismatchError } from './errors.js';

const ALGORITHM = 'scrypt';
const SALT_LENGTH = 16;
const KEY_LENGTH = 64;

/** Fixed work factor. Changing it only affects newly hashed passwords. */
const WORK_FACTOR: Required<Pick<ScryptOptions, 'N' | 'r' | 'p'>> = { N: 16384, r: 8, p: 1 };

const MIN_PASSWORD_LENGTH = 8;

function deriveKey(password: string, salt: Buffer, keyLength: number, params: ScryptOptions): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, params, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

/**
 * Hash a password. Encoded as `scrypt$N$r$p$<salt b64>$<key b64>`.
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const key = await deriveKey(password, salt, KEY_LENGTH, WORK_FACTOR);
  const { N, r, p } = WORK_FACTOR;
  return [ALGORITHM, N, r, p, salt.toString('base64'), key.toString('base64')].join('$');
}

interface ParsedHash {
  params: ScryptOptions;
  salt: Buffer;
  key: Buffer;
}

function parseHash(stored: string): ParsedHash {
  const parts = stored.split('$');
  if (parts.length !== 6 || parts[0] !== ALGORITHM) {
    throw new MalformedHashError();
  }
  const [, nRaw, rRaw, pRaw, saltB64, keyB64] = parts;
  const N = Number(nRaw);
  const r = Number(rRaw);
  const p = Number(pRaw);
  if (![N, r, p].every((v) => Number.isInteger(v) && v > 0)) {
    throw new MalformedHashError('Malformed password hash parameters');
  }
  const salt = Buffer.from(saltB64 ?? '', 'base64');
  const key = Buffer.from(keyB64 ?? '', 'base64');
  if (salt.length === 0 || key.length === 0) {
    throw new MalformedHashError();
  }
  return { params: { N, r, p }, salt, key };
}

/**
 * Verify a password against a stored hash.
 * Resolves on match, rejects with PasswordMismatchError on mismatch and
 * MalformedHashError when the stored value cannot be parsed.
 */
export async function verifyPassword(password: string, storedHash: string): Promise<void> {
  const { params, salt, key } = parseHash(storedHash);
  const derived = await deriveKey(password, salt, key.length, params);
  if (!timingSafeEqual(key, derived)) {
    throw new PasswordMismatchError();
  }
}

export function validatePasswordComplexity(password: string): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  if (password.length < MIN_PASSWORD_LENGTH) {
    errors.push(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }
  return { valid: errors.length === 0, errors };
}
