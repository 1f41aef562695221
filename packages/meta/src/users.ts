/**
 * Password hashing and privilege checks for metadata users.
 */

import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'node:crypto';
import type { Privilege } from '@strata/influxql';
import type { UserInfo } from './types.js';

const HASH_SCHEME = 'pbkdf2-sha256';
const HASH_ITERATIONS = 10_000;
const KEY_LENGTH = 32;

/**
 * Hash a password as `pbkdf2-sha256$<iterations>$<salt>$<key>`
 */
export function hashPassword(password: string, iterations = HASH_ITERATIONS): string {
  const salt = randomBytes(16);
  const key = pbkdf2Sync(password, salt, iterations, KEY_LENGTH, 'sha256');
  return [HASH_SCHEME, String(iterations), salt.toString('hex'), key.toString('hex')].join('$');
}

export function verifyPassword(password: string, encoded: string): boolean {
  const [scheme, iterationText, saltHex, keyHex] = encoded.split('$');
  const iterations = Number(iterationText);
  if (scheme !== HASH_SCHEME || !Number.isInteger(iterations) || !saltHex || !keyHex) {
    return false;
  }

  const expected = Buffer.from(keyHex, 'hex');
  const actual = pbkdf2Sync(password, Buffer.from(saltHex, 'hex'), iterations, expected.length, 'sha256');
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

/**
 * Whether the user holds `privilege` on `database`. Admins hold everything;
 * ALL satisfies READ and WRITE.
 */
export function userAuthorizes(user: UserInfo, privilege: Privilege, database: string): boolean {
  if (user.admin) return true;
  const granted = user.privileges.get(database);
  return granted !== undefined && (granted === privilege || granted === 'ALL');
}
