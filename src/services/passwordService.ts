/**
 * Password service.
 *
 * Provides password hashing using bcrypt with cost factor 12 and
 * verification against stored hashes.
 *
 * @module services/passwordService
 */

import bcrypt from 'bcrypt';

/**
 * Bcrypt cost factor (number of salt rounds).
 */
export const BCRYPT_COST_FACTOR = 12;

/**
 * A valid bcrypt hash of a random string, compared against when the
 * username does not exist so that the failure path costs the same.
 */
export const DUMMY_PASSWORD_HASH =
  '$2b$12$C6UzMDM.H6dfI/f/IKcEeO5Ga4XfgAQbhyn3DsWWs0e2D1E7nY0xm';

/**
 * Hash a plaintext password using bcrypt with cost factor 12.
 *
 * @example
 * ```typescript
 * const hash = await hashPassword('mySecurePass1');
 * // '$2b$12$...' (60-character bcrypt hash)
 * ```
 */
export async function hashPassword(plaintext: string): Promise<string> {
  const salt = await bcrypt.genSalt(BCRYPT_COST_FACTOR);
  return bcrypt.hash(plaintext, salt);
}

/**
 * Verify a plaintext password against a stored bcrypt hash.
 * bcrypt compares in constant time.
 */
export async function verifyPassword(plaintext: string, hash: string): Promise<boolean> {
  return bcrypt.compare(plaintext, hash);
}
