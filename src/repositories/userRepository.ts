/**
 * User repository for database operations on the users table.
 *
 * Every lookup is scoped to a tenant and hides soft-deleted rows.
 * Usernames are matched case-insensitively. The failed-login counter is
 * only ever changed by single conditional statements so that concurrent
 * failures cannot under-count.
 *
 * @module repositories/userRepository
 */

import { query, type QueryOptions } from '../utils/db.js';
import { parseUserRole, parseUserStatus, UserStatus, type User } from '../types/index.js';
import { firstRow, requireEnum } from './rows.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by PostgreSQL for the users table. */
interface UserRow {
  id: string;
  tenant_id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  role: string;
  status: string;
  failed_login_attempts: number;
  locked_until: Date | null;
  practitioner_id: string | null;
  last_login_at: Date | null;
  last_login_ip: string | null;
  is_deleted: boolean;
  deleted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = `id, tenant_id, username, email, first_name, last_name, password_hash, role, status,
       failed_login_attempts, locked_until, practitioner_id, last_login_at, last_login_ip,
       is_deleted, deleted_at, created_at, updated_at`;

/**
 * Map a database row (snake_case) to a User domain object (camelCase).
 */
function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    username: row.username,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    passwordHash: row.password_hash,
    role: requireEnum(parseUserRole(row.role), 'users.role', row.role),
    status: requireEnum(parseUserStatus(row.status), 'users.status', row.status),
    failedLoginAttempts: row.failed_login_attempts,
    lockedUntil: row.locked_until,
    practitionerId: row.practitioner_id,
    lastLoginAt: row.last_login_at,
    lastLoginIp: row.last_login_ip,
    isDeleted: row.is_deleted,
    deletedAt: row.deleted_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** Counter state after a failed login was recorded. */
export interface FailedLoginResult {
  failedLoginAttempts: number;
  status: UserStatus;
  lockedUntil: Date | null;
}

interface FailedLoginRow {
  failed_login_attempts: number;
  status: string;
  locked_until: Date | null;
}

// ─── Repository Functions ────────────────────────────────────────────────────

/**
 * Find a user by username (case-insensitive) within a tenant.
 *
 * @returns The matching User or null if absent or soft-deleted
 */
export async function findByUsername(
  tenantId: string,
  username: string,
  options?: QueryOptions,
): Promise<User | null> {
  const result = await query<UserRow>(
    `SELECT ${USER_COLUMNS}
     FROM users
     WHERE tenant_id = $1
       AND LOWER(username) = LOWER($2)
       AND is_deleted = FALSE`,
    [tenantId, username],
    options,
  );

  const row = firstRow(result);
  return row ? mapRowToUser(row) : null;
}

/**
 * Find a user by id within a tenant.
 *
 * @returns The matching User or null if absent or soft-deleted
 */
export async function findById(
  tenantId: string,
  id: string,
  options?: QueryOptions,
): Promise<User | null> {
  const result = await query<UserRow>(
    `SELECT ${USER_COLUMNS}
     FROM users
     WHERE tenant_id = $1
       AND id = $2
       AND is_deleted = FALSE`,
    [tenantId, id],
    options,
  );

  const row = firstRow(result);
  return row ? mapRowToUser(row) : null;
}

/**
 * Atomically increment the failed-login counter.
 *
 * When the incremented value reaches `threshold` the same statement sets
 * status to Locked and `locked_until` to `lockUntil`.
 *
 * @returns The counter state after the increment, or null if the user vanished
 */
export async function recordFailedLogin(
  tenantId: string,
  userId: string,
  threshold: number,
  lockUntil: Date,
  options?: QueryOptions,
): Promise<FailedLoginResult | null> {
  const result = await query<FailedLoginRow>(
    `UPDATE users
     SET failed_login_attempts = failed_login_attempts + 1,
         status = CASE WHEN failed_login_attempts + 1 >= $3 THEN '${UserStatus.LOCKED}' ELSE status END,
         locked_until = CASE WHEN failed_login_attempts + 1 >= $3 THEN $4 ELSE locked_until END,
         updated_at = NOW()
     WHERE tenant_id = $1 AND id = $2 AND is_deleted = FALSE
     RETURNING failed_login_attempts, status, locked_until`,
    [tenantId, userId, threshold, lockUntil.toISOString()],
    options,
  );

  const row = firstRow(result);
  if (!row) return null;
  return {
    failedLoginAttempts: row.failed_login_attempts,
    status: requireEnum(parseUserStatus(row.status), 'users.status', row.status),
    lockedUntil: row.locked_until,
  };
}

/**
 * Clear a lock whose `locked_until` has passed: status back to Active and
 * counter reset. Conditional, so a concurrent re-lock is not undone.
 *
 * @returns true if a lock was cleared
 */
export async function clearExpiredLock(
  tenantId: string,
  userId: string,
  now: Date,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `UPDATE users
     SET status = '${UserStatus.ACTIVE}', failed_login_attempts = 0, locked_until = NULL, updated_at = NOW()
     WHERE tenant_id = $1 AND id = $2
       AND status = '${UserStatus.LOCKED}'
       AND locked_until IS NOT NULL
       AND locked_until <= $3`,
    [tenantId, userId, now.toISOString()],
    options,
  );

  return (result.rowCount ?? 0) > 0;
}

/**
 * Reset the failure counter and record last-login metadata.
 *
 * Only touches an Active row, so a lock written by a concurrent failure
 * survives.
 *
 * @returns false if the user is missing or no longer Active
 */
export async function recordSuccessfulLogin(
  tenantId: string,
  userId: string,
  ipAddress: string,
  at: Date,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `UPDATE users
     SET failed_login_attempts = 0, locked_until = NULL, last_login_at = $3,
         last_login_ip = $4, updated_at = NOW()
     WHERE tenant_id = $1
       AND id = $2
       AND status = '${UserStatus.ACTIVE}'
       AND is_deleted = FALSE`,
    [tenantId, userId, at.toISOString(), ipAddress],
    options,
  );

  return (result.rowCount ?? 0) > 0;
}

/**
 * Lock an account until the given time, regardless of its counter.
 *
 * @returns true if the user exists and was locked
 */
export async function lockUser(
  tenantId: string,
  userId: string,
  lockedUntil: Date,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `UPDATE users
     SET status = '${UserStatus.LOCKED}', locked_until = $3, updated_at = NOW()
     WHERE tenant_id = $1 AND id = $2 AND is_deleted = FALSE`,
    [tenantId, userId, lockedUntil.toISOString()],
    options,
  );

  return (result.rowCount ?? 0) > 0;
}

/**
 * Unlock an account and reset its failure counter.
 *
 * @returns true if the user exists
 */
export async function unlockUser(
  tenantId: string,
  userId: string,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `UPDATE users
     SET status = '${UserStatus.ACTIVE}', failed_login_attempts = 0, locked_until = NULL, updated_at = NOW()
     WHERE tenant_id = $1 AND id = $2 AND is_deleted = FALSE`,
    [tenantId, userId],
    options,
  );

  return (result.rowCount ?? 0) > 0;
}

/**
 * Soft-delete a user. The row is kept; it disappears from every lookup.
 *
 * @returns true if a live user was deleted
 */
export async function softDeleteUser(
  tenantId: string,
  userId: string,
  at: Date,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `UPDATE users
     SET is_deleted = TRUE, deleted_at = $3, status = '${UserStatus.DELETED}', updated_at = NOW()
     WHERE tenant_id = $1 AND id = $2 AND is_deleted = FALSE`,
    [tenantId, userId, at.toISOString()],
    options,
  );

  return (result.rowCount ?? 0) > 0;
}
