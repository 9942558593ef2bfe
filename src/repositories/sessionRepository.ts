/**
 * Session repository for database operations on the sessions table.
 *
 * A session is a refresh-token record. Only the SHA-256 hash of the token
 * is stored. Rows are never deleted; revocation sets `is_revoked`,
 * `revoked_at` and `revocation_reason`.
 *
 * Handles snake_case ↔ camelCase mapping between the PostgreSQL schema
 * and the TypeScript Session type.
 *
 * @module repositories/sessionRepository
 */

import { query, withTransaction, type QueryOptions } from '../utils/db.js';
import type { Session } from '../types/index.js';
import { firstRow, requireRow } from './rows.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by PostgreSQL for the sessions table. */
interface SessionRow {
  id: string;
  user_id: string;
  tenant_id: string;
  refresh_token_hash: string;
  created_at: Date;
  expires_at: Date;
  last_accessed_at: Date | null;
  is_revoked: boolean;
  revoked_at: Date | null;
  revocation_reason: string | null;
  ip_address: string | null;
  user_agent: string | null;
}

const SESSION_COLUMNS = `id, user_id, tenant_id, refresh_token_hash, created_at, expires_at, last_accessed_at,
       is_revoked, revoked_at, revocation_reason, ip_address, user_agent`;

/**
 * Map a database row (snake_case) to a Session domain object (camelCase).
 */
function mapRowToSession(row: SessionRow): Session {
  return {
    id: row.id,
    userId: row.user_id,
    tenantId: row.tenant_id,
    refreshTokenHash: row.refresh_token_hash,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    lastAccessedAt: row.last_accessed_at,
    isRevoked: row.is_revoked,
    revokedAt: row.revoked_at,
    revocationReason: row.revocation_reason,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
  };
}

/** Fields needed to insert a session. */
export interface NewSession {
  userId: string;
  tenantId: string;
  refreshTokenHash: string;
  expiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
  /** Set on rotation; a fresh login leaves it null. */
  lastAccessedAt?: Date | null;
}

async function insertSession(session: NewSession, options?: QueryOptions): Promise<Session> {
  const result = await query<SessionRow>(
    `INSERT INTO sessions (user_id, tenant_id, refresh_token_hash, expires_at, last_accessed_at, ip_address, user_agent)
     VALUES ($1, $2, $3, $4, $5, $6, $7)
     RETURNING ${SESSION_COLUMNS}`,
    [
      session.userId,
      session.tenantId,
      session.refreshTokenHash,
      session.expiresAt.toISOString(),
      session.lastAccessedAt ? session.lastAccessedAt.toISOString() : null,
      session.ipAddress,
      session.userAgent,
    ],
    options,
  );

  return mapRowToSession(requireRow(result, 'sessions'));
}

// ─── Repository Functions ────────────────────────────────────────────────────

/**
 * Insert a new session for a successful login.
 *
 * @returns The newly created Session record
 */
export async function createSession(session: NewSession, options?: QueryOptions): Promise<Session> {
  return insertSession(session, options);
}

/**
 * Find a session by the SHA-256 hash of its refresh token.
 *
 * Returns the row whatever its revocation or expiry state; callers decide
 * whether it is effectively active.
 */
export async function findByTokenHash(
  refreshTokenHash: string,
  options?: QueryOptions,
): Promise<Session | null> {
  const result = await query<SessionRow>(
    `SELECT ${SESSION_COLUMNS}
     FROM sessions
     WHERE refresh_token_hash = $1`,
    [refreshTokenHash],
    options,
  );

  const row = firstRow(result);
  return row ? mapRowToSession(row) : null;
}

/**
 * Find all effectively active sessions for a user.
 */
export async function findActiveByUserId(
  tenantId: string,
  userId: string,
  now: Date,
  options?: QueryOptions,
): Promise<Session[]> {
  const result = await query<SessionRow>(
    `SELECT ${SESSION_COLUMNS}
     FROM sessions
     WHERE tenant_id = $1
       AND user_id = $2
       AND is_revoked = FALSE
       AND expires_at > $3
     ORDER BY created_at DESC`,
    [tenantId, userId, now.toISOString()],
    options,
  );

  return result.rows.map(mapRowToSession);
}

/**
 * Rotate a session in one transaction: revoke the old row only if it is
 * still unrevoked and unexpired, then insert its replacement.
 *
 * Two concurrent rotations of the same session race on the conditional
 * UPDATE; exactly one sees a row.
 *
 * @returns The new Session, or null when the old one was already revoked or expired
 */
export async function rotateSession(
  oldSessionId: string,
  replacement: NewSession,
  now: Date,
  signal?: AbortSignal,
): Promise<Session | null> {
  return withTransaction(async (executor) => {
    const revoked = await query<{ id: string }>(
      `UPDATE sessions
       SET is_revoked = TRUE, revoked_at = $2, revocation_reason = 'rotated'
       WHERE id = $1
         AND is_revoked = FALSE
         AND expires_at > $2
       RETURNING id`,
      [oldSessionId, now.toISOString()],
      { executor, signal },
    );

    if (revoked.rows.length === 0) {
      return null;
    }

    return insertSession({ ...replacement, lastAccessedAt: now }, { executor, signal });
  }, signal);
}

/**
 * Revoke a single session if it is not already revoked.
 *
 * @returns true if this call revoked it
 */
export async function revokeSession(
  sessionId: string,
  reason: string,
  at: Date,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `UPDATE sessions
     SET is_revoked = TRUE, revoked_at = $3, revocation_reason = $2
     WHERE id = $1 AND is_revoked = FALSE`,
    [sessionId, reason, at.toISOString()],
    options,
  );

  return (result.rowCount ?? 0) > 0;
}

/**
 * Revoke every unrevoked session of a user.
 *
 * @returns Number of sessions revoked
 */
export async function revokeAllForUser(
  tenantId: string,
  userId: string,
  reason: string,
  at: Date,
  options?: QueryOptions,
): Promise<number> {
  const result = await query(
    `UPDATE sessions
     SET is_revoked = TRUE, revoked_at = $4, revocation_reason = $3
     WHERE tenant_id = $1 AND user_id = $2 AND is_revoked = FALSE`,
    [tenantId, userId, reason, at.toISOString()],
    options,
  );

  return result.rowCount ?? 0;
}
