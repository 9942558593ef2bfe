/**
 * User scope repository for the user_scopes table.
 *
 * Scopes are named permission strings independent of patient-level access.
 * Revocation is terminal; rows are never deleted.
 *
 * @module repositories/userScopeRepository
 */

import { query, type QueryOptions } from '../utils/db.js';
import type { UserScope } from '../types/index.js';
import { firstRow, requireRow } from './rows.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface UserScopeRow {
  id: string;
  user_id: string;
  tenant_id: string;
  scope: string;
  granted_by: string;
  granted_at: Date;
  expires_at: Date | null;
  is_revoked: boolean;
  revoked_at: Date | null;
}

const SCOPE_COLUMNS =
  'id, user_id, tenant_id, scope, granted_by, granted_at, expires_at, is_revoked, revoked_at';

function mapRowToUserScope(row: UserScopeRow): UserScope {
  return {
    id: row.id,
    userId: row.user_id,
    tenantId: row.tenant_id,
    scope: row.scope,
    grantedBy: row.granted_by,
    grantedAt: row.granted_at,
    expiresAt: row.expires_at,
    isRevoked: row.is_revoked,
    revokedAt: row.revoked_at,
  };
}

// ─── Repository Functions ────────────────────────────────────────────────────

/**
 * Find the effectively active scopes of a user.
 */
export async function findActiveScopes(
  tenantId: string,
  userId: string,
  now: Date,
  options?: QueryOptions,
): Promise<UserScope[]> {
  const result = await query<UserScopeRow>(
    `SELECT ${SCOPE_COLUMNS}
     FROM user_scopes
     WHERE tenant_id = $1
       AND user_id = $2
       AND is_revoked = FALSE
       AND (expires_at IS NULL OR expires_at > $3)
     ORDER BY scope`,
    [tenantId, userId, now.toISOString()],
    options,
  );

  return result.rows.map(mapRowToUserScope);
}

export async function findScopeById(
  tenantId: string,
  scopeId: string,
  options?: QueryOptions,
): Promise<UserScope | null> {
  const result = await query<UserScopeRow>(
    `SELECT ${SCOPE_COLUMNS}
     FROM user_scopes
     WHERE tenant_id = $1 AND id = $2`,
    [tenantId, scopeId],
    options,
  );

  const row = firstRow(result);
  return row ? mapRowToUserScope(row) : null;
}

export async function createScope(
  scope: {
    userId: string;
    tenantId: string;
    scope: string;
    grantedBy: string;
    expiresAt: Date | null;
  },
  options?: QueryOptions,
): Promise<UserScope> {
  const result = await query<UserScopeRow>(
    `INSERT INTO user_scopes (user_id, tenant_id, scope, granted_by, expires_at)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING ${SCOPE_COLUMNS}`,
    [
      scope.userId,
      scope.tenantId,
      scope.scope,
      scope.grantedBy,
      scope.expiresAt ? scope.expiresAt.toISOString() : null,
    ],
    options,
  );

  return mapRowToUserScope(requireRow(result, 'user_scopes'));
}

/**
 * Revoke a scope. Only `is_revoked` and `revoked_at` are written.
 *
 * @returns true if this call revoked it
 */
export async function revokeScope(
  tenantId: string,
  scopeId: string,
  at: Date,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `UPDATE user_scopes
     SET is_revoked = TRUE, revoked_at = $3
     WHERE tenant_id = $1 AND id = $2 AND is_revoked = FALSE`,
    [tenantId, scopeId, at.toISOString()],
    options,
  );

  return (result.rowCount ?? 0) > 0;
}
