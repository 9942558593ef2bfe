/**
 * Patient access repository for the patient_access table.
 *
 * The table is a ledger of grants: several may coexist for the same
 * (user, patient) pair and the decision engine picks the most privileged
 * one that is effectively active. Revocation only flips `is_enabled` and
 * writes modification and revocation metadata; rows are never deleted.
 *
 * @module repositories/patientAccessRepository
 */

import { query, withTransaction, type QueryOptions } from '../utils/db.js';
import {
  AccessLevel,
  parseAccessLevel,
  type PagedResult,
  type PatientAccess,
} from '../types/index.js';
import { createAuditEvent, type AuditQueryOptions, type NewAuditEvent } from './auditRepository.js';
import { firstRow, parseCount, requireEnum, requireRow } from './rows.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by PostgreSQL for the patient_access table. */
interface PatientAccessRow {
  id: string;
  user_id: string;
  patient_id: string;
  tenant_id: string;
  access_level: string;
  granted_by: string;
  reason: string | null;
  granted_at: Date;
  expires_at: Date | null;
  is_enabled: boolean;
  emergency_justification: string | null;
  modified_at: Date | null;
  modified_by: string | null;
  revoked_at: Date | null;
  revocation_reason: string | null;
}

const GRANT_COLUMNS = `id, user_id, patient_id, tenant_id, access_level, granted_by, reason, granted_at,
       expires_at, is_enabled, emergency_justification, modified_at, modified_by, revoked_at, revocation_reason`;

function mapRowToPatientAccess(row: PatientAccessRow): PatientAccess {
  return {
    id: row.id,
    userId: row.user_id,
    patientId: row.patient_id,
    tenantId: row.tenant_id,
    accessLevel: requireEnum(
      parseAccessLevel(row.access_level),
      'patient_access.access_level',
      row.access_level,
    ),
    grantedBy: row.granted_by,
    reason: row.reason,
    grantedAt: row.granted_at,
    expiresAt: row.expires_at,
    isEnabled: row.is_enabled,
    emergencyJustification: row.emergency_justification,
    modifiedAt: row.modified_at,
    modifiedBy: row.modified_by,
    revokedAt: row.revoked_at,
    revocationReason: row.revocation_reason,
  };
}

// ─── Types ───────────────────────────────────────────────────────────────────

/** Fields supplied when inserting a grant. */
export interface NewPatientAccess {
  userId: string;
  patientId: string;
  tenantId: string;
  accessLevel: AccessLevel;
  grantedBy: string;
  reason: string | null;
  grantedAt: Date;
  expiresAt: Date | null;
  emergencyJustification?: string | null;
}

export interface PatientAccessFilter {
  patientId?: string;
  userId?: string;
  accessLevel?: AccessLevel;
  /** true: effectively active only; false: disabled or expired only. */
  isActive?: boolean;
}

// ─── Repository Functions ────────────────────────────────────────────────────

export async function findGrantById(
  tenantId: string,
  grantId: string,
  options?: QueryOptions,
): Promise<PatientAccess | null> {
  const result = await query<PatientAccessRow>(
    `SELECT ${GRANT_COLUMNS}
     FROM patient_access
     WHERE tenant_id = $1 AND id = $2`,
    [tenantId, grantId],
    options,
  );

  const row = firstRow(result);
  return row ? mapRowToPatientAccess(row) : null;
}

/**
 * Find every effectively active grant a user holds on a patient,
 * emergency grants included.
 */
export async function findActiveGrants(
  tenantId: string,
  userId: string,
  patientId: string,
  now: Date,
  options?: QueryOptions,
): Promise<PatientAccess[]> {
  const result = await query<PatientAccessRow>(
    `SELECT ${GRANT_COLUMNS}
     FROM patient_access
     WHERE tenant_id = $1
       AND user_id = $2
       AND patient_id = $3
       AND is_enabled = TRUE
       AND (expires_at IS NULL OR expires_at > $4)
     ORDER BY granted_at DESC`,
    [tenantId, userId, patientId, now.toISOString()],
    options,
  );

  return result.rows.map(mapRowToPatientAccess);
}

export async function createGrant(
  grant: NewPatientAccess,
  options?: QueryOptions,
): Promise<PatientAccess> {
  const result = await query<PatientAccessRow>(
    `INSERT INTO patient_access (user_id, patient_id, tenant_id, access_level, granted_by, reason,
                                 granted_at, expires_at, is_enabled, emergency_justification)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, TRUE, $9)
     RETURNING ${GRANT_COLUMNS}`,
    [
      grant.userId,
      grant.patientId,
      grant.tenantId,
      grant.accessLevel,
      grant.grantedBy,
      grant.reason,
      grant.grantedAt.toISOString(),
      grant.expiresAt ? grant.expiresAt.toISOString() : null,
      grant.emergencyJustification ?? null,
    ],
    options,
  );

  return mapRowToPatientAccess(requireRow(result, 'patient_access'));
}

/**
 * Insert a grant and the audit event recording it in one transaction.
 * Neither row is visible unless both are written.
 */
export async function createGrantWithAudit(
  grant: NewPatientAccess,
  buildAuditEvent: (created: PatientAccess) => NewAuditEvent,
  options: Pick<AuditQueryOptions, 'encryptionKey' | 'signal'> = {},
): Promise<PatientAccess> {
  return withTransaction(async (executor) => {
    const created = await createGrant(grant, { executor, signal: options.signal });
    await createAuditEvent(buildAuditEvent(created), {
      executor,
      signal: options.signal,
      encryptionKey: options.encryptionKey,
    });
    return created;
  }, options.signal);
}

/**
 * Disable a grant. Writes only the enable flag, modification and
 * revocation metadata.
 *
 * @returns true if this call disabled it; false if it was already disabled
 */
export async function revokeGrant(
  tenantId: string,
  grantId: string,
  revokedBy: string,
  reason: string | null,
  at: Date,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `UPDATE patient_access
     SET is_enabled = FALSE, modified_at = $3, modified_by = $4, revoked_at = $3, revocation_reason = $5
     WHERE tenant_id = $1 AND id = $2 AND is_enabled = TRUE`,
    [tenantId, grantId, at.toISOString(), revokedBy, reason],
    options,
  );

  return (result.rowCount ?? 0) > 0;
}

/**
 * Move the expiry of an enabled grant.
 *
 * @returns true if the grant was enabled and updated
 */
export async function extendGrant(
  tenantId: string,
  grantId: string,
  modifiedBy: string,
  expiresAt: Date,
  at: Date,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `UPDATE patient_access
     SET expires_at = $3, modified_at = $4, modified_by = $5
     WHERE tenant_id = $1 AND id = $2 AND is_enabled = TRUE`,
    [tenantId, grantId, expiresAt.toISOString(), at.toISOString(), modifiedBy],
    options,
  );

  return (result.rowCount ?? 0) > 0;
}

/**
 * List grants in a tenant, newest first, one page at a time.
 */
export async function listGrants(
  tenantId: string,
  filter: PatientAccessFilter,
  page: { page: number; pageSize: number },
  now: Date,
  options?: QueryOptions,
): Promise<PagedResult<PatientAccess>> {
  const conditions: string[] = ['tenant_id = $1'];
  const params: unknown[] = [tenantId];
  let paramIndex = 2;

  if (filter.patientId !== undefined) {
    conditions.push(`patient_id = $${paramIndex}`);
    params.push(filter.patientId);
    paramIndex += 1;
  }

  if (filter.userId !== undefined) {
    conditions.push(`user_id = $${paramIndex}`);
    params.push(filter.userId);
    paramIndex += 1;
  }

  if (filter.accessLevel !== undefined) {
    conditions.push(`access_level = $${paramIndex}`);
    params.push(filter.accessLevel);
    paramIndex += 1;
  }

  if (filter.isActive !== undefined) {
    conditions.push(
      filter.isActive
        ? `(is_enabled = TRUE AND (expires_at IS NULL OR expires_at > $${paramIndex}))`
        : `(is_enabled = FALSE OR expires_at <= $${paramIndex})`,
    );
    params.push(now.toISOString());
    paramIndex += 1;
  }

  const whereClause = conditions.join(' AND ');

  const countResult = await query<{ total: string }>(
    `SELECT COUNT(*) AS total FROM patient_access WHERE ${whereClause}`,
    params,
    options,
  );

  const offset = (page.page - 1) * page.pageSize;
  const result = await query<PatientAccessRow>(
    `SELECT ${GRANT_COLUMNS}
     FROM patient_access
     WHERE ${whereClause}
     ORDER BY granted_at DESC
     LIMIT $${paramIndex} OFFSET $${paramIndex + 1}`,
    [...params, page.pageSize, offset],
    options,
  );

  return {
    items: result.rows.map(mapRowToPatientAccess),
    total: parseCount(countResult.rows[0]?.total),
    page: page.page,
    pageSize: page.pageSize,
  };
}

/**
 * Distinct patient ids on which the user holds an effectively active grant.
 */
export async function findAccessiblePatientIds(
  tenantId: string,
  userId: string,
  now: Date,
  options?: QueryOptions,
): Promise<string[]> {
  const result = await query<{ patient_id: string }>(
    `SELECT DISTINCT patient_id
     FROM patient_access
     WHERE tenant_id = $1
       AND user_id = $2
       AND is_enabled = TRUE
       AND (expires_at IS NULL OR expires_at > $3)
     ORDER BY patient_id`,
    [tenantId, userId, now.toISOString()],
    options,
  );

  return result.rows.map((row) => row.patient_id);
}
