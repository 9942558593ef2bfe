/**
 * Unit tests for the PatientAccessRepository module.
 *
 * All database calls are mocked via vi.mock so these tests run
 * without a live PostgreSQL connection. Tests verify:
 * - Active-grant filtering is done in SQL
 * - Revocation and extension only touch enabled rows
 * - A grant and its audit row share one transaction executor
 * - Filter and paging parameters are numbered in order
 *
 * @module repositories/patientAccessRepository.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QueryResult } from 'pg';
import { AccessLevel, AuditEventType } from '../types/index.js';

// ─── Mock the db module ──────────────────────────────────────────────────────

const mockQuery = vi.fn();
const transactionExecutor = { query: vi.fn() };

vi.mock('../utils/db.js', () => ({
  query: (...args: unknown[]) => mockQuery(...args),
  withTransaction: (work: (executor: unknown) => Promise<unknown>) => work(transactionExecutor),
}));

// Import after mock is set up
const {
  createGrant,
  createGrantWithAudit,
  extendGrant,
  findAccessiblePatientIds,
  findActiveGrants,
  findGrantById,
  listGrants,
  revokeGrant,
} = await import('./patientAccessRepository.js');

// ─── Helpers ─────────────────────────────────────────────────────────────────

const NOW = new Date('2025-03-01T09:00:00.000Z');
const NOW_ISO = '2025-03-01T09:00:00.000Z';

function fakeGrantRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'grant-1',
    user_id: 'user-1',
    patient_id: 'patient-1',
    tenant_id: 'tenant-1',
    access_level: 'Write',
    granted_by: 'admin-1',
    reason: 'Referral',
    granted_at: NOW,
    expires_at: null,
    is_enabled: true,
    emergency_justification: null,
    modified_at: null,
    modified_by: null,
    revoked_at: null,
    revocation_reason: null,
    ...overrides,
  };
}

function fakeAuditRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'audit-1',
    tenant_id: 'tenant-1',
    event_type: 'AccessGranted',
    actor_id: 'admin-1',
    patient_id: 'patient-1',
    resource_type: 'patient_access',
    resource_id: 'grant-1',
    outcome: 'success',
    reason: null,
    ip_address: '10.0.0.1',
    user_agent: 'vitest',
    request_id: 'req-1',
    metadata: '{}',
    created_at: NOW,
    ...overrides,
  };
}

function pgResult(rows: Record<string, unknown>[], rowCount = rows.length): QueryResult {
  return { rows, rowCount, command: '', oid: 0, fields: [] };
}

function callAt(index: number): { sql: string; params: unknown[]; options: unknown } {
  const [sql, params, options] = mockQuery.mock.calls[index] ?? [];
  return { sql: String(sql), params: Array.isArray(params) ? params : [], options };
}

const NEW_GRANT = {
  userId: 'user-1',
  patientId: 'patient-1',
  tenantId: 'tenant-1',
  accessLevel: AccessLevel.WRITE,
  grantedBy: 'admin-1',
  reason: 'Referral',
  grantedAt: NOW,
  expiresAt: null,
};

// ─── Tests ───────────────────────────────────────────────────────────────────

beforeEach(() => {
  mockQuery.mockReset();
});

describe('patientAccessRepository', () => {
  describe('findGrantById', () => {
    it('should map the row to a PatientAccess', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeGrantRow()]));

      const grant = await findGrantById('tenant-1', 'grant-1');

      expect(grant).toEqual({
        id: 'grant-1',
        userId: 'user-1',
        patientId: 'patient-1',
        tenantId: 'tenant-1',
        accessLevel: AccessLevel.WRITE,
        grantedBy: 'admin-1',
        reason: 'Referral',
        grantedAt: NOW,
        expiresAt: null,
        isEnabled: true,
        emergencyJustification: null,
        modifiedAt: null,
        modifiedBy: null,
        revokedAt: null,
        revocationReason: null,
      });
    });

    it('should refuse an unknown stored access level', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeGrantRow({ access_level: 'Owner' })]));

      await expect(findGrantById('tenant-1', 'grant-1')).rejects.toMatchObject({
        details: { column: 'patient_access.access_level', value: 'Owner' },
      });
    });
  });

  describe('findActiveGrants', () => {
    it('should filter disabled and expired grants in SQL', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeGrantRow()]));

      await findActiveGrants('tenant-1', 'user-1', 'patient-1', NOW);

      const { sql, params } = callAt(0);
      expect(sql).toContain('is_enabled = TRUE');
      expect(sql).toContain('(expires_at IS NULL OR expires_at > $4)');
      expect(params).toEqual(['tenant-1', 'user-1', 'patient-1', NOW_ISO]);
    });
  });

  describe('createGrant', () => {
    it('should insert an enabled grant', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeGrantRow()]));

      await createGrant({ ...NEW_GRANT, emergencyJustification: 'Cardiac arrest' });

      const { sql, params } = callAt(0);
      expect(sql).toContain('VALUES ($1, $2, $3, $4, $5, $6, $7, $8, TRUE, $9)');
      expect(params).toEqual([
        'user-1',
        'patient-1',
        'tenant-1',
        'Write',
        'admin-1',
        'Referral',
        NOW_ISO,
        null,
        'Cardiac arrest',
      ]);
    });
  });

  describe('createGrantWithAudit', () => {
    it('should write the grant and its audit row on the same executor', async () => {
      mockQuery
        .mockResolvedValueOnce(pgResult([fakeGrantRow()]))
        .mockResolvedValueOnce(pgResult([fakeAuditRow()]));

      const created = await createGrantWithAudit(
        NEW_GRANT,
        (grant) => ({
          tenantId: grant.tenantId,
          eventType: AuditEventType.ACCESS_GRANTED,
          actorId: grant.grantedBy,
          patientId: grant.patientId,
          resourceType: 'patient_access',
          resourceId: grant.id,
          outcome: 'success',
          ipAddress: '10.0.0.1',
          userAgent: 'vitest',
          requestId: 'req-1',
        }),
        { encryptionKey: null },
      );

      const grantInsert = callAt(0);
      const auditInsert = callAt(1);
      expect(created.id).toBe('grant-1');
      expect(grantInsert.options).toEqual({ executor: transactionExecutor, signal: undefined });
      expect(auditInsert.sql).toContain('INSERT INTO audit_events');
      expect(auditInsert.params[6]).toBe('success');
      expect(auditInsert.params[5]).toBe('grant-1');
      expect(auditInsert.options).toEqual({ executor: transactionExecutor, signal: undefined });
    });

    it('should propagate an audit failure so the transaction rolls back', async () => {
      mockQuery
        .mockResolvedValueOnce(pgResult([fakeGrantRow()]))
        .mockRejectedValueOnce(new Error('audit insert failed'));

      await expect(
        createGrantWithAudit(NEW_GRANT, (grant) => ({
          tenantId: grant.tenantId,
          eventType: AuditEventType.ACCESS_GRANTED,
          actorId: grant.grantedBy,
          resourceType: 'patient_access',
          outcome: 'success',
          ipAddress: '10.0.0.1',
          userAgent: 'vitest',
          requestId: 'req-1',
        })),
      ).rejects.toThrow('audit insert failed');
    });
  });

  describe('revokeGrant / extendGrant', () => {
    it('should disable an enabled grant and keep the row', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([], 1));

      const revoked = await revokeGrant('tenant-1', 'grant-1', 'admin-1', 'Discharged', NOW);

      const { sql, params } = callAt(0);
      expect(revoked).toBe(true);
      expect(sql).toContain('SET is_enabled = FALSE');
      expect(sql).toContain('AND is_enabled = TRUE');
      expect(sql).not.toContain('DELETE');
      expect(params).toEqual(['tenant-1', 'grant-1', NOW_ISO, 'admin-1', 'Discharged']);
    });

    it('should report an already disabled grant', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([], 0));

      expect(await extendGrant('tenant-1', 'grant-1', 'admin-1', NOW, NOW)).toBe(false);
      expect(callAt(0).sql).toContain('SET expires_at = $3, modified_at = $4, modified_by = $5');
    });
  });

  describe('listGrants', () => {
    it('should number filter and paging parameters in order', async () => {
      mockQuery
        .mockResolvedValueOnce(pgResult([{ total: '42' }]))
        .mockResolvedValueOnce(pgResult([fakeGrantRow()]));

      const result = await listGrants(
        'tenant-1',
        { patientId: 'patient-1', accessLevel: AccessLevel.READ, isActive: true },
        { page: 3, pageSize: 10 },
        NOW,
      );

      const count = callAt(0);
      const select = callAt(1);
      expect(count.sql).toContain(
        'tenant_id = $1 AND patient_id = $2 AND access_level = $3 AND ' +
          '(is_enabled = TRUE AND (expires_at IS NULL OR expires_at > $4))',
      );
      expect(count.params).toEqual(['tenant-1', 'patient-1', 'Read', NOW_ISO]);
      expect(select.sql).toContain('LIMIT $5 OFFSET $6');
      expect(select.params).toEqual(['tenant-1', 'patient-1', 'Read', NOW_ISO, 10, 20]);
      expect(result).toMatchObject({ total: 42, page: 3, pageSize: 10 });
      expect(result.items).toHaveLength(1);
    });

    it('should select inactive grants when asked', async () => {
      mockQuery
        .mockResolvedValueOnce(pgResult([{ total: '0' }]))
        .mockResolvedValueOnce(pgResult([]));

      await listGrants('tenant-1', { isActive: false }, { page: 1, pageSize: 20 }, NOW);

      expect(callAt(0).sql).toContain('(is_enabled = FALSE OR expires_at <= $2)');
    });
  });

  describe('findAccessiblePatientIds', () => {
    it('should return distinct patient ids', async () => {
      mockQuery.mockResolvedValueOnce(
        pgResult([{ patient_id: 'patient-1' }, { patient_id: 'patient-2' }]),
      );

      expect(await findAccessiblePatientIds('tenant-1', 'user-1', NOW)).toEqual([
        'patient-1',
        'patient-2',
      ]);
      expect(callAt(0).sql).toContain('SELECT DISTINCT patient_id');
    });
  });
});
