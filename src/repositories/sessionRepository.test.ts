/**
 * Unit tests for the SessionRepository module.
 *
 * All database calls are mocked via vi.mock so these tests run
 * without a live PostgreSQL connection. Tests verify:
 * - Only the refresh token hash is written
 * - Conditional revocation statements
 * - Rotation revokes and inserts on the same transaction executor
 *
 * @module repositories/sessionRepository.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QueryResult } from 'pg';

// ─── Mock the db module ──────────────────────────────────────────────────────

const mockQuery = vi.fn();
const transactionExecutor = { query: vi.fn() };

vi.mock('../utils/db.js', () => ({
  query: (...args: unknown[]) => mockQuery(...args),
  withTransaction: (work: (executor: unknown) => Promise<unknown>) => work(transactionExecutor),
}));

// Import after mock is set up
const {
  createSession,
  findActiveByUserId,
  findByTokenHash,
  revokeAllForUser,
  revokeSession,
  rotateSession,
} = await import('./sessionRepository.js');

// ─── Helpers ─────────────────────────────────────────────────────────────────

const NOW = new Date('2025-03-01T09:00:00.000Z');
const EXPIRES = new Date('2025-03-08T09:00:00.000Z');

function fakeSessionRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'session-1',
    user_id: 'user-1',
    tenant_id: 'tenant-1',
    refresh_token_hash: 'f'.repeat(64),
    created_at: NOW,
    expires_at: EXPIRES,
    last_accessed_at: null,
    is_revoked: false,
    revoked_at: null,
    revocation_reason: null,
    ip_address: '10.0.0.1',
    user_agent: 'vitest',
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

const NEW_SESSION = {
  userId: 'user-1',
  tenantId: 'tenant-1',
  refreshTokenHash: 'f'.repeat(64),
  expiresAt: EXPIRES,
  ipAddress: '10.0.0.1',
  userAgent: 'vitest',
};

// ─── Tests ───────────────────────────────────────────────────────────────────

beforeEach(() => {
  mockQuery.mockReset();
});

describe('sessionRepository', () => {
  describe('createSession', () => {
    it('should insert the hash and map the returned row', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeSessionRow()]));

      const session = await createSession(NEW_SESSION);

      const { sql, params } = callAt(0);
      expect(sql).toContain('INSERT INTO sessions');
      expect(params).toEqual([
        'user-1',
        'tenant-1',
        'f'.repeat(64),
        '2025-03-08T09:00:00.000Z',
        null,
        '10.0.0.1',
        'vitest',
      ]);
      expect(session).toEqual({
        id: 'session-1',
        userId: 'user-1',
        tenantId: 'tenant-1',
        refreshTokenHash: 'f'.repeat(64),
        createdAt: NOW,
        expiresAt: EXPIRES,
        lastAccessedAt: null,
        isRevoked: false,
        revokedAt: null,
        revocationReason: null,
        ipAddress: '10.0.0.1',
        userAgent: 'vitest',
      });
    });

    it('should fail when the insert returns no row', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));

      await expect(createSession(NEW_SESSION)).rejects.toThrow('No row returned from sessions.');
    });
  });

  describe('findByTokenHash', () => {
    it('should return revoked rows too', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeSessionRow({ is_revoked: true })]));

      const session = await findByTokenHash('f'.repeat(64));

      expect(session?.isRevoked).toBe(true);
      expect(callAt(0).sql).not.toContain('is_revoked = FALSE');
    });

    it('should return null for an unknown hash', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));

      expect(await findByTokenHash('0'.repeat(64))).toBeNull();
    });
  });

  describe('findActiveByUserId', () => {
    it('should filter out revoked and expired sessions in SQL', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([fakeSessionRow()]));

      const sessions = await findActiveByUserId('tenant-1', 'user-1', NOW);

      const { sql, params } = callAt(0);
      expect(sessions).toHaveLength(1);
      expect(sql).toContain('is_revoked = FALSE');
      expect(sql).toContain('expires_at > $3');
      expect(params).toEqual(['tenant-1', 'user-1', '2025-03-01T09:00:00.000Z']);
    });
  });

  describe('rotateSession', () => {
    it('should revoke the old row and insert the replacement in one transaction', async () => {
      mockQuery
        .mockResolvedValueOnce(pgResult([{ id: 'session-1' }]))
        .mockResolvedValueOnce(
          pgResult([fakeSessionRow({ id: 'session-2', last_accessed_at: NOW })]),
        );

      const rotated = await rotateSession('session-1', NEW_SESSION, NOW);

      const revoke = callAt(0);
      const insert = callAt(1);
      expect(rotated?.id).toBe('session-2');
      expect(revoke.sql).toContain("revocation_reason = 'rotated'");
      expect(revoke.sql).toContain('AND is_revoked = FALSE');
      expect(revoke.params).toEqual(['session-1', '2025-03-01T09:00:00.000Z']);
      expect(revoke.options).toEqual({ executor: transactionExecutor, signal: undefined });
      expect(insert.params[4]).toBe('2025-03-01T09:00:00.000Z');
      expect(insert.options).toEqual({ executor: transactionExecutor, signal: undefined });
    });

    it('should return null without inserting when the old row was already revoked', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));

      expect(await rotateSession('session-1', NEW_SESSION, NOW)).toBeNull();
      expect(mockQuery).toHaveBeenCalledTimes(1);
    });
  });

  describe('revokeSession', () => {
    it('should revoke once and report later calls as no-ops', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([], 1)).mockResolvedValueOnce(pgResult([], 0));

      expect(await revokeSession('session-1', 'logout', NOW)).toBe(true);
      expect(await revokeSession('session-1', 'logout', NOW)).toBe(false);
      expect(callAt(0).params).toEqual(['session-1', 'logout', '2025-03-01T09:00:00.000Z']);
    });
  });

  describe('revokeAllForUser', () => {
    it('should return the number of sessions revoked', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([], 3));

      expect(await revokeAllForUser('tenant-1', 'user-1', 'logout_all', NOW)).toBe(3);
      expect(callAt(0).params).toEqual([
        'tenant-1',
        'user-1',
        'logout_all',
        '2025-03-01T09:00:00.000Z',
      ]);
    });
  });
});
