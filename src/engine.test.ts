/**
 * Tests for the engine composition root.
 *
 * pg is replaced with an in-process Pool stub; the tests check wiring and
 * that store outages surface as errors rather than denials.
 *
 * @module engine.test
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const pool = vi.hoisted(() => ({
  connect: vi.fn(),
  query: vi.fn(),
  end: vi.fn(),
}));

vi.mock('pg', () => ({
  default: {
    Pool: class {
      connect = pool.connect;
      query = pool.query;
      end = pool.end;
    },
  },
}));

const { createEngine } = await import('./engine.js');
const { loadConfig } = await import('./config/index.js');
const { silentLogger } = await import('./logging/logger.js');
const { AccessLevel, UserRole } = await import('./types/index.js');
const { ENGINE_ERROR_CODES } = await import('./utils/errors.js');

const CONFIG = loadConfig({ JWT_SECRET: 'test-secret-test-secret-test-secret-00' });
const NOW = new Date('2025-03-01T09:00:00.000Z');

beforeEach(() => {
  vi.clearAllMocks();
  pool.end.mockResolvedValue(undefined);
});

describe('createEngine', () => {
  it('should share one codec between the services and the app', () => {
    const engine = createEngine(CONFIG, { logger: silentLogger, now: () => NOW });

    expect(engine.app.codec).toBe(engine.codec);
    expect(engine.auth.codec).toBe(engine.codec);
    expect(engine.app.access).toEqual({ grants: engine.grants, emergency: engine.emergency });
    expect(engine.app.now?.()).toEqual(NOW);
  });

  it('should issue tokens its own codec verifies', () => {
    const engine = createEngine(CONFIG, { logger: silentLogger, now: () => NOW });

    const { token, expiresAt } = engine.codec.issue({
      userId: 'user-1',
      username: 'alice',
      role: UserRole.HEALTHCARE_PROVIDER,
      tenantId: 'tenant-1',
      scopes: [],
      practitionerId: null,
    });

    expect(expiresAt).toEqual(new Date('2025-03-01T09:15:00.000Z'));
    expect(engine.codec.verify(token)?.userId).toBe('user-1');
  });

  it('should allow administrators without touching the database', async () => {
    const engine = createEngine(CONFIG, { logger: silentLogger });

    const decision = await engine.decisions.decide(
      { userId: 'admin-1', tenantId: 'tenant-1', role: UserRole.SYSTEM_ADMINISTRATOR },
      'patient-1',
      AccessLevel.WRITE,
    );

    expect(decision).toEqual({ allowed: true, level: AccessLevel.ADMIN });
    expect(pool.query).not.toHaveBeenCalled();
  });

  it('should surface an unreachable database instead of denying', async () => {
    pool.query.mockRejectedValue(
      Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }),
    );
    const engine = createEngine(CONFIG, { logger: silentLogger });

    await expect(
      engine.decisions.decide(
        { userId: 'user-1', tenantId: 'tenant-1', role: UserRole.NURSE },
        'patient-1',
        AccessLevel.READ,
      ),
    ).rejects.toMatchObject({ code: ENGINE_ERROR_CODES.STORE_UNAVAILABLE });
  });

  it('should end the pool on close', async () => {
    const engine = createEngine(CONFIG, { logger: silentLogger });

    await engine.close();

    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});
