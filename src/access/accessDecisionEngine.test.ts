/**
 * Unit tests for the access decision engine.
 *
 * @module access/accessDecisionEngine.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  AccessLevel,
  AuditEventType,
  ConsentType,
  UserRole,
  type Actor,
  type RequestContext,
  type RequestedAccessLevel,
} from '../types/index.js';
import { DENY_REASONS, EngineError } from '../utils/errors.js';
import {
  compareGrantPrivilege,
  consentTypesCovering,
  mostPrivilegedGrant,
  rankOf,
} from './accessDecisionEngine.js';
import { createTestEngine, fakeConsent, fakeGrant, type TestEngine } from '../test/fakes.js';

const CONTEXT: RequestContext = { ipAddress: '10.0.0.7', userAgent: 'vitest', requestId: 'req-3' };

const PROVIDER: Actor = {
  userId: 'user-1',
  tenantId: 'tenant-1',
  role: UserRole.HEALTHCARE_PROVIDER,
};

let engine: TestEngine;

beforeEach(() => {
  engine = createTestEngine();
});

function decide(level: RequestedAccessLevel) {
  return engine.decisions.decide(PROVIDER, 'patient-1', level, CONTEXT);
}

describe('ranking', () => {
  it('should rank special-purpose levels with Read', () => {
    expect(rankOf(AccessLevel.RESEARCH)).toBe(rankOf(AccessLevel.READ));
    expect(rankOf(AccessLevel.ANALYTICS)).toBe(rankOf(AccessLevel.READ));
    expect(rankOf(AccessLevel.WRITE)).toBeGreaterThan(rankOf(AccessLevel.READ));
    expect(rankOf(AccessLevel.ADMIN)).toBeGreaterThan(rankOf(AccessLevel.WRITE));
  });

  it('should prefer a higher rank, then a general level, then the later expiry', () => {
    const read = fakeGrant({ id: 'read', accessLevel: AccessLevel.READ });
    const research = fakeGrant({ id: 'research', accessLevel: AccessLevel.RESEARCH });
    const write = fakeGrant({
      id: 'write',
      accessLevel: AccessLevel.WRITE,
      expiresAt: new Date('2025-03-02T00:00:00.000Z'),
    });
    const writeLonger = fakeGrant({
      id: 'write-longer',
      accessLevel: AccessLevel.WRITE,
      expiresAt: null,
    });

    expect(mostPrivilegedGrant([read, research, write])?.id).toBe('write');
    expect(mostPrivilegedGrant([research, read])?.id).toBe('read');
    expect(mostPrivilegedGrant([write, writeLonger])?.id).toBe('write-longer');
    expect(mostPrivilegedGrant([])).toBeNull();
  });

  it('should break a full tie by the newer grant', () => {
    const older = fakeGrant({ id: 'older', grantedAt: new Date('2025-01-01T00:00:00.000Z') });
    const newer = fakeGrant({ id: 'newer', grantedAt: new Date('2025-02-15T00:00:00.000Z') });

    expect(compareGrantPrivilege(newer, older)).toBeLessThan(0);
    expect(mostPrivilegedGrant([older, newer])?.id).toBe('newer');
  });
});

describe('consentTypesCovering', () => {
  it('should map routine clinical access to treatment consent', () => {
    expect(consentTypesCovering(UserRole.HEALTHCARE_PROVIDER, AccessLevel.WRITE)).toEqual([
      ConsentType.TREATMENT_CONSENT,
    ]);
  });

  it('should map research by level or role to research and sharing consent', () => {
    const expected = [ConsentType.RESEARCH_PARTICIPATION, ConsentType.DATA_SHARING];
    expect(consentTypesCovering(UserRole.NURSE, AccessLevel.RESEARCH)).toEqual(expected);
    expect(consentTypesCovering(UserRole.RESEARCHER, AccessLevel.READ)).toEqual(expected);
  });

  it('should map analytics by level or role to sharing and automated decisions', () => {
    const expected = [ConsentType.DATA_SHARING, ConsentType.AUTOMATED_DECISION_MAKING];
    expect(consentTypesCovering(UserRole.NURSE, AccessLevel.ANALYTICS)).toEqual(expected);
    expect(consentTypesCovering(UserRole.DATA_ANALYST, AccessLevel.READ)).toEqual(expected);
  });

  it('should map family members to family access consent', () => {
    expect(consentTypesCovering(UserRole.FAMILY_MEMBER, AccessLevel.READ)).toEqual([
      ConsentType.FAMILY_ACCESS,
    ]);
  });
});

describe('AccessDecisionEngine.decide', () => {
  it('should allow administrators at Admin without a grant or an audit row', async () => {
    const admin: Actor = { ...PROVIDER, userId: 'admin-1', role: UserRole.SYSTEM_ADMINISTRATOR };

    const decision = await engine.decisions.decide(admin, 'patient-1', AccessLevel.WRITE, CONTEXT);

    expect(decision).toEqual({ allowed: true, level: AccessLevel.ADMIN });
    expect(engine.auditStore.events).toEqual([]);
  });

  it('should deny with NO_GRANT and audit the denial', async () => {
    const decision = await decide(AccessLevel.READ);

    expect(decision).toEqual({ allowed: false, reason: DENY_REASONS.NO_GRANT });
    expect(engine.auditStore.events).toHaveLength(1);
    expect(engine.auditStore.events[0]).toMatchObject({
      eventType: AuditEventType.ACCESS_DENIED,
      actorId: 'user-1',
      patientId: 'patient-1',
      resourceType: 'patient_access',
      resourceId: null,
      outcome: 'failure',
      reason: DENY_REASONS.NO_GRANT,
      requestId: 'req-3',
      metadata: { requestedLevel: AccessLevel.READ, grantLevel: null },
    });
  });

  it('should allow at the grant level when the request is within it', async () => {
    engine.grantStore.add(fakeGrant({ accessLevel: AccessLevel.WRITE }));

    const decision = await decide(AccessLevel.READ);

    expect(decision).toEqual({ allowed: true, level: AccessLevel.WRITE });
    expect(engine.auditStore.events).toEqual([]);
  });

  it('should deny a request above the grant with INSUFFICIENT_LEVEL', async () => {
    engine.grantStore.add(fakeGrant({ accessLevel: AccessLevel.READ }));

    const decision = await decide(AccessLevel.WRITE);

    expect(decision).toEqual({ allowed: false, reason: DENY_REASONS.INSUFFICIENT_LEVEL });
    expect(engine.auditStore.events[0]).toMatchObject({
      resourceId: 'grant-1',
      metadata: { requestedLevel: AccessLevel.WRITE, grantLevel: AccessLevel.READ },
    });
  });

  it('should treat a Research grant as Read for ranking', async () => {
    engine.grantStore.add(fakeGrant({ accessLevel: AccessLevel.RESEARCH }));

    const read = await decide(AccessLevel.READ);
    const write = await decide(AccessLevel.WRITE);

    expect(read).toEqual({ allowed: true, level: AccessLevel.RESEARCH });
    expect(write).toEqual({ allowed: false, reason: DENY_REASONS.INSUFFICIENT_LEVEL });
  });

  it('should use the most privileged of overlapping grants', async () => {
    engine.grantStore.add(fakeGrant({ id: 'g-read', accessLevel: AccessLevel.READ }));
    engine.grantStore.add(fakeGrant({ id: 'g-admin', accessLevel: AccessLevel.ADMIN }));
    engine.grantStore.add(fakeGrant({ id: 'g-write', accessLevel: AccessLevel.WRITE }));

    const decision = await decide(AccessLevel.ADMIN);

    expect(decision).toEqual({ allowed: true, level: AccessLevel.ADMIN });
  });

  it('should ignore disabled and expired grants', async () => {
    engine.grantStore.add(
      fakeGrant({ id: 'off', accessLevel: AccessLevel.ADMIN, isEnabled: false }),
    );
    engine.grantStore.add(
      fakeGrant({
        id: 'old',
        accessLevel: AccessLevel.WRITE,
        expiresAt: new Date('2025-03-01T09:00:00.000Z'),
      }),
    );

    const decision = await decide(AccessLevel.READ);

    expect(decision).toEqual({ allowed: false, reason: DENY_REASONS.NO_GRANT });
  });

  it('should stop allowing once the grant expires', async () => {
    engine.grantStore.add(fakeGrant({ expiresAt: new Date('2025-03-01T10:00:00.000Z') }));

    const before = await decide(AccessLevel.READ);
    engine.clock.advance(60 * 60 * 1000);
    const after = await decide(AccessLevel.READ);

    expect(before.allowed).toBe(true);
    expect(after).toEqual({ allowed: false, reason: DENY_REASONS.NO_GRANT });
  });

  it('should not see grants held in another tenant', async () => {
    engine.grantStore.add(fakeGrant({ tenantId: 'tenant-2', accessLevel: AccessLevel.ADMIN }));

    const decision = await decide(AccessLevel.READ);

    expect(decision).toEqual({ allowed: false, reason: DENY_REASONS.NO_GRANT });
  });

  it('should deny with CONSENT_DENIED when the patient withheld treatment consent', async () => {
    engine.grantStore.add(fakeGrant({ accessLevel: AccessLevel.WRITE }));
    engine.consents.consents.push(fakeConsent({ consentType: ConsentType.TREATMENT_CONSENT }));

    const decision = await decide(AccessLevel.READ);

    expect(decision).toEqual({ allowed: false, reason: DENY_REASONS.CONSENT_DENIED });
    expect(engine.auditStore.events[0]?.reason).toBe(DENY_REASONS.CONSENT_DENIED);
  });

  it('should check consent for the requested scope as well as the grant purpose', async () => {
    engine.grantStore.add(fakeGrant({ id: 'research', accessLevel: AccessLevel.RESEARCH }));
    engine.consents.consents.push(fakeConsent({ consentType: ConsentType.TREATMENT_CONSENT }));

    const decision = await decide(AccessLevel.READ);

    expect(decision).toEqual({ allowed: false, reason: DENY_REASONS.CONSENT_DENIED });
  });

  it('should check the grant purpose when the request is a plain read', async () => {
    engine.grantStore.add(fakeGrant({ id: 'research', accessLevel: AccessLevel.RESEARCH }));
    engine.consents.consents.push(
      fakeConsent({ consentType: ConsentType.RESEARCH_PARTICIPATION }),
    );

    const decision = await decide(AccessLevel.READ);

    expect(decision).toEqual({ allowed: false, reason: DENY_REASONS.CONSENT_DENIED });
  });

  it('should ignore a denial of a consent type that does not cover the access', async () => {
    engine.grantStore.add(fakeGrant({ accessLevel: AccessLevel.WRITE }));
    engine.consents.consents.push(
      fakeConsent({ consentType: ConsentType.MARKETING_COMMUNICATIONS }),
    );

    const decision = await decide(AccessLevel.READ);

    expect(decision.allowed).toBe(true);
  });

  it('should ignore denials that are revoked, expired or not yet effective', async () => {
    engine.grantStore.add(fakeGrant({ accessLevel: AccessLevel.WRITE }));
    engine.consents.consents.push(
      fakeConsent({
        id: 'revoked',
        consentType: ConsentType.TREATMENT_CONSENT,
        revokedAt: new Date('2025-02-01T00:00:00.000Z'),
      }),
      fakeConsent({
        id: 'expired',
        consentType: ConsentType.TREATMENT_CONSENT,
        expiresAt: new Date('2025-02-01T00:00:00.000Z'),
      }),
      fakeConsent({
        id: 'future',
        consentType: ConsentType.TREATMENT_CONSENT,
        effectiveFrom: new Date('2025-04-01T00:00:00.000Z'),
      }),
    );

    const decision = await decide(AccessLevel.READ);

    expect(decision).toEqual({ allowed: true, level: AccessLevel.WRITE });
  });

  it('should let a granted consent stand', async () => {
    engine.grantStore.add(fakeGrant({ accessLevel: AccessLevel.READ }));
    engine.consents.consents.push(
      fakeConsent({ consentType: ConsentType.TREATMENT_CONSENT, isGranted: true }),
    );

    const decision = await decide(AccessLevel.READ);

    expect(decision.allowed).toBe(true);
  });

  describe('emergency grants', () => {
    beforeEach(() => {
      engine.grantStore.add(
        fakeGrant({
          id: 'glass',
          accessLevel: AccessLevel.EMERGENCY,
          expiresAt: new Date('2025-03-01T10:00:00.000Z'),
          emergencyJustification: 'Unconscious patient in ED',
        }),
      );
    });

    it('should allow at Emergency and audit every use', async () => {
      await decide(AccessLevel.WRITE);
      const decision = await decide(AccessLevel.ADMIN);

      expect(decision).toEqual({ allowed: true, level: AccessLevel.EMERGENCY });
      const uses = engine.auditStore.ofType(AuditEventType.EMERGENCY_ACCESS_USED);
      expect(uses).toHaveLength(2);
      expect(uses[1]).toMatchObject({
        actorId: 'user-1',
        patientId: 'patient-1',
        resourceId: 'glass',
        outcome: 'success',
        reason: 'emergency_access',
        metadata: { requestedLevel: AccessLevel.ADMIN },
        createdAt: new Date('2025-03-01T09:00:00.000Z'),
      });
    });

    it('should bypass a consent denial', async () => {
      engine.consents.consents.push(fakeConsent({ consentType: ConsentType.TREATMENT_CONSENT }));

      const decision = await decide(AccessLevel.READ);

      expect(decision).toEqual({ allowed: true, level: AccessLevel.EMERGENCY });
    });

    it('should not allow when the usage audit cannot be written', async () => {
      engine.auditStore.failNextWrite(new Error('audit store down'));

      await expect(
        decide(AccessLevel.READ),
      ).rejects.toThrow('audit store down');
      expect(engine.auditStore.events).toEqual([]);
    });

    it('should fall back to routine grants once the emergency grant expires', async () => {
      engine.grantStore.add(fakeGrant({ id: 'routine', accessLevel: AccessLevel.READ }));
      engine.clock.advance(60 * 60 * 1000);

      const decision = await decide(AccessLevel.READ);

      expect(decision).toEqual({ allowed: true, level: AccessLevel.READ });
      expect(engine.auditStore.ofType(AuditEventType.EMERGENCY_ACCESS_USED)).toEqual([]);
    });
  });

  it('should surface store failures instead of deciding', async () => {
    engine.auditStore.failNextWrite(new EngineError('STORE_UNAVAILABLE', 'down'));

    await expect(
      decide(AccessLevel.READ),
    ).rejects.toBeInstanceOf(EngineError);
  });
});
