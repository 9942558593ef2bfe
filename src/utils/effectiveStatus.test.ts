/**
 * Unit tests for derived active status.
 *
 * @module utils/effectiveStatus.test
 */

import { describe, it, expect } from 'vitest';
import type { Session, UserScope } from '../types/index.js';
import {
  isConsentInForce,
  isGrantActive,
  isScopeActive,
  isSessionActive,
} from './effectiveStatus.js';
import { fakeConsent, fakeGrant } from '../test/fakes.js';

const NOW = new Date('2025-03-01T09:00:00.000Z');
const BEFORE = new Date('2025-03-01T08:59:59.999Z');
const AFTER = new Date('2025-03-01T09:00:00.001Z');

function session(overrides: Partial<Session> = {}): Session {
  return {
    id: 'session-1',
    userId: 'user-1',
    tenantId: 'tenant-1',
    refreshTokenHash: 'hash',
    createdAt: new Date('2025-03-01T00:00:00.000Z'),
    expiresAt: AFTER,
    lastAccessedAt: null,
    isRevoked: false,
    revokedAt: null,
    revocationReason: null,
    ipAddress: null,
    userAgent: null,
    ...overrides,
  };
}

function scope(overrides: Partial<UserScope> = {}): UserScope {
  return {
    id: 'scope-1',
    userId: 'user-1',
    tenantId: 'tenant-1',
    scope: 'records.read',
    grantedBy: 'admin-1',
    grantedAt: new Date('2025-03-01T00:00:00.000Z'),
    expiresAt: null,
    isRevoked: false,
    revokedAt: null,
    ...overrides,
  };
}

describe('isSessionActive', () => {
  it('should be active strictly before expiry', () => {
    expect(isSessionActive(session(), NOW)).toBe(true);
    expect(isSessionActive(session({ expiresAt: NOW }), NOW)).toBe(false);
  });

  it('should be inactive once revoked', () => {
    expect(isSessionActive(session({ isRevoked: true, revokedAt: BEFORE }), NOW)).toBe(false);
  });
});

describe('isScopeActive', () => {
  it('should treat a null expiry as never expiring', () => {
    expect(isScopeActive(scope(), NOW)).toBe(true);
  });

  it('should expire at the expiry instant', () => {
    expect(isScopeActive(scope({ expiresAt: AFTER }), NOW)).toBe(true);
    expect(isScopeActive(scope({ expiresAt: NOW }), NOW)).toBe(false);
  });

  it('should be inactive once revoked', () => {
    expect(isScopeActive(scope({ isRevoked: true }), NOW)).toBe(false);
  });
});

describe('isGrantActive', () => {
  it('should require the enabled flag', () => {
    expect(isGrantActive(fakeGrant(), NOW)).toBe(true);
    expect(isGrantActive(fakeGrant({ isEnabled: false }), NOW)).toBe(false);
  });

  it('should expire at the expiry instant', () => {
    expect(isGrantActive(fakeGrant({ expiresAt: AFTER }), NOW)).toBe(true);
    expect(isGrantActive(fakeGrant({ expiresAt: NOW }), NOW)).toBe(false);
  });
});

describe('isConsentInForce', () => {
  it('should start at the effective instant', () => {
    expect(isConsentInForce(fakeConsent({ effectiveFrom: NOW }), NOW)).toBe(true);
    expect(isConsentInForce(fakeConsent({ effectiveFrom: AFTER }), NOW)).toBe(false);
  });

  it('should end at expiry or on revocation', () => {
    expect(isConsentInForce(fakeConsent({ expiresAt: NOW }), NOW)).toBe(false);
    expect(isConsentInForce(fakeConsent({ expiresAt: AFTER }), NOW)).toBe(true);
    expect(isConsentInForce(fakeConsent({ revokedAt: BEFORE }), NOW)).toBe(false);
  });
});
