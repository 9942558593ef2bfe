/**
 * Derived "effective active" status for sessions, scopes and grants.
 *
 * These values are computed from the stored flags and expiry at read time
 * and are never persisted. Revocation writes only the flag.
 *
 * @module utils/effectiveStatus
 */

import type { PatientAccess, PatientConsent, Session, UserScope } from '../types/index.js';

export function isSessionActive(session: Session, now: Date): boolean {
  return !session.isRevoked && now.getTime() < session.expiresAt.getTime();
}

export function isScopeActive(scope: UserScope, now: Date): boolean {
  if (scope.isRevoked) return false;
  return scope.expiresAt === null || now.getTime() < scope.expiresAt.getTime();
}

export function isGrantActive(grant: PatientAccess, now: Date): boolean {
  return grant.isEnabled && (grant.expiresAt === null || now.getTime() < grant.expiresAt.getTime());
}

/** A consent row is in force from `effectiveFrom` until it expires or is revoked. */
export function isConsentInForce(consent: PatientConsent, now: Date): boolean {
  const t = now.getTime();
  return (
    consent.effectiveFrom.getTime() <= t &&
    consent.revokedAt === null &&
    (consent.expiresAt === null || t < consent.expiresAt.getTime())
  );
}
