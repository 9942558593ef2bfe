/**
 * Access Decision Engine.
 *
 * Decides whether an actor may read or write a patient's record, and at
 * which effective level. Rules are evaluated in order, first match wins:
 *
 * 1. System administrators are allowed at Admin.
 * 2. An active Emergency grant allows at Emergency. Every such use is
 *    audited before the decision is returned; if the audit write fails
 *    the error propagates and nothing is allowed.
 * 3. Otherwise the most privileged active non-emergency grant is taken.
 *    None: NO_GRANT.
 * 4. A requested level ranked above the grant: INSUFFICIENT_LEVEL.
 *    Research and Analytics grants rank with Read.
 * 5. An in-force consent denial covering the access: CONSENT_DENIED.
 * 6. Otherwise allowed at the grant's level.
 *
 * Every denial is audited with its reason. Lookups are tenant-scoped, so
 * rows from another tenant are never seen.
 *
 * @module access
 */

import {
  AccessLevel,
  AuditEventType,
  ConsentType,
  UserRole,
  type Actor,
  type PatientAccess,
  type RequestContext,
  type RequestedAccessLevel,
} from '../types/index.js';
import { DENY_REASONS, type DenyReason } from '../utils/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { AuditRecorder } from '../audit/auditRecorder.js';
import type { AccessDecision, ConsentStore, GrantStore } from './types.js';

// ─── Ranking ─────────────────────────────────────────────────────────────────

/**
 * Capability rank of each level. Emergency sits above all others but is
 * resolved before ranked comparison.
 */
export const ACCESS_LEVEL_RANK: Readonly<Record<AccessLevel, number>> = {
  [AccessLevel.READ]: 1,
  [AccessLevel.RESEARCH]: 1,
  [AccessLevel.ANALYTICS]: 1,
  [AccessLevel.WRITE]: 2,
  [AccessLevel.ADMIN]: 3,
  [AccessLevel.EMERGENCY]: 4,
};

export function rankOf(level: AccessLevel): number {
  return ACCESS_LEVEL_RANK[level];
}

function isSpecialPurpose(level: AccessLevel): boolean {
  return level === AccessLevel.RESEARCH || level === AccessLevel.ANALYTICS;
}

function expiryValue(grant: PatientAccess): number {
  return grant.expiresAt ? grant.expiresAt.getTime() : Number.POSITIVE_INFINITY;
}

/**
 * Order grants most privileged first: higher rank, then a general level
 * before a special-purpose one of the same rank, then the later expiry,
 * then the newer grant.
 */
export function compareGrantPrivilege(a: PatientAccess, b: PatientAccess): number {
  const byRank = rankOf(b.accessLevel) - rankOf(a.accessLevel);
  if (byRank !== 0) return byRank;
  const bySpecial =
    Number(isSpecialPurpose(a.accessLevel)) - Number(isSpecialPurpose(b.accessLevel));
  if (bySpecial !== 0) return bySpecial;
  const aExp = expiryValue(a);
  const bExp = expiryValue(b);
  if (aExp !== bExp) return bExp > aExp ? 1 : -1;
  return b.grantedAt.getTime() - a.grantedAt.getTime();
}

/**
 * The most privileged grant among `grants`, or null for an empty list.
 */
export function mostPrivilegedGrant(grants: readonly PatientAccess[]): PatientAccess | null {
  return [...grants].sort(compareGrantPrivilege)[0] ?? null;
}

// ─── Consent Coverage ────────────────────────────────────────────────────────

/**
 * Consent types a patient can use to veto access by this role at this level.
 */
export function consentTypesCovering(role: UserRole, level: AccessLevel): ConsentType[] {
  if (level === AccessLevel.RESEARCH || role === UserRole.RESEARCHER) {
    return [ConsentType.RESEARCH_PARTICIPATION, ConsentType.DATA_SHARING];
  }
  if (level === AccessLevel.ANALYTICS || role === UserRole.DATA_ANALYST) {
    return [ConsentType.DATA_SHARING, ConsentType.AUTOMATED_DECISION_MAKING];
  }
  if (role === UserRole.FAMILY_MEMBER) {
    return [ConsentType.FAMILY_ACCESS];
  }
  return [ConsentType.TREATMENT_CONSENT];
}

// ─── Engine ──────────────────────────────────────────────────────────────────

/** Context used when a decision is requested outside an HTTP request. */
export const INTERNAL_CONTEXT: RequestContext = {
  ipAddress: 'internal',
  userAgent: 'patient-access-engine',
};

export interface AccessDecisionEngineDeps {
  grants: Pick<GrantStore, 'findActiveGrants'>;
  consents: ConsentStore;
  audit: AuditRecorder;
  logger?: Logger;
  now?: () => Date;
}

export class AccessDecisionEngine {
  private readonly grants: Pick<GrantStore, 'findActiveGrants'>;
  private readonly consents: ConsentStore;
  private readonly audit: AuditRecorder;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: AccessDecisionEngineDeps) {
    this.grants = deps.grants;
    this.consents = deps.consents;
    this.audit = deps.audit;
    this.logger = (deps.logger ?? silentLogger).child({ service: 'access-decision' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Decide whether `actor` may access `patientId` at `requestedLevel`.
   *
   * @throws {EngineError} STORE_UNAVAILABLE when a lookup or audit write fails
   */
  async decide(
    actor: Actor,
    patientId: string,
    requestedLevel: RequestedAccessLevel,
    context: RequestContext = INTERNAL_CONTEXT,
  ): Promise<AccessDecision> {
    // 1. Administrators
    if (actor.role === UserRole.SYSTEM_ADMINISTRATOR) {
      return { allowed: true, level: AccessLevel.ADMIN };
    }

    const now = this.now();
    const active = await this.grants.findActiveGrants(
      actor.tenantId,
      actor.userId,
      patientId,
      now,
      { signal: context.signal },
    );

    // 2. Emergency (break-glass)
    const emergency = active.find((g) => g.accessLevel === AccessLevel.EMERGENCY);
    if (emergency) {
      await this.audit.recordAccess(
        {
          tenantId: actor.tenantId,
          eventType: AuditEventType.EMERGENCY_ACCESS_USED,
          actorId: actor.userId,
          patientId,
          resourceId: emergency.id,
          outcome: 'success',
          reason: 'emergency_access',
          metadata: { requestedLevel },
          occurredAt: now,
        },
        context,
      );
      this.logger.warn('Emergency access used', {
        userId: actor.userId,
        patientId,
        grantId: emergency.id,
      });
      return { allowed: true, level: AccessLevel.EMERGENCY };
    }

    // 3. Most privileged routine grant
    const routine = active.filter((g) => g.accessLevel !== AccessLevel.EMERGENCY);
    const grant = mostPrivilegedGrant(routine);
    if (!grant) {
      return this.deny(actor, patientId, requestedLevel, DENY_REASONS.NO_GRANT, null, context);
    }

    // 4. Level ceiling
    if (rankOf(requestedLevel) > rankOf(grant.accessLevel)) {
      return this.deny(
        actor,
        patientId,
        requestedLevel,
        DENY_REASONS.INSUFFICIENT_LEVEL,
        grant,
        context,
      );
    }

    // 5. Patient consent veto, over the requested scope and the grant's purpose
    const consentTypes = new Set([
      ...consentTypesCovering(actor.role, requestedLevel),
      ...consentTypesCovering(actor.role, grant.accessLevel),
    ]);
    const denials = await this.consents.findInForceDenials(
      actor.tenantId,
      patientId,
      [...consentTypes],
      now,
      { signal: context.signal },
    );
    if (denials.length > 0) {
      return this.deny(
        actor,
        patientId,
        requestedLevel,
        DENY_REASONS.CONSENT_DENIED,
        grant,
        context,
      );
    }

    // 6. Allowed at the grant's level
    return { allowed: true, level: grant.accessLevel };
  }

  private async deny(
    actor: Actor,
    patientId: string,
    requestedLevel: RequestedAccessLevel,
    reason: DenyReason,
    grant: PatientAccess | null,
    context: RequestContext,
  ): Promise<AccessDecision> {
    await this.audit.recordAccess(
      {
        tenantId: actor.tenantId,
        eventType: AuditEventType.ACCESS_DENIED,
        actorId: actor.userId,
        patientId,
        resourceId: grant?.id ?? null,
        outcome: 'failure',
        reason,
        metadata: { requestedLevel, grantLevel: grant?.accessLevel ?? null },
      },
      context,
    );
    this.logger.info('Access denied', { userId: actor.userId, patientId, reason });
    return { allowed: false, reason };
  }
}
