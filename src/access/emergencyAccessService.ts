/**
 * Emergency ("break-glass") access.
 *
 * Creates a time-boxed Emergency grant that bypasses consent checks. The
 * justification is mandatory and is stored on the grant and in the audit
 * trail. The grant row and its EmergencyAccessGranted audit row commit in
 * one transaction; if either write fails neither exists.
 *
 * @module access
 */

import {
  AccessLevel,
  AuditEventType,
  UserRole,
  type Actor,
  type RequestContext,
} from '../types/index.js';
import type { EmergencyAccessPolicy } from '../config/index.js';
import { forbidden, notFound, validationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { AuditRecorder } from '../audit/auditRecorder.js';
import type { DirectoryStore, GrantStore } from './types.js';

const MS_PER_MINUTE = 60 * 1000;

const EMERGENCY_ROLES: ReadonlySet<UserRole> = new Set([
  UserRole.HEALTHCARE_PROVIDER,
  UserRole.NURSE,
  UserRole.SYSTEM_ADMINISTRATOR,
]);

export interface EmergencyAccessServiceDeps {
  grants: Pick<GrantStore, 'createGrantWithAudit'>;
  directory: Pick<DirectoryStore, 'patientExists'>;
  audit: AuditRecorder;
  policy: EmergencyAccessPolicy;
  logger?: Logger;
  now?: () => Date;
}

export interface EmergencyGrant {
  grantId: string;
  expiresAt: Date;
  /** Duration actually granted, after clamping to the policy maximum. */
  durationMinutes: number;
}

export class EmergencyAccessService {
  private readonly grants: Pick<GrantStore, 'createGrantWithAudit'>;
  private readonly directory: Pick<DirectoryStore, 'patientExists'>;
  private readonly audit: AuditRecorder;
  private readonly policy: EmergencyAccessPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: EmergencyAccessServiceDeps) {
    this.grants = deps.grants;
    this.directory = deps.directory;
    this.audit = deps.audit;
    this.policy = deps.policy;
    this.logger = (deps.logger ?? silentLogger).child({ service: 'emergency-access' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Break the glass on `patientId` for `durationMinutes` (clamped to the
   * policy maximum).
   *
   * @throws {EngineError} FORBIDDEN for other roles, VALIDATION_ERROR for a
   *   blank justification or a non-positive duration, NOT_FOUND for an
   *   unknown patient
   */
  async createEmergencyAccess(
    actor: Actor,
    patientId: string,
    justification: string,
    durationMinutes: number,
    context: RequestContext,
  ): Promise<EmergencyGrant> {
    if (!EMERGENCY_ROLES.has(actor.role)) {
      throw forbidden();
    }

    const fields: Record<string, string[]> = {};
    if (justification.trim().length === 0) {
      fields['justification'] = ['A justification is required'];
    }
    if (!Number.isFinite(durationMinutes) || durationMinutes <= 0) {
      fields['durationMinutes'] = ['Must be a positive number of minutes'];
    }
    if (Object.keys(fields).length > 0) {
      throw validationError('Invalid emergency access request.', fields);
    }

    const signal = context.signal;
    if (!(await this.directory.patientExists(actor.tenantId, patientId, { signal }))) {
      throw notFound('Patient', patientId);
    }

    const now = this.now();
    const granted = Math.min(durationMinutes, this.policy.maxDurationMinutes);
    const expiresAt = new Date(now.getTime() + granted * MS_PER_MINUTE);

    const created = await this.grants.createGrantWithAudit(
      {
        userId: actor.userId,
        patientId,
        tenantId: actor.tenantId,
        accessLevel: AccessLevel.EMERGENCY,
        grantedBy: actor.userId,
        reason: 'emergency_access',
        grantedAt: now,
        expiresAt,
        emergencyJustification: justification,
      },
      (grant) =>
        this.audit.toNewEvent(
          {
            tenantId: actor.tenantId,
            eventType: AuditEventType.EMERGENCY_ACCESS_GRANTED,
            actorId: actor.userId,
            patientId,
            resourceType: 'patient_access',
            resourceId: grant.id,
            outcome: 'success',
            reason: 'emergency_access',
            metadata: {
              justification,
              requestedMinutes: durationMinutes,
              grantedMinutes: granted,
              expiresAt: expiresAt.toISOString(),
            },
            occurredAt: now,
          },
          context,
        ),
      { encryptionKey: this.audit.encryptionKey, signal },
    );

    this.logger.warn('Emergency access granted', {
      userId: actor.userId,
      patientId,
      grantId: created.id,
      durationMinutes: granted,
    });

    return { grantId: created.id, expiresAt, durationMinutes: granted };
  }
}
