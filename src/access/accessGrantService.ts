/**
 * Access Grant Ledger operations: grant, revoke, extend and list
 * per-patient access.
 *
 * Grants accumulate. Granting never revokes an earlier grant for the same
 * (user, patient); the decision engine resolves overlaps by taking the most
 * privileged active one. Revoking flips the enable flag and keeps the row.
 *
 * Delegation: a healthcare provider may only hand out what they hold. They
 * need an active grant of at least Write on the patient and cannot grant a
 * level ranked above it. Emergency grants are created only through the
 * emergency access service.
 *
 * @module access
 */

import {
  AccessLevel,
  AuditEventType,
  UserRole,
  type Actor,
  type PagedResult,
  type PatientAccess,
  type RequestContext,
} from '../types/index.js';
import { forbidden, notFound, validationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { AuditRecorder } from '../audit/auditRecorder.js';
import { mostPrivilegedGrant, rankOf } from './accessDecisionEngine.js';
import type {
  DirectoryStore,
  GrantAccessInput,
  GrantStore,
  ListAccessFilter,
  PageRequest,
} from './types.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/** Roles whose members may view grants on patients they can access. */
const CLINICAL_ROLES: ReadonlySet<UserRole> = new Set([
  UserRole.HEALTHCARE_PROVIDER,
  UserRole.NURSE,
]);

export interface AccessGrantServiceDeps {
  grants: GrantStore;
  directory: DirectoryStore;
  audit: AuditRecorder;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Validate and default a page request.
 *
 * @throws {EngineError} VALIDATION_ERROR when page < 1 or pageSize is outside 1..100
 */
export function normalizePage(request: PageRequest = {}): { page: number; pageSize: number } {
  const page = request.page ?? 1;
  const pageSize = request.pageSize ?? DEFAULT_PAGE_SIZE;
  const fields: Record<string, string[]> = {};
  if (!Number.isInteger(page) || page < 1) {
    fields['page'] = ['Must be a positive integer'];
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    fields['pageSize'] = [`Must be an integer between 1 and ${MAX_PAGE_SIZE}`];
  }
  if (Object.keys(fields).length > 0) {
    throw validationError('Invalid pagination parameters.', fields);
  }
  return { page, pageSize };
}

export class AccessGrantService {
  private readonly grants: GrantStore;
  private readonly directory: DirectoryStore;
  private readonly audit: AuditRecorder;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: AccessGrantServiceDeps) {
    this.grants = deps.grants;
    this.directory = deps.directory;
    this.audit = deps.audit;
    this.logger = (deps.logger ?? silentLogger).child({ service: 'access-grants' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Grant `input.userId` access to `input.patientId`.
   *
   * @returns The id of the new grant
   * @throws {EngineError} VALIDATION_ERROR, FORBIDDEN or NOT_FOUND
   */
  async grant(actor: Actor, input: GrantAccessInput, context: RequestContext): Promise<string> {
    if (input.accessLevel === AccessLevel.EMERGENCY) {
      throw validationError('Emergency access must be requested through the emergency procedure.', {
        accessLevel: ['Emergency is not grantable here'],
      });
    }

    const now = this.now();
    const { patientId, accessLevel } = input;
    await this.requireGrantAuthority(actor, patientId, accessLevel, now, context.signal);

    const expiresAt = input.expiresAt ?? null;
    if (expiresAt && expiresAt.getTime() <= now.getTime()) {
      throw validationError('Access expiry must be in the future.', {
        expiresAt: ['Must be in the future'],
      });
    }

    const [userFound, patientFound] = await Promise.all([
      this.directory.userExists(actor.tenantId, input.userId, { signal: context.signal }),
      this.directory.patientExists(actor.tenantId, input.patientId, { signal: context.signal }),
    ]);
    if (!userFound) throw notFound('User', input.userId);
    if (!patientFound) throw notFound('Patient', input.patientId);

    const reason = input.reason?.trim() || null;
    const created = await this.grants.createGrantWithAudit(
      {
        userId: input.userId,
        patientId: input.patientId,
        tenantId: actor.tenantId,
        accessLevel: input.accessLevel,
        grantedBy: actor.userId,
        reason,
        grantedAt: now,
        expiresAt,
      },
      (grant) =>
        this.audit.toNewEvent(
          {
            tenantId: actor.tenantId,
            eventType: AuditEventType.ACCESS_GRANTED,
            actorId: actor.userId,
            patientId: grant.patientId,
            resourceType: 'patient_access',
            resourceId: grant.id,
            outcome: 'success',
            reason,
            metadata: {
              userId: grant.userId,
              accessLevel: grant.accessLevel,
              expiresAt: grant.expiresAt?.toISOString() ?? null,
            },
            occurredAt: now,
          },
          context,
        ),
      { encryptionKey: this.audit.encryptionKey, signal: context.signal },
    );

    this.logger.info('Patient access granted', {
      grantId: created.id,
      userId: created.userId,
      patientId: created.patientId,
      accessLevel: created.accessLevel,
    });
    return created.id;
  }

  /**
   * Disable a grant. Revoking an already disabled grant succeeds without change.
   *
   * @throws {EngineError} NOT_FOUND or FORBIDDEN
   */
  async revoke(
    grantId: string,
    actor: Actor,
    reason: string | null,
    context: RequestContext,
  ): Promise<void> {
    const grant = await this.requireManageableGrant(grantId, actor, context.signal);
    if (!grant.isEnabled) {
      return;
    }

    const now = this.now();
    const revocationReason = reason?.trim() || null;
    const revoked = await this.grants.revokeGrant(
      actor.tenantId,
      grantId,
      actor.userId,
      revocationReason,
      now,
      { signal: context.signal },
    );
    if (!revoked) {
      // Disabled concurrently
      return;
    }

    await this.audit.recordAccess(
      {
        tenantId: actor.tenantId,
        eventType: AuditEventType.ACCESS_REVOKED,
        actorId: actor.userId,
        patientId: grant.patientId,
        resourceId: grant.id,
        outcome: 'success',
        reason: revocationReason,
        metadata: { userId: grant.userId, accessLevel: grant.accessLevel },
        occurredAt: now,
      },
      context,
    );
  }

  /**
   * Move the expiry of an enabled, unexpired routine grant. Providers stay
   * under the delegation ceiling for the grant's level. Emergency grants
   * are not extendable: a new break-glass request goes through the
   * emergency access service.
   *
   * @throws {EngineError} NOT_FOUND, FORBIDDEN or VALIDATION_ERROR
   */
  async extendAccess(
    grantId: string,
    actor: Actor,
    newExpiresAt: Date,
    context: RequestContext,
  ): Promise<Date> {
    const signal = context.signal;
    const grant = await this.requireManageableGrant(grantId, actor, signal);
    const now = this.now();

    if (grant.accessLevel === AccessLevel.EMERGENCY) {
      throw validationError('Emergency access cannot be extended.', {
        accessLevel: ['Request new emergency access instead'],
      });
    }
    if (!grant.isEnabled) {
      throw validationError('A revoked grant cannot be extended.');
    }
    if (grant.expiresAt && grant.expiresAt.getTime() <= now.getTime()) {
      throw validationError('An expired grant cannot be extended.', {
        expiresAt: ['Grant has already expired'],
      });
    }
    if (newExpiresAt.getTime() <= now.getTime()) {
      throw validationError('Access expiry must be in the future.', {
        expiresAt: ['Must be in the future'],
      });
    }
    await this.requireGrantAuthority(actor, grant.patientId, grant.accessLevel, now, signal);

    const extended = await this.grants.extendGrant(
      actor.tenantId,
      grantId,
      actor.userId,
      newExpiresAt,
      now,
      { signal },
    );
    if (!extended) {
      throw validationError('A revoked grant cannot be extended.');
    }

    await this.audit.recordAccess(
      {
        tenantId: actor.tenantId,
        eventType: AuditEventType.ACCESS_EXTENDED,
        actorId: actor.userId,
        patientId: grant.patientId,
        resourceId: grant.id,
        outcome: 'success',
        metadata: {
          previousExpiresAt: grant.expiresAt?.toISOString() ?? null,
          expiresAt: newExpiresAt.toISOString(),
        },
        occurredAt: now,
      },
      context,
    );
    return newExpiresAt;
  }

  /**
   * Page through grants in the caller's tenant.
   *
   * @throws {EngineError} VALIDATION_ERROR for bad paging, FORBIDDEN when
   *   {@link canViewAccessRecords} refuses
   */
  async listAccess(
    actor: Actor,
    filter: ListAccessFilter,
    pageRequest: PageRequest = {},
    signal?: AbortSignal,
  ): Promise<PagedResult<PatientAccess>> {
    const page = normalizePage(pageRequest);
    if (!(await this.canViewAccessRecords(actor, filter, signal))) {
      throw forbidden();
    }
    return this.grants.listGrants(actor.tenantId, filter, page, this.now(), { signal });
  }

  /**
   * Administrators see everything. Providers and nurses see grants on a
   * patient they can currently access. Anyone sees their own grants.
   */
  async canViewAccessRecords(
    actor: Actor,
    filter: ListAccessFilter,
    signal?: AbortSignal,
  ): Promise<boolean> {
    if (actor.role === UserRole.SYSTEM_ADMINISTRATOR) {
      return true;
    }
    if (filter.userId !== undefined && filter.userId === actor.userId) {
      return true;
    }
    if (CLINICAL_ROLES.has(actor.role) && filter.patientId !== undefined) {
      const held = await this.grants.findActiveGrants(
        actor.tenantId,
        actor.userId,
        filter.patientId,
        this.now(),
        { signal },
      );
      return held.length > 0;
    }
    return false;
  }

  /**
   * Distinct patient ids the actor currently holds an active grant on.
   */
  async getAccessiblePatients(actor: Actor, signal?: AbortSignal): Promise<string[]> {
    return this.grants.findAccessiblePatientIds(actor.tenantId, actor.userId, this.now(), {
      signal,
    });
  }

  // ─── Authorization ───────────────────────────────────────────────────────

  /** Rank of the most privileged active routine grant, 0 when none. */
  private async heldRank(
    actor: Actor,
    patientId: string,
    now: Date,
    signal?: AbortSignal,
  ): Promise<number> {
    const { tenantId, userId } = actor;
    const active = await this.grants.findActiveGrants(tenantId, userId, patientId, now, { signal });
    const best = mostPrivilegedGrant(active.filter((g) => g.accessLevel !== AccessLevel.EMERGENCY));
    return best ? rankOf(best.accessLevel) : 0;
  }

  private async requireGrantAuthority(
    actor: Actor,
    patientId: string,
    level: AccessLevel,
    now: Date,
    signal?: AbortSignal,
  ): Promise<void> {
    if (actor.role === UserRole.SYSTEM_ADMINISTRATOR) {
      return;
    }
    if (actor.role !== UserRole.HEALTHCARE_PROVIDER) {
      throw forbidden();
    }
    const held = await this.heldRank(actor, patientId, now, signal);
    if (held < rankOf(AccessLevel.WRITE) || rankOf(level) > held) {
      throw forbidden();
    }
  }

  /**
   * Load a grant the actor may revoke or extend: administrators, the
   * original granter, or a provider holding at least Write on the patient.
   */
  private async requireManageableGrant(
    grantId: string,
    actor: Actor,
    signal?: AbortSignal,
  ): Promise<PatientAccess> {
    const grant = await this.grants.findGrantById(actor.tenantId, grantId, { signal });
    if (!grant) {
      throw notFound('Access grant', grantId);
    }

    if (actor.role === UserRole.SYSTEM_ADMINISTRATOR || grant.grantedBy === actor.userId) {
      return grant;
    }
    if (
      actor.role === UserRole.HEALTHCARE_PROVIDER &&
      (await this.heldRank(actor, grant.patientId, this.now(), signal)) >= rankOf(AccessLevel.WRITE)
    ) {
      return grant;
    }
    throw forbidden();
  }
}
