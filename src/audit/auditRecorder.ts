/**
 * Audit Recorder.
 *
 * Append-only record of authentication and access events. Every write
 * goes straight to the store and its failure propagates: an operation
 * whose audit row cannot be written does not report success.
 *
 * @module audit
 */

import type { AuditEvent, PagedResult, RequestContext } from '../types/index.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { generateRequestId } from '../utils/responses.js';
import { validationError } from '../utils/errors.js';
import type { Executor } from '../utils/db.js';
import type {
  AccessAuditParams,
  AuditQuery,
  AuditRecord,
  AuditStore,
  AuthAuditParams,
  NewAuditEvent,
} from './types.js';

export const DEFAULT_AUDIT_PAGE_SIZE = 20;
export const MAX_AUDIT_PAGE_SIZE = 100;

export interface AuditRecorderDeps {
  store: AuditStore;
  /** Hex AES-256 key for metadata at rest; null stores plain JSON. */
  encryptionKey?: string | null;
  logger?: Logger;
}

export class AuditRecorder {
  private readonly store: AuditStore;
  private readonly logger: Logger;
  readonly encryptionKey: string | null;

  constructor(deps: AuditRecorderDeps) {
    this.store = deps.store;
    this.encryptionKey = deps.encryptionKey ?? null;
    this.logger = (deps.logger ?? silentLogger).child({ service: 'audit' });
  }

  /**
   * Attach request context to a record. Used directly by callers that
   * write the audit row inside their own transaction.
   */
  toNewEvent(record: AuditRecord, context: RequestContext): NewAuditEvent {
    return {
      ...record,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      requestId: context.requestId ?? generateRequestId(),
    };
  }

  /**
   * Append an event. Pass `executor` to write within an open transaction.
   */
  async record(
    record: AuditRecord,
    context: RequestContext,
    executor?: Executor,
  ): Promise<AuditEvent> {
    const event = await this.store.createAuditEvent(this.toNewEvent(record, context), {
      executor,
      signal: context.signal,
      encryptionKey: this.encryptionKey,
    });
    this.logger.debug('Audit event recorded', {
      eventType: event.eventType,
      outcome: event.outcome,
      auditId: event.id,
    });
    return event;
  }

  /**
   * Record an authentication event. The resource is the user account.
   */
  async recordAuth(params: AuthAuditParams, context: RequestContext): Promise<AuditEvent> {
    return this.record(
      {
        tenantId: params.tenantId,
        eventType: params.eventType,
        actorId: params.actorId,
        resourceType: 'user',
        resourceId: params.actorId,
        outcome: params.outcome,
        reason: params.reason ?? null,
        metadata: params.metadata,
      },
      context,
    );
  }

  /**
   * Record a patient-access event (grant, revoke, decision).
   */
  async recordAccess(params: AccessAuditParams, context: RequestContext): Promise<AuditEvent> {
    return this.record(
      {
        tenantId: params.tenantId,
        eventType: params.eventType,
        actorId: params.actorId,
        patientId: params.patientId,
        resourceType: params.resourceType ?? 'patient_access',
        resourceId: params.resourceId ?? null,
        outcome: params.outcome,
        reason: params.reason ?? null,
        metadata: params.metadata,
        occurredAt: params.occurredAt,
      },
      context,
    );
  }

  /**
   * Page through recorded events for review, newest first.
   *
   * @throws {EngineError} VALIDATION_ERROR for an out-of-range page or page size
   */
  async query(filter: AuditQuery): Promise<PagedResult<AuditEvent>> {
    const page = filter.page ?? 1;
    const pageSize = filter.pageSize ?? DEFAULT_AUDIT_PAGE_SIZE;
    if (!Number.isInteger(page) || page < 1) {
      throw validationError('Invalid page.', { page: ['Must be a positive integer'] });
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_AUDIT_PAGE_SIZE) {
      throw validationError('Invalid page size.', {
        pageSize: [`Must be between 1 and ${MAX_AUDIT_PAGE_SIZE}`],
      });
    }

    return this.store.findByFilter(
      {
        tenantId: filter.tenantId,
        eventType: filter.eventType,
        actorId: filter.actorId,
        patientId: filter.patientId,
        outcome: filter.outcome,
        from: filter.from,
        to: filter.to,
        page,
        pageSize,
      },
      { encryptionKey: this.encryptionKey },
    );
  }
}
