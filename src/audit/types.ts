/**
 * Type definitions for the Audit module.
 */

import type { AuditEvent, AuditEventType, AuditOutcome, PagedResult } from '../types/index.js';
import type {
  AuditEventFilter,
  AuditQueryOptions,
  NewAuditEvent,
} from '../repositories/auditRepository.js';

export type { NewAuditEvent, AuditEventFilter, AuditQueryOptions };

/** Persistence used by the recorder; the pg audit repository satisfies it. */
export interface AuditStore {
  createAuditEvent(event: NewAuditEvent, options?: AuditQueryOptions): Promise<AuditEvent>;
  findByFilter(
    filter: AuditEventFilter,
    options?: AuditQueryOptions,
  ): Promise<PagedResult<AuditEvent>>;
}

/** An event to record, before request context is attached. */
export interface AuditRecord {
  tenantId: string;
  eventType: AuditEventType;
  actorId: string | null;
  patientId?: string | null;
  resourceType: string;
  resourceId?: string | null;
  outcome: AuditOutcome;
  reason?: string | null;
  metadata?: Record<string, unknown>;
  occurredAt?: Date;
}

export interface AuthAuditParams {
  tenantId: string;
  eventType: AuditEventType;
  /** Null when the username did not resolve to a user. */
  actorId: string | null;
  outcome: AuditOutcome;
  reason?: string | null;
  metadata?: Record<string, unknown>;
}

export interface AccessAuditParams {
  tenantId: string;
  eventType: AuditEventType;
  actorId: string;
  patientId: string | null;
  /** Defaults to `patient_access`. */
  resourceType?: string;
  resourceId?: string | null;
  outcome: AuditOutcome;
  reason?: string | null;
  metadata?: Record<string, unknown>;
  occurredAt?: Date;
}

export interface AuditQuery {
  tenantId: string;
  eventType?: AuditEventType;
  actorId?: string;
  patientId?: string;
  outcome?: AuditOutcome;
  from?: Date;
  to?: Date;
  page?: number;
  pageSize?: number;
}
