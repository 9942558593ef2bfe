/**
 * Type definitions for the Access module.
 */

import type {
  AccessLevel,
  ConsentType,
  PagedResult,
  PatientAccess,
  PatientConsent,
  RequestedAccessLevel,
} from '../types/index.js';
import type { QueryOptions } from '../utils/db.js';
import type { DenyReason } from '../utils/errors.js';
import type {
  NewPatientAccess,
  PatientAccessFilter,
} from '../repositories/patientAccessRepository.js';
import type { NewAuditEvent } from '../repositories/auditRepository.js';

export type { NewPatientAccess, PatientAccessFilter, RequestedAccessLevel };

// ─── Decisions ───────────────────────────────────────────────────────────────

export type AccessDecision =
  | { allowed: true; level: AccessLevel }
  | { allowed: false; reason: DenyReason };

// ─── Stores ──────────────────────────────────────────────────────────────────

/** Persistence for the grant ledger; the pg patient access repository satisfies it. */
export interface GrantStore {
  findGrantById(
    tenantId: string,
    grantId: string,
    options?: QueryOptions,
  ): Promise<PatientAccess | null>;
  findActiveGrants(
    tenantId: string,
    userId: string,
    patientId: string,
    now: Date,
    options?: QueryOptions,
  ): Promise<PatientAccess[]>;
  createGrantWithAudit(
    grant: NewPatientAccess,
    buildAuditEvent: (created: PatientAccess) => NewAuditEvent,
    options?: { encryptionKey?: string | null; signal?: AbortSignal },
  ): Promise<PatientAccess>;
  revokeGrant(
    tenantId: string,
    grantId: string,
    revokedBy: string,
    reason: string | null,
    at: Date,
    options?: QueryOptions,
  ): Promise<boolean>;
  extendGrant(
    tenantId: string,
    grantId: string,
    modifiedBy: string,
    expiresAt: Date,
    at: Date,
    options?: QueryOptions,
  ): Promise<boolean>;
  listGrants(
    tenantId: string,
    filter: PatientAccessFilter,
    page: { page: number; pageSize: number },
    now: Date,
    options?: QueryOptions,
  ): Promise<PagedResult<PatientAccess>>;
  findAccessiblePatientIds(
    tenantId: string,
    userId: string,
    now: Date,
    options?: QueryOptions,
  ): Promise<string[]>;
}

/** Read-only consent lookups. */
export interface ConsentStore {
  findInForceDenials(
    tenantId: string,
    patientId: string,
    consentTypes: readonly ConsentType[],
    now: Date,
    options?: QueryOptions,
  ): Promise<PatientConsent[]>;
}

/** Existence checks against identities owned elsewhere. */
export interface DirectoryStore {
  userExists(tenantId: string, userId: string, options?: QueryOptions): Promise<boolean>;
  patientExists(tenantId: string, patientId: string, options?: QueryOptions): Promise<boolean>;
}

// ─── Grant Ledger Inputs ─────────────────────────────────────────────────────

export interface GrantAccessInput {
  userId: string;
  patientId: string;
  accessLevel: AccessLevel;
  reason?: string | null;
  expiresAt?: Date | null;
}

export interface ListAccessFilter {
  patientId?: string;
  userId?: string;
  accessLevel?: AccessLevel;
  isActive?: boolean;
}

export interface PageRequest {
  page?: number;
  pageSize?: number;
}
