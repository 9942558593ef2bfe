/**
 * Credential administration: lock, unlock, scopes and soft delete.
 *
 * Restricted to system and IT administrators. Locking and deleting a user
 * also revokes all of their sessions; already-issued access tokens keep
 * working until they expire.
 *
 * @module services/credentialService
 */

import {
  AuditEventType,
  UserRole,
  type Actor,
  type RequestContext,
  type User,
  type UserScope,
} from '../types/index.js';
import type { QueryOptions } from '../utils/db.js';
import { forbidden, notFound, validationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { AuditRecorder } from '../audit/auditRecorder.js';
import type { SessionServiceDeps } from './sessionService.js';
import { revokeAllSessions } from './sessionService.js';

// ─── Dependency Interfaces ───────────────────────────────────────────────────

/** Subset of userRepository used for administration. */
export interface UserAdminStore {
  findById(tenantId: string, id: string, options?: QueryOptions): Promise<User | null>;
  lockUser(
    tenantId: string,
    userId: string,
    lockedUntil: Date,
    options?: QueryOptions,
  ): Promise<boolean>;
  unlockUser(tenantId: string, userId: string, options?: QueryOptions): Promise<boolean>;
  softDeleteUser(
    tenantId: string,
    userId: string,
    at: Date,
    options?: QueryOptions,
  ): Promise<boolean>;
}

/** Subset of userScopeRepository used for administration. */
export interface ScopeAdminStore {
  findActiveScopes(
    tenantId: string,
    userId: string,
    now: Date,
    options?: QueryOptions,
  ): Promise<UserScope[]>;
  findScopeById(
    tenantId: string,
    scopeId: string,
    options?: QueryOptions,
  ): Promise<UserScope | null>;
  createScope(
    scope: {
      userId: string;
      tenantId: string;
      scope: string;
      grantedBy: string;
      expiresAt: Date | null;
    },
    options?: QueryOptions,
  ): Promise<UserScope>;
  revokeScope(
    tenantId: string,
    scopeId: string,
    at: Date,
    options?: QueryOptions,
  ): Promise<boolean>;
}

export interface CredentialAdminDeps extends SessionServiceDeps {
  userStore: UserAdminStore;
  scopeStore: ScopeAdminStore;
  audit: AuditRecorder;
  logger?: Logger;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

const ADMIN_ROLES: ReadonlySet<UserRole> = new Set([
  UserRole.SYSTEM_ADMINISTRATOR,
  UserRole.IT_ADMINISTRATOR,
]);

/** Scope names: lowercase segments separated by `.`, `:` or `_`. */
const SCOPE_PATTERN = /^[a-z][a-z0-9]*(?:[.:_-][a-z0-9]+)*$/;

function clock(deps: CredentialAdminDeps): Date {
  return deps.now ? deps.now() : new Date();
}

function requireAdmin(actor: Actor): void {
  if (!ADMIN_ROLES.has(actor.role)) {
    throw forbidden();
  }
}

async function requireUser(
  actor: Actor,
  userId: string,
  deps: CredentialAdminDeps,
  signal?: AbortSignal,
): Promise<User> {
  const user = await deps.userStore.findById(actor.tenantId, userId, { signal });
  if (!user) {
    throw notFound('User', userId);
  }
  return user;
}

// ─── Operations ──────────────────────────────────────────────────────────────

/**
 * Lock a user until `lockedUntil` and revoke their sessions.
 *
 * @throws {EngineError} FORBIDDEN, NOT_FOUND, or VALIDATION_ERROR for a past time
 */
export async function lockUser(
  actor: Actor,
  userId: string,
  lockedUntil: Date,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<void> {
  requireAdmin(actor);
  const now = clock(deps);
  if (lockedUntil.getTime() <= now.getTime()) {
    throw validationError('Lock end must be in the future.', {
      lockedUntil: ['Must be in the future'],
    });
  }
  await requireUser(actor, userId, deps, context.signal);

  await deps.userStore.lockUser(actor.tenantId, userId, lockedUntil, { signal: context.signal });
  const revokedSessions = await revokeAllSessions(
    { userId, tenantId: actor.tenantId },
    'account_locked',
    deps,
    context.signal,
  );

  await deps.audit.record(
    {
      tenantId: actor.tenantId,
      eventType: AuditEventType.ACCOUNT_LOCKED,
      actorId: actor.userId,
      resourceType: 'user',
      resourceId: userId,
      outcome: 'success',
      reason: 'administrative_lock',
      metadata: { lockedUntil: lockedUntil.toISOString(), revokedSessions },
    },
    context,
  );
  (deps.logger ?? silentLogger).warn('Account locked by administrator', {
    userId,
    actorId: actor.userId,
  });
}

/**
 * Lift a lock and reset the failed-login counter.
 */
export async function unlockUser(
  actor: Actor,
  userId: string,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<void> {
  requireAdmin(actor);
  await requireUser(actor, userId, deps, context.signal);

  await deps.userStore.unlockUser(actor.tenantId, userId, { signal: context.signal });
  await deps.audit.record(
    {
      tenantId: actor.tenantId,
      eventType: AuditEventType.ACCOUNT_UNLOCKED,
      actorId: actor.userId,
      resourceType: 'user',
      resourceId: userId,
      outcome: 'success',
    },
    context,
  );
}

/**
 * Grant a named scope to a user.
 *
 * @returns The new scope record
 */
export async function grantScope(
  actor: Actor,
  userId: string,
  scope: string,
  expiresAt: Date | null,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<UserScope> {
  requireAdmin(actor);
  if (!SCOPE_PATTERN.test(scope)) {
    throw validationError('Invalid scope name.', { scope: ['Must be a lowercase scope name'] });
  }
  if (expiresAt && expiresAt.getTime() <= clock(deps).getTime()) {
    throw validationError('Scope expiry must be in the future.', {
      expiresAt: ['Must be in the future'],
    });
  }
  await requireUser(actor, userId, deps, context.signal);

  const created = await deps.scopeStore.createScope(
    { userId, tenantId: actor.tenantId, scope, grantedBy: actor.userId, expiresAt },
    { signal: context.signal },
  );

  await deps.audit.record(
    {
      tenantId: actor.tenantId,
      eventType: AuditEventType.SCOPE_GRANTED,
      actorId: actor.userId,
      resourceType: 'user_scope',
      resourceId: created.id,
      outcome: 'success',
      metadata: { userId, scope },
    },
    context,
  );
  return created;
}

/**
 * Revoke a scope. Revoking an already revoked scope is a no-op.
 */
export async function revokeScope(
  actor: Actor,
  scopeId: string,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<void> {
  requireAdmin(actor);
  const existing = await deps.scopeStore.findScopeById(actor.tenantId, scopeId, {
    signal: context.signal,
  });
  if (!existing) {
    throw notFound('Scope', scopeId);
  }
  if (existing.isRevoked) {
    return;
  }

  await deps.scopeStore.revokeScope(actor.tenantId, scopeId, clock(deps), {
    signal: context.signal,
  });
  await deps.audit.record(
    {
      tenantId: actor.tenantId,
      eventType: AuditEventType.SCOPE_REVOKED,
      actorId: actor.userId,
      resourceType: 'user_scope',
      resourceId: scopeId,
      outcome: 'success',
      metadata: { userId: existing.userId, scope: existing.scope },
    },
    context,
  );
}

export async function listActiveScopes(
  actor: Actor,
  userId: string,
  deps: CredentialAdminDeps,
  signal?: AbortSignal,
): Promise<UserScope[]> {
  requireAdmin(actor);
  return deps.scopeStore.findActiveScopes(actor.tenantId, userId, clock(deps), { signal });
}

/**
 * Soft-delete a user and revoke their sessions. The row is kept.
 */
export async function softDeleteUser(
  actor: Actor,
  userId: string,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<void> {
  requireAdmin(actor);
  if (userId === actor.userId) {
    throw validationError('Administrators cannot delete their own account.');
  }
  await requireUser(actor, userId, deps, context.signal);

  const now = clock(deps);
  await deps.userStore.softDeleteUser(actor.tenantId, userId, now, { signal: context.signal });
  const revokedSessions = await revokeAllSessions(
    { userId, tenantId: actor.tenantId },
    'user_deleted',
    deps,
    context.signal,
  );

  await deps.audit.record(
    {
      tenantId: actor.tenantId,
      eventType: AuditEventType.USER_DELETED,
      actorId: actor.userId,
      resourceType: 'user',
      resourceId: userId,
      outcome: 'success',
      metadata: { revokedSessions },
    },
    context,
  );
}
