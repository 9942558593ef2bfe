/**
 * Session service: the refresh-token ledger.
 *
 * Opens sessions on login, looks them up by raw refresh token, rotates
 * them on refresh and revokes them on logout or administrative action.
 * The raw token is returned to the caller once and never stored.
 *
 * @module services/sessionService
 */

import type { SessionPolicy } from '../config/index.js';
import type { RequestContext, Session } from '../types/index.js';
import type { QueryOptions } from '../utils/db.js';
import type { NewSession } from '../repositories/sessionRepository.js';
import { isSessionActive } from '../utils/effectiveStatus.js';
import { generateRefreshToken, hashRefreshToken } from './tokenService.js';

// ─── Dependency Interfaces ───────────────────────────────────────────────────

/** Subset of sessionRepository used by the session service. */
export interface SessionStore {
  createSession(session: NewSession, options?: QueryOptions): Promise<Session>;
  findByTokenHash(refreshTokenHash: string, options?: QueryOptions): Promise<Session | null>;
  findActiveByUserId(
    tenantId: string,
    userId: string,
    now: Date,
    options?: QueryOptions,
  ): Promise<Session[]>;
  rotateSession(
    oldSessionId: string,
    replacement: NewSession,
    now: Date,
    signal?: AbortSignal,
  ): Promise<Session | null>;
  revokeSession(
    sessionId: string,
    reason: string,
    at: Date,
    options?: QueryOptions,
  ): Promise<boolean>;
  revokeAllForUser(
    tenantId: string,
    userId: string,
    reason: string,
    at: Date,
    options?: QueryOptions,
  ): Promise<number>;
}

export interface SessionServiceDeps {
  sessionStore: SessionStore;
  sessionPolicy: SessionPolicy;
  now?: () => Date;
}

// ─── Types ───────────────────────────────────────────────────────────────────

/** A session together with the raw refresh token that opens it. */
export interface IssuedSession {
  session: Session;
  refreshToken: string;
}

export type SessionLookup =
  | { status: 'active'; session: Session }
  | { status: 'revoked'; session: Session }
  | { status: 'expired'; session: Session }
  | { status: 'not_found' };

export type RevokeOutcome = 'revoked' | 'already_revoked' | 'not_found';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function clock(deps: SessionServiceDeps): Date {
  return deps.now ? deps.now() : new Date();
}

function newSessionFor(
  owner: { userId: string; tenantId: string },
  context: RequestContext,
  deps: SessionServiceDeps,
  now: Date,
): { record: NewSession; refreshToken: string } {
  const refreshToken = generateRefreshToken();
  return {
    refreshToken,
    record: {
      userId: owner.userId,
      tenantId: owner.tenantId,
      refreshTokenHash: hashRefreshToken(refreshToken),
      expiresAt: new Date(now.getTime() + deps.sessionPolicy.refreshTokenTtlMs),
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    },
  };
}

// ─── Operations ──────────────────────────────────────────────────────────────

/**
 * Open a new session for a freshly authenticated user.
 */
export async function openSession(
  owner: { userId: string; tenantId: string },
  context: RequestContext,
  deps: SessionServiceDeps,
): Promise<IssuedSession> {
  const { record, refreshToken } = newSessionFor(owner, context, deps, clock(deps));
  const session = await deps.sessionStore.createSession(record, { signal: context.signal });
  return { session, refreshToken };
}

/**
 * Resolve a raw refresh token to its session and effective state.
 */
export async function lookupSession(
  refreshToken: string,
  deps: SessionServiceDeps,
  signal?: AbortSignal,
): Promise<SessionLookup> {
  const session = await deps.sessionStore.findByTokenHash(hashRefreshToken(refreshToken), {
    signal,
  });
  if (!session) return { status: 'not_found' };
  if (session.isRevoked) return { status: 'revoked', session };
  if (!isSessionActive(session, clock(deps))) return { status: 'expired', session };
  return { status: 'active', session };
}

/**
 * Replace a session with a new one carrying a fresh refresh token.
 *
 * @returns The new session, or null when another rotation (or a revoke)
 *   got to the old session first
 */
export async function rotateSession(
  session: Session,
  context: RequestContext,
  deps: SessionServiceDeps,
): Promise<IssuedSession | null> {
  const now = clock(deps);
  const { record, refreshToken } = newSessionFor(session, context, deps, now);
  const rotated = await deps.sessionStore.rotateSession(session.id, record, now, context.signal);
  return rotated ? { session: rotated, refreshToken } : null;
}

/**
 * Revoke the session a raw refresh token belongs to.
 */
export async function revokeSessionByToken(
  refreshToken: string,
  reason: string,
  context: RequestContext,
  deps: SessionServiceDeps,
): Promise<{ outcome: RevokeOutcome; session: Session | null }> {
  const session = await deps.sessionStore.findByTokenHash(hashRefreshToken(refreshToken), {
    signal: context.signal,
  });
  if (!session) return { outcome: 'not_found', session: null };
  if (session.isRevoked) return { outcome: 'already_revoked', session };

  const revoked = await deps.sessionStore.revokeSession(session.id, reason, clock(deps), {
    signal: context.signal,
  });
  return { outcome: revoked ? 'revoked' : 'already_revoked', session };
}

/**
 * Revoke every unrevoked session of a user.
 *
 * @returns Number of sessions revoked
 */
export async function revokeAllSessions(
  owner: { userId: string; tenantId: string },
  reason: string,
  deps: SessionServiceDeps,
  signal?: AbortSignal,
): Promise<number> {
  return deps.sessionStore.revokeAllForUser(owner.tenantId, owner.userId, reason, clock(deps), {
    signal,
  });
}

export async function listActiveSessions(
  owner: { userId: string; tenantId: string },
  deps: SessionServiceDeps,
  signal?: AbortSignal,
): Promise<Session[]> {
  return deps.sessionStore.findActiveByUserId(owner.tenantId, owner.userId, clock(deps), {
    signal,
  });
}
