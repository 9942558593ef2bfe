/**
 * Authenticator: credential check, lockout policy, token issuance and
 * session lifecycle.
 *
 * Uses dependency injection for every collaborator (stores, password
 * hasher, token codec, audit recorder) so the flows can be unit tested
 * against in-memory fakes.
 *
 * Failures are returned as {@link AuthFailure} results carrying a generic
 * message; the audit trail records the specific reason. Store outages are
 * thrown as `STORE_UNAVAILABLE` and are never reported as bad credentials.
 *
 * @module services/authService
 */

import type { LockoutPolicy } from '../config/index.js';
import {
  AuditEventType,
  UserRole,
  UserStatus,
  type AccessTokenClaims,
  type Actor,
  type RequestContext,
  type TokenPair,
  type User,
  type UserInfo,
  type UserScope,
} from '../types/index.js';
import type { QueryOptions } from '../utils/db.js';
import { ENGINE_ERROR_CODES } from '../utils/errors.js';
import {
  ACCOUNT_LOCKED_MESSAGE,
  INVALID_TOKEN_MESSAGE,
  LOGIN_FAILURE_MESSAGE,
} from '../utils/securityResponses.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { FailedLoginResult } from '../repositories/userRepository.js';
import type { AuditRecorder } from '../audit/auditRecorder.js';
import { DUMMY_PASSWORD_HASH } from './passwordService.js';
import type { IssuedSession, SessionServiceDeps } from './sessionService.js';
import {
  lookupSession,
  openSession,
  revokeAllSessions,
  revokeSessionByToken,
  rotateSession,
} from './sessionService.js';
import type { TokenCodec } from './tokenService.js';

// ─── Dependency Interfaces ───────────────────────────────────────────────────

/** Subset of userRepository used by the authenticator. */
export interface CredentialStore {
  findByUsername(tenantId: string, username: string, options?: QueryOptions): Promise<User | null>;
  findById(tenantId: string, id: string, options?: QueryOptions): Promise<User | null>;
  recordFailedLogin(
    tenantId: string,
    userId: string,
    threshold: number,
    lockUntil: Date,
    options?: QueryOptions,
  ): Promise<FailedLoginResult | null>;
  clearExpiredLock(
    tenantId: string,
    userId: string,
    now: Date,
    options?: QueryOptions,
  ): Promise<boolean>;
  recordSuccessfulLogin(
    tenantId: string,
    userId: string,
    ipAddress: string,
    at: Date,
    options?: QueryOptions,
  ): Promise<boolean>;
}

/** Subset of userScopeRepository used to build token scopes. */
export interface ScopeStore {
  findActiveScopes(
    tenantId: string,
    userId: string,
    now: Date,
    options?: QueryOptions,
  ): Promise<UserScope[]>;
}

/** Subset of passwordService used by the authenticator. */
export interface PasswordVerifier {
  verifyPassword(plaintext: string, hash: string): Promise<boolean>;
}

export interface ProfileDeps {
  credentialStore: Pick<CredentialStore, 'findById'>;
  scopeStore: ScopeStore;
  now?: () => Date;
}

/** All dependencies required by the authenticator. */
export interface AuthDeps extends SessionServiceDeps {
  credentialStore: CredentialStore;
  scopeStore: ScopeStore;
  passwords: PasswordVerifier;
  codec: TokenCodec;
  audit: AuditRecorder;
  lockoutPolicy: LockoutPolicy;
  logger?: Logger;
}

// ─── Results ─────────────────────────────────────────────────────────────────

export interface LoginRequest {
  username: string;
  password: string;
  tenantId: string;
}

export type AuthFailureCode =
  | typeof ENGINE_ERROR_CODES.INVALID_CREDENTIALS
  | typeof ENGINE_ERROR_CODES.ACCOUNT_LOCKED
  | typeof ENGINE_ERROR_CODES.INVALID_TOKEN;

export interface AuthFailure {
  success: false;
  code: AuthFailureCode;
  message: string;
  /** When a locked account may try again. */
  retryAfter?: Date;
}

export interface LoginSuccess {
  success: true;
  user: UserInfo;
  tokens: TokenPair;
}

export interface RefreshSuccess {
  success: true;
  tokens: TokenPair;
}

export interface LogoutSuccess {
  success: true;
}

export interface LogoutAllSuccess {
  success: true;
  revokedSessions: number;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

const MS_PER_MINUTE = 60 * 1000;

function clock(deps: { now?: () => Date }): Date {
  return deps.now ? deps.now() : new Date();
}

function invalidCredentials(): AuthFailure {
  return {
    success: false,
    code: ENGINE_ERROR_CODES.INVALID_CREDENTIALS,
    message: LOGIN_FAILURE_MESSAGE,
  };
}

function accountLocked(retryAfter: Date | null): AuthFailure {
  const failure: AuthFailure = {
    success: false,
    code: ENGINE_ERROR_CODES.ACCOUNT_LOCKED,
    message: ACCOUNT_LOCKED_MESSAGE,
  };
  if (retryAfter) failure.retryAfter = retryAfter;
  return failure;
}

function invalidToken(): AuthFailure {
  return { success: false, code: ENGINE_ERROR_CODES.INVALID_TOKEN, message: INVALID_TOKEN_MESSAGE };
}

/** Practitioner ids are only exposed for healthcare providers. */
function practitionerOf(user: User): string | null {
  return user.role === UserRole.HEALTHCARE_PROVIDER ? user.practitionerId : null;
}

/** Public projection of a user. */
export function toUserInfo(user: User, scopes: readonly string[]): UserInfo {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    fullName: `${user.firstName} ${user.lastName}`.trim(),
    role: user.role,
    practitionerId: practitionerOf(user),
    tenantId: user.tenantId,
    scopes: [...scopes],
  };
}

type LockState = 'locked' | 'lock_expired' | 'unlocked';

function lockStateOf(user: User, now: Date): LockState {
  if (user.status !== UserStatus.LOCKED) return 'unlocked';
  // A lock without an end time holds until an administrator lifts it
  if (user.lockedUntil === null || user.lockedUntil.getTime() > now.getTime()) return 'locked';
  return 'lock_expired';
}

async function loadScopes(user: User, deps: ProfileDeps, signal?: AbortSignal): Promise<string[]> {
  const scopes = await deps.scopeStore.findActiveScopes(user.tenantId, user.id, clock(deps), {
    signal,
  });
  return scopes.map((s) => s.scope);
}

function issueTokens(
  user: User,
  scopes: readonly string[],
  issued: IssuedSession,
  deps: AuthDeps,
): TokenPair {
  const access = deps.codec.issue({
    userId: user.id,
    username: user.username,
    role: user.role,
    tenantId: user.tenantId,
    scopes,
    practitionerId: practitionerOf(user),
  });
  return {
    accessToken: access.token,
    refreshToken: issued.refreshToken,
    accessTokenExpiresAt: access.expiresAt,
    refreshTokenExpiresAt: issued.session.expiresAt,
  };
}

// ─── Authenticate ────────────────────────────────────────────────────────────

/**
 * Check a username/password pair and open a session.
 *
 * Flow:
 * 1. Find the user by username within the tenant
 * 2. Unknown user: burn a dummy hash comparison, fail generically
 * 3. Locked with a future lock-until: fail with AccountLocked, no password check
 * 4. Locked with a past lock-until: clear the lock
 * 5. Any other non-Active status: fail generically
 * 6. Wrong password: atomically count the failure, lock at the threshold
 * 7. Success: reset the counter of a still-Active user, issue tokens, open a session
 */
export async function authenticate(
  request: LoginRequest,
  context: RequestContext,
  deps: AuthDeps,
): Promise<LoginSuccess | AuthFailure> {
  const { tenantId } = request;
  const signal = context.signal;
  const logger = (deps.logger ?? silentLogger).child({
    tenantId,
    operation: 'authenticate',
    correlationId: context.requestId,
  });
  const now = clock(deps);

  // 1. Find user
  let user = await deps.credentialStore.findByUsername(tenantId, request.username, { signal });

  // 2. Unknown user: equal work, uniform failure
  if (!user) {
    await deps.passwords.verifyPassword(request.password, DUMMY_PASSWORD_HASH);
    await deps.audit.recordAuth(
      {
        tenantId,
        eventType: AuditEventType.LOGIN_FAILURE,
        actorId: null,
        outcome: 'failure',
        reason: 'user_not_found',
        metadata: { username: request.username },
      },
      context,
    );
    return invalidCredentials();
  }

  // 3-4. Lock handling
  let lockState = lockStateOf(user, now);
  if (lockState === 'lock_expired') {
    const cleared = await deps.credentialStore.clearExpiredLock(tenantId, user.id, now, { signal });
    if (cleared) {
      user = { ...user, status: UserStatus.ACTIVE, failedLoginAttempts: 0, lockedUntil: null };
    } else {
      // Someone else changed the row; judge the current state
      user = await deps.credentialStore.findById(tenantId, user.id, { signal });
      if (!user) return invalidCredentials();
    }
    lockState = lockStateOf(user, now);
  }

  if (lockState === 'locked') {
    await deps.audit.recordAuth(
      {
        tenantId,
        eventType: AuditEventType.LOGIN_FAILURE,
        actorId: user.id,
        outcome: 'failure',
        reason: 'account_locked',
      },
      context,
    );
    return accountLocked(user.lockedUntil);
  }

  // 5. Inactive accounts
  if (user.status !== UserStatus.ACTIVE) {
    await deps.audit.recordAuth(
      {
        tenantId,
        eventType: AuditEventType.LOGIN_FAILURE,
        actorId: user.id,
        outcome: 'failure',
        reason: 'account_inactive',
        metadata: { status: user.status },
      },
      context,
    );
    return invalidCredentials();
  }

  // 6. Password check
  const passwordValid = await deps.passwords.verifyPassword(request.password, user.passwordHash);
  if (!passwordValid) {
    const lockUntil = new Date(now.getTime() + deps.lockoutPolicy.durationMinutes * MS_PER_MINUTE);
    const counted = await deps.credentialStore.recordFailedLogin(
      tenantId,
      user.id,
      deps.lockoutPolicy.threshold,
      lockUntil,
      { signal },
    );

    await deps.audit.recordAuth(
      {
        tenantId,
        eventType: AuditEventType.LOGIN_FAILURE,
        actorId: user.id,
        outcome: 'failure',
        reason: 'invalid_password',
        metadata: { failedLoginAttempts: counted?.failedLoginAttempts ?? null },
      },
      context,
    );

    if (counted && counted.status === UserStatus.LOCKED) {
      if (counted.failedLoginAttempts === deps.lockoutPolicy.threshold) {
        await deps.audit.recordAuth(
          {
            tenantId,
            eventType: AuditEventType.ACCOUNT_LOCKED,
            actorId: user.id,
            outcome: 'success',
            reason: 'failed_login_threshold',
            metadata: { lockedUntil: counted.lockedUntil?.toISOString() ?? null },
          },
          context,
        );
        logger.warn('Account locked after repeated failed logins', {
          userId: user.id,
          failedLoginAttempts: counted.failedLoginAttempts,
        });
      }
      return accountLocked(counted.lockedUntil);
    }

    return invalidCredentials();
  }

  // 7. Success, unless a concurrent failure changed the row after step 1
  const recorded = await deps.credentialStore.recordSuccessfulLogin(
    tenantId,
    user.id,
    context.ipAddress,
    now,
    { signal },
  );
  if (!recorded) {
    const current = await deps.credentialStore.findById(tenantId, user.id, { signal });
    const locked = current !== null && lockStateOf(current, now) === 'locked';
    await deps.audit.recordAuth(
      {
        tenantId,
        eventType: AuditEventType.LOGIN_FAILURE,
        actorId: user.id,
        outcome: 'failure',
        reason: locked ? 'account_locked' : 'account_inactive',
        metadata: { status: current?.status ?? null },
      },
      context,
    );
    return current && locked ? accountLocked(current.lockedUntil) : invalidCredentials();
  }
  const scopes = await loadScopes(user, deps, signal);
  const issued = await openSession({ userId: user.id, tenantId }, context, deps);
  const tokens = issueTokens(user, scopes, issued, deps);

  await deps.audit.recordAuth(
    {
      tenantId,
      eventType: AuditEventType.LOGIN_SUCCESS,
      actorId: user.id,
      outcome: 'success',
      metadata: { sessionId: issued.session.id },
    },
    context,
  );
  logger.info('User authenticated', { userId: user.id, sessionId: issued.session.id });

  return { success: true, user: toUserInfo(user, scopes), tokens };
}

// ─── Refresh ─────────────────────────────────────────────────────────────────

/**
 * Exchange a refresh token for a new token pair, rotating the session.
 *
 * The user is re-read so that role and scope changes take effect
 * immediately. Of several concurrent refreshes with the same token exactly
 * one succeeds.
 */
export async function refresh(
  refreshToken: string,
  context: RequestContext,
  deps: AuthDeps,
): Promise<RefreshSuccess | AuthFailure> {
  const signal = context.signal;
  const logger = (deps.logger ?? silentLogger).child({
    operation: 'refresh',
    correlationId: context.requestId,
  });

  const lookup = await lookupSession(refreshToken, deps, signal);
  if (lookup.status === 'not_found') {
    // No session means no tenant to file an audit event under
    logger.warn('Refresh with unknown token');
    return invalidToken();
  }

  const { session } = lookup;
  const fail = async (reason: string): Promise<AuthFailure> => {
    await deps.audit.recordAuth(
      {
        tenantId: session.tenantId,
        eventType: AuditEventType.TOKEN_REFRESH_FAILURE,
        actorId: session.userId,
        outcome: 'failure',
        reason,
        metadata: { sessionId: session.id },
      },
      context,
    );
    return invalidToken();
  };

  if (lookup.status !== 'active') {
    return fail(lookup.status === 'revoked' ? 'session_revoked' : 'session_expired');
  }

  const user = await deps.credentialStore.findById(session.tenantId, session.userId, { signal });
  if (!user || user.status !== UserStatus.ACTIVE) {
    return fail('user_inactive');
  }

  const rotated = await rotateSession(session, context, deps);
  if (!rotated) {
    return fail('concurrent_rotation');
  }

  const scopes = await loadScopes(user, deps, signal);
  const tokens = issueTokens(user, scopes, rotated, deps);

  await deps.audit.recordAuth(
    {
      tenantId: session.tenantId,
      eventType: AuditEventType.TOKEN_REFRESH,
      actorId: user.id,
      outcome: 'success',
      metadata: { previousSessionId: session.id, sessionId: rotated.session.id },
    },
    context,
  );

  return { success: true, tokens };
}

// ─── Logout ──────────────────────────────────────────────────────────────────

/**
 * Revoke the session behind a refresh token. Revoking an already revoked
 * session succeeds without change.
 */
export async function logout(
  refreshToken: string,
  context: RequestContext,
  deps: AuthDeps,
): Promise<LogoutSuccess | AuthFailure> {
  const { outcome, session } = await revokeSessionByToken(refreshToken, 'logout', context, deps);
  if (outcome === 'not_found' || !session) {
    return invalidToken();
  }

  await deps.audit.recordAuth(
    {
      tenantId: session.tenantId,
      eventType: AuditEventType.LOGOUT_SUCCESS,
      actorId: session.userId,
      outcome: 'success',
      metadata: { sessionId: session.id, alreadyRevoked: outcome === 'already_revoked' },
    },
    context,
  );

  return { success: true };
}

/**
 * Revoke every session of the calling user.
 */
export async function logoutAll(
  actor: Actor,
  context: RequestContext,
  deps: AuthDeps,
): Promise<LogoutAllSuccess> {
  const revokedSessions = await revokeAllSessions(actor, 'logout_all', deps, context.signal);

  await deps.audit.recordAuth(
    {
      tenantId: actor.tenantId,
      eventType: AuditEventType.SESSIONS_REVOKED,
      actorId: actor.userId,
      outcome: 'success',
      reason: 'logout_all',
      metadata: { revokedSessions },
    },
    context,
  );

  return { success: true, revokedSessions };
}

// ─── Current User ────────────────────────────────────────────────────────────

/**
 * Current profile for verified token claims, or null when the user has
 * since been deleted or deactivated.
 */
export async function getCurrentUser(
  claims: AccessTokenClaims,
  deps: ProfileDeps,
  signal?: AbortSignal,
): Promise<UserInfo | null> {
  const user = await deps.credentialStore.findById(claims.tenantId, claims.userId, { signal });
  if (!user || user.status !== UserStatus.ACTIVE) {
    return null;
  }
  return toUserInfo(user, await loadScopes(user, deps, signal));
}
