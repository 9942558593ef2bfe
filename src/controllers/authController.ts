/**
 * Authentication controller for the HTTP adapter.
 *
 * Validates the request body, calls the authenticator and turns its
 * result objects into API responses. All failures are reported with the
 * uniform messages from `utils/securityResponses`.
 *
 * @module controllers/authController
 */

import type { AccessTokenClaims, RequestContext, TokenPair, UserInfo } from '../types/index.js';
import * as authService from '../services/authService.js';
import type { AuthDeps, AuthFailure, ProfileDeps } from '../services/authService.js';
import { ENGINE_ERROR_CODES } from '../utils/errors.js';
import {
  formatErrorResponse,
  formatSuccess,
  type ErrorResponse,
  type SuccessResponse,
} from '../utils/responses.js';
import {
  buildAccountLockedResponse,
  buildInvalidTokenResponse,
  buildLoginFailureResponse,
} from '../utils/securityResponses.js';
import {
  validateLoginRequest,
  validateRefreshTokenRequest,
} from '../utils/validators/requestValidators.js';
import { toActor } from '../middleware/authenticate.js';

// ─── Response Shapes ─────────────────────────────────────────────────────────

export interface LoginResponseData {
  user: UserInfo;
  tokens: TokenPair;
}

export interface RefreshResponseData {
  tokens: TokenPair;
}

export interface LogoutAllResponseData {
  revokedSessions: number;
}

export type ApiResponse<T> = SuccessResponse<T> | ErrorResponse;

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function invalidRequest(
  errors: Record<string, string[]>,
  requestId?: string,
): ErrorResponse {
  return formatErrorResponse(
    ENGINE_ERROR_CODES.VALIDATION_ERROR,
    'The request is invalid.',
    requestId,
    errors,
  );
}

function toFailureResponse(failure: AuthFailure, requestId?: string): ErrorResponse {
  switch (failure.code) {
    case ENGINE_ERROR_CODES.ACCOUNT_LOCKED:
      return buildAccountLockedResponse(requestId, failure.retryAfter);
    case ENGINE_ERROR_CODES.INVALID_TOKEN:
      return buildInvalidTokenResponse(requestId);
    case ENGINE_ERROR_CODES.INVALID_CREDENTIALS:
      return buildLoginFailureResponse(requestId);
  }
}

// ─── Handlers ────────────────────────────────────────────────────────────────

export async function login(
  body: unknown,
  context: RequestContext,
  deps: AuthDeps,
): Promise<ApiResponse<LoginResponseData>> {
  const validation = validateLoginRequest(body);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }

  const result = await authService.authenticate(validation.value, context, deps);
  if (!result.success) {
    return toFailureResponse(result, context.requestId);
  }
  return formatSuccess({ user: result.user, tokens: result.tokens });
}

export async function refresh(
  body: unknown,
  context: RequestContext,
  deps: AuthDeps,
): Promise<ApiResponse<RefreshResponseData>> {
  const validation = validateRefreshTokenRequest(body);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }

  const result = await authService.refresh(validation.value.refreshToken, context, deps);
  if (!result.success) {
    return toFailureResponse(result, context.requestId);
  }
  return formatSuccess({ tokens: result.tokens });
}

export async function logout(
  body: unknown,
  context: RequestContext,
  deps: AuthDeps,
): Promise<ApiResponse<{ loggedOut: true }>> {
  const validation = validateRefreshTokenRequest(body);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }

  const result = await authService.logout(validation.value.refreshToken, context, deps);
  if (!result.success) {
    return toFailureResponse(result, context.requestId);
  }
  return formatSuccess({ loggedOut: true });
}

export async function logoutAll(
  claims: AccessTokenClaims,
  context: RequestContext,
  deps: AuthDeps,
): Promise<ApiResponse<LogoutAllResponseData>> {
  const result = await authService.logoutAll(toActor(claims), context, deps);
  return formatSuccess({ revokedSessions: result.revokedSessions });
}

/** A token whose user has since been deleted or deactivated is treated as invalid. */
export async function me(
  claims: AccessTokenClaims,
  context: RequestContext,
  deps: ProfileDeps,
): Promise<ApiResponse<UserInfo>> {
  const user = await authService.getCurrentUser(claims, deps, context.signal);
  if (!user) {
    return buildInvalidTokenResponse(context.requestId);
  }
  return formatSuccess(user);
}
