/**
 * Uniform security messages.
 *
 * Credential and token failures, and access denials, each map to a single
 * message regardless of the underlying reason (unknown username vs wrong
 * password; unknown vs revoked vs expired refresh token; no grant vs
 * consent denial). Only the audit trail records the differentiated reason.
 *
 * @module utils/securityResponses
 */

import { ENGINE_ERROR_CODES } from './errors.js';
import { formatErrorResponse, type ErrorResponse } from './responses.js';

// ─── Constants ───────────────────────────────────────────────────────────────

/** The single message returned for any failed login attempt. */
export const LOGIN_FAILURE_MESSAGE = 'The username or password you entered is incorrect.';

export const ACCOUNT_LOCKED_MESSAGE =
  'This account is temporarily locked. Please try again later.';

/** Returned for any unusable refresh or access token. */
export const INVALID_TOKEN_MESSAGE =
  'Your session is invalid or has expired. Please sign in again.';

/** Returned for every access-decision denial. */
export const ACCESS_DENIED_MESSAGE = 'You do not have access to this resource.';

// ─── Response Builders ───────────────────────────────────────────────────────

export function buildLoginFailureResponse(requestId?: string): ErrorResponse {
  return formatErrorResponse(
    ENGINE_ERROR_CODES.INVALID_CREDENTIALS,
    LOGIN_FAILURE_MESSAGE,
    requestId,
  );
}

export function buildAccountLockedResponse(requestId?: string, retryAfter?: Date): ErrorResponse {
  const response = formatErrorResponse(
    ENGINE_ERROR_CODES.ACCOUNT_LOCKED,
    ACCOUNT_LOCKED_MESSAGE,
    requestId,
  );
  if (retryAfter) response.error.retryAfter = retryAfter.toISOString();
  return response;
}

export function buildInvalidTokenResponse(requestId?: string): ErrorResponse {
  return formatErrorResponse(ENGINE_ERROR_CODES.INVALID_TOKEN, INVALID_TOKEN_MESSAGE, requestId);
}

export function buildAccessDeniedResponse(requestId?: string): ErrorResponse {
  return formatErrorResponse(ENGINE_ERROR_CODES.FORBIDDEN, ACCESS_DENIED_MESSAGE, requestId);
}
