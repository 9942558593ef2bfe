/**
 * Credential administration endpoints: account locks, soft deletion and
 * user scopes. The service enforces the administrator role.
 *
 * @module controllers/adminController
 */

import type { AccessTokenClaims, RequestContext, UserScope } from '../types/index.js';
import * as credentialService from '../services/credentialService.js';
import type { CredentialAdminDeps } from '../services/credentialService.js';
import { formatSuccess } from '../utils/responses.js';
import {
  validateGrantScopeRequest,
  validateLockUserRequest,
} from '../utils/validators/requestValidators.js';
import { toActor } from '../middleware/authenticate.js';
import { invalidRequest, type ApiResponse } from './authController.js';

export async function lockUser(
  claims: AccessTokenClaims,
  userId: string,
  body: unknown,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<ApiResponse<{ userId: string; lockedUntil: Date }>> {
  const validation = validateLockUserRequest(body);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }
  const { lockedUntil } = validation.value;
  await credentialService.lockUser(toActor(claims), userId, lockedUntil, context, deps);
  return formatSuccess({ userId, lockedUntil });
}

export async function unlockUser(
  claims: AccessTokenClaims,
  userId: string,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<ApiResponse<{ userId: string }>> {
  await credentialService.unlockUser(toActor(claims), userId, context, deps);
  return formatSuccess({ userId });
}

export async function deleteUser(
  claims: AccessTokenClaims,
  userId: string,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<ApiResponse<{ userId: string; deleted: true }>> {
  await credentialService.softDeleteUser(toActor(claims), userId, context, deps);
  return formatSuccess({ userId, deleted: true });
}

export async function listScopes(
  claims: AccessTokenClaims,
  userId: string,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<ApiResponse<UserScope[]>> {
  const scopes = await credentialService.listActiveScopes(
    toActor(claims),
    userId,
    deps,
    context.signal,
  );
  return formatSuccess(scopes);
}

export async function grantScope(
  claims: AccessTokenClaims,
  userId: string,
  body: unknown,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<ApiResponse<UserScope>> {
  const validation = validateGrantScopeRequest(body);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }
  const { scope, expiresAt } = validation.value;
  const created = await credentialService.grantScope(
    toActor(claims),
    userId,
    scope,
    expiresAt,
    context,
    deps,
  );
  return formatSuccess(created);
}

export async function revokeScope(
  claims: AccessTokenClaims,
  scopeId: string,
  context: RequestContext,
  deps: CredentialAdminDeps,
): Promise<ApiResponse<{ scopeId: string; revoked: true }>> {
  await credentialService.revokeScope(toActor(claims), scopeId, context, deps);
  return formatSuccess({ scopeId, revoked: true });
}
