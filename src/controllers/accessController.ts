/**
 * Patient access controller: grant ledger and emergency access endpoints.
 *
 * Request shapes are checked here; authority, existence and policy checks
 * stay in the services, whose {@link EngineError}s propagate to the app's
 * error handler.
 *
 * @module controllers/accessController
 */

import type {
  AccessTokenClaims,
  PagedResult,
  PatientAccess,
  RequestContext,
} from '../types/index.js';
import type { AccessGrantService } from '../access/accessGrantService.js';
import type {
  EmergencyAccessService,
  EmergencyGrant,
} from '../access/emergencyAccessService.js';
import { formatSuccess } from '../utils/responses.js';
import {
  validateEmergencyAccessRequest,
  validateExtendAccessRequest,
  validateGrantAccessRequest,
  validateListAccessQuery,
  validateRevokeAccessRequest,
} from '../utils/validators/requestValidators.js';
import { toActor } from '../middleware/authenticate.js';
import { invalidRequest, type ApiResponse } from './authController.js';

export interface AccessControllerDeps {
  grants: AccessGrantService;
  emergency: EmergencyAccessService;
}

export async function grantAccess(
  claims: AccessTokenClaims,
  patientId: string,
  body: unknown,
  context: RequestContext,
  deps: AccessControllerDeps,
): Promise<ApiResponse<{ grantId: string }>> {
  const validation = validateGrantAccessRequest(patientId, body);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }
  const grantId = await deps.grants.grant(toActor(claims), validation.value, context);
  return formatSuccess({ grantId });
}

export async function revokeAccess(
  claims: AccessTokenClaims,
  grantId: string,
  body: unknown,
  context: RequestContext,
  deps: AccessControllerDeps,
): Promise<ApiResponse<{ grantId: string; revoked: true }>> {
  const validation = validateRevokeAccessRequest(body);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }
  await deps.grants.revoke(grantId, toActor(claims), validation.value.reason, context);
  return formatSuccess({ grantId, revoked: true });
}

export async function extendAccess(
  claims: AccessTokenClaims,
  grantId: string,
  body: unknown,
  context: RequestContext,
  deps: AccessControllerDeps,
): Promise<ApiResponse<{ grantId: string; expiresAt: Date }>> {
  const validation = validateExtendAccessRequest(body);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }
  const expiresAt = await deps.grants.extendAccess(
    grantId,
    toActor(claims),
    validation.value.expiresAt,
    context,
  );
  return formatSuccess({ grantId, expiresAt });
}

export async function listAccess(
  claims: AccessTokenClaims,
  query: unknown,
  context: RequestContext,
  deps: AccessControllerDeps,
): Promise<ApiResponse<PagedResult<PatientAccess>>> {
  const validation = validateListAccessQuery(query);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }
  const { filter, page } = validation.value;
  const result = await deps.grants.listAccess(toActor(claims), filter, page, context.signal);
  return formatSuccess(result);
}

export async function listAccessiblePatients(
  claims: AccessTokenClaims,
  context: RequestContext,
  deps: AccessControllerDeps,
): Promise<ApiResponse<{ patientIds: string[] }>> {
  const patientIds = await deps.grants.getAccessiblePatients(toActor(claims), context.signal);
  return formatSuccess({ patientIds });
}

export async function createEmergencyAccess(
  claims: AccessTokenClaims,
  patientId: string,
  body: unknown,
  context: RequestContext,
  deps: AccessControllerDeps,
): Promise<ApiResponse<EmergencyGrant>> {
  const validation = validateEmergencyAccessRequest(body);
  if (!validation.valid) {
    return invalidRequest(validation.errors, context.requestId);
  }
  const { justification, durationMinutes } = validation.value;
  const grant = await deps.emergency.createEmergencyAccess(
    toActor(claims),
    patientId,
    justification,
    durationMinutes,
    context,
  );
  return formatSuccess(grant);
}
