/**
 * Request body and query validation for the HTTP adapter.
 *
 * Each validator takes the untrusted JSON body (or parsed query string)
 * and either narrows it to the typed request the services accept or
 * reports every offending field at once.
 *
 * @module utils/validators/requestValidators
 */

import { AccessLevel, parseAccessLevel } from '../../types/index.js';
import type { LoginRequest } from '../../services/authService.js';
import type { GrantAccessInput, ListAccessFilter, PageRequest } from '../../access/types.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type RequestValidation<T> =
  | { valid: true; value: T }
  | { valid: false; errors: Record<string, string[]> };

const MAX_USERNAME_LENGTH = 256;
const MAX_PASSWORD_LENGTH = 1024;
const MAX_REASON_LENGTH = 1000;
const MAX_JUSTIFICATION_LENGTH = 2000;

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class FieldErrors {
  readonly errors: Record<string, string[]> = {};

  add(field: string, message: string): void {
    (this.errors[field] ??= []).push(message);
  }

  get empty(): boolean {
    return Object.keys(this.errors).length === 0;
  }
}

function requiredString(
  source: Record<string, unknown>,
  field: string,
  errors: FieldErrors,
  maxLength: number,
): string {
  const value = source[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    errors.add(field, 'Required');
    return '';
  }
  if (value.length > maxLength) {
    errors.add(field, `Must be at most ${maxLength} characters`);
  }
  return value;
}

function optionalString(
  source: Record<string, unknown>,
  field: string,
  errors: FieldErrors,
  maxLength: number,
): string | null {
  const value = source[field];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    errors.add(field, 'Must be a string');
    return null;
  }
  if (value.length > maxLength) {
    errors.add(field, `Must be at most ${maxLength} characters`);
  }
  return value;
}

function optionalDate(
  source: Record<string, unknown>,
  field: string,
  errors: FieldErrors,
): Date | null {
  const value = source[field];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    errors.add(field, 'Must be an ISO 8601 timestamp');
    return null;
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    errors.add(field, 'Must be an ISO 8601 timestamp');
    return null;
  }
  return parsed;
}

function optionalPositiveInt(
  source: Record<string, unknown>,
  field: string,
  errors: FieldErrors,
): number | undefined {
  const value = source[field];
  if (value === undefined) return undefined;
  const parsed = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    errors.add(field, 'Must be a positive integer');
    return undefined;
  }
  return parsed;
}

function finish<T>(errors: FieldErrors, value: T): RequestValidation<T> {
  return errors.empty ? { valid: true, value } : { valid: false, errors: errors.errors };
}

function notAnObject<T>(): RequestValidation<T> {
  return { valid: false, errors: { body: ['Must be a JSON object'] } };
}

// ─── Auth ────────────────────────────────────────────────────────────────────

export function validateLoginRequest(body: unknown): RequestValidation<LoginRequest> {
  if (!isRecord(body)) return notAnObject();
  const errors = new FieldErrors();
  const username = requiredString(body, 'username', errors, MAX_USERNAME_LENGTH);
  const password = requiredString(body, 'password', errors, MAX_PASSWORD_LENGTH);
  const tenantId = requiredString(body, 'tenantId', errors, MAX_USERNAME_LENGTH);
  return finish(errors, { username, password, tenantId });
}

/** Refresh and logout both carry just the opaque refresh token. */
export function validateRefreshTokenRequest(
  body: unknown,
): RequestValidation<{ refreshToken: string }> {
  if (!isRecord(body)) return notAnObject();
  const errors = new FieldErrors();
  const refreshToken = requiredString(body, 'refreshToken', errors, MAX_PASSWORD_LENGTH);
  return finish(errors, { refreshToken });
}

// ─── Access ──────────────────────────────────────────────────────────────────

export function validateGrantAccessRequest(
  patientId: string,
  body: unknown,
): RequestValidation<GrantAccessInput> {
  if (!isRecord(body)) return notAnObject();
  const errors = new FieldErrors();
  const userId = requiredString(body, 'userId', errors, MAX_USERNAME_LENGTH);

  const accessLevel = parseAccessLevel(body['accessLevel']);
  if (!accessLevel) {
    errors.add('accessLevel', `Must be one of ${Object.values(AccessLevel).join(', ')}`);
  }

  const reason = optionalString(body, 'reason', errors, MAX_REASON_LENGTH);
  const expiresAt = optionalDate(body, 'expiresAt', errors);

  if (!accessLevel) return { valid: false, errors: errors.errors };
  return finish(errors, { userId, patientId, accessLevel, reason, expiresAt });
}

export function validateRevokeAccessRequest(
  body: unknown,
): RequestValidation<{ reason: string | null }> {
  if (body === undefined || body === null) return { valid: true, value: { reason: null } };
  if (!isRecord(body)) return notAnObject();
  const errors = new FieldErrors();
  const reason = optionalString(body, 'reason', errors, MAX_REASON_LENGTH);
  return finish(errors, { reason });
}

export function validateExtendAccessRequest(
  body: unknown,
): RequestValidation<{ expiresAt: Date }> {
  if (!isRecord(body)) return notAnObject();
  const errors = new FieldErrors();
  const expiresAt = optionalDate(body, 'expiresAt', errors);
  if (!expiresAt) {
    if (errors.empty) errors.add('expiresAt', 'Required');
    return { valid: false, errors: errors.errors };
  }
  return finish(errors, { expiresAt });
}

export interface EmergencyAccessRequest {
  justification: string;
  durationMinutes: number;
}

export function validateEmergencyAccessRequest(
  body: unknown,
): RequestValidation<EmergencyAccessRequest> {
  if (!isRecord(body)) return notAnObject();
  const errors = new FieldErrors();
  const justification = requiredString(body, 'justification', errors, MAX_JUSTIFICATION_LENGTH);

  const duration = body['durationMinutes'];
  let durationMinutes = 0;
  if (typeof duration !== 'number' || !Number.isInteger(duration) || duration <= 0) {
    errors.add('durationMinutes', 'Must be a positive whole number of minutes');
  } else {
    durationMinutes = duration;
  }

  return finish(errors, { justification, durationMinutes });
}

export interface ListAccessQuery {
  filter: ListAccessFilter;
  page: PageRequest;
}

/** Query-string values arrive as strings; repeated keys arrive as arrays and are rejected. */
export function validateListAccessQuery(query: unknown): RequestValidation<ListAccessQuery> {
  if (!isRecord(query)) return notAnObject();
  const errors = new FieldErrors();
  const filter: ListAccessFilter = {};

  const patientId = optionalString(query, 'patientId', errors, MAX_USERNAME_LENGTH);
  if (patientId) filter.patientId = patientId;

  const userId = optionalString(query, 'userId', errors, MAX_USERNAME_LENGTH);
  if (userId) filter.userId = userId;

  if (query['accessLevel'] !== undefined) {
    const accessLevel = parseAccessLevel(query['accessLevel']);
    if (accessLevel) filter.accessLevel = accessLevel;
    else errors.add('accessLevel', `Must be one of ${Object.values(AccessLevel).join(', ')}`);
  }

  const isActive = query['isActive'];
  if (isActive === 'true') filter.isActive = true;
  else if (isActive === 'false') filter.isActive = false;
  else if (isActive !== undefined) errors.add('isActive', 'Must be true or false');

  const page: PageRequest = {};
  const pageNumber = optionalPositiveInt(query, 'page', errors);
  if (pageNumber !== undefined) page.page = pageNumber;
  const pageSize = optionalPositiveInt(query, 'pageSize', errors);
  if (pageSize !== undefined) page.pageSize = pageSize;

  return finish(errors, { filter, page });
}

// ─── Administration ──────────────────────────────────────────────────────────

export function validateLockUserRequest(body: unknown): RequestValidation<{ lockedUntil: Date }> {
  if (!isRecord(body)) return notAnObject();
  const errors = new FieldErrors();
  const lockedUntil = optionalDate(body, 'lockedUntil', errors);
  if (!lockedUntil) {
    if (errors.empty) errors.add('lockedUntil', 'Required');
    return { valid: false, errors: errors.errors };
  }
  return finish(errors, { lockedUntil });
}

export function validateGrantScopeRequest(
  body: unknown,
): RequestValidation<{ scope: string; expiresAt: Date | null }> {
  if (!isRecord(body)) return notAnObject();
  const errors = new FieldErrors();
  const scope = requiredString(body, 'scope', errors, MAX_USERNAME_LENGTH);
  const expiresAt = optionalDate(body, 'expiresAt', errors);
  return finish(errors, { scope, expiresAt });
}
