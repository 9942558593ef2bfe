/**
 * Error taxonomy for the patient access engine.
 *
 * Credential and token errors are deliberately coarse: callers never learn
 * which half of a username/password pair was wrong, or whether a refresh
 * token was unknown, revoked or expired. Decision-engine denials carry a
 * reason code that is written to the audit trail; the HTTP layer decides
 * how much of it to surface.
 *
 * @module utils/errors
 */

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const ENGINE_ERROR_CODES = {
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  ACCOUNT_LOCKED: 'ACCOUNT_LOCKED',
  INVALID_TOKEN: 'INVALID_TOKEN',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  OPERATION_CANCELLED: 'OPERATION_CANCELLED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type EngineErrorCode = (typeof ENGINE_ERROR_CODES)[keyof typeof ENGINE_ERROR_CODES];

export const DENY_REASONS = {
  NO_GRANT: 'NO_GRANT',
  INSUFFICIENT_LEVEL: 'INSUFFICIENT_LEVEL',
  CONSENT_DENIED: 'CONSENT_DENIED',
} as const;

export type DenyReason = (typeof DENY_REASONS)[keyof typeof DENY_REASONS];

/** Error codes the caller may retry: the store, not the request, was at fault. */
const TRANSIENT_CODES: ReadonlySet<EngineErrorCode> = new Set([
  ENGINE_ERROR_CODES.STORE_UNAVAILABLE,
]);

// ─── Error ───────────────────────────────────────────────────────────────────

/**
 * Typed error thrown by engine operations.
 *
 * `message` is safe to show to end users; `details` is for logs and the
 * audit trail only.
 */
export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'EngineError';
  }

  /** Whether the operation may succeed if retried unchanged. */
  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }
}

export function forbidden(message = 'You are not allowed to perform this action.'): EngineError {
  return new EngineError(ENGINE_ERROR_CODES.FORBIDDEN, message);
}

export function notFound(resource: string, id: string): EngineError {
  return new EngineError(ENGINE_ERROR_CODES.NOT_FOUND, `${resource} not found.`, { resource, id });
}

export function validationError(
  message: string,
  fields: Record<string, string[]> = {},
): EngineError {
  return new EngineError(ENGINE_ERROR_CODES.VALIDATION_ERROR, message, { fields });
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Extract an engine error code from an unknown thrown value, falling back
 * to INTERNAL_ERROR for anything that is not an {@link EngineError}.
 */
export function extractErrorCode(error: unknown): EngineErrorCode {
  return isEngineError(error) ? error.code : ENGINE_ERROR_CODES.INTERNAL_ERROR;
}
