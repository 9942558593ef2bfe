/**
 * API response formatters for consistent JSON response structure.
 *
 * All HTTP adapter responses follow a predictable format:
 * - Success responses include `success: true` and the relevant data
 * - Error responses include `success: false`, an error object with
 *   code/message/fields, and a request correlation ID for debugging
 *
 * @module utils/responses
 */

import { v4 as uuidv4 } from 'uuid';
import { ENGINE_ERROR_CODES, type EngineErrorCode } from './errors.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: EngineErrorCode;
    message: string;
    fields?: Record<string, string[]>;
    /** ISO timestamp after which a locked account may retry. */
    retryAfter?: string;
  };
  requestId: string;
}

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

const ERROR_STATUS_MAP: Record<EngineErrorCode, number> = {
  [ENGINE_ERROR_CODES.INVALID_CREDENTIALS]: 401,
  [ENGINE_ERROR_CODES.ACCOUNT_LOCKED]: 423,
  [ENGINE_ERROR_CODES.INVALID_TOKEN]: 401,
  [ENGINE_ERROR_CODES.FORBIDDEN]: 403,
  [ENGINE_ERROR_CODES.NOT_FOUND]: 404,
  [ENGINE_ERROR_CODES.VALIDATION_ERROR]: 400,
  [ENGINE_ERROR_CODES.STORE_UNAVAILABLE]: 503,
  [ENGINE_ERROR_CODES.OPERATION_CANCELLED]: 499,
  [ENGINE_ERROR_CODES.INTERNAL_ERROR]: 500,
};

// ─── Correlation ID ──────────────────────────────────────────────────────────

/**
 * Generate a unique request correlation ID (UUID v4).
 * Used to trace requests across logs, audit events and error responses.
 */
export function generateRequestId(): string {
  return uuidv4();
}

// ─── Formatters ──────────────────────────────────────────────────────────────

export function formatSuccess<T>(data: T): SuccessResponse<T> {
  return { success: true, data };
}

/**
 * Format an error response with error code, message, optional field errors,
 * and a correlation ID for debugging.
 */
export function formatErrorResponse(
  code: EngineErrorCode,
  message: string,
  requestId?: string,
  fields?: Record<string, string[]>,
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
    requestId: requestId ?? generateRequestId(),
  };

  if (fields && Object.keys(fields).length > 0) {
    response.error.fields = fields;
  }

  return response;
}

export function getHttpStatusForError(code: EngineErrorCode): number {
  return ERROR_STATUS_MAP[code];
}

/**
 * Format an internal server error response.
 * Uses a generic message to avoid leaking implementation details.
 */
export function formatInternalError(requestId?: string): ErrorResponse {
  return formatErrorResponse(
    ENGINE_ERROR_CODES.INTERNAL_ERROR,
    'An unexpected error occurred. Please try again later.',
    requestId,
  );
}
