/**
 * Shared helpers for mapping PostgreSQL rows to domain objects.
 *
 * @module repositories/rows
 */

import type pg from 'pg';
import { EngineError, ENGINE_ERROR_CODES } from '../utils/errors.js';

/** First row of a result, or null when the statement matched nothing. */
export function firstRow<T extends pg.QueryResultRow>(result: pg.QueryResult<T>): T | null {
  return result.rows[0] ?? null;
}

/**
 * First row of a result that must exist (INSERT ... RETURNING).
 *
 * @throws {EngineError} INTERNAL_ERROR when the driver returned no row
 */
export function requireRow<T extends pg.QueryResultRow>(
  result: pg.QueryResult<T>,
  table: string,
): T {
  const row = result.rows[0];
  if (!row) {
    throw new EngineError(ENGINE_ERROR_CODES.INTERNAL_ERROR, `No row returned from ${table}.`);
  }
  return row;
}

/**
 * Unwrap a parsed enum column. A stored value outside the enumeration is a
 * data fault, not a user error.
 */
export function requireEnum<T>(parsed: T | null, column: string, raw: unknown): T {
  if (parsed === null) {
    throw new EngineError(
      ENGINE_ERROR_CODES.INTERNAL_ERROR,
      `Unrecognised value in column ${column}.`,
      { column, value: String(raw) },
    );
  }
  return parsed;
}

/** pg returns COUNT(*) as a string (bigint). */
export function parseCount(value: string | number | null | undefined): number {
  if (value === null || value === undefined) return 0;
  return typeof value === 'number' ? value : parseInt(value, 10);
}
