/**
 * Database connection pool utility.
 *
 * Provides a PostgreSQL connection pool using the `pg` library,
 * configured via environment variables. This module is the single
 * entry point for all database access in the engine.
 *
 * Every repository function accepts an optional {@link Executor} so that
 * several writes can share one transaction opened by {@link withTransaction}.
 * Connection-level failures are rethrown as a transient
 * `STORE_UNAVAILABLE` error so callers never mistake an outage for a denial.
 *
 * @module utils/db
 */

import pg from 'pg';
import { EngineError, ENGINE_ERROR_CODES } from './errors.js';

const { Pool } = pg;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  ssl?: boolean;
}

/** Anything that can run a parameterised query: the pool or a checked-out client. */
export interface Executor {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<pg.QueryResult<T>>;
}

export interface QueryOptions {
  /** Run on this executor (typically a transaction client) instead of the pool. */
  executor?: Executor;
  /** Abort before the statement is sent when the caller has given up. */
  signal?: AbortSignal;
}

/**
 * Build database configuration from environment variables with sensible defaults.
 */
export function getDbConfig(env: Record<string, string | undefined> = process.env): DbConfig {
  return {
    host: env['DB_HOST'] ?? 'localhost',
    port: parseInt(env['DB_PORT'] ?? '5432', 10),
    database: env['DB_NAME'] ?? 'patient_access',
    user: env['DB_USER'] ?? 'postgres',
    password: env['DB_PASSWORD'] ?? '',
    max: parseInt(env['DB_POOL_MAX'] ?? '20', 10),
    idleTimeoutMillis: parseInt(env['DB_IDLE_TIMEOUT'] ?? '30000', 10),
    connectionTimeoutMillis: parseInt(env['DB_CONNECT_TIMEOUT'] ?? '5000', 10),
    ssl: env['DB_SSL'] === 'true',
  };
}

/**
 * Create a new PostgreSQL connection pool with the given configuration.
 */
export function createPool(config?: Partial<DbConfig>): pg.Pool {
  const dbConfig = { ...getDbConfig(), ...config };
  return new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database,
    user: dbConfig.user,
    password: dbConfig.password,
    max: dbConfig.max,
    idleTimeoutMillis: dbConfig.idleTimeoutMillis,
    connectionTimeoutMillis: dbConfig.connectionTimeoutMillis,
    ssl: dbConfig.ssl ? { rejectUnauthorized: false } : undefined,
  });
}

/** Singleton pool instance, lazily initialized. */
let pool: pg.Pool | null = null;

/**
 * Get the shared database connection pool.
 * Creates the pool on first call using environment-based configuration.
 */
export function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool();
  }
  return pool;
}

/**
 * Replace the shared pool, e.g. with one built from loaded configuration.
 * Any previous pool is left to the caller to close.
 */
export function setPool(next: pg.Pool): void {
  pool = next;
}

// ─── Error Mapping ───────────────────────────────────────────────────────────

/** Node socket errors that mean the database could not be reached. */
const TRANSIENT_SOCKET_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
]);

/**
 * PostgreSQL SQLSTATE classes that indicate the store, not the statement,
 * failed: 08 connection exception, 53 insufficient resources, 57P0x
 * operator intervention, 40001/40P01 serialization failure and deadlock.
 */
function isTransientSqlState(code: string): boolean {
  return (
    code.startsWith('08') ||
    code.startsWith('53') ||
    code.startsWith('57P0') ||
    code === '40001' ||
    code === '40P01'
  );
}

export function isTransientDbError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : null;
  if (code && (TRANSIENT_SOCKET_CODES.has(code) || isTransientSqlState(code))) return true;
  return /connection terminated|timeout exceeded when trying to connect/i.test(error.message);
}

/**
 * Rethrow a driver error as an {@link EngineError} when it is transient,
 * otherwise rethrow it unchanged.
 */
function rethrow(error: unknown): never {
  if (error instanceof EngineError) throw error;
  if (isTransientDbError(error)) {
    throw new EngineError(
      ENGINE_ERROR_CODES.STORE_UNAVAILABLE,
      'The data store is temporarily unavailable. Please retry.',
      {},
      error,
    );
  }
  throw error;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new EngineError(ENGINE_ERROR_CODES.OPERATION_CANCELLED, 'The operation was cancelled.');
  }
}

// ─── Query Helpers ───────────────────────────────────────────────────────────

/**
 * Execute a parameterized SQL query using the shared pool, or the
 * executor passed in `options`.
 */
export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
  options: QueryOptions = {},
): Promise<pg.QueryResult<T>> {
  throwIfAborted(options.signal);
  const executor: Executor = options.executor ?? getPool();
  try {
    return await executor.query<T>(text, params);
  } catch (error: unknown) {
    rethrow(error);
  }
}

/**
 * Run `work` inside a single transaction on a dedicated client.
 *
 * Commits when `work` resolves and the signal has not been aborted;
 * rolls back otherwise, so partial writes are never visible.
 */
export async function withTransaction<T>(
  work: (executor: Executor) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  throwIfAborted(signal);

  let client: pg.PoolClient;
  try {
    client = await getPool().connect();
  } catch (error: unknown) {
    rethrow(error);
  }

  // A client whose ROLLBACK failed is destroyed rather than returned to the pool.
  let brokenConnection: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await work(client);
    throwIfAborted(signal);
    await client.query('COMMIT');
    return result;
  } catch (error: unknown) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError: unknown) {
      brokenConnection =
        rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    rethrow(error);
  } finally {
    client.release(brokenConnection);
  }
}

/**
 * Shut down the connection pool.
 * Should be called during application shutdown.
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
