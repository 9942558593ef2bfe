/**
 * Engine configuration.
 *
 * Every policy constant (token lifetimes, lockout threshold and duration,
 * emergency-access ceiling) and the token signing key material is read once
 * at startup from environment variables. The resulting object is frozen and
 * passed to the components that need it.
 *
 * @module config
 */

import { getDbConfig, type DbConfig } from '../utils/db.js';
import { isLogLevel, type LogLevel } from '../logging/logger.js';

/** Milliseconds in one minute. */
const MS_PER_MINUTE = 60 * 1000;
/** Milliseconds in one day. */
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

export type SigningAlgorithm = 'HS256' | 'RS256';

export interface TokenConfig {
  algorithm: SigningAlgorithm;
  /** HMAC secret for HS256, PEM private key for RS256. */
  signingKey: string;
  /** HMAC secret for HS256, PEM public key for RS256. */
  verificationKey: string;
  issuer: string;
  audience: string;
  accessTokenTtlSeconds: number;
}

export interface SessionPolicy {
  refreshTokenTtlMs: number;
}

export interface LockoutPolicy {
  /** Consecutive failed logins that lock the account. */
  threshold: number;
  durationMinutes: number;
}

export interface EmergencyAccessPolicy {
  maxDurationMinutes: number;
}

export interface EngineConfig {
  token: TokenConfig;
  session: SessionPolicy;
  lockout: LockoutPolicy;
  emergencyAccess: EmergencyAccessPolicy;
  db: DbConfig;
  /** Hex-encoded 32-byte key for audit metadata encryption; null stores plain JSON. */
  auditEncryptionKey: string | null;
  logLevel: LogLevel;
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 15 * 60;
export const DEFAULT_REFRESH_TOKEN_TTL_DAYS = 7;
export const DEFAULT_LOCKOUT_THRESHOLD = 5;
export const DEFAULT_LOCKOUT_DURATION_MINUTES = 15;
export const DEFAULT_EMERGENCY_MAX_MINUTES = 24 * 60;

/** HS256 secrets shorter than this are rejected. */
const MIN_HMAC_SECRET_LENGTH = 32;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number, max?: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  if (max !== undefined && value > max) {
    throw new ConfigError(`${name} must be at most ${max}, got ${value}`);
  }
  return value;
}

function readRequired(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`${name} environment variable is not set`);
  }
  return value;
}

function loadTokenConfig(env: Env): TokenConfig {
  const algorithm = env['JWT_ALGORITHM'] ?? 'HS256';
  if (algorithm !== 'HS256' && algorithm !== 'RS256') {
    throw new ConfigError(`JWT_ALGORITHM must be HS256 or RS256, got "${algorithm}"`);
  }

  const common = {
    issuer: env['JWT_ISSUER'] ?? 'patient-access-engine',
    audience: env['JWT_AUDIENCE'] ?? 'patient-access-engine.users',
    accessTokenTtlSeconds: readPositiveInt(
      env,
      'ACCESS_TOKEN_TTL_SECONDS',
      DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
      // Short-lived by contract: access tokens cannot be revoked.
      60 * 60,
    ),
  };

  if (algorithm === 'RS256') {
    return {
      ...common,
      algorithm,
      signingKey: readRequired(env, 'JWT_PRIVATE_KEY'),
      verificationKey: readRequired(env, 'JWT_PUBLIC_KEY'),
    };
  }

  const secret = readRequired(env, 'JWT_SECRET');
  if (secret.length < MIN_HMAC_SECRET_LENGTH) {
    throw new ConfigError(`JWT_SECRET must be at least ${MIN_HMAC_SECRET_LENGTH} characters`);
  }
  return { ...common, algorithm, signingKey: secret, verificationKey: secret };
}

// ─── Loader ──────────────────────────────────────────────────────────────────

/**
 * Load and validate the engine configuration.
 *
 * @param env - Environment to read from; defaults to `process.env`
 * @throws {ConfigError} When key material is missing or a value is out of range
 */
export function loadConfig(env: Env = process.env): Readonly<EngineConfig> {
  const auditKey = env['AUDIT_ENCRYPTION_KEY'] ?? null;
  if (auditKey !== null && !/^[0-9a-fA-F]{64}$/.test(auditKey)) {
    throw new ConfigError('AUDIT_ENCRYPTION_KEY must be 64 hex characters (32 bytes)');
  }

  const logLevel = env['LOG_LEVEL'] ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, fatal`);
  }

  const config: EngineConfig = {
    token: loadTokenConfig(env),
    session: {
      refreshTokenTtlMs:
        readPositiveInt(env, 'REFRESH_TOKEN_TTL_DAYS', DEFAULT_REFRESH_TOKEN_TTL_DAYS, 30) *
        MS_PER_DAY,
    },
    lockout: {
      threshold: readPositiveInt(env, 'LOCKOUT_THRESHOLD', DEFAULT_LOCKOUT_THRESHOLD),
      durationMinutes: readPositiveInt(
        env,
        'LOCKOUT_DURATION_MINUTES',
        DEFAULT_LOCKOUT_DURATION_MINUTES,
      ),
    },
    emergencyAccess: {
      maxDurationMinutes: readPositiveInt(
        env,
        'EMERGENCY_ACCESS_MAX_MINUTES',
        DEFAULT_EMERGENCY_MAX_MINUTES,
        DEFAULT_EMERGENCY_MAX_MINUTES,
      ),
    },
    db: getDbConfig(env),
    auditEncryptionKey: auditKey,
    logLevel,
  };

  return Object.freeze(config);
}
