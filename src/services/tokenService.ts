/**
 * Token codec for access tokens, plus refresh-token helpers.
 *
 * Access tokens are signed JWTs (HS256 with a shared secret, or RS256 with
 * a PEM key pair) built from immutable configuration at startup. They are
 * stateless: verification checks signature, algorithm, issuer, audience,
 * token type, expiry and claim shape, and never touches the database.
 * There is no deny-list, so an issued access token stays valid until it
 * expires; keep the TTL short.
 *
 * Refresh tokens are opaque random strings. Only their SHA-256 hash is
 * stored (see the session repository).
 *
 * @module services/tokenService
 */

import { randomBytes, createHash } from 'node:crypto';
import jwt from 'jsonwebtoken';
import type { TokenConfig } from '../config/index.js';
import { parseUserRole, type AccessTokenClaims, type UserRole } from '../types/index.js';

// ─── Constants ───────────────────────────────────────────────────────────────

/** Refresh tokens carry 32 bytes of entropy, hex encoded. */
export const REFRESH_TOKEN_BYTES = 32;

const TOKEN_TYPE = 'access';

// ─── Types ───────────────────────────────────────────────────────────────────

/** Identity claims placed in an access token. */
export interface IssueClaims {
  userId: string;
  username: string;
  role: UserRole;
  tenantId: string;
  scopes: readonly string[];
  practitionerId: string | null;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export interface TokenCodec {
  /** Sign an access token; `ttlSeconds` defaults to the configured TTL. */
  issue(claims: IssueClaims, ttlSeconds?: number): IssuedToken;
  /** Verified claims, or null for any malformed, forged or expired token. */
  verify(token: string): AccessTokenClaims | null;
}

export interface TokenCodecOptions {
  /** Clock used for `iat`, `exp` and expiry checks. */
  now?: () => Date;
}

// ─── Role Claim ──────────────────────────────────────────────────────────────

/** Serialize a role for the `role` claim. */
export function toRoleClaim(role: UserRole): string {
  return role;
}

/** Read the `role` claim back; null when it names no known role. */
export function fromRoleClaim(value: unknown): UserRole | null {
  return parseUserRole(value);
}

// ─── Claim Parsing ───────────────────────────────────────────────────────────

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function parseClaims(decoded: string | jwt.JwtPayload): AccessTokenClaims | null {
  if (typeof decoded === 'string') {
    return null;
  }

  if (decoded['type'] !== TOKEN_TYPE) {
    return null;
  }

  const { sub, iat, exp } = decoded;
  const username: unknown = decoded['username'];
  const tenant: unknown = decoded['tenant'];
  const scopes: unknown = decoded['scopes'];
  const practitioner: unknown = decoded['practitioner'];
  const role = fromRoleClaim(decoded['role']);

  if (
    typeof sub !== 'string' ||
    typeof username !== 'string' ||
    typeof tenant !== 'string' ||
    typeof iat !== 'number' ||
    typeof exp !== 'number' ||
    role === null ||
    !isStringArray(scopes)
  ) {
    return null;
  }

  if (practitioner !== undefined && typeof practitioner !== 'string') {
    return null;
  }

  return {
    userId: sub,
    username,
    role,
    tenantId: tenant,
    scopes,
    practitionerId: practitioner ?? null,
    issuedAt: new Date(iat * 1000),
    expiresAt: new Date(exp * 1000),
  };
}

// ─── Codec ───────────────────────────────────────────────────────────────────

/**
 * Build the process-wide token codec.
 *
 * @example
 * ```typescript
 * const codec = createTokenCodec(config.token);
 * const { token } = codec.issue({
 *   userId, username, role, tenantId, scopes, practitionerId: null,
 * });
 * const claims = codec.verify(token); // AccessTokenClaims | null
 * ```
 */
export function createTokenCodec(config: TokenConfig, options: TokenCodecOptions = {}): TokenCodec {
  const now = options.now ?? (() => new Date());

  return {
    issue(claims: IssueClaims, ttlSeconds: number = config.accessTokenTtlSeconds): IssuedToken {
      const iat = Math.floor(now().getTime() / 1000);
      const exp = iat + ttlSeconds;

      const payload: jwt.JwtPayload = {
        sub: claims.userId,
        username: claims.username,
        role: toRoleClaim(claims.role),
        tenant: claims.tenantId,
        scopes: [...claims.scopes],
        type: TOKEN_TYPE,
        iat,
        exp,
      };
      if (claims.practitionerId !== null) {
        payload['practitioner'] = claims.practitionerId;
      }

      const token = jwt.sign(payload, config.signingKey, {
        algorithm: config.algorithm,
        issuer: config.issuer,
        audience: config.audience,
      });

      return { token, expiresAt: new Date(exp * 1000) };
    },

    verify(token: string): AccessTokenClaims | null {
      try {
        const decoded = jwt.verify(token, config.verificationKey, {
          algorithms: [config.algorithm],
          issuer: config.issuer,
          audience: config.audience,
          clockTimestamp: Math.floor(now().getTime() / 1000),
        });
        return parseClaims(decoded);
      } catch {
        // Invalid, expired, or malformed: all look the same to the caller
        return null;
      }
    },
  };
}

// ─── Refresh Tokens ──────────────────────────────────────────────────────────

/**
 * Generate an opaque refresh token: 32 random bytes as 64 hex characters.
 */
export function generateRefreshToken(): string {
  return randomBytes(REFRESH_TOKEN_BYTES).toString('hex');
}

/**
 * Compute the SHA-256 hex digest of a raw refresh token.
 * Only the hash is persisted; the raw token goes to the client.
 */
export function hashRefreshToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}
