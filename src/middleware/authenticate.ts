/**
 * Bearer-token authentication.
 *
 * Verifies the access token in the `Authorization` header and attaches its
 * claims to `req.claims`. Any missing, malformed, expired or forged token
 * gets the same 401 response.
 *
 * @module middleware/authenticate
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Actor, AccessTokenClaims } from '../types/index.js';
import type { TokenCodec } from '../services/tokenService.js';
import { buildInvalidTokenResponse } from '../utils/securityResponses.js';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header);
  return match?.[1] ?? null;
}

export function toActor(claims: AccessTokenClaims): Actor {
  return { userId: claims.userId, tenantId: claims.tenantId, role: claims.role };
}

export function authenticate(codec: Pick<TokenCodec, 'verify'>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req.get('authorization'));
    const claims = token ? codec.verify(token) : null;
    if (!claims) {
      res.status(401).json(buildInvalidTokenResponse(req.requestId));
      return;
    }
    req.claims = claims;
    next();
  };
}
