/**
 * Route guard that asks the decision engine whether the authenticated
 * caller may act on the patient named in the route.
 *
 * Must run after {@link authenticate}. Every denial gets the same 403 body;
 * the reason is only in the audit trail.
 *
 * @module middleware/requirePatientAccess
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { RequestedAccessLevel } from '../types/index.js';
import type { AccessDecisionEngine } from '../access/accessDecisionEngine.js';
import {
  buildAccessDeniedResponse,
  buildInvalidTokenResponse,
} from '../utils/securityResponses.js';
import { toActor } from './authenticate.js';
import { getRequestContext } from './requestContext.js';

export interface RequirePatientAccessOptions {
  /** Route parameter holding the patient id. Defaults to `patientId`. */
  param?: string;
}

export function requirePatientAccess(
  engine: Pick<AccessDecisionEngine, 'decide'>,
  level: RequestedAccessLevel,
  options: RequirePatientAccessOptions = {},
): RequestHandler {
  const param = options.param ?? 'patientId';

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const claims = req.claims;
    if (!claims) {
      res.status(401).json(buildInvalidTokenResponse(req.requestId));
      return;
    }

    const patientId = req.params[param];
    if (!patientId) {
      res.status(403).json(buildAccessDeniedResponse(req.requestId));
      return;
    }

    try {
      const decision = await engine.decide(
        toActor(claims),
        patientId,
        level,
        getRequestContext(req),
      );
      if (!decision.allowed) {
        res.status(403).json(buildAccessDeniedResponse(req.requestId));
        return;
      }
      req.accessDecision = decision;
      next();
    } catch (err) {
      next(err);
    }
  };
}
