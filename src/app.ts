/**
 * Express application factory with dependency injection.
 *
 * Creates a configured Express app with middleware wired in order:
 * 1. JSON body parser
 * 2. Request context (correlation id, abort signal, completion log)
 * 3. Auth routes; everything but login/refresh/logout behind bearer auth
 * 4. Access, emergency and administration routes
 * 5. Error handler mapping {@link EngineError} codes to HTTP statuses
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';

import type { AuthDeps } from './services/authService.js';
import type { CredentialAdminDeps } from './services/credentialService.js';
import type { TokenCodec } from './services/tokenService.js';
import type { AccessDecisionEngine } from './access/accessDecisionEngine.js';
import { AccessLevel, type AccessTokenClaims } from './types/index.js';
import { silentLogger, type Logger } from './logging/logger.js';
import { ENGINE_ERROR_CODES, isEngineError } from './utils/errors.js';
import {
  formatErrorResponse,
  formatInternalError,
  formatSuccess,
  getHttpStatusForError,
  type ErrorResponse,
  type SuccessResponse,
} from './utils/responses.js';
import { buildInvalidTokenResponse } from './utils/securityResponses.js';
import { authenticate } from './middleware/authenticate.js';
import { requirePatientAccess } from './middleware/requirePatientAccess.js';
import { getRequestContext, requestContext } from './middleware/requestContext.js';
import * as authController from './controllers/authController.js';
import * as accessController from './controllers/accessController.js';
import type { AccessControllerDeps } from './controllers/accessController.js';
import * as adminController from './controllers/adminController.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

/** All dependencies required to create the Express application. */
export interface AppDependencies {
  codec: TokenCodec;
  auth: AuthDeps;
  decisions: Pick<AccessDecisionEngine, 'decide'>;
  access: AccessControllerDeps;
  admin: CredentialAdminDeps;
  logger?: Logger;
  /** Clock for the Retry-After header. */
  now?: () => Date;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

type Handler = (req: Request, res: Response) => Promise<void>;

function getResultStatus(
  result: SuccessResponse<unknown> | ErrorResponse,
  successStatus: number,
): number {
  return result.success ? successStatus : getHttpStatusForError(result.error.code);
}

function retryAfterSeconds(retryAfter: string, now: Date): string {
  const seconds = Math.ceil((Date.parse(retryAfter) - now.getTime()) / 1000);
  return String(Math.max(seconds, 1));
}

/** Forward rejections to the error handler; Express 4 does not. */
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/** Claims set by {@link authenticate}; a route mounted without it answers 401. */
function claimsOf(req: Request, res: Response): AccessTokenClaims | null {
  if (req.claims) return req.claims;
  res.status(401).json(buildInvalidTokenResponse(req.requestId));
  return null;
}

function param(req: Request, name: string): string {
  return req.params[name] ?? '';
}

// ─── Application Factory ────────────────────────────────────────────────────

export function createApp(deps: AppDependencies): express.Express {
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? (() => new Date());
  const app = express();

  function send(
    res: Response,
    result: SuccessResponse<unknown> | ErrorResponse,
    successStatus = 200,
  ): void {
    if (!result.success && result.error.retryAfter) {
      res.set('Retry-After', retryAfterSeconds(result.error.retryAfter, now()));
    }
    res.status(getResultStatus(result, successStatus)).json(result);
  }

  const requireAuth = authenticate(deps.codec);

  app.disable('x-powered-by');
  app.use(express.json({ limit: '100kb' }));
  app.use(requestContext(logger));

  // ── Auth Routes ───────────────────────────────────────────────────────

  const auth = express.Router();

  auth.post(
    '/login',
    route(async (req, res) => {
      send(res, await authController.login(req.body, getRequestContext(req), deps.auth));
    }),
  );

  auth.post(
    '/refresh',
    route(async (req, res) => {
      send(res, await authController.refresh(req.body, getRequestContext(req), deps.auth));
    }),
  );

  auth.post(
    '/logout',
    route(async (req, res) => {
      send(res, await authController.logout(req.body, getRequestContext(req), deps.auth));
    }),
  );

  auth.post(
    '/logout-all',
    requireAuth,
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      send(res, await authController.logoutAll(claims, getRequestContext(req), deps.auth));
    }),
  );

  auth.get(
    '/me',
    requireAuth,
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      send(res, await authController.me(claims, getRequestContext(req), deps.auth));
    }),
  );

  app.use('/api/auth', auth);

  // ── Patient Routes ────────────────────────────────────────────────────

  const patients = express.Router();
  patients.use(requireAuth);

  patients.post(
    '/:patientId/access',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const result = await accessController.grantAccess(
        claims,
        param(req, 'patientId'),
        req.body,
        getRequestContext(req),
        deps.access,
      );
      send(res, result, 201);
    }),
  );

  patients.post(
    '/:patientId/emergency-access',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const result = await accessController.createEmergencyAccess(
        claims,
        param(req, 'patientId'),
        req.body,
        getRequestContext(req),
        deps.access,
      );
      send(res, result, 201);
    }),
  );

  // Decision probe for clients deciding whether to render a patient view
  patients.get(
    '/:patientId/access-check',
    requirePatientAccess(deps.decisions, AccessLevel.READ),
    (req: Request, res: Response) => {
      res.status(200).json(formatSuccess({ decision: req.accessDecision }));
    },
  );

  app.use('/api/patients', patients);

  // ── Grant Ledger Routes ───────────────────────────────────────────────

  const access = express.Router();
  access.use(requireAuth);

  access.get(
    '/',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      send(
        res,
        await accessController.listAccess(claims, req.query, getRequestContext(req), deps.access),
      );
    }),
  );

  access.get(
    '/patients',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      send(
        res,
        await accessController.listAccessiblePatients(claims, getRequestContext(req), deps.access),
      );
    }),
  );

  access.patch(
    '/:grantId',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const result = await accessController.extendAccess(
        claims,
        param(req, 'grantId'),
        req.body,
        getRequestContext(req),
        deps.access,
      );
      send(res, result);
    }),
  );

  access.delete(
    '/:grantId',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const result = await accessController.revokeAccess(
        claims,
        param(req, 'grantId'),
        req.body,
        getRequestContext(req),
        deps.access,
      );
      send(res, result);
    }),
  );

  app.use('/api/access', access);

  // ── Administration Routes ─────────────────────────────────────────────

  const admin = express.Router();
  admin.use(requireAuth);

  admin.post(
    '/users/:userId/lock',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const context = getRequestContext(req);
      send(
        res,
        await adminController.lockUser(claims, param(req, 'userId'), req.body, context, deps.admin),
      );
    }),
  );

  admin.post(
    '/users/:userId/unlock',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const context = getRequestContext(req);
      send(
        res,
        await adminController.unlockUser(claims, param(req, 'userId'), context, deps.admin),
      );
    }),
  );

  admin.delete(
    '/users/:userId',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const context = getRequestContext(req);
      send(
        res,
        await adminController.deleteUser(claims, param(req, 'userId'), context, deps.admin),
      );
    }),
  );

  admin.get(
    '/users/:userId/scopes',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const context = getRequestContext(req);
      send(
        res,
        await adminController.listScopes(claims, param(req, 'userId'), context, deps.admin),
      );
    }),
  );

  admin.post(
    '/users/:userId/scopes',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const context = getRequestContext(req);
      const result = await adminController.grantScope(
        claims,
        param(req, 'userId'),
        req.body,
        context,
        deps.admin,
      );
      send(res, result, 201);
    }),
  );

  admin.delete(
    '/scopes/:scopeId',
    route(async (req, res) => {
      const claims = claimsOf(req, res);
      if (!claims) return;
      const context = getRequestContext(req);
      send(
        res,
        await adminController.revokeScope(claims, param(req, 'scopeId'), context, deps.admin),
      );
    }),
  );

  app.use('/api/admin', admin);

  // ── Global Error Handler ──────────────────────────────────────────────

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isEngineError(err)) {
      const fields = err.details['fields'];
      const body = formatErrorResponse(
        err.code,
        err.message,
        req.requestId,
        isFieldErrors(fields) ? fields : undefined,
      );
      if (err.transient) res.set('Retry-After', '1');
      res.status(getHttpStatusForError(err.code)).json(body);
      return;
    }

    if (isBodyParseError(err)) {
      res
        .status(400)
        .json(
          formatErrorResponse(
            ENGINE_ERROR_CODES.VALIDATION_ERROR,
            'The request body is not valid JSON.',
            req.requestId,
          ),
        );
      return;
    }

    logger.error(
      'Unhandled error',
      err instanceof Error ? err : new Error(String(err)),
      { correlationId: req.requestId, url: req.originalUrl },
    );
    res.status(500).json(formatInternalError(req.requestId));
  });

  return app;
}

function isFieldErrors(value: unknown): value is Record<string, string[]> {
  if (typeof value !== 'object' || value === null) return false;
  const lists: unknown[] = Object.values(value);
  return lists.every(
    (messages) => Array.isArray(messages) && messages.every((m: unknown) => typeof m === 'string'),
  );
}

/** body-parser marks malformed JSON with `type: 'entity.parse.failed'`. */
function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}
