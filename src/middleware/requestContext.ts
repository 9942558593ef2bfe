/**
 * Request Context Middleware
 *
 * Assigns every request a correlation id (honouring an inbound
 * `x-request-id`), an abort signal that fires when the client goes away
 * before the response is sent, and a log line on completion.
 *
 * @module middleware/requestContext
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../logging/logger.js';
import type { AccessTokenClaims, RequestContext } from '../types/index.js';
import type { AccessDecision } from '../access/types.js';
import { generateRequestId } from '../utils/responses.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      abortSignal?: AbortSignal;
      claims?: AccessTokenClaims;
      accessDecision?: AccessDecision;
    }
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

const MAX_REQUEST_ID_LENGTH = 128;

function getOrCreateRequestId(req: Request): string {
  const existing = req.get(REQUEST_ID_HEADER);
  if (existing && existing.length > 0 && existing.length <= MAX_REQUEST_ID_LENGTH) {
    return existing;
  }
  return generateRequestId();
}

export function requestContext(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = getOrCreateRequestId(req);
    const controller = new AbortController();
    req.requestId = requestId;
    req.abortSignal = controller.signal;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const start = Date.now();
    const method = req.method;
    const url = req.originalUrl;
    const child = logger.child({ correlationId: requestId });

    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
        child.warn('request aborted by client', { method, url });
        return;
      }
      child.info('request completed', {
        method,
        url,
        statusCode: res.statusCode,
        durationMs: Date.now() - start,
      });
    });

    next();
  };
}

/** Audit context for an Express request. */
export function getRequestContext(req: Request): RequestContext {
  return {
    ipAddress: req.ip ?? req.socket.remoteAddress ?? 'unknown',
    userAgent: req.get('user-agent') ?? 'unknown',
    requestId: req.requestId,
    signal: req.abortSignal,
  };
}
