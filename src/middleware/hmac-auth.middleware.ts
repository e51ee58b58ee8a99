/**
 * HMAC Auth Middleware
 *
 * Express binding for the verifier: builds a RequestDetails snapshot from
 * the inbound request, verifies the Authorization credential and either
 * passes the request on or hands it to the unauthorized handler.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { HmacVerifier } from '../hmac/verifier';
import { HmacError } from '../hmac/errors';
import { isJsonValue } from '../hmac/content-digest';
import { RequestBody, RequestDetails, VerificationResult } from '../hmac/types';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('hmac-auth');

/**
 * Request with the authenticated key id attached
 */
export interface HmacAuthenticatedRequest extends Request {
  hmacAuth?: {
    keyId: string;
  };
}

/**
 * Handlers invoked by name when verification fails
 */
export interface HmacAuthHandlers {
  unauthorized?: (req: Request, res: Response, next: NextFunction, result: VerificationResult) => void;
}

export interface HmacAuthConfig {
  verifier: HmacVerifier;
  handlers?: HmacAuthHandlers;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function bodyOf(req: Request): RequestBody | undefined {
  const body: unknown = req.body;
  if (body === undefined) {
    return undefined;
  }
  if (Buffer.isBuffer(body)) {
    return body.length > 0 ? body.toString('utf8') : undefined;
  }
  if (!isJsonValue(body)) {
    throw new HmacError('Request body cannot be signed', 'INVALID_BODY', 400);
  }
  return body;
}

/**
 * Full request path without the query string. `req.path` is relative to
 * the mount point, so it is read from `originalUrl` instead.
 */
function requestPathOf(req: Request): string {
  const url = req.originalUrl || req.url;
  return url.split('?', 1)[0];
}

/**
 * Snapshot the signed fields of an Express request
 */
export function requestDetailsFromExpress(req: Request): RequestDetails {
  return {
    method: req.method,
    contentType: headerValue(req.headers['content-type']) ?? '',
    path: requestPathOf(req),
    date: headerValue(req.headers['date']),
    params: bodyOf(req),
  };
}

function respondUnauthorized(_req: Request, res: Response, _next: NextFunction, result: VerificationResult): void {
  res.status(401).json({
    error: 'Unauthorized',
    message: result.message,
    code: result.outcome,
  });
}

/**
 * Create middleware that rejects requests without a valid HMAC credential
 *
 * Usage:
 * ```typescript
 * app.use(express.json());
 * app.use('/api', createHmacAuthMiddleware({ verifier }));
 * ```
 */
export function createHmacAuthMiddleware(config: HmacAuthConfig): RequestHandler {
  const { verifier } = config;
  const unauthorized = config.handlers?.unauthorized ?? respondUnauthorized;

  return async (req: HmacAuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const details = requestDetailsFromExpress(req);
      const result = await verifier.verify(details, headerValue(req.headers.authorization));

      if (!result.authenticated || !result.keyId) {
        log.warn('HMAC authentication failed', {
          outcome: result.outcome,
          keyId: result.keyId,
          method: req.method,
          path: req.path,
        });
        return unauthorized(req, res, next, result);
      }

      req.hmacAuth = { keyId: result.keyId };
      next();
    } catch (error) {
      handleError(error, res, next);
    }
  };
}

const ERROR_LABELS: Record<number, string> = {
  400: 'Bad Request',
  503: 'Service Unavailable',
};

function handleError(error: unknown, res: Response, next: NextFunction): void {
  if (error instanceof HmacError) {
    res.status(error.statusCode).json({
      error: ERROR_LABELS[error.statusCode] ?? 'Internal Server Error',
      message: error.message,
      code: error.code,
    });
    return;
  }
  next(error);
}
