import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';
import type { Logger } from 'pino';
import { EscalationError, InvalidObservationError, UnauthorizedError, formatUserError } from '../utils/errors.js';

function clientKey(req: Request, prefix: string): string {
  // Use X-Forwarded-For for proxied requests, fall back to IP
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string') {
    return `${prefix}:${forwarded.split(',')[0]?.trim() ?? 'unknown'}`;
  }
  return `${prefix}:${req.ip ?? 'unknown'}`;
}

/**
 * Rate limiter for the observation ingress
 * 300 requests per minute per client (one per analysed video)
 */
export const ingressRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later', code: 'RATE_LIMITED' },
  keyGenerator: (req) => clientKey(req, 'ingress'),
});

/**
 * Rate limiter for owner-facing endpoints
 * 60 requests per minute per client
 */
export const ownerRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 60,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later', code: 'RATE_LIMITED' },
  keyGenerator: (req) => clientKey(req, 'owner'),
});

/**
 * The authenticating gateway forwards the caller's id in `x-user-id`
 */
export function requireUserId(req: Request): string {
  const userId = req.headers['x-user-id'];
  if (typeof userId !== 'string' || userId.trim() === '') {
    throw new UnauthorizedError('Missing x-user-id header');
  }
  return userId.trim();
}

/**
 * Forward async handler rejections to the error middleware
 */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function isJsonSyntaxError(err: unknown): boolean {
  return err instanceof SyntaxError && Object.getOwnPropertyDescriptor(err, 'body') !== undefined;
}

/**
 * Global error handler middleware
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  const log = logger.child({ component: 'HttpErrors' });

  return (err: unknown, req, res, _next) => {
    if (isJsonSyntaxError(err)) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_JSON' });
      return;
    }

    if (err instanceof EscalationError) {
      if (err.statusCode >= 500) {
        log.error({ error: err, path: req.path, method: req.method }, 'Request failed');
      } else {
        log.debug({ code: err.code, path: req.path, method: req.method }, 'Request rejected');
      }
      const body = err instanceof InvalidObservationError ? { ...formatUserError(err), issues: err.issues } : formatUserError(err);
      res.status(err.statusCode).json(body);
      return;
    }

    log.error({ error: err, path: req.path, method: req.method }, 'Unhandled request error');
    res.status(500).json(formatUserError(err));
  };
}

/**
 * 404 for anything no router matched
 */
export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
};
