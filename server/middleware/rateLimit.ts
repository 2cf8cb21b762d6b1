/**
 * Rate limiting middleware
 *
 * A coarse express-rate-limit guard sits in front of the whole API; the
 * sliding-window limiter gates the expensive actions per client.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import type { ActionClass, RateLimiter } from '../core/RateLimiter.js';
import { getLogger } from '../core/logger.js';

const log = getLogger('ratelimit');

const ACTION_LABEL: Record<ActionClass, string> = {
  download: 'download requests',
  toolUpdate: 'update requests',
};

/** Progress polling and health checks are cheap reads and never count. */
export const isPollingRequest = (req: Request): boolean =>
  req.method === 'GET' && (req.path.startsWith('/progress/') || req.path === '/health');

/**
 * Global rate limiter (fallback for all routes except polling)
 */
export function globalRateLimit(perMinute: number): RequestHandler {
  return rateLimit({
    windowMs: 60_000,
    limit: perMinute,
    standardHeaders: true,
    legacyHeaders: false,
    skip: isPollingRequest,
    message: { error: 'Too many requests. Please slow down.', code: 'RATE_LIMITED' },
  });
}

export const clientIdOf = (req: Request): string => req.ip || req.socket.remoteAddress || 'unknown';

/**
 * Admit or reject the request against the sliding-window limiter. Rejections
 * answer 429 with Retry-After in whole seconds.
 */
export function admission(limiter: RateLimiter, action: ActionClass): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const clientId = clientIdOf(req);
    const verdict = limiter.admit(clientId, action);
    if (verdict.allowed) {
      next();
      return;
    }
    const retryAfter = Math.ceil(verdict.retryAfterMs / 1000);
    const { limit, windowMs } = limiter.limitFor(action);
    log.warn('rate_limited', { clientId, action, retryAfter });
    res.setHeader('Retry-After', String(retryAfter));
    res.status(429).json({
      error: `Rate limit exceeded: at most ${limit} ${ACTION_LABEL[action]} per ${Math.round(windowMs / 60_000)} minutes. Try again in ${retryAfter} seconds.`,
      code: 'RATE_LIMITED',
      retry_after: retryAfter,
    });
  };
}
