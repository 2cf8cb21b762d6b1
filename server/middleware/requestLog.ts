import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import { getLogger } from '../core/logger.js';

const log = getLogger('request');

const SENSITIVE = /^(authorization|cookie|x-api-key|x-auth-token)$/i;

function redactHeaders(h: Request['headers']) {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(h)) {
    out[key] = SENSITIVE.test(key) ? '***' : value;
  }
  return out;
}

const QUIET_PATHS = new Set(['/health']);
const QUIET_PREFIXES = ['/progress/'];

function isQuietRequest(req: Request, statusCode: number) {
  const { method } = req;
  const path = req.path || req.originalUrl || '';
  if (method === 'OPTIONS') return true;
  if (method !== 'GET' && method !== 'HEAD') return false;
  if (QUIET_PATHS.has(path)) return true;
  if (QUIET_PREFIXES.some((prefix) => path.startsWith(prefix)) && statusCode < 500) return true;
  return statusCode === 304;
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const header = req.headers['x-request-id'];
  const id = (typeof header === 'string' && header.trim().slice(0, 128)) || randomUUID();
  res.locals.requestId = id;
  res.setHeader('x-request-id', id);
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    if (process.env.VERBOSE_REQUEST_LOGS !== '1' && isQuietRequest(req, res.statusCode)) return;
    const durMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
    log.info(
      JSON.stringify({
        id,
        ip: req.ip,
        m: req.method,
        u: req.originalUrl || req.url,
        s: res.statusCode,
        durMs,
        h: redactHeaders(req.headers),
      }),
    );
  });

  next();
}
