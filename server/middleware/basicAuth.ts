import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'node:crypto';
import { getLogger } from '../core/logger.js';

const log = getLogger('auth');

export type BasicAuthOptions = {
  username: string;
  password: string;
  realm?: string;
};

const digest = (value: string) => createHash('sha256').update(value, 'utf8').digest();

/** Constant-time comparison that does not leak the length of either side. */
export function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export function parseBasicAuth(header: string | undefined): { username: string; password: string } | null {
  if (!header) return null;
  const match = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(header);
  if (!match) return null;
  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const sep = decoded.indexOf(':');
  if (sep < 0) return null;
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

export function basicAuth(options: BasicAuthOptions): RequestHandler {
  const realm = options.realm ?? 'Media Downloader';
  return (req: Request, res: Response, next: NextFunction) => {
    const creds = parseBasicAuth(req.headers.authorization);
    const userOk = creds ? safeEqual(creds.username, options.username) : false;
    const passOk = creds ? safeEqual(creds.password, options.password) : false;
    if (userOk && passOk) {
      next();
      return;
    }
    if (creds) log.warn('auth_failed', { ip: req.ip, path: req.path });
    res.setHeader('WWW-Authenticate', `Basic realm="${realm}", charset="UTF-8"`);
    res.status(401).json({ error: 'Authentication required', code: 'UNAUTHORIZED' });
  };
}
