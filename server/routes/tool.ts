import type { Express, Request, Response } from 'express';
import type { Extractor } from '../core/Extractor.js';
import { HttpError } from '../core/httpError.js';
import type { Logger } from '../core/logger.js';
import type { RateLimiter } from '../core/RateLimiter.js';
import { toExtractionError } from '../core/errors.js';
import type { ToolUpdater } from '../core/ytUpdate.js';
import { wrap } from '../core/wrap.js';
import { admission } from '../middleware/rateLimit.js';

export type ToolDeps = {
  extractor: Pick<Extractor, 'getVersion'>;
  updater: Pick<ToolUpdater, 'run'>;
  limiter: RateLimiter;
  log: Logger;
};

export function setupToolRoutes(app: Express, deps: ToolDeps) {
  const { extractor, updater, limiter, log } = deps;

  app.get(
    '/yt-dlp-version',
    wrap(async (_req: Request, res: Response) => {
      res.json({ version: await extractor.getVersion() });
    }),
  );

  app.post(
    '/update-yt-dlp',
    admission(limiter, 'toolUpdate'),
    wrap(async (_req: Request, res: Response) => {
      try {
        const result = await updater.run('manual');
        res.status(result.success ? 200 : 500).json(result);
      } catch (err) {
        const failure = toExtractionError(err);
        log.error('ytdlp_update_request_failed', { code: failure.code, message: failure.message });
        throw new HttpError(500, failure.code, failure.message);
      }
    }),
  );
}
