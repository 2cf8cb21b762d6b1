import type { Express, Request, Response } from 'express';
import { toExtractionError } from '../core/errors.js';
import type { Extractor } from '../core/Extractor.js';
import { HttpError } from '../core/httpError.js';
import type { Logger } from '../core/logger.js';
import { InfoBody, parseBody } from '../core/validate.js';
import { wrap } from '../core/wrap.js';
import { extractionStatus } from '../middleware/error.js';

export type InfoDeps = {
  extractor: Pick<Extractor, 'probe'>;
  log: Logger;
};

export function setupInfoRoutes(app: Express, deps: InfoDeps) {
  const { extractor, log } = deps;

  app.post(
    '/info',
    wrap(async (req: Request, res: Response) => {
      const { url, browser } = parseBody(InfoBody, req.body);
      try {
        const info = await extractor.probe(url, browser);
        res.json(info);
      } catch (err) {
        const failure = toExtractionError(err);
        log.warn('info_failed', { code: failure.code, message: failure.message });
        throw new HttpError(extractionStatus(failure.code), failure.code, `Could not fetch video info: ${failure.message}`);
      }
    }),
  );
}
