import type { Express, Request, Response } from 'express';
import { HttpError } from '../core/httpError.js';
import { isTerminal, type Job, type JobRegistry } from '../core/JobRegistry.js';
import type { JobRunner } from '../core/JobRunner.js';
import type { RateLimiter } from '../core/RateLimiter.js';
import { setNoStore } from '../core/http.js';
import { DownloadBody, parseBody } from '../core/validate.js';
import { wrap } from '../core/wrap.js';
import { admission } from '../middleware/rateLimit.js';

export type DownloadDeps = {
  registry: JobRegistry;
  runner: Pick<JobRunner, 'start' | 'cancel'>;
  limiter: RateLimiter;
};

/** Poll payload; snake_case keys are part of the wire format. */
export function progressView(job: Job) {
  return {
    status: job.status,
    percent: job.percent,
    speed: job.speed ?? null,
    eta: job.eta ?? null,
    ...(job.filename ? { filename: job.filename } : {}),
    ...(job.errorMessage ? { error: job.errorMessage, error_code: job.errorCode } : {}),
  };
}

function requireJob(registry: JobRegistry, id: string): Job {
  const job = registry.get(id);
  if (!job) throw new HttpError(404, 'NOT_FOUND', 'Download not found');
  return job;
}

export function setupDownloadRoutes(app: Express, deps: DownloadDeps) {
  const { registry, runner, limiter } = deps;

  // Validation runs before admission so malformed requests never use a slot.
  app.post(
    '/download',
    (req, _res, next) => {
      parseBody(DownloadBody, req.body);
      next();
    },
    admission(limiter, 'download'),
    wrap((req: Request, res: Response) => {
      const { url, format, browser } = parseBody(DownloadBody, req.body);
      const job = runner.start({ url, format, browser });
      res.json({ download_id: job.id, message: 'Download started' });
    }),
  );

  app.get('/progress/:id', (req: Request, res: Response) => {
    const job = requireJob(registry, req.params.id);
    setNoStore(res);
    res.json(progressView(job));
  });

  app.post('/cancel/:id', (req: Request, res: Response) => {
    const job = requireJob(registry, req.params.id);
    if (isTerminal(job.status) || !runner.cancel(job.id)) {
      throw new HttpError(409, 'ALREADY_FINISHED', `Download already finished (${job.status})`);
    }
    res.json({ ok: true });
  });
}
