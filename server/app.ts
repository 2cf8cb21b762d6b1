import express, { type Express } from 'express';
import type { AppConfig } from './core/config.js';
import type { Extractor } from './core/Extractor.js';
import type { JobRegistry } from './core/JobRegistry.js';
import type { JobRunner } from './core/JobRunner.js';
import type { RateLimiter } from './core/RateLimiter.js';
import { getLogger, type Logger } from './core/logger.js';
import type { ToolUpdater } from './core/ytUpdate.js';
import { basicAuth } from './middleware/basicAuth.js';
import { errorHandler, notFoundHandler } from './middleware/error.js';
import { globalRateLimit } from './middleware/rateLimit.js';
import { requestLogger } from './middleware/requestLog.js';
import { applySecurity } from './middleware/security.js';
import { setupDownloadRoutes } from './routes/downloads.js';
import { setupFileRoutes } from './routes/files.js';
import { setupInfoRoutes } from './routes/info.js';
import { setupSystemRoutes } from './routes/system.js';
import { setupToolRoutes } from './routes/tool.js';

export type AppDeps = {
  cfg: AppConfig;
  registry: JobRegistry;
  runner: JobRunner;
  extractor: Extractor;
  limiter: RateLimiter;
  updater: ToolUpdater;
  log?: Logger;
};

export function createApp(deps: AppDeps): Express {
  const { cfg, registry, runner, extractor, limiter, updater } = deps;
  const log = deps.log ?? getLogger('server');

  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', cfg.trustProxy);

  applySecurity(app);
  app.use(requestLogger);
  app.use(globalRateLimit(cfg.globalRequestsPerMinute));
  app.use(express.json({ limit: '100kb' }));

  setupSystemRoutes(app, { runner });

  if (cfg.auth.enabled) {
    app.use(basicAuth({ username: cfg.auth.username, password: cfg.auth.password }));
  }

  setupInfoRoutes(app, { extractor, log });
  setupDownloadRoutes(app, { registry, runner, limiter });
  setupFileRoutes(app, { downloadDir: cfg.downloadDir, listLimit: cfg.downloadsListLimit, log });
  setupToolRoutes(app, { extractor, updater, limiter, log });

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
