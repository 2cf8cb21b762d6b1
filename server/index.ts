import fs from 'node:fs';
import type { Server } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './core/config.js';
import { ConfigError } from './core/env.js';
import { JobRegistry } from './core/JobRegistry.js';
import { JobRunner } from './core/JobRunner.js';
import { getLogger } from './core/logger.js';
import { listenUrls } from './core/network.js';
import { RateLimiter } from './core/RateLimiter.js';
import { YtDlpExtractor } from './core/YtDlpExtractor.js';
import { createToolUpdater } from './core/ytUpdate.js';

const log = getLogger('server');

function readConfig() {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error('config_invalid', err.message);
      process.exit(1);
    }
    throw err;
  }
}

const cfg = readConfig();

fs.mkdirSync(cfg.downloadDir, { recursive: true });

const registry = new JobRegistry();
const extractor = new YtDlpExtractor({
  ytDlpPath: cfg.ytDlpPath,
  ffmpegLocation: cfg.ffmpegLocation,
  extraArgs: cfg.ytDlpExtraArgs,
  probeTimeoutMs: cfg.probeTimeoutMs,
  log: getLogger('ytdlp'),
});
const runner = new JobRunner({
  registry,
  extractor,
  outputDir: cfg.downloadDir,
  maxConcurrent: cfg.maxConcurrentJobs,
  log: getLogger('jobs'),
});
const limiter = new RateLimiter({ limits: cfg.rateLimits });
const updater = createToolUpdater(extractor, getLogger('ytdlp'));

const app = createApp({ cfg, registry, runner, extractor, limiter, updater, log });

if (!cfg.ffmpegLocation) {
  log.warn('ffmpeg_not_found', 'Audio extraction and merging may fail; set FFMPEG_LOCATION');
}
if (!cfg.auth.enabled) {
  log.warn('auth_disabled', 'Anyone who can reach this server can use it; set AUTH_ENABLED=1 to require a password');
}

let pruneTimer: NodeJS.Timeout | undefined;
if (cfg.jobRetentionMs > 0) {
  pruneTimer = setInterval(() => {
    const removed = registry.prune(cfg.jobRetentionMs);
    if (removed > 0) log.info('jobs_pruned', { removed, remaining: registry.size });
  }, Math.min(cfg.jobRetentionMs, 60_000));
  pruneTimer.unref();
}

const sweepTimer = setInterval(() => {
  const dropped = limiter.sweep();
  if (dropped > 0) log.debug('rate_limit_swept', { dropped, tracked: limiter.size });
}, 60_000);
sweepTimer.unref();

updater.startAuto(cfg.autoUpdateHours);

const server: Server = app.listen(cfg.port, cfg.host, () => {
  const urls = listenUrls(cfg.host, cfg.port);
  log.info(`media server listening on ${urls.local}`);
  if (urls.network) log.info(`network: ${urls.network} (open this on other devices)`);
  log.info('config', {
    downloadDir: cfg.downloadDir,
    ffmpegLocation: cfg.ffmpegLocation ?? null,
    maxConcurrentJobs: cfg.maxConcurrentJobs,
    auth: cfg.auth.enabled,
  });
});
server.keepAliveTimeout = 120_000;
server.headersTimeout = 125_000;

server.on('error', (err: NodeJS.ErrnoException) => {
  log.error('server_error', err.code === 'EADDRINUSE' ? `Port ${cfg.port} is already in use` : err);
  process.exitCode = 1;
});

let shuttingDown = false;
async function gracefulShutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info('shutdown', { signal });
  updater.stop();
  if (pruneTimer) clearInterval(pruneTimer);
  clearInterval(sweepTimer);
  server.close((err) => {
    if (err) log.warn('server_close_failed', err);
  });
  await runner.shutdown();
  process.exit(0);
}

const onSignal = (signal: string) => {
  gracefulShutdown(signal).catch((err: unknown) => {
    log.error('shutdown_failed', err);
    process.exit(1);
  });
};
process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));

process.on('uncaughtException', (err) => {
  log.error('uncaught_exception', err.stack || String(err));
});
process.on('unhandledRejection', (reason: unknown) => {
  log.error('unhandled_rejection', reason instanceof Error ? reason.stack || reason.message : String(reason));
});
