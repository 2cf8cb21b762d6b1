import path from 'node:path';
import { ConfigError, detectFfmpegLocation, envInt, envPositiveInt, envString, isFalse, isTrue } from './env.js';

export type WindowLimit = {
  limit: number;
  windowMs: number;
};

export type AppConfig = {
  port: number;
  host: string;
  downloadDir: string;
  ytDlpPath: string;
  ffmpegLocation?: string; // directory passed to --ffmpeg-location
  ytDlpExtraArgs: string[]; // opaque extra flags for the extractor
  probeTimeoutMs: number;
  rateLimits: {
    download: WindowLimit;
    toolUpdate: WindowLimit;
  };
  maxConcurrentJobs: number; // 0 = unlimited
  downloadsListLimit: number;
  jobRetentionMs: number; // 0 = keep finished jobs for the life of the process
  globalRequestsPerMinute: number;
  trustProxy: boolean | number | string[];
  auth: {
    enabled: boolean;
    username: string;
    password: string;
  };
  autoUpdateHours: number; // 0 = disabled
};

const MINUTE = 60_000;

function parseTrustProxy(input: string | undefined): AppConfig['trustProxy'] {
  const val = (input || '').trim();
  if (!val || isFalse(val)) return false;
  if (isTrue(val)) return true;
  if (/^\d+$/.test(val)) return Number(val);
  return val.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseExtraArgs(input: string | undefined): string[] {
  return (input || '').split(/\s+/).map((s) => s.trim()).filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const authEnabled = isTrue(env.AUTH_ENABLED);
  const password = env.AUTH_PASSWORD ?? '';
  if (authEnabled && !password) {
    throw new ConfigError('Invalid config: AUTH_ENABLED is set but AUTH_PASSWORD is empty');
  }

  const port = envPositiveInt(env, 'PORT', 5051);
  if (port > 65_535) {
    throw new ConfigError(`Invalid config: PORT must be at most 65535, got "${port}"`);
  }

  return {
    port,
    host: envString(env, 'HOST', '0.0.0.0'),
    downloadDir: path.resolve(envString(env, 'DOWNLOAD_DIR', 'downloads')),
    ytDlpPath: envString(env, 'YTDLP_PATH', 'yt-dlp'),
    ffmpegLocation: envString(env, 'FFMPEG_LOCATION') || detectFfmpegLocation(env),
    ytDlpExtraArgs: parseExtraArgs(env.YTDLP_EXTRA_ARGS),
    probeTimeoutMs: envPositiveInt(env, 'PROBE_TIMEOUT_MS', 60_000),
    rateLimits: {
      download: {
        limit: envPositiveInt(env, 'DOWNLOAD_RATE_LIMIT', 10),
        windowMs: envPositiveInt(env, 'DOWNLOAD_RATE_WINDOW_MIN', 10) * MINUTE,
      },
      toolUpdate: {
        limit: envPositiveInt(env, 'UPDATE_RATE_LIMIT', 1),
        windowMs: envPositiveInt(env, 'UPDATE_RATE_WINDOW_MIN', 5) * MINUTE,
      },
    },
    maxConcurrentJobs: envInt(env, 'MAX_CONCURRENT_JOBS', 0),
    downloadsListLimit: envPositiveInt(env, 'DOWNLOADS_LIST_LIMIT', 50),
    jobRetentionMs: envInt(env, 'JOB_RETENTION_MINUTES', 0) * MINUTE,
    globalRequestsPerMinute: envPositiveInt(env, 'GLOBAL_REQUESTS_PER_MINUTE', 600),
    trustProxy: parseTrustProxy(env.TRUST_PROXY),
    auth: {
      enabled: authEnabled,
      username: envString(env, 'AUTH_USERNAME', 'admin'),
      password,
    },
    autoUpdateHours: envInt(env, 'YTDLP_AUTO_UPDATE_HOURS', 0),
  };
}
