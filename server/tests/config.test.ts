import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../core/config.js';
import { ConfigError } from '../core/env.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const cfg = loadConfig({ FFMPEG_LOCATION: '/opt/ffmpeg/bin' });
    expect(cfg).toEqual({
      port: 5051,
      host: '0.0.0.0',
      downloadDir: path.resolve('downloads'),
      ytDlpPath: 'yt-dlp',
      ffmpegLocation: '/opt/ffmpeg/bin',
      ytDlpExtraArgs: [],
      probeTimeoutMs: 60_000,
      rateLimits: {
        download: { limit: 10, windowMs: 600_000 },
        toolUpdate: { limit: 1, windowMs: 300_000 },
      },
      maxConcurrentJobs: 0,
      downloadsListLimit: 50,
      jobRetentionMs: 0,
      globalRequestsPerMinute: 600,
      trustProxy: false,
      auth: { enabled: false, username: 'admin', password: '' },
      autoUpdateHours: 0,
    });
  });

  it('should read overrides', () => {
    const cfg = loadConfig({
      PORT: '8080',
      DOWNLOAD_DIR: '/srv/media',
      DOWNLOAD_RATE_LIMIT: '3',
      DOWNLOAD_RATE_WINDOW_MIN: '1',
      YTDLP_EXTRA_ARGS: ' --geo-bypass   --force-ipv4 ',
      MAX_CONCURRENT_JOBS: '2',
      JOB_RETENTION_MINUTES: '60',
      TRUST_PROXY: '2',
    });
    expect(cfg.port).toBe(8080);
    expect(cfg.downloadDir).toBe(path.resolve('/srv/media'));
    expect(cfg.rateLimits.download).toEqual({ limit: 3, windowMs: 60_000 });
    expect(cfg.ytDlpExtraArgs).toEqual(['--geo-bypass', '--force-ipv4']);
    expect(cfg.maxConcurrentJobs).toBe(2);
    expect(cfg.jobRetentionMs).toBe(3_600_000);
    expect(cfg.trustProxy).toBe(2);
  });

  it('should read trust proxy flags and lists', () => {
    expect(loadConfig({ TRUST_PROXY: 'true' }).trustProxy).toBe(true);
    expect(loadConfig({ TRUST_PROXY: 'off' }).trustProxy).toBe(false);
    expect(loadConfig({ TRUST_PROXY: '10.0.0.0/8, 192.168.0.0/16' }).trustProxy).toEqual([
      '10.0.0.0/8',
      '192.168.0.0/16',
    ]);
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/at most 65535/);
    expect(() => loadConfig({ DOWNLOAD_RATE_LIMIT: '0' })).toThrow(/greater than zero/);
    expect(() => loadConfig({ MAX_CONCURRENT_JOBS: '-1' })).toThrow(ConfigError);
  });

  it('should require a password when auth is enabled', () => {
    expect(() => loadConfig({ AUTH_ENABLED: '1' })).toThrow(/AUTH_PASSWORD/);
    expect(loadConfig({ AUTH_ENABLED: 'true', AUTH_PASSWORD: 'test-secret' }).auth).toEqual({
      enabled: true,
      username: 'admin',
      password: 'test-secret',
    });
  });
});
