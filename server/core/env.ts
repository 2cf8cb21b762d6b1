/**
 * Environment variable utilities
 * Consistent parsing of boolean and numeric values
 */

import fs from 'node:fs';
import path from 'node:path';

/**
 * Parse truthy environment variable
 * Accepts: 1, true, yes, on (case-insensitive)
 */
export const isTrue = (v?: string): boolean =>
  /^(1|true|yes|on)$/i.test(String(v || ''));

/**
 * Parse falsy environment variable
 * Accepts: 0, false, no, off (case-insensitive)
 */
export const isFalse = (v?: string): boolean =>
  /^(0|false|no|off)$/i.test(String(v || ''));

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Non-negative integer from the environment; unset or blank yields the default,
 * anything else that is not an integer >= 0 is a configuration error.
 */
export function envInt(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`Invalid config: ${key} must be a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

export function envPositiveInt(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const value = envInt(env, key, defaultValue);
  if (value === 0) {
    throw new ConfigError(`Invalid config: ${key} must be greater than zero`);
  }
  return value;
}

export const envString = (env: NodeJS.ProcessEnv, key: string, defaultValue = ''): string =>
  env[key]?.trim() || defaultValue;

const FFMPEG_BINARY = process.platform === 'win32' ? 'ffmpeg.exe' : 'ffmpeg';

const COMMON_FFMPEG_DIRS = [
  '/opt/homebrew/bin',
  '/usr/local/bin',
  '/usr/bin',
  'C:\\ffmpeg\\bin',
];

/**
 * Directory holding an ffmpeg binary: PATH first, then the usual package
 * manager locations. Undefined lets yt-dlp do its own lookup.
 */
export function detectFfmpegLocation(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const pathDirs = String(env.PATH || '')
    .split(path.delimiter)
    .map((dir) => dir.trim())
    .filter(Boolean);

  for (const dir of [...pathDirs, ...COMMON_FFMPEG_DIRS]) {
    const candidate = path.join(dir, FFMPEG_BINARY);
    try {
      if (fs.statSync(candidate).isFile()) return dir;
    } catch {
      // not here, keep looking
    }
  }
  return undefined;
}
