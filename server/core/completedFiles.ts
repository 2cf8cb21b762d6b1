import fs from 'node:fs/promises';
import path from 'node:path';

/** Suffixes yt-dlp gives files it is still writing. */
export const PARTIAL_SUFFIXES = ['.part', '.ytdl', '.temp'] as const;

export const isPartialFile = (name: string): boolean => PARTIAL_SUFFIXES.some((s) => name.endsWith(s));

export type CompletedFile = {
  filename: string;
  size: number;
  /** ISO timestamp of the last modification */
  modified: string;
};

/**
 * Finished artifacts in `dir`, newest first. Hidden entries, partial downloads
 * and anything that is not a regular file are skipped; a missing directory
 * lists as empty.
 */
export async function listCompletedFiles(dir: string, limit: number): Promise<CompletedFile[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }

  const files: { filename: string; size: number; mtimeMs: number }[] = [];
  for (const name of names) {
    if (name.startsWith('.') || isPartialFile(name)) continue;
    const stat = await fs.stat(path.join(dir, name)).catch(() => null);
    if (!stat?.isFile()) continue;
    files.push({ filename: name, size: stat.size, mtimeMs: stat.mtimeMs });
  }

  files.sort((a, b) => b.mtimeMs - a.mtimeMs || a.filename.localeCompare(b.filename));
  return files.slice(0, Math.max(0, limit)).map((f) => ({
    filename: f.filename,
    size: f.size,
    modified: new Date(f.mtimeMs).toISOString(),
  }));
}

export function isSafeFileName(name: string): boolean {
  if (!name || name === '.' || name === '..') return false;
  if (name.startsWith('.')) return false;
  return !/[/\\\0]/.test(name);
}

/**
 * Absolute path of `name` inside `dir`, or null when the name is unsafe,
 * escapes the directory, or is not an existing regular file.
 */
export async function resolveCompletedFile(dir: string, name: string): Promise<string | null> {
  if (!isSafeFileName(name)) return null;
  const root = path.resolve(dir);
  const full = path.resolve(root, name);
  if (path.dirname(full) !== root) return null;
  const stat = await fs.stat(full).catch(() => null);
  return stat?.isFile() ? full : null;
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
