import { spawn, type SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { z } from 'zod';
import { combineSignals, isTimeoutReason } from './abort.js';
import { isPartialFile } from './completedFiles.js';
import {
  CANCELLED_MESSAGE,
  EMPTY_RESULT_MESSAGE,
  ExtractionError,
  classifyToolFailure,
  type ExtractionStage,
} from './errors.js';
import type { Extractor, FetchRequest, MediaFormat, MediaMetadata, ProgressSink, UpdateResult } from './Extractor.js';
import { formatArgs } from './formats.js';
import { getLogger, type Logger } from './logger.js';
import { ARTIFACT_TEMPLATE, DOWNLOAD_TEMPLATE, POSTPROCESS_TEMPLATE, parseToolLine } from './progress.js';

/** The slice of ChildProcess the adapter relies on. */
export interface ToolProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnTool = (command: string, args: readonly string[], options: SpawnOptions) => ToolProcess;

export type YtDlpExtractorOptions = {
  ytDlpPath?: string;
  ffmpegLocation?: string;
  extraArgs?: readonly string[];
  probeTimeoutMs?: number;
  spawn?: SpawnTool;
  log?: Logger;
  now?: () => number;
};

type ToolRun = {
  code: number | null;
  stdout: string[];
  stderr: string;
};

type RunOptions = {
  signal?: AbortSignal;
  onLine?: (line: string) => void;
};

const DEFAULT_PROBE_TIMEOUT_MS = 60_000;
const VERSION_TTL_MS = 5 * 60_000;
const KILL_GRACE_MS = 5_000;
const MAX_STDOUT_LINES = 200;
const MAX_STDERR_CHARS = 64 * 1024;
const DESCRIPTION_MAX = 500;

const defaultSpawn: SpawnTool = (command, args, options) => spawn(command, args, options);

const RawFormatSchema = z.object({
  format_id: z.string().nullish(),
  ext: z.string().nullish(),
  resolution: z.string().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish(),
  vcodec: z.string().nullish(),
  acodec: z.string().nullish(),
  fps: z.number().nullish(),
  tbr: z.number().nullish(),
});

const RawInfoSchema = z.object({
  title: z.string().nullish(),
  uploader: z.string().nullish(),
  view_count: z.number().nullish(),
  duration: z.number().nullish(),
  thumbnail: z.string().nullish(),
  description: z.string().nullish(),
  formats: z.array(RawFormatSchema).nullish(),
});

type RawFormat = z.infer<typeof RawFormatSchema>;

function toMediaFormat(f: RawFormat): MediaFormat {
  return {
    format_id: f.format_id ?? '',
    ext: f.ext ?? '',
    resolution: f.resolution ?? 'audio only',
    filesize: f.filesize ?? f.filesize_approx ?? null,
    vcodec: f.vcodec ?? 'none',
    acodec: f.acodec ?? 'none',
    fps: f.fps ?? null,
    tbr: f.tbr ?? null,
  };
}

/** Formats with a video stream, or standalone audio. */
const isUsableFormat = (f: RawFormat): boolean => f.vcodec !== 'none' || f.acodec !== 'none';

export function parseMetadata(stdout: string): MediaMetadata {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ExtractionError('Internal', `Extractor returned unreadable metadata: ${reason}`);
  }
  const parsed = RawInfoSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
    throw new ExtractionError('Internal', `Extractor returned unexpected metadata (${where})`);
  }
  const info = parsed.data;
  return {
    title: info.title ?? 'Unknown',
    uploader: info.uploader ?? 'Unknown',
    view_count: info.view_count ?? 0,
    duration: info.duration ?? 0,
    thumbnail: info.thumbnail ?? '',
    description: (info.description ?? '').slice(0, DESCRIPTION_MAX),
    formats: (info.formats ?? []).filter(isUsableFormat).map(toMediaFormat),
  };
}

/**
 * Calls `onLine` for each non-blank line of `stream`. The returned function
 * flushes a trailing line that had no newline.
 */
function readLines(stream: Readable | null, onLine: (line: string) => void): () => void {
  let buffer = '';
  const flush = () => {
    if (!buffer.trim()) return;
    const rest = buffer;
    buffer = '';
    onLine(rest);
  };
  if (!stream) return flush;
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => {
    buffer += chunk;
    const parts = buffer.split(/\r\n|\n|\r/);
    buffer = parts.pop() ?? '';
    for (const part of parts) if (part.trim()) onLine(part);
  });
  stream.on('end', flush);
  return flush;
}

const lastLine = (lines: readonly string[]): string => {
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    const line = lines[i].trim();
    if (line) return line;
  }
  return '';
};

function abortFailure(reason: unknown, stage: ExtractionStage, timeoutMs: number): ExtractionError {
  if (isTimeoutReason(reason)) {
    const what = stage === 'probe' ? 'fetching video info' : 'downloading';
    return new ExtractionError('NetworkError', `Network error: timed out after ${Math.round(timeoutMs / 1000)}s ${what}`);
  }
  return new ExtractionError('Cancelled', CANCELLED_MESSAGE);
}

/**
 * Extractor backed by the yt-dlp command line. Progress comes from
 * `--progress-template` lines, the artifact path from `--print after_move:`.
 */
export class YtDlpExtractor implements Extractor {
  private readonly ytDlpPath: string;
  private readonly ffmpegLocation?: string;
  private readonly extraArgs: readonly string[];
  private readonly probeTimeoutMs: number;
  private readonly spawnTool: SpawnTool;
  private readonly log: Logger;
  private readonly now: () => number;
  private versionCache?: { value: string; at: number };

  constructor(options: YtDlpExtractorOptions = {}) {
    this.ytDlpPath = options.ytDlpPath ?? 'yt-dlp';
    this.ffmpegLocation = options.ffmpegLocation;
    this.extraArgs = options.extraArgs ?? [];
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.spawnTool = options.spawn ?? defaultSpawn;
    this.log = options.log ?? getLogger('ytdlp');
    this.now = options.now ?? Date.now;
  }

  async probe(url: string, browser: string, signal?: AbortSignal): Promise<MediaMetadata> {
    const args = [
      '--dump-single-json',
      '--skip-download',
      '--no-warnings',
      '--no-playlist',
      ...this.sharedArgs(browser),
      '--',
      url,
    ];
    const combined = combineSignals(signal, AbortSignal.timeout(this.probeTimeoutMs));
    const result = await this.run(args, 'probe', { signal: combined });
    if (result.code !== 0) {
      const failure = classifyToolFailure(result.stderr || result.stdout.join('\n'), 'probe');
      this.log.warn('probe_failed', { code: failure.code, exitCode: result.code, message: failure.message });
      throw failure;
    }
    return parseMetadata(result.stdout.join('\n'));
  }

  async fetch(request: FetchRequest, onProgress: ProgressSink): Promise<string> {
    const template = path.join(request.outputDir, `${request.filePrefix}_%(title)s.%(ext)s`);
    const args = [
      '--newline',
      '--progress',
      '--no-warnings',
      '--no-playlist',
      '--progress-template',
      DOWNLOAD_TEMPLATE,
      '--progress-template',
      POSTPROCESS_TEMPLATE,
      '--print',
      ARTIFACT_TEMPLATE,
      '--no-simulate',
      ...formatArgs(request.format),
      '-o',
      template,
      ...this.sharedArgs(request.browser),
      '--',
      request.url,
    ];

    let artifact: string | undefined;
    const onLine = (line: string) => {
      const parsed = parseToolLine(line);
      if (parsed.type === 'artifact') artifact = parsed.path;
      else if (parsed.type === 'progress' && !request.signal.aborted) onProgress(parsed.event);
    };

    let result: ToolRun;
    try {
      result = await this.run(args, 'fetch', { signal: request.signal, onLine });
    } catch (err) {
      await this.removePartials(request.outputDir, request.filePrefix);
      throw err;
    }

    if (result.code !== 0) {
      await this.removePartials(request.outputDir, request.filePrefix);
      const failure = classifyToolFailure(result.stderr || result.stdout.join('\n'), 'fetch');
      this.log.warn('fetch_failed', { code: failure.code, exitCode: result.code, message: failure.message });
      throw failure;
    }

    const produced = artifact ?? (await this.findArtifact(request.outputDir, request.filePrefix));
    return this.verifyArtifact(produced);
  }

  async getVersion(): Promise<string> {
    const at = this.now();
    if (this.versionCache && at - this.versionCache.at < VERSION_TTL_MS) return this.versionCache.value;
    const result = await this.run(['--version'], 'probe');
    if (result.code !== 0) throw classifyToolFailure(result.stderr || result.stdout.join('\n'), 'probe');
    const value = lastLine(result.stdout) || 'unknown';
    this.versionCache = { value, at };
    return value;
  }

  async update(): Promise<UpdateResult> {
    const result = await this.run(['-U'], 'probe');
    this.versionCache = undefined;
    const detail = lastLine(result.stdout);
    if (result.code === 0) {
      this.log.info('ytdlp_update_checked', { detail: detail || 'no_output' });
      return { success: true, message: detail || 'yt-dlp is up to date' };
    }
    const reason = lastLine(result.stderr.split(/\r?\n/)) || detail || `exit code ${String(result.code)}`;
    this.log.warn('ytdlp_update_failed', { exitCode: result.code, reason });
    return { success: false, message: `Update failed: ${reason}` };
  }

  private sharedArgs(browser: string): string[] {
    const args: string[] = [];
    if (browser && browser !== 'none') args.push('--cookies-from-browser', browser);
    if (this.ffmpegLocation) args.push('--ffmpeg-location', this.ffmpegLocation);
    args.push(...this.extraArgs);
    return args;
  }

  private run(args: string[], stage: ExtractionStage, options: RunOptions = {}): Promise<ToolRun> {
    const { signal, onLine } = options;
    return new Promise<ToolRun>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortFailure(signal.reason, stage, this.probeTimeoutMs));
        return;
      }

      let child: ToolProcess;
      try {
        child = this.spawnTool(this.ytDlpPath, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });
      } catch (err) {
        reject(classifyToolFailure(err instanceof Error ? err.message : String(err), stage));
        return;
      }

      const stdout: string[] = [];
      let stderr = '';
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const onAbort = () => {
        this.log.info('tool_abort', { stage });
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
        killTimer.unref();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (settle: () => void) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        if (killTimer) clearTimeout(killTimer);
        settle();
      };

      const flushStdout = readLines(child.stdout, (line) => {
        stdout.push(line);
        if (stdout.length > MAX_STDOUT_LINES) stdout.shift();
        onLine?.(line);
      });
      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
        if (stderr.length > MAX_STDERR_CHARS) stderr = stderr.slice(-MAX_STDERR_CHARS);
      });

      child.on('error', (err: Error) => {
        this.log.error('tool_spawn_error', { stage, error: err.message });
        finish(() => reject(classifyToolFailure(err.message, stage)));
      });

      child.on('close', (code: number | null) => {
        flushStdout();
        finish(() => {
          if (signal?.aborted) reject(abortFailure(signal.reason, stage, this.probeTimeoutMs));
          else resolve({ code, stdout, stderr });
        });
      });
    });
  }

  private async findArtifact(dir: string, prefix: string): Promise<string | undefined> {
    const names = await fs.readdir(dir).catch((err: unknown) => {
      this.log.warn('artifact_scan_failed', { dir, error: String(err) });
      return [];
    });
    let best: { file: string; mtime: number } | undefined;
    for (const name of names) {
      if (!name.startsWith(`${prefix}_`) || isPartialFile(name)) continue;
      const file = path.join(dir, name);
      const stat = await fs.stat(file).catch(() => null);
      if (stat?.isFile() && (!best || stat.mtimeMs > best.mtime)) best = { file, mtime: stat.mtimeMs };
    }
    return best?.file;
  }

  private async verifyArtifact(file: string | undefined): Promise<string> {
    if (!file) throw new ExtractionError('EmptyResult', EMPTY_RESULT_MESSAGE);
    const stat = await fs.stat(file).catch((err: unknown) => {
      this.log.warn('artifact_missing', { file, error: String(err) });
      return null;
    });
    if (!stat || !stat.isFile()) throw new ExtractionError('EmptyResult', EMPTY_RESULT_MESSAGE);
    if (stat.size === 0) {
      await fs.rm(file, { force: true });
      throw new ExtractionError('EmptyResult', EMPTY_RESULT_MESSAGE);
    }
    return path.resolve(file);
  }

  private async removePartials(dir: string, prefix: string): Promise<void> {
    const names = await fs.readdir(dir).catch((err: unknown) => {
      this.log.debug('partial_scan_failed', { dir, error: String(err) });
      return [];
    });
    const partials = names.filter(
      (name) => name.startsWith(`${prefix}_`) && isPartialFile(name),
    );
    await Promise.all(partials.map((name) => fs.rm(path.join(dir, name), { force: true })));
  }
}
