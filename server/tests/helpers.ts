import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { vi } from 'vitest';
import type { AppConfig } from '../core/config.js';
import type { Extractor } from '../core/Extractor.js';
import type { Logger } from '../core/logger.js';
import type { SpawnTool, ToolProcess } from '../core/YtDlpExtractor.js';

export function testLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function tempDir(prefix = 'media-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    downloadDir: overrides.downloadDir ?? tempDir(),
    ytDlpPath: 'yt-dlp',
    ytDlpExtraArgs: [],
    probeTimeoutMs: 60_000,
    rateLimits: {
      download: { limit: 10, windowMs: 10 * 60_000 },
      toolUpdate: { limit: 1, windowMs: 5 * 60_000 },
    },
    maxConcurrentJobs: 0,
    downloadsListLimit: 50,
    jobRetentionMs: 0,
    globalRequestsPerMinute: 10_000,
    trustProxy: false,
    auth: { enabled: false, username: 'admin', password: '' },
    autoUpdateHours: 0,
    ...overrides,
  };
}

export function fakeExtractor() {
  return {
    probe: vi.fn<Extractor['probe']>(),
    fetch: vi.fn<Extractor['fetch']>(),
    getVersion: vi.fn<Extractor['getVersion']>(),
    update: vi.fn<Extractor['update']>(),
  } satisfies Extractor;
}

/** Stand-in for a yt-dlp child process driven by the test. */
export class FakeToolProcess extends EventEmitter implements ToolProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: (NodeJS.Signals | number | undefined)[] = [];
  private closed = false;

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    this.exit(null);
    return true;
  }

  out(...lines: string[]): this {
    for (const line of lines) this.stdout.write(`${line}\n`);
    return this;
  }

  err(...lines: string[]): this {
    for (const line of lines) this.stderr.write(`${line}\n`);
    return this;
  }

  exit(code: number | null): void {
    if (this.closed) return;
    this.closed = true;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code));
  }

  fail(error: Error): void {
    if (this.closed) return;
    this.closed = true;
    setImmediate(() => this.emit('error', error));
  }
}

export type SpawnCall = { command: string; args: readonly string[] };

/**
 * Spawn function whose processes are scripted by `script`, which runs on the
 * tick after spawn so the adapter has attached its listeners.
 */
export function fakeSpawn(script: (proc: FakeToolProcess, args: readonly string[]) => void) {
  const calls: SpawnCall[] = [];
  const processes: FakeToolProcess[] = [];
  const spawn: SpawnTool = (command, args) => {
    const proc = new FakeToolProcess();
    calls.push({ command, args });
    processes.push(proc);
    setImmediate(() => script(proc, args));
    return proc;
  };
  return { spawn, calls, processes };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Value that follows `--flag` in an argument list. */
export function argAfter(args: readonly string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}
