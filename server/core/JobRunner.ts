import path from 'node:path';
import { CANCELLED_MESSAGE, ExtractionError, toExtractionError } from './errors.js';
import type { Extractor, ProgressEvent } from './Extractor.js';
import type { FormatChoice } from './formats.js';
import { JobRegistry, clampPercent, isTerminal, type Job, type JobPatch } from './JobRegistry.js';
import { getLogger, type Logger } from './logger.js';

export type DownloadRequest = {
  url: string;
  format: FormatChoice;
  browser: string;
};

export type JobRunnerOptions = {
  registry: JobRegistry;
  extractor: Extractor;
  outputDir: string;
  /** 0 = unlimited */
  maxConcurrent?: number;
  log?: Logger;
};

type RunEntry = {
  id: string;
  request: DownloadRequest;
  controller: AbortController;
  /** Highest percent seen in the current downloading phase. */
  floor: number;
  enqueuedAt: number;
  done: Promise<Job>;
  resolve: (job: Job) => void;
};

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const cancelledPatch = (): JobPatch => ({
  status: 'error',
  errorMessage: CANCELLED_MESSAGE,
  errorCode: 'Cancelled',
});

/**
 * Job Runner - one asynchronous worker per accepted download
 *
 * Workers are the only writers of their job's record. Whatever happens inside
 * the adapter, each job ends in exactly one terminal state.
 */
export class JobRunner {
  private readonly entries = new Map<string, RunEntry>();
  private readonly waiting: string[] = [];
  private readonly running = new Set<string>();

  private readonly registry: JobRegistry;
  private readonly extractor: Extractor;
  private readonly outputDir: string;
  private readonly maxConcurrent: number;
  private readonly log: Logger;

  constructor(options: JobRunnerOptions) {
    this.registry = options.registry;
    this.extractor = options.extractor;
    this.outputDir = options.outputDir;
    this.maxConcurrent = Math.max(0, options.maxConcurrent ?? 0);
    this.log = options.log ?? getLogger('jobs');
  }

  /**
   * Register a job and return it at once. The worker starts on a later tick.
   */
  start(request: DownloadRequest): Job {
    const job = this.registry.create({ url: request.url, format: request.format });
    const { promise, resolve } = deferred<Job>();
    this.entries.set(job.id, {
      id: job.id,
      request,
      controller: new AbortController(),
      floor: 0,
      enqueuedAt: Date.now(),
      done: promise,
      resolve,
    });
    this.waiting.push(job.id);
    this.log.info('job_created', { id: job.id, format: request.format, queued: this.waiting.length });
    setImmediate(() => this.schedule());
    return job;
  }

  /**
   * Request cancellation. False when the job is unknown or already finished.
   */
  cancel(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    if (!entry.controller.signal.aborted) {
      entry.controller.abort();
      this.log.info('job_cancel_requested', { id, running: this.running.has(id) });
    }
    if (!this.running.has(id)) {
      const idx = this.waiting.indexOf(id);
      if (idx >= 0) this.waiting.splice(idx, 1);
      this.finish(entry, cancelledPatch());
    }
    return true;
  }

  /** Resolves with the terminal record; undefined for unknown ids. */
  settled(id: string): Promise<Job | undefined> {
    const entry = this.entries.get(id);
    if (entry) return entry.done;
    return Promise.resolve(this.registry.get(id));
  }

  getStats() {
    let complete = 0;
    let error = 0;
    for (const job of this.registry.list()) {
      if (job.status === 'complete') complete++;
      else if (job.status === 'error') error++;
    }
    return {
      total: this.registry.size,
      running: this.running.size,
      waiting: this.waiting.length,
      complete,
      error,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /** Cancel everything still pending and wait for the workers to settle. */
  async shutdown(): Promise<void> {
    const pending = Array.from(this.entries.values());
    for (const entry of pending) this.cancel(entry.id);
    await Promise.all(pending.map((entry) => entry.done));
    this.log.info('runner_shutdown', { cancelled: pending.length });
  }

  private schedule(): void {
    while (this.waiting.length > 0 && (this.maxConcurrent === 0 || this.running.size < this.maxConcurrent)) {
      const id = this.waiting.shift();
      const entry = id === undefined ? undefined : this.entries.get(id);
      if (!entry) continue;
      this.running.add(entry.id);
      this.runJob(entry).catch((err: unknown) => {
        this.log.error('job_worker_crashed', { id: entry.id, error: err });
      });
    }
  }

  private async runJob(entry: RunEntry): Promise<void> {
    const { id, request, controller } = entry;
    this.log.info('job_started', { id, waitMs: Date.now() - entry.enqueuedAt });

    let outcome: JobPatch | undefined;
    try {
      const artifact = await this.extractor.fetch(
        {
          url: request.url,
          format: request.format,
          browser: request.browser,
          outputDir: this.outputDir,
          filePrefix: id,
          signal: controller.signal,
        },
        (event) => this.onProgress(entry, event),
      );
      if (controller.signal.aborted) throw new ExtractionError('Cancelled', CANCELLED_MESSAGE);
      outcome = { status: 'complete', percent: 100, filename: path.basename(artifact) };
    } catch (err) {
      const failure = controller.signal.aborted
        ? new ExtractionError('Cancelled', CANCELLED_MESSAGE)
        : toExtractionError(err);
      outcome = { status: 'error', errorMessage: failure.message, errorCode: failure.code };
    } finally {
      this.finish(
        entry,
        outcome ?? { status: 'error', errorMessage: 'Worker exited without a result', errorCode: 'Internal' },
      );
    }
  }

  private onProgress(entry: RunEntry, event: ProgressEvent): void {
    if (entry.controller.signal.aborted) return;
    const current = this.registry.get(entry.id);
    if (!current || isTerminal(current.status)) return;

    try {
      if (event.phase === 'processing') {
        entry.floor = 0;
        if (current.status !== 'processing') this.registry.update(entry.id, { status: 'processing', percent: 100 });
        return;
      }
      const percent = event.percent === undefined ? entry.floor : Math.max(entry.floor, clampPercent(event.percent));
      entry.floor = percent;
      this.registry.update(entry.id, { status: 'downloading', percent, speed: event.speed, eta: event.eta });
    } catch (err) {
      this.log.error('job_progress_rejected', { id: entry.id, error: err });
    }
  }

  private finish(entry: RunEntry, outcome: JobPatch): void {
    const { id } = entry;
    if (!this.entries.has(id)) return;

    const current = this.registry.get(id);
    let final = current;
    if (current && !isTerminal(current.status)) {
      try {
        final = this.registry.update(id, outcome);
      } catch (err) {
        this.log.error('job_outcome_rejected', { id, error: err });
        final = this.registry.update(id, {
          status: 'error',
          errorMessage: 'Internal error: job ended in an inconsistent state',
          errorCode: 'Internal',
        });
      }
    }

    this.entries.delete(id);
    this.running.delete(id);

    if (final?.status === 'complete') {
      this.log.info('job_completed', { id, filename: final.filename, durationMs: Date.now() - entry.enqueuedAt });
    } else if (final?.errorCode === 'Cancelled') {
      this.log.info('job_cancelled', { id });
    } else if (final) {
      this.log.warn('job_failed', { id, code: final.errorCode, error: final.errorMessage });
    }

    if (final) entry.resolve(final);
    this.schedule();
  }
}
