import { randomBytes } from 'node:crypto';
import type { ExtractionErrorCode } from './errors.js';

/**
 * Job states during lifecycle
 */
export type JobStatus = 'starting' | 'downloading' | 'processing' | 'complete' | 'error';

export type TerminalStatus = Extract<JobStatus, 'complete' | 'error'>;

export type JobErrorCode = ExtractionErrorCode;

export type Job = Readonly<{
  id: string;
  status: JobStatus;
  percent: number;
  /** bytes per second, only while downloading */
  speed?: number;
  /** seconds remaining, only while downloading */
  eta?: number;
  filename?: string;
  errorMessage?: string;
  errorCode?: JobErrorCode;
  url: string;
  format: string;
  createdAt: number;
  updatedAt: number;
  finishedAt?: number;
}>;

export type JobPatch = Partial<
  Pick<Job, 'status' | 'percent' | 'speed' | 'eta' | 'filename' | 'errorMessage' | 'errorCode'>
>;

export type JobInit = {
  url: string;
  format: string;
};

export class JobStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JobStateError';
  }
}

export const isTerminal = (status: JobStatus): status is TerminalStatus =>
  status === 'complete' || status === 'error';

export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

const ID_BYTES = 6;

/**
 * In-memory job table. Records are frozen snapshots; every update builds a new
 * record and swaps it in, so a reader holds either the old or the new record,
 * never a half-written one.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, Job>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  create(init: JobInit): Job {
    const id = this.newId();
    const at = this.now();
    const job: Job = Object.freeze({
      id,
      status: 'starting',
      percent: 0,
      url: init.url,
      format: init.format,
      createdAt: at,
      updatedAt: at,
    });
    this.jobs.set(id, job);
    return job;
  }

  get(id: string): Job | undefined {
    return this.jobs.get(id);
  }

  has(id: string): boolean {
    return this.jobs.has(id);
  }

  /**
   * Merge `patch` into the job. Fields the patch leaves out keep their values.
   * Throws JobStateError for unknown ids, for any write to a finished job, and
   * for terminal transitions missing their payload.
   */
  update(id: string, patch: JobPatch): Job {
    const current = this.jobs.get(id);
    if (!current) throw new JobStateError(`Unknown job ${id}`);
    if (isTerminal(current.status)) {
      throw new JobStateError(`Job ${id} is already ${current.status}`);
    }

    const next = normalize(mergePatch(current, patch, this.now()));

    if (next.status === 'complete' && !next.filename) {
      throw new JobStateError(`Job ${id} cannot complete without a filename`);
    }
    if (next.status === 'error' && !next.errorMessage) {
      throw new JobStateError(`Job ${id} cannot fail without an error message`);
    }

    const frozen = Object.freeze(next);
    this.jobs.set(id, frozen);
    return frozen;
  }

  list(): Job[] {
    return Array.from(this.jobs.values());
  }

  /** Drop finished jobs whose terminal transition is older than `maxAgeMs`. */
  prune(maxAgeMs: number): number {
    if (maxAgeMs <= 0) return 0;
    const cutoff = this.now() - maxAgeMs;
    let removed = 0;
    for (const job of this.jobs.values()) {
      if (isTerminal(job.status) && (job.finishedAt ?? job.updatedAt) <= cutoff) {
        this.jobs.delete(job.id);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.jobs.size;
  }

  private newId(): string {
    let id = randomBytes(ID_BYTES).toString('hex');
    while (this.jobs.has(id)) id = randomBytes(ID_BYTES).toString('hex');
    return id;
  }
}

function mergePatch(current: Job, patch: JobPatch, at: number): Job {
  return {
    ...current,
    status: patch.status ?? current.status,
    percent: patch.percent ?? current.percent,
    speed: patch.speed ?? current.speed,
    eta: patch.eta ?? current.eta,
    filename: patch.filename ?? current.filename,
    errorMessage: patch.errorMessage ?? current.errorMessage,
    errorCode: patch.errorCode ?? current.errorCode,
    updatedAt: at,
  };
}

function normalize(job: Job): Job {
  const { speed, eta, filename, errorMessage, errorCode, finishedAt: _finishedAt, ...rest } = job;
  const out: { -readonly [K in keyof Job]: Job[K] } = { ...rest, percent: clampPercent(job.percent) };

  if (job.status === 'downloading') {
    if (speed !== undefined && Number.isFinite(speed) && speed >= 0) out.speed = speed;
    if (eta !== undefined && Number.isFinite(eta) && eta >= 0) out.eta = eta;
  }
  if (job.status === 'complete') out.filename = filename;
  if (job.status === 'error') {
    out.errorMessage = errorMessage;
    out.errorCode = errorCode ?? 'Internal';
  }
  if (isTerminal(job.status)) out.finishedAt = job.updatedAt;
  return out;
}
