import type { WindowLimit } from './config.js';

export const ACTION_CLASSES = ['download', 'toolUpdate'] as const;

export type ActionClass = (typeof ACTION_CLASSES)[number];

export type Admission = {
  allowed: boolean;
  /** Milliseconds until the oldest counted entry leaves the window; 0 when allowed. */
  retryAfterMs: number;
  remaining: number;
};

export type RateLimiterOptions = {
  limits: Record<ActionClass, WindowLimit>;
  now?: () => number;
};

/**
 * Sliding-window log limiter keyed by (client, action class).
 *
 * Each key holds the ascending timestamps of accepted actions. Entries older
 * than the class window are evicted lazily when the key is next evaluated;
 * `sweep` drops clients that never came back.
 * A rejected attempt records nothing, so it never consumes capacity.
 * `admit` runs to completion synchronously; check and record cannot interleave
 * with another admission.
 */
export class RateLimiter {
  private readonly logs: Record<ActionClass, Map<string, number[]>> = {
    download: new Map(),
    toolUpdate: new Map(),
  };
  private readonly limits: Record<ActionClass, WindowLimit>;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    this.limits = options.limits;
    this.now = options.now ?? Date.now;
  }

  admit(clientId: string, action: ActionClass): Admission {
    const { limit, windowMs } = this.limits[action];
    const logs = this.logs[action];
    const now = this.now();
    const cutoff = now - windowMs;

    const log = logs.get(clientId) ?? [];
    let expired = 0;
    while (expired < log.length && log[expired] <= cutoff) expired++;
    if (expired > 0) log.splice(0, expired);

    if (log.length < limit) {
      log.push(now);
      logs.set(clientId, log);
      return { allowed: true, retryAfterMs: 0, remaining: limit - log.length };
    }

    if (log.length === 0) {
      logs.delete(clientId);
      return { allowed: false, retryAfterMs: windowMs, remaining: 0 };
    }
    const oldest = log[0];
    return { allowed: false, retryAfterMs: Math.max(1, oldest + windowMs - now), remaining: 0 };
  }

  /** Number of accepted actions currently inside the window (no eviction side effects). */
  count(clientId: string, action: ActionClass): number {
    const { windowMs } = this.limits[action];
    const cutoff = this.now() - windowMs;
    const log = this.logs[action].get(clientId) ?? [];
    return log.filter((t) => t > cutoff).length;
  }

  /** Drop clients whose every entry has left the window. Returns how many were dropped. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const action of ACTION_CLASSES) {
      const cutoff = now - this.limits[action].windowMs;
      for (const [clientId, log] of this.logs[action]) {
        const newest = log[log.length - 1];
        if (newest === undefined || newest <= cutoff) {
          this.logs[action].delete(clientId);
          removed++;
        }
      }
    }
    return removed;
  }

  /** Tracked (client, action class) keys. */
  get size(): number {
    return this.logs.download.size + this.logs.toolUpdate.size;
  }

  limitFor(action: ActionClass): WindowLimit {
    return this.limits[action];
  }

  reset(): void {
    this.logs.download.clear();
    this.logs.toolUpdate.clear();
  }
}
