import { beforeEach, describe, expect, it } from 'vitest';
import { RateLimiter } from '../core/RateLimiter.js';

const T0 = 1_700_000_000_000;
const TEN_MIN = 10 * 60_000;

describe('RateLimiter', () => {
  let now: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = T0;
    limiter = new RateLimiter({
      limits: {
        download: { limit: 10, windowMs: TEN_MIN },
        toolUpdate: { limit: 1, windowMs: 5 * 60_000 },
      },
      now: () => now,
    });
  });

  const fillDownloads = () => {
    for (let i = 0; i < 10; i++) {
      now = T0 + i * 1000;
      expect(limiter.admit('client-a', 'download').allowed).toBe(true);
    }
  };

  it('should admit up to the limit and report what remains', () => {
    expect(limiter.admit('client-a', 'download')).toEqual({ allowed: true, retryAfterMs: 0, remaining: 9 });
    for (let i = 0; i < 8; i++) limiter.admit('client-a', 'download');
    expect(limiter.admit('client-a', 'download')).toEqual({ allowed: true, retryAfterMs: 0, remaining: 0 });
  });

  it('should reject the 11th request with time until the oldest entry expires', () => {
    fillDownloads();
    now = T0 + 10_000;
    const verdict = limiter.admit('client-a', 'download');
    expect(verdict).toEqual({ allowed: false, retryAfterMs: TEN_MIN - 10_000, remaining: 0 });
  });

  it('should admit again once the window has slid past the oldest entry', () => {
    fillDownloads();
    now = T0 + TEN_MIN - 1;
    expect(limiter.admit('client-a', 'download').allowed).toBe(false);
    now = T0 + TEN_MIN;
    expect(limiter.admit('client-a', 'download')).toEqual({ allowed: true, retryAfterMs: 0, remaining: 0 });
  });

  it('should not let rejected attempts consume capacity', () => {
    fillDownloads();
    now = T0 + 60_000;
    for (let i = 0; i < 25; i++) expect(limiter.admit('client-a', 'download').allowed).toBe(false);
    expect(limiter.count('client-a', 'download')).toBe(10);

    now = T0 + TEN_MIN;
    expect(limiter.admit('client-a', 'download').allowed).toBe(true);
    const next = limiter.admit('client-a', 'download');
    expect(next.allowed).toBe(false);
    expect(next.retryAfterMs).toBe(1000);
  });

  it('should keep clients and action classes apart', () => {
    fillDownloads();
    expect(limiter.admit('client-a', 'download').allowed).toBe(false);
    expect(limiter.admit('client-b', 'download').allowed).toBe(true);
    expect(limiter.admit('client-a', 'toolUpdate').allowed).toBe(true);
  });

  it('should allow one tool update per five minutes', () => {
    expect(limiter.admit('client-a', 'toolUpdate').allowed).toBe(true);
    now = T0 + 60_000;
    expect(limiter.admit('client-a', 'toolUpdate')).toEqual({
      allowed: false,
      retryAfterMs: 4 * 60_000,
      remaining: 0,
    });
    now = T0 + 5 * 60_000;
    expect(limiter.admit('client-a', 'toolUpdate').allowed).toBe(true);
  });

  it('should always report a positive retry-after on rejection', () => {
    limiter.admit('client-a', 'toolUpdate');
    const verdict = limiter.admit('client-a', 'toolUpdate');
    expect(verdict.allowed).toBe(false);
    expect(verdict.retryAfterMs).toBe(5 * 60_000);
  });

  it('should sweep clients whose entries have all expired', () => {
    fillDownloads();
    limiter.admit('client-b', 'toolUpdate');
    expect(limiter.size).toBe(2);

    now = T0 + 9000 + 5 * 60_000;
    expect(limiter.sweep()).toBe(1);
    expect(limiter.size).toBe(1);

    now = T0 + 9000 + TEN_MIN;
    expect(limiter.sweep()).toBe(1);
    expect(limiter.size).toBe(0);
    expect(limiter.admit('client-a', 'download')).toEqual({ allowed: true, retryAfterMs: 0, remaining: 9 });
  });

  it('should not keep a log for a client it never admits', () => {
    const closed = new RateLimiter({
      limits: {
        download: { limit: 0, windowMs: 60_000 },
        toolUpdate: { limit: 1, windowMs: 60_000 },
      },
      now: () => now,
    });
    expect(closed.admit('client-a', 'download')).toEqual({ allowed: false, retryAfterMs: 60_000, remaining: 0 });
    expect(closed.size).toBe(0);
  });

  it('should forget everything on reset', () => {
    fillDownloads();
    limiter.reset();
    expect(limiter.count('client-a', 'download')).toBe(0);
    expect(limiter.admit('client-a', 'download').allowed).toBe(true);
  });
});
