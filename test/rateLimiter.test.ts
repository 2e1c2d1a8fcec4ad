import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { RateLimiter } from '../src/crawler/network/rateLimiter.js';
import { CrawlerError } from '../src/errors.js';

beforeEach(() => {
  vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
});

afterEach(() => {
  vi.useRealTimers();
});

describe('RateLimiter', () => {
  it('spends the burst immediately and then paces at the configured rate', async () => {
    const limiter = new RateLimiter({ rate: 2 });
    const granted: number[] = [];
    const acquisitions = [1, 2, 3, 4].map((id) => limiter.acquire().then(() => granted.push(id)));

    await vi.advanceTimersByTimeAsync(0);
    expect(granted).toEqual([1, 2]);
    expect(limiter.waiting).toBe(2);

    await vi.advanceTimersByTimeAsync(499);
    expect(granted).toEqual([1, 2]);

    await vi.advanceTimersByTimeAsync(1);
    expect(granted).toEqual([1, 2, 3]);

    await vi.advanceTimersByTimeAsync(500);
    expect(granted).toEqual([1, 2, 3, 4]);

    await Promise.all(acquisitions);
    limiter.dispose();
  });

  it('never exceeds rate plus burst within any one-second window', async () => {
    const limiter = new RateLimiter({ rate: 5, burst: 5 });
    const grantedAt: number[] = [];
    const acquisitions = Array.from({ length: 20 }, () =>
      limiter.acquire().then(() => grantedAt.push(Date.now())),
    );

    await vi.advanceTimersByTimeAsync(5_000);
    await Promise.all(acquisitions);

    expect(grantedAt).toHaveLength(20);
    expect(grantedAt.slice(0, 5).every((at) => at === grantedAt[0])).toBe(true);
    expect((grantedAt[19] ?? 0) - (grantedAt[0] ?? 0)).toBe(3_000);

    for (const start of grantedAt) {
      const inWindow = grantedAt.filter((at) => at >= start && at < start + 1_000).length;
      expect(inWindow).toBeLessThanOrEqual(10);
    }

    limiter.dispose();
  });

  it('removes an aborted waiter and keeps serving the rest in order', async () => {
    const limiter = new RateLimiter({ rate: 1 });
    await limiter.acquire();

    const controller = new AbortController();
    const aborted = limiter.acquire(controller.signal);
    const next = limiter.acquire();
    expect(limiter.waiting).toBe(2);

    controller.abort();
    await expect(aborted).rejects.toMatchObject({ kind: 'cancelled' });
    expect(limiter.waiting).toBe(1);

    await vi.advanceTimersByTimeAsync(1_000);
    await expect(next).resolves.toBeUndefined();

    limiter.dispose();
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const limiter = new RateLimiter({ rate: 10 });
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CrawlerError);
    limiter.dispose();
  });

  it('rejects pending and future acquisitions after dispose', async () => {
    const limiter = new RateLimiter({ rate: 1 });
    await limiter.acquire();
    const pending = limiter.acquire();

    limiter.dispose();

    await expect(pending).rejects.toMatchObject({ kind: 'cancelled' });
    await expect(limiter.acquire()).rejects.toMatchObject({ kind: 'cancelled' });
    expect(limiter.waiting).toBe(0);
  });

  it('slows down when the rate is lowered', async () => {
    const limiter = new RateLimiter({ rate: 10 });
    limiter.updateRate(1);
    expect(limiter.currentRate).toBe(1);

    const granted: number[] = [];
    const first = limiter.acquire().then(() => granted.push(Date.now()));
    const second = limiter.acquire().then(() => granted.push(Date.now()));

    await vi.advanceTimersByTimeAsync(1_000);
    await Promise.all([first, second]);

    expect((granted[1] ?? 0) - (granted[0] ?? 0)).toBe(1_000);
    limiter.dispose();
  });
});
