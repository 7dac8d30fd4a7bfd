import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RateLimiter } from '../../src/utils/rate-limiter.js';
import type { RateLimitPolicy } from '../../src/utils/rate-limiter.js';

const policy = (overrides: Partial<RateLimitPolicy> = {}): RateLimitPolicy => ({
  requestsPerMinute: 5,
  minIntervalMs: 0,
  concurrency: 10,
  adaptive: { floorMs: 0, stepMs: 2000, maxMs: 15_000, decay: 0.5 },
  ...overrides,
});

/** Largest number of timestamps inside any [t, t + windowMs) interval. */
function maxInAnyWindow(times: number[], windowMs: number): number {
  const sorted = [...times].sort((a, b) => a - b);
  let max = 0;
  for (let i = 0; i < sorted.length; i++) {
    const inWindow = sorted.filter((t) => t >= sorted[i] && t < sorted[i] + windowMs).length;
    max = Math.max(max, inWindow);
  }
  return max;
}

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should never dispatch more than N calls in any rolling 60s window', async () => {
    const limiter = new RateLimiter({ src: policy() }, { random: () => 0 });
    const dispatched: number[] = [];

    const calls = Array.from({ length: 12 }, () =>
      limiter.schedule('src', async () => {
        dispatched.push(Date.now());
      }),
    );
    await vi.runAllTimersAsync();
    await Promise.all(calls);

    const start = new Date('2026-01-01T00:00:00Z').getTime();
    expect(dispatched).toHaveLength(12);
    expect(maxInAnyWindow(dispatched, 60_000)).toBe(5);
    expect(dispatched.filter((t) => t === start)).toHaveLength(5);
    expect(dispatched.filter((t) => t === start + 60_000)).toHaveLength(5);
    expect(dispatched.filter((t) => t === start + 120_000)).toHaveLength(2);
  });

  it('should hold the bound for staggered arrivals', async () => {
    const limiter = new RateLimiter({ src: policy({ requestsPerMinute: 3 }) });
    const dispatched: number[] = [];
    const calls: Array<Promise<void>> = [];

    for (let i = 0; i < 10; i++) {
      calls.push(limiter.schedule('src', async () => {
        dispatched.push(Date.now());
      }));
      await vi.advanceTimersByTimeAsync(7_000);
    }
    await vi.runAllTimersAsync();
    await Promise.all(calls);

    expect(dispatched).toHaveLength(10);
    expect(maxInAnyWindow(dispatched, 60_000)).toBeLessThanOrEqual(3);
  });

  it('should space consecutive calls by minIntervalMs', async () => {
    const limiter = new RateLimiter({ src: policy({ minIntervalMs: 5000, requestsPerMinute: 100 }) });
    const dispatched: number[] = [];
    const calls = [0, 1, 2].map(() => limiter.schedule('src', async () => {
      dispatched.push(Date.now());
    }));
    await vi.runAllTimersAsync();
    await Promise.all(calls);

    expect(dispatched[1] - dispatched[0]).toBe(5000);
    expect(dispatched[2] - dispatched[1]).toBe(5000);
  });

  it('should cap concurrent tasks at the policy concurrency', async () => {
    const limiter = new RateLimiter({ src: policy({ concurrency: 2, requestsPerMinute: 100 }) });
    let active = 0;
    let peak = 0;
    const task = async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 1000));
      active--;
    };

    const calls = Array.from({ length: 6 }, () => limiter.schedule('src', task));
    await vi.runAllTimersAsync();
    await Promise.all(calls);

    expect(peak).toBe(2);
    expect(limiter.stats('src').inFlight).toBe(0);
  });

  it('should double the adaptive delay on throttling up to the cap', () => {
    const limiter = new RateLimiter({ src: policy() });
    const delays: number[] = [];
    for (let i = 0; i < 5; i++) {
      limiter.reportThrottled('src');
      delays.push(limiter.stats('src').adaptiveDelayMs);
    }
    expect(delays).toEqual([2000, 4000, 8000, 15_000, 15_000]);
    expect(limiter.stats('src').throttled).toBe(5);
  });

  it('should decay the adaptive delay on success and snap to the floor', () => {
    const limiter = new RateLimiter({ src: policy() });
    limiter.reportThrottled('src');
    limiter.reportSuccess('src');
    expect(limiter.stats('src').adaptiveDelayMs).toBe(1000);

    for (let i = 0; i < 20; i++) limiter.reportSuccess('src');
    expect(limiter.stats('src').adaptiveDelayMs).toBe(0);
  });

  it('should add the adaptive delay to the spacing of the next call', async () => {
    const limiter = new RateLimiter({ src: policy({ minIntervalMs: 1000 }) }, { random: () => 0 });
    await limiter.await('src');
    limiter.reportThrottled('src');

    let done = false;
    const next = limiter.await('src').then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(2999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await next;
    expect(done).toBe(true);
  });

  it('should give back the reserved slot when the wait is aborted', async () => {
    const limiter = new RateLimiter({ src: policy({ requestsPerMinute: 1 }) });
    await limiter.await('src');

    const controller = new AbortController();
    const waiting = limiter.await('src', controller.signal);
    controller.abort(new Error('stop'));

    await expect(waiting).rejects.toThrow('stop');
    expect(limiter.stats('src').dispatchedInWindow).toBe(1);
    expect(limiter.stats('src').requests).toBe(1);
  });

  it('should keep the adaptive delay after the only reserved slot is cancelled', async () => {
    const limiter = new RateLimiter({ src: policy() }, { random: () => 0 });
    limiter.reportThrottled('src');

    const controller = new AbortController();
    const cancelled = limiter.await('src', controller.signal);
    controller.abort(new Error('stop'));
    await expect(cancelled).rejects.toThrow('stop');
    expect(limiter.stats('src').dispatchedInWindow).toBe(0);

    let done = false;
    const next = limiter.await('src').then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(1999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await next;
    expect(done).toBe(true);
  });

  it('should reject unknown sources', async () => {
    const limiter = new RateLimiter();
    await expect(limiter.await('nope')).rejects.toThrow('unknown source "nope"');
    expect(() => limiter.stats('nope')).toThrow('unknown source');
  });

  it('should refuse a policy without a request budget', () => {
    const limiter = new RateLimiter();
    expect(() => limiter.register('src', policy({ requestsPerMinute: 0 }))).toThrow(RangeError);
  });
});
