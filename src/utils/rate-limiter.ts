import { logger } from './logger.js';
import { Semaphore } from './semaphore.js';
import { sleep } from './helpers.js';
import { MINUTE_MS } from '../constants.js';
import type { AdaptiveDelayConfig } from '../types.js';

export interface RateLimitPolicy {
  requestsPerMinute: number;
  minIntervalMs: number;
  concurrency: number;
  adaptive: AdaptiveDelayConfig;
}

export interface RateLimiterStats {
  dispatchedInWindow: number;
  adaptiveDelayMs: number;
  inFlight: number;
  waiting: number;
  throttled: number;
  requests: number;
}

interface SourceState {
  policy: RateLimitPolicy;
  // Dispatch times (ms), ascending; may hold reservations in the future
  dispatched: number[];
  lastRequestTime: number | null;
  adaptiveDelayMs: number;
  semaphore: Semaphore;
  throttled: number;
  requests: number;
}

export interface RateLimiterOptions {
  now?: () => number;
  random?: () => number;
  windowMs?: number;
}

/**
 * Per-source pacing: at most `requestsPerMinute` dispatches in any rolling
 * window, `minIntervalMs` between consecutive dispatches, an adaptive delay
 * that grows while the source throttles us, and a concurrency cap.
 *
 * Slot reservation is synchronous, so every read-modify-write of a source's
 * counters happens inside one event-loop turn. Callers then sleep until their
 * reserved slot outside that critical section.
 */
export class RateLimiter {
  private readonly sources = new Map<string, SourceState>();
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly windowMs: number;

  constructor(policies: Record<string, RateLimitPolicy> = {}, opts: RateLimiterOptions = {}) {
    this.now = opts.now ?? (() => Date.now());
    this.random = opts.random ?? Math.random;
    this.windowMs = opts.windowMs ?? MINUTE_MS;
    for (const [name, policy] of Object.entries(policies)) {
      this.register(name, policy);
    }
  }

  register(source: string, policy: RateLimitPolicy): void {
    if (policy.requestsPerMinute < 1) {
      throw new RangeError(`[rate-limiter] ${source}: requestsPerMinute must be >= 1`);
    }
    this.sources.set(source, {
      policy,
      dispatched: [],
      lastRequestTime: null,
      adaptiveDelayMs: policy.adaptive.floorMs,
      semaphore: new Semaphore(policy.concurrency),
      throttled: 0,
      requests: 0,
    });
  }

  /** Blocks until the source may be called again. Pacing only; no concurrency permit. */
  async await(source: string, signal?: AbortSignal): Promise<void> {
    const state = this.state(source);
    const slot = this.reserve(state);
    const waitMs = slot - this.now();
    if (waitMs <= 0) return;

    logger.debug(`[rate-limiter] ${source} waiting ${Math.round(waitMs)}ms`, {
      inWindow: state.dispatched.length,
      adaptiveMs: Math.round(state.adaptiveDelayMs),
    });
    try {
      await sleep(waitMs, signal);
    } catch (err) {
      this.cancel(state, slot);
      throw err;
    }
  }

  /** Holds a concurrency permit and a paced slot for the duration of `task`. */
  async schedule<T>(source: string, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const state = this.state(source);
    const release = await state.semaphore.acquire(signal);
    try {
      await this.await(source, signal);
      return await task();
    } finally {
      release();
    }
  }

  reportThrottled(source: string): void {
    const state = this.state(source);
    const { stepMs, maxMs } = state.policy.adaptive;
    state.adaptiveDelayMs = Math.min(Math.max(state.adaptiveDelayMs * 2, stepMs), maxMs);
    state.throttled++;
    logger.warn(`[rate-limiter] ${source} throttled, adaptive delay now ${Math.round(state.adaptiveDelayMs)}ms`);
  }

  reportSuccess(source: string): void {
    const state = this.state(source);
    const { floorMs, decay } = state.policy.adaptive;
    const next = state.adaptiveDelayMs * decay;
    // Below a millisecond the delay is noise; snap back to the floor
    state.adaptiveDelayMs = next - floorMs < 1 ? floorMs : next;
  }

  stats(source: string): RateLimiterStats {
    const state = this.state(source);
    this.prune(state, this.now());
    return {
      dispatchedInWindow: state.dispatched.length,
      adaptiveDelayMs: state.adaptiveDelayMs,
      inFlight: state.semaphore.inFlight,
      waiting: state.semaphore.waiting,
      throttled: state.throttled,
      requests: state.requests,
    };
  }

  private state(source: string): SourceState {
    const state = this.sources.get(source);
    if (!state) throw new Error(`[rate-limiter] unknown source "${source}"`);
    return state;
  }

  private prune(state: SourceState, now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < state.dispatched.length && state.dispatched[drop] <= cutoff) drop++;
    if (drop > 0) state.dispatched.splice(0, drop);
  }

  /** Picks the earliest slot satisfying every constraint and records it. */
  private reserve(state: SourceState): number {
    const now = this.now();
    this.prune(state, now);
    const { requestsPerMinute, minIntervalMs } = state.policy;

    let slot = now;
    const jitter = state.adaptiveDelayMs > 0
      ? state.adaptiveDelayMs * (1 + this.random())
      : 0;
    if (state.lastRequestTime !== null) {
      slot = Math.max(slot, state.lastRequestTime + minIntervalMs + jitter);
    } else {
      // No dispatch to space from (first call, or the only slot was cancelled)
      slot = Math.max(slot, now + jitter);
    }
    if (state.dispatched.length >= requestsPerMinute) {
      const nthMostRecent = state.dispatched[state.dispatched.length - requestsPerMinute];
      slot = Math.max(slot, nthMostRecent + this.windowMs);
    }

    state.dispatched.push(slot);
    state.lastRequestTime = slot;
    state.requests++;
    return slot;
  }

  /** Gives back a reserved slot that was never used. */
  private cancel(state: SourceState, slot: number): void {
    if (slot <= this.now()) return;
    const idx = state.dispatched.lastIndexOf(slot);
    if (idx !== -1) state.dispatched.splice(idx, 1);
    if (state.lastRequestTime === slot) {
      state.lastRequestTime = state.dispatched.length > 0 ? Math.max(...state.dispatched) : null;
    }
    state.requests--;
  }
}
