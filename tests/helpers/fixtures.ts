import { vi } from 'vitest';
import { RateLimiter } from '../../src/utils/rate-limiter.js';
import { emptyMarket } from '../../src/pipeline/feed.js';
import type { FetchFn } from '../../src/sources/http-source.js';
import type { MarketMetrics, SourceLimits, SourceName } from '../../src/types.js';

/** Limits with no pacing and millisecond backoff, so tests run on real timers. */
export function testLimits(overrides: Partial<SourceLimits> = {}): SourceLimits {
  return {
    enabled: true,
    requestsPerMinute: 1000,
    minIntervalMs: 0,
    concurrency: 4,
    timeoutMs: 1000,
    maxRetries: 2,
    retryBaseDelayMs: 1,
    adaptive: { floorMs: 0, stepMs: 1, maxMs: 5, decay: 0.5 },
    ...overrides,
  };
}

const ALL_SOURCES: SourceName[] = ['goplus', 'etherscan', 'bscscan', 'honeypot', 'solana'];

export function testLimiter(limits: SourceLimits = testLimits()): RateLimiter {
  const limiter = new RateLimiter();
  for (const name of ALL_SOURCES) limiter.register(name, limits);
  return limiter;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export type RouteHandler = (url: URL) => Response | Promise<Response>;

/**
 * In-process fetch: the first route whose key occurs in the URL answers.
 * Anything else fails like an unreachable host.
 */
export function routeFetch(routes: Array<[string, RouteHandler]>) {
  return vi.fn<FetchFn>(async (input) => {
    const url = new URL(input);
    for (const [match, handler] of routes) {
      if (input.includes(match)) return handler(url);
    }
    throw new TypeError(`fetch failed: no route for ${url.host}${url.pathname}`);
  });
}

export function market(overrides: Partial<MarketMetrics> = {}): MarketMetrics {
  return { ...emptyMarket(), ...overrides };
}

export const ADDR = {
  token: '0xaaa0000000000000000000000000000000000001',
  other: '0xbbb0000000000000000000000000000000000002',
  pair: '0xccc0000000000000000000000000000000000003',
  owner: '0xddd0000000000000000000000000000000000004',
  zero: '0x0000000000000000000000000000000000000000',
  dead: '0x000000000000000000000000000000000000dead',
  unicrypt: '0x663a5c229c09b049e36dcc11a9b0d4a8eb9db214',
} as const;
