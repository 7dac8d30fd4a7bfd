import type { z } from 'zod';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { SourceError, toSourceError } from '../utils/errors.js';
import type { RateLimiter } from '../utils/rate-limiter.js';
import type { SourceLimits, SourceName, SourceOutcome } from '../types.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface SourceDeps {
  limiter: RateLimiter;
  /** Defaults to the global fetch. */
  fetchFn?: FetchFn;
}

export function redactUrl(url: string): string {
  return url.replace(/(apikey=)[^&]+/i, '$1***');
}

export function withTimeout<T>(promise: Promise<T>, ms: number, source: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new SourceError({ code: 'TIMEOUT', source, message: `timeout after ${ms}ms` })),
      ms,
    );
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Shared request path for JSON sources: rate limiter slot, per-call timeout,
 * retry with backoff on transient failures, zod decoding of the body.
 */
export abstract class HttpSource {
  abstract readonly name: SourceName;
  abstract readonly label: string;

  constructor(
    protected readonly limits: SourceLimits,
    protected readonly deps: SourceDeps,
  ) {}

  get enabled(): boolean {
    return this.limits.enabled;
  }

  /** Payload-level throttling (some APIs answer 200 with a rate-limit message). */
  protected detectThrottle(_body: unknown): boolean {
    return false;
  }

  protected async getJson<S extends z.ZodTypeAny>(
    url: string,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    return withRetry(
      () => this.deps.limiter.schedule(this.name, () => this.fetchOnce(url, schema, signal), signal),
      `${this.name} ${redactUrl(url)}`,
      {
        maxRetries: this.limits.maxRetries,
        baseDelayMs: this.limits.retryBaseDelayMs,
        maxDelayMs: this.limits.adaptive.maxMs,
        signal,
        isRetryable: (err) => err instanceof SourceError && err.retryable,
      },
    );
  }

  private async fetchOnce<S extends z.ZodTypeAny>(
    url: string,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    const fetchFn = this.deps.fetchFn ?? fetch;
    const timeout = AbortSignal.timeout(this.limits.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let body: unknown;
    try {
      const response = await fetchFn(url, {
        signal: combined,
        headers: { Accept: 'application/json' },
      });

      if (response.status === 429) {
        this.deps.limiter.reportThrottled(this.name);
        throw new SourceError({ code: 'RATE_LIMITED', source: this.name, message: 'HTTP 429', status: 429 });
      }
      if (!response.ok) {
        throw new SourceError({
          code: 'HTTP',
          source: this.name,
          message: `HTTP ${response.status}`,
          status: response.status,
        });
      }
      body = await response.json();
    } catch (err) {
      throw toSourceError(this.name, err);
    }

    if (this.detectThrottle(body)) {
      this.deps.limiter.reportThrottled(this.name);
      throw new SourceError({ code: 'RATE_LIMITED', source: this.name, message: 'rate limit reached' });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SourceError({
        code: 'MALFORMED',
        source: this.name,
        message: `unexpected payload${issue ? ` at ${issue.path.join('.') || '<root>'}: ${issue.message}` : ''}`,
      });
    }

    this.deps.limiter.reportSuccess(this.name);
    return parsed.data;
  }

  protected unavailable(err: unknown, subject: string): SourceOutcome {
    const sourceErr = toSourceError(this.name, err);
    logger.debug(`[${this.name}] ${subject} unavailable: ${sourceErr.message}`, { code: sourceErr.code });
    return { status: 'unavailable', source: this.label, reason: `${sourceErr.code}: ${sourceErr.message}` };
  }

  protected notFound(reason: string): SourceOutcome {
    return { status: 'not_found', source: this.label, reason };
  }
}

// ─── Payload field helpers ───────────────────────────────────────────

/** "1"/1 → true, "0"/0 → false, anything else → not reported. */
export function parseFlag(value: string | number | null | undefined): boolean | undefined {
  if (value === '1' || value === 1) return true;
  if (value === '0' || value === 0) return false;
  return undefined;
}

export function parseNumber(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/** Taxes arrive as fractions ("0.02") or already in percent ("2"). */
export function parseTaxPercent(value: string | number | null | undefined): number | undefined {
  const n = parseNumber(value);
  if (n === undefined || n < 0) return undefined;
  return n <= 1 ? n * 100 : n;
}

export function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
