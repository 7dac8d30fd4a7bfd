import { logger } from './logger.js';
import { sleep } from './helpers.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
  signal?: AbortSignal;
  /** Return false to stop retrying and rethrow immediately. */
  isRetryable?: (err: Error) => boolean;
  /** Called before each backoff sleep. */
  onRetry?: (err: Error, attempt: number) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitter: true,
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  label: string,
  opts: Partial<RetryOptions> = {},
): Promise<T> {
  const options = { ...DEFAULT_OPTIONS, ...opts };
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (options.signal?.aborted) break;
      if (attempt === options.maxRetries) break;
      if (options.isRetryable && !options.isRetryable(lastError)) break;

      let delay = Math.min(
        options.baseDelayMs * Math.pow(2, attempt),
        options.maxDelayMs,
      );

      if (options.jitter) {
        delay = delay * (0.5 + Math.random() * 0.5);
      }

      options.onRetry?.(lastError, attempt);
      logger.debug(`[retry] ${label} attempt ${attempt + 1} failed, retrying in ${Math.round(delay)}ms`, {
        error: lastError.message,
      });

      await sleep(delay, options.signal);
    }
  }

  throw lastError ?? new Error(`${label} failed`);
}
