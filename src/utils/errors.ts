export type SourceErrorCode =
  | 'TIMEOUT'
  | 'NETWORK'
  | 'HTTP'
  | 'RATE_LIMITED'
  | 'MALFORMED'
  | 'ABORTED';

/**
 * Failure talking to one external source. Raised inside a source client and
 * turned into an `unavailable` outcome before it reaches any caller.
 */
export class SourceError extends Error {
  public readonly code: SourceErrorCode;
  public readonly source: string;
  public readonly status?: number;
  public override readonly cause?: unknown;

  constructor(input: { code: SourceErrorCode; source: string; message: string; status?: number; cause?: unknown }) {
    super(input.message);
    this.name = 'SourceError';
    this.code = input.code;
    this.source = input.source;
    this.status = input.status;
    this.cause = input.cause;
  }

  get retryable(): boolean {
    switch (this.code) {
      case 'TIMEOUT':
      case 'NETWORK':
      case 'RATE_LIMITED':
        return true;
      case 'HTTP':
        return this.status !== undefined && this.status >= 500;
      default:
        return false;
    }
  }
}

export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/** Classify anything thrown by fetch/json into a SourceError. */
export function toSourceError(source: string, err: unknown): SourceError {
  if (err instanceof SourceError) return err;
  if (err instanceof Error) {
    if (err.name === 'TimeoutError') {
      return new SourceError({ code: 'TIMEOUT', source, message: 'request timed out', cause: err });
    }
    if (err.name === 'AbortError' || err.message === 'Aborted') {
      return new SourceError({ code: 'ABORTED', source, message: 'request aborted', cause: err });
    }
    if (err instanceof SyntaxError) {
      return new SourceError({ code: 'MALFORMED', source, message: `invalid JSON: ${err.message}`, cause: err });
    }
    return new SourceError({ code: 'NETWORK', source, message: err.message, cause: err });
  }
  return new SourceError({ code: 'NETWORK', source, message: String(err), cause: err });
}
