/**
 * Error classes shared across the collaborators, the optimizer and the HTTP layer
 */

export class TimeoutError extends Error {
  constructor(
    message: string,
    public timeoutMs: number,
    public url?: string
  ) {
    super(message);
    this.name = 'TimeoutError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public errors: Record<string, string[]>
  ) {
    super(message);
    this.name = 'ValidationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A data source (deployments, usage records, price) failed or returned data
 * that cannot be scored. Fails the whole optimization pass.
 */
export class UpstreamUnavailableError extends Error {
  constructor(
    public source: string,
    message: string,
    cause?: unknown
  ) {
    super(`${source}: ${message}`, { cause });
    this.name = 'UpstreamUnavailableError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
