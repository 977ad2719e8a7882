import { TimeoutError } from './errors';

export type TimedRequestInit = RequestInit & { timeout?: number };

/**
 * Fetch that aborts after `timeout` milliseconds (default 30s) and reports the
 * abort as a TimeoutError carrying the URL.
 *
 * @example
 * const response = await fetchWithTimeout(subgraphUrl, {
 *   timeout: 10000,
 *   method: 'POST',
 *   body: JSON.stringify({ query }),
 * });
 */
export async function fetchWithTimeout(
  url: string,
  options: TimedRequestInit = {}
): Promise<Response> {
  const { timeout = 30000, ...fetchOptions } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TimeoutError(`Request timeout after ${timeout}ms`, timeout, url);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * fetchWithTimeout with exponential backoff on network failures.
 * Timeouts are not retried; HTTP error statuses are returned to the caller.
 */
export async function fetchWithRetry(
  url: string,
  options: TimedRequestInit & {
    retries?: number;
    retryDelay?: number;
  } = {}
): Promise<Response> {
  const { retries = 3, retryDelay = 1000, ...fetchOptions } = options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt < retries; attempt++) {
    try {
      return await fetchWithTimeout(url, fetchOptions);
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw error;
      }
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < retries - 1) {
        await new Promise(resolve =>
          setTimeout(resolve, retryDelay * Math.pow(2, attempt))
        );
      }
    }
  }

  throw lastError || new Error('All retry attempts failed');
}
