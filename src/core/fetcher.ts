/**
 * The fetch collaborator: simpleFetch plus the retry policy.
 */

import { createAbortError, simpleFetch } from './http-fetch.js';
import { DEFAULT_FETCH_CONFIG, FetchError, NetworkError, type FetchConfig, type PageFetcher } from '../types.js';

/**
 * Run `fn` up to `maxAttempts` times with exponential backoff.
 * Only FetchErrors marked `retryable` are retried; anything else (including
 * aborts) is rethrown at once. Aborting `signal` also cuts a pending backoff short.
 */
export async function retryFetch<T>(
  fn: () => Promise<T>,
  maxAttempts: number = 3,
  baseDelayMs: number = 1000,
  signal?: AbortSignal,
): Promise<T> {
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof FetchError) || !error.retryable) {
        throw error;
      }
      lastError = error;

      if (attempt < maxAttempts) {
        const delay = baseDelayMs * Math.pow(2, attempt - 1);
        if (process.env.DEBUG) console.debug('[threadscope]', `attempt ${attempt} failed (${error.message}), retrying in ${delay}ms`);
        await sleep(delay, signal);
      }
    }
  }

  throw lastError instanceof FetchError ? lastError : new NetworkError('Retry failed', false);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Build the PageFetcher the pipeline calls. The configuration is captured
 * here and never read from anywhere else.
 */
export function createPageFetcher(config: Partial<FetchConfig> = {}): PageFetcher {
  const resolved: FetchConfig = { ...DEFAULT_FETCH_CONFIG, ...config };

  return async (url, signal) => {
    const result = await retryFetch(
      () => simpleFetch(url, resolved, signal),
      resolved.maxAttempts,
      resolved.retryBaseDelayMs,
      signal,
    );
    return result.html;
  };
}
