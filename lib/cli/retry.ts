/**
 * Opt-in retry for transient failures. Only Unavailable errors are retried;
 * everything else aborts on the first attempt and propagates unchanged.
 */

import pRetry, { AbortError } from 'p-retry';
import { isQueryError } from '../errors';

export interface RetryBackoff {
  minTimeout: number;
  maxTimeout: number;
}

export const DEFAULT_RETRY_BACKOFF: RetryBackoff = {
  minTimeout: 1000,
  maxTimeout: 5000,
};

export async function withRetry<T>(
  operation: () => Promise<T>,
  retries: number,
  backoff: RetryBackoff = DEFAULT_RETRY_BACKOFF,
): Promise<T> {
  if (retries === 0) return operation();

  return pRetry(
    async () => {
      try {
        return await operation();
      } catch (error) {
        if (isQueryError(error) && error.retryable) throw error;
        throw new AbortError(error instanceof Error ? error : new Error(String(error)));
      }
    },
    {
      retries,
      ...backoff,
      onFailedAttempt: (error) => {
        console.warn(`Attempt ${error.attemptNumber} failed: ${error.message} (${error.retriesLeft} retries left)`);
      },
    },
  );
}
