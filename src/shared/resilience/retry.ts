/**
 * =============================================================================
 * RETRY WITH EXPONENTIAL BACKOFF
 * =============================================================================
 *
 * Bounded retries for calls to external providers.
 * Delay before attempt n+1 is baseDelayMs * 2^(n-1), capped at maxDelayMs.
 *
 * USAGE:
 * ```typescript
 * const reply = await retryWithBackoff(() => client.complete(prompt), {
 *   name: 'ai-extraction',
 *   maxAttempts: 3,
 *   shouldRetry: isRetryableError
 * });
 * ```
 * =============================================================================
 */

import { logger } from '../services/logger.service';
import { errorMessage } from '../../core/errors/AppError';

export interface RetryOptions {
  /** Name for logging */
  name: string;
  maxAttempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Errors for which this returns false are rethrown immediately */
  shouldRetry?: (error: unknown) => boolean;
  /** Injected in tests to skip real waiting */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const maxDelayMs = options.maxDelayMs ?? 30000;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      logger.warn(`[Retry] ${options.name} failed, retry ${attempt}/${options.maxAttempts - 1} in ${delay}ms`, {
        error: errorMessage(error)
      });
      await sleep(delay);
    }
  }
}
