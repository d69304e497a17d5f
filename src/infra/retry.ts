import { StoreError, isTransientStoreError, describeError } from '../domain/errors.js';
import { logger } from './logger.js';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  /** Upper bound for a single backoff sleep, in seconds */
  maxDelaySeconds: number;
  sleep?: Sleep;
  /** Which failures are worth another attempt; transient store errors by default */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Backoff after the failed attempt with 0-based index `attempt`: min(2^attempt, cap) seconds
 */
export function backoffDelayMs(attempt: number, maxDelaySeconds: number): number {
  return Math.min(2 ** attempt, maxDelaySeconds) * 1000;
}

/**
 * Run `operation`, retrying with exponential backoff while failures are retryable.
 * Non-retryable failures are rethrown untouched; running out of attempts throws a
 * transient StoreError naming the step and the number of attempts made.
 */
export async function withRetry<T>(
  step: string,
  operation: () => Promise<T>,
  policy: RetryPolicy
): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;
  const shouldRetry = policy.shouldRetry ?? isTransientStoreError;
  let lastError: unknown;

  for (let attempt = 0; attempt < policy.attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < policy.attempts - 1) {
        const delayMs = backoffDelayMs(attempt, policy.maxDelaySeconds);
        logger.warn('Store operation failed, retrying', {
          step,
          attempt: attempt + 1,
          delayMs,
          error: describeError(error),
        });
        await sleep(delayMs);
      }
    }
  }

  logger.error('Store operation failed after retries', {
    step,
    attempts: policy.attempts,
    error: describeError(lastError),
  });
  throw new StoreError(
    `${step} failed after ${policy.attempts} attempts: ${describeError(lastError)}`,
    'transient',
    lastError instanceof StoreError ? lastError.reason : 'unknown',
    { step, attempts: policy.attempts }
  );
}
