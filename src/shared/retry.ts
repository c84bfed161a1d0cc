// Retry helper
// Exponential backoff with jitter around flaky external calls

import logger from './logger';
import { safeErrorMessage } from './errors';

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxRetries: number;
  initialDelayMs: number;
  maxJitterMs?: number;
  label?: string;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delay before the retry that follows failed attempt `attempt` (0-based).
 */
export function computeBackoffDelay(
  attempt: number,
  initialDelayMs: number,
  maxJitterMs: number = 0,
  random: () => number = Math.random
): number {
  return initialDelayMs * Math.pow(2, attempt) + random() * maxJitterMs;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxRetries,
    initialDelayMs,
    maxJitterMs = 0,
    label = 'Retry',
    isRetryable = () => true,
    random = Math.random,
  } = options;
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, maxRetries);

  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      const isLast = attempt === attempts - 1;
      if (isLast || !isRetryable(error)) {
        if (!isLast) {
          logger.warn(`[${label}] Non-retryable failure: ${safeErrorMessage(error)}`);
        }
        throw error;
      }

      const delay = computeBackoffDelay(attempt, initialDelayMs, maxJitterMs, random);
      logger.warn(
        `[${label}] Attempt ${attempt + 1}/${attempts} failed (${safeErrorMessage(error)}), retrying in ${(delay / 1000).toFixed(2)}s`
      );
      await wait(delay);
    }
  }

  throw lastError;
}
