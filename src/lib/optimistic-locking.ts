/**
 * Optimistic Locking
 *
 * Allocation rows carry a `version` column. Every write compares the version
 * it read with the stored one and increments it (compare-and-swap); a
 * mismatch means another writer got there first and raises
 * OptimisticLockError. updateWithRetry re-runs the whole read-check-write unit
 * with exponential backoff so the retry sees fresh state.
 */

import { AllocationError } from './error-handling';
import { loadConfig } from './config';
import { createLogger } from './logger';

export class OptimisticLockError extends AllocationError {
  constructor(message: string, public readonly currentVersion: number) {
    super(message, 'OPTIMISTIC_LOCK', 'conflict', { currentVersion });
    this.name = 'OptimisticLockError';
  }
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
}

function calculateDelay(attempt: number, config: RetryConfig): number {
  const delay = Math.min(config.baseDelay * Math.pow(2, attempt), config.maxDelay);
  // Jitter spreads out writers that collided at the same moment
  return delay + Math.random() * config.baseDelay;
}

/**
 * Runs `unit` until it completes without an OptimisticLockError or the retry
 * budget is spent. Any other error is rethrown immediately.
 *
 * @param unit - One complete read-check-write transaction
 * @param config - Overrides for the configured retry policy
 */
export async function updateWithRetry<T>(
  unit: () => T | Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const logger = createLogger('optimistic-locking');
  const finalConfig: RetryConfig = { ...loadConfig().lockRetry, ...config };

  for (let attempt = 0; ; attempt++) {
    try {
      return await unit();
    } catch (error) {
      if (!(error instanceof OptimisticLockError) || attempt >= finalConfig.maxRetries) {
        throw error;
      }

      const delay = calculateDelay(attempt, finalConfig);
      logger.warn('Optimistic lock conflict, retrying', {
        attempt: attempt + 1,
        maxRetries: finalConfig.maxRetries,
        currentVersion: error.currentVersion,
        delay,
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
