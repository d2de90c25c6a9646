import { CircuitBreakerOpenError } from '../types-global/errors.js';
import { logger } from '../utils/internal/logger.js';
import { AsyncOperation, RetryPolicy, SleepFn } from './types.js';

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffBase: 2,
});

const defaultSleep: SleepFn = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay before the retry that follows the zero-based `attemptIndex`:
 * `min(initialDelayMs * backoffBase ^ attemptIndex, maxDelayMs)`.
 */
export function computeBackoffDelay(attemptIndex: number, policy: RetryPolicy): number {
  return Math.min(policy.initialDelayMs * Math.pow(policy.backoffBase, attemptIndex), policy.maxDelayMs);
}

export interface RetryExecutorOptions {
  policy?: Partial<RetryPolicy>;
  sleep?: SleepFn;
}

/**
 * Bounded exponential-backoff retry.
 *
 * Wrap operations that already go through `CircuitBreaker.call` so breaker
 * bookkeeping happens before the backoff is scheduled.
 */
export class RetryExecutor {
  private readonly policy: RetryPolicy;
  private readonly sleep: SleepFn;

  constructor(options: RetryExecutorOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Attempts `operation` up to `maxRetries + 1` times. A circuit-breaker-open
   * error propagates at once; otherwise the last failure is rethrown unchanged
   * once all attempts are spent.
   */
  async retry<T>(operation: AsyncOperation<T>, overrides?: Partial<RetryPolicy>): Promise<T> {
    const policy: RetryPolicy = { ...this.policy, ...overrides };
    const totalAttempts = Math.max(policy.maxRetries, 0) + 1;
    let lastError: unknown;

    for (let attempt = 0; attempt < totalAttempts; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (error instanceof CircuitBreakerOpenError) {
          throw error;
        }
        lastError = error;

        if (attempt < policy.maxRetries) {
          const delay = computeBackoffDelay(attempt, policy);
          logger.debug('Attempt failed, retrying', {
            component: 'RetryExecutor',
            attempt: attempt + 1,
            totalAttempts,
            delayMs: delay,
            error: (error instanceof Error ? error.message : String(error)).slice(0, 100),
          });
          await this.sleep(delay);
        }
      }
    }

    logger.warning('All retry attempts failed', {
      component: 'RetryExecutor',
      totalAttempts,
    });
    throw lastError;
  }
}
