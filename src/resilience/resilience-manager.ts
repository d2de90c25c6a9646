import { config } from '../config/index.js';
import { CircuitBreakerOpenError, RetryExhaustedError } from '../types-global/errors.js';
import { logger } from '../utils/internal/logger.js';
import { CircuitBreakerRegistry } from './breaker-registry.js';
import { RetryExecutor } from './retry.js';
import { AsyncOperation, CircuitBreakerSnapshot, RetryPolicy } from './types.js';

export interface ResilienceManagerOptions {
  registry?: CircuitBreakerRegistry;
  executor?: RetryExecutor;
  /** Policy applied when `withResilience` gets none; defaults to the configured agent-call policy */
  policy?: Partial<RetryPolicy>;
}

/**
 * Boundary used by the pipeline for every upstream call: retry with backoff
 * over the named dependency's circuit breaker.
 */
export class ResilienceManager {
  readonly registry: CircuitBreakerRegistry;
  private readonly executor: RetryExecutor;
  private readonly policy: Partial<RetryPolicy>;

  constructor(options: ResilienceManagerOptions = {}) {
    this.registry = options.registry ?? new CircuitBreakerRegistry();
    this.executor = options.executor ?? new RetryExecutor();
    this.policy = { ...config.retry, ...options.policy };
  }

  /**
   * Runs `operation` through `dependencyName`'s breaker, retrying transient failures.
   *
   * @throws {CircuitBreakerOpenError} as soon as the breaker refuses a call
   * @throws {RetryExhaustedError} once every attempt failed
   */
  async withResilience<T>(
    dependencyName: string,
    operation: AsyncOperation<T>,
    policy?: Partial<RetryPolicy>
  ): Promise<T> {
    const breaker = this.registry.get(dependencyName);
    let attempts = 0;

    try {
      return await this.executor.retry(
        () => {
          attempts++;
          return breaker.call(operation);
        },
        { ...this.policy, ...policy }
      );
    } catch (error) {
      if (error instanceof CircuitBreakerOpenError) {
        logger.warning('Dependency unavailable', {
          component: 'ResilienceManager',
          dependency: dependencyName,
          cooldownSeconds: error.cooldownSeconds,
        });
        throw error;
      }
      throw new RetryExhaustedError(dependencyName, attempts, error);
    }
  }

  getBreakerStates(): Record<string, CircuitBreakerSnapshot> {
    return this.registry.getAllStates();
  }
}
