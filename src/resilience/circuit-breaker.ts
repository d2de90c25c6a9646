/**
 * Circuit breaker
 *
 * Per-dependency failure isolator. Tracks consecutive failures and fails fast
 * while the protected dependency is considered down.
 */
import { config } from '../config/index.js';
import { BaseErrorCode, CircuitBreakerOpenError, PipelineError } from '../types-global/errors.js';
import { logger } from '../utils/internal/logger.js';
import {
  AsyncOperation,
  CircuitBreakerOptions,
  CircuitBreakerSnapshot,
  CircuitState,
  CircuitStates,
} from './types.js';

export class CircuitBreaker {
  readonly name: string;
  readonly failureThreshold: number;
  readonly recoveryTimeoutMs: number;
  private state: CircuitState = CircuitStates.CLOSED;
  private failureCount = 0;
  private lastFailureTimestamp: number | null = null;
  private trialInFlight = false;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = options.failureThreshold ?? config.circuitBreaker.failureThreshold;
    this.recoveryTimeoutMs = options.recoveryTimeoutMs ?? config.circuitBreaker.recoveryTimeoutMs;

    if (!Number.isInteger(this.failureThreshold) || this.failureThreshold <= 0) {
      throw new PipelineError(
        BaseErrorCode.VALIDATION_ERROR,
        `Circuit breaker '${this.name}' needs a positive failure threshold, got ${this.failureThreshold}`
      );
    }
  }

  /**
   * Executes `operation` unless the circuit is open within its cooldown window.
   * The result passes through unchanged; a failure is recorded and rethrown.
   *
   * @throws {CircuitBreakerOpenError} without invoking `operation` while open
   */
  async call<T>(operation: AsyncOperation<T>): Promise<T> {
    // Admission and state transition happen before the first await
    const isTrial = this.admit();

    try {
      const result = await operation();
      this.recordSuccess(isTrial);
      return result;
    } catch (error) {
      this.recordFailure(isTrial, error);
      throw error;
    }
  }

  getState(): CircuitBreakerSnapshot {
    return {
      name: this.name,
      state: this.state,
      isOpen: this.state === CircuitStates.OPEN,
      failureCount: this.failureCount,
      failureThreshold: this.failureThreshold,
      lastFailureTimestamp: this.lastFailureTimestamp,
      recoveryTimeoutMs: this.recoveryTimeoutMs,
    };
  }

  /**
   * Forces the circuit closed and clears its failure history.
   */
  reset(): void {
    this.failureCount = 0;
    this.lastFailureTimestamp = null;
    this.trialInFlight = false;
    this.transitionTo(CircuitStates.CLOSED, 'manual_reset');
  }

  /**
   * Throws while the circuit refuses calls.
   * @returns Whether the admitted call is the half-open trial.
   */
  private admit(): boolean {
    if (this.state === CircuitStates.OPEN) {
      const elapsed = Date.now() - (this.lastFailureTimestamp ?? 0);
      if (elapsed < this.recoveryTimeoutMs) {
        throw new CircuitBreakerOpenError(
          this.name,
          Math.ceil((this.recoveryTimeoutMs - elapsed) / 1000)
        );
      }
      this.transitionTo(CircuitStates.HALF_OPEN, 'recovery_timeout_elapsed');
      this.trialInFlight = true;
      return true;
    }

    if (this.state === CircuitStates.HALF_OPEN && this.trialInFlight) {
      throw new CircuitBreakerOpenError(
        this.name,
        0,
        `Circuit breaker '${this.name}' is testing recovery. Service temporarily unavailable.`
      );
    }
    return false;
  }

  // Only the trial decides how half-open ends. Calls admitted before the
  // circuit opened may settle later; their outcome counts only while closed.
  private recordSuccess(isTrial: boolean): void {
    if (isTrial && this.state === CircuitStates.HALF_OPEN) {
      this.failureCount = 0;
      this.trialInFlight = false;
      this.transitionTo(CircuitStates.CLOSED, 'trial_succeeded');
      return;
    }
    if (this.state === CircuitStates.CLOSED) {
      this.failureCount = 0;
    }
  }

  private recordFailure(isTrial: boolean, error: unknown): void {
    const message = (error instanceof Error ? error.message : String(error)).slice(0, 100);

    if (isTrial && this.state === CircuitStates.HALF_OPEN) {
      this.failureCount++;
      this.lastFailureTimestamp = Date.now();
      this.trialInFlight = false;
      this.transitionTo(CircuitStates.OPEN, 'trial_failed');
      return;
    }

    if (this.state !== CircuitStates.CLOSED) {
      logger.debug('Ignoring outcome of a call admitted before the circuit opened', {
        component: 'CircuitBreaker',
        breaker: this.name,
        state: this.state,
        error: message,
      });
      return;
    }

    this.failureCount++;
    this.lastFailureTimestamp = Date.now();

    logger.debug('Circuit breaker recorded failure', {
      component: 'CircuitBreaker',
      breaker: this.name,
      failureCount: this.failureCount,
      failureThreshold: this.failureThreshold,
      error: message,
    });

    if (this.failureCount >= this.failureThreshold) {
      this.transitionTo(CircuitStates.OPEN, 'failure_threshold_reached');
    }
  }

  private transitionTo(next: CircuitState, reason: string): void {
    if (this.state === next) {
      return;
    }
    const previous = this.state;
    this.state = next;

    const context = {
      component: 'CircuitBreaker',
      breaker: this.name,
      from: previous,
      to: next,
      reason,
      failureCount: this.failureCount,
    };
    if (next === CircuitStates.OPEN) {
      logger.warning('Circuit breaker opened', context);
    } else {
      logger.info('Circuit breaker state changed', context);
    }
  }
}
