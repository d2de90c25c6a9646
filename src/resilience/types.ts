/**
 * Circuit breaker states:
 * - closed: calls pass through, failures are counted
 * - open: calls fail immediately until the recovery timeout elapses
 * - half_open: a single trial call tests whether the dependency recovered
 */
export const CircuitStates = {
  CLOSED: 'closed',
  OPEN: 'open',
  HALF_OPEN: 'half_open',
} as const;

export type CircuitState = (typeof CircuitStates)[keyof typeof CircuitStates];

export interface CircuitBreakerOptions {
  name: string;
  /** Consecutive failures that open the circuit */
  failureThreshold?: number;
  /** Cooldown before an open circuit admits a trial call */
  recoveryTimeoutMs?: number;
}

export interface CircuitBreakerSnapshot {
  name: string;
  state: CircuitState;
  isOpen: boolean;
  failureCount: number;
  failureThreshold: number;
  lastFailureTimestamp: number | null;
  recoveryTimeoutMs: number;
}

export interface RetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffBase: number;
}

export type SleepFn = (ms: number) => Promise<void>;

export type AsyncOperation<T> = () => Promise<T>;
