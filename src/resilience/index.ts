export { CircuitBreaker } from './circuit-breaker.js';
export { CircuitBreakerRegistry, type BreakerDefaults } from './breaker-registry.js';
export {
  RetryExecutor,
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  type RetryExecutorOptions,
} from './retry.js';
export { ResilienceManager, type ResilienceManagerOptions } from './resilience-manager.js';
export {
  CircuitStates,
  type CircuitState,
  type CircuitBreakerOptions,
  type CircuitBreakerSnapshot,
  type RetryPolicy,
  type SleepFn,
  type AsyncOperation,
} from './types.js';
