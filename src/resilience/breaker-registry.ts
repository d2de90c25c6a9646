/**
 * Circuit Breaker Registry
 *
 * One breaker per protected dependency, created on first use and kept for the
 * lifetime of the registry.
 */
import { CircuitBreaker } from './circuit-breaker.js';
import { CircuitBreakerOptions, CircuitBreakerSnapshot } from './types.js';

export type BreakerDefaults = Omit<CircuitBreakerOptions, 'name'>;

export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly defaults: BreakerDefaults;

  constructor(defaults: BreakerDefaults = {}) {
    this.defaults = { ...defaults };
  }

  /**
   * Gets or creates the breaker for a dependency. Overrides apply only when
   * the breaker is created.
   */
  get(name: string, overrides: BreakerDefaults = {}): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker({ ...this.defaults, ...overrides, name });
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  /**
   * State of every registered breaker, keyed by dependency name.
   */
  getAllStates(): Record<string, CircuitBreakerSnapshot> {
    const states: Record<string, CircuitBreakerSnapshot> = {};
    for (const [name, breaker] of this.breakers) {
      states[name] = breaker.getState();
    }
    return states;
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }
}
