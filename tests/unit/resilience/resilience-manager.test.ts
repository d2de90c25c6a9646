import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { CircuitBreakerRegistry } from '../../../src/resilience/breaker-registry.js';
import { ResilienceManager } from '../../../src/resilience/resilience-manager.js';
import { RetryExecutor } from '../../../src/resilience/retry.js';
import { CircuitStates } from '../../../src/resilience/types.js';
import {
  BaseErrorCode,
  CircuitBreakerOpenError,
  RetryExhaustedError,
} from '../../../src/types-global/errors.js';

describe('CircuitBreakerRegistry', () => {
  it('should return the same breaker for a name', () => {
    const registry = new CircuitBreakerRegistry();
    expect(registry.get('planner')).toBe(registry.get('planner'));
    expect(registry.has('writer')).toBe(false);
  });

  it('should apply defaults and creation-time overrides', () => {
    const registry = new CircuitBreakerRegistry({ failureThreshold: 5, recoveryTimeoutMs: 60_000 });

    expect(registry.get('planner').failureThreshold).toBe(5);
    expect(registry.get('searcher', { failureThreshold: 2 }).failureThreshold).toBe(2);
    expect(registry.get('searcher', { failureThreshold: 9 }).failureThreshold).toBe(2);
  });

  it('should snapshot and reset every breaker', async () => {
    const registry = new CircuitBreakerRegistry({ failureThreshold: 1, recoveryTimeoutMs: 60_000 });
    await expect(
      registry.get('planner').call(async () => Promise.reject(new Error('down')))
    ).rejects.toThrow('down');
    registry.get('writer');

    const states = registry.getAllStates();
    expect(Object.keys(states)).toEqual(['planner', 'writer']);
    expect(states.planner?.state).toBe(CircuitStates.OPEN);

    registry.resetAll();
    expect(registry.getAllStates().planner?.state).toBe(CircuitStates.CLOSED);
  });
});

describe('ResilienceManager', () => {
  let delays: number[];
  let manager: ResilienceManager;

  beforeEach(() => {
    delays = [];
    manager = new ResilienceManager({
      registry: new CircuitBreakerRegistry({ failureThreshold: 5, recoveryTimeoutMs: 60_000 }),
      executor: new RetryExecutor({
        sleep: async ms => {
          delays.push(ms);
        },
      }),
      policy: { maxRetries: 3, initialDelayMs: 2_000, maxDelayMs: 10_000, backoffBase: 2 },
    });
  });

  it('should pass a success through', async () => {
    expect(await manager.withResilience('planner', async () => 'plan')).toBe('plan');
    expect(manager.getBreakerStates().planner?.failureCount).toBe(0);
  });

  it('should recover from transient failures', async () => {
    let calls = 0;
    const result = await manager.withResilience('searcher', async () => {
      calls++;
      if (calls === 1) {
        throw new Error('flaky');
      }
      return 'results';
    });

    expect(result).toBe('results');
    expect(delays).toEqual([2_000]);
  });

  it('should raise RetryExhaustedError after maxRetries + 1 attempts', async () => {
    const lastError = new Error('writer down');
    const operation = jest.fn(async (): Promise<string> => {
      throw lastError;
    });

    const caught = await manager.withResilience('writer', operation).catch((error: unknown) => error);

    expect(caught).toBeInstanceOf(RetryExhaustedError);
    expect(caught).toMatchObject({
      code: BaseErrorCode.RETRY_EXHAUSTED,
      dependencyName: 'writer',
      attempts: 4,
      lastError,
      message: "All 4 attempts to call 'writer' failed: writer down",
    });
    expect(operation).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([2_000, 4_000, 8_000]);
  });

  it('should surface an open breaker as is, without retrying it', async () => {
    const operation = jest.fn(async (): Promise<string> => {
      throw new Error('down');
    });

    await expect(manager.withResilience('planner', operation)).rejects.toBeInstanceOf(RetryExhaustedError);

    // The fifth failure opens the breaker; the retry that follows fails fast
    const caught = await manager.withResilience('planner', operation).catch((error: unknown) => error);

    expect(caught).toBeInstanceOf(CircuitBreakerOpenError);
    expect(operation).toHaveBeenCalledTimes(5);
    expect(manager.getBreakerStates().planner).toMatchObject({ isOpen: true, failureCount: 5 });
  });

  it('should honour a per-call policy', async () => {
    const operation = jest.fn(async (): Promise<string> => {
      throw new Error('down');
    });

    await expect(
      manager.withResilience('searcher', operation, { maxRetries: 1 })
    ).rejects.toMatchObject({ attempts: 2 });
    expect(operation).toHaveBeenCalledTimes(2);
  });
});
