import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { RateLimiter } from '../../../src/server/rate-limiter.js';

const T = 1_700_000_000_000;

describe('RateLimiter', () => {
  let now: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = T;
    jest.spyOn(Date, 'now').mockImplementation(() => now);
    limiter = new RateLimiter({ maxRequests: 5, windowMs: 60_000 });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function requestAt(offsetMs: number, clientKey = 'client-a') {
    now = T + offsetMs;
    return limiter.checkRateLimit(clientKey);
  }

  it('should admit requests up to the limit and count down remaining', () => {
    const remaining = [0, 1_000, 2_000, 3_000, 4_000].map(offset => {
      const result = requestAt(offset);
      expect(result.allowed).toBe(true);
      return result.info.remaining;
    });

    expect(remaining).toEqual([4, 3, 2, 1, 0]);
    expect(requestAt(4_000).info).toEqual({ limit: 5, remaining: 0, retryAfter: 56 });
  });

  it('should report the window length as reset on admission', () => {
    expect(requestAt(0).info).toEqual({ limit: 5, remaining: 4, reset: 60 });
  });

  it('should deny the sixth request in the window with a retry-after', () => {
    for (const offset of [0, 1_000, 2_000, 3_000, 4_000]) {
      requestAt(offset);
    }

    expect(requestAt(4_500)).toEqual({
      allowed: false,
      info: { limit: 5, remaining: 0, retryAfter: 56 },
    });
  });

  it('should free exactly one slot once the window slides past the earliest request', () => {
    for (const offset of [0, 1_000, 2_000, 3_000, 4_000]) {
      requestAt(offset);
    }

    expect(requestAt(60_500)).toEqual({
      allowed: true,
      info: { limit: 5, remaining: 0, reset: 60 },
    });
    expect(requestAt(60_500)).toEqual({
      allowed: false,
      info: { limit: 5, remaining: 0, retryAfter: 1 },
    });
  });

  it('should not record denied requests', () => {
    for (let i = 0; i < 8; i++) {
      requestAt(0);
    }
    expect(limiter.getStats().totalRecentRequests).toBe(5);
  });

  it('should track clients independently', () => {
    for (let i = 0; i < 5; i++) {
      requestAt(0, 'client-a');
    }

    expect(requestAt(0, 'client-a').allowed).toBe(false);
    expect(requestAt(0, 'client-b').allowed).toBe(true);
    expect(limiter.getRemaining('client-b')).toBe(4);
    expect(limiter.getRemaining('unknown')).toBe(5);
  });

  it('should aggregate stats across clients in the window', () => {
    requestAt(0, 'client-a');
    requestAt(1_000, 'client-a');
    requestAt(2_000, 'client-b');

    expect(limiter.getStats()).toEqual({
      activeClients: 2,
      totalRecentRequests: 3,
      limit: 5,
      windowMs: 60_000,
    });

    now = T + 60_500;
    expect(limiter.getStats()).toMatchObject({ activeClients: 2, totalRecentRequests: 2 });
  });

  it('should purge one client on reset', () => {
    for (let i = 0; i < 5; i++) {
      requestAt(0, 'client-a');
    }
    requestAt(0, 'client-b');

    limiter.resetClient('client-a');

    expect(limiter.getRemaining('client-a')).toBe(5);
    expect(limiter.getRemaining('client-b')).toBe(4);
  });

  it('should prune clients with an empty window', () => {
    requestAt(0, 'idle');
    requestAt(30_000, 'busy');

    now = T + 60_000;
    expect(limiter.pruneIdleClients()).toBe(1);
    expect(limiter.getStats()).toMatchObject({ activeClients: 1, totalRecentRequests: 1 });
  });
});
