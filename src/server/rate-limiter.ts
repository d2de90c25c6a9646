/**
 * Rate limiter for job admission
 *
 * Per-client sliding window: each client key keeps the timestamps of its
 * admitted requests inside the trailing window. Histories are trimmed on
 * access, so an inactive client's list empties on its next check.
 */
import { config } from '../config/index.js';
import { BaseErrorCode, PipelineError } from '../types-global/errors.js';
import { logger } from '../utils/internal/logger.js';

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  /** Seconds until a denied client may try again */
  retryAfter?: number;
  /** Seconds until the window fully resets after an admission */
  reset?: number;
}

export interface RateLimitResult {
  allowed: boolean;
  info: RateLimitInfo;
}

export interface RateLimiterStats {
  activeClients: number;
  totalRecentRequests: number;
  limit: number;
  windowMs: number;
}

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
}

export class RateLimiter {
  private readonly requests = new Map<string, number[]>();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly lastWarningTime = new Map<string, number>();
  private readonly warningThreshold = 0.8; // Warn at 80% capacity
  private readonly warningIntervalMs = 5000; // Minimum time between warnings per client

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? config.rateLimit.requestsPerWindow;
    this.windowMs = options.windowMs ?? config.rateLimit.windowMs;

    if (!Number.isInteger(this.maxRequests) || this.maxRequests <= 0) {
      throw new PipelineError(
        BaseErrorCode.VALIDATION_ERROR,
        `Rate limit must be a positive integer, got ${this.maxRequests}`
      );
    }

    logger.info('Rate limiter initialized', {
      component: 'RateLimiter',
      maxRequests: this.maxRequests,
      windowMs: this.windowMs,
      warningThreshold: this.warningThreshold,
    });
  }

  /**
   * Admits the request if the client has capacity left in the current window.
   * A denied request leaves the client's history untouched.
   */
  checkRateLimit(clientKey: string): RateLimitResult {
    const now = Date.now();
    const windowStart = now - this.windowMs;
    const timestamps = this.prune(clientKey, windowStart);

    if (timestamps.length >= this.maxRequests) {
      const oldest = timestamps[0] ?? now;
      const retryAfter = Math.max(Math.ceil((oldest - windowStart) / 1000), 1);

      logger.warning('Rate limit exceeded', {
        component: 'RateLimiter',
        clientKey,
        current: timestamps.length,
        limit: this.maxRequests,
        retryAfter,
      });
      return {
        allowed: false,
        info: { limit: this.maxRequests, remaining: 0, retryAfter },
      };
    }

    timestamps.push(now);
    this.requests.set(clientKey, timestamps);

    const utilizationRate = timestamps.length / this.maxRequests;
    const lastWarning = this.lastWarningTime.get(clientKey) ?? 0;
    if (utilizationRate >= this.warningThreshold && now - lastWarning >= this.warningIntervalMs) {
      this.lastWarningTime.set(clientKey, now);
      logger.warning('High request rate detected', {
        component: 'RateLimiter',
        clientKey,
        current: timestamps.length,
        limit: this.maxRequests,
        utilizationRate: utilizationRate.toFixed(2),
      });
    }

    return {
      allowed: true,
      info: {
        limit: this.maxRequests,
        remaining: this.maxRequests - timestamps.length,
        reset: Math.ceil(this.windowMs / 1000),
      },
    };
  }

  getRemaining(clientKey: string): number {
    const timestamps = this.prune(clientKey, Date.now() - this.windowMs);
    return Math.max(this.maxRequests - timestamps.length, 0);
  }

  getStats(): RateLimiterStats {
    const windowStart = Date.now() - this.windowMs;
    let activeClients = 0;
    let totalRecentRequests = 0;

    for (const timestamps of this.requests.values()) {
      const recent = timestamps.filter(time => time > windowStart).length;
      if (recent > 0) {
        activeClients++;
        totalRecentRequests += recent;
      }
    }

    return {
      activeClients,
      totalRecentRequests,
      limit: this.maxRequests,
      windowMs: this.windowMs,
    };
  }

  /**
   * Purges one client's history.
   */
  resetClient(clientKey: string): void {
    const cleared = this.requests.get(clientKey)?.length ?? 0;
    this.requests.delete(clientKey);
    this.lastWarningTime.delete(clientKey);

    logger.info('Rate limiter client reset', {
      component: 'RateLimiter',
      clientKey,
      clearedRequests: cleared,
    });
  }

  /**
   * Drops clients with no request left inside the window.
   * @returns The number of clients removed.
   */
  pruneIdleClients(): number {
    const windowStart = Date.now() - this.windowMs;
    let removed = 0;

    for (const clientKey of [...this.requests.keys()]) {
      if (this.prune(clientKey, windowStart).length === 0) {
        this.requests.delete(clientKey);
        this.lastWarningTime.delete(clientKey);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug('Idle rate limiter clients removed', {
        component: 'RateLimiter',
        removed,
        remaining: this.requests.size,
      });
    }
    return removed;
  }

  private prune(clientKey: string, windowStart: number): number[] {
    const timestamps = this.requests.get(clientKey) ?? [];
    const recent = timestamps.filter(time => time > windowStart);
    if (recent.length !== timestamps.length) {
      this.requests.set(clientKey, recent);
    }
    return recent;
  }
}
