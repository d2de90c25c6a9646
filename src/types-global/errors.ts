import { z } from "zod";

// Base error codes shared by every component of the core
export enum BaseErrorCode {
  RATE_LIMITED = 'RATE_LIMITED',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  RETRY_EXHAUSTED = 'RETRY_EXHAUSTED',
  TIMEOUT = 'TIMEOUT',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}

// Pipeline-specific error codes
export enum PipelineErrorCode {
  STAGE_FAILED = 'STAGE_FAILED',
  TASK_NOT_FOUND = 'TASK_NOT_FOUND',
  SUBSCRIPTION_CLOSED = 'SUBSCRIPTION_CLOSED'
}

export type ErrorCode = BaseErrorCode | PipelineErrorCode;

// Error schema for validation
export const ErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).optional()
});

export type ErrorResponse = z.infer<typeof ErrorSchema>;

// Base pipeline error class
export class PipelineError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toResponse(): ErrorResponse {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {})
    };
  }
}

/**
 * Raised by a circuit breaker that is open within its cooldown window.
 * Never retried by an enclosing retry layer.
 */
export class CircuitBreakerOpenError extends PipelineError {
  constructor(
    public readonly breakerName: string,
    public readonly cooldownSeconds: number,
    message?: string
  ) {
    super(
      BaseErrorCode.SERVICE_UNAVAILABLE,
      message ??
        `Circuit breaker '${breakerName}' is open. Service temporarily unavailable. Try again in ${cooldownSeconds}s`,
      { breakerName, cooldownSeconds }
    );
    this.name = 'CircuitBreakerOpenError';
  }
}

/**
 * Raised once every attempt of a resilient call has failed.
 * `lastError` is the failure of the final attempt, unchanged.
 */
export class RetryExhaustedError extends PipelineError {
  constructor(
    public readonly dependencyName: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    const lastMessage = lastError instanceof Error ? lastError.message : String(lastError);
    super(
      BaseErrorCode.RETRY_EXHAUSTED,
      `All ${attempts} attempts to call '${dependencyName}' failed: ${lastMessage}`,
      { dependencyName, attempts, lastErrorMessage: lastMessage }
    );
    this.name = 'RetryExhaustedError';
  }
}

export interface RateLimitRejection {
  limit: number;
  remaining: number;
  retryAfter: number;
}

// Structured rejection surfaced to a client that exceeded its admission limit
export class RateLimitExceededError extends PipelineError {
  constructor(
    public readonly clientKey: string,
    public readonly rejection: RateLimitRejection
  ) {
    super(
      BaseErrorCode.RATE_LIMITED,
      `Rate limit exceeded. Try again in ${rejection.retryAfter}s`,
      { ...rejection }
    );
    this.name = 'RateLimitExceededError';
  }
}
