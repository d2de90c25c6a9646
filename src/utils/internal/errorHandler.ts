/**
 * @file errorHandler.ts
 * @description Centralized error classification, logging and transformation.
 */
import { BaseErrorCode, ErrorCode, PipelineError } from '../../types-global/errors.js';
import { logger } from './logger.js';

/**
 * Context provided with errors, such as a `requestId` or task id.
 */
export interface ErrorContext {
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Options for `ErrorHandler.handleError`.
 */
export interface ErrorHandlerOptions {
  /** Context of the operation that caused the error. */
  context?: ErrorContext;

  /**
   * A descriptive name of the operation being performed when the error occurred.
   * Example: "ResearchPipeline.plan".
   */
  operation: string;

  /** If true, the (potentially transformed) error is rethrown after handling. */
  rethrow?: boolean;

  /** Error code overriding the automatically determined one. */
  errorCode?: ErrorCode;

  /** Custom mapping of the original error, used instead of the default `PipelineError`. */
  errorMapper?: (error: unknown) => Error;

  /** If true (the default), stack traces are included in the logs. */
  includeStack?: boolean;

  /** Marks the error as critical; logged at 'crit' instead of 'error'. */
  critical?: boolean;
}

/**
 * A rule mapping an error message or name pattern to an error code.
 */
export interface BaseErrorMapping {
  pattern: string | RegExp;
  errorCode: BaseErrorCode;
}

/**
 * Maps standard JavaScript error constructor names to `BaseErrorCode` values.
 * @readonly
 */
const ERROR_TYPE_MAPPINGS: Readonly<Record<string, BaseErrorCode>> = {
  'SyntaxError': BaseErrorCode.VALIDATION_ERROR,
  'TypeError': BaseErrorCode.VALIDATION_ERROR,
  'ReferenceError': BaseErrorCode.INTERNAL_ERROR,
  'RangeError': BaseErrorCode.VALIDATION_ERROR,
  'URIError': BaseErrorCode.VALIDATION_ERROR,
  'EvalError': BaseErrorCode.INTERNAL_ERROR,
};

/**
 * Message patterns used to classify errors. The first match wins, so more
 * specific patterns come first.
 * @readonly
 */
const COMMON_ERROR_PATTERNS: ReadonlyArray<Readonly<BaseErrorMapping>> = [
  { pattern: /rate.*limit|too.*many.*requests|throttled/i, errorCode: BaseErrorCode.RATE_LIMITED },
  { pattern: /timeout|timed.*out|deadline.*exceeded/i, errorCode: BaseErrorCode.TIMEOUT },
  { pattern: /service.*unavailable|bad.*gateway|gateway.*timeout|upstream.*error|circuit.*open/i, errorCode: BaseErrorCode.SERVICE_UNAVAILABLE },
  { pattern: /not.*found|no.*such|doesn't.*exist/i, errorCode: BaseErrorCode.NOT_FOUND },
  { pattern: /invalid|validation|malformed|missing.*required/i, errorCode: BaseErrorCode.VALIDATION_ERROR },
];

/**
 * Creates a case-insensitive, non-global RegExp for testing error messages.
 */
function createSafeRegex(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    let flags = pattern.flags.replace('g', '');
    if (!flags.includes('i')) {
      flags += 'i';
    }
    return new RegExp(pattern.source, flags);
  }
  return new RegExp(pattern, 'i');
}

/**
 * Retrieves a descriptive name for an error object or value.
 */
export function getErrorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name || 'Error';
  }
  if (error === null) {
    return 'NullValueEncountered';
  }
  if (error === undefined) {
    return 'UndefinedValueEncountered';
  }
  if (typeof error === 'object' && error.constructor && error.constructor.name !== 'Object') {
    return `${error.constructor.name}Encountered`;
  }
  return `${typeof error}Encountered`;
}

/**
 * Extracts a message string from an error object or value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error === null) {
    return 'Null value encountered as error';
  }
  if (error === undefined) {
    return 'Undefined value encountered as error';
  }
  if (typeof error === 'string') {
    return error;
  }
  const str = String(error);
  if (str === '[object Object]') {
    try {
      return `Non-Error object encountered: ${JSON.stringify(error)}`;
    } catch {
      return 'Unstringifyable non-Error object encountered';
    }
  }
  return str;
}

/**
 * @class ErrorHandler
 * @description Static helpers for consistent error handling.
 */
export class ErrorHandler {
  /**
   * Determines an appropriate error code for a given error.
   */
  public static determineErrorCode(error: unknown): ErrorCode {
    if (error instanceof PipelineError) {
      return error.code;
    }

    const errorName = getErrorName(error);
    const errorMessage = getErrorMessage(error);

    const typeMapping = ERROR_TYPE_MAPPINGS[errorName];
    if (typeMapping) {
      return typeMapping;
    }

    for (const mapping of COMMON_ERROR_PATTERNS) {
      const regex = createSafeRegex(mapping.pattern);
      if (regex.test(errorMessage) || regex.test(errorName)) {
        return mapping.errorCode;
      }
    }
    return BaseErrorCode.INTERNAL_ERROR;
  }

  /**
   * Logs an error with its context and returns it as a `PipelineError`
   * (or whatever `errorMapper` produces). Rethrows when `rethrow` is set.
   */
  public static handleError(error: unknown, options: ErrorHandlerOptions): Error {
    const {
      context = {},
      operation,
      rethrow = false,
      errorCode: explicitErrorCode,
      includeStack = true,
      critical = false,
      errorMapper,
    } = options;

    const originalErrorName = getErrorName(error);
    const originalErrorMessage = getErrorMessage(error);
    const originalStack = error instanceof Error ? error.stack : undefined;

    const consolidatedDetails: Record<string, unknown> = {
      ...(error instanceof PipelineError && error.details ? error.details : {}),
      ...context,
      originalErrorName,
      originalMessage: originalErrorMessage,
    };

    let finalError: Error;
    let loggedErrorCode: ErrorCode;

    if (error instanceof PipelineError) {
      loggedErrorCode = error.code;
      finalError = errorMapper ? errorMapper(error) : error;
    } else {
      loggedErrorCode = explicitErrorCode ?? ErrorHandler.determineErrorCode(error);
      finalError = errorMapper
        ? errorMapper(error)
        : new PipelineError(loggedErrorCode, `Error in ${operation}: ${originalErrorMessage}`, consolidatedDetails);
    }

    if (finalError !== error && originalStack && !finalError.stack) {
      finalError.stack = originalStack;
    }

    const logPayload: Record<string, unknown> = {
      operation,
      requestId: context.requestId,
      critical,
      errorCode: loggedErrorCode,
      originalErrorType: originalErrorName,
      finalErrorType: getErrorName(finalError),
      errorDetails: consolidatedDetails,
    };

    if (includeStack) {
      logPayload.stack = finalError.stack ?? originalStack;
    }

    const logMessage = `Error in ${operation}: ${finalError.message || originalErrorMessage}`;
    if (critical) {
      logger.crit(logMessage, logPayload);
    } else {
      logger.error(logMessage, logPayload);
    }

    if (rethrow) {
      throw finalError;
    }
    return finalError;
  }

  /**
   * Formats an error into a consistent object structure for responses.
   */
  public static formatError(error: unknown): Record<string, unknown> {
    if (error instanceof PipelineError) {
      return {
        code: error.code,
        message: error.message,
        details: error.details ?? {},
      };
    }

    if (error instanceof Error) {
      return {
        code: ErrorHandler.determineErrorCode(error),
        message: error.message,
        details: { errorType: error.name || 'Error' },
      };
    }

    return {
      code: BaseErrorCode.UNKNOWN_ERROR,
      message: getErrorMessage(error),
      details: { errorType: getErrorName(error) },
    };
  }

  /**
   * Executes a function and routes any failure through `handleError`, rethrowing it.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T> | T,
    options: Omit<ErrorHandlerOptions, 'rethrow'>
  ): Promise<T> {
    try {
      return await Promise.resolve(fn());
    } catch (error) {
      throw ErrorHandler.handleError(error, { ...options, rethrow: false });
    }
  }
}
