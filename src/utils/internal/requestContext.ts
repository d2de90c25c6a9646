/**
 * @file requestContext.ts
 * @description Utilities for creating request contexts.
 * A request context is an object carrying a unique ID, timestamp, and other
 * relevant data for logging and tracing a single operation.
 */
import { generatePrefixedId } from '../security/idGenerator.js';

/**
 * Defines the structure for context information associated with a request or operation.
 */
export interface RequestContext {
  /**
   * Unique ID for the context instance.
   * Used for log correlation and request tracing.
   */
  requestId: string;

  /**
   * ISO 8601 timestamp indicating when the context was created.
   */
  timestamp: string;

  /**
   * Allows arbitrary key-value pairs for specific context needs.
   */
  [key: string]: unknown;
}

/**
 * Service instance for creating contexts.
 */
const requestContextServiceInstance = {
  /**
   * Creates a new request context with a unique `requestId` and `timestamp`.
   * Custom properties can be added via `additionalContext`.
   *
   * @param additionalContext - Key-value pairs to include in the context.
   */
  createRequestContext(
    additionalContext: Record<string, unknown> = {}
  ): RequestContext {
    return {
      requestId: generatePrefixedId('req', 12),
      timestamp: new Date().toISOString(),
      ...additionalContext,
    };
  },
};

/**
 * Primary export for request context functionalities.
 */
export const requestContextService = requestContextServiceInstance;
