export { logger, Logger, isLogLevel, type LogLevel } from './internal/logger.js';
export { requestContextService, type RequestContext } from './internal/requestContext.js';
export {
  ErrorHandler,
  getErrorMessage,
  getErrorName,
  type ErrorContext,
  type ErrorHandlerOptions,
} from './internal/errorHandler.js';
export { AsyncLock } from './internal/asyncLock.js';
export { generateId, generatePrefixedId } from './security/idGenerator.js';
