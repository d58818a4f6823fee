/**
 * @fileoverview Public API for @candlefeed/logger
 * Structured logging, request context and process-level error handling.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
  withRequestContextSync,
  setRequestContext,
} from './request-context.js';

export { startTimer } from './perf-timer.js';

export { redactSecrets, redactValue, isSensitiveFieldName } from './formats.js';

export { requestIdMiddleware, REQUEST_ID_HEADER } from './middleware.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
export type { RequestLike, ResponseLike, NextFunction } from './middleware.js';
