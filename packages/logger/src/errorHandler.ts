/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. Both are logged, then the process exits with code 1.
 */

import type { Logger } from './types.js';

/** How long transports get to flush before the process is forced down */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

function describeReason(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Attaches the global handlers once per process.
 *
 * The pipeline converts every request failure into a response, so anything
 * reaching these handlers is a defect; the process does not try to continue.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception, exiting', {
      error: describeReason(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection, exiting', {
      error: describeReason(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('warning', (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: describeReason(warning),
      event: 'warning',
    });
  });

  handlersAttached = true;
  logger.debug('Global error handlers attached');
}

/**
 * Ends the logger and exits once it has flushed, or after the timeout.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
