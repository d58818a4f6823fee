/**
 * @fileoverview Request context propagated with AsyncLocalStorage.
 * Log lines written while serving a request pick up its id automatically.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** Unique request identifier (UUID v4 unless supplied by the caller) */
  request_id: string;
  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * The active request context, or undefined outside of one.
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * The active request id, or undefined outside of a request context.
 */
export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Runs `fn` inside a fresh request context.
 *
 * @param fn - Work to run; sync or async
 * @param requestId - Id to use; a new UUID when omitted
 * @param additionalContext - Extra fields stored next to the id
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   logger.info('Fetching candles'); // carries request_id
 *   await pipeline.run(request);
 * }, req.header('x-request-id'));
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId || generateRequestId(),
  };

  return requestContextStorage.run(context, fn);
}

/**
 * Synchronous variant of {@link withRequestContext}.
 */
export function withRequestContextSync<T>(
  fn: () => T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): T {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId || generateRequestId(),
  };

  return requestContextStorage.run(context, fn);
}

/**
 * Merges fields into the active context.
 *
 * @returns false when called outside of a request context
 */
export function setRequestContext(fields: Record<string, unknown>): boolean {
  const context = requestContextStorage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}
