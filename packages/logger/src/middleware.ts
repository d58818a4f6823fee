/**
 * @fileoverview Express-style middleware for request id propagation.
 */

import { withRequestContextSync, generateRequestId } from './request-context.js';

/**
 * Minimal request shape the middleware reads.
 */
export interface RequestLike {
  headers?: Record<string, string | string[] | undefined>;
}

/**
 * Minimal response shape the middleware writes.
 */
export interface ResponseLike {
  setHeader?: (name: string, value: string) => unknown;
}

export type NextFunction = (error?: unknown) => void;

/** Header used to carry the request id in both directions */
export const REQUEST_ID_HEADER = 'X-Request-ID';

/**
 * Accepts the caller's `X-Request-ID` (or generates one), echoes it on the
 * response and runs the rest of the chain inside its request context.
 *
 * @example
 * ```typescript
 * const app = express();
 * app.use(requestIdMiddleware());
 * ```
 */
export function requestIdMiddleware() {
  return (req: RequestLike, res: ResponseLike, next: NextFunction): void => {
    const incoming = req.headers?.['x-request-id'];
    const requestId = typeof incoming === 'string' && incoming.trim() !== '' ? incoming.trim() : generateRequestId();

    res.setHeader?.(REQUEST_ID_HEADER, requestId);

    withRequestContextSync(() => next(), requestId);
  };
}
