/**
 * @fileoverview Tests for request context propagation, middleware and timers.
 */

import { describe, it, expect } from 'vitest';
import {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
  withRequestContextSync,
  setRequestContext,
} from '../src/request-context.js';
import { requestIdMiddleware, REQUEST_ID_HEADER } from '../src/middleware.js';
import { startTimer } from '../src/perf-timer.js';

describe('request context', () => {
  it('should generate UUID v4 ids', () => {
    const id = generateRequestId();

    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i);
    expect(generateRequestId()).not.toBe(id);
  });

  it('should be empty outside of a context', () => {
    expect(getRequestContext()).toBeUndefined();
    expect(getRequestId()).toBeUndefined();
    expect(setRequestContext({ symbol: 'WIN1!' })).toBe(false);
  });

  it('should propagate through awaits and timers', async () => {
    await withRequestContext(async () => {
      const id = getRequestId();
      await new Promise((resolve) => setTimeout(resolve, 5));
      expect(getRequestId()).toBe(id);
    }, 'req-async');
  });

  it('should isolate concurrent contexts', async () => {
    const [a, b] = await Promise.all([
      withRequestContext(async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        return getRequestId();
      }, 'req-a'),
      withRequestContext(async () => getRequestId(), 'req-b'),
    ]);

    expect(a).toBe('req-a');
    expect(b).toBe('req-b');
  });

  it('should merge extra fields', () => {
    withRequestContextSync(
      () => {
        expect(setRequestContext({ provider: 'yahoo' })).toBe(true);
        expect(getRequestContext()).toEqual({ request_id: 'req-sync', symbol: 'PETR4', provider: 'yahoo' });
      },
      'req-sync',
      { symbol: 'PETR4' }
    );
  });
});

describe('requestIdMiddleware', () => {
  it('should reuse the incoming header', () => {
    const headers: Record<string, string> = {};
    let seen: string | undefined;

    requestIdMiddleware()(
      { headers: { 'x-request-id': 'req-from-client' } },
      { setHeader: (name: string, value: string) => (headers[name] = value) },
      () => {
        seen = getRequestId();
      }
    );

    expect(seen).toBe('req-from-client');
    expect(headers[REQUEST_ID_HEADER]).toBe('req-from-client');
  });

  it('should generate an id when the header is missing', () => {
    let seen: string | undefined;

    requestIdMiddleware()({ headers: {} }, {}, () => {
      seen = getRequestId();
    });

    expect(seen).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('startTimer', () => {
  it('should freeze on stop', async () => {
    const timer = startTimer();
    await new Promise((resolve) => setTimeout(resolve, 5));

    const duration = timer.stop();

    expect(timer.isRunning()).toBe(false);
    expect(duration).toBeGreaterThanOrEqual(0);
    expect(timer.elapsed()).toBe(duration);
  });
});
