/**
 * @fileoverview Chart-session wire protocol.
 *
 * Frames look like `~m~<length>~m~<payload>`; several frames may share one
 * websocket message. Payloads are either JSON `{ m, p }` messages, a JSON
 * session greeting, or a `~h~<n>` heartbeat that must be echoed back.
 *
 * @module @candlefeed/provider-tradingview/protocol
 */

import { z } from 'zod';
import type { RawBar } from '@candlefeed/contracts';

const FRAME_MARKER = '~m~';

/**
 * A decoded `{ m, p }` protocol message.
 */
export interface ProtocolMessage {
  method: string;
  params: unknown[];
}

const messageSchema = z.object({
  m: z.string(),
  p: z.array(z.unknown()).default([]),
});

const seriesRowSchema = z.object({
  i: z.number().optional(),
  v: z.array(z.number().nullable()),
});

const seriesUpdateSchema = z.record(z.unknown());

const seriesPayloadSchema = z.object({
  s: z.array(seriesRowSchema).default([]),
});

/**
 * Wraps one payload in a frame.
 *
 * @example
 * ```typescript
 * encodeFrame('~h~3') // '~m~4~m~~h~3'
 * ```
 */
export function encodeFrame(payload: string): string {
  return `${FRAME_MARKER}${payload.length}${FRAME_MARKER}${payload}`;
}

/**
 * Builds a framed `{ m, p }` message.
 *
 * @example
 * ```typescript
 * createMessage('set_auth_token', ['unauthorized_user_token'])
 * // '~m~54~m~{"m":"set_auth_token","p":["unauthorized_user_token"]}'
 * ```
 */
export function createMessage(method: string, params: unknown[]): string {
  return encodeFrame(JSON.stringify({ m: method, p: params }));
}

/**
 * Splits a websocket message into frame payloads.
 *
 * Decoding stops at the first malformed frame; payloads before it are kept.
 */
export function decodeFrames(raw: string): string[] {
  const payloads: string[] = [];
  let pos = 0;

  while (raw.startsWith(FRAME_MARKER, pos)) {
    const lengthStart = pos + FRAME_MARKER.length;
    const lengthEnd = raw.indexOf(FRAME_MARKER, lengthStart);
    if (lengthEnd < 0) break;

    const lengthText = raw.slice(lengthStart, lengthEnd);
    if (!/^\d+$/.test(lengthText)) break;

    const payloadStart = lengthEnd + FRAME_MARKER.length;
    const length = Number.parseInt(lengthText, 10);
    payloads.push(raw.slice(payloadStart, payloadStart + length));
    pos = payloadStart + length;
  }

  return payloads;
}

export function isHeartbeat(payload: string): boolean {
  return /^~h~\d+$/.test(payload);
}

/**
 * Parses a frame payload into a protocol message.
 *
 * @returns The message, or undefined for greetings and anything else without `m`
 */
export function parseMessage(payload: string): ProtocolMessage | undefined {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return undefined;
  }

  const result = messageSchema.safeParse(json);
  return result.success ? { method: result.data.m, params: result.data.p } : undefined;
}

/**
 * Extracts bars of one series from a `timescale_update` or `du` message.
 *
 * Rows are `{ i, v: [time, open, high, low, close, volume?] }` with time in
 * epoch seconds. Rows without a time or with fewer than five values are skipped.
 */
export function extractSeriesBars(params: readonly unknown[], seriesId: string): RawBar[] {
  const updates = seriesUpdateSchema.safeParse(params[1]);
  if (!updates.success) {
    return [];
  }

  const payload = seriesPayloadSchema.safeParse(updates.data[seriesId]);
  if (!payload.success) {
    return [];
  }

  const bars: RawBar[] = [];
  for (const row of payload.data.s) {
    const [time, open, high, low, close, volume] = row.v;
    if (time === null || time === undefined || row.v.length < 5) {
      continue;
    }
    bars.push({ timestamp: time, fields: { open, high, low, close, volume: volume ?? null } });
  }
  return bars;
}

/**
 * Random session identifier, e.g. `cs_qwertyuiopas`.
 */
export function generateSessionId(prefix: string): string {
  const letters = 'abcdefghijklmnopqrstuvwxyz';
  let id = '';
  for (let i = 0; i < 12; i++) {
    id += letters.charAt(Math.floor(Math.random() * letters.length));
  }
  return `${prefix}_${id}`;
}

/**
 * Value of the resolve_symbol parameter for a symbol.
 *
 * @example
 * ```typescript
 * symbolDescriptor('BMFBOVESPA:WIN1!')
 * // '={"symbol":"BMFBOVESPA:WIN1!","adjustment":"splits","session":"regular"}'
 * ```
 */
export function symbolDescriptor(symbol: string, session: 'regular' | 'extended' = 'regular'): string {
  return `=${JSON.stringify({ symbol, adjustment: 'splits', session })}`;
}
