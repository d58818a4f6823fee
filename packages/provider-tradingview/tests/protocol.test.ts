/**
 * @fileoverview Tests for the chart-session wire protocol.
 */

import { describe, it, expect } from 'vitest';
import {
  encodeFrame,
  createMessage,
  decodeFrames,
  isHeartbeat,
  parseMessage,
  extractSeriesBars,
  generateSessionId,
  symbolDescriptor,
} from '../src/protocol.js';

describe('encodeFrame', () => {
  it('should prefix the payload length', () => {
    expect(encodeFrame('~h~3')).toBe('~m~4~m~~h~3');
  });
});

describe('createMessage', () => {
  it('should frame a method call', () => {
    expect(createMessage('set_auth_token', ['unauthorized_user_token'])).toBe(
      '~m~54~m~{"m":"set_auth_token","p":["unauthorized_user_token"]}'
    );
  });
});

describe('decodeFrames', () => {
  it('should split several frames', () => {
    const raw = encodeFrame('{"m":"a","p":[]}') + encodeFrame('~h~12');

    expect(decodeFrames(raw)).toEqual(['{"m":"a","p":[]}', '~h~12']);
  });

  it('should keep payloads containing the frame marker', () => {
    const payload = '{"m":"x","p":["~m~"]}';

    expect(decodeFrames(encodeFrame(payload))).toEqual([payload]);
  });

  it('should stop at malformed input', () => {
    expect(decodeFrames('garbage')).toEqual([]);
    expect(decodeFrames(encodeFrame('ok') + '~m~x~m~bad')).toEqual(['ok']);
  });
});

describe('isHeartbeat', () => {
  it('should recognize heartbeats only', () => {
    expect(isHeartbeat('~h~7')).toBe(true);
    expect(isHeartbeat('{"m":"du"}')).toBe(false);
  });
});

describe('parseMessage', () => {
  it('should read method and params', () => {
    expect(parseMessage('{"m":"series_completed","p":["cs_a","s1"]}')).toEqual({
      method: 'series_completed',
      params: ['cs_a', 's1'],
    });
  });

  it('should ignore greetings and non-JSON payloads', () => {
    expect(parseMessage('{"session_id":"abc","timestamp":1}')).toBeUndefined();
    expect(parseMessage('not json')).toBeUndefined();
  });
});

describe('extractSeriesBars', () => {
  it('should read series rows', () => {
    const params = [
      'cs_a',
      {
        s1: {
          s: [
            { i: 0, v: [1736946000, 100, 110, 90, 108, 500] },
            { i: 1, v: [1736946060, 108, 109, 107, 107.5] },
          ],
        },
      },
    ];

    expect(extractSeriesBars(params, 's1')).toEqual([
      { timestamp: 1736946000, fields: { open: 100, high: 110, low: 90, close: 108, volume: 500 } },
      { timestamp: 1736946060, fields: { open: 108, high: 109, low: 107, close: 107.5, volume: null } },
    ]);
  });

  it('should skip short rows and other series', () => {
    const params = ['cs_a', { s1: { s: [{ i: 0, v: [1736946000, 100] }] }, s2: { s: [] } }];

    expect(extractSeriesBars(params, 's1')).toEqual([]);
    expect(extractSeriesBars(params, 's9')).toEqual([]);
    expect(extractSeriesBars(['cs_a'], 's1')).toEqual([]);
  });
});

describe('generateSessionId', () => {
  it('should use the prefix and twelve letters', () => {
    expect(generateSessionId('cs')).toMatch(/^cs_[a-z]{12}$/);
  });
});

describe('symbolDescriptor', () => {
  it('should describe a regular-session split-adjusted symbol', () => {
    expect(symbolDescriptor('BMFBOVESPA:WIN1!')).toBe(
      '={"symbol":"BMFBOVESPA:WIN1!","adjustment":"splits","session":"regular"}'
    );
  });
});
