/**
 * @fileoverview Chart-session client.
 *
 * Opens one session per request, asks for a single series and collects its
 * bars until the server reports the series complete.
 *
 * @module @candlefeed/provider-tradingview/client
 */

import { ProviderError, type RawBar } from '@candlefeed/contracts';
import type { Logger } from '@candlefeed/logger';
import {
  createMessage,
  decodeFrames,
  encodeFrame,
  extractSeriesBars,
  generateSessionId,
  isHeartbeat,
  parseMessage,
  symbolDescriptor,
  type ProtocolMessage,
} from './protocol.js';
import { createWebSocket, type ChartSocket, type ChartSocketFactory } from './socket.js';

export const CHART_SOCKET_URL = 'wss://data.tradingview.com/socket.io/websocket';
export const CHART_ORIGIN = 'https://data.tradingview.com';
export const ANONYMOUS_AUTH_TOKEN = 'unauthorized_user_token';

const SERIES_ID = 's1';
const SYMBOL_ID = 'symbol_1';

/**
 * Client options. All fields are optional.
 */
export interface ChartSessionClientOptions {
  url?: string;
  authToken?: string;
  /** Milliseconds to wait for `series_completed` (default: 15000) */
  timeoutMs?: number;
  socketFactory?: ChartSocketFactory;
  logger?: Logger;
}

/**
 * One series request.
 */
export interface SeriesRequest {
  /** EXCHANGE:TICKER */
  symbol: string;
  /** Provider interval code ("1", "5", "1H", "1D") */
  intervalCode: string;
  barCount: number;
}

/**
 * Chart-session client.
 *
 * @example
 * ```typescript
 * const client = new ChartSessionClient({ timeoutMs: 10000 });
 * const bars = await client.fetchSeries({ symbol: 'BMFBOVESPA:WIN1!', intervalCode: '1', barCount: 500 });
 * ```
 */
export class ChartSessionClient {
  private readonly url: string;
  private readonly authToken: string;
  private readonly timeoutMs: number;
  private readonly socketFactory: ChartSocketFactory;
  private readonly logger?: Logger;

  constructor(options: ChartSessionClientOptions = {}) {
    this.url = options.url ?? CHART_SOCKET_URL;
    this.authToken = options.authToken ?? ANONYMOUS_AUTH_TOKEN;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.socketFactory = options.socketFactory ?? createWebSocket;
    this.logger = options.logger;
  }

  /**
   * Fetches one series.
   *
   * @returns Bars sorted by time, one per timestamp
   * @throws {ProviderError} unsupported-symbol, protocol, network or timeout
   */
  fetchSeries(request: SeriesRequest): Promise<RawBar[]> {
    return new Promise<RawBar[]>((resolve, reject) => {
      const chartSession = generateSessionId('cs');
      const barsByTime = new Map<number, RawBar>();
      let socket: ChartSocket | undefined;
      let settled = false;

      const finish = (error?: ProviderError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket?.close();

        if (error) {
          reject(error);
          return;
        }
        const bars = [...barsByTime.entries()].sort(([a], [b]) => a - b).map(([, bar]) => bar);
        resolve(bars);
      };

      const fail = (reason: ProviderError['reason'], message: string, extra: Record<string, unknown> = {}): void => {
        finish(new ProviderError(message, { provider: 'tradingview', reason, symbol: request.symbol, ...extra }));
      };

      const timer = setTimeout(() => {
        fail('timeout', `No series data for ${request.symbol} within ${this.timeoutMs}ms`, {
          received: barsByTime.size,
        });
      }, this.timeoutMs);

      const send = (method: string, params: unknown[]): void => {
        socket?.send(createMessage(method, params));
      };

      const handleMessage = (message: ProtocolMessage): void => {
        switch (message.method) {
          case 'timescale_update':
          case 'du':
            for (const bar of extractSeriesBars(message.params, SERIES_ID)) {
              if (typeof bar.timestamp === 'number') {
                barsByTime.set(bar.timestamp, bar);
              }
            }
            break;
          case 'series_completed':
            this.logger?.debug('Chart series completed', { symbol: request.symbol, bars: barsByTime.size });
            finish();
            break;
          case 'symbol_error':
            fail('unsupported-symbol', `Symbol ${request.symbol} not found`, { details: message.params });
            break;
          case 'series_error':
          case 'critical_error':
          case 'protocol_error':
            fail('protocol', `Chart session ${message.method} for ${request.symbol}`, { details: message.params });
            break;
          default:
            break;
        }
      };

      try {
        socket = this.socketFactory(
          this.url,
          { Origin: CHART_ORIGIN },
          {
            onOpen: () => {
              this.logger?.debug('Chart socket open', { symbol: request.symbol, session: chartSession });
              send('set_auth_token', [this.authToken]);
              send('chart_create_session', [chartSession, '']);
              send('resolve_symbol', [chartSession, SYMBOL_ID, symbolDescriptor(request.symbol)]);
              send('create_series', [
                chartSession,
                SERIES_ID,
                SERIES_ID,
                SYMBOL_ID,
                request.intervalCode,
                request.barCount,
              ]);
            },
            onMessage: (data) => {
              for (const payload of decodeFrames(data)) {
                if (settled) return;
                if (isHeartbeat(payload)) {
                  socket?.send(encodeFrame(payload));
                  continue;
                }
                const message = parseMessage(payload);
                if (message) {
                  handleMessage(message);
                }
              }
            },
            onError: (error) => {
              fail('network', `Chart socket error for ${request.symbol}: ${error.message}`);
            },
            onClose: (code) => {
              fail('network', `Chart socket closed (code ${code}) before ${request.symbol} completed`, {
                received: barsByTime.size,
              });
            },
          }
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        fail('network', `Could not open chart socket: ${message}`);
      }
    });
  }
}
