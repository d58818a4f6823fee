/**
 * @fileoverview Main entry point for @candlefeed/provider-tradingview.
 *
 * @module @candlefeed/provider-tradingview
 */

export {
  TradingViewProvider,
  applyFrontContract,
  DEFAULT_EXCHANGE,
  MAX_BARS_PER_REQUEST,
} from './tradingview-provider.js';
export type { TradingViewProviderOptions } from './tradingview-provider.js';

export {
  ChartSessionClient,
  CHART_SOCKET_URL,
  CHART_ORIGIN,
  ANONYMOUS_AUTH_TOKEN,
} from './client.js';
export type { ChartSessionClientOptions, SeriesRequest } from './client.js';

export { createWebSocket } from './socket.js';
export type { ChartSocket, ChartSocketFactory, ChartSocketHandlers } from './socket.js';

export {
  encodeFrame,
  createMessage,
  decodeFrames,
  isHeartbeat,
  parseMessage,
  extractSeriesBars,
  generateSessionId,
  symbolDescriptor,
} from './protocol.js';
export type { ProtocolMessage } from './protocol.js';
