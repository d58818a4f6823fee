/**
 * @fileoverview Websocket transport for chart sessions.
 *
 * The client talks to a {@link ChartSocket} so tests can replace the network
 * with an in-process fake.
 *
 * @module @candlefeed/provider-tradingview/socket
 */

import WebSocket from 'ws';

/**
 * Callbacks a socket reports to.
 */
export interface ChartSocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onError(error: Error): void;
  onClose(code: number): void;
}

/**
 * Minimal outbound side of a socket.
 */
export interface ChartSocket {
  send(data: string): void;
  close(): void;
}

export type ChartSocketFactory = (
  url: string,
  headers: Record<string, string>,
  handlers: ChartSocketHandlers
) => ChartSocket;

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Opens a real websocket with `ws`.
 */
export const createWebSocket: ChartSocketFactory = (url, headers, handlers) => {
  const ws = new WebSocket(url, { headers });

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(rawDataToString(data)));
  ws.on('error', (error) => handlers.onError(error));
  ws.on('close', (code) => handlers.onClose(code));

  return {
    send: (data) => ws.send(data),
    close: () => {
      ws.removeAllListeners();
      // error events after terminate() would otherwise be unhandled
      ws.on('error', () => undefined);
      ws.terminate();
    },
  };
};
