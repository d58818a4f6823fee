/**
 * @fileoverview Ticker-history provider types.
 *
 * @module @candlefeed/provider-yahoo/types
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from '@candlefeed/logger';

/**
 * One quote array set from the chart endpoint. Missing samples are null.
 */
export interface YahooQuote {
  open?: Array<number | null>;
  high?: Array<number | null>;
  low?: Array<number | null>;
  close?: Array<number | null>;
  volume?: Array<number | null>;
}

/**
 * Subset of the chart endpoint response the provider reads.
 */
export interface YahooChartResponse {
  chart?: {
    result?: Array<{
      meta?: {
        symbol?: string;
        exchangeTimezoneName?: string;
      };
      timestamp?: number[];
      indicators?: {
        quote?: YahooQuote[];
      };
    }> | null;
    error?: {
      code?: string;
      description?: string;
    } | null;
  };
}

/**
 * Options for YahooProvider.
 */
export interface YahooProviderOptions {
  /**
   * Chart endpoint base URL.
   * @default 'https://query1.finance.yahoo.com/v8/finance/chart'
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /** Preconfigured axios instance; replaces baseUrl and timeoutMs */
  httpClient?: AxiosInstance;

  logger?: Logger;
}
