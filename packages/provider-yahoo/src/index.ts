/**
 * @fileoverview Main entry point for @candlefeed/provider-yahoo.
 *
 * @module @candlefeed/provider-yahoo
 */

export { YahooProvider, YAHOO_BASE_URL } from './yahoo-provider.js';
export { parseChartResponse } from './parser.js';
export { mapHttpError } from './errors.js';
export type { YahooChartResponse, YahooQuote, YahooProviderOptions } from './types.js';
