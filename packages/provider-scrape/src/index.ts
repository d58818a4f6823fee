/**
 * @fileoverview Main entry point for @candlefeed/provider-scrape.
 *
 * @module @candlefeed/provider-scrape
 */

export { ScrapeProvider, buildChartUrl, DEFAULT_CHART_URL } from './scrape-provider.js';
export type { ScrapeProviderOptions } from './scrape-provider.js';

export { HttpPageRenderer } from './http-renderer.js';
export type { HttpPageRendererOptions } from './http-renderer.js';
export type { PageRenderer, RenderedPage } from './renderer.js';

export { htmlToText } from './html.js';
export { parsePageText, parseTableRows, parseLegends, parsePrice, parseVolume, rowDateToIso } from './text-parser.js';
