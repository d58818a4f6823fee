/**
 * Main exports for @candlefeed/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, getClassificationPolicy, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';

// Pipeline exports
export { CandlePipeline } from './services/candle-pipeline.js';
export type { CandleFeedRequest, CandleFeedResponse, CandlePipelineOptions } from './services/candle-pipeline.js';
export { createProvider } from './services/providers/provider-factory.js';

// Server exports
export { HttpServer } from './server/http-server.js';
export type { HttpServerConfig } from './server/http-server.js';
export { scrapeRequestSchema, parseScrapeRequest } from './server/request-schema.js';
export type { ScrapeRequestBody } from './server/request-schema.js';

export { sanitizeError } from './utils/error-sanitizer.js';
