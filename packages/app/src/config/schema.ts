/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

const threshold = z.coerce.number().min(0).max(1);

/**
 * Application configuration schema
 *
 * Every section has defaults, so an empty environment yields a working
 * config (chart-session provider, reversal policy, port 8000).
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      name: z.string().default('candlefeed'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.coerce.number().int().min(0).max(65535).default(8000),
      corsOrigin: z.string().default('*'),
    })
    .default({}),

  provider: z
    .object({
      type: z.enum(['tradingview', 'yahoo', 'scrape']).default('tradingview'),
      timeoutMs: z.coerce.number().int().positive().default(15000),
      tradingview: z
        .object({
          exchange: z.string().min(1).default('BMFBOVESPA'),
          authToken: z.string().min(1).optional(),
          url: z.string().url().optional(),
        })
        .default({}),
      yahoo: z
        .object({
          baseUrl: z.string().url().optional(),
        })
        .default({}),
      scrape: z
        .object({
          settleMs: z.coerce.number().int().min(0).default(3000),
          defaultUrl: z.string().url().optional(),
          userAgent: z.string().min(1).optional(),
        })
        .default({}),
    })
    .default({}),

  market: z
    .object({
      sessionMinutes: z.coerce.number().int().positive().max(1440).default(540),
      symbolTablePath: z.string().min(1).optional(),
    })
    .default({}),

  classification: z
    .object({
      policy: z.string().min(1).default('reversal'),
      dojiThreshold: threshold.optional(),
      weakThreshold: threshold.optional(),
      strongThreshold: threshold.optional(),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  HOST: 'server.host',
  PORT: 'server.port',
  CORS_ORIGIN: 'server.corsOrigin',
  PROVIDER_TYPE: 'provider.type',
  PROVIDER_TIMEOUT_MS: 'provider.timeoutMs',
  TRADINGVIEW_EXCHANGE: 'provider.tradingview.exchange',
  TRADINGVIEW_AUTH_TOKEN: 'provider.tradingview.authToken',
  TRADINGVIEW_SOCKET_URL: 'provider.tradingview.url',
  YAHOO_BASE_URL: 'provider.yahoo.baseUrl',
  SCRAPE_SETTLE_MS: 'provider.scrape.settleMs',
  SCRAPE_DEFAULT_URL: 'provider.scrape.defaultUrl',
  SCRAPE_USER_AGENT: 'provider.scrape.userAgent',
  MARKET_SESSION_MINUTES: 'market.sessionMinutes',
  SYMBOL_TABLE_PATH: 'market.symbolTablePath',
  CLASSIFICATION_POLICY: 'classification.policy',
  CLASSIFICATION_DOJI_THRESHOLD: 'classification.dojiThreshold',
  CLASSIFICATION_WEAK_THRESHOLD: 'classification.weakThreshold',
  CLASSIFICATION_STRONG_THRESHOLD: 'classification.strongThreshold',
};
