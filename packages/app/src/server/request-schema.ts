/**
 * Request body validation for POST /scrape
 */

import { z } from 'zod';
import { RequestValidationError } from '@candlefeed/contracts';
import type { CandleFeedRequest } from '../services/candle-pipeline.js';

export const scrapeRequestSchema = z.object({
  symbol: z.string().trim().min(1, 'symbol is required'),
  tradingview_url: z.string().url().optional(),
  timeframe: z.string().trim().min(1).default('2m'),
  limit: z.number().int().min(1).max(5000).default(100),
  historical_days: z.number().int().min(1).max(3650).default(7),
  config: z
    .object({
      timeframe: z.string().trim().min(1).optional(),
    })
    .optional(),
});

export type ScrapeRequestBody = z.infer<typeof scrapeRequestSchema>;

/**
 * Validates a JSON body and maps it onto a pipeline request
 *
 * `config.timeframe` wins over the top-level `timeframe`.
 *
 * @throws {RequestValidationError} With one issue per invalid field
 *
 * @example
 * ```typescript
 * parseScrapeRequest({ symbol: 'WINZ25', config: { timeframe: '5m' } });
 * // { symbol: 'WINZ25', timeframe: '5m', limit: 100, historicalDays: 7 }
 * ```
 */
export function parseScrapeRequest(body: unknown): CandleFeedRequest {
  const result = scrapeRequestSchema.safeParse(body);

  if (!result.success) {
    const issues = result.error.errors.map((e) => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message));
    throw new RequestValidationError(`Invalid request: ${issues.join('; ')}`, issues);
  }

  const data = result.data;
  const request: CandleFeedRequest = {
    symbol: data.symbol,
    timeframe: data.config?.timeframe ?? data.timeframe,
    limit: data.limit,
    historicalDays: data.historical_days,
  };

  if (data.tradingview_url !== undefined) {
    request.sourceUrl = data.tradingview_url;
  }

  return request;
}

/**
 * Best-effort symbol for error envelopes of bodies that failed validation
 */
export function symbolFromBody(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'symbol' in body && typeof body.symbol === 'string') {
    return body.symbol;
  }
  return '';
}
