/**
 * Candle pipeline: resolve, fetch with fallback, normalize, classify, limit
 */

import {
  isProviderError,
  type Candle,
  type MarketDataProvider,
  type ProviderKind,
} from '@candlefeed/contracts';
import { getRequestId, startTimer, withRequestContext, type Logger } from '@candlefeed/logger';
import {
  buildFetchPlan,
  limitWindow,
  normalizeBars,
  type ClassificationPolicy,
} from '@candlefeed/market-data-core';
import { getDefaultSymbolTable, resolveSymbol, type SymbolTable } from '@candlefeed/symbol-registry';
import { sanitizeError } from '../utils/error-sanitizer.js';

/**
 * One candle request, already validated
 */
export interface CandleFeedRequest {
  /** Symbol as the caller wrote it ("WINZ25", "BMFBOVESPA:WIN1!", "PETR4") */
  symbol: string;
  timeframe: string;
  /** Number of most recent candles to return */
  limit: number;
  historicalDays: number;
  /** Chart page to scrape instead of the default one */
  sourceUrl?: string;
}

/**
 * Response envelope, identical in shape for every outcome
 */
export interface CandleFeedResponse {
  success: boolean;
  symbol: string;
  candles: Candle[];
  message?: string;
  timestamp?: string;
  source?: string;
}

export interface CandlePipelineOptions {
  provider: MarketDataProvider;
  policy: ClassificationPolicy;
  logger: Logger;
  /** Trading session length used for bar budgets */
  sessionMinutes?: number;
  symbolTable?: SymbolTable;
  /** Front contract requested for futures roots on the chart-session provider (default: 1) */
  frontContract?: number;
  now?: () => Date;
}

const UNEXPECTED_FAILURE_MESSAGE = 'Unexpected error while fetching candles';

/**
 * Runs one request through the whole pipeline.
 *
 * Never rejects: empty results and failures come back as `success: false`
 * envelopes, with the detail logged.
 *
 * @example
 * ```typescript
 * const pipeline = new CandlePipeline({ provider, policy: resolvePolicy('reversal'), logger });
 * const response = await pipeline.run({ symbol: 'WINZ25', timeframe: '2m', limit: 100, historicalDays: 7 });
 * // { success: true, symbol: 'WINZ25', candles: [...], message: 'Extracted 100 candles from tradingview', ... }
 * ```
 */
export class CandlePipeline {
  private readonly provider: MarketDataProvider;
  private readonly policy: ClassificationPolicy;
  private readonly logger: Logger;
  private readonly sessionMinutes?: number;
  private readonly symbolTable: SymbolTable;
  private readonly frontContract: number;
  private readonly now: () => Date;

  constructor(options: CandlePipelineOptions) {
    this.provider = options.provider;
    this.policy = options.policy;
    this.logger = options.logger.child({ component: 'pipeline', provider: options.provider.kind });
    this.sessionMinutes = options.sessionMinutes;
    this.symbolTable = options.symbolTable ?? getDefaultSymbolTable();
    this.frontContract = options.frontContract ?? 1;
    this.now = options.now ?? (() => new Date());
  }

  get source(): ProviderKind {
    return this.provider.kind;
  }

  get policyName(): string {
    return this.policy.name;
  }

  async run(request: CandleFeedRequest): Promise<CandleFeedResponse> {
    return withRequestContext(() => this.execute(request), getRequestId(), { symbol: request.symbol });
  }

  private async execute(request: CandleFeedRequest): Promise<CandleFeedResponse> {
    const timer = startTimer();
    const source = this.provider.kind;

    try {
      const resolution = resolveSymbol(request.symbol, source, this.symbolTable);
      const capabilities = this.provider.capabilities();

      const plan = buildFetchPlan({
        provider: source,
        providerSymbol: resolution.providerSymbol,
        exchange: resolution.exchange,
        requestedTimeframe: request.timeframe,
        lookbackDays: request.historicalDays,
        windowSize: request.limit,
        maxBarsPerRequest: capabilities.maxBarsPerRequest,
        sessionMinutes: this.sessionMinutes,
        sourceUrl: request.sourceUrl,
        frontContract: resolution.source === 'alias' ? this.frontContract : undefined,
      });

      this.logger.info('Symbol resolved', {
        symbol: request.symbol,
        provider_symbol: resolution.providerSymbol,
        resolution: resolution.source,
        timeframe: request.timeframe,
        attempts: plan.attempts.length,
        window: plan.windowSize,
      });

      for (const [index, query] of plan.attempts.entries()) {
        const attemptTimer = startTimer();
        const rawBars = await this.provider.fetchBars(query);
        const { candles, dropped } = normalizeBars(rawBars, {
          policy: this.policy,
          priceDecimals: capabilities.priceDecimals,
        });

        this.logger.info('Fetch attempt finished', {
          attempt: index + 1,
          interval: query.interval.code,
          period: query.period,
          bar_count: query.barCount,
          raw_bars: rawBars.length,
          candles: candles.length,
          duration_ms: attemptTimer.stop(),
        });

        if (dropped.length > 0) {
          this.logger.debug('Dropped malformed bars', {
            dropped: dropped.length,
            reasons: dropped.slice(0, 5).map((entry) => entry.error.message),
          });
        }

        if (candles.length > 0) {
          const window = [...limitWindow(candles, plan.windowSize)];
          this.logger.info('Candles extracted', { candles: window.length, duration_ms: timer.stop() });
          return this.envelope(request.symbol, true, window, `Extracted ${window.length} candles from ${source}`);
        }
      }

      this.logger.warn('No data returned', { symbol: request.symbol, duration_ms: timer.stop() });
      return this.envelope(request.symbol, false, [], `No data returned from ${source}`);
    } catch (error) {
      if (isProviderError(error)) {
        this.logger.error('Provider request failed', {
          reason: error.reason,
          error: sanitizeError(error, true),
          duration_ms: timer.stop(),
        });
        return this.envelope(request.symbol, false, [], error.message);
      }

      this.logger.error('Candle pipeline failed', { error: sanitizeError(error, true), duration_ms: timer.stop() });
      return this.envelope(request.symbol, false, [], UNEXPECTED_FAILURE_MESSAGE);
    }
  }

  private envelope(symbol: string, success: boolean, candles: Candle[], message: string): CandleFeedResponse {
    return {
      success,
      symbol,
      candles,
      message,
      timestamp: this.now().toISOString(),
      source: this.provider.kind,
    };
  }
}
