/**
 * Provider selection from configuration
 */

import type { MarketDataProvider } from '@candlefeed/contracts';
import type { Logger } from '@candlefeed/logger';
import { HttpPageRenderer, ScrapeProvider } from '@candlefeed/provider-scrape';
import { TradingViewProvider } from '@candlefeed/provider-tradingview';
import { YahooProvider } from '@candlefeed/provider-yahoo';
import type { Config } from '../../config/index.js';

/**
 * Builds the adapter named by `provider.type`.
 *
 * The pipeline only sees the MarketDataProvider interface, so swapping
 * backends is a config change.
 *
 * @example
 * ```typescript
 * const provider = createProvider(loadConfig(), logger);
 * provider.kind; // 'tradingview'
 * ```
 */
export function createProvider(config: Config, logger: Logger): MarketDataProvider {
  const { provider } = config;
  const providerLogger = logger.child({ component: 'provider', provider: provider.type });

  switch (provider.type) {
    case 'tradingview':
      return new TradingViewProvider({
        exchange: provider.tradingview.exchange,
        authToken: provider.tradingview.authToken,
        url: provider.tradingview.url,
        timeoutMs: provider.timeoutMs,
        logger: providerLogger,
      });

    case 'yahoo':
      return new YahooProvider({
        baseUrl: provider.yahoo.baseUrl,
        timeoutMs: provider.timeoutMs,
        logger: providerLogger,
      });

    case 'scrape':
      return new ScrapeProvider({
        renderer: new HttpPageRenderer({
          timeoutMs: provider.timeoutMs,
          userAgent: provider.scrape.userAgent,
        }),
        settleMs: provider.scrape.settleMs,
        defaultUrl: provider.scrape.defaultUrl,
        exchange: provider.tradingview.exchange,
        logger: providerLogger,
      });
  }
}
