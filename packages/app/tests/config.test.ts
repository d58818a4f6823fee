/**
 * Tests for configuration loading and provider selection
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@candlefeed/contracts';
import { createLogger } from '@candlefeed/logger';
import { ScrapeProvider } from '@candlefeed/provider-scrape';
import { TradingViewProvider } from '@candlefeed/provider-tradingview';
import { YahooProvider } from '@candlefeed/provider-yahoo';
import { loadConfig, getConfigSummary, getClassificationPolicy } from '../src/config/index.js';
import { createProvider } from '../src/services/providers/provider-factory.js';

const logger = createLogger({ level: 'error', console: false });

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig(undefined, {});

    expect(config.app.env).toBe('development');
    expect(config.server.port).toBe(8000);
    expect(config.server.corsOrigin).toBe('*');
    expect(config.provider.type).toBe('tradingview');
    expect(config.provider.timeoutMs).toBe(15000);
    expect(config.provider.tradingview.exchange).toBe('BMFBOVESPA');
    expect(config.provider.scrape.settleMs).toBe(3000);
    expect(config.market.sessionMinutes).toBe(540);
    expect(config.classification.policy).toBe('reversal');
    expect(config.logging.level).toBe('info');
  });

  it('should map environment variables onto nested settings', () => {
    const config = loadConfig(undefined, {
      PORT: '9000',
      PROVIDER_TYPE: 'yahoo',
      LOG_FORMAT: 'json',
      MARKET_SESSION_MINUTES: '420',
      SCRAPE_SETTLE_MS: '500',
    });

    expect(config.server.port).toBe(9000);
    expect(config.provider.type).toBe('yahoo');
    expect(config.logging.format).toBe('json');
    expect(config.market.sessionMinutes).toBe(420);
    expect(config.provider.scrape.settleMs).toBe(500);
  });

  it('should ignore blank variables', () => {
    const config = loadConfig(undefined, { LOG_LEVEL: '  ', PORT: '' });

    expect(config.logging.level).toBe('info');
    expect(config.server.port).toBe(8000);
  });

  it('should reject unknown provider types', () => {
    expect(() => loadConfig(undefined, { PROVIDER_TYPE: 'bloomberg' })).toThrow(ConfigurationError);
    expect(() => loadConfig(undefined, { PROVIDER_TYPE: 'bloomberg' })).toThrow(/provider\.type/);
  });

  it('should reject a non-numeric port', () => {
    expect(() => loadConfig(undefined, { PORT: 'eighty' })).toThrow(/server\.port/);
  });

  it('should reject unknown classification policies at load time', () => {
    expect(() => loadConfig(undefined, { CLASSIFICATION_POLICY: 'momentum' })).toThrow(
      'Unknown classification policy: momentum'
    );
  });

  it('should reject threshold overrides that break the order', () => {
    expect(() => loadConfig(undefined, { CLASSIFICATION_WEAK_THRESHOLD: '0.9' })).toThrow(ConfigurationError);
  });
});

describe('getClassificationPolicy', () => {
  it('should apply threshold overrides to the named policy', () => {
    const config = loadConfig(undefined, {
      CLASSIFICATION_POLICY: 'buyer-seller',
      CLASSIFICATION_STRONG_THRESHOLD: '0.8',
    });

    const policy = getClassificationPolicy(config);

    expect(policy.name).toBe('buyer-seller');
    expect(policy.strongThreshold).toBe(0.8);
    expect(policy.weakThreshold).toBe(0.1);
    expect(policy.labels.degenerate).toBe('doji');
  });
});

describe('getConfigSummary', () => {
  it('should leave credentials out', () => {
    const config = loadConfig(undefined, { TRADINGVIEW_AUTH_TOKEN: 'test-secret' });

    expect(config.provider.tradingview.authToken).toBe('test-secret');
    expect(getConfigSummary(config)).toEqual({
      environment: 'development',
      version: '0.1.0',
      server: { host: '0.0.0.0', port: 8000 },
      provider: 'tradingview',
      classification: 'reversal',
      sessionMinutes: 540,
      logging: { level: 'info', format: 'pretty', file: null },
    });
  });
});

describe('createProvider', () => {
  it('should build the adapter named by the config', () => {
    expect(createProvider(loadConfig(undefined, {}), logger)).toBeInstanceOf(TradingViewProvider);
    expect(createProvider(loadConfig(undefined, { PROVIDER_TYPE: 'yahoo' }), logger)).toBeInstanceOf(YahooProvider);
    expect(createProvider(loadConfig(undefined, { PROVIDER_TYPE: 'scrape' }), logger)).toBeInstanceOf(ScrapeProvider);
  });

  it('should report the capabilities of the selected adapter', () => {
    const provider = createProvider(loadConfig(undefined, { PROVIDER_TYPE: 'scrape' }), logger);

    expect(provider.kind).toBe('scrape');
    expect(provider.capabilities().maxBarsPerRequest).toBe(500);
  });
});
