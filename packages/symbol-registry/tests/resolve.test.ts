/**
 * @fileoverview Tests for symbol resolution.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError } from '@candlefeed/contracts';
import {
  resolveSymbol,
  resolveProviderSymbol,
  cleanSymbol,
  matchAliasRoot,
  createSymbolTable,
  loadSymbolTable,
  getDefaultSymbolTable,
  clearSymbolTableCache,
  getAliasRoots,
} from '../src/index.js';

describe('getDefaultSymbolTable', () => {
  beforeEach(() => {
    clearSymbolTableCache();
  });

  it('should load the bundled table', () => {
    const table = getDefaultSymbolTable();

    expect(table.defaultExchange).toBe('BMFBOVESPA');
    expect(table.localSuffix).toBe('.SA');
    expect(table.aliases.WIN?.tradingview).toBe('WIN1!');
  });

  it('should cache the table', () => {
    expect(getDefaultSymbolTable()).toBe(getDefaultSymbolTable());
  });
});

describe('createSymbolTable', () => {
  it('should reject tables without a default exchange', () => {
    expect(() => createSymbolTable({ aliases: {} })).toThrow(ConfigurationError);
  });

  it('should reject unknown providers', () => {
    expect(() => createSymbolTable({ defaultExchange: 'X', suffixProviders: ['bloomberg'] })).toThrow(
      ConfigurationError
    );
  });

  it('should upper-case alias roots', () => {
    const table = createSymbolTable({ defaultExchange: 'cme', aliases: { es: { tradingview: 'ES1!' } } });

    expect(table.defaultExchange).toBe('CME');
    expect(Object.keys(table.aliases)).toEqual(['ES']);
  });
});

describe('loadSymbolTable', () => {
  it('should fail on a missing file', () => {
    expect(() => loadSymbolTable('/nonexistent/symbols.json')).toThrow(ConfigurationError);
  });
});

describe('cleanSymbol', () => {
  const table = getDefaultSymbolTable();

  it('should strip a colon prefix', () => {
    expect(cleanSymbol('BMFBOVESPA:winz25', table)).toEqual({ canonical: 'WINZ25', exchange: 'BMFBOVESPA' });
  });

  it('should strip a known dash prefix', () => {
    expect(cleanSymbol('b3-PETR4', table)).toEqual({ canonical: 'PETR4', exchange: 'B3' });
  });

  it('should keep an unknown dash prefix', () => {
    expect(cleanSymbol('BRK-B', table)).toEqual({ canonical: 'BRK-B' });
  });

  it('should trim and upper-case', () => {
    expect(cleanSymbol('  petr4 ', table)).toEqual({ canonical: 'PETR4' });
  });
});

describe('matchAliasRoot', () => {
  const roots = ['WDO', 'WIN'];

  it('should match the root and its contract suffixes', () => {
    expect(matchAliasRoot('WIN', roots)).toBe('WIN');
    expect(matchAliasRoot('WINZ25', roots)).toBe('WIN');
    expect(matchAliasRoot('WINZ2025', roots)).toBe('WIN');
    expect(matchAliasRoot('WIN1!', roots)).toBe('WIN');
    expect(matchAliasRoot('WDOFUT', roots)).toBe('WDO');
  });

  it('should not match other tickers sharing the prefix', () => {
    expect(matchAliasRoot('WINNER', roots)).toBeUndefined();
    expect(matchAliasRoot('WINA25', roots)).toBeUndefined();
  });
});

describe('getAliasRoots', () => {
  it('should order longer roots first', () => {
    const table = createSymbolTable({ defaultExchange: 'X', aliases: { WD: {}, WDO: {} } });

    expect(getAliasRoots(table)).toEqual(['WDO', 'WD']);
  });
});

describe('resolveSymbol', () => {
  it('should map a dated mini-index contract to the continuous ticker', () => {
    expect(resolveSymbol('WINZ25', 'tradingview')).toEqual({
      providerSymbol: 'WIN1!',
      canonical: 'WINZ25',
      exchange: 'BMFBOVESPA',
      source: 'alias',
      root: 'WIN',
      continuous: true,
    });
  });

  it('should ignore the exchange prefix when matching', () => {
    const resolution = resolveSymbol('BMFBOVESPA:WINZ25', 'tradingview');

    expect(resolution.providerSymbol).toBe('WIN1!');
    expect(resolution.exchange).toBe('BMFBOVESPA');
  });

  it('should map the dollar future', () => {
    expect(resolveProviderSymbol('WDOF26', 'tradingview')).toBe('WDO1!');
    expect(resolveProviderSymbol('WDOF26', 'scrape')).toBe('WDO1!');
  });

  it('should map aliases to the yahoo proxy ticker', () => {
    const resolution = resolveSymbol('WIN', 'yahoo');

    expect(resolution.providerSymbol).toBe('^BVSP');
    expect(resolution.continuous).toBe(false);
  });

  it('should suffix local equities for yahoo only', () => {
    expect(resolveSymbol('PETR4', 'yahoo')).toMatchObject({ providerSymbol: 'PETR4.SA', source: 'suffixed' });
    expect(resolveSymbol('PETR4', 'tradingview')).toMatchObject({ providerSymbol: 'PETR4', source: 'passthrough' });
  });

  it('should pass unknown symbols through', () => {
    expect(resolveSymbol('aapl', 'yahoo')).toMatchObject({ providerSymbol: 'AAPL', source: 'passthrough' });
  });

  it('should pass input that cleans to nothing through unchanged', () => {
    expect(resolveSymbol('B3:', 'yahoo')).toMatchObject({ providerSymbol: 'B3:', canonical: 'B3:', source: 'passthrough' });
    expect(resolveSymbol('', 'tradingview')).toMatchObject({ providerSymbol: '', source: 'passthrough' });
  });

  it('should never throw', () => {
    expect(resolveProviderSymbol('', 'tradingview')).toBe('');
    expect(resolveProviderSymbol('   ', 'yahoo')).toBe('   ');
    expect(resolveProviderSymbol('B3:', 'yahoo')).toBe('B3:');
    expect(resolveProviderSymbol('%%%', 'scrape')).toBe('%%%');
  });

  it('should use a custom table', () => {
    const table = createSymbolTable({ defaultExchange: 'CME', aliases: { ES: { tradingview: 'ES1!' } } });

    expect(resolveSymbol('ESH25', 'tradingview', table)).toMatchObject({
      providerSymbol: 'ES1!',
      exchange: 'CME',
    });
  });
});
