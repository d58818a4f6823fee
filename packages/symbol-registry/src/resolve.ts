/**
 * Provider symbol resolution
 */

import type { ProviderKind } from '@candlefeed/contracts';
import { getAliasRoots, getDefaultSymbolTable } from './aliases.js';
import { cleanSymbol, isContinuousTicker, matchAliasRoot } from './normalize.js';
import type { ProviderSymbol, SymbolResolution, SymbolTable } from './types.js';

/**
 * Resolve a user-supplied symbol into the provider's notation
 *
 * Never throws: unknown symbols pass through cleaned, and input that cleans
 * to nothing falls back to the trimmed input, then to the raw input.
 *
 * @param raw - Symbol as received ("WINZ25", "BMFBOVESPA:WIN1!", "petr4")
 * @param provider - Target provider
 * @param table - Alias table; defaults to the bundled one
 *
 * @example
 * ```typescript
 * resolveSymbol('WINZ25', 'tradingview').providerSymbol // → 'WIN1!'
 * resolveSymbol('WINZ25', 'yahoo').providerSymbol       // → '^BVSP'
 * resolveSymbol('PETR4', 'yahoo').providerSymbol        // → 'PETR4.SA'
 * resolveSymbol('AAPL', 'tradingview').providerSymbol   // → 'AAPL'
 * ```
 */
export function resolveSymbol(
  raw: string,
  provider: ProviderKind,
  table: SymbolTable = getDefaultSymbolTable()
): SymbolResolution {
  const cleaned = cleanSymbol(raw, table);
  const canonical = cleaned.canonical || raw.trim().toUpperCase() || raw;
  const exchange = cleaned.exchange ?? table.defaultExchange;

  const root = matchAliasRoot(canonical, getAliasRoots(table));
  const target = root ? table.aliases[root]?.[provider] : undefined;
  if (root && target) {
    return build(target, canonical, exchange, 'alias', root);
  }

  if (table.suffixProviders.includes(provider) && table.localEquityPattern.test(canonical)) {
    return build(`${canonical}${table.localSuffix}`, canonical, exchange, 'suffixed');
  }

  // Input that cleans to nothing ('', 'B3:') passes through as given.
  return build(canonical, canonical, exchange, 'passthrough');
}

/**
 * Shorthand for {@link resolveSymbol} when only the ticker is needed
 */
export function resolveProviderSymbol(
  raw: string,
  provider: ProviderKind,
  table?: SymbolTable
): ProviderSymbol {
  return resolveSymbol(raw, provider, table).providerSymbol;
}

function build(
  providerSymbol: ProviderSymbol,
  canonical: string,
  exchange: string,
  source: SymbolResolution['source'],
  root?: string
): SymbolResolution {
  const resolution: SymbolResolution = {
    providerSymbol,
    canonical,
    exchange,
    source,
    continuous: isContinuousTicker(providerSymbol),
  };
  if (root) {
    resolution.root = root;
  }
  return resolution;
}
