/**
 * Core types for the symbol registry
 */

import type { ProviderKind } from '@candlefeed/contracts';

/**
 * Vendor-neutral instrument code after cleanup
 * Examples: "WIN", "WINZ25", "PETR4"
 */
export type CanonicalSymbol = string;

/**
 * Symbol in a provider's own notation
 * Examples: "WIN1!" (TradingView), "^BVSP" (Yahoo), "PETR4.SA" (Yahoo)
 */
export type ProviderSymbol = string;

/**
 * Provider-specific targets for one continuous-contract root
 */
export interface SymbolAlias {
  description?: string;
  tradingview?: ProviderSymbol;
  yahoo?: ProviderSymbol;
  scrape?: ProviderSymbol;
}

/**
 * Immutable symbol mapping configuration, loaded once per process
 */
export interface SymbolTable {
  /** Exchange used when the caller does not name one */
  readonly defaultExchange: string;

  /** Exchange names stripped from the front of a symbol ("B3-PETR4") */
  readonly exchangePrefixes: readonly string[];

  /** Suffix for local equities on providers that need one (".SA") */
  readonly localSuffix: string;

  /** Pattern a cleaned symbol must match to count as a local equity */
  readonly localEquityPattern: RegExp;

  /** Providers that address local equities with {@link localSuffix} */
  readonly suffixProviders: readonly ProviderKind[];

  /** Continuous-contract root → provider targets */
  readonly aliases: Readonly<Record<CanonicalSymbol, SymbolAlias>>;
}

/**
 * How a provider symbol was obtained
 * - alias: found in the alias table
 * - suffixed: local equity with the market suffix appended
 * - passthrough: best-effort guess, the cleaned input unchanged
 */
export type ResolutionSource = 'alias' | 'suffixed' | 'passthrough';

/**
 * Full result of resolving a raw symbol against one provider
 */
export interface SymbolResolution {
  /** Symbol as sent upstream */
  providerSymbol: ProviderSymbol;

  /** Cleaned input (prefix removed, upper-cased) */
  canonical: CanonicalSymbol;

  /** Exchange named in the input, or the table default */
  exchange: string;

  source: ResolutionSource;

  /** Alias root that matched, when source is 'alias' */
  root?: CanonicalSymbol;

  /** True when the provider symbol is a continuous futures ticker ("WIN1!") */
  continuous: boolean;
}
