/**
 * Symbol normalization
 * Turns user input into the canonical, vendor-neutral form the resolver works on
 */

import type { CanonicalSymbol, SymbolTable } from './types.js';

/**
 * Futures contract month codes
 * F=Jan, G=Feb, H=Mar, J=Apr, K=May, M=Jun, N=Jul, Q=Aug, U=Sep, V=Oct, X=Nov, Z=Dec
 */
const MONTH_CODES = 'FGHJKMNQUVXZ';

/**
 * Suffixes that may follow a contract root: a dated contract (Z25, Z2025),
 * a continuous ticker (1!) or the FUT keyword
 */
const CONTRACT_SUFFIX = new RegExp(`^(?:[${MONTH_CODES}]\\d{2}(?:\\d{2})?|\\d!|FUT)?$`);

/**
 * Result of stripping an exchange prefix
 */
export interface CleanedSymbol {
  canonical: CanonicalSymbol;
  /** Exchange named in the input, if any */
  exchange?: string;
}

/**
 * Strip an exchange prefix, surrounding whitespace and case
 *
 * Any prefix before ':' is treated as an exchange. A '-' only separates an
 * exchange when the prefix is one the table knows.
 *
 * @example
 * ```typescript
 * cleanSymbol('BMFBOVESPA:winz25', table) // → { canonical: 'WINZ25', exchange: 'BMFBOVESPA' }
 * cleanSymbol('B3-PETR4', table)          // → { canonical: 'PETR4', exchange: 'B3' }
 * cleanSymbol('petr4', table)             // → { canonical: 'PETR4' }
 * ```
 */
export function cleanSymbol(raw: string, table: SymbolTable): CleanedSymbol {
  const upper = raw.trim().toUpperCase();

  const colon = upper.indexOf(':');
  if (colon >= 0) {
    const exchange = upper.slice(0, colon).trim();
    const canonical = upper.slice(colon + 1).trim();
    return exchange ? { canonical, exchange } : { canonical };
  }

  const dash = upper.indexOf('-');
  if (dash > 0) {
    const prefix = upper.slice(0, dash).trim();
    if (table.exchangePrefixes.includes(prefix)) {
      return { canonical: upper.slice(dash + 1).trim(), exchange: prefix };
    }
  }

  return { canonical: upper };
}

/**
 * Find the alias root a canonical symbol belongs to
 *
 * The symbol must be the root itself, or the root followed by a contract
 * suffix. Roots are tried in the given order.
 *
 * @example
 * ```typescript
 * matchAliasRoot('WINZ25', ['WDO', 'WIN']) // → 'WIN'
 * matchAliasRoot('WIN1!', ['WIN'])         // → 'WIN'
 * matchAliasRoot('WINNER', ['WIN'])        // → undefined
 * ```
 */
export function matchAliasRoot(symbol: CanonicalSymbol, roots: readonly string[]): string | undefined {
  return roots.find((root) => symbol.startsWith(root) && CONTRACT_SUFFIX.test(symbol.slice(root.length)));
}

/**
 * True when the symbol names a continuous futures ticker ("WIN1!")
 */
export function isContinuousTicker(symbol: string): boolean {
  return /\d!$/.test(symbol);
}
