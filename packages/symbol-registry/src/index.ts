/**
 * @candlefeed/symbol-registry
 * Maps vendor-neutral instrument codes to provider-specific tickers
 */

export type {
  CanonicalSymbol,
  ProviderSymbol,
  SymbolAlias,
  SymbolTable,
  ResolutionSource,
  SymbolResolution,
} from './types.js';

export {
  createSymbolTable,
  loadSymbolTable,
  getDefaultSymbolTable,
  getAliasRoots,
  clearSymbolTableCache,
} from './aliases.js';

export type { CleanedSymbol } from './normalize.js';
export { cleanSymbol, matchAliasRoot, isContinuousTicker } from './normalize.js';

export { resolveSymbol, resolveProviderSymbol } from './resolve.js';
