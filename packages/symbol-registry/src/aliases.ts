/**
 * Alias table loading
 * The table lives in data/symbol-aliases.json and is read once per process
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '@candlefeed/contracts';
import type { SymbolTable } from './types.js';

const DEFAULT_TABLE_PATH = fileURLToPath(new URL('../data/symbol-aliases.json', import.meta.url));

const providerKindSchema = z.enum(['tradingview', 'yahoo', 'scrape']);

const aliasSchema = z.object({
  description: z.string().optional(),
  tradingview: z.string().min(1).optional(),
  yahoo: z.string().min(1).optional(),
  scrape: z.string().min(1).optional(),
});

const tableSchema = z.object({
  defaultExchange: z.string().min(1),
  exchangePrefixes: z.array(z.string().min(1)).default([]),
  localSuffix: z.string().default(''),
  localEquityPattern: z.string().default('^$'),
  suffixProviders: z.array(providerKindSchema).default([]),
  aliases: z.record(aliasSchema).default({}),
});

/**
 * Cached default table
 */
let cachedTable: SymbolTable | null = null;

/**
 * Validates raw JSON data and freezes it into a SymbolTable
 *
 * @param data - Parsed JSON content
 * @returns Immutable symbol table
 * @throws {ConfigurationError} If the data does not match the expected shape
 *
 * @example
 * ```typescript
 * const table = createSymbolTable({
 *   defaultExchange: 'BMFBOVESPA',
 *   aliases: { WIN: { tradingview: 'WIN1!', yahoo: '^BVSP' } }
 * });
 * ```
 */
export function createSymbolTable(data: unknown): SymbolTable {
  const result = tableSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid symbol table:\n${issues.join('\n')}`, { issues });
  }

  const raw = result.data;
  const aliases = Object.fromEntries(
    Object.entries(raw.aliases).map(([root, alias]) => [root.trim().toUpperCase(), Object.freeze({ ...alias })])
  );

  let localEquityPattern: RegExp;
  try {
    localEquityPattern = new RegExp(raw.localEquityPattern);
  } catch (error) {
    throw new ConfigurationError(`Invalid localEquityPattern: ${raw.localEquityPattern}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return Object.freeze({
    defaultExchange: raw.defaultExchange.toUpperCase(),
    exchangePrefixes: Object.freeze(raw.exchangePrefixes.map((p) => p.toUpperCase())),
    localSuffix: raw.localSuffix,
    localEquityPattern,
    suffixProviders: Object.freeze([...raw.suffixProviders]),
    aliases: Object.freeze(aliases),
  });
}

/**
 * Reads and validates a symbol table from a JSON file
 *
 * @param path - File to read; defaults to the bundled data/symbol-aliases.json
 * @throws {ConfigurationError} If the file is missing, not JSON, or invalid
 */
export function loadSymbolTable(path: string = DEFAULT_TABLE_PATH): SymbolTable {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read symbol table: ${path}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Symbol table is not valid JSON: ${path}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return createSymbolTable(data);
}

/**
 * The bundled table, loaded on first use
 */
export function getDefaultSymbolTable(): SymbolTable {
  if (!cachedTable) {
    cachedTable = loadSymbolTable();
  }
  return cachedTable;
}

/**
 * All alias roots of a table, longest first so "WDO" wins over "WD"
 */
export function getAliasRoots(table: SymbolTable): string[] {
  return Object.keys(table.aliases).sort((a, b) => b.length - a.length || a.localeCompare(b));
}

/**
 * Clear the default table cache (useful for testing)
 */
export function clearSymbolTableCache(): void {
  cachedTable = null;
}
