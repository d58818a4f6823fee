/**
 * @fileoverview Logger configuration and context types.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that reaches the transports.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Options for {@link createLogger}.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * JSON lines (true) or colorized single-line output (false).
   * @default true when NODE_ENV is 'production'
   */
  json?: boolean;

  /** Also append log lines to this file */
  filePath?: string;

  /**
   * Write to the console.
   * @default true
   */
  console?: boolean;
}

/**
 * Fields child loggers commonly bind for the candle pipeline.
 *
 * @example
 * ```typescript
 * const providerLogger = logger.child({ component: 'provider', provider: 'yahoo' });
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  /** Symbol as requested by the caller */
  symbol?: string;
  /** Symbol as sent upstream */
  provider_symbol?: string;
  provider?: string;
  timeframe?: string;
  request_id?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
