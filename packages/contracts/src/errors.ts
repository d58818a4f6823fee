/**
 * @fileoverview Error taxonomy for the candle feed.
 *
 * Every error carries a machine-readable code, an optional structured data
 * payload and the ISO timestamp of its creation.
 *
 * Empty provider results are not errors: they are reported in the response
 * envelope and never thrown.
 *
 * @module @candlefeed/contracts/errors
 */

import type { ProviderKind } from './market.js';

/**
 * Base class for all candle feed errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new CandleFeedError('CUSTOM_ERROR', 'Something went wrong', { symbol: 'WIN1!' });
 * ```
 */
export class CandleFeedError extends Error {
  /** Machine-readable error code (e.g. 'PROVIDER_ERROR') */
  readonly code: string;

  readonly data?: Record<string, unknown>;

  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Why a provider call failed.
 */
export type ProviderFailureReason =
  | 'network'
  | 'authentication'
  | 'unsupported-symbol'
  | 'timeout'
  | 'protocol';

/**
 * Thrown by provider adapters for hard fetch failures.
 *
 * Caught at the pipeline boundary and turned into a `success: false` response.
 *
 * @example
 * ```typescript
 * throw new ProviderError('Symbol BMFBOVESPA:XYZ1! not found', {
 *   provider: 'tradingview',
 *   reason: 'unsupported-symbol',
 *   symbol: 'XYZ1!'
 * });
 * ```
 */
export class ProviderError extends CandleFeedError {
  readonly provider: ProviderKind;
  readonly reason: ProviderFailureReason;

  constructor(
    message: string,
    data: {
      provider: ProviderKind;
      reason: ProviderFailureReason;
      statusCode?: number;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_ERROR', message, data);
    this.provider = data.provider;
    this.reason = data.reason;
  }
}

/**
 * A single raw bar could not be turned into a candle.
 *
 * Never fatal: the normalizer drops the bar and keeps going.
 */
export class MalformedBarError extends CandleFeedError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('MALFORMED_BAR', message, data);
  }
}

/**
 * An inbound request failed validation (HTTP 400).
 */
export class RequestValidationError extends CandleFeedError {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super('INVALID_REQUEST', message, { issues });
    this.issues = issues;
  }
}

/**
 * The process configuration failed validation at startup.
 */
export class ConfigurationError extends CandleFeedError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, data);
  }
}

/**
 * Type guard for any candle feed error.
 */
export function isCandleFeedError(error: unknown): error is CandleFeedError {
  return error instanceof CandleFeedError;
}

/**
 * Type guard for provider failures.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isProviderError(err) && err.reason === 'timeout') {
 *     logger.warn('Provider timed out', { provider: err.provider });
 *   }
 * }
 * ```
 */
export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isMalformedBarError(error: unknown): error is MalformedBarError {
  return error instanceof MalformedBarError;
}
