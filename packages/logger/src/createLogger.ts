/**
 * @fileoverview Logger factory for the candle feed.
 * Winston under the hood: redaction, standard fields, JSON or pretty output.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger.
 *
 * Format order matters: secrets are redacted first, then timestamp and
 * request id are added, then the line is rendered.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Server listening', { port: 8000 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', filePath: './logs/feed.log' });
 * const pipelineLogger = logger.child({ component: 'pipeline' });
 * pipelineLogger.debug('Symbol resolved', { symbol: 'WINZ25', provider_symbol: 'WIN1!' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const logFormat = format.combine(redactSecrets(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console({ level, format: logFormat }));
  }

  if (filePath) {
    // Files always get JSON lines, colors would end up as escape codes
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.combine(redactSecrets(), standardFields, format.json()),
      })
    );
  }

  // Winston warns when a logger has no transport at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // attachGlobalHandlers decides when the process exits
    exitOnError: false,
  });
}

/**
 * Creates a child logger that stamps `context` on every entry.
 *
 * @example
 * ```typescript
 * const providerLogger = createChildLogger(logger, { component: 'provider', provider: 'tradingview' });
 * providerLogger.info('Chart session opened');
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
