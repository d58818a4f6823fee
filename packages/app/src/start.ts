#!/usr/bin/env node

/**
 * Main application entry point
 * Loads configuration, wires the provider into the pipeline and starts the HTTP server
 */

// Load environment variables from .env file
import 'dotenv/config';

import { createLogger, attachGlobalHandlers, withRequestContext, startTimer, type Logger } from '@candlefeed/logger';
import { getDefaultSymbolTable, loadSymbolTable } from '@candlefeed/symbol-registry';
import { loadConfig, getConfigSummary, getClassificationPolicy } from './config/index.js';
import { HttpServer } from './server/http-server.js';
import { CandlePipeline } from './services/candle-pipeline.js';
import { createProvider } from './services/providers/provider-factory.js';

/**
 * Main startup function
 */
async function start(): Promise<void> {
  let logger: Logger | undefined;

  try {
    const config = loadConfig();

    logger = createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });

    attachGlobalHandlers(logger);
    const rootLogger = logger;

    const server = await withRequestContext(async () => {
      const startupTimer = startTimer();

      rootLogger.info('Starting candle feed', {
        ...getConfigSummary(config),
        operation: 'app_startup',
      });

      const pipeline = new CandlePipeline({
        provider: createProvider(config, rootLogger),
        policy: getClassificationPolicy(config),
        logger: rootLogger,
        sessionMinutes: config.market.sessionMinutes,
        symbolTable: config.market.symbolTablePath
          ? loadSymbolTable(config.market.symbolTablePath)
          : getDefaultSymbolTable(),
      });

      const httpServer = new HttpServer({
        port: config.server.port,
        host: config.server.host,
        corsOrigin: config.server.corsOrigin,
        serviceName: config.app.name,
        version: config.app.version,
        logger: rootLogger.child({ component: 'http-server' }),
        pipeline,
      });
      await httpServer.start();

      rootLogger.info('Candle feed startup complete', {
        operation: 'app_startup',
        duration_ms: startupTimer.stop(),
        result: 'success',
      });

      return httpServer;
    });

    const shutdown = (signal: string): void => {
      rootLogger.info('Shutting down', { signal });
      void server.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          rootLogger.error('Error during shutdown', { error });
          process.exit(1);
        }
      );
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    if (logger) {
      logger.error('Application startup failed', { error });
    } else {
      console.error('Application startup failed:', error);
    }
    process.exit(1);
  }
}

void start();
