/**
 * HTTP API server for the candle feed
 * Provides POST /scrape plus health and service info endpoints
 */

import type { Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { isCandleFeedError, RequestValidationError } from '@candlefeed/contracts';
import { getRequestId, requestIdMiddleware, startTimer, type Logger } from '@candlefeed/logger';
import type { CandleFeedResponse, CandlePipeline } from '../services/candle-pipeline.js';
import { sanitizeError } from '../utils/error-sanitizer.js';
import { parseScrapeRequest, symbolFromBody } from './request-schema.js';

export interface HttpServerConfig {
  port: number;
  host: string;
  logger: Logger;
  pipeline: CandlePipeline;
  /** Value of Access-Control-Allow-Origin (default: '*') */
  corsOrigin?: string;
  serviceName?: string;
  version?: string;
}

/**
 * HTTP server for handling API requests
 */
export class HttpServer {
  private readonly app: Express;
  private readonly logger: Logger;
  private server?: Server;

  constructor(private readonly config: HttpServerConfig) {
    this.logger = config.logger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Port actually bound, useful when listening on port 0
   */
  get port(): number | undefined {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : undefined;
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    const requestId = requestIdMiddleware();
    this.app.use((req, res, next) => requestId(req, res, next));

    // CORS
    this.app.use((req, res, next) => {
      res.setHeader('Access-Control-Allow-Origin', this.config.corsOrigin ?? '*');
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Request-ID');
      res.setHeader('Access-Control-Expose-Headers', 'X-Request-ID');
      if (req.method === 'OPTIONS') {
        res.status(204).end();
        return;
      }
      next();
    });

    // Request logging
    this.app.use((req, res, next) => {
      const timer = startTimer();
      const requestId = getRequestId();
      res.on('finish', () => {
        this.logger.info('HTTP request', {
          request_id: requestId,
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration_ms: timer.stop(),
        });
      });
      next();
    });

    this.app.use(express.json({ limit: '100kb' }));
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        service: this.config.serviceName ?? 'candlefeed',
        version: this.config.version ?? '0.1.0',
      });
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'healthy',
        provider: this.config.pipeline.source,
        policy: this.config.pipeline.policyName,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.post('/scrape', (req: Request, res: Response, next: NextFunction) => {
      this.handleScrape(req, res).catch(next);
    });

    // 404 handler
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found', path: req.path });
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.handleError(error, req, res);
    });
  }

  private async handleScrape(req: Request, res: Response): Promise<void> {
    const body: unknown = req.body;

    let response: CandleFeedResponse;
    try {
      response = await this.config.pipeline.run(parseScrapeRequest(body));
    } catch (error) {
      if (error instanceof RequestValidationError) {
        this.logger.warn('Rejected scrape request', { issues: error.issues });
        res.status(400).json({
          success: false,
          symbol: symbolFromBody(body),
          candles: [],
          message: error.message,
        } satisfies CandleFeedResponse);
        return;
      }
      throw error;
    }

    res.json(response);
  }

  private handleError(error: unknown, req: Request, res: Response): void {
    const status = httpStatusOf(error);

    if (status >= 500) {
      this.logger.error('Unhandled request error', { path: req.path, error: sanitizeError(error, true) });
    } else {
      this.logger.warn('Request rejected', { path: req.path, status, error: sanitizeError(error) });
    }

    if (res.headersSent) {
      return;
    }

    res.status(status).json({
      success: false,
      symbol: symbolFromBody(req.body),
      candles: [],
      message: status === 400 ? 'Malformed JSON body' : status >= 500 ? 'Internal server error' : errorMessage(error),
    } satisfies CandleFeedResponse);
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => resolve());
      server.once('error', reject);
      this.server = server;
    });

    this.logger.info('HTTP server listening', {
      host: this.config.host,
      port: this.port,
      provider: this.config.pipeline.source,
    });
  }

  /**
   * Stop the HTTP server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.server = undefined;
    this.logger.info('HTTP server stopped');
  }
}

/**
 * Status carried by body-parser errors (400 malformed JSON, 413 too large), else 500
 */
function httpStatusOf(error: unknown): number {
  if (isCandleFeedError(error)) {
    return 500;
  }
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 600 ? error.status : 500;
  }
  return 500;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
