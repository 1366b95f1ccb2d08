/**
 * HTTP transport for the MCP gateway
 *
 * Stateless JSON-RPC over POST: every request is handled on its own, with no
 * sessions and no streaming. Express adapts the HTTP request to McpGateway
 * and writes back whatever status and body the gateway decides on.
 */

import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import type { GatewayConfig } from './config.js';
import { HTTP_STATUS, JSONRPC_ERROR, LIVENESS_MESSAGE, TIME } from './constants.js';
import { toError } from './errors.js';
import { errorResponse } from './jsonrpc.js';
import type { Logger } from './logger.js';
import { McpGateway, type McpGatewayOptions } from './mcp-gateway.js';
import { MetricsCollector } from './metrics.js';
import { isRecord } from './validation-utils.js';

export type HttpTransportConfig = Pick<
  GatewayConfig,
  'host' | 'port' | 'mcpPath' | 'allowedOrigin' | 'metricsEnabled' | 'metricsPath'
>;

export const CORS_ALLOWED_METHODS = 'GET, POST, OPTIONS';
export const CORS_ALLOWED_HEADERS = 'Content-Type, Authorization, X-API-Key, mcp-protocol-version';

const MAX_BODY_SIZE = '1mb';

export const UNMATCHED_ROUTE_LABEL = 'other';

function singleHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export class HttpTransport {
  private app: express.Application;
  private server: Server | null = null;

  constructor(
    private config: HttpTransportConfig,
    private gateway: McpGateway,
    private logger: Logger,
    private metrics?: MetricsCollector
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Express application, for driving the transport without a listener
   */
  getApp(): express.Application {
    return this.app;
  }

  /**
   * Setup Express middleware
   *
   * Why raw text: malformed JSON must reach the gateway so it can answer
   * with a JSON-RPC parse error instead of an HTML error page.
   */
  private setupMiddleware(): void {
    this.app.disable('x-powered-by');

    this.app.use(express.text({ type: () => true, limit: MAX_BODY_SIZE }));

    // Metrics: record every request once the response is written
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      res.on('finish', () => {
        this.metrics?.recordHttpRequest(req.method, this.routeLabel(req.path), res.statusCode, (Date.now() - startTime) / 1000);
      });
      next();
    });

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      this.applyCorsHeaders(req, res);
      next();
    });
  }

  /**
   * Metrics path label: served routes keep their path, everything else is
   * counted under one label so unmatched URLs cannot grow the label set
   */
  private routeLabel(path: string): string {
    const { mcpPath, metricsEnabled, metricsPath } = this.config;
    const served = path === '/' || path === '/health' || path === mcpPath
      || (metricsEnabled && path === metricsPath);
    return served ? path : UNMATCHED_ROUTE_LABEL;
  }

  /**
   * CORS headers
   *
   * With a configured origin only that origin is echoed, together with the
   * credentials flag; other origins get no Allow-Origin header. Without one,
   * every origin is allowed.
   */
  private applyCorsHeaders(req: Request, res: Response): void {
    const allowed = this.config.allowedOrigin;
    if (allowed) {
      res.setHeader('Vary', 'Origin');
      if (req.headers.origin === allowed) {
        res.setHeader('Access-Control-Allow-Origin', allowed);
        res.setHeader('Access-Control-Allow-Credentials', 'true');
      }
    } else {
      res.setHeader('Access-Control-Allow-Origin', '*');
    }
    res.setHeader('Access-Control-Allow-Methods', CORS_ALLOWED_METHODS);
    res.setHeader('Access-Control-Allow-Headers', CORS_ALLOWED_HEADERS);
    res.setHeader('Access-Control-Max-Age', String(TIME.SECONDS_PER_DAY));
  }

  private setupRoutes(): void {
    // Preflight for any path
    this.app.options('*', (_req: Request, res: Response) => {
      res.status(HTTP_STATUS.NO_CONTENT).end();
    });

    this.app.get('/', (_req: Request, res: Response) => {
      res.type('text/plain').send(LIVENESS_MESSAGE);
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok' });
    });

    if (this.config.metricsEnabled && this.metrics) {
      this.app.get(this.config.metricsPath, this.handleMetrics.bind(this));
    }

    this.app.post(this.config.mcpPath, this.handlePost.bind(this));

    this.app.use((_req: Request, res: Response) => {
      res.status(HTTP_STATUS.NOT_FOUND).json({ error: 'Not Found' });
    });

    // Body parser failures (oversized or undecodable bodies)
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = isRecord(err) && typeof err.status === 'number' ? err.status : HTTP_STATUS.BAD_REQUEST;
      this.logger.warn('Rejected unreadable request body', { status, error: toError(err).message });
      res.status(status).json(errorResponse(null, JSONRPC_ERROR.PARSE_ERROR, `Parse error: ${toError(err).message}`));
    });
  }

  /**
   * Handle metrics endpoint
   *
   * Why: Prometheus scraping endpoint
   */
  private async handleMetrics(_req: Request, res: Response): Promise<void> {
    if (!this.metrics) {
      res.status(HTTP_STATUS.NOT_FOUND).json({ error: 'Not Found', message: 'Metrics disabled' });
      return;
    }

    try {
      const metrics = await this.metrics.getMetrics();
      res.set('Content-Type', this.metrics.getRegistry().contentType);
      res.send(metrics);
    } catch (error) {
      this.logger.error('Metrics endpoint error', toError(error));
      res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ error: 'Internal Server Error' });
    }
  }

  private async handlePost(req: Request, res: Response): Promise<void> {
    const body = typeof req.body === 'string' ? req.body : '';

    try {
      const result = await this.gateway.handle({
        body,
        authorization: req.headers.authorization,
        apiKey: singleHeader(req.headers['x-api-key']),
      });

      if (result.body === undefined) {
        res.status(result.status).end();
        return;
      }
      res.status(result.status).json(result.body);
    } catch (error) {
      // McpGateway maps its own failures; this only guards the transport itself
      this.logger.error('Unhandled transport error', toError(error));
      res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json(
        errorResponse(null, JSONRPC_ERROR.INTERNAL_ERROR, 'Internal error')
      );
    }
  }

  /**
   * Start HTTP server
   */
  public async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info('HTTP transport started', {
          host: this.config.host,
          port: this.config.port,
          path: this.config.mcpPath,
          metrics: this.config.metricsEnabled,
        });
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  /**
   * Stop HTTP server
   */
  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
        } else {
          this.logger.info('HTTP transport stopped');
          resolve();
        }
      });
    });
  }
}

/**
 * Wire gateway, metrics and transport from one configuration
 */
export function createHttpTransport(
  config: GatewayConfig,
  logger: Logger,
  options: Omit<McpGatewayOptions, 'logger' | 'metrics'> = {}
): HttpTransport {
  const metrics = config.metricsEnabled
    ? new MetricsCollector({ enabled: true, prefix: 'mcp_' })
    : undefined;
  const gateway = new McpGateway(config, { ...options, logger, metrics });
  return new HttpTransport(config, gateway, logger, metrics);
}
