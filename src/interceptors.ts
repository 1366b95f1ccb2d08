/**
 * HTTP interceptors and client for upstream calls
 *
 * Why interceptor pattern: Separates cross-cutting concerns (fixed headers,
 * logging, metrics) from the session logic that decides what to send.
 * Each interceptor is independently testable.
 */

import { HTTP_STATUS } from './constants.js';
import { UpstreamTransportError } from './errors.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';

export interface RequestContext {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  operation?: string; // Upstream operation name, for logs and metrics
}

export interface ResponseContext {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export type InterceptorFn = (
  ctx: RequestContext,
  next: () => Promise<ResponseContext>
) => Promise<ResponseContext>;

export interface InterceptorConfig {
  defaultHeaders?: Record<string, string>;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export class InterceptorChain {
  private interceptors: InterceptorFn[] = [];

  constructor(public config: InterceptorConfig = {}) {
    this.buildChain();
  }

  private buildChain(): void {
    if (this.config.defaultHeaders) {
      this.interceptors.push(this.createHeadersInterceptor(this.config.defaultHeaders));
    }

    if (this.config.logger) {
      this.interceptors.push(this.createLoggingInterceptor(this.config.logger));
    }

    if (this.config.metrics) {
      this.interceptors.push(this.createMetricsInterceptor(this.config.metrics));
    }
  }

  /**
   * Headers interceptor: adds headers every upstream call carries.
   * Explicit per-request headers win.
   */
  private createHeadersInterceptor(defaults: Record<string, string>): InterceptorFn {
    return async (ctx, next) => {
      ctx.headers = { ...defaults, ...ctx.headers };
      return next();
    };
  }

  private createLoggingInterceptor(logger: Logger): InterceptorFn {
    return async (ctx, next) => {
      logger.debug('Upstream request', {
        method: ctx.method,
        url: ctx.url,
        operation: ctx.operation,
        headers: ctx.headers,
      });
      const response = await next();
      logger.debug('Upstream response', {
        operation: ctx.operation,
        status: response.status,
      });
      return response;
    };
  }

  /**
   * Metrics interceptor: records duration and status class of every call,
   * including transport failures
   */
  private createMetricsInterceptor(metrics: MetricsCollector): InterceptorFn {
    return async (ctx, next) => {
      const startTime = Date.now();
      const operation = ctx.operation ?? 'unknown';
      try {
        const response = await next();
        metrics.recordApiCall(operation, response.status, (Date.now() - startTime) / 1000);
        return response;
      } catch (error) {
        metrics.recordApiCallError(operation, error instanceof Error ? error.name : 'unknown');
        throw error;
      }
    };
  }

  async execute(ctx: RequestContext, finalHandler: () => Promise<ResponseContext>): Promise<ResponseContext> {
    let index = 0;

    const next = async (): Promise<ResponseContext> => {
      if (index >= this.interceptors.length) {
        return finalHandler();
      }

      const interceptor = this.interceptors[index++];
      return interceptor(ctx, next);
    };

    return next();
  }
}

/**
 * HTTP client with interceptor support
 *
 * Returns every HTTP status to the caller: the session client decides what a
 * 401 or 403 means. Only transport failures (DNS, reset, timeout) throw.
 */
export class HttpClient {
  constructor(
    private baseUrl: string,
    private interceptors: InterceptorChain = new InterceptorChain(),
    private timeoutMs?: number
  ) {}

  async request(method: string, path: string, options: {
    body?: unknown;
    headers?: Record<string, string>;
    operation?: string;
  } = {}): Promise<ResponseContext> {
    const ctx: RequestContext = {
      method,
      url: this.baseUrl + path,
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
      body: options.body,
      operation: options.operation,
    };

    return this.interceptors.execute(ctx, async () => {
      const fetchOptions: RequestInit = {
        method: ctx.method,
        headers: ctx.headers,
      };

      if (ctx.method !== 'GET' && ctx.method !== 'HEAD' && ctx.body !== undefined) {
        fetchOptions.body = JSON.stringify(ctx.body);
      }

      if (this.timeoutMs) {
        fetchOptions.signal = AbortSignal.timeout(this.timeoutMs);
      }

      // The body stream can fail or time out after the headers arrived
      try {
        const response = await fetch(ctx.url, fetchOptions);
        const body = await readBody(response);

        return {
          status: response.status,
          headers: Object.fromEntries(response.headers.entries()),
          body,
        };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new UpstreamTransportError(`Upstream request failed: ${reason}`);
      }
    });
  }
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return undefined;
  }
  if (response.headers.get('content-type')?.includes('application/json')) {
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
  return text;
}

export function isSuccessStatus(status: number): boolean {
  return status >= HTTP_STATUS.OK && status < HTTP_STATUS.MULTIPLE_CHOICES;
}
