/**
 * MCP request gateway
 *
 * Why: One place that turns an inbound HTTP body plus headers into a JSON-RPC
 * response. Caller authentication, envelope checks, credential resolution,
 * per-request session construction and error shaping all happen here; the
 * HTTP transport only adapts Express to this interface.
 */

import crypto from 'node:crypto';
import {
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';
import type { GatewayConfig } from './config.js';
import { HTTP_STATUS, JSONRPC_ERROR, SERVER_INFO } from './constants.js';
import {
  describeCredentials,
  extractBearerValue,
  resolveCredentials,
  type Credentials,
} from './credentials.js';
import {
  InvalidRequestError,
  MethodNotFoundError,
  ParseError,
  UnauthorizedError,
  generateCorrelationId,
  getErrorDetails,
  isGatewayError,
  isUpstreamError,
  toError,
} from './errors.js';
import { FinanceApi, type SessionExecutor } from './finance-api.js';
import {
  errorResponse,
  extractId,
  isNotification,
  parseJsonBody,
  successResponse,
  validateRequest,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './jsonrpc.js';
import { ConsoleLogger, type Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import { SessionClient } from './session-client.js';
import { ToolDispatcher } from './tool-dispatcher.js';

export interface InboundRequest {
  /** Raw request body */
  body: string;
  authorization?: string;
  apiKey?: string;
}

export interface GatewayResponse {
  status: number;
  /** Absent for notifications */
  body?: JsonRpcResponse;
}

export type SessionFactory = (credentials: Credentials) => SessionExecutor;

export interface McpGatewayOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  dispatcher?: ToolDispatcher;
  /** Builds the upstream session for one tools/call */
  sessionFactory?: SessionFactory;
  /** Clock for date defaults in upstream operations */
  now?: () => Date;
}

interface InitializeResult {
  protocolVersion: string;
  capabilities: { tools: Record<string, never> };
  serverInfo: { name: string; version: string };
}

/**
 * Constant-time comparison of two secrets of any length
 */
export function secretsMatch(provided: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(provided).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

/**
 * Pick the protocol version the client asked for when we support it
 */
export function negotiateProtocolVersion(requested: unknown): string {
  if (typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)) {
    return requested;
  }
  return LATEST_PROTOCOL_VERSION;
}

export class McpGateway {
  private logger: Logger;
  private metrics?: MetricsCollector;
  private dispatcher: ToolDispatcher;
  private sessionFactory: SessionFactory;
  private now: () => Date;

  constructor(private config: GatewayConfig, options: McpGatewayOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.metrics = options.metrics;
    this.dispatcher = options.dispatcher ?? new ToolDispatcher();
    this.now = options.now ?? (() => new Date());
    this.sessionFactory = options.sessionFactory ?? (credentials => new SessionClient({
      baseUrl: config.upstreamBaseUrl,
      credentials,
      logger: this.logger,
      metrics: this.metrics,
      timeoutMs: config.upstreamTimeoutMs,
    }));
  }

  /**
   * Check the gateway key. X-API-Key wins; otherwise the Authorization bearer value is used.
   * Without a configured key every caller is accepted.
   */
  isCallerAuthorized(request: Pick<InboundRequest, 'authorization' | 'apiKey'>): boolean {
    const expected = this.config.gatewayKey;
    if (!expected) {
      return true;
    }

    const provided = request.apiKey ?? extractBearerValue(request.authorization);
    if (!provided) {
      return false;
    }
    return secretsMatch(provided, expected);
  }

  async handle(request: InboundRequest): Promise<GatewayResponse> {
    if (!this.isCallerAuthorized(request)) {
      this.logger.warn('Rejected caller: gateway key mismatch', {
        hasApiKeyHeader: request.apiKey !== undefined,
        hasAuthorization: request.authorization !== undefined,
      });
      const error = new UnauthorizedError();
      return {
        status: HTTP_STATUS.UNAUTHORIZED,
        body: errorResponse(null, error.rpcCode, error.message),
      };
    }

    let message: unknown;
    try {
      message = parseJsonBody(request.body);
    } catch (error) {
      return this.errorResult(null, error);
    }

    let rpcRequest: JsonRpcRequest;
    try {
      rpcRequest = validateRequest(message);
    } catch (error) {
      return this.errorResult(extractId(message), error);
    }

    if (isNotification(rpcRequest)) {
      this.logger.debug('Received notification', { method: rpcRequest.method });
      return { status: HTTP_STATUS.ACCEPTED };
    }

    const id = rpcRequest.id ?? null;
    try {
      const result = await this.dispatch(rpcRequest, request.authorization);
      return { status: HTTP_STATUS.OK, body: successResponse(id, result) };
    } catch (error) {
      return this.errorResult(id, error, rpcRequest.method);
    }
  }

  private async dispatch(request: JsonRpcRequest, authorization: string | undefined): Promise<unknown> {
    this.logger.debug('Handling MCP request', { method: request.method, id: request.id });

    switch (request.method) {
      case 'initialize':
        return this.handleInitialize(request.params);
      case 'ping':
        return {};
      case 'tools/list':
        return { tools: this.dispatcher.listTools() };
      case 'tools/call':
        return this.handleToolCall(request.params ?? {}, authorization);
      default:
        throw new MethodNotFoundError(request.method);
    }
  }

  private handleInitialize(params: Record<string, unknown> | undefined): InitializeResult {
    const protocolVersion = negotiateProtocolVersion(params?.protocolVersion);
    this.logger.info('Client initialized', { protocolVersion });

    return {
      protocolVersion,
      capabilities: { tools: {} },
      serverInfo: { ...SERVER_INFO },
    };
  }

  /**
   * Validate first, then resolve credentials and build a fresh session.
   * Unknown tools and bad arguments never construct a session.
   */
  private async handleToolCall(params: Record<string, unknown>, authorization: string | undefined): Promise<unknown> {
    const invocation = this.dispatcher.prepare(params.name, params.arguments);

    const resolved = resolveCredentials(authorization, this.config.fallbackCredentials);
    this.logger.info('Resolved upstream credentials', describeCredentials(resolved));

    const api = new FinanceApi(this.sessionFactory(resolved.credentials), { now: this.now });

    const startTime = Date.now();
    try {
      const result = await this.dispatcher.run(api, invocation);
      const duration = (Date.now() - startTime) / 1000;
      this.metrics?.recordToolCall(invocation.tool, 'success', duration);
      this.logger.info('Tool call succeeded', { tool: invocation.tool, duration });
      return result;
    } catch (error) {
      this.metrics?.recordToolCall(invocation.tool, 'error', (Date.now() - startTime) / 1000);
      this.metrics?.recordToolCallError(invocation.tool, toError(error).name);
      throw error;
    }
  }

  /**
   * Map an error to its JSON-RPC code, message and HTTP status
   *
   * Caller-input errors keep their message. Upstream failures become tool
   * execution errors carrying the upstream message. Anything else is an
   * internal error: generic outside diagnostic mode, with message and stack inside it.
   */
  private errorResult(id: JsonRpcId, error: unknown, method?: string): GatewayResponse {
    const correlationId = generateCorrelationId();

    if (isUpstreamError(error)) {
      this.logger.error('Tool execution failed', toError(error), {
        correlationId,
        method,
        ...getErrorDetails(error),
      });
      return {
        status: HTTP_STATUS.OK,
        body: errorResponse(id, JSONRPC_ERROR.TOOL_EXECUTION_ERROR, `Tool execution error: ${error.message}`, {
          correlationId,
        }),
      };
    }

    if (isGatewayError(error) && error.rpcCode !== JSONRPC_ERROR.INTERNAL_ERROR) {
      this.logger.warn('Request rejected', { correlationId, method, code: error.code, message: error.message });
      const status = error instanceof ParseError || error instanceof InvalidRequestError
        ? HTTP_STATUS.BAD_REQUEST
        : HTTP_STATUS.OK;
      return { status, body: errorResponse(id, error.rpcCode, error.message) };
    }

    const err = toError(error);
    this.logger.error('Internal error', err, { correlationId, method });

    if (this.config.diagnosticErrors) {
      return {
        status: HTTP_STATUS.INTERNAL_SERVER_ERROR,
        body: errorResponse(id, JSONRPC_ERROR.INTERNAL_ERROR, `Internal error: ${err.message} (correlation ID: ${correlationId})`, {
          correlationId,
          stack: err.stack,
        }),
      };
    }

    return {
      status: HTTP_STATUS.INTERNAL_SERVER_ERROR,
      body: errorResponse(id, JSONRPC_ERROR.INTERNAL_ERROR, `Internal error (correlation ID: ${correlationId})`),
    };
  }
}
