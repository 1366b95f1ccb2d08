/**
 * Prometheus Metrics Collector
 *
 * Why: Observability for production deployments
 *
 * Tracks:
 * - HTTP requests (status, method, path)
 * - MCP tool calls (tool, duration, errors)
 * - Upstream API calls (operation, status, duration)
 * - Upstream logins (outcome)
 */

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsCollectorConfig {
  enabled: boolean;
  prefix?: string;
}

export type LoginOutcome = 'success' | 'mfa_required' | 'failed';

export class MetricsCollector {
  private registry: Registry;
  private enabled: boolean;

  // HTTP metrics
  private httpRequestsTotal: Counter;
  private httpRequestDuration: Histogram;

  // MCP tool metrics
  private toolCallsTotal: Counter;
  private toolCallDuration: Histogram;
  private toolCallErrors: Counter;

  // Upstream metrics
  private apiCallsTotal: Counter;
  private apiCallDuration: Histogram;
  private apiCallErrors: Counter;
  private upstreamLoginsTotal: Counter;

  constructor(config: MetricsCollectorConfig) {
    this.enabled = config.enabled;
    this.registry = new Registry();

    const prefix = config.prefix || 'mcp_';

    this.httpRequestsTotal = new Counter({
      name: `${prefix}http_requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'],
      registers: [this.registry],
    });

    this.httpRequestDuration = new Histogram({
      name: `${prefix}http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'path', 'status'],
      buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
      registers: [this.registry],
    });

    this.toolCallsTotal = new Counter({
      name: `${prefix}tool_calls_total`,
      help: 'Total number of MCP tool calls',
      labelNames: ['tool', 'status'],
      registers: [this.registry],
    });

    this.toolCallDuration = new Histogram({
      name: `${prefix}tool_call_duration_seconds`,
      help: 'MCP tool call duration in seconds',
      labelNames: ['tool', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
      registers: [this.registry],
    });

    this.toolCallErrors = new Counter({
      name: `${prefix}tool_call_errors_total`,
      help: 'Total number of MCP tool call errors',
      labelNames: ['tool', 'error_type'],
      registers: [this.registry],
    });

    this.apiCallsTotal = new Counter({
      name: `${prefix}upstream_calls_total`,
      help: 'Total number of calls to the upstream API',
      labelNames: ['operation', 'status'],
      registers: [this.registry],
    });

    this.apiCallDuration = new Histogram({
      name: `${prefix}upstream_call_duration_seconds`,
      help: 'Upstream call duration in seconds',
      labelNames: ['operation', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
      registers: [this.registry],
    });

    this.apiCallErrors = new Counter({
      name: `${prefix}upstream_call_errors_total`,
      help: 'Total number of upstream transport failures',
      labelNames: ['operation', 'error_type'],
      registers: [this.registry],
    });

    this.upstreamLoginsTotal = new Counter({
      name: `${prefix}upstream_logins_total`,
      help: 'Total number of upstream login attempts',
      labelNames: ['outcome'],
      registers: [this.registry],
    });
  }

  recordHttpRequest(method: string, path: string, status: number, durationSeconds: number): void {
    if (!this.enabled) return;

    const labels = {
      method,
      path: this.normalizePath(path),
      status: status.toString(),
    };
    this.httpRequestsTotal.inc(labels);
    this.httpRequestDuration.observe(labels, durationSeconds);
  }

  recordToolCall(tool: string, status: 'success' | 'error', durationSeconds: number): void {
    if (!this.enabled) return;

    this.toolCallsTotal.inc({ tool, status });
    this.toolCallDuration.observe({ tool, status }, durationSeconds);
  }

  recordToolCallError(tool: string, errorType: string): void {
    if (!this.enabled) return;
    this.toolCallErrors.inc({ tool, error_type: errorType });
  }

  /**
   * Record upstream call
   */
  recordApiCall(operation: string, status: number, durationSeconds: number): void {
    if (!this.enabled) return;

    const statusLabel = this.getStatusLabel(status);

    this.apiCallsTotal.inc({ operation, status: statusLabel });
    this.apiCallDuration.observe({ operation, status: statusLabel }, durationSeconds);
  }

  recordApiCallError(operation: string, errorType: string): void {
    if (!this.enabled) return;
    this.apiCallErrors.inc({ operation, error_type: errorType });
  }

  recordLogin(outcome: LoginOutcome): void {
    if (!this.enabled) return;
    this.upstreamLoginsTotal.inc({ outcome });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    if (!this.enabled) {
      return '# Metrics disabled\n';
    }
    return this.registry.metrics();
  }

  /**
   * Get registry (for testing)
   */
  getRegistry(): Registry {
    return this.registry;
  }

  /**
   * Drop query strings so labels stay low-cardinality
   */
  private normalizePath(path: string): string {
    return path.split('?')[0];
  }

  /**
   * Get status label (2xx, 4xx, 5xx)
   *
   * Why: Group similar statuses to reduce cardinality
   */
  private getStatusLabel(status: number): string {
    if (status >= 200 && status < 300) return '2xx';
    if (status >= 300 && status < 400) return '3xx';
    if (status >= 400 && status < 500) return '4xx';
    if (status >= 500 && status < 600) return '5xx';
    return 'unknown';
  }
}
