/**
 * Tests for MetricsCollector
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsCollector } from './metrics.js';

describe('MetricsCollector', () => {
  let metrics: MetricsCollector;

  beforeEach(() => {
    metrics = new MetricsCollector({ enabled: true, prefix: 'test_' });
  });

  describe('HTTP Metrics', () => {
    it('should record HTTP requests', async () => {
      metrics.recordHttpRequest('POST', '/mcp', 200, 0.123);
      metrics.recordHttpRequest('POST', '/mcp', 400, 0.045);
      metrics.recordHttpRequest('GET', '/health', 200, 0.001);

      const output = await metrics.getMetrics();

      expect(output).toContain('test_http_requests_total{method="POST",path="/mcp",status="200"} 1');
      expect(output).toContain('test_http_requests_total{method="POST",path="/mcp",status="400"} 1');
      expect(output).toContain('test_http_requests_total{method="GET",path="/health",status="200"} 1');
    });

    it('should normalize paths for metrics', async () => {
      metrics.recordHttpRequest('POST', '/mcp?debug=1', 200, 0.1);

      const output = await metrics.getMetrics();

      expect(output).toContain('path="/mcp"');
      expect(output).not.toContain('debug=1');
    });
  });

  describe('Tool Call Metrics', () => {
    it('should record tool calls by status', async () => {
      metrics.recordToolCall('get_accounts', 'success', 0.2);
      metrics.recordToolCall('get_accounts', 'success', 0.3);
      metrics.recordToolCall('get_budgets', 'error', 0.1);

      const output = await metrics.getMetrics();

      expect(output).toContain('test_tool_calls_total{tool="get_accounts",status="success"} 2');
      expect(output).toContain('test_tool_calls_total{tool="get_budgets",status="error"} 1');
      expect(output).toContain('test_tool_call_duration_seconds_bucket');
    });

    it('should record tool call errors', async () => {
      metrics.recordToolCallError('get_budgets', 'UpstreamAuthExpiredError');

      const output = await metrics.getMetrics();

      expect(output).toContain(
        'test_tool_call_errors_total{tool="get_budgets",error_type="UpstreamAuthExpiredError"} 1'
      );
    });
  });

  describe('Upstream Metrics', () => {
    it('should group status codes (2xx, 4xx, 5xx)', async () => {
      metrics.recordApiCall('GetAccounts', 200, 0.1);
      metrics.recordApiCall('GetAccounts', 401, 0.1);
      metrics.recordApiCall('GetAccounts', 503, 0.1);

      const output = await metrics.getMetrics();

      expect(output).toContain('test_upstream_calls_total{operation="GetAccounts",status="2xx"} 1');
      expect(output).toContain('test_upstream_calls_total{operation="GetAccounts",status="4xx"} 1');
      expect(output).toContain('test_upstream_calls_total{operation="GetAccounts",status="5xx"} 1');
    });

    it('should record transport failures', async () => {
      metrics.recordApiCallError('login', 'UpstreamTransportError');

      const output = await metrics.getMetrics();

      expect(output).toContain('test_upstream_call_errors_total{operation="login",error_type="UpstreamTransportError"} 1');
    });

    it('should record login outcomes', async () => {
      metrics.recordLogin('success');
      metrics.recordLogin('mfa_required');

      const output = await metrics.getMetrics();

      expect(output).toContain('test_upstream_logins_total{outcome="success"} 1');
      expect(output).toContain('test_upstream_logins_total{outcome="mfa_required"} 1');
    });
  });

  describe('Disabled Metrics', () => {
    it('should not record metrics when disabled', async () => {
      const disabled = new MetricsCollector({ enabled: false });
      disabled.recordHttpRequest('POST', '/mcp', 200, 0.1);
      disabled.recordLogin('failed');

      expect(await disabled.getMetrics()).toBe('# Metrics disabled\n');
    });
  });

  describe('Custom Prefix', () => {
    it('should use default prefix when not specified', async () => {
      const defaultMetrics = new MetricsCollector({ enabled: true });
      defaultMetrics.recordLogin('success');

      expect(await defaultMetrics.getMetrics()).toContain('mcp_upstream_logins_total{outcome="success"} 1');
    });
  });
});
