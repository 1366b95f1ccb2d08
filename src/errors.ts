/**
 * Structured error types for the gateway
 *
 * Provides type-safe error handling with machine-readable error codes,
 * the JSON-RPC code each error surfaces as, and structured details for logging.
 */

import crypto from 'node:crypto';
import { JSONRPC_ERROR } from './constants.js';

export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
    public rpcCode: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/**
 * Request body is not valid JSON
 */
export class ParseError extends GatewayError {
  constructor(message: string = 'Parse error: Invalid JSON') {
    super(message, 'PARSE_ERROR', JSONRPC_ERROR.PARSE_ERROR);
    this.name = 'ParseError';
  }
}

export class InvalidRequestError extends GatewayError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', JSONRPC_ERROR.INVALID_REQUEST);
    this.name = 'InvalidRequestError';
  }
}

export class MethodNotFoundError extends GatewayError {
  constructor(method: string) {
    super(`Method not found: ${method}`, 'METHOD_NOT_FOUND', JSONRPC_ERROR.METHOD_NOT_FOUND, { method });
    this.name = 'MethodNotFoundError';
  }
}

/**
 * Gateway key mismatch, or no upstream credentials available
 */
export class UnauthorizedError extends GatewayError {
  constructor(message: string = 'Unauthorized: Invalid or missing API key') {
    super(message, 'UNAUTHORIZED', JSONRPC_ERROR.UNAUTHORIZED);
    this.name = 'UnauthorizedError';
  }
}

export class UnknownToolError extends GatewayError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, 'UNKNOWN_TOOL', JSONRPC_ERROR.METHOD_NOT_FOUND, { toolName });
    this.name = 'UnknownToolError';
  }
}

export class InvalidArgumentsError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENTS', JSONRPC_ERROR.INVALID_PARAMS, details);
    this.name = 'InvalidArgumentsError';
  }
}

export class InvalidDateRangeError extends GatewayError {
  constructor(message: string = 'You must specify both start_date and end_date, not just one of them.') {
    super(message, 'INVALID_DATE_RANGE', JSONRPC_ERROR.INVALID_PARAMS);
    this.name = 'InvalidDateRangeError';
  }
}

/**
 * Upstream asked for a second factor and none was supplied
 */
export class MfaRequiredError extends GatewayError {
  constructor() {
    super(
      'Multi-factor authentication required: supply mfaCode or mfaSecretKey',
      'MFA_REQUIRED',
      JSONRPC_ERROR.TOOL_EXECUTION_ERROR
    );
    this.name = 'MfaRequiredError';
  }
}

export class AuthenticationFailedError extends GatewayError {
  constructor(message: string, statusCode?: number, body?: unknown) {
    super(message, 'AUTHENTICATION_FAILED', JSONRPC_ERROR.TOOL_EXECUTION_ERROR, { statusCode, body });
    this.name = 'AuthenticationFailedError';
  }
}

/**
 * Upstream rejected the token again after one re-authentication
 */
export class UpstreamAuthExpiredError extends GatewayError {
  constructor(operationName: string) {
    super(
      `Upstream session expired again after re-authentication (operation: ${operationName})`,
      'UPSTREAM_AUTH_EXPIRED',
      JSONRPC_ERROR.TOOL_EXECUTION_ERROR,
      { operationName }
    );
    this.name = 'UpstreamAuthExpiredError';
  }
}

/**
 * Application-level error reported inside an otherwise successful response
 */
export class UpstreamOperationError extends GatewayError {
  constructor(message: string, operationName: string, details?: Record<string, unknown>) {
    super(message, 'UPSTREAM_OPERATION_ERROR', JSONRPC_ERROR.TOOL_EXECUTION_ERROR, { operationName, ...details });
    this.name = 'UpstreamOperationError';
  }
}

export class UpstreamTransportError extends GatewayError {
  constructor(message: string, statusCode?: number, body?: unknown) {
    super(message, 'UPSTREAM_TRANSPORT_ERROR', JSONRPC_ERROR.TOOL_EXECUTION_ERROR, { statusCode, body });
    this.name = 'UpstreamTransportError';
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', JSONRPC_ERROR.INTERNAL_ERROR, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Errors raised while talking to the upstream API.
 * Surfaced to callers as tool execution errors.
 */
export function isUpstreamError(error: unknown): error is GatewayError {
  return error instanceof MfaRequiredError
    || error instanceof AuthenticationFailedError
    || error instanceof UpstreamAuthExpiredError
    || error instanceof UpstreamOperationError
    || error instanceof UpstreamTransportError;
}

/**
 * Helper function to check if an error is a GatewayError
 */
export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Generate a correlation ID linking a client-facing error to server logs
 */
export function generateCorrelationId(): string {
  return crypto.randomUUID();
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isGatewayError(error)) {
    return {
      name: error.name,
      code: error.code,
      rpcCode: error.rpcCode,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
