/**
 * JSON-RPC 2.0 envelope parsing and response shaping
 *
 * The inbound id is echoed back exactly as received, including null.
 * When the envelope cannot be read at all, responses carry id null.
 *
 * Numeric ids go through JSON.parse, so only values that survive it are
 * accepted: integers outside the safe range and overflowing literals are
 * rejected instead of being echoed with a different value. Clients with
 * such ids send them as strings.
 */

import { InvalidRequestError, ParseError } from './errors.js';
import { isRecord } from './validation-utils.js';

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  /** Absent for notifications */
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

function isExactNumber(value: number): boolean {
  return Number.isFinite(value) && (!Number.isInteger(value) || Number.isSafeInteger(value));
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || (typeof value === 'number' && isExactNumber(value));
}

/**
 * @throws ParseError when the body is empty or not valid JSON
 */
export function parseJsonBody(raw: string): unknown {
  if (raw.trim() === '') {
    throw new ParseError();
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ParseError();
  }
}

/**
 * Best-effort id for error responses: the message's id when it is usable, else null
 */
export function extractId(message: unknown): JsonRpcId {
  if (isRecord(message) && isJsonRpcId(message.id)) {
    return message.id;
  }
  return null;
}

/**
 * Check the envelope shape
 *
 * @throws InvalidRequestError for batches, a wrong protocol marker, a missing method,
 * an unusable id or non-object params
 */
export function validateRequest(message: unknown): JsonRpcRequest {
  if (Array.isArray(message)) {
    throw new InvalidRequestError('Invalid Request: batch requests are not supported');
  }
  if (!isRecord(message)) {
    throw new InvalidRequestError('Invalid Request: expected a JSON object');
  }
  if (message.jsonrpc !== '2.0') {
    throw new InvalidRequestError('Invalid Request: jsonrpc must be "2.0"');
  }
  if (typeof message.method !== 'string' || message.method === '') {
    throw new InvalidRequestError('Invalid Request: method must be a non-empty string');
  }
  if ('id' in message && typeof message.id === 'number' && !isExactNumber(message.id)) {
    throw new InvalidRequestError('Invalid Request: numeric id must be a safe integer; send larger ids as strings');
  }
  if ('id' in message && !isJsonRpcId(message.id)) {
    throw new InvalidRequestError('Invalid Request: id must be a string, number or null');
  }
  if (message.params !== undefined && !isRecord(message.params)) {
    throw new InvalidRequestError('Invalid Request: params must be an object');
  }

  const request: JsonRpcRequest = { jsonrpc: '2.0', method: message.method };
  if ('id' in message && isJsonRpcId(message.id)) {
    request.id = message.id;
  }
  if (isRecord(message.params)) {
    request.params = message.params;
  }
  return request;
}

/**
 * A request without an id expects no response
 */
export function isNotification(request: JsonRpcRequest): boolean {
  return request.id === undefined;
}

export function successResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: '2.0', id, result };
}

export function errorResponse(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcErrorResponse {
  const error: JsonRpcErrorObject = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return { jsonrpc: '2.0', id, error };
}
