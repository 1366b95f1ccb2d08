/**
 * Tests for JSON-RPC envelope handling
 */

import { describe, it, expect } from 'vitest';
import {
  errorResponse,
  extractId,
  isNotification,
  parseJsonBody,
  successResponse,
  validateRequest,
} from './jsonrpc.js';
import { InvalidRequestError, ParseError } from './errors.js';

describe('parseJsonBody', () => {
  it('should parse valid JSON', () => {
    expect(parseJsonBody('{"a":1}')).toEqual({ a: 1 });
  });

  it('should reject empty and malformed bodies', () => {
    expect(() => parseJsonBody('')).toThrow(ParseError);
    expect(() => parseJsonBody('   ')).toThrow(ParseError);
    expect(() => parseJsonBody('{"jsonrpc":')).toThrow('Parse error: Invalid JSON');
  });
});

describe('extractId', () => {
  it('should return usable ids', () => {
    expect(extractId({ id: 7 })).toBe(7);
    expect(extractId({ id: 'abc' })).toBe('abc');
    expect(extractId({ id: null })).toBeNull();
  });

  it('should not echo numeric ids that lost precision', () => {
    expect(extractId(parseJsonBody('{"id":12345678901234567890}'))).toBeNull();
    expect(extractId(parseJsonBody('{"id":1e400}'))).toBeNull();
    expect(extractId(parseJsonBody('{"id":9007199254740991}'))).toBe(9007199254740991);
  });

  it('should fall back to null', () => {
    expect(extractId({ id: { nested: true } })).toBeNull();
    expect(extractId([1, 2])).toBeNull();
    expect(extractId('text')).toBeNull();
  });
});

describe('validateRequest', () => {
  it('should accept a request and keep its id and params', () => {
    expect(validateRequest({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'get_accounts' } }))
      .toEqual({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'get_accounts' } });
  });

  it('should keep a null id', () => {
    const request = validateRequest({ jsonrpc: '2.0', id: null, method: 'ping' });

    expect(request.id).toBeNull();
    expect(isNotification(request)).toBe(false);
  });

  it('should reject numeric ids beyond the safe integer range', () => {
    expect(() => validateRequest(parseJsonBody('{"jsonrpc":"2.0","id":12345678901234567890,"method":"ping"}')))
      .toThrow('Invalid Request: numeric id must be a safe integer; send larger ids as strings');
  });

  it('should keep large ids sent as strings', () => {
    const request = validateRequest(parseJsonBody('{"jsonrpc":"2.0","id":"12345678901234567890","method":"ping"}'));

    expect(request.id).toBe('12345678901234567890');
  });

  it('should treat a missing id as a notification', () => {
    const request = validateRequest({ jsonrpc: '2.0', method: 'notifications/initialized' });

    expect(isNotification(request)).toBe(true);
    expect(request).not.toHaveProperty('id');
  });

  it.each([
    [[{ jsonrpc: '2.0', id: 1, method: 'ping' }], 'Invalid Request: batch requests are not supported'],
    ['ping', 'Invalid Request: expected a JSON object'],
    [{ jsonrpc: '1.0', id: 1, method: 'ping' }, 'Invalid Request: jsonrpc must be "2.0"'],
    [{ jsonrpc: '2.0', id: 1 }, 'Invalid Request: method must be a non-empty string'],
    [{ jsonrpc: '2.0', id: 1, method: '' }, 'Invalid Request: method must be a non-empty string'],
    [{ jsonrpc: '2.0', id: true, method: 'ping' }, 'Invalid Request: id must be a string, number or null'],
    [{ jsonrpc: '2.0', id: 1, method: 'ping', params: [1] }, 'Invalid Request: params must be an object'],
    [{ jsonrpc: '2.0', id: 2 ** 53, method: 'ping' }, 'Invalid Request: numeric id must be a safe integer; send larger ids as strings'],
  ])('should reject %j', (message, expected) => {
    expect(() => validateRequest(message)).toThrow(InvalidRequestError);
    expect(() => validateRequest(message)).toThrow(expected);
  });
});

describe('responses', () => {
  it('should build success responses', () => {
    expect(successResponse('req-1', { tools: [] })).toEqual({ jsonrpc: '2.0', id: 'req-1', result: { tools: [] } });
  });

  it('should omit data when there is none', () => {
    expect(errorResponse(3, -32601, 'Method not found: nope')).toEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32601, message: 'Method not found: nope' },
    });
    expect(errorResponse(null, -32000, 'Tool execution error: x', { correlationId: 'c-1' }).error)
      .toEqual({ code: -32000, message: 'Tool execution error: x', data: { correlationId: 'c-1' } });
  });
});
