/**
 * Application constants
 *
 * Why: Centralized constants improve readability and maintainability.
 * Magic numbers scattered through code are harder to understand and change.
 */

/**
 * Time conversion constants
 */
export const TIME = {
  MS_PER_SECOND: 1000,
  MS_PER_MINUTE: 60000,
  SECONDS_PER_DAY: 86400,
} as const;

/**
 * HTTP status codes
 *
 * Why: Named constants more readable than numeric literals.
 */
export const HTTP_STATUS = {
  OK: 200,
  ACCEPTED: 202,
  NO_CONTENT: 204,
  MULTIPLE_CHOICES: 300,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/**
 * JSON-RPC error codes returned to MCP clients
 *
 * Standard codes from the JSON-RPC 2.0 standard plus the server-defined range
 * (-32000..-32099) used for tool execution and caller authentication.
 */
export const JSONRPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  TOOL_EXECUTION_ERROR: -32000,
  UNAUTHORIZED: -32001,
} as const;

/**
 * Upstream API contract
 *
 * The login endpoint is REST, every data operation goes through GraphQL.
 * TOKEN_SCHEME is dictated by the upstream API and is not the generic Bearer scheme.
 */
export const UPSTREAM = {
  DEFAULT_BASE_URL: 'https://api.monarchmoney.com',
  LOGIN_PATH: '/auth/login/',
  GRAPHQL_PATH: '/graphql',
  TOKEN_SCHEME: 'Token',
  CLIENT_PLATFORM: 'web',
  USER_AGENT: 'MonarchMoneyAPI',
  MAX_REAUTH_ATTEMPTS: 1,
} as const;

export const SERVER_INFO = {
  name: 'finance-mcp-gateway',
  version: '0.1.0',
} as const;

export const LIVENESS_MESSAGE = 'Finance MCP Gateway is live.';
