/**
 * Library exports for programmatic usage
 */
export { loadConfig } from './config.js';
export type { GatewayConfig } from './config.js';
export { HttpTransport, createHttpTransport } from './http-transport.js';
export { McpGateway } from './mcp-gateway.js';
export type { InboundRequest, GatewayResponse, McpGatewayOptions, SessionFactory } from './mcp-gateway.js';
export { SessionClient } from './session-client.js';
export { FinanceApi } from './finance-api.js';
export { ToolRegistry, TOOL_CATALOG } from './tool-registry.js';
export type { ToolName } from './tool-registry.js';
export { ToolDispatcher } from './tool-dispatcher.js';
export type { ToolInvocation } from './tool-dispatcher.js';
export { encodeCallerCredentials } from './credentials.js';
export type { Credentials } from './credentials.js';
export { ConsoleLogger, JsonLogger, createLogger, LogLevel } from './logger.js';
export type { Logger } from './logger.js';
export * from './errors.js';
