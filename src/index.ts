#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Why: Reads env vars, starts the HTTP gateway, handles errors gracefully.
 */

import 'dotenv/config';
import { loadConfig, type GatewayConfig } from './config.js';
import { toError } from './errors.js';
import { ConsoleLogger, createLogger } from './logger.js';
import { createHttpTransport } from './http-transport.js';

async function main(): Promise<void> {
  let config: GatewayConfig;
  try {
    config = loadConfig();
  } catch (error) {
    new ConsoleLogger().error('Invalid configuration', toError(error));
    process.exit(1);
  }

  const logger = createLogger(config.logFormat, config.logLevel);

  if (!config.gatewayKey) {
    logger.warn('MCP_API_KEY is not set: every caller is accepted');
  }
  if (!config.fallbackCredentials) {
    logger.info('No fallback credentials configured: callers must send their own');
  }

  const transport = createHttpTransport(config, logger);

  try {
    await transport.start();
  } catch (error) {
    logger.error('Fatal error', toError(error));
    process.exit(1);
  }

  // Graceful shutdown handlers
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await transport.stop();
      logger.info('Server stopped successfully');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', toError(error));
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  new ConsoleLogger().error('Fatal error', toError(error));
  process.exit(1);
});
