#!/usr/bin/env node

/**
 * Semantic Web Environment MCP Server
 *
 * Main entry point - reads configuration and starts the MCP server
 */

import { WebEnvironmentServer } from './server/mcp-server.js';
import { initServerConfig, shutdownEnvironment } from './server/server-config.js';
import { getLogger } from './shared/services/logging.service.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const logger = getLogger();

  try {
    initServerConfig(process.argv.slice(2));

    const server = new WebEnvironmentServer({
      name: 'semantic-web-env',
      version: '0.1.0',
      capabilities: {
        tools: {},
        logging: {},
      },
    });
    await server.start();

    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...');
      try {
        await shutdownEnvironment();
        await server.stop();
      } catch (error) {
        logger.error('Shutdown failed', error instanceof Error ? error : undefined);
      }
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  } catch (error) {
    logger.critical('Failed to start server', error instanceof Error ? error : undefined);
    process.exit(1);
  }
}

void main();
