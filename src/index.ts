#!/usr/bin/env node

/**
 * Strategos - MCP Server Entry Point
 *
 * Turns a project description into a dependency graph of phases and tasks,
 * then into a resourced, test-first mission plan.
 */

import { StrategosServer } from './server.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const server = new StrategosServer();
  serverInstance = server;

  const shutdown = (signal: string): void => {
    logger.info('Shutting down Strategos', { signal });
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

// Track server instance for cleanup on fatal errors
let serverInstance: StrategosServer | null = null;

main().catch(async (error: unknown) => {
  logger.error('Fatal error', error);

  if (serverInstance) {
    try {
      await serverInstance.stop();
    } catch (cleanupError) {
      logger.error('Error during cleanup', cleanupError);
    }
  }

  process.exit(1);
});
