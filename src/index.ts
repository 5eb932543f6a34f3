#!/usr/bin/env node

/**
 * ETP assistant - MCP server entry point
 */

import { EtpAssistantServer } from './server.js';
import { logger } from './utils/logger.js';

// Track server instance for cleanup on fatal errors
let serverInstance: EtpAssistantServer | null = null;

async function shutdown(server: EtpAssistantServer): Promise<void> {
  logger.info('Shutting down ETP assistant');
  await server.stop();
  process.exit(0);
}

async function main(): Promise<void> {
  const server = new EtpAssistantServer();
  serverInstance = server;

  process.on('SIGINT', () => {
    shutdown(server).catch((error: unknown) => {
      logger.error('Error during shutdown', error);
      process.exit(1);
    });
  });

  process.on('SIGTERM', () => {
    shutdown(server).catch((error: unknown) => {
      logger.error('Error during shutdown', error);
      process.exit(1);
    });
  });

  await server.start();
}

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
