#!/usr/bin/env node

import { SearxngScraperServer } from './server';
import { logger } from './utils/logger';

export function installShutdownHandlers(server: SearxngScraperServer): void {
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, closing gracefully...');
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

if (process.env.NODE_ENV !== 'test' && require.main === module) {
  const server = new SearxngScraperServer();
  installShutdownHandlers(server);

  server.start().catch(error => {
    logger.error({ error }, 'Fatal error during server startup');
    process.exit(1);
  });
}

export { SearxngScraperServer } from './server';
