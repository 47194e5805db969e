/**
 * User Registry Service Entry Point
 *
 * Builds the configuration and the in-memory registry, then serves the
 * user CRUD API until SIGTERM or SIGINT.
 */

import { parseConfig } from './config.js';
import { logger } from './utils/logger.js';
import { startServer, type RunningServer } from './api/index.js';
import { UserRegistry } from './services/users/index.js';

function setupGracefulShutdown(running: RunningServer): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await running.stop();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });
}

async function main() {
  const config = parseConfig();
  logger.level = config.logging.level;

  logger.info(
    { service: config.service.name, version: config.service.version, port: config.api.port },
    'Starting service'
  );

  const registry = new UserRegistry();
  const running = await startServer({ config, registry });
  setupGracefulShutdown(running);
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start service');
  process.exit(1);
});
