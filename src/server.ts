/**
 * HTTP server entrypoint for the coverage planner service.
 *
 * This file:
 * - Loads configuration
 * - Builds runtime dependencies (creates the database schema)
 * - Creates the Express app
 * - Starts listening on the configured port
 */
import { createServer } from 'http';
import { createApp } from './app';
import { buildRuntimeDeps } from './bootstrap/buildDeps';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';

logger.info('Application starting up...');

const deps = buildRuntimeDeps(config);
const app = createApp(deps);
const server = createServer(app);

server.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      env: config.env,
      databasePath: config.databasePath,
    },
    'Coverage planner service started',
  );
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
