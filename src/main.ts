/**
 * Entry point: starts the connection layer with the settings from server.config.ts.
 *
 * @module main
 */
import { HttpServer } from './core/server';
import { config } from './config/server.config';
import logger from './utils/logger';

async function startApplication(): Promise<void> {
  logger.info('Starting request-head parser server', {
    environment: process.env.NODE_ENV || 'development',
    nodeVersion: process.version,
    maxHeaders: config.maxHeaders,
    maxHeadBytes: config.maxHeadBytes,
    parser: config.parser,
  });

  const server = new HttpServer();
  await server.start();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    server
      .stop()
      .then(() => logger.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

startApplication().catch((err: unknown) => {
  logger.error('Failed to start server', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
