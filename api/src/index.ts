/**
 * Instrumentation API Server
 *
 * Loads config, opens the database pool and serves the Hono app on Node.js.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from '@/app';
import { createDatabase } from '@/db/client';
import { loadConfig } from '@/utils/config';
import { logger, setLogLevel } from '@/utils/logger';

const config = loadConfig();
setLogLevel(config.logLevel);
const database = createDatabase(config);
const app = createApp({ sql: database.sql, db: database.db, config });

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info('Instrumentation API listening', {
  port: config.port,
  routePrefix: config.routePrefix,
  nodeEnv: config.nodeEnv,
});

// Graceful shutdown with request drain
function gracefulShutdown(signal: string) {
  logger.info(`${signal} received: shutting down gracefully...`);
  server.close(() => {
    logger.info('HTTP server closed, draining connections');
    database
      .close()
      .then(() => {
        logger.info('Database connections closed');
        process.exit(0);
      })
      .catch((err) => {
        logger.error('Error closing database', { error: String(err) });
        process.exit(1);
      });
  });
  // Force exit after 10 seconds if drain takes too long
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
