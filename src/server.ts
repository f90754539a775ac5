/**
 * =============================================================================
 * RIDE DISPATCH API - SERVER ENTRY POINT
 * =============================================================================
 *
 * Query API over riders, drivers, rides and ride events:
 * - /api/v1/users        user administration (admin)
 * - /api/v1/rides        ride filters, GPS ranking, radius search (admin)
 * - /api/v1/ride-events  event feed and statistics (read: any, write: admin)
 * - /api/v1/auth         credential diagnostics
 * =============================================================================
 */

import { createServer } from 'http';
import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { db } from './shared/database/db';
import { createApp } from './app';

const app = createApp();
const server = createServer(app);

server.listen(config.port, config.host, () => {
  server.timeout = 30000;           // 30s max request time
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;    // > keepAliveTimeout

  const stats = db.getStats();
  logger.info(`Server started on http://${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    users: stats.users,
    rides: stats.rides,
    rideEvents: stats.rideEvents,
    persisted: stats.persisted
  });
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  db.flush();
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  db.flush();
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('HTTP server closed');
    db.flush();
    logger.info('Graceful shutdown complete');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    db.flush();
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
