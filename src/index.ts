/**
 * Matching Engine - Main Entry Point
 *
 * Background worker process: validates configuration, connects the
 * database and serves the matching, embedding, profile and maintenance
 * queues until SIGINT/SIGTERM.
 */

import 'dotenv/config';
import { getConfig } from './config/index.js';
import { checkDatabaseHealth, connectDatabase, disconnectDatabase } from './infrastructure/database/postgres.js';
import logger from './infrastructure/logging/logger.js';
import { closeQueueManager } from './infrastructure/queue/TaskQueue.js';
import { initializeWorkers } from './infrastructure/queue/workers.js';
import { closeTaskRegistry } from './infrastructure/tasks/TaskRegistry.js';

const SHUTDOWN_TIMEOUT_MS = 30_000;

// =============================================================================
// STARTUP
// =============================================================================

async function start(): Promise<void> {
  const config = getConfig();
  logger.info({ env: config.env, category: config.matching.category }, 'Starting matching engine');

  await connectDatabase();
  if (!(await checkDatabaseHealth())) {
    throw new Error('Database health check failed');
  }

  const workersStarted = await initializeWorkers();
  if (!workersStarted) {
    throw new Error('Queue workers could not start: Redis unavailable');
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Graceful shutdown started');

    const forceExit = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    try {
      await closeQueueManager();
      await closeTaskRegistry();
      await disconnectDatabase();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

// =============================================================================
// RUN
// =============================================================================

start().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start matching engine');
  process.exit(1);
});
