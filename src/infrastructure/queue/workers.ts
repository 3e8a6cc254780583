/**
 * Queue Workers
 *
 * One worker per queue, concurrency 1: items inside a run are processed
 * sequentially and the runs themselves are single-flight. Triggers are
 * dispatched to MatchingRuns; single-job matching goes straight to the
 * engine.
 */

import { Job } from 'bullmq';
import { Redis } from 'ioredis';
import { getConfig } from '../../config/index.js';
import { getMatchingRuns, type MatchingRuns } from '../../core/runs/MatchingRuns.js';
import { getMatchingEngine, type MatchingEngine } from '../../domain/services/MatchingEngine.js';
import { createLogger } from '../logging/logger.js';
import { getQueueManager, QUEUE_FOR_JOB, QUEUE_NAMES, type JobData } from './TaskQueue.js';

const logger = createLogger('workers');

const STALE_SCHEDULER_PATTERN = '0 * * * *';

// =============================================================================
// WORKER PROCESSOR
// =============================================================================

export interface ProcessorDeps {
  runs: MatchingRuns;
  engine: MatchingEngine;
}

/**
 * Route one queued trigger to its run
 */
export async function processJob(data: JobData, deps: ProcessorDeps): Promise<unknown> {
  switch (data.type) {
    case 'match-all':
      return deps.runs.matchAll({
        category: data.category,
        topK: data.topK,
        maxDistanceKm: data.maxDistanceKm,
      });
    case 'match-job':
      return deps.engine.matchJob(data.jobId, { topK: data.topK, maxDistanceKm: data.maxDistanceKm });
    case 'embed-missing':
      return deps.runs.embedAllMissing({ kind: data.kind, category: data.category, limit: data.limit });
    case 'profile-backfill':
      return deps.runs.backfillProfiles({
        kind: data.kind,
        category: data.category,
        limit: data.limit,
        force: data.force,
      });
    case 'detect-stale':
      return deps.runs.detectStale();
  }
}

// =============================================================================
// REPEATABLE JOBS SETUP
// =============================================================================

/**
 * Hourly stale match detection
 */
async function setupStaleScheduler(): Promise<void> {
  const queueManager = getQueueManager();
  const queue = queueManager.getQueue(QUEUE_FOR_JOB['detect-stale']);

  const repeatableJobs = await queue.getRepeatableJobs();
  for (const job of repeatableJobs) {
    if (job.name === 'detect-stale') {
      await queue.removeRepeatableByKey(job.key);
    }
  }

  await queueManager.addJob(
    { type: 'detect-stale' },
    {
      repeat: { pattern: STALE_SCHEDULER_PATTERN },
      removeOnComplete: 50,
      removeOnFail: 100,
    }
  );

  logger.info({ pattern: STALE_SCHEDULER_PATTERN }, 'Stale detection scheduler registered');
}

// =============================================================================
// WORKER INITIALIZATION
// =============================================================================

let workersInitialized = false;

/**
 * Test Redis connection before attempting to create workers
 */
async function testRedisConnection(redisUrl: string): Promise<boolean> {
  const testClient = new Redis(redisUrl, {
    maxRetriesPerRequest: 1,
    retryStrategy: () => null,
    connectTimeout: 3000,
    lazyConnect: true,
  });

  try {
    await testClient.connect();
    return true;
  } catch (error) {
    logger.warn({ err: error }, 'Redis connection test failed');
    return false;
  } finally {
    testClient.disconnect();
  }
}

/**
 * Register the workers and the maintenance schedule. Returns false when
 * Redis is unreachable.
 */
export async function initializeWorkers(): Promise<boolean> {
  if (workersInitialized) {
    logger.warn('Workers already initialized');
    return true;
  }

  if (!(await testRedisConnection(getConfig().queue.redisUrl))) {
    logger.warn('Redis is not available');
    return false;
  }

  const deps: ProcessorDeps = { runs: getMatchingRuns(), engine: getMatchingEngine() };
  const queueManager = getQueueManager();
  const processor = (job: Job<JobData>) => processJob(job.data, deps);

  for (const queueName of Object.values(QUEUE_NAMES)) {
    queueManager.registerWorker(queueName, processor, 1);
  }
  await setupStaleScheduler();

  workersInitialized = true;
  logger.info({ queues: Object.values(QUEUE_NAMES) }, 'Workers initialized');
  return true;
}
