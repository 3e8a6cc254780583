/**
 * Task Queue - BullMQ-based job processing
 *
 * Carries triggers for the matching runs:
 * - Category-wide and single-job matching
 * - Embedding generation
 * - Profile backfill
 * - Maintenance (stale match detection)
 */

import { Queue, Worker, Job } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import type { OwnerKind } from '../../domain/entities/Profile.js';
import { getConfig } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('task-queue');

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface QueueConfig {
  redisUrl: string;
  prefix: string;
}

// =============================================================================
// QUEUE NAMES
// =============================================================================

export const QUEUE_NAMES = {
  MATCHING: 'matching',
  EMBEDDINGS: 'embeddings',
  PROFILES: 'profiles',
  MAINTENANCE: 'maintenance',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// =============================================================================
// JOB DATA TYPES
// =============================================================================

export interface MatchAllJobData {
  type: 'match-all';
  category?: string;
  topK?: number;
  maxDistanceKm?: number;
}

export interface MatchJobJobData {
  type: 'match-job';
  jobId: string;
  topK?: number;
  maxDistanceKm?: number;
}

export interface EmbedMissingJobData {
  type: 'embed-missing';
  kind?: OwnerKind;
  category?: string;
  limit?: number;
}

export interface ProfileBackfillJobData {
  type: 'profile-backfill';
  kind?: OwnerKind;
  category?: string;
  limit?: number;
  force?: boolean;
}

export interface DetectStaleJobData {
  type: 'detect-stale';
}

export type JobData =
  | MatchAllJobData
  | MatchJobJobData
  | EmbedMissingJobData
  | ProfileBackfillJobData
  | DetectStaleJobData;

export const QUEUE_FOR_JOB: Record<JobData['type'], QueueName> = {
  'match-all': QUEUE_NAMES.MATCHING,
  'match-job': QUEUE_NAMES.MATCHING,
  'embed-missing': QUEUE_NAMES.EMBEDDINGS,
  'profile-backfill': QUEUE_NAMES.PROFILES,
  'detect-stale': QUEUE_NAMES.MAINTENANCE,
};

// =============================================================================
// JOB OPTIONS
// =============================================================================

export interface JobOptions {
  priority?: number;
  delay?: number;
  attempts?: number;
  removeOnComplete?: boolean | number;
  removeOnFail?: boolean | number;
  /** Cron schedule for a repeatable trigger */
  repeat?: { pattern: string };
}

// Runs are re-runnable batches; the next trigger picks up what a failed one left
const DEFAULT_JOB_OPTIONS: JobOptions = {
  attempts: 1,
  removeOnComplete: 100,
  removeOnFail: 500,
};

export function toConnectionOptions(redisUrl: string): ConnectionOptions {
  const url = new URL(redisUrl);
  return {
    host: url.hostname,
    port: parseInt(url.port || '6379', 10),
    password: url.password || undefined,
  };
}

// =============================================================================
// QUEUE MANAGER
// =============================================================================

export class QueueManager {
  private config: QueueConfig;
  private connection: ConnectionOptions;
  private queues: Map<string, Queue<JobData>> = new Map();
  private workers: Map<string, Worker<JobData>> = new Map();

  constructor(config: Partial<QueueConfig> = {}) {
    const appConfig = getConfig();
    this.config = {
      redisUrl: config.redisUrl ?? appConfig.queue.redisUrl,
      prefix: config.prefix ?? appConfig.queue.prefix,
    };
    this.connection = toConnectionOptions(this.config.redisUrl);
  }

  /**
   * Get or create a queue
   */
  getQueue(name: QueueName): Queue<JobData> {
    const existing = this.queues.get(name);
    if (existing) {
      return existing;
    }
    const queue = new Queue<JobData>(name, {
      connection: this.connection,
      prefix: this.config.prefix,
      defaultJobOptions: DEFAULT_JOB_OPTIONS,
    });
    this.queues.set(name, queue);
    return queue;
  }

  /**
   * Add a trigger to the queue that serves its type
   */
  async addJob(data: JobData, options: JobOptions = {}): Promise<Job<JobData>> {
    const queue = this.getQueue(QUEUE_FOR_JOB[data.type]);
    return queue.add(data.type, data, {
      ...DEFAULT_JOB_OPTIONS,
      ...options,
    });
  }

  /**
   * Register a worker for a queue
   */
  registerWorker(
    queueName: QueueName,
    processor: (job: Job<JobData>) => Promise<unknown>,
    concurrency = 1
  ): Worker<JobData> {
    if (this.workers.has(queueName)) {
      throw new Error(`Worker already registered for queue: ${queueName}`);
    }

    const worker = new Worker<JobData>(queueName, processor, {
      connection: this.connection,
      prefix: this.config.prefix,
      concurrency,
    });

    worker.on('completed', (job) => {
      logger.info({ queue: queueName, jobId: job.id, type: job.data.type }, 'Job completed');
    });

    worker.on('failed', (job, err) => {
      logger.error({ queue: queueName, jobId: job?.id, err }, 'Job failed');
    });

    worker.on('error', (err) => {
      logger.error({ queue: queueName, err }, 'Worker error');
    });

    this.workers.set(queueName, worker);
    return worker;
  }

  /**
   * Close all connections
   */
  async close(): Promise<void> {
    const closePromises: Promise<void>[] = [];

    for (const worker of this.workers.values()) {
      closePromises.push(worker.close());
    }

    for (const queue of this.queues.values()) {
      closePromises.push(queue.close());
    }

    await Promise.all(closePromises);

    this.workers.clear();
    this.queues.clear();
  }
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let queueManagerInstance: QueueManager | null = null;

export function getQueueManager(config?: Partial<QueueConfig>): QueueManager {
  if (!queueManagerInstance) {
    queueManagerInstance = new QueueManager(config);
  }
  return queueManagerInstance;
}

export async function closeQueueManager(): Promise<void> {
  if (queueManagerInstance) {
    const manager = queueManagerInstance;
    queueManagerInstance = null;
    await manager.close();
  }
}
