/**
 * Matching Runs - single-flight batch operations
 *
 * At most one run per name is active at a time, across every process that
 * shares the task registry. A duplicate trigger returns immediately with
 * `already_running`; progress and the final result are kept in the registry.
 */

import { createLogger } from '../../infrastructure/logging/logger.js';
import { getTaskRegistry, type TaskRegistry, type TaskState } from '../../infrastructure/tasks/TaskRegistry.js';
import type { OwnerKind } from '../../domain/entities/Profile.js';
import { describeError } from '../../domain/errors.js';
import { getEmbeddingIndexer, type EmbeddingBatchResult, type EmbeddingIndexer } from '../../domain/services/EmbeddingIndexer.js';
import { getMatchStore, type MatchStore } from '../../domain/services/MatchStore.js';
import { getMatchingEngine, type MatchAllResult, type MatchingEngine } from '../../domain/services/MatchingEngine.js';
import {
  getProfileExtractor,
  type BackfillResult,
  type ProfileExtractor,
} from '../../domain/services/ProfileExtractor.js';

const logger = createLogger('matching-runs');

// =============================================================================
// TYPES
// =============================================================================

export const RUN_NAMES = ['matching', 'embeddings', 'profiles', 'stale'] as const;
export type RunName = (typeof RUN_NAMES)[number];

export type RunOutcome<T> = { started: true; result: T } | { started: false; reason: 'already_running' };

export interface MatchingRunOptions {
  category?: string;
  topK?: number;
  maxDistanceKm?: number;
}

export interface EmbeddingRunOptions {
  kind?: OwnerKind;
  category?: string;
  limit?: number;
}

export interface ProfileRunOptions {
  /** Both kinds when omitted */
  kind?: OwnerKind;
  category?: string;
  limit?: number;
  force?: boolean;
}

export interface ProfileRunResult {
  candidates: BackfillResult | null;
  jobs: BackfillResult | null;
}

export interface StaleRunResult {
  flagged: number;
}

export interface MatchingRunsDeps {
  registry?: TaskRegistry;
  engine?: MatchingEngine;
  indexer?: EmbeddingIndexer;
  extractor?: ProfileExtractor;
  store?: MatchStore;
}

type ReportProgress = (progress: { step?: string; detail?: string; processed?: number; total?: number }) => void;

// =============================================================================
// MATCHING RUNS
// =============================================================================

export class MatchingRuns {
  private registry: TaskRegistry;
  private engine: MatchingEngine;
  private indexer: EmbeddingIndexer;
  private extractor: ProfileExtractor;
  private store: MatchStore;

  constructor(deps: MatchingRunsDeps = {}) {
    this.registry = deps.registry ?? getTaskRegistry();
    this.engine = deps.engine ?? getMatchingEngine();
    this.indexer = deps.indexer ?? getEmbeddingIndexer();
    this.extractor = deps.extractor ?? getProfileExtractor();
    this.store = deps.store ?? getMatchStore();
  }

  async matchAll(options: MatchingRunOptions = {}): Promise<RunOutcome<MatchAllResult>> {
    return this.run('matching', (report) =>
      this.engine.matchAll({
        ...options,
        onProgress: (step, detail) => report({ step, detail }),
      })
    );
  }

  async embedAllMissing(options: EmbeddingRunOptions = {}): Promise<RunOutcome<EmbeddingBatchResult>> {
    return this.run('embeddings', (report) =>
      this.indexer.embedAllMissing({
        ...options,
        onProgress: (processed, total) => report({ step: 'embedding', processed, total }),
      })
    );
  }

  async backfillProfiles(options: ProfileRunOptions = {}): Promise<RunOutcome<ProfileRunResult>> {
    return this.run('profiles', async (report) => {
      const { kind, ...filter } = options;
      const result: ProfileRunResult = { candidates: null, jobs: null };
      if (kind !== 'job') {
        result.candidates = await this.extractor.backfill('candidate', {
          ...filter,
          onProgress: (processed, total) => report({ step: 'candidates', processed, total }),
        });
      }
      if (kind !== 'candidate') {
        result.jobs = await this.extractor.backfill('job', {
          ...filter,
          onProgress: (processed, total) => report({ step: 'jobs', processed, total }),
        });
      }
      return result;
    });
  }

  async detectStale(): Promise<RunOutcome<StaleRunResult>> {
    return this.run('stale', async () => ({ flagged: await this.store.detectStale() }));
  }

  async getStatus(name: RunName): Promise<TaskState | null> {
    return this.registry.get(name);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  /**
   * Claim the run, execute it and record the outcome. Progress writes are
   * chained so they land in order and settle before the final state.
   */
  private async run<T>(name: RunName, work: (report: ReportProgress) => Promise<T>): Promise<RunOutcome<T>> {
    if (!(await this.registry.tryStart(name))) {
      logger.info({ run: name }, 'Run already in progress, trigger ignored');
      return { started: false, reason: 'already_running' };
    }

    logger.info({ run: name }, 'Run started');
    let progressWrites: Promise<void> = Promise.resolve();
    const report: ReportProgress = (progress) => {
      progressWrites = progressWrites
        .then(() => this.registry.update(name, progress))
        .catch((error: unknown) => {
          logger.warn({ run: name, err: error }, 'Progress update failed');
        });
    };

    try {
      const result = await work(report);
      await progressWrites;
      await this.registry.complete(name, result);
      logger.info({ run: name }, 'Run finished');
      return { started: true, result };
    } catch (error) {
      await progressWrites;
      await this.registry.fail(name, describeError(error));
      logger.error({ run: name, err: error }, 'Run failed');
      throw error;
    }
  }
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let runsInstance: MatchingRuns | null = null;

export function getMatchingRuns(): MatchingRuns {
  if (!runsInstance) {
    runsInstance = new MatchingRuns();
  }
  return runsInstance;
}

export function resetMatchingRuns(): void {
  runsInstance = null;
}
