/**
 * Embedding Indexer - vectors for candidates and jobs
 *
 * Renders a purpose-built text per owner (full task descriptions, no
 * truncation of the work history) and stores one fixed-length vector on the
 * owner. A failed call leaves any previous vector in place.
 */

import { getConfig } from '../../config/index.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import {
  EMBEDDING_PRICE_PER_MILLION,
  getEmbeddingClient,
  type EmbeddingProvider,
} from '../../integrations/llm/EmbeddingClient.js';
import type { EmbeddingRecord } from '../entities/Embedding.js';
import type { OwnerKind, Profile } from '../entities/Profile.js';
import { BoundedErrorList, describeError } from '../errors.js';
import {
  getCandidateRepository,
  getJobRepository,
  type CandidateRepository,
  type JobRepository,
  type OwnerRepository,
} from '../repositories/index.js';
import { CostTracker, roundTo } from './CostTracker.js';
import { renderCandidateEmbeddingText, renderJobEmbeddingText } from './DocumentText.js';
import type { CoverageStats, ProfileOwner } from './ProfileExtractor.js';

const logger = createLogger('embedding-indexer');

// =============================================================================
// TYPES
// =============================================================================

export interface EmbedOptions {
  costTracker?: CostTracker;
}

export interface EmbedAllOptions {
  /** Both kinds when omitted, candidates first */
  kind?: OwnerKind;
  category?: string;
  limit?: number;
  onProgress?: (processed: number, total: number) => void;
  costTracker?: CostTracker;
}

export interface EmbeddingBatchResult {
  total: number;
  embedded: number;
  skipped: number;
  failed: number;
  totalCostUsd: number;
  errors: string[];
}

export interface EmbeddingStats {
  candidates: CoverageStats;
  jobs: CoverageStats;
  coveragePercent: number;
}

export interface EmbeddingIndexerOptions {
  batchCommitSize: number;
  errorListLimit: number;
  /** Category the coverage stats are computed for */
  category: string;
}

export interface EmbeddingIndexerDeps {
  candidates?: CandidateRepository;
  jobs?: JobRepository;
  provider?: EmbeddingProvider;
  options?: EmbeddingIndexerOptions;
  now?: () => Date;
}

type GenerateOutcome =
  | { status: 'embedded'; record: EmbeddingRecord }
  | { status: 'empty' }
  | { status: 'failed'; error: string };

export function renderEmbeddingText(owner: ProfileOwner): string {
  return owner.kind === 'candidate' ? renderCandidateEmbeddingText(owner) : renderJobEmbeddingText(owner);
}

// =============================================================================
// EMBEDDING INDEXER
// =============================================================================

export class EmbeddingIndexer {
  private candidates: CandidateRepository;
  private jobs: JobRepository;
  private provider: EmbeddingProvider;
  private options: EmbeddingIndexerOptions;
  private now: () => Date;

  constructor(deps: EmbeddingIndexerDeps = {}) {
    this.candidates = deps.candidates ?? getCandidateRepository();
    this.jobs = deps.jobs ?? getJobRepository();
    this.provider = deps.provider ?? getEmbeddingClient();
    this.options = deps.options ?? defaultOptions();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Generate and store the vector of one owner. False when the rendered text
   * is empty or the call or the write failed.
   */
  async embed(owner: ProfileOwner, options: EmbedOptions = {}): Promise<boolean> {
    const outcome = await this.generate(owner, options.costTracker ?? new CostTracker());
    if (outcome.status !== 'embedded') {
      return false;
    }

    try {
      await this.repositoryFor(owner.kind).saveEmbeddings([outcome.record]);
      return true;
    } catch (error) {
      logger.error({ ownerId: owner.id, kind: owner.kind, err: error }, 'Failed to save embedding');
      return false;
    }
  }

  /**
   * Embed every active owner lacking a vector, newest first, committing
   * every batchCommitSize vectors.
   */
  async embedAllMissing(options: EmbedAllOptions = {}): Promise<EmbeddingBatchResult> {
    const costTracker = options.costTracker ?? new CostTracker();
    const errors = new BoundedErrorList(this.options.errorListLimit);
    const kinds: OwnerKind[] = options.kind ? [options.kind] : ['candidate', 'job'];

    const queues = await Promise.all(
      kinds.map(async (kind) => ({
        kind,
        ids: await this.repositoryFor(kind).listIdsMissingEmbedding({
          category: options.category,
          limit: options.limit,
        }),
      }))
    );

    const result: EmbeddingBatchResult = {
      total: queues.reduce((sum, queue) => sum + queue.ids.length, 0),
      embedded: 0,
      skipped: 0,
      failed: 0,
      totalCostUsd: 0,
      errors: [],
    };

    logger.info({ kinds, category: options.category, total: result.total }, 'Embedding run started');

    let processed = 0;
    for (const { kind, ids } of queues) {
      const repository = this.repositoryFor(kind);
      let pending: EmbeddingRecord[] = [];

      const flush = async (): Promise<void> => {
        if (pending.length === 0) {
          return;
        }
        const batch = pending;
        pending = [];
        try {
          await repository.saveEmbeddings(batch);
          result.embedded += batch.length;
        } catch (error) {
          result.failed += batch.length;
          errors.add(`Batch of ${batch.length} ${kind} embeddings not saved: ${describeError(error)}`);
          logger.error({ kind, size: batch.length, err: error }, 'Embedding batch commit failed');
        }
      };

      for (const id of ids) {
        try {
          const owner = await repository.findById(id);
          if (!owner) {
            result.skipped++;
          } else {
            const outcome = await this.generate(owner, costTracker);
            if (outcome.status === 'embedded') {
              pending.push(outcome.record);
            } else if (outcome.status === 'empty') {
              result.skipped++;
            } else {
              result.failed++;
              errors.add(`${kind} ${id}: ${outcome.error}`);
            }
          }
        } catch (error) {
          result.failed++;
          errors.add(`${kind} ${id}: ${describeError(error)}`);
        }

        if (pending.length >= this.options.batchCommitSize) {
          await flush();
        }
        processed++;
        options.onProgress?.(processed, result.total);
      }
      await flush();
    }

    result.totalCostUsd = costTracker.totalCost();
    result.errors = errors.toArray();

    logger.info(
      {
        total: result.total,
        embedded: result.embedded,
        skipped: result.skipped,
        failed: result.failed,
        costUsd: result.totalCostUsd,
      },
      'Embedding run finished'
    );
    return result;
  }

  async getEmbeddingStats(category: string = this.options.category): Promise<EmbeddingStats> {
    const [candidates, jobs] = await Promise.all([
      this.candidates.embeddingCoverage(category),
      this.jobs.embeddingCoverage(category),
    ]);
    const total = candidates.total + jobs.total;
    const covered = candidates.covered + jobs.covered;
    return {
      candidates: { ...candidates, missing: candidates.total - candidates.covered },
      jobs: { ...jobs, missing: jobs.total - jobs.covered },
      coveragePercent: total > 0 ? roundTo((covered / total) * 100, 1) : 0,
    };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private repositoryFor(kind: OwnerKind): OwnerRepository<ProfileOwner, Profile> {
    return kind === 'candidate' ? this.candidates : this.jobs;
  }

  private async generate(owner: ProfileOwner, costTracker: CostTracker): Promise<GenerateOutcome> {
    const text = renderEmbeddingText(owner).trim();
    if (text.length === 0) {
      logger.debug({ ownerId: owner.id, kind: owner.kind }, 'Nothing to embed');
      return { status: 'empty' };
    }

    try {
      const response = await this.provider.embed(text);
      costTracker.record(response.usage.totalTokens, 0, EMBEDDING_PRICE_PER_MILLION, 0);
      return {
        status: 'embedded',
        record: {
          ownerId: owner.id,
          ownerKind: owner.kind,
          vector: response.vector,
          generatedAt: this.now(),
        },
      };
    } catch (error) {
      logger.warn({ ownerId: owner.id, kind: owner.kind, err: error }, 'Embedding request failed');
      return { status: 'failed', error: describeError(error) };
    }
  }
}

function defaultOptions(): EmbeddingIndexerOptions {
  const config = getConfig();
  return {
    batchCommitSize: config.matching.batchCommitSize,
    errorListLimit: config.matching.errorListLimit,
    category: config.matching.category,
  };
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let indexerInstance: EmbeddingIndexer | null = null;

export function getEmbeddingIndexer(): EmbeddingIndexer {
  if (!indexerInstance) {
    indexerInstance = new EmbeddingIndexer();
  }
  return indexerInstance;
}

export function resetEmbeddingIndexer(): void {
  indexerInstance = null;
}
