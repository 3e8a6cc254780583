/**
 * Candidate Retriever - vector short list under a hard distance bound
 *
 * Read-only over the candidate store. Candidates without coordinates pass
 * the distance filter and are ranked on similarity alone.
 */

import { getConfig } from '../../config/index.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import type { Job } from '../entities/Job.js';
import { ExternalServiceError } from '../errors.js';
import { getCandidateRepository, type CandidateRepository } from '../repositories/index.js';
import { CostTracker, roundTo } from './CostTracker.js';
import { getEmbeddingIndexer, type EmbeddingIndexer } from './EmbeddingIndexer.js';

const logger = createLogger('candidate-retriever');

export interface RetrievedCandidate {
  candidateId: string;
  /** 1 - cosine distance, clamped to [0,1], 4 decimals */
  similarity: number;
  /** 1 decimal; null when either side lacks coordinates */
  distanceKm: number | null;
}

export interface RetrieveOptions {
  costTracker?: CostTracker;
}

export interface CandidateRetrieverDeps {
  candidates?: CandidateRepository;
  indexer?: EmbeddingIndexer;
  /** Used when the job carries no category */
  defaultCategory?: string;
}

export function toSimilarity(cosineDistance: number): number {
  return roundTo(Math.min(1, Math.max(0, 1 - cosineDistance)), 4);
}

export class CandidateRetriever {
  private candidates: CandidateRepository;
  private indexer: EmbeddingIndexer;
  private defaultCategory: string;

  constructor(deps: CandidateRetrieverDeps = {}) {
    this.candidates = deps.candidates ?? getCandidateRepository();
    this.indexer = deps.indexer ?? getEmbeddingIndexer();
    this.defaultCategory = deps.defaultCategory ?? getConfig().matching.category;
  }

  /**
   * Top `k` candidates by similarity to the job within `maxDistanceKm`.
   * Embeds the job first when it has no vector; throws when that fails.
   * Query errors propagate.
   */
  async findTopK(
    job: Job,
    k: number,
    maxDistanceKm: number,
    options: RetrieveOptions = {}
  ): Promise<RetrievedCandidate[]> {
    if (!job.embedding) {
      logger.info({ jobId: job.id }, 'Job has no embedding, generating');
      const embedded = await this.indexer.embed(job, { costTracker: options.costTracker });
      if (!embedded) {
        throw new ExternalServiceError(`Embedding could not be generated for job ${job.id}`, 'embedding', 'unavailable');
      }
    }

    const rows = await this.candidates.findSimilar({
      jobId: job.id,
      category: job.category ?? this.defaultCategory,
      maxDistanceKm,
      limit: k,
    });

    logger.debug({ jobId: job.id, k, maxDistanceKm, found: rows.length }, 'Candidates retrieved');

    return rows.map((row) => ({
      candidateId: row.candidateId,
      similarity: toSimilarity(row.cosineDistance),
      distanceKm: row.distanceKm === null ? null : roundTo(row.distanceKm, 1),
    }));
  }
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let retrieverInstance: CandidateRetriever | null = null;

export function getCandidateRetriever(): CandidateRetriever {
  if (!retrieverInstance) {
    retrieverInstance = new CandidateRetriever();
  }
  return retrieverInstance;
}

export function resetCandidateRetriever(): void {
  retrieverInstance = null;
}
