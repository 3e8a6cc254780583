/**
 * Matching Engine - the funnel for one job and for a whole category
 *
 * Per job: ensure the job vector, retrieve the short list, evaluate each
 * candidate in turn, upsert the Match. Candidates run strictly one after
 * another. One bad candidate or job is recorded and skipped, never aborts
 * the run; only a missing job or an ungeneratable job vector fails matchJob.
 */

import { getConfig } from '../../config/index.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { CLAUDE_PRICING, type ClaudeModel } from '../../integrations/llm/ClaudeClient.js';
import { EMBEDDING_PRICE_PER_MILLION } from '../../integrations/llm/EmbeddingClient.js';
import { BoundedErrorList, NotFoundError, describeError } from '../errors.js';
import {
  getCandidateRepository,
  getJobRepository,
  type CandidateRepository,
  type JobRepository,
} from '../repositories/index.js';
import { getCandidateRetriever, type CandidateRetriever } from './CandidateRetriever.js';
import { CostTracker, roundTo } from './CostTracker.js';
import { getDeepEvaluator, type DeepEvaluator } from './DeepEvaluator.js';
import { getMatchStore, type MatchStore } from './MatchStore.js';

const logger = createLogger('matching-engine');

// =============================================================================
// TYPES
// =============================================================================

export type MatchingStep = 'init' | 'embedding' | 'similarity' | 'evaluation' | 'matching' | 'done';

export type ProgressCallback = (step: MatchingStep, detail: string) => void;

export interface MatchedCandidate {
  candidateId: string;
  candidateName: string;
  matchId: string;
  similarity: number;
  distanceKm: number | null;
  aiScore: number;
  explanation: string;
  strengths: string[];
  weaknesses: string[];
  risks: string[];
  success: boolean;
  error: string | null;
}

export interface MatchJobOptions {
  topK?: number;
  maxDistanceKm?: number;
  onProgress?: ProgressCallback;
  /** Shared tracker of an enclosing run; a fresh one otherwise */
  costTracker?: CostTracker;
}

export interface MatchJobResult {
  jobId: string;
  jobPosition: string;
  candidatesFound: number;
  candidatesEvaluated: number;
  /** Highest aiScore first */
  candidates: MatchedCandidate[];
  matchesCreated: number;
  matchesUpdated: number;
  totalCostUsd: number;
  durationMs: number;
  errors: string[];
}

export interface MatchAllOptions {
  category?: string;
  topK?: number;
  maxDistanceKm?: number;
  onProgress?: ProgressCallback;
}

export interface MatchAllResult {
  category: string;
  totalJobs: number;
  jobsMatched: number;
  jobsFailed: number;
  totalMatchesCreated: number;
  totalMatchesUpdated: number;
  totalCandidatesEvaluated: number;
  totalCostUsd: number;
  errors: string[];
}

export interface CostEstimate {
  numJobs: number;
  candidatesPerJob: number;
  totalEvaluations: number;
  estimatedChatCostUsd: number;
  estimatedEmbeddingCostUsd: number;
  estimatedTotalCostUsd: number;
}

export interface MatchingEngineOptions {
  category: string;
  topK: number;
  maxDistanceKm: number;
  errorListLimit: number;
  evaluationModel: ClaudeModel;
}

export interface MatchingEngineDeps {
  jobs?: JobRepository;
  candidates?: CandidateRepository;
  retriever?: CandidateRetriever;
  evaluator?: DeepEvaluator;
  store?: MatchStore;
  options?: MatchingEngineOptions;
  now?: () => Date;
}

/** Job errors carried into the matchAll summary */
const ERRORS_PER_JOB_IN_SUMMARY = 3;

const ESTIMATE_INPUT_TOKENS_PER_EVALUATION = 2000;
const ESTIMATE_OUTPUT_TOKENS_PER_EVALUATION = 300;
const ESTIMATE_TOKENS_PER_EMBEDDING = 500;

// =============================================================================
// COST ESTIMATE
// =============================================================================

/**
 * Upper-bound cost of matching `numJobs` jobs, assuming every job and every
 * short-listed candidate still needs a vector.
 */
export function estimateMatchingCost(
  numJobs: number,
  candidatesPerJob: number,
  evaluationModel: ClaudeModel
): CostEstimate {
  const totalEvaluations = numJobs * candidatesPerJob;
  const pricing = CLAUDE_PRICING[evaluationModel];

  const chat = new CostTracker();
  chat.record(
    totalEvaluations * ESTIMATE_INPUT_TOKENS_PER_EVALUATION,
    totalEvaluations * ESTIMATE_OUTPUT_TOKENS_PER_EVALUATION,
    pricing.input,
    pricing.output
  );

  const embeddings = new CostTracker();
  embeddings.record((numJobs + totalEvaluations) * ESTIMATE_TOKENS_PER_EMBEDDING, 0, EMBEDDING_PRICE_PER_MILLION, 0);

  const chatCost = chat.totalCost();
  const embeddingCost = embeddings.totalCost();
  return {
    numJobs,
    candidatesPerJob,
    totalEvaluations,
    estimatedChatCostUsd: roundTo(chatCost, 4),
    estimatedEmbeddingCostUsd: roundTo(embeddingCost, 4),
    estimatedTotalCostUsd: roundTo(chatCost + embeddingCost, 4),
  };
}

// =============================================================================
// MATCHING ENGINE
// =============================================================================

export class MatchingEngine {
  private jobs: JobRepository;
  private candidates: CandidateRepository;
  private retriever: CandidateRetriever;
  private evaluator: DeepEvaluator;
  private store: MatchStore;
  private options: MatchingEngineOptions;
  private now: () => Date;

  constructor(deps: MatchingEngineDeps = {}) {
    this.jobs = deps.jobs ?? getJobRepository();
    this.candidates = deps.candidates ?? getCandidateRepository();
    this.retriever = deps.retriever ?? getCandidateRetriever();
    this.evaluator = deps.evaluator ?? getDeepEvaluator();
    this.store = deps.store ?? getMatchStore();
    this.options = deps.options ?? defaultOptions();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run the funnel for one job. Throws NotFoundError for an unknown job and
   * ExternalServiceError when the job vector cannot be generated.
   */
  async matchJob(jobId: string, options: MatchJobOptions = {}): Promise<MatchJobResult> {
    const startedAt = Date.now();
    const topK = options.topK ?? this.options.topK;
    const maxDistanceKm = options.maxDistanceKm ?? this.options.maxDistanceKm;
    const costTracker = options.costTracker ?? new CostTracker();
    const costBefore = costTracker.totalCost();
    const progress = options.onProgress;
    const errors = new BoundedErrorList(this.options.errorListLimit);

    const job = await this.jobs.findById(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }

    progress?.('init', `Matching ${job.position} at ${job.companyName}`);
    if (!job.embedding) {
      progress?.('embedding', 'Generating job embedding');
    }
    progress?.('similarity', `Finding top ${topK} candidates within ${maxDistanceKm} km`);

    const shortList = await this.retriever.findTopK(job, topK, maxDistanceKm, { costTracker });

    const result: MatchJobResult = {
      jobId,
      jobPosition: job.position,
      candidatesFound: shortList.length,
      candidatesEvaluated: 0,
      candidates: [],
      matchesCreated: 0,
      matchesUpdated: 0,
      totalCostUsd: 0,
      durationMs: 0,
      errors: [],
    };

    if (shortList.length === 0) {
      logger.info({ jobId, topK, maxDistanceKm }, 'No candidates in range');
      progress?.('done', 'No matching candidates found');
    }

    for (const [index, retrieved] of shortList.entries()) {
      const { candidateId, similarity, distanceKm } = retrieved;
      try {
        const candidate = await this.candidates.findById(candidateId);
        if (!candidate) {
          errors.add(`Candidate ${candidateId}: not found`);
          continue;
        }

        progress?.(
          'evaluation',
          `Evaluating ${index + 1}/${shortList.length}: ${candidate.fullName} (similarity ${similarity.toFixed(2)})`
        );

        const evaluation = await this.evaluator.evaluate(job, candidate, { costTracker });
        result.candidatesEvaluated++;

        const { match, inserted } = await this.store.upsert(candidateId, jobId, similarity, distanceKm, evaluation);
        if (inserted) {
          result.matchesCreated++;
        } else {
          result.matchesUpdated++;
        }

        result.candidates.push({
          candidateId,
          candidateName: candidate.fullName,
          matchId: match.id,
          similarity,
          distanceKm,
          aiScore: match.aiScore,
          explanation: evaluation.explanation,
          strengths: evaluation.strengths,
          weaknesses: evaluation.weaknesses,
          risks: evaluation.risks,
          success: evaluation.success,
          error: evaluation.success ? null : evaluation.error,
        });
      } catch (error) {
        logger.error({ jobId, candidateId, err: error }, 'Candidate failed in matching');
        errors.add(`Candidate ${candidateId}: ${describeError(error)}`);
      }
    }

    result.candidates.sort((a, b) => b.aiScore - a.aiScore);
    result.totalCostUsd = roundTo(costTracker.totalCost() - costBefore, 6);
    result.durationMs = Date.now() - startedAt;
    result.errors = errors.toArray();

    if (shortList.length > 0) {
      progress?.(
        'done',
        `Evaluated ${result.candidatesEvaluated} candidates: ${result.matchesCreated} new, ` +
          `${result.matchesUpdated} updated, cost ~$${result.totalCostUsd.toFixed(3)}`
      );
    }

    logger.info(
      {
        jobId,
        evaluated: result.candidatesEvaluated,
        created: result.matchesCreated,
        updated: result.matchesUpdated,
        durationMs: result.durationMs,
        costUsd: result.totalCostUsd,
      },
      'Job matched'
    );
    return result;
  }

  /**
   * Match every active (not deleted, not expired) job of a category, newest
   * first.
   */
  async matchAll(options: MatchAllOptions = {}): Promise<MatchAllResult> {
    const category = options.category ?? this.options.category;
    const progress = options.onProgress;
    const costTracker = new CostTracker();
    const errors = new BoundedErrorList(this.options.errorListLimit);

    const jobIds = await this.jobs.listActiveIds(category, this.now());

    const result: MatchAllResult = {
      category,
      totalJobs: jobIds.length,
      jobsMatched: 0,
      jobsFailed: 0,
      totalMatchesCreated: 0,
      totalMatchesUpdated: 0,
      totalCandidatesEvaluated: 0,
      totalCostUsd: 0,
      errors: [],
    };

    if (jobIds.length === 0) {
      progress?.('done', `No active ${category} jobs`);
      return result;
    }

    progress?.('init', `${jobIds.length} ${category} jobs, starting`);
    logger.info({ category, jobs: jobIds.length }, 'Matching run started');

    for (const [index, jobId] of jobIds.entries()) {
      progress?.('matching', `Job ${index + 1}/${jobIds.length}`);
      try {
        const jobResult = await this.matchJob(jobId, {
          topK: options.topK,
          maxDistanceKm: options.maxDistanceKm,
          costTracker,
        });
        result.jobsMatched++;
        result.totalMatchesCreated += jobResult.matchesCreated;
        result.totalMatchesUpdated += jobResult.matchesUpdated;
        result.totalCandidatesEvaluated += jobResult.candidatesEvaluated;
        errors.addAll(jobResult.errors.slice(0, ERRORS_PER_JOB_IN_SUMMARY));
      } catch (error) {
        logger.error({ jobId, err: error }, 'Job failed in matching run');
        result.jobsFailed++;
        errors.add(`Job ${jobId}: ${describeError(error)}`);
      }
    }

    result.totalCostUsd = costTracker.totalCost();
    result.errors = errors.toArray();

    progress?.(
      'done',
      `Matched ${result.jobsMatched}/${result.totalJobs} jobs, ` +
        `${result.totalCandidatesEvaluated} candidates evaluated, cost ~$${result.totalCostUsd.toFixed(2)}`
    );
    logger.info(
      {
        category,
        total: result.totalJobs,
        matched: result.jobsMatched,
        failed: result.jobsFailed,
        evaluated: result.totalCandidatesEvaluated,
        costUsd: result.totalCostUsd,
      },
      'Matching run finished'
    );
    return result;
  }

  estimateCost(numJobs: number, candidatesPerJob: number = 10): CostEstimate {
    return estimateMatchingCost(numJobs, candidatesPerJob, this.options.evaluationModel);
  }
}

function defaultOptions(): MatchingEngineOptions {
  const config = getConfig();
  return {
    category: config.matching.category,
    topK: config.matching.topK,
    maxDistanceKm: config.matching.maxDistanceKm,
    errorListLimit: config.matching.errorListLimit,
    evaluationModel: config.llm.evaluationModel,
  };
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let engineInstance: MatchingEngine | null = null;

export function getMatchingEngine(): MatchingEngine {
  if (!engineInstance) {
    engineInstance = new MatchingEngine();
  }
  return engineInstance;
}

export function resetMatchingEngine(): void {
  engineInstance = null;
}
