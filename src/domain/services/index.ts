/**
 * Domain Services Module
 *
 * The matching funnel, leaves first:
 * - CostTracker: running USD estimate shared by a run
 * - ProfileExtractor: cached structured profile per candidate/job
 * - EmbeddingIndexer: one vector per candidate/job
 * - CandidateRetriever: vector short list under a distance bound
 * - DeepEvaluator: calibrated score and rationale per pair
 * - MatchStore: versioned Match records, staleness, feedback
 * - MatchingEngine: the funnel for one job or a whole category
 */

export { CostTracker, roundTo, type CostSnapshot } from './CostTracker.js';

export {
  PROFILE_INPUT_LIMITS,
  EMBEDDING_TEXT_LIMITS,
  MIN_PROFILE_INPUT_CHARS,
  NO_DATA_PLACEHOLDER,
  renderCandidateProfileInput,
  renderJobProfileInput,
  renderCandidateEmbeddingText,
  renderJobEmbeddingText,
  renderJobEvaluationSection,
  renderCandidateEvaluationSection,
} from './DocumentText.js';

export {
  ProfileExtractor,
  getProfileExtractor,
  resetProfileExtractor,
  clampSeniority,
  toCandidateProfile,
  toJobProfile,
  BACKFILL_ERROR_LIMIT,
  type ProfileOwner,
  type ExtractionResult,
  type ExtractOptions,
  type BackfillOptions,
  type BackfillResult,
  type CoverageStats,
  type ProfileStats,
  type ProfileExtractorOptions,
  type ProfileExtractorDeps,
} from './ProfileExtractor.js';

export {
  EmbeddingIndexer,
  getEmbeddingIndexer,
  resetEmbeddingIndexer,
  renderEmbeddingText,
  type EmbedOptions,
  type EmbedAllOptions,
  type EmbeddingBatchResult,
  type EmbeddingStats,
  type EmbeddingIndexerOptions,
  type EmbeddingIndexerDeps,
} from './EmbeddingIndexer.js';

export {
  CandidateRetriever,
  getCandidateRetriever,
  resetCandidateRetriever,
  toSimilarity,
  type RetrievedCandidate,
  type RetrieveOptions,
  type CandidateRetrieverDeps,
} from './CandidateRetriever.js';

export {
  DeepEvaluator,
  getDeepEvaluator,
  resetDeepEvaluator,
  toEvaluation,
  failedEvaluation,
  DEFAULT_MISSING_SCORE,
  MISSING_EXPLANATION,
  type EvaluationPoints,
  type EvaluationResult,
  type EvaluateOptions,
  type DeepEvaluatorDeps,
} from './DeepEvaluator.js';

export {
  MatchStore,
  getMatchStore,
  resetMatchStore,
  DEFAULT_EXCELLENT_SCORE,
  type MatchStoreDeps,
} from './MatchStore.js';

export {
  MatchingEngine,
  getMatchingEngine,
  resetMatchingEngine,
  estimateMatchingCost,
  type MatchingStep,
  type ProgressCallback,
  type MatchedCandidate,
  type MatchJobOptions,
  type MatchJobResult,
  type MatchAllOptions,
  type MatchAllResult,
  type CostEstimate,
  type MatchingEngineOptions,
  type MatchingEngineDeps,
} from './MatchingEngine.js';
