/**
 * Match - versioned result of evaluating one candidate against one job
 *
 * Unique on (candidateId, jobId). The funnel owns the score fields; the
 * feedback fields belong to external collaborators and survive every
 * re-evaluation.
 */

// =============================================================================
// STATUS
// =============================================================================

export const MATCH_STATUSES = ['new', 'ai_checked', 'presented', 'rejected', 'placed'] as const;
export type MatchStatus = (typeof MATCH_STATUSES)[number];

export const MATCHING_METHODS = ['pre_match', 'deep_match', 'smart_match', 'manual'] as const;
export type MatchingMethod = (typeof MATCHING_METHODS)[number];

/**
 * Matches produced by the embedding + evaluation funnel
 */
export const FUNNEL_MATCHING_METHOD: MatchingMethod = 'smart_match';

/**
 * Transitions applied by external collaborators (presentation, feedback,
 * placement). The funnel itself only ever moves new -> ai_checked.
 */
export const EXTERNAL_STATUS_TRANSITIONS: Record<MatchStatus, MatchStatus[]> = {
  new: [],
  ai_checked: ['presented', 'rejected'],
  presented: ['placed'],
  rejected: [],
  placed: [],
};

export function canTransition(from: MatchStatus, to: MatchStatus): boolean {
  return EXTERNAL_STATUS_TRANSITIONS[from].includes(to);
}

// =============================================================================
// STALENESS
// =============================================================================

/**
 * In precedence order when several apply
 */
export const STALE_REASONS = ['job_expired', 'candidate_updated', 'job_updated'] as const;
export type StaleReason = (typeof STALE_REASONS)[number];

// =============================================================================
// MATCH
// =============================================================================

export interface Match {
  id: string;
  candidateId: string;
  jobId: string;
  matchingMethod: MatchingMethod;

  similarity: number;
  distanceKm: number | null;

  aiScore: number;
  explanation: string;
  strengths: string[];
  weaknesses: string[];
  risks: string[];
  aiCheckedAt: Date | null;

  status: MatchStatus;

  stale: boolean;
  staleReason: StaleReason | null;
  staleSince: Date | null;

  feedback: string | null;
  feedbackNote: string | null;
  feedbackAt: Date | null;
  rejectionReason: string | null;

  createdAt: Date;
  updatedAt: Date;
}

export const MAX_EVALUATION_POINTS = 3;
