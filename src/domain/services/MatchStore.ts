/**
 * Match Store - versioned Match records per (candidate, job)
 *
 * The funnel writes through `upsert` and `detectStale`; external
 * collaborators (alerting, pipeline, feedback) read through the list
 * queries and write only feedback and status.
 */

import { createLogger } from '../../infrastructure/logging/logger.js';
import { canTransition, type Match, type MatchStatus } from '../entities/Match.js';
import { InvalidStatusTransitionError, NotFoundError } from '../errors.js';
import {
  getMatchRepository,
  type MatchFeedback,
  type MatchListOptions,
  type MatchRepository,
  type UpsertOutcome,
} from '../repositories/index.js';
import type { EvaluationResult } from './DeepEvaluator.js';

const logger = createLogger('match-store');

export const DEFAULT_EXCELLENT_SCORE = 0.8;

export interface MatchStoreDeps {
  matches?: MatchRepository;
  now?: () => Date;
}

export class MatchStore {
  private matches: MatchRepository;
  private now: () => Date;

  constructor(deps: MatchStoreDeps = {}) {
    this.matches = deps.matches ?? getMatchRepository();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Record an evaluation for the pair. Successful and failed evaluations
   * are both stored; a failure lands as score 0 with its explanation.
   */
  async upsert(
    candidateId: string,
    jobId: string,
    similarity: number,
    distanceKm: number | null,
    evaluation: EvaluationResult
  ): Promise<UpsertOutcome> {
    const outcome = await this.matches.upsertEvaluation({
      candidateId,
      jobId,
      similarity: Math.min(1, Math.max(0, similarity)),
      distanceKm,
      aiScore: Math.min(1, Math.max(0, evaluation.score)),
      explanation: evaluation.explanation,
      strengths: evaluation.strengths,
      weaknesses: evaluation.weaknesses,
      risks: evaluation.risks,
      evaluatedAt: this.now(),
    });

    logger.debug(
      { candidateId, jobId, matchId: outcome.match.id, inserted: outcome.inserted, score: outcome.match.aiScore },
      'Match stored'
    );
    return outcome;
  }

  /**
   * Flag funnel matches whose candidate or job changed after evaluation, or
   * whose job expired. Returns the number newly flagged.
   */
  async detectStale(): Promise<number> {
    const flagged = await this.matches.markStale(this.now());
    logger.info({ flagged }, 'Stale match detection finished');
    return flagged;
  }

  async getMatch(candidateId: string, jobId: string): Promise<Match | null> {
    return this.matches.findByPair(candidateId, jobId);
  }

  async listForJob(jobId: string, options?: MatchListOptions): Promise<Match[]> {
    return this.matches.listForJob(jobId, options);
  }

  async listForCandidate(candidateId: string, options?: MatchListOptions): Promise<Match[]> {
    return this.matches.listForCandidate(candidateId, options);
  }

  async listExcellent(minScore: number = DEFAULT_EXCELLENT_SCORE): Promise<Match[]> {
    return this.matches.listExcellent(minScore);
  }

  async countStale(): Promise<number> {
    return this.matches.countStale();
  }

  async recordFeedback(matchId: string, feedback: MatchFeedback): Promise<Match> {
    const match = await this.matches.recordFeedback(matchId, feedback, this.now());
    if (!match) {
      throw new NotFoundError('Match', matchId);
    }
    logger.info({ matchId, feedback: feedback.feedback }, 'Feedback recorded');
    return match;
  }

  /**
   * Apply an external status change. Rejects moves outside the state
   * machine and races where the row moved in between.
   */
  async transitionStatus(matchId: string, to: MatchStatus): Promise<Match> {
    const current = await this.matches.findById(matchId);
    if (!current) {
      throw new NotFoundError('Match', matchId);
    }
    if (!canTransition(current.status, to)) {
      throw new InvalidStatusTransitionError(current.status, to);
    }

    const updated = await this.matches.updateStatus(matchId, current.status, to, this.now());
    if (!updated) {
      const latest = await this.matches.findById(matchId);
      throw new InvalidStatusTransitionError(latest?.status ?? current.status, to);
    }

    logger.info({ matchId, from: current.status, to }, 'Match status changed');
    return updated;
  }
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let storeInstance: MatchStore | null = null;

export function getMatchStore(): MatchStore {
  if (!storeInstance) {
    storeInstance = new MatchStore();
  }
  return storeInstance;
}

export function resetMatchStore(): void {
  storeInstance = null;
}
