/**
 * Match Repository - Data access for Match rows
 *
 * Writes go through single statements so the (candidate_id, job_id) natural
 * key is enforced by the unique constraint, not by read-then-write.
 */

import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import {
  FUNNEL_MATCHING_METHOD,
  MATCHING_METHODS,
  MATCH_STATUSES,
  STALE_REASONS,
  type Match,
  type MatchStatus,
} from '../entities/Match.js';
import { BaseRepository, RepositoryError } from './BaseRepository.js';
import { parseStringList } from './rows.js';

// =============================================================================
// TYPES
// =============================================================================

export interface MatchEvaluationWrite {
  candidateId: string;
  jobId: string;
  similarity: number;
  distanceKm: number | null;
  aiScore: number;
  explanation: string;
  strengths: string[];
  weaknesses: string[];
  risks: string[];
  evaluatedAt: Date;
}

export interface UpsertOutcome {
  match: Match;
  inserted: boolean;
}

export interface MatchListOptions {
  /** Default true */
  includeStale?: boolean;
  /** Default 0 */
  minScore?: number;
}

export interface MatchFeedback {
  feedback: string;
  note?: string | null;
  rejectionReason?: string | null;
}

export interface MatchRepository {
  findById(id: string): Promise<Match | null>;

  findByPair(candidateId: string, jobId: string): Promise<Match | null>;

  /**
   * Insert or refresh the evaluation fields of the pair. Never writes the
   * feedback columns; status moves only from new to ai_checked; clears the
   * stale flag.
   */
  upsertEvaluation(write: MatchEvaluationWrite): Promise<UpsertOutcome>;

  /**
   * Flags funnel matches whose inputs changed after evaluation or whose job
   * expired. Rows already stale are left alone. Returns the number flagged.
   */
  markStale(now: Date): Promise<number>;

  /** Ordered by ai_score, highest first */
  listForJob(jobId: string, options?: MatchListOptions): Promise<Match[]>;

  /** Ordered by ai_score, highest first */
  listForCandidate(candidateId: string, options?: MatchListOptions): Promise<Match[]>;

  /**
   * Non-stale ai_checked or presented matches scoring at least `minScore`
   */
  listExcellent(minScore: number): Promise<Match[]>;

  countStale(): Promise<number>;

  recordFeedback(id: string, feedback: MatchFeedback, at: Date): Promise<Match | null>;

  /**
   * Compare-and-set: applies only while the row is still in `from`
   */
  updateStatus(id: string, from: MatchStatus, to: MatchStatus, at: Date): Promise<Match | null>;
}

interface MatchRow extends QueryResultRow {
  id: string;
  candidate_id: string;
  job_id: string;
  matching_method: string;
  similarity: number;
  distance_km: number | null;
  ai_score: number;
  explanation: string;
  strengths: unknown;
  weaknesses: unknown;
  risks: unknown;
  ai_checked_at: Date | null;
  status: string;
  stale: boolean;
  stale_reason: string | null;
  stale_since: Date | null;
  feedback: string | null;
  feedback_note: string | null;
  feedback_at: Date | null;
  rejection_reason: string | null;
  created_at: Date;
  updated_at: Date;
}

interface UpsertRow extends MatchRow {
  inserted: boolean;
}

const statusSchema = z.enum(MATCH_STATUSES);
const methodSchema = z.enum(MATCHING_METHODS);
const staleReasonSchema = z.enum(STALE_REASONS).nullable().catch(null);

// =============================================================================
// REPOSITORY
// =============================================================================

export class PgMatchRepository extends BaseRepository<Match, MatchRow> implements MatchRepository {
  protected modelName = 'Match';
  protected tableName = 'matches';

  protected mapRow(row: MatchRow): Match {
    return {
      id: row.id,
      candidateId: row.candidate_id,
      jobId: row.job_id,
      matchingMethod: methodSchema.parse(row.matching_method),
      similarity: row.similarity,
      distanceKm: row.distance_km,
      aiScore: row.ai_score,
      explanation: row.explanation,
      strengths: parseStringList(row.strengths),
      weaknesses: parseStringList(row.weaknesses),
      risks: parseStringList(row.risks),
      aiCheckedAt: row.ai_checked_at,
      status: statusSchema.parse(row.status),
      stale: row.stale,
      staleReason: staleReasonSchema.parse(row.stale_reason),
      staleSince: row.stale_since,
      feedback: row.feedback,
      feedbackNote: row.feedback_note,
      feedbackAt: row.feedback_at,
      rejectionReason: row.rejection_reason,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async findByPair(candidateId: string, jobId: string): Promise<Match | null> {
    const rows = await this.query<MatchRow>(
      'SELECT * FROM matches WHERE candidate_id = $1 AND job_id = $2',
      [candidateId, jobId]
    );
    return rows.length > 0 ? this.mapRow(rows[0]) : null;
  }

  async upsertEvaluation(write: MatchEvaluationWrite): Promise<UpsertOutcome> {
    const rows = await this.query<UpsertRow>(
      `INSERT INTO matches (
         candidate_id, job_id, matching_method, similarity, distance_km,
         ai_score, explanation, strengths, weaknesses, risks,
         ai_checked_at, status, created_at, updated_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::jsonb, $10::jsonb, $11, 'ai_checked', $11, $11)
       ON CONFLICT (candidate_id, job_id) DO UPDATE SET
         similarity = EXCLUDED.similarity,
         distance_km = EXCLUDED.distance_km,
         ai_score = EXCLUDED.ai_score,
         explanation = EXCLUDED.explanation,
         strengths = EXCLUDED.strengths,
         weaknesses = EXCLUDED.weaknesses,
         risks = EXCLUDED.risks,
         ai_checked_at = EXCLUDED.ai_checked_at,
         status = CASE WHEN matches.status = 'new' THEN 'ai_checked' ELSE matches.status END,
         stale = FALSE,
         stale_reason = NULL,
         stale_since = NULL,
         updated_at = EXCLUDED.updated_at
       RETURNING *, (xmax = 0) AS inserted`,
      [
        write.candidateId,
        write.jobId,
        FUNNEL_MATCHING_METHOD,
        write.similarity,
        write.distanceKm,
        write.aiScore,
        write.explanation,
        JSON.stringify(write.strengths),
        JSON.stringify(write.weaknesses),
        JSON.stringify(write.risks),
        write.evaluatedAt,
      ]
    );
    if (rows.length === 0) {
      throw new RepositoryError(`Match upsert returned no row for ${write.candidateId}/${write.jobId}`, 'UNKNOWN');
    }
    return { match: this.mapRow(rows[0]), inserted: rows[0].inserted };
  }

  async markStale(now: Date): Promise<number> {
    return this.execute(
      `UPDATE matches m
       SET stale = TRUE, stale_reason = s.reason, stale_since = $1, updated_at = $1
       FROM (
         SELECT m2.id,
                CASE
                  WHEN j.expires_at IS NOT NULL AND j.expires_at < $1 THEN 'job_expired'
                  WHEN c.updated_at > COALESCE(m2.ai_checked_at, m2.created_at) THEN 'candidate_updated'
                  ELSE 'job_updated'
                END AS reason
         FROM matches m2
         JOIN candidates c ON c.id = m2.candidate_id
         JOIN jobs j ON j.id = m2.job_id
         WHERE m2.stale = FALSE
           AND m2.matching_method = $2
           AND (
             (j.expires_at IS NOT NULL AND j.expires_at < $1)
             OR c.updated_at > COALESCE(m2.ai_checked_at, m2.created_at)
             OR j.updated_at > COALESCE(m2.ai_checked_at, m2.created_at)
           )
       ) s
       WHERE m.id = s.id`,
      [now, FUNNEL_MATCHING_METHOD]
    );
  }

  async listForJob(jobId: string, options: MatchListOptions = {}): Promise<Match[]> {
    return this.list('job_id', jobId, options);
  }

  async listForCandidate(candidateId: string, options: MatchListOptions = {}): Promise<Match[]> {
    return this.list('candidate_id', candidateId, options);
  }

  private async list(
    column: 'job_id' | 'candidate_id',
    id: string,
    options: MatchListOptions
  ): Promise<Match[]> {
    const conditions = [`${column} = $1`, 'ai_score >= $2'];
    if (options.includeStale === false) {
      conditions.push('stale = FALSE');
    }
    const rows = await this.query<MatchRow>(
      `SELECT * FROM matches WHERE ${conditions.join(' AND ')} ORDER BY ai_score DESC, created_at ASC`,
      [id, options.minScore ?? 0]
    );
    return rows.map((row) => this.mapRow(row));
  }

  async listExcellent(minScore: number): Promise<Match[]> {
    const rows = await this.query<MatchRow>(
      `SELECT * FROM matches
       WHERE stale = FALSE
         AND status IN ('ai_checked', 'presented')
         AND ai_score >= $1
       ORDER BY ai_score DESC, created_at ASC`,
      [minScore]
    );
    return rows.map((row) => this.mapRow(row));
  }

  async countStale(): Promise<number> {
    return this.countWhere('t.stale = TRUE');
  }

  async recordFeedback(id: string, feedback: MatchFeedback, at: Date): Promise<Match | null> {
    const rows = await this.query<MatchRow>(
      `UPDATE matches
       SET feedback = $2, feedback_note = $3, rejection_reason = $4, feedback_at = $5, updated_at = $5
       WHERE id = $1
       RETURNING *`,
      [id, feedback.feedback, feedback.note ?? null, feedback.rejectionReason ?? null, at]
    );
    return rows.length > 0 ? this.mapRow(rows[0]) : null;
  }

  async updateStatus(id: string, from: MatchStatus, to: MatchStatus, at: Date): Promise<Match | null> {
    const rows = await this.query<MatchRow>(
      `UPDATE matches SET status = $3, updated_at = $4 WHERE id = $1 AND status = $2 RETURNING *`,
      [id, from, to, at]
    );
    return rows.length > 0 ? this.mapRow(rows[0]) : null;
  }
}
