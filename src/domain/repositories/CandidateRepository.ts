/**
 * Candidate Repository - Data access for candidates in the matching funnel
 *
 * Besides the profile/embedding columns, owns the retrieval query: one
 * statement that ranks candidates by cosine distance to a job's vector under
 * a hard geographic bound.
 */

import type { QueryResultRow } from 'pg';
import type { Candidate } from '../entities/Candidate.js';
import type { CandidateProfile } from '../entities/Profile.js';
import { PgOwnerRepository, type OwnerRepository } from './OwnerRepository.js';
import {
  OWNER_COMPUTED_COLUMNS,
  parseCandidateProfile,
  parseEducation,
  parseFurtherEducation,
  parseLanguages,
  parseWorkHistory,
  toEmbeddingStamp,
  toGeoPoint,
  type EmbeddingColumns,
  type GeoColumns,
  type ProfileColumns,
} from './rows.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SimilarityQuery {
  jobId: string;
  category: string;
  maxDistanceKm: number;
  limit: number;
}

/**
 * Raw retrieval row; rounding happens in the retriever
 */
export interface SimilarCandidate {
  candidateId: string;
  cosineDistance: number;
  distanceKm: number | null;
}

export interface CandidateRepository extends OwnerRepository<Candidate, CandidateProfile> {
  /**
   * Active candidates in `category` with a vector, within `maxDistanceKm` of
   * the job (or lacking coordinates on either side), by ascending cosine
   * distance. Empty when the job has no vector.
   */
  findSimilar(query: SimilarityQuery): Promise<SimilarCandidate[]>;
}

interface CandidateRow extends QueryResultRow, ProfileColumns, GeoColumns, EmbeddingColumns {
  id: string;
  full_name: string;
  current_position: string | null;
  current_company: string | null;
  city: string | null;
  work_history: unknown;
  education: unknown;
  further_education: unknown;
  skills: string[];
  it_skills: string[];
  erp: string[];
  languages: unknown;
  classified_roles: string[];
  category: string | null;
  cv_text: string | null;
  hidden: boolean;
  deleted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

interface SimilarCandidateRow extends QueryResultRow {
  candidate_id: string;
  cosine_distance: number;
  distance_km: number | null;
}

// =============================================================================
// REPOSITORY
// =============================================================================

export class PgCandidateRepository
  extends PgOwnerRepository<Candidate, CandidateProfile, CandidateRow>
  implements CandidateRepository
{
  readonly ownerKind = 'candidate' as const;
  protected modelName = 'Candidate';
  protected tableName = 'candidates';
  protected activeCondition = 't.hidden = FALSE AND t.deleted_at IS NULL';

  protected selectColumns(): string {
    return `t.id, t.full_name, t.current_position, t.current_company, t.city,
      t.work_history, t.education, t.further_education, t.skills, t.it_skills, t.erp,
      t.languages, t.classified_roles, t.category, t.cv_text, t.hidden, t.deleted_at,
      t.created_at, t.updated_at, t.profile, t.profile_version, t.profile_extracted_at,
      t.embedding_generated_at, ${OWNER_COMPUTED_COLUMNS}`;
  }

  protected mapRow(row: CandidateRow): Candidate {
    return {
      kind: 'candidate',
      id: row.id,
      fullName: row.full_name,
      currentPosition: row.current_position,
      currentCompany: row.current_company,
      city: row.city,
      workHistory: parseWorkHistory(row.work_history),
      education: parseEducation(row.education),
      furtherEducation: parseFurtherEducation(row.further_education),
      skills: row.skills,
      itSkills: row.it_skills,
      erp: row.erp,
      languages: parseLanguages(row.languages),
      classifiedRoles: row.classified_roles,
      category: row.category,
      cvText: row.cv_text,
      coordinates: toGeoPoint(row),
      hidden: row.hidden,
      deletedAt: row.deleted_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      profile: parseCandidateProfile(row.id, row),
      embedding: toEmbeddingStamp(row),
    };
  }

  /**
   * Exact ranking: every candidate passing the filters is scored, then the
   * closest `limit` are kept. Ordering by the materialized distance column
   * keeps an approximate vector index from cutting the scan short before
   * the geo filter runs.
   */
  async findSimilar(query: SimilarityQuery): Promise<SimilarCandidate[]> {
    const rows = await this.query<SimilarCandidateRow>(
      `WITH ranked AS MATERIALIZED (
         SELECT c.id AS candidate_id,
                (c.embedding <=> j.embedding)::float8 AS cosine_distance,
                CASE
                  WHEN c.coordinates IS NULL OR j.coordinates IS NULL THEN NULL
                  ELSE ST_Distance(c.coordinates, j.coordinates) / 1000.0
                END AS distance_km
         FROM candidates c
         JOIN jobs j ON j.id = $1
         WHERE j.embedding IS NOT NULL
           AND c.hidden = FALSE
           AND c.deleted_at IS NULL
           AND c.category = $2
           AND c.embedding IS NOT NULL
           AND (
             c.coordinates IS NULL
             OR j.coordinates IS NULL
             OR ST_DWithin(c.coordinates, j.coordinates, $3 * 1000.0)
           )
       )
       SELECT candidate_id, cosine_distance, distance_km
       FROM ranked
       ORDER BY cosine_distance ASC
       LIMIT $4`,
      [query.jobId, query.category, query.maxDistanceKm, query.limit]
    );

    return rows.map((row) => ({
      candidateId: row.candidate_id,
      cosineDistance: row.cosine_distance,
      distanceKm: row.distance_km,
    }));
  }
}
