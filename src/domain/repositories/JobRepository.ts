/**
 * Job Repository - Data access for jobs in the matching funnel
 */

import type { QueryResultRow } from 'pg';
import type { Job } from '../entities/Job.js';
import type { JobProfile } from '../entities/Profile.js';
import { PgOwnerRepository, type OwnerRepository } from './OwnerRepository.js';
import {
  OWNER_COMPUTED_COLUMNS,
  parseJobProfile,
  toEmbeddingStamp,
  toGeoPoint,
  type EmbeddingColumns,
  type GeoColumns,
  type ProfileColumns,
} from './rows.js';

// =============================================================================
// TYPES
// =============================================================================

export interface JobRepository extends OwnerRepository<Job, JobProfile> {
  /**
   * Jobs in `category` that are neither deleted nor expired at `now`, newest first
   */
  listActiveIds(category: string, now: Date): Promise<string[]>;
}

interface JobRow extends QueryResultRow, ProfileColumns, GeoColumns, EmbeddingColumns {
  id: string;
  position: string;
  company_name: string;
  city: string | null;
  job_text: string | null;
  industry: string | null;
  company_size: string | null;
  employment_type: string | null;
  work_arrangement: string | null;
  classified_roles: string[];
  category: string | null;
  expires_at: Date | null;
  deleted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

// =============================================================================
// REPOSITORY
// =============================================================================

export class PgJobRepository extends PgOwnerRepository<Job, JobProfile, JobRow> implements JobRepository {
  readonly ownerKind = 'job' as const;
  protected modelName = 'Job';
  protected tableName = 'jobs';
  protected activeCondition = 't.deleted_at IS NULL';

  protected selectColumns(): string {
    return `t.id, t.position, t.company_name, t.city, t.job_text, t.industry, t.company_size,
      t.employment_type, t.work_arrangement, t.classified_roles, t.category, t.expires_at,
      t.deleted_at, t.created_at, t.updated_at, t.profile, t.profile_version,
      t.profile_extracted_at, t.embedding_generated_at, ${OWNER_COMPUTED_COLUMNS}`;
  }

  protected mapRow(row: JobRow): Job {
    return {
      kind: 'job',
      id: row.id,
      position: row.position,
      companyName: row.company_name,
      city: row.city,
      jobText: row.job_text,
      industry: row.industry,
      companySize: row.company_size,
      employmentType: row.employment_type,
      workArrangement: row.work_arrangement,
      classifiedRoles: row.classified_roles,
      category: row.category,
      coordinates: toGeoPoint(row),
      expiresAt: row.expires_at,
      deletedAt: row.deleted_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      profile: parseJobProfile(row.id, row),
      embedding: toEmbeddingStamp(row),
    };
  }

  async listActiveIds(category: string, now: Date): Promise<string[]> {
    const rows = await this.query<{ id: string }>(
      `SELECT t.id FROM jobs t
       WHERE t.deleted_at IS NULL
         AND t.category = $1
         AND (t.expires_at IS NULL OR t.expires_at >= $2)
       ORDER BY t.created_at DESC`,
      [category, now]
    );
    return rows.map((row) => row.id);
  }
}
