/**
 * Owner Repository - profile and embedding columns shared by candidates and jobs
 *
 * The matching engine writes only the profile_* and embedding_* columns of an
 * owner row. Everything else on the row belongs to the CRUD surface.
 */

import type { QueryResultRow } from 'pg';
import type { EmbeddingRecord } from '../entities/Embedding.js';
import {
  PROFILE_SCHEMA_VERSION,
  type OwnerKind,
  type Profile,
  type ReextractionPolicy,
} from '../entities/Profile.js';
import { BaseRepository, toVectorLiteral, type CoverageCounts } from './BaseRepository.js';
import { serializeProfile } from './rows.js';

// =============================================================================
// PORT
// =============================================================================

export interface ProfileQueueOptions {
  category?: string;
  limit?: number;
  /** Every active owner, whatever its cache state */
  force?: boolean;
  policy: ReextractionPolicy;
}

export interface EmbeddingQueueOptions {
  category?: string;
  limit?: number;
}

export interface OwnerRepository<TOwner, TProfile extends Profile> {
  readonly ownerKind: OwnerKind;

  findById(id: string): Promise<TOwner | null>;

  /**
   * Active owners whose profile cache entry needs (re)building, oldest first
   */
  listIdsNeedingProfile(options: ProfileQueueOptions): Promise<string[]>;

  /**
   * Writes all profiles in one transaction
   */
  saveProfiles(profiles: TProfile[]): Promise<void>;

  /**
   * Active owners without a vector, newest first
   */
  listIdsMissingEmbedding(options: EmbeddingQueueOptions): Promise<string[]>;

  /**
   * Writes all vectors in one transaction
   */
  saveEmbeddings(records: EmbeddingRecord[]): Promise<void>;

  profileCoverage(): Promise<CoverageCounts>;

  embeddingCoverage(category?: string): Promise<CoverageCounts>;
}

// =============================================================================
// POSTGRES IMPLEMENTATION
// =============================================================================

export abstract class PgOwnerRepository<TOwner, TProfile extends Profile, TRow extends QueryResultRow>
  extends BaseRepository<TOwner, TRow>
  implements OwnerRepository<TOwner, TProfile>
{
  abstract readonly ownerKind: OwnerKind;

  /**
   * WHERE fragment selecting rows the engine may touch (table aliased `t`)
   */
  protected abstract activeCondition: string;

  async listIdsNeedingProfile(options: ProfileQueueOptions): Promise<string[]> {
    const conditions = [this.activeCondition];
    const values: unknown[] = [];

    if (options.category) {
      values.push(options.category);
      conditions.push(`t.category = $${values.length}`);
    }
    if (!options.force) {
      if (options.policy === 'on_owner_change') {
        values.push(PROFILE_SCHEMA_VERSION);
        conditions.push(
          `(t.profile_extracted_at IS NULL OR t.profile_version IS DISTINCT FROM $${values.length} OR t.updated_at > t.profile_extracted_at)`
        );
      } else {
        conditions.push('t.profile_extracted_at IS NULL');
      }
    }

    let sql = `SELECT t.id FROM ${this.tableName} t WHERE ${conditions.join(' AND ')} ORDER BY t.created_at ASC`;
    if (options.limit !== undefined) {
      values.push(options.limit);
      sql += ` LIMIT $${values.length}`;
    }

    const rows = await this.query<{ id: string }>(sql, values);
    return rows.map((row) => row.id);
  }

  async saveProfiles(profiles: TProfile[]): Promise<void> {
    if (profiles.length === 0) {
      return;
    }
    await this.transaction(async (tx) => {
      for (const profile of profiles) {
        await this.execute(
          `UPDATE ${this.tableName}
           SET profile = $2::jsonb, profile_version = $3, profile_extracted_at = $4
           WHERE id = $1`,
          [profile.ownerId, serializeProfile(profile), profile.version, profile.extractedAt],
          tx
        );
      }
    });
  }

  async listIdsMissingEmbedding(options: EmbeddingQueueOptions): Promise<string[]> {
    const conditions = [this.activeCondition, 't.embedding IS NULL'];
    const values: unknown[] = [];

    if (options.category) {
      values.push(options.category);
      conditions.push(`t.category = $${values.length}`);
    }

    let sql = `SELECT t.id FROM ${this.tableName} t WHERE ${conditions.join(' AND ')} ORDER BY t.created_at DESC`;
    if (options.limit !== undefined) {
      values.push(options.limit);
      sql += ` LIMIT $${values.length}`;
    }

    const rows = await this.query<{ id: string }>(sql, values);
    return rows.map((row) => row.id);
  }

  async saveEmbeddings(records: EmbeddingRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    await this.transaction(async (tx) => {
      for (const record of records) {
        await this.execute(
          `UPDATE ${this.tableName}
           SET embedding = $2::vector, embedding_generated_at = $3
           WHERE id = $1`,
          [record.ownerId, toVectorLiteral(record.vector), record.generatedAt],
          tx
        );
      }
    });
  }

  async profileCoverage(): Promise<CoverageCounts> {
    return this.coverage('t.profile_extracted_at');
  }

  async embeddingCoverage(category?: string): Promise<CoverageCounts> {
    return this.coverage('t.embedding_generated_at', category);
  }

  private async coverage(column: string, category?: string): Promise<CoverageCounts> {
    const conditions = [this.activeCondition];
    const values: unknown[] = [];
    if (category) {
      values.push(category);
      conditions.push(`t.category = $${values.length}`);
    }

    const rows = await this.query<{ total: number; covered: number }>(
      `SELECT COUNT(*)::int AS total, COUNT(${column})::int AS covered
       FROM ${this.tableName} t
       WHERE ${conditions.join(' AND ')}`,
      values
    );
    return rows.length > 0 ? { total: rows[0].total, covered: rows[0].covered } : { total: 0, covered: 0 };
  }
}
