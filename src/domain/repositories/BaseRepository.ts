/**
 * Base Repository - Common data access patterns
 *
 * Provides a consistent interface for Postgres operations. Driver failures
 * surface as ExternalServiceError(service = 'database') so batch callers can
 * record them per item.
 */

import type { QueryResultRow } from 'pg';
import { ExternalServiceError } from '../errors.js';
import type { Queryable } from '../../infrastructure/database/postgres.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Runs `fn` inside one transaction; everything `fn` writes through `tx`
 * commits together or not at all.
 */
export type TransactionRunner = <T>(fn: (tx: Queryable) => Promise<T>) => Promise<T>;

export interface CoverageCounts {
  total: number;
  covered: number;
}

// =============================================================================
// BASE REPOSITORY
// =============================================================================

export abstract class BaseRepository<TModel, TRow extends QueryResultRow> {
  protected abstract modelName: string;
  protected abstract tableName: string;

  constructor(
    protected db: Queryable,
    protected transaction: TransactionRunner
  ) {}

  /**
   * Convert a raw row into the domain model
   */
  protected abstract mapRow(row: TRow): TModel;

  /**
   * Column list used by findById and list queries
   */
  protected selectColumns(): string {
    return '*';
  }

  /**
   * Run a query, translating driver errors
   */
  protected async query<R extends QueryResultRow>(
    text: string,
    values: unknown[] = [],
    db: Queryable = this.db
  ): Promise<R[]> {
    try {
      const result = await db.query<R>(text, values);
      return result.rows;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(`${this.modelName} query failed: ${message}`, 'database', 'connection');
    }
  }

  /**
   * Run an UPDATE/DELETE and return the affected row count
   */
  protected async execute(text: string, values: unknown[] = [], db: Queryable = this.db): Promise<number> {
    try {
      const result = await db.query(text, values);
      return result.rowCount ?? 0;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(`${this.modelName} update failed: ${message}`, 'database', 'connection');
    }
  }

  /**
   * Find a single record by unique identifier
   */
  async findById(id: string): Promise<TModel | null> {
    const rows = await this.query<TRow>(
      `SELECT ${this.selectColumns()} FROM ${this.tableName} t WHERE t.id = $1`,
      [id]
    );
    return rows.length > 0 ? this.mapRow(rows[0]) : null;
  }

  /**
   * Count records matching a WHERE fragment (columns qualified with `t.`)
   */
  protected async countWhere(where: string, values: unknown[] = []): Promise<number> {
    const rows = await this.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM ${this.tableName} t WHERE ${where}`,
      values
    );
    return rows.length > 0 ? parseInt(rows[0].count, 10) : 0;
  }
}

// =============================================================================
// REPOSITORY ERROR
// =============================================================================

export type RepositoryErrorCode = 'NOT_FOUND' | 'DUPLICATE' | 'VALIDATION' | 'UNKNOWN';

export class RepositoryError extends Error {
  constructor(
    message: string,
    public code: RepositoryErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RepositoryError';
  }
}

// =============================================================================
// SQL HELPERS
// =============================================================================

/**
 * pgvector text literal, e.g. '[0.1,0.2,0.3]'
 */
export function toVectorLiteral(vector: number[]): string {
  return `[${vector.join(',')}]`;
}
