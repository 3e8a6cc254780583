/**
 * Postgres Pool - database access for the matching stores
 *
 * Requires the pgvector and PostGIS extensions (see schema.sql).
 */

import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import { getConfig } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('database');

// =============================================================================
// QUERYABLE
// =============================================================================

/**
 * Anything that runs parameterized SQL: the pool, a checked-out client
 * inside a transaction, or a test double.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

function asQueryable(client: Pool | PoolClient): Queryable {
  return {
    query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
      client.query<R>(text, values),
  };
}

// =============================================================================
// LAZY INITIALIZATION
// We use lazy initialization to ensure DATABASE_URL is available from dotenv
// =============================================================================

let poolInstance: Pool | null = null;

export function getPool(): Pool {
  if (!poolInstance) {
    const connectionString = getConfig().database.url;
    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is not set');
    }
    poolInstance = new Pool({ connectionString, max: 10 });
    poolInstance.on('error', (error) => {
      logger.error({ err: error }, 'Idle database client error');
    });
  }
  return poolInstance;
}

/**
 * Pool-backed Queryable for repositories
 */
export function getDatabase(): Queryable {
  return asQueryable(getPool());
}

// =============================================================================
// CONNECTION MANAGEMENT
// =============================================================================

export async function connectDatabase(): Promise<void> {
  const client = await getPool().connect();
  client.release();
  logger.info('Database connected');
}

export async function disconnectDatabase(): Promise<void> {
  if (poolInstance) {
    await poolInstance.end();
    poolInstance = null;
  }
  logger.info('Database disconnected');
}

// =============================================================================
// TRANSACTIONS
// =============================================================================

export async function withTransaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(asQueryable(client));
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

// =============================================================================
// HEALTH CHECK
// =============================================================================

export async function checkDatabaseHealth(): Promise<boolean> {
  try {
    await getPool().query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn({ err: error }, 'Database health check failed');
    return false;
  }
}
