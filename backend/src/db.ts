/**
 * Economy Database Client v1.0.0
 *
 * node-postgres pool wrapper. The pool is created on first use so that
 * modules importing `db` (and tests that run against the in-memory store)
 * never need DATABASE_URL.
 *
 * @see backend/database/schema.sql
 */

import pg from 'pg';
import type { QueryResultRow } from 'pg';
import { config } from './config';
import { dbLogger } from './logger';

// ============================================================================
// CONNECTION POOL
// ============================================================================

// BIGINT balances come back as numbers; every XP figure stays far below 2^53.
pg.types.setTypeParser(pg.types.builtins.INT8, (value) => parseInt(value, 10));

let pool: pg.Pool | null = null;

function getPool(): pg.Pool {
  if (pool) return pool;

  if (!config.database.url) {
    throw new Error('DATABASE_URL environment variable is not set');
  }

  pool = new pg.Pool({
    connectionString: config.database.url,
    max: config.database.maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on('error', (err) => {
    dbLogger.error({ err }, 'Idle client error');
  });

  dbLogger.info({ max: config.database.maxConnections }, 'Database pool initialized');
  return pool;
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export interface DatabaseError extends Error {
  code?: string;
  constraint?: string;
  detail?: string;
  table?: string;
}

function pgCode(error: unknown): string | null {
  if (!(error instanceof Error) || !('code' in error)) return null;
  return typeof error.code === 'string' ? error.code : null;
}

/**
 * Unique constraint violation (duplicate purchase, replayed request id).
 */
export function isUniqueViolation(error: unknown): error is DatabaseError {
  return pgCode(error) === '23505';
}

/**
 * Lock wait exceeded lock_timeout (55P03), serialization failure (40001)
 * or deadlock (40P01). All three are safe to retry.
 */
export function isLockConflict(error: unknown): error is DatabaseError {
  const code = pgCode(error);
  return code === '55P03' || code === '40001' || code === '40P01';
}

/**
 * The append-only trigger on xp_transactions raises XP001.
 */
export function isLedgerImmutabilityViolation(error: unknown): error is DatabaseError {
  return pgCode(error) === 'XP001';
}

// ============================================================================
// QUERY INTERFACE
// ============================================================================

export interface QueryResult<T> {
  rows: T[];
  rowCount: number;
}

export type QueryFn = <T extends QueryResultRow = QueryResultRow>(
  sql: string,
  params?: unknown[]
) => Promise<QueryResult<T>>;

function bindQuery(client: pg.PoolClient): QueryFn {
  return async <T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) => {
    const result = await client.query<T>(sql, params);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  };
}

export const db = {
  /**
   * Execute a SQL query
   */
  query: async <T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> => {
    const result = await getPool().query<T>(sql, params);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  },

  /**
   * Execute queries within a transaction
   */
  transaction: async <T>(fn: (query: QueryFn) => Promise<T>): Promise<T> => {
    const client = await getPool().connect();
    try {
      await client.query('BEGIN');
      const result = await fn(bindQuery(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        dbLogger.error({ originalError: error, rollbackError }, 'ROLLBACK failed - original error may be lost');
      }
      throw error;
    } finally {
      client.release();
    }
  },

  healthCheck: async (): Promise<{ connected: boolean; latencyMs: number }> => {
    const start = Date.now();
    try {
      await db.query('SELECT 1');
      return { connected: true, latencyMs: Date.now() - start };
    } catch (error) {
      dbLogger.warn({ err: error }, 'Database health check failed');
      return { connected: false, latencyMs: Date.now() - start };
    }
  },

  /**
   * Close all connections (for graceful shutdown)
   */
  close: async () => {
    if (!pool) return;
    await pool.end();
    pool = null;
    dbLogger.info('Database pool closed');
  },
};

export type Database = typeof db;

export default db;
