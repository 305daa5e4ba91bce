/**
 * Database connection pool.
 *
 * One `pg` Pool per process, created lazily from configuration. Generated
 * SQL never goes through the helpers here; it is run by the execution
 * coordinator, which takes a client from this pool.
 */

import { Pool, type QueryResultRow } from 'pg';

import { getConfig, type PipelineConfig } from '../config';
import { logger } from '../lib/logger';

// ---------------------------------------------------------------------------
// Pool initialisation
// ---------------------------------------------------------------------------

export function createPool(database: PipelineConfig['database']): Pool {
  return new Pool({
    host: database.host,
    port: database.port,
    user: database.user,
    password: database.password,
    database: database.database,
    min: 0,
    max: database.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: 'nl2sql',
  });
}

let pool: Pool | null = null;

/** The process-wide pool, created on first use. */
export function getPool(): Pool {
  if (!pool) {
    pool = createPool(getConfig().database);
  }
  return pool;
}

/** Close the shared pool (shutdown, tests). */
export async function closePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
  }
}

// ---------------------------------------------------------------------------
// Trusted queries
// ---------------------------------------------------------------------------

/**
 * Run a fixed, parameterised read query written by this codebase (audit
 * lookups, health checks). Never pass generated SQL here.
 */
export async function executeReadOnly<T extends QueryResultRow = Record<string, unknown>>(
  sql: string,
  params: unknown[] = [],
  target: Pool = getPool(),
): Promise<{ rows: T[]; rowCount: number }> {
  const result = await target.query<T>(sql, params);
  return { rows: result.rows, rowCount: result.rowCount ?? 0 };
}

// ---------------------------------------------------------------------------
// Health check
// ---------------------------------------------------------------------------

/**
 * Lightweight connectivity check.
 *
 * Returns `true` if the pool can successfully execute a trivial query,
 * `false` otherwise. Safe to call from readiness checks.
 */
export async function healthCheck(target: Pool = getPool()): Promise<boolean> {
  try {
    await target.query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn('Database health check failed', { error: error instanceof Error ? error.message : String(error) });
    return false;
  }
}
