/**
 * Execution Coordinator.
 *
 * Runs statements that carry an accepted validator verdict, and nothing
 * else. Each run happens in its own read-only transaction with a statement
 * timeout, through a server-side cursor so that no more than the row cap is
 * ever sent to the client.
 *
 * Database errors come back as `ExecutionFailure` values. The raw server
 * message is kept as internal `detail`; users only see the template text.
 */

import type { Pool, PoolClient } from 'pg';

import type { AcceptedVerdict, ExecutionErrorKind, ExecutionFailure, ExecutionResult } from '../../shared/types';
import { EXECUTION_MESSAGES } from '../../shared/constants/messages';
import { RequestCancelledError, UnvalidatedStatementError, throwIfAborted } from '../errors';
import { logger } from '../lib/logger';
import { isAcceptedVerdict } from '../validators/sql-validator';

const CURSOR_NAME = 'nl2sql_result';

/** Extra time the server gets to report its own timeout before the connection is dropped. */
export const CLIENT_GRACE_MS = 2_000;

const MAX_DETAIL_LENGTH = 500;

export interface ExecutionDefaults {
  timeoutMs: number;
  rowCap: number;
  /** Pinned as search_path so unqualified names resolve as the validator assumed. */
  defaultSchema: string;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  rowCap?: number;
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

function sqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Map a PostgreSQL SQLSTATE to an execution error kind. */
export function classifyDatabaseError(error: unknown): ExecutionErrorKind {
  const code = sqlState(error);
  if (code === undefined) return 'unknown';
  switch (code) {
    case '42P01': // undefined_table
    case '3F000': // invalid_schema_name
    case '42883': // undefined_function
      return 'invalid_object';
    case '42703': // undefined_column
    case '42702': // ambiguous_column
      return 'invalid_column';
    case '57014': // query_canceled (statement_timeout)
      return 'timeout';
  }
  if (code.startsWith('42')) return 'syntax_error';
  if (code.startsWith('53') || code.startsWith('54')) return 'resource_limit';
  return 'unknown';
}

function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const code = sqlState(error);
  const text = code ? `${code}: ${message}` : message;
  return text.length > MAX_DETAIL_LENGTH ? `${text.slice(0, MAX_DETAIL_LENGTH)}...` : text;
}

function failure(kind: ExecutionErrorKind, detail: string, startedAt: number): ExecutionFailure {
  return Object.freeze({
    status: 'error',
    kind,
    message: EXECUTION_MESSAGES[kind],
    detail,
    elapsedMs: Date.now() - startedAt,
  });
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export class ExecutionCoordinator {
  constructor(
    private readonly pool: Pool,
    private readonly defaults: ExecutionDefaults,
  ) {}

  async execute(verdict: AcceptedVerdict, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    if (!isAcceptedVerdict(verdict)) {
      throw new UnvalidatedStatementError();
    }
    throwIfAborted(options.signal);

    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
    const rowCap = options.rowCap ?? this.defaults.rowCap;
    const startedAt = Date.now();

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      return failure('unknown', `connection failed: ${describeError(error)}`, startedAt);
    }

    const state: { dropped: 'timeout' | 'cancelled' | null; released: boolean } = {
      dropped: null,
      released: false,
    };
    const drop = (why: 'timeout' | 'cancelled') => {
      if (state.released) return;
      state.dropped = why;
      state.released = true;
      // Releasing with an error destroys the connection instead of pooling it.
      client.release(new Error(`connection dropped: ${why}`));
    };
    const guard = setTimeout(() => drop('timeout'), timeoutMs + CLIENT_GRACE_MS);
    const onAbort = () => drop('cancelled');
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await client.query('BEGIN TRANSACTION READ ONLY');
      await client.query('SELECT set_config($1, $2, true)', ['statement_timeout', `${timeoutMs}ms`]);
      await client.query('SELECT set_config($1, $2, true)', ['search_path', this.defaults.defaultSchema]);
      await client.query(`DECLARE ${CURSOR_NAME} NO SCROLL CURSOR FOR\n${verdict.sql}\n`);
      // One row past the cap tells a cut result from one that fits exactly.
      const result = await client.query<Record<string, unknown>>(`FETCH FORWARD ${rowCap + 1} FROM ${CURSOR_NAME}`);
      await client.query('COMMIT');

      const rows = result.rows.slice(0, rowCap);
      return Object.freeze({
        status: 'rows',
        columns: result.fields.map((field) => field.name),
        rows,
        rowCount: rows.length,
        elapsedMs: Date.now() - startedAt,
        truncated: result.rows.length > rowCap,
      });
    } catch (error) {
      if (state.dropped === 'cancelled' || options.signal?.aborted) {
        throw new RequestCancelledError();
      }
      if (state.dropped === 'timeout') {
        return failure('timeout', `no response within ${timeoutMs + CLIENT_GRACE_MS}ms; connection dropped`, startedAt);
      }
      await this.rollback(client);
      return failure(classifyDatabaseError(error), describeError(error), startedAt);
    } finally {
      clearTimeout(guard);
      options.signal?.removeEventListener('abort', onAbort);
      if (!state.released) {
        state.released = true;
        client.release();
      }
    }
  }

  private async rollback(client: PoolClient): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (error) {
      logger.warn('ROLLBACK failed', { error: describeError(error) });
    }
  }
}
