/**
 * Audit / correlation logging.
 *
 * Every pipeline stage transition becomes one append-only `AuditRecord`
 * keyed by the request's correlation id. Records are written to the
 * query_audit_log table, falling back to console output if the DB write
 * fails. Audit failures never propagate to the caller.
 */

import type { Pool } from 'pg';

import type { AuditRecord, AuditStage } from '../../shared/types';
import { executeReadOnly, getPool } from '../db/pool';
import { logger } from '../lib/logger';

export interface AuditSink {
  write(record: AuditRecord): Promise<void>;
}

export type AuditFields = Partial<Pick<AuditRecord, 'attempt' | 'sql' | 'detail' | 'rowCount' | 'durationMs'>>;

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

const INSERT_SQL = `
  INSERT INTO query_audit_log (correlation_id, sequence, stage, attempt, recorded_at, sql_text, detail, row_count, duration_ms)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
`;

export class PgAuditSink implements AuditSink {
  constructor(private readonly pool: Pool) {}

  async write(record: AuditRecord): Promise<void> {
    await this.pool.query(INSERT_SQL, [
      record.correlationId,
      record.sequence,
      record.stage,
      record.attempt,
      record.timestamp,
      record.sql ?? null,
      record.detail ?? null,
      record.rowCount ?? null,
      record.durationMs ?? null,
    ]);
  }
}

export class ConsoleAuditSink implements AuditSink {
  async write(record: AuditRecord): Promise<void> {
    console.log('[AUDIT]', JSON.stringify(record));
  }
}

export function createAuditSink(kind: 'database' | 'console', pool?: Pool): AuditSink {
  return kind === 'database' ? new PgAuditSink(pool ?? getPool()) : new ConsoleAuditSink();
}

async function writeWithFallback(sink: AuditSink, record: AuditRecord): Promise<void> {
  try {
    await sink.write(record);
  } catch (error) {
    // Fallback: log to console so audit data is never silently lost
    logger.warn('Failed to write audit record, falling back to console', {
      correlationId: record.correlationId,
      error: error instanceof Error ? error.message : String(error),
    });
    console.log('[AUDIT]', JSON.stringify(record));
  }
}

// ---------------------------------------------------------------------------
// Trail
// ---------------------------------------------------------------------------

/** The audit records of one request, in the order they happened. */
export class AuditTrail {
  private readonly entries: AuditRecord[] = [];
  private readonly pending = new Set<Promise<void>>();

  constructor(
    readonly correlationId: string,
    private readonly sink: AuditSink,
  ) {}

  record(stage: AuditStage, fields: AuditFields = {}): AuditRecord {
    const record: AuditRecord = Object.freeze({
      ...fields,
      correlationId: this.correlationId,
      sequence: this.entries.length + 1,
      stage,
      attempt: fields.attempt ?? 0,
      timestamp: new Date(),
    });
    this.entries.push(record);

    const write: Promise<void> = writeWithFallback(this.sink, record).finally(() => {
      this.pending.delete(write);
    });
    this.pending.add(write);
    return record;
  }

  /** Resolves once every record so far has reached the sink (or the console). */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  get records(): readonly AuditRecord[] {
    return [...this.entries];
  }
}

// ---------------------------------------------------------------------------
// Read-back
// ---------------------------------------------------------------------------

type AuditRow = {
  correlation_id: string;
  sequence: number;
  stage: AuditStage;
  attempt: number;
  recorded_at: Date;
  sql_text: string | null;
  detail: string | null;
  row_count: number | null;
  duration_ms: number | null;
};

const SELECT_SQL = `
  SELECT correlation_id, sequence, stage, attempt, recorded_at, sql_text, detail, row_count, duration_ms
  FROM query_audit_log
  WHERE correlation_id = $1
  ORDER BY sequence
`;

export async function listAuditRecords(correlationId: string, pool: Pool = getPool()): Promise<AuditRecord[]> {
  const { rows } = await executeReadOnly<AuditRow>(SELECT_SQL, [correlationId], pool);
  return rows.map((row) => ({
    correlationId: row.correlation_id,
    sequence: row.sequence,
    stage: row.stage,
    attempt: row.attempt,
    timestamp: row.recorded_at,
    ...(row.sql_text !== null && { sql: row.sql_text }),
    ...(row.detail !== null && { detail: row.detail }),
    ...(row.row_count !== null && { rowCount: row.row_count }),
    ...(row.duration_ms !== null && { durationMs: row.duration_ms }),
  }));
}
