import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockPoolQuery } = vi.hoisted(() => ({
  mockPoolQuery: vi.fn(),
}));

vi.mock('pg', () => ({
  Pool: function () { return { query: mockPoolQuery }; },
}));

import { Pool } from 'pg';

import type { AuditRecord } from '../../src/shared/types';
import {
  AuditTrail,
  ConsoleAuditSink,
  PgAuditSink,
  createAuditSink,
  listAuditRecords,
  type AuditSink,
} from '../../src/server/middleware/audit';

class MemorySink implements AuditSink {
  readonly written: AuditRecord[] = [];

  async write(record: AuditRecord): Promise<void> {
    this.written.push(record);
  }
}

const failingSink: AuditSink = {
  write: async () => Promise.reject(new Error('connection refused')),
};

describe('AuditTrail', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    mockPoolQuery.mockReset();
  });

  it('should number records in order and stamp the correlation id', async () => {
    const sink = new MemorySink();
    const trail = new AuditTrail('req-1', sink);

    trail.record('request_received', { detail: 'question: how many customers?' });
    const generated = trail.record('generated', { attempt: 1, sql: 'SELECT count(*) FROM sales.customer' });
    await trail.flush();

    expect(generated).toEqual({
      correlationId: 'req-1',
      sequence: 2,
      stage: 'generated',
      attempt: 1,
      sql: 'SELECT count(*) FROM sales.customer',
      timestamp: expect.any(Date),
    });
    expect(Object.isFrozen(generated)).toBe(true);
    expect(trail.records.map((r) => [r.sequence, r.stage, r.attempt])).toEqual([
      [1, 'request_received', 0],
      [2, 'generated', 1],
    ]);
    expect(sink.written).toEqual(trail.records);
  });

  it('should hand out copies of its records', () => {
    const trail = new AuditTrail('req-2', new MemorySink());
    trail.record('request_received');
    const snapshot = trail.records;
    trail.record('cancelled');
    expect(snapshot).toHaveLength(1);
  });

  it('should fall back to console output when the sink fails', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const trail = new AuditTrail('req-3', failingSink);

    const record = trail.record('exhausted', { attempt: 3, detail: 'validation: Statement is empty' });
    await trail.flush();

    expect(warnSpy).toHaveBeenCalledWith('[nl2sql] Failed to write audit record, falling back to console', {
      correlationId: 'req-3',
      error: 'connection refused',
    });
    expect(consoleSpy).toHaveBeenCalledWith('[AUDIT]', JSON.stringify(record));
  });
});

describe('PgAuditSink', () => {
  beforeEach(() => {
    mockPoolQuery.mockReset();
  });

  it('should insert one row per record with nulls for absent fields', async () => {
    mockPoolQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    const timestamp = new Date('2026-01-01T00:00:00Z');

    await new PgAuditSink(new Pool()).write({
      correlationId: 'req-4',
      sequence: 3,
      stage: 'executed',
      attempt: 1,
      timestamp,
      sql: 'SELECT 1',
      rowCount: 1,
      durationMs: 12,
    });

    expect(mockPoolQuery).toHaveBeenCalledOnce();
    expect(mockPoolQuery).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO query_audit_log'), [
      'req-4',
      3,
      'executed',
      1,
      timestamp,
      'SELECT 1',
      null,
      1,
      12,
    ]);
  });
});

describe('createAuditSink', () => {
  it('should build the sink named by configuration', () => {
    expect(createAuditSink('console')).toBeInstanceOf(ConsoleAuditSink);
    expect(createAuditSink('database', new Pool())).toBeInstanceOf(PgAuditSink);
  });
});

describe('listAuditRecords', () => {
  beforeEach(() => {
    mockPoolQuery.mockReset();
  });

  it('should map rows back to records and omit null columns', async () => {
    const recordedAt = new Date('2026-01-01T00:00:00Z');
    mockPoolQuery.mockResolvedValueOnce({
      rows: [
        {
          correlation_id: 'req-5',
          sequence: 1,
          stage: 'request_received',
          attempt: 0,
          recorded_at: recordedAt,
          sql_text: null,
          detail: 'question: top products',
          row_count: null,
          duration_ms: null,
        },
        {
          correlation_id: 'req-5',
          sequence: 2,
          stage: 'executed',
          attempt: 1,
          recorded_at: recordedAt,
          sql_text: 'SELECT 1',
          detail: null,
          row_count: 1,
          duration_ms: 7,
        },
      ],
      rowCount: 2,
    });

    const records = await listAuditRecords('req-5', new Pool());

    expect(records).toEqual([
      { correlationId: 'req-5', sequence: 1, stage: 'request_received', attempt: 0, timestamp: recordedAt, detail: 'question: top products' },
      { correlationId: 'req-5', sequence: 2, stage: 'executed', attempt: 1, timestamp: recordedAt, sql: 'SELECT 1', rowCount: 1, durationMs: 7 },
    ]);
    expect(mockPoolQuery).toHaveBeenCalledWith(expect.stringContaining('WHERE correlation_id = $1'), ['req-5']);
  });
});
