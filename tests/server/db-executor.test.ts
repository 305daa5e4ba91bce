import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockClient, mockPool } = vi.hoisted(() => {
  const mockClient = {
    query: vi.fn(),
    release: vi.fn(),
  };
  const mockPool = {
    connect: vi.fn(),
  };
  return { mockClient, mockPool };
});

vi.mock('pg', () => ({
  Pool: function () { return mockPool; },
}));

import { Pool } from 'pg';

import type { AcceptedVerdict } from '../../src/shared/types';
import { EXECUTION_MESSAGES } from '../../src/shared/constants/messages';
import { loadConfig } from '../../src/server/config';
import { CLIENT_GRACE_MS, ExecutionCoordinator, classifyDatabaseError } from '../../src/server/db/executor';
import { RequestCancelledError, UnvalidatedStatementError } from '../../src/server/errors';
import { buildSchemaCatalog } from '../../src/server/schema';
import { validateSql } from '../../src/server/validators/sql-validator';

const { rules } = buildSchemaCatalog(loadConfig({}));

async function accepted(sql: string): Promise<AcceptedVerdict> {
  const verdict = await validateSql(sql, rules);
  if (verdict.status !== 'accepted') throw new Error(`fixture rejected: ${verdict.detail}`);
  return verdict;
}

const COUNT_SQL = 'SELECT count(*) FROM sales.customer';

function coordinator(): ExecutionCoordinator {
  return new ExecutionCoordinator(new Pool(), { timeoutMs: 10_000, rowCap: 5000, defaultSchema: 'public' });
}

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

/** Queues the four statements that run before FETCH. */
function preamble() {
  mockClient.query
    .mockResolvedValueOnce(undefined) // BEGIN
    .mockResolvedValueOnce(undefined) // statement_timeout
    .mockResolvedValueOnce(undefined) // search_path
    .mockResolvedValueOnce(undefined); // DECLARE
}

beforeEach(() => {
  vi.clearAllMocks();
  mockClient.query.mockReset();
  mockClient.release.mockReset();
  mockPool.connect.mockResolvedValue(mockClient);
});

describe('ExecutionCoordinator', () => {
  it('should run the statement through a cursor in a read-only transaction', async () => {
    preamble();
    mockClient.query
      .mockResolvedValueOnce({ rows: [{ count: '42' }], fields: [{ name: 'count' }] }) // FETCH
      .mockResolvedValueOnce(undefined); // COMMIT

    const result = await coordinator().execute(await accepted(COUNT_SQL));

    expect(result).toEqual({
      status: 'rows',
      columns: ['count'],
      rows: [{ count: '42' }],
      rowCount: 1,
      elapsedMs: expect.any(Number),
      truncated: false,
    });
    expect(mockClient.query.mock.calls).toEqual([
      ['BEGIN TRANSACTION READ ONLY'],
      ['SELECT set_config($1, $2, true)', ['statement_timeout', '10000ms']],
      ['SELECT set_config($1, $2, true)', ['search_path', 'public']],
      [`DECLARE nl2sql_result NO SCROLL CURSOR FOR\n${COUNT_SQL}\n`],
      ['FETCH FORWARD 5001 FROM nl2sql_result'],
      ['COMMIT'],
    ]);
    expect(mockClient.release).toHaveBeenCalledOnce();
    expect(mockClient.release).toHaveBeenCalledWith();
  });

  it('should honour per-call limits and flag a result cut at the row cap', async () => {
    preamble();
    mockClient.query
      .mockResolvedValueOnce({ rows: [{ id: 1 }, { id: 2 }, { id: 3 }], fields: [{ name: 'id' }] })
      .mockResolvedValueOnce(undefined);

    const result = await coordinator().execute(await accepted(COUNT_SQL), { rowCap: 2, timeoutMs: 500 });

    expect(result).toMatchObject({ status: 'rows', rows: [{ id: 1 }, { id: 2 }], rowCount: 2, truncated: true });
    expect(mockClient.query).toHaveBeenCalledWith('SELECT set_config($1, $2, true)', ['statement_timeout', '500ms']);
    expect(mockClient.query).toHaveBeenCalledWith('FETCH FORWARD 3 FROM nl2sql_result');
  });

  it('should not flag a result that fills the row cap exactly', async () => {
    preamble();
    mockClient.query
      .mockResolvedValueOnce({ rows: [{ id: 1 }, { id: 2 }], fields: [{ name: 'id' }] })
      .mockResolvedValueOnce(undefined);

    const result = await coordinator().execute(await accepted(COUNT_SQL), { rowCap: 2 });

    expect(result).toMatchObject({ status: 'rows', rows: [{ id: 1 }, { id: 2 }], rowCount: 2, truncated: false });
  });

  it('should refuse anything but a validator-issued verdict', async () => {
    const forged: AcceptedVerdict = { status: 'accepted', sql: 'DROP TABLE sales.customer', objects: [] };

    await expect(coordinator().execute(forged)).rejects.toBeInstanceOf(UnvalidatedStatementError);
    expect(mockPool.connect).not.toHaveBeenCalled();
  });

  it('should roll back and classify database errors', async () => {
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(pgError('42P01', 'relation "sales.nope" does not exist'))
      .mockResolvedValueOnce(undefined); // ROLLBACK

    const result = await coordinator().execute(await accepted(COUNT_SQL));

    expect(result).toEqual({
      status: 'error',
      kind: 'invalid_object',
      message: EXECUTION_MESSAGES.invalid_object,
      detail: '42P01: relation "sales.nope" does not exist',
      elapsedMs: expect.any(Number),
    });
    expect(mockClient.query).toHaveBeenLastCalledWith('ROLLBACK');
    expect(mockClient.release).toHaveBeenCalledOnce();
  });

  it('should still return the failure when ROLLBACK fails', async () => {
    mockClient.query
      .mockRejectedValueOnce(pgError('57014', 'canceling statement due to statement timeout'))
      .mockRejectedValueOnce(new Error('connection lost'));

    const result = await coordinator().execute(await accepted(COUNT_SQL));

    expect(result).toMatchObject({ status: 'error', kind: 'timeout', message: EXECUTION_MESSAGES.timeout });
    expect(mockClient.release).toHaveBeenCalledOnce();
  });

  it('should report a failed connection as unknown', async () => {
    mockPool.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    const result = await coordinator().execute(await accepted(COUNT_SQL));

    expect(result).toMatchObject({ status: 'error', kind: 'unknown', detail: 'connection failed: ECONNREFUSED' });
  });

  it('should destroy the connection and throw when the caller aborts', async () => {
    const controller = new AbortController();
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockImplementationOnce(
        () =>
          new Promise((_, reject) => {
            controller.signal.addEventListener('abort', () => reject(new Error('Connection terminated')));
          }),
      );

    const pending = coordinator().execute(await accepted(COUNT_SQL), { signal: controller.signal });
    await vi.waitFor(() => expect(mockClient.query).toHaveBeenCalledTimes(4));
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
    expect(mockClient.release).toHaveBeenCalledOnce();
    expect(mockClient.release).toHaveBeenCalledWith(new Error('connection dropped: cancelled'));
  });

  it('should drop the connection when the server does not answer in time', async () => {
    let rejectPending: (error: Error) => void = () => {};
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockImplementationOnce(
        () =>
          new Promise((_, reject) => {
            rejectPending = reject;
          }),
      );
    mockClient.release.mockImplementation((error?: Error) => {
      if (error) rejectPending(error);
    });

    const result = await coordinator().execute(await accepted(COUNT_SQL), { timeoutMs: 10 });

    expect(result).toMatchObject({
      status: 'error',
      kind: 'timeout',
      detail: `no response within ${10 + CLIENT_GRACE_MS}ms; connection dropped`,
    });
    expect(mockClient.release).toHaveBeenCalledOnce();
    expect(mockClient.query).not.toHaveBeenCalledWith('ROLLBACK');
  });
});

describe('classifyDatabaseError', () => {
  it.each([
    ['42P01', 'invalid_object'],
    ['3F000', 'invalid_object'],
    ['42883', 'invalid_object'],
    ['42703', 'invalid_column'],
    ['42702', 'invalid_column'],
    ['57014', 'timeout'],
    ['42601', 'syntax_error'],
    ['53200', 'resource_limit'],
    ['54001', 'resource_limit'],
    ['08006', 'unknown'],
  ])('should map SQLSTATE %s to %s', (code, kind) => {
    expect(classifyDatabaseError(pgError(code, 'message'))).toBe(kind);
  });

  it('should treat errors without a SQLSTATE as unknown', () => {
    expect(classifyDatabaseError(new Error('socket hang up'))).toBe('unknown');
    expect(classifyDatabaseError('not an error')).toBe('unknown');
  });
});
