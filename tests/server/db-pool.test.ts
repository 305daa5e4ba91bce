import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockPool, mockPoolCtor } = vi.hoisted(() => {
  const mockPool = {
    query: vi.fn(),
    end: vi.fn(),
  };
  return { mockPool, mockPoolCtor: vi.fn() };
});

vi.mock('pg', () => ({
  Pool: function (options: unknown) {
    mockPoolCtor(options);
    return mockPool;
  },
}));

import { closePool, createPool, executeReadOnly, getPool, healthCheck } from '../../src/server/db/pool';

beforeEach(async () => {
  await closePool();
  vi.clearAllMocks();
  mockPool.end.mockResolvedValue(undefined);
});

describe('createPool', () => {
  it('should build a pool from the database settings', () => {
    createPool({
      host: 'db',
      port: 5433,
      user: 'reader',
      password: 'test-secret',
      database: 'shop',
      poolMax: 3,
      defaultSchema: 'public',
    });

    expect(mockPoolCtor).toHaveBeenCalledWith({
      host: 'db',
      port: 5433,
      user: 'reader',
      password: 'test-secret',
      database: 'shop',
      min: 0,
      max: 3,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'nl2sql',
    });
  });
});

describe('getPool', () => {
  it('should create the shared pool once', () => {
    const first = getPool();
    expect(getPool()).toBe(first);
    expect(mockPoolCtor).toHaveBeenCalledTimes(1);
  });

  it('should create a new pool after closePool()', async () => {
    getPool();
    await closePool();
    expect(mockPool.end).toHaveBeenCalledOnce();

    getPool();
    expect(mockPoolCtor).toHaveBeenCalledTimes(2);
  });
});

describe('executeReadOnly', () => {
  it('should run a parameterised query on the shared pool', async () => {
    const mockRows = [{ stage: 'succeeded' }];
    mockPool.query.mockResolvedValueOnce({ rows: mockRows, rowCount: 1 });

    const result = await executeReadOnly('SELECT stage FROM query_audit_log WHERE correlation_id = $1', ['req-1']);

    expect(result).toEqual({ rows: mockRows, rowCount: 1 });
    expect(mockPool.query).toHaveBeenCalledWith('SELECT stage FROM query_audit_log WHERE correlation_id = $1', [
      'req-1',
    ]);
  });

  it('should default rowCount to 0 when null', async () => {
    mockPool.query.mockResolvedValueOnce({ rows: [], rowCount: null });

    const result = await executeReadOnly('SELECT 1');
    expect(result.rowCount).toBe(0);
    expect(mockPool.query).toHaveBeenCalledWith('SELECT 1', []);
  });
});

describe('healthCheck', () => {
  it('should return true when the pool is healthy', async () => {
    mockPool.query.mockResolvedValueOnce({ rows: [{ '?column?': 1 }] });

    expect(await healthCheck()).toBe(true);
    expect(mockPool.query).toHaveBeenCalledWith('SELECT 1');
  });

  it('should return false when the pool is unreachable', async () => {
    mockPool.query.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    expect(await healthCheck()).toBe(false);
  });
});
