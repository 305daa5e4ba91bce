import { describe, it, expect, vi, beforeEach } from 'vitest';

import type { AuditRecord, ExecutionResult, RowsResult } from '../../src/shared/types';
import {
  createPipeline,
  getPipeline,
  isPipelineFailure,
  resetPipeline,
} from '../../src/server/agents/nl2sql-agent';
import type { StatementExecutor } from '../../src/server/agents/repair-loop';
import { loadConfig } from '../../src/server/config';
import type { LLMCompletionRequest, LLMProvider } from '../../src/server/llm/types';
import type { AuditSink } from '../../src/server/middleware/audit';

const config = loadConfig({});

const UNORDERED_TOP_PRODUCTS =
  'SELECT product_id, sales_amount FROM sales.v_product_sales ORDER BY sales_amount DESC LIMIT 10';
const TOP_PRODUCTS = `${UNORDERED_TOP_PRODUCTS.replace(' LIMIT 10', '')}, product_id LIMIT 10`;

const ROWS: RowsResult = {
  status: 'rows',
  columns: ['product_id', 'sales_amount'],
  rows: [{ product_id: 7, sales_amount: '1200.00' }],
  rowCount: 1,
  elapsedMs: 5,
  truncated: false,
};

class MemorySink implements AuditSink {
  readonly written: AuditRecord[] = [];

  async write(record: AuditRecord): Promise<void> {
    this.written.push(record);
  }
}

function scriptedProvider(answers: string[]) {
  const requests: LLMCompletionRequest[] = [];
  const complete = vi.fn(async (request: LLMCompletionRequest) => {
    requests.push(request);
    const sql = answers[Math.min(requests.length, answers.length) - 1];
    return { text: JSON.stringify({ sql }), model: 'test-model' };
  });
  const provider: LLMProvider = { name: 'fake', complete };
  return { provider, complete, requests };
}

function stubExecutor() {
  const execute = vi.fn(async (): Promise<ExecutionResult> => ROWS);
  const executor: StatementExecutor = { execute };
  return { executor, execute };
}

function build(answers: string[]) {
  const llm = scriptedProvider(answers);
  const exec = stubExecutor();
  const sink = new MemorySink();
  const pipeline = createPipeline(config, { provider: llm.provider, executor: exec.executor, auditSink: sink });
  return { pipeline, sink, ...llm, ...exec };
}

describe('Nl2SqlPipeline', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  describe('generateAndExecute', () => {
    it('should repair a missing tiebreaker and return the rows', async () => {
      const { pipeline, sink, requests, execute } = build([UNORDERED_TOP_PRODUCTS, TOP_PRODUCTS]);

      const response = await pipeline.generateAndExecute('Top 10 products by sales', { correlationId: 'req-42' });

      expect(response).toEqual({
        sql: TOP_PRODUCTS,
        columns: ['product_id', 'sales_amount'],
        rows: [{ product_id: 7, sales_amount: '1200.00' }],
        correlationId: 'req-42',
        page: 1,
        pageSize: 20,
        meta: {
          attempts: 2,
          rowCount: 1,
          truncated: false,
          hasMore: false,
          executionTimeMs: 5,
          totalTimeMs: expect.any(Number),
        },
      });
      expect(execute).toHaveBeenCalledTimes(1);

      expect(requests).toHaveLength(2);
      expect(requests[1].userMessage).toContain(`1. This SQL failed validation: ${UNORDERED_TOP_PRODUCTS}`);
      expect(requests[1].userMessage).toContain(
        '   Problem: ORDER BY sales_amount does not cover a primary key, unique key or all GROUP BY columns',
      );

      expect(sink.written.map((r) => r.stage)).toEqual([
        'request_received',
        'generated',
        'validation_rejected',
        'repair_scheduled',
        'generated',
        'validation_accepted',
        'executed',
        'succeeded',
      ]);
      expect(sink.written.every((r) => r.correlationId === 'req-42')).toBe(true);
      expect(sink.written.map((r) => r.sequence)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    });

    it('should give up after three attempts with a template message', async () => {
      const { pipeline, complete, execute } = build(['SELECT name FROM production.product LIMIT 10']);

      const response = await pipeline.generateAndExecute('list product names', { correlationId: 'req-43' });

      expect(response).toEqual({
        error: {
          kind: 'exhausted_retries',
          message:
            'The query could not be completed after 3 attempts. Last problem: Row-limited queries must include an ORDER BY clause. Try rephrasing or simplifying your question.',
          correlationId: 'req-43',
        },
      });
      expect(complete).toHaveBeenCalledTimes(3);
      expect(execute).not.toHaveBeenCalled();
    });

    it('should keep objects off the allow-list out of the prompt and reject them', async () => {
      const { pipeline, requests } = build(['SELECT rate FROM humanresources.employee_pay_history ORDER BY rate LIMIT 5']);

      const response = await pipeline.generateAndExecute('what are employee salaries?');

      expect(requests[0].system).not.toContain('humanresources');
      expect(isPipelineFailure(response) && response.error.message).toBe(
        'The query could not be completed after 3 attempts. Last problem: The query references an object not in the approved schema. Try rephrasing or simplifying your question.',
      );
    });

    it('should reject empty and oversized questions before doing any work', async () => {
      const { pipeline, sink, complete } = build([TOP_PRODUCTS]);

      await expect(pipeline.generateAndExecute('   ', { correlationId: 'req-44' })).resolves.toEqual({
        error: { kind: 'invalid_request', message: 'A question is required.', correlationId: 'req-44' },
      });
      await expect(pipeline.generateAndExecute('x'.repeat(1001), { correlationId: 'req-45' })).resolves.toEqual({
        error: { kind: 'invalid_request', message: 'Questions are limited to 1000 characters.', correlationId: 'req-45' },
      });
      expect(complete).not.toHaveBeenCalled();
      expect(sink.written).toHaveLength(0);
    });

    it('should ask for the requested page and echo it', async () => {
      const { pipeline, sink, requests } = build([TOP_PRODUCTS]);

      const response = await pipeline.generateAndExecute('Top products by sales', {
        correlationId: 'req-50',
        page: 3,
        pageSize: 10,
      });

      expect(response).toMatchObject({ page: 3, pageSize: 10, meta: { hasMore: false } });
      expect(requests[0].userMessage).toBe(
        [
          'Question: Top products by sales',
          '',
          'Return page 3 with 10 rows per page: order by columns that include a unique tiebreaker,',
          'then use LIMIT 10 OFFSET 20.',
        ].join('\n'),
      );
      expect(sink.written[0].detail).toBe('question: Top products by sales (page 3, size 10)');
    });

    it('should report more rows when a page comes back full', async () => {
      const { pipeline, execute } = build([TOP_PRODUCTS]);
      execute.mockResolvedValueOnce({ ...ROWS, rows: [ROWS.rows[0], ROWS.rows[0]], rowCount: 2 });

      const response = await pipeline.generateAndExecute('Top products by sales', { page: 1, pageSize: 2 });

      expect(response).toMatchObject({ page: 1, pageSize: 2, meta: { rowCount: 2, hasMore: true } });
    });

    it.each([
      [{ page: 0 }, 'page must be a whole number from 1 to 1000.'],
      [{ page: 1001 }, 'page must be a whole number from 1 to 1000.'],
      [{ page: 1.5 }, 'page must be a whole number from 1 to 1000.'],
      [{ pageSize: 0 }, 'pageSize must be a whole number from 1 to 100.'],
      [{ pageSize: 101 }, 'pageSize must be a whole number from 1 to 100.'],
    ])('should reject paging options %j', async (paging, message) => {
      const { pipeline, sink, complete } = build([TOP_PRODUCTS]);

      await expect(
        pipeline.generateAndExecute('Top products by sales', { correlationId: 'req-51', ...paging }),
      ).resolves.toEqual({ error: { kind: 'invalid_request', message, correlationId: 'req-51' } });
      expect(complete).not.toHaveBeenCalled();
      expect(sink.written).toHaveLength(0);
    });

    it('should mint a correlation id when none is given', async () => {
      const { pipeline } = build([TOP_PRODUCTS]);

      const response = await pipeline.generateAndExecute('Top 10 products by sales');

      expect(isPipelineFailure(response)).toBe(false);
      expect('correlationId' in response && response.correlationId).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
      );
    });

    it('should report a cancelled request', async () => {
      const { pipeline, sink, complete } = build([TOP_PRODUCTS]);
      const controller = new AbortController();
      controller.abort();

      const response = await pipeline.generateAndExecute('Top 10 products by sales', {
        correlationId: 'req-46',
        signal: controller.signal,
      });

      expect(response).toEqual({
        error: { kind: 'cancelled', message: 'The request was cancelled.', correlationId: 'req-46' },
      });
      expect(complete).not.toHaveBeenCalled();
      expect(sink.written.map((r) => r.stage)).toEqual(['request_received', 'cancelled']);
    });
  });

  describe('executeValidated', () => {
    it('should run caller-supplied SQL that passes validation', async () => {
      const { pipeline, complete, execute } = build([]);

      const response = await pipeline.executeValidated(`${TOP_PRODUCTS};`, { correlationId: 'req-47' });

      expect(response).toMatchObject({ sql: TOP_PRODUCTS, correlationId: 'req-47', meta: { attempts: 1, hasMore: false } });
      expect(response).not.toHaveProperty('page');
      expect(execute).toHaveBeenCalledOnce();
      expect(complete).not.toHaveBeenCalled();
    });

    it('should report more rows only when the result was truncated', async () => {
      const { pipeline, execute } = build([]);
      execute.mockResolvedValueOnce({ ...ROWS, truncated: true });

      const response = await pipeline.executeValidated(TOP_PRODUCTS);

      expect(response).toMatchObject({ meta: { truncated: true, hasMore: true } });
    });

    it('should never execute a write statement', async () => {
      const { pipeline, sink, execute } = build([]);

      const response = await pipeline.executeValidated('DROP TABLE Products;', { correlationId: 'req-48' });

      expect(response).toEqual({
        error: {
          kind: 'exhausted_retries',
          message:
            'The query could not be completed after 1 attempt. Last problem: The query contains a write or administrative operation, which is not permitted. Try rephrasing or simplifying your question.',
          correlationId: 'req-48',
        },
      });
      expect(execute).not.toHaveBeenCalled();
      expect(sink.written.map((r) => r.stage)).toEqual(['request_received', 'validation_rejected', 'exhausted']);
      expect(sink.written[1].detail).toBe('banned_keyword: Statement starts with banned keyword DROP');
    });

    it('should require some SQL', async () => {
      const { pipeline } = build([]);
      await expect(pipeline.executeValidated('', { correlationId: 'req-49' })).resolves.toEqual({
        error: { kind: 'invalid_request', message: 'A SQL statement is required.', correlationId: 'req-49' },
      });
    });
  });
});

describe('getPipeline', () => {
  it('should build the process pipeline once until reset', () => {
    const first = getPipeline();
    expect(getPipeline()).toBe(first);
    resetPipeline();
    expect(getPipeline()).not.toBe(first);
    resetPipeline();
  });
});
