/**
 * NL2SQL pipeline.
 *
 * Entry points for the two ways a query reaches the database:
 *
 *  - `generateAndExecute(question)`: the LLM writes SQL from a bounded
 *    schema context; rejections and execution errors are repaired up to the
 *    attempt budget.
 *  - `executeValidated(sql)`: caller-supplied SQL goes through the same
 *    validator and executor exactly once.
 *
 * Both return either rows or a `{ error }` whose message is template text.
 * Rejected SQL and backend diagnostics stay in the audit trail.
 */

import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import type {
  PageRequest,
  PipelineErrorKind,
  PipelineFailure,
  PipelineResponse,
  QueryRequest,
} from '../../shared/types';
import {
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE,
  MAX_PAGE_SIZE,
  MAX_QUESTION_LENGTH,
  MAX_SQL_LENGTH,
} from '../../shared/constants';
import { REQUEST_MESSAGES, exhaustedMessage } from '../../shared/constants/messages';
import { getConfig, type PipelineConfig } from '../config';
import { ExecutionCoordinator } from '../db/executor';
import { createPool, getPool } from '../db/pool';
import { RequestCancelledError } from '../errors';
import { QueryGenerator } from '../generator/query-generator';
import { logger } from '../lib/logger';
import { Semaphore } from '../lib/semaphore';
import { createLLMProvider, type LLMProvider } from '../llm';
import { AuditTrail, createAuditSink, type AuditSink } from '../middleware/audit';
import { buildSchemaCatalog, extractHints, type SchemaContextProvider } from '../schema';
import { validateSql, type ValidationRules } from '../validators/sql-validator';
import {
  RepairLoopController,
  type CandidateGenerator,
  type RepairInput,
  type StatementExecutor,
} from './repair-loop';

export interface RequestOptions {
  signal?: AbortSignal;
  /** Reused from an incoming X-Request-ID; generated when absent. */
  correlationId?: string;
}

export interface GenerateRequestOptions extends RequestOptions {
  /** 1-based page of the result; defaults to the first. */
  page?: number;
  pageSize?: number;
}

function inRange(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= max;
}

export interface PipelineParts {
  config: PipelineConfig;
  schema: SchemaContextProvider;
  rules: ValidationRules;
  generator: CandidateGenerator;
  executor: StatementExecutor;
  auditSink: AuditSink;
}

export function pipelineFailure(kind: PipelineErrorKind, message: string, correlationId: string): PipelineFailure {
  return { error: { kind, message, correlationId } };
}

export function isPipelineFailure(response: PipelineResponse): response is PipelineFailure {
  return 'error' in response;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export class Nl2SqlPipeline {
  constructor(private readonly parts: PipelineParts) {}

  async generateAndExecute(question: string, options: GenerateRequestOptions = {}): Promise<PipelineResponse> {
    const correlationId = options.correlationId ?? randomUUID();
    const text = question.trim();
    if (text.length === 0) {
      return pipelineFailure('invalid_request', REQUEST_MESSAGES.emptyQuestion, correlationId);
    }
    if (text.length > MAX_QUESTION_LENGTH) {
      return pipelineFailure('invalid_request', REQUEST_MESSAGES.questionTooLong(MAX_QUESTION_LENGTH), correlationId);
    }
    const page: PageRequest = Object.freeze({
      page: options.page ?? DEFAULT_PAGE,
      pageSize: options.pageSize ?? DEFAULT_PAGE_SIZE,
    });
    if (!inRange(page.page, MAX_PAGE)) {
      return pipelineFailure('invalid_request', REQUEST_MESSAGES.pageOutOfRange(MAX_PAGE), correlationId);
    }
    if (!inRange(page.pageSize, MAX_PAGE_SIZE)) {
      return pipelineFailure('invalid_request', REQUEST_MESSAGES.pageSizeOutOfRange(MAX_PAGE_SIZE), correlationId);
    }

    const request: QueryRequest = Object.freeze({ question: text, correlationId, createdAt: new Date() });
    const audit = new AuditTrail(correlationId, this.parts.auditSink);
    audit.record('request_received', { detail: `question: ${text} (page ${page.page}, size ${page.pageSize})` });

    const schemaContext = this.parts.schema.contextFor(extractHints(text));
    return this.run(
      request,
      { mode: 'regenerate', question: text, schemaContext, generator: this.parts.generator, page },
      audit,
      options.signal,
    );
  }

  async executeValidated(sql: string, options: RequestOptions = {}): Promise<PipelineResponse> {
    const correlationId = options.correlationId ?? randomUUID();
    const text = sql.trim();
    if (text.length === 0) {
      return pipelineFailure('invalid_request', REQUEST_MESSAGES.emptySql, correlationId);
    }
    if (text.length > MAX_SQL_LENGTH) {
      return pipelineFailure('invalid_request', REQUEST_MESSAGES.sqlTooLong(MAX_SQL_LENGTH), correlationId);
    }

    const request: QueryRequest = Object.freeze({ question: text, correlationId, createdAt: new Date() });
    const audit = new AuditTrail(correlationId, this.parts.auditSink);
    audit.record('request_received', { sql: text, detail: 'caller-supplied SQL' });

    return this.run(request, { mode: 'single-attempt', sql: text }, audit, options.signal);
  }

  private async run(
    request: QueryRequest,
    input: RepairInput,
    audit: AuditTrail,
    signal: AbortSignal | undefined,
  ): Promise<PipelineResponse> {
    const { config, rules, executor } = this.parts;
    const { correlationId } = request;
    const log = logger.child({ correlationId });

    const controller = new RepairLoopController(input, {
      validate: (sql) => validateSql(sql, rules),
      executor,
      audit,
      maxAttempts: config.repair.maxAttempts,
      signal,
    });

    try {
      const outcome = await controller.run();

      if (outcome.status === 'exhausted') {
        log.info('Query attempts exhausted', {
          attempts: outcome.attempts,
          source: outcome.lastFailure.source,
        });
        return pipelineFailure(
          'exhausted_retries',
          exhaustedMessage(outcome.attempts, outcome.lastFailure, config.sql.maxRows),
          correlationId,
        );
      }

      const { result } = outcome;
      const page = input.mode === 'regenerate' ? input.page : undefined;
      log.info('Query succeeded', { attempts: outcome.attempts, rowCount: result.rowCount });
      return {
        sql: outcome.sql,
        columns: [...result.columns],
        rows: [...result.rows],
        correlationId,
        ...(page ? { page: page.page, pageSize: page.pageSize } : {}),
        meta: {
          attempts: outcome.attempts,
          rowCount: result.rowCount,
          truncated: result.truncated,
          hasMore: result.truncated || (page !== undefined && result.rowCount >= page.pageSize),
          executionTimeMs: result.elapsedMs,
          totalTimeMs: Date.now() - request.createdAt.getTime(),
        },
      };
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        log.info('Request cancelled', { attempts: controller.attempts });
        return pipelineFailure('cancelled', REQUEST_MESSAGES.cancelled, correlationId);
      }
      throw error;
    } finally {
      await audit.flush();
    }
  }
}

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

export interface PipelineOverrides {
  pool?: Pool;
  provider?: LLMProvider;
  generator?: CandidateGenerator;
  executor?: StatementExecutor;
  auditSink?: AuditSink;
}

/** Build a pipeline from configuration; overrides replace individual parts. */
export function createPipeline(config: PipelineConfig, overrides: PipelineOverrides = {}): Nl2SqlPipeline {
  const { schema, rules } = buildSchemaCatalog(config);

  let pool = overrides.pool;
  const sharedPool = (): Pool => {
    if (!pool) pool = createPool(config.database);
    return pool;
  };

  const generator =
    overrides.generator ??
    new QueryGenerator({
      provider:
        overrides.provider ?? createLLMProvider(config.llm.provider, { apiKey: config.llm.apiKey, model: config.llm.model }),
      semaphore: new Semaphore(config.llm.maxConcurrency),
      timeoutMs: config.llm.timeoutMs,
      maxTokens: config.llm.maxTokens,
      limits: { maxRows: config.sql.maxRows, defaultSchema: config.database.defaultSchema },
    });

  const executor =
    overrides.executor ??
    new ExecutionCoordinator(sharedPool(), {
      timeoutMs: config.sql.statementTimeoutMs,
      rowCap: config.sql.maxRows,
      defaultSchema: config.database.defaultSchema,
    });

  const auditSink =
    overrides.auditSink ?? createAuditSink(config.audit.sink, config.audit.sink === 'database' ? sharedPool() : undefined);

  return new Nl2SqlPipeline({ config, schema, rules, generator, executor, auditSink });
}

let pipeline: Nl2SqlPipeline | null = null;

/** The process pipeline, built once from environment configuration. */
export function getPipeline(): Nl2SqlPipeline {
  if (!pipeline) {
    pipeline = createPipeline(getConfig(), { pool: getPool() });
  }
  return pipeline;
}

/** Drop the process pipeline (tests, reconfiguration). */
export function resetPipeline(): void {
  pipeline = null;
}
