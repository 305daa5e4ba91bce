/**
 * Repair Loop Controller.
 *
 * Drives one request through generate → validate → execute, feeding every
 * failure back into the next prompt until a statement succeeds or the
 * attempt budget runs out.
 *
 *   generating ─┬─> validating ─┬─> executing ─┬─> succeeded
 *               │               │              │
 *               └───────────────┴──────────────┴─> repairing ─┬─> generating
 *                                                             └─> exhausted
 *
 * Validation rejections, execution errors and generator failures all take
 * the same repair edge and consume the same budget.
 */

import type {
  AcceptedVerdict,
  ExecutionResult,
  FailureDescription,
  PageRequest,
  RejectedVerdict,
  RepairAttempt,
  RowsResult,
  SqlCandidate,
  ValidationVerdict,
} from '../../shared/types';
import { repairInstructionFor } from '../../shared/constants/messages';
import type { ExecuteOptions } from '../db/executor';
import {
  GenerationTimeoutError,
  GenerationUnavailableError,
  RequestCancelledError,
  UnvalidatedStatementError,
  throwIfAborted,
} from '../errors';
import type { GenerateOptions } from '../generator/query-generator';
import { logger } from '../lib/logger';
import type { AuditTrail } from '../middleware/audit';

export type RepairState = 'generating' | 'validating' | 'executing' | 'repairing' | 'succeeded' | 'exhausted';

const TRANSITIONS: Record<RepairState, readonly RepairState[]> = {
  generating: ['validating', 'repairing'],
  validating: ['executing', 'repairing'],
  executing: ['succeeded', 'repairing'],
  repairing: ['generating', 'exhausted'],
  succeeded: [],
  exhausted: [],
};

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface CandidateGenerator {
  generate(
    question: string,
    schemaContext: string,
    priorFailures: readonly FailureDescription[],
    options: GenerateOptions,
  ): Promise<SqlCandidate>;
}

export interface StatementExecutor {
  execute(verdict: AcceptedVerdict, options?: ExecuteOptions): Promise<ExecutionResult>;
}

export type RepairInput =
  | {
      mode: 'regenerate';
      question: string;
      schemaContext: string;
      generator: CandidateGenerator;
      page?: PageRequest;
    }
  | {
      /** Caller-supplied SQL: validated and executed once, never regenerated. */
      mode: 'single-attempt';
      sql: string;
    };

export interface RepairLoopOptions {
  validate: (sql: string) => Promise<ValidationVerdict>;
  executor: StatementExecutor;
  audit: AuditTrail;
  maxAttempts: number;
  signal?: AbortSignal;
}

export type RepairOutcome =
  | {
      status: 'succeeded';
      sql: string;
      result: RowsResult;
      attempts: number;
      repairs: readonly RepairAttempt[];
    }
  | {
      status: 'exhausted';
      lastFailure: FailureDescription;
      attempts: number;
      repairs: readonly RepairAttempt[];
    };

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export class RepairLoopController {
  private current: RepairState;
  private attempt = 1;
  private pendingSql = '';
  private accepted: AcceptedVerdict | null = null;
  private readonly failures: FailureDescription[] = [];
  private readonly repairs: RepairAttempt[] = [];

  constructor(
    private readonly input: RepairInput,
    private readonly options: RepairLoopOptions,
  ) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    if (input.mode === 'single-attempt') {
      this.current = 'validating';
      this.pendingSql = input.sql;
    } else {
      this.current = 'generating';
    }
  }

  get state(): RepairState {
    return this.current;
  }

  get attempts(): number {
    return this.attempt;
  }

  async run(): Promise<RepairOutcome> {
    try {
      return await this.loop();
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        this.options.audit.record('cancelled', { attempt: this.attempt });
      }
      throw error;
    }
  }

  private async loop(): Promise<RepairOutcome> {
    for (;;) {
      throwIfAborted(this.options.signal);
      switch (this.current) {
        case 'generating':
          await this.generate();
          break;
        case 'validating':
          await this.validate();
          break;
        case 'executing': {
          const outcome = await this.execute();
          if (outcome) return outcome;
          break;
        }
        case 'repairing': {
          const outcome = this.repair();
          if (outcome) return outcome;
          break;
        }
        case 'succeeded':
        case 'exhausted':
          throw new Error(`Repair loop already finished (${this.current})`);
      }
    }
  }

  private transition(to: RepairState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal repair loop transition ${from} -> ${to}`);
    }
    if (from === 'repairing' && to === 'generating') {
      if (this.attempt >= this.options.maxAttempts) {
        throw new Error(`Attempt budget of ${this.options.maxAttempts} already spent`);
      }
      this.attempt += 1;
    }
    this.current = to;
  }

  private fail(failure: FailureDescription): void {
    this.failures.push(failure);
    this.accepted = null;
    this.transition('repairing');
  }

  // ── States ─────────────────────────────────────────────────────────────

  private async generate(): Promise<void> {
    if (this.input.mode !== 'regenerate') {
      throw new Error('Generation is not available for caller-supplied SQL');
    }
    const { generator, question, schemaContext, page } = this.input;
    const { audit, signal } = this.options;

    let candidate: SqlCandidate;
    try {
      candidate = await generator.generate(question, schemaContext, [...this.failures], {
        attempt: this.attempt,
        signal,
        page,
      });
    } catch (error) {
      let failure: FailureDescription;
      if (error instanceof GenerationTimeoutError) {
        failure = { source: 'generation', kind: 'timeout', detail: error.message };
      } else if (error instanceof GenerationUnavailableError) {
        failure = { source: 'generation', kind: 'unavailable', detail: error.message };
      } else {
        throw error;
      }
      audit.record('generation_failed', { attempt: this.attempt, detail: `${failure.kind}: ${failure.detail}` });
      this.fail(failure);
      return;
    }

    audit.record('generated', {
      attempt: this.attempt,
      sql: candidate.sql,
      detail: `prompt ${candidate.promptVersion}, context ${candidate.contextDigest}${candidate.model ? `, model ${candidate.model}` : ''}`,
    });
    this.pendingSql = candidate.sql;
    this.transition('validating');
  }

  private async validate(): Promise<void> {
    const { audit } = this.options;
    const verdict = await this.safeValidate(this.pendingSql);

    if (verdict.status === 'accepted') {
      audit.record('validation_accepted', {
        attempt: this.attempt,
        sql: verdict.sql,
        detail: `objects: ${verdict.objects.join(', ') || '(none)'}`,
      });
      this.accepted = verdict;
      this.transition('executing');
      return;
    }

    audit.record('validation_rejected', {
      attempt: this.attempt,
      sql: this.pendingSql,
      detail: `${verdict.reason}: ${verdict.detail}`,
    });
    this.fail({ source: 'validation', reason: verdict.reason, detail: verdict.detail, sql: this.pendingSql });
  }

  /** A validator that throws rejects the statement. */
  private async safeValidate(sql: string): Promise<ValidationVerdict> {
    try {
      return await this.options.validate(sql);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Validator threw; rejecting statement', { correlationId: this.options.audit.correlationId, error: message });
      const rejected: RejectedVerdict = {
        status: 'rejected',
        reason: 'non_select',
        rule: 'single_select',
        detail: `validator error: ${message}`,
      };
      return rejected;
    }
  }

  private async execute(): Promise<RepairOutcome | null> {
    const verdict = this.accepted;
    if (verdict === null) {
      throw new UnvalidatedStatementError();
    }
    const { audit, executor, signal } = this.options;
    const result = await executor.execute(verdict, { signal });

    if (result.status === 'rows') {
      audit.record('executed', {
        attempt: this.attempt,
        sql: verdict.sql,
        rowCount: result.rowCount,
        durationMs: result.elapsedMs,
      });
      this.transition('succeeded');
      audit.record('succeeded', { attempt: this.attempt, rowCount: result.rowCount });
      return {
        status: 'succeeded',
        sql: verdict.sql,
        result,
        attempts: this.attempt,
        repairs: [...this.repairs],
      };
    }

    audit.record('execution_failed', {
      attempt: this.attempt,
      sql: verdict.sql,
      detail: `${result.kind}: ${result.detail}`,
      durationMs: result.elapsedMs,
    });
    this.fail({ source: 'execution', kind: result.kind, detail: result.detail, sql: verdict.sql });
    return null;
  }

  private repair(): RepairOutcome | null {
    const { audit, maxAttempts } = this.options;
    const failure = this.failures[this.failures.length - 1];
    if (failure === undefined) {
      throw new Error('Entered repairing without a recorded failure');
    }

    if (this.input.mode === 'regenerate' && this.attempt < maxAttempts) {
      const instruction = repairInstructionFor(failure);
      this.repairs.push(Object.freeze({ correlationId: audit.correlationId, attempt: this.attempt, failure, instruction }));
      audit.record('repair_scheduled', { attempt: this.attempt, detail: instruction });
      this.transition('generating');
      return null;
    }

    this.repairs.push(Object.freeze({ correlationId: audit.correlationId, attempt: this.attempt, failure, instruction: null }));
    this.transition('exhausted');
    audit.record('exhausted', { attempt: this.attempt, detail: `${failure.source}: ${failure.detail}` });
    return {
      status: 'exhausted',
      lastFailure: failure,
      attempts: this.attempt,
      repairs: [...this.repairs],
    };
  }
}
