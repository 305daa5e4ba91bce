/**
 * Shared TypeScript type definitions for the NL2SQL pipeline.
 *
 * Keep this file free of runtime dependencies.
 */

// ---------------------------------------------------------------------------
// Requests and candidates
// ---------------------------------------------------------------------------

/** A natural-language question entering the pipeline. Never mutated. */
export interface QueryRequest {
  readonly question: string;
  readonly correlationId: string;
  readonly createdAt: Date;
}

/** Which slice of the result a generated query should return. */
export interface PageRequest {
  /** 1-based. */
  readonly page: number;
  readonly pageSize: number;
}

/** One statement proposed by the query generator. */
export interface SqlCandidate {
  readonly sql: string;
  /** Version of the prompt template that produced the candidate. */
  readonly promptVersion: string;
  /** Short digest of the schema context embedded in the prompt. */
  readonly contextDigest: string;
  readonly attempt: number;
  readonly model?: string;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export type RejectionReason =
  | 'non_select'
  | 'banned_keyword'
  | 'disallowed_object'
  | 'missing_order_by'
  | 'missing_unique_tiebreaker'
  | 'row_cap_exceeded'
  | 'depth_limit_exceeded';

/** The validator checks, in the order they run. */
export type ValidationRule =
  | 'single_select'
  | 'banned_keywords'
  | 'allow_list'
  | 'deterministic_order'
  | 'row_cap'
  | 'subquery_depth';

export interface AcceptedVerdict {
  readonly status: 'accepted';
  /** Statement text with comments kept and the trailing terminator removed. */
  readonly sql: string;
  /** Schema-qualified objects the statement reads. */
  readonly objects: readonly string[];
}

export interface RejectedVerdict {
  readonly status: 'rejected';
  readonly reason: RejectionReason;
  readonly rule: ValidationRule;
  /** Internal explanation; fed to repair prompts and audit, never to end users. */
  readonly detail: string;
}

export type ValidationVerdict = AcceptedVerdict | RejectedVerdict;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export type ObjectKind = 'table' | 'view';

export interface AllowListEntry {
  readonly name: string;
  readonly kind: ObjectKind;
}

export interface ColumnMetadata {
  readonly name: string;
  readonly type: string;
  readonly description?: string;
}

export interface ForeignKeyMetadata {
  readonly columns: readonly string[];
  readonly references: string;
  readonly referencedColumns: readonly string[];
}

export interface SchemaObject {
  readonly name: string;
  readonly kind: ObjectKind;
  readonly description: string;
  readonly columns: readonly ColumnMetadata[];
  readonly primaryKey: readonly string[];
  readonly uniqueKeys: readonly (readonly string[])[];
  readonly foreignKeys: readonly ForeignKeyMetadata[];
  readonly synonyms: readonly string[];
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export type ExecutionErrorKind =
  | 'invalid_object'
  | 'invalid_column'
  | 'syntax_error'
  | 'timeout'
  | 'resource_limit'
  | 'unknown';

export interface RowsResult {
  readonly status: 'rows';
  readonly columns: readonly string[];
  readonly rows: readonly Record<string, unknown>[];
  readonly rowCount: number;
  readonly elapsedMs: number;
  /** True when the cursor stopped at the row cap. */
  readonly truncated: boolean;
}

export interface ExecutionFailure {
  readonly status: 'error';
  readonly kind: ExecutionErrorKind;
  /** User-facing template text. */
  readonly message: string;
  /** Backend diagnostic, internal only. */
  readonly detail: string;
  readonly elapsedMs: number;
}

export type ExecutionResult = RowsResult | ExecutionFailure;

// ---------------------------------------------------------------------------
// Repair loop
// ---------------------------------------------------------------------------

export type GenerationFailureKind = 'timeout' | 'unavailable';

/** What went wrong on one attempt, in the shape the next prompt consumes. */
export type FailureDescription =
  | {
      readonly source: 'validation';
      readonly reason: RejectionReason;
      readonly detail: string;
      readonly sql: string;
    }
  | {
      readonly source: 'execution';
      readonly kind: ExecutionErrorKind;
      readonly detail: string;
      readonly sql: string;
    }
  | {
      readonly source: 'generation';
      readonly kind: GenerationFailureKind;
      readonly detail: string;
    };

export interface RepairAttempt {
  readonly correlationId: string;
  readonly attempt: number;
  readonly failure: FailureDescription;
  /** Corrective instruction added to the next prompt, or null when the loop ended. */
  readonly instruction: string | null;
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export type AuditStage =
  | 'request_received'
  | 'generated'
  | 'generation_failed'
  | 'validation_accepted'
  | 'validation_rejected'
  | 'executed'
  | 'execution_failed'
  | 'repair_scheduled'
  | 'succeeded'
  | 'exhausted'
  | 'cancelled';

/** One row per pipeline stage transition. Append-only. */
export interface AuditRecord {
  readonly correlationId: string;
  readonly sequence: number;
  readonly stage: AuditStage;
  readonly attempt: number;
  readonly timestamp: Date;
  readonly sql?: string;
  readonly detail?: string;
  readonly rowCount?: number;
  readonly durationMs?: number;
}

// ---------------------------------------------------------------------------
// Pipeline responses
// ---------------------------------------------------------------------------

export type PipelineErrorKind =
  | 'exhausted_retries'
  | 'invalid_request'
  | 'configuration_error'
  | 'cancelled'
  | 'internal_error';

export interface PipelineSuccess {
  sql: string;
  columns: string[];
  rows: Record<string, unknown>[];
  correlationId: string;
  /** Present for generated queries, which are always paged. */
  page?: number;
  pageSize?: number;
  meta: {
    attempts: number;
    rowCount: number;
    truncated: boolean;
    /** A full page (or a truncated result) came back, so more rows may follow. */
    hasMore: boolean;
    executionTimeMs: number;
    totalTimeMs: number;
  };
}

export interface PipelineFailure {
  error: {
    kind: PipelineErrorKind;
    message: string;
    correlationId: string;
  };
}

export type PipelineResponse = PipelineSuccess | PipelineFailure;
