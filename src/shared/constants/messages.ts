/**
 * User-facing message templates and repair instructions.
 *
 * End users only ever see text from this module. Backend diagnostics and
 * rejected SQL stay in audit records and repair prompts.
 */

import type {
  ExecutionErrorKind,
  FailureDescription,
  GenerationFailureKind,
  RejectionReason,
} from '../types';

export const REJECTION_MESSAGES: Record<RejectionReason, (maxRows: number) => string> = {
  non_select: () => 'Only a single read-only SELECT statement can be run.',
  banned_keyword: () => 'The query contains a write or administrative operation, which is not permitted.',
  disallowed_object: () => 'The query references an object not in the approved schema.',
  missing_order_by: () => 'Row-limited queries must include an ORDER BY clause.',
  missing_unique_tiebreaker: () =>
    'Deterministic ordering requires a unique tiebreaker: the ORDER BY clause must include a unique column such as a primary key.',
  row_cap_exceeded: (maxRows) =>
    `Queries must return at most ${maxRows} rows: add a LIMIT of ${maxRows} or less, or aggregate the results.`,
  depth_limit_exceeded: () => 'The query nests subqueries too deeply.',
};

export const EXECUTION_MESSAGES: Record<ExecutionErrorKind, string> = {
  invalid_object: 'The query referenced a table or view that does not exist.',
  invalid_column: 'The query referenced a column that does not exist.',
  syntax_error: 'The database could not interpret the query.',
  timeout: 'The query exceeded the statement time limit.',
  resource_limit: 'The query exceeded a database resource limit.',
  unknown: 'The database could not run the query.',
};

export const GENERATION_MESSAGES: Record<GenerationFailureKind, string> = {
  timeout: 'The SQL generator did not respond in time.',
  unavailable: 'The SQL generator is currently unavailable.',
};

/** Instructions appended to the next prompt after a failed attempt. */
export const REPAIR_INSTRUCTIONS: {
  validation: Record<RejectionReason, string>;
  execution: Record<ExecutionErrorKind, string>;
  generation: Record<GenerationFailureKind, string>;
} = {
  validation: {
    non_select: 'Return exactly one SELECT statement (a WITH clause is allowed) and nothing else.',
    banned_keyword: 'Use only read-only SELECT syntax. Do not write data, change the schema, or call administrative functions.',
    disallowed_object: 'Reference only the allowed objects listed above, always schema-qualified.',
    missing_order_by: 'Add an ORDER BY clause to every query block that uses LIMIT, OFFSET or FETCH.',
    missing_unique_tiebreaker:
      'Append a unique column (the primary key of a table in the FROM clause, or every GROUP BY column) to the ORDER BY clause.',
    row_cap_exceeded: 'Add LIMIT with a literal no larger than the row cap, or aggregate the result.',
    depth_limit_exceeded: 'Flatten nested subqueries into joins.',
  },
  execution: {
    invalid_object: 'Use only the object names exactly as listed in the schema context.',
    invalid_column: 'Use only the column names listed for each object in the schema context.',
    syntax_error: 'Fix the syntax so the statement is valid PostgreSQL.',
    timeout: 'Simplify the query: filter earlier, avoid cross joins, and aggregate where possible.',
    resource_limit: 'Reduce the work the query does: fewer joins, tighter filters, smaller result.',
    unknown: 'Rewrite the query more simply.',
  },
  generation: {
    timeout: 'Answer with the SQL statement only.',
    unavailable: 'Answer with the SQL statement only.',
  },
};

export const REPHRASE_SUGGESTION = 'Try rephrasing or simplifying your question.';

/** Template text describing a failure to an end user. */
export function describeFailure(failure: FailureDescription, maxRows: number): string {
  switch (failure.source) {
    case 'validation':
      return REJECTION_MESSAGES[failure.reason](maxRows);
    case 'execution':
      return EXECUTION_MESSAGES[failure.kind];
    case 'generation':
      return GENERATION_MESSAGES[failure.kind];
  }
}

/** Corrective instruction for the prompt that follows a failure. */
export function repairInstructionFor(failure: FailureDescription): string {
  switch (failure.source) {
    case 'validation':
      return REPAIR_INSTRUCTIONS.validation[failure.reason];
    case 'execution':
      return REPAIR_INSTRUCTIONS.execution[failure.kind];
    case 'generation':
      return REPAIR_INSTRUCTIONS.generation[failure.kind];
  }
}

export function exhaustedMessage(attempts: number, lastFailure: FailureDescription, maxRows: number): string {
  const noun = attempts === 1 ? 'attempt' : 'attempts';
  return `The query could not be completed after ${attempts} ${noun}. Last problem: ${describeFailure(lastFailure, maxRows)} ${REPHRASE_SUGGESTION}`;
}

/** Responses that end a request before the pipeline runs, or outside it. */
export const REQUEST_MESSAGES = {
  emptyQuestion: 'A question is required.',
  questionTooLong: (max: number) => `Questions are limited to ${max} characters.`,
  emptySql: 'A SQL statement is required.',
  sqlTooLong: (max: number) => `SQL statements are limited to ${max} characters.`,
  pageOutOfRange: (max: number) => `page must be a whole number from 1 to ${max}.`,
  pageSizeOutOfRange: (max: number) => `pageSize must be a whole number from 1 to ${max}.`,
  invalidBody: 'The request body must be a JSON object.',
  cancelled: 'The request was cancelled.',
  configuration: 'The query service is not configured correctly.',
  internal: 'The request could not be processed.',
} as const;
