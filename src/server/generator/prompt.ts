/**
 * Prompt construction for SQL generation.
 *
 * The system prompt carries the dialect rules and the schema context; the
 * user message carries the question and, on repair attempts, every earlier
 * failure with its corrective instruction.
 */

import { createHash } from 'node:crypto';

import type { FailureDescription, PageRequest } from '../../shared/types';
import { repairInstructionFor } from '../../shared/constants/messages';

/** Bump whenever the wording below changes; recorded on every candidate. */
export const PROMPT_VERSION = 'pg-select-v4';

export interface PromptLimits {
  maxRows: number;
  defaultSchema: string;
}

/** Short, stable digest of a schema context string. */
export function contextDigest(schemaContext: string): string {
  return createHash('sha256').update(schemaContext).digest('hex').slice(0, 12);
}

export function buildSystemPrompt(schemaContext: string, limits: PromptLimits): string {
  return `You translate questions into one read-only PostgreSQL query.

RULES (MANDATORY):
1. Return exactly one SELECT statement. A WITH clause is allowed. No other statement types, no semicolon-separated batches.
2. Never write data, change the schema, lock rows, or call administrative functions (pg_*, set_config, dblink).
3. Read only the allowed objects listed below, always schema-qualified (for example sales.customer).
4. Every query that returns rows must end with LIMIT n where n <= ${limits.maxRows}, unless it only returns aggregates.
5. Every query block that uses LIMIT, OFFSET or FETCH must have an ORDER BY whose columns include a unique key
   (the primary key or a UNIQUE key of a table in that block) or every GROUP BY column, so the row order is deterministic.
6. Keep nesting shallow: prefer joins and WITH clauses over nested subqueries.
7. Unqualified names resolve to the "${limits.defaultSchema}" schema; do not rely on that.

SCHEMA:
${schemaContext}

Respond with a JSON object and nothing else:
{ "sql": "SELECT ..." }`;
}

function paginationLines({ page, pageSize }: PageRequest): string[] {
  return [
    `Return page ${page} with ${pageSize} rows per page: order by columns that include a unique tiebreaker,`,
    `then use LIMIT ${pageSize} OFFSET ${(page - 1) * pageSize}.`,
  ];
}

export function buildUserMessage(
  question: string,
  priorFailures: readonly FailureDescription[],
  page?: PageRequest,
): string {
  const lines = [`Question: ${question}`];
  if (page) lines.push('', ...paginationLines(page));
  if (priorFailures.length === 0) {
    return lines.join('\n');
  }

  lines.push('', 'Earlier attempts failed. Fix every problem below:');
  priorFailures.forEach((failure, index) => {
    const n = index + 1;
    if (failure.source === 'generation') {
      lines.push(`${n}. No usable answer was produced (${failure.kind}).`);
    } else {
      lines.push(`${n}. This SQL failed ${failure.source}: ${failure.sql}`);
      lines.push(`   Problem: ${failure.detail}`);
    }
    lines.push(`   Instruction: ${repairInstructionFor(failure)}`);
  });
  return lines.join('\n');
}
