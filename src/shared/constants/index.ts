/**
 * Shared constants for the NL2SQL pipeline.
 *
 * Defaults only: every value here can be overridden through configuration,
 * and components receive the effective values at construction time.
 */

// ---------------------------------------------------------------------------
// SQL security block-lists
// ---------------------------------------------------------------------------

/**
 * Keywords that must never appear as a token in a candidate statement.
 * Multi-word entries are matched as consecutive tokens.
 */
export const DEFAULT_BANNED_KEYWORDS: readonly string[] = [
  // DDL
  'CREATE', 'ALTER', 'DROP', 'TRUNCATE',
  // DML
  'INSERT', 'UPDATE', 'DELETE', 'MERGE', 'UPSERT', 'INTO',
  // Procedures and dynamic SQL
  'EXEC', 'EXECUTE', 'CALL', 'DO', 'PREPARE', 'DEALLOCATE',
  // Bulk operations
  'COPY', 'IMPORT',
  // Administrative
  'GRANT', 'REVOKE', 'SET', 'RESET', 'LOAD', 'VACUUM', 'ANALYZE',
  'CLUSTER', 'REINDEX', 'CHECKPOINT', 'DISCARD', 'LISTEN', 'NOTIFY',
  'UNLISTEN', 'LOCK', 'REFRESH', 'SECURITY DEFINER',
];

/**
 * Function-name prefixes that reach the server's file system, sessions or
 * other databases, run SQL passed as text, or advance sequences.
 */
export const DEFAULT_BANNED_FUNCTION_PREFIXES: readonly string[] = [
  'pg_', 'lo_', 'dblink', 'set_config', 'current_setting', 'txid_',
  'query_to_xml', 'table_to_xml', 'schema_to_xml', 'database_to_xml', 'cursor_to_xml',
  'ts_stat', 'nextval', 'setval',
];

/** Aggregate functions that collapse a result to one row per group. */
export const AGGREGATE_FUNCTIONS = new Set([
  'count', 'sum', 'avg', 'min', 'max', 'bool_and', 'bool_or', 'every',
  'string_agg', 'array_agg', 'stddev', 'stddev_pop', 'stddev_samp',
  'variance', 'var_pop', 'var_samp', 'percentile_cont', 'percentile_disc', 'mode',
]);

/** Set-returning functions; one in a select list can multiply the rows of an aggregate. */
export const SET_RETURNING_FUNCTIONS = new Set([
  'generate_series', 'generate_subscripts', 'unnest', 'regexp_matches',
  'regexp_split_to_table', 'string_to_table', 'json_each', 'json_each_text',
  'jsonb_each', 'jsonb_each_text', 'json_array_elements', 'json_array_elements_text',
  'jsonb_array_elements', 'jsonb_array_elements_text', 'json_object_keys',
  'jsonb_object_keys', 'json_populate_recordset', 'jsonb_populate_recordset',
  'json_to_recordset', 'jsonb_to_recordset', 'jsonb_path_query',
]);

/** Deepest parenthesis nesting the validator will analyse. */
export const MAX_PARENTHESIS_NESTING = 64;

// ---------------------------------------------------------------------------
// Query limits
// ---------------------------------------------------------------------------

/** Maximum number of rows a non-aggregate query may return. */
export const DEFAULT_MAX_ROWS = 5_000;

/** Per-statement execution timeout in milliseconds. */
export const DEFAULT_STATEMENT_TIMEOUT_MS = 10_000;

/** Deepest allowed nesting of subqueries and CTE bodies. */
export const DEFAULT_MAX_SUBQUERY_DEPTH = 3;

/** Generation attempts per request, including the first. */
export const DEFAULT_MAX_REPAIR_ATTEMPTS = 3;

/** Deadline for a single LLM call in milliseconds. */
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;

/** Completion token budget for one generation call. */
export const DEFAULT_LLM_MAX_TOKENS = 800;

/** Concurrent LLM calls allowed across all requests. */
export const DEFAULT_LLM_MAX_CONCURRENCY = 4;

/** Character budget for the schema section of a prompt. */
export const DEFAULT_SCHEMA_CONTEXT_MAX_CHARS = 6_000;

/** Maximum length of a user-submitted question (characters). */
export const MAX_QUESTION_LENGTH = 1_000;

/** Maximum length of SQL submitted for direct execution (characters). */
export const MAX_SQL_LENGTH = 50_000;

/** Result pages for generated queries. */
export const DEFAULT_PAGE = 1;
export const MAX_PAGE = 1_000;
export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/** Request header carrying the correlation identifier. */
export const REQUEST_ID_HEADER = 'x-request-id';
