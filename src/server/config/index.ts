/**
 * Pipeline configuration.
 *
 * Read once from environment variables plus two JSON files (allow-list and
 * schema context), validated with zod, and deep-frozen. Any problem raises
 * a single ConfigurationError listing every issue; nothing is partially
 * initialised.
 *
 * Environment variables (all optional):
 *   PG_HOST, PG_PORT, PG_USER, PG_PASSWORD, PG_DATABASE, PG_POOL_MAX
 *   DB_DEFAULT_SCHEMA            - schema for unqualified names (public)
 *   LLM_PROVIDER, LLM_MODEL, LLM_API_KEY
 *   LLM_TIMEOUT_MS, LLM_MAX_CONCURRENCY, LLM_MAX_TOKENS
 *   SQL_ALLOWLIST_FILE, SQL_ALLOWLIST ("schema.name[:view],...")
 *   SCHEMA_CONTEXT_FILE, SCHEMA_CONTEXT_MAX_CHARS
 *   SQL_BANNED_KEYWORDS          - comma list replacing the default list
 *   SQL_MAX_ROWS, SQL_STATEMENT_TIMEOUT_MS, SQL_MAX_SUBQUERY_DEPTH
 *   MAX_REPAIR_ATTEMPTS
 *   AUDIT_SINK                   - "database" | "console"
 */

import { readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';

import type { AllowListEntry, SchemaObject } from '../../shared/types';
import {
  DEFAULT_BANNED_FUNCTION_PREFIXES,
  DEFAULT_BANNED_KEYWORDS,
  DEFAULT_LLM_MAX_CONCURRENCY,
  DEFAULT_LLM_MAX_TOKENS,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_MAX_REPAIR_ATTEMPTS,
  DEFAULT_MAX_ROWS,
  DEFAULT_MAX_SUBQUERY_DEPTH,
  DEFAULT_SCHEMA_CONTEXT_MAX_CHARS,
  DEFAULT_STATEMENT_TIMEOUT_MS,
} from '../../shared/constants';
import { ConfigurationError } from '../errors';
import type { LLMProviderName } from '../llm/types';
import { AllowListRegistry, parseAllowListOverride } from '../schema/allow-list';
import { SchemaContextProvider } from '../schema/schema-context';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PG_HOST: z.string().default('localhost'),
  PG_PORT: z.coerce.number().int().min(1).max(65_535).default(5432),
  PG_USER: z.string().optional(),
  PG_PASSWORD: z.string().optional(),
  PG_DATABASE: z.string().optional(),
  PG_POOL_MAX: positiveInt(10),
  DB_DEFAULT_SCHEMA: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, 'must be an unquoted lower-case schema name')
    .default('public'),

  LLM_PROVIDER: z.enum(['anthropic', 'openai', 'gemini']).default('anthropic'),
  LLM_MODEL: z.string().optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_TIMEOUT_MS: positiveInt(DEFAULT_LLM_TIMEOUT_MS),
  LLM_MAX_CONCURRENCY: positiveInt(DEFAULT_LLM_MAX_CONCURRENCY),
  LLM_MAX_TOKENS: positiveInt(DEFAULT_LLM_MAX_TOKENS),

  SQL_ALLOWLIST_FILE: z.string().default('config/allowlist.json'),
  SQL_ALLOWLIST: z.string().optional(),
  SCHEMA_CONTEXT_FILE: z.string().default('config/schema-context.json'),
  SCHEMA_CONTEXT_MAX_CHARS: positiveInt(DEFAULT_SCHEMA_CONTEXT_MAX_CHARS),

  SQL_BANNED_KEYWORDS: z.string().optional(),
  SQL_MAX_ROWS: positiveInt(DEFAULT_MAX_ROWS),
  SQL_STATEMENT_TIMEOUT_MS: positiveInt(DEFAULT_STATEMENT_TIMEOUT_MS),
  SQL_MAX_SUBQUERY_DEPTH: z.coerce.number().int().min(0).default(DEFAULT_MAX_SUBQUERY_DEPTH),
  MAX_REPAIR_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(DEFAULT_MAX_REPAIR_ATTEMPTS),

  AUDIT_SINK: z.enum(['database', 'console']).default('database'),
});

const lowerName = z.string().min(1).transform((v) => v.trim().toLowerCase());

const allowListFileSchema = z.object({
  objects: z.array(
    z.object({
      name: z.string().min(1),
      kind: z.enum(['table', 'view']).default('table'),
    }),
  ),
});

const schemaFileSchema = z.object({
  version: z.string().default('unversioned'),
  objects: z.array(
    z.object({
      name: lowerName,
      kind: z.enum(['table', 'view']),
      description: z.string().default(''),
      columns: z
        .array(
          z.object({
            name: lowerName,
            type: z.string().min(1),
            description: z.string().optional(),
          }),
        )
        .min(1),
      primaryKey: z.array(lowerName).default([]),
      uniqueKeys: z.array(z.array(lowerName).min(1)).default([]),
      foreignKeys: z
        .array(
          z.object({
            columns: z.array(lowerName).min(1),
            references: lowerName,
            referencedColumns: z.array(lowerName).min(1),
          }),
        )
        .default([]),
      synonyms: z.array(z.string()).default([]),
    }),
  ),
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PipelineConfig {
  readonly database: {
    readonly host: string;
    readonly port: number;
    readonly user?: string;
    readonly password?: string;
    readonly database?: string;
    readonly poolMax: number;
    readonly defaultSchema: string;
  };
  readonly llm: {
    readonly provider: LLMProviderName;
    readonly model?: string;
    readonly apiKey?: string;
    readonly timeoutMs: number;
    readonly maxConcurrency: number;
    readonly maxTokens: number;
  };
  readonly sql: {
    readonly maxRows: number;
    readonly statementTimeoutMs: number;
    readonly maxSubqueryDepth: number;
    readonly bannedKeywords: readonly string[];
    readonly bannedFunctionPrefixes: readonly string[];
  };
  readonly repair: {
    readonly maxAttempts: number;
  };
  readonly schema: {
    readonly version: string;
    readonly maxChars: number;
    readonly objects: readonly SchemaObject[];
  };
  readonly allowList: readonly AllowListEntry[];
  readonly audit: {
    readonly sink: 'database' | 'console';
  };
}

export interface LoadConfigOptions {
  /** Directory that relative file paths resolve against. */
  baseDir?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function formatIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${prefix}${path ? `${path}: ` : ': '}${issue.message}`;
  });
}

function readJsonFile(path: string, issues: string[]): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    issues.push(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
}

/** Environment with empty strings treated as unset. */
function nonEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((part) => part.trim().toUpperCase())
    .filter((part) => part.length > 0);
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function loadConfig(env: NodeJS.ProcessEnv = process.env, options: LoadConfigOptions = {}): PipelineConfig {
  const baseDir = options.baseDir ?? process.cwd();
  const issues: string[] = [];
  const at = (file: string) => (isAbsolute(file) ? file : resolve(baseDir, file));

  const parsedEnv = envSchema.safeParse(nonEmpty(env));
  if (!parsedEnv.success) {
    throw new ConfigurationError(formatIssues('', parsedEnv.error));
  }
  const e = parsedEnv.data;

  // Allow-list: env override wins over the file.
  let allowList: AllowListEntry[] = [];
  if (e.SQL_ALLOWLIST !== undefined) {
    allowList = parseAllowListOverride(e.SQL_ALLOWLIST);
  } else {
    const raw = readJsonFile(at(e.SQL_ALLOWLIST_FILE), issues);
    if (raw !== undefined) {
      const parsed = allowListFileSchema.safeParse(raw);
      if (parsed.success) {
        allowList = parsed.data.objects;
      } else {
        issues.push(...formatIssues(`${e.SQL_ALLOWLIST_FILE} `, parsed.error));
      }
    }
  }

  let schemaObjects: SchemaObject[] = [];
  let schemaVersion = 'unversioned';
  const rawSchema = readJsonFile(at(e.SCHEMA_CONTEXT_FILE), issues);
  if (rawSchema !== undefined) {
    const parsed = schemaFileSchema.safeParse(rawSchema);
    if (parsed.success) {
      schemaObjects = parsed.data.objects;
      schemaVersion = parsed.data.version;
    } else {
      issues.push(...formatIssues(`${e.SCHEMA_CONTEXT_FILE} `, parsed.error));
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  // Both constructors throw ConfigurationError on inconsistent input.
  const registry = new AllowListRegistry(allowList);
  new SchemaContextProvider(schemaObjects, registry, e.SCHEMA_CONTEXT_MAX_CHARS);

  return deepFreeze<PipelineConfig>({
    database: {
      host: e.PG_HOST,
      port: e.PG_PORT,
      user: e.PG_USER,
      password: e.PG_PASSWORD,
      database: e.PG_DATABASE,
      poolMax: e.PG_POOL_MAX,
      defaultSchema: e.DB_DEFAULT_SCHEMA,
    },
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL,
      apiKey: e.LLM_API_KEY,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxConcurrency: e.LLM_MAX_CONCURRENCY,
      maxTokens: e.LLM_MAX_TOKENS,
    },
    sql: {
      maxRows: e.SQL_MAX_ROWS,
      statementTimeoutMs: e.SQL_STATEMENT_TIMEOUT_MS,
      maxSubqueryDepth: e.SQL_MAX_SUBQUERY_DEPTH,
      bannedKeywords: e.SQL_BANNED_KEYWORDS !== undefined ? splitList(e.SQL_BANNED_KEYWORDS) : [...DEFAULT_BANNED_KEYWORDS],
      bannedFunctionPrefixes: [...DEFAULT_BANNED_FUNCTION_PREFIXES],
    },
    repair: { maxAttempts: e.MAX_REPAIR_ATTEMPTS },
    schema: {
      version: schemaVersion,
      maxChars: e.SCHEMA_CONTEXT_MAX_CHARS,
      objects: schemaObjects,
    },
    allowList,
    audit: { sink: e.AUDIT_SINK },
  });
}

// ---------------------------------------------------------------------------
// Process-wide instance
// ---------------------------------------------------------------------------

let cachedConfig: PipelineConfig | null = null;

/** Configuration for this process, loaded on first use. */
export function getConfig(): PipelineConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/** Forget the cached configuration (tests, reconfiguration). */
export function resetConfig(): void {
  cachedConfig = null;
}
