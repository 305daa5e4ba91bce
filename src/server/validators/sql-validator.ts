/**
 * SQL safety validator using PostgreSQL's own parser (libpg-query WASM).
 *
 * The only gate between generated (or user-submitted) SQL and the database.
 * The token stream settles what the parser cannot see: the leading verb,
 * the statement terminator and banned keywords. Everything structural is read
 * from the parse tree, turned into a light model (query blocks, FROM sources,
 * CTE scopes) and run through an ordered list of checks. The first failing
 * check decides the verdict.
 *
 *  1. Single SELECT statement (optionally WITH ... SELECT)
 *  2. No banned keyword, no call to a banned function
 *  3. Every object read is on the allow-list
 *  4. Row-limited blocks have an ORDER BY with a unique tiebreaker
 *  5. The outer query carries a literal row cap, unless it is aggregate-only
 *  6. Subquery nesting stays within the configured depth
 *
 * Only verdicts produced here are accepted by the executor; see
 * {@link isAcceptedVerdict}.
 */

import type {
  AcceptedVerdict,
  RejectedVerdict,
  RejectionReason,
  SchemaObject,
  ValidationRule,
  ValidationVerdict,
} from '../../shared/types';
import {
  AGGREGATE_FUNCTIONS,
  MAX_PARENTHESIS_NESTING,
  SET_RETURNING_FUNCTIONS,
} from '../../shared/constants';
import { SqlLexError, tokenize, type Token } from './sql-lexer';

// ---------------------------------------------------------------------------
// Lazy-load the WASM parser
// ---------------------------------------------------------------------------

let pgQuery: { parse: (sql: string) => Promise<unknown> } | null = null;

async function getParser() {
  if (!pgQuery) {
    pgQuery = await import('libpg-query');
  }
  return pgQuery;
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export interface ObjectAllowList {
  has(name: string): boolean;
}

export interface SchemaCatalog {
  lookup(name: string): SchemaObject | undefined;
}

export interface ValidationRules {
  readonly allowList: ObjectAllowList;
  readonly catalog: SchemaCatalog;
  readonly maxRows: number;
  readonly maxSubqueryDepth: number;
  /** Upper-case keywords; multi-word entries are matched as token sequences. */
  readonly bannedKeywords: readonly string[];
  readonly bannedFunctionPrefixes: readonly string[];
  /** Schema that unqualified object names resolve against. */
  readonly defaultSchema: string;
}

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

const issued = new WeakSet<object>();

/** True only for accepted verdicts created by {@link validateSql}. */
export function isAcceptedVerdict(value: unknown): value is AcceptedVerdict {
  return typeof value === 'object' && value !== null && issued.has(value);
}

function accept(sql: string, objects: readonly string[]): AcceptedVerdict {
  const verdict: AcceptedVerdict = Object.freeze({
    status: 'accepted',
    sql,
    objects: Object.freeze([...objects]),
  });
  issued.add(verdict);
  return verdict;
}

const RULE_FOR: Record<RejectionReason, ValidationRule> = {
  non_select: 'single_select',
  banned_keyword: 'banned_keywords',
  disallowed_object: 'allow_list',
  missing_order_by: 'deterministic_order',
  missing_unique_tiebreaker: 'deterministic_order',
  row_cap_exceeded: 'row_cap',
  depth_limit_exceeded: 'subquery_depth',
};

/** Thrown inside the analysis; converted to a verdict at the boundary. */
class Rejection extends Error {
  constructor(
    readonly reason: RejectionReason,
    readonly detail: string,
  ) {
    super(detail);
    this.name = 'Rejection';
  }
}

function reject(reason: RejectionReason, detail: string): never {
  throw new Rejection(reason, detail);
}

function toVerdict(rejection: Rejection): RejectedVerdict {
  return Object.freeze({
    status: 'rejected',
    reason: rejection.reason,
    rule: RULE_FOR[rejection.reason],
    detail: rejection.detail,
  });
}

// ---------------------------------------------------------------------------
// Parse tree access
// ---------------------------------------------------------------------------

type AstNode = Record<string, unknown>;

function isRecord(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Body of a `{ Type: {...} }` node wrapper. */
function nodeOf(value: unknown, type: string): AstNode | undefined {
  if (!isRecord(value)) return undefined;
  const body = value[type];
  return isRecord(body) ? body : undefined;
}

/** Typed fields (withClause, alias, larg) may come wrapped or bare. */
function fieldOf(value: unknown, type: string): AstNode | undefined {
  return nodeOf(value, type) ?? (isRecord(value) ? value : undefined);
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function stringOf(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function selectOf(value: unknown): AstNode | undefined {
  const wrapped = nodeOf(value, 'SelectStmt');
  if (wrapped) return wrapped;
  if (isRecord(value) && ('op' in value || 'targetList' in value || 'valuesLists' in value)) return value;
  return undefined;
}

/** Name parts of a qualified name list; `*` for A_Star. */
function nameParts(list: unknown): string[] {
  return listOf(list).map((item) => stringOf(nodeOf(item, 'String')?.sval) ?? '*');
}

function lastPart(parts: readonly string[]): string {
  return parts[parts.length - 1] ?? '';
}

/** Integer value of an A_Const; zero arrives as an empty `ival`. */
function integerConstant(value: unknown): number | null {
  const constant = nodeOf(value, 'A_Const');
  if (!constant || !isRecord(constant.ival)) return null;
  const ival = constant.ival.ival;
  if (ival === undefined) return 0;
  return typeof ival === 'number' ? ival : null;
}

type Visitor = (key: string, value: unknown) => boolean | void;

/** Depth-first over every keyed field; a visitor returning false skips that subtree. */
function walk(node: unknown, visit: Visitor): void {
  if (Array.isArray(node)) {
    for (const item of node) walk(item, visit);
    return;
  }
  if (!isRecord(node)) return;
  for (const [key, value] of Object.entries(node)) {
    if (visit(key, value) === false) continue;
    walk(value, visit);
  }
}

function renderExpression(value: unknown): string {
  const ref = nodeOf(value, 'ColumnRef');
  if (ref) return nameParts(ref.fields).join('.');

  const constant = nodeOf(value, 'A_Const');
  if (constant) {
    const integer = integerConstant(value);
    if (integer !== null) return String(integer);
    return stringOf(nodeOf(constant, 'sval')?.sval) ?? stringOf(nodeOf(constant, 'fval')?.fval) ?? 'constant';
  }

  const call = nodeOf(value, 'FuncCall');
  if (call) {
    const args = call.agg_star === true ? '*' : listOf(call.args).map(renderExpression).join(', ');
    return `${nameParts(call.funcname).join('.')}(${args})`;
  }

  const cast = nodeOf(value, 'TypeCast');
  if (cast) return renderExpression(cast.arg);
  return 'expression';
}

// ---------------------------------------------------------------------------
// Structural model
// ---------------------------------------------------------------------------

type LimitClause = { kind: 'literal'; value: number } | { kind: 'all' } | { kind: 'expression' };

interface Tail {
  orderBy: unknown[];
  limit: LimitClause | null;
  /** FETCH ... WITH TIES */
  withTies: boolean;
  offset: boolean;
}

interface SelectItem {
  expr: unknown;
  alias: string | null;
  /** Output column name: the alias, or the last part of a plain column reference. */
  outputName: string | null;
  star: boolean;
}

interface Source {
  kind: 'object' | 'function' | 'cte' | 'derived';
  /** Qualified name for objects and functions; null for three-part names. */
  name: string | null;
  display: string;
  alias: string | null;
  entry: SchemaObject | undefined;
}

interface SelectBlock {
  type: 'select';
  depth: number;
  distinct: boolean;
  selectItems: SelectItem[];
  sources: Source[];
  groupBy: unknown[];
  tail: Tail;
  subqueries: QueryExpression[];
}

interface QueryExpression {
  type: 'expression';
  depth: number;
  ctes: QueryExpression[];
  arms: (SelectBlock | QueryExpression)[];
  /** True when every set operator removes duplicates (no ALL). */
  distinctSetOps: boolean;
  /** ORDER BY / LIMIT applying to a set operation. */
  tail: Tail | null;
}

interface BuildContext {
  readonly scope: ReadonlySet<string>;
  readonly rules: ValidationRules;
}

interface ColumnRef {
  qualifier: string | null;
  column: string;
}

function columnRef(value: unknown): ColumnRef | null {
  const ref = nodeOf(value, 'ColumnRef');
  if (!ref) return null;
  const parts = nameParts(ref.fields);
  if (parts.length === 0 || parts.length > 3 || parts.includes('*')) return null;
  return {
    qualifier: parts.length > 1 ? parts.slice(0, -1).join('.') : null,
    column: lastPart(parts),
  };
}

function isStar(value: unknown): boolean {
  const ref = nodeOf(value, 'ColumnRef');
  return ref !== undefined && nameParts(ref.fields).includes('*');
}

function qualify(parts: readonly string[], defaultSchema: string): string | null {
  if (parts.length === 1) return `${defaultSchema}.${parts[0]}`;
  if (parts.length === 2) return `${parts[0]}.${parts[1]}`;
  return null;
}

function relationParts(rangeVar: AstNode): string[] {
  return [rangeVar.catalogname, rangeVar.schemaname, rangeVar.relname]
    .map(stringOf)
    .filter((part): part is string => part !== undefined && part !== '');
}

function aliasOf(value: unknown): string | null {
  return stringOf(fieldOf(value, 'Alias')?.aliasname) ?? null;
}

function parseLimit(value: unknown): LimitClause {
  if (nodeOf(value, 'A_Const')?.isnull === true) return { kind: 'all' };
  const count = integerConstant(value);
  return count !== null && count >= 0 ? { kind: 'literal', value: count } : { kind: 'expression' };
}

function tailOf(stmt: AstNode): Tail {
  return {
    orderBy: listOf(stmt.sortClause).flatMap((item) => {
      const node = nodeOf(item, 'SortBy')?.node;
      return node === undefined ? [] : [node];
    }),
    limit: stmt.limitCount === undefined ? null : parseLimit(stmt.limitCount),
    withTies: stmt.limitOption === 'LIMIT_OPTION_WITH_TIES',
    offset: stmt.limitOffset !== undefined,
  };
}

function selectItems(targetList: unknown): SelectItem[] {
  return listOf(targetList).flatMap((item): SelectItem[] => {
    const target = nodeOf(item, 'ResTarget');
    if (!target) return [];
    const alias = stringOf(target.name) ?? null;
    return [{
      expr: target.val,
      alias,
      outputName: alias ?? columnRef(target.val)?.column ?? null,
      star: isStar(target.val),
    }];
  });
}

function hasOwnTail(stmt: AstNode): boolean {
  return listOf(stmt.sortClause).length > 0 || stmt.limitCount !== undefined || stmt.limitOffset !== undefined;
}

// ---------------------------------------------------------------------------
// Building the model
// ---------------------------------------------------------------------------

function buildExpression(stmt: AstNode, ctx: BuildContext, depth: number): QueryExpression {
  const ctes: QueryExpression[] = [];
  let scope = ctx.scope;

  const withClause = fieldOf(stmt.withClause, 'WithClause');
  if (withClause) {
    const definitions = listOf(withClause.ctes).flatMap((item) => {
      const cte = nodeOf(item, 'CommonTableExpr');
      return cte ? [cte] : [];
    });
    const names = definitions.map((definition) => stringOf(definition.ctename) ?? '');
    definitions.forEach((definition, index) => {
      // Non-recursive CTEs only see the ones defined before them.
      const visible = withClause.recursive === true ? names : names.slice(0, index);
      const body = selectOf(definition.ctequery);
      if (!body) reject('non_select', `CTE ${names[index]} does not contain a SELECT`);
      ctes.push(buildExpression(body, { ...ctx, scope: new Set([...ctx.scope, ...visible]) }, depth + 1));
    });
    scope = new Set([...ctx.scope, ...names]);
  }

  const inner: BuildContext = { ...ctx, scope };
  if ((stringOf(stmt.op) ?? 'SETOP_NONE') === 'SETOP_NONE') {
    return { type: 'expression', depth, ctes, arms: [buildBlock(stmt, inner, depth)], distinctSetOps: true, tail: null };
  }

  const arms: (SelectBlock | QueryExpression)[] = [];
  let distinctSetOps = true;

  const addArms = (node: AstNode): void => {
    if (node.all === true) distinctSetOps = false;
    for (const side of [node.larg, node.rarg]) {
      const arm = selectOf(side);
      if (!arm) reject('non_select', 'Set operation is missing a query');
      const setOp = (stringOf(arm.op) ?? 'SETOP_NONE') !== 'SETOP_NONE';
      const nested = arm.withClause !== undefined || (setOp && hasOwnTail(arm));
      if (nested) {
        arms.push(buildExpression(arm, inner, depth));
      } else if (setOp) {
        addArms(arm);
      } else {
        arms.push(buildBlock(arm, inner, depth));
      }
    }
  };
  addArms(stmt);

  const sink: QueryExpression[] = [];
  for (const field of [stmt.sortClause, stmt.limitCount, stmt.limitOffset]) {
    collectSubqueries(field, inner, depth + 1, sink);
  }
  if (sink.length > 0) {
    reject('non_select', 'Subqueries are not supported in ORDER BY or LIMIT of a set operation');
  }

  return { type: 'expression', depth, ctes, arms, distinctSetOps, tail: tailOf(stmt) };
}

function buildBlock(stmt: AstNode, ctx: BuildContext, depth: number): SelectBlock {
  if (listOf(stmt.valuesLists).length > 0) reject('non_select', 'VALUES lists are not permitted');

  const items = selectItems(stmt.targetList);
  if (items.length === 0) reject('non_select', 'SELECT list is empty');

  // Plain DISTINCT is a list holding one empty node; DISTINCT ON lists expressions.
  const distinctClause = listOf(stmt.distinctClause);
  const block: SelectBlock = {
    type: 'select',
    depth,
    distinct: distinctClause.length > 0 && distinctClause.every((d) => !isRecord(d) || Object.keys(d).length === 0),
    selectItems: items,
    sources: [],
    groupBy: listOf(stmt.groupClause),
    tail: tailOf(stmt),
    subqueries: [],
  };

  for (const item of listOf(stmt.fromClause)) {
    addFromItem(item, block, ctx, depth);
  }

  const clauses = [
    stmt.targetList,
    stmt.whereClause,
    stmt.groupClause,
    stmt.havingClause,
    stmt.windowClause,
    stmt.distinctClause,
    stmt.sortClause,
    stmt.limitCount,
    stmt.limitOffset,
  ];
  for (const clause of clauses) {
    collectSubqueries(clause, ctx, depth + 1, block.subqueries);
  }
  return block;
}

/** Builds every SubLink found in an expression, without descending into it twice. */
function collectSubqueries(node: unknown, ctx: BuildContext, depth: number, sink: QueryExpression[]): void {
  walk(node, (key, value) => {
    if (key !== 'SubLink') return true;
    const link = isRecord(value) ? value : undefined;
    const query = link ? selectOf(link.subselect) : undefined;
    if (!link || !query) reject('non_select', 'Subquery does not contain a SELECT');
    // The left side of `x IN (...)` sits at the current level.
    collectSubqueries(link.testexpr, ctx, depth, sink);
    sink.push(buildExpression(query, ctx, depth));
    return false;
  });
}

function addRelation(rangeVar: AstNode, block: SelectBlock, ctx: BuildContext): void {
  const parts = relationParts(rangeVar);
  const kind: Source['kind'] = parts.length === 1 && ctx.scope.has(parts[0]) ? 'cte' : 'object';
  const name = kind === 'cte' ? null : qualify(parts, ctx.rules.defaultSchema);
  block.sources.push({
    kind,
    name,
    display: parts.join('.'),
    alias: aliasOf(rangeVar.alias),
    entry: kind === 'object' && name !== null ? ctx.rules.catalog.lookup(name) : undefined,
  });
}

function addFromItem(item: unknown, block: SelectBlock, ctx: BuildContext, depth: number): void {
  const rangeVar = nodeOf(item, 'RangeVar');
  if (rangeVar) {
    addRelation(rangeVar, block, ctx);
    return;
  }

  const sample = nodeOf(item, 'RangeTableSample');
  if (sample) {
    addFromItem(sample.relation, block, ctx, depth);
    return;
  }

  const join = nodeOf(item, 'JoinExpr');
  if (join) {
    addFromItem(join.larg, block, ctx, depth);
    addFromItem(join.rarg, block, ctx, depth);
    collectSubqueries(join.quals, ctx, depth + 1, block.subqueries);
    return;
  }

  const subselect = nodeOf(item, 'RangeSubselect');
  if (subselect) {
    const query = selectOf(subselect.subquery);
    if (!query) reject('non_select', 'Derived table does not contain a SELECT');
    block.subqueries.push(buildExpression(query, ctx, depth + 1));
    block.sources.push({ kind: 'derived', name: null, display: '(subquery)', alias: aliasOf(subselect.alias), entry: undefined });
    return;
  }

  const rangeFunction = nodeOf(item, 'RangeFunction');
  if (rangeFunction) {
    for (const entry of listOf(rangeFunction.functions)) {
      const call = nodeOf(listOf(nodeOf(entry, 'List')?.items ?? entry)[0], 'FuncCall');
      if (!call) reject('non_select', 'Unsupported function expression in FROM clause');
      const parts = nameParts(call.funcname);
      block.sources.push({
        kind: 'function',
        name: qualify(parts, ctx.rules.defaultSchema),
        display: parts.join('.'),
        alias: aliasOf(rangeFunction.alias),
        entry: undefined,
      });
      collectSubqueries(call.args, ctx, depth + 1, block.subqueries);
    }
    return;
  }

  const type = isRecord(item) ? Object.keys(item)[0] : undefined;
  reject('non_select', `Unsupported FROM item ${type ?? 'in query'}`);
}

// ---------------------------------------------------------------------------
// Tree walking
// ---------------------------------------------------------------------------

function forEachNode(
  expression: QueryExpression,
  visitExpression: (expression: QueryExpression) => void,
  visitBlock: (block: SelectBlock) => void,
): void {
  visitExpression(expression);
  for (const cte of expression.ctes) forEachNode(cte, visitExpression, visitBlock);
  for (const arm of expression.arms) {
    if (arm.type === 'expression') {
      forEachNode(arm, visitExpression, visitBlock);
      continue;
    }
    visitBlock(arm);
    for (const sub of arm.subqueries) forEachNode(sub, visitExpression, visitBlock);
  }
}

// ---------------------------------------------------------------------------
// Check 1: single SELECT
// ---------------------------------------------------------------------------

function checkSingleSelect(tokens: Token[], rules: ValidationRules): Token[] {
  if (tokens.length === 0) reject('non_select', 'Statement is empty');

  const semicolon = tokens.findIndex((t) => t.kind === 'punct' && t.value === ';');
  if (semicolon >= 0 && semicolon !== tokens.length - 1) {
    reject('non_select', 'Only one statement may be submitted');
  }
  const body = semicolon >= 0 ? tokens.slice(0, semicolon) : tokens;
  if (body.length === 0) reject('non_select', 'Statement is empty');

  const first = body[0];
  if (first.kind === 'punct' && first.value === '(') return body;
  if (first.kind === 'word' && (first.value === 'select' || first.value === 'with')) return body;

  const verb = first.text.toUpperCase();
  if (first.kind === 'word' && rules.bannedKeywords.some((k) => k.split(/\s+/)[0].toUpperCase() === verb)) {
    reject('banned_keyword', `Statement starts with banned keyword ${verb}`);
  }
  return reject('non_select', `Statement starts with ${verb}; only SELECT is permitted`);
}

function checkParenthesisNesting(tokens: readonly Token[]): void {
  let open = 0;
  for (const token of tokens) {
    if (token.kind !== 'punct') continue;
    if (token.value === '(') open++;
    else if (token.value === ')') open--;
    if (open > MAX_PARENTHESIS_NESTING) {
      reject('depth_limit_exceeded', `Parenthesis nesting exceeds ${MAX_PARENTHESIS_NESTING} levels`);
    }
  }
}

async function parseSelect(sql: string): Promise<AstNode> {
  const parser = await getParser();
  let result: unknown = null;
  try {
    result = await parser.parse(sql);
  } catch (parseError: unknown) {
    const msg = parseError instanceof Error ? parseError.message : 'Unknown parse error';
    reject('non_select', `SQL parse error: ${msg}`);
  }

  const stmts = isRecord(result) ? listOf(result.stmts) : [];
  if (stmts.length === 0) reject('non_select', 'Statement is empty');
  if (stmts.length > 1) reject('non_select', 'Only one statement may be submitted');

  const stmt = isRecord(stmts[0]) ? stmts[0].stmt : undefined;
  const select = nodeOf(stmt, 'SelectStmt');
  if (!select) {
    const stmtType = isRecord(stmt) ? Object.keys(stmt)[0] : undefined;
    reject('non_select', `Only SELECT statements are permitted (got ${stmtType ?? 'nothing'})`);
  }
  return select;
}

// ---------------------------------------------------------------------------
// Check 2: banned keywords and functions
// ---------------------------------------------------------------------------

function checkBannedKeywords(tokens: readonly Token[], rules: ValidationRules): void {
  const sequences = rules.bannedKeywords.map((keyword) => ({
    keyword,
    words: keyword.toLowerCase().split(/\s+/).filter(Boolean),
  }));

  for (let i = 0; i < tokens.length; i++) {
    if (tokens[i].kind !== 'word') continue;
    for (const { keyword, words } of sequences) {
      if (words.length === 0) continue;
      const matches = words.every((word, k) => {
        const candidate = tokens[i + k];
        return candidate !== undefined && candidate.kind === 'word' && candidate.value === word;
      });
      if (matches) reject('banned_keyword', `Banned keyword ${keyword}`);
    }
  }
}

const DATA_MODIFYING = new Map([
  ['InsertStmt', 'INSERT'],
  ['UpdateStmt', 'UPDATE'],
  ['DeleteStmt', 'DELETE'],
  ['MergeStmt', 'MERGE'],
]);

/** Writes, SELECT INTO, row locks and restricted calls anywhere in the tree. */
function checkRestrictedNodes(stmt: AstNode, rules: ValidationRules): void {
  const prefixes = rules.bannedFunctionPrefixes.map((p) => p.toLowerCase());
  walk(stmt, (key, value) => {
    const verb = DATA_MODIFYING.get(key);
    if (verb !== undefined) reject('banned_keyword', `Data-modifying ${verb} is not permitted`);
    if (key === 'intoClause' && isRecord(value)) reject('banned_keyword', 'SELECT INTO is not permitted');
    if (key === 'lockingClause' && listOf(value).length > 0) {
      reject('banned_keyword', 'Row-locking clause FOR ... is not permitted');
    }
    if (key === 'FuncCall' && isRecord(value)) {
      const parts = nameParts(value.funcname);
      const fn = lastPart(parts).toLowerCase();
      if (prefixes.some((prefix) => fn.startsWith(prefix))) {
        reject('banned_keyword', `Call to restricted function ${parts.join('.')}`);
      }
    }
  });
}

// ---------------------------------------------------------------------------
// Check 3: allow-list
// ---------------------------------------------------------------------------

function checkObjects(root: QueryExpression, rules: ValidationRules): string[] {
  const objects: string[] = [];
  forEachNode(
    root,
    () => undefined,
    (block) => {
      for (const source of block.sources) {
        if (source.kind === 'cte' || source.kind === 'derived') continue;
        if (source.name === null) {
          reject('disallowed_object', `Object ${source.display} uses a three-part name`);
        }
        if (!rules.allowList.has(source.name)) {
          reject('disallowed_object', `Object ${source.name} is not on the allow-list`);
        }
        if (!objects.includes(source.name)) objects.push(source.name);
      }
    },
  );
  return objects;
}

/** Every RangeVar in the tree, whatever clause it sits in, must be a CTE or allow-listed. */
function checkRelations(stmt: AstNode, rules: ValidationRules): void {
  const cteNames = new Set<string>();
  walk(stmt, (key, value) => {
    const name = key === 'CommonTableExpr' && isRecord(value) ? stringOf(value.ctename) : undefined;
    if (name !== undefined) cteNames.add(name);
  });

  walk(stmt, (key, value) => {
    if (key !== 'RangeVar' || !isRecord(value)) return;
    const parts = relationParts(value);
    if (parts.length === 1 && cteNames.has(parts[0])) return;
    const name = qualify(parts, rules.defaultSchema);
    if (name === null) reject('disallowed_object', `Object ${parts.join('.')} uses a three-part name`);
    if (!rules.allowList.has(name)) reject('disallowed_object', `Object ${name} is not on the allow-list`);
  });
}

// ---------------------------------------------------------------------------
// Check 4: deterministic ordering
// ---------------------------------------------------------------------------

function hasColumn(entry: SchemaObject, column: string): boolean {
  return entry.columns.some((c) => c.name === column);
}

function resolveSource(ref: ColumnRef, block: SelectBlock): number | null {
  const { sources } = block;
  if (ref.qualifier !== null) {
    const q = ref.qualifier;
    const index = sources.findIndex((s) =>
      s.alias !== null ? s.alias === q : s.name === q || s.display === q || s.display.split('.').pop() === q,
    );
    return index >= 0 ? index : null;
  }

  const opaque = sources.some((s) => s.entry === undefined);
  const candidates = sources
    .map((s, index) => ({ s, index }))
    .filter(({ s }) => s.entry !== undefined && hasColumn(s.entry, ref.column));
  if (candidates.length === 1 && !opaque) return candidates[0].index;
  if (sources.length === 1) return 0;
  return null;
}

type KeyMode = 'order' | 'group' | 'plain';

/** Parse tree without positions, so equal expressions compare equal. */
function canonical(expr: unknown): string {
  return JSON.stringify(expr, (key, value: unknown) => (key === 'location' ? undefined : value));
}

/**
 * Canonical key for an ORDER BY or GROUP BY expression: `col:<source>:<column>`
 * when it resolves to a column of a FROM source, otherwise the expression tree.
 */
function expressionKey(expr: unknown, block: SelectBlock, mode: KeyMode): string {
  if (mode !== 'plain') {
    const ordinal = integerConstant(expr);
    if (ordinal !== null) {
      const target = block.selectItems[ordinal - 1];
      return target ? expressionKey(target.expr, block, 'plain') : `ordinal:${ordinal}`;
    }
  }

  const ref = columnRef(expr);
  if (ref) {
    const aliased =
      mode !== 'plain' && ref.qualifier === null
        ? block.selectItems.find((item) => item.alias === ref.column)
        : undefined;
    // ORDER BY prefers output names; GROUP BY prefers input columns.
    if (aliased && mode === 'order') return expressionKey(aliased.expr, block, 'plain');

    const source = resolveSource(ref, block);
    if (source !== null) return `col:${source}:${ref.column}`;
    if (aliased) return expressionKey(aliased.expr, block, 'plain');
  }
  return `expr:${canonical(expr)}`;
}

function callsFunctionIn(expr: unknown, names: ReadonlySet<string>, aggregatesOnly: boolean): boolean {
  let found = false;
  walk(expr, (key, value) => {
    if (found || key === 'SubLink') return false;
    if (key !== 'FuncCall' || !isRecord(value)) return true;
    // A windowed aggregate still returns one row per input row.
    if (aggregatesOnly && value.over !== undefined) return true;
    if (names.has(lastPart(nameParts(value.funcname)).toLowerCase())) {
      found = true;
      return false;
    }
    return true;
  });
  return found;
}

/** Block returns at most one row per group: GROUP BY, or only aggregate select items. */
function isAggregateOnly(block: SelectBlock): boolean {
  if (block.groupBy.length > 0) return true;
  if (block.selectItems.some((item) => callsFunctionIn(item.expr, SET_RETURNING_FUNCTIONS, false))) return false;
  return block.selectItems.every((item) => callsFunctionIn(item.expr, AGGREGATE_FUNCTIONS, true));
}

function hasUniqueOrdering(block: SelectBlock, orderBy: unknown[]): boolean {
  // A single aggregate row needs no tiebreaker.
  if (block.groupBy.length === 0 && isAggregateOnly(block)) return true;

  const orderKeys = new Set(orderBy.map((expr) => expressionKey(expr, block, 'order')));

  if (block.groupBy.length > 0) {
    const groupKeys = block.groupBy.map((expr) => expressionKey(expr, block, 'group'));
    if (groupKeys.every((key) => orderKeys.has(key))) return true;
  }

  if (block.distinct && !block.selectItems.some((item) => item.star)) {
    const selectKeys = block.selectItems.map((item) => expressionKey(item.expr, block, 'plain'));
    if (selectKeys.every((key) => orderKeys.has(key))) return true;
  }

  return block.sources.some((source, index) => {
    const entry = source.entry;
    if (entry === undefined) return false;
    const keys = [entry.primaryKey, ...entry.uniqueKeys].filter((key) => key.length > 0);
    return keys.some((key) => key.every((column) => orderKeys.has(`col:${index}:${column}`)));
  });
}

function isRowLimited(tail: Tail): boolean {
  return (tail.limit !== null && tail.limit.kind !== 'all') || tail.offset;
}

function firstBlock(expression: QueryExpression): SelectBlock {
  const arm = expression.arms[0];
  return arm.type === 'select' ? arm : firstBlock(arm);
}

/** Set operations: only a duplicate-free result ordered by every output column is unique. */
function hasUniqueSetOrdering(expression: QueryExpression, orderBy: unknown[]): boolean {
  if (!expression.distinctSetOps) return false;
  const outputs = firstBlock(expression).selectItems;
  if (outputs.some((item) => item.star)) return false;

  const covered = new Set<number>();
  for (const expr of orderBy) {
    const ordinal = integerConstant(expr);
    if (ordinal !== null) {
      covered.add(ordinal - 1);
      continue;
    }
    const ref = columnRef(expr);
    if (ref && ref.qualifier === null) {
      const index = outputs.findIndex((item) => item.outputName === ref.column);
      if (index >= 0) covered.add(index);
    }
  }
  return outputs.every((_, index) => covered.has(index));
}

function hasUniqueExpressionOrdering(expression: QueryExpression, orderBy: unknown[]): boolean {
  if (expression.arms.length > 1) return hasUniqueSetOrdering(expression, orderBy);
  const arm = expression.arms[0];
  return arm.type === 'select' ? hasUniqueOrdering(arm, orderBy) : hasUniqueExpressionOrdering(arm, orderBy);
}

function checkOrdering(root: QueryExpression): void {
  forEachNode(
    root,
    (expression) => {
      const tail = expression.tail;
      if (tail === null || !isRowLimited(tail)) return;
      if (tail.orderBy.length === 0) {
        reject('missing_order_by', 'Row-limited query has no ORDER BY clause');
      }
      if (!hasUniqueExpressionOrdering(expression, tail.orderBy)) {
        reject('missing_unique_tiebreaker', 'ORDER BY of the row-limited query does not cover a unique key');
      }
    },
    (block) => {
      if (!isRowLimited(block.tail)) return;
      if (block.tail.orderBy.length === 0) {
        reject('missing_order_by', 'Row-limited query block has no ORDER BY clause');
      }
      if (!hasUniqueOrdering(block, block.tail.orderBy)) {
        const ordered = block.tail.orderBy.map(renderExpression).join(', ');
        reject(
          'missing_unique_tiebreaker',
          `ORDER BY ${ordered} does not cover a primary key, unique key or all GROUP BY columns`,
        );
      }
    },
  );
}

// ---------------------------------------------------------------------------
// Check 5: row cap
// ---------------------------------------------------------------------------

function tailCap(tail: Tail | null): number | null {
  const limit = tail?.limit;
  if (!tail || tail.withTies || !limit || limit.kind !== 'literal') return null;
  return limit.value;
}

function effectiveCap(expression: QueryExpression): number | null {
  const caps: number[] = [];
  const own = tailCap(expression.tail);
  if (own !== null) caps.push(own);
  if (expression.arms.length === 1) {
    const arm = expression.arms[0];
    const inner = arm.type === 'select' ? tailCap(arm.tail) : effectiveCap(arm);
    if (inner !== null) caps.push(inner);
  }
  return caps.length > 0 ? Math.min(...caps) : null;
}

function isAggregateOnlyExpression(expression: QueryExpression): boolean {
  return expression.arms.every((arm) =>
    arm.type === 'select' ? isAggregateOnly(arm) : isAggregateOnlyExpression(arm),
  );
}

function checkRowCap(root: QueryExpression, maxRows: number): void {
  const cap = effectiveCap(root);
  if (cap !== null) {
    if (cap > maxRows) reject('row_cap_exceeded', `Row cap ${cap} exceeds the maximum of ${maxRows}`);
    return;
  }
  if (!isAggregateOnlyExpression(root)) {
    reject('row_cap_exceeded', `Outer query has no literal LIMIT or FETCH of at most ${maxRows} rows`);
  }
}

// ---------------------------------------------------------------------------
// Check 6: nesting depth
// ---------------------------------------------------------------------------

function checkDepth(root: QueryExpression, maxDepth: number): void {
  let deepest = 0;
  forEachNode(
    root,
    (expression) => {
      deepest = Math.max(deepest, expression.depth);
    },
    (block) => {
      deepest = Math.max(deepest, block.depth);
    },
  );
  if (deepest > maxDepth) {
    reject('depth_limit_exceeded', `Subquery nesting depth ${deepest} exceeds the maximum of ${maxDepth}`);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

function lex(candidate: string): Token[] {
  try {
    return tokenize(candidate);
  } catch (err) {
    if (err instanceof SqlLexError) reject('non_select', `${err.message} at offset ${err.offset}`);
    throw err;
  }
}

/**
 * Validate a candidate statement against the safety rules.
 *
 * Resolves to a rejection for malformed input; never rejects the promise
 * for it.
 */
export async function validateSql(candidate: string, rules: ValidationRules): Promise<ValidationVerdict> {
  try {
    const body = checkSingleSelect(lex(candidate), rules);
    checkBannedKeywords(body, rules);
    checkParenthesisNesting(body);

    const last = body[body.length - 1];
    const sql = candidate.slice(0, last.offset + last.text.length).trim();

    const stmt = await parseSelect(sql);
    checkRestrictedNodes(stmt, rules);

    const root = buildExpression(stmt, { scope: new Set(), rules }, 0);
    const objects = checkObjects(root, rules);
    checkRelations(stmt, rules);
    checkOrdering(root);
    checkRowCap(root, rules.maxRows);
    checkDepth(root, rules.maxSubqueryDepth);

    return accept(sql, objects);
  } catch (err) {
    if (err instanceof Rejection) return toVerdict(err);
    throw err;
  }
}
