/**
 * PostgreSQL tokenizer for the SQL validator.
 *
 * Produces a flat token stream with comments removed. String literals,
 * quoted identifiers and dollar-quoted bodies are single tokens, so keywords
 * inside them never surface as words.
 */

export type TokenKind =
  | 'word'
  | 'quoted_ident'
  | 'string'
  | 'number'
  | 'param'
  | 'punct'
  | 'operator';

export interface Token {
  readonly kind: TokenKind;
  /** Source text of the token. */
  readonly text: string;
  /**
   * Words are lower-cased (unquoted identifiers fold to lower case);
   * quoted identifiers are unescaped with their case kept; other tokens
   * repeat `text`.
   */
  readonly value: string;
  readonly offset: number;
}

export class SqlLexError extends Error {
  constructor(
    message: string,
    readonly offset: number,
  ) {
    super(message);
    this.name = 'SqlLexError';
  }
}

const PUNCTUATION = new Set(['(', ')', ',', ';', '[', ']', '.']);
const OPERATOR_CHARS = new Set([...'+-*/<>=~!@#%^&|`?:']);
const STRING_PREFIXES = new Set(['e', 'b', 'x', 'n']);

const WORD_RE = /[A-Za-z_\u0080-\uffff][A-Za-z0-9_$\u0080-\uffff]*/y;
const NUMBER_RE = /(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d+)?/y;
const PARAM_RE = /\$\d+/y;
const DOLLAR_TAG_RE = /\$(?:[A-Za-z_\u0080-\uffff][A-Za-z0-9_\u0080-\uffff]*)?\$/y;

function matchAt(re: RegExp, sql: string, index: number): string | null {
  re.lastIndex = index;
  const match = re.exec(sql);
  return match ? match[0] : null;
}

/**
 * Index just past the closing quote of a quoted run starting at `start`.
 * A doubled quote character is an escaped quote.
 */
function scanQuoted(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (backslashEscapes && ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  const what = quote === '"' ? 'quoted identifier' : 'string literal';
  throw new SqlLexError(`Unterminated ${what}`, start);
}

function skipBlockComment(sql: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < sql.length) {
    if (sql.startsWith('/*', i)) {
      depth++;
      i += 2;
    } else if (sql.startsWith('*/', i)) {
      depth--;
      i += 2;
      if (depth === 0) return i;
    } else {
      i++;
    }
  }
  throw new SqlLexError('Unterminated block comment', start);
}

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  const push = (kind: TokenKind, start: number, end: number, value?: string) => {
    const text = sql.slice(start, end);
    tokens.push({ kind, text, value: value ?? text, offset: start });
  };

  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (sql.startsWith('--', i)) {
      const newline = sql.indexOf('\n', i);
      i = newline === -1 ? sql.length : newline + 1;
      continue;
    }
    if (sql.startsWith('/*', i)) {
      i = skipBlockComment(sql, i);
      continue;
    }

    if (ch === "'") {
      const end = scanQuoted(sql, i, "'", false);
      push('string', i, end);
      i = end;
      continue;
    }

    if (ch === '"') {
      const end = scanQuoted(sql, i, '"', false);
      push('quoted_ident', i, end, sql.slice(i + 1, end - 1).replace(/""/g, '"'));
      i = end;
      continue;
    }

    if (ch === '$') {
      const param = matchAt(PARAM_RE, sql, i);
      if (param) {
        push('param', i, i + param.length);
        i += param.length;
        continue;
      }
      const tag = matchAt(DOLLAR_TAG_RE, sql, i);
      if (tag) {
        const close = sql.indexOf(tag, i + tag.length);
        if (close === -1) {
          throw new SqlLexError('Unterminated dollar-quoted string', i);
        }
        const end = close + tag.length;
        push('string', i, end);
        i = end;
        continue;
      }
    }

    const number = matchAt(NUMBER_RE, sql, i);
    if (number) {
      push('number', i, i + number.length);
      i += number.length;
      continue;
    }

    const word = matchAt(WORD_RE, sql, i);
    if (word) {
      const after = i + word.length;
      const lower = word.toLowerCase();

      // E'...', B'...', X'...', N'...'
      if (word.length === 1 && STRING_PREFIXES.has(lower) && sql[after] === "'") {
        const end = scanQuoted(sql, after, "'", lower === 'e');
        push('string', i, end);
        i = end;
        continue;
      }
      // U&'...' and U&"..."
      if (lower === 'u' && sql[after] === '&' && (sql[after + 1] === "'" || sql[after + 1] === '"')) {
        const quote = sql[after + 1];
        const end = scanQuoted(sql, after + 1, quote, false);
        if (quote === '"') {
          push('quoted_ident', i, end, sql.slice(after + 2, end - 1).replace(/""/g, '"'));
        } else {
          push('string', i, end);
        }
        i = end;
        continue;
      }

      push('word', i, after, lower);
      i = after;
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      push('punct', i, i + 1);
      i++;
      continue;
    }

    if (OPERATOR_CHARS.has(ch) || ch === '$') {
      let end = i + 1;
      while (
        end < sql.length &&
        OPERATOR_CHARS.has(sql[end]) &&
        !sql.startsWith('--', end) &&
        !sql.startsWith('/*', end)
      ) {
        end++;
      }
      push('operator', i, end);
      i = end;
      continue;
    }

    throw new SqlLexError(`Unexpected character ${JSON.stringify(ch)}`, i);
  }

  return tokens;
}
