import { describe, it, expect } from 'vitest';

import { SqlLexError, tokenize } from '../../src/server/validators/sql-lexer';

const kindsAndValues = (sql: string) => tokenize(sql).map((t) => [t.kind, t.value]);

describe('tokenize', () => {
  it('should lower-case words and keep quoted identifiers as written', () => {
    expect(kindsAndValues('SELECT "Order Id" FROM Sales.Customer')).toEqual([
      ['word', 'select'],
      ['quoted_ident', 'Order Id'],
      ['word', 'from'],
      ['word', 'sales'],
      ['punct', '.'],
      ['word', 'customer'],
    ]);
  });

  it('should unescape doubled quotes in identifiers', () => {
    expect(tokenize('"a""b"')[0].value).toBe('a"b');
  });

  it('should keep string literals, parameters and dollar-quoted bodies as single tokens', () => {
    expect(kindsAndValues("'it''s', $1, $tag$x; DROP$tag$")).toEqual([
      ['string', "'it''s'"],
      ['punct', ','],
      ['param', '$1'],
      ['punct', ','],
      ['string', '$tag$x; DROP$tag$'],
    ]);
  });

  it('should read escape strings with backslashes', () => {
    const tokens = tokenize("E'a\\'b' x");
    expect(tokens.map((t) => t.kind)).toEqual(['string', 'word']);
    expect(tokens[0].text).toBe("E'a\\'b'");
  });

  it('should drop line and nested block comments', () => {
    expect(kindsAndValues('/* a /* b */ c */ SELECT 1 -- DROP\n')).toEqual([
      ['word', 'select'],
      ['number', '1'],
    ]);
  });

  it('should group operator characters', () => {
    expect(kindsAndValues('a<>b')).toEqual([
      ['word', 'a'],
      ['operator', '<>'],
      ['word', 'b'],
    ]);
  });

  it('should read decimals and exponents as one number', () => {
    expect(kindsAndValues('1.5e3')).toEqual([['number', '1.5e3']]);
  });

  it('should record the offset of each token', () => {
    expect(tokenize('SELECT  x').map((t) => t.offset)).toEqual([0, 8]);
  });

  it('should throw on an unterminated block comment', () => {
    expect(() => tokenize('SELECT /* open')).toThrow(new SqlLexError('Unterminated block comment', 7));
  });

  it('should report the offset of unexpected characters', () => {
    try {
      tokenize('SELECT {');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SqlLexError);
      expect(err).toMatchObject({ message: 'Unexpected character "{"', offset: 7 });
    }
  });
});
