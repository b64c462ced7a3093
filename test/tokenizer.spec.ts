import { describe, it, expect } from 'vitest';
import { DefaultSqlTokenizer, SqlToken, firstStatement, lexSql, statementKind } from '../src/validator/tokenizer.js';

const kinds = (sql: string) => lexSql(sql).map((t) => [t.kind, t.text]);

describe('lexSql', () => {
  it('splits identifiers, keywords, operators and punctuation', () => {
    expect(kinds("a.b >= 'x''y' -- note")).toEqual([
      ['identifier', 'a'],
      ['punctuation', '.'],
      ['identifier', 'b'],
      ['whitespace', ' '],
      ['operator', '>='],
      ['whitespace', ' '],
      ['string', "'x''y'"],
      ['whitespace', ' '],
      ['comment', '-- note'],
    ]);
  });

  it('recognizes keywords in any case', () => {
    expect(kinds('select Distinct')).toEqual([
      ['keyword', 'select'],
      ['whitespace', ' '],
      ['keyword', 'Distinct'],
    ]);
  });

  it('reads numbers and quoted identifiers', () => {
    expect(kinds('1.5 "my col" `x`')).toEqual([
      ['number', '1.5'],
      ['whitespace', ' '],
      ['quoted-identifier', '"my col"'],
      ['whitespace', ' '],
      ['quoted-identifier', '`x`'],
    ]);
  });

  it('leaves a quote without a closing partner as a single unknown token', () => {
    expect(kinds("'abc FROM t;")).toEqual([
      ['unknown', "'"],
      ['identifier', 'abc'],
      ['whitespace', ' '],
      ['keyword', 'FROM'],
      ['whitespace', ' '],
      ['identifier', 't'],
      ['punctuation', ';'],
    ]);
    expect(kinds('"a (')).toEqual([
      ['unknown', '"'],
      ['identifier', 'a'],
      ['whitespace', ' '],
      ['punctuation', '('],
    ]);
  });

  it('keeps every character of the input', () => {
    const sql = "SELECT o.id, COUNT(*) FROM orders AS o WHERE o.note <> 'a;b' /* c */ ;";
    expect(lexSql(sql).map((t) => t.text).join('')).toBe(sql);
  });
});

describe('SqlToken', () => {
  it('matches keywords case-insensitively and other text exactly', () => {
    expect(new SqlToken('keyword', 'select').matches('keyword', 'SELECT')).toBe(true);
    expect(new SqlToken('identifier', 'Name').matches('identifier', 'name')).toBe(false);
    expect(new SqlToken('punctuation', ';').matches('punctuation')).toBe(true);
    expect(new SqlToken('comment', '-- x').significant).toBe(false);
  });
});

describe('statement splitting', () => {
  it('stops the first statement at its semicolon', () => {
    expect(firstStatement(lexSql('SELECT 1; SELECT 2')).map((t) => t.text)).toEqual(['SELECT', ' ', '1', ';']);
  });

  it('names the statement by its leading keyword', () => {
    expect(statementKind(lexSql('  -- lead\nSELECT 1'))).toBe('SELECT');
    expect(statementKind(lexSql('drop table t'))).toBe('DROP');
    expect(statementKind(lexSql('foo bar'))).toBe('UNKNOWN');
    expect(statementKind(lexSql('FROM t'))).toBe('UNKNOWN');
  });

  it('looks past common table expressions', () => {
    expect(statementKind(lexSql('WITH x AS (SELECT 1) SELECT * FROM x'))).toBe('SELECT');
    expect(statementKind(lexSql('WITH x AS (SELECT 1) DELETE FROM t'))).toBe('DELETE');
    expect(statementKind(lexSql('WITH x AS (SELECT 1)'))).toBe('UNKNOWN');
  });
});

describe('DefaultSqlTokenizer', () => {
  const tokenizer = new DefaultSqlTokenizer();

  it('gives up only on empty text', () => {
    expect(tokenizer.analyze('')).toBeUndefined();
    expect(tokenizer.analyze('  \n ')).toBeUndefined();
    expect(tokenizer.analyze('  ;  ')?.statementKind).toBe('UNKNOWN');
    expect(tokenizer.analyze('/* nothing */')?.tokens.map((t) => t.kind)).toEqual(['comment']);
  });

  it('returns the tokens of the first statement', () => {
    const analysis = tokenizer.analyze('update t set a = 1; select 2');
    expect(analysis?.statementKind).toBe('UPDATE');
    expect(analysis?.tokens.at(-1)?.text).toBe(';');
    expect(analysis?.tokens.some((t) => t.matches('number', '2'))).toBe(false);
  });

  it('uppercases keywords in the formatted text', () => {
    const formatted = tokenizer.analyze('select o.id from orders as o;')?.formatted ?? '';
    expect(formatted).toContain('SELECT');
    expect(formatted).toContain('FROM');
    expect(formatted).not.toContain('select');
  });
});
