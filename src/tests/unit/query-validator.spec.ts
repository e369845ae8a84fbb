import { describe, expect, it } from 'vitest';

import {
  findDeniedSqlKeyword,
  stripSqlLiterals,
  validateQuery,
  validateScript,
  validateSql,
} from '../../sandbox/query-validator.js';

describe('validateSql', () => {
  it('accepts a single SELECT and drops the trailing semicolon', () => {
    expect(validateSql('  SELECT region FROM data;  ')).toEqual({ ok: true, statement: 'SELECT region FROM data' });
  });

  it('accepts WITH queries and leading comments', () => {
    expect(validateSql('WITH t AS (SELECT 1 AS x) SELECT x FROM t').ok).toBe(true);
    expect(validateSql('-- totals\nSELECT SUM(units) FROM data').ok).toBe(true);
  });

  it('rejects empty input', () => {
    expect(validateSql('')).toEqual({ ok: false, error: 'Empty query is not allowed' });
    expect(validateSql('  ;  ')).toEqual({ ok: false, error: 'Empty query is not allowed' });
  });

  it('rejects multiple statements', () => {
    expect(validateSql('SELECT 1; SELECT 2')).toEqual({ ok: false, error: 'Multiple statements are not allowed' });
  });

  it('names the denied statement type', () => {
    expect(validateSql('DROP TABLE data')).toEqual({
      ok: false,
      error: "Statement type 'DROP' is not allowed. Only SELECT queries are permitted.",
      keyword: 'DROP',
    });
    expect(validateSql('replace into data values (1)')).toMatchObject({ ok: false, keyword: 'REPLACE' });
  });

  it('rejects statements that do not start with SELECT or WITH', () => {
    expect(validateSql('EXPLAIN SELECT 1')).toEqual({
      ok: false,
      error: "Statement type 'EXPLAIN' is not allowed. Only SELECT queries are permitted.",
      keyword: 'EXPLAIN',
    });
  });

  it('ignores keywords inside literals and identifiers', () => {
    expect(validateSql("SELECT 'DROP; it' AS note FROM data").ok).toBe(true);
    expect(validateSql('SELECT "delete" FROM data').ok).toBe(true);
    expect(validateSql('SELECT updated_at FROM data').ok).toBe(true);
  });
});

describe('stripSqlLiterals', () => {
  it('blanks quoted strings including doubled quotes', () => {
    expect(stripSqlLiterals("SELECT 'it''s' FROM t")).toBe("SELECT '' FROM t");
  });

  it('removes comments', () => {
    expect(stripSqlLiterals('SELECT 1 /* DROP */ FROM t')).toBe('SELECT 1   FROM t');
  });
});

describe('findDeniedSqlKeyword', () => {
  it('is case-insensitive', () => {
    expect(findDeniedSqlKeyword('select * from data; delete from data')).toBe('DELETE');
    expect(findDeniedSqlKeyword('SELECT * FROM data')).toBeUndefined();
  });
});

describe('validateScript', () => {
  it('accepts plain analysis code', () => {
    expect(validateScript('return sum(rows.map((r) => r.units));')).toEqual({
      ok: true,
      statement: 'return sum(rows.map((r) => r.units));',
    });
  });

  it('rejects forbidden constructs', () => {
    expect(validateScript('const fs = require("fs")')).toEqual({
      ok: false,
      error: "Forbidden construct 'require(' in script",
      keyword: 'require(',
    });
    expect(validateScript('return rows.constructor')).toMatchObject({ ok: false, keyword: 'constructor' });
    expect(validateScript('return eval("1")')).toMatchObject({ ok: false, keyword: 'eval(' });
  });

  it('rejects empty scripts', () => {
    expect(validateScript('   ')).toEqual({ ok: false, error: 'Empty script is not allowed' });
  });
});

describe('validateQuery', () => {
  it('routes by language', () => {
    expect(validateQuery('return 1', 'script').ok).toBe(true);
    expect(validateQuery('return 1', 'sql')).toMatchObject({ ok: false, keyword: 'RETURN' });
  });
});
