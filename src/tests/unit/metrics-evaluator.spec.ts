import { describe, expect, it } from 'vitest';

import type { ExecutionResult, ExecutionValue } from '../../types.js';

import {
  checkCodeSafety,
  checkNumericGrounding,
  checkResultValidity,
  mergeReports,
  renderReport,
} from '../../evaluation/metrics-evaluator.js';

const resultOf = (value: ExecutionValue | undefined, success = true): ExecutionResult => ({
  success,
  kind: value?.kind ?? 'none',
  ...(value !== undefined ? { value } : {}),
  preview: '',
  language: 'sql',
  rowCount: 0,
  columnCount: 0,
  baseVersion: 1,
  elapsedMs: 1,
});

describe('checkCodeSafety', () => {
  it('passes read-only queries', () => {
    expect(checkCodeSafety('SELECT * FROM data')).toEqual({
      checks: [{ name: 'unsafe_code', passed: true, score: 1, detail: 'no forbidden patterns detected' }],
    });
  });

  it('fails denied SQL and script constructs', () => {
    expect(checkCodeSafety('DROP TABLE data').checks[0]).toEqual({
      name: 'unsafe_code',
      passed: false,
      score: 0,
      detail: 'uses DROP statement',
    });
    expect(checkCodeSafety('require("fs")', 'script').checks[0].detail).toBe('uses forbidden construct require(');
  });
});

describe('checkResultValidity', () => {
  it('scores failures at zero', () => {
    expect(checkResultValidity(resultOf(undefined, false)).checks[0]).toMatchObject({ passed: false, score: 0, detail: 'query failed with error' });
  });

  it('rejects empty and all-null tables', () => {
    const empty = resultOf({ kind: 'table', table: { columns: ['a'], rows: [] }, totalRows: 0 });
    expect(checkResultValidity(empty).checks[0]).toMatchObject({ passed: false, detail: 'result has 0 rows' });

    const nulls = resultOf({ kind: 'table', table: { columns: ['a'], rows: [[null], [null]] }, totalRows: 2 });
    expect(checkResultValidity(nulls).checks[0]).toMatchObject({ passed: false, score: 0.3, detail: '2 rows x 1 cols, all values are NULL' });
  });

  it('reports the non-null share of sparse tables', () => {
    const sparse = resultOf({ kind: 'table', table: { columns: ['a', 'b'], rows: [[1, null], [2, null]] }, totalRows: 2 });
    expect(checkResultValidity(sparse).checks[0]).toEqual({
      name: 'valid_answer',
      passed: true,
      score: 0.5,
      detail: '2 rows x 2 cols, 50% non-null',
    });
  });

  it('rejects NaN and NULL scalars', () => {
    expect(checkResultValidity(resultOf({ kind: 'scalar', value: Number.NaN })).checks[0].detail).toBe('result is NaN');
    expect(checkResultValidity(resultOf({ kind: 'scalar', value: null })).checks[0].detail).toBe('result is NULL');
  });

  it('mentions the intent for good results', () => {
    expect(checkResultValidity(resultOf({ kind: 'scalar', value: 3 }), 'count rows').checks[0].detail).toBe('scalar result for "count rows"');
  });
});

describe('checkNumericGrounding', () => {
  it('verifies numbers present in a preview', () => {
    expect(checkNumericGrounding('The average is 87.7', ['Result: 87.7']).checks[0]).toEqual({
      name: 'grounding',
      passed: true,
      score: 1,
      detail: '1/1 numbers verified',
    });
  });

  it('lowers the score for numbers found nowhere', () => {
    expect(checkNumericGrounding('The average is 999.9', ['Result: 87.7']).checks[0]).toEqual({
      name: 'grounding',
      passed: false,
      score: 0,
      detail: '0/1 numbers verified, unverified: 999.9',
    });
  });

  it('accepts rounded claims and thousands separators', () => {
    expect(checkNumericGrounding('About 87.67 on average', ['Result: 87.6667']).checks[0].passed).toBe(true);
    expect(checkNumericGrounding('Revenue was 1,234,567', ['total\n1234567']).checks[0].score).toBe(1);
  });

  it('ignores small integers such as ordinals', () => {
    expect(checkNumericGrounding('The top 5 regions', ['Result: 87.7']).checks[0].detail).toBe('no significant numbers in text');
  });

  it('skips when there is nothing to compare against', () => {
    expect(checkNumericGrounding('Total 500', []).checks[0]).toMatchObject({ passed: true, detail: 'no query result to compare (skipped)' });
  });
});

describe('renderReport', () => {
  it('renders verdicts and the retry hint', () => {
    const failedValidity = checkResultValidity(resultOf({ kind: 'table', table: { columns: ['a'], rows: [] }, totalRows: 0 }));
    expect(renderReport(mergeReports(checkCodeSafety('SELECT 1'), failedValidity))).toBe([
      'QUALITY CHECKS:',
      '  - unsafe_code: PASS (no forbidden patterns detected)',
      '  - valid_answer: FAIL (result has 0 rows)',
      '  >> Consider retrying with a different query.',
    ].join('\n'));
  });

  it('keeps grounding informational', () => {
    expect(renderReport(checkNumericGrounding('The average is 999.9', ['Result: 87.7']))).toBe(
      'QUALITY CHECKS:\n  - grounding: 0/1 numbers verified, unverified: 999.9 (informational)',
    );
  });

  it('renders nothing for an empty report', () => {
    expect(renderReport({ checks: [] })).toBe('');
  });
});
