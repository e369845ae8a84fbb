import type { CheckResult, EvaluationReport, ExecutionResult, QualityReport, QueryLanguage, SafetyReport } from '../types.js';

import { findDeniedScriptPattern, findDeniedSqlKeyword } from '../sandbox/query-validator.js';

// Integers up to this value are usually counts or ordinals, not claims
export const ORDINAL_CEILING = 20;
export const GROUNDING_PASS_RATIO = 0.3;
const VALIDITY_PASS_SCORE = 0.5;
const MAX_ROUNDING_DECIMALS = 2;
const MAX_LISTED_UNVERIFIED = 5;

const NUMBER_PATTERN = /(?<![\w.])-?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?/g;

interface NumericToken {
  text: string;
  value: number;
  decimals: number;
}

function extractNumbers(text: string): NumericToken[] {
  const tokens: NumericToken[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  for (const match of text.matchAll(NUMBER_PATTERN)) {
    const normalized = match[0].replace(/,/g, '');
    const value = Number(normalized);
    if (!Number.isFinite(value)) continue;
    const dot = normalized.indexOf('.');
    tokens.push({ text: normalized, value, decimals: dot === -1 ? 0 : normalized.length - dot - 1 });
  }
  return tokens;
}

const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

function isVerified(claim: NumericToken, previewValues: readonly number[]): boolean {
  return previewValues.some((candidate) => {
    if (candidate === claim.value) return true;
    // a claim quoted at lower precision than the result, e.g. 87.67 for 87.6667
    if (claim.decimals <= MAX_ROUNDING_DECIMALS && roundTo(candidate, claim.decimals) === claim.value) return true;
    // a claim carrying trailing precision the result rounded away, e.g. 1234.00 for 1234
    return Array.from({ length: MAX_ROUNDING_DECIMALS + 1 }, (_, d) => roundTo(claim.value, d)).includes(candidate);
  });
}

const report = (check: CheckResult): EvaluationReport => ({ checks: [check] });

/**
 * Static deny-list check of generated code, applied independently of the
 * sandbox validator. A failing report blocks execution.
 */
export function checkCodeSafety(code: string, language: QueryLanguage = 'sql'): SafetyReport {
  const violation = language === 'sql' ? findDeniedSqlKeyword(code) : findDeniedScriptPattern(code);
  if (violation !== undefined) {
    const detail = language === 'sql' ? `uses ${violation} statement` : `uses forbidden construct ${violation}`;
    return report({ name: 'unsafe_code', passed: false, score: 0, detail });
  }
  return report({ name: 'unsafe_code', passed: true, score: 1, detail: 'no forbidden patterns detected' });
}

export function checkResultValidity(result: ExecutionResult, intent = ''): QualityReport {
  const fail = (score: number, detail: string): QualityReport => report({ name: 'valid_answer', passed: false, score, detail });
  if (!result.success) return fail(0, 'query failed with error');
  const value = result.value;
  if (value === undefined || value.kind === 'none') return fail(0.2, 'no value returned');

  const suffix = intent.length > 0 ? ` for "${intent}"` : '';
  switch (value.kind) {
    case 'scalar':
      if (typeof value.value === 'number' && Number.isNaN(value.value)) return fail(0.3, 'result is NaN');
      if (value.value === null) return fail(0.3, 'result is NULL');
      return report({ name: 'valid_answer', passed: true, score: 1, detail: `scalar result${suffix}` });
    case 'figure':
      return report({ name: 'valid_answer', passed: true, score: 1, detail: `figure${suffix}` });
    case 'table':
    case 'table_transform': {
      const { table, totalRows } = value;
      if (totalRows === 0) return fail(0.2, 'result has 0 rows');
      const cells = table.rows.reduce((acc, row) => acc + row.length, 0);
      const nonNull = table.rows.reduce((acc, row) => acc + row.filter((cell) => cell !== null).length, 0);
      const shape = `${String(totalRows)} rows x ${String(table.columns.length)} cols`;
      if (nonNull === 0) return fail(0.3, `${shape}, all values are NULL`);
      const score = cells === 0 ? 1 : nonNull / cells;
      return report({
        name: 'valid_answer',
        passed: score >= VALIDITY_PASS_SCORE,
        score,
        detail: score < 1 ? `${shape}, ${String(Math.round(score * 100))}% non-null` : shape,
      });
    }
  }
}

/**
 * Advisory comparison of numbers in prose against the run's query previews.
 * Never a gate: derived figures (totals, percentages) legitimately fail it.
 */
export function checkNumericGrounding(text: string, previews: readonly string[]): QualityReport {
  if (previews.length === 0 || text.trim().length === 0) {
    return report({ name: 'grounding', passed: true, score: 1, detail: 'no query result to compare (skipped)' });
  }
  const seen = new Set<string>();
  const claims = extractNumbers(text).filter((token) => {
    if (token.decimals === 0 && Math.abs(token.value) <= ORDINAL_CEILING) return false;
    if (seen.has(token.text)) return false;
    seen.add(token.text);
    return true;
  });
  if (claims.length === 0) {
    return report({ name: 'grounding', passed: true, score: 1, detail: 'no significant numbers in text' });
  }

  const previewValues = previews.flatMap((preview) => extractNumbers(preview).map((token) => token.value));
  const unverified = claims.filter((claim) => !isVerified(claim, previewValues));
  const found = claims.length - unverified.length;
  const score = found / claims.length;
  let detail = `${String(found)}/${String(claims.length)} numbers verified`;
  if (unverified.length > 0) {
    detail += `, unverified: ${unverified.slice(0, MAX_LISTED_UNVERIFIED).map((c) => c.text).join(', ')}`;
  }
  return report({ name: 'grounding', passed: score >= GROUNDING_PASS_RATIO, score, detail });
}

export function mergeReports(...reports: EvaluationReport[]): EvaluationReport {
  return { checks: reports.flatMap((r) => r.checks) };
}

/**
 * Render checks as the block appended to a tool result. Grounding checks are
 * informational and never carry a PASS/FAIL verdict.
 */
export function renderReport(evaluation: EvaluationReport): string {
  if (evaluation.checks.length === 0) return '';
  const lines = ['QUALITY CHECKS:'];
  evaluation.checks.forEach((check) => {
    if (check.name === 'grounding') {
      lines.push(`  - grounding: ${check.detail} (informational)`);
      return;
    }
    lines.push(`  - ${check.name}: ${check.passed ? 'PASS' : 'FAIL'} (${check.detail})`);
  });
  const validity = evaluation.checks.find((check) => check.name === 'valid_answer');
  if (validity !== undefined && !validity.passed) {
    lines.push('  >> Consider retrying with a different query.');
  }
  return lines.join('\n');
}
