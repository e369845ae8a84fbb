import type { QueryLanguage } from '../types.js';

export type ValidationOutcome =
  | { ok: true; statement: string }
  | { ok: false; error: string; keyword?: string };

const SQL_DENIED_KEYWORDS = [
  'INSERT', 'UPDATE', 'DELETE', 'DROP', 'ALTER', 'CREATE', 'TRUNCATE', 'COPY', 'ATTACH', 'DETACH',
  'GRANT', 'REVOKE', 'PRAGMA', 'LOAD', 'INSTALL', 'MERGE', 'VACUUM', 'REINDEX',
] as const;

const SQL_DENIED_PATTERN = new RegExp(`\\b(${SQL_DENIED_KEYWORDS.join('|')})\\b`, 'i');
const SQL_REPLACE_INTO = /\bREPLACE\s+INTO\b/i;
const SQL_ENTRY_KEYWORDS = new Set(['SELECT', 'WITH']);

interface ScriptRule {
  label: string;
  pattern: RegExp;
}

const SCRIPT_DENIED: readonly ScriptRule[] = [
  { label: 'eval(', pattern: /\beval\s*\(/ },
  { label: 'new Function', pattern: /\bnew\s+Function\b/ },
  { label: 'Function(', pattern: /\bFunction\s*\(/ },
  { label: 'exec(', pattern: /\bexec(?:Sync|File)?\s*\(/ },
  { label: 'import(', pattern: /\bimport\s*\(/ },
  { label: 'import', pattern: /\bimport\b[^;\n]*\bfrom\b/ },
  { label: 'require(', pattern: /\brequire\s*\(/ },
  { label: 'child_process', pattern: /child_process/ },
  { label: 'process', pattern: /\bprocess\b/ },
  { label: 'globalThis', pattern: /\bglobalThis\b/ },
  { label: 'global.', pattern: /\bglobal\s*\./ },
  { label: 'fs.', pattern: /\bfs\s*\./ },
  { label: 'readFile', pattern: /readFile/ },
  { label: 'writeFile', pattern: /writeFile/ },
  { label: 'open(', pattern: /\bopen\s*\(/ },
  { label: 'fetch(', pattern: /\bfetch\s*\(/ },
  { label: 'constructor', pattern: /\bconstructor\b/ },
  { label: '__proto__', pattern: /__proto__/ },
  { label: 'Reflect', pattern: /\bReflect\b/ },
  { label: 'Proxy', pattern: /\bProxy\b/ },
  { label: 'WebAssembly', pattern: /\bWebAssembly\b/ },
];

/**
 * Remove comments and blank out quoted strings and identifiers so keyword
 * and separator checks only see SQL structure. An unterminated quote
 * swallows the rest of the input.
 */
export function stripSqlLiterals(sql: string): string {
  let out = '';
  let i = 0;
  // eslint-disable-next-line functional/no-loop-statements
  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];
    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end;
      out += ' ';
      continue;
    }
    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      i = end === -1 ? sql.length : end + 2;
      out += ' ';
      continue;
    }
    if (ch === '\'' || ch === '"' || ch === '`') {
      let j = i + 1;
      // eslint-disable-next-line functional/no-loop-statements
      while (j < sql.length) {
        if (sql[j] === ch) {
          // doubled quote is an escaped quote
          if (sql[j + 1] === ch) {
            j += 2;
            continue;
          }
          break;
        }
        j += 1;
      }
      out += `${ch}${ch}`;
      i = j + 1;
      continue;
    }
    out += ch;
    i += 1;
  }
  return out;
}

export function findDeniedSqlKeyword(query: string): string | undefined {
  const structure = stripSqlLiterals(query);
  const match = SQL_DENIED_PATTERN.exec(structure);
  if (match !== null) return match[1].toUpperCase();
  if (SQL_REPLACE_INTO.test(structure)) return 'REPLACE';
  return undefined;
}

export function findDeniedScriptPattern(code: string): string | undefined {
  return SCRIPT_DENIED.find((rule) => rule.pattern.test(code))?.label;
}

export function validateSql(query: string): ValidationOutcome {
  const statement = query.trim().replace(/[;\s]+$/, '');
  if (statement.length === 0) {
    return { ok: false, error: 'Empty query is not allowed' };
  }
  const structure = stripSqlLiterals(statement);
  if (structure.includes(';')) {
    return { ok: false, error: 'Multiple statements are not allowed' };
  }
  const denied = findDeniedSqlKeyword(statement);
  if (denied !== undefined) {
    return {
      ok: false,
      error: `Statement type '${denied}' is not allowed. Only SELECT queries are permitted.`,
      keyword: denied,
    };
  }
  const first = /^[\s(]*([A-Za-z_]+)/.exec(structure);
  const keyword = first === null ? '' : first[1].toUpperCase();
  if (!SQL_ENTRY_KEYWORDS.has(keyword)) {
    return {
      ok: false,
      error: `Statement type '${keyword}' is not allowed. Only SELECT queries are permitted.`,
      keyword,
    };
  }
  return { ok: true, statement };
}

export function validateScript(code: string): ValidationOutcome {
  const statement = code.trim();
  if (statement.length === 0) {
    return { ok: false, error: 'Empty script is not allowed' };
  }
  const denied = findDeniedScriptPattern(statement);
  if (denied !== undefined) {
    return { ok: false, error: `Forbidden construct '${denied}' in script`, keyword: denied };
  }
  return { ok: true, statement };
}

export function validateQuery(code: string, language: QueryLanguage): ValidationOutcome {
  return language === 'sql' ? validateSql(code) : validateScript(code);
}
