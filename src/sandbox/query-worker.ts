import type Database from 'better-sqlite3';
import type * as NodeVm from 'node:vm';

import type { CellValue, QueryLanguage } from '../types.js';

// Everything below runs inside the query worker thread. The engine ships these
// declarations to the worker as source, so each function may only reach its
// own parameters, the other functions listed in QUERY_WORKER_FUNCTIONS and
// runtime globals. Imports here are type-only.

export interface QueryJob {
  language: QueryLanguage;
  code: string;
  tableName: string;
  columns: readonly string[];
  rows: readonly (readonly CellValue[])[];
  maxResultRows: number;
  timeoutMs: number;
  sqlitePath?: string;
}

export type RawExecution =
  | { type: 'table'; columns: string[]; rows: CellValue[][]; totalRows: number }
  | { type: 'scalar'; value: CellValue }
  | { type: 'figure'; spec: Record<string, unknown> }
  | { type: 'none' };

export type WorkerReply =
  | { ok: true; result: RawExecution }
  | { ok: false; error: string; timeout: boolean };

interface Figure {
  readonly spec: unknown;
}

interface RealmRuntime {
  deepFreeze: <T>(value: T) => T;
  isFigure: (value: unknown) => value is Figure;
  helpers: Record<string, unknown>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function toSqlValue(value: CellValue): string | number | null {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') {
    return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  // script dates come from another realm, so instanceof Date does not hold
  if (Object.prototype.toString.call(value) === '[object Date]') return new Date(Number(value)).toISOString();
  if (typeof value === 'function' || typeof value === 'symbol') return String(value);
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function runSql(job: QueryJob, Sqlite: typeof Database): RawExecution {
  const db = new Sqlite(':memory:');
  try {
    const table = quoteIdent(job.tableName);
    db.exec(`CREATE TABLE ${table} (${job.columns.map(quoteIdent).join(', ')})`);
    const insert = db.prepare(`INSERT INTO ${table} VALUES (${job.columns.map(() => '?').join(', ')})`);
    const load = db.transaction((rows: readonly (readonly CellValue[])[]) => {
      rows.forEach((row) => {
        insert.run(row.map(toSqlValue));
      });
    });
    load(job.rows);
    db.pragma('query_only = ON');

    const stmt = db.prepare(job.code);
    if (!stmt.reader) {
      throw new Error('Only statements that return rows are permitted');
    }
    stmt.raw(true);
    const columns = stmt.columns().map((column) => column.name);
    const rows: CellValue[][] = [];
    let totalRows = 0;
    for (const row of stmt.iterate()) {
      totalRows += 1;
      if (rows.length < job.maxResultRows && Array.isArray(row)) {
        const cells: unknown[] = row;
        rows.push(cells.map(toCell));
      }
    }
    return { type: 'table', columns, rows, totalRows };
  } finally {
    db.close();
  }
}

// Compiled inside the script context, so every function a script can reach
// belongs to the realm where code generation is disabled.
export function realmHelpers(): RealmRuntime {
  const figures = new WeakSet<object>();
  const numbers = (values: unknown): number[] => (Array.isArray(values) ? values : [])
    .filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
  const deepFreeze = <T>(value: T): T => {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      Object.freeze(value);
      Object.values(value).forEach((child) => {
        deepFreeze(child);
      });
    }
    return value;
  };
  const isFigure = (value: unknown): value is Figure => value !== null && typeof value === 'object' && figures.has(value);
  return {
    deepFreeze,
    isFigure,
    helpers: {
      chart: (spec: unknown): Figure => {
        const figure = Object.freeze({ spec });
        figures.add(figure);
        return figure;
      },
      sum: (values: unknown) => numbers(values).reduce((acc, v) => acc + v, 0),
      mean: (values: unknown) => {
        const nums = numbers(values);
        return nums.length === 0 ? null : nums.reduce((acc, v) => acc + v, 0) / nums.length;
      },
      min: (values: unknown) => {
        const nums = numbers(values);
        return nums.length === 0 ? null : Math.min(...nums);
      },
      max: (values: unknown) => {
        const nums = numbers(values);
        return nums.length === 0 ? null : Math.max(...nums);
      },
      count: (values: unknown) => (Array.isArray(values) ? values.filter((v) => v !== null && v !== undefined).length : 0),
      groupBy: (rows: unknown, column: string) => {
        const groups: Record<string, unknown[]> = {};
        (Array.isArray(rows) ? rows : []).forEach((row: unknown) => {
          const cell = row !== null && typeof row === 'object' ? Object.getOwnPropertyDescriptor(row, column)?.value : undefined;
          const key = String(cell ?? null);
          if (!Object.prototype.hasOwnProperty.call(groups, key)) groups[key] = [];
          groups[key].push(row);
        });
        return groups;
      },
      round: (value: unknown, digits?: unknown) => {
        if (typeof value !== 'number') return value;
        const factor = Math.pow(10, typeof digits === 'number' ? digits : 0);
        return Math.round(value * factor) / factor;
      },
    },
  };
}

export function tableFromValue(value: object): { columns: string[]; rows: CellValue[][] } {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    const records = items.filter(isRecord);
    if (items.length > 0 && records.length === items.length) {
      const columns: string[] = [];
      const seen = new Set<string>();
      records.forEach((record) => {
        Object.keys(record).forEach((key) => {
          if (!seen.has(key)) {
            seen.add(key);
            columns.push(key);
          }
        });
      });
      return { columns, rows: records.map((record) => columns.map((column) => toCell(record[column]))) };
    }
    const lists = items.filter((item): item is unknown[] => Array.isArray(item));
    if (lists.length === items.length) {
      const width = lists.reduce((acc, list) => Math.max(acc, list.length), 0);
      const columns = Array.from({ length: width }, (_, i) => `col${String(i + 1)}`);
      return { columns, rows: lists.map((list) => columns.map((_, i) => toCell(list[i]))) };
    }
    return { columns: ['value'], rows: items.map((item) => [toCell(item)]) };
  }
  if (isRecord(value) && Array.isArray(value.columns) && Array.isArray(value.rows)) {
    const header: unknown[] = value.columns;
    const body: unknown[] = value.rows;
    const columns = header.map((column) => String(column));
    const rows = body.map((row) => columns.map((_, i) => toCell(Array.isArray(row) ? row[i] : undefined)));
    return { columns, rows };
  }
  return { columns: ['key', 'value'], rows: Object.entries(value).map(([key, cell]) => [key, toCell(cell)]) };
}

export function runScript(job: QueryJob, vm: typeof NodeVm): RawExecution {
  const context = vm.createContext(Object.create(null), {
    name: 'analysis-script',
    codeGeneration: { strings: false, wasm: false },
  });
  const runtime: RealmRuntime = new vm.Script(`(${String(realmHelpers)})()`, { filename: 'analysis-helpers.js' })
    .runInContext(context);
  const parseInContext: (text: string) => unknown = vm.runInContext('JSON.parse', context);
  const records = job.rows.map((row) => Object.fromEntries(job.columns.map((column, i): [string, CellValue] => [column, row[i]])));
  Object.entries(runtime.helpers).forEach(([name, helper]) => {
    context[name] = helper;
  });
  context.rows = runtime.deepFreeze(parseInContext(JSON.stringify(records)));
  context.columns = runtime.deepFreeze(parseInContext(JSON.stringify(job.columns)));

  const source = /\breturn\b/.test(job.code)
    ? `(function () { "use strict";\n${job.code}\n})()`
    : job.code;
  const value: unknown = new vm.Script(source, { filename: 'analysis-script.js' })
    .runInContext(context, { timeout: job.timeoutMs, breakOnSigint: false });

  if (value === undefined || value === null) return { type: 'none' };
  if (runtime.isFigure(value)) {
    const spec: unknown = JSON.parse(JSON.stringify(value.spec ?? {}));
    return { type: 'figure', spec: isRecord(spec) ? spec : {} };
  }
  if (typeof value !== 'object') return { type: 'scalar', value: typeof value === 'number' ? value : toCell(value) };
  const table = tableFromValue(value);
  return { type: 'table', columns: table.columns, rows: table.rows.slice(0, job.maxResultRows), totalRows: table.rows.length };
}

export function runQueryJob(job: QueryJob, loadSqlite: () => typeof Database, vm: typeof NodeVm): WorkerReply {
  try {
    const result = job.language === 'script' ? runScript(job, vm) : runSql(job, loadSqlite());
    return { ok: true, result };
  } catch (error) {
    // errors thrown by scripts belong to the script realm
    const message = isRecord(error) && typeof error.message === 'string' ? error.message : String(error);
    const timeout = isRecord(error) && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
    return { ok: false, error: message, timeout };
  }
}

export const QUERY_WORKER_FUNCTIONS = [
  isRecord,
  quoteIdent,
  toSqlValue,
  toCell,
  runSql,
  realmHelpers,
  tableFromValue,
  runScript,
  runQueryJob,
] as const;
