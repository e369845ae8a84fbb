import { Mutex } from 'async-mutex';

import type { CellValue, TableData } from '../types.js';

import { ToolExecutionError } from '../tools/tool-errors.js';
import { isPlainObject, toCellValue } from '../utils.js';

export interface DatasetSnapshot {
  readonly version: number;
  readonly columns: readonly string[];
  readonly rows: readonly (readonly CellValue[])[];
  readonly createdAt: number;
  readonly reason: string;
}

export type ColumnType = 'INTEGER' | 'REAL' | 'TEXT' | 'BOOLEAN' | 'NULL' | 'MIXED';

export interface ColumnSummary {
  name: string;
  type: ColumnType;
  nullCount: number;
}

export interface DatasetDescription {
  version: number;
  rowCount: number;
  columnCount: number;
  columns: ColumnSummary[];
}

export interface CommitOptions {
  baseVersion: number;
  reason: string;
}

const freezeSnapshot = (version: number, table: TableData, reason: string): DatasetSnapshot => {
  const rows = Object.freeze(table.rows.map((row) => Object.freeze([...row])));
  return Object.freeze({
    version,
    columns: Object.freeze([...table.columns]),
    rows,
    createdAt: Date.now(),
    reason,
  });
};

const validateTable = (table: TableData): void => {
  if (table.columns.length === 0) {
    throw new Error('dataset must have at least one column');
  }
  const seen = new Set<string>();
  table.columns.forEach((column) => {
    if (seen.has(column)) throw new Error(`duplicate column '${column}'`);
    seen.add(column);
  });
  table.rows.forEach((row, idx) => {
    if (row.length !== table.columns.length) {
      throw new Error(`row ${String(idx)} has ${String(row.length)} cells, expected ${String(table.columns.length)}`);
    }
  });
};

function inferType(values: readonly CellValue[]): ColumnType {
  const kinds = new Set<ColumnType>();
  values.forEach((value) => {
    if (value === null) return;
    if (typeof value === 'boolean') kinds.add('BOOLEAN');
    else if (typeof value === 'number') kinds.add(Number.isInteger(value) ? 'INTEGER' : 'REAL');
    else kinds.add('TEXT');
  });
  if (kinds.size === 0) return 'NULL';
  if (kinds.size === 2 && kinds.has('INTEGER') && kinds.has('REAL')) return 'REAL';
  if (kinds.size > 1) return 'MIXED';
  const [only] = [...kinds];
  return only;
}

/**
 * Versioned, copy-on-write view of one tabular dataset.
 *
 * Snapshots are frozen; readers keep whichever snapshot they started with.
 * Commits are serialized and rejected when the caller's base version is stale.
 */
export class DatasetHandle {
  private readonly versions: DatasetSnapshot[] = [];
  private readonly mutex = new Mutex();

  constructor(initial: TableData, reason = 'initial load') {
    validateTable(initial);
    this.versions.push(freezeSnapshot(1, initial, reason));
  }

  static fromRecords(records: readonly unknown[]): DatasetHandle {
    const columns: string[] = [];
    const known = new Set<string>();
    const objects = records.map((record, idx) => {
      if (!isPlainObject(record)) throw new Error(`record ${String(idx)} is not an object`);
      Object.keys(record).forEach((key) => {
        if (!known.has(key)) {
          known.add(key);
          columns.push(key);
        }
      });
      return record;
    });
    const rows = objects.map((record) => columns.map((column) => toCellValue(record[column])));
    return new DatasetHandle({ columns, rows });
  }

  current(): DatasetSnapshot {
    return this.versions[this.versions.length - 1];
  }

  original(): DatasetSnapshot {
    return this.versions[0];
  }

  at(version: number): DatasetSnapshot | undefined {
    return this.versions.find((snapshot) => snapshot.version === version);
  }

  history(): readonly DatasetSnapshot[] {
    return [...this.versions];
  }

  async commit(table: TableData, opts: CommitOptions): Promise<DatasetSnapshot> {
    return await this.mutex.runExclusive(() => {
      const head = this.current();
      if (opts.baseVersion !== head.version) {
        throw new ToolExecutionError(
          'conflict',
          `dataset is at version ${String(head.version)} but the result was computed from version ${String(opts.baseVersion)}; re-run the query`,
        );
      }
      validateTable(table);
      const snapshot = freezeSnapshot(head.version + 1, table, opts.reason);
      this.versions.push(snapshot);
      return snapshot;
    });
  }

  // Restore the original data as a new version; earlier versions stay addressable.
  async reset(): Promise<DatasetSnapshot> {
    return await this.mutex.runExclusive(() => {
      const first = this.original();
      const snapshot = freezeSnapshot(
        this.current().version + 1,
        { columns: [...first.columns], rows: first.rows.map((row) => [...row]) },
        'reset to original',
      );
      this.versions.push(snapshot);
      return snapshot;
    });
  }

  describe(snapshot: DatasetSnapshot = this.current()): DatasetDescription {
    const columns = snapshot.columns.map((name, idx) => {
      const values = snapshot.rows.map((row) => row[idx]);
      return {
        name,
        type: inferType(values),
        nullCount: values.filter((value) => value === null).length,
      };
    });
    return {
      version: snapshot.version,
      rowCount: snapshot.rows.length,
      columnCount: snapshot.columns.length,
      columns,
    };
  }
}
