import type { CellValue, ExecutionValue } from '../types.js';
import type { DatasetSnapshot } from '../dataset/dataset-handle.js';
import type { RawExecution } from './query-worker.js';

// Row-count band, relative to the snapshot, inside which a full-width result
// may still be a transform of the dataset
const TRANSFORM_MIN_RATIO = 0.5;
const TRANSFORM_MAX_RATIO = 1.5;

// booleans come back from SQLite as 1/0
const storedForm = (value: CellValue): CellValue => (typeof value === 'boolean' ? (value ? 1 : 0) : value);

const rowKey = (row: readonly CellValue[]): string => JSON.stringify(row.map(storedForm));

// Row order is ignored: a permutation of the original rows is a read, not a change.
function rowsDiffer(
  columns: readonly string[],
  rows: readonly (readonly CellValue[])[],
  snapshot: DatasetSnapshot,
): boolean {
  const counts = new Map<string, number>();
  snapshot.rows.forEach((row) => {
    const key = rowKey(row);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  });
  const positions = snapshot.columns.map((column) => columns.indexOf(column));
  return rows.some((row) => {
    const key = rowKey(positions.map((pos) => row[pos]));
    const remaining = counts.get(key) ?? 0;
    if (remaining === 0) return true;
    counts.set(key, remaining - 1);
    return false;
  });
}

const isBooleanColumn = (snapshot: DatasetSnapshot, idx: number): boolean => {
  const values = snapshot.rows.map((row) => row[idx]).filter((value) => value !== null);
  return values.length > 0 && values.every((value) => typeof value === 'boolean');
};

/**
 * Map 1/0 back to true/false in every column that was boolean in the snapshot,
 * so a committed transform keeps the original column types.
 */
export function restoreBooleanColumns(
  columns: readonly string[],
  rows: readonly (readonly CellValue[])[],
  snapshot: DatasetSnapshot,
): CellValue[][] {
  const booleanPositions = new Set<number>();
  snapshot.columns.forEach((column, idx) => {
    if (isBooleanColumn(snapshot, idx)) booleanPositions.add(columns.indexOf(column));
  });
  booleanPositions.delete(-1);
  if (booleanPositions.size === 0) return rows.map((row) => [...row]);
  return rows.map((row) => row.map((value, pos) => {
    if (!booleanPositions.has(pos)) return value;
    if (value === 1) return true;
    if (value === 0) return false;
    return value;
  }));
}

/**
 * Decide whether a tabular result replaces the dataset: every original column
 * is kept, the row count stays within the band, and the result either adds a
 * column or (same columns, same row count) holds rows the original does not.
 * Partial results and duplicate column names are never transforms.
 */
export function isTableTransform(
  columns: readonly string[],
  rows: readonly (readonly CellValue[])[],
  totalRows: number,
  snapshot: DatasetSnapshot,
): boolean {
  if (rows.length !== totalRows) return false;
  if (new Set(columns).size !== columns.length) return false;
  const resultColumns = new Set(columns);
  if (!snapshot.columns.every((column) => resultColumns.has(column))) return false;

  const originalRows = snapshot.rows.length;
  if (totalRows < originalRows * TRANSFORM_MIN_RATIO || totalRows > originalRows * TRANSFORM_MAX_RATIO) return false;

  const addsColumn = columns.length > snapshot.columns.length;
  if (addsColumn) return true;
  if (totalRows !== originalRows) return false;
  return rowsDiffer(columns, rows, snapshot);
}

export function classifyExecution(raw: RawExecution, snapshot: DatasetSnapshot): ExecutionValue {
  switch (raw.type) {
    case 'none':
      return { kind: 'none' };
    case 'scalar':
      return { kind: 'scalar', value: raw.value };
    case 'figure':
      return { kind: 'figure', spec: raw.spec };
    case 'table': {
      if (raw.totalRows === 1 && raw.columns.length === 1 && raw.rows.length === 1) {
        return { kind: 'scalar', value: raw.rows[0][0] };
      }
      if (isTableTransform(raw.columns, raw.rows, raw.totalRows, snapshot)) {
        const rows = restoreBooleanColumns(raw.columns, raw.rows, snapshot);
        return { kind: 'table_transform', table: { columns: raw.columns, rows }, totalRows: raw.totalRows };
      }
      return { kind: 'table', table: { columns: raw.columns, rows: raw.rows }, totalRows: raw.totalRows };
    }
  }
}
