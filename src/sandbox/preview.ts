import type { ExecutionValue } from '../types.js';

import { truncateToBytes } from '../truncation.js';
import { formatCell, isPlainObject } from '../utils.js';

export interface PreviewOptions {
  previewRows: number;
  previewMaxBytes: number;
}

const plural = (count: number, noun: string): string => `${String(count)} ${noun}${count === 1 ? '' : 's'}`;

/**
 * Text rendering of an execution value that re-enters the conversation:
 * a metadata line, a ` | ` separated header and up to `previewRows` rows,
 * capped at `previewMaxBytes`.
 */
export function renderPreview(value: ExecutionValue, opts: PreviewOptions): string {
  switch (value.kind) {
    case 'none':
      return 'No value returned.';
    case 'scalar':
      return `Result: ${formatCell(value.value)}`;
    case 'figure': {
      const mark = value.spec.mark;
      const markName = typeof mark === 'string'
        ? mark
        : isPlainObject(mark) && typeof mark.type === 'string' ? mark.type : 'unknown';
      const data = value.spec.data;
      const points = isPlainObject(data) && Array.isArray(data.values) ? data.values.length : 0;
      return `Figure: mark=${markName}, ${plural(points, 'data point')}`;
    }
    case 'table':
    case 'table_transform': {
      const { table, totalRows } = value;
      const shown = table.rows.slice(0, opts.previewRows);
      let meta = `${plural(totalRows, 'row')} x ${plural(table.columns.length, 'column')}`;
      if (shown.length < totalRows) meta += ` (showing first ${String(shown.length)})`;
      const lines = [
        meta,
        table.columns.join(' | '),
        ...shown.map((row) => row.map((cell) => formatCell(cell)).join(' | ')),
      ];
      return truncateToBytes(lines.join('\n'), opts.previewMaxBytes, 'head');
    }
  }
}
