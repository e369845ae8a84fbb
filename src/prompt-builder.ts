import type { DatasetDescription } from './dataset/dataset-handle.js';
import type { ConversationMessage, PersistenceRecord } from './types.js';

import { isPlainObject } from './utils.js';

const SYSTEM_TEMPLATE = `You are a data analyst working with one table named "\${TABLE}".
Current time: \${DATETIME} (\${TIMEZONE}).

\${SUMMARY}

Work only through the tools:
- query: run one read-only \${LANGUAGES} statement and read its preview. A result that keeps every column and adds or changes values replaces the working table for later queries.
- emit_text / emit_table / emit_plot: show results to the user. Quote numbers as they appear in query results.
- finalize: call once the answer is complete.

Tool results may end with QUALITY CHECKS. Use them to decide whether to retry a query.`;

export function buildPromptVars(now: Date = new Date()): Record<string, string> {
  const pad2 = (n: number): string => (n < 10 ? `0${String(n)}` : String(n));
  const formatRFC3339Local = (d: Date): string => {
    const y = d.getFullYear();
    const m = pad2(d.getMonth() + 1);
    const da = pad2(d.getDate());
    const hh = pad2(d.getHours());
    const mm = pad2(d.getMinutes());
    const ss = pad2(d.getSeconds());
    const tzMin = -d.getTimezoneOffset();
    const sign = tzMin >= 0 ? '+' : '-';
    const abs = Math.abs(tzMin);
    return `${String(y)}-${m}-${da}T${hh}:${mm}:${ss}${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`;
  };
  const detectTimezone = (): string => { try { return Intl.DateTimeFormat().resolvedOptions().timeZone; } catch { return process.env.TZ ?? 'UTC'; } };
  return {
    DATETIME: formatRFC3339Local(now),
    TIMEZONE: detectTimezone(),
  };
}

export function expandVars(text: string, vars: Record<string, string>): string {
  return text.replace(/\$\{([A-Z_]+)\}/g, (match, name: string) => (name in vars ? vars[name] : match));
}

export function describeDataset(description: DatasetDescription): string {
  const lines = description.columns.map((column) => {
    const nulls = column.nullCount > 0 ? `, ${String(column.nullCount)} null` : '';
    return `- ${column.name} (${column.type}${nulls})`;
  });
  return [
    `The table has ${String(description.rowCount)} rows and ${String(description.columnCount)} columns (version ${String(description.version)}):`,
    ...lines,
  ].join('\n');
}

export interface SystemPromptOptions {
  tableName: string;
  allowScripts: boolean;
  now?: Date;
}

export function buildSystemPrompt(description: DatasetDescription, opts: SystemPromptOptions): string {
  return expandVars(SYSTEM_TEMPLATE, {
    ...buildPromptVars(opts.now),
    TABLE: opts.tableName,
    SUMMARY: describeDataset(description),
    LANGUAGES: opts.allowScripts ? 'SQL SELECT (or a script with language "script")' : 'SQL SELECT',
  });
}

const describeRecord = (record: PersistenceRecord): string | undefined => {
  const payload = record.payload;
  switch (record.type) {
    case 'text':
    case 'reasoning':
      return record.text;
    case 'query_result': {
      const rows = isPlainObject(payload) && typeof payload.rowCount === 'number' ? ` (${String(payload.rowCount)} rows)` : '';
      const query = isPlainObject(payload) && typeof payload.query === 'string' ? `: ${payload.query}` : '';
      return `[query ${record.text}${rows}${query}]`;
    }
    case 'table':
      return `[table shown: ${record.text}]`;
    case 'plot':
      return `[plot shown: ${record.text}]`;
    case 'session':
    case 'tool_error':
      return undefined;
  }
};

/**
 * Prior-session context from persisted records: user prose stays a user turn,
 * consecutive assistant records fold into one assistant turn.
 */
export function buildHistoryMessages(records: readonly PersistenceRecord[]): ConversationMessage[] {
  const messages: ConversationMessage[] = [];
  let pending: string[] = [];
  const flush = (): void => {
    // the conversation must open with a user turn
    if (pending.length > 0 && messages.length > 0) {
      messages.push({ role: 'assistant', content: pending.join('\n') });
    }
    pending = [];
  };
  records.forEach((record) => {
    if (record.role === 'user') {
      flush();
      if (record.text.trim().length > 0) messages.push({ role: 'user', content: record.text });
      return;
    }
    const line = describeRecord(record);
    if (line !== undefined && line.trim().length > 0) pending.push(line);
  });
  flush();
  return messages;
}
