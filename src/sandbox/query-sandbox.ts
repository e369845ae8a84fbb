import type { SandboxSettings } from '../config.js';
import type { DatasetSnapshot } from '../dataset/dataset-handle.js';
import type { ExecutionResult, QueryLanguage } from '../types.js';

import { toToolExecutionError } from '../tools/tool-errors.js';

import { renderPreview } from './preview.js';
import { validateQuery } from './query-validator.js';
import { classifyExecution } from './result-classifier.js';
import { runInWorker } from './worker-engine.js';

export interface ExecuteOptions {
  language?: QueryLanguage;
  signal?: AbortSignal;
}

/**
 * Validates and runs one query or script against a dataset snapshot.
 * `execute` never rejects; every failure is reported in the result.
 */
export class QuerySandbox {
  private readonly settings: SandboxSettings;

  constructor(settings: SandboxSettings) {
    this.settings = settings;
  }

  async execute(code: string, snapshot: DatasetSnapshot, opts: ExecuteOptions = {}): Promise<ExecutionResult> {
    const language = opts.language ?? 'sql';
    const started = Date.now();
    const failed = (error: string): ExecutionResult => ({
      success: false,
      kind: 'none',
      preview: `ERROR: ${error}`,
      error,
      language,
      rowCount: 0,
      columnCount: 0,
      baseVersion: snapshot.version,
      elapsedMs: Date.now() - started,
    });

    if (language === 'script' && !this.settings.allowScripts) {
      return failed('Script execution is disabled; use SQL');
    }
    const validation = validateQuery(code, language);
    if (!validation.ok) {
      return failed(validation.error);
    }

    try {
      const raw = await runInWorker({
        language,
        code: validation.statement,
        tableName: this.settings.tableName,
        columns: snapshot.columns,
        rows: snapshot.rows,
        maxResultRows: this.settings.maxResultRows,
        timeoutMs: this.settings.queryTimeoutMs,
      }, opts.signal);
      const value = classifyExecution(raw, snapshot);
      const shape = value.kind === 'table' || value.kind === 'table_transform'
        ? { rowCount: value.totalRows, columnCount: value.table.columns.length }
        : { rowCount: value.kind === 'scalar' ? 1 : 0, columnCount: value.kind === 'scalar' ? 1 : 0 };
      return {
        success: true,
        kind: value.kind,
        value,
        preview: renderPreview(value, this.settings),
        language,
        ...shape,
        baseVersion: snapshot.version,
        elapsedMs: Date.now() - started,
      };
    } catch (error) {
      const err = toToolExecutionError(error, 'execution_error');
      return { ...failed(err.message), errorKind: err.kind };
    }
  }
}
