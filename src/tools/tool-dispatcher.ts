import Ajv from 'ajv';

import type { Settings } from '../config.js';
import type { DatasetHandle, DatasetSnapshot } from '../dataset/dataset-handle.js';
import type { QuerySandbox } from '../sandbox/query-sandbox.js';
import type { EmitPlotArgs, EmitTableArgs, EmitTextArgs, FinalizeArgs, ParsedInvocation, QueryArgs } from '../tool-schema.js';
import type {
  CellValue,
  EmitEvent,
  EvaluationReport,
  ExecutionResult,
  LogEntry,
  LogSink,
  PersistedMessageType,
  PersistenceHook,
  QueryResultEvent,
  ToolInvocation,
  ToolResult,
  TurnState,
} from '../types.js';
import type { Ajv as AjvClass, Options as AjvOptions, ValidateFunction } from 'ajv';

import { checkCodeSafety, checkNumericGrounding, checkResultValidity, mergeReports, renderReport } from '../evaluation/metrics-evaluator.js';
import { persistSafely } from '../persistence.js';
import { addSpanEvent } from '../telemetry/index.js';
import { parseToolInvocation } from '../tool-schema.js';
import { truncateList, truncateToBytes } from '../truncation.js';
import { isPlainObject, toCellValue } from '../utils.js';

import { formatToolError, toToolExecutionError, ToolExecutionError } from './tool-errors.js';

type AjvConstructor = new (options?: AjvOptions) => AjvClass;
const AjvCtor: AjvConstructor = Ajv as unknown as AjvConstructor;

// Tool results re-enter the conversation verbatim; keep them bounded
const MAX_TOOL_RESULT_BYTES = 8192;

const PLOT_SPEC_SCHEMA = {
  type: 'object',
  required: ['mark'],
  properties: {
    mark: {
      anyOf: [
        { type: 'string', minLength: 1 },
        { type: 'object', required: ['type'], properties: { type: { type: 'string', minLength: 1 } } },
      ],
    },
    data: {
      type: 'object',
      properties: {
        values: { type: 'array' },
      },
    },
    encoding: { type: 'object' },
  },
};

export interface DispatchContext {
  state: TurnState;
  dataset: DatasetHandle;
  emit: EmitEvent;
  // Position of the invocation inside its batch
  index: number;
  signal?: AbortSignal;
}

export interface ToolDispatcherOptions {
  sandbox: QuerySandbox;
  settings: Pick<Settings, 'output' | 'sandbox'>;
  log?: LogSink;
  persistence?: PersistenceHook;
}

interface Outcome {
  content: string;
  persistType: PersistedMessageType;
  persistText: string;
  payload?: Record<string, unknown>;
}

const withReport = (content: string, evaluation: EvaluationReport): string => {
  const rendered = renderReport(evaluation);
  return rendered.length > 0 ? `${content}\n\n${rendered}` : content;
};

const PERSIST_TYPE_BY_TOOL: Record<ParsedInvocation['name'], PersistedMessageType> = {
  query: 'query_result',
  emit_text: 'text',
  emit_table: 'table',
  emit_plot: 'plot',
  finalize: 'session',
};

export function describeChange(before: DatasetSnapshot, after: DatasetSnapshot): string {
  const beforeCols = new Set(before.columns);
  const afterCols = new Set(after.columns);
  const added = after.columns.filter((column) => !beforeCols.has(column));
  const removed = before.columns.filter((column) => !afterCols.has(column));
  const delta = after.rows.length - before.rows.length;
  const parts: string[] = [];
  if (added.length > 0) parts.push(`added columns: ${added.join(', ')}`);
  if (removed.length > 0) parts.push(`removed columns: ${removed.join(', ')}`);
  parts.push(`row delta: ${delta >= 0 ? '+' : ''}${String(delta)}`);
  return parts.join('; ');
}

/**
 * Maps one tool invocation to its action. `dispatch` never rejects: every
 * failure becomes an error ToolResult the model can react to.
 */
export class ToolDispatcher {
  private readonly sandbox: QuerySandbox;
  private readonly settings: Pick<Settings, 'output' | 'sandbox'>;
  private readonly log?: LogSink;
  private readonly persistence?: PersistenceHook;
  private readonly validatePlot: ValidateFunction;

  constructor(opts: ToolDispatcherOptions) {
    this.sandbox = opts.sandbox;
    this.settings = opts.settings;
    this.log = opts.log;
    this.persistence = opts.persistence;
    const ajv = new AjvCtor({ allErrors: true, strict: false });
    this.validatePlot = ajv.compile(PLOT_SPEC_SCHEMA);
  }

  async dispatch(invocation: ToolInvocation, ctx: DispatchContext): Promise<ToolResult> {
    const started = Date.now();
    ctx.state.metrics.toolCalls += 1;
    this.logEntry(ctx, invocation.name, {
      severity: 'VRB',
      direction: 'request',
      message: `dispatching ${invocation.name}`,
    });

    let outcome: Outcome;
    let isError = false;
    try {
      if (ctx.signal?.aborted === true) {
        throw new ToolExecutionError('canceled', 'run was stopped before this tool executed');
      }
      const parsed = parseToolInvocation(invocation);
      if (!parsed.ok) throw parsed.error;
      outcome = await this.execute(parsed.invocation, ctx);
    } catch (error: unknown) {
      const err = toToolExecutionError(error);
      isError = true;
      ctx.state.metrics.toolErrors += 1;
      const reports = err.details?.report;
      const content = isEvaluationReport(reports) ? withReport(formatToolError(err), reports) : formatToolError(err);
      outcome = { content, persistType: 'tool_error', persistText: content, payload: { tool: invocation.name, kind: err.kind } };
      addSpanEvent('tool.call.failure', { 'tool.name': invocation.name, 'tool.error_kind': err.kind });
    }

    const latencyMs = Date.now() - started;
    this.logEntry(ctx, invocation.name, {
      severity: isError ? 'WRN' : 'VRB',
      direction: 'response',
      message: isError ? outcome.content.split('\n')[0] : `${invocation.name} completed`,
      details: { latency_ms: latencyMs, is_error: isError },
    });

    await persistSafely(this.persistence, {
      role: 'assistant',
      type: outcome.persistType,
      text: outcome.persistText,
      ...(outcome.payload !== undefined ? { payload: outcome.payload } : {}),
      runId: ctx.state.runId,
      timestamp: Date.now(),
    }, (message) => {
      this.logEntry(ctx, invocation.name, { severity: 'WRN', direction: 'response', message });
    });

    return {
      invocationId: invocation.id,
      content: truncateToBytes(outcome.content, MAX_TOOL_RESULT_BYTES),
      isError,
    };
  }

  private async execute(invocation: ParsedInvocation, ctx: DispatchContext): Promise<Outcome> {
    switch (invocation.name) {
      case 'query':
        return await this.runQuery(invocation.id, invocation.args, ctx);
      case 'emit_text':
        return this.emitText(invocation.id, invocation.args, ctx);
      case 'emit_table':
        return this.emitTable(invocation.args, ctx);
      case 'emit_plot':
        return this.emitPlot(invocation.args, ctx);
      case 'finalize':
        return this.finalize(invocation.args, ctx);
    }
  }

  private async runQuery(id: string, args: QueryArgs, ctx: DispatchContext): Promise<Outcome> {
    const language = args.language ?? 'sql';
    const description = args.description.trim().length > 0 ? args.description.trim() : 'Running query';
    ctx.emit('status', { message: description });

    const safety = checkCodeSafety(args.query, language);
    if (!safety.checks.every((check) => check.passed)) {
      throw new ToolExecutionError('unsafe_code', 'query rejected by the safety check', { details: { report: safety } });
    }

    const snapshot = ctx.dataset.current();
    const result = await this.sandbox.execute(args.query, snapshot, { language, signal: ctx.signal });
    ctx.state.metrics.queries += 1;
    const validity = checkResultValidity(result, description);
    const evaluation = mergeReports(safety, validity);
    this.publishValidity(id, validity, ctx);

    if (!result.success) {
      ctx.state.metrics.failedQueries += 1;
      ctx.emit('query_result', this.queryEvent(id, args, description, result));
      throw new ToolExecutionError(result.errorKind ?? 'execution_error', result.error ?? 'query failed', {
        details: { report: evaluation },
      });
    }

    ctx.state.previews.push(result.preview);

    let changeSummary: string | undefined;
    if (result.value?.kind === 'table_transform') {
      const committed = await ctx.dataset.commit(result.value.table, {
        baseVersion: result.baseVersion,
        reason: description,
      });
      changeSummary = describeChange(snapshot, committed);
      ctx.state.datasetVersion = committed.version;
      ctx.state.dataUpdated = true;
    }

    const event = this.queryEvent(id, args, description, result, changeSummary);
    ctx.emit('query_result', event);

    const header = `Query succeeded (${result.kind}).`;
    const update = changeSummary !== undefined
      ? `\nDataset updated to version ${String(ctx.state.datasetVersion)} (${changeSummary}). Later queries read the updated table.`
      : '';
    return {
      content: withReport(`${header}\n${result.preview}${update}`, evaluation),
      persistType: 'query_result',
      persistText: description,
      payload: {
        query: args.query,
        language,
        kind: result.kind,
        columns: event.columns,
        rows: event.rows,
        rowCount: event.rowCount,
        ...(changeSummary !== undefined ? { changeSummary } : {}),
      },
    };
  }

  private emitText(id: string, args: EmitTextArgs, ctx: DispatchContext): Outcome {
    const text = args.text;
    ctx.state.outputs.push({ type: 'text', text });
    ctx.emit('text', { text });

    const grounding = checkNumericGrounding(text, ctx.state.previews);
    ctx.state.metrics.groundingChecks += 1;
    const [check] = grounding.checks;
    if (!check.passed) {
      ctx.state.metrics.groundingFailures += 1;
      ctx.emit('judge', { source: 'grounding', passed: false, score: check.score, detail: check.detail, invocationId: id });
      this.logEntry(ctx, 'emit_text', {
        severity: 'WRN',
        direction: 'response',
        message: `grounding check below threshold: ${check.detail}`,
        details: { score: Number(check.score.toFixed(2)) },
      });
    }
    return {
      content: withReport('ok', grounding),
      persistType: PERSIST_TYPE_BY_TOOL.emit_text,
      persistText: text,
    };
  }

  private emitTable(args: EmitTableArgs, ctx: DispatchContext): Outcome {
    const width = args.headers.length;
    const { items, omitted } = truncateList(args.rows, this.settings.output.maxTableRows);
    const rows: CellValue[][] = items.map((row) => {
      const cells = row.slice(0, width).map((cell) => toCellValue(cell));
      while (cells.length < width) cells.push(null);
      return cells;
    });
    const truncated = omitted > 0;
    ctx.state.outputs.push({ type: 'table', title: args.title, headers: args.headers, rows });
    ctx.emit('table', { title: args.title, headers: args.headers, rows, truncated });
    const note = truncated
      ? ` (table truncated to ${String(rows.length)} of ${String(args.rows.length)} rows)`
      : '';
    return {
      content: `ok${note}`,
      persistType: PERSIST_TYPE_BY_TOOL.emit_table,
      persistText: args.title,
      payload: { headers: args.headers, rows },
    };
  }

  private emitPlot(args: EmitPlotArgs, ctx: DispatchContext): Outcome {
    if (!this.validatePlot(args.spec)) {
      const issues = (this.validatePlot.errors ?? [])
        .map((e) => `${e.instancePath.length > 0 ? e.instancePath : 'spec'} ${e.message ?? 'is invalid'}`)
        .join('; ');
      throw new ToolExecutionError('invalid_parameters', `invalid plot spec: ${issues}`);
    }
    const spec: Record<string, unknown> = { ...args.spec };
    let truncated = false;
    const data = spec.data;
    if (isPlainObject(data) && Array.isArray(data.values)) {
      const { items, omitted } = truncateList(data.values, this.settings.output.maxPlotPoints);
      if (omitted > 0) {
        truncated = true;
        spec.data = { ...data, values: items };
      }
    }
    if (typeof spec.title !== 'string') spec.title = args.title;
    ctx.state.outputs.push({ type: 'plot', title: args.title, spec });
    ctx.emit('plot', { title: args.title, spec, truncated });
    return {
      content: truncated ? `ok (plot data truncated to ${String(this.settings.output.maxPlotPoints)} points)` : 'ok',
      persistType: PERSIST_TYPE_BY_TOOL.emit_plot,
      persistText: args.title,
      payload: { spec },
    };
  }

  private finalize(args: FinalizeArgs, ctx: DispatchContext): Outcome {
    ctx.state.finished = true;
    const title = typeof args.session_title === 'string' ? args.session_title.trim() : '';
    if (title.length > 0) {
      ctx.state.title = title;
      ctx.emit('session_update', { title });
    }
    const suggestions = (args.suggestions ?? []).map((s) => s.trim()).filter((s) => s.length > 0).slice(0, 3);
    ctx.state.suggestions = suggestions;
    return {
      content: 'ok',
      persistType: PERSIST_TYPE_BY_TOOL.finalize,
      persistText: title,
      payload: { suggestions },
    };
  }

  private queryEvent(
    id: string,
    args: QueryArgs,
    description: string,
    result: ExecutionResult,
    changeSummary?: string,
  ): QueryResultEvent {
    const value = result.value;
    const previewRows = this.settings.sandbox.previewRows;
    let columns: string[] = [];
    let rows: CellValue[][] = [];
    if (value !== undefined && (value.kind === 'table' || value.kind === 'table_transform')) {
      columns = value.table.columns;
      rows = value.table.rows.slice(0, previewRows);
    } else if (value?.kind === 'scalar') {
      columns = ['value'];
      rows = [[value.value]];
    }
    return {
      invocationId: id,
      description,
      query: args.query,
      language: result.language,
      success: result.success,
      kind: result.kind,
      columns,
      rows,
      rowCount: result.rowCount,
      ...(result.error !== undefined ? { error: result.error } : {}),
      ...(changeSummary !== undefined ? { changeSummary } : {}),
    };
  }

  private publishValidity(id: string, validity: EvaluationReport, ctx: DispatchContext): void {
    const [check] = validity.checks;
    if (check.passed) return;
    ctx.state.metrics.validityFailures += 1;
    ctx.emit('judge', { source: 'validity', passed: false, score: check.score, detail: check.detail, invocationId: id });
    this.logEntry(ctx, 'query', {
      severity: 'WRN',
      direction: 'response',
      message: `result validity check failed: ${check.detail}`,
      details: { score: Number(check.score.toFixed(2)) },
    });
  }

  private logEntry(
    ctx: DispatchContext,
    tool: string,
    entry: Pick<LogEntry, 'severity' | 'direction' | 'message'> & { details?: LogEntry['details'] },
  ): void {
    this.log?.({
      timestamp: Date.now(),
      iteration: ctx.state.iteration,
      invocation: ctx.index,
      type: 'tool',
      remoteIdentifier: `tool:${tool}`,
      fatal: false,
      runId: ctx.state.runId,
      ...entry,
    });
  }
}

function isEvaluationReport(value: unknown): value is EvaluationReport {
  return isPlainObject(value) && Array.isArray(value.checks);
}
