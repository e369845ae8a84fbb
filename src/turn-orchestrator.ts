import type { Settings } from './config.js';
import type { DatasetHandle } from './dataset/dataset-handle.js';
import type { TurnTranscript } from './evaluation/llm-judge.js';
import type {
  AgentEvent,
  AssistantBlock,
  ConversationMessage,
  DoneReason,
  EmitEvent,
  JudgeVerdict,
  LLMCapability,
  LLMResponse,
  LogEntry,
  LogSink,
  PersistenceHook,
  StreamPart,
  ToolResult,
  ToolUseBlock,
  TurnState,
  UserBlock,
} from './types.js';

import { EventChannel } from './event-channel.js';
import { PartialJsonStringExtractor } from './partial-json.js';
import { persistSafely } from './persistence.js';
import { buildSystemPrompt } from './prompt-builder.js';
import { QuerySandbox } from './sandbox/query-sandbox.js';
import { addSpanAttributes, recordSpanError, runWithSpan } from './telemetry/index.js';
import { TOOL_DEFINITIONS } from './tool-schema.js';
import { ToolQueue } from './tools/queue-manager.js';
import { ToolDispatcher } from './tools/tool-dispatcher.js';
import { formatToolError, ToolExecutionError } from './tools/tool-errors.js';
import { errorMessage, newRunId } from './utils.js';

export interface TurnJudge {
  evaluateTurn: (turn: TurnTranscript) => Promise<JudgeVerdict>;
}

export interface TurnInput {
  userMessage: string;
  dataset: DatasetHandle;
  // Prior conversation, oldest first; must open with a user turn
  history?: readonly ConversationMessage[];
  persistence?: PersistenceHook;
  signal?: AbortSignal;
  runId?: string;
}

export interface TurnOrchestratorOptions {
  llm: LLMCapability;
  settings: Settings;
  log?: LogSink;
  judge?: TurnJudge;
  sandbox?: QuerySandbox;
  persistence?: PersistenceHook;
  // Replaces the generated system prompt
  systemPrompt?: string;
}

interface RunContext {
  input: TurnInput;
  state: TurnState;
  channel: EventChannel;
  emit: EmitEvent;
  signal: AbortSignal;
  dispatcher: ToolDispatcher;
  persistence?: PersistenceHook;
  visibleOutput: boolean;
  doneEmitted: boolean;
}

const newTurnState = (runId: string, datasetVersion: number): TurnState => ({
  runId,
  iteration: 0,
  finished: false,
  outputs: [],
  previews: [],
  datasetVersion,
  dataUpdated: false,
  suggestions: [],
  metrics: {
    toolCalls: 0,
    toolErrors: 0,
    queries: 0,
    failedQueries: 0,
    groundingChecks: 0,
    groundingFailures: 0,
    validityFailures: 0,
  },
});

const isToolUse = (block: AssistantBlock): block is ToolUseBlock => block.type === 'tool_use';

const joinText = (blocks: readonly AssistantBlock[]): string => blocks
  .flatMap((block) => (block.type === 'text' ? [block.text.trim()] : []))
  .filter((text) => text.length > 0)
  .join('\n\n');

/**
 * Drives one user message through repeated LLM calls and tool batches.
 *
 * `run` returns the event channel immediately; the loop runs in the
 * background and always ends with exactly one `done` event, after which the
 * channel is closed. Failures never reject: they surface as `error` events.
 */
export class TurnOrchestrator {
  private readonly llm: LLMCapability;
  private readonly settings: Settings;
  private readonly log?: LogSink;
  private readonly judge?: TurnJudge;
  private readonly sandbox: QuerySandbox;
  private readonly persistence?: PersistenceHook;
  private readonly systemPrompt?: string;

  constructor(opts: TurnOrchestratorOptions) {
    this.llm = opts.llm;
    this.settings = opts.settings;
    this.log = opts.log;
    this.judge = opts.judge;
    this.sandbox = opts.sandbox ?? new QuerySandbox(opts.settings.sandbox);
    this.persistence = opts.persistence;
    this.systemPrompt = opts.systemPrompt;
  }

  run(input: TurnInput): EventChannel {
    const channel = new EventChannel();
    const runId = input.runId ?? newRunId();
    const controller = new AbortController();
    const onExternalAbort = (): void => {
      controller.abort();
    };
    if (input.signal?.aborted === true) controller.abort();
    input.signal?.addEventListener('abort', onExternalAbort, { once: true });

    const persistence = input.persistence ?? this.persistence;
    const ctx: RunContext = {
      input,
      state: newTurnState(runId, input.dataset.current().version),
      channel,
      emit: (type, data) => {
        if (type === 'text' || type === 'plot') ctx.visibleOutput = true;
        channel.push(type, data);
      },
      signal: controller.signal,
      dispatcher: new ToolDispatcher({
        sandbox: this.sandbox,
        settings: this.settings,
        log: this.log,
        persistence,
      }),
      persistence,
      visibleOutput: false,
      doneEmitted: false,
    };

    void runWithSpan('agent.run', { attributes: { 'agent.run_id': runId } }, async () => await this.execute(ctx))
      .catch((error: unknown) => {
        // Unexpected failure inside the loop itself; the caller still gets a terminal event
        this.logEntry(ctx, {
          severity: 'ERR',
          type: 'agent',
          remoteIdentifier: 'agent:run',
          fatal: true,
          message: `run failed: ${errorMessage(error)}`,
        });
        ctx.emit('error', { message: errorMessage(error), fatal: true });
        this.emitFallback(ctx);
        this.finish(ctx, 'error');
      })
      .finally(() => {
        input.signal?.removeEventListener('abort', onExternalAbort);
        channel.close();
      });
    return channel;
  }

  async runToCompletion(input: TurnInput): Promise<AgentEvent[]> {
    return await this.run(input).collect();
  }

  private async execute(ctx: RunContext): Promise<void> {
    const { input, state } = ctx;
    const system = this.systemPrompt ?? buildSystemPrompt(input.dataset.describe(), {
      tableName: this.settings.sandbox.tableName,
      allowScripts: this.settings.sandbox.allowScripts,
    });
    const messages: ConversationMessage[] = [...(input.history ?? []), { role: 'user', content: input.userMessage }];
    await this.persist(ctx, { role: 'user', type: 'text', text: input.userMessage });

    const maxIterations = this.settings.agent.maxIterations;
    let reason: DoneReason | undefined;
    // eslint-disable-next-line functional/no-loop-statements
    while (reason === undefined) {
      if (ctx.signal.aborted) {
        reason = 'canceled';
        break;
      }
      if (state.iteration >= maxIterations) {
        this.logEntry(ctx, {
          severity: 'WRN',
          type: 'agent',
          remoteIdentifier: 'agent:run',
          message: `iteration ceiling ${String(maxIterations)} reached without finalize`,
        });
        reason = 'max_iterations';
        break;
      }
      state.iteration += 1;
      ctx.emit('status', { message: state.iteration === 1 ? 'Analyzing the request' : `Working (step ${String(state.iteration)})` });

      let response: LLMResponse;
      try {
        response = await this.callLlm(ctx, system, messages);
      } catch (error) {
        if (ctx.signal.aborted) {
          reason = 'canceled';
          break;
        }
        const message = errorMessage(error);
        this.logEntry(ctx, {
          severity: 'ERR',
          type: 'llm',
          direction: 'response',
          remoteIdentifier: this.llm.name,
          fatal: true,
          message: `LLM call failed: ${message}`,
        });
        ctx.emit('error', { message: `LLM call failed: ${message}`, fatal: true });
        reason = 'error';
        break;
      }

      const toolUses = response.content.filter(isToolUse);
      const text = joinText(response.content);
      if (toolUses.length === 0) {
        if (text.length > 0) {
          state.outputs.push({ type: 'text', text });
          ctx.emit('text', { text });
          await this.persist(ctx, { role: 'assistant', type: 'text', text });
        }
        reason = 'end_turn';
        break;
      }

      if (text.length > 0) {
        await this.persist(ctx, { role: 'assistant', type: 'reasoning', text });
      }
      messages.push({ role: 'assistant', content: response.content });
      const results = await this.runBatch(ctx, toolUses);
      const resultBlocks: UserBlock[] = results.map((result) => ({
        type: 'tool_result',
        toolUseId: result.invocationId,
        content: result.content,
        isError: result.isError,
      }));
      messages.push({ role: 'user', content: resultBlocks });

      if (ctx.signal.aborted) {
        reason = 'canceled';
      } else if (state.finished) {
        reason = 'finalized';
      }
    }

    if (reason === 'canceled') {
      ctx.emit('status', { message: 'Stopped' });
    }
    this.emitFallback(ctx);
    if (reason !== 'canceled' && reason !== 'error') {
      await this.runJudge(ctx);
    }
    this.finish(ctx, reason);
  }

  private async callLlm(ctx: RunContext, system: string, messages: ConversationMessage[]): Promise<LLMResponse> {
    const extractors = new Map<string, PartialJsonStringExtractor>();
    const onStream = (part: StreamPart): void => {
      if (part.type === 'tool-input-start') {
        if (part.toolName === 'emit_text') extractors.set(part.id, new PartialJsonStringExtractor('text'));
        return;
      }
      if (part.type !== 'tool-input-delta') return;
      const extractor = extractors.get(part.id);
      if (extractor === undefined) return;
      const delta = extractor.push(part.delta);
      if (delta.length > 0) ctx.emit('text_delta', { invocationId: part.id, delta });
    };

    return await runWithSpan('agent.llm', {
      attributes: { 'agent.iteration': ctx.state.iteration, 'llm.name': this.llm.name },
    }, async () => {
      const started = Date.now();
      this.logEntry(ctx, {
        severity: 'VRB',
        type: 'llm',
        direction: 'request',
        remoteIdentifier: this.llm.name,
        message: `LLM request (${String(messages.length)} messages)`,
      });
      const response = await this.llm.complete({
        system,
        messages,
        tools: TOOL_DEFINITIONS,
        abortSignal: ctx.signal,
        onStream,
      });
      const toolCount = response.content.filter(isToolUse).length;
      addSpanAttributes({ 'llm.stop_reason': response.stopReason, 'llm.tool_calls': toolCount });
      this.logEntry(ctx, {
        severity: 'VRB',
        type: 'llm',
        direction: 'response',
        remoteIdentifier: this.llm.name,
        message: `LLM response: ${String(toolCount)} tool calls, ${String(response.content.length - toolCount)} text blocks`,
        details: {
          stop_reason: response.stopReason,
          latency_ms: Date.now() - started,
          ...(response.usage !== undefined
            ? { input_tokens: response.usage.inputTokens, output_tokens: response.usage.outputTokens }
            : {}),
        },
      });
      return response;
    });
  }

  /**
   * Execute one batch. Results come back in invocation order whatever the
   * completion order; `finalize` does not cut its siblings short.
   */
  private async runBatch(ctx: RunContext, toolUses: readonly ToolUseBlock[]): Promise<ToolResult[]> {
    const capacity = this.settings.agent.parallelTools ? this.settings.agent.maxConcurrentTools : 1;
    const queue = new ToolQueue(capacity);
    return await Promise.all(toolUses.map(async (use, index) => {
      try {
        return await queue.run(async () => await this.dispatchOne(ctx, use, index), ctx.signal);
      } catch (error) {
        // queue wait aborted before the invocation started
        ctx.state.metrics.toolErrors += 1;
        const err = new ToolExecutionError('canceled', `run was stopped before this tool executed (${errorMessage(error)})`);
        return { invocationId: use.id, content: formatToolError(err), isError: true };
      }
    }));
  }

  private async dispatchOne(ctx: RunContext, use: ToolUseBlock, index: number): Promise<ToolResult> {
    return await runWithSpan('agent.tool', {
      attributes: { 'tool.name': use.name, 'agent.iteration': ctx.state.iteration, 'tool.index': index },
    }, async (span) => {
      const result = await ctx.dispatcher.dispatch(
        { id: use.id, name: use.name, arguments: use.input },
        { state: ctx.state, dataset: ctx.input.dataset, emit: ctx.emit, signal: ctx.signal, index },
      );
      span.setAttribute('tool.is_error', result.isError);
      if (result.isError) recordSpanError(new Error(result.content.split('\n')[0]));
      return result;
    });
  }

  private async runJudge(ctx: RunContext): Promise<void> {
    if (this.judge === undefined) return;
    const { state } = ctx;
    let verdict: JudgeVerdict;
    try {
      verdict = await this.judge.evaluateTurn({
        question: ctx.input.userMessage,
        messages: state.outputs.flatMap((block) => (block.type === 'text' ? [block.text] : [])),
        queryResults: state.previews,
        plots: state.outputs.flatMap((block) => (block.type === 'plot' ? [block.title] : [])),
      });
    } catch (error) {
      this.logEntry(ctx, { severity: 'WRN', type: 'agent', remoteIdentifier: 'judge', message: `judge failed: ${errorMessage(error)}` });
      return;
    }
    const score = (verdict.relevance + verdict.accuracy + verdict.completeness) / 30;
    ctx.emit('judge', {
      source: 'judge',
      passed: verdict.verdict !== 'retry',
      score,
      detail: verdict.feedback,
      verdict,
    });
    this.logEntry(ctx, {
      severity: verdict.verdict === 'pass' ? 'VRB' : 'WRN',
      type: 'agent',
      remoteIdentifier: 'judge',
      message: `judge verdict ${verdict.verdict}: ${verdict.feedback}`,
      details: { relevance: verdict.relevance, accuracy: verdict.accuracy, completeness: verdict.completeness },
    });
  }

  private emitFallback(ctx: RunContext): void {
    if (ctx.visibleOutput || ctx.doneEmitted) return;
    const fallback = this.settings.agent.fallbackText;
    ctx.state.outputs.push({ type: 'text', text: fallback });
    ctx.emit('text', { text: fallback, fallback: true });
  }

  private finish(ctx: RunContext, reason: DoneReason): void {
    if (ctx.doneEmitted) return;
    ctx.doneEmitted = true;
    const { state } = ctx;
    ctx.emit('done', {
      reason,
      iterations: state.iteration,
      dataUpdated: state.dataUpdated,
      datasetVersion: state.datasetVersion,
      ...(state.title !== undefined ? { title: state.title } : {}),
      suggestions: [...state.suggestions],
      metrics: { ...state.metrics },
    });
    this.logEntry(ctx, {
      severity: 'FIN',
      type: 'agent',
      remoteIdentifier: 'agent:run',
      fatal: reason === 'error',
      message: `run finished: ${reason} after ${String(state.iteration)} iterations`,
      details: {
        reason,
        tool_calls: state.metrics.toolCalls,
        tool_errors: state.metrics.toolErrors,
        grounding_failures: state.metrics.groundingFailures,
        data_updated: state.dataUpdated,
      },
    });
  }

  private async persist(ctx: RunContext, record: { role: 'user' | 'assistant'; type: 'text' | 'reasoning'; text: string }): Promise<void> {
    await persistSafely(ctx.persistence, { ...record, runId: ctx.state.runId, timestamp: Date.now() }, (message) => {
      this.logEntry(ctx, { severity: 'WRN', type: 'agent', remoteIdentifier: 'agent:persistence', message });
    });
  }

  private logEntry(
    ctx: RunContext,
    entry: Pick<LogEntry, 'severity' | 'type' | 'remoteIdentifier' | 'message'> & Partial<Pick<LogEntry, 'direction' | 'fatal' | 'details'>>,
  ): void {
    this.log?.({
      timestamp: Date.now(),
      iteration: ctx.state.iteration,
      invocation: 0,
      direction: 'response',
      fatal: false,
      runId: ctx.state.runId,
      ...entry,
    });
  }
}
