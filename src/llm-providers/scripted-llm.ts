import type { AssistantBlock, ConversationMessage, LLMCapability, LLMRequest, LLMResponse, StopReason } from '../types.js';

import { LLMCallError } from '../tools/tool-errors.js';

export type ScriptedStep =
  | { kind: 'response'; content: AssistantBlock[]; stopReason?: StopReason; delayMs?: number }
  | { kind: 'error'; message: string; delayMs?: number };

export interface ScriptedLLMOptions {
  // Chunk size used when streaming emit_text inputs as partial JSON
  streamChunkSize?: number;
  // Replayed once the script is exhausted; defaults to a plain end_turn
  whenExhausted?: ScriptedStep;
}

export interface RecordedRequest {
  system: string;
  messages: ConversationMessage[];
  toolNames: string[];
}

export const textBlock = (text: string): AssistantBlock => ({ type: 'text', text });

export const toolUse = (id: string, name: string, input: unknown): AssistantBlock => ({ type: 'tool_use', id, name, input });

export const respond = (content: AssistantBlock[], extra: { stopReason?: StopReason; delayMs?: number } = {}): ScriptedStep => ({
  kind: 'response',
  content,
  ...extra,
});

export const fail = (message: string, delayMs?: number): ScriptedStep => ({
  kind: 'error',
  message,
  ...(delayMs !== undefined ? { delayMs } : {}),
});

const abortReason = (): LLMCallError => new LLMCallError('scripted', 'request aborted', { kind: 'timeout' });

async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return;
  await new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Deterministic capability that replays pre-programmed steps in order and
 * records every request it receives.
 */
export class ScriptedLLM implements LLMCapability {
  readonly name = 'scripted';
  readonly requests: RecordedRequest[] = [];
  private readonly steps: ScriptedStep[];
  private readonly opts: ScriptedLLMOptions;
  private cursor = 0;

  constructor(steps: ScriptedStep[], opts: ScriptedLLMOptions = {}) {
    this.steps = [...steps];
    this.opts = opts;
  }

  get callCount(): number {
    return this.requests.length;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.requests.push({
      system: request.system,
      messages: structuredClone(request.messages),
      toolNames: request.tools.map((def) => def.name),
    });
    if (request.abortSignal?.aborted === true) throw abortReason();

    const step = this.steps[this.cursor] ?? this.opts.whenExhausted ?? respond([textBlock('Done.')], { stopReason: 'end_turn' });
    this.cursor += 1;
    await sleep(step.delayMs ?? 0, request.abortSignal);

    if (step.kind === 'error') {
      throw new LLMCallError('scripted', step.message);
    }
    this.stream(step.content, request);
    const hasToolUse = step.content.some((block) => block.type === 'tool_use');
    return {
      content: structuredClone(step.content),
      stopReason: step.stopReason ?? (hasToolUse ? 'tool_use' : 'end_turn'),
    };
  }

  private stream(content: readonly AssistantBlock[], request: LLMRequest): void {
    const onStream = request.onStream;
    if (onStream === undefined) return;
    const size = Math.max(1, this.opts.streamChunkSize ?? 8);
    content.forEach((block) => {
      if (block.type === 'text') {
        onStream({ type: 'text-delta', text: block.text });
        return;
      }
      onStream({ type: 'tool-input-start', id: block.id, toolName: block.name });
      const json = JSON.stringify(block.input ?? {});
      // eslint-disable-next-line functional/no-loop-statements
      for (let offset = 0; offset < json.length; offset += size) {
        onStream({ type: 'tool-input-delta', id: block.id, delta: json.slice(offset, offset + size) });
      }
    });
  }
}
