import { createAnthropic } from '@ai-sdk/anthropic';
import { generateText, streamText, tool } from 'ai';

import type { ToolDefinition } from '../tool-schema.js';
import type {
  AssistantBlock,
  ConversationMessage,
  LLMCapability,
  LLMRequest,
  LLMResponse,
  StopReason,
  TokenUsage,
} from '../types.js';
import type { FinishReason, LanguageModel, LanguageModelUsage, ModelMessage, ToolSet } from 'ai';

import { LLMCallError } from '../tools/tool-errors.js';
import { errorMessage, parseJsonLoose } from '../utils.js';

import { classifyLlmError } from './llm-error-mapping.js';

export interface AnthropicCapabilityConfig {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxOutputTokens: number;
  stream: boolean;
}

// Content parts of a finished step that the capability reads
interface StepContentPart {
  type: string;
  text?: string;
  toolCallId?: string;
  toolName?: string;
  input?: unknown;
}

const mapFinishReason = (reason: FinishReason | undefined): StopReason => {
  switch (reason) {
    case 'tool-calls':
      return 'tool_use';
    case 'stop':
      return 'end_turn';
    case 'length':
      return 'max_tokens';
    default:
      return 'other';
  }
};

const toTokenUsage = (usage: LanguageModelUsage | undefined): TokenUsage | undefined => {
  if (usage === undefined) return undefined;
  return { inputTokens: usage.inputTokens ?? 0, outputTokens: usage.outputTokens ?? 0 };
};

// Tools are declared without executors so the SDK returns calls instead of running them.
export function convertTools(tools: readonly ToolDefinition[]): ToolSet {
  return Object.fromEntries(
    tools.map((def) => [def.name, tool({ description: def.description, inputSchema: def.inputSchema })]),
  );
}

/**
 * Conversation -> SDK model messages. Tool results become a `tool` message
 * that directly follows the assistant message holding the matching calls.
 */
export function convertMessages(messages: readonly ConversationMessage[]): ModelMessage[] {
  const toolNames = new Map<string, string>();
  return messages.flatMap((message): ModelMessage[] => {
    if (message.role === 'assistant') {
      if (typeof message.content === 'string') return [{ role: 'assistant', content: message.content }];
      return [{
        role: 'assistant',
        content: message.content.map((block) => {
          if (block.type === 'text') return { type: 'text' as const, text: block.text };
          toolNames.set(block.id, block.name);
          return { type: 'tool-call' as const, toolCallId: block.id, toolName: block.name, input: block.input };
        }),
      }];
    }
    if (typeof message.content === 'string') return [{ role: 'user', content: message.content }];
    const out: ModelMessage[] = [];
    const results = message.content.flatMap((block) => (block.type === 'tool_result' ? [block] : []));
    const texts = message.content.flatMap((block) => (block.type === 'text' ? [block] : []));
    if (results.length > 0) {
      out.push({
        role: 'tool',
        content: results.map((block) => ({
          type: 'tool-result' as const,
          toolCallId: block.toolUseId,
          toolName: toolNames.get(block.toolUseId) ?? 'unknown',
          output: block.isError
            ? { type: 'error-text' as const, value: block.content }
            : { type: 'text' as const, value: block.content },
        })),
      });
    }
    if (texts.length > 0) {
      out.push({ role: 'user', content: texts.map((block) => ({ type: 'text' as const, text: block.text })) });
    }
    return out;
  });
}

// Invalid calls come back flagged with the raw input text; the dispatcher re-validates.
export function convertContent(parts: readonly StepContentPart[]): AssistantBlock[] {
  return parts.flatMap((part): AssistantBlock[] => {
    if (part.type === 'text' && typeof part.text === 'string' && part.text.length > 0) {
      return [{ type: 'text', text: part.text }];
    }
    if (part.type === 'tool-call' && typeof part.toolCallId === 'string' && typeof part.toolName === 'string') {
      const input = typeof part.input === 'string' ? parseJsonLoose(part.input) : part.input;
      return [{ type: 'tool_use', id: part.toolCallId, name: part.toolName, input }];
    }
    return [];
  });
}

export class AnthropicCapability implements LLMCapability {
  readonly name: string;
  private readonly model: LanguageModel;
  private readonly config: AnthropicCapabilityConfig;

  constructor(config: AnthropicCapabilityConfig) {
    this.config = config;
    this.name = `anthropic:${config.model}`;
    const prov = createAnthropic({
      ...(config.apiKey !== undefined ? { apiKey: config.apiKey } : {}),
      ...(config.baseUrl !== undefined ? { baseURL: config.baseUrl } : {}),
    });
    this.model = prov(config.model);
  }

  get languageModel(): LanguageModel {
    return this.model;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    try {
      return this.config.stream
        ? await this.completeStreaming(request)
        : await this.completeNonStreaming(request);
    } catch (error) {
      if (error instanceof LLMCallError) throw error;
      const kind = classifyLlmError(error);
      throw new LLMCallError('anthropic', errorMessage(error), { cause: error, ...(kind !== undefined ? { kind } : {}) });
    }
  }

  private async completeNonStreaming(request: LLMRequest): Promise<LLMResponse> {
    const result = await generateText({
      model: this.model,
      system: request.system,
      messages: convertMessages(request.messages),
      tools: convertTools(request.tools),
      maxOutputTokens: this.config.maxOutputTokens,
      abortSignal: request.abortSignal,
    });
    const usage = toTokenUsage(result.usage);
    return {
      content: convertContent(result.content),
      stopReason: mapFinishReason(result.finishReason),
      ...(usage !== undefined ? { usage } : {}),
    };
  }

  private async completeStreaming(request: LLMRequest): Promise<LLMResponse> {
    let streamError: unknown;
    const result = streamText({
      model: this.model,
      system: request.system,
      messages: convertMessages(request.messages),
      tools: convertTools(request.tools),
      maxOutputTokens: this.config.maxOutputTokens,
      abortSignal: request.abortSignal,
      onError: ({ error }) => {
        streamError ??= error;
      },
    });

    let finishReason: FinishReason | undefined;
    // eslint-disable-next-line functional/no-loop-statements
    for await (const part of result.fullStream) {
      switch (part.type) {
        case 'text-delta':
          if (part.text.length > 0) request.onStream?.({ type: 'text-delta', text: part.text });
          break;
        case 'tool-input-start':
          request.onStream?.({ type: 'tool-input-start', id: part.id, toolName: part.toolName });
          break;
        case 'tool-input-delta':
          request.onStream?.({ type: 'tool-input-delta', id: part.id, delta: part.delta });
          break;
        case 'finish':
          finishReason = part.finishReason;
          break;
        case 'error':
          streamError ??= part.error;
          break;
        default:
          break;
      }
    }
    if (streamError !== undefined) throw streamError;

    const content = await result.content;
    const usage = toTokenUsage(await result.usage);
    return {
      content: convertContent(content),
      stopReason: mapFinishReason(finishReason ?? await result.finishReason),
      ...(usage !== undefined ? { usage } : {}),
    };
  }
}
