import type { LlmErrorKind } from '../llm-providers/llm-error-mapping.js';

import { errorMessage } from '../utils.js';

export type ToolErrorKind =
  | 'unknown_tool'
  | 'invalid_parameters'
  | 'unsafe_code'
  | 'execution_error'
  | 'timeout'
  | 'canceled'
  | 'conflict'
  | 'internal_error';

export class ToolExecutionError extends Error {
  readonly kind: ToolErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ToolErrorKind, message: string, opts?: { details?: Record<string, unknown> }) {
    super(message);
    this.name = 'ToolExecutionError';
    this.kind = kind;
    if (opts?.details !== undefined) {
      this.details = opts.details;
    }
  }
}

const isToolExecutionError = (value: unknown): value is ToolExecutionError =>
  value instanceof ToolExecutionError;

export const toToolExecutionError = (
  value: unknown,
  fallbackKind: ToolErrorKind = 'internal_error'
): ToolExecutionError => {
  if (isToolExecutionError(value)) return value;
  return new ToolExecutionError(fallbackKind, errorMessage(value));
};

export const formatToolError = (error: ToolExecutionError): string => `ERROR (${error.kind}): ${error.message}`;

// Fatal category: the LLM capability itself failed
export class LLMCallError extends Error {
  readonly provider: string;
  readonly kind: LlmErrorKind | 'unknown';

  constructor(provider: string, message: string, opts?: { cause?: unknown; kind?: LlmErrorKind }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'LLMCallError';
    this.provider = provider;
    this.kind = opts?.kind ?? 'unknown';
  }
}
