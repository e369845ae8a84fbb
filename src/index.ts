// Main library exports for programmatic use
export { TurnOrchestrator } from './turn-orchestrator.js';
export { EventChannel } from './event-channel.js';
export { DatasetHandle } from './dataset/dataset-handle.js';
export { QuerySandbox } from './sandbox/query-sandbox.js';
export { validateQuery, validateScript, validateSql } from './sandbox/query-validator.js';
export { ToolDispatcher } from './tools/tool-dispatcher.js';
export { ToolExecutionError, LLMCallError, formatToolError } from './tools/tool-errors.js';
export {
  checkCodeSafety,
  checkNumericGrounding,
  checkResultValidity,
  mergeReports,
  renderReport,
} from './evaluation/metrics-evaluator.js';
export { LLMJudge } from './evaluation/llm-judge.js';
export { AnthropicCapability } from './llm-providers/anthropic.js';
export { ScriptedLLM, fail, respond, textBlock, toolUse } from './llm-providers/scripted-llm.js';
export { PartialJsonStringExtractor } from './partial-json.js';
export { TOOL_DEFINITIONS, TOOL_SCHEMA_VERSION, describeToolSchema, parseToolInvocation } from './tool-schema.js';
export { loadConfiguration, parseConfiguration, resolveSettings } from './config.js';
export { JsonlPersistence, MemoryPersistence, createPersistence } from './persistence.js';
export { buildHistoryMessages, buildSystemPrompt } from './prompt-builder.js';
export { StructuredLogger, createStructuredLogger } from './logging/structured-logger.js';

// Type exports
export type { TurnInput, TurnJudge, TurnOrchestratorOptions } from './turn-orchestrator.js';
export type { DatasetSnapshot, DatasetDescription } from './dataset/dataset-handle.js';
export type { Configuration, Settings } from './config.js';
export type { ToolErrorKind } from './tools/tool-errors.js';
export type {
  AgentEvent,
  AgentEventMap,
  AgentEventType,
  CellValue,
  ConversationMessage,
  DoneSummary,
  EvaluationReport,
  ExecutionResult,
  LLMCapability,
  LLMRequest,
  LLMResponse,
  LogEntry,
  PersistenceHook,
  PersistenceRecord,
  TableData,
  ToolInvocation,
  ToolResult,
} from './types.js';
