import type { ToolDefinition } from './tool-schema.js';
import type { ToolErrorKind } from './tools/tool-errors.js';

// Cell values as they travel between the dataset, the sandbox and the client
export type CellValue = string | number | boolean | null;

export interface TableData {
  columns: string[];
  rows: CellValue[][];
}

// Conversation structures exchanged with the LLM capability
export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: unknown;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: string;
  isError: boolean;
}

export type AssistantBlock = TextBlock | ToolUseBlock;
export type UserBlock = TextBlock | ToolResultBlock;

export type ConversationMessage =
  | { role: 'user'; content: string | UserBlock[] }
  | { role: 'assistant'; content: string | AssistantBlock[] };

export type ToolName = 'query' | 'emit_text' | 'emit_table' | 'emit_plot' | 'finalize';

// Raw invocation as produced by the model; the name is not trusted until parsed
export interface ToolInvocation {
  id: string;
  name: string;
  arguments: unknown;
}

export interface ToolResult {
  invocationId: string;
  content: string;
  isError: boolean;
}

// Sandbox results
export type QueryLanguage = 'sql' | 'script';

export type ExecutionKind = 'scalar' | 'table' | 'table_transform' | 'figure' | 'none';

export type ExecutionValue =
  | { kind: 'scalar'; value: CellValue }
  | { kind: 'table' | 'table_transform'; table: TableData; totalRows: number }
  | { kind: 'figure'; spec: Record<string, unknown> }
  | { kind: 'none' };

export interface ExecutionResult {
  success: boolean;
  kind: ExecutionKind;
  value?: ExecutionValue;
  preview: string;
  error?: string;
  errorKind?: ToolErrorKind;
  language: QueryLanguage;
  rowCount: number;
  columnCount: number;
  // Snapshot version the query ran against
  baseVersion: number;
  elapsedMs: number;
}

// Evaluator reports
export type CheckName = 'unsafe_code' | 'valid_answer' | 'grounding';

export interface CheckResult {
  name: CheckName;
  passed: boolean;
  score: number;
  detail: string;
}

export interface EvaluationReport {
  checks: CheckResult[];
}

export type SafetyReport = EvaluationReport;
export type QualityReport = EvaluationReport;

export interface JudgeVerdict {
  relevance: number;
  accuracy: number;
  completeness: number;
  verdict: 'pass' | 'warn' | 'retry';
  feedback: string;
}

// Events delivered to the client, in order
export type DoneReason = 'finalized' | 'end_turn' | 'max_iterations' | 'error' | 'canceled';

export interface RunMetrics {
  toolCalls: number;
  toolErrors: number;
  queries: number;
  failedQueries: number;
  groundingChecks: number;
  groundingFailures: number;
  validityFailures: number;
}

export interface DoneSummary {
  reason: DoneReason;
  iterations: number;
  dataUpdated: boolean;
  datasetVersion: number;
  title?: string;
  suggestions: string[];
  metrics: RunMetrics;
}

export interface QueryResultEvent {
  invocationId: string;
  description: string;
  query: string;
  language: QueryLanguage;
  success: boolean;
  kind: ExecutionKind;
  columns: string[];
  rows: CellValue[][];
  rowCount: number;
  error?: string;
  changeSummary?: string;
}

export interface JudgeEvent {
  source: 'grounding' | 'validity' | 'judge';
  passed: boolean;
  score: number;
  detail: string;
  invocationId?: string;
  verdict?: JudgeVerdict;
}

export interface AgentEventMap {
  status: { message: string };
  text: { text: string; fallback?: boolean };
  text_delta: { invocationId: string; delta: string };
  table: { title: string; headers: string[]; rows: CellValue[][]; truncated: boolean };
  plot: { title: string; spec: Record<string, unknown>; truncated: boolean };
  query_result: QueryResultEvent;
  judge: JudgeEvent;
  error: { message: string; fatal: boolean };
  session_update: { title: string };
  done: DoneSummary;
}

export type AgentEventType = keyof AgentEventMap;

export type AgentEventOf<K extends AgentEventType> = {
  [P in K]: { type: P; seq: number; data: AgentEventMap[P] };
}[K];

export type AgentEvent = AgentEventOf<AgentEventType>;

export type EmitEvent = <K extends AgentEventType>(type: K, data: AgentEventMap[K]) => void;

// User-visible output collected during a run
export type OutputBlock =
  | { type: 'text'; text: string }
  | { type: 'table'; title: string; headers: string[]; rows: CellValue[][] }
  | { type: 'plot'; title: string; spec: Record<string, unknown> };

// Mutable accumulator owned by a single run
export interface TurnState {
  runId: string;
  iteration: number;
  finished: boolean;
  outputs: OutputBlock[];
  previews: string[];
  datasetVersion: number;
  dataUpdated: boolean;
  title?: string;
  suggestions: string[];
  metrics: RunMetrics;
}

// Structured logging
export interface LogEntry {
  timestamp: number;
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';
  iteration: number;
  // Position of the tool invocation inside the batch (0 for LLM and run entries)
  invocation: number;
  direction: 'request' | 'response';
  type: 'llm' | 'tool' | 'agent';
  // 'provider:model' or 'tool:<name>'
  remoteIdentifier: string;
  fatal: boolean;
  message: string;
  runId?: string;
  details?: Record<string, string | number | boolean>;
}

export type LogSink = (entry: LogEntry) => void;

// LLM capability
export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'other';

export type StreamPart =
  | { type: 'text-delta'; text: string }
  | { type: 'tool-input-start'; id: string; toolName: string }
  | { type: 'tool-input-delta'; id: string; delta: string };

export interface LLMRequest {
  system: string;
  messages: ConversationMessage[];
  tools: readonly ToolDefinition[];
  abortSignal?: AbortSignal;
  onStream?: (part: StreamPart) => void;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMResponse {
  content: AssistantBlock[];
  stopReason: StopReason;
  usage?: TokenUsage;
}

export interface LLMCapability {
  readonly name: string;
  complete: (request: LLMRequest) => Promise<LLMResponse>;
}

// Persistence
export type PersistedMessageType = 'text' | 'reasoning' | 'query_result' | 'table' | 'plot' | 'session' | 'tool_error';

export interface PersistenceRecord {
  role: 'user' | 'assistant';
  type: PersistedMessageType;
  text: string;
  payload?: Record<string, unknown>;
  runId?: string;
  timestamp: number;
}

export interface PersistenceHook {
  save: (record: PersistenceRecord) => void | Promise<void>;
}
