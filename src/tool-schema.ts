import { z } from 'zod';

import type { ToolInvocation, ToolName } from './types.js';

import { ToolExecutionError } from './tools/tool-errors.js';
import { isPlainObject, parseJsonLoose } from './utils.js';

export const TOOL_SCHEMA_VERSION = '1';

export const QueryArgsSchema = z.object({
  query: z.string().describe('A single read-only SQL SELECT/WITH statement against the table, or a script when language is "script".'),
  description: z.string().describe('One short sentence shown to the user while the query runs.'),
  language: z.enum(['sql', 'script']).optional().describe('Execution strategy; defaults to "sql".'),
});

export const EmitTextArgsSchema = z.object({
  text: z.string().describe('Markdown text shown to the user.'),
});

export const EmitTableArgsSchema = z.object({
  title: z.string(),
  headers: z.array(z.string()).min(1),
  rows: z.array(z.array(z.unknown())),
});

export const EmitPlotArgsSchema = z.object({
  title: z.string(),
  spec: z.record(z.string(), z.unknown()).describe('Vega-Lite style chart specification; "mark" is required and inline data goes in data.values.'),
});

export const FinalizeArgsSchema = z.object({
  session_title: z.string().nullable().optional().describe('Short title for the conversation, when one is warranted.'),
  suggestions: z.array(z.string()).optional().describe('Up to three follow-up questions the user may ask.'),
});

export type QueryArgs = z.infer<typeof QueryArgsSchema>;
export type EmitTextArgs = z.infer<typeof EmitTextArgsSchema>;
export type EmitTableArgs = z.infer<typeof EmitTableArgsSchema>;
export type EmitPlotArgs = z.infer<typeof EmitPlotArgsSchema>;
export type FinalizeArgs = z.infer<typeof FinalizeArgsSchema>;

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: z.ZodType;
}

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: 'query',
    description: 'Run a read-only query against the dataset and receive a preview of the result. A result that keeps every column and adds or modifies columns replaces the working dataset.',
    inputSchema: QueryArgsSchema,
  },
  {
    name: 'emit_text',
    description: 'Show explanatory text to the user. Quote numbers exactly as they appear in query results.',
    inputSchema: EmitTextArgsSchema,
  },
  {
    name: 'emit_table',
    description: 'Show a small table to the user.',
    inputSchema: EmitTableArgsSchema,
  },
  {
    name: 'emit_plot',
    description: 'Show a chart to the user.',
    inputSchema: EmitPlotArgsSchema,
  },
  {
    name: 'finalize',
    description: 'End the turn once the answer is complete.',
    inputSchema: FinalizeArgsSchema,
  },
];

const TOOL_NAMES = new Set<string>(TOOL_DEFINITIONS.map((def) => def.name));

export const isToolName = (value: string): value is ToolName => TOOL_NAMES.has(value);

export type ParsedInvocation =
  | { id: string; name: 'query'; args: QueryArgs }
  | { id: string; name: 'emit_text'; args: EmitTextArgs }
  | { id: string; name: 'emit_table'; args: EmitTableArgs }
  | { id: string; name: 'emit_plot'; args: EmitPlotArgs }
  | { id: string; name: 'finalize'; args: FinalizeArgs };

export type ParseOutcome =
  | { ok: true; invocation: ParsedInvocation }
  | { ok: false; error: ToolExecutionError };

const invalid = (name: string, issues: z.core.$ZodIssue[]): ParseOutcome => {
  const lines = issues.map((issue) => {
    const path = issue.path.map((p) => String(p)).join('.');
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
  return {
    ok: false,
    error: new ToolExecutionError('invalid_parameters', `invalid arguments for '${name}': ${lines.join('; ')}`, {
      details: { issues: lines },
    }),
  };
};

/**
 * Validate a raw model invocation into the tagged union keyed by tool name.
 * String arguments are parsed (and repaired) as JSON first.
 */
export function parseToolInvocation(raw: ToolInvocation): ParseOutcome {
  const { id, name } = raw;
  if (!isToolName(name)) {
    return { ok: false, error: new ToolExecutionError('unknown_tool', `unknown tool '${name}'`) };
  }
  const args = parseJsonLoose(raw.arguments ?? {});
  if (!isPlainObject(args)) {
    return {
      ok: false,
      error: new ToolExecutionError('invalid_parameters', `arguments for '${name}' must be a JSON object`),
    };
  }
  switch (name) {
    case 'query': {
      const parsed = QueryArgsSchema.safeParse(args);
      return parsed.success ? { ok: true, invocation: { id, name, args: parsed.data } } : invalid(name, parsed.error.issues);
    }
    case 'emit_text': {
      const parsed = EmitTextArgsSchema.safeParse(args);
      return parsed.success ? { ok: true, invocation: { id, name, args: parsed.data } } : invalid(name, parsed.error.issues);
    }
    case 'emit_table': {
      const parsed = EmitTableArgsSchema.safeParse(args);
      return parsed.success ? { ok: true, invocation: { id, name, args: parsed.data } } : invalid(name, parsed.error.issues);
    }
    case 'emit_plot': {
      const parsed = EmitPlotArgsSchema.safeParse(args);
      return parsed.success ? { ok: true, invocation: { id, name, args: parsed.data } } : invalid(name, parsed.error.issues);
    }
    case 'finalize': {
      const parsed = FinalizeArgsSchema.safeParse(args);
      return parsed.success ? { ok: true, invocation: { id, name, args: parsed.data } } : invalid(name, parsed.error.issues);
    }
  }
}

export interface ToolSchemaManifest {
  version: string;
  tools: { name: ToolName; description: string; inputSchema: unknown }[];
}

export function describeToolSchema(): ToolSchemaManifest {
  return {
    version: TOOL_SCHEMA_VERSION,
    tools: TOOL_DEFINITIONS.map((def) => ({
      name: def.name,
      description: def.description,
      inputSchema: z.toJSONSchema(def.inputSchema),
    })),
  };
}
