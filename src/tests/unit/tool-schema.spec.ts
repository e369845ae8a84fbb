import { describe, expect, it } from 'vitest';

import { describeToolSchema, isToolName, parseToolInvocation, TOOL_SCHEMA_VERSION } from '../../tool-schema.js';

describe('parseToolInvocation', () => {
  it('parses JSON string arguments into the tagged invocation', () => {
    const outcome = parseToolInvocation({
      id: 't1',
      name: 'query',
      arguments: '{"query":"SELECT 1","description":"one"}',
    });
    expect(outcome).toEqual({
      ok: true,
      invocation: { id: 't1', name: 'query', args: { query: 'SELECT 1', description: 'one' } },
    });
  });

  it('repairs truncated JSON', () => {
    const outcome = parseToolInvocation({ id: 't2', name: 'emit_text', arguments: '{"text": "hi"' });
    expect(outcome).toEqual({ ok: true, invocation: { id: 't2', name: 'emit_text', args: { text: 'hi' } } });
  });

  it('rejects unknown tools', () => {
    const outcome = parseToolInvocation({ id: 't3', name: 'drop_table', arguments: {} });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('unknown_tool');
    expect(outcome.error.message).toBe("unknown tool 'drop_table'");
  });

  it('lists the failing fields', () => {
    const outcome = parseToolInvocation({ id: 't4', name: 'emit_text', arguments: { body: 'x' } });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('invalid_parameters');
    expect(outcome.error.message.startsWith("invalid arguments for 'emit_text': text: ")).toBe(true);
  });

  it('rejects non-object arguments', () => {
    const outcome = parseToolInvocation({ id: 't5', name: 'query', arguments: '[1,2]' });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe("arguments for 'query' must be a JSON object");
  });

  it('treats missing arguments as an empty object', () => {
    const outcome = parseToolInvocation({ id: 't6', name: 'finalize', arguments: undefined });
    expect(outcome).toEqual({ ok: true, invocation: { id: 't6', name: 'finalize', args: {} } });
  });
});

describe('describeToolSchema', () => {
  it('publishes every tool with a JSON schema', () => {
    const manifest = describeToolSchema();
    expect(manifest.version).toBe(TOOL_SCHEMA_VERSION);
    expect(manifest.tools.map((t) => t.name)).toEqual(['query', 'emit_text', 'emit_table', 'emit_plot', 'finalize']);
    expect(manifest.tools[0].inputSchema).toMatchObject({ type: 'object', required: ['query', 'description'] });
  });

  it('recognizes tool names', () => {
    expect(isToolName('emit_plot')).toBe(true);
    expect(isToolName('shell')).toBe(false);
  });
});
