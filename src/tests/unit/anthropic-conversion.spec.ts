import { describe, expect, it } from 'vitest';

import { convertContent, convertMessages, convertTools } from '../../llm-providers/anthropic.js';
import { TOOL_DEFINITIONS } from '../../tool-schema.js';

describe('convertMessages', () => {
  it('turns tool results into a tool message after the calls', () => {
    const converted = convertMessages([
      { role: 'user', content: 'Total units?' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Checking.' },
          { type: 'tool_use', id: 'q1', name: 'query', input: { query: 'SELECT 1', description: 'one' } },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'tool_result', toolUseId: 'q1', content: 'Query succeeded (scalar).', isError: false },
          { type: 'tool_result', toolUseId: 'zz', content: 'ERROR (unknown_tool): x', isError: true },
        ],
      },
    ]);

    expect(converted).toEqual([
      { role: 'user', content: 'Total units?' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Checking.' },
          { type: 'tool-call', toolCallId: 'q1', toolName: 'query', input: { query: 'SELECT 1', description: 'one' } },
        ],
      },
      {
        role: 'tool',
        content: [
          { type: 'tool-result', toolCallId: 'q1', toolName: 'query', output: { type: 'text', value: 'Query succeeded (scalar).' } },
          { type: 'tool-result', toolCallId: 'zz', toolName: 'unknown', output: { type: 'error-text', value: 'ERROR (unknown_tool): x' } },
        ],
      },
    ]);
  });

  it('keeps user text blocks after the tool results', () => {
    const converted = convertMessages([
      { role: 'assistant', content: [{ type: 'tool_use', id: 'f', name: 'finalize', input: {} }] },
      {
        role: 'user',
        content: [
          { type: 'text', text: 'also this' },
          { type: 'tool_result', toolUseId: 'f', content: 'ok', isError: false },
        ],
      },
    ]);
    expect(converted.map((m) => m.role)).toEqual(['assistant', 'tool', 'user']);
  });
});

describe('convertContent', () => {
  it('keeps non-empty text and tool calls', () => {
    expect(convertContent([
      { type: 'text', text: '' },
      { type: 'reasoning', text: 'hidden' },
      { type: 'text', text: 'Here you go.' },
      { type: 'tool-call', toolCallId: 'c1', toolName: 'emit_text', input: '{"text":"hi"' },
      { type: 'tool-call', toolCallId: 'c2', toolName: 'finalize', input: {} },
    ])).toEqual([
      { type: 'text', text: 'Here you go.' },
      { type: 'tool_use', id: 'c1', name: 'emit_text', input: { text: 'hi' } },
      { type: 'tool_use', id: 'c2', name: 'finalize', input: {} },
    ]);
  });
});

describe('convertTools', () => {
  it('declares every tool by name', () => {
    expect(Object.keys(convertTools(TOOL_DEFINITIONS))).toEqual(['query', 'emit_text', 'emit_table', 'emit_plot', 'finalize']);
  });
});
