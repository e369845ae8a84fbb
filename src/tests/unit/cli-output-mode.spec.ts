import { describe, expect, it } from 'vitest';

import type { AgentEvent, AgentEventOf } from '../../types.js';

import { formatEventForCli, resolveCliOutputMode } from '../../cli-output-mode.js';

const metrics = {
  toolCalls: 0,
  toolErrors: 0,
  queries: 0,
  failedQueries: 0,
  groundingChecks: 0,
  groundingFailures: 0,
  validityFailures: 0,
};

describe('resolveCliOutputMode', () => {
  it('defaults to text', () => {
    expect(resolveCliOutputMode(undefined)).toBe('text');
    expect(resolveCliOutputMode('events')).toBe('events');
  });

  it('rejects unknown modes', () => {
    expect(() => resolveCliOutputMode('xml')).toThrow("unknown output format 'xml' (expected events or text)");
  });
});

describe('formatEventForCli', () => {
  it('prints every event as JSON in events mode', () => {
    const event: AgentEvent = { type: 'status', seq: 3, data: { message: 'Working' } };
    expect(formatEventForCli(event, 'events')).toBe('{"type":"status","seq":3,"data":{"message":"Working"}}');
  });

  it('renders tables as pipe-separated rows', () => {
    const event: AgentEvent = {
      type: 'table',
      seq: 1,
      data: { title: 'Units', headers: ['region', 'units'], rows: [['north', 15], ['east', null]], truncated: true },
    };
    expect(formatEventForCli(event, 'text')).toBe('## Units\nregion | units\nnorth | 15\neast | NULL\n(truncated)');
  });

  it('prints suggestions from done and hides internal events', () => {
    const done: AgentEventOf<'done'> = {
      type: 'done',
      seq: 9,
      data: { reason: 'finalized', iterations: 2, dataUpdated: false, datasetVersion: 1, suggestions: ['By month?'], metrics },
    };
    expect(formatEventForCli(done, 'text')).toBe('\nSuggestions:\n- By month?');
    expect(formatEventForCli({ ...done, data: { ...done.data, suggestions: [] } }, 'text')).toBeUndefined();
    expect(formatEventForCli({ type: 'status', seq: 0, data: { message: 'x' } }, 'text')).toBeUndefined();
    expect(formatEventForCli({ type: 'plot', seq: 0, data: { title: 'Trend', spec: {}, truncated: false } }, 'text')).toBe('[plot: Trend]');
  });
});
