import { describe, expect, it } from 'vitest';

import type { ToolInvocation, ToolResult, TurnState } from '../../types.js';

import { DatasetHandle } from '../../dataset/dataset-handle.js';
import { MemoryPersistence } from '../../persistence.js';
import { QuerySandbox } from '../../sandbox/query-sandbox.js';
import { describeChange, ToolDispatcher } from '../../tools/tool-dispatcher.js';
import { collectLogs, EventLog, newTestState, salesDataset, testSettings } from '../fixtures/analysis-fixtures.js';

interface Harness {
  dispatcher: ToolDispatcher;
  state: TurnState;
  dataset: DatasetHandle;
  events: EventLog;
  persistence: MemoryPersistence;
  logs: ReturnType<typeof collectLogs>;
  call: (name: string, args: unknown, signal?: AbortSignal) => Promise<ToolResult>;
}

function harness(dataset: DatasetHandle = salesDataset()): Harness {
  const settings = testSettings({ output: { maxTableRows: 2, maxPlotPoints: 3 } });
  const persistence = new MemoryPersistence();
  const logs = collectLogs();
  const dispatcher = new ToolDispatcher({
    sandbox: new QuerySandbox(settings.sandbox),
    settings,
    log: logs.sink,
    persistence,
  });
  const state = newTestState();
  const events = new EventLog();
  let counter = 0;
  const call = async (name: string, args: unknown, signal?: AbortSignal): Promise<ToolResult> => {
    counter += 1;
    const invocation: ToolInvocation = { id: `call-${String(counter)}`, name, arguments: args };
    return await dispatcher.dispatch(invocation, { state, dataset, emit: events.emit, index: 0, signal });
  };
  return { dispatcher, state, dataset, events, persistence, logs, call };
}

describe('ToolDispatcher query', () => {
  it('runs a read query and returns the preview with checks', async () => {
    const h = harness();
    const result = await h.call('query', {
      query: 'SELECT region, SUM(units) AS units FROM data GROUP BY region ORDER BY region',
      description: ' Units per region ',
    });

    expect(result).toEqual({
      invocationId: 'call-1',
      isError: false,
      content: [
        'Query succeeded (table).',
        '3 rows x 2 columns',
        'region | units',
        'east | 8',
        'north | 15',
        'south | 20',
        '',
        'QUALITY CHECKS:',
        '  - unsafe_code: PASS (no forbidden patterns detected)',
        '  - valid_answer: PASS (3 rows x 2 cols)',
      ].join('\n'),
    });
    expect(h.events.types()).toEqual(['status', 'query_result']);
    expect(h.events.of('status')).toEqual([{ message: 'Units per region' }]);
    expect(h.events.of('query_result')[0]).toMatchObject({
      invocationId: 'call-1',
      success: true,
      kind: 'table',
      columns: ['region', 'units'],
      rows: [['east', 8], ['north', 15], ['south', 20]],
      rowCount: 3,
    });
    expect(h.state.previews).toHaveLength(1);
    expect(h.state.metrics).toMatchObject({ toolCalls: 1, queries: 1, toolErrors: 0 });
    expect(h.persistence.records.map((r) => [r.type, r.text])).toEqual([['query_result', 'Units per region']]);
  });

  it('blocks unsafe code before it reaches the sandbox', async () => {
    const h = harness();
    const result = await h.call('query', { query: 'DROP TABLE data', description: 'drop' });

    expect(result.isError).toBe(true);
    expect(result.content).toBe([
      'ERROR (unsafe_code): query rejected by the safety check',
      '',
      'QUALITY CHECKS:',
      '  - unsafe_code: FAIL (uses DROP statement)',
    ].join('\n'));
    expect(h.events.types()).toEqual(['status']);
    expect(h.state.metrics).toMatchObject({ toolErrors: 1, queries: 0 });
    expect(h.persistence.records[0].type).toBe('tool_error');
    expect(h.logs.entries.some((e) => e.severity === 'WRN' && e.remoteIdentifier === 'tool:query')).toBe(true);
  });

  it('commits transforms and reports the change', async () => {
    const h = harness();
    const result = await h.call('query', { query: 'SELECT *, units * price AS revenue FROM data', description: 'add revenue' });

    expect(result.isError).toBe(false);
    expect(result.content).toContain('Dataset updated to version 2 (added columns: revenue; row delta: +0). Later queries read the updated table.');
    expect(h.dataset.current().version).toBe(2);
    expect(h.dataset.current().columns).toContain('revenue');
    expect(h.state).toMatchObject({ dataUpdated: true, datasetVersion: 2 });
    expect(h.events.of('query_result')[0].changeSummary).toBe('added columns: revenue; row delta: +0');
  });

  it('keeps a reordered full table as a read', async () => {
    const h = harness();
    const result = await h.call('query', { query: 'SELECT * FROM data ORDER BY units DESC', description: 'sorted' });

    expect(result.content.startsWith('Query succeeded (table).\n4 rows x 4 columns')).toBe(true);
    expect(result.content).not.toContain('Dataset updated');
    expect(h.dataset.current().version).toBe(1);
    expect(h.state).toMatchObject({ dataUpdated: false, datasetVersion: 1 });
    expect(h.events.of('query_result')[0].rows[0]).toEqual(['south', 'apple', 20, 1.25]);
  });

  it('keeps boolean columns boolean across a committed transform', async () => {
    const h = harness(new DatasetHandle({ columns: ['id', 'ok'], rows: [[1, true], [2, false]] }));
    const result = await h.call('query', { query: 'SELECT *, id * 2 AS d FROM data', description: 'double ids' });

    expect(result.isError).toBe(false);
    expect(h.dataset.current().rows).toEqual([[1, true, 2], [2, false, 4]]);
    expect(h.dataset.describe().columns.map((c) => c.type)).toEqual(['INTEGER', 'BOOLEAN', 'INTEGER']);
  });

  it('turns engine failures into error results with a validity event', async () => {
    const h = harness();
    const result = await h.call('query', { query: 'SELECT missing FROM data', description: 'broken' });

    expect(result.isError).toBe(true);
    expect(result.content.startsWith('ERROR (execution_error): no such column')).toBe(true);
    expect(result.content.endsWith('  - valid_answer: FAIL (query failed with error)\n  >> Consider retrying with a different query.')).toBe(true);
    expect(h.state.metrics).toMatchObject({ failedQueries: 1, validityFailures: 1, toolErrors: 1 });
    expect(h.events.of('judge')).toEqual([
      { source: 'validity', passed: false, score: 0, detail: 'query failed with error', invocationId: 'call-1' },
    ]);
    expect(h.events.of('query_result')[0].success).toBe(false);
  });
});

describe('ToolDispatcher emit tools', () => {
  it('flags ungrounded numbers without failing the call', async () => {
    const h = harness();
    h.state.previews.push('Result: 87.7');
    const result = await h.call('emit_text', { text: 'The average is 999.9' });

    expect(result).toEqual({
      invocationId: 'call-1',
      isError: false,
      content: 'ok\n\nQUALITY CHECKS:\n  - grounding: 0/1 numbers verified, unverified: 999.9 (informational)',
    });
    expect(h.events.types()).toEqual(['text', 'judge']);
    expect(h.events.of('judge')[0]).toMatchObject({ source: 'grounding', passed: false, score: 0 });
    expect(h.state.metrics).toMatchObject({ groundingChecks: 1, groundingFailures: 1 });
  });

  it('emits grounded text without a judge event', async () => {
    const h = harness();
    h.state.previews.push('Result: 87.7');
    const result = await h.call('emit_text', { text: 'The average is 87.7' });

    expect(result.content).toBe('ok\n\nQUALITY CHECKS:\n  - grounding: 1/1 numbers verified (informational)');
    expect(h.events.of('text')).toEqual([{ text: 'The average is 87.7' }]);
    expect(h.events.of('judge')).toEqual([]);
    expect(h.state.outputs).toEqual([{ type: 'text', text: 'The average is 87.7' }]);
  });

  it('truncates and pads table rows', async () => {
    const h = harness();
    const result = await h.call('emit_table', { title: 'Sample', headers: ['a', 'b'], rows: [[1, 2, 3], [4], [5, 6]] });

    expect(result.content).toBe('ok (table truncated to 2 of 3 rows)');
    expect(h.events.of('table')).toEqual([{ title: 'Sample', headers: ['a', 'b'], rows: [[1, 2], [4, null]], truncated: true }]);
  });

  it('validates plot specs', async () => {
    const h = harness();
    const result = await h.call('emit_plot', { title: 'Broken', spec: { data: { values: [] } } });

    expect(result.isError).toBe(true);
    expect(result.content).toBe("ERROR (invalid_parameters): invalid plot spec: spec must have required property 'mark'");
    expect(h.events.of('plot')).toEqual([]);
  });

  it('caps plot data points and fills the title', async () => {
    const h = harness();
    const values = [1, 2, 3, 4, 5].map((y) => ({ x: y, y }));
    const result = await h.call('emit_plot', { title: 'Trend', spec: { mark: 'line', data: { values } } });

    expect(result.content).toBe('ok (plot data truncated to 3 points)');
    expect(h.events.of('plot')[0]).toEqual({
      title: 'Trend',
      truncated: true,
      spec: { mark: 'line', data: { values: values.slice(0, 3) }, title: 'Trend' },
    });
  });

  it('records the title and at most three suggestions on finalize', async () => {
    const h = harness();
    const result = await h.call('finalize', { session_title: ' Sales review ', suggestions: ['a', ' ', 'b', 'c', 'd'] });

    expect(result.content).toBe('ok');
    expect(h.state).toMatchObject({ finished: true, title: 'Sales review', suggestions: ['a', 'b', 'c'] });
    expect(h.events.of('session_update')).toEqual([{ title: 'Sales review' }]);
  });
});

describe('ToolDispatcher errors', () => {
  it('reports unknown tools', async () => {
    const h = harness();
    const result = await h.call('delete_everything', {});
    expect(result).toEqual({ invocationId: 'call-1', isError: true, content: "ERROR (unknown_tool): unknown tool 'delete_everything'" });
  });

  it('refuses to run after the run was stopped', async () => {
    const h = harness();
    const controller = new AbortController();
    controller.abort();
    const result = await h.call('emit_text', { text: 'late' }, controller.signal);
    expect(result.content).toBe('ERROR (canceled): run was stopped before this tool executed');
    expect(h.events.events).toEqual([]);
  });

  it('logs and survives a failing persistence hook', async () => {
    const settings = testSettings();
    const logs = collectLogs();
    const dispatcher = new ToolDispatcher({
      sandbox: new QuerySandbox(settings.sandbox),
      settings,
      log: logs.sink,
      persistence: { save: () => { throw new Error('disk full'); } },
    });
    const events = new EventLog();
    const result = await dispatcher.dispatch(
      { id: 'x', name: 'emit_text', arguments: { text: 'hello' } },
      { state: newTestState(), dataset: salesDataset(), emit: events.emit, index: 2 },
    );

    expect(result.isError).toBe(false);
    const warning = logs.entries.find((e) => e.message === 'persistence hook failed: disk full');
    expect(warning).toMatchObject({ severity: 'WRN', invocation: 2, remoteIdentifier: 'tool:emit_text' });
  });
});

describe('describeChange', () => {
  it('summarizes added and removed columns and the row delta', async () => {
    const handle = salesDataset();
    const before = handle.current();
    const after = await handle.commit({ columns: ['region', 'share'], rows: [['north', 0.5]] }, { baseVersion: 1, reason: 'x' });
    expect(describeChange(before, after)).toBe('added columns: share; removed columns: product, units, price; row delta: -3');
  });
});
