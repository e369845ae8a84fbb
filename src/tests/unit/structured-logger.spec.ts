import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { formatConsole } from '../../logging/console-format.js';
import { encodeLogfmtValue, formatLogfmt } from '../../logging/logfmt.js';
import { buildStructuredLogEvent, parseRemoteIdentifier } from '../../logging/structured-log-event.js';
import { createStructuredLogger } from '../../logging/structured-logger.js';

const toolEntry: LogEntry = {
  timestamp: 0,
  severity: 'WRN',
  iteration: 2,
  invocation: 1,
  direction: 'response',
  type: 'tool',
  remoteIdentifier: 'tool:query',
  fatal: false,
  message: 'query failed',
  runId: 'run-1',
  details: { latency_ms: 12, is_error: true },
};

const capture = (): { lines: string[]; writer: (line: string) => void } => {
  const lines: string[] = [];
  return { lines, writer: (line) => { lines.push(line); } };
};

describe('logfmt', () => {
  it('renders fields in a stable order with the message last', () => {
    expect(formatLogfmt(buildStructuredLogEvent(toolEntry))).toBe(
      'ts=1970-01-01T00:00:00.000Z level=wrn priority=4 type=tool direction=response iteration=2 invocation=1 '
      + 'run_id=run-1 remote=tool:query tool=query latency_ms=12 is_error=true message="query failed"',
    );
  });

  it('quotes values that need it', () => {
    expect(encodeLogfmtValue('')).toBe('""');
    expect(encodeLogfmtValue('a=b')).toBe('"a=b"');
    expect(encodeLogfmtValue('say "hi"')).toBe('"say \\"hi\\""');
    expect(encodeLogfmtValue('two\nlines')).toBe('two\\nlines');
  });
});

describe('buildStructuredLogEvent', () => {
  it('splits llm identifiers into provider and model', () => {
    expect(parseRemoteIdentifier('anthropic:claude-test', 'llm')).toEqual({ provider: 'anthropic', model: 'claude-test' });
    expect(parseRemoteIdentifier('agent:run', 'agent')).toEqual({});
  });

  it('drops labels that collide with reserved keys', () => {
    const event = buildStructuredLogEvent({ ...toolEntry, details: { tool: 'x', rows: 3 } }, { labels: { host: 'test' } });
    expect(event.labels).toEqual({ host: 'test', rows: '3' });
    expect(event.priority).toBe(4);
  });
});

describe('formatConsole', () => {
  it('summarizes tool entries on one line', () => {
    expect(formatConsole(buildStructuredLogEvent(toolEntry))).toBe('WRN 2.1 ← TOOL query [12ms, error] query failed');
  });

  it('labels llm requests with provider and model', () => {
    const event = buildStructuredLogEvent({
      ...toolEntry,
      severity: 'VRB',
      type: 'llm',
      direction: 'request',
      invocation: 0,
      remoteIdentifier: 'anthropic:claude-test',
      message: 'LLM request (3 messages)',
      details: {},
    });
    expect(formatConsole(event)).toBe('VRB 2.0 → LLM anthropic/claude-test LLM request (3 messages)');
  });
});

describe('StructuredLogger', () => {
  it('drops verbose entries unless verbose is set', () => {
    const out = capture();
    const logger = createStructuredLogger({ format: 'logfmt', writer: out.writer });
    logger.emit({ ...toolEntry, severity: 'VRB' });
    logger.emit(toolEntry);
    expect(out.lines).toHaveLength(1);
    expect(out.lines[0].endsWith('message="query failed"\n')).toBe(true);
  });

  it('writes JSON payloads', () => {
    const out = capture();
    createStructuredLogger({ format: 'json', writer: out.writer }).asSink()({ ...toolEntry, severity: 'ERR', fatal: true });
    const parsed: unknown = JSON.parse(out.lines[0]);
    expect(parsed).toMatchObject({
      ts: '1970-01-01T00:00:00.000Z',
      severity: 'ERR',
      level: 'err',
      priority: 3,
      tool: 'query',
      fatal: true,
      labels: { latency_ms: '12', is_error: 'true' },
      message: 'query failed',
    });
  });

  it('writes nothing in none format', () => {
    const out = capture();
    createStructuredLogger({ format: 'none', writer: out.writer }).emit(toolEntry);
    expect(out.lines).toEqual([]);
  });
});
