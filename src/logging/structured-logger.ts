import type { LogEntry, LogSink } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent, type BuildStructuredEventOptions } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console' | 'none';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  // When false, VRB and TRC entries are dropped
  verbose?: boolean;
  writer?: (line: string) => void;
}

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly color: boolean;
  private readonly verbose: boolean;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.color = options.color ?? false;
    this.verbose = options.verbose ?? false;
    const writer = options.writer ?? defaultWriter;
    const format = options.format ?? 'logfmt';

    if (format === 'logfmt') {
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color: this.color })}\n`);
      });
    }
    if (format === 'json') {
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
    if (format === 'console') {
      this.sinks.push((event) => {
        writer(`${formatConsole(event, { color: this.color, verbose: this.verbose })}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    if (!this.verbose && (entry.severity === 'VRB' || entry.severity === 'TRC')) return;
    const options: BuildStructuredEventOptions = { labels: this.labels };
    const event = buildStructuredLogEvent(entry, options);
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }

  asSink(): LogSink {
    return (entry) => {
      this.emit(entry);
    };
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions = {}): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // ignore
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('iteration', event.iteration);
  push('invocation', event.invocation);
  push('run_id', event.runId);
  push('remote', event.remoteIdentifier);
  push('provider', event.provider);
  push('model', event.model);
  push('tool', event.tool);
  push('fatal', event.fatal);
  push('labels', event.labels);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
