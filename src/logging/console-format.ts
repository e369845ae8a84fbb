import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_GREEN = '\u001B[32m';
const ANSI_BLUE = '\u001B[34m';

function buildContext(event: StructuredLogEvent): string | undefined {
  const metrics: string[] = [];
  const latency = event.labels.latency_ms;
  if (latency !== undefined) metrics.push(`${latency}ms`);
  const stopReason = event.labels.stop_reason;
  if (stopReason !== undefined) metrics.push(`stop=${stopReason}`);
  if (event.labels.is_error === 'true') metrics.push('error');
  const suffix = metrics.length > 0 ? ` [${metrics.join(', ')}]` : '';

  if (event.type === 'llm') {
    if (event.provider === undefined) return undefined;
    const label = event.model !== undefined ? `${event.provider}/${event.model}` : event.provider;
    return `${label}${suffix}`;
  }
  if (event.type === 'tool' && event.tool !== undefined) {
    return `${event.tool}${suffix}`;
  }
  return suffix.length > 0 ? suffix.trim() : undefined;
}

/**
 * Human-oriented single line:
 * `WRN 3.1 ← TOOL query [12ms, error] message`
 */
export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const direction = event.direction === 'request' ? '→' : '←';
  const kind = event.type === 'llm' ? 'LLM' : event.type === 'tool' ? 'TOOL' : 'RUN';
  const prefix = `${event.severity} ${String(event.iteration)}.${String(event.invocation)} ${direction} ${kind}`;
  const context = buildContext(event);
  const useColor = options.color === true;

  let contextText = context ?? '';
  if (useColor && contextText.length > 0 && event.severity !== 'ERR' && event.severity !== 'WRN') {
    contextText = `${event.type === 'llm' ? ANSI_BLUE : ANSI_GREEN}${contextText}${ANSI_RESET}`;
  }
  const parts = [prefix];
  if (contextText.length > 0) parts.push(contextText);
  if (event.message.trim().length > 0) parts.push(event.message.trim());
  let line = parts.join(' ');

  if (options.verbose === true) {
    const extras = Object.entries(event.labels)
      .filter(([key]) => key !== 'latency_ms' && key !== 'stop_reason' && key !== 'is_error')
      .map(([key, value]) => `${key}=${value}`);
    if (extras.length > 0) line += ` (${extras.join(' ')})`;
  }

  if (useColor && event.severity === 'ERR') return `${ANSI_RED}${line}${ANSI_RESET}`;
  if (useColor && event.severity === 'WRN') return `${ANSI_YELLOW}${line}${ANSI_RESET}`;
  return line;
}
