import type { AgentEvent } from './types.js';

import { formatCell } from './utils.js';

export type CliOutputMode = 'events' | 'text';

export const resolveCliOutputMode = (formatOption: unknown): CliOutputMode => {
  if (formatOption === undefined || formatOption === 'text') return 'text';
  if (formatOption === 'events') return 'events';
  throw new Error(`unknown output format '${String(formatOption)}' (expected events or text)`);
};

/**
 * Render one run event for stdout. `events` mode prints every event as one
 * JSON line; `text` mode prints only what a user would see.
 */
export function formatEventForCli(event: AgentEvent, mode: CliOutputMode): string | undefined {
  if (mode === 'events') return JSON.stringify(event);
  switch (event.type) {
    case 'text':
      return event.data.text;
    case 'table': {
      const lines = [
        `## ${event.data.title}`,
        event.data.headers.join(' | '),
        ...event.data.rows.map((row) => row.map(formatCell).join(' | ')),
      ];
      if (event.data.truncated) lines.push('(truncated)');
      return lines.join('\n');
    }
    case 'plot':
      return `[plot: ${event.data.title}]`;
    case 'done': {
      const suggestions = event.data.suggestions.map((s) => `- ${s}`);
      return suggestions.length > 0 ? ['', 'Suggestions:', ...suggestions].join('\n') : undefined;
    }
    default:
      return undefined;
  }
}
