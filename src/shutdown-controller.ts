import type { LogSink } from './types.js';

import { errorMessage } from './utils.js';

export type CleanupTask = () => Promise<void> | void;

interface Cleanup {
  name: string;
  task: CleanupTask;
}

/**
 * Stops a CLI run: aborts the shared signal the orchestrator listens to, then
 * runs cleanups (pending session writes, the warning sink) newest first.
 * Calling `shutdown` again returns the same pending stop.
 */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly cleanups: Cleanup[] = [];
  private pending?: Promise<void>;

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get stopping(): boolean {
    return this.pending !== undefined;
  }

  onShutdown(name: string, task: CleanupTask): () => void {
    const cleanup = { name, task };
    this.cleanups.push(cleanup);
    return () => {
      const idx = this.cleanups.indexOf(cleanup);
      if (idx >= 0) this.cleanups.splice(idx, 1);
    };
  }

  async shutdown(log?: LogSink, reason = 'stopped by user'): Promise<void> {
    this.pending ??= this.stop(log, reason);
    await this.pending;
  }

  private async stop(log: LogSink | undefined, reason: string): Promise<void> {
    this.abortController.abort(new Error(reason));
    // eslint-disable-next-line functional/no-loop-statements -- cleanups run one at a time
    for (const { name, task } of [...this.cleanups].reverse()) {
      try {
        await task();
      } catch (error) {
        log?.({
          timestamp: Date.now(),
          severity: 'WRN',
          iteration: 0,
          invocation: 0,
          direction: 'response',
          type: 'agent',
          remoteIdentifier: 'shutdown',
          fatal: false,
          message: `cleanup '${name}' failed: ${errorMessage(error)}`,
        });
      }
    }
  }
}
