import { createRequire } from 'node:module';
import { Worker } from 'node:worker_threads';

import { z } from 'zod';

import type { QueryJob, RawExecution } from './query-worker.js';

import { ToolExecutionError } from '../tools/tool-errors.js';
import { toCellValue } from '../utils.js';

import { QUERY_WORKER_FUNCTIONS, runQueryJob } from './query-worker.js';

// better-sqlite3 is resolved here and handed to the worker as an absolute path,
// since eval'd worker code has no module context of its own.
const require = createRequire(import.meta.url);
let sqlitePath: string | undefined;

const resolveSqlitePath = (): string => {
  sqlitePath ??= require.resolve('better-sqlite3');
  return sqlitePath;
};

// The worker runs the compiled query-worker functions, started with `eval: true`
// so the same code works from the TypeScript sources and from the build.
const WORKER_SOURCE = [
  "'use strict';",
  "const { parentPort, workerData } = require('node:worker_threads');",
  ...QUERY_WORKER_FUNCTIONS.map((fn) => String(fn)),
  `parentPort.postMessage(${runQueryJob.name}(workerData, () => require(workerData.sqlitePath), require('node:vm')));`,
].join('\n');

export type WorkerJob = Omit<QueryJob, 'sqlitePath'>;

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const WorkerResultSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('table'),
    columns: z.array(z.string()),
    rows: z.array(z.array(CellSchema)),
    totalRows: z.number().int().nonnegative(),
  }),
  // NaN survives so the validity check can reject it
  z.object({ type: z.literal('scalar'), value: z.unknown() }),
  z.object({ type: z.literal('figure'), spec: z.record(z.string(), z.unknown()) }),
  z.object({ type: z.literal('none') }),
]);

const WorkerMessageSchema = z.union([
  z.object({ ok: z.literal(true), result: WorkerResultSchema }),
  z.object({ ok: z.literal(false), error: z.string(), timeout: z.boolean() }),
]);

const timeoutError = (timeoutMs: number): ToolExecutionError =>
  new ToolExecutionError('timeout', `Query timed out after ${String(timeoutMs)} ms`);

/**
 * Execute one query in a fresh worker thread. The worker is terminated on
 * completion, on timeout and on abort; failures reject with ToolExecutionError.
 */
export async function runInWorker(job: WorkerJob, signal?: AbortSignal): Promise<RawExecution> {
  if (signal?.aborted === true) {
    throw new ToolExecutionError('canceled', 'Query canceled before it started');
  }
  const worker = new Worker(WORKER_SOURCE, {
    eval: true,
    workerData: {
      ...job,
      columns: [...job.columns],
      rows: job.rows.map((row) => [...row]),
      sqlitePath: job.language === 'sql' ? resolveSqlitePath() : undefined,
    } satisfies QueryJob,
  });

  return await new Promise<RawExecution>((resolve, reject) => {
    let settled = false;
    const finish = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      void worker.terminate().catch(() => undefined);
      fn();
    };
    const onAbort = (): void => {
      finish(() => {
        reject(new ToolExecutionError('canceled', 'Query canceled'));
      });
    };
    const timer = setTimeout(() => {
      finish(() => {
        reject(timeoutError(job.timeoutMs));
      });
    }, job.timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    worker.once('message', (message: unknown) => {
      finish(() => {
        const parsed = WorkerMessageSchema.safeParse(message);
        if (!parsed.success) {
          reject(new ToolExecutionError('internal_error', 'Malformed message from query worker'));
          return;
        }
        const data = parsed.data;
        if (!data.ok) {
          reject(data.timeout ? timeoutError(job.timeoutMs) : new ToolExecutionError('execution_error', data.error));
          return;
        }
        const result = data.result;
        if (result.type === 'scalar') {
          const value = typeof result.value === 'number' ? result.value : toCellValue(result.value);
          resolve({ type: 'scalar', value });
          return;
        }
        resolve(result);
      });
    });
    worker.once('error', (error: Error) => {
      finish(() => {
        reject(new ToolExecutionError('execution_error', error.message));
      });
    });
    worker.once('exit', (code: number) => {
      finish(() => {
        reject(new ToolExecutionError('internal_error', `Query worker exited with code ${String(code)}`));
      });
    });
  });
}
