import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import type { PersistenceHook, PersistenceRecord } from './types.js';

import { warn } from './utils.js';

const PersistenceRecordSchema = z.object({
  role: z.enum(['user', 'assistant']),
  type: z.enum(['text', 'reasoning', 'query_result', 'table', 'plot', 'session', 'tool_error']),
  text: z.string(),
  payload: z.record(z.string(), z.unknown()).optional(),
  runId: z.string().optional(),
  timestamp: z.number(),
});

export interface PersistenceConfig {
  sessionsDir?: string;
}

// In-process store, used for replay between runs and by tests
export class MemoryPersistence implements PersistenceHook {
  readonly records: PersistenceRecord[] = [];

  save(record: PersistenceRecord): void {
    this.records.push(structuredClone(record));
  }

  load(): PersistenceRecord[] {
    return this.records.map((record) => structuredClone(record));
  }
}

/**
 * One JSON line per record in `<sessionsDir>/<sessionId>.jsonl`.
 */
export class JsonlPersistence implements PersistenceHook {
  readonly filePath: string;
  // appends are chained so concurrent tool results land in call order
  private tail: Promise<void> = Promise.resolve();

  constructor(sessionsDir: string, sessionId: string) {
    if (!/^[A-Za-z0-9._-]+$/.test(sessionId)) {
      throw new Error(`invalid session id '${sessionId}'`);
    }
    this.filePath = path.join(path.resolve(sessionsDir), `${sessionId}.jsonl`);
  }

  async save(record: PersistenceRecord): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    const write = this.tail.then(async () => {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.appendFile(this.filePath, line, 'utf8');
    });
    // a failed append is reported to its caller and does not block later ones
    this.tail = write.catch(() => undefined);
    await write;
  }

  // Resolves once every save issued so far has settled.
  async flush(): Promise<void> {
    await this.tail;
  }

  async load(): Promise<PersistenceRecord[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
    return raw.split('\n').reduce<PersistenceRecord[]>((acc, line, idx) => {
      if (line.trim().length === 0) return acc;
      try {
        const parsed = PersistenceRecordSchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          acc.push(parsed.data);
        } else {
          warn(`skipping malformed session record at ${this.filePath}:${String(idx + 1)}`);
        }
      } catch {
        warn(`skipping unparseable session record at ${this.filePath}:${String(idx + 1)}`);
      }
      return acc;
    }, []);
  }
}

export function createPersistence(config: PersistenceConfig | undefined, sessionId: string): PersistenceHook | undefined {
  if (typeof config?.sessionsDir === 'string' && config.sessionsDir.trim().length > 0) {
    return new JsonlPersistence(config.sessionsDir, sessionId);
  }
  return undefined;
}

/**
 * Save through a hook without letting its failure reach the caller.
 */
export async function persistSafely(
  hook: PersistenceHook | undefined,
  record: PersistenceRecord,
  onError: (message: string) => void = (message) => { warn(message); },
): Promise<void> {
  if (hook === undefined) return;
  try {
    await hook.save(record);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    onError(`persistence hook failed: ${message}`);
  }
}
