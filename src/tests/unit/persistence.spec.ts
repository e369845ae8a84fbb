import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import type { PersistenceRecord } from '../../types.js';

import { createPersistence, JsonlPersistence, MemoryPersistence, persistSafely } from '../../persistence.js';
import { setWarningSink } from '../../utils.js';

const record = (text: string, type: PersistenceRecord['type'] = 'text'): PersistenceRecord => ({
  role: 'assistant',
  type,
  text,
  runId: 'run-1',
  timestamp: 1,
});

describe('MemoryPersistence', () => {
  it('stores copies of records', () => {
    const store = new MemoryPersistence();
    const original = { ...record('a'), payload: { rows: [[1]] } };
    store.save(original);
    original.payload.rows.push([2]);
    expect(store.load()[0].payload).toEqual({ rows: [[1]] });
  });
});

describe('JsonlPersistence', () => {
  const dirs: string[] = [];

  afterEach(() => {
    setWarningSink(undefined);
    dirs.splice(0).forEach((dir) => {
      fs.rmSync(dir, { recursive: true, force: true });
    });
  });

  const tempDir = (): string => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'analyst-sessions-'));
    dirs.push(dir);
    return dir;
  };

  it('appends one line per record and reads them back', async () => {
    const store = new JsonlPersistence(path.join(tempDir(), 'nested'), 'session-1');
    await store.save(record('first'));
    await store.save(record('second', 'reasoning'));

    expect(fs.readFileSync(store.filePath, 'utf8').split('\n')).toHaveLength(3);
    expect((await store.load()).map((r) => [r.type, r.text])).toEqual([['text', 'first'], ['reasoning', 'second']]);
  });

  it('keeps call order for concurrent saves and flushes pending writes', async () => {
    const store = new JsonlPersistence(tempDir(), 'parallel');
    const writes = ['a', 'b', 'c'].map((text) => store.save(record(text)));
    await store.flush();

    expect(fs.readFileSync(store.filePath, 'utf8')).toBe(
      ['a', 'b', 'c'].map((text) => `${JSON.stringify(record(text))}\n`).join(''),
    );
    await Promise.all(writes);
  });

  it('returns no records for a new session', async () => {
    expect(await new JsonlPersistence(tempDir(), 'fresh').load()).toEqual([]);
  });

  it('skips malformed lines with a warning', async () => {
    const warnings: string[] = [];
    setWarningSink((message) => { warnings.push(message); });
    const store = new JsonlPersistence(tempDir(), 'mixed');
    await store.save(record('kept'));
    fs.appendFileSync(store.filePath, 'not json\n{"role":"robot"}\n');

    expect((await store.load()).map((r) => r.text)).toEqual(['kept']);
    expect(warnings).toEqual([
      `skipping unparseable session record at ${store.filePath}:2`,
      `skipping malformed session record at ${store.filePath}:3`,
    ]);
  });

  it('rejects session ids that could escape the directory', () => {
    expect(() => new JsonlPersistence(tempDir(), '../outside')).toThrow("invalid session id '../outside'");
  });
});

describe('createPersistence', () => {
  it('needs a sessions directory', () => {
    expect(createPersistence(undefined, 's')).toBeUndefined();
    expect(createPersistence({ sessionsDir: '  ' }, 's')).toBeUndefined();
    expect(createPersistence({ sessionsDir: os.tmpdir() }, 's')).toBeInstanceOf(JsonlPersistence);
  });
});

describe('persistSafely', () => {
  it('reports hook failures instead of throwing', async () => {
    const errors: string[] = [];
    await persistSafely({ save: async () => { await Promise.reject(new Error('disk full')); } }, record('x'), (message) => {
      errors.push(message);
    });
    expect(errors).toEqual(['persistence hook failed: disk full']);
  });

  it('does nothing without a hook', async () => {
    await expect(persistSafely(undefined, record('x'))).resolves.toBeUndefined();
  });
});
