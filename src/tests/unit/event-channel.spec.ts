import { describe, expect, it } from 'vitest';

import type { AgentEvent } from '../../types.js';

import { EventChannel } from '../../event-channel.js';

describe('EventChannel', () => {
  it('numbers events in push order', async () => {
    const channel = new EventChannel();
    channel.push('status', { message: 'one' });
    channel.push('text', { text: 'two' });
    channel.close();

    const events = await channel.collect();
    expect(events.map((e) => [e.seq, e.type])).toEqual([[0, 'status'], [1, 'text']]);
  });

  it('refuses events after close', () => {
    const channel = new EventChannel();
    channel.close();
    expect(channel.push('status', { message: 'late' })).toBe(false);
    expect(channel.isClosed).toBe(true);
  });

  it('wakes a waiting reader', async () => {
    const channel = new EventChannel();
    const iterator = channel[Symbol.asyncIterator]();
    const pending = iterator.next();
    channel.push('error', { message: 'boom', fatal: false });

    const first = await pending;
    expect(first.done).toBe(false);
    expect(first.value).toEqual({ type: 'error', seq: 0, data: { message: 'boom', fatal: false } });

    const end = iterator.next();
    channel.close();
    expect((await end).done).toBe(true);
  });

  it('notifies listeners until they unsubscribe', () => {
    const channel = new EventChannel();
    const seen: AgentEvent[] = [];
    const off = channel.onEvent((event) => { seen.push(event); });
    channel.push('status', { message: 'a' });
    off();
    channel.push('status', { message: 'b' });
    expect(seen).toHaveLength(1);
  });
});
