import type { AgentEvent, AgentEventMap, AgentEventOf, AgentEventType } from './types.js';

interface PendingRead {
  resolve: (result: IteratorResult<AgentEvent>) => void;
}

/**
 * Ordered, append-only channel of run events with a single consumer.
 * Every event gets a monotonically increasing `seq`; nothing is accepted
 * after `close()`.
 */
export class EventChannel implements AsyncIterable<AgentEvent> {
  private readonly buffer: AgentEvent[] = [];
  private readonly readers: PendingRead[] = [];
  private readonly listeners: ((event: AgentEvent) => void)[] = [];
  private nextSeq = 0;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  push<K extends AgentEventType>(type: K, data: AgentEventMap[K]): boolean {
    if (this.closed) return false;
    const event = this.buildEvent(type, data);
    this.listeners.forEach((listener) => {
      listener(event);
    });
    const reader = this.readers.shift();
    if (reader !== undefined) {
      reader.resolve({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
    return true;
  }

  // Synchronous observer, called for every event before it is queued
  onEvent(listener: (event: AgentEvent) => void): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.readers.splice(0).forEach((reader) => {
      reader.resolve({ value: undefined, done: true });
    });
  }

  async collect(): Promise<AgentEvent[]> {
    const events: AgentEvent[] = [];
    // eslint-disable-next-line functional/no-loop-statements
    for await (const event of this) {
      events.push(event);
    }
    return events;
  }

  [Symbol.asyncIterator](): AsyncIterator<AgentEvent> {
    return {
      next: () => {
        const buffered = this.buffer.shift();
        if (buffered !== undefined) return Promise.resolve({ value: buffered, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise<IteratorResult<AgentEvent>>((resolve) => {
          this.readers.push({ resolve });
        });
      },
    };
  }

  private buildEvent<K extends AgentEventType>(type: K, data: AgentEventMap[K]): AgentEvent {
    const seq = this.nextSeq;
    this.nextSeq += 1;
    return buildAgentEvent(type, seq, data);
  }
}

function buildAgentEvent<K extends AgentEventType>(type: K, seq: number, data: AgentEventMap[K]): AgentEvent {
  const event: AgentEventOf<K> = { type, seq, data };
  return event;
}
