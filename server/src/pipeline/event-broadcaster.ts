/**
 * Event Broadcaster — fan-out from the orchestrator to connected observers.
 *
 * Every observer owns a bounded queue that it pulls from at its own pace, so
 * a slow or dead connection never stalls `publish` or the other observers.
 * New observers receive a snapshot of the current session first.
 */

import { randomUUID } from 'node:crypto';
import logger, { type Logger } from '../lib/logger.js';

export const DEFAULT_MAX_OBSERVER_QUEUE = 1_000;

export class ObserverQueue<T> implements AsyncIterable<T> {
  readonly id = randomUUID();
  private buffer: T[] = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private isClosed = false;

  constructor(
    private readonly maxQueue: number,
    private readonly onClose: (queue: ObserverQueue<T>) => void,
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** Returns false when the observer is closed or its queue overflowed. */
  push(event: T): boolean {
    if (this.isClosed) return false;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: false, value: event });
      return true;
    }
    if (this.buffer.length >= this.maxQueue) return false;
    this.buffer.push(event);
    return true;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head !== undefined) return Promise.resolve({ done: false, value: head });
    if (this.isClosed) return Promise.resolve({ done: true, value: undefined });
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Ends the stream; events already queued are dropped. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.buffer = [];
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: true, value: undefined });
    }
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }
}

export interface EventBroadcasterOptions<T> {
  /** Builds the event a new observer sees first. */
  snapshot: () => T;
  maxQueue?: number;
  log?: Logger;
}

export class EventBroadcaster<T> {
  private observers = new Map<string, ObserverQueue<T>>();
  private readonly maxQueue: number;
  private readonly log: Logger;
  private dropped = 0;

  constructor(private readonly options: EventBroadcasterOptions<T>) {
    this.maxQueue = options.maxQueue ?? DEFAULT_MAX_OBSERVER_QUEUE;
    this.log = options.log ?? logger;
  }

  get size(): number {
    return this.observers.size;
  }

  get droppedObservers(): number {
    return this.dropped;
  }

  subscribe(): ObserverQueue<T> {
    const queue = new ObserverQueue<T>(this.maxQueue, (closed) => {
      this.observers.delete(closed.id);
    });
    this.observers.set(queue.id, queue);
    queue.push(this.options.snapshot());
    this.log.debug({ observerId: queue.id, observers: this.observers.size }, 'Observer subscribed');
    return queue;
  }

  unsubscribe(queue: ObserverQueue<T>): void {
    if (!this.observers.has(queue.id)) return;
    queue.close();
    this.log.debug({ observerId: queue.id, observers: this.observers.size }, 'Observer unsubscribed');
  }

  publish(event: T): void {
    for (const queue of [...this.observers.values()]) {
      if (!queue.push(event)) {
        this.dropped += 1;
        this.log.debug({ observerId: queue.id, pending: queue.pending }, 'Pruning observer that stopped reading');
        queue.close();
      }
    }
  }

  /** Ends every observer stream. */
  close(): void {
    for (const queue of [...this.observers.values()]) {
      queue.close();
    }
  }
}
