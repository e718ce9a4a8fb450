// src/message_queue.ts

import { Address } from "./address";
import { ConnectionClosedError, QueueFullError } from "./errors";

/**
 * Bounded FIFO inbox for a single listener.
 *
 * `push` never waits: it hands the item straight to a pending receiver, or
 * buffers it, or throws `QueueFullError` once `capacity` items are buffered.
 * `shift` resolves with `undefined` after the queue is closed.
 */
export class MessageQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T | undefined) => void> = [];
  private _closed = false;

  constructor(
    private readonly owner: Address,
    readonly capacity: number,
  ) {}

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  push(item: T): void {
    if (this._closed) {
      throw new ConnectionClosedError("deliver message", this.owner);
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }

    if (this.items.length >= this.capacity) {
      throw new QueueFullError(this.owner, this.capacity);
    }
    this.items.push(item);
  }

  shift(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this._closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Drops buffered items and wakes every pending receiver. Idempotent.
   */
  close(): void {
    if (this._closed) {
      return;
    }
    this._closed = true;
    this.items.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }
}
