import type { QueueProgress } from "./types.js";

type PendingPut<T> = {
  item: T;
  resolve: () => void;
};

/**
 * Task Queue
 *
 * Bounded in-memory channel feeding the worker pool. `put` waits while the
 * buffer is full, `take` waits while it is empty. Once closed, no further
 * items are accepted; items already queued are still handed out, after which
 * `take` resolves to `null`.
 *
 * Capacity 1 keeps the producer in lockstep with the workers.
 */
export class TaskQueue<T> {
  private capacity: number;
  private buffer: T[];
  private takers: Array<(item: T | null) => void>;
  private putters: PendingPut<T>[];
  private isClosed: boolean;
  private enqueued: number;
  private dequeued: number;

  constructor(capacity = 1) {
    this.capacity = Math.max(1, capacity);
    this.buffer = [];
    this.takers = [];
    this.putters = [];
    this.isClosed = false;
    this.enqueued = 0;
    this.dequeued = 0;
  }

  /**
   * Add an item, waiting for room if the queue is full
   */
  async put(item: T): Promise<void> {
    if (this.isClosed) {
      throw new Error("Cannot put into a closed queue");
    }

    this.enqueued++;

    const taker = this.takers.shift();
    if (taker) {
      this.dequeued++;
      taker(item);
      return;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return;
    }

    await new Promise<void>((resolve) => {
      this.putters.push({ item, resolve });
    });
  }

  /**
   * Next item, or null once the queue is closed and drained
   */
  async take(): Promise<T | null> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      this.dequeued++;
      this.refill();
      return item;
    }

    if (this.isClosed) {
      return null;
    }

    return new Promise<T | null>((resolve) => {
      this.takers.push(resolve);
    });
  }

  /**
   * Stop accepting items; waiting consumers are released once drained
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    if (this.buffer.length === 0) {
      for (const taker of this.takers.splice(0)) {
        taker(null);
      }
    }
  }

  getProgress(): QueueProgress {
    return {
      enqueued: this.enqueued,
      dequeued: this.dequeued,
      pending: this.buffer.length + this.putters.length,
      closed: this.isClosed,
    };
  }

  private refill(): void {
    const next = this.putters.shift();
    if (!next) {
      return;
    }
    this.buffer.push(next.item);
    next.resolve();
  }
}
