/**
 * Bounded FIFO queue shared by the worker pool.
 *
 * Consumers waiting in take() are served in arrival order; producers blocked
 * in put() are admitted in arrival order as space frees up.
 */

import { QueueClosedError } from './errors';

interface Taker<T> {
  resolve: (item: T) => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

interface Putter<T> {
  item: T;
  resolve: () => void;
  reject: (reason: unknown) => void;
}

export class BoundedQueue<T> {
  private items: T[] = [];
  private takers: Taker<T>[] = [];
  private putters: Putter<T>[] = [];
  private closed = false;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Number of buffered items (excludes producers still blocked in put())
   */
  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Non-blocking enqueue. Returns false when the queue is full.
   * @throws QueueClosedError
   */
  tryPut(item: T): boolean {
    if (this.closed) {
      throw new QueueClosedError();
    }

    const taker = this.takers.shift();
    if (taker) {
      this.settleTaker(taker);
      taker.resolve(item);
      return true;
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return true;
    }

    return false;
  }

  /**
   * Enqueue, waiting for space when full. Rejects with QueueClosedError if the
   * queue is closed before the item is admitted.
   */
  put(item: T): Promise<void> {
    try {
      if (this.tryPut(item)) {
        return Promise.resolve();
      }
    } catch (error) {
      return Promise.reject(error);
    }

    return new Promise<void>((resolve, reject) => {
      this.putters.push({ item, resolve, reject });
    });
  }

  /**
   * Dequeue, waiting for an item when empty. Rejects with the signal's
   * reason if it aborts first, or with QueueClosedError once closed and drained.
   */
  take(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.items.length > 0) {
      const item = this.items[0];
      this.items.shift();
      this.admitPutter();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }

    return new Promise<T>((resolve, reject) => {
      const taker: Taker<T> = { resolve, reject, signal };
      if (signal) {
        taker.onAbort = () => {
          this.takers = this.takers.filter(t => t !== taker);
          reject(signal.reason);
        };
        signal.addEventListener('abort', taker.onAbort, { once: true });
      }
      this.takers.push(taker);
    });
  }

  /**
   * Stop accepting items. Blocked producers and idle consumers are rejected;
   * items already buffered stay available to take().
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const putters = this.putters;
    this.putters = [];
    for (const putter of putters) {
      putter.reject(new QueueClosedError());
    }

    const takers = this.takers;
    this.takers = [];
    for (const taker of takers) {
      this.settleTaker(taker);
      taker.reject(new QueueClosedError());
    }
  }

  private admitPutter(): void {
    const putter = this.putters.shift();
    if (!putter) return;
    this.items.push(putter.item);
    putter.resolve();
  }

  private settleTaker(taker: Taker<T>): void {
    if (taker.signal && taker.onAbort) {
      taker.signal.removeEventListener('abort', taker.onAbort);
    }
  }
}
