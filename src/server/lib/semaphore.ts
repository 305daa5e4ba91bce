/**
 * Counting semaphore with a FIFO wait queue.
 *
 * Bounds concurrent calls to the LLM service to the configured quota. A
 * waiter whose abort signal fires leaves the queue without taking a slot.
 */

import { RequestCancelledError } from '../errors';

interface QueueEntry {
  resolve: () => void;
  reject: (err: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class Semaphore {
  private queue: QueueEntry[] = [];
  private current = 0;

  constructor(private readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore size must be a positive integer (got ${max})`);
    }
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new RequestCancelledError();
    }
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>((resolve, reject) => {
      const entry: QueueEntry = { resolve, reject, signal };

      if (signal) {
        entry.onAbort = () => {
          const idx = this.queue.indexOf(entry);
          if (idx >= 0) {
            this.queue.splice(idx, 1);
            reject(new RequestCancelledError());
          }
        };
        signal.addEventListener('abort', entry.onAbort, { once: true });
      }

      this.queue.push(entry);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter.
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      next.resolve();
      return;
    }
    if (this.current > 0) {
      this.current--;
    }
  }

  /** Run `fn` while holding a slot. */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.current;
  }
}
