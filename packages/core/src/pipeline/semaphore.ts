import { AbortError } from '../llm/retry.js';

/**
 * Counting semaphore bounding how many claims verify at once.
 * Waiters are served FIFO; a waiter whose signal fires leaves the queue
 * without taking a slot.
 */
export class Semaphore {
  private free: number;
  private readonly waiters: Array<{ grant: () => void }> = [];

  constructor(readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error('Semaphore maxConcurrent must be an integer of at least 1');
    }
    this.free = maxConcurrent;
  }

  /** Slots not currently held. */
  get available(): number {
    return this.free;
  }

  /** Callers waiting for a slot. */
  get pending(): number {
    return this.waiters.length;
  }

  /** Run `fn` with a slot. Rejects with AbortError if `signal` fires while waiting. */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new AbortError('Aborted while waiting for a slot'));
    }
    if (this.free > 0) {
      this.free--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(new AbortError('Aborted while waiting for a slot'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot straight to the next waiter
      next.grant();
    } else {
      this.free++;
    }
  }
}
