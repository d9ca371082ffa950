import { abortReason } from '../errors.js';

/**
 * Async semaphore bounding how many nodes run at once. Waiters are admitted
 * in FIFO order.
 */
export class Semaphore {
  private count: number;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly capacity: number) {
    this.count = Math.max(1, capacity);
  }

  get available(): number {
    return this.count;
  }

  get queued(): number {
    return this.waiting.length;
  }

  /**
   * Take a slot. When `signal` aborts while waiting, the waiter leaves the
   * queue and the promise rejects with the abort reason.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    if (this.count > 0) {
      this.count--;
      return;
    }
    return new Promise<void>((resolve, reject) => {
      const admit = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      const onAbort = () => {
        const index = this.waiting.indexOf(admit);
        if (index !== -1) this.waiting.splice(index, 1);
        reject(signal ? abortReason(signal) : new Error('Aborted'));
      };
      this.waiting.push(admit);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.count++;
    }
  }

  /**
   * Run `task` holding one slot.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
