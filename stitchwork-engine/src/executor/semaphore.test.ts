import { describe, it, expect } from 'vitest';
import { CancelledError } from '../errors.js';
import { Semaphore } from './semaphore.js';

describe('Semaphore', () => {
  it('admits waiters in FIFO order as slots free up', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const second = semaphore.acquire().then(() => order.push('second'));
    const third = semaphore.acquire().then(() => order.push('third'));
    expect(semaphore.queued).toBe(2);

    semaphore.release();
    await second;
    semaphore.release();
    await third;

    expect(order).toEqual(['second', 'third']);
    expect(semaphore.available).toBe(0);
    semaphore.release();
    expect(semaphore.available).toBe(1);
  });

  it('drops an aborted waiter from the queue', async () => {
    const semaphore = new Semaphore(1);
    const controller = new AbortController();
    await semaphore.acquire();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort(new CancelledError('gave up'));

    await expect(waiting).rejects.toThrow('gave up');
    expect(semaphore.queued).toBe(0);
    semaphore.release();
    expect(semaphore.available).toBe(1);
  });

  it('never runs more tasks than its capacity', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        semaphore.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 1));
          active--;
          return n;
        })
      )
    );

    expect(peak).toBe(2);
    expect(semaphore.available).toBe(2);
  });
});
