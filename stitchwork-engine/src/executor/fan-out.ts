/**
 * Structured fan-out: children run concurrently and are always joined before
 * the caller continues. Nothing started here outlives the call.
 */

import { abortReason } from '../errors.js';
import { Semaphore } from './semaphore.js';

export interface FanOutOptions {
  /** Parent cancellation; forwarded to every child */
  signal?: AbortSignal;
  /** Cap on children running at once (unbounded by default) */
  concurrency?: number;
}

export type Settled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; error: Error };

type FanOutTask<T, R> = (item: T, signal: AbortSignal, index: number) => Promise<R>;

/**
 * Fail-fast join. The first rejection aborts the remaining children; the
 * call still waits for all of them to settle and then rethrows that first
 * error.
 */
export async function fanOut<T, R>(
  items: readonly T[],
  task: FanOutTask<T, R>,
  options: FanOutOptions = {}
): Promise<R[]> {
  const controller = new AbortController();
  const failure: { first?: Error } = {};

  const settled = await runChildren(items, task, options, controller, (err) => {
    if (!failure.first) {
      failure.first = err;
      controller.abort(err);
    }
  });

  if (failure.first) throw failure.first;

  return settled.map((outcome) => {
    if (outcome.status === 'rejected') throw outcome.error;
    return outcome.value;
  });
}

/**
 * Settling join: every child runs to completion and each outcome is
 * reported in input order.
 */
export async function fanOutSettled<T, R>(
  items: readonly T[],
  task: FanOutTask<T, R>,
  options: FanOutOptions = {}
): Promise<Settled<R>[]> {
  return runChildren(items, task, options, new AbortController(), () => undefined);
}

async function runChildren<T, R>(
  items: readonly T[],
  task: FanOutTask<T, R>,
  options: FanOutOptions,
  controller: AbortController,
  onError: (err: Error) => void
): Promise<Settled<R>[]> {
  const { signal } = options;
  const forwardAbort = () => controller.abort(signal ? abortReason(signal) : undefined);

  if (signal?.aborted) {
    forwardAbort();
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  const gate = options.concurrency ? new Semaphore(options.concurrency) : null;

  try {
    return await Promise.all(
      items.map(async (item, index): Promise<Settled<R>> => {
        try {
          if (controller.signal.aborted) throw abortReason(controller.signal);
          const value = gate
            ? await gate.run(() => task(item, controller.signal, index), controller.signal)
            : await task(item, controller.signal, index);
          return { status: 'fulfilled', value };
        } catch (err) {
          const error = err instanceof Error ? err : new Error(String(err));
          onError(error);
          return { status: 'rejected', error };
        }
      })
    );
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
  }
}
