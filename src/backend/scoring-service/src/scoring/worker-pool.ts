/**
 * Bounded Worker Pool
 *
 * Runs an async worker over a list with a fixed number of lanes. Every item
 * settles into a result object at its own index, so ordering never depends on
 * completion order. Only cancellation escapes the pool.
 */

import { rejectOnAbort, RequestCancelledError, toError } from '@dispatch/shared';

export type SettledResult<T> = { ok: true; value: T } | { ok: false; error: Error };

export interface WorkerPoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export const DEFAULT_CONCURRENCY = 16;

/**
 * @throws RequestCancelledError when the signal aborts before every item settles
 */
export async function mapWithConcurrency<I, O>(
  items: readonly I[],
  worker: (item: I, index: number) => Promise<O>,
  options: WorkerPoolOptions = { concurrency: DEFAULT_CONCURRENCY }
): Promise<Array<SettledResult<O>>> {
  const { signal } = options;
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const results = new Array<SettledResult<O>>(items.length);
  let next = 0;
  let cancellation: RequestCancelledError | undefined;

  // Lanes never reject; cancellation is recorded and rethrown once they stop
  const runLane = async (): Promise<void> => {
    while (next < items.length && !cancellation) {
      if (signal?.aborted) {
        cancellation = new RequestCancelledError();
        return;
      }
      const index = next++;
      try {
        results[index] = { ok: true, value: await worker(items[index], index) };
      } catch (error) {
        if (error instanceof RequestCancelledError) {
          cancellation = error;
        } else if (signal?.aborted) {
          cancellation = new RequestCancelledError();
        } else {
          results[index] = { ok: false, error: toError(error) };
        }
      }
    }
  };

  const lanes = Promise.all(
    Array.from({ length: Math.min(concurrency, items.length) }, () => runLane())
  );

  if (signal) {
    const abort = rejectOnAbort(signal);
    try {
      await Promise.race([lanes, abort.promise]);
    } finally {
      abort.dispose();
    }
  } else {
    await lanes;
  }

  if (cancellation) {
    throw cancellation;
  }
  return results;
}
