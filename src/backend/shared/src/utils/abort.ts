/**
 * Abort Signal Helpers
 *
 * Cancellation plumbing shared by the distance providers and the scoring fan-out.
 */

import { RequestCancelledError } from '../errors/domain-errors.js';

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestCancelledError();
  }
}

export interface LinkedAbortController {
  signal: AbortSignal;
  /** Clears the timer and detaches listeners from the source signals */
  dispose(): void;
  /** True when the timeout, not a source signal, caused the abort */
  timedOut(): boolean;
}

/**
 * Creates a signal that aborts when any source signal aborts or, when given,
 * after timeoutMs
 */
export function linkAbortSignals(
  sources: ReadonlyArray<AbortSignal | undefined>,
  timeoutMs?: number
): LinkedAbortController {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  let didTimeOut = false;

  for (const source of sources) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = (): void => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => source.removeEventListener('abort', onAbort));
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    const timeoutId = setTimeout(() => {
      didTimeOut = true;
      controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timeoutId));
  }

  return {
    signal: controller.signal,
    dispose: () => cleanups.forEach((cleanup) => cleanup()),
    timedOut: () => didTimeOut,
  };
}

/**
 * Resolves once the signal aborts, rejecting with RequestCancelledError.
 * Used to race long-running work against cancellation.
 */
export function rejectOnAbort(signal: AbortSignal): { promise: Promise<never>; dispose(): void } {
  let onAbort: (() => void) | undefined;
  const promise = new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(new RequestCancelledError());
      return;
    }
    onAbort = () => reject(new RequestCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return {
    promise,
    dispose: () => {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Waits for ms milliseconds, rejecting early with RequestCancelledError on abort
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestCancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(new RequestCancelledError());
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
