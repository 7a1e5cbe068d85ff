import { CancelledError } from './errors.js';

/**
 * Fail fast when the caller's signal is already aborted.
 */
export function ensureNotCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError('Operation cancelled', { cause: signal.reason });
  }
}

/**
 * Race a promise against an abort signal. The underlying work is not
 * stopped, but the caller stops waiting for it.
 */
export function withSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError('Operation cancelled', { cause: signal.reason }));
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => {
      reject(new CancelledError('Operation cancelled', { cause: signal.reason }));
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return Promise.race([promise, aborted]).finally(() => {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  });
}
