import { CallCancelledError } from '../transport/errors.js';

/**
 * Settle with `promise`, or reject with CallCancelledError as soon as
 * `signal` fires. The underlying work is not interrupted; only this caller
 * stops waiting on it.
 */
export function raceSignal<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  label: string
): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new CallCancelledError(label));

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CallCancelledError(label));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
