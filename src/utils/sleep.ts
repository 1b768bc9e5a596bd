import { CanceledError } from '../error/canceledError.js';

/**
 * Waits for the given number of milliseconds.
 *
 * When `signal` aborts first, the timer is cleared and the promise rejects
 * with a {@link CanceledError} carrying the abort reason as cause.
 *
 * @example
 * await sleep(250, controller.signal);
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CanceledError('error sleep canceled', { cause: signal.reason }));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CanceledError('error sleep canceled', { cause: signal?.reason }));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
