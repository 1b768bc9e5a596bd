import { TimeoutError } from '../error/timeoutError.js';

/** A signal that aborts on its own, plus a way to stop its timer early. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Stops the timer; call once the guarded work settles */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort with a {@link TimeoutError}
 * after the specified timeout.
 *
 * When `timeoutMs` is `false`, not positive or not finite, no timeout signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs || timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), { once: true });

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/** A signal following several sources, plus a way to detach it from them. */
export interface LinkedSignal {
  signal: AbortSignal;
  /** Removes the listeners added to the sources */
  release: () => void;
}

/**
 * Links multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - Nullish sources are skipped; without sources the signal never aborts.
 * - The linked signal aborts with the `reason` of the first source to abort,
 *   immediately when a source already is aborted.
 * - Listeners on the sources are removed once the linked signal aborts or `release` is called,
 *   so long-lived sources do not collect listeners from finished work.
 */
export function linkSignals(signals: Array<AbortSignal | null | undefined>): LinkedSignal {
  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  controller.signal.addEventListener('abort', release, { once: true });

  for (const signal of signals) {
    if (!signal) {
      continue;
    }

    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }

    const abort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
