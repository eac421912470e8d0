import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** A signal plus the cleanup that releases its timers and listeners. */
export interface SignalHandle {
  signal: AbortSignal;
  /** Releases timers and listeners. Safe to call more than once. */
  dispose: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 *
 * When `timeoutMs` is `false`, `0` or `undefined`, no signal is created.
 * Call `dispose` once the guarded work finishes so the timer does not keep the process alive.
 */
export function createTimeoutSignal(timeoutMs?: number | false): SignalHandle | null {
  if (!timeoutMs) {
    return null;
  }

  const ms = timeoutMs;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(ms)), ms);

  return {
    signal: controller.signal,
    dispose: () => clearTimeout(timeout),
  };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - No signals gives `null`.
 * - A single signal is returned as-is, with a no-op `dispose`.
 * - Several signals produce a new signal that aborts when any source aborts,
 *   keeping the source `reason`, or an {@link AbortError} when the source has none.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): SignalHandle | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], dispose: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const dispose = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', dispose, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, dispose };
}
