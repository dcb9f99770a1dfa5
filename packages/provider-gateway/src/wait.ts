/**
 * Time and waiting primitives. Everything that sleeps takes a `Waiter` and a
 * `Clock` so tests can drive time explicitly.
 */

export interface Clock {
  readonly now: () => number;
}

export const systemClock: Clock = { now: () => Date.now() };

/** Resolves after `ms`, rejects with the signal's reason when aborted. */
export type Waiter = (ms: number, signal?: AbortSignal) => Promise<void>;

export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new DOMException("Aborted", "AbortError");
}

/**
 * Abort-aware sleep.
 */
export const sleep: Waiter = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    let onAbort: (() => void) | undefined;

    const timer = setTimeout(() => {
      if (onAbort) signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    if (signal) {
      onAbort = () => {
        clearTimeout(timer);
        reject(abortReason(signal));
      };
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

// ---------------------------------------------------------------------------
// Observers
// ---------------------------------------------------------------------------

export interface WaitHandle {
  /** Idempotent; safe to call from any callback. */
  stop(): void;
}

/**
 * Advisory progress display for waits and in-flight calls. Correctness never
 * depends on an observer.
 */
export interface WaitObserver {
  begin(label: string, durationMs?: number): WaitHandle;
}

const NOOP_HANDLE: WaitHandle = { stop: () => {} };

export const silentObserver: WaitObserver = { begin: () => NOOP_HANDLE };

/**
 * Sleep for `ms` while `observer` shows `label`. The indicator is stopped
 * whether the wait completes or is aborted.
 */
export async function observedWait(
  waiter: Waiter,
  observer: WaitObserver,
  label: string,
  ms: number,
  signal?: AbortSignal,
): Promise<void> {
  if (ms <= 0) return;
  const handle = observer.begin(label, ms);
  try {
    await waiter(ms, signal);
  } finally {
    handle.stop();
  }
}
