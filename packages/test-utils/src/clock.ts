/**
 * Deterministic time for tests. `ManualClock` only moves when told to;
 * the recording waiter advances it by exactly the requested wait.
 */

export class ManualClock {
  private current: number;

  constructor(start = 1_000_000) {
    this.current = start;
  }

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

export interface RecordingWaiter {
  readonly waiter: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Every requested wait, in order */
  readonly waits: number[];
}

export function createRecordingWaiter(clock?: ManualClock): RecordingWaiter {
  const waits: number[] = [];
  return {
    waits,
    waiter: async (ms, signal) => {
      if (signal?.aborted) {
        throw signal.reason ?? new DOMException("Aborted", "AbortError");
      }
      waits.push(ms);
      clock?.advance(ms);
    },
  };
}
