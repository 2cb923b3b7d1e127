import { performance } from "node:perf_hooks";
import { setTimeout as delay } from "node:timers/promises";

/**
 * Time access for the replay loop. Everything that reads the clock or waits
 * on it goes through this, so tests can drive time by hand.
 */
export interface Clock {
  /** Monotonic milliseconds since an arbitrary fixed point. */
  now(): number;
  /** Resolves after `ms`, or early once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  // A zero wait still goes through a timer so pending I/O gets a turn.
  sleep: async (ms: number, signal?: AbortSignal) => {
    try {
      await delay(Math.max(0, ms), undefined, { signal });
    } catch (error) {
      if (!signal?.aborted) {
        throw error;
      }
    }
  }
};
