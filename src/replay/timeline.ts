import { Clock } from "../util/clock.js";

/** Epoch milliseconds throughout. */
export interface TimelineState {
  /** Log time treated as zero; moves back by logDuration at each wrap. */
  logOrigin: number | undefined;
  /** Wall-clock time of the first event of the run. */
  replayStart: number | undefined;
  /** Length of one pass over the capture, known once the first pass ends. */
  logDuration: number | undefined;
  /** Timestamp of the most recent event seen. */
  lastTimestamp: number | undefined;
  /** Zero-based pass counter; -1 before the first pass starts. */
  cycle: number;
}

export const createTimelineState = (): TimelineState => ({
  logOrigin: undefined,
  replayStart: undefined,
  logDuration: undefined,
  lastTimestamp: undefined,
  cycle: -1
});

/**
 * Maps log-relative timestamps onto the wall clock. The capture repeats, so at
 * every wrap the origin is pushed back by one pass length: the first event of
 * pass N lands where it would have if the log simply continued.
 */
export class Timeline {
  private readonly state: TimelineState = createTimelineState();

  constructor(
    private readonly speedMultiplier: number,
    private readonly clock: Clock
  ) {
    if (!(speedMultiplier > 0)) {
      throw new RangeError(`speed multiplier must be positive, got ${speedMultiplier}`);
    }
  }

  /** Call before the first event of every pass over the capture. */
  startCycle(): void {
    const state = this.state;
    state.cycle++;
    if (state.cycle === 0 || state.logOrigin === undefined || state.lastTimestamp === undefined) {
      return;
    }
    if (state.logDuration === undefined) {
      state.logDuration = state.lastTimestamp - state.logOrigin;
    }
    state.logOrigin -= state.logDuration;
  }

  /**
   * Milliseconds to wait before sending the event recorded at `timestamp`.
   * Negative when the replay is already behind schedule.
   */
  nextSleep(timestamp: Date | number): number {
    const state = this.state;
    const logTime = typeof timestamp === "number" ? timestamp : timestamp.getTime();
    const now = this.clock.now();

    if (state.replayStart === undefined) {
      state.replayStart = now;
    }
    if (state.logOrigin === undefined) {
      state.logOrigin = logTime;
    }
    state.lastTimestamp = logTime;

    const logElapsed = logTime - state.logOrigin;
    const scaledRealElapsed = (now - state.replayStart) * this.speedMultiplier;
    return (logElapsed - scaledRealElapsed) / this.speedMultiplier;
  }

  snapshot(): Readonly<TimelineState> {
    return { ...this.state };
  }
}
