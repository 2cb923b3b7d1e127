import { RequestEvent, RequestSource } from "../source/types.js";
import { Clock, systemClock } from "../util/clock.js";
import { EmptyCaptureError } from "../util/errors.js";
import { logger } from "../util/logging.js";
import { Dispatcher } from "./dispatcher.js";
import { Timeline } from "./timeline.js";

export type RunState = "idle" | "running" | "draining" | "done";

export interface RunStats {
  elapsedMs: number;
  sentCount: number;
  averageRequestsPerSecond: number;
  /** Requests still in flight when the budget ran out. */
  outstandingCount: number;
  /** Of the outstanding requests, those that were cut off rather than answered during the drain. */
  cancelledCount: number;
  /** How late the last scheduled request was when the run ended. */
  secondsBehind: number;
  /** secondsBehind as a share of the run; above 1 means the target could not keep up at all. */
  percentageBehind: number;
}

export interface ReplayRunnerOptions {
  source: RequestSource;
  timeline: Timeline;
  dispatcher: Dispatcher;
  budgetMs: number;
  clock?: Clock;
  /** Log progress every this many dispatches. */
  progressInterval?: number;
}

const DEFAULT_PROGRESS_INTERVAL = 1000;

export class ReplayRunner {
  private readonly source: RequestSource;
  private readonly timeline: Timeline;
  private readonly dispatcher: Dispatcher;
  private readonly budgetMs: number;
  private readonly clock: Clock;
  private readonly progressInterval: number;
  private currentState: RunState = "idle";

  constructor(options: ReplayRunnerOptions) {
    if (!(options.budgetMs > 0)) {
      throw new RangeError(`run budget must be positive, got ${options.budgetMs}ms`);
    }
    this.source = options.source;
    this.timeline = options.timeline;
    this.dispatcher = options.dispatcher;
    this.budgetMs = options.budgetMs;
    this.clock = options.clock ?? systemClock;
    this.progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  }

  get state(): RunState {
    return this.currentState;
  }

  async run(): Promise<RunStats> {
    if (this.currentState !== "idle") {
      throw new Error(`replay runner cannot start from state "${this.currentState}"`);
    }
    this.currentState = "running";
    logger.info(`replaying ${this.source.describe()} for ${(this.budgetMs / 1000).toFixed(1)}s`);

    const startTime = this.clock.now();
    let sentCount = 0;
    let lastSleepMs = 0;
    let elapsedMs = 0;

    try {
      for (const event of this.cycle()) {
        lastSleepMs = this.timeline.nextSleep(event.timestamp);
        elapsedMs = this.clock.now() - startTime;
        if (elapsedMs >= this.budgetMs) {
          break;
        }

        await this.clock.sleep(Math.max(0, Math.min(lastSleepMs, this.budgetMs - elapsedMs)));
        const hasSlot = await this.waitForSlot(startTime);

        elapsedMs = this.clock.now() - startTime;
        if (!hasSlot || elapsedMs >= this.budgetMs) {
          break;
        }

        this.dispatcher.dispatch(event);
        sentCount++;
        if (sentCount % this.progressInterval === 0) {
          logger.debug(
            `sent ${sentCount} requests, ${this.dispatcher.inFlight} in flight, schedule offset ${lastSleepMs.toFixed(0)}ms`
          );
        }
      }
    } catch (error) {
      await this.abandon();
      throw error;
    }

    this.currentState = "draining";
    const { outstanding, cancelled } = await this.dispatcher.drain();
    this.currentState = "done";

    const elapsedSeconds = elapsedMs / 1000;
    const secondsBehind = Math.max(-lastSleepMs, 0) / 1000;
    const stats: RunStats = {
      elapsedMs,
      sentCount,
      averageRequestsPerSecond: elapsedSeconds > 0 ? sentCount / elapsedSeconds : 0,
      outstandingCount: outstanding,
      cancelledCount: cancelled,
      secondsBehind,
      percentageBehind: elapsedSeconds > 0 ? secondsBehind / elapsedSeconds : 0
    };
    logger.info(`replay finished: ${sentCount} sent, ${outstanding} cut off at the deadline`);
    return stats;
  }

  /** Waits for a free dispatcher slot; false when the budget runs out first. */
  private async waitForSlot(startTime: number): Promise<boolean> {
    while (!this.dispatcher.hasCapacity) {
      const remainingMs = this.budgetMs - (this.clock.now() - startTime);
      if (remainingMs <= 0) {
        return false;
      }
      const deadline = new AbortController();
      try {
        await Promise.race([this.dispatcher.acquire(deadline.signal), this.clock.sleep(remainingMs, deadline.signal)]);
      } finally {
        deadline.abort();
      }
    }
    return true;
  }

  /** Endless stream over the source, marking each pass on the timeline. */
  private *cycle(): Generator<RequestEvent> {
    for (;;) {
      this.timeline.startCycle();
      let yielded = 0;
      for (const event of this.source.events()) {
        yielded++;
        yield event;
      }
      if (yielded === 0) {
        throw new EmptyCaptureError(this.source.describe());
      }
      logger.debug(`pass ${this.timeline.snapshot().cycle + 1} over ${this.source.describe()} complete`);
    }
  }

  private async abandon(): Promise<void> {
    this.currentState = "draining";
    try {
      await this.dispatcher.drain();
    } catch (drainError) {
      logger.warn(`drain after a failed run also failed: ${drainError instanceof Error ? drainError.message : String(drainError)}`);
    } finally {
      this.currentState = "done";
    }
  }
}
