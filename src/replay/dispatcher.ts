import { performance } from "node:perf_hooks";
import { ResponseSink } from "../sink/types.js";
import { RequestEvent } from "../source/types.js";
import { ReplayResponse, Transport, TRANSPORT_ERROR_STATUS } from "../transport/types.js";
import { DispatchDefectError, isAbortError } from "../util/errors.js";
import { logger } from "../util/logging.js";

export type DispatchOutcome =
  | { kind: "completed"; response: ReplayResponse }
  | { kind: "failed"; response: ReplayResponse }
  | { kind: "cancelled" }
  | { kind: "defect"; error: unknown };

export interface DispatchHandle {
  readonly id: number;
  readonly event: RequestEvent;
  /** Resolves once the unit is finished; never rejects. */
  readonly settled: Promise<DispatchOutcome>;
  cancel(): void;
}

export interface DrainResult {
  /** Units still in flight when the drain began. */
  outstanding: number;
  /** Of those, the ones that ended by cancellation rather than a late response. */
  cancelled: number;
}

export interface DispatcherOptions {
  /** Caps concurrent units; unbounded when omitted. */
  maxInFlight?: number;
}

/**
 * Fires each request as an independent unit and owns the set of units still
 * in flight. Results reach the sink from the unit itself; the pacing loop only
 * ever holds handles.
 */
export class Dispatcher {
  private readonly outstanding = new Set<DispatchHandle>();
  private readonly defects: unknown[] = [];
  private readonly maxInFlight: number | undefined;
  private nextId = 1;

  constructor(
    private readonly transport: Transport,
    private readonly sink: ResponseSink,
    options: DispatcherOptions = {}
  ) {
    if (options.maxInFlight !== undefined && !(options.maxInFlight >= 1)) {
      throw new RangeError(`maxInFlight must be at least 1, got ${options.maxInFlight}`);
    }
    this.maxInFlight = options.maxInFlight;
  }

  get inFlight(): number {
    return this.outstanding.size;
  }

  get dispatched(): number {
    return this.nextId - 1;
  }

  get hasCapacity(): boolean {
    return this.maxInFlight === undefined || this.outstanding.size < this.maxInFlight;
  }

  /**
   * Waits until another unit may start under maxInFlight. Returns at once when
   * uncapped, and gives up without a slot once `signal` aborts.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    const aborted = new Promise<void>((resolve) => {
      signal?.addEventListener("abort", () => resolve(), { once: true });
    });
    while (!this.hasCapacity && !signal?.aborted) {
      await Promise.race([...Array.from(this.outstanding, (handle) => handle.settled), aborted]);
    }
  }

  dispatch(event: RequestEvent): DispatchHandle {
    const id = this.nextId++;
    const controller = new AbortController();

    const settled = this.execute(event, controller.signal).then((outcome) => {
      this.outstanding.delete(handle);
      return outcome;
    });
    const handle: DispatchHandle = {
      id,
      event,
      settled,
      cancel: () => controller.abort()
    };

    this.outstanding.add(handle);
    return handle;
  }

  /**
   * Cancels every unit still in flight and waits for each to finish. A unit
   * whose response lands after cancel() counts as completed, not cancelled.
   */
  async drain(): Promise<DrainResult> {
    const pending = Array.from(this.outstanding);
    pending.forEach((handle) => handle.cancel());

    const outcomes = await Promise.all(pending.map((handle) => handle.settled));
    if (this.defects.length > 0) {
      throw new DispatchDefectError([...this.defects]);
    }

    return {
      outstanding: pending.length,
      cancelled: outcomes.filter((outcome) => outcome.kind === "cancelled").length
    };
  }

  private async execute(event: RequestEvent, signal: AbortSignal): Promise<DispatchOutcome> {
    const start = performance.now();
    let outcome: Extract<DispatchOutcome, { response: ReplayResponse }>;

    try {
      const response = await this.transport.send(event, signal);
      outcome = { kind: "completed", response };
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        return { kind: "cancelled" };
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`${event.method} ${event.path} failed: ${message}`);
      outcome = {
        kind: "failed",
        response: {
          status: TRANSPORT_ERROR_STATUS,
          body: null,
          latencyMs: Math.max(0, performance.now() - start),
          error: message
        }
      };
    }

    try {
      this.sink.process(outcome.response);
    } catch (error) {
      this.defects.push(error);
      return { kind: "defect", error };
    }
    return outcome;
  }
}
