import { ResponseSink } from "../src/sink/types.js";
import { RequestEvent, RequestSource } from "../src/source/types.js";
import { ReplayResponse, Transport } from "../src/transport/types.js";
import { Clock } from "../src/util/clock.js";

/**
 * A clock that only moves when something sleeps on it. Timers registered with
 * `after()` fire as a sleep passes them; a sleep whose signal aborts stops at
 * the timer that was due.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private timers: Array<{ at: number; resolve: () => void }> = [];

  constructor(private time = 0) {}

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }

  after(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.timers.push({ at: this.time + ms, resolve });
    });
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    const target = this.time + Math.max(0, ms);
    for (;;) {
      const due = this.timers.filter((timer) => timer.at <= target).sort((a, b) => a.at - b.at)[0];
      if (!due) {
        break;
      }
      this.timers = this.timers.filter((timer) => timer !== due);
      this.time = Math.max(this.time, due.at);
      due.resolve();
      await new Promise((resolve) => setImmediate(resolve));
      if (signal?.aborted) {
        return;
      }
    }
    this.time = target;
  }
}

export const BASE_TIME = Date.UTC(2024, 2, 1, 10, 0, 0);

export const makeEvent = (offsetMs: number, path = "/products/_search"): RequestEvent => ({
  timestamp: new Date(BASE_TIME + offsetMs),
  method: "POST",
  path,
  body: { query: { match_all: {} }, offset: offsetMs }
});

export class ArraySource implements RequestSource {
  passes = 0;

  constructor(private readonly captured: RequestEvent[]) {}

  describe(): string {
    return "memory";
  }

  events(): Iterable<RequestEvent> {
    this.passes++;
    return [...this.captured];
  }
}

type Responder = (event: RequestEvent, signal: AbortSignal) => Promise<ReplayResponse>;

const abortError = (): Error => {
  const error = new Error("Request aborted");
  error.name = "AbortError";
  return error;
};

/** Answers after `delayMs` of manual-clock time unless aborted first. */
export const respondAfter =
  (clock: ManualClock, delayMs: number, status = 200): Responder =>
  (_event, signal) =>
    new Promise<ReplayResponse>((resolve, reject) => {
      signal.addEventListener("abort", () => reject(abortError()), { once: true });
      void clock.after(delayMs).then(() => resolve({ status, body: { took: 1 }, latencyMs: delayMs }));
    });

export const respondWith =
  (status: number, body: unknown, latencyMs = 1): Responder =>
  async () => ({ status, body, latencyMs });

/** Never answers; rejects the way undici does once the signal fires. */
export const hangUntilAborted: Responder = (_event, signal) =>
  new Promise<ReplayResponse>((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(abortError()));
  });

export class FakeTransport implements Transport {
  readonly sent: Array<{ event: RequestEvent; at: number }> = [];
  closed = false;

  constructor(
    private readonly clock: Clock,
    private readonly responder: Responder
  ) {}

  send(event: RequestEvent, signal: AbortSignal): Promise<ReplayResponse> {
    this.sent.push({ event, at: this.clock.now() });
    return this.responder(event, signal);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class RecordingSink implements ResponseSink {
  readonly responses: ReplayResponse[] = [];

  process(response: ReplayResponse): void {
    this.responses.push(response);
  }

  summary(): Record<string, unknown> {
    return { processed: this.responses.length };
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};
