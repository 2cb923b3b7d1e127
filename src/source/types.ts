export interface RequestEvent {
  /** When the request was recorded in the capture (log-relative time). */
  readonly timestamp: Date;
  readonly method: string;
  readonly path: string;
  readonly body: unknown;
}

/**
 * A finite capture that can be walked any number of times. Each call to
 * `events()` starts a fresh pass yielding the same sequence; the replay
 * runner turns that into an endless stream by calling it again on exhaustion.
 */
export interface RequestSource {
  describe(): string;
  events(): Iterable<RequestEvent>;
}

export type SourceFormat = "slowlog" | "jsonl";
