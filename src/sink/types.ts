import { ReplayResponse } from "../transport/types.js";

/** Collects statistics from responses as they complete. */
export interface ResponseSink {
  process(response: ReplayResponse): void;
  summary(): Record<string, unknown>;
}
