import { RequestEvent } from "../source/types.js";

export interface ReplayResponse {
  /** HTTP status, or TRANSPORT_ERROR_STATUS when no response arrived. */
  status: number;
  /** Parsed JSON body; null when the body was empty or not JSON. */
  body: unknown;
  /** Client-side round trip in milliseconds. */
  latencyMs: number;
  error?: string;
}

/** Status recorded for requests that failed before any HTTP response (refused, reset, DNS). */
export const TRANSPORT_ERROR_STATUS = 0;

export interface Transport {
  send(event: RequestEvent, signal: AbortSignal): Promise<ReplayResponse>;
  close(): Promise<void>;
}
