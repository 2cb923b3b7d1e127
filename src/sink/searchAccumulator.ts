import { z } from "zod";
import { ReplayResponse, TRANSPORT_ERROR_STATUS } from "../transport/types.js";
import { ResponseSink } from "./types.js";

const SUCCESS_STATUS = 200;

const searchBodySchema = z.object({ took: z.number() });

export type SearchSummary = {
  completion_status_counts: Record<string, number>;
  successful_requests: number;
  /** Mean server-reported `took` over successful searches, null when there were none. */
  average_time_per_successful_request: number | null;
  average_client_latency_ms: number | null;
};

/**
 * Accumulates Elasticsearch search responses: a histogram of status codes and
 * the server-side `took` of every successful search.
 */
export class SearchResponseAccumulator implements ResponseSink {
  private readonly statusCounts = new Map<number, number>();
  private totalTookMs = 0;
  private tookSamples = 0;
  private totalClientLatencyMs = 0;
  private answered = 0;

  process(response: ReplayResponse): void {
    this.statusCounts.set(response.status, (this.statusCounts.get(response.status) ?? 0) + 1);

    if (response.status !== TRANSPORT_ERROR_STATUS) {
      this.answered++;
      this.totalClientLatencyMs += response.latencyMs;
    }

    if (response.status === SUCCESS_STATUS) {
      const parsed = searchBodySchema.safeParse(response.body);
      if (parsed.success) {
        this.totalTookMs += parsed.data.took;
        this.tookSamples++;
      }
    }
  }

  summary(): SearchSummary {
    const counts: Record<string, number> = {};
    Array.from(this.statusCounts.keys())
      .sort((a, b) => a - b)
      .forEach((status) => {
        counts[String(status)] = this.statusCounts.get(status) ?? 0;
      });

    return {
      completion_status_counts: counts,
      successful_requests: this.statusCounts.get(SUCCESS_STATUS) ?? 0,
      average_time_per_successful_request: this.tookSamples > 0 ? this.totalTookMs / this.tookSamples : null,
      average_client_latency_ms: this.answered > 0 ? this.totalClientLatencyMs / this.answered : null
    };
  }
}
