import { ReplayConfig } from "../config/types.js";
import { SearchResponseAccumulator } from "../sink/searchAccumulator.js";
import { ResponseSink } from "../sink/types.js";
import { openRequestSource } from "../source/index.js";
import { RequestSource } from "../source/types.js";
import { HttpTransport } from "../transport/httpTransport.js";
import { Transport } from "../transport/types.js";
import { Clock, systemClock } from "../util/clock.js";
import { Dispatcher } from "./dispatcher.js";
import { buildReport, ReplayReport } from "./report.js";
import { ReplayRunner } from "./runner.js";
import { Timeline } from "./timeline.js";

export interface ReplayDependencies {
  source?: RequestSource;
  transport?: Transport;
  sink?: ResponseSink;
  clock?: Clock;
  progressInterval?: number;
}

/** Wires source, timeline, dispatcher and sink together and runs one replay to completion. */
export async function runReplay(config: ReplayConfig, deps: ReplayDependencies = {}): Promise<ReplayReport> {
  const clock = deps.clock ?? systemClock;
  const source = deps.source ?? openRequestSource(config.logFile, config.format);
  const transport = deps.transport ?? new HttpTransport({ host: config.host, port: config.port });
  const sink = deps.sink ?? new SearchResponseAccumulator();

  const runner = new ReplayRunner({
    source,
    timeline: new Timeline(config.speedMultiplier, clock),
    dispatcher: new Dispatcher(transport, sink, { maxInFlight: config.maxInFlight }),
    budgetMs: config.runTimeMinutes * 60000,
    clock,
    progressInterval: deps.progressInterval
  });

  try {
    const stats = await runner.run();
    return buildReport(stats, sink.summary());
  } finally {
    await transport.close();
  }
}

export { Dispatcher } from "./dispatcher.js";
export type { DispatchHandle, DispatchOutcome, DrainResult } from "./dispatcher.js";
export { formatReport, writeReport } from "./report.js";
export type { ReplayReport, RunInformation } from "./report.js";
export { ReplayRunner } from "./runner.js";
export type { RunState, RunStats } from "./runner.js";
export { Timeline } from "./timeline.js";
export type { TimelineState } from "./timeline.js";
