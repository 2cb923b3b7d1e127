import fs from "fs-extra";
import path from "node:path";
import { RunStats } from "./runner.js";

export interface RunInformation {
  run_time_minutes: number;
  num_sent_requests: number;
  average_requests_per_second: number;
  num_outstanding_requests: number;
  num_cancelled_requests: number;
  /** The last request went out this many seconds after it was due. */
  seconds_behind: number;
  /** Zero when the replay kept up; near or above 1 when the target fell over. */
  percentage_behind: number;
}

export interface ReplayReport {
  run_information: RunInformation;
  accumulator_information: Record<string, unknown>;
}

export const toRunInformation = (stats: RunStats): RunInformation => ({
  run_time_minutes: stats.elapsedMs / 60000,
  num_sent_requests: stats.sentCount,
  average_requests_per_second: stats.averageRequestsPerSecond,
  num_outstanding_requests: stats.outstandingCount,
  num_cancelled_requests: stats.cancelledCount,
  seconds_behind: stats.secondsBehind,
  percentage_behind: stats.percentageBehind
});

export const buildReport = (stats: RunStats, summary: Record<string, unknown>): ReplayReport => ({
  run_information: toRunInformation(stats),
  accumulator_information: summary
});

export const formatReport = (report: ReplayReport): string => JSON.stringify(report, null, 4);

export async function writeReport(filePath: string, report: ReplayReport): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeJson(filePath, report, { spaces: 4 });
}
