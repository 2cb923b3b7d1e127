import { SourceFormat } from "../source/types.js";

/** Raw `replay` options as commander hands them over. */
export interface CliOptions {
  log_file?: string;
  host?: string;
  port?: string;
  speed_multiplier?: string;
  run_time_minutes?: string;
  format?: string;
  max_in_flight?: string;
  out?: string;
}

export interface ReplayConfig {
  logFile: string;
  format: SourceFormat;
  host: string;
  port: number;
  speedMultiplier: number;
  runTimeMinutes: number;
  maxInFlight?: number;
  outFile?: string;
}
