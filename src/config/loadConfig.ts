import path from "node:path";
import { z } from "zod";
import { inferSourceFormat } from "../source/index.js";
import { ConfigError } from "../util/errors.js";
import { DEFAULT_PORT, DEFAULT_SPEED_MULTIPLIER } from "./defaults.js";
import { CliOptions, ReplayConfig } from "./types.js";

const positiveNumber = (flag: string) =>
  z.coerce
    .number({ invalid_type_error: `${flag} must be a number` })
    .finite(`${flag} must be finite`)
    .positive(`${flag} must be greater than 0`);

const replayOptionsSchema = z.object({
  log_file: z.string({ required_error: "--log_file is required" }).min(1, "--log_file is required"),
  host: z.string({ required_error: "--host is required" }).min(1, "--host is required"),
  port: z.coerce
    .number({ invalid_type_error: "--port must be a number" })
    .int("--port must be an integer")
    .min(1, "--port must be between 1 and 65535")
    .max(65535, "--port must be between 1 and 65535")
    .default(DEFAULT_PORT),
  speed_multiplier: positiveNumber("--speed_multiplier").default(DEFAULT_SPEED_MULTIPLIER),
  run_time_minutes: z
    .string({ required_error: "--run_time_minutes is required" })
    .pipe(positiveNumber("--run_time_minutes")),
  format: z.enum(["slowlog", "jsonl"], { errorMap: () => ({ message: "--format must be slowlog or jsonl" }) }).optional(),
  max_in_flight: z.coerce
    .number({ invalid_type_error: "--max_in_flight must be a number" })
    .int("--max_in_flight must be an integer")
    .min(1, "--max_in_flight must be at least 1")
    .optional(),
  out: z.string().min(1).optional()
});

export function buildReplayConfig(cwd: string, cliOptions: CliOptions): ReplayConfig {
  const result = replayOptionsSchema.safeParse(cliOptions);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message));
  }

  const options = result.data;
  const logFile = path.resolve(cwd, options.log_file);
  return {
    logFile,
    format: options.format ?? inferSourceFormat(logFile),
    host: options.host,
    port: options.port,
    speedMultiplier: options.speed_multiplier,
    runTimeMinutes: options.run_time_minutes,
    maxInFlight: options.max_in_flight,
    outFile: options.out ? path.resolve(cwd, options.out) : undefined
  };
}
