import { DEFAULT_LOG_LEVEL } from "./defaults.js";
import { isLogLevel, LogLevel } from "../util/logging.js";

export interface RuntimeEnv {
  logLevel: LogLevel;
  progressInterval: number;
}

export const getRuntimeEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeEnv => {
  const levelEnv = env.LOGREPLAY_LOG_LEVEL?.toLowerCase() ?? DEFAULT_LOG_LEVEL;
  const logLevel = isLogLevel(levelEnv) ? levelEnv : DEFAULT_LOG_LEVEL;

  let progressInterval = Number(env.LOGREPLAY_PROGRESS_INTERVAL ?? "1000");
  if (!Number.isSafeInteger(progressInterval) || progressInterval < 1) {
    progressInterval = 1000;
  }
  return { logLevel, progressInterval };
};
