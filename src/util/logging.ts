export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const isLogLevel = (value: string): value is LogLevel =>
  Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

let threshold: LogLevel = "info";

export const setLogLevel = (level: LogLevel): void => {
  threshold = level;
};

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

// stdout is reserved for the run report, so every level goes to stderr.
const write = (level: LogLevel, message: string): void => {
  if (enabled(level)) {
    console.error(`[logreplay] ${level}: ${message}`);
  }
};

export const logger = {
  debug(message: string): void {
    write("debug", message);
  },
  info(message: string): void {
    write("info", message);
  },
  warn(message: string): void {
    write("warn", message);
  },
  error(message: string): void {
    write("error", message);
  }
};
