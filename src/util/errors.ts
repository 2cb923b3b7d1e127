export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class MalformedLogLineError extends Error {
  readonly lineNumber: number;
  readonly line: string;

  constructor(lineNumber: number, line: string, reason: string) {
    super(`Malformed log line ${lineNumber} (${reason}): ${line}`);
    this.name = "MalformedLogLineError";
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

export class MalformedCaptureError extends Error {
  readonly lineNumber: number;

  constructor(lineNumber: number, reason: string) {
    super(`Malformed capture entry on line ${lineNumber}: ${reason}`);
    this.name = "MalformedCaptureError";
    this.lineNumber = lineNumber;
  }
}

export class EmptyCaptureError extends Error {
  constructor(source: string) {
    super(`Request source ${source} produced no events; nothing to replay`);
    this.name = "EmptyCaptureError";
  }
}

export class DispatchDefectError extends Error {
  readonly causes: unknown[];

  constructor(causes: unknown[]) {
    const first = causes[0];
    const detail = first instanceof Error ? first.message : String(first);
    super(`${causes.length} dispatched request(s) failed outside the transport: ${detail}`);
    this.name = "DispatchDefectError";
    this.causes = causes;
  }
}

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === "AbortError" || error.name === "RequestAbortedError");
