import fs from "fs-extra";
import { MalformedLogLineError } from "../util/errors.js";
import { RequestEvent, RequestSource } from "./types.js";

// [2024-03-01T10:15:42,118][WARN ][index.search.slowlog.query] [products][2] took[1.2s], ... source[{...}], extra_source[]
const SLOWLOG_LINE =
  /^\[(?<timestamp>.*?)\]\[.*?\]\[(?<requestType>.*?)\]\s*\[(?<index>.*?)\].*source\[(?<source>.*)\],\s*extra_source\[(?<extraSource>.*)\]/;

const parseJsonObject = (text: string, lineNumber: number, line: string, field: string): Record<string, unknown> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedLogLineError(lineNumber, line, `${field} is not JSON: ${reason}`);
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new MalformedLogLineError(lineNumber, line, `${field} is not a JSON object`);
  }
  return { ...parsed };
};

/**
 * Parses one slow log line. Returns undefined for entries that are not
 * search queries (fetch phase, indexing); throws for lines that do not
 * follow the slow log layout at all.
 */
export function parseSlowlogLine(line: string, lineNumber: number): RequestEvent | undefined {
  const match = SLOWLOG_LINE.exec(line);
  if (!match?.groups) {
    throw new MalformedLogLineError(lineNumber, line, "does not match the slow log layout");
  }

  const { timestamp, requestType, index, source, extraSource } = match.groups;
  const phase = requestType.split(".").pop();
  if (phase !== "query") {
    return undefined;
  }

  // Elasticsearch separates milliseconds with a comma, which Date cannot read.
  const recordedAt = new Date(timestamp.split(",")[0]);
  if (Number.isNaN(recordedAt.getTime())) {
    throw new MalformedLogLineError(lineNumber, line, `unreadable timestamp "${timestamp}"`);
  }

  const body: Record<string, unknown> = {};
  if (source) {
    Object.assign(body, parseJsonObject(source, lineNumber, line, "source"));
  }
  if (extraSource) {
    Object.assign(body, parseJsonObject(extraSource, lineNumber, line, "extra_source"));
  }

  return {
    timestamp: recordedAt,
    method: "POST",
    path: `/${index}/_search`,
    body
  };
}

export function* parseSlowlog(content: string): Generator<RequestEvent> {
  const lines = content.split("\n");
  for (let idx = 0; idx < lines.length; idx++) {
    const line = lines[idx].replace(/\r$/, "");
    if (line.trim().length === 0) {
      continue;
    }
    const event = parseSlowlogLine(line, idx + 1);
    if (event) {
      yield event;
    }
  }
}

/** Replays an Elasticsearch search slow log, re-reading the file on every pass. */
export class SlowlogSource implements RequestSource {
  constructor(private readonly logFile: string) {}

  describe(): string {
    return `slowlog:${this.logFile}`;
  }

  events(): Iterable<RequestEvent> {
    return parseSlowlog(fs.readFileSync(this.logFile, "utf8"));
  }
}
