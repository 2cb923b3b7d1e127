import fs from "fs-extra";
import path from "node:path";
import superjson from "superjson";
import { z } from "zod";
import { MalformedCaptureError } from "../util/errors.js";
import { RequestEvent, RequestSource } from "./types.js";

const captureEntrySchema = z.object({
  timestamp: z.date(),
  method: z.string().min(1),
  path: z
    .string()
    .startsWith("/")
    .refine((value) => !value.startsWith("//"), "must be a path on the target host, not a network-path reference"),
  body: z.unknown()
});

const readLines = (filePath: string): string[] => {
  const content = fs.readFileSync(filePath, "utf8");
  return content.split("\n").filter((line) => line.trim().length > 0);
};

export function parseCaptureLine(line: string, lineNumber: number): RequestEvent {
  let decoded: unknown;
  try {
    decoded = superjson.parse(line);
  } catch (error) {
    throw new MalformedCaptureError(lineNumber, error instanceof Error ? error.message : String(error));
  }

  const result = captureEntrySchema.safeParse(decoded);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => `${issue.path.join(".") || "entry"}: ${issue.message}`);
    throw new MalformedCaptureError(lineNumber, reason.join("; "));
  }
  const { timestamp, method, path: requestPath, body } = result.data;
  return { timestamp, method, path: requestPath, body };
}

export function* readCapture(filePath: string): Generator<RequestEvent> {
  const lines = readLines(filePath);
  for (let idx = 0; idx < lines.length; idx++) {
    yield parseCaptureLine(lines[idx], idx + 1);
  }
}

export const serializeCapture = (events: Iterable<RequestEvent>): string => {
  let out = "";
  for (const event of events) {
    out += `${superjson.stringify(event)}\n`;
  }
  return out;
};

export async function writeCapture(filePath: string, events: Iterable<RequestEvent>): Promise<number> {
  const buffered = Array.from(events);
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, serializeCapture(buffered));
  return buffered.length;
}

/** Replays a JSONL capture produced by `logreplay convert`. */
export class CaptureFileSource implements RequestSource {
  constructor(private readonly captureFile: string) {}

  describe(): string {
    return `jsonl:${this.captureFile}`;
  }

  events(): Iterable<RequestEvent> {
    return readCapture(this.captureFile);
  }
}
