import path from "node:path";
import { CaptureFileSource } from "./captureFile.js";
import { SlowlogSource } from "./slowlogParser.js";
import { RequestSource, SourceFormat } from "./types.js";

export const inferSourceFormat = (logFile: string): SourceFormat =>
  path.extname(logFile).toLowerCase() === ".jsonl" ? "jsonl" : "slowlog";

export const openRequestSource = (logFile: string, format: SourceFormat): RequestSource =>
  format === "jsonl" ? new CaptureFileSource(logFile) : new SlowlogSource(logFile);

export { CaptureFileSource, readCapture, writeCapture } from "./captureFile.js";
export { SlowlogSource, parseSlowlog, parseSlowlogLine } from "./slowlogParser.js";
export type { RequestEvent, RequestSource, SourceFormat } from "./types.js";
