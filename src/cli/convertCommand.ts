import path from "node:path";
import { Command } from "commander";
import { SlowlogSource, writeCapture } from "../source/index.js";
import { logger } from "../util/logging.js";

export const registerConvertCommand = (program: Command): Command => {
  return program
    .command("convert")
    .description("Convert an Elasticsearch slow log into a JSONL capture for replay.")
    .argument("<logFile>", "Path to the slow log")
    .option("--out <file>", "Output capture file (default: <logFile>.jsonl)")
    .action(async (logFile: string, options: { out?: string }) => {
      const absLogFile = path.resolve(logFile);
      const outFile = options.out ? path.resolve(options.out) : `${absLogFile}.jsonl`;

      const count = await writeCapture(outFile, new SlowlogSource(absLogFile).events());
      logger.info(`converted ${count} search requests from ${absLogFile} -> ${outFile}`);
    });
};
