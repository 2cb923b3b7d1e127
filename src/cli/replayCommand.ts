import { Command } from "commander";
import { buildReplayConfig } from "../config/loadConfig.js";
import { getRuntimeEnv } from "../config/env.js";
import { CliOptions } from "../config/types.js";
import { formatReport, runReplay, writeReport } from "../replay/index.js";
import { logger } from "../util/logging.js";

export const registerReplayCommand = (program: Command): Command => {
  return program
    .command("replay")
    .description("Replay a captured request log against a live service and report how it coped.")
    .option("--log_file <path>", "Slow log or JSONL capture to replay")
    .option("--host <host>", "Host to load test")
    .option("--port <port>", "Port on the host", "9200")
    .option("--speed_multiplier <factor>", "1 is real time, 2 twice as fast, 0.5 half speed", "1")
    .option("--run_time_minutes <minutes>", "Wall-clock time to keep the replay running")
    .option("--format <format>", "Capture format: slowlog or jsonl (default: from the file extension)")
    .option("--max_in_flight <count>", "Cap on concurrent requests (default: unbounded)")
    .option("--out <file>", "Also write the report to this file")
    .action(async (options: CliOptions) => {
      const config = buildReplayConfig(process.cwd(), options);
      const { progressInterval } = getRuntimeEnv();
      logger.debug(`replay config: ${JSON.stringify(config)}`);

      const report = await runReplay(config, { progressInterval });
      console.log(formatReport(report));

      if (config.outFile) {
        await writeReport(config.outFile, report);
        logger.info(`report written to ${config.outFile}`);
      }
    });
};
