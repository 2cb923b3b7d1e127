import { Command } from "commander";
import { getRuntimeEnv } from "../config/env.js";
import { setLogLevel } from "../util/logging.js";
import { registerConvertCommand } from "./convertCommand.js";
import { registerReplayCommand } from "./replayCommand.js";

export const buildProgram = (): Command => {
  const program = new Command();

  program.name("logreplay");
  registerReplayCommand(program);
  registerConvertCommand(program);

  return program;
};

export const runCli = async (argv: string[] = process.argv): Promise<void> => {
  setLogLevel(getRuntimeEnv().logLevel);
  const program = buildProgram();
  await program.parseAsync(argv);
};
