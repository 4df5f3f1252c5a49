import { Command } from "commander";

import { loadAppContext, type AppContext } from "../app/context.js";

import { registerChecksumCommand } from "./checksum.js";
import { registerConfigCommand } from "./config.js";
import { registerErrorsCommand } from "./errors.js";
import { registerLogErrorCommand } from "./log-error.js";
import { registerProgressCommand } from "./progress.js";
import { registerQuotaCheckCommand } from "./quota-check.js";
import { registerStateCommand } from "./state.js";
import { registerStatusCommand } from "./status.js";

export type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  // Loaded on first use so commands that never read config work without one.
  let appContext: AppContext | null = null;
  const getContext = (): AppContext => {
    appContext ??= loadAppContext({ explicitConfigPath: program.opts<GlobalOptions>().config });
    return appContext;
  };

  program
    .name("markrun")
    .description("Checkpoint state and failure reports for LLM marking runs")
    .version("0.1.0")
    .option(
      "--config <path>",
      "System config path (defaults to $MARKRUN_CONFIG, then ./configs/config.yaml)",
    )
    .option("--debug", "Show error codes, causes and stack traces", false);

  registerErrorsCommand(program, getContext);
  registerStatusCommand(program);
  registerStateCommand(program);
  registerChecksumCommand(program);
  registerQuotaCheckCommand(program, getContext);
  registerLogErrorCommand(program);
  registerProgressCommand(program);
  registerConfigCommand(program, getContext);

  return program;
}
