import type { Command } from "commander";

import type { AppContext } from "../app/context.js";
import type { MarkrunConfig } from "../core/config.js";

import { invalidInput } from "./assignment.js";

// Scalar settings the shell dispatcher reads, e.g. MAX_PARALLEL=$(markrun config max_parallel).
export const CONFIG_KEYS = [
  "default_provider",
  "max_parallel",
  "verbose",
  "output_file_suffix",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function registerConfigCommand(program: Command, getContext: () => AppContext): void {
  program
    .command("config")
    .description("Print the resolved system config, or one value for shell scripts")
    .argument("[key]", `One of: ${CONFIG_KEYS.join(", ")}`)
    .action((key: string | undefined) => {
      process.exitCode = configCommand(getContext(), key);
    });
}

export function configCommand(ctx: AppContext, key?: string): number {
  if (key === undefined) {
    for (const line of formatConfigSummary(ctx)) {
      console.log(line);
    }
    return 0;
  }

  if (!isConfigKey(key)) {
    throw invalidInput(`Unknown config key "${key}".`, `Use one of: ${CONFIG_KEYS.join(", ")}.`);
  }

  console.log(formatConfigValue(ctx.config, key));
  return 0;
}

export function formatConfigSummary(ctx: AppContext): string[] {
  const source = ctx.configPath ?? "(built-in defaults)";
  return [
    `Config: ${source} [${ctx.configSource}]`,
    ...CONFIG_KEYS.map((key) => `  ${key}: ${formatConfigValue(ctx.config, key)}`),
  ];
}

function formatConfigValue(config: MarkrunConfig, key: ConfigKey): string {
  return String(config[key]);
}

function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}
