import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { MarkrunConfigSchema, defaultConfig, type MarkrunConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "env" | "cwd" | "defaults";

export type ConfigResolution = {
  configPath: string | null;
  source: ConfigSource;
};

export const CONFIG_ENV_VAR = "MARKRUN_CONFIG";
export const DEFAULT_CONFIG_RELATIVE_PATH = path.join("configs", "config.yaml");

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [
        k,
        expandEnv(v, { ...ctx, trail: [...ctx.trail, k] }),
      ]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Check the --config path or unset MARKRUN_CONFIG to use defaults.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun. Remove it to fall back to defaults.";

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: `Config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: `Config at ${configPath} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConfigPath(
  args: { explicitPath?: string; cwd?: string; env?: NodeJS.ProcessEnv } = {},
): ConfigResolution {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const envPath = (args.env ?? process.env)[CONFIG_ENV_VAR];
  if (envPath) {
    return { configPath: path.resolve(envPath), source: "env" };
  }

  const cwdPath = path.resolve(args.cwd ?? process.cwd(), DEFAULT_CONFIG_RELATIVE_PATH);
  if (fs.existsSync(cwdPath)) {
    return { configPath: cwdPath, source: "cwd" };
  }

  return { configPath: null, source: "defaults" };
}

export function loadConfig(configPath: string): MarkrunConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    return parseConfigFile(absolutePath);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw createInvalidConfigError(absolutePath, err);
    }
    throw err;
  }
}

export function loadConfigOrDefaults(resolution: ConfigResolution): MarkrunConfig {
  return resolution.configPath ? loadConfig(resolution.configPath) : defaultConfig();
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseConfigFile(absolutePath: string): MarkrunConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML config at ${absolutePath}: ${detail}`, err);
  }

  // An empty file is a valid "use every default" config.
  const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

  const parsed = MarkrunConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid config at ${absolutePath}:\n${details}`, parsed.error);
  }

  return parsed.data;
}
