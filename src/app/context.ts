/**
 * AppContext carries the resolved system config into every command without globals.
 * Purpose: load config once at startup; components receive what they need from here.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = loadAppContext({ explicitConfigPath: opts.config }).
 */

import {
  loadConfigOrDefaults,
  resolveConfigPath,
  type ConfigSource,
} from "../core/config-loader.js";
import { resolveFailurePatterns, type MarkrunConfig } from "../core/config.js";
import type { FailurePatterns } from "../core/failure-patterns.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = Readonly<{
  configPath: string | null;
  configSource: ConfigSource;
  config: MarkrunConfig;
  patterns: FailurePatterns;
}>;

export type CreateAppContextInput = {
  config: MarkrunConfig;
  configPath?: string | null;
  configSource?: ConfigSource;
};

export type LoadAppContextInput = {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  return Object.freeze({
    configPath: input.configPath ?? null,
    configSource: input.configSource ?? "defaults",
    config: input.config,
    patterns: resolveFailurePatterns(input.config),
  });
}

export function loadAppContext(input: LoadAppContextInput = {}): AppContext {
  const resolution = resolveConfigPath({
    explicitPath: input.explicitConfigPath,
    cwd: input.cwd,
    env: input.env,
  });
  const config = loadConfigOrDefaults(resolution);

  return createAppContext({
    config,
    configPath: resolution.configPath,
    configSource: resolution.source,
  });
}

export function resolveProvider(ctx: AppContext, explicit?: string): string {
  return (explicit ?? ctx.config.default_provider).toLowerCase();
}
