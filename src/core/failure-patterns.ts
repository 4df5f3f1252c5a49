/**
 * Default failure vocabularies for captured worker output.
 *
 * Worker CLIs do not share an error protocol, so classification is substring matching over
 * these lists. They are plain data: the system config can extend any list without touching
 * the classifier.
 */

// =============================================================================
// TYPES
// =============================================================================

export type QuotaPatterns = {
  common: string[];
  providers: Record<string, string[]>;
};

export type FailurePatterns = {
  quota: QuotaPatterns;
  timeout: string[];
  network: string[];
  permission: string[];
  failure_keywords: string[];
  informational: string[];
  start_markers: string[];
  success_markers: string[];
};

export type QuotaResetWindow = "fixed" | "hourly_or_daily" | "daily";

export type ProviderProfile = {
  resetWindow: QuotaResetWindow;
  resetHint: string;
  upgradeHint: string;
};

// =============================================================================
// DEFAULTS
// =============================================================================

export const KNOWN_PROVIDERS = ["claude", "codex", "gemini"] as const;

export const DEFAULT_FAILURE_PATTERNS: FailurePatterns = {
  quota: {
    common: [
      "quota",
      "rate limit",
      "usage limit",
      "limit reached",
      "too many requests",
      "rate_limit_exceeded",
      "resource_exhausted",
      "resource exhausted",
      "exhausted your capacity",
    ],
    providers: {
      codex: [
        "5-hour limit reached",
        "resets 3am",
        "/upgrade to max",
        "/extra-usage",
        "daily limit",
        "usage cap",
      ],
      claude: ["rate limit exceeded", "usage limits", "maximum requests", "overloaded_error"],
      gemini: ["quota_exceeded", "rate_limit_error"],
    },
  },
  timeout: ["timeout", "timed out"],
  network: ["connection", "network", "socket", "econnrefused", "econnreset", "enotfound"],
  permission: ["permission", "access denied", "eacces", "forbidden"],
  failure_keywords: ["error", "failed"],
  informational: ["yolo mode", "automatically approved"],
  start_markers: ["Creating final feedback", "Marking student"],
  success_markers: ["✓"],
};

export const PROVIDER_PROFILES: Record<string, ProviderProfile> = {
  codex: {
    resetWindow: "fixed",
    resetHint: "typically resets at 3am local time",
    upgradeHint: "Use '/upgrade to Max' or enable '/extra-usage'",
  },
  claude: {
    resetWindow: "hourly_or_daily",
    resetHint: "typically resets hourly or daily",
    upgradeHint: "Consider Claude Pro or an API tier upgrade",
  },
  gemini: {
    resetWindow: "daily",
    resetHint: "typically resets daily",
    upgradeHint: "Consider Gemini Advanced or a higher API tier",
  },
};

// =============================================================================
// MERGING
// =============================================================================

export type FailurePatternOverrides = {
  quota?: { common?: string[]; providers?: Record<string, string[]> };
  timeout?: string[];
  network?: string[];
  permission?: string[];
  failure_keywords?: string[];
  informational?: string[];
  start_markers?: string[];
  success_markers?: string[];
};

export function mergeFailurePatterns(
  base: FailurePatterns,
  overrides: FailurePatternOverrides = {},
): FailurePatterns {
  const providers: Record<string, string[]> = {};
  const providerNames = new Set([
    ...Object.keys(base.quota.providers),
    ...Object.keys(overrides.quota?.providers ?? {}),
  ]);
  for (const name of providerNames) {
    providers[name] = appendUnique(base.quota.providers[name], overrides.quota?.providers?.[name]);
  }

  return {
    quota: {
      common: appendUnique(base.quota.common, overrides.quota?.common),
      providers,
    },
    timeout: appendUnique(base.timeout, overrides.timeout),
    network: appendUnique(base.network, overrides.network),
    permission: appendUnique(base.permission, overrides.permission),
    failure_keywords: appendUnique(base.failure_keywords, overrides.failure_keywords),
    informational: appendUnique(base.informational, overrides.informational),
    start_markers: appendUnique(base.start_markers, overrides.start_markers),
    success_markers: appendUnique(base.success_markers, overrides.success_markers),
  };
}

function appendUnique(base: string[] = [], extra: string[] = []): string[] {
  const result = [...base];
  for (const item of extra) {
    if (!result.includes(item)) result.push(item);
  }
  return result;
}
