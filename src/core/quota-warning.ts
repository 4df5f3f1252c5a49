/*
Purpose: human-facing warning shown when a single LLM call hits a quota or rate limit.
Assumptions: presentation only; callers decide where the text goes (normally stderr).
Usage: if (isQuotaError(out, provider, patterns)) console.error(renderQuotaWarning(provider, out));
*/

import { createAnsiFormatter } from "./error-format.js";
import { API_ERROR_SPAN } from "./failure-classifier.js";
import {
  KNOWN_PROVIDERS,
  PROVIDER_PROFILES,
  type ProviderProfile,
  type QuotaResetWindow,
} from "./failure-patterns.js";

export { isQuotaError } from "./failure-classifier.js";

export type QuotaWarningOptions = {
  useColor?: boolean;
};

const RULE = "=".repeat(80);

const WAIT_LABELS: Record<QuotaResetWindow, string> = {
  fixed: "Wait for the usage window to reset",
  hourly_or_daily: "Wait for rate limit reset",
  daily: "Wait for quota reset",
};

export function extractQuotaSnippet(text: string): string | null {
  const span = API_ERROR_SPAN.exec(text);
  if (span) return span[0];

  for (const line of text.split("\n")) {
    const lower = line.toLowerCase();
    if (lower.includes("limit reached") || lower.includes("resets")) {
      return line.trim();
    }
  }
  return null;
}

export function renderQuotaWarning(
  provider: string,
  text: string,
  opts: QuotaWarningOptions = {},
): string {
  const format = createAnsiFormatter(opts.useColor ?? false);
  const alert = (value: string) => format(value, ["red", "bold"]);
  const heading = (value: string) => format(value, ["yellow", "bold"]);

  const key = provider.toLowerCase();
  const displayName = key.length > 0 ? `${key[0].toUpperCase()}${key.slice(1)}` : "LLM";
  const profile = PROVIDER_PROFILES[key];
  const snippet = extractQuotaSnippet(text);

  const lines: string[] = [
    "",
    alert(RULE),
    alert(`  ${displayName.toUpperCase()} API QUOTA/RATE LIMIT REACHED`),
    alert(RULE),
    "",
  ];

  if (snippet) {
    lines.push(format(`Error message: ${snippet}`, ["red"]), "");
  }

  lines.push(
    heading("What this means:"),
    `  • The ${displayName} API has run out of quota or hit a rate limit`,
    "  • All completed work has been preserved (resume will skip completed tasks)",
    "",
    heading("Options to continue:"),
    ...renderOptions(key, profile, heading),
    "",
    heading("Resume capability:"),
    "  • Your progress is saved - no work will be lost",
    "  • When you re-run, only failed tasks will be processed",
    "",
    alert(RULE),
    "",
  );

  return lines.join("\n");
}

function renderOptions(
  provider: string,
  profile: ProviderProfile | undefined,
  heading: (value: string) => string,
): string[] {
  if (!profile) {
    return [
      `  1. ${heading("Wait for quota reset")} and re-run`,
      `  2. ${heading("Upgrade plan")} or switch to a different provider`,
    ];
  }

  const alternatives = KNOWN_PROVIDERS.filter((name) => name !== provider)
    .map((name) => `'${name}'`)
    .join(" or ");

  return [
    `  1. ${heading(WAIT_LABELS[profile.resetWindow])} (${profile.resetHint})`,
    "     Then re-run the same command - resume will pick up where it left off",
    "",
    `  2. ${heading("Upgrade plan")}: ${profile.upgradeHint}`,
    "",
    `  3. ${heading("Switch provider")}: Edit overview.md to use ${alternatives}`,
  ];
}
