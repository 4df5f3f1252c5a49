import type { FailurePatterns } from "./failure-patterns.js";

// =============================================================================
// TYPES
// =============================================================================

export const FAILURE_TYPES = [
  "quota/rate_limit",
  "timeout",
  "network",
  "permission",
  "llm_failure",
  "incomplete",
  "other",
  "unknown",
] as const;

export type FailureType = (typeof FAILURE_TYPES)[number];

export type CapturedOutput = {
  stderr: string;
  stdout: string;
  provider: string;
};

export type Classification =
  | { failed: false }
  | { failed: true; errorType: FailureType; message: string };

export const INCOMPLETE_MESSAGE = "Task started but did not complete successfully";

const NO_FAILURE: Classification = { failed: false };

export const API_ERROR_SPAN = /\[API Error:.*?\]/;
const QUOTA_LINE_HINTS = ["quota", "limit", "capacity", "reset"];

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Classify one worker's captured output. stderr is the primary signal; stdout is only
 * consulted when stderr is empty, to catch workers killed mid-task.
 *
 * Categories are checked in a fixed priority order and the first match wins, so text that
 * mentions both a timeout and a connection is reported as a timeout.
 */
export function classifyTaskOutput(
  output: CapturedOutput,
  patterns: FailurePatterns,
): Classification {
  const stderr = output.stderr.trim();
  const stdout = output.stdout.trim();

  if (stderr) {
    return classifyStderr(stderr, output.provider, patterns);
  }

  if (stdout && isIncomplete(stdout, patterns)) {
    return { failed: true, errorType: "incomplete", message: INCOMPLETE_MESSAGE };
  }

  return NO_FAILURE;
}

export function isQuotaError(text: string, provider: string, patterns: FailurePatterns): boolean {
  const lower = text.toLowerCase();
  if (containsAny(lower, patterns.quota.common)) return true;

  const providerPatterns = patterns.quota.providers[provider.toLowerCase()] ?? [];
  return containsAny(lower, providerPatterns);
}

// =============================================================================
// STDERR
// =============================================================================

function classifyStderr(
  stderr: string,
  provider: string,
  patterns: FailurePatterns,
): Classification {
  const lower = stderr.toLowerCase();

  if (isQuotaError(stderr, provider, patterns)) {
    return { failed: true, errorType: "quota/rate_limit", message: extractQuotaMessage(stderr) };
  }
  if (containsAny(lower, patterns.timeout)) {
    return { failed: true, errorType: "timeout", message: stderr };
  }
  if (containsAny(lower, patterns.network)) {
    return { failed: true, errorType: "network", message: stderr };
  }
  if (containsAny(lower, patterns.permission)) {
    return { failed: true, errorType: "permission", message: stderr };
  }
  if (containsAny(lower, patterns.failure_keywords)) {
    return {
      failed: true,
      errorType: "llm_failure",
      message: extractFailureLine(stderr, patterns) ?? stderr,
    };
  }

  // Approval-mode banners and credential notices land on stderr without anything failing.
  if (containsAny(lower, patterns.informational)) {
    return NO_FAILURE;
  }

  return { failed: true, errorType: "other", message: stderr };
}

export function extractQuotaMessage(stderr: string): string {
  const span = API_ERROR_SPAN.exec(stderr);
  if (span) return span[0];

  const line = stderr
    .split("\n")
    .find((candidate) => containsAny(candidate.toLowerCase(), QUOTA_LINE_HINTS));
  return line ? line.trim() : stderr;
}

export function extractFailureLine(stderr: string, patterns: FailurePatterns): string | null {
  for (const line of stderr.split("\n")) {
    const lower = line.toLowerCase();
    if (containsAny(lower, patterns.informational)) continue;
    if (containsAny(lower, patterns.failure_keywords)) {
      return line.trim();
    }
  }
  return null;
}

// =============================================================================
// STDOUT
// =============================================================================

function isIncomplete(stdout: string, patterns: FailurePatterns): boolean {
  const started = patterns.start_markers.some((marker) => stdout.includes(marker));
  if (!started) return false;
  return !patterns.success_markers.some((marker) => stdout.includes(marker));
}

function containsAny(lowerText: string, phrases: string[]): boolean {
  return phrases.some((phrase) => lowerText.includes(phrase.toLowerCase()));
}
