import path from "node:path";

import fse from "fs-extra";

import type { FailureType } from "./failure-classifier.js";
import { logEvent, type EventSink } from "./logger.js";
import type { MissingOutput } from "./missing-outputs.js";
import type { TaskFailure } from "./task-scanner.js";
import { formatLocalTimestamp, isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorReportSummary = {
  total_failures: number;
  total_missing: number;
  by_error_type: Record<string, number>;
};

export type ErrorReport = {
  stage: string;
  timestamp: string;
  failures: TaskFailure[];
  missing_outputs: MissingOutput[];
  summary: ErrorReportSummary;
};

export type BuildErrorReportInput = {
  stage: string;
  failures: TaskFailure[];
  missing: MissingOutput[];
  generatedAt?: string;
};

export type WrittenReport = {
  textPath: string;
  jsonPath: string | null;
};

const HEAVY_RULE = "=".repeat(70);
const LIGHT_RULE = "-".repeat(70);
const MAX_ERROR_LINE_CHARS = 100;

// Order in which remediation bullets appear; only types present in the report are listed.
const REMEDIATION: Array<{ type: FailureType; heading: string; steps: string[] }> = [
  {
    type: "quota/rate_limit",
    heading: "QUOTA/RATE LIMIT errors detected:",
    steps: [
      "Wait for quota reset (check provider docs for reset time)",
      "Re-run the same command to retry only failed tasks",
    ],
  },
  {
    type: "timeout",
    heading: "TIMEOUT errors detected:",
    steps: ["Try reducing --parallel to lower concurrency", "Check network connection stability"],
  },
  {
    type: "network",
    heading: "NETWORK errors detected:",
    steps: [
      "Check connectivity to the provider API",
      "Re-run to retry - resume will skip completed tasks",
    ],
  },
  {
    type: "permission",
    heading: "PERMISSION errors detected:",
    steps: [
      "Check API keys and file permissions for the assignment directory",
      "Fix access, then re-run to retry failed tasks",
    ],
  },
  {
    type: "incomplete",
    heading: "INCOMPLETE tasks detected:",
    steps: [
      "LLM may have failed to generate output",
      "Re-run to retry - resume will skip completed tasks",
    ],
  },
  {
    type: "llm_failure",
    heading: "LLM FAILURE errors detected:",
    steps: [
      "The LLM agent failed to complete the task",
      "This may be due to context length, API issues, or prompt problems",
      "Re-run to retry - resume will skip completed tasks",
    ],
  },
  {
    type: "other",
    heading: "OTHER errors detected:",
    steps: [
      "Inspect the stderr file in each task directory",
      "Re-run to retry - resume will skip completed tasks",
    ],
  },
];

// =============================================================================
// BUILD
// =============================================================================

export function buildErrorReport(input: BuildErrorReportInput): ErrorReport {
  const counts = new Map<string, number>();
  for (const failure of input.failures) {
    counts.set(failure.error_type, (counts.get(failure.error_type) ?? 0) + 1);
  }

  const byErrorType: Record<string, number> = {};
  for (const type of [...counts.keys()].sort(compareNames)) {
    byErrorType[type] = counts.get(type) ?? 0;
  }

  return {
    stage: input.stage,
    timestamp: input.generatedAt ?? isoNow(),
    failures: input.failures,
    missing_outputs: input.missing,
    summary: {
      total_failures: input.failures.length,
      total_missing: input.missing.length,
      by_error_type: byErrorType,
    },
  };
}

/** Process exit code for a report: anything to retry is a failure. */
export function reportExitCode(report: ErrorReport): number {
  return report.failures.length > 0 || report.missing_outputs.length > 0 ? 1 : 0;
}

// =============================================================================
// RENDER
// =============================================================================

export function renderErrorReport(report: ErrorReport): string {
  const { failures, missing_outputs: missing } = report;
  const lines: string[] = [
    HEAVY_RULE,
    `ERROR SUMMARY REPORT - ${report.stage.toUpperCase()}`,
    `Generated: ${formatLocalTimestamp(new Date(report.timestamp))}`,
    HEAVY_RULE,
    "",
    `SUMMARY: ${failures.length + missing.length} issue(s) found`,
    `  - Task failures: ${failures.length}`,
    `  - Missing outputs: ${missing.length}`,
    "",
  ];

  if (failures.length === 0 && missing.length === 0) {
    lines.push("✓ No errors detected!", "");
    return lines.join("\n");
  }

  if (failures.length > 0) {
    lines.push(...sectionHeader("FAILED TASKS BY ERROR TYPE"));
    for (const [type, group] of groupByType(failures)) {
      lines.push(`## ${type.toUpperCase()} (${group.length} failures)`, "");
      for (const failure of group) {
        lines.push(`  Student: ${failure.student_name}`);
        if (failure.error_message) {
          const firstLine = failure.error_message.split("\n")[0].slice(0, MAX_ERROR_LINE_CHARS);
          lines.push(`  Error: ${firstLine}`);
        }
        lines.push("");
      }
    }
  }

  if (missing.length > 0) {
    lines.push(...sectionHeader("MISSING OUTPUT FILES"));
    for (const entry of missing) {
      lines.push(`  Student: ${entry.student_name}`, `  Expected: ${entry.expected_file}`, "");
    }
  }

  lines.push(...sectionHeader("RECOMMENDATIONS"));
  const present = new Set(failures.map((failure) => failure.error_type));
  for (const item of REMEDIATION) {
    if (!present.has(item.type)) continue;
    lines.push(`• ${item.heading}`, ...item.steps.map((step) => `  - ${step}`), "");
  }
  if (missing.length > 0) {
    lines.push(
      "• MISSING OUTPUTS detected:",
      "  - The worker exited before writing any feedback (check its logs, if any)",
      "  - Re-run to retry - resume will skip completed tasks",
      "",
    );
  }

  lines.push(
    "To retry failed tasks:",
    "  Re-run the same marking command; completed work units are skipped automatically.",
    "",
  );

  return lines.join("\n");
}

// =============================================================================
// PERSIST
// =============================================================================

export async function writeErrorReport(
  report: ErrorReport,
  textPath: string,
  opts: { json?: boolean; logger?: EventSink } = {},
): Promise<WrittenReport> {
  await fse.outputFile(textPath, renderErrorReport(report), "utf8");

  let jsonPath: string | null = null;
  if (opts.json) {
    jsonPath = siblingJsonPath(textPath);
    await fse.outputFile(jsonPath, JSON.stringify(report, null, 2) + "\n", "utf8");
  }

  logEvent(opts.logger, "report.written", {
    stage: report.stage,
    text_path: textPath,
    json_path: jsonPath,
    total_failures: report.summary.total_failures,
    total_missing: report.summary.total_missing,
  });

  return { textPath, jsonPath };
}

export function siblingJsonPath(textPath: string): string {
  const parsed = path.parse(textPath);
  return path.join(parsed.dir, `${parsed.name}.json`);
}

// =============================================================================
// INTERNALS
// =============================================================================

function sectionHeader(title: string): string[] {
  return [LIGHT_RULE, title, LIGHT_RULE, ""];
}

// Groups sorted by type name; failures keep discovery order inside a group.
function groupByType(failures: TaskFailure[]): Array<[string, TaskFailure[]]> {
  const groups = new Map<string, TaskFailure[]>();
  for (const failure of failures) {
    const group = groups.get(failure.error_type);
    if (group) {
      group.push(failure);
    } else {
      groups.set(failure.error_type, [failure]);
    }
  }
  return [...groups.entries()].sort(([a], [b]) => compareNames(a, b));
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
