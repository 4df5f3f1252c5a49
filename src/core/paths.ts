import path from "node:path";

import type { StageName } from "./config.js";

// =============================================================================
// TYPES
// =============================================================================

export type AssignmentPaths = {
  assignmentDir: string;
  processedDir: string;
  logsDir: string;
  finalDir: string;
  manifestPath: string;
  statePath: string;
  eventsLogPath: string;
};

// =============================================================================
// ASSIGNMENT LAYOUT
// =============================================================================

export function createAssignmentPaths(assignmentDir: string): AssignmentPaths {
  const resolved = path.resolve(assignmentDir);
  const processedDir = path.join(resolved, "processed");
  const logsDir = path.join(processedDir, "logs");

  return {
    assignmentDir: resolved,
    processedDir,
    logsDir,
    finalDir: path.join(processedDir, "final"),
    manifestPath: path.join(processedDir, "submissions_manifest.json"),
    statePath: path.join(logsDir, "state.json"),
    eventsLogPath: path.join(logsDir, "markrun-events.jsonl"),
  };
}

export function stageLogsDir(paths: AssignmentPaths, stage: StageName): string {
  return path.join(paths.logsDir, `${stage}_logs`);
}

export function errorSummaryPath(paths: AssignmentPaths, stage: StageName): string {
  return path.join(stageLogsDir(paths, stage), "error_summary.txt");
}

export function errorLogPath(paths: AssignmentPaths, sessionStamp: string): string {
  return path.join(paths.logsDir, `errors_${sessionStamp}.json`);
}

export function expectedOutputPath(
  finalDir: string,
  studentName: string,
  suffix = "_feedback.md",
): string {
  return path.join(finalDir, `${studentName}${suffix}`);
}
