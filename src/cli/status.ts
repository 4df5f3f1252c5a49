import type { Command } from "commander";
import fse from "fs-extra";

import { createAssignmentPaths } from "../core/paths.js";
import { loadRunState, summarizeRunState, type RunStateSummary } from "../core/state-store.js";

import { requireAssignmentDir } from "./assignment.js";

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show the checkpoint summary for an assignment")
    .argument("<assignment>", "Assignment directory")
    .action(async (assignment: string) => {
      process.exitCode = await statusCommand(assignment);
    });
}

export async function statusCommand(assignmentDir: string): Promise<number> {
  const paths = createAssignmentPaths(assignmentDir);
  await requireAssignmentDir(paths);

  if (!(await fse.pathExists(paths.statePath))) {
    console.log(`No run state found at ${paths.statePath}.`);
    console.log("Nothing has been checkpointed for this assignment yet.");
    return 1;
  }

  const { state } = await loadRunState(paths.statePath);
  console.log(`State: ${paths.statePath}`);
  for (const line of formatRunSummary(summarizeRunState(state))) {
    console.log(line);
  }
  return 0;
}

export function formatRunSummary(summary: RunStateSummary): string[] {
  return [
    `Started: ${summary.startedAt}`,
    `Updated: ${summary.updatedAt ?? "(never saved)"}`,
    `Last stage: ${summary.lastStage ?? "(none)"}`,
    `Completed stages: ${formatList(summary.completedStages)}`,
    `Completed activities: ${summary.completedActivities}`,
    `Completed students: ${summary.completedStudents}`,
    `Checksums: ${formatList(summary.checksumLabels)}`,
  ];
}

function formatList(items: string[]): string {
  return items.length > 0 ? items.join(", ") : "(none)";
}
