import type { Command } from "commander";

import { JsonlLogger } from "../core/logger.js";
import { createAssignmentPaths } from "../core/paths.js";
import { StateStore, loadRunState } from "../core/state-store.js";
import { isActivityComplete, isStudentComplete } from "../core/state.js";
import { sessionStamp } from "../core/utils.js";

import { invalidInput, requireAssignmentDir } from "./assignment.js";

// =============================================================================
// TYPES
// =============================================================================

export type StateMarkOptions = {
  stage?: string;
  activity?: string;
  student?: string;
};

export type StateCheckOptions = {
  activity?: string;
  student?: string;
};

type MarkTarget =
  | { kind: "stage"; stage: string }
  | { kind: "activity"; activity: string }
  | { kind: "student"; student: string; activity?: string };

// =============================================================================
// COMMAND
// =============================================================================

export function registerStateCommand(program: Command): void {
  const state = program.command("state").description("Record or query completed work units");

  state
    .command("mark")
    .description("Record a stage, activity or student as complete")
    .argument("<assignment>", "Assignment directory")
    .option("--stage <name>", "Stage that finished")
    .option("--activity <id>", "Activity that finished (or scope for --student)")
    .option("--student <name>", "Student whose work unit finished")
    .action(async (assignment: string, opts: StateMarkOptions) => {
      process.exitCode = await stateMarkCommand(assignment, opts);
    });

  state
    .command("check")
    .description("Exit 0 when the work unit is already complete, 1 otherwise")
    .argument("<assignment>", "Assignment directory")
    .option("--activity <id>", "Activity to check (or scope for --student)")
    .option("--student <name>", "Student to check")
    .action(async (assignment: string, opts: StateCheckOptions) => {
      process.exitCode = await stateCheckCommand(assignment, opts);
    });
}

export async function stateMarkCommand(
  assignmentDir: string,
  opts: StateMarkOptions,
): Promise<number> {
  const target = resolveMarkTarget(opts);
  const paths = createAssignmentPaths(assignmentDir);
  await requireAssignmentDir(paths);

  const logger = new JsonlLogger(paths.eventsLogPath, { session: sessionStamp() });
  try {
    const store = await StateStore.open(paths.statePath, { logger });
    await applyMark(store, target);
  } finally {
    logger.close();
  }

  console.log(`Marked ${describeTarget(target)} complete.`);
  return 0;
}

export async function stateCheckCommand(
  assignmentDir: string,
  opts: StateCheckOptions,
): Promise<number> {
  if (!opts.student && !opts.activity) {
    throw invalidInput("state check needs --student or --activity.");
  }

  const paths = createAssignmentPaths(assignmentDir);
  await requireAssignmentDir(paths);

  // Read-only: a missing state file means nothing is complete yet.
  const { state } = await loadRunState(paths.statePath);
  const complete = opts.student
    ? isStudentComplete(state, { student: opts.student, activity: opts.activity })
    : isActivityComplete(state, opts.activity ?? "");

  console.log(complete ? "complete" : "pending");
  return complete ? 0 : 1;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveMarkTarget(opts: StateMarkOptions): MarkTarget {
  if (opts.stage) {
    if (opts.activity || opts.student) {
      throw invalidInput("--stage cannot be combined with --activity or --student.");
    }
    return { kind: "stage", stage: opts.stage };
  }
  if (opts.student) {
    return { kind: "student", student: opts.student, activity: opts.activity };
  }
  if (opts.activity) {
    return { kind: "activity", activity: opts.activity };
  }
  throw invalidInput(
    "state mark needs one of --stage, --activity or --student.",
    "Example: markrun state mark <assignment> --student 'Ada Lovelace' --activity A1",
  );
}

async function applyMark(store: StateStore, target: MarkTarget): Promise<void> {
  switch (target.kind) {
    case "stage":
      await store.markStageComplete(target.stage);
      return;
    case "activity":
      await store.markActivityComplete(target.activity);
      return;
    case "student":
      await store.markStudentComplete(target.student, target.activity);
      return;
  }
}

function describeTarget(target: MarkTarget): string {
  switch (target.kind) {
    case "stage":
      return `stage ${target.stage}`;
    case "activity":
      return `activity ${target.activity}`;
    case "student":
      return target.activity
        ? `student ${target.student} (activity ${target.activity})`
        : `student ${target.student}`;
  }
}
