import { Option, type Command } from "commander";
import fse from "fs-extra";

import { resolveProvider, type AppContext } from "../app/context.js";
import { StageNameSchema, type StageName } from "../core/config.js";
import {
  buildErrorReport,
  renderErrorReport,
  reportExitCode,
  writeErrorReport,
  type ErrorReport,
  type WrittenReport,
} from "../core/error-report.js";
import { JsonlLogger, type EventSink } from "../core/logger.js";
import { auditMissingOutputs, type MissingOutput } from "../core/missing-outputs.js";
import {
  createAssignmentPaths,
  errorSummaryPath,
  stageLogsDir,
  type AssignmentPaths,
} from "../core/paths.js";
import { scanTasks } from "../core/task-scanner.js";
import { sessionStamp } from "../core/utils.js";

import { requireAssignmentDir } from "./assignment.js";
import { renderCliWarning } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorsStageOption = StageName | "all";

export type ErrorsCommandOptions = {
  stage: ErrorsStageOption;
  provider?: string;
  json?: boolean;
  quiet?: boolean;
};

export type StageErrorSummary = {
  stage: StageName;
  report: ErrorReport;
  written: WrittenReport;
};

export type ErrorsCommandResult = {
  exitCode: number;
  stages: StageErrorSummary[];
};

// =============================================================================
// COMMAND
// =============================================================================

export function registerErrorsCommand(program: Command, getContext: () => AppContext): void {
  program
    .command("errors")
    .description("Summarize failed tasks and missing outputs for an assignment")
    .argument("<assignment>", "Assignment directory")
    .addOption(
      new Option("--stage <stage>", "Stage to summarize")
        .choices([...StageNameSchema.options, "all"])
        .default("all"),
    )
    .option("--provider <name>", "Provider whose quota vocabulary applies (default: config)")
    .option("--json", "Also write error_summary.json", false)
    .option("--quiet", "Only print reports that contain issues", false)
    .action(async (assignment: string, opts: ErrorsCommandOptions) => {
      const result = await errorsCommand(assignment, opts, getContext());
      process.exitCode = result.exitCode;
    });
}

export async function errorsCommand(
  assignmentDir: string,
  opts: ErrorsCommandOptions,
  ctx: AppContext,
): Promise<ErrorsCommandResult> {
  const paths = createAssignmentPaths(assignmentDir);
  await requireAssignmentDir(paths);

  if (!(await fse.pathExists(paths.processedDir))) {
    console.warn(renderCliWarning("No processed directory found. Has marking been run?"));
    return { exitCode: 0, stages: [] };
  }

  const stages: StageName[] = opts.stage === "all" ? [...StageNameSchema.options] : [opts.stage];
  const logger = new JsonlLogger(paths.eventsLogPath, { session: sessionStamp() });
  const summaries: StageErrorSummary[] = [];

  try {
    for (const stage of stages) {
      if (!(await fse.pathExists(stageLogsDir(paths, stage)))) continue;
      summaries.push(await summarizeStage(paths, stage, opts, ctx, logger));
    }
  } finally {
    logger.close();
  }

  if (summaries.length === 0) {
    printNoLogsFound(paths);
  }

  const failed = summaries.some((summary) => reportExitCode(summary.report) !== 0);
  return { exitCode: failed ? 1 : 0, stages: summaries };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function summarizeStage(
  paths: AssignmentPaths,
  stage: StageName,
  opts: ErrorsCommandOptions,
  ctx: AppContext,
  logger: EventSink,
): Promise<StageErrorSummary> {
  const failures = await scanTasks(stageLogsDir(paths, stage), {
    provider: resolveProvider(ctx, opts.provider),
    patterns: ctx.patterns,
    logger,
  });
  const missing = await auditStageOutputs(paths, ctx, logger);

  const report = buildErrorReport({ stage, failures, missing });
  const written = await writeErrorReport(report, errorSummaryPath(paths, stage), {
    json: opts.json,
    logger,
  });

  if (!opts.quiet || reportExitCode(report) !== 0) {
    console.log("");
    console.log(renderErrorReport(report));
    console.log(`Report saved to: ${written.textPath}`);
    if (written.jsonPath) {
      console.log(`JSON report saved to: ${written.jsonPath}`);
    }
  }

  return { stage, report, written };
}

// The audit needs both a manifest and the final directory; before unification neither exists.
async function auditStageOutputs(
  paths: AssignmentPaths,
  ctx: AppContext,
  logger: EventSink,
): Promise<MissingOutput[]> {
  const ready =
    (await fse.pathExists(paths.manifestPath)) && (await fse.pathExists(paths.finalDir));
  if (!ready) return [];

  return auditMissingOutputs(paths.manifestPath, paths.finalDir, {
    outputSuffix: ctx.config.output_file_suffix,
    logger,
  });
}

function printNoLogsFound(paths: AssignmentPaths): void {
  console.log(`No task logs found in ${paths.logsDir}`);
  console.log("This may mean:");
  console.log("  - Marking hasn't reached the parallel stages yet");
  console.log("  - Or logs were cleaned up");
}
