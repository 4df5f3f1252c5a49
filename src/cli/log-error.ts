import path from "node:path";

import type { Command } from "commander";

import { ErrorLog } from "../core/error-log.js";
import { JsonlLogger } from "../core/logger.js";
import { createAssignmentPaths, errorLogPath } from "../core/paths.js";
import { sessionStamp } from "../core/utils.js";

import { invalidInput, requireAssignmentDir } from "./assignment.js";

export type LogErrorOptions = {
  type: string;
  message: string;
  student?: string;
  activity?: string;
  file?: string;
  session?: string;
  fatal?: boolean;
};

const SESSION_STAMP_PATTERN = /^\d{8}_\d{6}$/;

export function registerLogErrorCommand(program: Command): void {
  program
    .command("log-error")
    .description("Append a structured error record to the session error log")
    .argument("<assignment>", "Assignment directory")
    .requiredOption("--type <type>", "Error type, e.g. AGENT_FAILURE")
    .requiredOption("--message <text>", "Human-readable message")
    .option("--student <name>", "Student the error belongs to")
    .option("--activity <id>", "Activity the error belongs to")
    .option("--file <path>", "File involved")
    .option("--session <stamp>", "Existing session stamp (YYYYMMDD_HHMMSS) to append to")
    .option("--fatal", "Persist the record and stop with exit code 1", false)
    .action(async (assignment: string, opts: LogErrorOptions) => {
      process.exitCode = await logErrorCommand(assignment, opts);
    });
}

export async function logErrorCommand(
  assignmentDir: string,
  opts: LogErrorOptions,
  exit?: (code: number) => void,
): Promise<number> {
  if (opts.session && !SESSION_STAMP_PATTERN.test(opts.session)) {
    throw invalidInput(`Invalid session stamp "${opts.session}".`, "Use the YYYYMMDD_HHMMSS form.");
  }

  const paths = createAssignmentPaths(assignmentDir);
  await requireAssignmentDir(paths);

  const session = opts.session ?? sessionStamp();
  const logger = new JsonlLogger(paths.eventsLogPath, { session });
  const terminate = exit ?? ((code: number) => process.exit(code));
  const exitAfterClose = (code: number): void => {
    logger.close();
    terminate(code);
  };

  try {
    const log = await ErrorLog.open(errorLogPath(paths, session), {
      logger,
      exit: exitAfterClose,
    });
    await log.logError({
      type: opts.type,
      message: opts.message,
      student: opts.student,
      activity: opts.activity,
      filePath: opts.file ? path.resolve(opts.file) : undefined,
      fatal: opts.fatal,
    });
    console.log(`Session: ${session}`);
  } finally {
    logger.close();
  }

  return 0;
}
