import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { classifyTaskOutput, type FailureType } from "./failure-classifier.js";
import type { FailurePatterns } from "./failure-patterns.js";
import { logEvent, type EventSink } from "./logger.js";
import { isMissingFileError, truncate } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskFailure = {
  task_dir: string;
  student_name: string;
  error_type: FailureType;
  error_message: string;
  stdout_snippet: string;
};

export type ScanOptions = {
  provider: string;
  patterns: FailurePatterns;
  logger?: EventSink;
};

export const MAX_ERROR_MESSAGE_CHARS = 500;
export const MAX_STDOUT_SNIPPET_CHARS = 200;
const MAX_FALLBACK_NAME_CHARS = 50;

const BATCH_DIR_PATTERN = /^\d+$/;
const QUOTED_STUDENT_PATTERN = /--student\s+'([^']+)'/;
const BARE_STUDENT_PATTERN = /--student\s+(\S+)/;

// =============================================================================
// SCAN
// =============================================================================

/**
 * Classify every captured task under `outputRoot`. Tasks may sit directly under the root
 * or one level down in numbered batch directories. Unreadable files count as empty output.
 */
export async function scanTasks(outputRoot: string, opts: ScanOptions): Promise<TaskFailure[]> {
  if (!(await fse.pathExists(outputRoot))) {
    console.warn(`Warning: task output directory not found: ${outputRoot}`);
    return [];
  }

  logEvent(opts.logger, "scan.start", { output_root: outputRoot, provider: opts.provider });

  const failures: TaskFailure[] = [];
  for (const resultsDir of await listResultsDirs(outputRoot)) {
    for (const taskDir of await listSubdirs(resultsDir)) {
      const failure = await scanTaskDir(taskDir, opts);
      if (failure) {
        failures.push(failure);
        logEvent(opts.logger, "scan.task_failed", {
          student: failure.student_name,
          task_dir: failure.task_dir,
          error_type: failure.error_type,
        });
      }
    }
  }

  return failures;
}

export async function scanTaskDir(taskDir: string, opts: ScanOptions): Promise<TaskFailure | null> {
  const stderr = (await readCapture(path.join(taskDir, "stderr"), opts.logger)).trim();
  const stdout = (await readCapture(path.join(taskDir, "stdout"), opts.logger)).trim();

  const result = classifyTaskOutput({ stderr, stdout, provider: opts.provider }, opts.patterns);
  if (!result.failed) return null;

  return {
    task_dir: taskDir,
    student_name: extractStudentName(path.basename(taskDir)),
    error_type: result.errorType,
    error_message: truncate(result.message, MAX_ERROR_MESSAGE_CHARS),
    stdout_snippet: truncate(stdout, MAX_STDOUT_SNIPPET_CHARS),
  };
}

/**
 * Task directories are named after the command line that launched the worker, e.g.
 * `python3 mark.py --student 'Ada Lovelace' --submission ...`.
 */
export function extractStudentName(taskDirName: string): string {
  const quoted = QUOTED_STUDENT_PATTERN.exec(taskDirName);
  if (quoted) return quoted[1];

  const bare = BARE_STUDENT_PATTERN.exec(taskDirName);
  if (bare) return bare[1];

  return taskDirName.length > MAX_FALLBACK_NAME_CHARS
    ? `${taskDirName.slice(0, MAX_FALLBACK_NAME_CHARS)}...`
    : taskDirName;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function listResultsDirs(outputRoot: string): Promise<string[]> {
  const batches = (await listSubdirs(outputRoot)).filter((dir) =>
    BATCH_DIR_PATTERN.test(path.basename(dir)),
  );
  return batches.length > 0 ? batches : [outputRoot];
}

async function listSubdirs(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    console.warn(`Warning: could not list ${dir}: ${formatErrorMessage(err)}`);
    return [];
  }

  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }))
    .map((name) => path.join(dir, name));
}

// Invalid UTF-8 is replaced with U+FFFD by Buffer#toString rather than rejected.
async function readCapture(filePath: string, logger?: EventSink): Promise<string> {
  try {
    const raw = await fs.readFile(filePath);
    return raw.toString("utf8");
  } catch (err) {
    if (isMissingFileError(err)) return "";

    const detail = formatErrorMessage(err);
    console.warn(`Warning: could not read ${filePath}: ${detail}`);
    logEvent(logger, "scan.read_failed", { path: filePath, error: detail });
    return "";
  }
}
