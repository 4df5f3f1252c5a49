import type { Command } from "commander";

import { compareChecksum, recordChecksum } from "../core/checksum.js";
import { JsonlLogger } from "../core/logger.js";
import { createAssignmentPaths } from "../core/paths.js";
import { StateStore } from "../core/state-store.js";
import { sessionStamp } from "../core/utils.js";

import { requireAssignmentDir } from "./assignment.js";
import { renderCliWarning } from "./error-format.js";

export function registerChecksumCommand(program: Command): void {
  const checksum = program
    .command("checksum")
    .description("Record or verify checkpoint artifact checksums");

  checksum
    .command("record")
    .description("Store the SHA-256 of a file under a label")
    .argument("<assignment>", "Assignment directory")
    .argument("<file>", "File to fingerprint")
    .requiredOption("--label <label>", "Label to store the checksum under")
    .action(async (assignment: string, file: string, opts: { label: string }) => {
      process.exitCode = await checksumRecordCommand(assignment, file, opts.label);
    });

  checksum
    .command("verify")
    .description("Compare a recorded checksum with the file on disk (advisory)")
    .argument("<assignment>", "Assignment directory")
    .requiredOption("--label <label>", "Label to verify")
    .action(async (assignment: string, opts: { label: string }) => {
      process.exitCode = await checksumVerifyCommand(assignment, opts.label);
    });
}

export async function checksumRecordCommand(
  assignmentDir: string,
  filePath: string,
  label: string,
): Promise<number> {
  const paths = createAssignmentPaths(assignmentDir);
  await requireAssignmentDir(paths);

  const logger = new JsonlLogger(paths.eventsLogPath, { session: sessionStamp() });
  try {
    const store = await StateStore.open(paths.statePath, { logger });
    const record = await recordChecksum(store, filePath, label, { logger });
    if (!record) {
      console.warn(renderCliWarning(`Checksum for "${label}" was not recorded.`));
      return 1;
    }

    console.log(`Recorded ${label}: ${record.checksum}  ${record.path}`);
    return 0;
  } finally {
    logger.close();
  }
}

export async function checksumVerifyCommand(assignmentDir: string, label: string): Promise<number> {
  const paths = createAssignmentPaths(assignmentDir);
  await requireAssignmentDir(paths);

  const store = await StateStore.open(paths.statePath);
  const comparison = await compareChecksum(store, label);
  if (!comparison) {
    console.log(`No checksum recorded for "${label}".`);
    return 0;
  }

  console.log(`Label: ${comparison.label}`);
  console.log(`Path: ${comparison.path}`);
  console.log(`Stored: ${comparison.stored}`);
  console.log(`Current: ${comparison.current || "(unreadable)"}`);
  if (comparison.changed) {
    console.warn(renderCliWarning(`${comparison.path} has changed since it was recorded.`));
  } else {
    console.log("Unchanged.");
  }
  return 0;
}
