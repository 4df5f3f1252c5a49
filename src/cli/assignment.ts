import fse from "fs-extra";

import type { AssignmentPaths } from "../core/paths.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

export async function requireAssignmentDir(paths: AssignmentPaths): Promise<void> {
  if (await fse.pathExists(paths.assignmentDir)) return;

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.assignment,
    title: "Assignment not found.",
    message: `Assignment directory not found: ${paths.assignmentDir}`,
    hint: "Pass the assignment directory that contains processed/.",
  });
}

export function invalidInput(message: string, hint?: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: "Invalid arguments.",
    message,
    hint,
  });
}
