import fs from "node:fs";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createTempAssignment, type TempAssignment } from "../__tests__/helpers/temp-assignment.js";
import { errorLogPath } from "../core/paths.js";

import { logErrorCommand } from "./log-error.js";

const SESSION = "20260302_091500";

let assignment: TempAssignment;

beforeEach(async () => {
  assignment = await createTempAssignment();
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
});

afterEach(async () => {
  await assignment.cleanup();
});

function readErrorFile(): {
  total_errors: number;
  failed_students: string[];
  errors: Array<{ type: string; student: string | null; fatal: boolean }>;
} {
  return JSON.parse(fs.readFileSync(errorLogPath(assignment.paths, SESSION), "utf8"));
}

describe("logErrorCommand", () => {
  it("appends to an existing session across invocations", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const exit = vi.fn();

    await logErrorCommand(
      assignment.paths.assignmentDir,
      { type: "AGENT_FAILURE", message: "no output", student: "Ada Lovelace", session: SESSION },
      exit,
    );
    await logErrorCommand(
      assignment.paths.assignmentDir,
      { type: "MISSING_FILE", message: "no notebook", student: "Ada Lovelace", session: SESSION },
      exit,
    );

    const doc = readErrorFile();
    expect(doc.total_errors).toBe(2);
    expect(doc.failed_students).toEqual(["Ada Lovelace"]);
    expect(doc.errors.map((record) => record.type)).toEqual(["AGENT_FAILURE", "MISSING_FILE"]);
    expect(exit).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenLastCalledWith(`Session: ${SESSION}`);
  });

  it("persists a fatal record before exiting with 1", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const exit = vi.fn((code: number) => {
      expect(readErrorFile().errors[0]?.fatal).toBe(true);
      expect(code).toBe(1);
    });

    await logErrorCommand(
      assignment.paths.assignmentDir,
      { type: "CONFIG_ERROR", message: "rubric missing", session: SESSION, fatal: true },
      exit,
    );

    expect(exit).toHaveBeenCalledTimes(1);
    expect(process.stderr.write).toHaveBeenCalledWith(
      "Fatal error encountered. Stopping execution.\n",
    );
  });

  it("rejects a malformed session stamp", async () => {
    await expect(
      logErrorCommand(assignment.paths.assignmentDir, {
        type: "AGENT_FAILURE",
        message: "x",
        session: "2026-03-02",
      }),
    ).rejects.toMatchObject({ code: "INPUT_ERROR" });
  });
});
