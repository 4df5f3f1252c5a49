import fs from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createTempAssignment, type TempAssignment } from "../__tests__/helpers/temp-assignment.js";

import { checksumRecordCommand, checksumVerifyCommand } from "./checksum.js";

const ABC_SHA256 = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

let assignment: TempAssignment;
let rubricPath: string;

beforeEach(async () => {
  process.env.NO_COLOR = "1";
  assignment = await createTempAssignment();
  await assignment.writeFile("rubric.md", "abc");
  rubricPath = path.join(assignment.paths.assignmentDir, "rubric.md");
});

afterEach(async () => {
  await assignment.cleanup();
});

describe("checksumRecordCommand", () => {
  it("stores the digest under the label", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const code = await checksumRecordCommand(assignment.paths.assignmentDir, rubricPath, "rubric");

    expect(code).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(`Recorded rubric: ${ABC_SHA256}  ${rubricPath}`);
    const state = JSON.parse(fs.readFileSync(assignment.paths.statePath, "utf8"));
    expect(state.checksums.rubric).toMatchObject({ path: rubricPath, checksum: ABC_SHA256 });
  });

  it("returns 1 when the file cannot be read", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const missing = path.join(assignment.paths.assignmentDir, "absent.md");

    const code = await checksumRecordCommand(assignment.paths.assignmentDir, missing, "absent");

    expect(code).toBe(1);
    expect(warnSpy).toHaveBeenLastCalledWith('[WARNING] Checksum for "absent" was not recorded.');
    expect(fs.existsSync(assignment.paths.statePath)).toBe(false);
  });
});

describe("checksumVerifyCommand", () => {
  it("reports an unchanged file", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await checksumRecordCommand(assignment.paths.assignmentDir, rubricPath, "rubric");
    logSpy.mockClear();

    const code = await checksumVerifyCommand(assignment.paths.assignmentDir, "rubric");

    expect(code).toBe(0);
    expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
      "Label: rubric",
      `Path: ${rubricPath}`,
      `Stored: ${ABC_SHA256}`,
      `Current: ${ABC_SHA256}`,
      "Unchanged.",
    ]);
  });

  it("warns about drift without failing", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await checksumRecordCommand(assignment.paths.assignmentDir, rubricPath, "rubric");
    await assignment.writeFile("rubric.md", "abcd");

    const code = await checksumVerifyCommand(assignment.paths.assignmentDir, "rubric");

    expect(code).toBe(0);
    expect(warnSpy).toHaveBeenCalledWith(
      `[WARNING] ${rubricPath} has changed since it was recorded.`,
    );
  });

  it("says so when the label was never recorded", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const code = await checksumVerifyCommand(assignment.paths.assignmentDir, "manifest");

    expect(code).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('No checksum recorded for "manifest".');
  });
});
