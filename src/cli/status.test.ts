import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createTempAssignment, type TempAssignment } from "../__tests__/helpers/temp-assignment.js";

import { stateMarkCommand } from "./state.js";
import { formatRunSummary, statusCommand } from "./status.js";

let assignment: TempAssignment;

beforeEach(async () => {
  assignment = await createTempAssignment();
});

afterEach(async () => {
  await assignment.cleanup();
});

describe("formatRunSummary", () => {
  it("renders placeholders for an unsaved state", () => {
    expect(
      formatRunSummary({
        startedAt: "2026-03-02T09:00:00.000Z",
        updatedAt: null,
        lastStage: null,
        completedStages: [],
        completedActivities: 0,
        completedStudents: 0,
        checksumLabels: [],
      }),
    ).toEqual([
      "Started: 2026-03-02T09:00:00.000Z",
      "Updated: (never saved)",
      "Last stage: (none)",
      "Completed stages: (none)",
      "Completed activities: 0",
      "Completed students: 0",
      "Checksums: (none)",
    ]);
  });

  it("joins stage and checksum lists", () => {
    const lines = formatRunSummary({
      startedAt: "2026-03-02T09:00:00.000Z",
      updatedAt: "2026-03-02T10:00:00.000Z",
      lastStage: "unifier",
      completedStages: ["marker", "unifier"],
      completedActivities: 3,
      completedStudents: 12,
      checksumLabels: ["manifest", "rubric"],
    });

    expect(lines[2]).toBe("Last stage: unifier");
    expect(lines[3]).toBe("Completed stages: marker, unifier");
    expect(lines[6]).toBe("Checksums: manifest, rubric");
  });
});

describe("statusCommand", () => {
  it("returns 1 when no state has been written", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const code = await statusCommand(assignment.paths.assignmentDir);

    expect(code).toBe(1);
    expect(logSpy).toHaveBeenCalledWith(`No run state found at ${assignment.paths.statePath}.`);
  });

  it("summarizes a saved state", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await stateMarkCommand(assignment.paths.assignmentDir, { stage: "marker" });
    await stateMarkCommand(assignment.paths.assignmentDir, { student: "Ada Lovelace" });
    logSpy.mockClear();

    const code = await statusCommand(assignment.paths.assignmentDir);

    const printed = logSpy.mock.calls.map((call) => String(call[0]));
    expect(code).toBe(0);
    expect(printed[0]).toBe(`State: ${assignment.paths.statePath}`);
    expect(printed).toContain("Last stage: marker");
    expect(printed).toContain("Completed students: 1");
    expect(printed).toContain("Checksums: (none)");
  });
});
