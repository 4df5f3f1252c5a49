import { RunStateSchema, type ChecksumRecord, type RunState } from "./state-schema.js";
import { isoNow } from "./utils.js";

export { RunStateSchema, type ChecksumRecord, type RunState };

// =============================================================================
// WORK UNITS
// =============================================================================

export type WorkUnit = {
  student: string;
  activity?: string;
};

/**
 * Membership key for a WorkUnit. A student recorded without an activity is a different
 * unit from the same student recorded for a specific activity.
 */
export function workUnitKey(student: string, activity?: string): string {
  return activity ? `${student}:${activity}` : student;
}

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function createRunState(now: string = isoNow()): RunState {
  return {
    started_at: now,
    last_stage: null,
    completed_stages: [],
    completed_activities: [],
    completed_students: [],
    checksums: {},
  };
}

// =============================================================================
// MUTATIONS
// =============================================================================
// Completion only grows. Each mutation reports whether it changed the state so callers
// can skip a write when re-marking an already complete unit.

export function markStageComplete(state: RunState, stage: string, now: string = isoNow()): boolean {
  state.last_stage = stage;
  state.completed_at = now;
  addUnique(state.completed_stages, stage);
  return true;
}

export function markActivityComplete(state: RunState, activity: string): boolean {
  return addUnique(state.completed_activities, activity);
}

export function markStudentComplete(state: RunState, unit: WorkUnit): boolean {
  return addUnique(state.completed_students, workUnitKey(unit.student, unit.activity));
}

export function setChecksum(state: RunState, label: string, record: ChecksumRecord): void {
  state.checksums[label] = record;
}

// =============================================================================
// QUERIES
// =============================================================================

export function isActivityComplete(state: RunState, activity: string): boolean {
  return state.completed_activities.includes(activity);
}

export function isStudentComplete(state: RunState, unit: WorkUnit): boolean {
  return state.completed_students.includes(workUnitKey(unit.student, unit.activity));
}

export function isStageComplete(state: RunState, stage: string): boolean {
  return state.completed_stages.includes(stage);
}

function addUnique(items: string[], value: string): boolean {
  if (items.includes(value)) return false;
  items.push(value);
  return true;
}
