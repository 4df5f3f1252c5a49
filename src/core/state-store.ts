import fse from "fs-extra";

import { writeFileAtomic } from "./atomic-write.js";
import { formatErrorMessage } from "./error-format.js";
import { StateError } from "./errors.js";
import { logEvent, type EventSink } from "./logger.js";
import {
  RunStateSchema,
  createRunState,
  isActivityComplete,
  isStudentComplete,
  markActivityComplete,
  markStageComplete,
  markStudentComplete,
  setChecksum,
  type ChecksumRecord,
  type RunState,
} from "./state.js";
import { isMissingFileError, isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type StateLoadStatus = "loaded" | "missing" | "corrupt";

export type LoadedRunState = {
  state: RunState;
  status: StateLoadStatus;
};

export type StateStoreOptions = {
  logger?: EventSink;
};

export type RunStateSummary = {
  startedAt: string;
  updatedAt: string | null;
  lastStage: string | null;
  completedStages: string[];
  completedActivities: number;
  completedStudents: number;
  checksumLabels: string[];
};

// =============================================================================
// STORE
// =============================================================================

export class StateStore {
  private current: RunState | null = null;
  private readonly logger?: EventSink;

  constructor(
    public readonly statePath: string,
    opts: StateStoreOptions = {},
  ) {
    this.logger = opts.logger;
  }

  static async open(statePath: string, opts: StateStoreOptions = {}): Promise<StateStore> {
    const store = new StateStore(statePath, opts);
    await store.load();
    return store;
  }

  get state(): RunState {
    if (!this.current) {
      throw new StateError(`Run state for ${this.statePath} has not been loaded.`);
    }
    return this.current;
  }

  async exists(): Promise<boolean> {
    return fse.pathExists(this.statePath);
  }

  async load(): Promise<RunState> {
    const loaded = await loadRunState(this.statePath, { logger: this.logger });
    this.current = loaded.state;
    return loaded.state;
  }

  async save(): Promise<void> {
    await saveRunState(this.statePath, this.state);
    logEvent(this.logger, "state.saved", { path: this.statePath });
  }

  async markStageComplete(stage: string): Promise<void> {
    markStageComplete(this.state, stage);
    logEvent(this.logger, "stage.complete", { stage });
    await this.save();
  }

  async markActivityComplete(activity: string): Promise<void> {
    if (markActivityComplete(this.state, activity)) {
      await this.save();
    }
  }

  async markStudentComplete(student: string, activity?: string): Promise<void> {
    if (markStudentComplete(this.state, { student, activity })) {
      await this.save();
    }
  }

  async recordChecksum(label: string, record: ChecksumRecord): Promise<void> {
    setChecksum(this.state, label, record);
    await this.save();
  }

  isActivityComplete(activity: string): boolean {
    return isActivityComplete(this.state, activity);
  }

  isStudentComplete(student: string, activity?: string): boolean {
    return isStudentComplete(this.state, { student, activity });
  }

  getChecksum(label: string): ChecksumRecord | null {
    return this.state.checksums[label] ?? null;
  }

  getSummary(): RunStateSummary {
    return summarizeRunState(this.state);
  }
}

// =============================================================================
// LOAD/SAVE
// =============================================================================

export async function loadRunState(
  statePath: string,
  opts: StateStoreOptions = {},
): Promise<LoadedRunState> {
  let raw: string;
  try {
    raw = await fse.readFile(statePath, "utf8");
  } catch (err) {
    if (isMissingFileError(err)) {
      return { state: createRunState(), status: "missing" };
    }
    return fallBackToFreshState(statePath, err, opts.logger);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    return fallBackToFreshState(statePath, err, opts.logger);
  }

  const parsed = RunStateSchema.safeParse(doc);
  if (!parsed.success) {
    return fallBackToFreshState(statePath, parsed.error, opts.logger);
  }

  return { state: parsed.data, status: "loaded" };
}

export async function saveRunState(
  statePath: string,
  state: RunState,
  tempPath?: string,
): Promise<void> {
  const parsed = RunStateSchema.safeParse(state);
  if (!parsed.success) {
    throw new StateError(`Cannot save run state: ${parsed.error.toString()}`);
  }

  const normalized: RunState = { ...parsed.data, updated_at: isoNow() };
  Object.assign(state, normalized);

  await writeFileAtomic(statePath, JSON.stringify(normalized, null, 2) + "\n", tempPath);
}

export function summarizeRunState(state: RunState): RunStateSummary {
  return {
    startedAt: state.started_at,
    updatedAt: state.updated_at ?? null,
    lastStage: state.last_stage,
    completedStages: [...state.completed_stages],
    completedActivities: state.completed_activities.length,
    completedStudents: state.completed_students.length,
    checksumLabels: Object.keys(state.checksums).sort(),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function fallBackToFreshState(
  statePath: string,
  error: unknown,
  logger?: EventSink,
): LoadedRunState {
  const detail = formatErrorMessage(error);
  console.warn(`Warning: could not load state file ${statePath}: ${detail}. Starting fresh.`);
  logEvent(logger, "state.load_failed", { path: statePath, error: detail });
  return { state: createRunState(), status: "corrupt" };
}
