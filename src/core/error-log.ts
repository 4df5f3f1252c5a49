import fse from "fs-extra";
import { z } from "zod";

import { writeFileAtomic } from "./atomic-write.js";
import { formatErrorMessage } from "./error-format.js";
import { lockPathFor, withFileLock, type FileLockOptions } from "./file-lock.js";
import { logEvent, type EventSink, type JsonObject } from "./logger.js";
import { isMissingFileError, isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export const ErrorRecordSchema = z.object({
  timestamp: z.string(),
  type: z.string(),
  message: z.string(),
  student: z.string().nullable(),
  activity: z.string().nullable(),
  file_path: z.string().nullable(),
  exception: z.string().nullable(),
  fatal: z.boolean(),
});
export type ErrorRecord = z.infer<typeof ErrorRecordSchema>;

export const ErrorLogFileSchema = z.object({
  total_errors: z.number().int().nonnegative(),
  failed_students: z.array(z.string()),
  errors: z.array(ErrorRecordSchema),
});
export type ErrorLogFile = z.infer<typeof ErrorLogFileSchema>;

export type LogErrorInput = {
  type: string;
  message: string;
  student?: string;
  activity?: string;
  filePath?: string;
  exception?: unknown;
  fatal?: boolean;
};

export type ErrorLogSummary = {
  totalErrors: number;
  fatalErrors: number;
  failedStudents: string[];
};

export type ExitFn = (code: number) => void;

export type ErrorLogOptions = {
  logger?: EventSink;
  exit?: ExitFn;
  stderr?: { write(chunk: string): unknown };
  lock?: FileLockOptions;
};

type ErrorLogRead =
  | { status: "missing" }
  | { status: "loaded"; doc: ErrorLogFile }
  | { status: "corrupt"; detail: string };

// =============================================================================
// ERROR LOG
// =============================================================================

/**
 * Structured error records for one logging session, mirrored to `errors_<stamp>.json`.
 * Several processes may append to the same session: each write happens under
 * `<file>.lock`, re-reads the file and appends only this instance's unsaved records.
 * Only a record logged with `fatal: true` ends the process.
 */
export class ErrorLog {
  private records: ErrorRecord[] = [];
  private failedStudents: string[] = [];
  private readonly unsaved: ErrorRecord[] = [];
  private readonly logger?: EventSink;
  private readonly exit: ExitFn;
  private readonly stderr: { write(chunk: string): unknown };
  private readonly lock?: FileLockOptions;

  constructor(
    public readonly filePath: string,
    opts: ErrorLogOptions = {},
  ) {
    this.logger = opts.logger;
    this.exit = opts.exit ?? ((code) => process.exit(code));
    this.stderr = opts.stderr ?? process.stderr;
    this.lock = opts.lock;
  }

  /** Continue a session file written by an earlier process; unreadable files start empty. */
  static async open(filePath: string, opts: ErrorLogOptions = {}): Promise<ErrorLog> {
    const log = new ErrorLog(filePath, opts);
    const read = await readErrorLogFile(filePath);

    if (read.status === "loaded") {
      log.replaceRecords(read.doc.errors);
    } else if (read.status === "corrupt") {
      console.warn(
        `Warning: could not load error file ${filePath}: ${read.detail}. Starting fresh.`,
      );
    }
    return log;
  }

  get errors(): readonly ErrorRecord[] {
    return this.records;
  }

  async logError(input: LogErrorInput): Promise<ErrorRecord> {
    const record: ErrorRecord = {
      timestamp: isoNow(),
      type: input.type,
      message: input.message,
      student: input.student ?? null,
      activity: input.activity ?? null,
      file_path: input.filePath ?? null,
      exception: input.exception === undefined ? null : formatErrorMessage(input.exception),
      fatal: input.fatal ?? false,
    };

    this.records.push(record);
    this.rememberStudent(record);
    this.unsaved.push(record);
    this.stderr.write(`${formatErrorRecord(record)}\n`);

    const fields: JsonObject & { student?: string } = {
      error_type: record.type,
      message: record.message,
      fatal: record.fatal,
    };
    if (record.student) fields.student = record.student;
    if (record.activity) fields.activity = record.activity;
    logEvent(this.logger, "error.logged", fields);

    await this.persist();

    if (record.fatal) {
      this.stderr.write("Fatal error encountered. Stopping execution.\n");
      this.exit(1);
    }

    return record;
  }

  getSummary(): ErrorLogSummary {
    return {
      totalErrors: this.records.length,
      fatalErrors: this.records.filter((record) => record.fatal).length,
      failedStudents: [...this.failedStudents],
    };
  }

  private replaceRecords(records: ErrorRecord[]): void {
    this.records = [...records];
    this.failedStudents = [];
    for (const record of this.records) this.rememberStudent(record);
  }

  private rememberStudent(record: ErrorRecord): void {
    if (record.student && !this.failedStudents.includes(record.student)) {
      this.failedStudents.push(record.student);
    }
  }

  private async persist(): Promise<void> {
    try {
      await withFileLock(lockPathFor(this.filePath), () => this.mergeAndWrite(), this.lock);
    } catch (err) {
      const detail = formatErrorMessage(err);
      console.warn(`Warning: could not save error file ${this.filePath}: ${detail}`);
    }
  }

  // Runs under the lock. Unsaved records stay queued when the write fails.
  private async mergeAndWrite(): Promise<void> {
    const current = await readErrorLogFile(this.filePath);
    const merged =
      current.status === "loaded" ? [...current.doc.errors, ...this.unsaved] : [...this.records];

    const doc: ErrorLogFile = {
      total_errors: merged.length,
      failed_students: uniqueStudents(merged),
      errors: merged,
    };
    await writeFileAtomic(this.filePath, JSON.stringify(doc, null, 2) + "\n");

    this.replaceRecords(merged);
    this.unsaved.length = 0;
  }
}

export function formatErrorRecord(record: ErrorRecord): string {
  let line = `[${record.type}] ${record.message}`;
  if (record.student) line += ` (Student: ${record.student})`;
  if (record.activity) line += ` (Activity: ${record.activity})`;
  return line;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readErrorLogFile(filePath: string): Promise<ErrorLogRead> {
  let raw: string;
  try {
    raw = await fse.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFileError(err)) return { status: "missing" };
    return { status: "corrupt", detail: formatErrorMessage(err) };
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    return { status: "corrupt", detail: formatErrorMessage(err) };
  }

  const parsed = ErrorLogFileSchema.safeParse(doc);
  if (!parsed.success) {
    return { status: "corrupt", detail: parsed.error.issues[0]?.message ?? "invalid" };
  }
  return { status: "loaded", doc: parsed.data };
}

function uniqueStudents(records: ErrorRecord[]): string[] {
  const students: string[] = [];
  for (const record of records) {
    if (record.student && !students.includes(record.student)) students.push(record.student);
  }
  return students;
}
