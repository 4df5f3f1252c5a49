import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  session?: string;
  student?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  session?: string;
  student?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type EventDefaults = {
  session?: string;
  student?: string;
};

/** Anything that accepts events; components depend on this rather than on the file logger. */
export interface EventSink {
  log(event: LogEventInput): void;
}

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventSink {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

/** Keeps events in memory; used where no log file is wanted. */
export class MemoryEventSink implements EventSink {
  readonly events: LogEvent[] = [];

  constructor(private readonly defaults: EventDefaults = {}) {}

  log(event: LogEventInput): void {
    this.events.push(eventWithTs(event, this.defaults));
  }

  ofType(type: string): LogEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { session, student, payload, ts, type } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = { ts: normalizedTs, type };

  const resolvedSession = session ?? defaults.session;
  if (resolvedSession) {
    result.session = resolvedSession;
  }
  const resolvedStudent = student ?? defaults.student;
  if (resolvedStudent) {
    result.student = resolvedStudent;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logEvent(
  sink: EventSink | undefined,
  type: string,
  fields: JsonObject & { student?: string } = {},
): void {
  if (!sink) return;

  const { student, ...payload } = fields;
  const event: LogEventInput = { type, payload };

  if (typeof student === "string") {
    event.student = student;
  }

  sink.log(event);
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stack ? `${message}\n${stack.text}` : message;
}

function resolveLoggerDebugEnabled(): boolean {
  return resolveDebugFlagFromArgv(process.argv) ?? false;
}

export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}
