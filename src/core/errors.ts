export class MarkrunError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "MarkrunError";
  }
}

export class ConfigError extends MarkrunError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class StateError extends MarkrunError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StateError";
  }
}

export class FileLockError extends MarkrunError {
  constructor(public readonly lockPath: string) {
    super(`Timed out waiting for lock ${lockPath}. Remove it if no markrun process is running.`);
    this.name = "FileLockError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  state: "STATE_ERROR",
  assignment: "ASSIGNMENT_ERROR",
  input: "INPUT_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends MarkrunError {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly exitCode: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.exitCode = input.exitCode ?? 1;
  }
}
