/*
Purpose: render user-facing errors and warnings for CLI output with optional color.
Assumptions: stderr is the default stream; non-TTY output should disable color.
Usage: console.error(renderCliError(err, { debug: isDebugEnabled }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(error, { mode });
  const format = resolveFormatter(options);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

export function renderCliWarning(message: string, options: CliErrorFormatOptions = {}): string {
  const format = resolveFormatter(options);
  return `${format("[WARNING]", ["yellow"])} ${message}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFormatter(options: CliErrorFormatOptions): AnsiFormatter {
  const stream = options.stream ?? process.stderr;
  const useColor = resolveColorEnabled({ stream, useColor: options.useColor });
  return createAnsiFormatter(useColor);
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
    case "name":
    case "cause": {
      const label = `${line.kind[0].toUpperCase()}${line.kind.slice(1)}:`;
      return `${format(label, ["dim"])} ${format(line.text, ["dim"])}`;
    }
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indentMultiline(line.text, 2), ["dim"])}`;
    default:
      return line.text;
  }
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
