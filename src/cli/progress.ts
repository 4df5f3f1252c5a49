import type { Command } from "commander";

import { ProgressReporter, type ProgressStream } from "../core/progress.js";

import { invalidInput } from "./assignment.js";

export type ProgressCommandOptions = {
  student: string;
  activity?: string;
  message?: string;
};

export type Fraction = {
  current: number;
  total: number;
};

const FRACTION_PATTERN = /^(\d+)\/(\d+)$/;

export function registerProgressCommand(program: Command): void {
  program
    .command("progress")
    .description("Print one progress line (for dispatcher scripts)")
    .requiredOption("--student <i/n>", "Student position, e.g. 3/20")
    .option("--activity <i/n>", "Activity position for multi-activity assignments, e.g. 2/4")
    .option("--message <text>", "Status message", "")
    .action((opts: ProgressCommandOptions) => {
      progressCommand(opts);
    });
}

export function progressCommand(
  opts: ProgressCommandOptions,
  stream: ProgressStream = process.stdout,
): void {
  const student = parseFraction(opts.student, "--student");
  const activity = opts.activity
    ? parseFraction(opts.activity, "--activity")
    : { current: 1, total: 1 };

  const reporter = new ProgressReporter({
    totalActivities: activity.total,
    totalStudents: student.total,
    stream,
  });
  reporter.update({
    activity: activity.current,
    student: student.current,
    message: opts.message,
  });
}

export function parseFraction(value: string, flag: string): Fraction {
  const match = FRACTION_PATTERN.exec(value.trim());
  if (!match) {
    throw invalidInput(`${flag} expects <current>/<total>, got "${value}".`);
  }
  return { current: Number(match[1]), total: Number(match[2]) };
}
