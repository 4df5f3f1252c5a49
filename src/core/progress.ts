/*
Purpose: carriage-return progress lines for long marking stages.
Assumptions: purely presentational; nothing here is persisted.
Usage: const progress = new ProgressReporter({ totalActivities: 3, totalStudents: 20 });
*/

// =============================================================================
// TYPES
// =============================================================================

export type ProgressStream = {
  write(chunk: string): unknown;
};

export type ProgressPosition = {
  currentActivity: number;
  totalActivities: number;
  currentStudent: number;
  totalStudents: number;
  message?: string;
};

export const PROGRESS_BAR_WIDTH = 30;
const BANNER_RULE = "=".repeat(60);

// =============================================================================
// FORMATTING
// =============================================================================

export function formatProgressLine(position: ProgressPosition): string {
  const { currentActivity, totalActivities, currentStudent, totalStudents } = position;
  const studentLabel = `[Student ${currentStudent}/${totalStudents}]`;

  let percent: number;
  let activityLabel = "";
  if (totalActivities > 1) {
    const totalTasks = totalActivities * totalStudents;
    const currentTask = (currentActivity - 1) * totalStudents + currentStudent;
    percent = ratioPercent(currentTask, totalTasks);
    activityLabel = `[A${currentActivity}/${totalActivities}]`;
  } else {
    percent = ratioPercent(currentStudent, totalStudents);
  }

  return `${activityLabel} ${studentLabel} (${percent.toFixed(1)}%) |${renderBar(percent)}| ${
    position.message ?? ""
  }`;
}

export function renderBar(percent: number, width = PROGRESS_BAR_WIDTH): string {
  const filled = Math.max(0, Math.min(width, Math.floor((width * percent) / 100)));
  return "█".repeat(filled) + "░".repeat(width - filled);
}

function ratioPercent(current: number, total: number): number {
  return total > 0 ? (current / total) * 100 : 0;
}

// =============================================================================
// REPORTERS
// =============================================================================

export class ProgressReporter {
  private currentActivity: number;
  private currentStudent: number;
  private readonly totalActivities: number;
  private readonly totalStudents: number;
  private readonly stream: ProgressStream;

  constructor(opts: {
    totalActivities: number;
    totalStudents: number;
    currentActivity?: number;
    currentStudent?: number;
    stream?: ProgressStream;
  }) {
    this.totalActivities = opts.totalActivities;
    this.totalStudents = opts.totalStudents;
    this.currentActivity = opts.currentActivity ?? 0;
    this.currentStudent = opts.currentStudent ?? 0;
    this.stream = opts.stream ?? process.stdout;
  }

  update(opts: { activity?: number; student?: number; message?: string } = {}): void {
    if (opts.activity !== undefined) this.currentActivity = opts.activity;
    if (opts.student !== undefined) this.currentStudent = opts.student;

    const line = formatProgressLine({
      currentActivity: this.currentActivity,
      totalActivities: this.totalActivities,
      currentStudent: this.currentStudent,
      totalStudents: this.totalStudents,
      message: opts.message,
    });
    this.stream.write(`\r${line}`);
  }

  startActivity(activity: number, activityName = ""): void {
    this.currentActivity = activity;
    this.currentStudent = 0;
    const name = activityName ? ` - ${activityName}` : "";
    this.stream.write(
      `\n\n${BANNER_RULE}\nStarting Activity ${activity}/${this.totalActivities}${name}\n${BANNER_RULE}\n`,
    );
  }

  startStudent(studentName: string, studentIndex: number): void {
    this.currentStudent = studentIndex;
    this.update({ message: `Processing ${studentName}...` });
  }

  completeStudent(studentName: string): void {
    this.update({ message: `✓ Completed ${studentName}` });
    this.stream.write("\n");
  }

  completeActivity(activity: number): void {
    this.stream.write(`\n✓ Activity ${activity}/${this.totalActivities} completed\n`);
  }

  errorStudent(studentName: string, errorMessage: string): void {
    this.stream.write(`\n✗ Error with ${studentName}: ${errorMessage}\n`);
  }

  stageComplete(stageName: string): void {
    this.stream.write(`\n\n${BANNER_RULE}\n✓ ${stageName} completed\n${BANNER_RULE}\n\n`);
  }
}

export class SimpleProgress {
  private current = 0;

  constructor(
    private readonly total: number,
    private readonly prefix = "Progress",
    private readonly stream: ProgressStream = process.stdout,
  ) {}

  update(current: number, message = ""): void {
    this.current = current;
    const percent = ratioPercent(current, this.total);
    this.stream.write(
      `\r${this.prefix}: [${current}/${this.total}] (${percent.toFixed(1)}%) |${renderBar(percent)}| ${message}`,
    );
  }

  increment(message = ""): void {
    this.update(this.current + 1, message);
  }

  complete(): void {
    this.stream.write(`\n✓ ${this.prefix} completed (${this.total} items)\n`);
  }
}
