export function isoNow(): string {
  return new Date().toISOString();
}

// YYYYMMDD_HHMMSS in local time, used to name one file per logging session.
export function sessionStamp(d: Date = new Date()): string {
  const yyyy = d.getFullYear();
  const mm = pad2(d.getMonth() + 1);
  const dd = pad2(d.getDate());
  const hh = pad2(d.getHours());
  const mi = pad2(d.getMinutes());
  const ss = pad2(d.getSeconds());
  return `${yyyy}${mm}${dd}_${hh}${mi}${ss}`;
}

// YYYY-MM-DD HH:MM:SS in local time, for human-facing report headers.
export function formatLocalTimestamp(d: Date): string {
  const date = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
  return `${date} ${time}`;
}

export function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) : value;
}

export function isMissingFileError(error: unknown): boolean {
  return getErrorCode(error) === "ENOENT";
}

export function isFileExistsError(error: unknown): boolean {
  return getErrorCode(error) === "EEXIST";
}

function getErrorCode(error: unknown): unknown {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return error.code;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}
