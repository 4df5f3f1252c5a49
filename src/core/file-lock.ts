import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";

import fse from "fs-extra";

import { FileLockError } from "./errors.js";
import { isFileExistsError, isMissingFileError, isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type FileLockOptions = {
  retryDelayMs?: number;
  timeoutMs?: number;
  // A lock file older than this is left over from a crashed writer and is removed.
  staleMs?: number;
};

const DEFAULT_RETRY_DELAY_MS = 20;
const DEFAULT_TIMEOUT_MS = 5_000;
const DEFAULT_STALE_MS = 30_000;

// =============================================================================
// PUBLIC API
// =============================================================================

/** Run `fn` while holding an exclusive `<file>.lock` shared by every process on the host. */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  opts: FileLockOptions = {},
): Promise<T> {
  const handle = await acquireLock(lockPath, opts);
  try {
    return await fn();
  } finally {
    await handle.close();
    await safeUnlink(lockPath);
  }
}

export function lockPathFor(filePath: string): string {
  return `${filePath}.lock`;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function acquireLock(lockPath: string, opts: FileLockOptions): Promise<FileHandle> {
  const retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const staleMs = opts.staleMs ?? DEFAULT_STALE_MS;

  await fse.ensureDir(path.dirname(lockPath));
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    const handle = await tryCreateLock(lockPath);
    if (handle) return handle;

    if (await removeIfStale(lockPath, staleMs)) continue;
    if (Date.now() >= deadline) {
      throw new FileLockError(lockPath);
    }
    await delay(retryDelayMs);
  }
}

async function tryCreateLock(lockPath: string): Promise<FileHandle | null> {
  let handle: FileHandle;
  try {
    handle = await fs.open(lockPath, "wx");
  } catch (err) {
    if (isFileExistsError(err)) return null;
    throw err;
  }

  try {
    await handle.writeFile(`${JSON.stringify({ pid: process.pid, acquired_at: isoNow() })}\n`);
  } catch (err) {
    await handle.close();
    await safeUnlink(lockPath);
    throw err;
  }
  return handle;
}

async function removeIfStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stats = await fs.stat(lockPath);
    if (Date.now() - stats.mtimeMs < staleMs) return false;
  } catch (err) {
    // Released between our open and stat; retry straight away.
    if (isMissingFileError(err)) return true;
    throw err;
  }

  await safeUnlink(lockPath);
  return true;
}

async function safeUnlink(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (!isMissingFileError(err)) throw err;
  }
}
