import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { formatErrorMessage } from "./error-format.js";
import { logEvent, type EventSink } from "./logger.js";
import type { ChecksumRecord } from "./state.js";
import type { StateStore } from "./state-store.js";
import { isoNow } from "./utils.js";

export const CHECKSUM_CHUNK_BYTES = 64 * 1024;

export type ChecksumOptions = {
  logger?: EventSink;
};

export type ChecksumComparison = {
  label: string;
  path: string;
  stored: string;
  current: string;
  changed: boolean;
};

/**
 * SHA-256 hex digest of a file, read in fixed-size chunks.
 * Returns "" (and warns) when the file cannot be read; checksums are diagnostic only.
 */
export async function computeChecksum(
  filePath: string,
  opts: ChecksumOptions = {},
): Promise<string> {
  const hash = createHash("sha256");
  try {
    const stream = fs.createReadStream(filePath, { highWaterMark: CHECKSUM_CHUNK_BYTES });
    for await (const chunk of stream) {
      hash.update(chunk);
    }
    return hash.digest("hex");
  } catch (err) {
    const detail = formatErrorMessage(err);
    console.warn(`Warning: could not compute checksum for ${filePath}: ${detail}`);
    logEvent(opts.logger, "checksum.failed", { path: filePath, error: detail });
    return "";
  }
}

export async function recordChecksum(
  store: StateStore,
  filePath: string,
  label: string,
  opts: ChecksumOptions = {},
): Promise<ChecksumRecord | null> {
  const resolved = path.resolve(filePath);
  const checksum = await computeChecksum(resolved, opts);
  if (!checksum) return null;

  const record: ChecksumRecord = { path: resolved, checksum, recorded_at: isoNow() };
  await store.recordChecksum(label, record);
  logEvent(opts.logger, "checksum.recorded", { label, path: resolved, checksum });
  return record;
}

// Advisory: reports drift, never blocks. `current` is "" when the file is gone.
export async function compareChecksum(
  store: StateStore,
  label: string,
  opts: ChecksumOptions = {},
): Promise<ChecksumComparison | null> {
  const stored = store.getChecksum(label);
  if (!stored) return null;

  const current = await computeChecksum(stored.path, opts);
  return {
    label,
    path: stored.path,
    stored: stored.checksum,
    current,
    changed: current !== stored.checksum,
  };
}
