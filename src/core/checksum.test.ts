import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { compareChecksum, computeChecksum, recordChecksum } from "./checksum.js";
import { MemoryEventSink } from "./logger.js";
import { StateStore } from "./state-store.js";

const EMPTY_SHA256 = "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";
// SHA-256 of the three bytes "abc".
const ABC_SHA256 = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "checksum-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("computeChecksum", () => {
  it("hashes an empty file", async () => {
    const filePath = path.join(makeTempDir(), "empty.txt");
    fs.writeFileSync(filePath, "");

    await expect(computeChecksum(filePath)).resolves.toBe(EMPTY_SHA256);
  });

  it("is deterministic for identical content", async () => {
    const dir = makeTempDir();
    const first = path.join(dir, "a.txt");
    const second = path.join(dir, "b.txt");
    fs.writeFileSync(first, "abc");
    fs.writeFileSync(second, "abc");

    const [a, b] = await Promise.all([computeChecksum(first), computeChecksum(second)]);

    expect(a).toBe(ABC_SHA256);
    expect(b).toBe(a);
  });

  it("hashes files larger than one read chunk", async () => {
    const filePath = path.join(makeTempDir(), "big.bin");
    fs.writeFileSync(filePath, Buffer.alloc(200 * 1024, 7));

    const digest = await computeChecksum(filePath);

    expect(digest).toMatch(/^[0-9a-f]{64}$/);
    expect(digest).not.toBe(EMPTY_SHA256);
  });

  it("returns an empty string and warns when the file cannot be read", async () => {
    const missing = path.join(makeTempDir(), "missing.txt");
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new MemoryEventSink();

    await expect(computeChecksum(missing, { logger })).resolves.toBe("");

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(String(warnSpy.mock.calls[0]?.[0])).toContain(
      `Warning: could not compute checksum for ${missing}:`,
    );
    expect(logger.ofType("checksum.failed")).toHaveLength(1);
  });
});

describe("recordChecksum", () => {
  it("stores the digest under its label and persists it", async () => {
    const dir = makeTempDir();
    const filePath = path.join(dir, "rubric.md");
    fs.writeFileSync(filePath, "abc");
    const statePath = path.join(dir, "state.json");
    const store = await StateStore.open(statePath);

    const record = await recordChecksum(store, filePath, "rubric");

    expect(record?.checksum).toBe(ABC_SHA256);
    expect(record?.path).toBe(filePath);

    const reloaded = await StateStore.open(statePath);
    expect(reloaded.getChecksum("rubric")).toEqual(record);
  });

  it("records nothing when the file is unreadable", async () => {
    const dir = makeTempDir();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const store = await StateStore.open(path.join(dir, "state.json"));

    const record = await recordChecksum(store, path.join(dir, "nope.md"), "rubric");

    expect(record).toBeNull();
    expect(store.getChecksum("rubric")).toBeNull();
    expect(fs.existsSync(path.join(dir, "state.json"))).toBe(false);
  });
});

describe("compareChecksum", () => {
  it("reports drift after the file changes", async () => {
    const dir = makeTempDir();
    const filePath = path.join(dir, "overview.md");
    fs.writeFileSync(filePath, "abc");
    const store = await StateStore.open(path.join(dir, "state.json"));
    await recordChecksum(store, filePath, "overview");

    const unchanged = await compareChecksum(store, "overview");
    fs.writeFileSync(filePath, "");
    const changed = await compareChecksum(store, "overview");

    expect(unchanged).toEqual({
      label: "overview",
      path: filePath,
      stored: ABC_SHA256,
      current: ABC_SHA256,
      changed: false,
    });
    expect(changed?.current).toBe(EMPTY_SHA256);
    expect(changed?.changed).toBe(true);
  });

  it("returns null for an unknown label", async () => {
    const store = await StateStore.open(path.join(makeTempDir(), "state.json"));

    await expect(compareChecksum(store, "unknown")).resolves.toBeNull();
  });
});
