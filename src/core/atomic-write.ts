import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

import fse from "fs-extra";

/**
 * Write through a sibling temp file, fsync it, then rename over the target. Readers see the
 * old contents or the new ones, never a partial file.
 */
export async function writeFileAtomic(
  filePath: string,
  contents: string,
  tempPath?: string,
): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = tempPath ?? `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(contents, "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}
