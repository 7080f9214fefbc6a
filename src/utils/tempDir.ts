import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../logger.js";

/**
 * Runs `fn` with a fresh directory under `parentDir` and removes it afterwards,
 * whether `fn` resolves or throws.
 */
export async function withScopedTempDir<T>(
  parentDir: string,
  prefix: string,
  fn: (dir: string) => Promise<T>,
  log?: Logger
): Promise<T> {
  await fs.mkdir(parentDir, { recursive: true });
  const dir = await fs.mkdtemp(path.join(parentDir, prefix));
  try {
    return await fn(dir);
  } finally {
    try {
      await fs.rm(dir, { recursive: true, force: true });
      log?.debug({ dir }, "Removed scoped temp dir");
    } catch (error) {
      log?.warn({ err: error, dir }, "Cleanup warning");
    }
  }
}
