import { readdir, rm, stat } from "fs/promises";
import { join } from "path";
import { errorMessage } from "../errors.js";

export interface CleanupResult {
  removed: string[];
  failed: string[];
}

/** Deletes entries in `directory` last modified more than `maxAgeHours` ago. */
export async function cleanupTempFiles(
  directory: string,
  maxAgeHours: number,
  now: number = Date.now()
): Promise<CleanupResult> {
  const result: CleanupResult = { removed: [], failed: [] };
  const cutoff = now - maxAgeHours * 3600 * 1000;

  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    console.warn(`[Cleanup] Cannot read ${directory}: ${errorMessage(error)}`);
    return result;
  }

  for (const name of entries) {
    const path = join(directory, name);
    try {
      const info = await stat(path);
      if (info.mtimeMs >= cutoff) continue;
      await rm(path, { recursive: true, force: true });
      result.removed.push(name);
    } catch (error) {
      console.warn(`[Cleanup] Failed to remove ${path}: ${errorMessage(error)}`);
      result.failed.push(name);
    }
  }

  if (result.removed.length > 0) {
    console.log(`[Cleanup] Removed ${result.removed.length} stale entries from ${directory}`);
  }
  return result;
}
