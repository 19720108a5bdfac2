import { stat } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import { log } from "../utils/logger.js";
import type { ResolvedCatalog, TaskDescriptor } from "./types.js";

const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR"]);

export function displayName(entry: string): string {
  const base = basename(entry);
  return basename(base, extname(base));
}

export function describeTask(baseDir: string, entry: string): TaskDescriptor {
  return Object.freeze({
    entry,
    name: displayName(entry),
    path: resolve(baseDir, entry),
  });
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && typeof err.code === "string" && NOT_FOUND_CODES.has(err.code)) {
      return false;
    }
    // Any other stat failure keeps the entry; launching it reports the real cause.
    log.debug(`Could not stat "${path}"`, { error: String(err) });
    return true;
  }
}

/**
 * Pair every catalog entry with its path under `baseDir` and drop the ones
 * with nothing on disk. Order is preserved.
 */
export async function resolveCatalog(baseDir: string, entries: readonly string[]): Promise<ResolvedCatalog> {
  const descriptors = entries.map((entry) => describeTask(baseDir, entry));
  const found = await Promise.all(descriptors.map((task) => exists(task.path)));

  const tasks: TaskDescriptor[] = [];
  const missing: string[] = [];
  descriptors.forEach((task, i) => {
    if (found[i]) {
      tasks.push(task);
    } else {
      missing.push(task.entry);
      log.warn(`Skipping ${task.entry} (file not found)`, { path: task.path });
    }
  });

  return { tasks, missing };
}
