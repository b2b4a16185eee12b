/**
 * Record pair discovery.
 *
 * Scans the source and target directories (non-recursively), keeps the
 * regular files each side's adapter recognizes, and groups them by base id:
 *
 * ```
 * .claude/agents/planner.md          ┐
 *                                    ├─ { baseId: "planner", sourcePath, targetPath }
 * .github/agents/planner.agent.md    ┘
 * ```
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ConfigType } from "../canonical/models.js";
import type { FormatAdapter } from "../adapters/types.js";
import type { RecordPair } from "../types.js";
import { isErrnoException } from "./file-writer.js";

/**
 * Error thrown when a sync directory is missing or is not a directory.
 * Fatal to the run; raised before any pair is processed.
 */
export class LocationError extends Error {
  readonly directory: string;

  constructor(message: string, directory: string) {
    super(message);
    this.name = "LocationError";
    this.directory = directory;
  }
}

export interface LocateOptions {
  sourceDir: string;
  targetDir: string;
  sourceAdapter: FormatAdapter;
  targetAdapter: FormatAdapter;
  configType: ConfigType;
}

/**
 * A recognized file on one side.
 */
interface SideEntry {
  baseId: string;
  filePath: string;
  mtime: number;
}

/**
 * Builds one record pair per distinct base id on either side, sorted by
 * base id.
 *
 * @throws LocationError if the source directory doesn't exist, or if either
 * path exists but isn't a directory. A missing target directory counts as empty.
 */
export async function locateRecordPairs(options: LocateOptions): Promise<RecordPair[]> {
  const { sourceDir, targetDir, sourceAdapter, targetAdapter, configType } = options;

  await assertDirectory(sourceDir, "Source", true);
  const targetExists = await assertDirectory(targetDir, "Target", false);

  const sourceEntries = await scanSide(sourceDir, sourceAdapter, configType);
  const targetEntries = targetExists ? await scanSide(targetDir, targetAdapter, configType) : [];

  const pairs = new Map<string, RecordPair>();
  for (const entry of sourceEntries) {
    pairs.set(entry.baseId, {
      baseId: entry.baseId,
      sourcePath: entry.filePath,
      sourceMtime: entry.mtime,
    });
  }
  for (const entry of targetEntries) {
    const pair = pairs.get(entry.baseId) ?? { baseId: entry.baseId };
    pair.targetPath = entry.filePath;
    pair.targetMtime = entry.mtime;
    pairs.set(entry.baseId, pair);
  }

  return [...pairs.values()].sort((a, b) => compareIds(a.baseId, b.baseId));
}

/**
 * @returns Whether the directory exists
 */
async function assertDirectory(dir: string, label: string, required: boolean): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    if (!stats.isDirectory()) {
      throw new LocationError(`${label} path is not a directory: ${dir}`, dir);
    }
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      if (required) {
        throw new LocationError(`${label} directory does not exist: ${dir}`, dir);
      }
      return false;
    }
    throw error;
  }
}

async function scanSide(
  dir: string,
  adapter: FormatAdapter,
  configType: ConfigType
): Promise<SideEntry[]> {
  const dirents = await fs.readdir(dir, { withFileTypes: true });
  const names = dirents
    .filter((dirent) => dirent.isFile())
    .map((dirent) => dirent.name)
    .sort(compareIds);

  const entries: SideEntry[] = [];
  const seen = new Set<string>();
  for (const name of names) {
    const filePath = path.join(dir, name);
    if (!adapter.canHandle(filePath, configType)) continue;

    const baseId = adapter.baseIdFor(filePath, configType);
    if (seen.has(baseId)) {
      console.warn(`[sync] Ignoring ${filePath}: another file in ${dir} already maps to "${baseId}"`);
      continue;
    }
    seen.add(baseId);

    const stats = await fs.stat(filePath);
    entries.push({ baseId, filePath, mtime: stats.mtimeMs });
  }
  return entries;
}

/** Code-unit order, independent of locale */
function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
