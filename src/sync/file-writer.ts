/**
 * File writing helpers for synced records.
 *
 * Handles directory creation, atomic file writing, and deletion of records
 * removed on the other side.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Writes a file atomically, creating its directory if it doesn't exist.
 *
 * The content is written to `<filePath>.tmp` first, then renamed over the
 * target, so readers never observe a half-written file.
 *
 * @returns The absolute path to the written file
 *
 * @example
 * ```ts
 * await writeFileAtomic("./.github/agents/planner.agent.md", content);
 * // Returns: "/absolute/path/.github/agents/planner.agent.md"
 * ```
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<string> {
  const absolutePath = path.resolve(filePath);
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });

  const tempPath = `${absolutePath}.tmp`;
  await fs.writeFile(tempPath, content, "utf-8");
  await fs.rename(tempPath, absolutePath);

  return absolutePath;
}

/**
 * Deletes a file.
 *
 * Does not throw if the file doesn't exist (idempotent delete).
 *
 * @example
 * ```ts
 * await deleteFile("/path/to/agents/old-agent.md");
 * ```
 */
export async function deleteFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * Reads a file's modification time in ms, or `undefined` if it doesn't exist.
 */
export async function readMtime(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(filePath);
    return stats.mtimeMs;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
