/**
 * Fixture helpers for sync tests.
 *
 * Record files are written with explicit modification times so that
 * decisions don't depend on how fast the test runs.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { SyncConfig, SyncLogger } from "../src/types.js";

/** Fixed instants used as file modification times */
export const T1 = new Date("2024-01-01T00:00:00.000Z");
export const T2 = new Date("2024-01-02T00:00:00.000Z");
export const T3 = new Date("2024-01-03T00:00:00.000Z");
export const T4 = new Date("2024-01-04T00:00:00.000Z");

/**
 * An instant `minutes` from now. Files written by a sync carry the current
 * time, so an edit made after it needs a later mtime to count as a change.
 */
export function fromNow(minutes: number): Date {
  return new Date(Date.now() + minutes * 60_000);
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Writes a file and sets its atime and mtime.
 *
 * @returns The file path
 */
export async function writeRecord(
  dir: string,
  fileName: string,
  content: string,
  mtime: Date
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, fileName);
  await fs.writeFile(filePath, content, "utf-8");
  await fs.utimes(filePath, mtime, mtime);
  return filePath;
}

export async function setMtime(filePath: string, mtime: Date): Promise<void> {
  await fs.utimes(filePath, mtime, mtime);
}

export async function mtimeOf(filePath: string): Promise<number> {
  const stats = await fs.stat(filePath);
  return stats.mtimeMs;
}

/** Sorted directory listing, or [] if the directory doesn't exist */
export async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch {
    return [];
  }
}

/**
 * A minimal Claude agent file.
 */
export function claudeAgentFile(name: string, instructions = `You are ${name}.`): string {
  return `---\nname: ${name}\ndescription: The ${name} agent\ntools: Read, Grep\nmodel: sonnet\n---\n${instructions}\n`;
}

/**
 * A minimal Copilot agent file.
 */
export function copilotAgentFile(name: string, instructions = `You are ${name}.`): string {
  return `---\nname: ${name}\ndescription: The ${name} agent\ntools:\n  - read\n  - search\nmodel: Claude Opus 4\ntarget: vscode\n---\n${instructions}\n`;
}

export function syncConfig(overrides: Partial<SyncConfig> & Pick<SyncConfig, "sourceDir" | "targetDir" | "stateFile">): SyncConfig {
  return {
    sourceFormat: "claude",
    targetFormat: "copilot",
    configType: "agent",
    direction: "both",
    dryRun: false,
    force: false,
    verbose: false,
    conversionOptions: {},
    ...overrides,
  };
}

/**
 * Logger that records lines instead of printing them.
 */
export function captureLog(): { lines: string[]; log: SyncLogger } {
  const lines: string[] = [];
  return { lines, log: (message) => lines.push(message) };
}
