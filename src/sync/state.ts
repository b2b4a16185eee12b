/**
 * Sync state management for bidirectional record sync.
 *
 * Remembers, per directory pair and per base id, the modification times
 * observed at the last successful sync. The decision engine compares them
 * against the current times to tell edits from deletions and conflicts.
 *
 * One state file can hold many directory pairs; each is a scope keyed by
 * `"<abs source>|<abs target>"`.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { isPlainObject } from "../parser/frontmatter.js";
import type {
  ExecutableAction,
  SyncPairScope,
  SyncRecord,
  SyncStateFile,
} from "../types.js";
import { isErrnoException } from "./file-writer.js";

/**
 * Current sync state file schema version.
 * Increment when making breaking changes to the state file format.
 */
export const STATE_FILE_VERSION = 1;

/** Environment variable overriding the default state file location */
export const STATE_FILE_ENV = "AGENT_SYNC_STATE_FILE";

/**
 * State file path used when none is configured: `$AGENT_SYNC_STATE_FILE`,
 * else `~/.agent_sync_state.json`.
 */
export function defaultStateFilePath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[STATE_FILE_ENV];
  if (fromEnv) {
    return fromEnv;
  }
  return path.join(os.homedir(), ".agent_sync_state.json");
}

/**
 * Create an empty sync state object.
 *
 * Used when no state file exists (first sync) or when the state file
 * is corrupted and cannot be parsed.
 */
export function createEmptyState(): SyncStateFile {
  return {
    version: STATE_FILE_VERSION,
    syncPairs: {},
  };
}

/**
 * Scope key for a directory pair. Both paths are resolved to absolute form,
 * so `./agents` and `/home/me/agents` share history.
 */
export function scopeKey(sourceDir: string, targetDir: string): string {
  return `${path.resolve(sourceDir)}|${path.resolve(targetDir)}`;
}

/**
 * Load sync state from a JSON file.
 *
 * If the file doesn't exist, returns an empty state (first sync).
 * If the file is corrupted, has the wrong shape or an unknown version,
 * logs a warning and returns an empty state. Individual records that fail
 * validation are dropped with a warning.
 *
 * @param stateFilePath - Path to the state JSON file
 */
export async function loadState(stateFilePath: string): Promise<SyncStateFile> {
  let content: string;
  try {
    content = await fs.readFile(stateFilePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      // File doesn't exist - this is normal for first sync
      return createEmptyState();
    }
    console.warn(
      `[sync-state] Failed to read state file ${stateFilePath}:`,
      error instanceof Error ? error.message : error
    );
    console.warn("[sync-state] Starting fresh sync.");
    return createEmptyState();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    console.warn(
      `[sync-state] Failed to load state file ${stateFilePath}:`,
      error instanceof Error ? error.message : error
    );
    console.warn("[sync-state] Starting fresh sync.");
    return createEmptyState();
  }

  if (
    !isPlainObject(parsed) ||
    parsed.version !== STATE_FILE_VERSION ||
    !isPlainObject(parsed.syncPairs)
  ) {
    console.warn(
      `[sync-state] State file ${stateFilePath} has invalid structure. Starting fresh.`
    );
    return createEmptyState();
  }

  const state = createEmptyState();
  for (const [key, rawScope] of Object.entries(parsed.syncPairs)) {
    if (!isPlainObject(rawScope)) {
      console.warn(`[sync-state] Dropping invalid scope "${key}"`);
      continue;
    }
    state.syncPairs[key] = parseScope(key, rawScope);
  }
  return state;
}

function parseScope(key: string, raw: Record<string, unknown>): SyncPairScope {
  const scope: SyncPairScope = {
    lastSync: typeof raw.lastSync === "string" ? raw.lastSync : null,
    records: {},
  };
  const records = isPlainObject(raw.records) ? raw.records : {};
  for (const [baseId, rawRecord] of Object.entries(records)) {
    const record = parseSyncRecord(rawRecord);
    if (record) {
      scope.records[baseId] = record;
    } else {
      console.warn(`[sync-state] Dropping invalid record "${baseId}" in scope "${key}"`);
    }
  }
  return scope;
}

const EXECUTABLE_ACTIONS: readonly ExecutableAction[] = [
  "source-to-target",
  "target-to-source",
  "delete-target",
  "delete-source",
];

function parseSyncRecord(raw: unknown): SyncRecord | undefined {
  if (!isPlainObject(raw)) return undefined;

  const lastSourceMtime = optionalMtime(raw.lastSourceMtime);
  const lastTargetMtime = optionalMtime(raw.lastTargetMtime);
  const lastAction = EXECUTABLE_ACTIONS.find((action) => action === raw.lastAction);
  if (
    lastSourceMtime === undefined ||
    lastTargetMtime === undefined ||
    lastAction === undefined ||
    typeof raw.lastSyncTime !== "string"
  ) {
    return undefined;
  }

  return { lastSourceMtime, lastTargetMtime, lastAction, lastSyncTime: raw.lastSyncTime };
}

/** A stored mtime: a finite number, or null/absent. `undefined` means invalid. */
function optionalMtime(value: unknown): number | null | undefined {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" && Number.isFinite(value)) return value;
  return undefined;
}

/**
 * Save sync state to a JSON file atomically.
 *
 * Writes to a temporary file first, then renames to the target path.
 * This prevents corruption if the process is interrupted during write.
 *
 * @param stateFilePath - Path to the state JSON file
 * @param state - The state to save
 */
export async function saveState(
  stateFilePath: string,
  state: SyncStateFile
): Promise<void> {
  // Ensure directory exists
  const dir = path.dirname(stateFilePath);
  await fs.mkdir(dir, { recursive: true });

  // Write to temp file first for atomic operation
  const tempPath = `${stateFilePath}.tmp`;
  const content = JSON.stringify(state, null, 2);

  await fs.writeFile(tempPath, content, "utf-8");

  // Rename is atomic on most filesystems
  await fs.rename(tempPath, stateFilePath);
}

// =============================================================================
// Scoped store
// =============================================================================

/**
 * Sync history for one directory pair, backed by a shared state file.
 *
 * The store is constructed explicitly and handed to the engine; nothing
 * about it is global. Other scopes in the same file are carried through
 * untouched on save.
 *
 * @example
 * ```ts
 * const store = new SyncStateStore("~/.agent_sync_state.json", ".claude/agents", ".github/agents");
 * await store.load();
 * store.get("planner"); // { lastSourceMtime, lastTargetMtime, ... } | undefined
 * ```
 */
export class SyncStateStore {
  readonly stateFile: string;
  readonly scopeKey: string;

  private state: SyncStateFile = createEmptyState();
  private loaded = false;

  constructor(stateFile: string, sourceDir: string, targetDir: string) {
    this.stateFile = stateFile;
    this.scopeKey = scopeKey(sourceDir, targetDir);
  }

  /** Reads the state file once; later calls are no-ops. */
  async load(): Promise<void> {
    if (this.loaded) return;
    this.state = await loadState(this.stateFile);
    this.loaded = true;
  }

  /** A copy of the stored record, so callers can't mutate the store. */
  get(baseId: string): SyncRecord | undefined {
    const record = this.state.syncPairs[this.scopeKey]?.records[baseId];
    return record ? { ...record } : undefined;
  }

  put(baseId: string, record: SyncRecord): void {
    this.scope().records[baseId] = { ...record };
  }

  remove(baseId: string): void {
    const scope = this.state.syncPairs[this.scopeKey];
    if (scope) {
      delete scope.records[baseId];
    }
  }

  /** Base ids recorded in this scope, sorted. */
  listBaseIds(): string[] {
    return Object.keys(this.state.syncPairs[this.scopeKey]?.records ?? {}).sort();
  }

  /** ISO time of the last run that saved this scope, if any. */
  get lastSync(): string | null {
    return this.state.syncPairs[this.scopeKey]?.lastSync ?? null;
  }

  /**
   * Stamps the scope with the current time and writes the whole file
   * atomically. If the store was never loaded, the file's other scopes are
   * read first so they survive the write.
   */
  async save(now: Date = new Date()): Promise<void> {
    if (!this.loaded) {
      const pending = this.scope();
      await this.load();
      this.state.syncPairs[this.scopeKey] = pending;
    }
    this.scope().lastSync = now.toISOString();
    await saveState(this.stateFile, this.state);
  }

  private scope(): SyncPairScope {
    let scope = this.state.syncPairs[this.scopeKey];
    if (!scope) {
      scope = { lastSync: null, records: {} };
      this.state.syncPairs[this.scopeKey] = scope;
    }
    return scope;
  }
}
