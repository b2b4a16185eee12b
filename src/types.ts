/**
 * Core types for the sync engine.
 */

import type { ConfigType } from "./canonical/models.js";

/**
 * Which propagation directions a run is allowed to perform.
 */
export type SyncDirection = "both" | "source-to-target" | "target-to-source";

/**
 * Every outcome the decision engine can propose for a record pair.
 */
export type SyncAction =
  | "source-to-target"
  | "target-to-source"
  | "delete-target"
  | "delete-source"
  | "conflict"
  | "skip";

/** An action the executor can apply (conflicts must be resolved first). */
export type ExecutableAction = Exclude<SyncAction, "conflict" | "skip">;

/** What a conflict resolver may answer. */
export type ConflictChoice = "source-to-target" | "target-to-source" | "skip";

/** Receives one line of engine output. */
export type SyncLogger = (message: string) => void;

/**
 * Options forwarded to adapters when they render a record.
 */
export interface ConversionOptions {
  /** [copilot] Copy the description into `argument-hint` when none is preserved */
  addArgumentHint?: boolean;
  /** [copilot] Add a placeholder `handoffs` entry when none is preserved */
  addHandoffs?: boolean;
}

export interface SyncConfig {
  /** Directory holding the source-format records */
  sourceDir: string;
  /** Directory holding the target-format records (created lazily) */
  targetDir: string;
  /** Registered format name of the source side (e.g., "claude") */
  sourceFormat: string;
  /** Registered format name of the target side (e.g., "copilot") */
  targetFormat: string;
  /** Kind of configuration record being synced */
  configType: ConfigType;
  /** Allowed propagation directions */
  direction: SyncDirection;
  /** Log and count actions without touching files or state */
  dryRun: boolean;
  /** Resolve conflicts automatically (newest wins) */
  force: boolean;
  /** Log skipped pairs as well */
  verbose: boolean;
  /** Path to sync state file */
  stateFile: string;
  /** Adapter rendering options */
  conversionOptions: ConversionOptions;
}

// =============================================================================
// Record Pairs and Sync State
// =============================================================================

/**
 * One logical record as it may exist on each side.
 * At least one of `sourcePath` / `targetPath` is always set.
 */
export interface RecordPair {
  /** Identifier shared by both sides (file name minus the format suffix) */
  baseId: string;
  sourcePath?: string;
  targetPath?: string;
  /** mtime in ms since the epoch, set iff `sourcePath` is */
  sourceMtime?: number;
  /** mtime in ms since the epoch, set iff `targetPath` is */
  targetMtime?: number;
}

/**
 * Timestamps observed when a pair was last synced successfully.
 */
export interface SyncRecord {
  lastSourceMtime: number | null;
  lastTargetMtime: number | null;
  lastAction: ExecutableAction;
  /** ISO timestamp of the sync */
  lastSyncTime: string;
}

/**
 * Records for one (source dir, target dir) combination.
 */
export interface SyncPairScope {
  /** ISO timestamp of the last run that saved this scope */
  lastSync: string | null;
  records: Record<string, SyncRecord>;
}

/**
 * Sync state file format.
 */
export interface SyncStateFile {
  /** Schema version for future migrations */
  version: number;
  /** Scopes keyed by `"<abs source>|<abs target>"` */
  syncPairs: Record<string, SyncPairScope>;
}

// =============================================================================
// Run Results
// =============================================================================

/**
 * Per-invocation counters. Not persisted.
 */
export interface RunStatistics {
  sourceToTarget: number;
  targetToSource: number;
  deletedOnTarget: number;
  deletedOnSource: number;
  conflicts: number;
  skipped: number;
  errors: number;
}

export interface PairOutcome {
  baseId: string;
  /** The action finally taken ("skip" when nothing was done) */
  action: Exclude<SyncAction, "conflict">;
  reason: string;
  /** True when the decision engine reported a conflict for this pair */
  conflict: boolean;
  status: "applied" | "skipped" | "failed";
}

export interface SyncError {
  baseId?: string;
  message: string;
  cause?: unknown;
}

export interface SyncResult {
  dryRun: boolean;
  stats: RunStatistics;
  /** One entry per pair, in processing order */
  outcomes: PairOutcome[];
  errors: SyncError[];
}
