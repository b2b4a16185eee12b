/**
 * Applies resolved sync actions.
 *
 * The executor is the error boundary for per-pair work: a failure while
 * converting, writing or deleting one pair is logged, counted and recorded,
 * and the run moves on to the next pair. It also owns the run statistics
 * and is the only writer of the state store during a run.
 */

import * as path from "node:path";
import type { ConfigType } from "../canonical/models.js";
import type { FormatAdapter } from "../adapters/types.js";
import type {
  ConversionOptions,
  ExecutableAction,
  PairOutcome,
  RecordPair,
  RunStatistics,
  SyncError,
  SyncLogger,
  SyncResult,
} from "../types.js";
import { deleteFile, readMtime } from "./file-writer.js";
import type { SyncStateStore } from "./state.js";

export interface ExecutorOptions {
  sourceDir: string;
  targetDir: string;
  sourceAdapter: FormatAdapter;
  targetAdapter: FormatAdapter;
  configType: ConfigType;
  /** Convert and log, but write, delete and record nothing */
  dryRun: boolean;
  conversionOptions?: ConversionOptions;
  store: SyncStateStore;
  log: SyncLogger;
  /** Log skipped pairs */
  verbose?: boolean;
  /** Clock for `lastSyncTime`; injectable for tests */
  now?: () => Date;
}

/** One side of a pair, oriented for a propagation */
interface Side {
  dir: string;
  adapter: FormatAdapter;
  filePath: string | undefined;
}

export function createEmptyStatistics(): RunStatistics {
  return {
    sourceToTarget: 0,
    targetToSource: 0,
    deletedOnTarget: 0,
    deletedOnSource: 0,
    conflicts: 0,
    skipped: 0,
    errors: 0,
  };
}

const ACTION_LABELS: Record<ExecutableAction, string> = {
  "source-to-target": "source → target",
  "target-to-source": "target → source",
  "delete-target": "delete on target",
  "delete-source": "delete on source",
};

const STAT_KEYS: Record<ExecutableAction, keyof RunStatistics> = {
  "source-to-target": "sourceToTarget",
  "target-to-source": "targetToSource",
  "delete-target": "deletedOnTarget",
  "delete-source": "deletedOnSource",
};

export class SyncExecutor {
  readonly stats: RunStatistics = createEmptyStatistics();
  readonly outcomes: PairOutcome[] = [];
  readonly errors: SyncError[] = [];

  private readonly options: ExecutorOptions;

  constructor(options: ExecutorOptions) {
    this.options = options;
  }

  /**
   * Applies one action. Never throws for per-pair failures.
   *
   * @param conflict - Whether the action came out of conflict resolution
   */
  async execute(
    pair: RecordPair,
    action: ExecutableAction,
    reason: string,
    conflict = false
  ): Promise<PairOutcome> {
    const { log } = this.options;
    log(`[sync] ${pair.baseId}: ${ACTION_LABELS[action]} (${reason})`);

    try {
      if (action === "delete-target" || action === "delete-source") {
        await this.delete(pair, action);
      } else {
        await this.propagate(pair, action);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log(`[sync] ${pair.baseId}: error: ${message}`);
      this.stats.errors++;
      this.errors.push({ baseId: pair.baseId, message, cause: error });
      return this.record({ baseId: pair.baseId, action, reason, conflict, status: "failed" });
    }

    this.stats[STAT_KEYS[action]]++;
    return this.record({ baseId: pair.baseId, action, reason, conflict, status: "applied" });
  }

  /** Counts a skip; logged only when verbose. */
  skip(pair: RecordPair, reason: string, conflict = false): PairOutcome {
    if (this.options.verbose) {
      this.options.log(`[sync] ${pair.baseId}: skip (${reason})`);
    }
    this.stats.skipped++;
    return this.record({ baseId: pair.baseId, action: "skip", reason, conflict, status: "skipped" });
  }

  countConflict(): void {
    this.stats.conflicts++;
  }

  /** Counts a failure outside any single action, e.g. a resolver that threw. */
  fail(pair: RecordPair, message: string, cause?: unknown): PairOutcome {
    this.options.log(`[sync] ${pair.baseId}: error: ${message}`);
    this.stats.errors++;
    this.errors.push({ baseId: pair.baseId, message, cause });
    return this.record({
      baseId: pair.baseId,
      action: "skip",
      reason: message,
      conflict: true,
      status: "failed",
    });
  }

  result(): SyncResult {
    return {
      dryRun: this.options.dryRun,
      stats: { ...this.stats },
      outcomes: [...this.outcomes],
      errors: [...this.errors],
    };
  }

  private record(outcome: PairOutcome): PairOutcome {
    this.outcomes.push(outcome);
    return outcome;
  }

  private async propagate(
    pair: RecordPair,
    action: "source-to-target" | "target-to-source"
  ): Promise<void> {
    const { configType, dryRun, conversionOptions, store } = this.options;
    const source: Side = {
      dir: this.options.sourceDir,
      adapter: this.options.sourceAdapter,
      filePath: pair.sourcePath,
    };
    const target: Side = {
      dir: this.options.targetDir,
      adapter: this.options.targetAdapter,
      filePath: pair.targetPath,
    };
    const [from, to] = action === "source-to-target" ? [source, target] : [target, source];

    if (from.filePath === undefined) {
      throw new Error(`Nothing to copy: ${pair.baseId} is missing on the ${action === "source-to-target" ? "source" : "target"} side`);
    }

    const record = await from.adapter.read(from.filePath, configType);
    this.logWarnings(pair, from.adapter.getConversionWarnings());

    const destination =
      to.filePath ?? path.join(to.dir, `${pair.baseId}${to.adapter.getFileExtension(configType)}`);

    if (dryRun) {
      // Render anyway so dry runs report the same warnings and failures
      to.adapter.fromCanonical(record, configType, conversionOptions);
      this.logWarnings(pair, to.adapter.getConversionWarnings());
      return;
    }

    await to.adapter.write(record, destination, configType, conversionOptions);
    this.logWarnings(pair, to.adapter.getConversionWarnings());

    const sourcePath = action === "source-to-target" ? from.filePath : destination;
    const targetPath = action === "source-to-target" ? destination : from.filePath;
    store.put(pair.baseId, {
      lastSourceMtime: (await readMtime(sourcePath)) ?? null,
      lastTargetMtime: (await readMtime(targetPath)) ?? null,
      lastAction: action,
      lastSyncTime: this.now().toISOString(),
    });
  }

  private async delete(pair: RecordPair, action: "delete-target" | "delete-source"): Promise<void> {
    const filePath = action === "delete-target" ? pair.targetPath : pair.sourcePath;
    if (this.options.dryRun) return;

    if (filePath !== undefined) {
      await deleteFile(filePath);
    }
    this.options.store.remove(pair.baseId);
  }

  private logWarnings(pair: RecordPair, warnings: string[]): void {
    for (const warning of warnings) {
      this.options.log(`[sync] ${pair.baseId}: warning: ${warning}`);
    }
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }
}
