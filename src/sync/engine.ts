/**
 * Sync engine: bidirectional record sync orchestration.
 *
 * Implements the pipeline for one directory pair:
 * 1. Resolve both adapters from the registry
 * 2. Load sync state for the directory pair
 * 3. Locate record pairs on both sides
 * 4. For each pair, in base id order: decide, resolve conflicts, execute
 * 5. Drop state for records gone from both sides
 * 6. Save state (live runs only) and return a summary
 */

import type { ConfigType } from "../canonical/models.js";
import type { FormatAdapter } from "../adapters/types.js";
import { createDefaultRegistry, FormatRegistryError, type FormatRegistry } from "../registry.js";
import type { RecordPair, SyncConfig, SyncLogger, SyncResult } from "../types.js";
import {
  newestWinsResolver,
  resolveConflict,
  skipResolver,
  toConflictRequest,
  type ConflictResolution,
  type ConflictResolver,
} from "./conflict.js";
import { decide } from "./decide.js";
import { SyncExecutor } from "./executor.js";
import { locateRecordPairs } from "./locator.js";
import { SyncStateStore } from "./state.js";

/**
 * Options for the sync operation.
 */
export interface SyncOptions {
  /** Adapter lookup; defaults to the built-in Claude and Copilot adapters */
  registry?: FormatRegistry;
  /** State store; defaults to one over `config.stateFile` */
  store?: SyncStateStore;
  /** Line sink; defaults to `console.log` */
  log?: SyncLogger;
  /**
   * Asked for every conflict unless `config.force` is set (which means
   * newest wins). Without one, conflicts are skipped.
   */
  resolveConflict?: ConflictResolver;
  /** If true, suppress all engine output */
  quiet?: boolean;
  /** Clock for state timestamps; injectable for tests */
  now?: () => Date;
}

/**
 * Syncs the records of two directories.
 *
 * Pairs are processed one at a time, each awaited before the next, so runs
 * over the same filesystem log in the same order. Per-pair failures are
 * collected in the result; setup failures are thrown.
 *
 * @throws FormatRegistryError for an unknown format or an unsupported config type
 * @throws LocationError for a missing source directory or a non-directory path
 *
 * @example
 * ```ts
 * const result = await syncDirectories({
 *   sourceDir: ".claude/agents",
 *   targetDir: ".github/agents",
 *   sourceFormat: "claude",
 *   targetFormat: "copilot",
 *   configType: "agent",
 *   direction: "both",
 *   dryRun: false,
 *   force: true,
 *   verbose: false,
 *   stateFile: defaultStateFilePath(),
 *   conversionOptions: {},
 * });
 *
 * console.log(`${result.stats.sourceToTarget} records copied to target`);
 * ```
 */
export async function syncDirectories(
  config: SyncConfig,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const log: SyncLogger = options.quiet ? () => {} : options.log ?? ((message) => console.log(message));
  const registry = options.registry ?? createDefaultRegistry();

  const sourceAdapter = resolveAdapter(registry, config.sourceFormat, config.configType);
  const targetAdapter = resolveAdapter(registry, config.targetFormat, config.configType);

  const store =
    options.store ?? new SyncStateStore(config.stateFile, config.sourceDir, config.targetDir);
  await store.load();

  const resolver = config.force
    ? newestWinsResolver
    : options.resolveConflict ?? skipResolver;

  log(
    `[sync] ${config.sourceFormat} ${config.sourceDir} ⇄ ${config.targetFormat} ${config.targetDir} ` +
      `(${config.configType}, direction: ${config.direction})`
  );

  const pairs = await locateRecordPairs({
    sourceDir: config.sourceDir,
    targetDir: config.targetDir,
    sourceAdapter,
    targetAdapter,
    configType: config.configType,
  });
  if (config.verbose) {
    log(`[sync] Found ${pairs.length} record pair(s)`);
  }

  const executor = new SyncExecutor({
    sourceDir: config.sourceDir,
    targetDir: config.targetDir,
    sourceAdapter,
    targetAdapter,
    configType: config.configType,
    dryRun: config.dryRun,
    conversionOptions: config.conversionOptions,
    store,
    log,
    verbose: config.verbose,
    now: options.now,
  });

  for (const pair of pairs) {
    await syncPair(pair, { config, store, executor, resolver, log });
  }

  // Records gone from both sides leave nothing to decide on; forget them
  const present = new Set(pairs.map((pair) => pair.baseId));
  for (const baseId of store.listBaseIds()) {
    if (present.has(baseId)) continue;
    if (config.verbose) {
      log(`[sync] ${baseId}: forgetting state (missing on both sides)`);
    }
    if (!config.dryRun) {
      store.remove(baseId);
    }
  }

  if (!config.dryRun) {
    await store.save(options.now ? options.now() : new Date());
  }

  const result = executor.result();
  const { stats } = result;
  log(
    `[sync] Complete: ${stats.sourceToTarget} source → target, ${stats.targetToSource} target → source, ` +
      `${stats.deletedOnTarget + stats.deletedOnSource} deleted, ${stats.conflicts} conflicts, ` +
      `${stats.skipped} skipped, ${stats.errors} errors`
  );
  return result;
}

interface PairContext {
  config: SyncConfig;
  store: SyncStateStore;
  executor: SyncExecutor;
  resolver: ConflictResolver;
  log: SyncLogger;
}

async function syncPair(pair: RecordPair, ctx: PairContext): Promise<void> {
  const { config, store, executor, resolver, log } = ctx;
  const decision = decide(pair, store.get(pair.baseId), config.direction);

  switch (decision.action) {
    case "skip":
      executor.skip(pair, decision.reason);
      return;

    case "conflict": {
      executor.countConflict();
      log(`[sync] ${pair.baseId}: conflict (${decision.reason})`);

      const request = toConflictRequest(pair);
      if (!request) {
        executor.fail(pair, "Conflict reported for a record missing on one side");
        return;
      }

      let resolution: ConflictResolution;
      try {
        resolution = await resolveConflict(request, resolver, config.direction);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        executor.fail(pair, `Conflict resolution failed: ${message}`, error);
        return;
      }

      if (resolution.choice === "skip") {
        executor.skip(pair, resolution.reason, true);
        return;
      }
      await executor.execute(pair, resolution.choice, resolution.reason, true);
      return;
    }

    default:
      await executor.execute(pair, decision.action, decision.reason);
  }
}

/**
 * Looks up an adapter and checks that it handles `configType`.
 */
export function resolveAdapter(
  registry: FormatRegistry,
  formatName: string,
  configType: ConfigType
): FormatAdapter {
  const adapter = registry.requireAdapter(formatName);
  if (!adapter.supportedConfigTypes.includes(configType)) {
    throw new FormatRegistryError(
      `Format '${formatName}' does not support config type '${configType}'`
    );
  }
  return adapter;
}
