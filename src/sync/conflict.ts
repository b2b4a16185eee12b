/**
 * Conflict resolution.
 *
 * A conflict means both sides changed since the last sync. The engine does
 * not merge content; it asks a resolver which whole file wins. Resolvers are
 * plain functions so that forced runs, terminal prompts, tests and embedding
 * UIs all go through the same code path.
 */

import type { ConflictChoice, RecordPair, SyncDirection } from "../types.js";
import { allowsSourceToTarget, allowsTargetToSource, DIRECTION_EXCLUDED } from "./decide.js";

/**
 * What a resolver is shown for one conflicting pair.
 */
export interface ConflictRequest {
  baseId: string;
  sourcePath: string;
  targetPath: string;
  /** mtime in ms since the epoch */
  sourceMtime: number;
  targetMtime: number;
}

export type ConflictResolver = (
  request: ConflictRequest
) => ConflictChoice | Promise<ConflictChoice>;

export interface ConflictResolution {
  choice: ConflictChoice;
  reason: string;
}

/**
 * Picks the side with the strictly newer mtime. A tie skips.
 */
export const newestWinsResolver: ConflictResolver = (request) => {
  if (request.sourceMtime > request.targetMtime) return "source-to-target";
  if (request.targetMtime > request.sourceMtime) return "target-to-source";
  return "skip";
};

/**
 * Resolver that never chooses. Used for non-interactive runs without
 * `--force`: conflicts are skipped and reported.
 */
export const skipResolver: ConflictResolver = () => "skip";

/**
 * Builds the request for a pair the decision engine flagged as conflicting.
 * Returns `undefined` if the pair lacks either side, which a conflict never does.
 */
export function toConflictRequest(pair: RecordPair): ConflictRequest | undefined {
  if (
    pair.sourcePath === undefined ||
    pair.targetPath === undefined ||
    pair.sourceMtime === undefined ||
    pair.targetMtime === undefined
  ) {
    return undefined;
  }
  return {
    baseId: pair.baseId,
    sourcePath: pair.sourcePath,
    targetPath: pair.targetPath,
    sourceMtime: pair.sourceMtime,
    targetMtime: pair.targetMtime,
  };
}

/**
 * Asks `resolver` for a choice and applies the direction gate: a choice
 * the direction excludes is downgraded to skip.
 */
export async function resolveConflict(
  request: ConflictRequest,
  resolver: ConflictResolver,
  direction: SyncDirection
): Promise<ConflictResolution> {
  const choice = await resolver(request);

  switch (choice) {
    case "source-to-target":
      if (!allowsSourceToTarget(direction)) {
        return { choice: "skip", reason: `Conflict resolved source-to-target (${DIRECTION_EXCLUDED})` };
      }
      return { choice, reason: "Conflict resolved: keep source" };
    case "target-to-source":
      if (!allowsTargetToSource(direction)) {
        return { choice: "skip", reason: `Conflict resolved target-to-source (${DIRECTION_EXCLUDED})` };
      }
      return { choice, reason: "Conflict resolved: keep target" };
    case "skip":
      return { choice, reason: "Conflict skipped" };
    default:
      // Reachable from untyped callers such as a UI bridge
      throw new Error(`Unknown conflict choice: ${String(choice)}`);
  }
}

export function isConflictChoice(value: unknown): value is ConflictChoice {
  return value === "source-to-target" || value === "target-to-source" || value === "skip";
}
