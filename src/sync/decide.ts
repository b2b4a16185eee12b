/**
 * Sync decision logic.
 *
 * Pure: given what exists now, what was observed at the last sync, and the
 * permitted direction, pick one action for a record pair. No I/O.
 */

import type { RecordPair, SyncAction, SyncDirection, SyncRecord } from "../types.js";

export interface SyncDecision {
  action: SyncAction;
  reason: string;
}

export const DIRECTION_EXCLUDED = "direction excludes this propagation";

/**
 * Whether `direction` permits actions that write toward the given side.
 * Deleting on target is a source → target propagation, and vice versa.
 */
export function allowsSourceToTarget(direction: SyncDirection): boolean {
  return direction === "both" || direction === "source-to-target";
}

export function allowsTargetToSource(direction: SyncDirection): boolean {
  return direction === "both" || direction === "target-to-source";
}

/**
 * Decides the action for one record pair.
 *
 * Priority order:
 * 1. A side deleted since the last sync (its stored mtime is set, the file
 *    is gone) → delete on the other side.
 * 2. Exists on one side only → propagate toward the empty side.
 * 3. Both exist, no history → the strictly newer side wins; a tie skips.
 * 4. Both exist with history → changed on both sides is a conflict,
 *    changed on one side propagates it, unchanged skips.
 *
 * Any propagation the direction forbids becomes a skip.
 *
 * @example
 * ```ts
 * decide({ baseId: "foo", sourcePath: "a/foo.md", sourceMtime: 1000 }, undefined, "both");
 * // { action: "source-to-target", reason: "New source record" }
 * ```
 */
export function decide(
  pair: RecordPair,
  stored: SyncRecord | undefined,
  direction: SyncDirection
): SyncDecision {
  const sourceMtime = pair.sourcePath !== undefined ? pair.sourceMtime : undefined;
  const targetMtime = pair.targetPath !== undefined ? pair.targetMtime : undefined;
  const lastSourceMtime = stored?.lastSourceMtime ?? null;
  const lastTargetMtime = stored?.lastTargetMtime ?? null;

  // Deletions first: a missing side that was present at the last sync.
  // The survivor is deleted even if it was edited since; use a one-way
  // direction to keep it.
  if (sourceMtime === undefined && lastSourceMtime !== null) {
    if (targetMtime === undefined) {
      return { action: "skip", reason: "Record deleted on both sides" };
    }
    return gate("delete-target", "Source record deleted", allowsSourceToTarget(direction));
  }
  if (targetMtime === undefined && lastTargetMtime !== null) {
    if (sourceMtime === undefined) {
      return { action: "skip", reason: "Record deleted on both sides" };
    }
    return gate("delete-source", "Target record deleted", allowsTargetToSource(direction));
  }

  if (sourceMtime !== undefined && targetMtime === undefined) {
    return gate("source-to-target", "New source record", allowsSourceToTarget(direction));
  }
  if (targetMtime !== undefined && sourceMtime === undefined) {
    return gate("target-to-source", "New target record", allowsTargetToSource(direction));
  }
  if (sourceMtime === undefined || targetMtime === undefined) {
    return { action: "skip", reason: "Record missing on both sides" };
  }

  if (!stored) {
    if (sourceMtime > targetMtime) {
      return gate(
        "source-to-target",
        "First sync - source is newer",
        allowsSourceToTarget(direction)
      );
    }
    if (targetMtime > sourceMtime) {
      return gate(
        "target-to-source",
        "First sync - target is newer",
        allowsTargetToSource(direction)
      );
    }
    return { action: "skip", reason: "First sync - identical timestamps, no reliable preference" };
  }

  const sourceChanged = lastSourceMtime === null || sourceMtime > lastSourceMtime;
  const targetChanged = lastTargetMtime === null || targetMtime > lastTargetMtime;

  if (sourceChanged && targetChanged) {
    return { action: "conflict", reason: "Both records modified since last sync" };
  }
  if (sourceChanged) {
    return gate(
      "source-to-target",
      "Source modified since last sync",
      allowsSourceToTarget(direction)
    );
  }
  if (targetChanged) {
    return gate(
      "target-to-source",
      "Target modified since last sync",
      allowsTargetToSource(direction)
    );
  }
  return { action: "skip", reason: "No changes detected" };
}

function gate(action: SyncAction, reason: string, allowed: boolean): SyncDecision {
  if (allowed) {
    return { action, reason };
  }
  return { action: "skip", reason: `${reason} (${DIRECTION_EXCLUDED})` };
}
