/**
 * Message channels between a running sync and a display surface.
 *
 * A UI with its own event loop (a desktop shell, an editor panel, a web
 * socket) should not hand the engine callbacks that touch its state.
 * Instead it passes `logger` and `resolver` to the engine and consumes two
 * one-way channels:
 *
 * - `log`: lines from the engine, in order
 * - `conflicts`: resolution requests out, choices back in
 *
 * @example
 * ```ts
 * const channels = createSyncChannels();
 * const run = syncDirectories(config, {
 *   log: channels.logger,
 *   resolveConflict: channels.resolver,
 * });
 *
 * const request = await channels.conflicts.nextRequest();
 * channels.conflicts.respond(request.id, "source-to-target");
 * await run;
 * ```
 */

import type { ConflictChoice, SyncLogger } from "../types.js";
import { isConflictChoice, type ConflictRequest, type ConflictResolver } from "./conflict.js";

/**
 * Unbounded FIFO with an awaitable `next()`.
 */
class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T) => void> = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  next(): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }
}

export interface LogChannel {
  /** Returns and clears every queued line */
  drain(): string[];
  /** Waits for the next line */
  next(): Promise<string>;
}

/** A conflict waiting for an answer; `id` is unique per channel set. */
export interface PendingConflict extends ConflictRequest {
  id: number;
}

export interface ConflictChannel {
  /** Waits for the next request that is still unanswered */
  nextRequest(): Promise<PendingConflict>;
  /**
   * Answers a pending request, resuming the engine.
   * @throws Error if no pending request has this id
   */
  respond(id: number, choice: ConflictChoice): void;
  /** Unanswered requests, oldest first */
  pending(): PendingConflict[];
}

export interface SyncChannels {
  log: LogChannel;
  conflicts: ConflictChannel;
  /** Engine-side end of the log channel */
  logger: SyncLogger;
  /** Engine-side end of the conflict channel */
  resolver: ConflictResolver;
}

export function createSyncChannels(): SyncChannels {
  const lines = new AsyncQueue<string>();
  const requests = new AsyncQueue<PendingConflict>();
  const open = new Map<number, { request: PendingConflict; settle: (choice: ConflictChoice) => void }>();
  let nextId = 1;

  const conflicts: ConflictChannel = {
    async nextRequest() {
      for (;;) {
        const request = await requests.next();
        // Skip requests answered through pending() before they were taken
        if (open.has(request.id)) {
          return request;
        }
      }
    },
    respond(id, choice) {
      const entry = open.get(id);
      if (!entry) {
        throw new Error(`No pending conflict with id ${id}`);
      }
      if (!isConflictChoice(choice)) {
        throw new Error(`Unknown conflict choice: ${String(choice)}`);
      }
      open.delete(id);
      entry.settle(choice);
    },
    pending() {
      return [...open.values()].map((entry) => entry.request);
    },
  };

  return {
    log: {
      drain: () => lines.drain(),
      next: () => lines.next(),
    },
    conflicts,
    logger: (message) => lines.push(message),
    resolver: (request) =>
      new Promise<ConflictChoice>((settle) => {
        const pending: PendingConflict = { ...request, id: nextId++ };
        open.set(pending.id, { request: pending, settle });
        requests.push(pending);
      }),
  };
}
