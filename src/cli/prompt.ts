/**
 * Interactive conflict prompt for terminal sessions.
 */

import * as readline from "node:readline/promises";
import type { ConflictChoice } from "../types.js";
import type { ConflictRequest, ConflictResolver } from "../sync/conflict.js";

/** Asks one question and resolves with the raw answer. */
export type AskFn = (question: string) => Promise<string>;

const CHOICES = new Map<string, ConflictChoice>([
  ["1", "source-to-target"],
  ["2", "target-to-source"],
  ["3", "skip"],
]);

/**
 * Formats the conflict block shown before the question.
 *
 * @example
 * ```
 * Conflict: planner (both sides modified since last sync)
 *   1) Use source: .claude/agents/planner.md (modified 2024-01-02T00:00:00.000Z)
 *   2) Use target: .github/agents/planner.agent.md (modified 2024-01-03T00:00:00.000Z)
 *   3) Skip
 * ```
 */
export function formatConflict(request: ConflictRequest): string[] {
  return [
    `Conflict: ${request.baseId} (both sides modified since last sync)`,
    `  1) Use source: ${request.sourcePath} (modified ${new Date(request.sourceMtime).toISOString()})`,
    `  2) Use target: ${request.targetPath} (modified ${new Date(request.targetMtime).toISOString()})`,
    "  3) Skip",
  ];
}

/**
 * Builds a resolver that asks through `ask` until it gets 1, 2 or 3.
 * If `ask` fails (input closed, Ctrl+D) the conflict is skipped.
 */
export function createPromptResolver(
  ask: AskFn,
  write: (line: string) => void = (line) => console.log(line)
): ConflictResolver {
  return async (request) => {
    for (const line of formatConflict(request)) {
      write(line);
    }

    for (;;) {
      let answer: string;
      try {
        answer = await ask("Choose [1/2/3]: ");
      } catch (error) {
        write(
          `No answer (${error instanceof Error ? error.message : String(error)}); skipping ${request.baseId}`
        );
        return "skip";
      }

      const choice = CHOICES.get(answer.trim());
      if (choice) {
        return choice;
      }
      write("Please enter 1, 2 or 3.");
    }
  };
}

export interface TerminalPrompt {
  resolver: ConflictResolver;
  close(): void;
}

/**
 * Prompt resolver over stdin/stdout. Call `close()` when the run ends so
 * the process can exit.
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): TerminalPrompt {
  const rl = readline.createInterface({ input, output });
  return {
    resolver: createPromptResolver((question) => rl.question(question)),
    close: () => rl.close(),
  };
}
