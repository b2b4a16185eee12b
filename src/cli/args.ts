/**
 * Command-line argument parsing.
 */

import { CONFIG_TYPES, isConfigType, type ConfigType } from "../canonical/models.js";
import type { SyncDirection } from "../types.js";

/**
 * Error thrown for invalid or missing command-line arguments.
 * The CLI prints it with a hint to run `--help` and exits with 1.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type CliCommand = "sync" | "convert" | "status" | "formats";

const COMMANDS: readonly CliCommand[] = ["sync", "convert", "status", "formats"];

const DIRECTIONS: readonly SyncDirection[] = ["both", "source-to-target", "target-to-source"];

export interface CliArgs {
  command: CliCommand | null;
  /** Positional arguments after the command (the input file for `convert`) */
  positionals: string[];
  sourceDir?: string;
  targetDir?: string;
  sourceFormat?: string;
  targetFormat?: string;
  /** Undefined when not given, so `convert` can detect it */
  configType?: ConfigType;
  direction: SyncDirection;
  dryRun: boolean;
  force: boolean;
  verbose: boolean;
  stateFile?: string;
  output?: string;
  addArgumentHint: boolean;
  addHandoffs: boolean;
  help: boolean;
}

type ValueFlag =
  | "sourceDir"
  | "targetDir"
  | "sourceFormat"
  | "targetFormat"
  | "stateFile"
  | "output";

const VALUE_FLAGS: Record<string, ValueFlag> = {
  "--source-dir": "sourceDir",
  "--target-dir": "targetDir",
  "--source-format": "sourceFormat",
  "--target-format": "targetFormat",
  "--state-file": "stateFile",
  "--output": "output",
  "-o": "output",
};

/**
 * Parses `process.argv.slice(2)`.
 *
 * @throws CliUsageError for unknown commands or flags, missing flag values,
 * or invalid `--config-type` / `--direction` values
 *
 * @example
 * ```ts
 * parseArgs(["sync", "--source-dir", "a", "--target-dir", "b", "--dry-run"]);
 * // { command: "sync", sourceDir: "a", targetDir: "b", dryRun: true, ... }
 * ```
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: null,
    positionals: [],
    direction: "both",
    dryRun: false,
    force: false,
    verbose: false,
    addArgumentHint: false,
    addHandoffs: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--dry-run") {
      result.dryRun = true;
    } else if (arg === "--force") {
      result.force = true;
    } else if (arg === "--verbose" || arg === "-v") {
      result.verbose = true;
    } else if (arg === "--add-argument-hint") {
      result.addArgumentHint = true;
    } else if (arg === "--add-handoffs") {
      result.addHandoffs = true;
    } else if (arg === "--config-type") {
      const value = requireValue(args, i, arg);
      if (!isConfigType(value)) {
        throw new CliUsageError(`--config-type must be one of: ${CONFIG_TYPES.join(", ")}`);
      }
      result.configType = value;
      i++; // Skip the value
    } else if (arg === "--direction") {
      const value = requireValue(args, i, arg);
      const direction = DIRECTIONS.find((candidate) => candidate === value);
      if (!direction) {
        throw new CliUsageError(`--direction must be one of: ${DIRECTIONS.join(", ")}`);
      }
      result.direction = direction;
      i++;
    } else if (VALUE_FLAGS[arg] !== undefined) {
      result[VALUE_FLAGS[arg]] = requireValue(args, i, arg);
      i++;
    } else if (arg.startsWith("-")) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else if (result.command === null) {
      const command = COMMANDS.find((candidate) => candidate === arg);
      if (!command) {
        throw new CliUsageError(`Unknown command: ${arg}`);
      }
      result.command = command;
    } else {
      result.positionals.push(arg);
    }
  }

  return result;
}

function requireValue(args: string[], index: number, flag: string): string {
  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith("-")) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return nextArg;
}
