/**
 * CLI command implementations.
 *
 * `runCli` takes the arguments and its I/O as parameters and returns the
 * exit code, so commands run the same under tests as from `cli.ts`.
 */

import * as os from "node:os";
import * as path from "node:path";
import { createDefaultRegistry, type FormatRegistry } from "../registry.js";
import { convertFile } from "../sync/convert.js";
import { syncDirectories } from "../sync/engine.js";
import { defaultStateFilePath, SyncStateStore } from "../sync/state.js";
import type { ConflictResolver } from "../sync/conflict.js";
import type { SyncConfig, SyncResult } from "../types.js";
import { CliUsageError, parseArgs, type CliArgs } from "./args.js";
import { createTerminalPrompt, type TerminalPrompt } from "./prompt.js";

export interface CliDeps {
  /** Normal output; defaults to `console.log` */
  stdout?: (line: string) => void;
  /** Error output; defaults to `console.error` */
  stderr?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  /** Whether conflicts can be asked about; defaults to stdin and stdout being TTYs */
  interactive?: boolean;
  createPrompt?: () => TerminalPrompt;
  registry?: FormatRegistry;
}

interface CliContext {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
  registry: FormatRegistry;
  deps: CliDeps;
}

const HELP = `
agent-config-sync - Sync AI coding assistant configuration between tool formats

Usage:
  agent-config-sync <command> [options]

Commands:
  sync      Sync records between a source and a target directory
  convert   Convert a single file to another format
  status    Show the stored sync state for a directory pair
  formats   List registered formats and their config types

Sync options:
  --source-dir <dir>      Directory holding the source-format records (required)
  --target-dir <dir>      Directory holding the target-format records (required)
  --source-format <fmt>   Source format, e.g. claude (required)
  --target-format <fmt>   Target format, e.g. copilot (required)
  --config-type <type>    agent, permission or slash-command (default: agent)
  --direction <dir>       both, source-to-target or target-to-source (default: both)
  --dry-run               Show what would be done without changing anything
  --force                 Resolve conflicts automatically (newest file wins)
  --verbose, -v           Also log skipped records
  --state-file <path>     State file (default: $AGENT_SYNC_STATE_FILE or ~/.agent_sync_state.json)
  --add-argument-hint     [copilot] Add argument-hint from the description
  --add-handoffs          [copilot] Add a placeholder handoffs entry

Convert options:
  convert <file> --target-format <fmt> [--source-format <fmt>] [--config-type <type>]
                 [--output, -o <path>] [--dry-run]

Status options:
  status --source-dir <dir> --target-dir <dir> [--state-file <path>]

Other:
  --help, -h              Show this help message

Examples:
  agent-config-sync sync --source-dir ~/.claude/agents --target-dir .github/agents \\
                         --source-format claude --target-format copilot
  agent-config-sync sync --source-dir .claude/commands --target-dir .github/prompts \\
                         --source-format claude --target-format copilot \\
                         --config-type slash-command --dry-run
  agent-config-sync convert .claude/agents/planner.md --target-format copilot
  agent-config-sync status --source-dir ~/.claude/agents --target-dir .github/agents
`;

/**
 * Runs one CLI invocation.
 *
 * @param argv - Arguments without the node and script paths
 * @returns The process exit code
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const ctx: CliContext = {
    out: deps.stdout ?? ((line) => console.log(line)),
    err: deps.stderr ?? ((line) => console.error(line)),
    env: deps.env ?? process.env,
    registry: deps.registry ?? createDefaultRegistry(),
    deps,
  };

  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    return reportError(ctx, null, error);
  }

  if (args.help || !args.command) {
    ctx.out(HELP);
    return args.help ? 0 : 1;
  }

  try {
    switch (args.command) {
      case "sync":
        return await runSync(ctx, args);
      case "convert":
        return await runConvert(ctx, args);
      case "status":
        return await runStatus(ctx, args);
      case "formats":
        return runFormats(ctx);
    }
  } catch (error) {
    return reportError(ctx, args.command, error);
  }
}

function reportError(ctx: CliContext, command: string | null, error: unknown): number {
  if (error instanceof CliUsageError) {
    ctx.err(`Error: ${error.message}`);
    ctx.err("Run with --help for usage information.");
    return 1;
  }
  const message = error instanceof Error ? error.message : String(error);
  ctx.err(command ? `${capitalize(command)} failed: ${message}` : `Error: ${message}`);
  return 1;
}

// =============================================================================
// sync
// =============================================================================

/**
 * Builds the run configuration from flags and environment.
 *
 * @throws CliUsageError when a required flag is missing
 */
export function buildSyncConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const { sourceDir, targetDir, sourceFormat, targetFormat } = args;
  if (
    sourceDir === undefined ||
    targetDir === undefined ||
    sourceFormat === undefined ||
    targetFormat === undefined
  ) {
    const missing: string[] = [];
    if (sourceDir === undefined) missing.push("--source-dir");
    if (targetDir === undefined) missing.push("--target-dir");
    if (sourceFormat === undefined) missing.push("--source-format");
    if (targetFormat === undefined) missing.push("--target-format");
    throw new CliUsageError(`Missing required option(s): ${missing.join(", ")}`);
  }

  return {
    sourceDir: expandPath(sourceDir, env),
    targetDir: expandPath(targetDir, env),
    sourceFormat,
    targetFormat,
    configType: args.configType ?? "agent",
    direction: args.direction,
    dryRun: args.dryRun,
    force: args.force,
    verbose: args.verbose,
    stateFile: expandPath(args.stateFile ?? defaultStateFilePath(env), env),
    conversionOptions: {
      addArgumentHint: args.addArgumentHint,
      addHandoffs: args.addHandoffs,
    },
  };
}

/**
 * Whether a run can ever write a Copilot record, which is the only place
 * the Copilot conversion options take effect.
 */
export function writesCopilot(config: SyncConfig): boolean {
  const forward = config.direction !== "target-to-source" && config.targetFormat === "copilot";
  const backward = config.direction !== "source-to-target" && config.sourceFormat === "copilot";
  return forward || backward;
}

async function runSync(ctx: CliContext, args: CliArgs): Promise<number> {
  const config = buildSyncConfig(args, ctx.env);

  if ((args.addArgumentHint || args.addHandoffs) && !writesCopilot(config)) {
    ctx.out(
      "Warning: --add-argument-hint and --add-handoffs only apply when writing copilot records; ignored for this run"
    );
  }

  if (config.dryRun) {
    ctx.out("Dry run: no files or state will be changed");
  }

  const interactive =
    ctx.deps.interactive ?? (process.stdin.isTTY === true && process.stdout.isTTY === true);

  let prompt: TerminalPrompt | undefined;
  let resolveConflict: ConflictResolver | undefined;
  if (!config.force && interactive) {
    prompt = (ctx.deps.createPrompt ?? createTerminalPrompt)();
    resolveConflict = prompt.resolver;
  }

  let result: SyncResult;
  try {
    result = await syncDirectories(config, {
      registry: ctx.registry,
      log: ctx.out,
      resolveConflict,
    });
  } finally {
    prompt?.close();
  }

  printSummary(ctx, result);

  let exitCode = result.errors.length > 0 ? 1 : 0;

  const unresolved = result.outcomes.filter(
    (outcome) => outcome.conflict && outcome.status === "skipped"
  );
  if (unresolved.length > 0 && !config.force && !interactive) {
    ctx.out("");
    ctx.out(`Unresolved conflicts: ${unresolved.length}`);
    for (const outcome of unresolved) {
      ctx.out(`  - ${outcome.baseId}`);
    }
    ctx.out("Rerun with --force (newest wins) or from a terminal to choose.");
    exitCode = 1;
  }

  return exitCode;
}

function printSummary(ctx: CliContext, result: SyncResult): void {
  const { stats } = result;
  ctx.out("");
  ctx.out(result.dryRun ? "Dry run complete (nothing written):" : "Sync complete:");
  ctx.out(`  Source → target: ${stats.sourceToTarget}`);
  ctx.out(`  Target → source: ${stats.targetToSource}`);
  ctx.out(`  Deleted on target: ${stats.deletedOnTarget}`);
  ctx.out(`  Deleted on source: ${stats.deletedOnSource}`);
  ctx.out(`  Conflicts: ${stats.conflicts}`);
  ctx.out(`  Skipped: ${stats.skipped}`);
  ctx.out(`  Errors: ${stats.errors}`);

  for (const error of result.errors) {
    ctx.err(`    - ${error.baseId ? `${error.baseId}: ` : ""}${error.message}`);
  }
}

// =============================================================================
// convert
// =============================================================================

async function runConvert(ctx: CliContext, args: CliArgs): Promise<number> {
  const [inputFile, ...extra] = args.positionals;
  if (inputFile === undefined) {
    throw new CliUsageError("convert requires an input file");
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${extra[0]}`);
  }
  if (args.targetFormat === undefined) {
    throw new CliUsageError("Missing required option(s): --target-format");
  }

  const result = await convertFile({
    inputPath: expandPath(inputFile, ctx.env),
    targetFormat: args.targetFormat,
    sourceFormat: args.sourceFormat,
    configType: args.configType,
    outputPath: args.output === undefined ? undefined : expandPath(args.output, ctx.env),
    dryRun: args.dryRun,
    conversionOptions: {
      addArgumentHint: args.addArgumentHint,
      addHandoffs: args.addHandoffs,
    },
    registry: ctx.registry,
  });

  for (const warning of result.warnings) {
    ctx.err(`[convert] warning: ${warning}`);
  }

  if (args.dryRun) {
    ctx.out(result.content);
  } else {
    ctx.out(
      `[convert] ${inputFile} (${result.sourceFormat}) → ${result.outputPath} (${args.targetFormat})`
    );
  }
  return 0;
}

// =============================================================================
// status
// =============================================================================

async function runStatus(ctx: CliContext, args: CliArgs): Promise<number> {
  if (args.sourceDir === undefined || args.targetDir === undefined) {
    throw new CliUsageError("status requires --source-dir and --target-dir");
  }

  const stateFile = expandPath(args.stateFile ?? defaultStateFilePath(ctx.env), ctx.env);
  const store = new SyncStateStore(
    stateFile,
    expandPath(args.sourceDir, ctx.env),
    expandPath(args.targetDir, ctx.env)
  );
  await store.load();

  const baseIds = store.listBaseIds();
  ctx.out(`State file: ${stateFile}`);
  ctx.out(`Directory pair: ${store.scopeKey}`);
  ctx.out(`Last sync: ${store.lastSync ?? "never"}`);

  if (baseIds.length === 0) {
    ctx.out("No records for this directory pair.");
    return 0;
  }

  ctx.out(`Records: ${baseIds.length}`);
  for (const baseId of baseIds) {
    const record = store.get(baseId);
    if (!record) continue;
    ctx.out(
      `  ${baseId}: ${record.lastAction} at ${record.lastSyncTime} ` +
        `(source mtime ${formatMtime(record.lastSourceMtime)}, target mtime ${formatMtime(record.lastTargetMtime)})`
    );
  }
  return 0;
}

// =============================================================================
// formats
// =============================================================================

function runFormats(ctx: CliContext): number {
  ctx.out("Registered formats:");
  for (const name of ctx.registry.listFormats()) {
    const adapter = ctx.registry.requireAdapter(name);
    const types = adapter.supportedConfigTypes
      .map((type) => `${type} (${adapter.getFileExtension(type)})`)
      .join(", ");
    ctx.out(`  ${name}: ${types}`);
  }
  return 0;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Expands a leading `~` to the home directory and resolves the result.
 *
 * @example
 * ```ts
 * expandPath("~/.claude/agents"); // "/home/me/.claude/agents"
 * ```
 */
export function expandPath(input: string, env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME ?? os.homedir();
  if (input === "~") {
    return home;
  }
  if (input.startsWith("~/")) {
    return path.join(home, input.slice(2));
  }
  return path.resolve(input);
}

function formatMtime(mtime: number | null): string {
  return mtime === null ? "none" : new Date(mtime).toISOString();
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
