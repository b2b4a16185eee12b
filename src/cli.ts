#!/usr/bin/env node

/**
 * CLI entry point for agent-config-sync.
 *
 * Commands:
 * - `sync` to reconcile a source and a target directory
 * - `convert` to convert a single file
 * - `status` to show stored sync state
 * - `formats` to list registered formats
 *
 * Configuration via environment variables:
 * - AGENT_SYNC_STATE_FILE (optional): state file used when --state-file is not given
 */

import { runCli } from "./cli/run.js";

async function main(): Promise<void> {
  // Skip node and script path
  const exitCode = await runCli(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((error) => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
