/**
 * agent-config-sync
 *
 * Bidirectional sync of AI coding assistant configuration (agents,
 * permissions, slash commands) between tool formats such as Claude Code
 * and GitHub Copilot.
 *
 * @packageDocumentation
 */

// =============================================================================
// Core Sync Functions
// =============================================================================

/**
 * Main sync function: reconcile two directories
 */
export { syncDirectories, resolveAdapter, type SyncOptions } from "./sync/engine.js";

/**
 * Single-file conversion
 */
export {
  convertFile,
  detectConfigType,
  type ConvertFileOptions,
  type ConvertFileResult,
} from "./sync/convert.js";

// =============================================================================
// Sync Building Blocks (for custom pipelines)
// =============================================================================

export { locateRecordPairs, LocationError, type LocateOptions } from "./sync/locator.js";

export {
  decide,
  allowsSourceToTarget,
  allowsTargetToSource,
  type SyncDecision,
} from "./sync/decide.js";

export {
  newestWinsResolver,
  skipResolver,
  resolveConflict,
  toConflictRequest,
  type ConflictRequest,
  type ConflictResolver,
  type ConflictResolution,
} from "./sync/conflict.js";

export { SyncExecutor, createEmptyStatistics, type ExecutorOptions } from "./sync/executor.js";

/**
 * Channels for embedding a run in a UI with its own event loop
 */
export {
  createSyncChannels,
  type SyncChannels,
  type LogChannel,
  type ConflictChannel,
  type PendingConflict,
} from "./sync/channels.js";

// =============================================================================
// Sync State Management
// =============================================================================

export {
  SyncStateStore,
  loadState,
  saveState,
  createEmptyState,
  scopeKey,
  defaultStateFilePath,
  STATE_FILE_VERSION,
  STATE_FILE_ENV,
} from "./sync/state.js";

// =============================================================================
// Formats
// =============================================================================

export { FormatRegistry, FormatRegistryError, createDefaultRegistry } from "./registry.js";

export { AdapterError, BaseFormatAdapter, type FormatAdapter } from "./adapters/types.js";
export { ClaudeAdapter } from "./adapters/claude.js";
export { CopilotAdapter, toCanonicalModel, toDisplayModel } from "./adapters/copilot.js";

export {
  extractFrontmatter,
  parseFrontmatterDocument,
  renderFrontmatterDocument,
  type FrontmatterDocument,
} from "./parser/frontmatter.js";

// =============================================================================
// Canonical Records
// =============================================================================

export {
  CONFIG_TYPES,
  isConfigType,
  createCanonicalAgent,
  createCanonicalPermission,
  createCanonicalSlashCommand,
  getMetadata,
  hasMetadata,
  setMetadata,
  foreignMetadataFields,
  type ConfigType,
  type CanonicalAgent,
  type CanonicalPermission,
  type CanonicalSlashCommand,
  type CanonicalRecord,
  type FormatMetadata,
} from "./canonical/models.js";

// =============================================================================
// CLI (for embedding)
// =============================================================================

export { runCli, type CliDeps } from "./cli/run.js";
export { CliUsageError } from "./cli/args.js";

// =============================================================================
// Core Types
// =============================================================================

export type {
  // Sync configuration and results
  SyncConfig,
  SyncDirection,
  SyncAction,
  ExecutableAction,
  ConflictChoice,
  ConversionOptions,
  SyncLogger,
  SyncResult,
  PairOutcome,
  RunStatistics,
  SyncError,
  // Pairs and state
  RecordPair,
  SyncRecord,
  SyncPairScope,
  SyncStateFile,
} from "./types.js";
