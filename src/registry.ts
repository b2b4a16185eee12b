/**
 * Format registry.
 *
 * Maps format names to adapters and answers "which format is this file?".
 * Adding a new tool means writing one adapter and registering it here.
 */

import type { ConfigType } from "./canonical/models.js";
import { ClaudeAdapter } from "./adapters/claude.js";
import { CopilotAdapter } from "./adapters/copilot.js";
import type { FormatAdapter } from "./adapters/types.js";

export class FormatRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatRegistryError";
  }
}

export class FormatRegistry {
  private readonly adapters = new Map<string, FormatAdapter>();

  /**
   * @throws FormatRegistryError if an adapter with the same format name exists
   */
  register(adapter: FormatAdapter): void {
    if (this.adapters.has(adapter.formatName)) {
      throw new FormatRegistryError(`Format '${adapter.formatName}' is already registered`);
    }
    this.adapters.set(adapter.formatName, adapter);
  }

  /** Removes an adapter. Unknown names are ignored. */
  unregister(formatName: string): void {
    this.adapters.delete(formatName);
  }

  getAdapter(formatName: string): FormatAdapter | undefined {
    return this.adapters.get(formatName);
  }

  /**
   * Like {@link getAdapter}, but an unknown name is an error that lists the
   * registered formats.
   */
  requireAdapter(formatName: string): FormatAdapter {
    const adapter = this.adapters.get(formatName);
    if (!adapter) {
      const known = this.listFormats().join(", ") || "none";
      throw new FormatRegistryError(`Unknown format '${formatName}' (registered: ${known})`);
    }
    return adapter;
  }

  /**
   * Returns the first registered adapter that claims the file, in
   * registration order.
   *
   * @example
   * ```ts
   * registry.detectFormat(".github/agents/reviewer.agent.md")?.formatName; // "copilot"
   * registry.detectFormat("notes.txt"); // undefined
   * ```
   */
  detectFormat(filePath: string, configType?: ConfigType): FormatAdapter | undefined {
    for (const adapter of this.adapters.values()) {
      if (adapter.canHandle(filePath, configType)) {
        return adapter;
      }
    }
    return undefined;
  }

  listFormats(): string[] {
    return [...this.adapters.keys()];
  }

  supportsConfigType(formatName: string, configType: ConfigType): boolean {
    const adapter = this.adapters.get(formatName);
    return adapter !== undefined && adapter.supportedConfigTypes.includes(configType);
  }

  getFormatsSupporting(configType: ConfigType): string[] {
    return this.listFormats().filter((name) => this.supportsConfigType(name, configType));
  }
}

/**
 * Creates a registry with the built-in Claude and Copilot adapters.
 */
export function createDefaultRegistry(): FormatRegistry {
  const registry = new FormatRegistry();
  registry.register(new ClaudeAdapter());
  registry.register(new CopilotAdapter());
  return registry;
}
