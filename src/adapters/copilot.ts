/**
 * GitHub Copilot format adapter.
 *
 * Copilot keeps its configuration in:
 * - Agents: `.github/agents/*.agent.md`
 * - Prompt files (slash commands): `.github/prompts/*.prompt.md`
 *
 * Agent file format:
 * ```
 * ---
 * name: agent-name
 * description: Agent description
 * argument-hint: What to pass       # Copilot-only, kept in metadata
 * tools: ['read', 'edit', 'search'] # YAML list
 * model: Claude Sonnet 4            # display name
 * target: vscode                    # Copilot-only, kept in metadata
 * handoffs: [...]                   # Copilot-only, kept in metadata
 * ---
 * Agent instructions in markdown...
 * ```
 *
 * Copilot has no permission model. Permission records map to a `.perm.json`
 * placeholder so a permission pair can still be tracked.
 */

import {
  createCanonicalAgent,
  createCanonicalPermission,
  createCanonicalSlashCommand,
  getMetadata,
  hasMetadata,
  setMetadata,
  type CanonicalAgent,
  type CanonicalPermission,
  type CanonicalRecord,
  type CanonicalSlashCommand,
  type ConfigType,
} from "../canonical/models.js";
import {
  extractFrontmatter,
  parseFrontmatterDocument,
  renderFrontmatterDocument,
} from "../parser/frontmatter.js";
import type { ConversionOptions } from "../types.js";
import { droppedFieldWarnings, optionalString, parseToolList } from "./shared.js";
import { BaseFormatAdapter } from "./types.js";

const FORMAT = "copilot";

/** Canonical short name → Copilot display name. `null` means "omit the field". */
const MODEL_DISPLAY_NAMES: Readonly<Record<string, string | null>> = {
  sonnet: "Claude Sonnet 4",
  opus: "Claude Opus 4",
  haiku: "Claude Haiku 4",
  inherit: null,
};

/** Lower-cased Copilot display name → canonical short name */
const MODEL_SHORT_NAMES: Readonly<Record<string, string>> = {
  "claude sonnet 4": "sonnet",
  "claude opus 4": "opus",
  "claude haiku 4": "haiku",
};

/** Agent frontmatter keys only Copilot understands, in output order */
const AGENT_ONLY_FIELDS = ["argument-hint", "target", "handoffs", "mcp-servers"] as const;

const COMMAND_ONLY_FIELDS = ["mode"] as const;

export const DEFAULT_TARGET = "vscode";

export const PLACEHOLDER_HANDOFF = {
  label: "Next Step",
  agent: "agent",
  prompt: "Continue with the next step",
  send: false,
} as const;

export const PERMISSION_PLACEHOLDER =
  "# Permissions are not explicitly supported by Copilot format\n";

export class CopilotAdapter extends BaseFormatAdapter {
  readonly formatName = FORMAT;

  protected readonly extensions = {
    agent: ".agent.md",
    permission: ".perm.json",
    "slash-command": ".prompt.md",
  } as const;

  protected matches(fileName: string, configType: ConfigType): boolean {
    return fileName.endsWith(this.getFileExtension(configType));
  }

  toCanonical(content: string, configType: ConfigType, name?: string): CanonicalRecord {
    this.warnings = [];
    switch (configType) {
      case "agent":
        return this.agentToCanonical(content, name);
      case "permission":
        return this.permissionToCanonical();
      case "slash-command":
        return this.commandToCanonical(content, name);
    }
  }

  fromCanonical(
    record: CanonicalRecord,
    configType: ConfigType,
    options: ConversionOptions = {}
  ): string {
    this.warnings = [];
    switch (configType) {
      case "agent":
        return this.agentFromCanonical(this.expectKind(record, "agent"), options);
      case "permission":
        return this.permissionFromCanonical(this.expectKind(record, "permission"));
      case "slash-command":
        return this.commandFromCanonical(this.expectKind(record, "slash-command"));
    }
  }

  // ===========================================================================
  // Agents
  // ===========================================================================

  private agentToCanonical(content: string, fallbackName?: string): CanonicalAgent {
    const { frontmatter, body } = parseFrontmatterDocument(content);

    const agent = createCanonicalAgent({
      name: optionalString(frontmatter.name) ?? fallbackName ?? "",
      description: optionalString(frontmatter.description) ?? "",
      instructions: body.trim(),
      tools: parseToolList(frontmatter.tools),
      model: toCanonicalModel(frontmatter.model),
      sourceFormat: FORMAT,
    });

    for (const field of AGENT_ONLY_FIELDS) {
      if (frontmatter[field] !== undefined) {
        setMetadata(agent, FORMAT, field, frontmatter[field]);
      }
    }

    return agent;
  }

  private agentFromCanonical(agent: CanonicalAgent, options: ConversionOptions): string {
    const frontmatter: Record<string, unknown> = {
      name: agent.name,
      description: agent.description,
    };

    if (hasMetadata(agent, FORMAT, "argument-hint")) {
      frontmatter["argument-hint"] = getMetadata(agent, FORMAT, "argument-hint");
    } else if (options.addArgumentHint && agent.description) {
      frontmatter["argument-hint"] = agent.description;
    }

    if (agent.tools.length > 0) {
      frontmatter.tools = [...agent.tools];
    }

    const model = toDisplayModel(agent.model);
    if (model) {
      frontmatter.model = model;
    }

    frontmatter.target = hasMetadata(agent, FORMAT, "target")
      ? getMetadata(agent, FORMAT, "target")
      : DEFAULT_TARGET;

    if (hasMetadata(agent, FORMAT, "handoffs")) {
      frontmatter.handoffs = getMetadata(agent, FORMAT, "handoffs");
    } else if (options.addHandoffs) {
      frontmatter.handoffs = [{ ...PLACEHOLDER_HANDOFF }];
    }

    if (hasMetadata(agent, FORMAT, "mcp-servers")) {
      frontmatter["mcp-servers"] = getMetadata(agent, FORMAT, "mcp-servers");
    }

    this.warnings.push(...droppedFieldWarnings(agent, FORMAT));
    return renderFrontmatterDocument(frontmatter, agent.instructions);
  }

  // ===========================================================================
  // Permissions (placeholder)
  // ===========================================================================

  private permissionToCanonical(): CanonicalPermission {
    this.warnings.push("Copilot has no permission model; read an empty permission set");
    return createCanonicalPermission({ sourceFormat: FORMAT });
  }

  private permissionFromCanonical(permission: CanonicalPermission): string {
    const ruleCount = permission.allow.length + permission.deny.length + permission.ask.length;
    if (ruleCount > 0) {
      this.warnings.push(
        `Copilot has no permission model; dropped ${ruleCount} permission rule${ruleCount === 1 ? "" : "s"}`
      );
    }
    this.warnings.push(...droppedFieldWarnings(permission, FORMAT));
    return PERMISSION_PLACEHOLDER;
  }

  // ===========================================================================
  // Prompt files
  // ===========================================================================

  private commandToCanonical(content: string, fallbackName?: string): CanonicalSlashCommand {
    const { frontmatter, body } = extractFrontmatter(content);

    const command = createCanonicalSlashCommand({
      name: optionalString(frontmatter.name) ?? fallbackName ?? "",
      description: optionalString(frontmatter.description) ?? "",
      argumentHint: optionalString(frontmatter["argument-hint"]) ?? null,
      instructions: body.trim(),
      tools: parseToolList(frontmatter.tools),
      model: toCanonicalModel(frontmatter.model),
      sourceFormat: FORMAT,
    });

    for (const field of COMMAND_ONLY_FIELDS) {
      if (frontmatter[field] !== undefined) {
        setMetadata(command, FORMAT, field, frontmatter[field]);
      }
    }

    return command;
  }

  private commandFromCanonical(command: CanonicalSlashCommand): string {
    const frontmatter: Record<string, unknown> = {};

    if (hasMetadata(command, FORMAT, "mode")) {
      frontmatter.mode = getMetadata(command, FORMAT, "mode");
    }
    if (command.description) {
      frontmatter.description = command.description;
    }
    if (command.argumentHint) {
      frontmatter["argument-hint"] = command.argumentHint;
    }
    if (command.tools.length > 0) {
      frontmatter.tools = [...command.tools];
    }
    const model = toDisplayModel(command.model);
    if (model) {
      frontmatter.model = model;
    }

    this.warnings.push(...droppedFieldWarnings(command, FORMAT));
    return renderFrontmatterDocument(frontmatter, command.instructions);
  }
}

// =============================================================================
// Model names
// =============================================================================

/**
 * Maps a Copilot display name to its canonical short name.
 * Lookup is case-insensitive; unknown names pass through unchanged.
 *
 * @example
 * ```ts
 * toCanonicalModel("Claude Sonnet 4"); // "sonnet"
 * toCanonicalModel("GPT-4o");          // "GPT-4o"
 * ```
 */
export function toCanonicalModel(model: unknown): string | null {
  const value = optionalString(model);
  if (!value) return null;
  return MODEL_SHORT_NAMES[value.toLowerCase()] ?? value;
}

/**
 * Maps a canonical short name to the Copilot display name.
 * `inherit` maps to `null` (the field is omitted); unknown names pass through.
 */
export function toDisplayModel(model: string | null): string | null {
  if (!model) return null;
  const key = model.toLowerCase();
  if (Object.prototype.hasOwnProperty.call(MODEL_DISPLAY_NAMES, key)) {
    return MODEL_DISPLAY_NAMES[key] ?? null;
  }
  return model;
}
