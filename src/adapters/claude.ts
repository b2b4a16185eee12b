/**
 * Claude Code format adapter.
 *
 * Claude Code keeps its configuration in:
 * - Agents: `~/.claude/agents/*.md` or `.claude/agents/*.md`
 * - Slash commands: `.claude/commands/*.md`
 * - Permissions: `.claude/settings.json` / `.claude/settings.local.json`
 *
 * Agent file format:
 * ```
 * ---
 * name: agent-name
 * description: Agent description
 * tools: Read, Grep, Glob, Bash   # comma-separated string
 * model: sonnet|opus|haiku|inherit
 * permissionMode: ask             # Claude-only, kept in metadata
 * skills: [...]                   # Claude-only, kept in metadata
 * ---
 * Agent instructions in markdown...
 * ```
 *
 * Short model names (sonnet, opus, haiku) are already the canonical form.
 */

import * as fs from "node:fs/promises";
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
  isPlainObject,
  parseFrontmatterDocument,
  renderFrontmatterDocument,
} from "../parser/frontmatter.js";
import { writeFileAtomic, isErrnoException } from "../sync/file-writer.js";
import type { ConversionOptions } from "../types.js";
import { droppedFieldWarnings, optionalString, parseToolList, stringList } from "./shared.js";
import { AdapterError, BaseFormatAdapter } from "./types.js";

const FORMAT = "claude";

/** Agent frontmatter keys only Claude understands */
const AGENT_ONLY_FIELDS = ["permissionMode", "skills"] as const;

/** Command frontmatter keys only Claude understands */
const COMMAND_ONLY_FIELDS = ["disable-model-invocation"] as const;

const SETTINGS_FILES = new Set(["settings.json", "settings.local.json"]);

const PERMISSION_LISTS = new Set(["allow", "deny", "ask"]);

export class ClaudeAdapter extends BaseFormatAdapter {
  readonly formatName = FORMAT;

  protected readonly extensions = {
    agent: ".md",
    permission: ".json",
    "slash-command": ".md",
  } as const;

  protected matches(fileName: string, configType: ConfigType): boolean {
    if (configType === "permission") {
      return SETTINGS_FILES.has(fileName);
    }
    return (
      fileName.endsWith(".md") &&
      !fileName.endsWith(".agent.md") &&
      !fileName.endsWith(".prompt.md")
    );
  }

  toCanonical(content: string, configType: ConfigType, name?: string): CanonicalRecord {
    this.warnings = [];
    switch (configType) {
      case "agent":
        return this.agentToCanonical(content, name);
      case "permission":
        return this.permissionToCanonical(content);
      case "slash-command":
        return this.commandToCanonical(content, name);
    }
  }

  fromCanonical(
    record: CanonicalRecord,
    configType: ConfigType,
    _options?: ConversionOptions
  ): string {
    this.warnings = [];
    switch (configType) {
      case "agent":
        return this.agentFromCanonical(this.expectKind(record, "agent"));
      case "permission":
        return `${JSON.stringify(this.permissionSettings(this.expectKind(record, "permission")), null, 2)}\n`;
      case "slash-command":
        return this.commandFromCanonical(this.expectKind(record, "slash-command"));
    }
  }

  /**
   * Writes a record to disk. Permission records are merged into an existing
   * settings file so its other keys (env, hooks, ...) survive.
   */
  override async write(
    record: CanonicalRecord,
    filePath: string,
    configType: ConfigType,
    options?: ConversionOptions
  ): Promise<void> {
    if (configType !== "permission") {
      return super.write(record, filePath, configType, options);
    }

    this.warnings = [];
    const settings = this.permissionSettings(this.expectKind(record, "permission"));
    const existing = await readSettingsObject(filePath);
    const merged = { ...existing, ...settings };
    await writeFileAtomic(filePath, `${JSON.stringify(merged, null, 2)}\n`);
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
      model: normalizeModel(frontmatter.model),
      sourceFormat: FORMAT,
    });

    for (const field of AGENT_ONLY_FIELDS) {
      if (frontmatter[field] !== undefined) {
        setMetadata(agent, FORMAT, field, frontmatter[field]);
      }
    }

    return agent;
  }

  private agentFromCanonical(agent: CanonicalAgent): string {
    const frontmatter: Record<string, unknown> = {
      name: agent.name,
      description: agent.description,
    };

    if (agent.tools.length > 0) {
      frontmatter.tools = agent.tools.join(", ");
    }
    if (agent.model) {
      frontmatter.model = agent.model;
    }
    for (const field of AGENT_ONLY_FIELDS) {
      if (hasMetadata(agent, FORMAT, field)) {
        frontmatter[field] = getMetadata(agent, FORMAT, field);
      }
    }

    this.warnings.push(...droppedFieldWarnings(agent, FORMAT));
    return renderFrontmatterDocument(frontmatter, agent.instructions);
  }

  // ===========================================================================
  // Permissions
  // ===========================================================================

  private permissionToCanonical(content: string): CanonicalPermission {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new AdapterError("Invalid JSON in settings file", { cause: error });
    }
    if (!isPlainObject(data)) {
      throw new AdapterError("Settings file must contain a JSON object");
    }

    const permissions = isPlainObject(data.permissions) ? data.permissions : {};
    const permission = createCanonicalPermission({
      allow: stringList(permissions.allow),
      deny: stringList(permissions.deny),
      ask: stringList(permissions.ask),
      sourceFormat: FORMAT,
    });

    // defaultMode, additionalDirectories, ...
    for (const [key, value] of Object.entries(permissions)) {
      if (!PERMISSION_LISTS.has(key)) {
        setMetadata(permission, FORMAT, key, value);
      }
    }

    return permission;
  }

  private permissionSettings(permission: CanonicalPermission): { permissions: Record<string, unknown> } {
    const permissions: Record<string, unknown> = {
      allow: permission.allow,
      deny: permission.deny,
      ask: permission.ask,
    };
    for (const [key, value] of Object.entries(permission.metadata[FORMAT] ?? {})) {
      permissions[key] = value;
    }

    this.warnings.push(...droppedFieldWarnings(permission, FORMAT));
    return { permissions };
  }

  // ===========================================================================
  // Slash commands
  // ===========================================================================

  private commandToCanonical(content: string, fallbackName?: string): CanonicalSlashCommand {
    const { frontmatter, body } = extractFrontmatter(content);

    const command = createCanonicalSlashCommand({
      name: optionalString(frontmatter.name) ?? fallbackName ?? "",
      description: optionalString(frontmatter.description) ?? "",
      argumentHint: optionalString(frontmatter["argument-hint"]) ?? null,
      instructions: body.trim(),
      tools: parseToolList(frontmatter["allowed-tools"]),
      model: normalizeModel(frontmatter.model),
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

    if (command.description) {
      frontmatter.description = command.description;
    }
    if (command.argumentHint) {
      frontmatter["argument-hint"] = command.argumentHint;
    }
    if (command.tools.length > 0) {
      frontmatter["allowed-tools"] = command.tools.join(", ");
    }
    if (command.model) {
      frontmatter.model = command.model;
    }
    for (const field of COMMAND_ONLY_FIELDS) {
      if (hasMetadata(command, FORMAT, field)) {
        frontmatter[field] = getMetadata(command, FORMAT, field);
      }
    }

    this.warnings.push(...droppedFieldWarnings(command, FORMAT));

    // Frontmatter is optional for Claude commands
    if (Object.keys(frontmatter).length === 0) {
      return `${command.instructions}\n`;
    }
    return renderFrontmatterDocument(frontmatter, command.instructions);
  }
}

/**
 * Lower-cases a model name. Claude's short names are the canonical form.
 */
export function normalizeModel(model: unknown): string | null {
  const value = optionalString(model);
  if (!value) return null;
  return value.toLowerCase();
}

/**
 * Reads an existing settings file as an object, or `{}` when it is missing
 * or does not hold a JSON object.
 */
async function readSettingsObject(filePath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return isPlainObject(parsed) ? parsed : {};
  } catch {
    console.warn(`[claude] ${filePath} is not valid JSON; rewriting it with permissions only`);
    return {};
  }
}
