/**
 * Unit tests for the GitHub Copilot format adapter.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  CopilotAdapter,
  PERMISSION_PLACEHOLDER,
  toCanonicalModel,
  toDisplayModel,
} from "../../src/adapters/copilot.js";
import {
  createCanonicalAgent,
  createCanonicalPermission,
  createCanonicalSlashCommand,
} from "../../src/canonical/models.js";
import { extractFrontmatter } from "../../src/parser/frontmatter.js";
import { copilotAgentFile } from "../helpers.js";

describe("CopilotAdapter", () => {
  let adapter: CopilotAdapter;

  beforeEach(() => {
    adapter = new CopilotAdapter();
  });

  describe("file handling", () => {
    it("reports its suffixes", () => {
      expect(adapter.formatName).toBe("copilot");
      expect(adapter.fileExtension).toBe(".agent.md");
      expect(adapter.getFileExtension("permission")).toBe(".perm.json");
      expect(adapter.getFileExtension("slash-command")).toBe(".prompt.md");
    });

    it("matches files by suffix per config type", () => {
      expect(adapter.canHandle(".github/agents/reviewer.agent.md", "agent")).toBe(true);
      expect(adapter.canHandle("reviewer.md", "agent")).toBe(false);
      expect(adapter.canHandle("settings.perm.json", "permission")).toBe(true);
      expect(adapter.canHandle("review.prompt.md", "slash-command")).toBe(true);
      expect(adapter.canHandle("review.prompt.md", "agent")).toBe(false);
    });

    it("derives base ids by stripping the suffix", () => {
      expect(adapter.baseIdFor("/a/reviewer.agent.md", "agent")).toBe("reviewer");
      expect(adapter.baseIdFor("/a/settings.perm.json", "permission")).toBe("settings");
      expect(adapter.baseIdFor("/a/review.prompt.md", "slash-command")).toBe("review");
    });
  });

  describe("model names", () => {
    it("maps display names to short names case-insensitively", () => {
      expect(toCanonicalModel("Claude Sonnet 4")).toBe("sonnet");
      expect(toCanonicalModel("claude haiku 4")).toBe("haiku");
      expect(toCanonicalModel("CLAUDE OPUS 4")).toBe("opus");
    });

    it("passes unknown display names through", () => {
      expect(toCanonicalModel("GPT-4o")).toBe("GPT-4o");
      expect(toCanonicalModel(undefined)).toBeNull();
    });

    it("maps short names to display names", () => {
      expect(toDisplayModel("sonnet")).toBe("Claude Sonnet 4");
      expect(toDisplayModel("OPUS")).toBe("Claude Opus 4");
      expect(toDisplayModel("gpt-5")).toBe("gpt-5");
      expect(toDisplayModel(null)).toBeNull();
    });

    it("omits inherit", () => {
      expect(toDisplayModel("inherit")).toBeNull();
    });
  });

  describe("agents", () => {
    it("converts an agent file to canonical form", () => {
      expect(adapter.toCanonical(copilotAgentFile("reviewer"), "agent")).toEqual({
        kind: "agent",
        name: "reviewer",
        description: "The reviewer agent",
        instructions: "You are reviewer.",
        tools: ["read", "search"],
        model: "opus",
        sourceFormat: "copilot",
        metadata: { copilot: { target: "vscode" } },
      });
    });

    it("writes a canonical agent with display model and default target", () => {
      const agent = createCanonicalAgent({
        name: "planner",
        description: "Plans work",
        instructions: "You plan.",
        tools: ["Read", "Grep"],
        model: "sonnet",
      });

      const output = adapter.fromCanonical(agent, "agent");

      expect(extractFrontmatter(output)).toEqual({
        frontmatter: {
          name: "planner",
          description: "Plans work",
          tools: ["Read", "Grep"],
          model: "Claude Sonnet 4",
          target: "vscode",
        },
        body: "You plan.\n",
        hasFrontmatter: true,
      });
    });

    it("leaves out the model for inherit", () => {
      const output = adapter.fromCanonical(
        createCanonicalAgent({ name: "a", description: "d", model: "inherit" }),
        "agent"
      );

      expect(extractFrontmatter(output).frontmatter).toEqual({
        name: "a",
        description: "d",
        target: "vscode",
      });
    });

    it("adds argument-hint and handoffs when asked", () => {
      const agent = createCanonicalAgent({ name: "planner", description: "Plans work" });

      const output = adapter.fromCanonical(agent, "agent", {
        addArgumentHint: true,
        addHandoffs: true,
      });

      expect(extractFrontmatter(output).frontmatter).toEqual({
        name: "planner",
        description: "Plans work",
        "argument-hint": "Plans work",
        target: "vscode",
        handoffs: [
          { label: "Next Step", agent: "agent", prompt: "Continue with the next step", send: false },
        ],
      });
    });

    it("prefers preserved fields over the conversion options", () => {
      const content = [
        "---",
        "name: planner",
        "description: Plans work",
        "argument-hint: A feature to plan",
        "target: github-copilot",
        "handoffs:",
        "  - label: Implement",
        "    agent: coder",
        "mcp-servers:",
        "  - name: docs",
        "---",
        "You plan.",
        "",
      ].join("\n");

      const output = adapter.fromCanonical(adapter.toCanonical(content, "agent"), "agent", {
        addArgumentHint: true,
        addHandoffs: true,
      });

      expect(extractFrontmatter(output).frontmatter).toEqual({
        name: "planner",
        description: "Plans work",
        "argument-hint": "A feature to plan",
        target: "github-copilot",
        handoffs: [{ label: "Implement", agent: "coder" }],
        "mcp-servers": [{ name: "docs" }],
      });
    });

    it("warns about Claude-only fields it drops", () => {
      const agent = createCanonicalAgent({
        name: "planner",
        metadata: { claude: { permissionMode: "ask", skills: ["research"] } },
      });

      adapter.fromCanonical(agent, "agent");

      expect(adapter.getConversionWarnings()).toEqual([
        "Dropped claude-specific fields: permissionMode, skills",
      ]);
    });

    it("requires frontmatter", () => {
      expect(() => adapter.toCanonical("no frontmatter", "agent")).toThrow(
        "No YAML frontmatter found"
      );
    });
  });

  describe("permissions", () => {
    it("reads an empty permission set and warns", () => {
      const permission = adapter.toCanonical(PERMISSION_PLACEHOLDER, "permission");

      expect(permission).toEqual({
        kind: "permission",
        allow: [],
        deny: [],
        ask: [],
        sourceFormat: "copilot",
        metadata: {},
      });
      expect(adapter.getConversionWarnings()).toEqual([
        "Copilot has no permission model; read an empty permission set",
      ]);
    });

    it("writes the placeholder and counts the dropped rules", () => {
      const permission = createCanonicalPermission({
        allow: ["Bash(npm test)", "Read"],
        deny: ["Read(.env)"],
        metadata: { claude: { defaultMode: "acceptEdits" } },
      });

      expect(adapter.fromCanonical(permission, "permission")).toBe(
        "# Permissions are not explicitly supported by Copilot format\n"
      );
      expect(adapter.getConversionWarnings()).toEqual([
        "Copilot has no permission model; dropped 3 permission rules",
        "Dropped claude-specific fields: defaultMode",
      ]);
    });

    it("does not warn for an empty permission set", () => {
      adapter.fromCanonical(createCanonicalPermission(), "permission");

      expect(adapter.getConversionWarnings()).toEqual([]);
    });
  });

  describe("prompt files", () => {
    const PROMPT = [
      "---",
      "mode: agent",
      "description: Write tests",
      "tools:",
      "  - codebase",
      "model: Claude Haiku 4",
      "---",
      "Write tests for the selected code.",
      "",
    ].join("\n");

    it("converts a prompt file to a canonical command", () => {
      expect(adapter.toCanonical(PROMPT, "slash-command", "tests")).toEqual({
        kind: "slash-command",
        name: "tests",
        description: "Write tests",
        argumentHint: null,
        instructions: "Write tests for the selected code.",
        tools: ["codebase"],
        model: "haiku",
        sourceFormat: "copilot",
        metadata: { copilot: { mode: "agent" } },
      });
    });

    it("writes a command back with the preserved mode", () => {
      const output = adapter.fromCanonical(
        adapter.toCanonical(PROMPT, "slash-command", "tests"),
        "slash-command"
      );

      expect(extractFrontmatter(output).frontmatter).toEqual({
        mode: "agent",
        description: "Write tests",
        tools: ["codebase"],
        model: "Claude Haiku 4",
      });
    });

    it("writes argument hints", () => {
      const command = createCanonicalSlashCommand({
        name: "review",
        description: "Review code",
        argumentHint: "file to review",
        instructions: "Review it.",
      });

      expect(adapter.fromCanonical(command, "slash-command")).toBe(
        "---\ndescription: Review code\nargument-hint: file to review\n---\nReview it.\n"
      );
    });
  });
});
