/**
 * Unit tests for the sync executor.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ClaudeAdapter } from "../../src/adapters/claude.js";
import { CopilotAdapter } from "../../src/adapters/copilot.js";
import { SyncExecutor, type ExecutorOptions } from "../../src/sync/executor.js";
import { SyncStateStore } from "../../src/sync/state.js";
import {
  captureLog,
  claudeAgentFile,
  copilotAgentFile,
  listDir,
  makeTempDir,
  mtimeOf,
  removeTempDir,
  T1,
  T2,
  writeRecord,
} from "../helpers.js";

const NOW = new Date("2024-02-01T12:00:00.000Z");

describe("SyncExecutor", () => {
  let tempDir: string;
  let sourceDir: string;
  let targetDir: string;
  let store: SyncStateStore;
  let output: ReturnType<typeof captureLog>;

  function createExecutor(overrides: Partial<ExecutorOptions> = {}): SyncExecutor {
    return new SyncExecutor({
      sourceDir,
      targetDir,
      sourceAdapter: new ClaudeAdapter(),
      targetAdapter: new CopilotAdapter(),
      configType: "agent",
      dryRun: false,
      store,
      log: output.log,
      now: () => NOW,
      ...overrides,
    });
  }

  beforeEach(async () => {
    tempDir = await makeTempDir("executor-test");
    sourceDir = path.join(tempDir, "claude");
    targetDir = path.join(tempDir, "copilot");
    store = new SyncStateStore(path.join(tempDir, "state.json"), sourceDir, targetDir);
    output = captureLog();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  describe("source-to-target", () => {
    it("writes the converted record and stores both mtimes", async () => {
      const sourcePath = await writeRecord(sourceDir, "planner.md", claudeAgentFile("planner"), T1);
      const executor = createExecutor();

      const outcome = await executor.execute(
        { baseId: "planner", sourcePath, sourceMtime: T1.getTime() },
        "source-to-target",
        "New source record"
      );

      const targetPath = path.join(targetDir, "planner.agent.md");
      expect(await fs.readFile(targetPath, "utf-8")).toBe(
        "---\n" +
          "name: planner\n" +
          "description: The planner agent\n" +
          "tools:\n" +
          "  - Read\n" +
          "  - Grep\n" +
          "model: Claude Sonnet 4\n" +
          "target: vscode\n" +
          "---\n" +
          "You are planner.\n"
      );
      expect(store.get("planner")).toEqual({
        lastSourceMtime: T1.getTime(),
        lastTargetMtime: await mtimeOf(targetPath),
        lastAction: "source-to-target",
        lastSyncTime: NOW.toISOString(),
      });
      expect(outcome).toEqual({
        baseId: "planner",
        action: "source-to-target",
        reason: "New source record",
        conflict: false,
        status: "applied",
      });
      expect(executor.stats.sourceToTarget).toBe(1);
      expect(output.lines).toEqual(["[sync] planner: source → target (New source record)"]);
    });

    it("overwrites an existing target in place", async () => {
      const sourcePath = await writeRecord(sourceDir, "planner.md", claudeAgentFile("planner", "New text."), T2);
      const targetPath = await writeRecord(targetDir, "planner.agent.md", copilotAgentFile("planner"), T1);
      const executor = createExecutor();

      await executor.execute(
        { baseId: "planner", sourcePath, sourceMtime: T2.getTime(), targetPath, targetMtime: T1.getTime() },
        "source-to-target",
        "Source modified since last sync"
      );

      expect(await listDir(targetDir)).toEqual(["planner.agent.md"]);
      expect(await fs.readFile(targetPath, "utf-8")).toContain("New text.");
    });

    it("renders without writing in a dry run", async () => {
      const sourcePath = await writeRecord(sourceDir, "planner.md", claudeAgentFile("planner"), T1);
      const executor = createExecutor({ dryRun: true });

      const outcome = await executor.execute(
        { baseId: "planner", sourcePath, sourceMtime: T1.getTime() },
        "source-to-target",
        "New source record"
      );

      expect(outcome.status).toBe("applied");
      expect(executor.stats.sourceToTarget).toBe(1);
      expect(await listDir(targetDir)).toEqual([]);
      expect(store.get("planner")).toBeUndefined();
      expect(executor.result().dryRun).toBe(true);
    });
  });

  describe("target-to-source", () => {
    it("logs conversion warnings for dropped fields", async () => {
      const targetPath = await writeRecord(targetDir, "reviewer.agent.md", copilotAgentFile("reviewer"), T1);
      const executor = createExecutor();

      await executor.execute(
        { baseId: "reviewer", targetPath, targetMtime: T1.getTime() },
        "target-to-source",
        "New target record"
      );

      expect(await listDir(sourceDir)).toEqual(["reviewer.md"]);
      expect(output.lines).toEqual([
        "[sync] reviewer: target → source (New target record)",
        "[sync] reviewer: warning: Dropped copilot-specific fields: target",
      ]);
      expect(store.get("reviewer")?.lastTargetMtime).toBe(T1.getTime());
      expect(executor.stats.targetToSource).toBe(1);
    });
  });

  describe("deletion", () => {
    it("deletes the target file and forgets the record", async () => {
      const targetPath = await writeRecord(targetDir, "old.agent.md", copilotAgentFile("old"), T1);
      store.put("old", {
        lastSourceMtime: T1.getTime(),
        lastTargetMtime: T1.getTime(),
        lastAction: "source-to-target",
        lastSyncTime: T1.toISOString(),
      });
      const executor = createExecutor();

      await executor.execute(
        { baseId: "old", targetPath, targetMtime: T1.getTime() },
        "delete-target",
        "Source record deleted"
      );

      expect(await listDir(targetDir)).toEqual([]);
      expect(store.get("old")).toBeUndefined();
      expect(executor.stats.deletedOnTarget).toBe(1);
      expect(output.lines).toEqual(["[sync] old: delete on target (Source record deleted)"]);
    });

    it("keeps the file and the record in a dry run", async () => {
      const sourcePath = await writeRecord(sourceDir, "old.md", claudeAgentFile("old"), T1);
      store.put("old", {
        lastSourceMtime: T1.getTime(),
        lastTargetMtime: T1.getTime(),
        lastAction: "source-to-target",
        lastSyncTime: T1.toISOString(),
      });
      const executor = createExecutor({ dryRun: true });

      await executor.execute(
        { baseId: "old", sourcePath, sourceMtime: T1.getTime() },
        "delete-source",
        "Target record deleted"
      );

      expect(await listDir(sourceDir)).toEqual(["old.md"]);
      expect(store.get("old")).toBeDefined();
      expect(executor.stats.deletedOnSource).toBe(1);
    });
  });

  describe("failures", () => {
    it("records a conversion failure and keeps going", async () => {
      const sourcePath = await writeRecord(sourceDir, "broken.md", "no frontmatter here\n", T1);
      const executor = createExecutor();

      const outcome = await executor.execute(
        { baseId: "broken", sourcePath, sourceMtime: T1.getTime() },
        "source-to-target",
        "New source record"
      );

      expect(outcome.status).toBe("failed");
      expect(executor.stats).toMatchObject({ sourceToTarget: 0, errors: 1 });
      expect(executor.errors).toHaveLength(1);
      expect(executor.errors[0]?.message).toBe("No YAML frontmatter found");
      expect(output.lines[1]).toBe("[sync] broken: error: No YAML frontmatter found");
      expect(await listDir(targetDir)).toEqual([]);
      expect(store.get("broken")).toBeUndefined();
    });

    it("fail() counts an error outside an action", () => {
      const executor = createExecutor();

      const outcome = executor.fail({ baseId: "x" }, "Conflict resolution failed: closed");

      expect(outcome).toEqual({
        baseId: "x",
        action: "skip",
        reason: "Conflict resolution failed: closed",
        conflict: true,
        status: "failed",
      });
      expect(executor.stats.errors).toBe(1);
      expect(output.lines).toEqual(["[sync] x: error: Conflict resolution failed: closed"]);
    });
  });

  describe("skip", () => {
    it("counts silently unless verbose", () => {
      const quiet = createExecutor();
      quiet.skip({ baseId: "a" }, "No changes detected");
      expect(quiet.stats.skipped).toBe(1);
      expect(output.lines).toEqual([]);

      const verbose = createExecutor({ verbose: true });
      verbose.skip({ baseId: "a" }, "No changes detected");
      expect(output.lines).toEqual(["[sync] a: skip (No changes detected)"]);
    });

    it("result() returns copies", () => {
      const executor = createExecutor();
      executor.skip({ baseId: "a" }, "No changes detected");

      const result = executor.result();
      executor.skip({ baseId: "b" }, "No changes detected");

      expect(result.stats.skipped).toBe(1);
      expect(result.outcomes).toHaveLength(1);
    });
  });
});
