/**
 * One-shot conversion of a single record file between formats.
 *
 * Unlike a sync run there is no pairing and no state: the input is read,
 * rendered in the target format and written beside it (or to an explicit
 * output path).
 */

import * as path from "node:path";
import { CONFIG_TYPES, type ConfigType } from "../canonical/models.js";
import type { FormatAdapter } from "../adapters/types.js";
import { createDefaultRegistry, FormatRegistryError, type FormatRegistry } from "../registry.js";
import type { ConversionOptions } from "../types.js";
import { resolveAdapter } from "./engine.js";

export interface ConvertFileOptions {
  inputPath: string;
  targetFormat: string;
  /** Detected from the input path when omitted */
  sourceFormat?: string;
  /** Detected from the input path when omitted */
  configType?: ConfigType;
  /** Defaults to `<input dir>/<base id><target suffix>` */
  outputPath?: string;
  /** Render only; write nothing */
  dryRun?: boolean;
  conversionOptions?: ConversionOptions;
  registry?: FormatRegistry;
}

export interface ConvertFileResult {
  sourceFormat: string;
  configType: ConfigType;
  outputPath: string;
  /** The rendered target-format content */
  content: string;
  /** Warnings from reading the input and rendering the output */
  warnings: string[];
  written: boolean;
}

/**
 * Converts one file.
 *
 * @throws FormatRegistryError when the source format can't be detected or a
 * format doesn't support the config type
 * @throws AdapterError when the input can't be parsed
 *
 * @example
 * ```ts
 * const result = await convertFile({
 *   inputPath: ".claude/agents/planner.md",
 *   targetFormat: "copilot",
 *   outputPath: ".github/agents/planner.agent.md",
 * });
 * ```
 */
export async function convertFile(options: ConvertFileOptions): Promise<ConvertFileResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const inputPath = options.inputPath;

  const { sourceAdapter, configType } = detectSource(registry, inputPath, options);
  const targetAdapter = resolveAdapter(registry, options.targetFormat, configType);

  const record = await sourceAdapter.read(inputPath, configType);
  const warnings = sourceAdapter.getConversionWarnings();

  const outputPath =
    options.outputPath ??
    path.join(
      path.dirname(inputPath),
      `${sourceAdapter.baseIdFor(inputPath, configType)}${targetAdapter.getFileExtension(configType)}`
    );
  if (path.resolve(outputPath) === path.resolve(inputPath)) {
    throw new Error(`Refusing to overwrite the input file ${inputPath}; choose an output path`);
  }

  const content = targetAdapter.fromCanonical(record, configType, options.conversionOptions);
  warnings.push(...targetAdapter.getConversionWarnings());

  if (!options.dryRun) {
    await targetAdapter.write(record, outputPath, configType, options.conversionOptions);
  }

  return {
    sourceFormat: sourceAdapter.formatName,
    configType,
    outputPath,
    content,
    warnings,
    written: !options.dryRun,
  };
}

function detectSource(
  registry: FormatRegistry,
  inputPath: string,
  options: ConvertFileOptions
): { sourceAdapter: FormatAdapter; configType: ConfigType } {
  if (options.sourceFormat !== undefined) {
    const adapter = registry.requireAdapter(options.sourceFormat);
    const configType = options.configType ?? detectConfigType(adapter, inputPath);
    return { sourceAdapter: resolveAdapter(registry, options.sourceFormat, configType), configType };
  }

  const adapter = registry.detectFormat(inputPath, options.configType);
  if (!adapter) {
    throw new FormatRegistryError(
      `Cannot detect the format of ${inputPath}; pass --source-format`
    );
  }
  return { sourceAdapter: adapter, configType: options.configType ?? detectConfigType(adapter, inputPath) };
}

/**
 * First config type (agent, permission, slash-command) whose files the
 * adapter recognizes. Falls back to "agent", so `planner.md` is an agent
 * rather than a command.
 */
export function detectConfigType(adapter: FormatAdapter, filePath: string): ConfigType {
  return CONFIG_TYPES.find((type) => adapter.canHandle(filePath, type)) ?? "agent";
}
