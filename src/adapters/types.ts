/**
 * Format adapter contract.
 *
 * An adapter owns one tool's on-disk representation: which files belong to
 * it, how their names map to base identifiers, and how their content maps to
 * canonical records. The sync engine only calls through this interface.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CONFIG_TYPES, type CanonicalRecord, type ConfigType } from "../canonical/models.js";
import type { ConversionOptions } from "../types.js";
import { writeFileAtomic } from "../sync/file-writer.js";

/**
 * Error thrown when record content cannot be converted (malformed
 * frontmatter, invalid JSON, unsupported config type).
 */
export class AdapterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AdapterError";
  }
}

export interface FormatAdapter {
  /** Registry key, e.g. "claude" */
  readonly formatName: string;
  /** Native suffix of agent files, e.g. ".agent.md" */
  readonly fileExtension: string;
  readonly supportedConfigTypes: readonly ConfigType[];

  /** Native suffix for the given config type */
  getFileExtension(configType: ConfigType): string;
  /** Whether the file belongs to this format (for any supported type when `configType` is omitted) */
  canHandle(filePath: string, configType?: ConfigType): boolean;
  /** File name minus this format's suffix */
  baseIdFor(filePath: string, configType: ConfigType): string;

  read(filePath: string, configType: ConfigType): Promise<CanonicalRecord>;
  write(
    record: CanonicalRecord,
    filePath: string,
    configType: ConfigType,
    options?: ConversionOptions
  ): Promise<void>;

  toCanonical(content: string, configType: ConfigType, name?: string): CanonicalRecord;
  fromCanonical(
    record: CanonicalRecord,
    configType: ConfigType,
    options?: ConversionOptions
  ): string;

  /** Data-loss warnings produced by the most recent conversion */
  getConversionWarnings(): string[];
}

/**
 * File I/O and suffix handling shared by the built-in adapters.
 * Subclasses supply the suffix table, the file predicate and the conversions.
 */
export abstract class BaseFormatAdapter implements FormatAdapter {
  abstract readonly formatName: string;
  protected abstract readonly extensions: Readonly<Partial<Record<ConfigType, string>>>;

  protected warnings: string[] = [];

  get fileExtension(): string {
    return this.getFileExtension("agent");
  }

  get supportedConfigTypes(): readonly ConfigType[] {
    return CONFIG_TYPES.filter((type) => this.extensions[type] !== undefined);
  }

  getFileExtension(configType: ConfigType): string {
    const extension = this.extensions[configType];
    if (extension === undefined) {
      throw new AdapterError(`Unsupported config type for ${this.formatName}: ${configType}`);
    }
    return extension;
  }

  canHandle(filePath: string, configType?: ConfigType): boolean {
    const fileName = path.basename(filePath);
    if (configType === undefined) {
      return this.supportedConfigTypes.some((type) => this.matches(fileName, type));
    }
    if (this.extensions[configType] === undefined) {
      return false;
    }
    return this.matches(fileName, configType);
  }

  baseIdFor(filePath: string, configType: ConfigType): string {
    const fileName = path.basename(filePath);
    const extension = this.getFileExtension(configType);
    return fileName.endsWith(extension) ? fileName.slice(0, -extension.length) : fileName;
  }

  async read(filePath: string, configType: ConfigType): Promise<CanonicalRecord> {
    const content = await fs.readFile(filePath, "utf-8");
    return this.toCanonical(content, configType, this.baseIdFor(filePath, configType));
  }

  async write(
    record: CanonicalRecord,
    filePath: string,
    configType: ConfigType,
    options?: ConversionOptions
  ): Promise<void> {
    const content = this.fromCanonical(record, configType, options);
    await writeFileAtomic(filePath, content);
  }

  getConversionWarnings(): string[] {
    return [...this.warnings];
  }

  /** Whether a bare file name is a `configType` file of this format */
  protected abstract matches(fileName: string, configType: ConfigType): boolean;

  abstract toCanonical(content: string, configType: ConfigType, name?: string): CanonicalRecord;

  abstract fromCanonical(
    record: CanonicalRecord,
    configType: ConfigType,
    options?: ConversionOptions
  ): string;

  /**
   * Narrows `record` to the shape `configType` expects.
   * @throws AdapterError on a mismatch
   */
  protected expectKind<K extends CanonicalRecord["kind"]>(
    record: CanonicalRecord,
    kind: K
  ): Extract<CanonicalRecord, { kind: K }> {
    if (!isKind(record, kind)) {
      throw new AdapterError(`Expected a canonical ${kind} record, got ${record.kind}`);
    }
    return record;
  }
}

function isKind<K extends CanonicalRecord["kind"]>(
  record: CanonicalRecord,
  kind: K
): record is Extract<CanonicalRecord, { kind: K }> {
  return record.kind === kind;
}
