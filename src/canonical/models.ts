/**
 * Canonical (format-neutral) configuration records.
 *
 * Adapters convert their native files to and from these shapes. The sync
 * engine never looks inside them; it only hands them from one adapter to
 * another.
 *
 * Fields a format supports but the canonical model does not are kept in
 * `metadata`, bucketed by format name, so that a same-format round trip is
 * lossless:
 *
 * ```ts
 * agent.metadata = {
 *   claude: { permissionMode: "ask" },
 *   copilot: { target: "vscode" },
 * };
 * ```
 */

export type ConfigType = "agent" | "permission" | "slash-command";

export const CONFIG_TYPES: readonly ConfigType[] = ["agent", "permission", "slash-command"];

/** Native fields per format name. */
export type FormatMetadata = Record<string, Record<string, unknown>>;

export interface CanonicalAgent {
  kind: "agent";
  name: string;
  description: string;
  /** Markdown body with surrounding whitespace trimmed */
  instructions: string;
  tools: string[];
  /** Canonical short name (sonnet, opus, haiku) or a pass-through value */
  model: string | null;
  sourceFormat: string;
  metadata: FormatMetadata;
}

export interface CanonicalPermission {
  kind: "permission";
  allow: string[];
  deny: string[];
  ask: string[];
  sourceFormat: string;
  metadata: FormatMetadata;
}

export interface CanonicalSlashCommand {
  kind: "slash-command";
  name: string;
  description: string;
  argumentHint: string | null;
  instructions: string;
  tools: string[];
  model: string | null;
  sourceFormat: string;
  metadata: FormatMetadata;
}

export type CanonicalRecord = CanonicalAgent | CanonicalPermission | CanonicalSlashCommand;

export function isConfigType(value: string): value is ConfigType {
  return CONFIG_TYPES.some((type) => type === value);
}

export function createCanonicalAgent(
  fields: Partial<Omit<CanonicalAgent, "kind">> & Pick<CanonicalAgent, "name">
): CanonicalAgent {
  return {
    kind: "agent",
    description: "",
    instructions: "",
    tools: [],
    model: null,
    sourceFormat: "canonical",
    metadata: {},
    ...fields,
  };
}

export function createCanonicalPermission(
  fields: Partial<Omit<CanonicalPermission, "kind">> = {}
): CanonicalPermission {
  return {
    kind: "permission",
    allow: [],
    deny: [],
    ask: [],
    sourceFormat: "canonical",
    metadata: {},
    ...fields,
  };
}

export function createCanonicalSlashCommand(
  fields: Partial<Omit<CanonicalSlashCommand, "kind">> & Pick<CanonicalSlashCommand, "name">
): CanonicalSlashCommand {
  return {
    kind: "slash-command",
    description: "",
    argumentHint: null,
    instructions: "",
    tools: [],
    model: null,
    sourceFormat: "canonical",
    metadata: {},
    ...fields,
  };
}

// =============================================================================
// Metadata helpers
// =============================================================================

export function getMetadata(record: CanonicalRecord, format: string, key: string): unknown {
  return record.metadata[format]?.[key];
}

export function hasMetadata(record: CanonicalRecord, format: string, key: string): boolean {
  const bucket = record.metadata[format];
  return bucket !== undefined && Object.prototype.hasOwnProperty.call(bucket, key);
}

/**
 * Stores a native field under `metadata[format][key]`.
 * Mutates the record in place.
 */
export function setMetadata(
  record: CanonicalRecord,
  format: string,
  key: string,
  value: unknown
): void {
  const bucket = record.metadata[format] ?? {};
  bucket[key] = value;
  record.metadata[format] = bucket;
}

/**
 * Lists the metadata fields belonging to formats other than `format`,
 * as `{ format, fields }` groups in insertion order. Empty buckets are left out.
 */
export function foreignMetadataFields(
  record: CanonicalRecord,
  format: string
): Array<{ format: string; fields: string[] }> {
  const groups: Array<{ format: string; fields: string[] }> = [];
  for (const [owner, bucket] of Object.entries(record.metadata)) {
    if (owner === format) continue;
    const fields = Object.keys(bucket);
    if (fields.length > 0) {
      groups.push({ format: owner, fields });
    }
  }
  return groups;
}
