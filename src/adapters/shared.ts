/**
 * Field coercion helpers shared by the built-in adapters.
 */

import { foreignMetadataFields, type CanonicalRecord } from "../canonical/models.js";

/**
 * Parses a tool list from either a comma-separated string or a YAML list.
 *
 * @example
 * ```ts
 * parseToolList("Read, Grep,  Glob"); // ["Read", "Grep", "Glob"]
 * parseToolList(["read", "edit"]);    // ["read", "edit"]
 * parseToolList(undefined);           // []
 * ```
 */
export function parseToolList(value: unknown): string[] {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((tool) => tool.trim())
      .filter((tool) => tool.length > 0);
  }
  if (Array.isArray(value)) {
    return value
      .filter((tool): tool is string | number => typeof tool === "string" || typeof tool === "number")
      .map((tool) => String(tool).trim())
      .filter((tool) => tool.length > 0);
  }
  return [];
}

/**
 * Reads a scalar frontmatter value as a string. YAML turns some values into
 * numbers or booleans (`name: 2024`), which are stringified back.
 */
export function optionalString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

/** Keeps the string entries of a JSON array; anything else yields []. */
export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string");
}

/**
 * One warning per foreign format whose metadata the writing adapter can't
 * represent, e.g. "Dropped copilot-specific fields: target, argument-hint".
 */
export function droppedFieldWarnings(record: CanonicalRecord, writerFormat: string): string[] {
  return foreignMetadataFields(record, writerFormat).map(
    ({ format, fields }) => `Dropped ${format}-specific fields: ${fields.join(", ")}`
  );
}
