/**
 * Frontmatter parsing and rendering for markdown-based config files.
 *
 * Agent and command files share one layout:
 *
 * ```
 * ---
 * name: planner
 * tools: Read, Grep
 * ---
 * Instructions in markdown...
 * ```
 *
 * Frontmatter is parsed and serialized with the `yaml` package. The body is
 * treated as opaque text.
 */

import { parse as parseYaml, stringify } from "yaml";
import { AdapterError } from "../adapters/types.js";

/**
 * Result of frontmatter extraction.
 */
export interface FrontmatterDocument {
  /** Parsed frontmatter as key-value object */
  frontmatter: Record<string, unknown>;
  /** Markdown body without frontmatter */
  body: string;
  /** False when the content carried no `---` block at all */
  hasFrontmatter: boolean;
}

/**
 * Extracts YAML frontmatter from markdown content.
 *
 * Frontmatter must be at the very start of the file, delimited by `---`.
 * - No frontmatter → empty object, full content as body
 * - Empty frontmatter (`---\n---`) → empty object, rest as body
 * - Frontmatter only (no body) → parsed frontmatter, empty body
 *
 * @throws AdapterError when the YAML block cannot be parsed or is not a mapping
 *
 * @example
 * ```ts
 * const result = extractFrontmatter(`---
 * name: planner
 * ---
 * Plan the work.`);
 * // result.frontmatter = { name: "planner" }
 * // result.body = "Plan the work."
 * ```
 */
export function extractFrontmatter(content: string): FrontmatterDocument {
  const normalized = content.replace(/\r\n/g, "\n");

  if (!normalized.startsWith("---\n")) {
    return { frontmatter: {}, body: normalized, hasFrontmatter: false };
  }

  // `---\n---` has its closing delimiter at index 3, the general case after a newline
  let yamlContent: string;
  let rest: string;
  if (normalized.startsWith("---\n---")) {
    yamlContent = "";
    rest = normalized.slice(7);
  } else {
    const closingIndex = normalized.indexOf("\n---", 3);
    if (closingIndex === -1) {
      return { frontmatter: {}, body: normalized, hasFrontmatter: false };
    }
    yamlContent = normalized.slice(4, closingIndex);
    rest = normalized.slice(closingIndex + 4);
  }

  let frontmatter: Record<string, unknown> = {};
  if (yamlContent.trim()) {
    let parsed: unknown;
    try {
      parsed = parseYaml(yamlContent);
    } catch (error) {
      throw new AdapterError(
        `Failed to parse YAML frontmatter: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    if (parsed !== null && parsed !== undefined) {
      if (!isPlainObject(parsed)) {
        throw new AdapterError("YAML frontmatter must be a mapping of keys to values");
      }
      frontmatter = parsed;
    }
  }

  // Drop the remainder of the closing delimiter line
  const newline = rest.indexOf("\n");
  const body = newline === -1 ? "" : rest.slice(newline + 1);

  return { frontmatter, body, hasFrontmatter: true };
}

/**
 * Like {@link extractFrontmatter}, but a file without a frontmatter block is
 * an error. Used for formats where the block carries required fields.
 */
export function parseFrontmatterDocument(content: string): FrontmatterDocument {
  const document = extractFrontmatter(content);
  if (!document.hasFrontmatter) {
    throw new AdapterError("No YAML frontmatter found");
  }
  return document;
}

/**
 * Renders frontmatter and body as `---\n<yaml>---\n<body>\n`.
 *
 * Keys are written in insertion order. An empty frontmatter object still
 * produces the delimiters so the output parses back the same way.
 */
export function renderFrontmatterDocument(
  frontmatter: Record<string, unknown>,
  body: string
): string {
  const yamlBlock = Object.keys(frontmatter).length > 0 ? stringify(frontmatter) : "";
  return `---\n${yamlBlock}---\n${body}\n`;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
