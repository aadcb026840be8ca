/**
 * Frontmatter handling for agent and command Markdown files.
 *
 * A document opens with a `---` line, holds a YAML mapping, and closes with
 * the next line that is exactly `---`. Everything after is the prompt body.
 */

import { parseDocument, stringify } from "yaml";
import { errorMessage, isRecord } from "./utils.js";

// ============================================================================
// Types
// ============================================================================

export type FrontmatterData = Record<string, unknown>;

export type FrontmatterSplit =
  | { kind: "absent"; body: string; bodyLine: 1 }
  | { kind: "unterminated"; body: string; bodyLine: 1 }
  | { kind: "present"; block: string; body: string; bodyLine: number };

export type FrontmatterErrorCode = "missing" | "unterminated" | "syntax";

export interface FrontmatterError {
  code: FrontmatterErrorCode;
  message: string;
  /** 1-based line in the source file */
  line: number;
}

export type FrontmatterResult =
  | { ok: true; data: FrontmatterData; body: string; bodyLine: number }
  | { ok: false; error: FrontmatterError; body: string; bodyLine: number };

const DELIMITER = "---";
const BOM = "\uFEFF";

// ============================================================================
// Core
// ============================================================================

/**
 * Split a document into its frontmatter block and body without parsing.
 */
export function splitFrontmatter(content: string): FrontmatterSplit {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  const lines = text.split(/\r?\n/);

  if (lines[0]?.trimEnd() !== DELIMITER) {
    return { kind: "absent", body: text, bodyLine: 1 };
  }

  const closeIdx = lines.findIndex(
    (line, idx) => idx > 0 && line.trimEnd() === DELIMITER
  );
  if (closeIdx === -1) {
    return { kind: "unterminated", body: text, bodyLine: 1 };
  }

  return {
    kind: "present",
    block: lines.slice(1, closeIdx).join("\n"),
    body: lines.slice(closeIdx + 1).join("\n"),
    bodyLine: closeIdx + 2,
  };
}

/**
 * Parse the frontmatter of a document. Never throws.
 *
 * A document without frontmatter is reported as an error at line 1, since
 * every agent and command needs at least a description.
 */
export function parseFrontmatter(content: string): FrontmatterResult {
  const split = splitFrontmatter(content);

  if (split.kind === "absent") {
    return {
      ok: false,
      error: { code: "missing", message: "missing frontmatter block", line: 1 },
      body: split.body,
      bodyLine: split.bodyLine,
    };
  }

  if (split.kind === "unterminated") {
    return {
      ok: false,
      error: { code: "unterminated", message: `frontmatter block is not closed with "${DELIMITER}"`, line: 1 },
      body: split.body,
      bodyLine: split.bodyLine,
    };
  }

  const doc = parseDocument(split.block);
  const [firstError] = doc.errors;
  if (firstError) {
    // Block line 1 is source line 2 (after the opening delimiter)
    const blockLine = firstError.linePos?.[0].line ?? 1;
    return {
      ok: false,
      error: {
        code: "syntax",
        message: firstLine(firstError.message),
        line: blockLine + 1,
      },
      body: split.body,
      bodyLine: split.bodyLine,
    };
  }

  // toJS() throws when alias expansion exceeds the yaml library's limit
  let value: unknown;
  try {
    value = doc.toJS();
  } catch (error) {
    return {
      ok: false,
      error: { code: "syntax", message: firstLine(errorMessage(error)), line: 2 },
      body: split.body,
      bodyLine: split.bodyLine,
    };
  }
  if (value === null || value === undefined) {
    return { ok: true, data: {}, body: split.body, bodyLine: split.bodyLine };
  }
  if (!isRecord(value)) {
    return {
      ok: false,
      error: { code: "syntax", message: "frontmatter must be a mapping of key: value pairs", line: 2 },
      body: split.body,
      bodyLine: split.bodyLine,
    };
  }

  return { ok: true, data: value, body: split.body, bodyLine: split.bodyLine };
}

/**
 * Render frontmatter data and a body back into a document.
 */
export function stringifyFrontmatter(data: FrontmatterData, body: string): string {
  const block = Object.keys(data).length > 0 ? stringify(data) : "";
  return `${DELIMITER}\n${block}${DELIMITER}\n\n${body.trimStart()}`;
}

function firstLine(message: string): string {
  return message.split("\n")[0] ?? message;
}
