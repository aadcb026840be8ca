/**
 * Host configuration file loading (opencode.json / opencode.jsonc).
 *
 * Both go through jsonc-parser so errors carry an offset. Only `.jsonc`
 * files may hold comments and trailing commas.
 */

import * as path from "node:path";
import * as jsonc from "jsonc-parser";
import {
  type HostConfigFile,
  hostConfigSchema,
  toMcpServerEntry,
} from "@agentpack/core";
import { readFileIfExists, relativePath, lineAt } from "./fs-helpers.js";

// ============================================================================
// Types
// ============================================================================

export interface ConfigParseError {
  message: string;
  line?: number;
}

export type LoadedHostConfig =
  | { ok: true; path: string; relPath: string; raw: string; data: unknown }
  | { ok: false; path: string; relPath: string; raw: string; error: ConfigParseError };

// ============================================================================
// Core
// ============================================================================

/**
 * Parse configuration text. Comments and trailing commas are accepted only
 * when the file name ends in .jsonc.
 */
export function parseConfigText(
  text: string,
  fileName: string
): { ok: true; data: unknown } | { ok: false; error: ConfigParseError } {
  const lenient = path.extname(fileName).toLowerCase() === ".jsonc";
  const errors: jsonc.ParseError[] = [];
  const data: unknown = jsonc.parse(text, errors, {
    disallowComments: !lenient,
    allowTrailingComma: lenient,
  });
  const [first] = errors;
  if (first) {
    return {
      ok: false,
      error: {
        message: `${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`,
        line: lineAt(text, first.offset),
      },
    };
  }
  return { ok: true, data };
}

/**
 * Load the host configuration file from the pack. Returns null when the
 * pack has none.
 */
export async function loadHostConfig(
  root: string,
  configFile: string
): Promise<LoadedHostConfig | null> {
  const filePath = path.resolve(root, configFile);
  const raw = await readFileIfExists(filePath);
  if (raw === null) return null;

  const relPath = relativePath(root, filePath);
  const parsed = parseConfigText(raw, filePath);
  if (!parsed.ok) {
    return { ok: false, path: filePath, relPath, raw, error: parsed.error };
  }
  return { ok: true, path: filePath, relPath, raw, data: parsed.data };
}

/**
 * Validate a loaded config and convert it to a HostConfigFile.
 * Returns null when it failed to parse or validate.
 */
export function toHostConfigFile(loaded: LoadedHostConfig): HostConfigFile | null {
  if (!loaded.ok) return null;
  const result = hostConfigSchema.safeParse(loaded.data);
  if (!result.success) return null;

  const mcp = Object.entries(result.data.mcp ?? {})
    .map(([name, entry]) => toMcpServerEntry(name, entry))
    .sort((a, b) => a.name.localeCompare(b.name));
  return { path: loaded.path, mcp };
}

/**
 * 1-based line of the JSON node at a property path, falling back to the
 * nearest ancestor that exists.
 */
export function lineOfJsonPath(raw: string, jsonPath: (string | number)[]): number | undefined {
  const tree = jsonc.parseTree(raw);
  if (!tree) return undefined;

  for (let depth = jsonPath.length; depth > 0; depth--) {
    const node = jsonc.findNodeAtLocation(tree, jsonPath.slice(0, depth));
    if (node) {
      // Report the property key line rather than the value's
      const target = node.parent?.type === "property" ? node.parent : node;
      return lineAt(raw, target.offset);
    }
  }
  return undefined;
}
