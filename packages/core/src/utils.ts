/**
 * Utility functions for agentpack
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Expand ~ to home directory in path
 */
export function expandPath(p: string, home: string = os.homedir()): string {
  if (p === "~" || p.startsWith("~/")) {
    return path.join(home, p.slice(1));
  }
  return p;
}

/**
 * Contract home directory to ~ in path
 */
export function contractPath(p: string, home: string = os.homedir()): string {
  if (p === home || p.startsWith(home + path.sep)) {
    return "~" + p.slice(home.length);
  }
  return p;
}

/**
 * Get the agentpack home directory (traces, state).
 * Honors AGENTPACK_HOME, defaulting to ~/.agentpack.
 */
export function getAgentpackHome(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.AGENTPACK_HOME;
  return fromEnv ? expandPath(fromEnv) : expandPath("~/.agentpack");
}

/**
 * Derive a definition name from its file path (filename without extension)
 */
export function deriveName(filePath: string): string {
  return path.parse(filePath).name;
}

const KEBAB_CASE = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

/**
 * Check whether a name is lowercase kebab-case (e.g. "security-reviewer")
 */
export function isKebabCase(name: string): boolean {
  return KEBAB_CASE.test(name);
}

/**
 * Narrow an unknown value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check if a path exists
 */
export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Format an error value for display
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
