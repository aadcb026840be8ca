/**
 * Symlink Manager for agentpack
 *
 * Creates, inspects, and removes the symlinks that point a host's
 * configuration directory at the pack.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorMessage } from "@agentpack/core";
import { isNotFound } from "./fs-helpers.js";

// ============================================================================
// Types
// ============================================================================

export type LinkAction = "created" | "updated" | "replaced" | "unchanged" | "skipped" | "error";

export interface LinkOptions {
  /** Move a real file or directory aside instead of skipping it */
  force?: boolean;
  /** Compute the action without touching the filesystem */
  dryRun?: boolean;
}

export interface CreateLinkResult {
  success: boolean;
  action: LinkAction;
  backupPath?: string;
  message?: string;
  error?: string;
}

export interface RemoveLinkResult {
  success: boolean;
  existed: boolean;
  removed: boolean;
  error?: string;
}

export type LinkState =
  | { kind: "missing" }
  | { kind: "file" }
  | { kind: "directory" }
  | { kind: "symlink"; target: string; resolved: string; dangling: boolean };

// ============================================================================
// Inspection
// ============================================================================

/** Absolute target of a symlink, resolved against the link's directory */
export function resolveLinkTarget(linkPath: string, target: string): string {
  return path.resolve(path.dirname(linkPath), target);
}

/**
 * Describe what sits at a path without following a symlink there.
 */
export async function inspectPath(linkPath: string): Promise<LinkState> {
  let stats;
  try {
    stats = await fs.lstat(linkPath);
  } catch (error) {
    if (isNotFound(error)) return { kind: "missing" };
    throw error;
  }

  if (stats.isSymbolicLink()) {
    const target = await fs.readlink(linkPath);
    const resolved = resolveLinkTarget(linkPath, target);
    let dangling = false;
    try {
      await fs.stat(linkPath);
    } catch (error) {
      if (!isNotFound(error)) throw error;
      dangling = true;
    }
    return { kind: "symlink", target, resolved, dangling };
  }

  return stats.isDirectory() ? { kind: "directory" } : { kind: "file" };
}

/**
 * Check if a symlink exists and points to the expected target.
 */
export async function isSymlinkValid(linkPath: string, expectedTarget: string): Promise<boolean> {
  const state = await inspectPath(linkPath);
  return state.kind === "symlink" && state.resolved === path.resolve(expectedTarget);
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Point linkPath at sourcePath. Existing symlinks are re-pointed; a real
 * file or directory is moved to `<path>.backup.<ms>` with force and left
 * alone without it.
 */
export async function createLink(
  sourcePath: string,
  linkPath: string,
  options: LinkOptions = {}
): Promise<CreateLinkResult> {
  const source = path.resolve(sourcePath);
  try {
    const state = await inspectPath(linkPath);

    if (state.kind === "missing") {
      if (!options.dryRun) {
        await fs.mkdir(path.dirname(linkPath), { recursive: true });
        await fs.symlink(source, linkPath);
      }
      return { success: true, action: "created" };
    }

    if (state.kind === "symlink") {
      if (state.resolved === source) {
        return { success: true, action: "unchanged" };
      }
      if (!options.dryRun) {
        await fs.unlink(linkPath);
        await fs.symlink(source, linkPath);
      }
      return { success: true, action: "updated", message: `was ${state.target}` };
    }

    if (!options.force) {
      return {
        success: true,
        action: "skipped",
        message: `${state.kind} exists at ${linkPath}; use --force to back it up and replace it`,
      };
    }

    const backupPath = `${linkPath}.backup.${Date.now()}`;
    if (!options.dryRun) {
      await fs.rename(linkPath, backupPath);
      await fs.symlink(source, linkPath);
    }
    return { success: true, action: "replaced", backupPath };
  } catch (error) {
    return { success: false, action: "error", error: errorMessage(error) };
  }
}

/**
 * Remove a symlink. Only removes actual symlinks, and with expectedTarget
 * only those pointing there.
 */
export async function removeLink(
  linkPath: string,
  expectedTarget?: string,
  options: Pick<LinkOptions, "dryRun"> = {}
): Promise<RemoveLinkResult> {
  try {
    const state = await inspectPath(linkPath);
    if (state.kind === "missing") {
      return { success: true, existed: false, removed: false };
    }

    if (state.kind !== "symlink") {
      return {
        success: false,
        existed: true,
        removed: false,
        error: `Path exists but is not a symlink: ${linkPath}`,
      };
    }

    if (expectedTarget !== undefined && state.resolved !== path.resolve(expectedTarget)) {
      return {
        success: false,
        existed: true,
        removed: false,
        error: `Symlink points elsewhere (${state.target}): ${linkPath}`,
      };
    }

    if (!options.dryRun) await fs.unlink(linkPath);
    return { success: true, existed: true, removed: true };
  } catch (error) {
    return { success: false, existed: true, removed: false, error: errorMessage(error) };
  }
}

/**
 * Symlinks directly inside dir whose target no longer exists.
 */
export async function findBrokenSymlinks(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  const broken: string[] = [];
  for (const entry of entries.sort()) {
    const entryPath = path.join(dir, entry);
    const state = await inspectPath(entryPath);
    if (state.kind === "symlink" && state.dangling) broken.push(entryPath);
  }
  return broken;
}

/**
 * Symlinks directly inside dir that point somewhere under root.
 */
export async function findLinksInto(dir: string, root: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  const base = path.resolve(root);
  const links: string[] = [];
  for (const entry of entries.sort()) {
    const entryPath = path.join(dir, entry);
    const state = await inspectPath(entryPath);
    if (state.kind !== "symlink") continue;
    if (state.resolved === base || state.resolved.startsWith(base + path.sep)) {
      links.push(entryPath);
    }
  }
  return links;
}
