/**
 * Pack Loader
 *
 * Scans the agent and command directories of a pack, parses every
 * definition's frontmatter, and loads the host configuration file.
 * Loading never fails on bad content; problems are left for the linter.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  type AgentDefinition,
  type CommandDefinition,
  type DefinitionKind,
  type FrontmatterResult,
  type PackConfig,
  agentFrontmatterSchema,
  commandFrontmatterSchema,
  deriveName,
  extractAgentReferences,
  parseFrontmatter,
} from "@agentpack/core";
import { isNotFound, relativePath } from "./fs-helpers.js";
import { loadHostConfig, type LoadedHostConfig } from "./config-loader.js";

// ============================================================================
// Types
// ============================================================================

export interface LoadedDefinition {
  kind: DefinitionKind;
  name: string;
  /** Absolute path */
  path: string;
  /** Path relative to the pack root, with forward slashes */
  relPath: string;
  content: string;
  frontmatter: FrontmatterResult;
}

export interface LoadedPack {
  root: string;
  config: PackConfig;
  agentsDir: string;
  commandsDir: string;
  agents: LoadedDefinition[];
  commands: LoadedDefinition[];
  hostConfig: LoadedHostConfig | null;
}

// ============================================================================
// Core
// ============================================================================

/**
 * Load all *.md definitions from a directory. Hidden files are skipped and
 * results are sorted by file name. Returns [] if the directory is missing.
 */
export async function loadDefinitionsFromDir(
  root: string,
  dir: string,
  kind: DefinitionKind
): Promise<LoadedDefinition[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  const definitions: LoadedDefinition[] = [];

  for (const entry of entries.sort()) {
    if (entry.startsWith(".")) continue;
    if (path.extname(entry).toLowerCase() !== ".md") continue;

    const filePath = path.join(dir, entry);
    let stats;
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      // Dangling symlink
      if (isNotFound(error)) continue;
      throw error;
    }
    if (!stats.isFile()) continue;

    const content = await fs.readFile(filePath, "utf-8");
    definitions.push({
      kind,
      name: deriveName(entry),
      path: filePath,
      relPath: relativePath(root, filePath),
      content,
      frontmatter: parseFrontmatter(content),
    });
  }

  return definitions;
}

/**
 * Load a whole pack: agents, commands, and the host configuration file.
 */
export async function loadPack(root: string, config: PackConfig): Promise<LoadedPack> {
  const packRoot = path.resolve(root);
  const agentsDir = path.resolve(packRoot, config.agentsDir);
  const commandsDir = path.resolve(packRoot, config.commandsDir);

  const [agents, commands, hostConfig] = await Promise.all([
    loadDefinitionsFromDir(packRoot, agentsDir, "agent"),
    loadDefinitionsFromDir(packRoot, commandsDir, "command"),
    loadHostConfig(packRoot, config.configFile),
  ]);

  return { root: packRoot, config, agentsDir, commandsDir, agents, commands, hostConfig };
}

/**
 * Typed agent definition, or null when the frontmatter does not validate.
 */
export function toAgentDefinition(def: LoadedDefinition): AgentDefinition | null {
  if (!def.frontmatter.ok) return null;
  const result = agentFrontmatterSchema.safeParse(def.frontmatter.data);
  if (!result.success) return null;

  const fm = result.data;
  return {
    name: def.name,
    path: def.path,
    description: fm.description,
    mode: fm.mode,
    model: fm.model,
    temperature: fm.temperature,
    tools: fm.tools ?? {},
    disable: fm.disable ?? false,
    permission: fm.permission,
    body: def.frontmatter.body,
  };
}

/**
 * Typed command definition, or null when the frontmatter does not validate.
 */
export function toCommandDefinition(def: LoadedDefinition): CommandDefinition | null {
  if (!def.frontmatter.ok) return null;
  const result = commandFrontmatterSchema.safeParse(def.frontmatter.data);
  if (!result.success) return null;

  const fm = result.data;
  return {
    name: def.name,
    path: def.path,
    description: fm.description,
    agent: fm.agent,
    model: fm.model,
    subtask: fm.subtask,
    body: def.frontmatter.body,
    agentReferences: extractAgentReferences(def.frontmatter.body, def.frontmatter.bodyLine),
  };
}
