/**
 * New Command for agentpack CLI
 *
 * Scaffolds an agent or command file with valid frontmatter.
 */

import { Command } from "commander";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  type DefinitionKind,
  type PackConfig,
  ensureDir,
  errorMessage,
  isKebabCase,
  pathExists,
  stringifyFrontmatter,
} from "@agentpack/core";
import { loadPackContext, parseChoice } from "./shared.js";

// ============================================================================
// Types
// ============================================================================

export const DEFINITION_KINDS: readonly DefinitionKind[] = ["agent", "command"];

export interface ScaffoldOptions {
  description?: string;
  force?: boolean;
}

export interface ScaffoldResult {
  success: boolean;
  path?: string;
  error?: string;
}

// ============================================================================
// Core Functions
// ============================================================================

/** "security-reviewer" -> "Security Reviewer" */
export function titleFromName(name: string): string {
  return name
    .split("-")
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Render the text of a new definition file
 */
export function renderDefinition(kind: DefinitionKind, name: string, description?: string): string {
  const title = titleFromName(name);

  if (kind === "agent") {
    return stringifyFrontmatter(
      { description: description ?? `Describe when to use the ${name} agent`, mode: "subagent" },
      `# ${title}\n\nYou are the ${title} agent.\n`
    );
  }

  return stringifyFrontmatter(
    { description: description ?? `Describe what /${name} does` },
    `# ${title}\n\n1. First step\n`
  );
}

/**
 * Write a new agent or command file into the pack
 */
export async function scaffoldDefinition(
  root: string,
  config: PackConfig,
  kind: DefinitionKind,
  name: string,
  options: ScaffoldOptions = {}
): Promise<ScaffoldResult> {
  if (!isKebabCase(name)) {
    return {
      success: false,
      error: `Invalid name "${name}": use lowercase kebab-case (e.g. security-reviewer)`,
    };
  }

  const dir = path.resolve(root, kind === "agent" ? config.agentsDir : config.commandsDir);
  const filePath = path.join(dir, `${name}.md`);

  if (!options.force && (await pathExists(filePath))) {
    return { success: false, error: `File already exists: ${filePath} (use --force to overwrite)` };
  }

  try {
    await ensureDir(dir);
    await fs.writeFile(filePath, renderDefinition(kind, name, options.description), "utf-8");
    return { success: true, path: filePath };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

// ============================================================================
// Commander.js Command
// ============================================================================

export const newCommand = new Command("new")
  .description("Create an agent or command file")
  .argument("<kind>", `One of: ${DEFINITION_KINDS.join(", ")}`)
  .argument("<name>", "Lowercase kebab-case name")
  .option("-r, --root <dir>", "Pack root directory (default: current directory)")
  .option("-d, --description <text>", "Description for the frontmatter")
  .option("-f, --force", "Overwrite an existing file")
  .action(async (kind: string, name: string, options: { root?: string; description?: string; force?: boolean }) => {
    try {
      const definitionKind = parseChoice(kind, DEFINITION_KINDS, "kind");
      const { root, config } = await loadPackContext(options.root);
      const result = await scaffoldDefinition(root, config, definitionKind, name, {
        description: options.description,
        force: options.force ?? false,
      });

      if (result.success) {
        console.log(`✓ Created ${path.relative(process.cwd(), result.path ?? "") || result.path}`);
      } else {
        console.error(`Error: ${result.error}`);
        process.exit(1);
      }
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
