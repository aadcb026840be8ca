/**
 * List Command for agentpack CLI
 *
 * Prints the agents, commands, and MCP servers of a pack.
 */

import { Command } from "commander";
import { errorMessage, referencedAgentNames } from "@agentpack/core";
import { type LoadedPack, loadPack, toAgentDefinition, toCommandDefinition } from "../core/pack-loader.js";
import { toHostConfigFile } from "../core/config-loader.js";
import { loadPackContext, parseChoice } from "./shared.js";

// ============================================================================
// Types
// ============================================================================

export type ListSection = "agents" | "commands" | "mcp";

export const LIST_SECTIONS: readonly ListSection[] = ["agents", "commands", "mcp"];

export interface AgentRow {
  name: string;
  /** Agent mode, "-" when unset, "?" when the frontmatter is invalid */
  mode: string;
  description: string;
  disabled: boolean;
}

export interface CommandRow {
  name: string;
  description: string;
  agents: string[];
}

export interface McpRow {
  name: string;
  type: string;
  enabled: boolean;
  timeout?: number;
  env: string[];
}

export interface Listing {
  agents?: AgentRow[];
  commands?: CommandRow[];
  mcp?: McpRow[];
}

const INVALID = "(invalid frontmatter)";

// ============================================================================
// Core Functions
// ============================================================================

export function listAgents(pack: LoadedPack): AgentRow[] {
  return pack.agents.map((def) => {
    const agent = toAgentDefinition(def);
    if (!agent) return { name: def.name, mode: "?", description: INVALID, disabled: false };
    return {
      name: agent.name,
      mode: agent.mode ?? "-",
      description: agent.description,
      disabled: agent.disable,
    };
  });
}

export function listCommands(pack: LoadedPack): CommandRow[] {
  return pack.commands.map((def) => {
    const command = toCommandDefinition(def);
    if (!command) return { name: def.name, description: INVALID, agents: [] };
    const agents = referencedAgentNames(command.agentReferences);
    return {
      name: command.name,
      description: command.description,
      agents: command.agent ? [...new Set([command.agent, ...agents])] : agents,
    };
  });
}

export function listMcpServers(pack: LoadedPack): McpRow[] {
  const config = pack.hostConfig ? toHostConfigFile(pack.hostConfig) : null;
  if (!config) return [];
  return config.mcp.map((entry) => ({
    name: entry.name,
    type: entry.type,
    enabled: entry.enabled,
    timeout: entry.timeout,
    env: entry.envRefs,
  }));
}

export function buildListing(pack: LoadedPack, section?: ListSection): Listing {
  const listing: Listing = {};
  if (!section || section === "agents") listing.agents = listAgents(pack);
  if (!section || section === "commands") listing.commands = listCommands(pack);
  if (!section || section === "mcp") listing.mcp = listMcpServers(pack);
  return listing;
}

function table(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map(row =>
    row.map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0))).join("  ").trimEnd()
  );
}

/**
 * Format a listing as aligned text sections
 */
export function formatListing(listing: Listing): string {
  const lines: string[] = [];

  if (listing.agents) {
    lines.push(`Agents (${listing.agents.length})`);
    lines.push(...table(listing.agents.map(a => [
      `  ${a.name}`,
      a.disabled ? `${a.mode} (disabled)` : a.mode,
      a.description,
    ])));
    lines.push("");
  }

  if (listing.commands) {
    lines.push(`Commands (${listing.commands.length})`);
    lines.push(...table(listing.commands.map(c => [
      `  /${c.name}`,
      c.agents.length > 0 ? c.agents.join(", ") : "-",
    ])));
    lines.push("");
  }

  if (listing.mcp) {
    lines.push(`MCP Servers (${listing.mcp.length})`);
    lines.push(...table(listing.mcp.map(m => [
      `  ${m.name}`,
      m.enabled ? "enabled" : "disabled",
      m.timeout !== undefined ? `${m.timeout}ms` : "-",
      m.env.length > 0 ? m.env.join(", ") : "-",
    ])));
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

// ============================================================================
// Commander.js Command
// ============================================================================

export const listCommand = new Command("list")
  .description("List agents, commands, and MCP servers in the pack")
  .argument("[section]", `One of: ${LIST_SECTIONS.join(", ")} (default: all)`)
  .option("-r, --root <dir>", "Pack root directory (default: current directory)")
  .option("-j, --json", "Output as JSON")
  .action(async (section: string | undefined, options: { root?: string; json?: boolean }) => {
    try {
      const which = section !== undefined ? parseChoice(section, LIST_SECTIONS, "section") : undefined;
      const { root, config } = await loadPackContext(options.root);
      const listing = buildListing(await loadPack(root, config), which);
      console.log(options.json ? JSON.stringify(listing, null, 2) : formatListing(listing));
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
