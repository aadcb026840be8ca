/**
 * Status Command for agentpack CLI
 *
 * Shows, per host, whether each target is linked, copied, stale, missing,
 * foreign, or broken.
 */

import { Command } from "commander";
import { contractPath, errorMessage } from "@agentpack/core";
import {
  type InstallPlan,
  type StatusEntry,
  type TargetStatus,
  planInstalled,
  status,
} from "../core/installer.js";
import { loadPackContext, resolveHosts } from "./shared.js";

// ============================================================================
// Types
// ============================================================================

export interface HostStatus {
  host: string;
  name: string;
  configDir: string;
  strategy: InstallPlan["strategy"];
  entries: StatusEntry[];
}

export interface StatusCommandOptions {
  hosts?: string[];
  env?: NodeJS.ProcessEnv;
  home?: string;
}

const STATUS_COLOR: Record<TargetStatus, string> = {
  linked: "\u001b[32m", // Green
  copied: "\u001b[32m",
  stale: "\u001b[33m", // Yellow
  missing: "\u001b[90m", // Gray
  foreign: "\u001b[33m",
  broken: "\u001b[31m", // Red
};
const RESET = "\u001b[0m";

// ============================================================================
// Core Functions
// ============================================================================

export async function getStatus(root: string | undefined, options: StatusCommandOptions = {}): Promise<HostStatus[]> {
  const { root: packRoot, config } = await loadPackContext(root);

  const statuses: HostStatus[] = [];
  for (const host of resolveHosts(options.hosts, config)) {
    const plan = await planInstalled(packRoot, config, host, { env: options.env, home: options.home });
    statuses.push({
      host: host.id,
      name: host.display.name,
      configDir: plan.paths.configDir,
      strategy: plan.strategy,
      entries: await status(plan),
    });
  }
  return statuses;
}

export function formatStatus(statuses: HostStatus[], options: { color?: boolean; home?: string } = {}): string {
  const paint = (text: string, code: string): string => (options.color ? `${code}${text}${RESET}` : text);
  const lines: string[] = [];

  for (const host of statuses) {
    lines.push(`${host.name}  ${contractPath(host.configDir, options.home)}  (${host.strategy})`);
    if (host.entries.length === 0) lines.push("  Nothing to install");
    for (const entry of host.entries) {
      const label = paint(entry.status.padEnd(7), STATUS_COLOR[entry.status]);
      const arrow = entry.linkTarget ? `  -> ${entry.linkTarget}` : "";
      lines.push(`  ${label}  ${contractPath(entry.target.target, options.home)}${arrow}`);
    }
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

// ============================================================================
// Commander.js Command
// ============================================================================

export const statusCommand = new Command("status")
  .description("Show install status of the pack in each host")
  .option("-r, --root <dir>", "Pack root directory (default: current directory)")
  .option("--host <ids...>", "Hosts to check (default: hosts from agentpack.yaml)")
  .option("-j, --json", "Output as JSON")
  .action(async (options: { root?: string; host?: string[]; json?: boolean }) => {
    try {
      const statuses = await getStatus(options.root, { hosts: options.host });
      if (options.json) {
        console.log(JSON.stringify(statuses, null, 2));
      } else {
        console.log(formatStatus(statuses, { color: process.stdout.isTTY }));
      }
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
