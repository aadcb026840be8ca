/**
 * Install Command for agentpack CLI
 *
 * Places the pack's agents, commands, and config file into each host's
 * configuration directory as symlinks (default) or copies.
 */

import { Command } from "commander";
import {
  type InstallMode,
  type InstallStrategy,
  contractPath,
  errorMessage,
} from "@agentpack/core";
import {
  type InstallEntry,
  type InstallPlan,
  type InstallResult,
  install,
  planInstall,
} from "../core/installer.js";
import { getTracer } from "../core/global-tracer.js";
import { NULL_LOGGER, type TraceLogger, withFields } from "../core/tracer.js";
import { loadPackContext, parseChoice, resolveHosts } from "./shared.js";

// ============================================================================
// Types
// ============================================================================

export const INSTALL_MODES: readonly InstallMode[] = ["symlink", "copy"];
export const INSTALL_STRATEGIES: readonly InstallStrategy[] = ["directory", "files"];

export interface InstallCommandOptions {
  hosts?: string[];
  mode?: InstallMode;
  strategy?: InstallStrategy;
  force?: boolean;
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
  home?: string;
  log?: TraceLogger;
}

export interface HostInstall {
  plan: InstallPlan;
  result: InstallResult;
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Copies cannot follow later edits to a directory, so copy mode always
 * places files one by one.
 */
export function effectiveStrategy(mode: InstallMode, strategy?: InstallStrategy): InstallStrategy {
  if (mode === "copy") return "files";
  return strategy ?? "directory";
}

/**
 * Install the pack at root into every selected host
 */
export async function runInstall(root: string | undefined, options: InstallCommandOptions = {}): Promise<HostInstall[]> {
  const log = options.log ?? NULL_LOGGER;
  const { root: packRoot, config } = await loadPackContext(root);
  const mode = options.mode ?? config.installMode;
  const strategy = effectiveStrategy(mode, options.strategy);

  const installs: HostInstall[] = [];
  for (const host of resolveHosts(options.hosts, config)) {
    const hostLog = withFields(log, { host: host.id, mode });
    const plan = await planInstall(packRoot, config, host, { strategy, env: options.env, home: options.home });
    hostLog.debug({
      scope: "plan",
      op: "resolve",
      path: plan.paths.configDir,
      msg: `${plan.targets.length} targets (${strategy})`,
    });
    const result = await install(plan, { mode, force: options.force, dryRun: options.dryRun, log: hostLog });
    installs.push({ plan, result });
  }
  return installs;
}

const ACTION_ICON: Record<InstallEntry["action"], string> = {
  created: "✓",
  updated: "✓",
  replaced: "✓",
  unchanged: "·",
  skipped: "⚠",
  error: "✗",
};

/**
 * Format one host's install result
 */
export function formatInstall({ plan, result }: HostInstall, dryRun = false, home?: string): string {
  const lines: string[] = [];
  const suffix = dryRun ? ", dry run" : "";
  lines.push(`${plan.host.display.name} (${result.mode}, ${plan.strategy}${suffix})`);

  if (result.entries.length === 0) {
    lines.push("  Nothing to install");
  }
  for (const dir of result.unlinkedDirs) {
    lines.push(`  ✓ unlinked   ${contractPath(dir, home)}`);
  }
  for (const entry of result.entries) {
    const icon = ACTION_ICON[entry.action];
    lines.push(`  ${icon} ${entry.action.padEnd(9)}  ${contractPath(entry.target.target, home)}`);
    if (entry.backupPath) lines.push(`      backup: ${contractPath(entry.backupPath, home)}`);
    if (entry.message && entry.action !== "updated") lines.push(`      ${entry.message}`);
    if (entry.error) lines.push(`      ${entry.error}`);
  }
  for (const link of result.pruned) {
    lines.push(`  ✓ pruned     ${contractPath(link, home)}`);
  }

  return lines.join("\n");
}

// ============================================================================
// Commander.js Command
// ============================================================================

export const installCommand = new Command("install")
  .description("Link (or copy) the pack into host configuration directories")
  .option("-r, --root <dir>", "Pack root directory (default: current directory)")
  .option("--host <ids...>", "Hosts to install into (default: hosts from agentpack.yaml)")
  .option("-m, --mode <mode>", `Install mode: ${INSTALL_MODES.join(", ")}`)
  .option("-s, --strategy <strategy>", `Layout: ${INSTALL_STRATEGIES.join(", ")}`)
  .option("-f, --force", "Back up and replace files that are in the way")
  .option("-n, --dry-run", "Show what would change without touching anything")
  .action(async (
    options: { root?: string; host?: string[]; mode?: string; strategy?: string; force?: boolean; dryRun?: boolean }
  ) => {
    try {
      const installs = await runInstall(options.root, {
        hosts: options.host,
        mode: options.mode !== undefined ? parseChoice(options.mode, INSTALL_MODES, "--mode") : undefined,
        strategy: options.strategy !== undefined ? parseChoice(options.strategy, INSTALL_STRATEGIES, "--strategy") : undefined,
        force: options.force ?? false,
        dryRun: options.dryRun ?? false,
        log: getTracer().createTrace("install"),
      });

      console.log(installs.map(i => formatInstall(i, options.dryRun)).join("\n\n"));
      if (installs.some(i => !i.result.success)) {
        process.exit(1);
      }
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
