/**
 * Uninstall Command for agentpack CLI
 *
 * Removes what install placed. Symlinks are removed only when they point
 * into the pack, copies only when they still match the pack.
 */

import { Command } from "commander";
import { type InstallMode, type InstallStrategy, contractPath, errorMessage } from "@agentpack/core";
import {
  type InstallPlan,
  type UninstallResult,
  planInstall,
  planInstalled,
  uninstall,
} from "../core/installer.js";
import { getTracer } from "../core/global-tracer.js";
import { NULL_LOGGER, type TraceLogger, withFields } from "../core/tracer.js";
import { INSTALL_MODES, INSTALL_STRATEGIES } from "./install.js";
import { loadPackContext, parseChoice, resolveHosts } from "./shared.js";

export interface UninstallCommandOptions {
  hosts?: string[];
  mode?: InstallMode;
  /** Detected from what is on disk when unset */
  strategy?: InstallStrategy;
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
  home?: string;
  log?: TraceLogger;
}

export interface HostUninstall {
  plan: InstallPlan;
  result: UninstallResult;
}

export async function runUninstall(
  root: string | undefined,
  options: UninstallCommandOptions = {}
): Promise<HostUninstall[]> {
  const log = options.log ?? NULL_LOGGER;
  const { root: packRoot, config } = await loadPackContext(root);

  const results: HostUninstall[] = [];
  for (const host of resolveHosts(options.hosts, config)) {
    const pathOptions = { env: options.env, home: options.home };
    const plan = options.strategy
      ? await planInstall(packRoot, config, host, { ...pathOptions, strategy: options.strategy })
      : await planInstalled(packRoot, config, host, pathOptions);
    const hostLog = withFields(log, { host: host.id });
    const result = await uninstall(plan, { mode: options.mode, dryRun: options.dryRun, log: hostLog });
    results.push({ plan, result });
  }
  return results;
}

export function formatUninstall({ plan, result }: HostUninstall, home?: string): string {
  const lines = [`${plan.host.display.name} (${plan.strategy})`];
  for (const entry of result.entries) {
    if (entry.action === "missing") continue;
    const icon = entry.action === "removed" ? "✓" : entry.action === "kept" ? "·" : "✗";
    const note = entry.message ? `  (${entry.message})` : "";
    lines.push(`  ${icon} ${entry.action.padEnd(7)}  ${contractPath(entry.target.target, home)}${note}`);
  }
  for (const link of result.pruned) {
    lines.push(`  ✓ pruned   ${contractPath(link, home)}`);
  }
  if (lines.length === 1) lines.push("  Nothing installed");
  return lines.join("\n");
}

export const uninstallCommand = new Command("uninstall")
  .description("Remove the pack's links or copies from host configuration directories")
  .option("-r, --root <dir>", "Pack root directory (default: current directory)")
  .option("--host <ids...>", "Hosts to uninstall from (default: hosts from agentpack.yaml)")
  .option("-m, --mode <mode>", `Only remove: ${INSTALL_MODES.join(", ")}`)
  .option("-s, --strategy <strategy>", `Layout: ${INSTALL_STRATEGIES.join(", ")} (default: detected)`)
  .option("-n, --dry-run", "Show what would be removed without touching anything")
  .action(async (
    options: { root?: string; host?: string[]; mode?: string; strategy?: string; dryRun?: boolean }
  ) => {
    try {
      const results = await runUninstall(options.root, {
        hosts: options.host,
        mode: options.mode !== undefined ? parseChoice(options.mode, INSTALL_MODES, "--mode") : undefined,
        strategy: options.strategy !== undefined ? parseChoice(options.strategy, INSTALL_STRATEGIES, "--strategy") : undefined,
        dryRun: options.dryRun ?? false,
        log: getTracer().createTrace("uninstall"),
      });

      console.log(results.map(r => formatUninstall(r)).join("\n\n"));
      if (results.some(r => !r.result.success)) {
        process.exit(1);
      }
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
