/**
 * Host install checks for doctor command.
 */

import { contractPath } from "@agentpack/core";
import { type InstallPlan, status } from "../../core/installer.js";
import { findBrokenSymlinks } from "../../core/symlink-manager.js";
import type { DiagnosticResult } from "./types.js";

/**
 * Check that every target of a plan is installed and current
 */
export async function checkHostInstall(plan: InstallPlan, home?: string): Promise<DiagnosticResult> {
  const name = `${plan.host.display.name} Install`;
  const fix = `Run: agentpack install --host ${plan.host.id}`;
  const entries = await status(plan);

  if (entries.length === 0) {
    return { name, status: "pass", message: "Nothing to install for this host" };
  }

  const problems = entries.filter(e => e.status !== "linked" && e.status !== "copied");
  if (problems.length === 0) {
    return {
      name,
      status: "pass",
      message: `${entries.length} targets installed (${plan.strategy})`,
    };
  }

  if (problems.length === entries.length && problems.every(e => e.status === "missing")) {
    return { name, status: "warn", message: "Not installed", fix };
  }

  const details = problems.map(e => `${contractPath(e.target.target, home)} (${e.status})`);
  const hasForeign = problems.some(e => e.status === "foreign");
  return {
    name,
    status: "warn",
    message: `${problems.length} of ${entries.length} targets need attention: ${details.join(", ")}`,
    fix: hasForeign ? `${fix} --force` : fix,
  };
}

/**
 * Check for broken symlinks in the host's directories
 */
export async function checkHostBrokenSymlinks(plan: InstallPlan, home?: string): Promise<DiagnosticResult> {
  const name = `${plan.host.display.name} Symlinks`;
  const dirs = [plan.paths.configDir, plan.paths.agentsDir, plan.paths.commandsDir];

  const broken: string[] = [];
  for (const dir of dirs) {
    broken.push(...(await findBrokenSymlinks(dir)));
  }

  if (broken.length === 0) {
    return { name, status: "pass", message: "No broken symlinks" };
  }

  return {
    name,
    status: "warn",
    message: `${broken.length} broken symlinks: ${broken.map(p => contractPath(p, home)).join(", ")}`,
    fix: `Run: agentpack install --host ${plan.host.id} --force`,
  };
}
