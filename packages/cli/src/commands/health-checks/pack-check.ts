/**
 * Pack content checks for doctor command.
 */

import * as path from "node:path";
import { pathExists } from "@agentpack/core";
import type { LoadedPack } from "../../core/pack-loader.js";
import { lintPack } from "../../core/linter.js";
import type { DiagnosticResult } from "./types.js";

/**
 * Check that the pack has its agent and command directories
 */
export async function checkPackDirs(pack: LoadedPack): Promise<DiagnosticResult> {
  const missing: string[] = [];
  for (const dir of [pack.agentsDir, pack.commandsDir]) {
    if (!(await pathExists(dir))) missing.push(path.relative(pack.root, dir) || dir);
  }

  if (missing.length === 0) {
    return {
      name: "Pack Directories",
      status: "pass",
      message: `${pack.agents.length} agents, ${pack.commands.length} commands`,
    };
  }

  return {
    name: "Pack Directories",
    status: "fail",
    message: `Missing: ${missing.join(", ")}`,
    fix: "Run: agentpack new agent <name> (or check agentsDir/commandsDir in agentpack.yaml)",
  };
}

/**
 * Check that the host configuration file parses
 */
export function checkConfigFile(pack: LoadedPack): DiagnosticResult {
  const loaded = pack.hostConfig;
  const name = "Host Config File";

  if (!loaded) {
    return { name, status: "pass", message: `Config not present: ${pack.config.configFile}` };
  }

  if (!loaded.ok) {
    const where = loaded.error.line !== undefined ? `:${loaded.error.line}` : "";
    return {
      name,
      status: "fail",
      message: `Invalid JSON in ${loaded.relPath}${where}: ${loaded.error.message}`,
      fix: `Check ${loaded.relPath} for syntax errors`,
    };
  }

  return { name, status: "pass", message: `Config is valid: ${loaded.relPath}` };
}

/**
 * Lint the pack: errors fail, warnings warn
 */
export function checkLint(pack: LoadedPack): DiagnosticResult {
  const report = lintPack(pack);
  const name = "Lint";

  if (report.errorCount > 0) {
    return {
      name,
      status: "fail",
      message: `${report.errorCount} errors, ${report.warningCount} warnings in ${report.fileCount} files`,
      fix: "Run: agentpack lint",
    };
  }

  if (report.warningCount > 0) {
    return {
      name,
      status: "warn",
      message: `${report.warningCount} warnings in ${report.fileCount} files`,
      fix: "Run: agentpack lint",
    };
  }

  return { name, status: "pass", message: `${report.fileCount} files, no problems` };
}
