/**
 * Orchestrates running all doctor health checks.
 */

import * as path from "node:path";
import { type HostDescriptor, type PackConfig, errorMessage, getHost } from "@agentpack/core";
import { toHostConfigFile } from "../../core/config-loader.js";
import { planInstalled } from "../../core/installer.js";
import { loadPack } from "../../core/pack-loader.js";
import { PACK_CONFIG_FILE, loadPackConfig } from "../../core/pack-config.js";
import { NULL_LOGGER } from "../../core/tracer.js";
import { checkConfigFile, checkLint, checkPackDirs } from "./pack-check.js";
import { checkHostBrokenSymlinks, checkHostInstall } from "./install-check.js";
import { checkMcpEnv } from "./env-check.js";
import type { DiagnosticResult, DoctorOptions, DoctorResult } from "./types.js";

function summarize(checks: DiagnosticResult[]): DoctorResult {
  const summary = {
    passed: checks.filter((c) => c.status === "pass").length,
    failed: checks.filter((c) => c.status === "fail").length,
    warnings: checks.filter((c) => c.status === "warn").length,
  };

  return {
    success: summary.failed === 0,
    checks,
    summary,
  };
}

/**
 * Run all diagnostic checks
 */
export async function runAllChecks(options: DoctorOptions): Promise<DoctorResult> {
  const root = path.resolve(options.root);
  const env = options.env ?? process.env;
  const log = options.log ?? NULL_LOGGER;
  const checks: DiagnosticResult[] = [];

  // 1. Pack configuration; nothing else can run without it
  let config: PackConfig;
  try {
    config = options.config ?? (await loadPackConfig(root));
    checks.push({ name: "Pack Configuration", status: "pass", message: `Hosts: ${config.hosts.join(", ")}` });
  } catch (error) {
    checks.push({
      name: "Pack Configuration",
      status: "fail",
      message: errorMessage(error),
      fix: `Check ${PACK_CONFIG_FILE} for invalid fields`,
    });
    return summarize(checks);
  }

  // 2. Pack content
  const pack = await loadPack(root, config);
  checks.push(await checkPackDirs(pack));
  checks.push(checkConfigFile(pack));
  checks.push(checkLint(pack));

  // 3. Each configured host
  for (const hostId of options.hosts ?? config.hosts) {
    let host: HostDescriptor;
    try {
      host = getHost(hostId);
    } catch (error) {
      checks.push({
        name: `Host ${hostId}`,
        status: "fail",
        message: errorMessage(error),
        fix: `Fix hosts in ${PACK_CONFIG_FILE}`,
      });
      continue;
    }

    const plan = await planInstalled(root, config, host, { env, home: options.home });
    checks.push(await checkHostInstall(plan, options.home));
    checks.push(await checkHostBrokenSymlinks(plan, options.home));
  }

  // 4. Environment of enabled MCP servers
  const hostConfig = pack.hostConfig ? toHostConfigFile(pack.hostConfig) : null;
  if (hostConfig) {
    checks.push(...checkMcpEnv(hostConfig, env));
  }

  for (const check of checks) {
    const fields = { scope: "doctor", op: "check", item: check.name, action: check.status, msg: check.message };
    if (check.status === "fail") log.warn(fields);
    else log.debug(fields);
  }

  return summarize(checks);
}
