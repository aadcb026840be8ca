/**
 * Doctor Command for agentpack CLI
 *
 * Checks pack health:
 * - agentpack.yaml loads and the pack directories exist
 * - the host config file parses and the pack lints clean
 * - each host has the pack installed, with no broken symlinks
 * - enabled MCP servers have their environment variables set
 */

import { Command } from "commander";
import { errorMessage } from "@agentpack/core";
import { runAllChecks, formatDoctorOutput, formatDoctorJson } from "./health-checks/index.js";
import { getTracer } from "../core/global-tracer.js";

export const doctorCommand = new Command("doctor")
  .description("Check pack health and diagnose install issues")
  .option("-r, --root <dir>", "Pack root directory (default: current directory)")
  .option("--host <ids...>", "Hosts to check (default: hosts from agentpack.yaml)")
  .option("-j, --json", "Output as JSON")
  .action(async (options: { root?: string; host?: string[]; json?: boolean }) => {
    try {
      const result = await runAllChecks({
        root: options.root ?? process.cwd(),
        hosts: options.host,
        log: getTracer().createTrace("doctor"),
      });

      console.log(options.json ? formatDoctorJson(result) : formatDoctorOutput(result));

      // Exit with non-zero if checks failed
      process.exitCode = result.success ? 0 : 1;
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
