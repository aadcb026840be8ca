/**
 * MCP environment checks for doctor command. Servers are never started;
 * only the variables their config refers to are looked up.
 */

import { type HostConfigFile, missingEnvVars } from "@agentpack/core";
import type { DiagnosticResult } from "./types.js";

/**
 * One result per enabled MCP server. Disabled servers are skipped.
 */
export function checkMcpEnv(config: HostConfigFile, env: NodeJS.ProcessEnv): DiagnosticResult[] {
  const results: DiagnosticResult[] = [];

  for (const entry of config.mcp) {
    if (!entry.enabled) continue;
    const name = `MCP Env: ${entry.name}`;
    const missing = missingEnvVars(entry, env);

    if (missing.length > 0) {
      results.push({
        name,
        status: "warn",
        message: `Unset: ${missing.join(", ")}`,
        fix: `export ${missing.map(v => `${v}=...`).join(" ")}`,
      });
      continue;
    }

    results.push({
      name,
      status: "pass",
      message: entry.envRefs.length > 0 ? `Set: ${entry.envRefs.join(", ")}` : "No environment variables needed",
    });
  }

  return results;
}
