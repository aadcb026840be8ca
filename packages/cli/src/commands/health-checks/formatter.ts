/**
 * Formatting functions for doctor output.
 */

import type { DiagnosticResult, DoctorResult } from "./types.js";

const RESET = "\u001b[0m";

const STATUS_STYLE: Record<DiagnosticResult["status"], { icon: string; color: string }> = {
  pass: { icon: "✔", color: "\u001b[32m" }, // Checkmark, green
  fail: { icon: "✘", color: "\u001b[31m" }, // X mark, red
  warn: { icon: "⚠", color: "\u001b[33m" }, // Warning, yellow
};

/**
 * Format doctor output for terminal display
 */
export function formatDoctorOutput(result: DoctorResult): string {
  const lines: string[] = [];

  lines.push("agentpack doctor");
  lines.push("================");
  lines.push("");

  for (const check of result.checks) {
    const { icon, color } = STATUS_STYLE[check.status];
    lines.push(`${color}${icon}${RESET} ${check.name}`);
    lines.push(`    ${check.message}`);

    if (check.fix && check.status !== "pass") {
      lines.push(`    ${color}Fix:${RESET} ${check.fix}`);
    }

    lines.push("");
  }

  const { passed, failed, warnings } = result.summary;
  lines.push("Summary:");
  lines.push(`  ${passed} passed`);
  lines.push(failed > 0 ? `  \u001b[31m${failed} failed${RESET}` : `  ${failed} failed`);
  const warningText = `${warnings} warning${warnings !== 1 ? "s" : ""}`;
  lines.push(warnings > 0 ? `  \u001b[33m${warningText}${RESET}` : `  ${warningText}`);

  lines.push("");
  if (result.success) {
    lines.push(`\u001b[32m✔ Pack health check passed${RESET}`);
  } else {
    lines.push(`\u001b[31m✘ Pack health check failed${RESET}`);
    lines.push("");
    lines.push("Run suggested fixes above to resolve issues.");
  }

  return lines.join("\n");
}

/**
 * Format doctor output as JSON
 */
export function formatDoctorJson(result: DoctorResult): string {
  return JSON.stringify(result, null, 2);
}
