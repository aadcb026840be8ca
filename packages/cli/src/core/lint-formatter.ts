/**
 * Formatting functions for lint output.
 */

import type { LintIssue, LintReport, Severity } from "@agentpack/core";

export type LintFormat = "stylish" | "json";

export const LINT_FORMATS: readonly LintFormat[] = ["stylish", "json"];

export interface StylishOptions {
  color?: boolean;
}

const RESET = "\u001b[0m";
const SEVERITY_COLOR: Record<Severity, string> = {
  error: "\u001b[31m", // Red
  warning: "\u001b[33m", // Yellow
};

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/**
 * Format a report grouped by file:
 *
 *   agent/foo.md
 *        3  error    description is required  description/required
 */
export function formatStylish(report: LintReport, options: StylishOptions = {}): string {
  const paint = (text: string, code: string): string =>
    options.color ? `${code}${text}${RESET}` : text;

  const byFile = new Map<string, LintIssue[]>();
  for (const issue of report.issues) {
    byFile.set(issue.file, [...(byFile.get(issue.file) ?? []), issue]);
  }

  const lines: string[] = [];
  for (const [file, issues] of byFile) {
    lines.push(file);
    for (const issue of issues) {
      const line = (issue.line !== undefined ? String(issue.line) : "-").padStart(4);
      const severity = paint(issue.severity.padEnd(7), SEVERITY_COLOR[issue.severity]);
      lines.push(`  ${line}  ${severity}  ${issue.message}  ${issue.ruleId}`);
    }
    lines.push("");
  }

  const total = report.errorCount + report.warningCount;
  if (total === 0) {
    lines.push(paint(`✔ ${plural(report.fileCount, "file")} checked, no problems`, "\u001b[32m"));
  } else {
    const summary =
      `✖ ${plural(total, "problem")} ` +
      `(${plural(report.errorCount, "error")}, ${plural(report.warningCount, "warning")})`;
    lines.push(paint(summary, report.errorCount > 0 ? SEVERITY_COLOR.error : SEVERITY_COLOR.warning));
  }

  return lines.join("\n");
}

/**
 * Format a report as JSON
 */
export function formatLintJson(report: LintReport): string {
  return JSON.stringify(report, null, 2);
}

export function formatLintReport(report: LintReport, format: LintFormat, options: StylishOptions = {}): string {
  return format === "json" ? formatLintJson(report) : formatStylish(report, options);
}
