/**
 * Linter
 *
 * Runs the lint rules over a loaded pack, applies severity overrides from
 * the pack configuration, and builds a sorted report.
 */

import type { LintIssue, LintReport, RuleSetting } from "@agentpack/core";
import { LINT_RULES, type LintRule, type IssueInput } from "./lint-rules.js";
import type { LoadedPack } from "./pack-loader.js";

export interface LintOptions {
  /** Per-rule overrides; defaults to the pack config's rules */
  rules?: Record<string, RuleSetting>;
  /** Extra tool names; defaults to the pack config's knownTools */
  knownTools?: string[];
}

function compareIssues(a: LintIssue, b: LintIssue): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  const lineA = a.line ?? 0;
  const lineB = b.line ?? 0;
  if (lineA !== lineB) return lineA - lineB;
  if (a.ruleId !== b.ruleId) return a.ruleId < b.ruleId ? -1 : 1;
  return 0;
}

/**
 * Lint a loaded pack.
 */
export function lintPack(pack: LoadedPack, options: LintOptions = {}): LintReport {
  const overrides = options.rules ?? pack.config.rules;
  const knownTools = new Set(options.knownTools ?? pack.config.knownTools);
  const issues: LintIssue[] = [];

  const runRule = (rule: LintRule): void => {
    const setting = overrides[rule.id] ?? rule.severity;
    if (setting === "off") return;

    rule.check({
      pack,
      knownTools,
      report: (issue: IssueInput) => {
        issues.push({ ruleId: rule.id, severity: setting, ...issue });
      },
    });
  };

  for (const rule of LINT_RULES) {
    runRule(rule);
  }

  issues.sort(compareIssues);

  return {
    issues,
    errorCount: issues.filter(i => i.severity === "error").length,
    warningCount: issues.filter(i => i.severity === "warning").length,
    fileCount: pack.agents.length + pack.commands.length + (pack.hostConfig ? 1 : 0),
  };
}

/**
 * Exit code for a report: 1 on errors or too many warnings.
 */
export function lintExitCode(report: LintReport, maxWarnings?: number): number {
  if (report.errorCount > 0) return 1;
  if (maxWarnings !== undefined && maxWarnings >= 0 && report.warningCount > maxWarnings) return 1;
  return 0;
}
