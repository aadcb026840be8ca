/**
 * Lint Command for agentpack CLI
 *
 * Validates agent and command frontmatter, agent references, and the
 * host configuration file.
 */

import { Command } from "commander";
import { type LintReport, errorMessage } from "@agentpack/core";
import { loadPack } from "../core/pack-loader.js";
import { lintExitCode, lintPack } from "../core/linter.js";
import { LINT_FORMATS, formatLintReport, type LintFormat } from "../core/lint-formatter.js";
import { getTracer } from "../core/global-tracer.js";
import { NULL_LOGGER, type TraceLogger } from "../core/tracer.js";
import { loadPackContext, parseChoice, parseCount } from "./shared.js";

// ============================================================================
// Types
// ============================================================================

export interface LintCommandOptions {
  format?: LintFormat;
  maxWarnings?: number;
  color?: boolean;
  log?: TraceLogger;
}

export interface LintRunResult {
  report: LintReport;
  output: string;
  exitCode: number;
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Load, lint, and format a pack
 */
export async function runLint(root: string | undefined, options: LintCommandOptions = {}): Promise<LintRunResult> {
  const log = options.log ?? NULL_LOGGER;
  const start = Date.now();
  const { root: packRoot, config } = await loadPackContext(root);
  const pack = await loadPack(packRoot, config);
  const report = lintPack(pack);

  for (const issue of report.issues) {
    log.debug({
      scope: "rule",
      op: "report",
      item: issue.ruleId,
      path: issue.file,
      msg: issue.message,
      data: { line: issue.line, severity: issue.severity },
    });
  }
  log.info({
    scope: "pack",
    op: "lint",
    path: packRoot,
    msg: `${report.errorCount} errors, ${report.warningCount} warnings in ${report.fileCount} files`,
    dur: Date.now() - start,
    data: { errors: report.errorCount, warnings: report.warningCount, files: report.fileCount },
  });

  return {
    report,
    output: formatLintReport(report, options.format ?? "stylish", { color: options.color }),
    exitCode: lintExitCode(report, options.maxWarnings),
  };
}

// ============================================================================
// Commander.js Command
// ============================================================================

export const lintCommand = new Command("lint")
  .description("Validate agents, commands, and the host config file")
  .option("-r, --root <dir>", "Pack root directory (default: current directory)")
  .option("--format <format>", `Output format: ${LINT_FORMATS.join(", ")}`, "stylish")
  .option("--max-warnings <n>", "Exit with an error when there are more warnings than this")
  .option("--no-color", "Disable colored output")
  .action(async (options: { root?: string; format: string; maxWarnings?: string; color: boolean }) => {
    try {
      const result = await runLint(options.root, {
        format: parseChoice(options.format, LINT_FORMATS, "--format"),
        maxWarnings: options.maxWarnings !== undefined ? parseCount(options.maxWarnings, "--max-warnings") : undefined,
        color: options.color && process.stdout.isTTY,
        log: getTracer().createTrace("lint"),
      });
      console.log(result.output);
      process.exitCode = result.exitCode;
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
