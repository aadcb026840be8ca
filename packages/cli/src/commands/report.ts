import { Command } from "commander";
import os from "node:os";
import fs from "node:fs";
import { type LogEntry, type LogLevel, errorMessage } from "@agentpack/core";
import { getTracer } from "../core/global-tracer.js";
import type { TraceQueryOptions } from "../core/trace-store.js";
import { parseChoice, parseCount } from "./shared.js";

export type ReportFormat = "jsonl" | "json" | "table";

export const REPORT_FORMATS: readonly ReportFormat[] = ["jsonl", "json", "table"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const UNIT_MS = { m: 60_000, h: 3_600_000, d: 86_400_000 } as const;

export interface ReportOptions {
  host?: string;
  scope?: string;
  item?: string;
  cmd?: string;
  level?: string;
  trace?: string;
  since?: string;
  limit?: string;
}

export function parseSince(since: string, now: number = Date.now()): number {
  const match = /^(\d+)(m|h|d)$/.exec(since);
  if (match) {
    const unit = match[2] === "m" ? "m" : match[2] === "h" ? "h" : "d";
    return now - Number(match[1]) * UNIT_MS[unit];
  }
  const ts = new Date(since).getTime();
  if (Number.isNaN(ts)) {
    throw new Error(`Invalid --since "${since}": use 30m, 1h, 7d, or an ISO date`);
  }
  return ts;
}

export function buildTraceQuery(opts: ReportOptions, now: number = Date.now()): TraceQueryOptions {
  return {
    host: opts.host,
    scope: opts.scope,
    item: opts.item,
    cmd: opts.cmd,
    level: opts.level !== undefined ? parseChoice(opts.level, LOG_LEVELS, "--level") : undefined,
    traceId: opts.trace,
    since: opts.since ? parseSince(opts.since, now) : undefined,
    limit: opts.limit !== undefined ? parseCount(opts.limit, "--limit") : undefined,
  };
}

export function buildEnvSection(): Record<string, unknown> {
  return {
    _section: "env",
    os: `${os.platform()} ${os.release()}`,
    node: process.version,
    arch: os.arch(),
  };
}

export function formatReport(entries: LogEntry[], format: ReportFormat): string {
  if (format === "json") {
    return JSON.stringify(entries, null, 2) + "\n";
  }

  if (format === "table") {
    const lines = [
      `${"TIME".padEnd(24)} ${"LEVEL".padEnd(6)} ${"CMD".padEnd(10)} ${"SCOPE".padEnd(8)} ${"HOST".padEnd(12)} ${"ITEM".padEnd(20)} MSG`,
      "─".repeat(100),
    ];
    for (const e of entries) {
      const time = new Date(e.ts).toISOString().slice(0, 23);
      lines.push(
        `${time.padEnd(24)} ${e.level.padEnd(6)} ${e.cmd.padEnd(10)} ${e.scope.padEnd(8)} ${(e.host ?? "-").padEnd(12)} ${(e.item ?? "-").padEnd(20)} ${e.msg}`
      );
    }
    return lines.join("\n") + "\n";
  }

  return entries.map((e) => JSON.stringify({ _section: "trace", ...e })).join("\n") + (entries.length > 0 ? "\n" : "");
}

export const reportCommand = new Command("report")
  .description("Query trace logs")
  .option("--host <host>", "Filter by host ID")
  .option("--scope <scope>", "Filter by scope (install, lint, doctor, plan)")
  .option("--item <item>", "Filter by item name")
  .option("--cmd <cmd>", "Filter by command")
  .option("--level <level>", "Filter by log level (debug, info, warn, error)")
  .option("--trace <traceId>", "Filter by trace ID")
  .option("--since <time>", "Time filter: 1h, 30m, 7d, or ISO date", "1h")
  .option("--limit <n>", "Max entries to return", "100")
  .option("--format <fmt>", `Output format: ${REPORT_FORMATS.join(", ")}`, "jsonl")
  .option("--full", "Append an environment section (jsonl only)", false)
  .option("--output <path>", "Write report to file instead of stdout")
  .action((opts: ReportOptions & { format: string; full: boolean; output?: string }) => {
    try {
      const format = parseChoice(opts.format, REPORT_FORMATS, "--format");
      const entries = getTracer().query(buildTraceQuery(opts));

      let output = formatReport(entries, format);
      if (opts.full && format === "jsonl") {
        output += JSON.stringify(buildEnvSection()) + "\n";
      }

      if (opts.output) {
        fs.writeFileSync(opts.output, output);
        console.log(`Report written to ${opts.output}`);
      } else {
        process.stdout.write(output);
      }
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
