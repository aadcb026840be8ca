import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { createLogEntry, type LogEntry, type LogEntryInput, type LogLevel } from "@agentpack/core";
import { TraceStore, type TraceQueryOptions } from "./trace-store.js";

export interface TracerOptions {
  snapshotDir?: string;
  debugMode?: boolean;
  maxRows?: number;
}

export type TraceFields = Omit<LogEntryInput, "traceId" | "level" | "cmd">;

export interface TraceLogger {
  debug: (fields: TraceFields) => void;
  info: (fields: TraceFields) => void;
  warn: (fields: TraceFields) => void;
  error: (fields: TraceFields) => void;
  traceId: string;
}

/** Fields stamped onto every entry a scoped logger writes */
export type TraceDefaults = Partial<TraceFields>;

/** Logger that drops everything, for library calls made without a trace */
export const NULL_LOGGER: TraceLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  traceId: "none",
};

/**
 * Scope a logger to a host, mode or item. Fields passed at the call site
 * win over the defaults.
 */
export function withFields(log: TraceLogger, defaults: TraceDefaults): TraceLogger {
  if (log === NULL_LOGGER) return log;
  return {
    debug: (f) => log.debug({ ...defaults, ...f }),
    info: (f) => log.info({ ...defaults, ...f }),
    warn: (f) => log.warn({ ...defaults, ...f }),
    error: (f) => log.error({ ...defaults, ...f }),
    traceId: log.traceId,
  };
}

/** `<iso time>_<traceId>.jsonl`, with the time made safe for file names */
export function snapshotFileName(traceId: string, at: Date = new Date()): string {
  return `${at.toISOString().replace(/[:.]/g, "-")}_${traceId}.jsonl`;
}

export class Tracer {
  private store: TraceStore;
  private snapshotDir?: string;
  private debugMode: boolean;

  constructor(dbPath: string, opts?: TracerOptions) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    this.store = new TraceStore(dbPath, { maxRows: opts?.maxRows });
    this.snapshotDir = opts?.snapshotDir;
    this.debugMode = opts?.debugMode ?? false;
  }

  /** Start a trace for one command run; `defaults` go on every entry */
  createTrace(cmd: string, defaults?: TraceDefaults): TraceLogger {
    const traceId = `${cmd}-${randomBytes(4).toString("hex")}`;

    const log = (level: LogLevel, fields: TraceFields) => {
      if (level === "debug" && !this.debugMode) return;
      const entry = createLogEntry({ ...fields, traceId, level, cmd });
      this.store.insert(entry);
      if (level === "error") this.snapshot(traceId);
    };

    const logger: TraceLogger = {
      debug: (f) => log("debug", f),
      info: (f) => log("info", f),
      warn: (f) => log("warn", f),
      error: (f) => log("error", f),
      traceId,
    };
    return defaults ? withFields(logger, defaults) : logger;
  }

  private snapshot(traceId: string): void {
    if (!this.snapshotDir) return;
    if (!fs.existsSync(this.snapshotDir)) fs.mkdirSync(this.snapshotDir, { recursive: true });
    const entries = this.store.query({ traceId, limit: 1000 }).reverse();
    if (entries.length === 0) return;
    const content = entries.map((e) => JSON.stringify(e)).join("\n") + "\n";
    fs.writeFileSync(path.join(this.snapshotDir, snapshotFileName(traceId)), content);
  }

  query(opts: TraceQueryOptions): LogEntry[] {
    return this.store.query(opts);
  }

  exportJsonl(opts: TraceQueryOptions): string {
    return this.store.exportJsonl(opts);
  }

  vacuum(): void {
    this.store.vacuum();
  }

  close(): void {
    this.store.close();
  }
}
