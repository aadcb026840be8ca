import Database from "better-sqlite3";
import { z } from "zod";
import { type LogEntry, isRecord } from "@agentpack/core";

export interface TraceQueryOptions {
  traceId?: string;
  level?: string;
  cmd?: string;
  scope?: string;
  op?: string;
  host?: string;
  item?: string;
  itemKind?: string;
  action?: string;
  since?: number;
  limit?: number;
}

export interface TraceStoreOptions {
  maxRows?: number;
}

const COLUMNS = [
  "ts", "trace_id", "level", "cmd", "scope", "op", "host", "item",
  "item_kind", "path", "mode", "action", "msg", "dur", "error", "data",
] as const;

const optionalText = z.string().nullable().transform(v => v ?? undefined);

const eventRowSchema = z.object({
  ts: z.number(),
  trace_id: z.string(),
  level: z.enum(["debug", "info", "warn", "error"]),
  cmd: z.string(),
  scope: z.string(),
  op: z.string(),
  host: optionalText,
  item: optionalText,
  item_kind: optionalText,
  path: optionalText,
  mode: optionalText,
  action: optionalText,
  msg: z.string(),
  dur: z.number().nullable().transform(v => v ?? undefined),
  error: optionalText,
  data: optionalText,
});

const countRowSchema = z.object({ c: z.number() });

function parseData(raw: string | undefined): Record<string, unknown> | undefined {
  if (raw === undefined) return undefined;
  const value: unknown = JSON.parse(raw);
  return isRecord(value) ? value : undefined;
}

export class TraceStore {
  private db: Database.Database;
  private maxRows: number;
  private insertStmt: Database.Statement;

  constructor(dbPath: string, opts?: TraceStoreOptions) {
    this.maxRows = opts?.maxRows ?? 50_000;
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.init();
    this.insertStmt = this.db.prepare(`
      INSERT INTO events (${COLUMNS.join(", ")})
      VALUES (${COLUMNS.map(() => "?").join(", ")})
    `);
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        trace_id TEXT NOT NULL,
        level TEXT NOT NULL,
        cmd TEXT NOT NULL,
        scope TEXT NOT NULL,
        op TEXT NOT NULL,
        host TEXT,
        item TEXT,
        item_kind TEXT,
        path TEXT,
        mode TEXT,
        action TEXT,
        msg TEXT NOT NULL,
        dur INTEGER,
        error TEXT,
        data TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_trace ON events(trace_id);
      CREATE INDEX IF NOT EXISTS idx_level ON events(level);
      CREATE INDEX IF NOT EXISTS idx_cmd ON events(cmd);
      CREATE INDEX IF NOT EXISTS idx_host ON events(host);
      CREATE INDEX IF NOT EXISTS idx_item ON events(item);
      CREATE INDEX IF NOT EXISTS idx_ts ON events(ts);
    `);
  }

  insert(entry: LogEntry): void {
    this.insertStmt.run(
      entry.ts,
      entry.traceId,
      entry.level,
      entry.cmd,
      entry.scope,
      entry.op,
      entry.host ?? null,
      entry.item ?? null,
      entry.itemKind ?? null,
      entry.path ?? null,
      entry.mode ?? null,
      entry.action ?? null,
      entry.msg,
      entry.dur ?? null,
      entry.error ?? null,
      entry.data ? JSON.stringify(entry.data) : null,
    );
  }

  query(opts: TraceQueryOptions): LogEntry[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    const addFilter = (col: string, val: string | undefined) => {
      if (val !== undefined) {
        conditions.push(`${col} = ?`);
        params.push(val);
      }
    };

    addFilter("trace_id", opts.traceId);
    addFilter("level", opts.level);
    addFilter("cmd", opts.cmd);
    addFilter("scope", opts.scope);
    addFilter("op", opts.op);
    addFilter("host", opts.host);
    addFilter("item", opts.item);
    addFilter("item_kind", opts.itemKind);
    addFilter("action", opts.action);

    if (opts.since !== undefined) {
      conditions.push("ts >= ?");
      params.push(opts.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    params.push(opts.limit && opts.limit > 0 ? Math.floor(opts.limit) : 500);

    const rows = this.db
      .prepare(`SELECT ${COLUMNS.join(", ")} FROM events ${where} ORDER BY ts DESC, id DESC LIMIT ?`)
      .all(...params);

    return rows.map((raw) => {
      const row = eventRowSchema.parse(raw);
      return {
        ts: row.ts,
        traceId: row.trace_id,
        level: row.level,
        cmd: row.cmd,
        scope: row.scope,
        op: row.op,
        host: row.host,
        item: row.item,
        itemKind: row.item_kind,
        path: row.path,
        mode: row.mode,
        action: row.action,
        msg: row.msg,
        dur: row.dur,
        error: row.error,
        data: parseData(row.data),
      };
    });
  }

  exportJsonl(opts: TraceQueryOptions): string {
    const entries = this.query(opts);
    return entries.map((e) => JSON.stringify(e)).join("\n");
  }

  count(): number {
    return countRowSchema.parse(this.db.prepare("SELECT COUNT(*) as c FROM events").get()).c;
  }

  vacuum(): void {
    const count = this.count();
    if (count > this.maxRows) {
      const deleteCount = count - this.maxRows;
      this.db.prepare("DELETE FROM events WHERE id IN (SELECT id FROM events ORDER BY ts ASC, id ASC LIMIT ?)").run(deleteCount);
    }
  }

  close(): void {
    this.db.close();
  }
}
