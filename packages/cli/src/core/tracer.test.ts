import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";

describe("Tracer", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "agentpack-tracer-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("createTrace returns a logger with convenience methods", async () => {
    const { Tracer } = await import("./tracer.js");
    const tracer = new Tracer(path.join(tmpDir, "trace.db"));
    const log = tracer.createTrace("install");

    log.info({ scope: "link", op: "create", msg: "linked agents", host: "opencode" });
    log.error({ scope: "link", op: "create", msg: "failed", host: "opencode", error: "EACCES" });

    const all = tracer.query({ cmd: "install" });
    expect(all).toHaveLength(2);
    expect(all[0]?.traceId).toMatch(/^install-[0-9a-f]{8}$/);
    expect(all[0]?.traceId).toBe(log.traceId);

    tracer.close();
  });

  it("creates the database directory", async () => {
    const { Tracer } = await import("./tracer.js");
    const dbPath = path.join(tmpDir, "nested", "traces", "trace.db");
    const tracer = new Tracer(dbPath);

    expect(fs.existsSync(dbPath)).toBe(true);
    tracer.close();
  });

  it("auto-creates snapshot on error", async () => {
    const snapshotDir = path.join(tmpDir, "snapshots");
    const { Tracer } = await import("./tracer.js");
    const tracer = new Tracer(path.join(tmpDir, "trace.db"), { snapshotDir });
    const log = tracer.createTrace("install");

    log.info({ scope: "pack", op: "load", msg: "loaded pack" });
    log.error({ scope: "link", op: "create", msg: "EACCES", host: "opencode", error: "permission denied" });

    const snapshots = fs.readdirSync(snapshotDir);
    expect(snapshots).toHaveLength(1);
    expect(snapshots[0]).toMatch(new RegExp(`_${log.traceId}\\.jsonl$`));

    const content = fs.readFileSync(path.join(snapshotDir, snapshots[0] ?? ""), "utf-8");
    const lines = content.trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? "{}").msg).toBe("loaded pack");
    expect(JSON.parse(lines[1] ?? "{}").error).toBe("permission denied");

    tracer.close();
  });

  it("debug level entries are skipped when debugMode is false", async () => {
    const { Tracer } = await import("./tracer.js");
    const tracer = new Tracer(path.join(tmpDir, "trace.db"), { debugMode: false });
    const log = tracer.createTrace("lint");

    log.debug({ scope: "rule", op: "run", msg: "verbose detail" });
    log.info({ scope: "rule", op: "run", msg: "normal" });

    const all = tracer.query({});
    expect(all).toHaveLength(1);
    expect(all[0]?.level).toBe("info");

    tracer.close();
  });

  it("keeps debug entries in debug mode", async () => {
    const { Tracer } = await import("./tracer.js");
    const tracer = new Tracer(path.join(tmpDir, "trace.db"), { debugMode: true });
    const log = tracer.createTrace("lint");

    log.debug({ scope: "rule", op: "run", msg: "verbose detail" });

    expect(tracer.query({ level: "debug" })).toHaveLength(1);
    tracer.close();
  });

  it("createTrace stamps default fields on every entry", async () => {
    const { Tracer } = await import("./tracer.js");
    const tracer = new Tracer(path.join(tmpDir, "trace.db"));
    const log = tracer.createTrace("install", { host: "claude-code", mode: "copy" });

    log.info({ scope: "install", op: "copy", msg: "copied reviewer" });
    log.info({ scope: "install", op: "copy", msg: "copied planner", host: "opencode" });

    const hosts = tracer.query({ cmd: "install" }).map((e) => [e.msg, e.host, e.mode]);
    expect(hosts).toContainEqual(["copied reviewer", "claude-code", "copy"]);
    expect(hosts).toContainEqual(["copied planner", "opencode", "copy"]);

    tracer.close();
  });
});

describe("withFields", () => {
  it("merges defaults under the call-site fields and keeps the trace id", async () => {
    const { withFields } = await import("./tracer.js");
    const seen: unknown[] = [];
    const base = {
      debug: (f: object) => seen.push(["debug", f]),
      info: (f: object) => seen.push(["info", f]),
      warn: (f: object) => seen.push(["warn", f]),
      error: (f: object) => seen.push(["error", f]),
      traceId: "lint-0000",
    };

    const log = withFields(base, { host: "opencode", item: "reviewer" });
    log.warn({ scope: "rule", op: "run", msg: "slow", item: "planner" });

    expect(log.traceId).toBe("lint-0000");
    expect(seen).toEqual([["warn", { host: "opencode", item: "planner", scope: "rule", op: "run", msg: "slow" }]]);
  });

  it("returns the null logger unchanged", async () => {
    const { withFields, NULL_LOGGER } = await import("./tracer.js");
    expect(withFields(NULL_LOGGER, { host: "opencode" })).toBe(NULL_LOGGER);
  });
});

describe("snapshotFileName", () => {
  it("replaces colons and dots in the timestamp", async () => {
    const { snapshotFileName } = await import("./tracer.js");
    const name = snapshotFileName("install-abcd1234", new Date("2026-03-01T10:20:30.456Z"));
    expect(name).toBe("2026-03-01T10-20-30-456Z_install-abcd1234.jsonl");
  });
});
