import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { loadPack } from "../core/pack-loader.js";
import { DEFAULT_PACK_CONFIG } from "../core/pack-config.js";
import { buildListing, formatListing, listAgents, listCommands, listMcpServers } from "./list.js";

describe("list command", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "agentpack-list-"));
    await fs.mkdir(path.join(root, "agent"));
    await fs.mkdir(path.join(root, "command"));
    await fs.writeFile(path.join(root, "agent", "reviewer.md"), "---\ndescription: Reviews code\nmode: subagent\n---\n\nReview.\n");
    await fs.writeFile(
      path.join(root, "agent", "planner.md"),
      "---\ndescription: Plans work\nmode: primary\ndisable: true\n---\n\nPlan.\n"
    );
    await fs.writeFile(path.join(root, "agent", "broken.md"), "---\nmode: subagent\n---\n\nNo description.\n");
    await fs.writeFile(
      path.join(root, "command", "review.md"),
      "---\ndescription: Run a review\nagent: planner\n---\n\nLaunch the **reviewer** agent, then the **planner** agent.\n"
    );
    await fs.writeFile(
      path.join(root, "opencode.json"),
      JSON.stringify({
        mcp: {
          gemini: {
            type: "local",
            command: ["npx", "-y", "gemini-mcp"],
            environment: { GEMINI_API_KEY: "{env:GEMINI_API_KEY}" },
            enabled: false,
            timeout: 5000,
          },
          context7: {
            type: "remote",
            url: "https://mcp.example.com/mcp",
            headers: { CONTEXT7_API_KEY: "{env:CONTEXT7_API_KEY}" },
          },
        },
      })
    );
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("lists agents with their mode", async () => {
    const pack = await loadPack(root, DEFAULT_PACK_CONFIG);
    expect(listAgents(pack)).toEqual([
      { name: "broken", mode: "?", description: "(invalid frontmatter)", disabled: false },
      { name: "planner", mode: "primary", description: "Plans work", disabled: true },
      { name: "reviewer", mode: "subagent", description: "Reviews code", disabled: false },
    ]);
  });

  it("lists the agents a command uses, agent field first", async () => {
    const pack = await loadPack(root, DEFAULT_PACK_CONFIG);
    expect(listCommands(pack)).toEqual([
      { name: "review", description: "Run a review", agents: ["planner", "reviewer"] },
    ]);
  });

  it("lists MCP servers sorted by name", async () => {
    const pack = await loadPack(root, DEFAULT_PACK_CONFIG);
    expect(listMcpServers(pack)).toEqual([
      { name: "context7", type: "remote", enabled: true, timeout: undefined, env: ["CONTEXT7_API_KEY"] },
      { name: "gemini", type: "local", enabled: false, timeout: 5000, env: ["GEMINI_API_KEY"] },
    ]);
  });

  it("returns no MCP servers without a config file", async () => {
    await fs.rm(path.join(root, "opencode.json"));
    const pack = await loadPack(root, DEFAULT_PACK_CONFIG);
    expect(listMcpServers(pack)).toEqual([]);
  });

  it("limits the listing to one section", async () => {
    const pack = await loadPack(root, DEFAULT_PACK_CONFIG);
    expect(Object.keys(buildListing(pack, "commands"))).toEqual(["commands"]);
    expect(Object.keys(buildListing(pack))).toEqual(["agents", "commands", "mcp"]);
  });

  it("formats aligned sections", async () => {
    const pack = await loadPack(root, DEFAULT_PACK_CONFIG);

    expect(formatListing(buildListing(pack, "commands")).split("\n")).toEqual([
      "Commands (1)",
      "  /review  planner, reviewer",
    ]);
    expect(formatListing(buildListing(pack, "mcp")).split("\n")).toEqual([
      "MCP Servers (2)",
      "  context7  enabled   -       CONTEXT7_API_KEY",
      "  gemini    disabled  5000ms  GEMINI_API_KEY",
    ]);
  });

  it("marks disabled agents in the formatted listing", async () => {
    const pack = await loadPack(root, DEFAULT_PACK_CONFIG);
    const lines = formatListing(buildListing(pack, "agents")).split("\n");

    expect(lines[0]).toBe("Agents (3)");
    expect(lines[2]).toBe(`${"  planner".padEnd(10)}  ${"primary (disabled)"}  Plans work`);
  });
});
