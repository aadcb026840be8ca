import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_PACK_CONFIG } from "../core/pack-config.js";
import { loadPack } from "../core/pack-loader.js";
import { lintPack } from "../core/linter.js";
import { renderDefinition, scaffoldDefinition, titleFromName } from "./new.js";

describe("new command", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "agentpack-new-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("titleFromName capitalizes each word", () => {
    expect(titleFromName("security-reviewer")).toBe("Security Reviewer");
  });

  it("renders an agent with a subagent mode", () => {
    expect(renderDefinition("agent", "security-reviewer")).toBe(
      "---\n" +
        "description: Describe when to use the security-reviewer agent\n" +
        "mode: subagent\n" +
        "---\n\n" +
        "# Security Reviewer\n\nYou are the Security Reviewer agent.\n"
    );
  });

  it("renders a command with the given description", () => {
    expect(renderDefinition("command", "audit", "Audit dependencies")).toBe(
      "---\ndescription: Audit dependencies\n---\n\n# Audit\n\n1. First step\n"
    );
  });

  it("writes a file that lints clean", async () => {
    const agent = await scaffoldDefinition(root, DEFAULT_PACK_CONFIG, "agent", "test-analyst");
    const command = await scaffoldDefinition(root, DEFAULT_PACK_CONFIG, "command", "analyze-tests");

    expect(agent).toEqual({ success: true, path: path.join(root, "agent", "test-analyst.md") });
    expect(command).toEqual({ success: true, path: path.join(root, "command", "analyze-tests.md") });

    const report = lintPack(await loadPack(root, DEFAULT_PACK_CONFIG));
    expect(report.issues).toEqual([]);
  });

  it("refuses names that are not kebab-case", async () => {
    const result = await scaffoldDefinition(root, DEFAULT_PACK_CONFIG, "agent", "SecurityReviewer");
    expect(result).toEqual({
      success: false,
      error: 'Invalid name "SecurityReviewer": use lowercase kebab-case (e.g. security-reviewer)',
    });
  });

  it("refuses to overwrite without force", async () => {
    await scaffoldDefinition(root, DEFAULT_PACK_CONFIG, "command", "audit");
    const filePath = path.join(root, "command", "audit.md");

    const again = await scaffoldDefinition(root, DEFAULT_PACK_CONFIG, "command", "audit", { description: "Changed" });
    expect(again).toEqual({ success: false, error: `File already exists: ${filePath} (use --force to overwrite)` });

    const forced = await scaffoldDefinition(root, DEFAULT_PACK_CONFIG, "command", "audit", {
      description: "Changed",
      force: true,
    });
    expect(forced.success).toBe(true);
    expect(await fs.readFile(filePath, "utf-8")).toContain("description: Changed\n");
  });

  it("honors custom directories from the pack config", async () => {
    const config = { ...DEFAULT_PACK_CONFIG, agentsDir: "agents" };
    const result = await scaffoldDefinition(root, config, "agent", "planner");
    expect(result.path).toBe(path.join(root, "agents", "planner.md"));
  });
});
