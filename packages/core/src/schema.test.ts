import { describe, it, expect } from "vitest";
import {
  agentFrontmatterSchema,
  commandFrontmatterSchema,
  mcpServerSchema,
  hostConfigSchema,
  packConfigSchema,
  AGENT_FIELDS,
  COMMAND_FIELDS,
} from "./schema.js";

function firstIssue(result: { success: boolean; error?: { issues: { path: (string | number)[]; message: string }[] } }) {
  return result.error?.issues[0];
}

describe("agentFrontmatterSchema", () => {
  it("accepts a complete agent", () => {
    const result = agentFrontmatterSchema.safeParse({
      description: "Reviews code for security problems",
      mode: "subagent",
      model: "anthropic/claude-sonnet-4",
      temperature: 0.1,
      tools: { bash: false, write: false, read: true },
      disable: false,
      permission: { edit: "deny", bash: { "git diff*": "allow", "*": "ask" } },
    });
    expect(result.success).toBe(true);
  });

  it("requires a description", () => {
    const issue = firstIssue(agentFrontmatterSchema.safeParse({ mode: "all" }));
    expect(issue?.path).toEqual(["description"]);
    expect(issue?.message).toBe("description is required");
  });

  it("rejects a blank description", () => {
    const issue = firstIssue(agentFrontmatterSchema.safeParse({ description: "   " }));
    expect(issue?.message).toBe("description must not be empty");
  });

  it("rejects an unknown mode", () => {
    const issue = firstIssue(agentFrontmatterSchema.safeParse({ description: "x", mode: "helper" }));
    expect(issue?.path).toEqual(["mode"]);
    expect(issue?.message).toBe("mode must be one of primary, subagent, all");
  });

  it("rejects a temperature above 2", () => {
    const issue = firstIssue(agentFrontmatterSchema.safeParse({ description: "x", temperature: 3 }));
    expect(issue?.message).toBe("temperature must be between 0 and 2");
  });

  it("rejects non-boolean tool flags with the tool in the path", () => {
    const issue = firstIssue(agentFrontmatterSchema.safeParse({ description: "x", tools: { bash: "yes" } }));
    expect(issue?.path).toEqual(["tools", "bash"]);
    expect(issue?.message).toBe("tool flags must be true or false");
  });

  it("rejects unknown permission levels", () => {
    const issue = firstIssue(agentFrontmatterSchema.safeParse({ description: "x", permission: { edit: "maybe" } }));
    expect(issue?.path[0]).toBe("permission");
  });

  it("lists its known fields", () => {
    expect(AGENT_FIELDS).toEqual([
      "description", "mode", "model", "temperature", "tools", "disable", "permission",
    ]);
  });
});

describe("commandFrontmatterSchema", () => {
  it("accepts a command with an agent", () => {
    const result = commandFrontmatterSchema.safeParse({ description: "Audit deps", agent: "dependency-analyzer" });
    expect(result.success).toBe(true);
  });

  it("rejects a non-boolean subtask", () => {
    const issue = firstIssue(commandFrontmatterSchema.safeParse({ description: "x", subtask: "yes" }));
    expect(issue?.path).toEqual(["subtask"]);
  });

  it("lists its known fields", () => {
    expect(COMMAND_FIELDS).toEqual(["description", "agent", "model", "subtask"]);
  });
});

describe("mcpServerSchema", () => {
  it("defaults type to local and enabled to true", () => {
    const result = mcpServerSchema.safeParse({ command: ["npx", "-y", "@upstash/context7-mcp"] });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.type).toBe("local");
    expect(result.data.enabled).toBe(true);
  });

  it("rejects a non-boolean enabled flag", () => {
    const issue = firstIssue(mcpServerSchema.safeParse({ type: "local", command: ["x"], enabled: "yes" }));
    expect(issue?.path).toEqual(["enabled"]);
    expect(issue?.message).toBe("enabled must be true or false");
  });

  it("rejects a fractional timeout", () => {
    const issue = firstIssue(mcpServerSchema.safeParse({ type: "local", command: ["x"], timeout: 1.5 }));
    expect(issue?.message).toBe("timeout must be an integer number of milliseconds");
  });

  it("validates remote URLs", () => {
    expect(mcpServerSchema.safeParse({ type: "remote", url: "https://mcp.example.com/mcp" }).success).toBe(true);
    const issue = firstIssue(mcpServerSchema.safeParse({ type: "remote", url: "not a url" }));
    expect(issue?.message).toBe("url must be a valid URL");
  });
});

describe("hostConfigSchema", () => {
  it("passes unrelated top-level keys through", () => {
    const result = hostConfigSchema.safeParse({ theme: "dark", mcp: {} });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data["theme"]).toBe("dark");
  });
});

describe("packConfigSchema", () => {
  it("fills defaults", () => {
    expect(packConfigSchema.parse({})).toEqual({
      agentsDir: "agent",
      commandsDir: "command",
      configFile: "opencode.json",
      hosts: ["opencode"],
      installMode: "symlink",
      rules: {},
      knownTools: [],
    });
  });

  it("rejects unknown keys", () => {
    expect(packConfigSchema.safeParse({ agentDir: "agents" }).success).toBe(false);
  });

  it("rejects unknown rule settings", () => {
    expect(packConfigSchema.safeParse({ rules: { "tools/unknown": "warn" } }).success).toBe(false);
  });
});
