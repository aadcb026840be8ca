import type { HostDescriptor } from "./_types.js";

// MCP servers for this host are registered through its own CLI, so the
// config file is left alone.
export const claudeCode: HostDescriptor = {
  id: "claude-code",
  display: { name: "Claude Code", color: "#D97706" },
  configDir: "~/.claude",
  configDirEnv: null,
  agentsDirName: "agents",
  commandsDirName: "commands",
  configFileName: null,
  capabilities: ["agents", "commands"],
};
