import type { HostDescriptor } from "./_types.js";

export const opencode: HostDescriptor = {
  id: "opencode",
  display: { name: "OpenCode", color: "#6366F1" },
  configDir: "~/.config/opencode",
  configDirEnv: "OPENCODE_CONFIG_DIR",
  agentsDirName: "agent",
  commandsDirName: "command",
  configFileName: "opencode.json",
  capabilities: ["agents", "commands", "mcp"],
};
