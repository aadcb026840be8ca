/**
 * Host Registry Types — describes where an AI coding host reads agents,
 * commands, and its configuration file.
 */

export type Capability = "agents" | "commands" | "mcp";

export interface HostDisplay {
  name: string;
  color: string;
}

export interface HostDescriptor {
  id: string;
  display: HostDisplay;
  /** Base configuration directory, may start with ~ */
  configDir: string;
  /** Environment variable that overrides configDir, if the host honors one */
  configDirEnv: string | null;
  agentsDirName: string;
  commandsDirName: string;
  /** Configuration file name inside configDir, null when not managed here */
  configFileName: string | null;
  capabilities: Capability[];
}

export interface ResolvedHostPaths {
  configDir: string;
  agentsDir: string;
  commandsDir: string;
  configFile: string | null;
}
