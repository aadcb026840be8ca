/**
 * Core types for the agentpack toolchain
 */

// ============================================================================
// Definition Types
// ============================================================================

export type DefinitionKind = "agent" | "command";

export type AgentMode = "primary" | "subagent" | "all";

export const AGENT_MODES: readonly AgentMode[] = ["primary", "subagent", "all"];

/** Built-in host tools an agent can switch on or off */
export const KNOWN_TOOLS = [
  "bash",
  "read",
  "write",
  "edit",
  "list",
  "patch",
  "glob",
  "grep",
  "todowrite",
  "todoread",
  "webfetch",
] as const;

export type KnownTool = (typeof KNOWN_TOOLS)[number];

export type PermissionLevel = "allow" | "ask" | "deny";

/**
 * Permission map keyed by tool (edit, bash, webfetch, ...). A value is either
 * one level, or a map of command pattern to level (used by bash).
 */
export type AgentPermission = Record<
  string,
  PermissionLevel | Record<string, PermissionLevel>
>;

export interface AgentDefinition {
  name: string;
  path: string;
  description: string;
  mode?: AgentMode;
  model?: string;
  temperature?: number;
  tools: Record<string, boolean>;
  disable: boolean;
  permission?: AgentPermission;
  body: string;
}

export interface AgentReference {
  name: string;
  /** 1-based line in the source file */
  line: number;
  /** 1-based column in the source file */
  column: number;
}

export interface CommandDefinition {
  name: string;
  path: string;
  description: string;
  agent?: string;
  model?: string;
  subtask?: boolean;
  body: string;
  agentReferences: AgentReference[];
}

// ============================================================================
// Host Config Types
// ============================================================================

export type McpServerType = "local" | "remote";

export interface McpServerEntry {
  name: string;
  type: McpServerType;
  enabled: boolean;
  timeout?: number;
  command?: string[];
  url?: string;
  environment?: Record<string, string>;
  headers?: Record<string, string>;
  /** Names of environment variables the entry reads via {env:NAME} */
  envRefs: string[];
}

export interface HostConfigFile {
  path: string;
  mcp: McpServerEntry[];
}

// ============================================================================
// Lint Types
// ============================================================================

export type Severity = "error" | "warning";

export type RuleSetting = Severity | "off";

export interface LintIssue {
  ruleId: string;
  severity: Severity;
  /** Path relative to the pack root */
  file: string;
  line?: number;
  message: string;
}

export interface LintReport {
  issues: LintIssue[];
  errorCount: number;
  warningCount: number;
  fileCount: number;
}

// ============================================================================
// Pack Config Types
// ============================================================================

export type InstallMode = "symlink" | "copy";

export type InstallStrategy = "directory" | "files";

export interface PackConfig {
  agentsDir: string;
  commandsDir: string;
  configFile: string;
  hosts: string[];
  installMode: InstallMode;
  rules: Record<string, RuleSetting>;
  knownTools: string[];
}
