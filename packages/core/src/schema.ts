/**
 * Zod schemas for agentpack content and configuration validation
 */

import { z } from "zod";

// ============================================================================
// Shared
// ============================================================================

export const agentModeSchema = z.enum(["primary", "subagent", "all"], {
  errorMap: () => ({ message: "mode must be one of primary, subagent, all" }),
});

export const permissionLevelSchema = z.enum(["allow", "ask", "deny"], {
  errorMap: () => ({ message: "permission must be one of allow, ask, deny" }),
});

const descriptionSchema = z
  .string({
    required_error: "description is required",
    invalid_type_error: "description must be a string",
  })
  .trim()
  .min(1, "description must not be empty");

// ============================================================================
// Definition Schemas
// ============================================================================

export const agentPermissionSchema = z.record(
  z.string(),
  z.union([permissionLevelSchema, z.record(z.string(), permissionLevelSchema)])
);

export const agentFrontmatterSchema = z.object({
  description: descriptionSchema,
  mode: agentModeSchema.optional(),
  model: z.string().min(1).optional(),
  temperature: z
    .number({ invalid_type_error: "temperature must be a number" })
    .min(0, "temperature must be between 0 and 2")
    .max(2, "temperature must be between 0 and 2")
    .optional(),
  tools: z
    .record(
      z.string(),
      z.boolean({ invalid_type_error: "tool flags must be true or false" })
    )
    .optional(),
  disable: z.boolean().optional(),
  permission: agentPermissionSchema.optional(),
});

export const commandFrontmatterSchema = z.object({
  description: descriptionSchema,
  agent: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  subtask: z.boolean().optional(),
});

export const AGENT_FIELDS = Object.keys(agentFrontmatterSchema.shape);
export const COMMAND_FIELDS = Object.keys(commandFrontmatterSchema.shape);

// ============================================================================
// Host Config Schemas
// ============================================================================

const mcpCommonShape = {
  enabled: z
    .boolean({ invalid_type_error: "enabled must be true or false" })
    .default(true),
  timeout: z
    .number({ invalid_type_error: "timeout must be a number of milliseconds" })
    .int("timeout must be an integer number of milliseconds")
    .positive("timeout must be positive")
    .optional(),
};

export const localMcpServerSchema = z.object({
  type: z.literal("local"),
  command: z.array(z.string()).min(1, "command must name an executable"),
  environment: z.record(z.string(), z.string()).optional(),
  ...mcpCommonShape,
});

export const remoteMcpServerSchema = z.object({
  type: z.literal("remote"),
  url: z.string().url("url must be a valid URL"),
  headers: z.record(z.string(), z.string()).optional(),
  ...mcpCommonShape,
});

export const mcpServerSchema = z.preprocess(
  (value) =>
    typeof value === "object" && value !== null && !("type" in value)
      ? { ...value, type: "local" }
      : value,
  z.discriminatedUnion("type", [localMcpServerSchema, remoteMcpServerSchema])
);

export const hostConfigSchema = z
  .object({
    $schema: z.string().optional(),
    mcp: z.record(z.string(), mcpServerSchema).optional(),
  })
  .passthrough();

// ============================================================================
// Pack Config Schema
// ============================================================================

export const ruleSettingSchema = z.enum(["error", "warning", "off"]);

export const packConfigSchema = z
  .object({
    agentsDir: z.string().min(1).default("agent"),
    commandsDir: z.string().min(1).default("command"),
    configFile: z.string().min(1).default("opencode.json"),
    hosts: z.array(z.string()).default(["opencode"]),
    installMode: z.enum(["symlink", "copy"]).default("symlink"),
    rules: z.record(z.string(), ruleSettingSchema).default({}),
    knownTools: z.array(z.string()).default([]),
  })
  .strict();

export type AgentFrontmatter = z.infer<typeof agentFrontmatterSchema>;
export type CommandFrontmatter = z.infer<typeof commandFrontmatterSchema>;
export type McpServerInput = z.infer<typeof mcpServerSchema>;
export type HostConfigInput = z.infer<typeof hostConfigSchema>;
