/**
 * Helpers for MCP server entries in a host configuration file
 */

import type { McpServerEntry } from "./types.js";
import type { McpServerInput } from "./schema.js";

const ENV_REF = /\{env:([A-Za-z_][A-Za-z0-9_]*)\}|\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Collect environment variable names referenced as {env:NAME} or ${NAME}
 */
export function collectEnvRefs(values: Iterable<string>): string[] {
  const names = new Set<string>();
  for (const value of values) {
    for (const match of value.matchAll(ENV_REF)) {
      const name = match[1] ?? match[2];
      if (name) names.add(name);
    }
  }
  return [...names].sort();
}

/**
 * True when the value is nothing but an env reference
 */
export function isEnvReference(value: string): boolean {
  return /^(\{env:[A-Za-z_][A-Za-z0-9_]*\}|\$\{[A-Za-z_][A-Za-z0-9_]*\})$/.test(value.trim());
}

/**
 * Convert a validated server entry into an McpServerEntry
 */
export function toMcpServerEntry(name: string, input: McpServerInput): McpServerEntry {
  if (input.type === "local") {
    const environment = input.environment ?? {};
    return {
      name,
      type: "local",
      enabled: input.enabled,
      timeout: input.timeout,
      command: input.command,
      environment,
      envRefs: collectEnvRefs([...input.command, ...Object.values(environment)]),
    };
  }

  const headers = input.headers ?? {};
  return {
    name,
    type: "remote",
    enabled: input.enabled,
    timeout: input.timeout,
    url: input.url,
    headers,
    envRefs: collectEnvRefs([input.url, ...Object.values(headers)]),
  };
}

/**
 * Environment variables an enabled server needs that are not set
 */
export function missingEnvVars(
  entry: McpServerEntry,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  return entry.envRefs.filter(name => !env[name]);
}
