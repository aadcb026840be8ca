/**
 * Detects hardcoded secrets in MCP server environment and header values.
 * Used by the config/secret lint rule.
 */

import { type McpServerEntry, isEnvReference } from "@agentpack/core";

export interface SecretFinding {
  mcpName: string;
  /** "environment" or "headers" */
  field: "environment" | "headers";
  key: string;
}

/** Known secret key name patterns (case-insensitive) */
const SECRET_KEY_PATTERNS = /(?:key|secret|token|password|credential|auth)/i;

/** Known secret value prefixes */
const SECRET_VALUE_PREFIXES = [
  "sk-",
  "pk-",
  "ghp_",
  "gho_",
  "ghs_",
  "xox",
  "ctx7sk-",
  "AIza",
  "AKIA",
  "sk_live_",
  "sk_test_",
  "whsec_",
  "npm_",
  "glpat-",
];

const ENV_REF_ANYWHERE = /\{env:[A-Za-z_][A-Za-z0-9_]*\}|\$\{[A-Za-z_][A-Za-z0-9_]*\}/;

/**
 * Heuristic: high-entropy string (≥20 chars, mostly alphanumeric/special).
 * Excludes paths and URLs.
 */
function looksHighEntropy(value: string): boolean {
  if (value.length < 20) return false;
  if (value.startsWith("/") || value.startsWith("~") || value.includes("://")) return false;
  if (/\s/.test(value)) return false;
  const alphaCount = (value.match(/[A-Za-z0-9\-_./+=]/g) || []).length;
  return alphaCount / value.length > 0.85;
}

/**
 * Returns true if the key/value pair looks like a hardcoded secret.
 */
export function isLikelySecret(key: string, value: string): boolean {
  // {env:NAME} and ${NAME} references, alone or inside "Bearer {env:NAME}"
  if (isEnvReference(value) || ENV_REF_ANYWHERE.test(value)) return false;
  if (!value || value.length < 8) return false;

  for (const prefix of SECRET_VALUE_PREFIXES) {
    if (value.startsWith(prefix)) return true;
  }

  const bare = value.replace(/^(?:Bearer|Basic|Token)\s+/i, "");
  if (SECRET_KEY_PATTERNS.test(key)) return bare.length >= 8;

  return looksHighEntropy(bare);
}

/**
 * Scan MCP server entries for hardcoded secrets.
 */
export function detectSecretsInMcps(entries: McpServerEntry[]): SecretFinding[] {
  const findings: SecretFinding[] = [];
  for (const entry of entries) {
    for (const field of ["environment", "headers"] as const) {
      const values = entry[field];
      if (!values) continue;
      for (const [key, value] of Object.entries(values)) {
        if (isLikelySecret(key, value)) {
          findings.push({ mcpName: entry.name, field, key });
        }
      }
    }
  }
  return findings;
}
