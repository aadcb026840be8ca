/**
 * Lint rules for agent packs.
 *
 * Each rule inspects the loaded pack and reports issues through its
 * context. Severity is applied by the linter, so rules only describe
 * what is wrong and where.
 */

import {
  type LintIssue,
  type Severity,
  AGENT_FIELDS,
  COMMAND_FIELDS,
  KNOWN_TOOLS,
  agentFrontmatterSchema,
  commandFrontmatterSchema,
  extractAgentReferences,
  hostConfigSchema,
  isKebabCase,
  isRecord,
} from "@agentpack/core";
import type { LoadedDefinition, LoadedPack } from "./pack-loader.js";
import { lineOfJsonPath, toHostConfigFile } from "./config-loader.js";
import { detectSecretsInMcps } from "./secret-detector.js";

// ============================================================================
// Types
// ============================================================================

export type IssueInput = Omit<LintIssue, "ruleId" | "severity">;

export interface RuleContext {
  pack: LoadedPack;
  /** Tool names accepted in addition to the built-in ones */
  knownTools: ReadonlySet<string>;
  report: (issue: IssueInput) => void;
}

export interface LintRule {
  id: string;
  severity: Severity;
  description: string;
  check: (ctx: RuleContext) => void;
}

interface SchemaIssue {
  path: (string | number)[];
  message: string;
}

// ============================================================================
// Helpers
// ============================================================================

const schemaCache = new WeakMap<LoadedDefinition, SchemaIssue[]>();

/** Schema issues of a definition whose frontmatter parsed */
function schemaIssues(def: LoadedDefinition): SchemaIssue[] {
  const cached = schemaCache.get(def);
  if (cached) return cached;
  if (!def.frontmatter.ok) return [];

  const schema = def.kind === "agent" ? agentFrontmatterSchema : commandFrontmatterSchema;
  const result = schema.safeParse(def.frontmatter.data);
  const issues = result.success
    ? []
    : result.error.issues.map(i => ({ path: i.path, message: i.message }));
  schemaCache.set(def, issues);
  return issues;
}

function allDefinitions(pack: LoadedPack): LoadedDefinition[] {
  return [...pack.agents, ...pack.commands];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * 1-based source line of a frontmatter key. Nested keys are looked up
 * among the indented lines under their parent. Falls back to the
 * parent's line, then to line 1.
 */
export function findKeyLine(def: LoadedDefinition, keyPath: (string | number)[]): number {
  const lines = def.content.split(/\r?\n/);
  const end = def.frontmatter.ok ? def.frontmatter.bodyLine - 2 : lines.length;
  const [top, nested] = keyPath;
  if (top === undefined) return 1;

  const topPattern = new RegExp(`^["']?${escapeRegExp(String(top))}["']?\\s*:`);
  const topIdx = lines.findIndex((line, idx) => idx > 0 && idx < end && topPattern.test(line));
  if (topIdx === -1) return 1;
  if (nested === undefined) return topIdx + 1;

  const nestedPattern = new RegExp(`^\\s+["']?${escapeRegExp(String(nested))}["']?\\s*:`);
  for (let idx = topIdx + 1; idx < end; idx++) {
    const line = lines[idx] ?? "";
    if (line.trim() === "") continue;
    if (!/^\s/.test(line)) break;
    if (nestedPattern.test(line)) return idx + 1;
  }
  return topIdx + 1;
}

function formatSchemaMessage(issue: SchemaIssue): string {
  const field = String(issue.path[0] ?? "");
  if (issue.message.startsWith(field)) return issue.message;
  return `${issue.path.join(".")}: ${issue.message}`;
}

/** Rule that reports schema issues for the given top-level fields */
function schemaFieldRule(
  id: string,
  description: string,
  matches: (field: string) => boolean
): LintRule {
  return {
    id,
    severity: "error",
    description,
    check: ({ pack, report }) => {
      for (const def of allDefinitions(pack)) {
        for (const issue of schemaIssues(def)) {
          if (!matches(String(issue.path[0] ?? ""))) continue;
          report({
            file: def.relPath,
            line: findKeyLine(def, issue.path),
            message: formatSchemaMessage(issue),
          });
        }
      }
    },
  };
}

/** Tool names and wildcard prefixes an agent may switch */
function isKnownTool(tool: string, ctx: RuleContext, mcpNames: string[]): boolean {
  const builtIn: readonly string[] = KNOWN_TOOLS;
  if (builtIn.includes(tool) || ctx.knownTools.has(tool)) return true;
  if (mcpNames.some(name => tool.startsWith(`${name}_`))) return true;

  const star = tool.indexOf("*");
  if (star === -1) return false;
  const prefix = tool.slice(0, star);
  return (
    prefix === "" ||
    builtIn.some(t => t.startsWith(prefix)) ||
    mcpNames.some(name => `${name}_`.startsWith(prefix) || prefix.startsWith(`${name}_`))
  );
}

function mcpServerNames(pack: LoadedPack): string[] {
  const loaded = pack.hostConfig;
  if (!loaded?.ok || !isRecord(loaded.data)) return [];
  const mcp = loaded.data["mcp"];
  return isRecord(mcp) ? Object.keys(mcp) : [];
}

// ============================================================================
// Rules
// ============================================================================

const frontmatterMissing: LintRule = {
  id: "frontmatter/missing",
  severity: "error",
  description: "Every definition starts with a --- frontmatter block",
  check: ({ pack, report }) => {
    for (const def of allDefinitions(pack)) {
      const fm = def.frontmatter;
      if (!fm.ok && fm.error.code === "missing") {
        report({ file: def.relPath, line: 1, message: `missing frontmatter block in ${def.kind} "${def.name}"` });
      }
    }
  },
};

const frontmatterSyntax: LintRule = {
  id: "frontmatter/syntax",
  severity: "error",
  description: "Frontmatter is a closed block holding a YAML mapping",
  check: ({ pack, report }) => {
    for (const def of allDefinitions(pack)) {
      const fm = def.frontmatter;
      if (!fm.ok && fm.error.code !== "missing") {
        report({ file: def.relPath, line: fm.error.line, message: `invalid frontmatter: ${fm.error.message}` });
      }
    }
  },
};

const descriptionRequired = schemaFieldRule(
  "description/required",
  "Every definition has a non-empty description",
  field => field === "description"
);

const modeEnum = schemaFieldRule(
  "mode/enum",
  "Agent mode is primary, subagent, or all",
  field => field === "mode"
);

const toolsBoolean = schemaFieldRule(
  "tools/boolean",
  "Agent tool flags are booleans",
  field => field === "tools"
);

const temperatureRange = schemaFieldRule(
  "temperature/range",
  "Agent temperature is a number between 0 and 2",
  field => field === "temperature"
);

const FIELD_RULE_FIELDS = new Set(["description", "mode", "tools", "temperature"]);

const fieldType = schemaFieldRule(
  "field/type",
  "Other known fields have the right type",
  field => !FIELD_RULE_FIELDS.has(field)
);

const toolsUnknown: LintRule = {
  id: "tools/unknown",
  severity: "warning",
  description: "Tool flags name a built-in tool, a configured tool, or an MCP server's tools",
  check: (ctx) => {
    const mcpNames = mcpServerNames(ctx.pack);
    for (const def of ctx.pack.agents) {
      if (!def.frontmatter.ok) continue;
      const tools = def.frontmatter.data["tools"];
      if (!isRecord(tools)) continue;
      for (const tool of Object.keys(tools)) {
        if (isKnownTool(tool, ctx, mcpNames)) continue;
        ctx.report({
          file: def.relPath,
          line: findKeyLine(def, ["tools", tool]),
          message: `unknown tool "${tool}"`,
        });
      }
    }
  },
};

const fieldUnknown: LintRule = {
  id: "field/unknown",
  severity: "warning",
  description: "Frontmatter only uses fields the host understands",
  check: ({ pack, report }) => {
    for (const def of allDefinitions(pack)) {
      if (!def.frontmatter.ok) continue;
      const known = def.kind === "agent" ? AGENT_FIELDS : COMMAND_FIELDS;
      for (const key of Object.keys(def.frontmatter.data)) {
        if (known.includes(key)) continue;
        report({
          file: def.relPath,
          line: findKeyLine(def, [key]),
          message: `unknown ${def.kind} field "${key}"`,
        });
      }
    }
  },
};

const nameFormat: LintRule = {
  id: "name/format",
  severity: "warning",
  description: "File names are lowercase kebab-case",
  check: ({ pack, report }) => {
    for (const def of allDefinitions(pack)) {
      if (isKebabCase(def.name)) continue;
      report({ file: def.relPath, message: `${def.kind} name "${def.name}" is not lowercase kebab-case` });
    }
  },
};

const nameDuplicate: LintRule = {
  id: "name/duplicate",
  severity: "error",
  description: "No two files of one kind derive the same name",
  check: ({ pack, report }) => {
    for (const defs of [pack.agents, pack.commands]) {
      const byName = new Map<string, LoadedDefinition[]>();
      for (const def of defs) {
        const key = def.name.toLowerCase();
        byName.set(key, [...(byName.get(key) ?? []), def]);
      }
      for (const group of byName.values()) {
        const [first, ...rest] = group;
        if (!first) continue;
        for (const dup of rest) {
          report({
            file: dup.relPath,
            message: `duplicate ${dup.kind} name "${dup.name}" (also ${first.relPath})`,
          });
        }
      }
    }
  },
};

const referenceUnknownAgent: LintRule = {
  id: "reference/unknown-agent",
  severity: "error",
  description: "Agent references resolve to an agent file",
  check: ({ pack, report }) => {
    const agentNames = new Set(pack.agents.map(a => a.name));

    for (const def of allDefinitions(pack)) {
      const { body, bodyLine } = def.frontmatter;
      for (const ref of extractAgentReferences(body, bodyLine)) {
        if (agentNames.has(ref.name)) continue;
        report({ file: def.relPath, line: ref.line, message: `unknown agent "${ref.name}"` });
      }

      if (def.kind === "command" && def.frontmatter.ok) {
        const agent = def.frontmatter.data["agent"];
        if (typeof agent === "string" && agent !== "" && !agentNames.has(agent)) {
          report({
            file: def.relPath,
            line: findKeyLine(def, ["agent"]),
            message: `agent field names unknown agent "${agent}"`,
          });
        }
      }
    }
  },
};

const referenceDisabledAgent: LintRule = {
  id: "reference/disabled-agent",
  severity: "warning",
  description: "Agent references do not point at disabled agents",
  check: ({ pack, report }) => {
    const disabled = new Set(
      pack.agents
        .filter(a => a.frontmatter.ok && a.frontmatter.data["disable"] === true)
        .map(a => a.name)
    );
    if (disabled.size === 0) return;

    for (const def of allDefinitions(pack)) {
      const { body, bodyLine } = def.frontmatter;
      for (const ref of extractAgentReferences(body, bodyLine)) {
        if (!disabled.has(ref.name)) continue;
        report({ file: def.relPath, line: ref.line, message: `agent "${ref.name}" is disabled` });
      }
    }
  },
};

const bodyEmpty: LintRule = {
  id: "body/empty",
  severity: "warning",
  description: "Definitions carry prompt text after the frontmatter",
  check: ({ pack, report }) => {
    for (const def of allDefinitions(pack)) {
      const fm = def.frontmatter;
      if (!fm.ok || fm.body.trim() !== "") continue;
      report({ file: def.relPath, line: fm.bodyLine, message: `${def.kind} "${def.name}" has no prompt text` });
    }
  },
};

const configSyntax: LintRule = {
  id: "config/syntax",
  severity: "error",
  description: "The host configuration file is valid JSON",
  check: ({ pack, report }) => {
    const loaded = pack.hostConfig;
    if (!loaded || loaded.ok) return;
    report({ file: loaded.relPath, line: loaded.error.line, message: `invalid JSON: ${loaded.error.message}` });
  },
};

const configSchema: LintRule = {
  id: "config/schema",
  severity: "error",
  description: "MCP entries have boolean enabled flags and integer timeouts",
  check: ({ pack, report }) => {
    const loaded = pack.hostConfig;
    if (!loaded?.ok) return;
    const result = hostConfigSchema.safeParse(loaded.data);
    if (result.success) return;

    for (const issue of result.error.issues) {
      report({
        file: loaded.relPath,
        line: lineOfJsonPath(loaded.raw, issue.path),
        message: issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      });
    }
  },
};

const configSecret: LintRule = {
  id: "config/secret",
  severity: "warning",
  description: "MCP credentials come from {env:NAME} references",
  check: ({ pack, report }) => {
    const loaded = pack.hostConfig;
    if (!loaded) return;
    const config = toHostConfigFile(loaded);
    if (!config) return;

    for (const finding of detectSecretsInMcps(config.mcp)) {
      const jsonPath = ["mcp", finding.mcpName, finding.field, finding.key];
      report({
        file: loaded.relPath,
        line: lineOfJsonPath(loaded.raw, jsonPath),
        message: `${jsonPath.join(".")} looks like a hardcoded secret; use "{env:${finding.key}}"`,
      });
    }
  },
};

export const LINT_RULES: readonly LintRule[] = [
  frontmatterMissing,
  frontmatterSyntax,
  descriptionRequired,
  modeEnum,
  toolsBoolean,
  toolsUnknown,
  temperatureRange,
  fieldType,
  fieldUnknown,
  nameFormat,
  nameDuplicate,
  referenceUnknownAgent,
  referenceDisabledAgent,
  bodyEmpty,
  configSyntax,
  configSchema,
  configSecret,
];

export function getRule(id: string): LintRule | undefined {
  return LINT_RULES.find(r => r.id === id);
}
