/**
 * Agent reference extraction from command bodies.
 *
 * Recognized forms:
 *   Launch **dependency-analyzer** agent
 *   Hand off to the **test-analyst** subagent
 *   Run the `security-reviewer` agent
 *
 * Names keep their case so the linter can report `**Code-Reviewer** agent`
 * as an unknown agent. A single capitalized word is treated as prose.
 */

import type { AgentReference } from "./types.js";

const REFERENCE_PATTERNS = [
  /\*\*([a-z0-9]+(?:-[a-z0-9]+)*)\*\*\s+(?:sub)?agent\b/gi,
  /`([a-z0-9]+(?:-[a-z0-9]+)*)`\s+(?:sub)?agent\b/gi,
];

const FENCE = /^\s*(```|~~~)/;

/**
 * Find every agent reference in a body.
 *
 * @param body - Markdown text after the frontmatter
 * @param firstLine - Source line the body starts on
 */
export function extractAgentReferences(body: string, firstLine = 1): AgentReference[] {
  const refs: AgentReference[] = [];
  const lines = body.split(/\r?\n/);
  let fence: string | null = null;

  lines.forEach((text, idx) => {
    const fenceMatch = FENCE.exec(text);
    if (fenceMatch?.[1]) {
      if (fence === null) fence = fenceMatch[1];
      else if (fence === fenceMatch[1]) fence = null;
      return;
    }
    if (fence !== null) return;

    const found: AgentReference[] = [];
    for (const pattern of REFERENCE_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        const name = match[1];
        if (!name || isCapitalizedWord(name)) continue;
        found.push({ name, line: firstLine + idx, column: (match.index ?? 0) + 1 });
      }
    }
    refs.push(...found.sort((a, b) => a.column - b.column));
  });

  return refs;
}

// "**Important** agent" is prose; "**Code-Reviewer** agent" is a miscased reference
function isCapitalizedWord(name: string): boolean {
  return !name.includes("-") && name !== name.toLowerCase();
}

/**
 * Unique referenced agent names, in first-seen order
 */
export function referencedAgentNames(refs: AgentReference[]): string[] {
  return [...new Set(refs.map(r => r.name))];
}
