import { describe, it, expect } from "vitest";
import { extractAgentReferences, referencedAgentNames } from "./references.js";

describe("extractAgentReferences", () => {
  it("finds bold agent and subagent references with source positions", () => {
    const body = [
      "## Phase 1",
      "1. Launch **dependency-analyzer** agent to map imports",
      "2. Hand off to the **test-analyst** subagent",
    ].join("\n");

    expect(extractAgentReferences(body, 5)).toEqual([
      { name: "dependency-analyzer", line: 6, column: 11 },
      { name: "test-analyst", line: 7, column: 20 },
    ]);
  });

  it("finds code-span references and is case-insensitive on the word agent", () => {
    const refs = extractAgentReferences("Run the `security-reviewer` Agent now");
    expect(refs).toEqual([{ name: "security-reviewer", line: 1, column: 9 }]);
  });

  it("returns several references on one line in column order", () => {
    const refs = extractAgentReferences("Use `b-agent` agent after **a-agent** agent");
    expect(refs.map(r => r.name)).toEqual(["b-agent", "a-agent"]);
  });

  it("ignores references inside fenced code blocks", () => {
    const body = [
      "```markdown",
      "Launch **example-agent** agent",
      "```",
      "Launch **real-agent** agent",
    ].join("\n");
    expect(extractAgentReferences(body).map(r => r.name)).toEqual(["real-agent"]);
  });

  it("ignores bold text not followed by agent and capitalized single words", () => {
    const body = "**Important** agent notes\n**phase-one** results";
    expect(extractAgentReferences(body)).toEqual([]);
  });

  it("keeps hyphenated names with uppercase letters", () => {
    const body = "**Important** agent notes\n**phase-one** results\n**Security-Reviewer** agent";
    expect(extractAgentReferences(body)).toEqual([{ name: "Security-Reviewer", line: 3, column: 1 }]);
  });
});

describe("referencedAgentNames", () => {
  it("dedupes in first-seen order", () => {
    const names = referencedAgentNames([
      { name: "b", line: 1, column: 1 },
      { name: "a", line: 2, column: 1 },
      { name: "b", line: 3, column: 1 },
    ]);
    expect(names).toEqual(["b", "a"]);
  });
});
