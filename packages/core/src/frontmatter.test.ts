import { describe, it, expect } from "vitest";
import { splitFrontmatter, parseFrontmatter, stringifyFrontmatter } from "./frontmatter.js";

describe("splitFrontmatter", () => {
  it("splits block and body and reports the body line", () => {
    const split = splitFrontmatter("---\ndescription: Reviews code\n---\nBody text\n");
    expect(split).toEqual({
      kind: "present",
      block: "description: Reviews code",
      body: "Body text\n",
      bodyLine: 4,
    });
  });

  it("reports absent frontmatter", () => {
    const split = splitFrontmatter("# Title\n\nText\n");
    expect(split.kind).toBe("absent");
    expect(split.body).toBe("# Title\n\nText\n");
  });

  it("reports an unterminated block", () => {
    expect(splitFrontmatter("---\ndescription: x\n").kind).toBe("unterminated");
  });

  it("does not treat a later thematic break as the opening delimiter", () => {
    expect(splitFrontmatter("Intro\n---\ndescription: x\n---\n").kind).toBe("absent");
  });

  it("accepts a byte order mark, CRLF line endings and trailing spaces on delimiters", () => {
    const split = splitFrontmatter("\uFEFF--- \r\ndescription: x\r\n---\r\nBody\r\n");
    expect(split).toEqual({ kind: "present", block: "description: x", body: "Body\n", bodyLine: 4 });
  });
});

describe("parseFrontmatter", () => {
  it("parses nested maps", () => {
    const result = parseFrontmatter(
      "---\ndescription: Reviews code\nmode: subagent\ntools:\n  bash: false\n  read: true\n---\nBody text\n"
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data).toEqual({
      description: "Reviews code",
      mode: "subagent",
      tools: { bash: false, read: true },
    });
    expect(result.body).toBe("Body text\n");
    expect(result.bodyLine).toBe(8);
  });

  it("parses an empty block as an empty map", () => {
    const result = parseFrontmatter("---\n---\nBody");
    expect(result).toEqual({ ok: true, data: {}, body: "Body", bodyLine: 3 });
  });

  it("reports a missing block at line 1", () => {
    const result = parseFrontmatter("Just prose\n");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({ code: "missing", message: "missing frontmatter block", line: 1 });
  });

  it("reports an unterminated block", () => {
    const result = parseFrontmatter("---\ndescription: x\n");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("unterminated");
    expect(result.error.message).toBe('frontmatter block is not closed with "---"');
  });

  it("reports YAML errors at their source line", () => {
    const result = parseFrontmatter("---\ndescription: a\ndescription: b\n---\n");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("syntax");
    expect(result.error.message).toContain("Map keys must be unique");
    expect(result.error.line).toBe(3);
  });

  it("rejects a block that is not a mapping", () => {
    const result = parseFrontmatter("---\njust text\n---\nBody\n");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({
      code: "syntax",
      message: "frontmatter must be a mapping of key: value pairs",
      line: 2,
    });
  });

  it("reports excessive alias expansion as a syntax error", () => {
    const aliases = Array.from({ length: 120 }, () => "  - *a").join("\n");
    const text = `---\nx: &a v\ny:\n${aliases}\n---\nBody\n`;

    const result = parseFrontmatter(text);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("syntax");
    expect(result.error.line).toBe(2);
    expect(result.error.message).toMatch(/alias/i);
    expect(result.body).toBe("Body\n");
  });
});

describe("stringifyFrontmatter", () => {
  it("writes a document the parser reads back", () => {
    const doc = stringifyFrontmatter({ description: "Reviews code", mode: "subagent" }, "# Title\n");
    expect(doc).toBe("---\ndescription: Reviews code\nmode: subagent\n---\n\n# Title\n");

    const parsed = parseFrontmatter(doc);
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.data).toEqual({ description: "Reviews code", mode: "subagent" });
    expect(parsed.body).toBe("\n# Title\n");
  });
});
