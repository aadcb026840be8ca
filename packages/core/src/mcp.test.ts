import { describe, it, expect } from "vitest";
import { collectEnvRefs, isEnvReference, toMcpServerEntry, missingEnvVars } from "./mcp.js";

describe("collectEnvRefs", () => {
  it("collects both reference styles, sorted and unique", () => {
    expect(
      collectEnvRefs(["{env:OPENAI_API_KEY}", "Bearer ${CONTEXT7_API_KEY}", "plain", "{env:OPENAI_API_KEY}"])
    ).toEqual(["CONTEXT7_API_KEY", "OPENAI_API_KEY"]);
  });
});

describe("isEnvReference", () => {
  it("accepts a value that is only a reference", () => {
    expect(isEnvReference("{env:GEMINI_API_KEY}")).toBe(true);
    expect(isEnvReference("${GEMINI_API_KEY}")).toBe(true);
    expect(isEnvReference("Bearer {env:GEMINI_API_KEY}")).toBe(false);
  });
});

describe("toMcpServerEntry", () => {
  it("builds a local entry with env refs from command and environment", () => {
    const entry = toMcpServerEntry("context7", {
      type: "local",
      command: ["npx", "-y", "@upstash/context7-mcp"],
      environment: { CONTEXT7_API_KEY: "{env:CONTEXT7_API_KEY}" },
      enabled: true,
      timeout: 10000,
    });
    expect(entry).toEqual({
      name: "context7",
      type: "local",
      enabled: true,
      timeout: 10000,
      command: ["npx", "-y", "@upstash/context7-mcp"],
      environment: { CONTEXT7_API_KEY: "{env:CONTEXT7_API_KEY}" },
      envRefs: ["CONTEXT7_API_KEY"],
    });
  });

  it("builds a remote entry with env refs from headers", () => {
    const entry = toMcpServerEntry("search", {
      type: "remote",
      url: "https://mcp.example.com/mcp",
      headers: { Authorization: "Bearer {env:SEARCH_TOKEN}" },
      enabled: false,
    });
    expect(entry.type).toBe("remote");
    expect(entry.enabled).toBe(false);
    expect(entry.envRefs).toEqual(["SEARCH_TOKEN"]);
  });
});

describe("missingEnvVars", () => {
  it("lists referenced variables that are unset or empty", () => {
    const entry = toMcpServerEntry("gemini", {
      type: "local",
      command: ["gemini-mcp"],
      environment: { A: "{env:GEMINI_API_KEY}", B: "{env:OPENAI_API_KEY}" },
      enabled: true,
    });
    expect(missingEnvVars(entry, { GEMINI_API_KEY: "test-secret", OPENAI_API_KEY: "" })).toEqual(["OPENAI_API_KEY"]);
  });
});
