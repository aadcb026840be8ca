/**
 * @agentpack/core
 * Core types, schemas, and utilities for agent pack tooling
 */

// Types
export * from "./types.js";

// Schemas
export * from "./schema.js";

// Utilities
export * from "./utils.js";

// Frontmatter
export * from "./frontmatter.js";

// References and MCP helpers
export * from "./references.js";
export * from "./mcp.js";

// Logger
export { createLogEntry, type LogEntry, type LogEntryInput, type LogLevel } from "./logger.js";

// Host Registry
export * from "./hosts/index.js";
