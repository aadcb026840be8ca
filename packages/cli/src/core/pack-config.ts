/**
 * Pack configuration (agentpack.yaml at the pack root).
 *
 * Every field is optional; a missing file yields the defaults. A file that
 * exists but does not validate is a hard error.
 */

import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { type PackConfig, packConfigSchema, errorMessage } from "@agentpack/core";
import { readFileIfExists } from "./fs-helpers.js";

export const PACK_CONFIG_FILE = "agentpack.yaml";

export const DEFAULT_PACK_CONFIG: PackConfig = packConfigSchema.parse({});

export async function loadPackConfig(root: string): Promise<PackConfig> {
  const configPath = path.join(root, PACK_CONFIG_FILE);
  const content = await readFileIfExists(configPath);
  if (content === null) return { ...DEFAULT_PACK_CONFIG };

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new Error(`Invalid ${PACK_CONFIG_FILE}: ${errorMessage(error)}`);
  }

  const result = packConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new Error(`Invalid ${PACK_CONFIG_FILE} (${configPath}): ${where}${issue?.message ?? "invalid configuration"}`);
  }

  return result.data;
}
