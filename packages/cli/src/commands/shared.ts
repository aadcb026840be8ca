/**
 * Helpers shared by the pack commands.
 */

import * as path from "node:path";
import { type HostDescriptor, type PackConfig, getHost } from "@agentpack/core";
import { loadPackConfig } from "../core/pack-config.js";

export interface PackContext {
  root: string;
  config: PackConfig;
}

/**
 * Resolve the pack root (default: current directory) and load its config
 */
export async function loadPackContext(root?: string): Promise<PackContext> {
  const packRoot = path.resolve(root ?? process.cwd());
  return { root: packRoot, config: await loadPackConfig(packRoot) };
}

/**
 * Hosts named on the command line, or the pack config's hosts
 */
export function resolveHosts(requested: string[] | undefined, config: PackConfig): HostDescriptor[] {
  const ids = requested && requested.length > 0 ? requested : config.hosts;
  return ids.map(id => getHost(id));
}

/**
 * Validate an option against its allowed values
 */
export function parseChoice<T extends string>(value: string, choices: readonly T[], flag: string): T {
  const match = choices.find(c => c === value);
  if (match === undefined) {
    throw new Error(`Invalid ${flag} "${value}": expected one of ${choices.join(", ")}`);
  }
  return match;
}

export function parseCount(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid ${flag} "${value}": expected a non-negative integer`);
  }
  return n;
}
