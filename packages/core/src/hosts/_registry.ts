import * as os from "node:os";
import * as path from "node:path";
import type { HostDescriptor, Capability, ResolvedHostPaths } from "./_types.js";
import { expandPath } from "../utils.js";
import { opencode } from "./opencode.js";
import { claudeCode } from "./claude-code.js";

export const HOST_REGISTRY: Record<string, HostDescriptor> = {
  [opencode.id]: opencode,
  [claudeCode.id]: claudeCode,
};

export const ALL_HOST_IDS = Object.keys(HOST_REGISTRY);

export function getHost(id: string): HostDescriptor {
  const desc = HOST_REGISTRY[id];
  if (!desc) throw new Error(`Unknown host: ${id}`);
  return desc;
}

export function hostsWithCapability(cap: Capability): HostDescriptor[] {
  return Object.values(HOST_REGISTRY).filter(h => h.capabilities.includes(cap));
}

export interface ResolveHostPathsOptions {
  env?: NodeJS.ProcessEnv;
  home?: string;
}

export function resolveHostPaths(
  host: HostDescriptor,
  opts: ResolveHostPathsOptions = {}
): ResolvedHostPaths {
  const env = opts.env ?? process.env;
  const home = opts.home ?? os.homedir();
  const override = host.configDirEnv ? env[host.configDirEnv] : undefined;
  const configDir = expandPath(override || host.configDir, home);

  return {
    configDir,
    agentsDir: path.join(configDir, host.agentsDirName),
    commandsDir: path.join(configDir, host.commandsDirName),
    configFile: host.configFileName ? path.join(configDir, host.configFileName) : null,
  };
}
