export type { HostDescriptor, HostDisplay, Capability, ResolvedHostPaths } from "./_types.js";
export {
  HOST_REGISTRY,
  ALL_HOST_IDS,
  getHost,
  hostsWithCapability,
  resolveHostPaths,
  type ResolveHostPathsOptions,
} from "./_registry.js";
