/**
 * Installer
 *
 * Places a pack into a host's configuration directory, either as symlinks
 * back into the pack or as copies, and reports or undoes what is there.
 *
 * Strategy "directory" links the agent and command directories (and the
 * config file) as a whole. Strategy "files" places each definition file on
 * its own, next to whatever else the host directory holds.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  type HostDescriptor,
  type InstallMode,
  type InstallStrategy,
  type PackConfig,
  type ResolvedHostPaths,
  type ResolveHostPathsOptions,
  errorMessage,
  pathExists,
  resolveHostPaths,
} from "@agentpack/core";
import { hashPath } from "./content-hash.js";
import { loadDefinitionsFromDir } from "./pack-loader.js";
import {
  type LinkAction,
  createLink,
  findLinksInto,
  inspectPath,
  removeLink,
} from "./symlink-manager.js";
import { NULL_LOGGER, type TraceLogger, withFields } from "./tracer.js";

// ============================================================================
// Types
// ============================================================================

export type TargetKind = "agents" | "commands" | "config" | "agent" | "command";

export interface InstallTarget {
  kind: TargetKind;
  /** Display name: the definition name, or the pack-relative path */
  name: string;
  source: string;
  target: string;
}

export interface SourceDir {
  source: string;
  hostDir: string;
}

export interface InstallPlan {
  root: string;
  host: HostDescriptor;
  paths: ResolvedHostPaths;
  strategy: InstallStrategy;
  /** Pack directories and the host directories they are placed into */
  dirs: SourceDir[];
  targets: InstallTarget[];
}

export interface PlanOptions extends ResolveHostPathsOptions {
  strategy?: InstallStrategy;
}

export interface InstallOptions {
  mode?: InstallMode;
  force?: boolean;
  dryRun?: boolean;
  log?: TraceLogger;
}

export interface InstallEntry {
  target: InstallTarget;
  action: LinkAction;
  backupPath?: string;
  message?: string;
  error?: string;
}

export interface InstallResult {
  success: boolean;
  host: string;
  mode: InstallMode;
  entries: InstallEntry[];
  /** Symlinks into the pack that no longer have a source */
  pruned: string[];
  /** Host directories that were symlinks into the pack and became real directories */
  unlinkedDirs: string[];
}

export type UninstallAction = "removed" | "kept" | "missing" | "error";

export interface UninstallEntry {
  target: InstallTarget;
  action: UninstallAction;
  message?: string;
}

export interface UninstallOptions {
  /** Only remove symlinks, or only copies; both when unset */
  mode?: InstallMode;
  dryRun?: boolean;
  log?: TraceLogger;
}

export interface UninstallResult {
  success: boolean;
  host: string;
  entries: UninstallEntry[];
  pruned: string[];
}

export type TargetStatus = "linked" | "copied" | "stale" | "missing" | "foreign" | "broken";

export interface StatusEntry {
  target: InstallTarget;
  status: TargetStatus;
  /** Where a stale or broken symlink points */
  linkTarget?: string;
}

// ============================================================================
// Planning
// ============================================================================

/**
 * Work out which paths a pack occupies in a host's configuration directory.
 * Sources that do not exist in the pack are left out.
 */
export async function planInstall(
  root: string,
  config: PackConfig,
  host: HostDescriptor,
  options: PlanOptions = {}
): Promise<InstallPlan> {
  const packRoot = path.resolve(root);
  const strategy = options.strategy ?? "directory";
  const paths = resolveHostPaths(host, { env: options.env, home: options.home });

  const agentsSource = path.resolve(packRoot, config.agentsDir);
  const commandsSource = path.resolve(packRoot, config.commandsDir);
  const configSource = path.resolve(packRoot, config.configFile);

  const dirs: SourceDir[] = [];
  if (host.capabilities.includes("agents") && (await pathExists(agentsSource))) {
    dirs.push({ source: agentsSource, hostDir: paths.agentsDir });
  }
  if (host.capabilities.includes("commands") && (await pathExists(commandsSource))) {
    dirs.push({ source: commandsSource, hostDir: paths.commandsDir });
  }

  const targets: InstallTarget[] = [];

  if (strategy === "directory") {
    for (const dir of dirs) {
      targets.push({
        kind: dir.source === agentsSource ? "agents" : "commands",
        name: path.basename(dir.source),
        source: dir.source,
        target: dir.hostDir,
      });
    }
  } else {
    for (const dir of dirs) {
      const kind = dir.source === agentsSource ? "agent" : "command";
      const definitions = await loadDefinitionsFromDir(packRoot, dir.source, kind);
      for (const def of definitions) {
        targets.push({
          kind,
          name: def.name,
          source: def.path,
          target: path.join(dir.hostDir, path.basename(def.path)),
        });
      }
    }
  }

  if (paths.configFile && host.capabilities.includes("mcp") && (await pathExists(configSource))) {
    targets.push({
      kind: "config",
      name: path.basename(configSource),
      source: configSource,
      target: paths.configFile,
    });
  }

  return { root: packRoot, host, paths, strategy, dirs, targets };
}

/**
 * Plan matching what is on disk: "files" when a host directory the pack
 * would occupy is a real directory, "directory" otherwise.
 */
export async function planInstalled(
  root: string,
  config: PackConfig,
  host: HostDescriptor,
  options: ResolveHostPathsOptions = {}
): Promise<InstallPlan> {
  const dirPlan = await planInstall(root, config, host, { ...options, strategy: "directory" });
  for (const dir of dirPlan.dirs) {
    const state = await inspectPath(dir.hostDir);
    if (state.kind === "directory") {
      return planInstall(root, config, host, { ...options, strategy: "files" });
    }
  }
  return dirPlan;
}

// ============================================================================
// Install
// ============================================================================

async function copyTarget(
  target: InstallTarget,
  options: InstallOptions
): Promise<Omit<InstallEntry, "target">> {
  try {
    const state = await inspectPath(target.target);

    const write = async (): Promise<void> => {
      if (options.dryRun) return;
      await fs.mkdir(path.dirname(target.target), { recursive: true });
      await fs.cp(target.source, target.target, { recursive: true });
    };

    if (state.kind === "missing") {
      await write();
      return { action: "created" };
    }

    if (state.kind === "symlink") {
      if (!options.dryRun) await fs.unlink(target.target);
      await write();
      return { action: "updated", message: `replaced symlink to ${state.target}` };
    }

    const [sourceHash, targetHash] = await Promise.all([hashPath(target.source), hashPath(target.target)]);
    if (sourceHash !== null && sourceHash === targetHash) {
      return { action: "unchanged" };
    }

    if (!options.force) {
      return {
        action: "skipped",
        message: `a different ${state.kind} exists at ${target.target}; use --force to back it up and replace it`,
      };
    }

    const backupPath = `${target.target}.backup.${Date.now()}`;
    if (!options.dryRun) await fs.rename(target.target, backupPath);
    await write();
    return { action: "replaced", backupPath };
  } catch (error) {
    return { action: "error", error: errorMessage(error) };
  }
}

/**
 * A host directory that is itself a symlink into the pack cannot take
 * per-file links: writing into it would write into the pack.
 */
async function unlinkPackDirs(plan: InstallPlan, dryRun: boolean): Promise<string[]> {
  const unlinked: string[] = [];
  for (const dir of plan.dirs) {
    const state = await inspectPath(dir.hostDir);
    if (state.kind !== "symlink") continue;
    if (state.resolved !== plan.root && !state.resolved.startsWith(plan.root + path.sep)) continue;
    if (!dryRun) {
      await fs.unlink(dir.hostDir);
      await fs.mkdir(dir.hostDir, { recursive: true });
    }
    unlinked.push(dir.hostDir);
  }
  return unlinked;
}

/**
 * Remove symlinks into the pack that the plan no longer places.
 */
async function pruneStaleLinks(plan: InstallPlan, dryRun: boolean): Promise<string[]> {
  const planned = new Set(plan.targets.map(t => t.target));
  const pruned: string[] = [];
  for (const dir of plan.dirs) {
    for (const link of await findLinksInto(dir.hostDir, plan.root)) {
      if (planned.has(link)) continue;
      const result = await removeLink(link, undefined, { dryRun });
      if (!result.success) throw new Error(result.error ?? `Failed to remove ${link}`);
      pruned.push(link);
    }
  }
  return pruned;
}

/**
 * Install a plan. Never throws for a single target; failures are recorded
 * as "error" entries.
 */
export async function install(plan: InstallPlan, options: InstallOptions = {}): Promise<InstallResult> {
  const mode = options.mode ?? "symlink";
  const dryRun = options.dryRun ?? false;
  const hostId = plan.host.id;
  const log = withFields(options.log ?? NULL_LOGGER, { host: hostId, mode });

  const unlinkedDirs = plan.strategy === "files" ? await unlinkPackDirs(plan, dryRun) : [];
  for (const dir of unlinkedDirs) {
    log.info({ scope: "install", op: "unlink-dir", path: dir, msg: `Replaced directory symlink ${dir}` });
  }

  const entries: InstallEntry[] = [];
  for (const target of plan.targets) {
    const start = Date.now();
    const outcome =
      mode === "copy"
        ? await copyTarget(target, options)
        : await createLink(target.source, target.target, { force: options.force, dryRun });

    const entry: InstallEntry = {
      target,
      action: outcome.action,
      backupPath: outcome.backupPath,
      message: outcome.message,
      error: outcome.error,
    };
    entries.push(entry);

    const fields = {
      scope: "install",
      op: mode === "copy" ? "copy" : "link",
      item: target.name,
      itemKind: target.kind,
      path: target.target,
      action: entry.action,
      dur: Date.now() - start,
      data: dryRun ? { dryRun } : undefined,
    };
    if (entry.action === "error") {
      log.error({ ...fields, msg: `Failed to place ${target.name}`, error: entry.error });
    } else if (entry.action === "skipped") {
      log.warn({ ...fields, msg: entry.message ?? `Skipped ${target.name}` });
    } else {
      log.info({ ...fields, msg: `${entry.action} ${target.target}` });
    }
  }

  const pruned =
    plan.strategy === "files" && mode === "symlink" ? await pruneStaleLinks(plan, dryRun) : [];
  for (const link of pruned) {
    log.info({ scope: "install", op: "prune", path: link, action: "removed", msg: `Removed stale link ${link}` });
  }

  return {
    success: entries.every(e => e.action !== "error"),
    host: hostId,
    mode,
    entries,
    pruned,
    unlinkedDirs,
  };
}

// ============================================================================
// Uninstall
// ============================================================================

async function uninstallTarget(
  target: InstallTarget,
  options: UninstallOptions
): Promise<Omit<UninstallEntry, "target">> {
  try {
    const state = await inspectPath(target.target);
    if (state.kind === "missing") return { action: "missing" };

    if (state.kind === "symlink") {
      if (options.mode === "copy") {
        return { action: "kept", message: "symlink left in place in copy mode" };
      }
      if (state.resolved !== path.resolve(target.source)) {
        return { action: "kept", message: `symlink points elsewhere (${state.target})` };
      }
      if (!options.dryRun) await fs.unlink(target.target);
      return { action: "removed" };
    }

    if (options.mode === "symlink") {
      return { action: "kept", message: `${state.kind} is not a symlink` };
    }

    const [sourceHash, targetHash] = await Promise.all([hashPath(target.source), hashPath(target.target)]);
    if (sourceHash === null || sourceHash !== targetHash) {
      return { action: "kept", message: `${state.kind} differs from the pack` };
    }
    if (!options.dryRun) await fs.rm(target.target, { recursive: true, force: true });
    return { action: "removed" };
  } catch (error) {
    return { action: "error", message: errorMessage(error) };
  }
}

/**
 * Remove what install placed. Anything that is not ours is kept.
 */
export async function uninstall(plan: InstallPlan, options: UninstallOptions = {}): Promise<UninstallResult> {
  const dryRun = options.dryRun ?? false;
  const hostId = plan.host.id;
  const log = withFields(options.log ?? NULL_LOGGER, { host: hostId, mode: options.mode });
  const entries: UninstallEntry[] = [];

  for (const target of plan.targets) {
    const outcome = await uninstallTarget(target, options);
    entries.push({ target, ...outcome });

    const fields = {
      scope: "uninstall",
      op: "remove",
      item: target.name,
      itemKind: target.kind,
      path: target.target,
      action: outcome.action,
      data: dryRun ? { dryRun } : undefined,
    };
    if (outcome.action === "error") {
      log.error({ ...fields, msg: `Failed to remove ${target.name}`, error: outcome.message });
    } else {
      log.info({ ...fields, msg: outcome.message ?? `${outcome.action} ${target.target}` });
    }
  }

  const pruned =
    plan.strategy === "files" && options.mode !== "copy" ? await pruneStaleLinks(plan, dryRun) : [];
  for (const link of pruned) {
    log.info({ scope: "uninstall", op: "prune", path: link, action: "removed", msg: `Removed stale link ${link}` });
  }

  return {
    success: entries.every(e => e.action !== "error"),
    host: hostId,
    entries,
    pruned,
  };
}

// ============================================================================
// Status
// ============================================================================

/**
 * Report what sits at each planned target.
 */
export async function status(plan: InstallPlan): Promise<StatusEntry[]> {
  const entries: StatusEntry[] = [];

  for (const target of plan.targets) {
    const state = await inspectPath(target.target);

    if (state.kind === "missing") {
      entries.push({ target, status: "missing" });
    } else if (state.kind === "symlink") {
      if (state.dangling) {
        entries.push({ target, status: "broken", linkTarget: state.target });
      } else if (state.resolved === path.resolve(target.source)) {
        entries.push({ target, status: "linked" });
      } else {
        entries.push({ target, status: "stale", linkTarget: state.target });
      }
    } else {
      const [sourceHash, targetHash] = await Promise.all([hashPath(target.source), hashPath(target.target)]);
      entries.push({
        target,
        status: sourceHash !== null && sourceHash === targetHash ? "copied" : "foreign",
      });
    }
  }

  return entries;
}
