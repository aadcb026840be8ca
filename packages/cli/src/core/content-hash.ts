/**
 * content-hash — SHA-256 hashing of installed copies
 *
 * A copy counts as ours when its hash equals the source's. Directories hash
 * their sorted relative paths together with each file's contents.
 */
import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isNotFound } from "./fs-helpers.js";

/** Compute a 12-character SHA-256 hex prefix. */
export function computeContentHash(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex").slice(0, 12);
}

async function collectFiles(dir: string, prefix = ""): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(path.join(dir, entry.name), rel)));
    } else {
      files.push(rel);
    }
  }
  return files;
}

/**
 * Hash a file or directory, following symlinks. Returns null when the path
 * does not exist.
 */
export async function hashPath(target: string): Promise<string | null> {
  let stats;
  try {
    stats = await fs.stat(target);
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }

  if (!stats.isDirectory()) {
    return computeContentHash(await fs.readFile(target));
  }

  const hash = crypto.createHash("sha256");
  for (const rel of (await collectFiles(target)).sort()) {
    hash.update(rel);
    hash.update("\0");
    hash.update(await fs.readFile(path.join(target, rel)));
    hash.update("\0");
  }
  return hash.digest("hex").slice(0, 12);
}
