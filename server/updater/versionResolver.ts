import fs from "node:fs/promises";
import path from "node:path";

import { commandSucceeded } from "./commandRunner.js";
import { runGit, type GitContext } from "./git.js";
import type { RepositoryHandle } from "./types.js";

export interface VersionResolverOptions {
  releasePrefixes: string[];
  queryTimeoutMs: number;
}

export const VERSION_FILE_NAME = "VERSION";

function debug(message: string): void {
  if (process.env.UPDATER_DEBUG === "1") {
    console.debug(`[version-resolver] ${message}`);
  }
}

async function readCurrentBranch(git: GitContext, timeoutMs: number): Promise<string | null> {
  try {
    const result = await runGit(git, ["rev-parse", "--abbrev-ref", "HEAD"], timeoutMs);
    if (!commandSucceeded(result)) {
      debug(`rev-parse failed: ${result.stderr.trim() || "no output"}`);
      return null;
    }
    const branch = result.stdout.trim();
    return branch.length > 0 ? branch : null;
  } catch (error) {
    debug(`rev-parse threw: ${String(error)}`);
    return null;
  }
}

export function stripReleasePrefix(branch: string, prefixes: string[]): string | null {
  for (const prefix of prefixes) {
    if (branch.startsWith(prefix)) {
      const version = branch.slice(prefix.length).trim();
      return version.length > 0 ? version : null;
    }
  }
  return null;
}

async function readVersionFile(repositoryPath: string): Promise<string | null> {
  try {
    const raw = await fs.readFile(path.join(repositoryPath, VERSION_FILE_NAME), "utf8");
    const firstLine = raw.split(/\r?\n/)[0]?.trim() ?? "";
    return firstLine.length > 0 ? firstLine : null;
  } catch (error) {
    debug(`VERSION file unreadable: ${String(error)}`);
    return null;
  }
}

async function describeTags(git: GitContext, timeoutMs: number): Promise<string | null> {
  try {
    const result = await runGit(git, ["describe", "--tags", "--always"], timeoutMs);
    if (!commandSucceeded(result)) {
      debug(`describe failed: ${result.stderr.trim() || "no output"}`);
      return null;
    }
    const version = result.stdout.trim().replace(/^v/, "").split("-")[0]?.trim() ?? "";
    return version.length > 0 ? version : null;
  } catch (error) {
    debug(`describe threw: ${String(error)}`);
    return null;
  }
}

/**
 * Resolves the installed version: release branch name, then VERSION file,
 * then `git describe`, then the raw branch name. Returns null only when every
 * query fails.
 */
export async function resolveVersion(git: GitContext, options: VersionResolverOptions): Promise<string | null> {
  const branch = await readCurrentBranch(git, options.queryTimeoutMs);
  const fromBranch = branch ? stripReleasePrefix(branch, options.releasePrefixes) : null;
  if (fromBranch) {
    debug(`resolved ${fromBranch} from branch ${branch ?? ""}`);
    return fromBranch;
  }

  const fromFile = await readVersionFile(git.repositoryPath);
  if (fromFile) {
    debug(`resolved ${fromFile} from ${VERSION_FILE_NAME}`);
    return fromFile;
  }

  const fromDescribe = await describeTags(git, options.queryTimeoutMs);
  if (fromDescribe) {
    debug(`resolved ${fromDescribe} from git describe`);
    return fromDescribe;
  }

  if (branch) {
    debug(`falling back to branch name ${branch}`);
    return branch;
  }

  console.warn(`[version-resolver] Could not detect a version for ${git.repositoryPath}.`);
  return null;
}

function porcelainPath(line: string): string {
  const entry = line.slice(3);
  return entry.startsWith('"') && entry.endsWith('"') ? entry.slice(1, -1) : entry;
}

function isIgnoredPath(entry: string, ignoredPaths: readonly string[]): boolean {
  const normalized = entry.replace(/\/+$/, "");
  return ignoredPaths.some((ignored) => normalized === ignored || normalized.startsWith(`${ignored}/`));
}

/**
 * Any change outside `ignoredPaths` (tree-relative, forward slashes) makes the
 * tree dirty. The updater's own lock and data files are passed here.
 */
export async function isWorkingTreeDirty(
  git: GitContext,
  timeoutMs: number,
  ignoredPaths: readonly string[] = []
): Promise<boolean> {
  try {
    const result = await runGit(git, ["status", "--porcelain", "--untracked-files=all"], timeoutMs);
    if (!commandSucceeded(result)) {
      // An unreadable status is treated as dirty.
      return true;
    }
    return result.stdout
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .some((line) => !isIgnoredPath(porcelainPath(line), ignoredPaths));
  } catch {
    return true;
  }
}

export async function inspectRepository(
  git: GitContext,
  options: VersionResolverOptions & { ignoredPaths?: readonly string[] }
): Promise<RepositoryHandle> {
  const [currentVersion, dirty, currentRef] = await Promise.all([
    resolveVersion(git, options),
    isWorkingTreeDirty(git, options.queryTimeoutMs, options.ignoredPaths),
    readCurrentBranch(git, options.queryTimeoutMs)
  ]);

  return {
    path: git.repositoryPath,
    currentVersion,
    dirty,
    currentRef
  };
}
