import { commandSucceeded, describeCommandFailure } from "./commandRunner.js";
import { UpdateError } from "./errors.js";
import { REMOTE_AUTH_HINT, runGit, type GitContext } from "./git.js";
import type { ReleaseRef } from "./types.js";
import { compareVersions } from "./versionComparator.js";

export interface ReleaseCatalogOptions {
  remote: string;
  releasePrefixes: string[];
  fetchTimeoutMs: number;
  listTimeoutMs: number;
}

export function parseRemoteBranchLine(line: string, remote: string, prefixes: string[]): ReleaseRef | null {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.includes(" -> ")) {
    return null;
  }

  const remotePrefix = `${remote}/`;
  if (!trimmed.startsWith(remotePrefix)) {
    return null;
  }

  const branch = trimmed.slice(remotePrefix.length);
  for (const prefix of prefixes) {
    if (!branch.startsWith(prefix)) {
      continue;
    }

    const version = branch.slice(prefix.length).trim();
    if (version.length === 0) {
      return null;
    }

    return {
      version,
      remoteRef: trimmed,
      branch
    };
  }

  return null;
}

/**
 * One entry per version literal. A later listing replaces an earlier one but
 * keeps the earlier entry's position.
 */
export function dedupeReleases(releases: ReleaseRef[]): ReleaseRef[] {
  const byVersion = new Map<string, ReleaseRef>();
  for (const release of releases) {
    byVersion.set(release.version, release);
  }
  return [...byVersion.values()];
}

export function parseRemoteBranches(output: string, remote: string, prefixes: string[]): ReleaseRef[] {
  const releases: ReleaseRef[] = [];
  for (const line of output.split(/\r?\n/)) {
    const release = parseRemoteBranchLine(line, remote, prefixes);
    if (release) {
      releases.push(release);
    }
  }
  return dedupeReleases(releases);
}

export async function fetchAndListReleases(git: GitContext, options: ReleaseCatalogOptions): Promise<ReleaseRef[]> {
  const fetchResult = await runGit(git, ["fetch", "--all", "--prune"], options.fetchTimeoutMs);
  if (!commandSucceeded(fetchResult)) {
    const reason = describeCommandFailure("git fetch --all --prune", fetchResult, options.fetchTimeoutMs);
    console.error(`[release-catalog] ${reason}`);
    throw new UpdateError("NETWORK_FAILURE", `${reason} ${REMOTE_AUTH_HINT}`);
  }

  const listResult = await runGit(git, ["branch", "-r"], options.listTimeoutMs);
  if (!commandSucceeded(listResult)) {
    const reason = describeCommandFailure("git branch -r", listResult, options.listTimeoutMs);
    console.error(`[release-catalog] ${reason}`);
    throw new UpdateError("NETWORK_FAILURE", `Could not list remote branches: ${reason}`);
  }

  const releases = parseRemoteBranches(listResult.stdout, options.remote, options.releasePrefixes);
  console.info(`[release-catalog] Found ${releases.length} release branch(es) on ${options.remote}.`);
  return releases;
}

export function findLatestRelease(releases: ReleaseRef[]): ReleaseRef | null {
  let latest: ReleaseRef | null = null;
  for (const release of releases) {
    if (!latest || compareVersions(release.version, latest.version) > 0) {
      latest = release;
    }
  }
  return latest;
}

export function releaseRefForVersion(version: string, remote: string, prefix: string): ReleaseRef {
  const trimmed = version.trim();
  const branch = `${prefix}${trimmed}`;
  return {
    version: trimmed,
    remoteRef: `${remote}/${branch}`,
    branch
  };
}

export function trackingRef(branch: string, remote: string): ReleaseRef {
  const trimmed = branch.trim();
  return {
    version: trimmed,
    remoteRef: `${remote}/${trimmed}`,
    branch: trimmed
  };
}
