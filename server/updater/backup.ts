import fs from "node:fs/promises";
import path from "node:path";

import { UpdateError } from "./errors.js";

const BACKUP_PREFIX = "backup_";
const excludedEntries = new Set([".git", ".update.lock"]);

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function nextBackupPath(repositoryPath: string, now: Date): Promise<string> {
  const parent = path.dirname(path.resolve(repositoryPath));
  const base = path.join(parent, `${BACKUP_PREFIX}${formatBackupTimestamp(now)}`);
  if (!(await pathExists(base))) {
    return base;
  }

  for (let suffix = 1; ; suffix += 1) {
    const candidate = `${base}_${suffix}`;
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
}

function copyFilter(sourceRoot: string) {
  return (source: string): boolean => {
    const relative = path.relative(sourceRoot, source);
    if (relative.length === 0) {
      return true;
    }
    const topLevel = relative.split(path.sep)[0] ?? "";
    return !excludedEntries.has(topLevel);
  };
}

/** Copies the working tree (minus version-control metadata) to a timestamped sibling directory. */
export async function createBackup(repositoryPath: string, now: Date = new Date()): Promise<string> {
  const sourceRoot = path.resolve(repositoryPath);
  const destination = await nextBackupPath(sourceRoot, now);

  await fs.cp(sourceRoot, destination, {
    recursive: true,
    errorOnExist: true,
    force: false,
    filter: copyFilter(sourceRoot)
  });

  return destination;
}

export function isBackupOf(repositoryPath: string, backupPath: string): boolean {
  const resolvedBackup = path.resolve(backupPath);
  return (
    path.basename(resolvedBackup).startsWith(BACKUP_PREFIX) &&
    path.dirname(resolvedBackup) === path.dirname(path.resolve(repositoryPath))
  );
}

/**
 * Copies a backup back over the working tree. Files created after the backup
 * are left in place and `.git` is untouched, so the result is the backed-up
 * content on top of whatever commit is checked out.
 */
export async function restoreBackup(repositoryPath: string, backupPath: string): Promise<void> {
  if (!isBackupOf(repositoryPath, backupPath)) {
    throw new UpdateError(
      "INVALID_REQUEST",
      `${backupPath} is not a ${BACKUP_PREFIX}* directory next to ${repositoryPath}.`
    );
  }

  const stats = await fs.stat(backupPath).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new UpdateError("INVALID_REQUEST", `Backup directory ${backupPath} does not exist.`);
  }

  const sourceRoot = path.resolve(backupPath);
  await fs.cp(sourceRoot, path.resolve(repositoryPath), {
    recursive: true,
    force: true,
    filter: copyFilter(sourceRoot)
  });
}
