import fs from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createBackup, formatBackupTimestamp, isBackupOf, restoreBackup } from "../../server/updater/backup.js";
import { LOCK_FILE_NAME } from "../../server/updater/lock.js";
import { createTempWorkspace, type TempWorkspace } from "../helpers/workspace.js";

const now = new Date(2024, 0, 2, 3, 4, 5);
let workspace: TempWorkspace;

beforeEach(() => {
  workspace = createTempWorkspace();
  const repo = workspace.repositoryPath;
  fs.writeFileSync(path.join(repo, "main.py"), "print('v1')\n", "utf8");
  fs.mkdirSync(path.join(repo, "config"));
  fs.writeFileSync(path.join(repo, "config", "settings.yaml"), "debug: false\n", "utf8");
  fs.mkdirSync(path.join(repo, ".git"));
  fs.writeFileSync(path.join(repo, ".git", "HEAD"), "ref: refs/heads/release/1.0\n", "utf8");
  fs.writeFileSync(path.join(repo, LOCK_FILE_NAME), "{}", "utf8");
});

afterEach(() => {
  workspace.cleanup();
});

describe("working tree backups", () => {
  it("formats the timestamp in local time", () => {
    expect(formatBackupTimestamp(now)).toBe("20240102_030405");
  });

  it("copies the tree beside it without git metadata or the lock file", async () => {
    const backupPath = await createBackup(workspace.repositoryPath, now);

    expect(backupPath).toBe(path.join(workspace.root, "backup_20240102_030405"));
    expect(fs.readFileSync(path.join(backupPath, "main.py"), "utf8")).toBe("print('v1')\n");
    expect(fs.readFileSync(path.join(backupPath, "config", "settings.yaml"), "utf8")).toBe("debug: false\n");
    expect(fs.existsSync(path.join(backupPath, ".git"))).toBe(false);
    expect(fs.existsSync(path.join(backupPath, LOCK_FILE_NAME))).toBe(false);
  });

  it("adds a numeric suffix when the timestamped directory exists", async () => {
    const first = await createBackup(workspace.repositoryPath, now);
    const second = await createBackup(workspace.repositoryPath, now);

    expect(path.basename(first)).toBe("backup_20240102_030405");
    expect(path.basename(second)).toBe("backup_20240102_030405_1");
  });

  it("recognises only backup directories next to the tree", () => {
    expect(isBackupOf(workspace.repositoryPath, path.join(workspace.root, "backup_20240102_030405"))).toBe(true);
    expect(isBackupOf(workspace.repositoryPath, path.join(workspace.root, "snapshot"))).toBe(false);
    expect(isBackupOf(workspace.repositoryPath, path.join(workspace.repositoryPath, "backup_20240102_030405"))).toBe(
      false
    );
  });

  it("restores backed-up content over the tree and keeps newer files", async () => {
    const backupPath = await createBackup(workspace.repositoryPath, now);
    fs.writeFileSync(path.join(workspace.repositoryPath, "main.py"), "print('v2')\n", "utf8");
    fs.writeFileSync(path.join(workspace.repositoryPath, "added.txt"), "new\n", "utf8");

    await restoreBackup(workspace.repositoryPath, backupPath);

    expect(fs.readFileSync(path.join(workspace.repositoryPath, "main.py"), "utf8")).toBe("print('v1')\n");
    expect(fs.existsSync(path.join(workspace.repositoryPath, "added.txt"))).toBe(true);
    expect(fs.readFileSync(path.join(workspace.repositoryPath, ".git", "HEAD"), "utf8")).toBe(
      "ref: refs/heads/release/1.0\n"
    );
  });

  it("rejects paths that are not backups of the tree", async () => {
    await expect(restoreBackup(workspace.repositoryPath, path.join(workspace.root, "elsewhere"))).rejects.toMatchObject({
      code: "INVALID_REQUEST"
    });
    await expect(
      restoreBackup(workspace.repositoryPath, path.join(workspace.root, "backup_20990101_000000"))
    ).rejects.toMatchObject({
      code: "INVALID_REQUEST",
      message: `Backup directory ${path.join(workspace.root, "backup_20990101_000000")} does not exist.`
    });
  });
});
