import fs from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { UpdateCoordinator, type UpdateCoordinatorDeps } from "../../server/updater/coordinator.js";
import { UpdateError } from "../../server/updater/errors.js";
import { LOCK_FILE_NAME, UpdateLock } from "../../server/updater/lock.js";
import type { RestartLauncher } from "../../server/updater/relaunch.js";
import { createFakeRunner, deferred, failed, gitScript, ok, type FakeHandler } from "../helpers/fakeRunner.js";
import { createTempWorkspace, createTestConfig, type TempWorkspace } from "../helpers/workspace.js";

const listing = "  origin/HEAD -> origin/main\n  origin/main\n  origin/release/1.2.0\n  origin/release/1.3.0\n";
const releaseScript = {
  "rev-parse --abbrev-ref HEAD": ok("release/1.2.0\n"),
  "branch -r": ok(listing)
};

let workspace: TempWorkspace;

beforeEach(() => {
  workspace = createTempWorkspace();
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  workspace.cleanup();
  vi.restoreAllMocks();
});

function createCoordinator(
  handler: FakeHandler = gitScript(releaseScript),
  env: NodeJS.ProcessEnv = {},
  deps: UpdateCoordinatorDeps = {}
) {
  const fake = createFakeRunner(handler);
  const coordinator = new UpdateCoordinator(createTestConfig(workspace, env), {
    runner: fake.runner,
    makeBackup: async () => path.join(workspace.root, "backup_test"),
    ...deps
  });
  return { ...fake, coordinator };
}

describe("update coordinator", () => {
  it("reports an available update and records the check", async () => {
    const { coordinator } = createCoordinator();

    const result = await coordinator.check();

    expect(result.currentVersion).toBe("1.2.0");
    expect(result.latest).toEqual({
      version: "1.3.0",
      remoteRef: "origin/release/1.3.0",
      branch: "release/1.3.0"
    });
    expect(result.updateAvailable).toBe(true);
    expect(result.comparison).toEqual({ result: 1, path: "numeric" });
    expect(coordinator.getStatus()).toMatchObject({
      currentVersion: "1.2.0",
      latestVersion: "1.3.0",
      updateAvailable: true,
      busy: false
    });
  });

  it("fails the check when no version can be detected", async () => {
    const { coordinator, gitCalls } = createCoordinator(
      gitScript({
        "rev-parse --abbrev-ref HEAD": failed("fatal: not a git repository"),
        "describe --tags --always": failed("fatal: not a git repository")
      })
    );

    await expect(coordinator.check()).rejects.toMatchObject({ code: "VERSION_UNDETECTABLE" });
    expect(gitCalls()).not.toContain("fetch --all --prune");
    expect(coordinator.getStatus().lastError).toBe(
      "Could not determine the installed version from the branch name, VERSION file or git tags."
    );
  });

  it("updates to the newest release and releases the lock afterwards", async () => {
    const { coordinator, gitCalls } = createCoordinator();

    const result = await coordinator.run();

    expect(result.upToDate).toBe(false);
    expect(result.session?.outcome).toEqual({ status: "succeeded" });
    expect(result.summary).toBe(`Update to 1.3.0 completed. Backup: ${path.join(workspace.root, "backup_test")}.`);
    expect(result.restart).toEqual({ recommended: true, strategy: "in-place" });
    expect(gitCalls()).toContain("reset --hard origin/release/1.3.0");
    expect(coordinator.isBusy()).toBe(false);
    expect(fs.existsSync(path.join(workspace.repositoryPath, LOCK_FILE_NAME))).toBe(false);
    expect(coordinator.getStatus()).toMatchObject({
      currentVersion: "1.3.0",
      lastOutcome: result.summary,
      lastBackupPath: path.join(workspace.root, "backup_test")
    });
  });

  it("reports up to date without starting a session", async () => {
    const { coordinator, gitCalls } = createCoordinator(
      gitScript({ ...releaseScript, "branch -r": ok("  origin/release/1.1.0\n  origin/release/1.2.0\n") })
    );

    const handle = await coordinator.start();
    const result = await handle.done;

    expect(handle.session).toBeNull();
    expect(result).toEqual({
      upToDate: true,
      summary: "Already up to date (installed 1.2.0, newest release 1.2.0).",
      restart: { recommended: false, strategy: "in-place" }
    });
    expect(gitCalls().some((call) => call.startsWith("fetch --depth"))).toBe(false);
    expect(coordinator.isBusy()).toBe(false);
  });

  it("resolves a bare version against the first release prefix", async () => {
    const { coordinator, gitCalls } = createCoordinator();

    await coordinator.run({ target: "2.0.0", backup: false });

    expect(gitCalls()).toContain("fetch --depth 1 origin +refs/heads/release/2.0.0:refs/remotes/origin/release/2.0.0");
    expect(gitCalls()).not.toContain("branch -r");
  });

  it("rejects a second update while one is running", async () => {
    const gate = deferred();
    const script = gitScript(releaseScript);
    const { coordinator } = createCoordinator(async (command, args, options) => {
      if (args[0] === "fetch" && args[1] === "--depth") {
        await gate.promise;
      }
      return script(command, args, options);
    });

    const first = await coordinator.start();
    expect(first.session).not.toBeNull();
    expect(coordinator.isBusy()).toBe(true);
    expect(coordinator.getActiveSession()?.id).toBe(first.session?.id);

    const second = coordinator.start();
    await expect(second).rejects.toBeInstanceOf(UpdateError);
    await expect(second).rejects.toMatchObject({ code: "BUSY" });

    gate.resolve();
    const result = await first.done;
    expect(result.session?.outcome).toEqual({ status: "succeeded" });
    expect(coordinator.isBusy()).toBe(false);
  });

  it("rejects an update while another process holds the lock", async () => {
    fs.writeFileSync(
      path.join(workspace.repositoryPath, LOCK_FILE_NAME),
      JSON.stringify({ pid: 4242, timestamp: Date.now() }),
      "utf8"
    );
    const { coordinator, gitCalls } = createCoordinator(gitScript(releaseScript), {}, {
      lock: new UpdateLock(workspace.repositoryPath, { ttlMs: 60_000, isProcessAlive: () => true })
    });

    await expect(coordinator.start()).rejects.toMatchObject({
      code: "BUSY",
      message: "An update is already running in process 4242."
    });
    await expect(coordinator.check()).rejects.toMatchObject({
      code: "BUSY",
      message: "An update is already running in process 4242."
    });
    expect(gitCalls()).toEqual([]);
    expect(coordinator.isBusy()).toBe(false);
  });

  it("forces remote-triggered updates and can target the tracked branch", async () => {
    const { coordinator, gitCalls } = createCoordinator(gitScript(releaseScript), { UPDATER_TRIGGER_TARGET: "branch" });

    const result = await coordinator.runForced({ target: coordinator.triggerTarget() });

    expect(result.session?.mode).toBe("force");
    expect(result.session?.target).toEqual({ version: "main", remoteRef: "origin/main", branch: "main" });
    expect(result.session?.backupPath).toBe(path.join(workspace.root, "backup_test"));
    expect(gitCalls().slice(0, 2)).toEqual(["reset --hard HEAD", "clean -fd -e .update.lock"]);
  });

  it("answers a forced start before the target is resolved", async () => {
    const gate = deferred();
    const script = gitScript(releaseScript);
    const { coordinator, gitCalls } = createCoordinator(async (command, args, options) => {
      if (args.join(" ") === "fetch --all --prune") {
        await gate.promise;
      }
      return script(command, args, options);
    });

    const handle = await coordinator.startForced();

    expect(handle.target).toBe("latest");
    expect(gitCalls()).not.toContain("branch -r");
    expect(coordinator.isBusy()).toBe(true);

    gate.resolve();
    const result = await handle.done;
    expect(result.session?.id).toBe(handle.sessionId);
    expect(result.session?.target.version).toBe("1.3.0");
    expect(coordinator.isBusy()).toBe(false);
  });

  it("releases the slot when a forced start cannot resolve its target", async () => {
    const { coordinator } = createCoordinator(
      gitScript({
        "rev-parse --abbrev-ref HEAD": failed("fatal: not a git repository"),
        "describe --tags --always": failed("fatal: not a git repository")
      })
    );

    const handle = await coordinator.startForced();

    await expect(handle.done).rejects.toMatchObject({ code: "VERSION_UNDETECTABLE" });
    expect(coordinator.isBusy()).toBe(false);
    expect(coordinator.progressLog.query({ level: "error" }).map((entry) => entry.message)).toEqual([
      "Could not resolve the update target: Could not determine the installed version from the branch name, VERSION file or git tags."
    ]);
  });

  it("refuses a check while an update owns the tree", async () => {
    const gate = deferred();
    const script = gitScript(releaseScript);
    const { coordinator, gitCalls } = createCoordinator(async (command, args, options) => {
      if (args[0] === "fetch" && args[1] === "--depth") {
        await gate.promise;
      }
      return script(command, args, options);
    });

    const handle = await coordinator.start({ target: "1.3.0", backup: false });
    await vi.waitFor(() => expect(coordinator.getActiveSession()?.state).toBe("fetching"));

    await expect(coordinator.check()).rejects.toMatchObject({ code: "BUSY" });
    expect(gitCalls()).not.toContain("fetch --all --prune");

    gate.resolve();
    await handle.done;
  });

  it("lets a running check finish before an update takes the lock", async () => {
    const gate = deferred();
    const script = gitScript(releaseScript);
    const { coordinator, gitCalls } = createCoordinator(async (command, args, options) => {
      if (args.join(" ") === "fetch --all --prune") {
        await gate.promise;
      }
      return script(command, args, options);
    });

    const check = coordinator.check();
    await vi.waitFor(() => expect(gitCalls()).toContain("fetch --all --prune"));
    const run = coordinator.run({ target: "1.3.0", backup: false });
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(fs.existsSync(path.join(workspace.repositoryPath, LOCK_FILE_NAME))).toBe(false);
    expect(gitCalls()).not.toContain("status --porcelain --untracked-files=all");

    gate.resolve();
    await check;
    const result = await run;
    expect(result.session?.outcome).toEqual({ status: "succeeded" });
  });

  it("has the final progress line on disk when the run settles", async () => {
    const { coordinator } = createCoordinator();

    const result = await coordinator.run({ target: "1.3.0", backup: false });

    const logPath = path.join(workspace.root, "data", "update.log");
    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(result.summary).toBe("Update to 1.3.0 completed.");
    expect(lines[lines.length - 1]).toMatch(/ SUCCESS Update to 1\.3\.0 completed\.$/);
  });

  it("keeps in-tree updater files out of the dirty check and the force clean", async () => {
    const { coordinator, gitCalls } = createCoordinator(
      gitScript({
        ...releaseScript,
        "status --porcelain --untracked-files=all": ok("?? .update.lock\n?? state/update.log\n?? state/updater-state.json\n")
      }),
      { UPDATER_DATA_DIR: path.join(workspace.repositoryPath, "state") }
    );

    const safe = await coordinator.run({ target: "1.3.0", backup: false });
    const forced = await coordinator.runForced({ target: "1.3.0", backup: false });

    expect(safe.session?.outcome).toEqual({ status: "succeeded" });
    expect(forced.session?.outcome).toEqual({ status: "succeeded" });
    expect(gitCalls()).toContain(
      "clean -fd -e .update.lock -e state/updater-state.json -e state/update.log"
    );
  });

  it("forwards session progress to the progress log and the caller", async () => {
    const { coordinator } = createCoordinator();
    const sink = vi.fn();

    await coordinator.run({ target: "1.3.0", backup: false, sink });

    const successes = coordinator.progressLog.query({ level: "success" });
    expect(successes.map((entry) => entry.message)).toEqual(["Update to 1.3.0 completed."]);
    expect(sink).toHaveBeenCalledWith(expect.objectContaining({ type: "state", state: "completed" }));
  });

  it("cancels only when a session is active", async () => {
    const { coordinator } = createCoordinator();

    expect(coordinator.cancel()).toBe(false);
  });

  it("restarts only after success and when nothing is in flight", async () => {
    const launcher: RestartLauncher = {
      restartInPlace: vi.fn(async () => undefined),
      handOffToRelauncher: vi.fn(async () => undefined)
    };
    const { coordinator } = createCoordinator(gitScript(releaseScript), { UPDATER_RESTART_STRATEGY: "relauncher" }, {
      restartLauncher: launcher
    });
    const result = await coordinator.run({ target: "1.3.0", backup: false });

    await expect(coordinator.restartNow(result, { hasInFlightWork: () => true })).resolves.toEqual({
      restarted: false,
      reason: "Work is still in flight; restart deferred."
    });
    expect(launcher.handOffToRelauncher).not.toHaveBeenCalled();

    await expect(coordinator.restartNow(result, { hasInFlightWork: () => false })).resolves.toEqual({
      restarted: true,
      strategy: "relauncher"
    });
    expect(launcher.handOffToRelauncher).toHaveBeenCalledWith("1.3.0", workspace.repositoryPath);
    expect(launcher.restartInPlace).not.toHaveBeenCalled();
  });

  it("restores a backup under the same single-flight guard", async () => {
    const restore = vi.fn(async () => undefined);
    const { coordinator } = createCoordinator(gitScript(releaseScript), {}, { restoreBackupWith: restore });
    const backupPath = path.join(workspace.root, "backup_20240102_030405");

    await coordinator.restoreBackup(backupPath);

    expect(restore).toHaveBeenCalledWith(workspace.repositoryPath, backupPath);
    expect(coordinator.progressLog.query({ level: "success" }).map((entry) => entry.message)).toEqual([
      `Restored backup ${backupPath}.`
    ]);
    expect(coordinator.isBusy()).toBe(false);
  });
});
