import { nanoid } from "nanoid";

import { restoreBackup as copyBackupOverTree } from "./backup.js";
import type { CommandRunner } from "./commandRunner.js";
import { treeOwnedPaths, type UpdaterRuntimeConfig } from "./config.js";
import type { syncDependencies } from "./dependencies.js";
import { UpdateError, toErrorMessage } from "./errors.js";
import { createGitContext, type GitContext } from "./git.js";
import { UpdateLock } from "./lock.js";
import { ProgressLog } from "./progressLog.js";
import type { RestartLauncher } from "./relaunch.js";
import { fetchAndListReleases, findLatestRelease, releaseRefForVersion, trackingRef } from "./releases.js";
import { UpdateSession, summarizeSession } from "./session.js";
import { UpdaterStateStore } from "./state.js";
import type {
  ReleaseRef,
  RestartStrategy,
  UpdateCheckResult,
  UpdateMode,
  UpdateProgressEvent,
  UpdateProgressSink,
  UpdateRunResult,
  UpdateSessionSnapshot,
  UpdateStatus
} from "./types.js";
import { describeComparison } from "./versionComparator.js";
import { resolveVersion } from "./versionResolver.js";

export interface StartUpdateRequest {
  /** Explicit release, bare version label, or nothing for "newest release". */
  target?: ReleaseRef | string;
  mode?: UpdateMode;
  backup?: boolean;
  sink?: UpdateProgressSink;
}

export interface UpdateSessionHandle {
  /** Null when no update was needed. */
  session: UpdateSession | null;
  done: Promise<UpdateRunResult>;
}

/** Returned before the target is known; `target` is "latest" until the background task resolves it. */
export interface DetachedUpdateHandle {
  sessionId: string;
  target: string;
  done: Promise<UpdateRunResult>;
}

export interface InFlightGate {
  hasInFlightWork(): boolean;
}

export type RestartOutcome = { restarted: true; strategy: RestartStrategy } | { restarted: false; reason: string };

export interface UpdateCoordinatorDeps {
  runner?: CommandRunner;
  stateStore?: UpdaterStateStore;
  progressLog?: ProgressLog;
  lock?: UpdateLock;
  restartLauncher?: RestartLauncher;
  makeBackup?: (repositoryPath: string) => Promise<string>;
  syncDependenciesWith?: typeof syncDependencies;
  restoreBackupWith?: (repositoryPath: string, backupPath: string) => Promise<void>;
}

function nowIso(): string {
  return new Date().toISOString();
}

function isReleaseRef(value: ReleaseRef | string): value is ReleaseRef {
  return typeof value !== "string";
}

function describeTarget(target: ReleaseRef | string | undefined): string {
  if (target === undefined) {
    return "latest";
  }
  return isReleaseRef(target) ? target.version : target.trim();
}

/**
 * Owns the single update slot for one working tree. Every entry point (CLI,
 * timer, webhook, dashboard API) goes through here, so at most one session
 * touches the tree at a time across this process and, through the lock file,
 * across processes.
 */
export class UpdateCoordinator {
  readonly git: GitContext;
  readonly stateStore: UpdaterStateStore;
  readonly progressLog: ProgressLog;
  private readonly lock: UpdateLock;
  private busy = false;
  private activeSession: UpdateSession | null = null;
  private readonly pendingChecks = new Set<Promise<UpdateCheckResult>>();

  constructor(
    private readonly config: UpdaterRuntimeConfig,
    private readonly deps: UpdateCoordinatorDeps = {}
  ) {
    this.git = createGitContext(config.repositoryPath, {
      gitBinary: config.gitBinary,
      runner: deps.runner
    });
    this.stateStore = deps.stateStore ?? new UpdaterStateStore(config.statePath);
    this.progressLog = deps.progressLog ?? new ProgressLog({ filePath: config.progressLogPath });
    this.lock = deps.lock ?? new UpdateLock(config.repositoryPath, { ttlMs: config.lockTtlMs });
  }

  isBusy(): boolean {
    return this.busy;
  }

  getActiveSession(): UpdateSessionSnapshot | null {
    return this.activeSession?.snapshot() ?? null;
  }

  async resolveCurrentVersion(): Promise<string | null> {
    return resolveVersion(this.git, {
      releasePrefixes: this.config.releasePrefixes,
      queryTimeoutMs: this.config.timeouts.versionQueryMs
    });
  }

  /** Refused with BUSY while an update, here or in another process, owns the tree. */
  async check(): Promise<UpdateCheckResult> {
    if (this.busy) {
      throw this.busyError();
    }

    const pending = this.checkUnlessLockedElsewhere();
    this.pendingChecks.add(pending);
    try {
      return await pending;
    } finally {
      this.pendingChecks.delete(pending);
    }
  }

  private async checkUnlessLockedElsewhere(): Promise<UpdateCheckResult> {
    const foreignHolder = await this.lock.describeForeignHolder();
    if (foreignHolder) {
      throw new UpdateError("BUSY", foreignHolder);
    }
    return this.runCheck();
  }

  private async runCheck(): Promise<UpdateCheckResult> {
    const lastCheckedAt = nowIso();

    try {
      const currentVersion = await this.resolveCurrentVersion();
      if (!currentVersion) {
        throw new UpdateError(
          "VERSION_UNDETECTABLE",
          "Could not determine the installed version from the branch name, VERSION file or git tags."
        );
      }

      const releases = await fetchAndListReleases(this.git, {
        remote: this.config.remote,
        releasePrefixes: this.config.releasePrefixes,
        fetchTimeoutMs: this.config.timeouts.catalogFetchMs,
        listTimeoutMs: this.config.timeouts.catalogListMs
      });
      const latest = findLatestRelease(releases);
      const comparison = latest ? describeComparison(latest.version, currentVersion) : undefined;
      const updateAvailable = comparison?.result === 1;

      this.stateStore.patch({
        currentVersion,
        latestVersion: latest?.version,
        latestRef: latest?.remoteRef,
        lastCheckedAt,
        lastError: undefined
      });

      return { currentVersion, latest, releases, updateAvailable, comparison };
    } catch (error) {
      this.stateStore.patch({
        lastCheckedAt,
        lastError: toErrorMessage(error)
      });
      throw error;
    }
  }

  /** Target for branch-tracking updates: the remote head of `branch`, labelled with the branch name. */
  trackingTarget(branch: string = this.config.targetBranch): ReleaseRef {
    return trackingRef(branch, this.config.remote);
  }

  /** What remote triggers update to, per configuration. Undefined means "newest release". */
  triggerTarget(): ReleaseRef | undefined {
    return this.config.triggerTarget === "branch" ? this.trackingTarget() : undefined;
  }

  async start(request: StartUpdateRequest = {}): Promise<UpdateSessionHandle> {
    await this.acquireSlot();

    let resolved: ReleaseRef | UpdateCheckResult;
    try {
      resolved = await this.resolveTarget(request.target);
    } catch (error) {
      await this.releaseSlot();
      throw error;
    }

    if (!isReleaseRef(resolved)) {
      return { session: null, done: this.settleUpToDate(resolved) };
    }

    const session = this.openSession(resolved, request);
    return { session, done: this.settle(session) };
  }

  async run(request: StartUpdateRequest = {}): Promise<UpdateRunResult> {
    const handle = await this.start(request);
    return handle.done;
  }

  /**
   * Discards local modifications. Used by remote triggers, which have nobody to
   * ask and must answer before any git call, so the target is resolved in the
   * background.
   */
  async startForced(request: Omit<StartUpdateRequest, "mode"> = {}): Promise<DetachedUpdateHandle> {
    await this.acquireSlot();

    const sessionId = nanoid(12);
    return {
      sessionId,
      target: describeTarget(request.target),
      done: this.resolveAndSettle(
        { ...request, mode: "force", backup: request.backup ?? this.config.backupBeforeUpdate },
        sessionId
      )
    };
  }

  async runForced(request: Omit<StartUpdateRequest, "mode"> = {}): Promise<UpdateRunResult> {
    const handle = await this.startForced(request);
    return handle.done;
  }

  cancel(): boolean {
    return this.activeSession?.cancel() ?? false;
  }

  /** Explicit rollback: copies a backup over the working tree. Never runs on its own. */
  async restoreBackup(backupPath: string): Promise<void> {
    await this.acquireSlot();

    try {
      const restore = this.deps.restoreBackupWith ?? copyBackupOverTree;
      await restore(this.config.repositoryPath, backupPath);
      this.progressLog.add("success", `Restored backup ${backupPath}.`, { backupPath });
      console.info(`[updater] Restored backup ${backupPath} into ${this.config.repositoryPath}.`);
    } catch (error) {
      this.progressLog.add("error", `Restoring ${backupPath} failed: ${toErrorMessage(error)}`, { backupPath });
      throw error;
    } finally {
      await this.releaseSlot();
    }
  }

  async restartNow(result: UpdateRunResult, gate: InFlightGate): Promise<RestartOutcome> {
    if (!result.restart.recommended || !result.session) {
      return { restarted: false, reason: "No successful update to restart into." };
    }
    if (gate.hasInFlightWork()) {
      return { restarted: false, reason: "Work is still in flight; restart deferred." };
    }

    const launcher = this.deps.restartLauncher;
    if (!launcher) {
      return { restarted: false, reason: "No restart launcher is configured." };
    }

    const strategy = result.restart.strategy;
    if (strategy === "relauncher") {
      await launcher.handOffToRelauncher(result.session.target.version, this.config.repositoryPath);
    } else {
      await launcher.restartInPlace();
    }
    return { restarted: true, strategy };
  }

  getStatus(): UpdateStatus {
    const state = this.stateStore.read();
    const updateAvailable =
      typeof state.latestVersion === "string" && typeof state.currentVersion === "string"
        ? describeComparison(state.latestVersion, state.currentVersion).result === 1
        : false;

    return {
      repositoryPath: this.config.repositoryPath,
      currentVersion: state.currentVersion,
      latestVersion: state.latestVersion,
      latestRef: state.latestRef,
      updateAvailable,
      busy: this.busy,
      activeSession: this.getActiveSession() ?? undefined,
      lastCheckedAt: state.lastCheckedAt,
      lastAppliedAt: state.lastAppliedAt,
      lastOutcome: state.lastOutcome,
      lastError: state.lastError,
      lastBackupPath: state.lastBackupPath
    };
  }

  private busyError(): UpdateError {
    const active = this.activeSession;
    return new UpdateError(
      "BUSY",
      active
        ? `Update session ${active.id} is ${active.getState()}; wait for it to finish or cancel it.`
        : "Another update operation is in progress."
    );
  }

  private claimSlot(): void {
    if (this.busy) {
      throw this.busyError();
    }
    this.busy = true;
  }

  /** Claims the in-process slot, lets a running standalone check finish, then takes the lock file. */
  private async acquireSlot(): Promise<void> {
    this.claimSlot();

    try {
      if (this.pendingChecks.size > 0) {
        await Promise.allSettled([...this.pendingChecks]);
      }
      const acquisition = await this.lock.acquire();
      if (!acquisition.acquired) {
        throw new UpdateError("BUSY", acquisition.reason);
      }
    } catch (error) {
      this.busy = false;
      throw error;
    }
  }

  private async releaseSlot(): Promise<void> {
    this.activeSession = null;
    try {
      await this.lock.release();
    } catch (error) {
      console.error("[updater] Could not release the update lock:", error);
    } finally {
      this.busy = false;
    }
  }

  private async resolveTarget(target: ReleaseRef | string | undefined): Promise<ReleaseRef | UpdateCheckResult> {
    if (target === undefined) {
      const check = await this.runCheck();
      return check.updateAvailable && check.latest ? check.latest : check;
    }

    if (isReleaseRef(target)) {
      return target;
    }

    if (target.trim().length === 0) {
      throw new UpdateError("INVALID_REQUEST", "Target version must not be empty.");
    }
    const prefix = this.config.releasePrefixes[0] ?? "release/";
    return releaseRefForVersion(target, this.config.remote, prefix);
  }

  private upToDateResult(check: UpdateCheckResult): UpdateRunResult {
    const latest = check.latest ? check.latest.version : "none";
    return {
      upToDate: true,
      summary: `Already up to date (installed ${check.currentVersion}, newest release ${latest}).`,
      restart: { recommended: false, strategy: this.config.restartStrategy }
    };
  }

  private openSession(target: ReleaseRef, request: StartUpdateRequest, id?: string): UpdateSession {
    const mode = request.mode ?? "safe";
    const session = new UpdateSession({
      id,
      git: this.git,
      target,
      remote: this.config.remote,
      mode,
      backup: request.backup ?? this.config.backupBeforeUpdate,
      syncDependencies: this.config.syncDependencies,
      dependencyManifest: this.config.dependencyManifest,
      systemInterpreter: this.config.pythonBinary,
      timeouts: {
        statusMs: this.config.timeouts.versionQueryMs,
        fetchMs: this.config.timeouts.fetchMs,
        checkoutMs: this.config.timeouts.checkoutMs,
        dependencySyncMs: this.config.timeouts.dependencySyncMs
      },
      preservedPaths: treeOwnedPaths(this.config),
      sink: (event) => this.forwardProgress(event, request.sink),
      makeBackup: this.deps.makeBackup,
      syncDependenciesWith: this.deps.syncDependenciesWith
    });

    this.activeSession = session;
    console.info(`[updater] Session ${session.id} started for ${target.version} (${mode}).`);
    return session;
  }

  private async resolveAndSettle(request: StartUpdateRequest, sessionId: string): Promise<UpdateRunResult> {
    let resolved: ReleaseRef | UpdateCheckResult;
    try {
      resolved = await this.resolveTarget(request.target);
    } catch (error) {
      const message = `Could not resolve the update target: ${toErrorMessage(error)}`;
      console.error(`[updater] ${message}`);
      this.progressLog.add("error", message, { sessionId });
      await this.releaseSlot();
      await this.progressLog.flush();
      throw error;
    }

    if (!isReleaseRef(resolved)) {
      return this.settleUpToDate(resolved);
    }
    return this.settle(this.openSession(resolved, request, sessionId));
  }

  private async settleUpToDate(check: UpdateCheckResult): Promise<UpdateRunResult> {
    const result = this.upToDateResult(check);
    console.info(`[updater] ${result.summary}`);
    this.progressLog.add("info", result.summary);
    await this.releaseSlot();
    await this.progressLog.flush();
    return result;
  }

  private forwardProgress(event: UpdateProgressEvent, sink: UpdateProgressSink | undefined): void {
    this.progressLog.record(event);
    if (event.type === "log") {
      const line = `[update-session] ${event.sessionId} ${event.message}`;
      if (event.level === "error") {
        console.error(line);
      } else if (event.level === "warning") {
        console.warn(line);
      } else {
        console.info(line);
      }
    }
    sink?.(event);
  }

  private async settle(session: UpdateSession): Promise<UpdateRunResult> {
    try {
      const snapshot = await session.run();
      const succeeded = snapshot.outcome?.status === "succeeded";
      const summary = summarizeSession(snapshot);

      this.stateStore.patch({
        lastOutcome: summary,
        lastError: snapshot.outcome?.status === "failed" ? snapshot.outcome.reason : undefined,
        ...(succeeded
          ? {
              currentVersion: snapshot.target.version,
              lastAppliedAt: snapshot.finishedAt ?? nowIso()
            }
          : {}),
        ...(snapshot.backupPath ? { lastBackupPath: snapshot.backupPath } : {})
      });
      console.info(`[updater] ${summary}`);

      return {
        upToDate: false,
        session: snapshot,
        summary,
        restart: { recommended: succeeded, strategy: this.config.restartStrategy }
      };
    } finally {
      await this.releaseSlot();
      await this.progressLog.flush();
    }
  }
}
