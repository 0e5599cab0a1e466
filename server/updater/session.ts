import { nanoid } from "nanoid";

import { createBackup } from "./backup.js";
import { commandSucceeded, describeCommandFailure, type CommandResult } from "./commandRunner.js";
import { syncDependencies, type DependencySyncResult } from "./dependencies.js";
import { UpdateError, isFatalUpdateErrorCode, isUpdateError, toErrorMessage } from "./errors.js";
import { REMOTE_AUTH_HINT, runGit, type GitContext } from "./git.js";
import { LOCK_FILE_NAME } from "./lock.js";
import type {
  ProgressLevel,
  ReleaseRef,
  UpdateErrorCode,
  UpdateMode,
  UpdateOutcome,
  UpdateProgressSink,
  UpdateSessionSnapshot,
  UpdateSessionState,
  UpdateWarning
} from "./types.js";
import { isWorkingTreeDirty } from "./versionResolver.js";

export interface SessionTimeouts {
  statusMs: number;
  fetchMs: number;
  checkoutMs: number;
  dependencySyncMs: number;
}

export interface UpdateSessionOptions {
  /** Assigned up front when the caller announces the session before it exists. */
  id?: string;
  git: GitContext;
  target: ReleaseRef;
  remote: string;
  mode: UpdateMode;
  backup: boolean;
  syncDependencies: boolean;
  dependencyManifest: string;
  systemInterpreter: string;
  timeouts: SessionTimeouts;
  /** Tree-relative updater files kept out of the dirty check and `git clean`. The lock file is always kept. */
  preservedPaths?: string[];
  sink?: UpdateProgressSink;
  makeBackup?: (repositoryPath: string) => Promise<string>;
  syncDependenciesWith?: typeof syncDependencies;
}

const stageOrder: UpdateSessionState[] = [
  "created",
  "checking-working-tree",
  "backing-up",
  "fetching",
  "checking-out",
  "syncing-dependencies",
  "completed"
];

const terminalStates = new Set<UpdateSessionState>(["completed", "failed", "cancelled"]);
const missingRefPattern = /did not match any|not a valid|unknown revision|invalid reference|not a commit/i;

function nowIso(): string {
  return new Date().toISOString();
}

function stageRank(state: UpdateSessionState): number {
  return stageOrder.indexOf(state);
}

/**
 * One update attempt. States only move forward; fatal errors end the session
 * where it stands and cancellation is honoured between stages, never inside
 * one.
 */
export class UpdateSession {
  readonly id: string;
  private state: UpdateSessionState = "created";
  private readonly log: string[] = [];
  private readonly warnings: UpdateWarning[] = [];
  private cancelRequested = false;
  private backupPath: string | undefined;
  private outcome: UpdateOutcome | undefined;
  private readonly startedAt = nowIso();
  private finishedAt: string | undefined;
  private running: Promise<UpdateSessionSnapshot> | null = null;

  constructor(private readonly options: UpdateSessionOptions) {
    this.id = options.id ?? nanoid(12);
  }

  get target(): ReleaseRef {
    return this.options.target;
  }

  getState(): UpdateSessionState {
    return this.state;
  }

  isFinished(): boolean {
    return terminalStates.has(this.state);
  }

  /** Takes effect at the next stage boundary. */
  cancel(): boolean {
    if (this.isFinished()) {
      return false;
    }
    if (!this.cancelRequested) {
      this.cancelRequested = true;
      this.record("warning", `Cancellation requested during ${this.state}; it takes effect when this stage ends.`);
    }
    return true;
  }

  snapshot(): UpdateSessionSnapshot {
    return {
      id: this.id,
      target: { ...this.options.target },
      mode: this.options.mode,
      state: this.state,
      log: [...this.log],
      warnings: this.warnings.map((warning) => ({ ...warning })),
      backupPath: this.backupPath,
      cancelRequested: this.cancelRequested,
      outcome: this.outcome ? { ...this.outcome } : undefined,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt
    };
  }

  run(): Promise<UpdateSessionSnapshot> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  private async execute(): Promise<UpdateSessionSnapshot> {
    const { target, mode } = this.options;
    this.record("info", `Starting ${mode} update to ${target.version} (${target.remoteRef}).`);

    const stages: Array<[UpdateSessionState, () => Promise<void>]> = [
      ["checking-working-tree", () => this.checkWorkingTree()]
    ];
    if (this.options.backup) {
      stages.push(["backing-up", () => this.backUp()]);
    }
    stages.push(
      ["fetching", () => this.fetch()],
      ["checking-out", () => this.checkOut()],
      ["syncing-dependencies", () => this.syncDependencies()]
    );

    for (const [stage, handler] of stages) {
      if (this.honourCancellation(stage)) {
        return this.snapshot();
      }

      this.transition(stage);
      try {
        await handler();
      } catch (error) {
        if (isUpdateError(error) && !isFatalUpdateErrorCode(error.code)) {
          this.warn(error.code, error.message);
          continue;
        }
        this.fail(stage, error);
        return this.snapshot();
      }
    }

    if (this.honourCancellation("completed")) {
      return this.snapshot();
    }

    this.complete();
    return this.snapshot();
  }

  private honourCancellation(nextStage: UpdateSessionState): boolean {
    if (!this.cancelRequested) {
      return false;
    }

    const stoppedAt = this.state;
    this.record("warning", `Update cancelled after ${stoppedAt}; ${nextStage} was not started.`);
    if (stageRank(stoppedAt) >= stageRank("checking-out")) {
      this.record(
        "warning",
        `The working tree already matches ${this.options.target.remoteRef}; the new code is in place and the installed version has changed.`
      );
    }
    this.outcome = { status: "cancelled", stage: nextStage };
    this.transition("cancelled");
    return true;
  }

  private transition(next: UpdateSessionState): void {
    if (this.isFinished()) {
      throw new Error(`Session ${this.id} is already ${this.state}.`);
    }
    if (!terminalStates.has(next) && stageRank(next) <= stageRank(this.state)) {
      throw new Error(`Session ${this.id} cannot move from ${this.state} back to ${next}.`);
    }

    this.state = next;
    if (terminalStates.has(next)) {
      this.finishedAt = nowIso();
    }
    this.options.sink?.({ type: "state", sessionId: this.id, state: next, at: nowIso() });
  }

  private record(level: ProgressLevel, message: string): void {
    const prefix = level === "warning" ? "WARNING: " : level === "error" ? "ERROR: " : "";
    this.log.push(`${prefix}${message}`);
    this.options.sink?.({ type: "log", sessionId: this.id, level, message, at: nowIso() });
  }

  private warn(code: UpdateErrorCode, message: string): void {
    this.warnings.push({ code, message });
    this.record("warning", message);
  }

  private fail(stage: UpdateSessionState, error: unknown): void {
    const code: UpdateErrorCode = isUpdateError(error)
      ? error.code
      : stage === "fetching"
        ? "NETWORK_FAILURE"
        : "CHECKOUT_CONFLICT";
    const reason = toErrorMessage(error);
    this.record("error", `${stage} failed [${code}]: ${reason}`);
    this.outcome = { status: "failed", code, reason, stage };
    this.transition("failed");
  }

  private complete(): void {
    this.transition("completed");
    this.outcome = { status: "succeeded" };
    this.record("success", `Update to ${this.options.target.version} completed.`);
    if (this.backupPath) {
      this.record("info", `Backup created at: ${this.backupPath}`);
    }
    for (const warning of this.warnings) {
      this.record("warning", `Post-update warning [${warning.code}]: ${warning.message}`);
    }
  }

  private async git(args: string[], timeoutMs: number): Promise<CommandResult> {
    return runGit(this.options.git, args, timeoutMs);
  }

  private ensureSucceeded(
    label: string,
    result: CommandResult,
    timeoutMs: number,
    failureCode: UpdateErrorCode,
    hint = ""
  ): void {
    if (commandSucceeded(result)) {
      return;
    }
    const reason = describeCommandFailure(label, result, timeoutMs);
    if (result.timedOut) {
      throw new UpdateError("TIMEOUT", reason);
    }
    throw new UpdateError(failureCode, hint.length > 0 ? `${reason} ${hint}` : reason);
  }

  private preservedPaths(): string[] {
    return [...new Set([LOCK_FILE_NAME, ...(this.options.preservedPaths ?? [])])];
  }

  private async checkWorkingTree(): Promise<void> {
    const { timeouts } = this.options;
    const preserved = this.preservedPaths();

    if (this.options.mode === "safe") {
      const dirty = await isWorkingTreeDirty(this.options.git, timeouts.statusMs, preserved);
      if (dirty) {
        throw new UpdateError(
          "DIRTY_WORKING_TREE",
          "The working tree has uncommitted changes. Commit or stash them, or use the force update."
        );
      }
      this.record("info", "Working tree is clean.");
      return;
    }

    const reset = await this.git(["reset", "--hard", "HEAD"], timeouts.checkoutMs);
    this.ensureSucceeded("git reset --hard HEAD", reset, timeouts.checkoutMs, "CHECKOUT_CONFLICT");
    const clean = await this.git(
      ["clean", "-fd", ...preserved.flatMap((entry) => ["-e", entry])],
      timeouts.checkoutMs
    );
    this.ensureSucceeded("git clean -fd", clean, timeouts.checkoutMs, "CHECKOUT_CONFLICT");
    this.record("warning", "Force mode: discarded local modifications and removed untracked files.");
  }

  private async backUp(): Promise<void> {
    const makeBackup = this.options.makeBackup ?? createBackup;
    try {
      this.backupPath = await makeBackup(this.options.git.repositoryPath);
    } catch (error) {
      throw new UpdateError("BACKUP_FAILED", `Backup failed, continuing without a safety copy: ${toErrorMessage(error)}`);
    }
    this.record("info", `Backup created at ${this.backupPath}.`);
  }

  private async fetch(): Promise<void> {
    const { target, remote, timeouts } = this.options;
    this.record("info", `Fetching ${target.branch} from ${remote}...`);
    const result = await this.git(
      ["fetch", "--depth", "1", remote, `+refs/heads/${target.branch}:refs/remotes/${remote}/${target.branch}`],
      timeouts.fetchMs
    );
    this.ensureSucceeded(`git fetch ${remote} ${target.branch}`, result, timeouts.fetchMs, "NETWORK_FAILURE", REMOTE_AUTH_HINT);
    this.record("info", `Fetched ${target.remoteRef}.`);
  }

  private async checkOut(): Promise<void> {
    const { target, timeouts } = this.options;

    const existing = await this.git(["checkout", target.branch], timeouts.checkoutMs);
    if (existing.timedOut) {
      this.ensureSucceeded(`git checkout ${target.branch}`, existing, timeouts.checkoutMs, "CHECKOUT_CONFLICT");
    }

    if (!commandSucceeded(existing)) {
      this.record("info", `No local ${target.branch}; creating it from ${target.remoteRef}.`);
      const created = await this.git(["checkout", "-b", target.branch, target.remoteRef], timeouts.checkoutMs);
      const code: UpdateErrorCode = missingRefPattern.test(created.stderr) ? "BRANCH_NOT_FOUND" : "CHECKOUT_CONFLICT";
      this.ensureSucceeded(`git checkout -b ${target.branch}`, created, timeouts.checkoutMs, code);
    }

    const reset = await this.git(["reset", "--hard", target.remoteRef], timeouts.checkoutMs);
    this.ensureSucceeded(`git reset --hard ${target.remoteRef}`, reset, timeouts.checkoutMs, "CHECKOUT_CONFLICT");
    this.record("info", `Working tree now matches ${target.remoteRef}.`);
  }

  private async syncDependencies(): Promise<void> {
    if (!this.options.syncDependencies) {
      this.record("info", "Dependency sync disabled; skipping.");
      return;
    }

    const sync = this.options.syncDependenciesWith ?? syncDependencies;
    let result: DependencySyncResult;
    try {
      result = await sync({
        repositoryPath: this.options.git.repositoryPath,
        manifest: this.options.dependencyManifest,
        systemInterpreter: this.options.systemInterpreter,
        timeoutMs: this.options.timeouts.dependencySyncMs,
        runner: this.options.git.runner
      });
    } catch (error) {
      throw new UpdateError("DEPENDENCY_SYNC_FAILURE", `Dependency sync crashed: ${toErrorMessage(error)}`);
    }

    if (result.status === "skipped") {
      this.record("info", result.reason);
    } else if (result.status === "synced") {
      this.record("info", `Dependencies synced with ${result.interpreter}.`);
    } else {
      throw new UpdateError(
        "DEPENDENCY_SYNC_FAILURE",
        `Dependency sync reported problems; the code update stands but dependencies may be stale. ${result.reason}`
      );
    }
  }
}

export function summarizeSession(session: UpdateSessionSnapshot): string {
  const version = session.target.version;
  const outcome = session.outcome;
  if (!outcome) {
    return `Update to ${version} is ${session.state}.`;
  }

  if (outcome.status === "succeeded") {
    const backup = session.backupPath ? ` Backup: ${session.backupPath}.` : "";
    return session.warnings.length > 0
      ? `Update to ${version} completed with ${session.warnings.length} warning(s).${backup}`
      : `Update to ${version} completed.${backup}`;
  }

  if (outcome.status === "cancelled") {
    return `Update to ${version} cancelled before ${outcome.stage}.`;
  }

  return `Update to ${version} failed [${outcome.code}]: ${outcome.reason}`;
}
