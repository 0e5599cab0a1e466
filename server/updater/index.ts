export { createBackup, formatBackupTimestamp, isBackupOf, restoreBackup } from "./backup.js";
export { execCommand, type CommandOptions, type CommandResult, type CommandRunner } from "./commandRunner.js";
export {
  collectInsecureConfigWarnings,
  resolveUpdaterRuntimeConfig,
  treeOwnedPaths,
  type StageTimeouts,
  type UpdaterRuntimeConfig
} from "./config.js";
export {
  UpdateCoordinator,
  type DetachedUpdateHandle,
  type InFlightGate,
  type RestartOutcome,
  type StartUpdateRequest,
  type UpdateCoordinatorDeps,
  type UpdateSessionHandle
} from "./coordinator.js";
export { syncDependencies, type DependencySyncResult } from "./dependencies.js";
export { UpdateError, isFatalUpdateErrorCode, isUpdateError } from "./errors.js";
export { createGitContext, type GitContext } from "./git.js";
export { UpdateLock, type LockInfo } from "./lock.js";
export { ProgressLog, type ProgressQuery } from "./progressLog.js";
export { createProcessRestartLauncher, type ApplicationCommand, type RestartLauncher } from "./relaunch.js";
export { runRelauncher, type RelauncherOptions, type RelauncherResult } from "./relauncher.js";
export { fetchAndListReleases, findLatestRelease, parseRemoteBranches } from "./releases.js";
export { startUpdateCheckScheduler } from "./scheduler.js";
export { UpdateSession, summarizeSession } from "./session.js";
export { UpdaterStateStore } from "./state.js";
export type * from "./types.js";
export { compareVersions, describeComparison, parseVersion } from "./versionComparator.js";
export { inspectRepository, resolveVersion } from "./versionResolver.js";
