export type UpdateMode = "safe" | "force";

export type RestartStrategy = "in-place" | "relauncher";

export type TriggerTarget = "latest-release" | "branch";

export type WebhookSignaturePolicy = "required" | "disabled";

export type UpdateSessionState =
  | "created"
  | "checking-working-tree"
  | "backing-up"
  | "fetching"
  | "checking-out"
  | "syncing-dependencies"
  | "completed"
  | "failed"
  | "cancelled";

export type UpdateErrorCode =
  | "VERSION_UNDETECTABLE"
  | "NETWORK_FAILURE"
  | "DIRTY_WORKING_TREE"
  | "BRANCH_NOT_FOUND"
  | "CHECKOUT_CONFLICT"
  | "DEPENDENCY_SYNC_FAILURE"
  | "TIMEOUT"
  | "CANCELLED"
  | "BACKUP_FAILED"
  | "BUSY"
  | "INVALID_REQUEST";

export interface ParsedVersion {
  literal: string;
  parts: number[] | null;
}

export type ComparisonPath = "numeric" | "lexical";

export interface VersionComparison {
  result: -1 | 0 | 1;
  path: ComparisonPath;
}

export interface ReleaseRef {
  version: string;
  remoteRef: string;
  branch: string;
}

export interface RepositoryHandle {
  path: string;
  currentVersion: string | null;
  dirty: boolean;
  currentRef: string | null;
}

export type ProgressLevel = "info" | "warning" | "error" | "success";

export type UpdateProgressEvent =
  | {
      type: "state";
      sessionId: string;
      state: UpdateSessionState;
      at: string;
    }
  | {
      type: "log";
      sessionId: string;
      level: ProgressLevel;
      message: string;
      at: string;
    };

export type UpdateProgressSink = (event: UpdateProgressEvent) => void;

export interface UpdateWarning {
  code: UpdateErrorCode;
  message: string;
}

export type UpdateOutcome =
  | { status: "succeeded" }
  | { status: "failed"; code: UpdateErrorCode; reason: string; stage: UpdateSessionState }
  | { status: "cancelled"; stage: UpdateSessionState };

export interface UpdateSessionSnapshot {
  id: string;
  target: ReleaseRef;
  mode: UpdateMode;
  state: UpdateSessionState;
  log: string[];
  warnings: UpdateWarning[];
  backupPath?: string;
  cancelRequested: boolean;
  outcome?: UpdateOutcome;
  startedAt: string;
  finishedAt?: string;
}

export interface UpdateCheckResult {
  currentVersion: string;
  latest: ReleaseRef | null;
  releases: ReleaseRef[];
  updateAvailable: boolean;
  comparison?: VersionComparison;
}

export interface RestartRecommendation {
  recommended: boolean;
  strategy: RestartStrategy;
}

export interface UpdateRunResult {
  upToDate: boolean;
  session?: UpdateSessionSnapshot;
  summary: string;
  restart: RestartRecommendation;
}

export interface ProgressEntry {
  timestamp: string;
  level: ProgressLevel;
  message: string;
  data: Record<string, unknown>;
}

export interface UpdaterStateSnapshot {
  version: 1;
  currentVersion?: string;
  latestVersion?: string;
  latestRef?: string;
  lastCheckedAt?: string;
  lastAppliedAt?: string;
  lastOutcome?: string;
  lastError?: string;
  lastBackupPath?: string;
}

export interface UpdateStatus {
  repositoryPath: string;
  currentVersion?: string;
  latestVersion?: string;
  latestRef?: string;
  updateAvailable: boolean;
  busy: boolean;
  activeSession?: UpdateSessionSnapshot;
  lastCheckedAt?: string;
  lastAppliedAt?: string;
  lastOutcome?: string;
  lastError?: string;
  lastBackupPath?: string;
}

export interface ApplyUpdateRequest {
  version?: string;
  force?: boolean;
  backup?: boolean;
}
