import fs from "node:fs";
import path from "node:path";

import type { UpdaterStateSnapshot } from "./types.js";

const DEFAULT_STATE: UpdaterStateSnapshot = {
  version: 1
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeState(value: unknown): UpdaterStateSnapshot {
  if (!isRecord(value)) {
    return { ...DEFAULT_STATE };
  }

  return {
    version: 1,
    currentVersion: normalizeString(value.currentVersion),
    latestVersion: normalizeString(value.latestVersion),
    latestRef: normalizeString(value.latestRef),
    lastCheckedAt: normalizeString(value.lastCheckedAt),
    lastAppliedAt: normalizeString(value.lastAppliedAt),
    lastOutcome: normalizeString(value.lastOutcome),
    lastError: normalizeString(value.lastError),
    lastBackupPath: normalizeString(value.lastBackupPath)
  };
}

export class UpdaterStateStore {
  private state: UpdaterStateSnapshot;

  constructor(private readonly statePath: string) {
    this.state = this.load();
  }

  private load(): UpdaterStateSnapshot {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.statePath, "utf8"));
      return normalizeState(parsed);
    } catch {
      return { ...DEFAULT_STATE };
    }
  }

  private persist(): void {
    try {
      fs.mkdirSync(path.dirname(this.statePath), { recursive: true });
      fs.writeFileSync(this.statePath, `${JSON.stringify(this.state, null, 2)}\n`, "utf8");
    } catch (error) {
      console.error("[updater-state-persist-error]", error);
    }
  }

  read(): UpdaterStateSnapshot {
    return structuredClone(this.state);
  }

  patch(patch: Partial<UpdaterStateSnapshot>): UpdaterStateSnapshot {
    this.state = normalizeState({
      ...this.state,
      ...patch
    });
    this.persist();
    return this.read();
  }
}
