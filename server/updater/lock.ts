import fs from "node:fs/promises";
import path from "node:path";

export const LOCK_FILE_NAME = ".update.lock";

export interface LockInfo {
  pid: number;
  timestamp: number;
}

export type LockAcquisition = { acquired: true; lock: UpdateLock } | { acquired: false; reason: string; holder?: LockInfo };

export interface UpdateLockOptions {
  ttlMs: number;
  pid?: number;
  isProcessAlive?: (pid: number) => boolean | "unknown";
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

export function isProcessAlive(pid: number): boolean | "unknown" {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    if (hasErrorCode(error, "ESRCH")) {
      return false;
    }
    // EPERM: the process exists but belongs to someone else.
    return hasErrorCode(error, "EPERM") ? true : "unknown";
  }
}

function parseLockInfo(raw: string): LockInfo | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "pid" in parsed &&
      "timestamp" in parsed &&
      typeof parsed.pid === "number" &&
      typeof parsed.timestamp === "number"
    ) {
      return { pid: parsed.pid, timestamp: parsed.timestamp };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Advisory lock file in the working tree root. It guards against two update
 * paths (timer, webhook, CLI) in different processes racing on one tree.
 */
export class UpdateLock {
  readonly filePath: string;
  private held = false;

  constructor(
    repositoryPath: string,
    private readonly options: UpdateLockOptions
  ) {
    this.filePath = path.join(repositoryPath, LOCK_FILE_NAME);
  }

  private get pid(): number {
    return this.options.pid ?? process.pid;
  }

  async readHolder(): Promise<LockInfo | null> {
    try {
      return parseLockInfo(await fs.readFile(this.filePath, "utf8"));
    } catch {
      return null;
    }
  }

  /** Why a live process other than this one holds the lock, or null. Removes nothing. */
  async describeForeignHolder(now: number = Date.now()): Promise<string | null> {
    if (this.held) {
      return null;
    }
    const holder = await this.readHolder();
    if (!holder || holder.pid === this.pid || now - holder.timestamp >= this.options.ttlMs) {
      return null;
    }
    return (this.options.isProcessAlive ?? isProcessAlive)(holder.pid) === true
      ? `An update is already running in process ${holder.pid}.`
      : null;
  }

  private async clearStale(now: number): Promise<string | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }

    const holder = parseLockInfo(raw);
    if (!holder) {
      console.warn(`[update-lock] Removing unreadable lock file ${this.filePath}.`);
      await fs.rm(this.filePath, { force: true });
      return null;
    }

    if (now - holder.timestamp >= this.options.ttlMs) {
      console.warn(`[update-lock] Removing expired lock held by pid ${holder.pid}.`);
      await fs.rm(this.filePath, { force: true });
      return null;
    }

    const alive = (this.options.isProcessAlive ?? isProcessAlive)(holder.pid);
    if (alive === false) {
      console.warn(`[update-lock] Removing lock left by exited pid ${holder.pid}.`);
      await fs.rm(this.filePath, { force: true });
      return null;
    }

    return alive === true
      ? `An update is already running in process ${holder.pid}.`
      : `Lock holder ${holder.pid} could not be checked; refusing to start a concurrent update.`;
  }

  async acquire(now: number = Date.now()): Promise<LockAcquisition> {
    const blocked = await this.clearStale(now);
    if (blocked) {
      return { acquired: false, reason: blocked, holder: (await this.readHolder()) ?? undefined };
    }

    const info: LockInfo = { pid: this.pid, timestamp: now };
    try {
      await fs.writeFile(this.filePath, JSON.stringify(info), { flag: "wx" });
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) {
        return { acquired: false, reason: "Another process acquired the update lock first." };
      }
      throw error;
    }

    this.held = true;
    return { acquired: true, lock: this };
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;

    const holder = await this.readHolder();
    if (holder && holder.pid !== this.pid) {
      console.warn(`[update-lock] Lock now belongs to pid ${holder.pid}; leaving it in place.`);
      return;
    }
    await fs.rm(this.filePath, { force: true });
  }
}
