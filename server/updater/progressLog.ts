import fs from "node:fs/promises";
import path from "node:path";

import type { ProgressEntry, ProgressLevel, UpdateProgressEvent } from "./types.js";

export const DEFAULT_PROGRESS_CAPACITY = 100;

export interface ProgressQuery {
  limit?: number;
  level?: ProgressLevel;
  since?: Date;
}

export interface ProgressLogOptions {
  capacity?: number;
  filePath?: string;
  now?: () => Date;
}

export class ProgressLog {
  private entries: ProgressEntry[] = [];
  private readonly capacity: number;
  private readonly filePath: string | undefined;
  private readonly now: () => Date;
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(options: ProgressLogOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_PROGRESS_CAPACITY);
    this.filePath = options.filePath;
    this.now = options.now ?? (() => new Date());
  }

  add(level: ProgressLevel, message: string, data: Record<string, unknown> = {}): ProgressEntry {
    const entry: ProgressEntry = {
      timestamp: this.now().toISOString(),
      level,
      message: message.trim(),
      data
    };

    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries = this.entries.slice(-this.capacity);
    }

    this.appendToFile(entry);
    return entry;
  }

  /** Sink adapter for session progress: log lines become entries, state changes become info entries. */
  record(event: UpdateProgressEvent): void {
    if (event.type === "log") {
      this.add(event.level, event.message, { sessionId: event.sessionId });
      return;
    }
    this.add("info", `Session entered ${event.state}.`, { sessionId: event.sessionId, state: event.state });
  }

  query(query: ProgressQuery = {}): ProgressEntry[] {
    const limit = Math.max(0, Math.min(query.limit ?? 50, this.capacity));
    const sinceMs = query.since?.getTime();
    const filtered = this.entries.filter((entry) => {
      if (query.level && entry.level !== query.level) {
        return false;
      }
      if (sinceMs !== undefined && Date.parse(entry.timestamp) < sinceMs) {
        return false;
      }
      return true;
    });
    return limit === 0 ? [] : filtered.slice(-limit);
  }

  get size(): number {
    return this.entries.length;
  }

  get maxEntries(): number {
    return this.capacity;
  }

  get logFilePath(): string | undefined {
    return this.filePath;
  }

  /** Resolves once every entry added so far has reached the log file. */
  flush(): Promise<void> {
    return this.pendingWrite;
  }

  async readFileTail(maxChars: number): Promise<string | null> {
    if (!this.filePath) {
      return null;
    }
    await this.flush();
    try {
      const content = await fs.readFile(this.filePath, "utf8");
      return content.slice(-maxChars);
    } catch {
      return null;
    }
  }

  private appendToFile(entry: ProgressEntry): void {
    const filePath = this.filePath;
    if (!filePath) {
      return;
    }

    const line = `[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.message}\n`;
    this.pendingWrite = this.pendingWrite
      .then(async () => {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.appendFile(filePath, line, "utf8");
      })
      .catch((error) => {
        console.error("[progress-log] Could not append to progress log:", error);
      });
  }
}
