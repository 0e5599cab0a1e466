import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ProgressLog } from "../../server/updater/progressLog.js";
import { UpdaterStateStore } from "../../server/updater/state.js";
import { createTempWorkspace, type TempWorkspace } from "../helpers/workspace.js";

function steppingClock(startIso: string, stepMs = 1_000): () => Date {
  let current = Date.parse(startIso);
  return () => {
    const value = new Date(current);
    current += stepMs;
    return value;
  };
}

let workspace: TempWorkspace | null = null;

afterEach(() => {
  workspace?.cleanup();
  workspace = null;
});

describe("progress log", () => {
  it("keeps only the newest entries up to its capacity", () => {
    const log = new ProgressLog({ capacity: 3, now: steppingClock("2024-01-01T00:00:00.000Z") });
    for (const message of ["one", "two", "three", "four"]) {
      log.add("info", message);
    }

    expect(log.size).toBe(3);
    expect(log.maxEntries).toBe(3);
    expect(log.query().map((entry) => entry.message)).toEqual(["two", "three", "four"]);
  });

  it("filters by level and time and returns the newest matches", () => {
    const log = new ProgressLog({ now: steppingClock("2024-01-01T00:00:00.000Z") });
    log.add("info", "started");
    log.add("error", "first failure");
    log.add("info", "retrying");
    log.add("error", "second failure");

    expect(log.query({ level: "error" }).map((entry) => entry.message)).toEqual(["first failure", "second failure"]);
    expect(log.query({ level: "error", limit: 1 }).map((entry) => entry.message)).toEqual(["second failure"]);
    expect(log.query({ since: new Date("2024-01-01T00:00:02.000Z") }).map((entry) => entry.message)).toEqual([
      "retrying",
      "second failure"
    ]);
    expect(log.query({ limit: 0 })).toEqual([]);
  });

  it("turns session events into entries", () => {
    const log = new ProgressLog({ now: () => new Date("2024-01-01T00:00:00.000Z") });

    log.record({ type: "state", sessionId: "s1", state: "fetching", at: "2024-01-01T00:00:00.000Z" });
    log.record({ type: "log", sessionId: "s1", level: "warning", message: " slow remote ", at: "2024-01-01T00:00:00.000Z" });

    expect(log.query()).toEqual([
      {
        timestamp: "2024-01-01T00:00:00.000Z",
        level: "info",
        message: "Session entered fetching.",
        data: { sessionId: "s1", state: "fetching" }
      },
      {
        timestamp: "2024-01-01T00:00:00.000Z",
        level: "warning",
        message: "slow remote",
        data: { sessionId: "s1" }
      }
    ]);
  });

  it("appends each entry to the log file", async () => {
    workspace = createTempWorkspace();
    const filePath = path.join(workspace.root, "data", "update.log");
    const log = new ProgressLog({ filePath, now: () => new Date("2024-01-01T00:00:00.000Z") });

    log.add("info", "Update started.");
    log.add("success", "Update finished.");
    await log.flush();

    expect(fs.readFileSync(filePath, "utf8")).toBe(
      "[2024-01-01T00:00:00.000Z] INFO Update started.\n[2024-01-01T00:00:00.000Z] SUCCESS Update finished.\n"
    );
    await expect(log.readFileTail(17)).resolves.toBe("Update finished.\n");
    expect(log.logFilePath).toBe(filePath);
  });

  it("has no file tail without a log file", async () => {
    await expect(new ProgressLog().readFileTail(100)).resolves.toBeNull();
  });
});

describe("updater state store", () => {
  it("persists patches and reloads them", () => {
    workspace = createTempWorkspace();
    const statePath = path.join(workspace.root, "data", "updater-state.json");
    const store = new UpdaterStateStore(statePath);

    store.patch({ currentVersion: "1.2.0", lastError: "   " });

    expect(new UpdaterStateStore(statePath).read()).toEqual({
      version: 1,
      currentVersion: "1.2.0",
      latestVersion: undefined,
      latestRef: undefined,
      lastCheckedAt: undefined,
      lastAppliedAt: undefined,
      lastOutcome: undefined,
      lastError: undefined,
      lastBackupPath: undefined
    });
  });

  it("starts empty when the state file is unreadable", () => {
    workspace = createTempWorkspace();
    const statePath = path.join(workspace.root, "updater-state.json");
    fs.writeFileSync(statePath, "{ not json", "utf8");

    expect(new UpdaterStateStore(statePath).read()).toEqual({ version: 1 });
  });

  it("hands out copies", () => {
    workspace = createTempWorkspace();
    const store = new UpdaterStateStore(path.join(workspace.root, "state.json"));
    const snapshot = store.patch({ latestVersion: "2.0" });

    snapshot.latestVersion = "tampered";

    expect(store.read().latestVersion).toBe("2.0");
  });
});
