import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";

import { commandSucceeded, describeCommandFailure, execCommand, type CommandRunner } from "./commandRunner.js";
import { ISOLATED_ENV_DIR, findIsolatedInterpreter, installArgs } from "./dependencies.js";
import { isProcessAlive } from "./lock.js";
import type { ProgressLog } from "./progressLog.js";
import { applicationEnv, launchDetached, resolveApplicationCommand, type DetachedSpawner } from "./relaunch.js";
import type { ProgressLevel } from "./types.js";

export interface RelauncherOptions {
  version: string;
  repositoryPath: string;
  pythonBinary: string;
  dependencyManifest: string;
  relaunchCommand: string[];
  installTimeoutMs: number;
  waitPid?: number;
  pollIntervalMs?: number;
  waitTimeoutMs?: number;
  runner?: CommandRunner;
  spawnDetached?: DetachedSpawner;
  isProcessAlive?: (pid: number) => boolean | "unknown";
  sleep?: (ms: number) => Promise<void>;
  progressLog?: ProgressLog;
}

export type RelauncherResult = { status: "started"; command: string; args: string[] } | { status: "failed"; reason: string };

export function parseWaitPid(raw: string | undefined): number | undefined {
  const parsed = Number.parseInt(raw ?? "", 10);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
}

async function fileExists(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

/**
 * Second half of a restart: runs after the updated process has exited,
 * rebuilds the isolated environment and starts the application again.
 * An install failure here is fatal, unlike the in-session dependency sync.
 */
export async function runRelauncher(options: RelauncherOptions): Promise<RelauncherResult> {
  const runner = options.runner ?? execCommand;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const checkAlive = options.isProcessAlive ?? isProcessAlive;
  const pollIntervalMs = options.pollIntervalMs ?? 500;
  const waitTimeoutMs = options.waitTimeoutMs ?? 30_000;
  const cwd = options.repositoryPath;

  const report = (level: ProgressLevel, message: string): void => {
    const line = `[relauncher] ${message}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warning") {
      console.warn(line);
    } else {
      console.info(line);
    }
    options.progressLog?.add(level, message, { version: options.version });
  };

  const fail = async (reason: string): Promise<RelauncherResult> => {
    report("error", reason);
    await options.progressLog?.flush();
    return { status: "failed", reason };
  };

  report("info", `Relaunching ${cwd} at ${options.version}.`);

  if (options.waitPid !== undefined) {
    let waited = 0;
    while (checkAlive(options.waitPid) === true && waited < waitTimeoutMs) {
      await sleep(pollIntervalMs);
      waited += pollIntervalMs;
    }
    if (checkAlive(options.waitPid) === true) {
      report("warning", `Process ${options.waitPid} is still running after ${waitTimeoutMs}ms; continuing anyway.`);
    }
  }

  let interpreter = await findIsolatedInterpreter(cwd);
  if (!interpreter) {
    report("info", `No ${ISOLATED_ENV_DIR}/ found; creating it with ${options.pythonBinary}.`);
    const created = await runner(options.pythonBinary, ["-m", "venv", ISOLATED_ENV_DIR], {
      cwd,
      timeoutMs: options.installTimeoutMs
    });
    if (!commandSucceeded(created)) {
      return fail(describeCommandFailure("Creating the isolated environment", created, options.installTimeoutMs));
    }
    interpreter = await findIsolatedInterpreter(cwd);
    if (!interpreter) {
      return fail(`${ISOLATED_ENV_DIR}/ was created but contains no interpreter.`);
    }
  }

  if (await fileExists(path.join(cwd, options.dependencyManifest))) {
    const upgrade = await runner(interpreter, ["-m", "pip", "install", "--upgrade", "pip"], {
      cwd,
      timeoutMs: options.installTimeoutMs
    });
    if (!commandSucceeded(upgrade)) {
      report("warning", describeCommandFailure("Installer upgrade", upgrade, options.installTimeoutMs));
    }

    const install = await runner(interpreter, installArgs(options.dependencyManifest), {
      cwd,
      timeoutMs: options.installTimeoutMs
    });
    if (!commandSucceeded(install)) {
      return fail(describeCommandFailure("Dependency install", install, options.installTimeoutMs));
    }
    report("info", "Dependencies installed.");
  } else {
    report("info", `No ${options.dependencyManifest} found; skipping dependency install.`);
  }

  const resolved = resolveApplicationCommand(options.relaunchCommand, interpreter);
  if (!resolved) {
    return fail("No relaunch command is configured.");
  }
  const { command, args: rest } = resolved;
  const env = applicationEnv();

  try {
    (options.spawnDetached ?? launchDetached)({ command, args: rest, cwd, env, stdio: "ignore" });
  } catch (error) {
    return fail(`Could not start ${command}: ${String(error)}`);
  }

  report("success", `Started ${[command, ...rest].join(" ")}.`);
  await options.progressLog?.flush();
  return { status: "started", command, args: rest };
}
