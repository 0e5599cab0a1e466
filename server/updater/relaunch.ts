import { spawn } from "node:child_process";

import { findIsolatedInterpreter } from "./dependencies.js";

export const RELAUNCH_WAIT_PID_ENV = "RELAUNCH_WAIT_PID";

export interface DetachedLaunch {
  command: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdio: "ignore" | "inherit";
}

export type DetachedSpawner = (launch: DetachedLaunch) => void;

export interface RestartLauncher {
  restartInPlace(): Promise<void>;
  handOffToRelauncher(version: string, repositoryPath: string): Promise<void>;
}

export interface ApplicationCommand {
  command: string[];
  repositoryPath: string;
}

export interface ProcessRestartLauncherOptions {
  /** Entry script that understands `relaunch <version> <path>`. */
  relauncherScript: string;
  /** Started by an in-place restart. Without it the current process re-executes itself. */
  application?: ApplicationCommand;
  /** A listener keeps serving after it starts the application. */
  keepRunning?: boolean;
  spawnDetached?: DetachedSpawner;
  exit?: (code: number) => void;
}

const pythonLauncherNames = new Set(["python", "python3"]);

export function launchDetached(launch: DetachedLaunch): void {
  const child = spawn(launch.command, launch.args, {
    cwd: launch.cwd,
    env: launch.env,
    detached: true,
    stdio: launch.stdio
  });
  child.unref();
}

/** A bare `python`/`python3` head runs under the isolated environment when there is one. */
export function resolveApplicationCommand(
  relaunchCommand: string[],
  isolatedInterpreter: string | null
): { command: string; args: string[] } | null {
  const [head, ...args] = relaunchCommand;
  if (!head) {
    return null;
  }
  const command = isolatedInterpreter && pythonLauncherNames.has(head) ? isolatedInterpreter : head;
  return { command, args };
}

export function applicationEnv(): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env };
  delete env[RELAUNCH_WAIT_PID_ENV];
  return env;
}

export async function applicationLaunch(application: ApplicationCommand): Promise<DetachedLaunch> {
  const resolved = resolveApplicationCommand(
    application.command,
    await findIsolatedInterpreter(application.repositoryPath)
  );
  if (!resolved) {
    throw new Error("No relaunch command is configured.");
  }

  return {
    command: resolved.command,
    args: resolved.args,
    cwd: application.repositoryPath,
    env: applicationEnv(),
    stdio: "inherit"
  };
}

export function selfRestartLaunch(): DetachedLaunch {
  return {
    command: process.execPath,
    args: [...process.execArgv, ...process.argv.slice(1)],
    cwd: process.cwd(),
    env: process.env,
    stdio: "inherit"
  };
}

export function relauncherLaunch(relauncherScript: string, version: string, repositoryPath: string): DetachedLaunch {
  return {
    command: process.execPath,
    args: [...process.execArgv, relauncherScript, "relaunch", version, repositoryPath],
    cwd: repositoryPath,
    env: {
      ...process.env,
      [RELAUNCH_WAIT_PID_ENV]: String(process.pid)
    },
    stdio: "ignore"
  };
}

/** Both paths spawn the successor before any exit. */
export function createProcessRestartLauncher(options: ProcessRestartLauncherOptions): RestartLauncher {
  const spawnDetached = options.spawnDetached ?? launchDetached;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  return {
    async restartInPlace() {
      const launch = options.application ? await applicationLaunch(options.application) : selfRestartLaunch();
      console.info(`[updater] Restarting in place: ${[launch.command, ...launch.args].join(" ")} in ${launch.cwd}.`);
      spawnDetached(launch);
      if (!options.keepRunning) {
        exit(0);
      }
    },
    async handOffToRelauncher(version, repositoryPath) {
      console.info(`[updater] Handing off to relauncher for ${version}.`);
      spawnDetached(relauncherLaunch(options.relauncherScript, version, repositoryPath));
      exit(0);
    }
  };
}
