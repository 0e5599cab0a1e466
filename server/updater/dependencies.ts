import fs from "node:fs/promises";
import path from "node:path";

import { commandSucceeded, describeCommandFailure, type CommandResult, type CommandRunner } from "./commandRunner.js";

export const ISOLATED_ENV_DIR = "venv";

const isolatedInterpreterCandidates = [
  ["bin", "python3"],
  ["bin", "python"],
  ["Scripts", "python.exe"]
];

export interface DependencySyncOptions {
  repositoryPath: string;
  manifest: string;
  systemInterpreter: string;
  timeoutMs: number;
  runner: CommandRunner;
}

export type DependencySyncResult =
  | { status: "skipped"; reason: string }
  | { status: "synced"; interpreter: string }
  | { status: "failed"; interpreter: string; reason: string };

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

export async function findIsolatedInterpreter(repositoryPath: string): Promise<string | null> {
  for (const segments of isolatedInterpreterCandidates) {
    const candidate = path.join(repositoryPath, ISOLATED_ENV_DIR, ...segments);
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/** Isolated environment first, then the system interpreter. */
export async function resolveInstaller(repositoryPath: string, systemInterpreter: string): Promise<string> {
  return (await findIsolatedInterpreter(repositoryPath)) ?? systemInterpreter;
}

export function installArgs(manifest: string): string[] {
  return ["-m", "pip", "install", "-r", manifest, "--upgrade"];
}

export async function runInstaller(
  interpreter: string,
  args: string[],
  options: Pick<DependencySyncOptions, "repositoryPath" | "timeoutMs" | "runner">
): Promise<CommandResult> {
  return options.runner(interpreter, args, {
    cwd: options.repositoryPath,
    timeoutMs: options.timeoutMs
  });
}

export async function syncDependencies(options: DependencySyncOptions): Promise<DependencySyncResult> {
  const manifestPath = path.join(options.repositoryPath, options.manifest);
  if (!(await isFile(manifestPath))) {
    return { status: "skipped", reason: `No ${options.manifest} found, skipping dependency sync.` };
  }

  const interpreter = await resolveInstaller(options.repositoryPath, options.systemInterpreter);
  const result = await runInstaller(interpreter, installArgs(options.manifest), options);
  if (commandSucceeded(result)) {
    return { status: "synced", interpreter };
  }

  return {
    status: "failed",
    interpreter,
    reason: describeCommandFailure("Dependency install", result, options.timeoutMs)
  };
}
