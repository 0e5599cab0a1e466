import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);
const DEFAULT_MAX_BUFFER = 8 * 1024 * 1024;

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the process could not be started at all (missing binary, bad cwd). */
  spawnError?: string;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

interface ExecFailure {
  code?: unknown;
  killed?: unknown;
  signal?: unknown;
  stdout?: unknown;
  stderr?: unknown;
  message?: unknown;
}

function isExecFailure(value: unknown): value is ExecFailure {
  return typeof value === "object" && value !== null;
}

function asText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString("utf8");
  }
  return "";
}

export const execCommand: CommandRunner = async (command, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      timeout: options.timeoutMs,
      maxBuffer: DEFAULT_MAX_BUFFER,
      windowsHide: true
    });

    return {
      exitCode: 0,
      stdout,
      stderr,
      timedOut: false
    };
  } catch (error) {
    if (!isExecFailure(error)) {
      return { exitCode: null, stdout: "", stderr: String(error), timedOut: false, spawnError: String(error) };
    }

    const stdout = asText(error.stdout);
    const stderr = asText(error.stderr);
    if (typeof error.code === "number") {
      return { exitCode: error.code, stdout, stderr, timedOut: false };
    }

    if (error.killed === true) {
      return { exitCode: null, stdout, stderr, timedOut: true };
    }

    if (typeof error.signal === "string") {
      return { exitCode: null, stdout, stderr: stderr || `terminated by ${error.signal}`, timedOut: false };
    }

    const message = typeof error.message === "string" ? error.message : String(error.code ?? "spawn failed");
    return {
      exitCode: null,
      stdout,
      stderr: stderr || message,
      timedOut: false,
      spawnError: message
    };
  }
};

export function commandSucceeded(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.timedOut && result.spawnError === undefined;
}

export function describeCommandFailure(label: string, result: CommandResult, timeoutMs: number): string {
  if (result.timedOut) {
    return `${label} timed out after ${timeoutMs}ms`;
  }
  if (result.spawnError) {
    return `${label} could not be started: ${result.spawnError}`;
  }

  const output = (result.stderr.trim() || result.stdout.trim()).slice(-1000);
  return output.length > 0
    ? `${label} failed (exit ${result.exitCode ?? "?"}): ${output}`
    : `${label} failed (exit ${result.exitCode ?? "?"})`;
}
