import { execCommand, type CommandResult, type CommandRunner } from "./commandRunner.js";

export interface GitContext {
  repositoryPath: string;
  gitBinary: string;
  runner: CommandRunner;
}

export function createGitContext(
  repositoryPath: string,
  options: Partial<Omit<GitContext, "repositoryPath">> = {}
): GitContext {
  return {
    repositoryPath,
    gitBinary: options.gitBinary ?? "git",
    runner: options.runner ?? execCommand
  };
}

export function runGit(context: GitContext, args: string[], timeoutMs: number): Promise<CommandResult> {
  return context.runner(context.gitBinary, args, {
    cwd: context.repositoryPath,
    timeoutMs,
    env: {
      ...process.env,
      // Never block a headless update on a credential prompt.
      GIT_TERMINAL_PROMPT: "0"
    }
  });
}

export const REMOTE_AUTH_HINT =
  "Hint: publickey or permission errors usually mean the remote's authentication (deploy key or token) is misconfigured.";
