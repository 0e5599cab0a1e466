#!/usr/bin/env node
import { Command } from "commander";
import { fileURLToPath } from "node:url";

import { createRemoteTriggerApp } from "./http/appFactory.js";
import { createInFlightTracker } from "./http/middleware.js";
import { collectInsecureConfigWarnings, resolveUpdaterRuntimeConfig, type UpdaterRuntimeConfig } from "./updater/config.js";
import { UpdateCoordinator } from "./updater/coordinator.js";
import { isUpdateError, toErrorMessage } from "./updater/errors.js";
import { ProgressLog } from "./updater/progressLog.js";
import { RELAUNCH_WAIT_PID_ENV, createProcessRestartLauncher } from "./updater/relaunch.js";
import { parseWaitPid, runRelauncher } from "./updater/relauncher.js";
import { startUpdateCheckScheduler } from "./updater/scheduler.js";
import type { UpdateRunResult } from "./updater/types.js";

const entryScript = fileURLToPath(import.meta.url);

function createCoordinator(config: UpdaterRuntimeConfig, options: { keepRunning?: boolean } = {}): UpdateCoordinator {
  return new UpdateCoordinator(config, {
    restartLauncher: createProcessRestartLauncher({
      relauncherScript: entryScript,
      application: { command: config.relaunchCommand, repositoryPath: config.repositoryPath },
      keepRunning: options.keepRunning
    })
  });
}

function reportFailure(error: unknown): void {
  const code = isUpdateError(error) ? ` [${error.code}]` : "";
  console.error(`[updater]${code} ${toErrorMessage(error)}`);
  process.exitCode = 1;
}

function exitCodeFor(result: UpdateRunResult): number {
  if (result.upToDate) {
    return 0;
  }
  return result.session?.outcome?.status === "succeeded" ? 0 : 1;
}

const program = new Command()
  .name("release-updater")
  .description("Keeps a git working tree on its newest release branch");

program
  .command("check")
  .description("Compare the installed version with the newest release on the remote")
  .option("-j, --json", "Output JSON")
  .action(async (options: { json?: boolean }) => {
    try {
      const coordinator = createCoordinator(resolveUpdaterRuntimeConfig(process.env));
      const result = await coordinator.check();
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      console.log(`Installed: ${result.currentVersion}`);
      console.log(`Newest release: ${result.latest ? `${result.latest.version} (${result.latest.remoteRef})` : "none"}`);
      console.log(result.updateAvailable ? "An update is available." : "Up to date.");
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command("apply [version]")
  .description("Update to the given release, or the newest one when omitted")
  .option("-f, --force", "Discard local modifications instead of refusing to update")
  .option("--no-backup", "Skip the pre-update backup")
  .option("--restart", "Restart after a successful update")
  .action(async (version: string | undefined, options: { force?: boolean; backup: boolean; restart?: boolean }) => {
    try {
      const config = resolveUpdaterRuntimeConfig(process.env);
      const coordinator = createCoordinator(config);

      const onInterrupt = () => {
        if (coordinator.cancel()) {
          console.warn("[updater] Cancelling after the current stage; press Ctrl-C again to abort immediately.");
          process.removeListener("SIGINT", onInterrupt);
        }
      };
      process.on("SIGINT", onInterrupt);

      const result = await coordinator.run({
        target: version,
        mode: options.force ? "force" : "safe",
        backup: options.backup ? config.backupBeforeUpdate : false
      });
      process.removeListener("SIGINT", onInterrupt);
      await coordinator.progressLog.flush();

      console.log(result.summary);
      process.exitCode = exitCodeFor(result);

      if (result.restart.recommended) {
        if (options.restart) {
          const outcome = await coordinator.restartNow(result, { hasInFlightWork: () => false });
          if (!outcome.restarted) {
            console.warn(`[updater] Restart skipped: ${outcome.reason}`);
          }
        } else {
          console.log(`Restart recommended (${result.restart.strategy}); rerun with --restart to do it now.`);
        }
      }
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command("restore <backupPath>")
  .description("Copy a backup directory back over the working tree")
  .action(async (backupPath: string) => {
    try {
      const coordinator = createCoordinator(resolveUpdaterRuntimeConfig(process.env));
      await coordinator.restoreBackup(backupPath);
      await coordinator.progressLog.flush();
      console.log(`Restored ${backupPath}.`);
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command("relaunch <version> <path>")
  .description("Wait for the updated process to exit, rebuild its environment and start it again")
  .action(async (version: string, repositoryPath: string) => {
    try {
      const config = resolveUpdaterRuntimeConfig(process.env);
      const result = await runRelauncher({
        version,
        repositoryPath,
        pythonBinary: config.pythonBinary,
        dependencyManifest: config.dependencyManifest,
        relaunchCommand: config.relaunchCommand,
        installTimeoutMs: config.timeouts.dependencySyncMs,
        waitPid: parseWaitPid(process.env[RELAUNCH_WAIT_PID_ENV]),
        progressLog: new ProgressLog({ filePath: config.progressLogPath })
      });
      process.exitCode = result.status === "started" ? 0 : 1;
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command("serve")
  .description("Listen for push webhooks and manual triggers")
  .action(() => {
    let config: UpdaterRuntimeConfig;
    try {
      config = resolveUpdaterRuntimeConfig(process.env);
    } catch (error) {
      reportFailure(error);
      return;
    }

    const coordinator = createCoordinator(config, { keepRunning: true });
    const inFlight = createInFlightTracker();

    const onUpdateSettled = (result: UpdateRunResult) => {
      if (!config.restartAfterUpdate || !result.restart.recommended) {
        return;
      }
      void coordinator
        .restartNow(result, inFlight)
        .then((outcome) => {
          if (!outcome.restarted) {
            console.warn(`[updater] Restart skipped: ${outcome.reason}`);
          }
        })
        .catch((error) => {
          console.error("[updater] Restart failed:", error);
        });
    };

    const app = createRemoteTriggerApp({
      config,
      coordinator,
      relauncherScript: entryScript,
      inFlight,
      onUpdateSettled
    });

    const scheduler = startUpdateCheckScheduler({
      intervalMs: config.autoCheckIntervalMs,
      check: () => coordinator.check(),
      isBusy: () => coordinator.isBusy()
    });

    const server = app.listen(config.port, config.host, () => {
      console.log(`[updater] Listening on http://${config.host}:${config.port}`);
      console.log(`[updater] Working tree: ${config.repositoryPath}`);
      console.log(`[updater] Target branch: ${config.targetBranch} (trigger target: ${config.triggerTarget})`);
      console.log(`[updater] Webhook path: ${config.webhookPath}, signature policy: ${config.signaturePolicy}`);
      for (const warning of collectInsecureConfigWarnings(config)) {
        console.warn(`[updater] WARNING: ${warning}`);
      }
      coordinator.progressLog.add("info", "Webhook listener started.", {
        host: config.host,
        port: config.port,
        targetBranch: config.targetBranch
      });
    });

    const shutdown = (signal: string) => {
      console.log(`[updater] ${signal} received, shutting down.`);
      scheduler.dispose();
      coordinator.cancel();
      server.close((error) => {
        if (error) {
          console.error("[updater] Error while closing the listener:", error);
        }
      });
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  });

void program.parseAsync(process.argv).catch((error: unknown) => {
  reportFailure(error);
});
