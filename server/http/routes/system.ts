import type { Express, Request, Response } from "express";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import type { UpdaterRuntimeConfig } from "../../updater/config.js";
import type { ProgressLog } from "../../updater/progressLog.js";
import { firstQueryValue, sendRouteError } from "./helpers.js";

const UPDATE_LOG_PREVIEW_CHARS = 2000;

export interface SystemRouteDependencies {
  serviceName: string;
  config: Pick<UpdaterRuntimeConfig, "targetBranch" | "repositoryPath" | "webhookPath" | "webhookSecret" | "signaturePolicy">;
  relauncherScript: string;
  progressLog: ProgressLog;
  isBusy: () => boolean;
  insecureWarnings: string[];
}

const logsQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).optional(),
  level: z.enum(["info", "warning", "error", "success"]).optional(),
  since: z.string().trim().min(1).optional()
});

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export function registerSystemRoutes(app: Express, deps: SystemRouteDependencies): void {
  app.get("/", (_request: Request, response: Response) => {
    response.json({
      service: deps.serviceName,
      targetBranch: deps.config.targetBranch,
      endpoints: {
        webhook: `${deps.config.webhookPath} (POST)`,
        health: "/health (GET)",
        logs: "/logs (GET)",
        trigger: "/trigger (GET/POST)",
        updates: "/api/updates/{status,check,apply,cancel}"
      }
    });
  });

  app.get("/health", async (_request: Request, response: Response) => {
    try {
      const [repositoryPresent, relauncherPresent] = await Promise.all([
        pathExists(path.join(deps.config.repositoryPath, ".git")),
        pathExists(deps.relauncherScript)
      ]);

      response.json({
        status: "healthy",
        service: deps.serviceName,
        timestamp: new Date().toISOString(),
        targetBranch: deps.config.targetBranch,
        repositoryPath: deps.config.repositoryPath,
        repositoryPresent,
        relauncherPresent,
        secretConfigured: deps.config.webhookSecret.length > 0,
        signaturePolicy: deps.config.signaturePolicy,
        busy: deps.isBusy(),
        ...(deps.insecureWarnings.length > 0 ? { warnings: deps.insecureWarnings } : {})
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.get("/logs", async (request: Request, response: Response) => {
    try {
      const input = logsQuerySchema.parse({
        limit: firstQueryValue(request.query.limit),
        level: firstQueryValue(request.query.level),
        since: firstQueryValue(request.query.since)
      });

      let since: Date | undefined;
      if (input.since) {
        const parsed = Date.parse(input.since);
        if (Number.isNaN(parsed)) {
          response.status(400).json({
            error: "Invalid timestamp format. Use ISO format (e.g. 2024-01-01T00:00:00Z)."
          });
          return;
        }
        since = new Date(parsed);
      }

      const entries = deps.progressLog.query({ limit: input.limit, level: input.level, since });
      const preview = await deps.progressLog.readFileTail(UPDATE_LOG_PREVIEW_CHARS);

      response.json({
        status: "success",
        logEntries: entries,
        totalEntries: entries.length,
        totalStored: deps.progressLog.size,
        maxEntries: deps.progressLog.maxEntries,
        updateLogFile: deps.progressLog.logFilePath ?? null,
        updateLogPreview: preview,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });
}
