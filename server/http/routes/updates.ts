import type { Express, Request, Response } from "express";
import { z } from "zod";

import type { UpdateCoordinator } from "../../updater/coordinator.js";
import type { UpdateRunResult } from "../../updater/types.js";
import { sendRouteError } from "./helpers.js";

export interface UpdateRouteDependencies {
  coordinator: Pick<UpdateCoordinator, "getStatus" | "check" | "start" | "cancel" | "getActiveSession">;
  onUpdateSettled?: (result: UpdateRunResult) => void;
}

export const applyUpdateSchema = z.object({
  version: z.string().trim().min(1).max(200).optional(),
  force: z.boolean().optional(),
  backup: z.boolean().optional()
});

export function registerUpdateRoutes(app: Express, deps: UpdateRouteDependencies): void {
  app.get("/api/updates/status", (_request: Request, response: Response) => {
    try {
      response.json({
        status: deps.coordinator.getStatus()
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/updates/check", async (_request: Request, response: Response) => {
    try {
      const check = await deps.coordinator.check();
      response.json({
        check,
        status: deps.coordinator.getStatus()
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/updates/apply", async (request: Request, response: Response) => {
    try {
      const input = applyUpdateSchema.parse(request.body ?? {});
      const handle = await deps.coordinator.start({
        target: input.version,
        mode: input.force ? "force" : "safe",
        backup: input.backup
      });

      if (!handle.session) {
        const result = await handle.done;
        response.json({ status: "up-to-date", message: result.summary });
        return;
      }

      const session = handle.session;
      void handle.done
        .then((result) => {
          deps.onUpdateSettled?.(result);
        })
        .catch((error) => {
          console.error(`[updater] Update ${session.id} did not settle cleanly:`, error);
        });

      response.status(202).json({
        status: "accepted",
        sessionId: session.id,
        session: session.snapshot()
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/updates/cancel", (_request: Request, response: Response) => {
    try {
      const cancelled = deps.coordinator.cancel();
      response.json({
        cancelled,
        session: deps.coordinator.getActiveSession()
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });
}
