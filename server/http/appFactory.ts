import express from "express";

import type { UpdaterRuntimeConfig } from "../updater/config.js";
import { collectInsecureConfigWarnings } from "../updater/config.js";
import type { UpdateCoordinator } from "../updater/coordinator.js";
import type { UpdateRunResult } from "../updater/types.js";
import {
  createApiAuthMiddleware,
  createAuditMiddleware,
  createCorsMiddleware,
  createErrorMiddleware,
  createNotFoundMiddleware,
  createSecurityHeadersMiddleware,
  type InFlightTracker
} from "./middleware.js";
import { registerSystemRoutes } from "./routes/system.js";
import { registerTriggerRoutes } from "./routes/trigger.js";
import { registerUpdateRoutes } from "./routes/updates.js";

export const SERVICE_NAME = "release-updater";

export interface RemoteTriggerAppDependencies {
  config: UpdaterRuntimeConfig;
  coordinator: UpdateCoordinator;
  relauncherScript: string;
  inFlight?: InFlightTracker;
  onUpdateSettled?: (result: UpdateRunResult) => void;
}

function isProtectedPath(requestPath: string): boolean {
  return requestPath.startsWith("/api/") || requestPath === "/trigger";
}

export function createRemoteTriggerApp(deps: RemoteTriggerAppDependencies): express.Express {
  const { config, coordinator } = deps;
  const app = express();

  app.disable("x-powered-by");
  app.use(createAuditMiddleware());
  if (deps.inFlight) {
    app.use(deps.inFlight.middleware);
  }
  app.use(createSecurityHeadersMiddleware());
  app.use(
    createCorsMiddleware({
      allowedOrigins: config.corsOrigins,
      allowAnyOrigin: config.allowAnyCorsOrigin
    })
  );
  // Signatures are computed over the exact bytes GitHub sent.
  app.use(config.webhookPath, express.raw({ type: () => true, limit: "1mb" }));
  app.use("/api", express.json({ limit: "256kb" }));
  app.use(createApiAuthMiddleware(config.authToken, { isProtectedPath }));

  registerSystemRoutes(app, {
    serviceName: SERVICE_NAME,
    config,
    relauncherScript: deps.relauncherScript,
    progressLog: coordinator.progressLog,
    isBusy: () => coordinator.isBusy(),
    insecureWarnings: collectInsecureConfigWarnings(config)
  });
  registerTriggerRoutes(app, {
    coordinator,
    progressLog: coordinator.progressLog,
    webhookPath: config.webhookPath,
    webhookSecret: config.webhookSecret,
    signaturePolicy: config.signaturePolicy,
    targetBranch: config.targetBranch,
    onUpdateSettled: deps.onUpdateSettled
  });
  registerUpdateRoutes(app, {
    coordinator,
    onUpdateSettled: deps.onUpdateSettled
  });

  app.use(createNotFoundMiddleware());
  app.use(createErrorMiddleware());

  return app;
}
