import type { Express, Request, Response } from "express";

import type { UpdateCoordinator } from "../../updater/coordinator.js";
import { isUpdateError, toErrorMessage } from "../../updater/errors.js";
import type { ProgressLog } from "../../updater/progressLog.js";
import type { UpdateRunResult, WebhookSignaturePolicy } from "../../updater/types.js";
import { headerValue } from "../middleware.js";
import { SIGNATURE_HEADER, branchFromRef, parsePushPayload, previewCommits, verifySignature } from "../webhook.js";
import { sendRouteError } from "./helpers.js";

export interface TriggerRouteDependencies {
  coordinator: Pick<UpdateCoordinator, "startForced" | "triggerTarget">;
  progressLog: ProgressLog;
  webhookPath: string;
  webhookSecret: string;
  signaturePolicy: WebhookSignaturePolicy;
  targetBranch: string;
  onUpdateSettled?: (result: UpdateRunResult) => void;
}

async function startTriggeredUpdate(
  deps: TriggerRouteDependencies,
  source: string,
  data: Record<string, unknown>,
  response: Response
): Promise<void> {
  try {
    const handle = await deps.coordinator.startForced({ target: deps.coordinator.triggerTarget() });
    deps.progressLog.add("info", `${source} started update ${handle.sessionId} to ${handle.target}.`, {
      source,
      sessionId: handle.sessionId,
      ...data
    });
    void handle.done
      .then((result) => {
        if (!result.upToDate) {
          deps.onUpdateSettled?.(result);
        }
      })
      .catch((error) => {
        console.error(`[webhook] Update ${handle.sessionId} did not settle cleanly:`, error);
      });

    response.status(202).json({
      status: "accepted",
      sessionId: handle.sessionId,
      target: handle.target
    });
  } catch (error) {
    if (isUpdateError(error) && error.code === "BUSY") {
      deps.progressLog.add("warning", `${source} ignored: ${error.message}`, { source, ...data });
      response.status(409).json({ status: "busy", error: error.message });
      return;
    }

    deps.progressLog.add("error", `${source} could not start an update: ${toErrorMessage(error)}`, { source, ...data });
    sendRouteError(error, response);
  }
}

export function registerTriggerRoutes(app: Express, deps: TriggerRouteDependencies): void {
  app.post(deps.webhookPath, async (request: Request, response: Response) => {
    const body: Buffer = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
    const event = headerValue(request, "x-github-event");

    if (deps.signaturePolicy === "required") {
      const check = verifySignature(deps.webhookSecret, body, headerValue(request, SIGNATURE_HEADER));
      if (!check.valid) {
        console.warn(`[webhook] Rejected request: ${check.reason}`);
        deps.progressLog.add("warning", `Webhook rejected: ${check.reason}`, { event });
        response.status(401).json({ status: "error", error: "Invalid signature" });
        return;
      }
    }

    const parsed = parsePushPayload(body);
    if (!parsed.ok) {
      deps.progressLog.add("warning", `Webhook rejected: ${parsed.error}`, { event });
      response.status(400).json({ status: "error", error: parsed.error });
      return;
    }

    if (event === "ping") {
      deps.progressLog.add("info", "Webhook ping received.", { event });
      response.status(200).json({ status: "pong" });
      return;
    }

    if (event !== "push") {
      response.status(200).json({
        status: "ignored",
        reason: `Event ${event || "(none)"} is not handled.`
      });
      return;
    }

    const branch = branchFromRef(parsed.payload.ref);
    if (branch !== deps.targetBranch) {
      deps.progressLog.add("info", `Push to ${branch ?? "unknown ref"} ignored.`, { event, branch });
      response.status(200).json({
        status: "ignored",
        reason: `Push to ${branch ?? "unknown ref"} does not target ${deps.targetBranch}.`
      });
      return;
    }

    const commits = previewCommits(parsed.payload);
    console.info(`[webhook] Push to ${branch} with ${commits.count} commit(s).`);
    await startTriggeredUpdate(
      deps,
      "Webhook",
      { branch, commits: commits.count, commitMessages: commits.messages },
      response
    );
  });

  const manualTrigger = async (request: Request, response: Response) => {
    console.info(`[webhook] Manual trigger via ${request.method}.`);
    await startTriggeredUpdate(deps, "Manual trigger", { method: request.method }, response);
  };
  app.get("/trigger", manualTrigger);
  app.post("/trigger", manualTrigger);
}
