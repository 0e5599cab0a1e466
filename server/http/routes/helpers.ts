import type { Response } from "express";
import { ZodError } from "zod";

import { isUpdateError } from "../../updater/errors.js";

export function sendRouteError(error: unknown, response: Response): void {
  if (error instanceof ZodError) {
    response.status(400).json({
      error: "Validation failed",
      details: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
    return;
  }

  if (isUpdateError(error)) {
    response.status(error.statusCode).json({
      error: error.message,
      code: error.code
    });
    return;
  }

  console.error("[api-error]", error);
  const message =
    error instanceof Error && error.message.trim().length > 0
      ? error.message.trim().replace(/\s+/g, " ").slice(0, 480)
      : "Internal server error";
  response.status(500).json({ error: message });
}

export function firstQueryValue(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return firstQueryValue(value[0]);
  }
  return typeof value === "string" ? value : undefined;
}
