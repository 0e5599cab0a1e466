import { createHmac } from "node:crypto";
import { z } from "zod";

import { constantTimeEquals } from "./middleware.js";

export const SIGNATURE_HEADER = "x-hub-signature-256";
const SIGNATURE_PREFIX = "sha256=";
const COMMIT_MESSAGE_PREVIEW_LENGTH = 50;
const COMMIT_PREVIEW_COUNT = 3;

export const pushPayloadSchema = z
  .object({
    ref: z.string().optional(),
    commits: z
      .array(
        z
          .object({
            id: z.string().optional(),
            message: z.string().optional()
          })
          .passthrough()
      )
      .optional()
  })
  .passthrough();

export type PushPayload = z.infer<typeof pushPayloadSchema>;

export function signPayload(secret: string, body: Buffer): string {
  return `${SIGNATURE_PREFIX}${createHmac("sha256", secret).update(body).digest("hex")}`;
}

export type SignatureCheck = { valid: true } | { valid: false; reason: string };

export function verifySignature(secret: string, body: Buffer, header: string): SignatureCheck {
  if (header.length === 0) {
    return { valid: false, reason: "Missing X-Hub-Signature-256 header." };
  }
  if (!header.startsWith(SIGNATURE_PREFIX)) {
    return { valid: false, reason: "Signature header is not in sha256=<hex> form." };
  }
  if (!constantTimeEquals(header, signPayload(secret, body))) {
    return { valid: false, reason: "Signature does not match the payload." };
  }
  return { valid: true };
}

export function parsePushPayload(body: Buffer): { ok: true; payload: PushPayload } | { ok: false; error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf8"));
  } catch {
    return { ok: false, error: "Request body is not valid JSON." };
  }

  const result = pushPayloadSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: "Request body is not a push payload." };
  }
  return { ok: true, payload: result.data };
}

export function branchFromRef(ref: string | undefined): string | null {
  if (!ref) {
    return null;
  }
  return ref.startsWith("refs/heads/") ? ref.slice("refs/heads/".length) : ref;
}

export interface CommitPreview {
  count: number;
  messages: string[];
}

export function previewCommits(payload: PushPayload): CommitPreview {
  const commits = payload.commits ?? [];
  return {
    count: commits.length,
    messages: commits
      .slice(0, COMMIT_PREVIEW_COUNT)
      .map((commit) => (commit.message ?? "").slice(0, COMMIT_MESSAGE_PREVIEW_LENGTH))
  };
}
