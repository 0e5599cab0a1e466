import path from "node:path";

import type { RestartStrategy, TriggerTarget, WebhookSignaturePolicy } from "./types.js";

export interface StageTimeouts {
  versionQueryMs: number;
  catalogFetchMs: number;
  catalogListMs: number;
  fetchMs: number;
  checkoutMs: number;
  dependencySyncMs: number;
}

export interface UpdaterRuntimeConfig {
  repositoryPath: string;
  remote: string;
  releasePrefixes: string[];
  targetBranch: string;
  gitBinary: string;
  pythonBinary: string;
  dependencyManifest: string;
  backupBeforeUpdate: boolean;
  syncDependencies: boolean;
  restartStrategy: RestartStrategy;
  restartAfterUpdate: boolean;
  relaunchCommand: string[];
  triggerTarget: TriggerTarget;
  timeouts: StageTimeouts;
  host: string;
  port: number;
  webhookPath: string;
  webhookSecret: string;
  signaturePolicy: WebhookSignaturePolicy;
  authToken: string;
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  statePath: string;
  progressLogPath: string;
  autoCheckIntervalMs: number;
  lockTtlMs: number;
}

const defaultPort = 9000;
const defaultReleasePrefixes = ["release/", "Release/"];
const truthyEnvValues = new Set(["1", "true", "yes", "on"]);
const falsyEnvValues = new Set(["0", "false", "no", "off"]);

export function parsePort(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1 || parsed > 65535) {
    return defaultPort;
  }
  return parsed;
}

export function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, parsed));
}

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (truthyEnvValues.has(normalized)) {
    return true;
  }
  if (falsyEnvValues.has(normalized)) {
    return false;
  }

  return fallback;
}

function parseList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseReleasePrefixes(raw: string | undefined): string[] {
  const configured = parseList(raw).map((prefix) => (prefix.endsWith("/") ? prefix : `${prefix}/`));
  return configured.length > 0 ? [...new Set(configured)] : [...defaultReleasePrefixes];
}

function parseCorsOrigins(raw: string | undefined): {
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
} {
  const configured = parseList(raw);
  const corsOrigins = configured.length > 0 ? configured : ["http://localhost:5173", "http://127.0.0.1:5173"];

  return {
    corsOrigins,
    allowAnyCorsOrigin: corsOrigins.includes("*")
  };
}

function normalizeRestartStrategy(raw: string | undefined): RestartStrategy {
  return raw?.trim().toLowerCase() === "relauncher" ? "relauncher" : "in-place";
}

function normalizeTriggerTarget(raw: string | undefined): TriggerTarget {
  return raw?.trim().toLowerCase() === "branch" ? "branch" : "latest-release";
}

function normalizeWebhookPath(raw: string | undefined): string {
  const trimmed = (raw ?? "").trim();
  if (trimmed.length === 0) {
    return "/webhook";
  }
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

function resolveSignaturePolicy(raw: string | undefined, secret: string): WebhookSignaturePolicy {
  const normalized = raw?.trim().toLowerCase() ?? "";
  if (normalized === "required" || normalized === "disabled") {
    return normalized;
  }
  if (normalized.length > 0) {
    throw new Error(`UPDATER_WEBHOOK_SIGNATURE_POLICY must be "required" or "disabled" (got "${raw}").`);
  }
  return secret.length > 0 ? "required" : "disabled";
}

function splitCommand(raw: string | undefined, fallback: string[]): string[] {
  const parts = (raw ?? "").trim().split(/\s+/).filter((part) => part.length > 0);
  return parts.length > 0 ? parts : fallback;
}

/** Beside the working tree, never inside it: `/srv/app` keeps its state in `/srv/.app-updater`. */
function defaultDataRootPath(repositoryPath: string): string {
  return path.join(path.dirname(repositoryPath), `.${path.basename(repositoryPath)}-updater`);
}

function resolvePathFromEnv(raw: string | undefined, fallback: string, cwd: string): string {
  const trimmed = raw?.trim() ?? "";
  return trimmed.length > 0 ? path.resolve(cwd, trimmed) : fallback;
}

export function resolveUpdaterRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): UpdaterRuntimeConfig {
  const { corsOrigins, allowAnyCorsOrigin } = parseCorsOrigins(env.UPDATER_CORS_ORIGINS);
  const repositoryPath = resolvePathFromEnv(env.UPDATER_REPOSITORY_PATH, cwd, cwd);
  const dataRootPath = resolvePathFromEnv(env.UPDATER_DATA_DIR, defaultDataRootPath(repositoryPath), cwd);
  const webhookSecret = (env.WEBHOOK_SECRET ?? "").trim();
  const signaturePolicy = resolveSignaturePolicy(env.UPDATER_WEBHOOK_SIGNATURE_POLICY, webhookSecret);
  const autoCheckIntervalMs = parseIntEnv(env.UPDATER_AUTO_CHECK_INTERVAL_MS, 0, 0, 86_400_000);

  const config: UpdaterRuntimeConfig = {
    repositoryPath,
    remote: (env.UPDATER_REMOTE ?? "").trim() || "origin",
    releasePrefixes: parseReleasePrefixes(env.UPDATER_RELEASE_PREFIXES),
    targetBranch: (env.UPDATER_TARGET_BRANCH ?? env.GIT_BRANCH ?? "").trim() || "main",
    gitBinary: (env.UPDATER_GIT_BINARY ?? "").trim() || "git",
    pythonBinary: (env.UPDATER_PYTHON_BINARY ?? "").trim() || "python3",
    dependencyManifest: (env.UPDATER_DEPENDENCY_MANIFEST ?? "").trim() || "requirements.txt",
    backupBeforeUpdate: parseBooleanEnv(env.UPDATER_BACKUP, true),
    syncDependencies: parseBooleanEnv(env.UPDATER_SYNC_DEPENDENCIES, true),
    restartStrategy: normalizeRestartStrategy(env.UPDATER_RESTART_STRATEGY),
    restartAfterUpdate: parseBooleanEnv(env.UPDATER_RESTART_AFTER_UPDATE, false),
    relaunchCommand: splitCommand(env.UPDATER_RELAUNCH_COMMAND, ["python3", "main.py"]),
    triggerTarget: normalizeTriggerTarget(env.UPDATER_TRIGGER_TARGET),
    timeouts: {
      versionQueryMs: parseIntEnv(env.UPDATER_VERSION_QUERY_TIMEOUT_MS, 5_000, 500, 60_000),
      catalogFetchMs: parseIntEnv(env.UPDATER_CATALOG_FETCH_TIMEOUT_MS, 30_000, 2_000, 300_000),
      catalogListMs: parseIntEnv(env.UPDATER_CATALOG_LIST_TIMEOUT_MS, 10_000, 1_000, 120_000),
      fetchMs: parseIntEnv(env.UPDATER_FETCH_TIMEOUT_MS, 60_000, 2_000, 600_000),
      checkoutMs: parseIntEnv(env.UPDATER_CHECKOUT_TIMEOUT_MS, 30_000, 1_000, 300_000),
      dependencySyncMs: parseIntEnv(env.UPDATER_DEPENDENCY_SYNC_TIMEOUT_MS, 600_000, 10_000, 3_600_000)
    },
    host: (env.WEBHOOK_HOST ?? "").trim() || "0.0.0.0",
    port: parsePort(env.WEBHOOK_PORT),
    webhookPath: normalizeWebhookPath(env.UPDATER_WEBHOOK_PATH),
    webhookSecret,
    signaturePolicy,
    authToken: (env.UPDATER_AUTH_TOKEN ?? "").trim(),
    corsOrigins,
    allowAnyCorsOrigin,
    statePath: resolvePathFromEnv(env.UPDATER_STATE_PATH, path.join(dataRootPath, "updater-state.json"), cwd),
    progressLogPath: resolvePathFromEnv(env.UPDATER_PROGRESS_LOG_PATH, path.join(dataRootPath, "update.log"), cwd),
    autoCheckIntervalMs: autoCheckIntervalMs === 0 ? 0 : Math.max(30_000, autoCheckIntervalMs),
    lockTtlMs: parseIntEnv(env.UPDATER_LOCK_TTL_MS, 30 * 60 * 1000, 60_000, 24 * 60 * 60 * 1000)
  };

  if (config.signaturePolicy === "required" && config.webhookSecret.length === 0) {
    throw new Error("WEBHOOK_SECRET is required when UPDATER_WEBHOOK_SIGNATURE_POLICY=required.");
  }

  return config;
}

/**
 * Updater files that were configured inside the working tree, relative to it.
 * Sessions leave these out of the dirty check and out of `git clean`.
 */
export function treeOwnedPaths(config: Pick<UpdaterRuntimeConfig, "repositoryPath" | "statePath" | "progressLogPath">): string[] {
  const owned = new Set<string>();
  for (const filePath of [config.statePath, config.progressLogPath]) {
    const relative = path.relative(config.repositoryPath, filePath);
    if (relative.length > 0 && !relative.startsWith("..") && !path.isAbsolute(relative)) {
      owned.add(relative.split(path.sep).join("/"));
    }
  }
  return [...owned];
}

/** Startup warnings that must stay visible for as long as the condition holds. */
export function collectInsecureConfigWarnings(config: UpdaterRuntimeConfig): string[] {
  const warnings: string[] = [];
  if (config.signaturePolicy === "disabled") {
    warnings.push(
      config.webhookSecret.length === 0
        ? "WEBHOOK_SECRET is not set: webhook requests are accepted WITHOUT signature verification."
        : "UPDATER_WEBHOOK_SIGNATURE_POLICY=disabled: webhook signatures are NOT verified even though a secret is set."
    );
  }
  if (config.authToken.length === 0) {
    warnings.push("UPDATER_AUTH_TOKEN is not set: /trigger and /api/updates/* accept unauthenticated requests.");
  }
  return warnings;
}
