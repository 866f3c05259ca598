import { readFileSync } from "fs";
import { z } from "zod";
import type Database from "better-sqlite3";
import { loadConfig, type AppConfig } from "../core/config.js";
import { ConfigError, toErrorMessage } from "../core/errors.js";
import { SyncLedger } from "../core/ledger.js";
import { Reconciler } from "../core/reconcile.js";
import { CachedCandidateSource, SqliteRunRecorder } from "../core/db.js";
import { GitHubEventSource } from "../core/backends/github.js";
import { ClockifyRecordApi } from "../core/backends/clockify.js";
import { AzureDevOpsCandidateSource } from "../core/backends/azure-devops.js";
import { setDebugEnabled } from "../core/log.js";
import type { CandidateSource, EventSource, ExternalRecordApi } from "../types.js";

export { toErrorMessage };

/** Load and validate the environment once per command. */
export function loadRuntimeConfig(): AppConfig {
  const config = loadConfig();
  setDebugEnabled(config.debug);
  return config;
}

/** Print the error and exit non-zero. Commands call this from their catch. */
export function fail(err: unknown): never {
  console.error(`Error: ${toErrorMessage(err)}`);
  process.exit(1);
}

const JsonArraySchema = z.array(z.unknown());

export function readJsonArray(path: string): unknown[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new Error(`Could not read ${path}: ${toErrorMessage(err)}`);
  }
  const parsed = JsonArraySchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`${path} must contain a JSON array`);
  }
  return parsed.data;
}

export function createEventSource(config: AppConfig): EventSource {
  const { token, org, username } = config.github;
  if (!org && !username) {
    throw new ConfigError("Set GITHUB_USERNAME or GITHUB_ORG to fetch commits");
  }
  return new GitHubEventSource({ token, org, username, timeoutMs: config.httpTimeoutMs });
}

export function isClockifyConfigured(config: AppConfig): boolean {
  return Boolean(config.clockify.apiKey && config.clockify.workspaceId);
}

export function createRecordApi(config: AppConfig): ExternalRecordApi {
  const { apiKey, workspaceId, baseUrl } = config.clockify;
  if (!apiKey || !workspaceId) {
    throw new ConfigError("Set CLOCKIFY_API_KEY and CLOCKIFY_WORKSPACE_ID to sync sessions");
  }
  return new ClockifyRecordApi({ apiKey, workspaceId, baseUrl, timeoutMs: config.httpTimeoutMs });
}

/** Azure DevOps behind the local cache, or null when it is not configured. */
export function createCandidateSource(
  config: AppConfig,
  db: Database.Database
): CandidateSource | null {
  const { organization, project, pat, baseUrl } = config.ado;
  if (!organization || !project || !pat) return null;
  const upstream = new AzureDevOpsCandidateSource({
    organization,
    project,
    pat,
    baseUrl,
    timeoutMs: config.httpTimeoutMs,
  });
  return new CachedCandidateSource(db, upstream, config.cacheTtlSeconds);
}

export function createReconciler(
  config: AppConfig,
  ledger: SyncLedger,
  api: ExternalRecordApi,
  db: Database.Database | null
): Reconciler {
  return new Reconciler(
    ledger,
    api,
    {
      timezone: config.timezone,
      cluster: config.cluster,
      markSeen: config.markSeen,
      projectRef: config.clockify.defaultProjectId,
    },
    db ? new SqliteRunRecorder(db) : null
  );
}
