import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { validateClusterOptions, type ClusterOptions } from "./cluster.js";
import { ConfigError } from "./errors.js";

export type MarkSeenMode = "before-sync" | "after-sync";
export type MatchingMode = "strict" | "fuzzy" | "hybrid";

export interface AppConfig {
  home: string;
  ledgerPath: string;
  dbPath: string;
  timezone: string;
  cluster: ClusterOptions;
  pollIntervalMs: number;
  historyDays: number;
  startDate: string | null; // YYYY-MM-DD
  endDate: string | null; // YYYY-MM-DD
  markSeen: MarkSeenMode;
  matchStrategy: MatchingMode;
  cacheTtlSeconds: number;
  httpTimeoutMs: number;
  debug: boolean;
  github: {
    token: string | null;
    username: string | null;
    org: string | null;
  };
  clockify: {
    apiKey: string | null;
    workspaceId: string | null;
    baseUrl: string;
    defaultProjectId: string | null;
  };
  ado: {
    organization: string | null;
    project: string | null;
    pat: string | null;
    baseUrl: string;
  };
}

const optional = z.string().trim().min(1).optional();
const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .optional();

const EnvSchema = z.object({
  WORKLOG_HOME: optional,
  WORKLOG_LEDGER_PATH: optional,
  WORKLOG_DB_PATH: optional,
  WORKLOG_TIMEZONE: z
    .string()
    .default("UTC")
    .refine(isKnownTimezone, "unknown IANA timezone"),
  WORKLOG_TAU_HOURS: z.coerce.number().positive().default(2.5),
  WORKLOG_CLUSTER_THRESHOLD: z.coerce.number().gt(0).lte(1).default(0.1),
  WORKLOG_MAX_SESSION_HOURS: z.coerce.number().positive().default(4),
  WORKLOG_MIN_CLUSTER_GAP_MINUTES: z.coerce.number().default(30),
  WORKLOG_POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  WORKLOG_HISTORY_DAYS: z.coerce.number().int().nonnegative().default(7),
  WORKLOG_START_DATE: isoDate,
  WORKLOG_END_DATE: isoDate,
  WORKLOG_MARK_SEEN: z.enum(["before-sync", "after-sync"]).default("before-sync"),
  WORKLOG_MATCH_STRATEGY: z.enum(["strict", "fuzzy", "hybrid"]).default("hybrid"),
  WORKLOG_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(3600),
  WORKLOG_DEBUG: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((v) => v === "true" || v === "1"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GITHUB_TOKEN: optional,
  GITHUB_USERNAME: optional,
  GITHUB_ORG: optional,
  CLOCKIFY_API_KEY: optional,
  CLOCKIFY_WORKSPACE_ID: optional,
  CLOCKIFY_BASE_URL: z.string().url().default("https://api.clockify.me/api/v1"),
  CLOCKIFY_DEFAULT_PROJECT_ID: optional,
  ADO_ORG: optional,
  ADO_PROJECT: optional,
  ADO_PAT: optional,
  ADO_BASE_URL: z.string().url().default("https://dev.azure.com"),
});

/**
 * Build the application config from environment variables.
 * Empty variables count as unset. Throws ConfigError on any invalid value.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  const home = e.WORKLOG_HOME ?? join(homedir(), ".worklog-sync");
  const cluster: ClusterOptions = {
    tauHours: e.WORKLOG_TAU_HOURS,
    clusterThreshold: e.WORKLOG_CLUSTER_THRESHOLD,
    maxSessionHours: e.WORKLOG_MAX_SESSION_HOURS,
    minClusterGapMinutes: e.WORKLOG_MIN_CLUSTER_GAP_MINUTES,
  };
  validateClusterOptions(cluster);

  return {
    home,
    ledgerPath: e.WORKLOG_LEDGER_PATH ?? join(home, "ledger.json"),
    dbPath: e.WORKLOG_DB_PATH ?? join(home, "cache.db"),
    timezone: e.WORKLOG_TIMEZONE,
    cluster,
    pollIntervalMs: e.WORKLOG_POLL_INTERVAL_SECONDS * 1000,
    historyDays: e.WORKLOG_HISTORY_DAYS,
    startDate: e.WORKLOG_START_DATE ?? null,
    endDate: e.WORKLOG_END_DATE ?? null,
    markSeen: e.WORKLOG_MARK_SEEN,
    matchStrategy: e.WORKLOG_MATCH_STRATEGY,
    cacheTtlSeconds: e.WORKLOG_CACHE_TTL_SECONDS,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    debug: e.WORKLOG_DEBUG,
    github: {
      token: e.GITHUB_TOKEN ?? null,
      username: e.GITHUB_USERNAME ?? null,
      org: e.GITHUB_ORG ?? null,
    },
    clockify: {
      apiKey: e.CLOCKIFY_API_KEY ?? null,
      workspaceId: e.CLOCKIFY_WORKSPACE_ID ?? null,
      baseUrl: e.CLOCKIFY_BASE_URL,
      defaultProjectId: e.CLOCKIFY_DEFAULT_PROJECT_ID ?? null,
    },
    ado: {
      organization: e.ADO_ORG ?? null,
      project: e.ADO_PROJECT ?? null,
      pat: e.ADO_PAT ?? null,
      baseUrl: e.ADO_BASE_URL,
    },
  };
}

function isKnownTimezone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}
