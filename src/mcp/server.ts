import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { SyncLedger } from "../core/ledger.js";
import { getMeta, getRecentRuns, openDatabase } from "../core/db.js";
import { parseEvents } from "../core/events.js";
import {
  EntityMatcher,
  matchRecords,
  matchStatistics,
  parseTextRecords,
} from "../core/matcher.js";
import { summarizeResult, type Reconciler } from "../core/reconcile.js";
import { CommitTracker } from "../core/tracker.js";
import { ScheduledTask } from "../core/task.js";
import * as log from "../core/log.js";
import { VERSION } from "../version.js";
import {
  createCandidateSource,
  createEventSource,
  createReconciler,
  createRecordApi,
  isClockifyConfigured,
  loadRuntimeConfig,
  toErrorMessage,
} from "../cli/util.js";

function text(body: string) {
  return { content: [{ type: "text" as const, text: body }] };
}

export async function startMcpServer(): Promise<void> {
  const config = loadRuntimeConfig();
  const db = openDatabase(config.dbPath);
  const ledger = SyncLedger.load(config.ledgerPath);
  const candidateSource = createCandidateSource(config, db);

  const reconciler: Reconciler | null = isClockifyConfigured(config)
    ? createReconciler(config, ledger, createRecordApi(config), db)
    : null;
  const tracker =
    reconciler && (config.github.username || config.github.org)
      ? new CommitTracker(config, createEventSource(config), reconciler, ledger)
      : null;
  let task: ScheduledTask | null = null;

  const server = new McpServer(
    { name: "worklog-sync", version: VERSION },
    {
      instructions:
        "worklog-sync turns commit activity into time entries and links time entries to work items. " +
        "Use extract_work_item_ids or match_time_entries to link descriptions to work items, " +
        "sync_status to inspect the ledger, and sync_now to reconcile immediately.",
    }
  );

  server.tool(
    "extract_work_item_ids",
    "Extract work-item ids (#1234, ADO-1234, WI:1234, [1234], ...) from free text with a confidence score.",
    {
      text: z.string().describe("Free text such as a time-entry description or commit message."),
    },
    async ({ text: input }) => {
      const { ids, confidence } = new EntityMatcher(config.matchStrategy).extractIds(input);
      const sorted = [...ids].sort((a, b) => a - b);
      return text(JSON.stringify({ ids: sorted, confidence }));
    }
  );

  server.tool(
    "match_time_entries",
    "Link time entries to work items. Referenced items are looked up in Azure DevOps when configured; extra candidates can be passed directly.",
    {
      entries: z
        .array(z.object({ id: z.string(), description: z.string() }))
        .describe("Time entries to match."),
      candidates: z
        .array(z.object({ id: z.number().int(), title: z.string(), isClosed: z.boolean().default(false) }))
        .optional()
        .describe("Work items to consider in addition to the ones looked up by id."),
      strategy: z.enum(["strict", "fuzzy", "hybrid"]).optional().describe("Defaults to WORKLOG_MATCH_STRATEGY."),
    },
    async ({ entries, candidates, strategy }) => {
      const { records } = parseTextRecords(entries);
      const matcher = new EntityMatcher(strategy ?? config.matchStrategy);
      try {
        const results = await matchRecords(matcher, records, candidateSource, candidates ?? []);
        return text(
          JSON.stringify({
            results: results.map((r) => ({
              id: r.record.id,
              matchedIds: [...r.matchedIds].sort((a, b) => a - b),
              confidence: r.confidence,
              strategy: r.strategy,
            })),
            statistics: matchStatistics(results),
          })
        );
      } catch (err) {
        return text(`Matching failed: ${toErrorMessage(err)}`);
      }
    }
  );

  server.tool(
    "sync_status",
    "Show how many events have been seen, how many sessions are synced, and the most recent sync runs.",
    {},
    async () => {
      const stats = await ledger.stats();
      const runs = getRecentRuns(db, 5);
      return text(
        JSON.stringify({
          seenEvents: stats.seenEvents,
          sessions: stats.sessions,
          lastSyncAt: getMeta(db, "last_sync_at"),
          polling: task?.running ?? false,
          recentRuns: runs,
        })
      );
    }
  );

  server.tool(
    "sync_now",
    "Reconcile now: events passed in, or the last 24 hours of commits from GitHub when none are given.",
    {
      events: z
        .array(z.record(z.unknown()))
        .optional()
        .describe("Events as { id, actor, scope, timestamp, text }. Omit to poll GitHub."),
    },
    async ({ events }) => {
      if (!reconciler) {
        return text("Clockify is not configured (CLOCKIFY_API_KEY, CLOCKIFY_WORKSPACE_ID).");
      }
      try {
        if (events) {
          const parsed = parseEvents(events);
          const result = await reconciler.reconcile(parsed.events);
          const skipped = parsed.skipped > 0 ? ` (${parsed.skipped} malformed skipped)` : "";
          return text(`${summarizeResult(result)}${skipped}`);
        }
        if (!tracker) {
          return text("GitHub is not configured (GITHUB_USERNAME or GITHUB_ORG); pass events instead.");
        }
        return text(summarizeResult(await tracker.pollOnce()));
      } catch (err) {
        return text(`Sync failed: ${toErrorMessage(err)}`);
      }
    }
  );

  // Connect transport immediately so MCP clients discover tools without delay.
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // ── Background polling ──────────────────────────────
  if (tracker) {
    task = new ScheduledTask(
      "background sync",
      async (signal) => {
        const result = await tracker.pollOnce(signal);
        if (result.accepted > 0) log.info(`Background sync: ${summarizeResult(result)}`);
      },
      config.pollIntervalMs
    );
    task.start();
    log.info(`Auto-sync every ${Math.round(config.pollIntervalMs / 1000)}s`);
  } else {
    log.info("Auto-sync disabled: configure GitHub and Clockify to enable it");
  }

  let stopping = false;
  async function shutdown(): Promise<void> {
    if (stopping) return;
    stopping = true;
    try {
      if (task) await task.stop();
      await ledger.persist();
    } catch (err) {
      log.error(`Shutdown failed: ${toErrorMessage(err)}`);
    }
    db.close();
    process.exit(0);
  }
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}
