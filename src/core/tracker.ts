import { ScheduledTask } from "./task.js";
import { ConfigError } from "./errors.js";
import { addDays, localDate, startOfDay } from "./time.js";
import { MS_PER_HOUR } from "./cluster.js";
import * as log from "./log.js";
import type { AppConfig } from "./config.js";
import type { SyncLedger } from "./ledger.js";
import type { Reconciler, ReconcileResult } from "./reconcile.js";
import type { EventSource, TimeWindow } from "../types.js";

const POLL_WINDOW_HOURS = 24;

type TrackerConfig = Pick<
  AppConfig,
  "timezone" | "historyDays" | "startDate" | "endDate" | "pollIntervalMs" | "github"
>;

/**
 * Keeps the time tracker in step with commit activity: one historical
 * backfill, then a rolling 24h window on every poll. Re-fetching the same
 * commits is harmless since the reconciler skips seen ids.
 */
export class CommitTracker {
  private readonly config: TrackerConfig;
  private readonly source: EventSource;
  private readonly reconciler: Reconciler;
  private readonly ledger: SyncLedger;
  private readonly now: () => Date;
  private task: ScheduledTask | null = null;

  constructor(
    config: TrackerConfig,
    source: EventSource,
    reconciler: Reconciler,
    ledger: SyncLedger,
    now: () => Date = () => new Date()
  ) {
    if (!config.github.username && !config.github.org) {
      throw new ConfigError("Neither GITHUB_USERNAME nor GITHUB_ORG is configured");
    }
    this.config = config;
    this.source = source;
    this.reconciler = reconciler;
    this.ledger = ledger;
    this.now = now;
  }

  get running(): boolean {
    return this.task?.running ?? false;
  }

  /**
   * Whole days in the configured timezone: from the start date (or
   * `historyDays` before the end date) through the end of the end date
   * (today when unset).
   */
  dateRange(): TimeWindow {
    const { timezone, historyDays, startDate, endDate } = this.config;
    const end = endDate ?? localDate(this.now(), timezone);
    const start = startDate ?? addDays(end, -historyDays);
    if (start > end) {
      throw new ConfigError(`Start date ${start} is after end date ${end}`);
    }
    return {
      since: startOfDay(start, timezone),
      until: new Date(startOfDay(addDays(end, 1), timezone).getTime() - 1),
    };
  }

  async syncHistorical(): Promise<ReconcileResult> {
    const window = this.dateRange();
    const { timezone } = this.config;
    log.info(
      `Fetching commits from ${localDate(window.since, timezone)} to ${localDate(window.until, timezone)}`
    );
    return this.syncWindow(window);
  }

  async pollOnce(signal?: AbortSignal): Promise<ReconcileResult> {
    const until = this.now();
    const since = new Date(until.getTime() - POLL_WINDOW_HOURS * MS_PER_HOUR);
    return this.syncWindow({ since, until }, signal);
  }

  async start(options: { skipHistorical?: boolean } = {}): Promise<void> {
    if (this.task) {
      log.warn("Tracker already running");
      return;
    }
    if (!options.skipHistorical) {
      await this.syncHistorical();
    }

    const target = this.config.github.org ?? this.config.github.username;
    log.info(
      `Polling commits for ${target} every ${Math.round(this.config.pollIntervalMs / 1000)}s`
    );
    this.task = new ScheduledTask(
      "commit poll",
      async (signal) => {
        await this.pollOnce(signal);
      },
      this.config.pollIntervalMs
    );
    this.task.start();
  }

  async stop(): Promise<void> {
    if (this.task) {
      await this.task.stop();
      this.task = null;
    }
    await this.ledger.persist();
    log.info("Tracker stopped");
  }

  private async syncWindow(window: TimeWindow, signal?: AbortSignal): Promise<ReconcileResult> {
    const events = await this.source.fetchEvents(window, signal);
    // A partial fetch is not reconciled; the next pass covers the same window.
    if (signal?.aborted) throw new Error("Commit fetch cancelled");
    log.debug(`Fetched ${events.length} commits`);
    return this.reconciler.reconcile(events);
  }
}
