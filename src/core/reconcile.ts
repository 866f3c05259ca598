import { v4 as uuidv4 } from "uuid";
import { clusterEvents, validateClusterOptions, type ClusterOptions } from "./cluster.js";
import { mergeSessions } from "./merge.js";
import { describeSession, extendRecord, sessionKey } from "./session.js";
import { toErrorMessage } from "./errors.js";
import * as log from "./log.js";
import type { SyncLedger, LedgerState } from "./ledger.js";
import type { MarkSeenMode } from "./config.js";
import type {
  ExternalRecord,
  ExternalRecordApi,
  RawEvent,
  RecordInput,
  WorkSession,
} from "../types.js";

export interface ReconcilerOptions {
  timezone: string;
  cluster: ClusterOptions;
  /**
   * "before-sync": event ids are recorded as seen before their session is
   * synced, so a failed session is never retried (its events are reported
   * as dropped). "after-sync": ids are recorded only once their session
   * synced, so failed events are picked up again on the next run.
   */
  markSeen: MarkSeenMode;
  projectRef: string | null;
}

export type SessionAction = "created" | "updated" | "failed";

export interface SessionOutcome {
  sessionKey: string;
  action: SessionAction;
  recordId: string | null;
  eventIds: string[];
}

/** A session that failed after its events were already marked seen. */
export interface DroppedSession {
  sessionKey: string;
  eventIds: string[];
}

export interface ReconcileResult {
  runId: string;
  startedAt: string; // ISO 8601
  finishedAt: string; // ISO 8601
  received: number;
  accepted: number;
  duplicates: number;
  sessions: number;
  created: number;
  updated: number;
  failed: number;
  dropped: DroppedSession[];
  outcomes: SessionOutcome[];
  persisted: boolean;
}

/** Receives every finished pass, e.g. to keep a run history. */
export interface RunRecorder {
  record(result: ReconcileResult): void;
}

/** Number of sessions created or updated by a pass. */
export function syncedCount(result: ReconcileResult): number {
  return result.created + result.updated;
}

/**
 * Turns new events into external records, one per session key, without
 * creating duplicates across runs.
 *
 * A pass holds the ledger lock from the seen-id filter until the ledger is
 * flushed, so concurrent passes (polling loop, on-demand sync) never both
 * create a record for the same session key.
 */
export class Reconciler {
  private readonly ledger: SyncLedger;
  private readonly api: ExternalRecordApi;
  private readonly options: ReconcilerOptions;
  private readonly recorder: RunRecorder | null;

  constructor(
    ledger: SyncLedger,
    api: ExternalRecordApi,
    options: ReconcilerOptions,
    recorder: RunRecorder | null = null
  ) {
    validateClusterOptions(options.cluster);
    this.ledger = ledger;
    this.api = api;
    this.options = options;
    this.recorder = recorder;
  }

  reconcile(events: RawEvent[]): Promise<ReconcileResult> {
    return this.ledger.withLock((state) => this.runPass(state, events));
  }

  private async runPass(state: LedgerState, events: RawEvent[]): Promise<ReconcileResult> {
    const runId = uuidv4();
    const startedAt = new Date().toISOString();
    const markBefore = this.options.markSeen === "before-sync";

    const accepted: RawEvent[] = [];
    const batchIds = new Set<string>();
    let duplicates = 0;
    for (const event of events) {
      if (state.hasSeen(event.id) || batchIds.has(event.id)) {
        duplicates += 1;
        continue;
      }
      batchIds.add(event.id);
      if (markBefore) state.markSeen(event.id);
      accepted.push(event);
    }

    const outcomes: SessionOutcome[] = [];
    const dropped: DroppedSession[] = [];
    let sessionCount = 0;

    if (accepted.length === 0) {
      log.debug("No new events to process");
    } else {
      log.info(`Processing ${accepted.length} new events...`);
      const { cluster } = this.options;
      const sessions = mergeSessions(clusterEvents(accepted, cluster), cluster);
      sessionCount = sessions.length;

      for (const session of sessions) {
        const outcome = await this.syncSession(state, session);
        outcomes.push(outcome);

        if (outcome.action !== "failed") {
          if (!markBefore) outcome.eventIds.forEach((id) => state.markSeen(id));
          continue;
        }
        if (markBefore) {
          dropped.push({ sessionKey: outcome.sessionKey, eventIds: outcome.eventIds });
          log.warn(
            `Dropped after partial failure: ${outcome.sessionKey} ` +
              `(${outcome.eventIds.length} events already marked seen, not retried)`
          );
        } else {
          log.warn(
            `Sync failed for ${outcome.sessionKey}; ` +
              `${outcome.eventIds.length} events will be retried next run`
          );
        }
      }
    }

    const persisted = accepted.length === 0 ? true : state.flush();

    const result: ReconcileResult = {
      runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      received: events.length,
      accepted: accepted.length,
      duplicates,
      sessions: sessionCount,
      created: outcomes.filter((o) => o.action === "created").length,
      updated: outcomes.filter((o) => o.action === "updated").length,
      failed: outcomes.filter((o) => o.action === "failed").length,
      dropped,
      outcomes,
      persisted,
    };

    if (this.recorder) {
      try {
        this.recorder.record(result);
      } catch (err) {
        log.warn(`Could not record sync run ${runId}: ${toErrorMessage(err)}`);
      }
    }
    return result;
  }

  private async syncSession(state: LedgerState, session: WorkSession): Promise<SessionOutcome> {
    const { timezone } = this.options;
    const key = sessionKey(session, timezone);
    const eventIds = session.events.map((e) => e.id);
    const summary =
      `${session.actor} @ ${session.scope}: ` +
      `${session.durationHours.toFixed(2)}h (${session.events.length} commits)`;

    const existingId = state.recordIdFor(key);
    if (existingId) {
      const input = await this.updateInput(existingId, session);
      const updated = await this.call(`update ${key}`, () =>
        this.api.updateRecord(existingId, input)
      );
      if (updated) {
        if (updated.id !== existingId) state.setRecordId(key, updated.id);
        log.info(`Updated session for ${summary}`);
        return { sessionKey: key, action: "updated", recordId: updated.id, eventIds };
      }
      // Known duplicate risk: the old record may still exist remotely.
      log.warn(`Failed to update ${key} (record ${existingId}), creating a new record`);
    }

    const created = await this.call(`create ${key}`, () =>
      this.api.createRecord({
        start: session.start,
        end: session.end,
        description: describeSession(session, timezone),
        projectRef: this.options.projectRef,
      })
    );
    if (created) {
      state.setRecordId(key, created.id);
      log.info(`Created session for ${summary}`);
      return { sessionKey: key, action: "created", recordId: created.id, eventIds };
    }

    log.error(`Failed to create session for ${summary}`);
    return { sessionKey: key, action: "failed", recordId: null, eventIds };
  }

  private async updateInput(recordId: string, session: WorkSession): Promise<RecordInput> {
    const { timezone } = this.options;
    const fresh: RecordInput = {
      start: session.start,
      end: session.end,
      description: describeSession(session, timezone),
    };
    if (!this.api.fetchRecord) return fresh;

    const fetchRecord = this.api.fetchRecord.bind(this.api);
    const existing = await this.call(`read ${recordId}`, () => fetchRecord(recordId));
    return existing ? extendRecord(existing, session, timezone) : fresh;
  }

  /** Run a collaborator call; any error or invalid record becomes null. */
  private async call(
    label: string,
    action: () => Promise<ExternalRecord | null>
  ): Promise<ExternalRecord | null> {
    try {
      const record = await action();
      return isValidRecord(record) ? record : null;
    } catch (err) {
      log.error(`External call failed (${label}): ${toErrorMessage(err)}`);
      return null;
    }
  }
}

function isValidRecord(record: ExternalRecord | null | undefined): record is ExternalRecord {
  if (!record) return false;
  return typeof record.id === "string" && record.id.length > 0;
}

/** One-line summary of a pass, for command output and tool responses. */
export function summarizeResult(result: ReconcileResult): string {
  const parts = [
    `${result.accepted} new of ${result.received} events`,
    `${result.sessions} sessions`,
    `${result.created} created`,
    `${result.updated} updated`,
  ];
  if (result.failed > 0) parts.push(`${result.failed} failed`);
  if (result.dropped.length > 0) parts.push(`${result.dropped.length} dropped`);
  if (!result.persisted) parts.push("ledger not saved");
  return parts.join(", ");
}
