import { describe, it, after } from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { CommitTracker } from "../core/tracker.js";
import { Reconciler } from "../core/reconcile.js";
import { SyncLedger } from "../core/ledger.js";
import { DEFAULT_CLUSTER_OPTIONS } from "../core/cluster.js";
import { ConfigError } from "../core/errors.js";
import { makeEvent } from "./helpers.js";
import type { EventSource, ExternalRecord, RawEvent, RecordInput, TimeWindow } from "../types.js";

class FakeSource implements EventSource {
  windows: TimeWindow[] = [];
  constructor(private readonly events: RawEvent[] = []) {}

  async fetchEvents(window: TimeWindow): Promise<RawEvent[]> {
    this.windows.push(window);
    return this.events;
  }
}

const api = {
  created: 0,
  async createRecord(input: RecordInput & { projectRef: string | null }): Promise<ExternalRecord> {
    this.created += 1;
    return { id: `rec-${this.created}`, ...input };
  },
  async updateRecord(id: string, input: RecordInput): Promise<ExternalRecord> {
    return { id, projectRef: null, ...input };
  },
};

function makeConfig(overrides: Partial<ConstructorParameters<typeof CommitTracker>[0]> = {}) {
  return {
    timezone: "UTC",
    historyDays: 7,
    startDate: null,
    endDate: null,
    pollIntervalMs: 60_000,
    github: { token: null, username: "alice", org: null },
    ...overrides,
  };
}

function makeTracker(
  config = makeConfig(),
  source: EventSource = new FakeSource(),
  ledger = new SyncLedger(null)
): CommitTracker {
  const reconciler = new Reconciler(ledger, api, {
    timezone: config.timezone,
    cluster: DEFAULT_CLUSTER_OPTIONS,
    markSeen: "before-sync",
    projectRef: null,
  });
  return new CommitTracker(config, source, reconciler, ledger, () => new Date("2024-03-10T15:00:00Z"));
}

describe("tracker", () => {
  const dir = mkdtempSync(join(tmpdir(), "worklog-tracker-"));
  after(() => rmSync(dir, { recursive: true, force: true }));

  describe("dateRange", () => {
    it("covers historyDays before today through the end of today", () => {
      const { since, until } = makeTracker().dateRange();
      assert.equal(since.toISOString(), "2024-03-03T00:00:00.000Z");
      assert.equal(until.toISOString(), "2024-03-10T23:59:59.999Z");
    });

    it("uses explicit dates as whole local days", () => {
      const tracker = makeTracker(
        makeConfig({ timezone: "America/New_York", startDate: "2024-03-01", endDate: "2024-03-02" })
      );
      const { since, until } = tracker.dateRange();
      assert.equal(since.toISOString(), "2024-03-01T05:00:00.000Z");
      assert.equal(until.toISOString(), "2024-03-03T04:59:59.999Z");
    });

    it("rejects a start date after the end date", () => {
      const tracker = makeTracker(makeConfig({ startDate: "2024-03-05", endDate: "2024-03-01" }));
      assert.throws(() => tracker.dateRange(), ConfigError);
    });
  });

  it("requires a GitHub user or organization", () => {
    assert.throws(
      () => makeTracker(makeConfig({ github: { token: null, username: null, org: null } })),
      ConfigError
    );
  });

  it("reconciles the historical window", async () => {
    const source = new FakeSource([makeEvent({ id: "h1" })]);
    const result = await makeTracker(makeConfig(), source).syncHistorical();
    assert.equal(source.windows.length, 1);
    assert.equal(source.windows[0].since.toISOString(), "2024-03-03T00:00:00.000Z");
    assert.equal(result.accepted, 1);
  });

  it("polls the last 24 hours", async () => {
    const source = new FakeSource();
    await makeTracker(makeConfig(), source).pollOnce();
    assert.equal(source.windows[0].since.toISOString(), "2024-03-09T15:00:00.000Z");
    assert.equal(source.windows[0].until.toISOString(), "2024-03-10T15:00:00.000Z");
  });

  it("polls once on start, then persists the ledger on stop", async () => {
    const source = new FakeSource([makeEvent({ id: "p1" })]);
    const path = join(dir, "ledger.json");
    const tracker = makeTracker(makeConfig(), source, new SyncLedger(path));

    await tracker.start({ skipHistorical: true });
    assert.equal(tracker.running, true);
    await tracker.stop();

    assert.equal(tracker.running, false);
    assert.equal(source.windows.length, 1);
    assert.equal(existsSync(path), true);
  });

  it("backfills before polling unless told to skip", async () => {
    const source = new FakeSource();
    const tracker = makeTracker(makeConfig(), source);
    await tracker.start();
    await tracker.stop();
    assert.equal(source.windows.length, 2);
    assert.equal(source.windows[0].since.toISOString(), "2024-03-03T00:00:00.000Z");
  });

  it("aborts a slow fetch on stop and skips reconciling it", async () => {
    let sawAbort = false;
    const source: EventSource = {
      fetchEvents: (_window, signal) =>
        new Promise((resolve) => {
          const timer = setTimeout(() => resolve([makeEvent({ id: "late" })]), 5000);
          signal?.addEventListener("abort", () => {
            clearTimeout(timer);
            sawAbort = true;
            resolve([makeEvent({ id: "late" })]);
          });
        }),
    };
    const ledger = new SyncLedger(null);
    const tracker = makeTracker(makeConfig(), source, ledger);

    const startedAt = Date.now();
    await tracker.start({ skipHistorical: true });
    await tracker.stop();

    assert.equal(sawAbort, true);
    assert.ok(Date.now() - startedAt < 1000, "stop waited for the whole fetch");
    assert.deepEqual(await ledger.stats(), { seenEvents: 0, sessions: 0 });
  });
});
