import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type Database from "better-sqlite3";
import {
  CachedCandidateSource,
  SqliteRunRecorder,
  getCachedCandidates,
  getMeta,
  getRecentRuns,
  openDatabase,
  setMeta,
  upsertCandidates,
} from "../core/db.js";
import type { ReconcileResult } from "../core/reconcile.js";
import type { CandidateSource, MatchCandidate } from "../types.js";

function makeResult(overrides: Partial<ReconcileResult> = {}): ReconcileResult {
  return {
    runId: "run-1",
    startedAt: "2024-03-04T09:00:00.000Z",
    finishedAt: "2024-03-04T09:00:05.000Z",
    received: 3,
    accepted: 2,
    duplicates: 1,
    sessions: 1,
    created: 1,
    updated: 0,
    failed: 0,
    dropped: [],
    outcomes: [],
    persisted: true,
    ...overrides,
  };
}

class FakeUpstream implements CandidateSource {
  calls: number[][] = [];
  fail = false;
  constructor(private readonly items: MatchCandidate[]) {}

  async fetchCandidates(ids: number[]): Promise<MatchCandidate[]> {
    this.calls.push(ids);
    if (this.fail) throw new Error("service unavailable");
    return this.items.filter((c) => ids.includes(c.id));
  }
}

const T0 = new Date("2024-03-04T10:00:00Z");
const minutesAfter = (m: number) => new Date(T0.getTime() + m * 60_000);

describe("db", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("stores meta values", () => {
    assert.equal(getMeta(db, "missing"), null);
    setMeta(db, "k", "v1");
    setMeta(db, "k", "v2");
    assert.equal(getMeta(db, "k"), "v2");
  });

  describe("candidate cache", () => {
    it("returns only entries younger than the max age", () => {
      upsertCandidates(db, [{ id: 1234, title: "Payment API", isClosed: true }], T0);
      assert.deepEqual(getCachedCandidates(db, [1234, 5678], 3600, minutesAfter(30)), [
        { id: 1234, title: "Payment API", isClosed: true },
      ]);
      assert.deepEqual(getCachedCandidates(db, [1234], 600, minutesAfter(30)), []);
      assert.equal(getCachedCandidates(db, [1234], null, minutesAfter(600)).length, 1);
    });

    it("fetches only ids that are missing or expired", async () => {
      const upstream = new FakeUpstream([
        { id: 1111, title: "One", isClosed: false },
        { id: 2222, title: "Two", isClosed: false },
      ]);
      let now = T0;
      const source = new CachedCandidateSource(db, upstream, 3600, () => now);

      assert.deepEqual((await source.fetchCandidates([2222, 1111, 2222])).map((c) => c.id), [1111, 2222]);
      assert.deepEqual(upstream.calls, [[2222, 1111]]);

      now = minutesAfter(10);
      await source.fetchCandidates([1111]);
      assert.equal(upstream.calls.length, 1);

      now = minutesAfter(120);
      await source.fetchCandidates([1111]);
      assert.deepEqual(upstream.calls[1], [1111]);
    });

    it("serves expired entries when the upstream fails", async () => {
      upsertCandidates(db, [{ id: 1111, title: "One", isClosed: false }], T0);
      const upstream = new FakeUpstream([]);
      upstream.fail = true;
      const source = new CachedCandidateSource(db, upstream, 60, () => minutesAfter(600));

      const result = await source.fetchCandidates([1111, 3333]);
      assert.deepEqual(result, [{ id: 1111, title: "One", isClosed: false }]);
    });
  });

  describe("sync runs", () => {
    it("records runs and the last sync time", () => {
      const recorder = new SqliteRunRecorder(db);
      recorder.record(makeResult());
      recorder.record(
        makeResult({
          runId: "run-2",
          finishedAt: "2024-03-04T10:00:05.000Z",
          failed: 1,
          dropped: [{ sessionKey: "k", eventIds: ["a"] }],
          persisted: false,
        })
      );

      const runs = getRecentRuns(db, 10);
      assert.deepEqual(runs.map((r) => r.id), ["run-2", "run-1"]);
      assert.equal(runs[0].dropped, 1);
      assert.equal(runs[0].persisted, 0);
      assert.equal(runs[1].accepted, 2);
      assert.equal(getMeta(db, "last_sync_at"), "2024-03-04T10:00:05.000Z");
    });

    it("limits the history", () => {
      const recorder = new SqliteRunRecorder(db);
      for (let i = 0; i < 3; i++) {
        recorder.record(makeResult({ runId: `run-${i}`, finishedAt: `2024-03-04T1${i}:00:00.000Z` }));
      }
      assert.deepEqual(getRecentRuns(db, 2).map((r) => r.id), ["run-2", "run-1"]);
    });
  });
});
