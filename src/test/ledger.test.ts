import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { SyncLedger, readLedgerFile, writeLedgerFile } from "../core/ledger.js";
import { Mutex } from "../core/mutex.js";

describe("ledger", () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "worklog-ledger-"));
    path = join(dir, "state", "ledger.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    const ledger = SyncLedger.load(path);
    assert.deepEqual(await ledger.stats(), { seenEvents: 0, sessions: 0 });
  });

  it("round-trips seen ids and the session index", async () => {
    const ledger = SyncLedger.load(path);
    await ledger.withLock((state) => {
      state.markSeen("sha-1");
      state.markSeen("sha-2");
      state.setRecordId("2024-03-04_alice_acme/api", "rec-1");
    });
    assert.equal(await ledger.persist(), true);

    const reloaded = SyncLedger.load(path);
    const snapshot = await reloaded.withLock((state) => state.snapshot());
    assert.deepEqual(snapshot, {
      seen_commits: ["sha-1", "sha-2"],
      clockify_entries: { "2024-03-04_alice_acme/api": "rec-1" },
    });
  });

  it("writes the established file format", () => {
    writeLedgerFile(path, { seen_commits: ["a"], clockify_entries: { k: "r" } });
    assert.equal(
      readFileSync(path, "utf-8"),
      '{\n  "seen_commits": [\n    "a"\n  ],\n  "clockify_entries": {\n    "k": "r"\n  }\n}'
    );
    assert.equal(existsSync(`${path}.${process.pid}.tmp`), false);
  });

  it("reports whether an id was new", async () => {
    const ledger = new SyncLedger(null);
    const results = await ledger.withLock((state) => [
      state.markSeen("x"),
      state.markSeen("x"),
      state.hasSeen("x"),
      state.hasSeen("y"),
    ]);
    assert.deepEqual(results, [true, false, true, false]);
  });

  it("overwrites a session mapping", async () => {
    const ledger = new SyncLedger(null, {
      seen_commits: [],
      clockify_entries: { key: "old" },
    });
    const id = await ledger.withLock((state) => {
      state.setRecordId("key", "new");
      return state.recordIdFor("key");
    });
    assert.equal(id, "new");
  });

  it("starts empty from a corrupt file", async () => {
    writeLedgerFile(path, { seen_commits: [], clockify_entries: {} });
    writeFileSync(path, "{ not json", "utf-8");
    assert.equal(readLedgerFile(path), null);
    assert.deepEqual(await SyncLedger.load(path).stats(), { seenEvents: 0, sessions: 0 });
  });

  it("fills in missing fields", () => {
    writeFileSync(join(dir, "partial.json"), '{"seen_commits":["a"]}', "utf-8");
    assert.deepEqual(readLedgerFile(join(dir, "partial.json")), {
      seen_commits: ["a"],
      clockify_entries: {},
    });
  });

  it("reports a failed write without throwing", async () => {
    // A directory where the file should be makes the rename fail.
    const blocked = join(dir, "blocked");
    writeLedgerFile(join(blocked, "inner.json"), { seen_commits: [], clockify_entries: {} });
    const ledger = new SyncLedger(blocked);
    assert.equal(await ledger.persist(), false);
  });

  it("memory-only ledgers always flush successfully", async () => {
    assert.equal(await new SyncLedger(null).persist(), true);
  });

  it("serializes concurrent access", async () => {
    const ledger = new SyncLedger(null);
    const order: string[] = [];
    const slow = ledger.withLock(async (state) => {
      order.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 20));
      state.markSeen("slow");
      order.push("slow:end");
    });
    const fast = ledger.withLock((state) => {
      order.push(`fast:${state.hasSeen("slow")}`);
    });
    await Promise.all([slow, fast]);
    assert.deepEqual(order, ["slow:start", "slow:end", "fast:true"]);
  });

  describe("Mutex", () => {
    it("releases the lock after a failing action", async () => {
      const mutex = new Mutex();
      await assert.rejects(
        mutex.runExclusive(() => {
          throw new Error("boom");
        }),
        /boom/
      );
      assert.equal(mutex.locked, false);
      assert.equal(await mutex.runExclusive(() => 42), 42);
    });
  });
});
