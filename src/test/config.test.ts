import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { join } from "path";
import { loadConfig } from "../core/config.js";
import { ConfigError } from "../core/errors.js";

describe("config", () => {
  it("applies defaults", () => {
    const config = loadConfig({ WORKLOG_HOME: "/tmp/worklog-home" });
    assert.equal(config.ledgerPath, join("/tmp/worklog-home", "ledger.json"));
    assert.equal(config.dbPath, join("/tmp/worklog-home", "cache.db"));
    assert.equal(config.timezone, "UTC");
    assert.deepEqual(config.cluster, {
      tauHours: 2.5,
      clusterThreshold: 0.1,
      maxSessionHours: 4,
      minClusterGapMinutes: 30,
    });
    assert.equal(config.pollIntervalMs, 60_000);
    assert.equal(config.historyDays, 7);
    assert.equal(config.markSeen, "before-sync");
    assert.equal(config.matchStrategy, "hybrid");
    assert.equal(config.debug, false);
    assert.equal(config.clockify.baseUrl, "https://api.clockify.me/api/v1");
    assert.equal(config.github.username, null);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      WORKLOG_TIMEZONE: "Europe/Berlin",
      WORKLOG_TAU_HOURS: "1.5",
      WORKLOG_MIN_CLUSTER_GAP_MINUTES: "0",
      WORKLOG_MARK_SEEN: "after-sync",
      WORKLOG_START_DATE: "2024-03-01",
      WORKLOG_DEBUG: "1",
      GITHUB_ORG: "acme",
      CLOCKIFY_API_KEY: "test-secret",
      CLOCKIFY_WORKSPACE_ID: "ws-1",
    });
    assert.equal(config.timezone, "Europe/Berlin");
    assert.equal(config.cluster.tauHours, 1.5);
    assert.equal(config.cluster.minClusterGapMinutes, 0);
    assert.equal(config.markSeen, "after-sync");
    assert.equal(config.startDate, "2024-03-01");
    assert.equal(config.debug, true);
    assert.equal(config.github.org, "acme");
    assert.equal(config.clockify.apiKey, "test-secret");
  });

  it("treats empty variables as unset", () => {
    const config = loadConfig({ GITHUB_USERNAME: "  ", WORKLOG_TIMEZONE: "" });
    assert.equal(config.github.username, null);
    assert.equal(config.timezone, "UTC");
  });

  it("fails fast on a non-positive tau", () => {
    assert.throws(() => loadConfig({ WORKLOG_TAU_HOURS: "0" }), ConfigError);
  });

  it("names every invalid variable", () => {
    assert.throws(
      () => loadConfig({ WORKLOG_TIMEZONE: "Mars/Olympus", WORKLOG_MARK_SEEN: "never" }),
      (err: unknown) =>
        err instanceof ConfigError &&
        err.message.includes("WORKLOG_TIMEZONE: unknown IANA timezone") &&
        err.message.includes("WORKLOG_MARK_SEEN")
    );
  });

  it("rejects malformed dates", () => {
    assert.throws(() => loadConfig({ WORKLOG_END_DATE: "03/01/2024" }), /expected YYYY-MM-DD/);
  });
});
