import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mergeSessions } from "../core/merge.js";
import { at, makeEvent, makeSession } from "./helpers.js";

const options = { minClusterGapMinutes: 30, maxSessionHours: 4 };

describe("merge", () => {
  it("fuses sessions separated by a short gap", () => {
    const morning = makeSession({
      start: at("10:00"),
      end: at("12:00"),
      events: [makeEvent({ id: "a", timestamp: at("10:00") }), makeEvent({ id: "b", timestamp: at("12:00") })],
    });
    const noon = makeSession({
      start: at("12:20"),
      end: at("13:00"),
      events: [makeEvent({ id: "c", timestamp: at("12:20") }), makeEvent({ id: "d", timestamp: at("13:00") })],
    });

    const merged = mergeSessions([noon, morning], options);
    assert.equal(merged.length, 1);
    assert.equal(merged[0].start.toISOString(), "2024-03-04T10:00:00.000Z");
    assert.equal(merged[0].end.toISOString(), "2024-03-04T13:00:00.000Z");
    assert.equal(merged[0].durationHours, 3);
    assert.deepEqual(merged[0].events.map((e) => e.id), ["a", "b", "c", "d"]);
  });

  it("keeps sessions apart when the gap is too long", () => {
    const merged = mergeSessions(
      [
        makeSession({ start: at("09:00"), end: at("10:00") }),
        makeSession({ start: at("10:31"), end: at("11:00") }),
      ],
      options
    );
    assert.equal(merged.length, 2);
  });

  it("merges at exactly the configured gap", () => {
    const merged = mergeSessions(
      [
        makeSession({ start: at("09:00"), end: at("10:00") }),
        makeSession({ start: at("10:30"), end: at("11:00") }),
      ],
      options
    );
    assert.equal(merged.length, 1);
  });

  it("caps the merged duration", () => {
    const merged = mergeSessions(
      [
        makeSession({ start: at("08:00"), end: at("11:00") }),
        makeSession({ start: at("11:10"), end: at("13:00") }),
      ],
      options
    );
    assert.equal(merged[0].durationHours, 4);
    assert.equal(merged[0].end.toISOString(), "2024-03-04T13:00:00.000Z");
  });

  it("never merges across actors or scopes", () => {
    const merged = mergeSessions(
      [
        makeSession({ start: at("09:00"), end: at("10:00") }),
        makeSession({ actor: "bob", start: at("10:05"), end: at("11:00") }),
        makeSession({ scope: "acme/web", start: at("10:05"), end: at("11:00") }),
      ],
      options
    );
    assert.deepEqual(
      merged.map((s) => `${s.actor}|${s.scope}`),
      ["alice|acme/api", "alice|acme/web", "bob|acme/api"]
    );
  });

  it("chains merges in a single pass", () => {
    const merged = mergeSessions(
      [
        makeSession({ start: at("09:00"), end: at("09:30") }),
        makeSession({ start: at("09:50"), end: at("10:10") }),
        makeSession({ start: at("10:30"), end: at("10:45") }),
      ],
      options
    );
    assert.equal(merged.length, 1);
    assert.equal(merged[0].end.toISOString(), "2024-03-04T10:45:00.000Z");
    assert.equal(merged[0].durationHours, 1.75);
  });

  it("takes the next session's end even when it ends earlier", () => {
    const merged = mergeSessions(
      [
        makeSession({ start: at("09:00"), end: at("12:00") }),
        makeSession({ start: at("10:00"), end: at("10:15") }),
      ],
      options
    );
    assert.equal(merged.length, 1);
    assert.equal(merged[0].end.toISOString(), "2024-03-04T10:15:00.000Z");
  });

  it("returns the input unchanged when merging is disabled", () => {
    const sessions = [
      makeSession({ start: at("09:00"), end: at("10:00") }),
      makeSession({ start: at("10:05"), end: at("11:00") }),
    ];
    assert.equal(mergeSessions(sessions, { ...options, minClusterGapMinutes: 0 }), sessions);
  });

  it("returns an empty list for no sessions", () => {
    assert.deepEqual(mergeSessions([], options), []);
  });
});
