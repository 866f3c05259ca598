import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ScheduledTask } from "../core/task.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("task", () => {
  it("runs a single pass on demand", async () => {
    let runs = 0;
    const task = new ScheduledTask("test", async () => {
      runs += 1;
    }, 1000);
    await task.runOnce();
    assert.equal(runs, 1);
    assert.equal(task.running, false);
  });

  it("swallows and logs a failing pass", async () => {
    const task = new ScheduledTask("test", async () => {
      throw new Error("boom");
    }, 1000);
    await task.runOnce();
    assert.equal(task.busy, false);
  });

  it("runs immediately on start and again on the interval", async () => {
    let runs = 0;
    const task = new ScheduledTask("test", async () => {
      runs += 1;
    }, 10);
    task.start();
    assert.equal(runs, 1);
    await sleep(35);
    await task.stop();
    assert.ok(runs >= 2, `expected at least 2 runs, got ${runs}`);
  });

  it("skips ticks while a pass is still running", async () => {
    let runs = 0;
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const task = new ScheduledTask("test", async () => {
      runs += 1;
      await gate;
    }, 5);

    task.start();
    await sleep(30);
    assert.equal(runs, 1);
    release();
    await task.stop();
  });

  it("aborts the signal and waits for the pass on stop", async () => {
    let sawAbort = false;
    let finished = false;
    const task = new ScheduledTask("test", async (signal) => {
      await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve()));
      sawAbort = signal.aborted;
      finished = true;
    }, 1000);

    task.start();
    await task.stop();
    assert.equal(sawAbort, true);
    assert.equal(finished, true);
    assert.equal(task.running, false);
  });

  it("rejects a non-positive interval", () => {
    assert.throws(() => new ScheduledTask("test", async () => {}, 0), /interval must be positive/);
  });
});
