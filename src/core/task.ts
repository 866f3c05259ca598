import { toErrorMessage } from "./errors.js";
import * as log from "./log.js";

export type TaskRun = (signal: AbortSignal) => Promise<void>;

/**
 * Runs a pass immediately and then every `intervalMs`. A tick that fires while
 * the previous pass is still running is skipped. Errors are logged and the
 * schedule continues.
 */
export class ScheduledTask {
  readonly name: string;
  private readonly run: TaskRun;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private controller = new AbortController();
  private inFlight: Promise<void> | null = null;

  constructor(name: string, run: TaskRun, intervalMs: number) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`${name}: interval must be positive, got ${intervalMs}`);
    }
    this.name = name;
    this.run = run;
    this.intervalMs = intervalMs;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  /** One pass. Resolves once it finishes; never rejects. Joins a pass already in flight. */
  runOnce(): Promise<void> {
    if (this.inFlight) return this.inFlight;

    const pass = this.execute().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pass;
    return pass;
  }

  start(): void {
    if (this.timer) return;
    if (this.controller.signal.aborted) this.controller = new AbortController();

    void this.runOnce();
    this.timer = setInterval(() => {
      if (this.inFlight) {
        log.debug(`${this.name}: previous pass still running, skipping tick`);
        return;
      }
      void this.runOnce();
    }, this.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller.abort();
    if (this.inFlight) await this.inFlight;
  }

  private async execute(): Promise<void> {
    try {
      await this.run(this.controller.signal);
    } catch (err) {
      if (this.controller.signal.aborted) {
        log.debug(`${this.name}: pass cancelled (${toErrorMessage(err)})`);
        return;
      }
      log.error(`${this.name} failed: ${toErrorMessage(err)}`);
    }
  }
}
