import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { Mutex } from "./mutex.js";
import { toErrorMessage } from "./errors.js";
import * as log from "./log.js";

/**
 * On-disk ledger format. Field names are fixed: existing state files written
 * by earlier deployments must keep loading.
 */
export interface LedgerFile {
  seen_commits: string[];
  clockify_entries: Record<string, string>; // session key -> external record id
}

const LedgerFileSchema = z.object({
  seen_commits: z.array(z.string()).default([]),
  clockify_entries: z.record(z.string()).default({}),
});

/**
 * View of the ledger handed to a withLock action. Only valid for the
 * duration of that action.
 */
export interface LedgerState {
  hasSeen(eventId: string): boolean;
  /** Record an event id; false when it was already seen. Ids are never removed. */
  markSeen(eventId: string): boolean;
  readonly seenCount: number;
  recordIdFor(sessionKey: string): string | null;
  setRecordId(sessionKey: string, recordId: string): void;
  readonly indexSize: number;
  snapshot(): LedgerFile;
  /** Write the current snapshot to disk. False (and logged) on failure. */
  flush(): boolean;
}

/**
 * Durable idempotency store: which events were already processed, and which
 * external record each session key maps to. All access is serialized through
 * one mutex owned by the ledger.
 */
export class SyncLedger {
  private readonly seen: Set<string>;
  private readonly index: Map<string, string>;
  private readonly mutex = new Mutex();
  readonly path: string | null;

  /** A null path keeps the ledger in memory only. */
  constructor(path: string | null, data?: LedgerFile) {
    this.path = path;
    this.seen = new Set(data?.seen_commits ?? []);
    this.index = new Map(Object.entries(data?.clockify_entries ?? {}));
  }

  /**
   * Load from disk. A missing file gives an empty ledger; an unreadable or
   * invalid one is logged and also starts empty.
   */
  static load(path: string): SyncLedger {
    const data = readLedgerFile(path);
    if (data) {
      log.info(
        `Loaded ledger: ${data.seen_commits.length} seen events, ` +
          `${Object.keys(data.clockify_entries).length} synced sessions`
      );
    }
    return new SyncLedger(path, data ?? undefined);
  }

  withLock<T>(action: (state: LedgerState) => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(() => action(this.state()));
  }

  persist(): Promise<boolean> {
    return this.withLock((state) => state.flush());
  }

  stats(): Promise<{ seenEvents: number; sessions: number }> {
    return this.withLock((state) => ({
      seenEvents: state.seenCount,
      sessions: state.indexSize,
    }));
  }

  private state(): LedgerState {
    const { seen, index, path } = this;
    const snapshot = (): LedgerFile => ({
      seen_commits: Array.from(seen),
      clockify_entries: Object.fromEntries(index),
    });

    return {
      hasSeen: (eventId) => seen.has(eventId),
      markSeen: (eventId) => {
        if (seen.has(eventId)) return false;
        seen.add(eventId);
        return true;
      },
      get seenCount() {
        return seen.size;
      },
      recordIdFor: (key) => index.get(key) ?? null,
      setRecordId: (key, recordId) => {
        index.set(key, recordId);
      },
      get indexSize() {
        return index.size;
      },
      snapshot,
      flush: () => {
        if (!path) return true;
        try {
          writeLedgerFile(path, snapshot());
          return true;
        } catch (err) {
          log.error(`Could not write ledger to ${path}: ${toErrorMessage(err)}`);
          return false;
        }
      },
    };
  }
}

export function readLedgerFile(path: string): LedgerFile | null {
  if (!existsSync(path)) return null;
  try {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return LedgerFileSchema.parse(raw);
  } catch (err) {
    log.error(`Could not load ledger from ${path}, starting empty: ${toErrorMessage(err)}`);
    return null;
  }
}

/**
 * Full-snapshot write through a temporary file and a rename, so a crash
 * mid-write leaves the previous file intact.
 */
export function writeLedgerFile(path: string, data: LedgerFile): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.tmp`;
  writeFileSync(tmpPath, JSON.stringify(data, null, 2), "utf-8");
  renameSync(tmpPath, path);
}
