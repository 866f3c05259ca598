import { mkdirSync } from "fs";
import { dirname } from "path";
import Database from "better-sqlite3";
import { toErrorMessage } from "./errors.js";
import * as log from "./log.js";
import type { ReconcileResult, RunRecorder } from "./reconcile.js";
import type { CandidateSource, MatchCandidate } from "../types.js";

/** Pass ":memory:" for a throwaway database. */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS candidates (
      id INTEGER PRIMARY KEY,
      title TEXT NOT NULL,
      is_closed INTEGER NOT NULL DEFAULT 0,
      fetched_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS sync_runs (
      id TEXT PRIMARY KEY,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL,
      received INTEGER NOT NULL,
      accepted INTEGER NOT NULL,
      duplicates INTEGER NOT NULL,
      sessions INTEGER NOT NULL,
      created INTEGER NOT NULL,
      updated INTEGER NOT NULL,
      failed INTEGER NOT NULL,
      dropped INTEGER NOT NULL,
      persisted INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
}

// -- Meta operations --

export function getMeta(db: Database.Database, key: string): string | null {
  const row = db
    .prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?")
    .get(key);
  return row?.value ?? null;
}

export function setMeta(
  db: Database.Database,
  key: string,
  value: string
): void {
  db.prepare(
    "INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
  ).run(key, value);
}

// -- Candidate cache --

interface CandidateRow {
  id: number;
  title: string;
  is_closed: number;
  fetched_at: string;
}

export function upsertCandidates(
  db: Database.Database,
  candidates: MatchCandidate[],
  fetchedAt: Date = new Date()
): void {
  const stmt = db.prepare(
    `INSERT INTO candidates (id, title, is_closed, fetched_at)
     VALUES (@id, @title, @is_closed, @fetched_at)
     ON CONFLICT(id) DO UPDATE SET
       title = excluded.title,
       is_closed = excluded.is_closed,
       fetched_at = excluded.fetched_at`
  );
  const insertAll = db.transaction((rows: MatchCandidate[]) => {
    for (const c of rows) {
      stmt.run({
        id: c.id,
        title: c.title,
        is_closed: c.isClosed ? 1 : 0,
        fetched_at: fetchedAt.toISOString(),
      });
    }
  });
  insertAll(candidates);
}

/**
 * Cached candidates among `ids`. With `maxAgeSeconds` set, entries fetched
 * longer ago than that are left out.
 */
export function getCachedCandidates(
  db: Database.Database,
  ids: number[],
  maxAgeSeconds: number | null,
  now: Date = new Date()
): MatchCandidate[] {
  if (ids.length === 0) return [];
  const cutoff =
    maxAgeSeconds === null ? "" : new Date(now.getTime() - maxAgeSeconds * 1000).toISOString();
  const placeholders = ids.map(() => "?").join(", ");
  const rows = db
    .prepare<Array<number | string>, CandidateRow>(
      `SELECT * FROM candidates WHERE id IN (${placeholders}) AND fetched_at >= ? ORDER BY id`
    )
    .all(...ids, cutoff);
  return rows.map(rowToCandidate);
}

function rowToCandidate(row: CandidateRow): MatchCandidate {
  return { id: row.id, title: row.title, isClosed: row.is_closed === 1 };
}

/**
 * TTL cache in front of a candidate source. Only ids missing from the cache
 * (or expired) are fetched. When the upstream fails, expired entries are
 * served instead.
 */
export class CachedCandidateSource implements CandidateSource {
  private readonly db: Database.Database;
  private readonly upstream: CandidateSource;
  private readonly ttlSeconds: number;
  private readonly now: () => Date;

  constructor(
    db: Database.Database,
    upstream: CandidateSource,
    ttlSeconds: number,
    now: () => Date = () => new Date()
  ) {
    this.db = db;
    this.upstream = upstream;
    this.ttlSeconds = ttlSeconds;
    this.now = now;
  }

  async fetchCandidates(ids: number[]): Promise<MatchCandidate[]> {
    const unique = [...new Set(ids)];
    const fresh = getCachedCandidates(this.db, unique, this.ttlSeconds, this.now());
    const cachedIds = new Set(fresh.map((c) => c.id));
    const missing = unique.filter((id) => !cachedIds.has(id));
    if (missing.length === 0) return fresh;

    log.debug(`Candidate cache: ${fresh.length} hit, ${missing.length} miss`);
    try {
      const fetched = await this.upstream.fetchCandidates(missing);
      upsertCandidates(this.db, fetched, this.now());
      return [...fresh, ...fetched].sort((a, b) => a.id - b.id);
    } catch (err) {
      log.warn(`Candidate fetch failed, using stale cache: ${toErrorMessage(err)}`);
      const stale = getCachedCandidates(this.db, missing, null);
      return [...fresh, ...stale].sort((a, b) => a.id - b.id);
    }
  }
}

// -- Sync run history --

export interface SyncRunRow {
  id: string;
  started_at: string;
  finished_at: string;
  received: number;
  accepted: number;
  duplicates: number;
  sessions: number;
  created: number;
  updated: number;
  failed: number;
  dropped: number;
  persisted: number;
}

export function recordSyncRun(db: Database.Database, result: ReconcileResult): void {
  db.prepare(
    `INSERT INTO sync_runs (id, started_at, finished_at, received, accepted, duplicates,
       sessions, created, updated, failed, dropped, persisted)
     VALUES (@id, @started_at, @finished_at, @received, @accepted, @duplicates,
       @sessions, @created, @updated, @failed, @dropped, @persisted)`
  ).run({
    id: result.runId,
    started_at: result.startedAt,
    finished_at: result.finishedAt,
    received: result.received,
    accepted: result.accepted,
    duplicates: result.duplicates,
    sessions: result.sessions,
    created: result.created,
    updated: result.updated,
    failed: result.failed,
    dropped: result.dropped.length,
    persisted: result.persisted ? 1 : 0,
  });
  setMeta(db, "last_sync_at", result.finishedAt);
}

export function getRecentRuns(db: Database.Database, limit = 10): SyncRunRow[] {
  return db
    .prepare<[number], SyncRunRow>(
      "SELECT * FROM sync_runs ORDER BY finished_at DESC, rowid DESC LIMIT ?"
    )
    .all(limit);
}

export class SqliteRunRecorder implements RunRecorder {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  record(result: ReconcileResult): void {
    recordSyncRun(this.db, result);
  }
}
