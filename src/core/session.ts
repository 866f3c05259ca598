import { compareText } from "./cluster.js";
import { localDate, localTime } from "./time.js";
import type { ExternalRecord, RecordInput, WorkSession } from "../types.js";

/**
 * Ledger key of a session: "<YYYY-MM-DD>_<actor>_<scope>", the date being the
 * session start in the configured timezone. One external record per key.
 */
export function sessionKey(session: WorkSession, timeZone: string): string {
  return `${localDate(session.start, timeZone)}_${session.actor}_${session.scope}`;
}

/** "{scope}: {n} commits ({HH:MM}–{HH:MM})" */
export function describeRange(
  scope: string,
  eventCount: number,
  start: Date,
  end: Date,
  timeZone: string
): string {
  return `${scope}: ${eventCount} commits (${localTime(start, timeZone)}–${localTime(end, timeZone)})`;
}

export function describeSession(session: WorkSession, timeZone: string): string {
  return describeRange(
    session.scope,
    session.events.length,
    session.start,
    session.end,
    timeZone
  );
}

const DESCRIPTION_COUNT_RE = /: (\d+) commits \(\d{2}:\d{2}–\d{2}:\d{2}\)$/;

/**
 * Widen an existing record to cover a newly reconciled session.
 * The commit count carries over when the record still has our description
 * format; otherwise only the new session's events are counted.
 */
export function extendRecord(
  existing: ExternalRecord,
  session: WorkSession,
  timeZone: string
): RecordInput {
  const start = new Date(Math.min(existing.start.getTime(), session.start.getTime()));
  const end = new Date(Math.max(existing.end.getTime(), session.end.getTime()));
  const previous = DESCRIPTION_COUNT_RE.exec(existing.description);
  const count = session.events.length + (previous ? Number(previous[1]) : 0);
  return {
    start,
    end,
    description: describeRange(session.scope, count, start, end, timeZone),
  };
}

export interface DailyHours {
  date: string; // YYYY-MM-DD
  actor: string;
  hours: number;
}

/** Sum session durations per (local date, actor), sorted by date then actor. */
export function dailyHours(sessions: WorkSession[], timeZone: string): DailyHours[] {
  const totals = new Map<string, DailyHours>();
  for (const session of sessions) {
    const date = localDate(session.start, timeZone);
    const key = JSON.stringify([date, session.actor]);
    const entry = totals.get(key);
    if (entry) entry.hours += session.durationHours;
    else totals.set(key, { date, actor: session.actor, hours: session.durationHours });
  }
  return Array.from(totals.values()).sort(
    (a, b) => compareText(a.date, b.date) || compareText(a.actor, b.actor)
  );
}

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);

/**
 * Human-readable summary of sessions grouped by actor.
 */
export function formatSessions(sessions: WorkSession[], timeZone: string): string {
  if (sessions.length === 0) return "No work sessions detected";

  const lines = ["Work Sessions Detected:", RULE];
  const sorted = [...sessions].sort(
    (a, b) => compareText(a.actor, b.actor) || a.start.getTime() - b.start.getTime()
  );

  let actor: string | null = null;
  let total = 0;
  for (const session of sorted) {
    if (session.actor !== actor) {
      if (actor !== null) lines.push(`  Total: ${total.toFixed(2)} hours`);
      actor = session.actor;
      total = 0;
      lines.push("", `${actor}:`, THIN_RULE);
    }
    lines.push(
      `  ${localDate(session.start, timeZone)} ${localTime(session.start, timeZone)} - ` +
        `${localTime(session.end, timeZone)} (${session.durationHours.toFixed(2)}h) | ` +
        describeSession(session, timeZone)
    );
    total += session.durationHours;
  }
  lines.push(`  Total: ${total.toFixed(2)} hours`);

  return lines.join("\n");
}
