import { ConfigError } from "./errors.js";
import type { RawEvent, WorkSession } from "../types.js";

export interface ClusterOptions {
  /** Exponential-decay time constant, in hours. */
  tauHours: number;
  /** Weight below which two consecutive events start a new session. */
  clusterThreshold: number;
  maxSessionHours: number;
  /** Merger pass: fuse sessions whose gap is at most this. <= 0 disables merging. */
  minClusterGapMinutes: number;
}

export const DEFAULT_CLUSTER_OPTIONS: ClusterOptions = {
  tauHours: 2.5,
  clusterThreshold: 0.1,
  maxSessionHours: 4.0,
  minClusterGapMinutes: 30,
};

export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_MINUTE = 60 * 1000;

/** A lone event still represents some work: it is booked as 15 minutes. */
const SINGLE_EVENT_MS = 15 * MS_PER_MINUTE;
const SINGLE_EVENT_HOURS = 0.25;

export function validateClusterOptions(options: ClusterOptions): void {
  if (!Number.isFinite(options.tauHours) || options.tauHours <= 0) {
    throw new ConfigError(`tauHours must be a positive number, got ${options.tauHours}`);
  }
  if (
    !Number.isFinite(options.clusterThreshold) ||
    options.clusterThreshold <= 0 ||
    options.clusterThreshold > 1
  ) {
    throw new ConfigError(
      `clusterThreshold must be in (0, 1], got ${options.clusterThreshold}`
    );
  }
  if (!Number.isFinite(options.maxSessionHours) || options.maxSessionHours <= 0) {
    throw new ConfigError(
      `maxSessionHours must be a positive number, got ${options.maxSessionHours}`
    );
  }
  if (!Number.isFinite(options.minClusterGapMinutes)) {
    throw new ConfigError(
      `minClusterGapMinutes must be a finite number, got ${options.minClusterGapMinutes}`
    );
  }
}

/**
 * Temporal proximity weight of an event relative to its predecessor:
 * W = e^(-Δt / τ). Equal timestamps weigh 1.0 and never split a session.
 */
export function decayWeight(gapHours: number, tauHours: number): number {
  return Math.exp(-gapHours / tauHours);
}

/**
 * Group events into work sessions per (actor, scope).
 *
 * Within a partition, events are walked in time order and a new session
 * starts whenever the decay weight of the gap to the previous event drops
 * below the cluster threshold. With the defaults (τ = 2.5h, threshold 0.1)
 * that is a gap of about 5.75h, but only the formula decides.
 *
 * Output is ordered by actor, scope, then start time, independent of the
 * input order.
 */
export function clusterEvents(
  events: RawEvent[],
  options: ClusterOptions = DEFAULT_CLUSTER_OPTIONS
): WorkSession[] {
  validateClusterOptions(options);
  if (events.length === 0) return [];

  const sessions: WorkSession[] = [];

  for (const partition of partitionEvents(events)) {
    let current: RawEvent[] = [partition[0]];

    for (let i = 1; i < partition.length; i++) {
      const gapHours =
        (partition[i].timestamp.getTime() - partition[i - 1].timestamp.getTime()) /
        MS_PER_HOUR;

      if (decayWeight(gapHours, options.tauHours) < options.clusterThreshold) {
        sessions.push(buildSession(current, options.maxSessionHours));
        current = [];
      }
      current.push(partition[i]);
    }

    sessions.push(buildSession(current, options.maxSessionHours));
  }

  return sessions;
}

/**
 * Build a session from time-ordered events of one (actor, scope).
 * A session whose events all share one instant is booked like a single
 * event, so every session has a positive duration.
 */
export function buildSession(events: RawEvent[], maxSessionHours: number): WorkSession {
  const first = events[0];
  const last = events[events.length - 1];
  const startMs = first.timestamp.getTime();
  const spanMs = last.timestamp.getTime() - startMs;

  if (spanMs <= 0) {
    return {
      actor: first.actor,
      scope: first.scope,
      start: new Date(startMs),
      end: new Date(startMs + SINGLE_EVENT_MS),
      events: [...events],
      durationHours: Math.min(SINGLE_EVENT_HOURS, maxSessionHours),
    };
  }

  return {
    actor: first.actor,
    scope: first.scope,
    start: new Date(startMs),
    end: new Date(startMs + spanMs),
    events: [...events],
    durationHours: Math.min(spanMs / MS_PER_HOUR, maxSessionHours),
  };
}

/**
 * Split events by (actor, scope), each partition sorted by timestamp
 * (event id breaks ties), partitions ordered by actor then scope.
 */
export function partitionEvents(events: RawEvent[]): RawEvent[][] {
  const groups = new Map<string, RawEvent[]>();
  for (const event of events) {
    const key = JSON.stringify([event.actor, event.scope]);
    const group = groups.get(key);
    if (group) group.push(event);
    else groups.set(key, [event]);
  }

  return Array.from(groups.values())
    .map((group) => [...group].sort(compareEvents))
    .sort((a, b) => compareText(a[0].actor, b[0].actor) || compareText(a[0].scope, b[0].scope));
}

function compareEvents(a: RawEvent, b: RawEvent): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || compareText(a.id, b.id);
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
