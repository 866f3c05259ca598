import { MS_PER_HOUR, MS_PER_MINUTE, compareText } from "./cluster.js";
import type { WorkSession } from "../types.js";

export interface MergeOptions {
  minClusterGapMinutes: number;
  maxSessionHours: number;
}

/**
 * Fuse sessions of the same (actor, scope) separated by a small gap.
 *
 * Single left-to-right pass over each group sorted by start: a running
 * session absorbs the next one when `next.start - current.end` is at most
 * `minClusterGapMinutes`. The result depends on that sort order; it is not a
 * global optimum. A non-positive gap returns the input unchanged.
 */
export function mergeSessions(
  sessions: WorkSession[],
  options: MergeOptions
): WorkSession[] {
  if (sessions.length === 0 || options.minClusterGapMinutes <= 0) {
    return sessions;
  }

  const sorted = [...sessions].sort(
    (a, b) =>
      compareText(a.actor, b.actor) ||
      compareText(a.scope, b.scope) ||
      a.start.getTime() - b.start.getTime()
  );

  const merged: WorkSession[] = [];
  let current = sorted[0];

  for (const next of sorted.slice(1)) {
    if (next.actor !== current.actor || next.scope !== current.scope) {
      merged.push(current);
      current = next;
      continue;
    }

    const gapMinutes = (next.start.getTime() - current.end.getTime()) / MS_PER_MINUTE;
    if (gapMinutes <= options.minClusterGapMinutes) {
      current = {
        actor: current.actor,
        scope: current.scope,
        start: current.start,
        end: next.end,
        events: [...current.events, ...next.events],
        durationHours: Math.min(
          (next.end.getTime() - current.start.getTime()) / MS_PER_HOUR,
          options.maxSessionHours
        ),
      };
    } else {
      merged.push(current);
      current = next;
    }
  }

  merged.push(current);
  return merged;
}
