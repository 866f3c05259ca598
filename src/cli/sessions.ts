import { clusterEvents } from "../core/cluster.js";
import { mergeSessions } from "../core/merge.js";
import { parseEvents } from "../core/events.js";
import { dailyHours, describeSession, formatSessions } from "../core/session.js";
import { loadRuntimeConfig, readJsonArray } from "./util.js";

export function sessionsCommand(options: { file: string; json?: boolean; daily?: boolean }): void {
  const config = loadRuntimeConfig();
  const { events, skipped } = parseEvents(readJsonArray(options.file));
  const sessions = mergeSessions(clusterEvents(events, config.cluster), config.cluster);
  const tz = config.timezone;

  if (options.json) {
    const out = sessions.map((s) => ({
      actor: s.actor,
      scope: s.scope,
      start: s.start.toISOString(),
      end: s.end.toISOString(),
      durationHours: s.durationHours,
      events: s.events.map((e) => e.id),
      description: describeSession(s, tz),
    }));
    console.log(JSON.stringify(out, null, 2));
    return;
  }

  console.log(formatSessions(sessions, tz));

  if (options.daily && sessions.length > 0) {
    console.log("\nDaily hours:");
    for (const day of dailyHours(sessions, tz)) {
      console.log(`  ${day.date}  ${day.actor}  ${day.hours.toFixed(2)}h`);
    }
  }
  if (skipped > 0) {
    console.log(`\n${skipped} malformed event(s) skipped.`);
  }
}
