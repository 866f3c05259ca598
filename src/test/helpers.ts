import type { RawEvent, WorkSession } from "../types.js";

/** UTC instant on 2024-03-04 at the given HH:MM. */
export function at(time: string, date = "2024-03-04"): Date {
  return new Date(`${date}T${time}:00Z`);
}

export function makeEvent(overrides: Partial<RawEvent> = {}): RawEvent {
  return {
    id: "sha-1",
    actor: "alice",
    scope: "acme/api",
    timestamp: at("09:00"),
    text: "commit",
    ...overrides,
  };
}

export function makeSession(overrides: Partial<WorkSession> = {}): WorkSession {
  const start = overrides.start ?? at("09:00");
  const end = overrides.end ?? at("10:00");
  return {
    actor: "alice",
    scope: "acme/api",
    start,
    end,
    events: [makeEvent({ timestamp: start })],
    durationHours: (end.getTime() - start.getTime()) / 3_600_000,
    ...overrides,
  };
}
