import { z } from "zod";
import * as log from "./log.js";
import type { RawEvent } from "../types.js";

// Commit feeds come in two shapes: the native one and the commit-tracker
// export (sha/author/repo/message). Both map onto RawEvent.
const NativeEventSchema = z.object({
  id: z.string().min(1),
  actor: z.string().min(1),
  scope: z.string().min(1),
  timestamp: z.string().min(1),
  text: z.string().default(""),
});

const CommitEventSchema = z.object({
  sha: z.string().min(1),
  author: z.string().min(1),
  repo: z.string().min(1),
  timestamp: z.string().min(1),
  message: z.string().default(""),
});

const OFFSET_RE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse an ISO-8601 timestamp. A timestamp without an offset is read as UTC,
 * never as host-local time. Returns null when unparseable.
 */
export function parseTimestamp(value: string): Date | null {
  const trimmed = value.trim();
  const withOffset = OFFSET_RE.test(trimmed) ? trimmed : `${trimmed}Z`;
  const ms = Date.parse(withOffset);
  return Number.isFinite(ms) ? new Date(ms) : null;
}

export interface ParsedEvents {
  events: RawEvent[];
  skipped: number;
}

/**
 * Validate raw records into RawEvents. Malformed records (missing fields,
 * unparseable timestamps) are logged and skipped; the rest go through.
 */
export function parseEvents(records: unknown[]): ParsedEvents {
  const events: RawEvent[] = [];
  let skipped = 0;

  records.forEach((record, index) => {
    const event = parseEvent(record);
    if (event) {
      events.push(event);
    } else {
      skipped += 1;
      log.warn(`Skipping malformed event at index ${index}`);
    }
  });

  return { events, skipped };
}

function parseEvent(record: unknown): RawEvent | null {
  const native = NativeEventSchema.safeParse(record);
  if (native.success) {
    const timestamp = parseTimestamp(native.data.timestamp);
    if (!timestamp) return null;
    return {
      id: native.data.id,
      actor: native.data.actor,
      scope: native.data.scope,
      timestamp,
      text: native.data.text,
    };
  }

  const commit = CommitEventSchema.safeParse(record);
  if (commit.success) {
    const timestamp = parseTimestamp(commit.data.timestamp);
    if (!timestamp) return null;
    return {
      id: commit.data.sha,
      actor: commit.data.author,
      scope: commit.data.repo,
      timestamp,
      text: commit.data.message,
    };
  }

  return null;
}
