import { z } from "zod";
import { requestJson } from "./http.js";
import { parseTimestamp } from "../events.js";
import { toErrorMessage } from "../errors.js";
import * as log from "../log.js";
import type { ExternalRecord, ExternalRecordApi, RecordInput } from "../../types.js";

const TimeEntrySchema = z.object({
  id: z.string().min(1),
  description: z.string().nullish(),
  projectId: z.string().nullish(),
  timeInterval: z.object({
    start: z.string(),
    end: z.string().nullish(),
  }),
});

type TimeEntry = z.infer<typeof TimeEntrySchema>;

export interface ClockifyOptions {
  apiKey: string;
  workspaceId: string;
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Clockify time entries as external records. Every failure is logged and
 * reported as null; nothing is retried here.
 */
export class ClockifyRecordApi implements ExternalRecordApi {
  private readonly options: ClockifyOptions;
  private readonly entriesUrl: string;

  constructor(options: ClockifyOptions) {
    this.options = options;
    const base = options.baseUrl.replace(/\/+$/, "");
    this.entriesUrl = `${base}/workspaces/${encodeURIComponent(options.workspaceId)}/time-entries`;
  }

  createRecord(input: RecordInput & { projectRef: string | null }): Promise<ExternalRecord | null> {
    return this.send("create", this.entriesUrl, "POST", {
      start: input.start.toISOString(),
      end: input.end.toISOString(),
      description: input.description,
      billable: true,
      projectId: input.projectRef,
      tagIds: [],
    });
  }

  updateRecord(id: string, input: RecordInput): Promise<ExternalRecord | null> {
    return this.send(`update ${id}`, `${this.entriesUrl}/${encodeURIComponent(id)}`, "PUT", {
      start: input.start.toISOString(),
      end: input.end.toISOString(),
      description: input.description,
    });
  }

  fetchRecord(id: string): Promise<ExternalRecord | null> {
    return this.send(`read ${id}`, `${this.entriesUrl}/${encodeURIComponent(id)}`, "GET");
  }

  private async send(
    label: string,
    url: string,
    method: "GET" | "POST" | "PUT",
    body?: Record<string, unknown>
  ): Promise<ExternalRecord | null> {
    try {
      const entry = await requestJson(url, TimeEntrySchema, {
        method,
        body,
        headers: { "X-Api-Key": this.options.apiKey },
        timeoutMs: this.options.timeoutMs,
      });
      return toRecord(entry);
    } catch (err) {
      log.error(`Clockify ${label} failed: ${toErrorMessage(err)}`);
      return null;
    }
  }
}

function toRecord(entry: TimeEntry): ExternalRecord | null {
  const start = parseTimestamp(entry.timeInterval.start);
  // A running entry has no end yet; treat it as ending where it starts.
  const end = entry.timeInterval.end ? parseTimestamp(entry.timeInterval.end) : start;
  if (!start || !end) {
    log.warn(`Clockify entry ${entry.id} has an unreadable time interval`);
    return null;
  }
  return {
    id: entry.id,
    start,
    end,
    description: entry.description ?? "",
    projectRef: entry.projectId ?? null,
  };
}
