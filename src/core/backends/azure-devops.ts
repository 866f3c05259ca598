import { z } from "zod";
import { requestJson } from "./http.js";
import { toErrorMessage } from "../errors.js";
import * as log from "../log.js";
import type { CandidateSource, MatchCandidate } from "../../types.js";

const BATCH_SIZE = 200;
const API_VERSION = "7.0";
const CLOSED_STATES = new Set(["Resolved", "Closed", "Done", "Removed"]);

const WorkItemsSchema = z.object({
  // errorPolicy=omit returns null in place of ids that do not exist.
  value: z.array(
    z
      .object({
        id: z.number().int(),
        fields: z
          .object({
            "System.Title": z.string().default(""),
            "System.State": z.string().default(""),
          })
          .passthrough(),
      })
      .nullable()
  ),
});

export interface AzureDevOpsOptions {
  organization: string;
  project: string;
  pat: string;
  baseUrl: string;
  timeoutMs: number;
}

/** Work items fetched by id, in batches. A failed batch is logged and skipped. */
export class AzureDevOpsCandidateSource implements CandidateSource {
  private readonly options: AzureDevOpsOptions;
  private readonly itemsUrl: string;
  private readonly authorization: string;

  constructor(options: AzureDevOpsOptions) {
    this.options = options;
    const base = options.baseUrl.replace(/\/+$/, "");
    this.itemsUrl =
      `${base}/${encodeURIComponent(options.organization)}` +
      `/${encodeURIComponent(options.project)}/_apis/wit/workitems`;
    this.authorization = `Basic ${Buffer.from(`:${options.pat}`).toString("base64")}`;
  }

  async fetchCandidates(ids: number[]): Promise<MatchCandidate[]> {
    const unique = [...new Set(ids)];
    const candidates: MatchCandidate[] = [];

    for (let i = 0; i < unique.length; i += BATCH_SIZE) {
      const batch = unique.slice(i, i + BATCH_SIZE);
      const url = `${this.itemsUrl}?ids=${batch.join(",")}&api-version=${API_VERSION}&errorPolicy=omit`;
      try {
        const response = await requestJson(url, WorkItemsSchema, {
          headers: { Authorization: this.authorization },
          timeoutMs: this.options.timeoutMs,
        });
        for (const item of response.value) {
          if (!item) continue;
          candidates.push({
            id: item.id,
            title: item.fields["System.Title"],
            isClosed: CLOSED_STATES.has(item.fields["System.State"]),
          });
        }
      } catch (err) {
        log.error(`Failed to fetch batch of ${batch.length} work items: ${toErrorMessage(err)}`);
      }
    }
    return candidates;
  }
}
