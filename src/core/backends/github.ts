import { z } from "zod";
import { HttpError, requestJson } from "./http.js";
import { parseTimestamp } from "../events.js";
import { toErrorMessage } from "../errors.js";
import * as log from "../log.js";
import type { EventSource, RawEvent, TimeWindow } from "../../types.js";

const PER_PAGE = 100;
const DEFAULT_BASE_URL = "https://api.github.com";

const RepoListSchema = z.array(z.object({ full_name: z.string() }));

const CommitListSchema = z.array(
  z.object({
    sha: z.string(),
    commit: z.object({
      author: z
        .object({
          name: z.string().nullish(),
          date: z.string().nullish(),
        })
        .nullish(),
      message: z.string().default(""),
    }),
  })
);

export interface GitHubSourceOptions {
  token: string | null;
  /** Organization repos are tracked when set; otherwise the user's repos. */
  org: string | null;
  username: string | null;
  timeoutMs: number;
  baseUrl?: string;
}

/**
 * Commits across every repository of a user or organization. Failures on one
 * repository are logged and the remaining repositories still contribute.
 */
export class GitHubEventSource implements EventSource {
  private readonly options: GitHubSourceOptions;
  private readonly baseUrl: string;

  constructor(options: GitHubSourceOptions) {
    if (!options.org && !options.username) {
      throw new Error("GitHub source needs an organization or a username");
    }
    this.options = options;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  }

  async fetchEvents(window: TimeWindow, signal?: AbortSignal): Promise<RawEvent[]> {
    const repos = await this.listRepositories(signal);
    const events: RawEvent[] = [];
    for (const repo of repos) {
      if (signal?.aborted) break;
      const commits = await this.fetchCommits(repo, window, signal);
      log.debug(`Found ${commits.length} commits in ${repo}`);
      events.push(...commits);
    }
    return events;
  }

  async listRepositories(signal?: AbortSignal): Promise<string[]> {
    const { org, username } = this.options;
    const path = org
      ? `/orgs/${encodeURIComponent(org)}/repos`
      : `/users/${encodeURIComponent(username ?? "")}/repos`;

    const repos: string[] = [];
    try {
      for (let page = 1; ; page++) {
        const batch = await this.get(
          `${path}?type=all&per_page=${PER_PAGE}&page=${page}`,
          RepoListSchema,
          signal
        );
        repos.push(...batch.map((r) => r.full_name));
        if (batch.length < PER_PAGE || signal?.aborted) break;
      }
    } catch (err) {
      if (signal?.aborted) return [];
      log.error(`Could not list repositories for ${org ?? username}: ${toErrorMessage(err)}`);
      return [];
    }
    log.debug(`Found ${repos.length} repositories`);
    return repos;
  }

  async fetchCommits(repo: string, window: TimeWindow, signal?: AbortSignal): Promise<RawEvent[]> {
    const events: RawEvent[] = [];
    const range = `since=${window.since.toISOString()}&until=${window.until.toISOString()}`;
    try {
      for (let page = 1; ; page++) {
        const batch = await this.get(
          `/repos/${repo}/commits?${range}&per_page=${PER_PAGE}&page=${page}`,
          CommitListSchema,
          signal
        );
        for (const item of batch) {
          const timestamp = parseTimestamp(item.commit.author?.date ?? "");
          if (!timestamp) continue;
          events.push({
            id: item.sha,
            actor: item.commit.author?.name ?? "unknown",
            scope: repo,
            timestamp,
            text: item.commit.message,
          });
        }
        if (batch.length < PER_PAGE || signal?.aborted) break;
      }
    } catch (err) {
      // 409 is GitHub's answer for an empty repository.
      if (!signal?.aborted && !(err instanceof HttpError && err.status === 409)) {
        log.warn(`Could not fetch commits from ${repo}: ${toErrorMessage(err)}`);
      }
    }
    return events;
  }

  private get<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    const headers: Record<string, string> = { Accept: "application/vnd.github+json" };
    if (this.options.token) headers.Authorization = `Bearer ${this.options.token}`;
    return requestJson(`${this.baseUrl}${path}`, schema, {
      headers,
      timeoutMs: this.options.timeoutMs,
      signal,
    });
  }
}
