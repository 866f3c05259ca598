export interface RawEvent {
  id: string; // commit sha, unique per source
  actor: string;
  scope: string; // repository full name
  timestamp: Date;
  text: string;
}

export interface WorkSession {
  actor: string;
  scope: string;
  start: Date;
  end: Date;
  events: RawEvent[]; // ordered by timestamp
  durationHours: number;
}

export interface ExternalRecord {
  id: string;
  start: Date;
  end: Date;
  description: string;
  projectRef: string | null;
}

export interface RecordInput {
  start: Date;
  end: Date;
  description: string;
}

export interface TimeWindow {
  since: Date;
  until: Date;
}

// ── Matching types ───────────────────────────────────────

export interface TextRecord {
  id: string;
  description: string;
  [field: string]: unknown;
}

export interface MatchCandidate {
  id: number; // 1..999999
  title: string;
  isClosed: boolean;
}

export type MatchStrategy = "strict" | "fuzzy";

export interface MatchResult {
  record: TextRecord;
  matchedIds: Set<number>;
  confidence: number; // 0..1
  strategy: MatchStrategy;
}

export interface MatchStatistics {
  total: number;
  matched: number;
  unmatched: number;
  matchRate: number;
  highConfidence: number;
  highConfidenceRate: number;
  averageConfidence: number;
  strategies: Record<MatchStrategy, number>;
}

// ── Collaborators ────────────────────────────────────────

/**
 * Supplies raw activity. Pagination and rate limits are the source's concern.
 */
export interface EventSource {
  /** Stops early once `signal` aborts, returning what it already has. */
  fetchEvents(window: TimeWindow, signal?: AbortSignal): Promise<RawEvent[]>;
}

/**
 * External time-tracking system. A `null` result (or a thrown error) means the
 * call failed; callers never retry.
 */
export interface ExternalRecordApi {
  createRecord(
    input: RecordInput & { projectRef: string | null }
  ): Promise<ExternalRecord | null>;
  updateRecord(id: string, input: RecordInput): Promise<ExternalRecord | null>;
  /** Optional read-back, used to extend an existing record instead of overwriting it. */
  fetchRecord?(id: string): Promise<ExternalRecord | null>;
}

export interface CandidateSource {
  fetchCandidates(ids: number[]): Promise<MatchCandidate[]>;
}
