import { z } from "zod";
import { similarityRatio } from "./similarity.js";
import * as log from "./log.js";
import type { MatchingMode } from "./config.js";
import type {
  CandidateSource,
  MatchCandidate,
  MatchResult,
  MatchStatistics,
  TextRecord,
} from "../types.js";

export interface MatchPattern {
  name: string;
  /** Must contain one capture group holding the numeric id. */
  regex: RegExp;
  /** Lower is more explicit. */
  priority: number;
  /** Bare numbers are only a guess until checked against real candidates. */
  requiresValidation: boolean;
}

export const MIN_WORK_ITEM_ID = 1;
export const MAX_WORK_ITEM_ID = 999_999;

export const DEFAULT_PATTERNS: MatchPattern[] = [
  { name: "hash", regex: /#(\d{4,6})/gi, priority: 1, requiresValidation: false },
  { name: "ado_dash", regex: /ADO-(\d{4,6})/gi, priority: 2, requiresValidation: false },
  { name: "ado_underscore", regex: /ADO_(\d{4,6})/gi, priority: 2, requiresValidation: false },
  { name: "wi_colon", regex: /WI:(\d{4,6})/gi, priority: 3, requiresValidation: false },
  { name: "wi_underscore", regex: /WI_(\d{4,6})/gi, priority: 3, requiresValidation: false },
  { name: "brackets", regex: /\[(\d{4,6})\]/gi, priority: 4, requiresValidation: false },
  { name: "parentheses", regex: /\((\d{4,6})\)/gi, priority: 5, requiresValidation: false },
  { name: "plain_number", regex: /\b(\d{4,6})\b/gi, priority: 10, requiresValidation: true },
];

const FUZZY_THRESHOLD = 0.7;
const CONTAINMENT_SCORE = 0.8;
const FUZZY_CONFIDENCE = 0.6;
const STRICT_ABOVE = 0.7;
const HIGH_CONFIDENCE = 0.8;

export interface Extraction {
  ids: Set<number>;
  confidence: number;
}

/**
 * Links free-text time records to work-item ids.
 *
 * Explicit references (`#1234`, `ADO-1234`, `WI:1234`, ...) are tried in
 * priority order; with no usable reference and a fuzzy-capable mode, the
 * text is compared against the titles of open candidates.
 */
export class EntityMatcher {
  private readonly patterns: MatchPattern[];
  private readonly mode: MatchingMode;

  constructor(mode: MatchingMode = "hybrid", patterns: MatchPattern[] = DEFAULT_PATTERNS) {
    this.mode = mode;
    this.patterns = [...patterns].sort((a, b) => a.priority - b.priority);
  }

  /**
   * Extract ids and a confidence score. Each pattern that yields a valid id
   * proposes `1 - priority * 0.1` (0.5 for bare numbers); the best proposal
   * wins, plus 0.1 when more than one pattern matched. The bonus counts
   * patterns, not distinct ids: `#1234` alone also matches as a bare number.
   */
  extractIds(text: string): Extraction {
    const ids = new Set<number>();
    if (!text) return { ids, confidence: 0 };

    let confidence = 0;
    let patternsMatched = 0;

    for (const pattern of this.patterns) {
      const found = extractWithPattern(pattern, text);
      if (found.length === 0) continue;

      found.forEach((id) => ids.add(id));
      patternsMatched += 1;
      const proposal = pattern.requiresValidation
        ? 0.5
        : Math.max(0, 1.0 - pattern.priority * 0.1);
      confidence = Math.max(confidence, proposal);
    }

    if (patternsMatched > 1) {
      confidence = Math.min(1.0, confidence + 0.1);
    }
    return { ids, confidence };
  }

  match(records: TextRecord[], candidates: Map<number, MatchCandidate>): MatchResult[] {
    return records.map((record) => this.matchOne(record, candidates));
  }

  private matchOne(record: TextRecord, candidates: Map<number, MatchCandidate>): MatchResult {
    const description = record.description ?? "";
    const extraction = this.extractIds(description);
    let confidence = extraction.confidence;

    const matchedIds = new Set<number>();
    for (const id of extraction.ids) {
      if (candidates.has(id)) matchedIds.add(id);
    }

    if (matchedIds.size === 0 && this.mode !== "strict") {
      const best = fuzzyMatch(description, candidates);
      if (best) {
        matchedIds.add(best.id);
        confidence = FUZZY_CONFIDENCE;
      }
    }

    return {
      record,
      matchedIds,
      confidence,
      strategy: confidence > STRICT_ABOVE ? "strict" : "fuzzy",
    };
  }
}

function extractWithPattern(pattern: MatchPattern, text: string): number[] {
  const flags = pattern.regex.flags.includes("g") ? pattern.regex.flags : `${pattern.regex.flags}g`;
  const ids: number[] = [];

  for (const match of text.matchAll(new RegExp(pattern.regex.source, flags))) {
    const raw = match[1];
    const id = Number.parseInt(raw ?? "", 10);
    if (!Number.isInteger(id) || id < MIN_WORK_ITEM_ID || id > MAX_WORK_ITEM_ID) {
      log.debug(`Discarding out-of-range id "${raw ?? ""}" (pattern ${pattern.name})`);
      continue;
    }
    ids.push(id);
  }
  return ids;
}

/**
 * Best open candidate whose title resembles the text. Containment either way
 * scores at least 0.8; closed candidates are never considered.
 */
export function fuzzyMatch(
  text: string,
  candidates: Map<number, MatchCandidate>
): MatchCandidate | null {
  if (!text) return null;

  const lowered = text.toLowerCase();
  let best: MatchCandidate | null = null;
  let bestScore = 0;

  for (const candidate of candidates.values()) {
    if (candidate.isClosed) continue;

    const title = candidate.title.toLowerCase();
    let score = similarityRatio(lowered, title);
    if (title.includes(lowered) || lowered.includes(title)) {
      score = Math.max(score, CONTAINMENT_SCORE);
    }

    if (score > bestScore && score >= FUZZY_THRESHOLD) {
      bestScore = score;
      best = candidate;
    }
  }
  return best;
}

export function isMatched(result: MatchResult): boolean {
  return result.matchedIds.size > 0;
}

export function isHighConfidence(result: MatchResult): boolean {
  return result.confidence >= HIGH_CONFIDENCE;
}

/** Split results into high-confidence (>= 0.8) and the rest. */
export function partitionByConfidence(results: MatchResult[]): {
  high: MatchResult[];
  low: MatchResult[];
} {
  return {
    high: results.filter(isHighConfidence),
    low: results.filter((r) => !isHighConfidence(r)),
  };
}

export function unmatchedRecords(results: MatchResult[]): TextRecord[] {
  return results.filter((r) => !isMatched(r)).map((r) => r.record);
}

export function matchStatistics(results: MatchResult[]): MatchStatistics {
  const total = results.length;
  const matched = results.filter(isMatched).length;
  const highConfidence = results.filter(isHighConfidence).length;
  const strategies = { strict: 0, fuzzy: 0 };
  let confidenceSum = 0;
  for (const result of results) {
    strategies[result.strategy] += 1;
    confidenceSum += result.confidence;
  }

  return {
    total,
    matched,
    unmatched: total - matched,
    matchRate: total > 0 ? matched / total : 0,
    highConfidence,
    highConfidenceRate: total > 0 ? highConfidence / total : 0,
    averageConfidence: total > 0 ? confidenceSum / total : 0,
    strategies,
  };
}

const TextRecordSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    description: z.string().nullish().transform((d) => d ?? ""),
  })
  .passthrough();

/** Validate time records; entries without an id are logged and skipped. */
export function parseTextRecords(items: unknown[]): { records: TextRecord[]; skipped: number } {
  const records: TextRecord[] = [];
  let skipped = 0;
  items.forEach((item, index) => {
    const parsed = TextRecordSchema.safeParse(item);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      skipped += 1;
      log.warn(`Skipping malformed time entry at index ${index}`);
    }
  });
  return { records, skipped };
}

/**
 * Extract ids from every record, look the referenced items up once, then
 * match. `extra` candidates are always considered, e.g. open items for the
 * fuzzy fallback.
 */
export async function matchRecords(
  matcher: EntityMatcher,
  records: TextRecord[],
  source: CandidateSource | null,
  extra: MatchCandidate[] = []
): Promise<MatchResult[]> {
  const referenced = new Set<number>();
  for (const record of records) {
    matcher.extractIds(record.description).ids.forEach((id) => referenced.add(id));
  }

  const candidates = new Map<number, MatchCandidate>(extra.map((c) => [c.id, c]));
  if (source && referenced.size > 0) {
    const fetched = await source.fetchCandidates([...referenced].sort((a, b) => a - b));
    fetched.forEach((c) => candidates.set(c.id, c));
  }
  log.debug(`Matching ${records.length} entries against ${candidates.size} work items`);
  return matcher.match(records, candidates);
}
