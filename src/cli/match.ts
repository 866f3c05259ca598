import { z } from "zod";
import { openDatabase } from "../core/db.js";
import {
  EntityMatcher,
  matchRecords,
  matchStatistics,
  parseTextRecords,
} from "../core/matcher.js";
import * as log from "../core/log.js";
import type { MatchingMode } from "../core/config.js";
import type { MatchCandidate } from "../types.js";
import { createCandidateSource, loadRuntimeConfig, readJsonArray } from "./util.js";

const CandidateFileSchema = z.array(
  z.object({
    id: z.number().int().min(1).max(999_999),
    title: z.string(),
    isClosed: z.boolean().default(false),
  })
);

const StrategySchema = z.enum(["strict", "fuzzy", "hybrid"]);

export async function matchCommand(options: {
  file: string;
  candidates?: string;
  strategy?: string;
  json?: boolean;
}): Promise<void> {
  const config = loadRuntimeConfig();
  const mode: MatchingMode = options.strategy
    ? StrategySchema.parse(options.strategy)
    : config.matchStrategy;

  const { records } = parseTextRecords(readJsonArray(options.file));
  let extra: MatchCandidate[] = [];
  if (options.candidates) {
    extra = CandidateFileSchema.parse(readJsonArray(options.candidates));
  }

  const db = openDatabase(config.dbPath);
  try {
    const source = createCandidateSource(config, db);
    if (!source && extra.length === 0) {
      log.warn("No work items available: configure ADO_* or pass --candidates.");
    }
    const results = await matchRecords(new EntityMatcher(mode), records, source, extra);
    const stats = matchStatistics(results);

    if (options.json) {
      const out = results.map((r) => ({
        id: r.record.id,
        description: r.record.description,
        matchedIds: [...r.matchedIds].sort((a, b) => a - b),
        confidence: r.confidence,
        strategy: r.strategy,
      }));
      console.log(JSON.stringify({ results: out, statistics: stats }, null, 2));
      return;
    }

    for (const r of results) {
      const ids = [...r.matchedIds].sort((a, b) => a - b).map((id) => `#${id}`).join(", ");
      const label = ids || "unmatched";
      console.log(`  ${label.padEnd(16)} ${r.confidence.toFixed(2)} ${r.strategy.padEnd(6)} ${r.record.description}`);
    }
    console.log();
    console.log(`Matched ${stats.matched}/${stats.total} (${(stats.matchRate * 100).toFixed(1)}%)`);
    console.log(
      `High confidence: ${stats.highConfidence} (${(stats.highConfidenceRate * 100).toFixed(1)}%), ` +
        `average confidence ${stats.averageConfidence.toFixed(2)}`
    );
  } finally {
    db.close();
  }
}
