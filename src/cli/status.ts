import { existsSync } from "fs";
import { SyncLedger } from "../core/ledger.js";
import { getMeta, getRecentRuns, openDatabase } from "../core/db.js";
import { isClockifyConfigured, loadRuntimeConfig } from "./util.js";

export async function statusCommand(options: { runs?: string }): Promise<void> {
  const config = loadRuntimeConfig();
  const limit = Math.max(1, Number.parseInt(options.runs ?? "5", 10) || 5);

  const ledger = SyncLedger.load(config.ledgerPath);
  const stats = await ledger.stats();

  console.log("worklog-sync status\n");
  console.log(`  Ledger:        ${config.ledgerPath}`);
  console.log(`  Seen events:   ${stats.seenEvents}`);
  console.log(`  Sessions:      ${stats.sessions}`);
  console.log(`  Timezone:      ${config.timezone}`);
  console.log(`  Mark seen:     ${config.markSeen}`);
  console.log(`  GitHub:        ${config.github.org ?? config.github.username ?? "not configured"}`);
  console.log(`  Clockify:      ${isClockifyConfigured(config) ? "configured" : "not configured"}`);

  if (!existsSync(config.dbPath)) {
    console.log("\nNo sync runs recorded yet.");
    return;
  }

  const db = openDatabase(config.dbPath);
  try {
    const lastSync = getMeta(db, "last_sync_at");
    console.log(`  Last sync:     ${lastSync ?? "never"}`);

    const runs = getRecentRuns(db, limit);
    if (runs.length === 0) return;
    console.log(`\nRecent runs:`);
    for (const run of runs) {
      const flags = [
        run.failed > 0 ? `${run.failed} failed` : "",
        run.dropped > 0 ? `${run.dropped} dropped` : "",
        run.persisted ? "" : "not persisted",
      ].filter(Boolean);
      console.log(
        `  ${run.finished_at}  ${run.accepted}/${run.received} new, ` +
          `${run.created} created, ${run.updated} updated` +
          (flags.length > 0 ? ` (${flags.join(", ")})` : "")
      );
    }
  } finally {
    db.close();
  }
}
