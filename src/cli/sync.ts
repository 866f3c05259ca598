import { SyncLedger } from "../core/ledger.js";
import { openDatabase } from "../core/db.js";
import { parseEvents } from "../core/events.js";
import { CommitTracker } from "../core/tracker.js";
import { summarizeResult, type ReconcileResult } from "../core/reconcile.js";
import {
  createEventSource,
  createReconciler,
  createRecordApi,
  loadRuntimeConfig,
  readJsonArray,
} from "./util.js";

/**
 * One reconcile pass: events from a file when given, otherwise the
 * historical window from GitHub.
 */
export async function syncCommand(options: { file?: string }): Promise<void> {
  const config = loadRuntimeConfig();
  const api = createRecordApi(config);
  const ledger = SyncLedger.load(config.ledgerPath);
  const db = openDatabase(config.dbPath);

  try {
    const reconciler = createReconciler(config, ledger, api, db);
    let result: ReconcileResult;
    let skipped = 0;
    if (options.file) {
      const parsed = parseEvents(readJsonArray(options.file));
      skipped = parsed.skipped;
      result = await reconciler.reconcile(parsed.events);
    } else {
      const tracker = new CommitTracker(config, createEventSource(config), reconciler, ledger);
      result = await tracker.syncHistorical();
    }

    console.log(`Sync complete: ${summarizeResult(result)}`);
    for (const outcome of result.outcomes) {
      const ref = outcome.recordId ? ` -> ${outcome.recordId}` : "";
      console.log(`  ${outcome.action.padEnd(8)} ${outcome.sessionKey}${ref}`);
    }
    if (skipped > 0) console.log(`\n${skipped} malformed event(s) skipped.`);
    if (result.failed > 0) process.exitCode = 1;
  } finally {
    db.close();
  }
}
