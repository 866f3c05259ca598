import { SyncLedger } from "../core/ledger.js";
import { openDatabase } from "../core/db.js";
import { CommitTracker } from "../core/tracker.js";
import * as log from "../core/log.js";
import {
  createEventSource,
  createReconciler,
  createRecordApi,
  loadRuntimeConfig,
  toErrorMessage,
} from "./util.js";

/** Historical backfill, then poll until interrupted. */
export async function watchCommand(options: { skipHistorical?: boolean }): Promise<void> {
  const config = loadRuntimeConfig();
  const api = createRecordApi(config);
  const source = createEventSource(config);
  const ledger = SyncLedger.load(config.ledgerPath);
  const db = openDatabase(config.dbPath);

  const tracker = new CommitTracker(
    config,
    source,
    createReconciler(config, ledger, api, db),
    ledger
  );

  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    void tracker
      .stop()
      .catch((err) => log.error(`Shutdown failed: ${toErrorMessage(err)}`))
      .finally(() => {
        db.close();
        process.exit(0);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await tracker.start({ skipHistorical: options.skipHistorical });
  log.info("Watching for commits. Press Ctrl+C to stop.");
}
