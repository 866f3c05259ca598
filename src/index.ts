#!/usr/bin/env node

import { Command } from "commander";
import { sessionsCommand } from "./cli/sessions.js";
import { syncCommand } from "./cli/sync.js";
import { watchCommand } from "./cli/watch.js";
import { matchCommand } from "./cli/match.js";
import { statusCommand } from "./cli/status.js";
import { fail } from "./cli/util.js";
import { startMcpServer } from "./mcp/server.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("worklog-sync")
  .description("Turn commit activity into time entries and link time entries to work items")
  .version(VERSION);

program
  .command("sessions")
  .description("Cluster events from a JSON file into work sessions")
  .requiredOption("-f, --file <path>", "JSON array of events")
  .option("--json", "Output sessions as JSON")
  .option("--daily", "Also print hours per day and actor")
  .action((options: { file: string; json?: boolean; daily?: boolean }) => {
    try {
      sessionsCommand(options);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("sync")
  .description("Reconcile events into time entries (from GitHub, or from a file)")
  .option("-f, --file <path>", "JSON array of events instead of fetching from GitHub")
  .action(async (options: { file?: string }) => {
    try {
      await syncCommand(options);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("watch")
  .description("Backfill history, then poll GitHub and sync new commits")
  .option("--skip-historical", "Start polling without the historical backfill")
  .action(async (options: { skipHistorical?: boolean }) => {
    try {
      await watchCommand(options);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("match")
  .description("Link time entries to work items")
  .requiredOption("-f, --file <path>", "JSON array of time entries ({ id, description })")
  .option("-c, --candidates <path>", "JSON array of work items ({ id, title, isClosed })")
  .option("-s, --strategy <mode>", "strict, fuzzy or hybrid")
  .option("--json", "Output results as JSON")
  .action(
    async (options: { file: string; candidates?: string; strategy?: string; json?: boolean }) => {
      try {
        await matchCommand(options);
      } catch (err) {
        fail(err);
      }
    }
  );

program
  .command("status")
  .description("Show ledger counts and recent sync runs")
  .option("-n, --runs <count>", "Number of recent runs to show", "5")
  .action(async (options: { runs?: string }) => {
    try {
      await statusCommand(options);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("serve")
  .description("Start the MCP server (stdio)")
  .action(async () => {
    try {
      await startMcpServer();
    } catch (err) {
      fail(err);
    }
  });

program.parse();
