#!/usr/bin/env npx tsx
/**
 * Arweave event statistics collector
 *
 * Crawls the Arweave GraphQL gateway for one entity and prints event
 * statistics, saving the raw transaction lists as JSON (and optionally CSV).
 *
 * Usage:
 *   npx tsx collect.ts event --entity <id> --ticket-process <id> \
 *     --start "2024-12-19 19:56:50" --end "2024-12-19 19:56:55"
 *   npx tsx collect.ts world --entity <id> \
 *     --start "2024-07-26 0:06:50" --end "2024-12-20 8:06:55" --out ./data --csv
 *
 * Environment Variables (see .env.example):
 * - GRAPHQL_ENDPOINT, MAX_RETRIES, RETRY_DELAY_MS, BATCH_SLEEP_MS, ...
 * - ENTITY_ID, TICKET_PROCESS_ID, START_DATE, END_DATE: defaults for the flags
 * - LOG_LEVEL: debug | info | warn | error
 */

import * as dotenv from "dotenv";

import { ArweaveClient } from "./src/client";
import { env, loadClientConfig } from "./src/config";
import { errorMessage } from "./src/errors";
import { log } from "./src/logger";
import { runEventReport, runWorldReport } from "./src/reports";
import { parseUtc } from "./src/time";

type Command = "event" | "world";

type Opts = {
  command: Command;
  entityId: string;
  ticketProcessId: string;
  start: string;
  end: string;
  outDir: string;
  csv: boolean;
};

function usage(): void {
  console.log("Usage: tsx collect.ts <event|world> [options]");
  console.log("");
  console.log("Options:");
  console.log("  --entity <id>          Entity (process) id          [ENTITY_ID]");
  console.log("  --ticket-process <id>  Ticket token process (event) [TICKET_PROCESS_ID]");
  console.log('  --start "<time>"       Window start, UTC            [START_DATE]');
  console.log('  --end "<time>"         Window end, UTC              [END_DATE]');
  console.log("  --out <dir>            Output directory (default ./data)");
  console.log("  --csv                  Also write CSV files");
}

function parseArgs(argv: string[]): Opts | null {
  const [command, ...args] = argv;
  if (command !== "event" && command !== "world") return null;

  const opts: Opts = {
    command,
    entityId: env.getString("ENTITY_ID", ""),
    ticketProcessId: env.getString("TICKET_PROCESS_ID", ""),
    start: env.getString("START_DATE", ""),
    end: env.getString("END_DATE", ""),
    outDir: "./data",
    csv: false,
  };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === "--entity" && next) {
      opts.entityId = next;
      i++;
    } else if (args[i] === "--ticket-process" && next) {
      opts.ticketProcessId = next;
      i++;
    } else if (args[i] === "--start" && next) {
      opts.start = next;
      i++;
    } else if (args[i] === "--end" && next) {
      opts.end = next;
      i++;
    } else if (args[i] === "--out" && next) {
      opts.outDir = next;
      i++;
    } else if (args[i] === "--csv") {
      opts.csv = true;
    }
  }
  return opts;
}

async function main(argv: string[]): Promise<void> {
  dotenv.config();

  if (argv.includes("--help") || argv.includes("-h")) {
    usage();
    return;
  }

  const opts = parseArgs(argv);
  if (!opts || !opts.entityId || !opts.start || !opts.end) {
    usage();
    process.exitCode = 1;
    return;
  }

  const config = loadClientConfig();
  log.setLevel(config.logLevel);
  const client = new ArweaveClient(config);
  const window = { start: parseUtc(opts.start), end: parseUtc(opts.end) };

  log.info("=".repeat(60));
  log.info(`ARWEAVE ${opts.command.toUpperCase()} STATISTICS`);
  log.info("=".repeat(60));
  log.info(`Endpoint: ${config.graphqlEndpoint}`);
  log.info(`Entity:   ${opts.entityId}`);

  if (opts.command === "event") {
    if (!opts.ticketProcessId) {
      usage();
      process.exitCode = 1;
      return;
    }
    const report = await runEventReport(client, {
      entityId: opts.entityId,
      ticketProcessId: opts.ticketProcessId,
      window,
      outDir: opts.outDir,
      csv: opts.csv,
    });
    console.log(`Sold: ${report.ticketSales.tickets} tickets`);
    console.log(`Catches: ${JSON.stringify(report.catchCounts.byType)}`);
  } else {
    const report = await runWorldReport(client, {
      entityId: opts.entityId,
      window,
      outDir: opts.outDir,
      csv: opts.csv,
    });
    console.log(`Entity creates:          ${report.entityCreate.length}`);
    console.log(`Entity position updates: ${report.entityUpdatePosition.length}`);
    console.log(`Received:                ${report.received.length}`);
    console.log(`Unique users:            ${report.uniqueUsers.length}`);
    console.log(`Chat messages:           ${report.chatMessages.length}`);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error) => {
    console.error("Collector failed:", errorMessage(error));
    process.exit(1);
  });
}
