import * as path from "path";

import type { ArweaveClient } from "./client";
import { log } from "./logger";
import { writeCsv, writeJson } from "./output";
import {
  countCatches,
  countTicketSales,
  cumulativeTicketSales,
  type CatchCounts,
  type TicketSales,
  type TicketSalesPoint,
} from "./stats/event";
import { chatMessages, uniqueOwners, userMessages } from "./stats/world";
import { formatWithOffset, toTimestamp } from "./time";
import type { TransactionEdge } from "./types";

export type EventWindow = {
  start: Date;
  end: Date;
};

export type OutputOptions = {
  /** Directory for result files; nothing is written when omitted. */
  outDir?: string;
  csv?: boolean;
};

// Event organisers read times in UTC+8.
const LOCAL_OFFSET_HOURS = 8;

function logWindow(window: EventWindow): void {
  log.info(`Event start (UTC):   ${formatWithOffset(window.start, 0)}`);
  log.info(`Event end (UTC):     ${formatWithOffset(window.end, 0)}`);
  log.info(`Event start (UTC+8): ${formatWithOffset(window.start, LOCAL_OFFSET_HOURS)}`);
  log.info(`Event end (UTC+8):   ${formatWithOffset(window.end, LOCAL_OFFSET_HOURS)}`);
  log.info(`Event window: ${toTimestamp(window.start)} .. ${toTimestamp(window.end)} (unix seconds)`);
}

type IngestRange = { minIngestedAt: number; maxIngestedAt: number };

function ingestRange(window: EventWindow): IngestRange {
  return { minIngestedAt: toTimestamp(window.start), maxIngestedAt: toTimestamp(window.end) };
}

/** One checkpoint per entity, query type and window, apart from the result files. */
function checkpointFile(
  outDir: string,
  entityId: string,
  queryType: string,
  range: IngestRange
): string {
  const window = `${range.minIngestedAt}_${range.maxIngestedAt}`;
  return path.join(outDir, `${queryType}_${entityId}_${window}.checkpoint.json`);
}

function save(output: OutputOptions, name: string, edges: TransactionEdge[]): void {
  if (!output.outDir) return;
  const base = path.join(output.outDir, name);
  writeJson(`${base}.json`, edges);
  if (output.csv) writeCsv(`${base}.csv`, edges);
  log.info(`  saved ${edges.length} records to ${base}.json${output.csv ? " (+csv)" : ""}`);
}

// ==================== Event: tickets and catches ====================

export type EventReport = {
  transfers: TransactionEdge[];
  ticketSales: TicketSales;
  ticketTimeline: TicketSalesPoint[];
  catches: TransactionEdge[];
  catchCounts: CatchCounts;
};

export async function runEventReport(
  client: ArweaveClient,
  params: { entityId: string; ticketProcessId: string; window: EventWindow } & OutputOptions
): Promise<EventReport> {
  logWindow(params.window);
  const range = ingestRange(params.window);

  const transfers = await client.getAllTransactionSummaries(
    params.entityId,
    "token_transfers_from_process",
    { ...range, searchTagsFromProcess: params.ticketProcessId }
  );
  const ticketSales = countTicketSales(transfers);
  log.info(`Total tickets sold: ${ticketSales.tickets} (${ticketSales.transfers} transfers)`);
  if (ticketSales.skipped > 0) {
    log.warn(`${ticketSales.skipped} transfers carried no usable Quantity tag`);
  }
  save(params, "token_transfers_res", transfers);

  const ticketTimeline = cumulativeTicketSales(transfers);
  if (params.outDir) {
    writeJson(path.join(params.outDir, "ticket_sales_timeline.json"), ticketTimeline);
  }

  const catches = await client.getAllTransactionSummaries(
    params.entityId,
    "sent_action_catch",
    range
  );
  const catchCounts = countCatches(catches);
  log.info(`Fish type statistics: ${JSON.stringify(catchCounts.byType)}`);
  if (catchCounts.unknown > 0) log.warn(`${catchCounts.unknown} catches had an unknown type code`);
  save(params, "catch_res", catches);

  return { transfers, ticketSales, ticketTimeline, catches, catchCounts };
}

// ==================== World: entities, players, chat ====================

export type WorldReport = {
  entityCreate: TransactionEdge[];
  entityUpdatePosition: TransactionEdge[];
  received: TransactionEdge[];
  userReceived: TransactionEdge[];
  uniqueUsers: string[];
  chatMessages: TransactionEdge[];
};

export async function runWorldReport(
  client: ArweaveClient,
  params: { entityId: string; window: EventWindow } & OutputOptions
): Promise<WorldReport> {
  logWindow(params.window);
  const range = ingestRange(params.window);

  const createType = "received_action_entityCreate";
  const entityCreate = await client.getAllTransactionSummaries(params.entityId, createType, {
    ...range,
    ...(params.outDir
      ? { checkpointPath: checkpointFile(params.outDir, params.entityId, createType, range) }
      : {}),
  });
  log.info(`entity_create count: ${entityCreate.length}`);
  save(params, "entity_create_res", entityCreate);

  const entityUpdatePosition = await client.getAllTransactionSummaries(
    params.entityId,
    "received_action_entityUpdatePosition",
    range
  );
  log.info(`entity_update_position count: ${entityUpdatePosition.length}`);
  save(params, "entity_update_position_res", entityUpdatePosition);

  const received = await client.getAllTransactionSummaries(params.entityId, "received", range);
  save(params, "received_res", received);

  const userReceived = userMessages(received);
  const uniqueUsers = uniqueOwners(userReceived);
  log.info(`Unique user addresses: ${uniqueUsers.length}`);

  const chat = chatMessages(received);
  log.info(`Player chat messages: ${chat.length}`);
  save(params, "chat_message_res", chat);

  return {
    entityCreate,
    entityUpdatePosition,
    received,
    userReceived,
    uniqueUsers,
    chatMessages: chat,
  };
}
