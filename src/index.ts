export { ArweaveClient } from "./client";
export type { ClientDeps, RangeOptions, SinglePageOptions, SummaryCrawlOptions } from "./client";
export { DEFAULT_CLIENT_CONFIG, env, loadClientConfig } from "./config";
export type { ClientConfig } from "./config";
export { nextBatchSize } from "./crawler/batch-size";
export type { BatchSizeState } from "./crawler/batch-size";
export { checkpointStore } from "./crawler/checkpoint";
export { TransactionCrawler } from "./crawler/crawler";
export type { CrawlOptions, CrawlResult, StopReason } from "./crawler/crawler";
export { isFinal, processPage, seedSeenIds } from "./crawler/dedup";
export type { PageFilterResult, SeenIds } from "./crawler/dedup";
export {
  PersistenceError,
  ProtocolError,
  QueryError,
  TransportError,
  ValidationError,
} from "./errors";
export { log } from "./logger";
export { csv, writeCsv, writeJson } from "./output";
export {
  buildTransactionsQuery,
  createDetailsFilter,
  createSummaryFilter,
} from "./query/conditions";
export { GraphqlQueryExecutor } from "./query/executor";
export { parseEdge, parseTransactionsResponse } from "./query/response";
export { runEventReport, runWorldReport } from "./reports";
export { withRetry, sleep } from "./retry";
export {
  countCatches,
  countTicketSales,
  cumulativeTicketSales,
  CATCH_TYPES,
  TICKET_PRICE,
} from "./stats/event";
export type { CatchCounts, TicketSales, TicketSalesPoint } from "./stats/event";
export { hasTag, tagValue, tagValues } from "./stats/tags";
export { chatMessages, uniqueOwners, userMessages } from "./stats/world";
export { formatWithOffset, fromTimestamp, parseUtc, toTimestamp } from "./time";
export * from "./types";
