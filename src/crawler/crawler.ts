import type { ClientConfig } from "../config";
import { ValidationError } from "../errors";
import { log } from "../logger";
import { describeFilter } from "../query/conditions";
import { sleep } from "../retry";
import type { PageSource, RetryPolicy, TransactionEdge, TransactionFilter } from "../types";
import { nextBatchSize, type BatchSizeState } from "./batch-size";
import { checkpointStore } from "./checkpoint";
import { processPage, seedSeenIds, type SeenIds } from "./dedup";

export type CrawlOptions = {
  initialBatchSize?: number;
  maxBatchSize?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  batchSleepMs?: number;
  /** Cap on returned records; 0 means no cap. */
  maxTotalRecords?: number;
  /** Keep records whose block has no height yet. Default true. */
  includeNonFinal?: boolean;
  checkpointPath?: string;
  /** Save after this many new records; 0 or less turns saving off. */
  checkpointStep?: number;
  maxPages?: number;
};

export type CrawlDefaults = Pick<
  ClientConfig,
  | "initialBatchSize"
  | "maxBatchSize"
  | "maxRetries"
  | "retryDelayMs"
  | "batchSleepMs"
  | "checkpointStep"
  | "maxPages"
>;

export type StopReason =
  | "count-failed"
  | "page-failed"
  | "empty-page"
  | "no-new-records"
  | "max-records"
  | "max-pages";

export type CrawlResult = {
  records: TransactionEdge[];
  totalCount: number;
  /** Page requests made after the count request. */
  pages: number;
  stopReason: StopReason;
  /** Cursor whose retries ran out, when the run ended on a failure. */
  failedCursor?: string;
  /** Records taken over from the checkpoint. */
  resumedFrom: number;
};

type CrawlSettings = {
  batch: BatchSizeState;
  retry: RetryPolicy;
  batchSleepMs: number;
  maxTotalRecords?: number;
  includeNonFinal: boolean;
  checkpointPath?: string;
  checkpointStep: number;
  maxPages: number;
};

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer`, { value });
  }
  return value;
}

/**
 * Walks a cursor-paginated result set to the end:
 * INIT (settings, checkpoint) -> FETCHING_COUNT -> PAGING -> DONE.
 *
 * Every run owns its record list and seen-id map; nothing is shared between
 * calls.
 */
export class TransactionCrawler {
  constructor(
    private readonly source: PageSource,
    private readonly defaults: CrawlDefaults
  ) {}

  async crawl(filter: TransactionFilter, options: CrawlOptions = {}): Promise<CrawlResult> {
    const settings = this.resolve(options);
    const label = describeFilter(filter);

    let records: TransactionEdge[] = [];
    let cursor = "";
    let seenIds: SeenIds = new Map();

    if (settings.checkpointPath) {
      const prior = await checkpointStore.load(settings.checkpointPath);
      if (prior && prior.length > 0) {
        records = prior;
        cursor = checkpointStore.resumeCursor(prior);
        seenIds = seedSeenIds(prior);
        log.info(`Resuming ${label} from cursor: ${cursor} (${prior.length} records loaded)`);
      }
    }
    const resumedFrom = records.length;

    const counted = await this.source.fetchPage(
      { filter, cursor: "", limit: 1, wantCount: true },
      settings.retry
    );
    if (counted.status !== "ok") {
      log.error(`Failed to get initial response for ${label}`);
      return {
        records: [],
        totalCount: 0,
        pages: 0,
        stopReason: "count-failed",
        failedCursor: counted.cursor,
        resumedFrom,
      };
    }

    const totalCount = counted.page.totalCount ?? 0;
    const target =
      settings.maxTotalRecords !== undefined
        ? Math.min(totalCount, settings.maxTotalRecords)
        : totalCount;
    log.info(`Total transactions to fetch for ${label}: ${totalCount}`);

    const savePath = settings.checkpointStep > 0 ? settings.checkpointPath : undefined;
    let batch = settings.batch;
    let savedCount = records.length;
    let dirty = false;
    let pages = 0;
    let stopReason: StopReason = "max-pages";
    let failedCursor: string | undefined;

    while (pages < settings.maxPages) {
      if (settings.maxTotalRecords !== undefined && records.length >= settings.maxTotalRecords) {
        stopReason = "max-records";
        break;
      }

      const outcome = await this.source.fetchPage(
        { filter, cursor, limit: batch.size, wantCount: false },
        settings.retry
      );
      pages++;

      if (outcome.status !== "ok") {
        log.error(`Failed to fetch ${label} after ${outcome.attempts} attempts`);
        stopReason = "page-failed";
        failedCursor = outcome.cursor;
        break;
      }

      const edges = outcome.page.edges;
      if (edges.length === 0) {
        stopReason = "empty-page";
        break;
      }

      const { kept, duplicates, nonFinal } = processPage(edges, seenIds, settings.includeNonFinal);
      log.debug(
        `Batch stats - Total: ${edges.length}, Kept: ${kept.length}, Duplicates: ${duplicates}, Non-final: ${nonFinal}`
      );

      records.push(...kept);
      if (kept.length === 0) {
        stopReason = "no-new-records";
        break;
      }
      dirty = true;

      cursor = kept[kept.length - 1].cursor;
      batch = nextBatchSize(batch.size, edges.length, batch.max);

      if (savePath && records.length - savedCount >= settings.checkpointStep) {
        if (await checkpointStore.save(savePath, records)) {
          savedCount = records.length;
          dirty = false;
        }
      }

      log.info(`  [${label}] page ${pages}: +${kept.length} -> ${records.length}/${target}`);
      await sleep(settings.batchSleepMs);
    }

    // The checkpoint keeps everything fetched; only the returned list is capped.
    if (savePath && dirty) {
      await checkpointStore.save(savePath, records);
    }

    const capped =
      settings.maxTotalRecords !== undefined && records.length > settings.maxTotalRecords
        ? records.slice(0, settings.maxTotalRecords)
        : records;

    log.info(`Retrieved ${capped.length} transactions in total for ${label} (${stopReason})`);
    return {
      records: capped,
      totalCount,
      pages,
      stopReason,
      ...(failedCursor !== undefined ? { failedCursor } : {}),
      resumedFrom,
    };
  }

  /** Explicit options win over the client defaults; bad values fail before any I/O. */
  private resolve(options: CrawlOptions): CrawlSettings {
    const d = this.defaults;
    const max = positiveInteger("maxBatchSize", options.maxBatchSize ?? d.maxBatchSize);
    const initial = positiveInteger(
      "initialBatchSize",
      options.initialBatchSize ?? d.initialBatchSize
    );
    const retryDelayMs = options.retryDelayMs ?? d.retryDelayMs;
    const batchSleepMs = options.batchSleepMs ?? d.batchSleepMs;
    if (retryDelayMs < 0 || batchSleepMs < 0) {
      throw new ValidationError("retryDelayMs and batchSleepMs must not be negative");
    }

    return {
      batch: { size: Math.min(initial, max), max },
      retry: {
        attempts: positiveInteger("maxRetries", options.maxRetries ?? d.maxRetries),
        delayMs: retryDelayMs,
      },
      batchSleepMs,
      ...(options.maxTotalRecords !== undefined && options.maxTotalRecords !== 0
        ? { maxTotalRecords: positiveInteger("maxTotalRecords", options.maxTotalRecords) }
        : {}),
      includeNonFinal: options.includeNonFinal ?? true,
      ...(options.checkpointPath ? { checkpointPath: options.checkpointPath } : {}),
      checkpointStep: options.checkpointStep ?? d.checkpointStep,
      maxPages: positiveInteger("maxPages", options.maxPages ?? d.maxPages),
    };
  }
}
