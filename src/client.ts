import type { AxiosAdapter } from "axios";

import { DEFAULT_CLIENT_CONFIG, type ClientConfig } from "./config";
import { TransactionCrawler, type CrawlOptions, type CrawlResult } from "./crawler/crawler";
import { createDetailsFilter, createSummaryFilter } from "./query/conditions";
import { GraphqlQueryExecutor } from "./query/executor";
import type { PageSource, RetryPolicy, TransactionEdge, TransactionPage } from "./types";

export type RangeOptions = {
  minIngestedAt?: number;
  maxIngestedAt?: number;
  minBlock?: number;
  maxBlock?: number;
  /** From-Process id, required by token_transfers_from_process. */
  searchTagsFromProcess?: string;
};

export type SummaryCrawlOptions = CrawlOptions & RangeOptions;

export type SinglePageOptions = RangeOptions & {
  cursor?: string;
  limit?: number;
  /** Ask the gateway for the total match count as well. Default true. */
  wantCount?: boolean;
  maxRetries?: number;
};

export type ClientDeps = {
  /** Serve pages from somewhere other than the GraphQL gateway. */
  source?: PageSource;
  adapter?: AxiosAdapter;
};

/**
 * Entry point for transaction queries against the Arweave GraphQL gateway.
 */
export class ArweaveClient {
  readonly config: ClientConfig;
  private readonly source: PageSource;
  private readonly crawler: TransactionCrawler;

  constructor(config: Partial<ClientConfig> = {}, deps: ClientDeps = {}) {
    this.config = { ...DEFAULT_CLIENT_CONFIG, ...config };
    this.source =
      deps.source ??
      new GraphqlQueryExecutor({
        endpoint: this.config.graphqlEndpoint,
        timeoutMs: this.config.requestTimeoutMs,
        errorLogPath: this.config.errorLogPath,
        retry: { attempts: this.config.maxRetries, delayMs: this.config.retryDelayMs },
        ...(deps.adapter ? { adapter: deps.adapter } : {}),
      });
    this.crawler = new TransactionCrawler(this.source, this.config);
  }

  /**
   * One page of transactions for an entity. Resolves null when every retry
   * failed (the cursor is in the error log), which is not the same as an
   * empty page.
   */
  async getTransactionSummaryStats(
    entityId: string,
    queryType: string = "sent",
    options: SinglePageOptions = {}
  ): Promise<TransactionPage | null> {
    const filter = createSummaryFilter({ entityId, queryType, ...options });
    const outcome = await this.source.fetchPage(
      {
        filter,
        cursor: options.cursor ?? "",
        limit: options.limit ?? this.config.initialBatchSize,
        wantCount: options.wantCount ?? true,
      },
      this.retryPolicy(options.maxRetries)
    );
    return outcome.status === "ok" ? outcome.page : null;
  }

  /** One page of messages pushed for `messageId` by `fromProcessId`. */
  async getTransactionDetails(
    messageId: string,
    fromProcessId: string,
    options: { queryType?: string; cursor?: string; limit?: number; wantCount?: boolean } = {}
  ): Promise<TransactionPage | null> {
    const filter = createDetailsFilter(messageId, fromProcessId, options.queryType);
    const outcome = await this.source.fetchPage(
      {
        filter,
        cursor: options.cursor ?? "",
        limit: options.limit ?? this.config.initialBatchSize,
        wantCount: options.wantCount ?? true,
      },
      this.retryPolicy()
    );
    return outcome.status === "ok" ? outcome.page : null;
  }

  /** Full crawl with the run report (stop reason, total count, pages). */
  async crawlTransactionSummaries(
    entityId: string,
    queryType: string = "sent",
    options: SummaryCrawlOptions = {}
  ): Promise<CrawlResult> {
    const filter = createSummaryFilter({ entityId, queryType, ...options });
    return this.crawler.crawl(filter, options);
  }

  /**
   * Every transaction matching `queryType` for `entityId`, deduplicated and in
   * arrival order. Ends early on retry exhaustion with what was collected.
   */
  async getAllTransactionSummaries(
    entityId: string,
    queryType: string = "sent",
    options: SummaryCrawlOptions = {}
  ): Promise<TransactionEdge[]> {
    const result = await this.crawlTransactionSummaries(entityId, queryType, options);
    return result.records;
  }

  private retryPolicy(maxRetries?: number): RetryPolicy {
    return { attempts: maxRetries ?? this.config.maxRetries, delayMs: this.config.retryDelayMs };
  }
}
