import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import * as fs from "fs";
import * as path from "path";

import { errorMessage, TransportError } from "../errors";
import { log } from "../logger";
import { withRetry } from "../retry";
import type {
  PageOutcome,
  PageRequest,
  PageSource,
  RetryPolicy,
  TransactionPage,
} from "../types";
import { buildTransactionsQuery, describeFilter, type GraphqlPayload } from "./conditions";
import { parseTransactionsResponse } from "./response";

// The gateway serves the explorer; requests look like they come from it.
export const DEFAULT_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36",
  Origin: "https://www.ao.link",
  Referer: "https://www.ao.link/",
};

export type ExecutorOptions = {
  endpoint: string;
  timeoutMs: number;
  errorLogPath: string;
  retry: RetryPolicy;
  headers?: Record<string, string>;
  /** Replaces the network layer (tests use an in-process adapter). */
  adapter?: AxiosAdapter;
};

function toTransportError(error: unknown): TransportError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const reason = status !== undefined ? `HTTP ${status}` : error.code ?? "network error";
    return new TransportError(`Request failed (${reason}): ${error.message}`, status, error.code);
  }
  return new TransportError(`Request failed: ${errorMessage(error)}`);
}

/**
 * Issues single page requests against the GraphQL gateway. Failures are
 * retried with a fixed delay; once the budget is gone the cursor is appended
 * to the error log and an "exhausted" outcome is returned instead of throwing.
 */
export class GraphqlQueryExecutor implements PageSource {
  private readonly http: AxiosInstance;

  constructor(private readonly options: ExecutorOptions) {
    this.http = axios.create({
      timeout: options.timeoutMs,
      headers: { ...DEFAULT_HEADERS, ...options.headers },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async fetchPage(
    request: PageRequest,
    policy: RetryPolicy = this.options.retry
  ): Promise<PageOutcome> {
    const payload = buildTransactionsQuery(
      request.filter,
      request.cursor,
      request.limit,
      request.wantCount
    );
    log.debug(`query ${describeFilter(request.filter)} cursor="${request.cursor}" limit=${request.limit}`);

    const result = await withRetry(() => this.postOnce(payload, request.wantCount), {
      attempts: policy.attempts,
      delayMs: policy.delayMs,
      onAttemptFailed: (error, attempt, willRetry) => {
        log.error(
          `Request failed on attempt ${attempt}: ${errorMessage(error)}${willRetry ? " (retrying)" : ""}`
        );
      },
    });

    if (result.ok) {
      return { status: "ok", page: result.value, attempts: result.attempts };
    }

    log.error(`Max retries reached for cursor: "${request.cursor}". Saving to error log.`);
    this.logErrorCursor(request.cursor);
    return {
      status: "exhausted",
      cursor: request.cursor,
      error: result.error,
      attempts: result.attempts,
    };
  }

  private async postOnce(payload: GraphqlPayload, wantCount: boolean): Promise<TransactionPage> {
    let body: unknown;
    try {
      const response = await this.http.post<unknown>(this.options.endpoint, payload);
      body = response.data;
    } catch (error) {
      throw toTransportError(error);
    }
    return parseTransactionsResponse(body, wantCount);
  }

  private logErrorCursor(cursor: string): void {
    const file = this.options.errorLogPath;
    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.appendFileSync(file, `${cursor}\n`, "utf8");
      log.info(`Cursor "${cursor}" saved to error log ${file}`);
    } catch (error) {
      log.error(`Failed to append to error log ${file}: ${errorMessage(error)}`);
    }
  }
}
