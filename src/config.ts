import { parseLogLevel, type LogLevel } from "./logger";

// ==================== Environment Helpers ====================

export const env = {
  getString: (name: string, defaultValue: string): string => {
    const value = process.env[name];
    return value?.trim() || defaultValue;
  },

  getNumber: (name: string, defaultValue: number, min?: number): number => {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === "") return defaultValue;
    const value = Number(raw);
    if (!Number.isFinite(value)) return defaultValue;
    return min !== undefined && value < min ? defaultValue : value;
  },
};

// ==================== Client Configuration ====================

export type ClientConfig = {
  graphqlEndpoint: string;
  maxRetries: number;
  retryDelayMs: number;
  batchSleepMs: number;
  initialBatchSize: number;
  maxBatchSize: number;
  requestTimeoutMs: number;
  errorLogPath: string;
  checkpointStep: number;
  /** Upper bound on page requests per crawl, independent of the data. */
  maxPages: number;
  logLevel: LogLevel;
};

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  graphqlEndpoint: "https://arweave-search.goldsky.com/graphql",
  maxRetries: 3,
  retryDelayMs: 1000,
  batchSleepMs: 1000,
  initialBatchSize: 100,
  maxBatchSize: 500,
  requestTimeoutMs: 30_000,
  errorLogPath: "error_cursors.log",
  checkpointStep: 100,
  maxPages: 10_000,
  logLevel: "info",
};

/**
 * Build the client configuration from process.env, falling back to
 * DEFAULT_CLIENT_CONFIG for anything missing or unparsable.
 */
export function loadClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  const d = DEFAULT_CLIENT_CONFIG;
  const fromEnv: ClientConfig = {
    graphqlEndpoint: env.getString("GRAPHQL_ENDPOINT", d.graphqlEndpoint),
    maxRetries: env.getNumber("MAX_RETRIES", d.maxRetries, 1),
    retryDelayMs: env.getNumber("RETRY_DELAY_MS", d.retryDelayMs, 0),
    batchSleepMs: env.getNumber("BATCH_SLEEP_MS", d.batchSleepMs, 0),
    initialBatchSize: env.getNumber("INITIAL_BATCH_SIZE", d.initialBatchSize, 1),
    maxBatchSize: env.getNumber("MAX_BATCH_SIZE", d.maxBatchSize, 1),
    requestTimeoutMs: env.getNumber("REQUEST_TIMEOUT_MS", d.requestTimeoutMs, 0),
    errorLogPath: env.getString("ERROR_LOG_PATH", d.errorLogPath),
    checkpointStep: env.getNumber("CHECKPOINT_STEP", d.checkpointStep),
    maxPages: env.getNumber("MAX_PAGES", d.maxPages, 1),
    logLevel: parseLogLevel(process.env.LOG_LEVEL, d.logLevel),
  };
  return { ...fromEnv, ...overrides };
}
