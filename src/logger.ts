/**
 * Leveled console logger.
 *
 * Threshold comes from LOG_LEVEL (debug | info | warn | error), default "info".
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  return value === "debug" || value === "info" || value === "warn" || value === "error"
    ? value
    : fallback;
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

export const log = {
  setLevel: (level: LogLevel): void => {
    threshold = level;
  },

  level: (): LogLevel => threshold,

  debug: (...args: unknown[]): void => {
    if (enabled("debug")) console.log("[debug]", ...args);
  },

  info: (...args: unknown[]): void => {
    if (enabled("info")) console.log(...args);
  },

  warn: (...args: unknown[]): void => {
    if (enabled("warn")) console.warn("[warn]", ...args);
  },

  error: (...args: unknown[]): void => {
    if (enabled("error")) console.error("[error]", ...args);
  },
};
