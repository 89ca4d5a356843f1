import { log } from "../logger";

export type BatchSizeState = {
  /** Limit for the next request. */
  size: number;
  /** Largest page the server is believed to serve. */
  max: number;
};

/**
 * Adapt the page size to what the server actually returns.
 *
 * A full page doubles the request, capped at the current max; once the
 * request already sits at the max, a full page locks onto it. A short page is
 * taken as the server's real ceiling, so both size and max drop to it. This
 * is a heuristic: a short page caused by something other than a server cap
 * still lowers the max.
 */
export function nextBatchSize(
  requested: number,
  received: number,
  currentMax: number
): BatchSizeState {
  if (received <= 0 || received > requested) {
    return { size: requested, max: currentMax };
  }

  if (received === requested) {
    return { size: Math.min(requested * 2, currentMax), max: currentMax };
  }

  log.debug(`Actual maximum batch size discovered: ${received}`);
  return { size: received, max: received };
}
