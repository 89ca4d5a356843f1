export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export type RetryOptions = {
  /** Total attempts, including the first one. Values below 1 are treated as 1. */
  attempts: number;
  delayMs: number;
  onAttemptFailed?: (error: unknown, attempt: number, willRetry: boolean) => void;
};

/**
 * Run `operation` until it resolves or the attempt budget is spent, waiting
 * `delayMs` between attempts. Never throws: the last error comes back in the
 * exhausted result.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const budget = Math.max(1, Math.floor(options.attempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= budget; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = error;
      const willRetry = attempt < budget;
      options.onAttemptFailed?.(error, attempt, willRetry);
      if (willRetry) await sleep(options.delayMs);
    }
  }

  return { ok: false, error: lastError, attempts: budget };
}
