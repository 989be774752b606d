import { isLedgerError } from "@/domains/ledger";
import { type BackoffConfig, CONFLICT_BACKOFF_CONFIG, calculateBackoffMs, sleep } from "@/lib/rate-limiter";

export interface ConflictRetryOptions {
  maxAttempts?: number;
  backoff?: BackoffConfig;
}

export const DEFAULT_CONFLICT_ATTEMPTS = 5;

/**
 * Runs an optimistic write, retrying with backoff while it loses
 * compare-and-swap races. The last CONCURRENT_WRITE_CONFLICT is rethrown
 * after `maxAttempts`; any other error propagates immediately.
 */
export const withConflictRetry = async <T>(
  operation: () => Promise<T>,
  { maxAttempts = DEFAULT_CONFLICT_ATTEMPTS, backoff = CONFLICT_BACKOFF_CONFIG }: ConflictRetryOptions = {},
): Promise<T> => {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isLedgerError(error, "CONCURRENT_WRITE_CONFLICT") || attempt + 1 >= maxAttempts) {
        throw error;
      }
      await sleep(calculateBackoffMs(attempt, backoff));
    }
  }
};
