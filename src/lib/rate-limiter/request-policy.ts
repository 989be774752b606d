/**
 * Request policy for spreadsheet API calls, combining rate limiting,
 * circuit breaker, timeouts, and retry.
 *
 * Order of operations:
 * 1. Acquire a token from the category bucket (read / write)
 * 2. Enforce the request timeout (timeouts count as failures)
 * 3. Execute inside the circuit breaker
 * 4. Retry with backoff on retryable errors (429/5xx/network)
 */

import type { Logger } from "@/lib/logger";

import {
  type BackoffConfig,
  DEFAULT_BACKOFF_CONFIG,
  RATE_LIMIT_BACKOFF_CONFIG,
  calculateBackoffMs,
  getStatusCode,
  isRetryableError,
  parseRetryAfterMs,
  sleep,
} from "./backoff";
import {
  type CircuitBreakerConfig,
  type CircuitBreakerState,
  CircuitOpenError,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  createCircuitBreaker,
} from "./circuit-breaker";
import { type RequestCategory, SHEETS_QUOTAS, type SheetsQuotaConfig } from "./quotas";
import { type TokenBucket, createTokenBucket } from "./token-bucket";

export interface RequestPolicyConfig {
  quotas?: SheetsQuotaConfig;
  circuitBreakerConfig?: CircuitBreakerConfig;
  backoffConfig?: BackoffConfig;
  maxRetries?: number;
  defaultTimeoutMs?: number;
  logger?: Pick<Logger, "debug" | "info" | "warn">;
}

export interface ExecuteOptions {
  /** Operation name, used in logs */
  operation: string;
  category: RequestCategory;
  timeoutMs?: number;
  /** Custom retry check (default: isRetryableError) */
  retryable?: (error: unknown) => boolean;
  maxRetries?: number;
}

export interface RequestPolicyMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalRetries: number;
  rateLimitWaits: number;
  rateLimitWaitTimeMs: number;
  circuitBreakerTrips: number;
}

export interface RequestPolicy {
  execute: <T>(fn: () => Promise<T>, options: ExecuteOptions) => Promise<T>;
  getMetrics: () => RequestPolicyMetrics;
  getCircuitState: () => CircuitBreakerState;
  getAvailableTokens: (category: RequestCategory) => number;
}

export class RequestTimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = "RequestTimeoutError";
  }
}

export class MaxRetriesExceededError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(message);
    this.name = "MaxRetriesExceededError";
  }
}

const isHeadersRecord = (value: unknown): value is Record<string, string | undefined> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const withTimeout = <T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> =>
  new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new RequestTimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    fn()
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });

/**
 * Retry-After from a gaxios error (`response.headers`) or a plain `headers` field.
 */
const retryAfterFrom = (error: unknown): number | null => {
  if (error === null || typeof error !== "object") {
    return null;
  }
  let headers: unknown;
  if ("headers" in error) {
    headers = error.headers;
  } else if (
    "response" in error &&
    error.response !== null &&
    typeof error.response === "object" &&
    "headers" in error.response
  ) {
    headers = error.response.headers;
  }
  if (!isHeadersRecord(headers)) {
    return null;
  }
  return parseRetryAfterMs(headers["retry-after"] ?? headers["Retry-After"] ?? null);
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Creates the request policy used by the Google Sheets client.
 *
 * @example
 * ```typescript
 * const policy = createRequestPolicy({ logger });
 * const titles = await policy.execute(() => api.listTitles(), {
 *   operation: "listSheetTitles",
 *   category: "read",
 * });
 * ```
 */
export const createRequestPolicy = (config: RequestPolicyConfig = {}): RequestPolicy => {
  const {
    quotas = SHEETS_QUOTAS,
    circuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    backoffConfig = DEFAULT_BACKOFF_CONFIG,
    maxRetries = 3,
    defaultTimeoutMs = quotas.defaultTimeoutMs,
    logger,
  } = config;

  const buckets: Record<RequestCategory, TokenBucket> = {
    read: createTokenBucket(quotas.read),
    write: createTokenBucket(quotas.write),
  };

  const metrics: RequestPolicyMetrics = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    totalRetries: 0,
    rateLimitWaits: 0,
    rateLimitWaitTimeMs: 0,
    circuitBreakerTrips: 0,
  };

  const circuitBreaker = createCircuitBreaker({
    ...circuitBreakerConfig,
    onStateChange: (state) => {
      if (state === "OPEN") {
        metrics.circuitBreakerTrips++;
        logger?.warn("Spreadsheet circuit breaker opened", { trips: metrics.circuitBreakerTrips });
      } else if (state === "CLOSED") {
        logger?.info("Spreadsheet circuit breaker closed");
      }
    },
  });

  const execute = async <T>(fn: () => Promise<T>, options: ExecuteOptions): Promise<T> => {
    const {
      operation,
      category,
      timeoutMs = defaultTimeoutMs,
      retryable = isRetryableError,
      maxRetries: retryLimit = maxRetries,
    } = options;

    metrics.totalRequests++;
    const bucket = buckets[category];

    let attempt = 0;

    for (;;) {
      try {
        const waitedMs = await bucket.acquire();
        if (waitedMs > 0) {
          metrics.rateLimitWaits++;
          metrics.rateLimitWaitTimeMs += waitedMs;
          logger?.debug("Rate limit wait", { operation, category, waitedMs });
        }

        const result = await circuitBreaker.execute(() => withTimeout(fn, timeoutMs));

        bucket.recover();
        metrics.successfulRequests++;
        if (attempt > 0) {
          logger?.info("Request succeeded after retry", { operation, attempt });
        }
        return result;
      } catch (error) {
        if (error instanceof CircuitOpenError) {
          metrics.failedRequests++;
          logger?.warn("Request failed: circuit open", { operation });
          throw error;
        }

        if (!retryable(error)) {
          metrics.failedRequests++;
          logger?.warn("Request failed: non-retryable error", {
            operation,
            error: describeError(error),
          });
          throw error;
        }

        if (attempt >= retryLimit) {
          metrics.failedRequests++;
          throw new MaxRetriesExceededError(
            `Max retries (${retryLimit}) exceeded for ${operation}`,
            attempt + 1,
            error,
          );
        }

        const is429 = error !== null && typeof error === "object" && getStatusCode(error) === 429;
        if (is429) {
          bucket.penalize(0.5);
        }
        const backoffMs =
          retryAfterFrom(error) ??
          calculateBackoffMs(attempt, is429 ? RATE_LIMIT_BACKOFF_CONFIG : backoffConfig);

        metrics.totalRetries++;
        logger?.debug("Retrying request", {
          operation,
          attempt,
          backoffMs,
          error: describeError(error),
        });

        await sleep(backoffMs);
        attempt++;
      }
    }
  };

  return {
    execute,
    getMetrics: () => ({ ...metrics }),
    getCircuitState: () => circuitBreaker.getState(),
    getAvailableTokens: (category) => buckets[category].available(),
  };
};
