/**
 * Exponential backoff utilities shared by the Sheets request policy and the
 * ledger's optimistic-concurrency retry loop.
 */

export interface BackoffConfig {
  /** Initial delay before first retry (ms) */
  initialDelayMs: number;
  /** Maximum delay between retries (ms) */
  maxDelayMs: number;
  /** Multiplier for exponential growth */
  multiplier: number;
  /** Jitter factor (0-1) */
  jitterFactor: number;
}

/**
 * Default backoff for spreadsheet API calls: 1s, doubling, capped at 60s, 10% jitter.
 */
export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Backoff after a quota rejection (HTTP 429). Sheets quotas are per minute,
 * so this grows faster and caps higher.
 */
export const RATE_LIMIT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 2000,
  maxDelayMs: 120000,
  multiplier: 3,
  jitterFactor: 0.2,
};

/**
 * Short backoff for compare-and-swap conflicts on a single ledger record.
 */
export const CONFLICT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 5,
  maxDelayMs: 200,
  multiplier: 2,
  jitterFactor: 0.5,
};

/**
 * Calculates backoff delay for a given attempt number.
 *
 * @param attempt - 0-indexed, so the first retry is attempt 0
 *
 * @example
 * ```typescript
 * calculateBackoffMs(0); // ~1000ms
 * calculateBackoffMs(2); // ~4000ms
 * ```
 */
export const calculateBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number => {
  const { initialDelayMs, maxDelayMs, multiplier, jitterFactor } = config;

  const baseDelayMs = initialDelayMs * multiplier ** attempt;
  const cappedDelayMs = Math.min(baseDelayMs, maxDelayMs);
  const jitter = cappedDelayMs * jitterFactor * Math.random();

  return Math.floor(cappedDelayMs + jitter);
};

/**
 * Parses a Retry-After header value (seconds or HTTP date).
 *
 * @returns Delay in milliseconds, or null if parsing fails
 */
export const parseRetryAfterMs = (value: string | null): number | null => {
  if (!value) {
    return null;
  }

  if (/^\d+$/.test(value)) {
    return Number.parseInt(value, 10) * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const delayMs = date - Date.now();
    return delayMs > 0 ? delayMs : 0;
  }

  return null;
};

export const RETRYABLE_STATUS_CODES = new Set([
  429, // Too Many Requests (per-minute quota)
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

export const NON_RETRYABLE_STATUS_CODES = new Set([
  400, // Bad Request (invalid range, bad tab name)
  401, // Unauthorized
  403, // Forbidden (sheet not shared with the service account)
  404, // Not Found (spreadsheet id)
  409, // Conflict (duplicate tab title)
]);

export const isRetryableStatusCode = (statusCode: number): boolean =>
  RETRYABLE_STATUS_CODES.has(statusCode);

const NON_RETRYABLE_ERROR_NAMES = new Set([
  "RequestTimeoutError",
  "CircuitOpenError",
  "MaxRetriesExceededError",
  "LedgerError",
  "SettingsError",
]);

/**
 * Extracts an HTTP status code from an error object without type casts.
 *
 * googleapis (gaxios) errors carry `status`, a numeric-string `code`, or
 * `response.status` depending on the failure path.
 */
export const getStatusCode = (err: object): number | undefined => {
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  if ("code" in err) {
    if (typeof err.code === "number") {
      return err.code;
    }
    if (typeof err.code === "string" && /^\d{3}$/.test(err.code)) {
      return Number.parseInt(err.code, 10);
    }
  }
  if (
    "response" in err &&
    err.response !== null &&
    typeof err.response === "object" &&
    "status" in err.response &&
    typeof err.response.status === "number"
  ) {
    return err.response.status;
  }
  return undefined;
};

export const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const NON_RETRYABLE_PATTERNS = [
  "unable to parse range",
  "requested entity was not found",
  "the caller does not have permission",
  "invalid_grant",
  "already exists",
];

/**
 * Checks if an error is worth retrying.
 *
 * Retryable: 429, 5xx, network errors, and anything unrecognised.
 * Not retryable: auth/permission and validation failures, domain errors,
 * timeouts and open circuits.
 */
export const isRetryableError = (error: unknown): boolean => {
  if (error !== null && typeof error === "object") {
    if (
      "name" in error &&
      typeof error.name === "string" &&
      NON_RETRYABLE_ERROR_NAMES.has(error.name)
    ) {
      return false;
    }

    const statusCode = getStatusCode(error);
    if (statusCode !== undefined) {
      if (NON_RETRYABLE_STATUS_CODES.has(statusCode)) {
        return false;
      }
      if (RETRYABLE_STATUS_CODES.has(statusCode)) {
        return true;
      }
    }

    if ("code" in error && typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code)) {
      return true;
    }

    if ("message" in error && typeof error.message === "string") {
      const message = error.message.toLowerCase();
      if (NON_RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern))) {
        return false;
      }
    }
  }

  return true;
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
