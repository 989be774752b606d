export {
  createTokenBucket,
  type TokenBucket,
  type TokenBucketConfig,
} from "./token-bucket";

export {
  calculateBackoffMs,
  CONFLICT_BACKOFF_CONFIG,
  DEFAULT_BACKOFF_CONFIG,
  getStatusCode,
  isRetryableError,
  isRetryableStatusCode,
  NETWORK_ERROR_CODES,
  parseRetryAfterMs,
  RATE_LIMIT_BACKOFF_CONFIG,
  sleep,
  type BackoffConfig,
} from "./backoff";

export {
  CircuitOpenError,
  createCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
} from "./circuit-breaker";

export { SHEETS_QUOTAS, type RequestCategory, type SheetsQuotaConfig } from "./quotas";

export {
  createRequestPolicy,
  MaxRetriesExceededError,
  RequestTimeoutError,
  type ExecuteOptions,
  type RequestPolicy,
  type RequestPolicyConfig,
  type RequestPolicyMetrics,
} from "./request-policy";
