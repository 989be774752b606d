import type { TokenBucketConfig } from "./token-bucket";

/**
 * Request categories for the spreadsheet API. Reads and writes are metered
 * against separate per-minute quotas.
 */
export type RequestCategory = "read" | "write";

export interface SheetsQuotaConfig {
  read: TokenBucketConfig;
  write: TokenBucketConfig;
  defaultTimeoutMs: number;
}

/**
 * Google Sheets allows 300 read and 300 write requests per minute per project
 * (60 per user). Buckets are sized to the per-user limit.
 */
export const SHEETS_QUOTAS: SheetsQuotaConfig = {
  read: { maxTokens: 60, refillRatePerSecond: 1 },
  write: { maxTokens: 60, refillRatePerSecond: 1 },
  defaultTimeoutMs: 15000,
};
