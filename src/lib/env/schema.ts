import * as v from "valibot";

import { isValidTimeZone } from "@/domains/sync/timestamp";

import { logLevelSchema } from "../logger/schema";

const integerFromString = (min: number, max: number) =>
  v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(min), v.maxValue(max));

const commaList = v.pipe(
  v.string(),
  v.transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  ),
);

export const envSchema = v.object({
  // Database
  DATABASE_URL: v.pipe(v.string(), v.minLength(1)),

  // Server
  PORT: integerFromString(1, 65535),
  NODE_ENV: v.picklist(["development", "production", "test"]),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Google Sheets
  GOOGLE_SPREADSHEET_ID: v.optional(v.pipe(v.string(), v.minLength(1))),
  GOOGLE_SERVICE_ACCOUNT_JSON: v.optional(v.pipe(v.string(), v.minLength(1))),
  GOOGLE_SERVICE_ACCOUNT_PATH: v.optional(v.pipe(v.string(), v.minLength(1))),
  SHEET_TIMEZONE: v.optional(
    v.pipe(v.string(), v.check(isValidTimeZone, "Unknown IANA time zone")),
    "UTC",
  ),

  // Partitioning
  PARTITION_MODE: v.optional(v.picklist(["single", "groups"]), "groups"),
  LEGACY_SHEET_NAME: v.optional(v.pipe(v.string(), v.minLength(1)), "Sheet1"),
  IGNORED_TABS: v.optional(commaList, ""),
  RENAME_DETECTION: v.optional(v.picklist(["heuristic", "explicit"]), "heuristic"),
  PARTITION_CACHE_TTL_MS: v.optional(integerFromString(0, 86_400_000), "60000"),

  // Sync
  DEFAULT_SYNC_INTERVAL_SECONDS: v.optional(integerFromString(5, 3600), "10"),
  CLOCK_SKEW_TOLERANCE_MS: v.optional(integerFromString(0, 3_600_000), "0"),

  // Ledger
  DEFAULT_COMMISSION_RATE: v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.minValue(0), v.maxValue(1)),
    "0.1",
  ),
});

export type Env = v.InferOutput<typeof envSchema>;
