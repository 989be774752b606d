import { type Env, getEnv } from "./env";
import type { LogLevel } from "./logger";

export interface AppConfig {
  database: {
    url: string;
  };
  server: {
    port: number;
    nodeEnv: Env["NODE_ENV"];
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  sheets: {
    spreadsheetId: string | undefined;
    serviceAccountJson: string | undefined;
    serviceAccountPath: string | undefined;
    timeZone: string;
  };
  partitions: {
    mode: Env["PARTITION_MODE"];
    legacySheetName: string;
    ignoredTabs: string[];
    renameDetection: Env["RENAME_DETECTION"];
    cacheTtlMs: number;
  };
  sync: {
    defaultIntervalSeconds: number;
    clockSkewToleranceMs: number;
  };
  ledger: {
    defaultCommissionRate: number;
  };
}

export const loadConfig = (env: Env = getEnv()): AppConfig => ({
  database: {
    url: env.DATABASE_URL,
  },
  server: {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  },
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    pretty: env.NODE_ENV === "development",
  },
  sheets: {
    spreadsheetId: env.GOOGLE_SPREADSHEET_ID,
    serviceAccountJson: env.GOOGLE_SERVICE_ACCOUNT_JSON,
    serviceAccountPath: env.GOOGLE_SERVICE_ACCOUNT_PATH,
    timeZone: env.SHEET_TIMEZONE,
  },
  partitions: {
    mode: env.PARTITION_MODE,
    legacySheetName: env.LEGACY_SHEET_NAME,
    ignoredTabs: env.IGNORED_TABS,
    renameDetection: env.RENAME_DETECTION,
    cacheTtlMs: env.PARTITION_CACHE_TTL_MS,
  },
  sync: {
    defaultIntervalSeconds: env.DEFAULT_SYNC_INTERVAL_SECONDS,
    clockSkewToleranceMs: env.CLOCK_SKEW_TOLERANCE_MS,
  },
  ledger: {
    defaultCommissionRate: env.DEFAULT_COMMISSION_RATE,
  },
});
