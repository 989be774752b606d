/**
 * Factory for the spreadsheet adapter.
 */

import type { Logger } from "@/lib/logger";
import { type RequestPolicy, createRequestPolicy } from "@/lib/rate-limiter";

import type { SpreadsheetConfig } from "./config";
import { createGoogleSheetsAdapter, createGoogleSheetsClient, loadServiceAccountKey } from "./google-sheets";
import { createMemorySpreadsheet } from "./memory";
import type { SpreadsheetAdapter } from "./types";

export interface SpreadsheetAdapterDeps {
  logger: Logger;
  /** Defaults to a policy with the Sheets quotas */
  policy?: RequestPolicy;
}

export const createSpreadsheetAdapter = (
  config: SpreadsheetConfig,
  deps: SpreadsheetAdapterDeps,
): SpreadsheetAdapter => {
  const logger = deps.logger.child({ component: "spreadsheet" });

  switch (config.backend) {
    case "google": {
      const key = loadServiceAccountKey({
        json: config.serviceAccountJson,
        path: config.serviceAccountPath,
      });
      const policy = deps.policy ?? createRequestPolicy({ logger });
      const client = createGoogleSheetsClient({ spreadsheetId: config.spreadsheetId, key, policy });
      logger.info("Using Google Sheets backend", { spreadsheetId: config.spreadsheetId });
      return createGoogleSheetsAdapter({ client, timeZone: config.timeZone, logger });
    }
    case "memory":
      logger.warn("No spreadsheet credentials configured; using in-memory spreadsheet");
      return createMemorySpreadsheet({ timeZone: config.timeZone });
  }
};
