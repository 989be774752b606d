/**
 * Spreadsheet backend configuration.
 */

import * as v from "valibot";

import { isValidTimeZone } from "@/domains/sync";

const timeZoneSchema = v.pipe(v.string(), v.check(isValidTimeZone, "Unknown IANA time zone"));

export const SpreadsheetConfigSchema = v.variant("backend", [
  v.object({
    backend: v.literal("google"),
    spreadsheetId: v.pipe(v.string(), v.minLength(1)),
    serviceAccountJson: v.optional(v.pipe(v.string(), v.minLength(1))),
    serviceAccountPath: v.optional(v.pipe(v.string(), v.minLength(1))),
    timeZone: timeZoneSchema,
  }),
  v.object({
    backend: v.literal("memory"),
    timeZone: timeZoneSchema,
  }),
]);

export type SpreadsheetConfig = v.InferOutput<typeof SpreadsheetConfigSchema>;

export const parseSpreadsheetConfig = (config: unknown): SpreadsheetConfig =>
  v.parse(SpreadsheetConfigSchema, config);

export interface SheetsSettings {
  spreadsheetId: string | undefined;
  serviceAccountJson: string | undefined;
  serviceAccountPath: string | undefined;
  timeZone: string;
}

/**
 * Picks the Google backend when a spreadsheet id and some credential source
 * are configured, the in-memory backend otherwise.
 */
export const resolveSpreadsheetConfig = (sheets: SheetsSettings): SpreadsheetConfig => {
  const { spreadsheetId, serviceAccountJson, serviceAccountPath, timeZone } = sheets;
  if (spreadsheetId && (serviceAccountJson || serviceAccountPath)) {
    return parseSpreadsheetConfig({
      backend: "google",
      spreadsheetId,
      serviceAccountJson,
      serviceAccountPath,
      timeZone,
    });
  }
  return parseSpreadsheetConfig({ backend: "memory", timeZone });
};
