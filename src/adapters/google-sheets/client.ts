/**
 * Thin Google Sheets API v4 client. Every call goes through the request
 * policy (quota buckets, circuit breaker, retry, timeout).
 *
 * Credentials come from GOOGLE_SERVICE_ACCOUNT_JSON (inline JSON) or, failing
 * that, the key file at GOOGLE_SERVICE_ACCOUNT_PATH.
 */

import { readFileSync } from "node:fs";

import { google, type sheets_v4 } from "googleapis";
import * as v from "valibot";

import type { RequestPolicy } from "@/lib/rate-limiter";

import type { CellValue } from "../normalizers";

export const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";

export interface SheetTab {
  sheetId: number;
  title: string;
}

/**
 * The Sheets operations the adapter needs. Ranges use A1 notation.
 */
export interface SheetsClient {
  listSheets(): Promise<SheetTab[]>;
  addSheet(title: string): Promise<SheetTab>;
  renameSheet(sheetId: number, title: string): Promise<void>;
  getValues(range: string): Promise<string[][]>;
  updateValues(range: string, values: CellValue[][]): Promise<void>;
  batchUpdateValues(data: { range: string; values: CellValue[][] }[]): Promise<void>;
  appendValues(range: string, values: CellValue[][]): Promise<void>;
  /** Deletes rows [startIndex, endIndex) (0-based) */
  deleteRows(sheetId: number, startIndex: number, endIndex: number): Promise<void>;
}

const serviceAccountKeySchema = v.object({
  client_email: v.pipe(v.string(), v.minLength(1)),
  private_key: v.pipe(v.string(), v.minLength(1)),
});

export type ServiceAccountKey = v.InferOutput<typeof serviceAccountKeySchema>;

export interface ServiceAccountSource {
  json?: string;
  path?: string;
}

/**
 * Reads and validates the service account key from inline JSON or a file.
 */
export const loadServiceAccountKey = (
  source: ServiceAccountSource,
  readFile: (path: string) => string = (path) => readFileSync(path, "utf-8"),
): ServiceAccountKey => {
  let raw: string;
  if (source.json) {
    raw = source.json;
  } else if (source.path) {
    raw = readFile(source.path);
  } else {
    throw new Error(
      "Google service account credentials not found: set GOOGLE_SERVICE_ACCOUNT_JSON or GOOGLE_SERVICE_ACCOUNT_PATH",
    );
  }
  const parsed: unknown = JSON.parse(raw);
  return v.parse(serviceAccountKeySchema, parsed);
};

const toCellStrings = (values: unknown[][] | null | undefined): string[][] =>
  (values ?? []).map((row) =>
    row.map((value) => (value === null || value === undefined ? "" : String(value))),
  );

const toTab = (sheet: sheets_v4.Schema$Sheet | undefined): SheetTab | null => {
  const sheetId = sheet?.properties?.sheetId;
  const title = sheet?.properties?.title;
  return typeof sheetId === "number" && typeof title === "string" ? { sheetId, title } : null;
};

export interface GoogleSheetsClientConfig {
  spreadsheetId: string;
  key: ServiceAccountKey;
  policy: RequestPolicy;
}

export const createGoogleSheetsClient = (config: GoogleSheetsClientConfig): SheetsClient => {
  const { spreadsheetId, key, policy } = config;

  const auth = new google.auth.JWT({
    email: key.client_email,
    key: key.private_key,
    scopes: [SHEETS_SCOPE],
  });
  const api = google.sheets({ version: "v4", auth });

  const batchUpdate = (operation: string, requests: sheets_v4.Schema$Request[]) =>
    policy.execute(
      () => api.spreadsheets.batchUpdate({ spreadsheetId, requestBody: { requests } }),
      { operation, category: "write" },
    );

  return {
    listSheets: async () => {
      const response = await policy.execute(
        () => api.spreadsheets.get({ spreadsheetId, fields: "sheets.properties(sheetId,title)" }),
        { operation: "listSheets", category: "read" },
      );
      return (response.data.sheets ?? [])
        .map(toTab)
        .filter((tab): tab is SheetTab => tab !== null);
    },

    addSheet: async (title) => {
      const response = await batchUpdate("addSheet", [{ addSheet: { properties: { title } } }]);
      const properties = response.data.replies?.[0]?.addSheet?.properties;
      const tab = toTab(properties ? { properties } : undefined);
      if (!tab) {
        throw new Error(`Sheets API returned no properties for new sheet ${title}`);
      }
      return tab;
    },

    renameSheet: async (sheetId, title) => {
      await batchUpdate("renameSheet", [
        { updateSheetProperties: { properties: { sheetId, title }, fields: "title" } },
      ]);
    },

    getValues: async (range) => {
      const response = await policy.execute(
        () =>
          api.spreadsheets.values.get({
            spreadsheetId,
            range,
            valueRenderOption: "FORMATTED_VALUE",
          }),
        { operation: "getValues", category: "read" },
      );
      return toCellStrings(response.data.values);
    },

    updateValues: async (range, values) => {
      await policy.execute(
        () =>
          api.spreadsheets.values.update({
            spreadsheetId,
            range,
            valueInputOption: "RAW",
            requestBody: { values },
          }),
        { operation: "updateValues", category: "write" },
      );
    },

    batchUpdateValues: async (data) => {
      if (data.length === 0) {
        return;
      }
      await policy.execute(
        () =>
          api.spreadsheets.values.batchUpdate({
            spreadsheetId,
            requestBody: { valueInputOption: "RAW", data },
          }),
        { operation: "batchUpdateValues", category: "write" },
      );
    },

    appendValues: async (range, values) => {
      await policy.execute(
        () =>
          api.spreadsheets.values.append({
            spreadsheetId,
            range,
            valueInputOption: "RAW",
            insertDataOption: "INSERT_ROWS",
            requestBody: { values },
          }),
        { operation: "appendValues", category: "write" },
      );
    },

    deleteRows: async (sheetId, startIndex, endIndex) => {
      await batchUpdate("deleteRows", [
        {
          deleteDimension: {
            range: { sheetId, dimension: "ROWS", startIndex, endIndex },
          },
        },
      ]);
    },
  };
};
