export { createGoogleSheetsAdapter, quoteSheetName, type GoogleSheetsAdapterConfig } from "./adapter";
export {
  createGoogleSheetsClient,
  loadServiceAccountKey,
  SHEETS_SCOPE,
  type GoogleSheetsClientConfig,
  type ServiceAccountKey,
  type ServiceAccountSource,
  type SheetsClient,
  type SheetTab,
} from "./client";
export { toSpreadsheetError } from "./errors";
