/**
 * Spreadsheet adapter exports.
 */

export type {
  ReadRowsResult,
  RowFields,
  RowIssue,
  RowIssueCode,
  RowUpdate,
  SpreadsheetAdapter,
  SpreadsheetRow,
} from "./types";
export { SHEET_HEADER } from "./types";

export { SpreadsheetError, isSpreadsheetError } from "./errors";
export type { SpreadsheetErrorCode } from "./errors";

export { decodeRows, encodeRow, headerCells } from "./normalizers";
export type { CellValue } from "./normalizers";

// Factory function
export { createSpreadsheetAdapter } from "./factory";
export type { SpreadsheetAdapterDeps } from "./factory";

// Config validation
export {
  SpreadsheetConfigSchema,
  parseSpreadsheetConfig,
  resolveSpreadsheetConfig,
} from "./config";
export type { SheetsSettings, SpreadsheetConfig } from "./config";

// Backends
export { createMemorySpreadsheet } from "./memory";
export type { MemorySpreadsheet, MemorySpreadsheetConfig } from "./memory";
export { createGoogleSheetsAdapter, createGoogleSheetsClient, loadServiceAccountKey } from "./google-sheets";
export type { SheetsClient, SheetTab } from "./google-sheets";
