/**
 * Spreadsheet adapter port and row types.
 *
 * One tab per partition. Row 1 is the header
 * `UserID | FullName | Phone | Username | Points | LastUpdated`; data starts on row 2.
 */

export const SHEET_HEADER = ["UserID", "FullName", "Phone", "Username", "Points", "LastUpdated"] as const;

export interface RowFields {
  id: string;
  fullName: string;
  phone: string;
  username: string;
  balance: number;
  /** Raw cell text */
  lastUpdated: string;
}

export interface SpreadsheetRow extends RowFields {
  /** 1-based sheet row */
  rowNumber: number;
  /** `lastUpdated` parsed in the sheet's zone; null when blank or malformed */
  lastUpdatedAt: Date | null;
}

export type RowUpdate = Partial<Omit<RowFields, "id">>;

export type RowIssueCode = "MISSING_ID" | "MALFORMED_BALANCE" | "MALFORMED_TIMESTAMP" | "DUPLICATE_ID";

/**
 * A row-level problem. Rows with MISSING_ID or DUPLICATE_ID are left out of
 * the result; the others are kept with the bad value replaced.
 */
export interface RowIssue {
  code: RowIssueCode;
  sheetName: string;
  rowNumber: number;
  id?: string;
  value?: string;
  message: string;
}

export interface ReadRowsResult {
  rows: SpreadsheetRow[];
  issues: RowIssue[];
}

export interface SpreadsheetAdapter {
  /** Tab names in sheet order */
  listPartitionNames(): Promise<string[]>;
  /** Adds a tab and writes the header row; ALREADY_EXISTS if the name is taken */
  createPartition(name: string): Promise<void>;
  renamePartition(oldName: string, newName: string): Promise<void>;
  readRows(name: string): Promise<ReadRowsResult>;
  /** Updates the given fields of the first row with `id`; NOT_FOUND if absent */
  writeRow(name: string, id: string, fields: RowUpdate): Promise<void>;
  /** Deletes the first row with `id`; NOT_FOUND if absent */
  deleteRow(name: string, id: string): Promise<void>;
  appendRow(name: string, fields: RowFields): Promise<void>;
}
