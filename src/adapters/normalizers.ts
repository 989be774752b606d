/**
 * Row codec shared by every spreadsheet adapter: cells in, typed rows and
 * row issues out, and back.
 */

import { isBlankTimestamp, parseSheetTimestamp } from "@/domains/sync";

import { type ReadRowsResult, type RowFields, type RowIssue, SHEET_HEADER, type SpreadsheetRow } from "./types";

export type CellValue = string | number;

const INTEGER = /^[+-]?\d+$/;

const cell = (row: readonly CellValue[], index: number): string => {
  const value = row[index];
  return value === undefined ? "" : String(value).trim();
};

export const headerCells = (): string[] => [...SHEET_HEADER];

/**
 * Decodes data rows. `values[0]` is sheet row 2. Fully blank rows are skipped
 * silently; for duplicate ids the first row wins.
 */
export const decodeRows = (
  sheetName: string,
  values: readonly (readonly CellValue[])[],
  timeZone: string,
): ReadRowsResult => {
  const rows: SpreadsheetRow[] = [];
  const issues: RowIssue[] = [];
  const seen = new Set<string>();

  values.forEach((raw, index) => {
    const rowNumber = index + 2;
    const cells = SHEET_HEADER.map((_, column) => cell(raw, column));
    if (cells.every((value) => value === "")) {
      return;
    }

    const [id = "", fullName = "", phone = "", username = "", points = "", lastUpdated = ""] = cells;

    if (id === "") {
      issues.push({
        code: "MISSING_ID",
        sheetName,
        rowNumber,
        message: `Row ${rowNumber} has no UserID`,
      });
      return;
    }
    if (seen.has(id)) {
      issues.push({
        code: "DUPLICATE_ID",
        sheetName,
        rowNumber,
        id,
        message: `UserID ${id} already appears above row ${rowNumber}`,
      });
      return;
    }
    seen.add(id);

    let balance = 0;
    if (points !== "") {
      if (INTEGER.test(points)) {
        balance = Number.parseInt(points, 10);
      } else {
        issues.push({
          code: "MALFORMED_BALANCE",
          sheetName,
          rowNumber,
          id,
          value: points,
          message: `Points value "${points}" for ${id} is not an integer; using 0`,
        });
      }
    }

    const lastUpdatedAt = parseSheetTimestamp(lastUpdated, timeZone);
    if (lastUpdatedAt === null && !isBlankTimestamp(lastUpdated)) {
      issues.push({
        code: "MALFORMED_TIMESTAMP",
        sheetName,
        rowNumber,
        id,
        value: lastUpdated,
        message: `LastUpdated value "${lastUpdated}" for ${id} is not a recognised timestamp`,
      });
    }

    rows.push({ id, fullName, phone, username, balance, lastUpdated, lastUpdatedAt, rowNumber });
  });

  return { rows, issues };
};

export const encodeRow = (fields: RowFields): CellValue[] => [
  fields.id,
  fields.fullName,
  fields.phone,
  fields.username,
  fields.balance,
  fields.lastUpdated,
];

const FIELD_COLUMNS = {
  fullName: 1,
  phone: 2,
  username: 3,
  balance: 4,
  lastUpdated: 5,
} as const;

export type UpdatableField = keyof typeof FIELD_COLUMNS;

/**
 * Zero-based column index of a row field.
 */
export const columnOf = (field: UpdatableField): number => FIELD_COLUMNS[field];

export const columnLetter = (index: number): string => String.fromCharCode("A".charCodeAt(0) + index);

const UPDATABLE_FIELDS: readonly UpdatableField[] = ["fullName", "phone", "username", "balance", "lastUpdated"];

/**
 * Fields present in an update, in column order.
 */
export const updatableFields = (fields: Partial<Record<UpdatableField, unknown>>): UpdatableField[] =>
  UPDATABLE_FIELDS.filter((field) => fields[field] !== undefined);
