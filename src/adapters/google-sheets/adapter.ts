import type { Logger } from "@/lib/logger";

import { SpreadsheetError } from "../errors";
import {
  columnLetter,
  columnOf,
  decodeRows,
  encodeRow,
  headerCells,
  updatableFields,
} from "../normalizers";
import { SHEET_HEADER, type SpreadsheetAdapter } from "../types";
import type { SheetTab, SheetsClient } from "./client";
import { toSpreadsheetError } from "./errors";

export interface GoogleSheetsAdapterConfig {
  client: SheetsClient;
  timeZone: string;
  logger?: Logger;
}

const LAST_COLUMN = columnLetter(SHEET_HEADER.length - 1);

/**
 * Quotes a tab name for A1 notation: `'10 A'!A2:F`.
 */
export const quoteSheetName = (name: string): string => `'${name.replaceAll("'", "''")}'`;

export const createGoogleSheetsAdapter = (config: GoogleSheetsAdapterConfig): SpreadsheetAdapter => {
  const { client, timeZone, logger } = config;

  const wrap = async <T>(operation: string, sheetName: string | undefined, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (error) {
      const mapped = toSpreadsheetError(error, operation, sheetName);
      logger?.warn("Spreadsheet operation failed", {
        operation,
        sheetName,
        code: mapped.code,
      });
      throw mapped;
    }
  };

  const findTab = async (name: string): Promise<SheetTab> => {
    const tab = (await client.listSheets()).find((sheet) => sheet.title === name);
    if (!tab) {
      throw new SpreadsheetError(`Sheet not found: ${name}`, "NOT_FOUND", name);
    }
    return tab;
  };

  /**
   * Locates the first data row with `id` by reading column A.
   */
  const findRowNumber = async (name: string, id: string): Promise<number> => {
    const ids = await client.getValues(`${quoteSheetName(name)}!A2:A`);
    const index = ids.findIndex((row) => (row[0] ?? "").trim() === id);
    if (index < 0) {
      throw new SpreadsheetError(`Row ${id} not found in ${name}`, "NOT_FOUND", name);
    }
    return index + 2;
  };

  return {
    listPartitionNames: () =>
      wrap("listPartitionNames", undefined, async () =>
        (await client.listSheets()).map((tab) => tab.title),
      ),

    createPartition: (name) =>
      wrap("createPartition", name, async () => {
        const existing = await client.listSheets();
        if (existing.some((tab) => tab.title === name)) {
          throw new SpreadsheetError(`Sheet already exists: ${name}`, "ALREADY_EXISTS", name);
        }
        await client.addSheet(name);
        await client.updateValues(`${quoteSheetName(name)}!A1:${LAST_COLUMN}1`, [headerCells()]);
      }),

    renamePartition: (oldName, newName) =>
      wrap("renamePartition", oldName, async () => {
        const tab = await findTab(oldName);
        await client.renameSheet(tab.sheetId, newName);
      }),

    readRows: (name) =>
      wrap("readRows", name, async () => {
        const values = await client.getValues(`${quoteSheetName(name)}!A2:${LAST_COLUMN}`);
        return decodeRows(name, values, timeZone);
      }),

    writeRow: (name, id, fields) =>
      wrap("writeRow", name, async () => {
        const rowNumber = await findRowNumber(name, id);
        const data = updatableFields(fields).map((field) => {
          const column = columnLetter(columnOf(field));
          const value = fields[field];
          return {
            range: `${quoteSheetName(name)}!${column}${rowNumber}`,
            values: [[value ?? ""]],
          };
        });
        await client.batchUpdateValues(data);
      }),

    deleteRow: (name, id) =>
      wrap("deleteRow", name, async () => {
        const tab = await findTab(name);
        const rowNumber = await findRowNumber(name, id);
        await client.deleteRows(tab.sheetId, rowNumber - 1, rowNumber);
      }),

    appendRow: (name, fields) =>
      wrap("appendRow", name, async () => {
        await client.appendValues(`${quoteSheetName(name)}!A:${LAST_COLUMN}`, [encodeRow(fields)]);
      }),
  };
};
