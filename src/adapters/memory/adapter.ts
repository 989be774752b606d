/**
 * In-memory spreadsheet. Stores raw cells per tab and decodes them with the
 * same codec as the Google adapter, so malformed cells behave identically.
 * Used by tests and by local runs without Google credentials.
 */

import { SpreadsheetError } from "../errors";
import { type CellValue, columnOf, decodeRows, encodeRow, headerCells, updatableFields } from "../normalizers";
import type { SpreadsheetAdapter } from "../types";

export interface MemorySpreadsheetConfig {
  timeZone?: string;
  /** Initial tabs: name → data rows (without header) */
  tabs?: Record<string, CellValue[][]>;
}

export interface MemorySpreadsheet extends SpreadsheetAdapter {
  /** Replaces a tab's data rows, creating the tab if needed */
  setCells: (name: string, rows: CellValue[][]) => void;
  /** Data rows (without header) as strings */
  getCells: (name: string) => string[][];
  removeTab: (name: string) => void;
}

export const createMemorySpreadsheet = (config: MemorySpreadsheetConfig = {}): MemorySpreadsheet => {
  const { timeZone = "UTC" } = config;
  const tabs = new Map<string, string[][]>();

  const toStrings = (row: readonly CellValue[]): string[] => row.map((value) => String(value));

  const tab = (name: string): string[][] => {
    const rows = tabs.get(name);
    if (!rows) {
      throw new SpreadsheetError(`Sheet not found: ${name}`, "NOT_FOUND", name);
    }
    return rows;
  };

  const findRow = (name: string, id: string): number => {
    const rows = tab(name);
    const index = rows.findIndex((row) => (row[0] ?? "").trim() === id);
    if (index <= 0) {
      throw new SpreadsheetError(`Row ${id} not found in ${name}`, "NOT_FOUND", name);
    }
    return index;
  };

  for (const [name, rows] of Object.entries(config.tabs ?? {})) {
    tabs.set(name, [headerCells(), ...rows.map(toStrings)]);
  }

  return {
    listPartitionNames: async () => [...tabs.keys()],

    createPartition: async (name) => {
      if (tabs.has(name)) {
        throw new SpreadsheetError(`Sheet already exists: ${name}`, "ALREADY_EXISTS", name);
      }
      tabs.set(name, [headerCells()]);
    },

    renamePartition: async (oldName, newName) => {
      const rows = tab(oldName);
      if (tabs.has(newName)) {
        throw new SpreadsheetError(`Sheet already exists: ${newName}`, "ALREADY_EXISTS", newName);
      }
      tabs.delete(oldName);
      tabs.set(newName, rows);
    },

    readRows: async (name) => decodeRows(name, tab(name).slice(1), timeZone),

    writeRow: async (name, id, fields) => {
      const row = tab(name)[findRow(name, id)];
      if (!row) {
        throw new SpreadsheetError(`Row ${id} not found in ${name}`, "NOT_FOUND", name);
      }
      for (const field of updatableFields(fields)) {
        const column = columnOf(field);
        while (row.length <= column) {
          row.push("");
        }
        row[column] = String(fields[field]);
      }
    },

    deleteRow: async (name, id) => {
      tab(name).splice(findRow(name, id), 1);
    },

    appendRow: async (name, fields) => {
      tab(name).push(toStrings(encodeRow(fields)));
    },

    setCells: (name, rows) => {
      tabs.set(name, [headerCells(), ...rows.map(toStrings)]);
    },

    getCells: (name) => tab(name).slice(1).map((row) => [...row]),

    removeTab: (name) => {
      tabs.delete(name);
    },
  };
};
