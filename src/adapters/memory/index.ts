export { createMemorySpreadsheet, type MemorySpreadsheet, type MemorySpreadsheetConfig } from "./adapter";
