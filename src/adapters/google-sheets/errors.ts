import {
  CircuitOpenError,
  MaxRetriesExceededError,
  NETWORK_ERROR_CODES,
  RequestTimeoutError,
  getStatusCode,
} from "@/lib/rate-limiter";

import { SpreadsheetError, type SpreadsheetErrorCode } from "../errors";

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const classify = (error: unknown): SpreadsheetErrorCode => {
  if (error instanceof MaxRetriesExceededError) {
    return classify(error.lastError);
  }
  if (error instanceof CircuitOpenError || error instanceof RequestTimeoutError) {
    return "NETWORK_ERROR";
  }
  if (error === null || typeof error !== "object") {
    return "UNKNOWN";
  }
  if ("code" in error && typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code)) {
    return "NETWORK_ERROR";
  }
  const message = messageOf(error).toLowerCase();
  switch (getStatusCode(error)) {
    case 401:
    case 403:
      return "PERMISSION_DENIED";
    case 404:
      return "NOT_FOUND";
    case 409:
      return "ALREADY_EXISTS";
    case 429:
      return "RATE_LIMITED";
    case 400:
      if (message.includes("already exists")) {
        return "ALREADY_EXISTS";
      }
      if (message.includes("unable to parse range")) {
        return "NOT_FOUND";
      }
      return "UNKNOWN";
    default:
      return "UNKNOWN";
  }
};

/**
 * Wraps any failure from the Sheets client in a SpreadsheetError.
 */
export const toSpreadsheetError = (
  error: unknown,
  operation: string,
  sheetName?: string,
): SpreadsheetError => {
  if (error instanceof SpreadsheetError) {
    return error;
  }
  const code = classify(error);
  const target = sheetName ? ` on ${sheetName}` : "";
  return new SpreadsheetError(
    `Spreadsheet ${operation}${target} failed: ${messageOf(error)}`,
    code,
    sheetName,
    error,
  );
};
