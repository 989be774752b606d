export type SpreadsheetErrorCode =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "RATE_LIMITED"
  | "PERMISSION_DENIED"
  | "NETWORK_ERROR"
  | "UNKNOWN";

export class SpreadsheetError extends Error {
  public override readonly name = "SpreadsheetError";

  constructor(
    message: string,
    public readonly code: SpreadsheetErrorCode,
    public readonly sheetName?: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export const isSpreadsheetError = (
  error: unknown,
  code?: SpreadsheetErrorCode,
): error is SpreadsheetError =>
  error instanceof SpreadsheetError && (code === undefined || error.code === code);
