import { isSpreadsheetError } from "@/adapters/errors";
import { type LedgerErrorCode, isLedgerError } from "@/domains/ledger";
import { SettingsError } from "@/domains/settings";
import { JobCancelledError } from "@/worker/queue";

export type ErrorStatus = 400 | 404 | 409 | 422 | 429 | 500 | 502 | 503;

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    field?: string;
  };
}

export class RequestValidationError extends Error {
  public override readonly name = "RequestValidationError";
  public readonly code = "INVALID_REQUEST";

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

export const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, ErrorStatus> = {
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  INACTIVE_ACCOUNT: 409,
  INSUFFICIENT_BALANCE: 422,
  CONCURRENT_WRITE_CONFLICT: 409,
  INVALID_AMOUNT: 400,
  INVALID_TRANSFER: 400,
  INVALID_TRANSITION: 409,
};

const SPREADSHEET_ERROR_STATUS = {
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  RATE_LIMITED: 429,
  PERMISSION_DENIED: 502,
  NETWORK_ERROR: 503,
  UNKNOWN: 502,
} as const satisfies Record<string, ErrorStatus>;

/**
 * Maps a thrown error to a response. `null` means the error is unexpected.
 */
export const toErrorResponse = (error: unknown): { status: ErrorStatus; body: ErrorBody } | null => {
  if (error instanceof RequestValidationError || error instanceof SettingsError) {
    return {
      status: 400,
      body: {
        error: {
          code: error.code,
          message: error.message,
          ...(error.field !== undefined && { field: error.field }),
        },
      },
    };
  }
  if (isLedgerError(error)) {
    return {
      status: LEDGER_ERROR_STATUS[error.code],
      body: { error: { code: error.code, message: error.message } },
    };
  }
  if (isSpreadsheetError(error)) {
    return {
      status: SPREADSHEET_ERROR_STATUS[error.code],
      body: { error: { code: `SPREADSHEET_${error.code}`, message: error.message } },
    };
  }
  if (error instanceof JobCancelledError) {
    return {
      status: 409,
      body: { error: { code: "SYNC_CANCELLED", message: "Reconciliation pass was cancelled before it finished" } },
    };
  }
  return null;
};
