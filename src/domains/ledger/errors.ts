export type LedgerErrorCode =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INACTIVE_ACCOUNT"
  | "INSUFFICIENT_BALANCE"
  | "CONCURRENT_WRITE_CONFLICT"
  | "INVALID_AMOUNT"
  | "INVALID_TRANSFER"
  | "INVALID_TRANSITION";

export class LedgerError extends Error {
  public override readonly name = "LedgerError";

  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    public readonly accountId?: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export const isLedgerError = (error: unknown, code?: LedgerErrorCode): error is LedgerError =>
  error instanceof LedgerError && (code === undefined || error.code === code);

export const accountNotFound = (accountId: string): LedgerError =>
  new LedgerError(`Account not found: ${accountId}`, "NOT_FOUND", accountId);

export const writeConflict = (accountId: string, cause?: unknown): LedgerError =>
  new LedgerError(
    `Concurrent write conflict on account ${accountId}`,
    "CONCURRENT_WRITE_CONFLICT",
    accountId,
    cause,
  );

export const groupNotFound = (groupId: string): LedgerError =>
  new LedgerError(`Group not found: ${groupId}`, "NOT_FOUND");

export const groupAlreadyExists = (groupId: string): LedgerError =>
  new LedgerError(`Group already exists: ${groupId}`, "ALREADY_EXISTS");
