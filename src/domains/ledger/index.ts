export type {
  Account,
  AccountFilters,
  AccountPatch,
  AccountProfile,
  AccountRole,
  AccountStatus,
  CreateAccountInput,
  LogEntryFilters,
  LogEntryType,
  LogSource,
  NewLogEntry,
  TransactionLogEntry,
  TransferBalances,
} from "./types";
export {
  accountRoleSchema,
  accountStatusSchema,
  isAccountRole,
  isAccountStatus,
  isLogEntryType,
  isLogSource,
  logEntryTypeSchema,
  logSourceSchema,
  REMOVED_STATUSES,
  toLogEntry,
} from "./types";

export type { LedgerErrorCode } from "./errors";
export {
  accountNotFound,
  groupAlreadyExists,
  groupNotFound,
  isLedgerError,
  LedgerError,
  writeConflict,
} from "./errors";

export type { TransitionResult } from "./result";
export { isTransitionOk } from "./result";

export type { AccountEvent } from "./lifecycle";
export { ACCOUNT_TRANSITIONS, INITIAL_ACCOUNT_STATUS, transitionAccount } from "./lifecycle";

export {
  applyTransfer,
  calculateCommission,
  validateDelta,
  validateTransferInput,
} from "./transfer-rules";
