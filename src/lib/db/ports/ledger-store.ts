import type {
  Account,
  AccountFilters,
  AccountPatch,
  CreateAccountInput,
  LogEntryFilters,
  NewLogEntry,
  TransactionLogEntry,
  TransferBalances,
} from "@/domains/ledger";

export interface UpdateAccountOptions {
  /**
   * Compare-and-swap guard: the write fails with CONCURRENT_WRITE_CONFLICT
   * unless the stored version still equals this value.
   */
  expectedVersion?: number;
}

/**
 * Transactional balance store. Every account write bumps `version`; writes
 * without an explicit `updatedAt` in the patch stamp the current time.
 */
export interface LedgerStore {
  getAccount(id: string): Promise<Account | null>;
  /** Fails with ALREADY_EXISTS when the id is taken */
  createAccount(id: string, input: CreateAccountInput): Promise<Account>;
  /** Fails with NOT_FOUND, or CONCURRENT_WRITE_CONFLICT on a version mismatch */
  updateAccount(id: string, patch: AccountPatch, options?: UpdateAccountOptions): Promise<Account>;
  listAccounts(filters?: AccountFilters): Promise<Account[]>;
  /** Re-points every account in group `from` to group `to`; returns the count */
  reassignGroup(from: string, to: string): Promise<number>;
  /** Hard delete; no-op when missing */
  deleteAccount(id: string): Promise<void>;
  /**
   * Moves `amount` from sender to recipient and burns `commission` from the
   * sender, all-or-nothing.
   */
  transferPoints(
    senderId: string,
    recipientId: string,
    amount: number,
    commission: number,
  ): Promise<TransferBalances>;
  /** Atomic read-modify-write of one balance; returns the new balance */
  adjustBalance(id: string, delta: number): Promise<number>;
  appendLogEntry(entry: NewLogEntry): Promise<TransactionLogEntry>;
  /** Newest first */
  listLogEntries(filters?: LogEntryFilters): Promise<TransactionLogEntry[]>;
}
