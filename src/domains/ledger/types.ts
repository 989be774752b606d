import * as v from "valibot";

export const accountRoleSchema = v.picklist(["teacher", "student"]);
export type AccountRole = v.InferOutput<typeof accountRoleSchema>;

export const accountStatusSchema = v.picklist([
  "pending",
  "active",
  "pending_restore",
  "deleted",
  "banned",
]);
export type AccountStatus = v.InferOutput<typeof accountStatusSchema>;

export const isAccountRole = (value: unknown): value is AccountRole =>
  v.is(accountRoleSchema, value);

export const isAccountStatus = (value: unknown): value is AccountStatus =>
  v.is(accountStatusSchema, value);

/**
 * Statuses whose sheet rows are removed during cleanup.
 */
export const REMOVED_STATUSES: readonly AccountStatus[] = ["deleted", "banned"];

export interface AccountProfile {
  fullName: string;
  phone: string;
  username: string;
}

/**
 * A ledger account. `balance` is a signed integer number of points and
 * `version` increments on every write.
 */
export interface Account extends AccountProfile {
  id: string;
  balance: number;
  role: AccountRole;
  status: AccountStatus;
  groupId: string | null;
  updatedAt: Date | null;
  createdAt: Date;
  version: number;
}

export interface CreateAccountInput extends Partial<AccountProfile> {
  balance?: number;
  role: AccountRole;
  status: AccountStatus;
  groupId?: string | null;
  updatedAt?: Date | null;
}

export type AccountPatch = Partial<
  Pick<Account, "fullName" | "phone" | "username" | "balance" | "role" | "status" | "groupId" | "updatedAt">
>;

export interface AccountFilters {
  role?: AccountRole;
  status?: AccountStatus;
  /** `null` matches accounts without a group; omit to match any */
  groupId?: string | null;
}

export const logEntryTypeSchema = v.picklist(["transfer", "add", "subtract", "manual_edit"]);
export type LogEntryType = v.InferOutput<typeof logEntryTypeSchema>;

export const logSourceSchema = v.picklist(["bot", "spreadsheet"]);
export type LogSource = v.InferOutput<typeof logSourceSchema>;

export const isLogEntryType = (value: unknown): value is LogEntryType =>
  v.is(logEntryTypeSchema, value);

export const isLogSource = (value: unknown): value is LogSource => v.is(logSourceSchema, value);

/**
 * Append-only audit record of a balance change.
 */
export interface TransactionLogEntry {
  id: string;
  type: LogEntryType;
  senderId: string | null;
  recipientId: string | null;
  actorId: string | null;
  amount: number;
  commission: number;
  oldBalance: number | null;
  newBalance: number | null;
  source: LogSource;
  reason: string | null;
  status: "completed";
  createdAt: Date;
}

export interface NewLogEntry {
  type: LogEntryType;
  source: LogSource;
  amount: number;
  senderId?: string | null;
  recipientId?: string | null;
  actorId?: string | null;
  commission?: number;
  oldBalance?: number | null;
  newBalance?: number | null;
  reason?: string | null;
}

export interface LogEntryFilters {
  type?: LogEntryType;
  /** Matches sender, recipient or actor */
  accountId?: string;
  limit?: number;
}

export interface TransferBalances {
  senderBalance: number;
  recipientBalance: number;
}

/**
 * Builds a complete log entry record from the fields a caller supplies.
 */
export const toLogEntry = (id: string, entry: NewLogEntry, createdAt: Date): TransactionLogEntry => ({
  id,
  type: entry.type,
  senderId: entry.senderId ?? null,
  recipientId: entry.recipientId ?? null,
  actorId: entry.actorId ?? null,
  amount: entry.amount,
  commission: entry.commission ?? 0,
  oldBalance: entry.oldBalance ?? null,
  newBalance: entry.newBalance ?? null,
  source: entry.source,
  reason: entry.reason ?? null,
  status: "completed",
  createdAt,
});
