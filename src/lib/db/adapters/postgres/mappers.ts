import {
  type Account,
  type TransactionLogEntry,
  isAccountRole,
  isAccountStatus,
  isLogEntryType,
  isLogSource,
} from "@/domains/ledger";
import { type Group, isGroupStatus } from "@/domains/partition";

import type { accounts, groups, transactionLogs } from "../../schema";

export const mapAccount = (row: typeof accounts.$inferSelect): Account => {
  if (!isAccountRole(row.role)) {
    throw new Error(`Invalid account role: ${row.role}`);
  }
  if (!isAccountStatus(row.status)) {
    throw new Error(`Invalid account status: ${row.status}`);
  }

  return {
    id: row.id,
    fullName: row.fullName,
    phone: row.phone,
    username: row.username,
    balance: row.balance,
    role: row.role,
    status: row.status,
    groupId: row.groupId ?? null,
    updatedAt: row.updatedAt ?? null,
    createdAt: row.createdAt,
    version: row.version,
  };
};

export const mapLogEntry = (row: typeof transactionLogs.$inferSelect): TransactionLogEntry => {
  if (!isLogEntryType(row.type)) {
    throw new Error(`Invalid log entry type: ${row.type}`);
  }
  if (!isLogSource(row.source)) {
    throw new Error(`Invalid log entry source: ${row.source}`);
  }

  return {
    id: row.id,
    type: row.type,
    senderId: row.senderId ?? null,
    recipientId: row.recipientId ?? null,
    actorId: row.actorId ?? null,
    amount: row.amount,
    commission: row.commission,
    oldBalance: row.oldBalance ?? null,
    newBalance: row.newBalance ?? null,
    source: row.source,
    reason: row.reason ?? null,
    status: "completed",
    createdAt: row.createdAt,
  };
};

export const mapGroup = (row: typeof groups.$inferSelect): Group => {
  if (!isGroupStatus(row.status)) {
    throw new Error(`Invalid group status: ${row.status}`);
  }

  return {
    id: row.id,
    displayName: row.displayName,
    hidden: row.hidden,
    status: row.status,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
};

const SERIALIZATION_FAILURE = "40001";
const DEADLOCK_DETECTED = "40P01";
const UNIQUE_VIOLATION = "23505";

const postgresCode = (error: unknown): string | undefined =>
  error !== null && typeof error === "object" && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

export const isRetryableTransactionError = (error: unknown): boolean => {
  const code = postgresCode(error);
  return code === SERIALIZATION_FAILURE || code === DEADLOCK_DETECTED;
};

export const isUniqueViolation = (error: unknown): boolean =>
  postgresCode(error) === UNIQUE_VIOLATION;
