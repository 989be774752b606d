/**
 * In-memory ledger store with the same compare-and-swap semantics as the
 * Postgres store. Each operation yields between its read and its commit, so
 * concurrent callers interleave the way database transactions do.
 */

import { randomUUID } from "node:crypto";

import {
  type Account,
  type TransactionLogEntry,
  LedgerError,
  accountNotFound,
  applyTransfer,
  toLogEntry,
  validateDelta,
  validateTransferInput,
  writeConflict,
} from "@/domains/ledger";

import { type ConflictRetryOptions, withConflictRetry } from "../../conflict-retry";
import type { LedgerStore } from "../../ports/ledger-store";

export interface MemoryLedgerStoreOptions {
  now?: () => Date;
  conflictRetry?: ConflictRetryOptions;
}

const suspend = (): Promise<void> =>
  new Promise((resolve) => {
    queueMicrotask(resolve);
  });

export const createMemoryLedgerStore = (options: MemoryLedgerStoreOptions = {}): LedgerStore => {
  const { now = () => new Date(), conflictRetry } = options;
  const accounts = new Map<string, Account>();
  const logs: TransactionLogEntry[] = [];

  const read = (id: string): Account | undefined => {
    const account = accounts.get(id);
    return account ? { ...account } : undefined;
  };

  /**
   * Returns the stored record if its version still matches. Synchronous, so
   * a commit touching several records cannot be interleaved.
   */
  const checkVersion = (id: string, expectedVersion: number): Account => {
    const stored = accounts.get(id);
    if (!stored) {
      throw accountNotFound(id);
    }
    if (stored.version !== expectedVersion) {
      throw writeConflict(id);
    }
    return stored;
  };

  return {
    getAccount: async (id) => {
      await suspend();
      return read(id) ?? null;
    },

    createAccount: async (id, input) => {
      await suspend();
      if (accounts.has(id)) {
        throw new LedgerError(`Account already exists: ${id}`, "ALREADY_EXISTS", id);
      }
      const account: Account = {
        id,
        fullName: input.fullName ?? "",
        phone: input.phone ?? "",
        username: input.username ?? "",
        balance: input.balance ?? 0,
        role: input.role,
        status: input.status,
        groupId: input.groupId ?? null,
        updatedAt: input.updatedAt === undefined ? now() : input.updatedAt,
        createdAt: now(),
        version: 0,
      };
      accounts.set(id, account);
      return { ...account };
    },

    updateAccount: async (id, patch, { expectedVersion } = {}) => {
      const attempt = async (): Promise<Account> => {
        const current = read(id);
        if (!current) {
          throw accountNotFound(id);
        }
        await suspend();
        const stored = checkVersion(id, expectedVersion ?? current.version);
        const next: Account = {
          ...stored,
          ...patch,
          updatedAt: patch.updatedAt === undefined ? now() : patch.updatedAt,
          version: stored.version + 1,
        };
        accounts.set(id, next);
        return { ...next };
      };
      return expectedVersion === undefined ? withConflictRetry(attempt, conflictRetry) : attempt();
    },

    listAccounts: async (filters = {}) => {
      await suspend();
      return [...accounts.values()]
        .filter(
          (account) =>
            (filters.role === undefined || account.role === filters.role) &&
            (filters.status === undefined || account.status === filters.status) &&
            (filters.groupId === undefined || account.groupId === filters.groupId),
        )
        .map((account) => ({ ...account }));
    },

    reassignGroup: async (from, to) => {
      await suspend();
      let count = 0;
      for (const account of accounts.values()) {
        if (account.groupId === from) {
          accounts.set(account.id, { ...account, groupId: to, version: account.version + 1 });
          count++;
        }
      }
      return count;
    },

    deleteAccount: async (id) => {
      await suspend();
      accounts.delete(id);
    },

    transferPoints: async (senderId, recipientId, amount, commission) => {
      validateTransferInput(senderId, recipientId, amount, commission);
      return withConflictRetry(async () => {
        const sender = read(senderId);
        const recipient = read(recipientId);
        const balances = applyTransfer(senderId, sender, recipientId, recipient, amount, commission);
        await suspend();

        const storedSender = checkVersion(senderId, sender?.version ?? -1);
        const storedRecipient = checkVersion(recipientId, recipient?.version ?? -1);
        const updatedAt = now();
        accounts.set(senderId, {
          ...storedSender,
          balance: balances.senderBalance,
          updatedAt,
          version: storedSender.version + 1,
        });
        accounts.set(recipientId, {
          ...storedRecipient,
          balance: balances.recipientBalance,
          updatedAt,
          version: storedRecipient.version + 1,
        });
        return balances;
      }, conflictRetry);
    },

    adjustBalance: async (id, delta) => {
      validateDelta(delta);
      return withConflictRetry(async () => {
        const current = read(id);
        if (!current) {
          throw accountNotFound(id);
        }
        await suspend();
        const stored = checkVersion(id, current.version);
        const balance = stored.balance + delta;
        accounts.set(id, { ...stored, balance, updatedAt: now(), version: stored.version + 1 });
        return balance;
      }, conflictRetry);
    },

    appendLogEntry: async (entry) => {
      await suspend();
      const logEntry = toLogEntry(randomUUID(), entry, now());
      logs.push(logEntry);
      return { ...logEntry };
    },

    listLogEntries: async (filters = {}) => {
      await suspend();
      const { type, accountId, limit } = filters;
      const matching = logs
        .filter(
          (entry) =>
            (type === undefined || entry.type === type) &&
            (accountId === undefined ||
              entry.senderId === accountId ||
              entry.recipientId === accountId ||
              entry.actorId === accountId),
        )
        .reverse();
      return (limit === undefined ? matching : matching.slice(0, limit)).map((entry) => ({
        ...entry,
      }));
    },
  };
};
