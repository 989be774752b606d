import { and, desc, eq, inArray, isNull, or, sql } from "drizzle-orm";

import {
  type Account,
  LedgerError,
  accountNotFound,
  applyTransfer,
  validateDelta,
  validateTransferInput,
  writeConflict,
} from "@/domains/ledger";

import type { Database } from "../../client";
import { type ConflictRetryOptions, withConflictRetry } from "../../conflict-retry";
import type { LedgerStore } from "../../ports/ledger-store";
import { accounts, transactionLogs } from "../../schema";
import { isRetryableTransactionError, isUniqueViolation, mapAccount, mapLogEntry } from "./mappers";

/**
 * Runs `operation`, turning serialization failures and deadlocks into
 * write conflicts so the retry loop treats them alike.
 */
const asConflict = async <T>(accountId: string, operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    if (isRetryableTransactionError(error)) {
      throw writeConflict(accountId, error);
    }
    throw error;
  }
};

export const createPostgresLedgerStore = (
  db: Database,
  conflictRetry?: ConflictRetryOptions,
): LedgerStore => {
  const selectAccount = async (id: string): Promise<typeof accounts.$inferSelect | undefined> => {
    const [row] = await db.select().from(accounts).where(eq(accounts.id, id));
    return row;
  };

  return {
    getAccount: async (id) => {
      const row = await selectAccount(id);
      return row ? mapAccount(row) : null;
    },

    createAccount: async (id, input) => {
      try {
        const [inserted] = await db
          .insert(accounts)
          .values({
            id,
            fullName: input.fullName ?? "",
            phone: input.phone ?? "",
            username: input.username ?? "",
            balance: input.balance ?? 0,
            role: input.role,
            status: input.status,
            groupId: input.groupId ?? null,
            updatedAt: input.updatedAt === undefined ? new Date() : input.updatedAt,
          })
          .returning();
        if (!inserted) {
          throw new Error(`Failed to create account ${id}`);
        }
        return mapAccount(inserted);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new LedgerError(`Account already exists: ${id}`, "ALREADY_EXISTS", id, error);
        }
        throw error;
      }
    },

    updateAccount: async (id, patch, { expectedVersion } = {}) => {
      const attempt = async (): Promise<Account> => {
        const current = await selectAccount(id);
        if (!current) {
          throw accountNotFound(id);
        }
        const version = expectedVersion ?? current.version;
        const [updated] = await db
          .update(accounts)
          .set({
            ...patch,
            updatedAt: patch.updatedAt === undefined ? new Date() : patch.updatedAt,
            version: version + 1,
          })
          .where(and(eq(accounts.id, id), eq(accounts.version, version)))
          .returning();
        if (!updated) {
          throw writeConflict(id);
        }
        return mapAccount(updated);
      };
      return expectedVersion === undefined
        ? withConflictRetry(attempt, conflictRetry)
        : attempt();
    },

    listAccounts: async (filters = {}) => {
      const conditions = [
        filters.role === undefined ? undefined : eq(accounts.role, filters.role),
        filters.status === undefined ? undefined : eq(accounts.status, filters.status),
        filters.groupId === undefined
          ? undefined
          : filters.groupId === null
            ? isNull(accounts.groupId)
            : eq(accounts.groupId, filters.groupId),
      ];
      const rows = await db
        .select()
        .from(accounts)
        .where(and(...conditions))
        .orderBy(accounts.createdAt);
      return rows.map(mapAccount);
    },

    reassignGroup: async (from, to) => {
      const rows = await db
        .update(accounts)
        .set({ groupId: to, version: sql`${accounts.version} + 1` })
        .where(eq(accounts.groupId, from))
        .returning({ id: accounts.id });
      return rows.length;
    },

    deleteAccount: async (id) => {
      await db.delete(accounts).where(eq(accounts.id, id));
    },

    transferPoints: async (senderId, recipientId, amount, commission) => {
      validateTransferInput(senderId, recipientId, amount, commission);

      return withConflictRetry(
        () =>
          asConflict(senderId, () =>
            db.transaction(async (tx) => {
              const rows = await tx
                .select()
                .from(accounts)
                .where(inArray(accounts.id, [senderId, recipientId]));
              const sender = rows.find((row) => row.id === senderId);
              const recipient = rows.find((row) => row.id === recipientId);
              const balances = applyTransfer(
                senderId,
                sender,
                recipientId,
                recipient,
                amount,
                commission,
              );

              const updatedAt = new Date();
              for (const [party, balance] of [
                [sender, balances.senderBalance],
                [recipient, balances.recipientBalance],
              ] as const) {
                if (!party) {
                  continue;
                }
                const [written] = await tx
                  .update(accounts)
                  .set({ balance, updatedAt, version: party.version + 1 })
                  .where(and(eq(accounts.id, party.id), eq(accounts.version, party.version)))
                  .returning({ id: accounts.id });
                if (!written) {
                  throw writeConflict(party.id);
                }
              }
              return balances;
            }),
          ),
        conflictRetry,
      );
    },

    adjustBalance: async (id, delta) => {
      validateDelta(delta);

      return withConflictRetry(
        () =>
          asConflict(id, async () => {
            const current = await selectAccount(id);
            if (!current) {
              throw accountNotFound(id);
            }
            const balance = current.balance + delta;
            const [written] = await db
              .update(accounts)
              .set({ balance, updatedAt: new Date(), version: current.version + 1 })
              .where(and(eq(accounts.id, id), eq(accounts.version, current.version)))
              .returning({ id: accounts.id });
            if (!written) {
              throw writeConflict(id);
            }
            return balance;
          }),
        conflictRetry,
      );
    },

    appendLogEntry: async (entry) => {
      const [inserted] = await db
        .insert(transactionLogs)
        .values({
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
        })
        .returning();
      if (!inserted) {
        throw new Error("Failed to append log entry");
      }
      return mapLogEntry(inserted);
    },

    listLogEntries: async (filters = {}) => {
      const { type, accountId, limit } = filters;
      const query = db
        .select()
        .from(transactionLogs)
        .where(
          and(
            type === undefined ? undefined : eq(transactionLogs.type, type),
            accountId === undefined
              ? undefined
              : or(
                  eq(transactionLogs.senderId, accountId),
                  eq(transactionLogs.recipientId, accountId),
                  eq(transactionLogs.actorId, accountId),
                ),
          ),
        )
        .orderBy(desc(transactionLogs.createdAt));
      const rows = limit === undefined ? await query : await query.limit(limit);
      return rows.map(mapLogEntry);
    },
  };
};
